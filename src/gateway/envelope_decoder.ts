/**
 * Decodes a raw API response body into an Envelope
 */

import * as v from "valibot";
import { ApiStatus, type Envelope, type JsonObject } from "../domain/types.ts";
import { DecodeError } from "../domain/errors.ts";
import { describeIssues } from "../domain/issues.ts";

export const NO_ERROR_TEXT = "(response contained no error text)";

const IntegerSchema = v.pipe(v.number(), v.integer());

const WireEnvelopeSchema = v.looseObject({
  seq: v.nullish(IntegerSchema),
  status: IntegerSchema,
});

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// The server nests the payload under "content"; older and third-party
// backends merge it into the envelope itself.
function extractContent(body: JsonObject): JsonObject {
  const nested = body["content"];
  if (isJsonObject(nested)) {
    return nested;
  }
  const merged: JsonObject = {};
  for (const [key, value] of Object.entries(body)) {
    if (key !== "seq" && key !== "status") {
      merged[key] = value;
    }
  }
  return merged;
}

export function classifyError(
  status: ApiStatus,
  content: Readonly<JsonObject>,
): string | null {
  const apiError = content["error"];
  if (typeof apiError === "string") {
    return apiError;
  }
  return status === ApiStatus.OK ? null : NO_ERROR_TEXT;
}

/**
 * @param body parsed JSON, or undefined when the body was not JSON
 * @param httpStatus reported in the error message only
 */
export function decodeEnvelope(body: unknown, httpStatus: number): Envelope {
  const parsed = v.safeParse(WireEnvelopeSchema, body);
  if (!parsed.success || !isJsonObject(body)) {
    const reason = parsed.success
      ? "body is not a JSON object"
      : describeIssues(parsed.issues);
    throw new DecodeError(
      `API JSON response was malformed (HTTP ${httpStatus}): ${reason} - are you sure you supplied the correct URL?`,
    );
  }

  const status = parsed.output.status === ApiStatus.OK
    ? ApiStatus.OK
    : ApiStatus.ERROR;
  const content = Object.freeze(extractContent(body));

  return Object.freeze({
    sequence: parsed.output.seq ?? null,
    status,
    error: classifyError(status, content),
    content,
  });
}
