/**
 * JSON-over-HTTP channel to the Tiny Tiny RSS API
 */

import type { HttpClient } from "../port/http_client.ts";
import type { RpcChannel } from "../port/rpc_channel.ts";
import type { Envelope, JsonObject, SessionState } from "../domain/types.ts";
import {
  ConnectionError,
  DecodeError,
  EncodeError,
  errorMessage,
} from "../domain/errors.ts";
import { decodeEnvelope } from "./envelope_decoder.ts";
import { createComponentLogger } from "../infra/logger.ts";

const logger = createComponentLogger("rpc-channel");

export const OPERATION_KEY = "op";
export const SESSION_KEY = "sid";

export function encodeRequest(body: JsonObject): string {
  try {
    return JSON.stringify(body);
  } catch (error) {
    throw new EncodeError(
      `error encoding JSON: ${errorMessage(error)} - trying to encode ${
        Object.keys(body).join(", ")
      }`,
      { cause: error },
    );
  }
}

export class TtrssRpcChannel implements RpcChannel {
  constructor(
    private httpClient: HttpClient,
    readonly session: SessionState,
  ) {}

  /**
   * Issues one API operation. Application errors come back in the
   * Envelope; only transport and decode failures reject.
   */
  async call(operation: string, parameters: JsonObject = {}): Promise<Envelope> {
    const body: JsonObject = { ...parameters, [OPERATION_KEY]: operation };
    if (this.session.token !== "") {
      body[SESSION_KEY] = this.session.token;
    }

    const payload = encodeRequest(body);
    logger.debug("Issuing API call", { operation, request: body });

    let response: Response;
    let text: string;
    try {
      response = await this.httpClient.fetch(this.session.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: payload,
      });
      text = await response.text();
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(`connection error: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(
        `API JSON response was malformed (HTTP ${response.status}): ${
          errorMessage(error)
        } - are you sure you supplied the correct URL?`,
        { cause: error },
      );
    }

    const envelope = decodeEnvelope(parsed, response.status);
    logger.debug("API call completed", {
      operation,
      status: envelope.status,
      seq: envelope.sequence,
    });
    return envelope;
  }
}
