/**
 * Subscription outcome decoding for subscribeToFeed
 */

import * as v from "valibot";
import type { JsonObject } from "./types.ts";
import { ProtocolError } from "./errors.ts";
import { describeIssues } from "./issues.ts";

export const SubscribeStatus = {
  ALREADY_SUBSCRIBED: 0,
  ADDED: 1,
  INVALID_URL: 2,
  HTML_NO_FEEDS: 3,
  HTML_MULTIPLE_FEEDS: 4,
  GET_FAILED: 5,
  XML_INVALID: 6,
} as const;

export type SubscribeStatus =
  (typeof SubscribeStatus)[keyof typeof SubscribeStatus];

const SUBSCRIBE_STATUS_DESCRIPTIONS: Record<SubscribeStatus, string> = {
  [SubscribeStatus.ALREADY_SUBSCRIBED]: "already subscribed to feed",
  [SubscribeStatus.ADDED]: "subscribed to feed",
  [SubscribeStatus.INVALID_URL]: "invalid feed URL",
  [SubscribeStatus.HTML_NO_FEEDS]: "no feed link found in HTML at URL",
  [SubscribeStatus.HTML_MULTIPLE_FEEDS]:
    "multiple feed links found in HTML at URL",
  [SubscribeStatus.GET_FAILED]: "unable to GET URL",
  [SubscribeStatus.XML_INVALID]: "invalid XML at URL",
};

export const NO_SUBSCRIBE_MESSAGE = "(no underlying error returned by API)";

export function describeSubscribeStatus(status: SubscribeStatus): string {
  return SUBSCRIBE_STATUS_DESCRIPTIONS[status];
}

export function isSubscribeStatus(code: number): code is SubscribeStatus {
  return Number.isInteger(code) &&
    code >= SubscribeStatus.ALREADY_SUBSCRIBED &&
    code <= SubscribeStatus.XML_INVALID;
}

/**
 * What the server reported for a subscribe attempt.
 *
 * This is an Error so callers may throw it, but it is returned for every
 * code, including ADDED and ALREADY_SUBSCRIBED. Check `subscribed` on the
 * result, not the presence of an outcome.
 */
export class SubscriptionOutcome extends Error {
  constructor(
    readonly code: SubscribeStatus,
    /**
     * The server's own message, or NO_SUBSCRIBE_MESSAGE when it sent none.
     * `message` prefixes it with the code's description.
     */
    readonly detail: string,
  ) {
    super(`${describeSubscribeStatus(code)}: ${detail}`);
    this.name = "SubscriptionOutcome";
  }
}

export interface SubscribeResult {
  subscribed: boolean;
  outcome: SubscriptionOutcome;
}

const SubscribeStatusSchema = v.object({
  code: v.pipe(v.number(), v.integer()),
  message: v.optional(v.unknown()),
});

export function decodeSubscribe(content: Readonly<JsonObject>): SubscribeResult {
  const status = content["status"];
  if (typeof status !== "object" || status === null || Array.isArray(status)) {
    throw new ProtocolError(
      `subscribeToFeed: no subscription status: have instead ${
        JSON.stringify(content)
      }`,
    );
  }

  const parsed = v.safeParse(SubscribeStatusSchema, status);
  if (!parsed.success) {
    throw new ProtocolError(
      `subscribeToFeed: unknown subscription status ${JSON.stringify(status)}: ${
        describeIssues(parsed.issues)
      }`,
    );
  }

  const { code, message } = parsed.output;
  if (!isSubscribeStatus(code)) {
    throw new ProtocolError(
      `subscribeToFeed: subscription code ${code} is out of range`,
    );
  }

  const outcome = new SubscriptionOutcome(
    code,
    typeof message === "string" ? message : NO_SUBSCRIBE_MESSAGE,
  );

  return {
    subscribed: code === SubscribeStatus.ADDED ||
      code === SubscribeStatus.ALREADY_SUBSCRIBED,
    outcome,
  };
}
