import { describe, expect, it } from "vitest";
import {
  decodeSubscribe,
  describeSubscribeStatus,
  NO_SUBSCRIBE_MESSAGE,
  SubscribeStatus,
  SubscriptionOutcome,
} from "../../../src/domain/subscription.ts";
import { ProtocolError } from "../../../src/domain/errors.ts";

describe("decodeSubscribe", () => {
  it("should report ADDED as subscribed", () => {
    const result = decodeSubscribe({ status: { code: 1, message: "ok" } });

    expect(result.subscribed).toBe(true);
    expect(result.outcome.code).toBe(SubscribeStatus.ADDED);
    expect(result.outcome.detail).toBe("ok");
    expect(result.outcome.message).toBe("subscribed to feed: ok");
  });

  it("should report ALREADY_SUBSCRIBED with the placeholder message", () => {
    const result = decodeSubscribe({ status: { code: 0 } });

    expect(result.subscribed).toBe(true);
    expect(result.outcome.code).toBe(SubscribeStatus.ALREADY_SUBSCRIBED);
    expect(result.outcome.detail).toBe(NO_SUBSCRIBE_MESSAGE);
    expect(result.outcome.detail).toBe(
      "(no underlying error returned by API)",
    );
    expect(result.outcome.message).toBe(
      "already subscribed to feed: (no underlying error returned by API)",
    );
  });

  it("should report failure codes as not subscribed", () => {
    const result = decodeSubscribe({
      status: { code: 5, message: "connection refused" },
    });

    expect(result.subscribed).toBe(false);
    expect(result.outcome.code).toBe(SubscribeStatus.GET_FAILED);
    expect(result.outcome.message).toBe(
      "unable to GET URL: connection refused",
    );
  });

  it("should return an outcome value for every code", () => {
    for (let code = 0; code <= 6; code++) {
      const { outcome } = decodeSubscribe({ status: { code } });
      expect(outcome).toBeInstanceOf(SubscriptionOutcome);
      expect(outcome).toBeInstanceOf(Error);
      expect(outcome.code).toBe(code);
    }
  });

  it("should default a non-string message", () => {
    const result = decodeSubscribe({ status: { code: 2, message: 42 } });

    expect(result.outcome.detail).toBe(NO_SUBSCRIBE_MESSAGE);
    expect(result.outcome.message).toBe(
      "invalid feed URL: (no underlying error returned by API)",
    );
  });

  it("should reject codes outside the known range", () => {
    expect(() => decodeSubscribe({ status: { code: 99 } })).toThrow(
      new ProtocolError("subscribeToFeed: subscription code 99 is out of range"),
    );
    expect(() => decodeSubscribe({ status: { code: -1 } })).toThrow(
      ProtocolError,
    );
  });

  it("should reject a non-integer code", () => {
    expect(() => decodeSubscribe({ status: { code: 1.5 } })).toThrow(
      ProtocolError,
    );
    expect(() => decodeSubscribe({ status: { code: "1" } })).toThrow(
      /^subscribeToFeed: unknown subscription status \{"code":"1"\}: /,
    );
  });

  it("should reject a missing code", () => {
    expect(() => decodeSubscribe({ status: { message: "hm" } })).toThrow(
      ProtocolError,
    );
  });

  it("should reject a missing or flat status", () => {
    expect(() => decodeSubscribe({})).toThrow(
      new ProtocolError("subscribeToFeed: no subscription status: have instead {}"),
    );
    expect(() => decodeSubscribe({ status: 1 })).toThrow(ProtocolError);
    expect(() => decodeSubscribe({ status: [1] })).toThrow(ProtocolError);
  });
});

describe("describeSubscribeStatus", () => {
  it("should describe each code", () => {
    expect(describeSubscribeStatus(SubscribeStatus.ALREADY_SUBSCRIBED)).toBe(
      "already subscribed to feed",
    );
    expect(describeSubscribeStatus(SubscribeStatus.HTML_NO_FEEDS)).toBe(
      "no feed link found in HTML at URL",
    );
    expect(describeSubscribeStatus(SubscribeStatus.HTML_MULTIPLE_FEEDS)).toBe(
      "multiple feed links found in HTML at URL",
    );
    expect(describeSubscribeStatus(SubscribeStatus.XML_INVALID)).toBe(
      "invalid XML at URL",
    );
  });
});
