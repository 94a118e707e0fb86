/**
 * Tests that credentials and session ids never reach the log output
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DataSanitizer, StructuredLogger } from "../../src/infra/logger.ts";
import { config } from "../../src/infra/config.ts";

describe("Logger security", () => {
  let originalLevel: string | undefined;
  let lines: string[];

  beforeEach(() => {
    originalLevel = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = "debug";
    config.resetCache();
    lines = [];
    const capture = (line: string) => {
      lines.push(line);
    };
    vi.spyOn(console, "log").mockImplementation(capture);
    vi.spyOn(console, "warn").mockImplementation(capture);
    vi.spyOn(console, "error").mockImplementation(capture);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    config.resetCache();
  });

  it("should redact sensitive fields", () => {
    new StructuredLogger("test-logger").info("Logged in", {
      user: "reader",
      password: "test-password",
      session_id: "session-abc",
    });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({
      level: "info",
      msg: "Logged in",
      logger: "test-logger",
      user: "reader",
      password: "[REDACTED]",
      session_id: "[REDACTED]",
    });
  });

  it("should redact the sid inside a nested request body", () => {
    new StructuredLogger("rpc-channel").debug("Issuing API call", {
      operation: "getFeedTree",
      request: { op: "getFeedTree", sid: "session-abc" },
    });

    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({
      operation: "getFeedTree",
      request: { op: "getFeedTree", sid: "[REDACTED]" },
    });
  });

  it("should route levels to the matching console method", () => {
    const log = new StructuredLogger("test-logger");

    log.warn("careful");
    log.error("broken");

    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("should drop entries below the configured level", () => {
    process.env.LOG_LEVEL = "warn";
    config.resetCache();
    const log = new StructuredLogger("test-logger");

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");

    expect(lines).toHaveLength(1);
  });

  it("should take the level from the loaded config", () => {
    const log = new StructuredLogger("test-logger");
    config.loadConfig();
    process.env.LOG_LEVEL = "error";

    log.info("still shown");
    expect(lines).toHaveLength(1);

    config.resetCache();
    log.info("hidden");
    expect(lines).toHaveLength(1);
  });

  it("should fall back to info on an unknown level", () => {
    process.env.LOG_LEVEL = "verbose";
    config.resetCache();
    const log = new StructuredLogger("test-logger");

    log.debug("hidden");
    log.info("shown");

    expect(lines).toHaveLength(1);
  });

  it("should mask long opaque tokens in strings", () => {
    expect(
      DataSanitizer.sanitizeString(
        "token abcdefghijklmnopqrstuvwxyz0123456789 issued",
      ),
    ).toBe("token abcd[REDACTED]6789 issued");
  });

  it("should mask bearer credentials", () => {
    expect(DataSanitizer.sanitizeString("Authorization: Bearer test-token"))
      .toBe("Authorization: Bear[REDACTED]oken");
  });

  it("should leave non-string values untouched", () => {
    expect(DataSanitizer.sanitize({ count: 3, ok: true, items: ["a"] }))
      .toEqual({ count: 3, ok: true, items: ["a"] });
  });
});
