/**
 * Tests for the loggers.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { ConsoleLogger, InMemoryLogger, LogLevel, noOpLogger, redactContext } from "../telemetry";
import { SecretString } from "../types/token";

describe("InMemoryLogger", () => {
  it("should merge child context and share entries with the parent", () => {
    const logger = new InMemoryLogger({ provider: "feishu" });
    const child = logger.child({ variant: "direct" });

    child.warn("callback.provider_error", { errorCode: "Provider.access_denied" });

    expect(logger.getLogs()).toHaveLength(1);
    expect(logger.find("callback.provider_error")?.context).toEqual({
      provider: "feishu",
      variant: "direct",
      errorCode: "Provider.access_denied",
    });
    expect(logger.getLogsByLevel("warn")).toHaveLength(1);
  });

  it("should clear entries", () => {
    const logger = new InMemoryLogger();
    logger.info("request.redirect");

    logger.clear();

    expect(logger.getLogs()).toEqual([]);
  });
});

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should format the event with its context", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    new ConsoleLogger({ context: { provider: "feishu" } }).info("token.exchanged", {
      tokenType: "Bearer",
      durationMs: undefined,
    });

    expect(info).toHaveBeenCalledWith(
      '[INFO] token.exchanged {"provider":"feishu","tokenType":"Bearer"}'
    );
  });

  it("should drop entries below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    new ConsoleLogger({ minLevel: "info" }).debug("payload.signature_verified");

    expect(debug).not.toHaveBeenCalled();
  });
});

describe("ConsoleLogger redaction", () => {
  function capture(): { lines: string[]; logger: ConsoleLogger } {
    const lines: string[] = [];
    const logger = new ConsoleLogger({
      minLevel: "debug",
      write: (level: LogLevel, line: string) => lines.push(`${level}|${line}`),
    });
    return { lines, logger };
  }

  it("should mask secret keys and SecretString values", () => {
    const { lines, logger } = capture();

    logger.warn("token.exchanged", {
      access_token: "at-1",
      session_key: "sk-1",
      secret: new SecretString("test-secret"),
      tokenType: "session",
    });

    expect(lines).toEqual([
      'warn|[WARN] token.exchanged {"access_token":"[REDACTED]","session_key":"[REDACTED]","secret":"[REDACTED]","tokenType":"session"}',
    ]);
  });

  it("should carry child context and the shared sink", () => {
    const { lines, logger } = capture();

    logger.child({ provider: "feishu" }).debug("payload.decrypted", { fields: 3 });

    expect(lines).toEqual(['debug|[DEBUG] payload.decrypted {"provider":"feishu","fields":3}']);
  });

  it("should write the bare event when there are no fields", () => {
    const { lines, logger } = capture();

    logger.error("callback.failed");

    expect(lines).toEqual(["error|[ERROR] callback.failed"]);
  });
});

describe("redactContext", () => {
  it("should drop undefined values", () => {
    expect(redactContext({ scope: "read", durationMs: undefined, code: "abc" })).toEqual({
      scope: "read",
      code: "[REDACTED]",
    });
  });
});

describe("noOpLogger", () => {
  it("should return itself for children", () => {
    expect(noOpLogger.child({ provider: "feishu" })).toBe(noOpLogger);
  });
});
