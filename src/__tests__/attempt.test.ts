/**
 * Tests for the attempt lifecycle.
 */

import { describe, it, expect } from "vitest";
import { AuthAttempt } from "../strategy";
import { MissingCodeError, StateError } from "../error";
import { createToken } from "../types/token";

const token = createToken({ accessToken: "at-1", tokenType: "Bearer" });

describe("AuthAttempt", () => {
  it("should start idle with no data", () => {
    const attempt = new AuthAttempt();

    expect(attempt.state).toBe("idle");
    expect(attempt.scopes).toEqual([]);
    expect(attempt.errors).toEqual([]);
    expect(attempt.token).toBeUndefined();
  });

  it("should walk the success path", () => {
    const attempt = new AuthAttempt();

    attempt.issue({ scopes: ["snsapi_userinfo"], stateParam: "s1" });
    expect(attempt.state).toBe("request_issued");

    attempt.receiveCallback();
    attempt.setToken(token);
    attempt.authenticate({ openId: "ou_1" });

    expect(attempt.state).toBe("authenticated");
    expect(attempt.token).toBe(token);
    expect(attempt.profile).toEqual({ openId: "ou_1" });
  });

  it("should record failures with their typed cause", () => {
    const attempt = AuthAttempt.resume();
    attempt.receiveCallback();

    const error = new MissingCodeError();
    attempt.fail(error);

    expect(attempt.state).toBe("failed");
    expect(attempt.errors).toEqual([{ code: "missing_code", description: "No code received" }]);
    expect(attempt.failure).toBe(error);
  });

  it("should resume from a snapshot", () => {
    const original = new AuthAttempt();
    original.issue({
      scopes: ["contact"],
      stateParam: "s1",
      redirectUri: "https://app.example.com/cb",
    });

    const resumed = AuthAttempt.resume(original.snapshot());

    expect(resumed.state).toBe("request_issued");
    expect(resumed.scopes).toEqual(["contact"]);
    expect(resumed.stateParam).toBe("s1");
    expect(resumed.redirectUri).toBe("https://app.example.com/cb");
  });

  it("should reject a callback before the request is issued", () => {
    const attempt = new AuthAttempt();

    expect(() => attempt.receiveCallback()).toThrow(
      "Cannot move attempt from idle to callback_received"
    );
  });

  it("should reject a second callback", () => {
    const attempt = AuthAttempt.resume();
    attempt.receiveCallback();

    expect(() => attempt.receiveCallback()).toThrow(StateError);
  });

  it("should only accept a token while handling the callback", () => {
    const attempt = AuthAttempt.resume();

    expect(() => attempt.setToken(token)).toThrow(
      "Attempt is request_issued, expected callback_received"
    );
  });

  it("should refuse cleanup before a terminal state", () => {
    const attempt = AuthAttempt.resume();

    expect(() => attempt.cleanup()).toThrow(
      "Cannot move attempt from request_issued to cleaned_up"
    );
  });

  it("should clear data on cleanup and allow repeating it", () => {
    const attempt = AuthAttempt.resume();
    attempt.receiveCallback();
    attempt.setToken(token);
    attempt.authenticate({ openId: "ou_1" });

    attempt.cleanup();
    attempt.cleanup();

    expect(attempt.state).toBe("cleaned_up");
    expect(attempt.token).toBeUndefined();
    expect(attempt.profile).toBeUndefined();
  });

  it("should hand out copies of its collections", () => {
    const attempt = AuthAttempt.resume({ scopes: ["a"] });

    attempt.scopes.push("b");
    attempt.snapshot().scopes.push("c");

    expect(attempt.scopes).toEqual(["a"]);
  });
});
