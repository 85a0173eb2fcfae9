/**
 * Authentication Attempt
 *
 * Per-attempt state for one request/callback cycle.
 */

import { AttemptError, AuthError, StateError } from "../error";
import type { Token } from "../types/token";
import type { ProfileMapping } from "../types/result";

/**
 * Attempt lifecycle states.
 */
export type AttemptState =
  | "idle"
  | "request_issued"
  | "callback_received"
  | "authenticated"
  | "failed"
  | "cleaned_up";

const TRANSITIONS: Readonly<Record<AttemptState, readonly AttemptState[]>> = {
  idle: ["request_issued"],
  request_issued: ["callback_received"],
  callback_received: ["authenticated", "failed"],
  authenticated: ["cleaned_up"],
  failed: ["cleaned_up"],
  cleaned_up: [],
};

/**
 * Request-phase data a host can keep in its session between the redirect
 * and the callback.
 */
export interface AttemptSnapshot {
  scopes: string[];
  stateParam?: string;
  redirectUri?: string;
}

/**
 * One authentication attempt. Owned by a single request handler.
 */
export class AuthAttempt {
  private _state: AttemptState = "idle";
  private _scopes: string[] = [];
  private _stateParam?: string;
  private _redirectUri?: string;
  private _token?: Token;
  private _profile?: ProfileMapping;
  private _errors: AttemptError[] = [];
  private _failure?: AuthError;
  private _testBypass = false;

  /**
   * Recreate an attempt at the callback phase, optionally from a snapshot.
   */
  static resume(snapshot?: AttemptSnapshot): AuthAttempt {
    const attempt = new AuthAttempt();
    attempt.issue(snapshot ?? { scopes: [] });
    return attempt;
  }

  get state(): AttemptState {
    return this._state;
  }

  get scopes(): string[] {
    return [...this._scopes];
  }

  get stateParam(): string | undefined {
    return this._stateParam;
  }

  get redirectUri(): string | undefined {
    return this._redirectUri;
  }

  get token(): Token | undefined {
    return this._token;
  }

  get profile(): ProfileMapping | undefined {
    return this._profile;
  }

  get errors(): AttemptError[] {
    return [...this._errors];
  }

  /**
   * The typed error behind the failed state.
   */
  get failure(): AuthError | undefined {
    return this._failure;
  }

  /**
   * True when the callback used the test code and skipped the exchange.
   */
  get testBypass(): boolean {
    return this._testBypass;
  }

  snapshot(): AttemptSnapshot {
    return {
      scopes: [...this._scopes],
      stateParam: this._stateParam,
      redirectUri: this._redirectUri,
    };
  }

  issue(snapshot: AttemptSnapshot): void {
    this.transition("request_issued");
    this._scopes = [...snapshot.scopes];
    this._stateParam = snapshot.stateParam;
    this._redirectUri = snapshot.redirectUri;
  }

  receiveCallback(): void {
    this.transition("callback_received");
  }

  setToken(token: Token): void {
    this.expectState("callback_received");
    this._token = token;
  }

  authenticate(profile: ProfileMapping): void {
    this.transition("authenticated");
    this._profile = profile;
  }

  markTestBypass(): void {
    this.transition("authenticated");
    this._testBypass = true;
  }

  fail(error: AuthError): void {
    this.transition("failed");
    this._errors.push(error.toAttemptError());
    this._failure = error;
  }

  /**
   * Drop the token and profile. Safe to call repeatedly.
   */
  cleanup(): void {
    if (this._state !== "cleaned_up") {
      this.transition("cleaned_up");
    }
    this._token = undefined;
    this._profile = undefined;
  }

  private transition(next: AttemptState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new StateError(`Cannot move attempt from ${this._state} to ${next}`);
    }
    this._state = next;
  }

  private expectState(expected: AttemptState): void {
    if (this._state !== expected) {
      throw new StateError(`Attempt is ${this._state}, expected ${expected}`);
    }
  }
}
