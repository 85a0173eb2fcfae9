/**
 * Auth Error Types
 *
 * Error class hierarchy for the authentication pipeline.
 */

/**
 * Error entry recorded on an authentication attempt.
 */
export interface AttemptError {
  /** Machine-readable error code (e.g. "missing_code") */
  code: string;
  /** Human-readable description */
  description: string;
}

/**
 * Base authentication error class.
 */
export class AuthError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, options?: { retryable?: boolean }) {
    super(message);
    this.name = "AuthError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, AuthError.prototype);
  }

  /**
   * Convert to the `{code, description}` entry stored on an attempt.
   */
  toAttemptError(): AttemptError {
    return { code: "unknown_error", description: this.message };
  }
}

/**
 * Configuration error - invalid setup detected at startup.
 */
export class ConfigurationError extends AuthError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: "InvalidConfig" | "MissingRequired" = "InvalidConfig",
    issues: string[] = []
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Callback arrived without an authorization code.
 */
export class MissingCodeError extends AuthError {
  constructor(message: string = "No code received") {
    super(message, "Callback.MissingCode", { retryable: true });
    this.name = "MissingCodeError";
    Object.setPrototypeOf(this, MissingCodeError.prototype);
  }

  toAttemptError(): AttemptError {
    return { code: "missing_code", description: this.message };
  }
}

/**
 * Identity provider rejected the request.
 */
export class ProviderError extends AuthError {
  public readonly errorCode: string;
  public readonly errorDescription?: string;

  constructor(errorCode: string, errorDescription?: string) {
    super(errorDescription || errorCode, `Provider.${errorCode}`, {
      retryable: errorCode === "server_error" || errorCode === "temporarily_unavailable",
    });
    this.name = "ProviderError";
    this.errorCode = errorCode;
    this.errorDescription = errorDescription;
    Object.setPrototypeOf(this, ProviderError.prototype);
  }

  toAttemptError(): AttemptError {
    return { code: this.errorCode, description: this.errorDescription ?? "" };
  }
}

/**
 * Transport failure kinds.
 */
export type TransportErrorKind =
  | "ConnectionFailed"
  | "Timeout"
  | "DnsResolutionFailed"
  | "TlsError"
  | "HttpStatus"
  | "UnexpectedRedirect"
  | "ResponseTooLarge";

/**
 * Network/transport error.
 */
export class TransportError extends AuthError {
  public readonly kind: TransportErrorKind;
  public readonly status?: number;

  constructor(message: string, kind: TransportErrorKind, options?: { status?: number }) {
    super(message, `Transport.${kind}`, {
      retryable: kind === "ConnectionFailed" || kind === "Timeout" || kind === "DnsResolutionFailed",
    });
    this.name = "TransportError";
    this.kind = kind;
    this.status = options?.status;
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  toAttemptError(): AttemptError {
    return { code: "transport_error", description: this.message };
  }
}

/**
 * Response or callback data had an unexpected shape.
 */
export class DataInvalidError extends AuthError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Invalid data: ${reason}`, "Data.Invalid");
    this.name = "DataInvalidError";
    this.reason = reason;
    Object.setPrototypeOf(this, DataInvalidError.prototype);
  }

  toAttemptError(): AttemptError {
    return { code: "data_invalid", description: this.reason };
  }
}

/**
 * Encrypted payload could not be decoded or decrypted.
 */
export class DataCorruptedError extends AuthError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, "Data.Corrupted");
    this.name = "DataCorruptedError";
    this.field = field;
    Object.setPrototypeOf(this, DataCorruptedError.prototype);
  }

  toAttemptError(): AttemptError {
    return { code: "data_corrupted", description: this.message };
  }
}

/**
 * Payload signature did not match. Treat as possible tampering.
 */
export class SignatureMismatchError extends AuthError {
  constructor(message: string = "Signature does not match raw data") {
    super(message, "Data.SignatureMismatch");
    this.name = "SignatureMismatchError";
    Object.setPrototypeOf(this, SignatureMismatchError.prototype);
  }

  toAttemptError(): AttemptError {
    return { code: "signature_not_matched", description: this.message };
  }
}

/**
 * Illegal lifecycle transition on an attempt.
 */
export class StateError extends AuthError {
  constructor(message: string) {
    super(message, "State.InvalidTransition");
    this.name = "StateError";
    Object.setPrototypeOf(this, StateError.prototype);
  }
}

/**
 * Check if a value is an AuthError.
 */
export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

/**
 * Check if an error indicates the payload may have been tampered with.
 */
export function isTamperSignal(error: unknown): boolean {
  return error instanceof SignatureMismatchError;
}
