/**
 * Auth Error Mapping
 *
 * Map provider responses and arbitrary failures to error classes.
 */

import {
  AttemptError,
  AuthError,
  ProviderError,
  TransportError,
} from "./types";
import { parseJsonObject } from "../core/json";

/**
 * OAuth2 error response from provider.
 */
export interface ErrorResponse {
  error: string;
  error_description?: string;
}

/**
 * Parse error from HTTP response body.
 */
export function parseErrorResponse(body: string): ErrorResponse | null {
  const parsed = parseJsonObject(body);
  return parsed ? errorFromRecord(parsed) : null;
}

/**
 * Extract `error` / `error_description` from a decoded record.
 */
export function errorFromRecord(record: Record<string, unknown>): ErrorResponse | null {
  if (typeof record.error !== "string" || record.error === "") {
    return null;
  }
  return {
    error: record.error,
    error_description:
      typeof record.error_description === "string" ? record.error_description : undefined,
  };
}

/**
 * Build a ProviderError from token extras or callback parameters.
 *
 * Falls back to "unknown_error" when the provider sent no error code.
 */
export function providerErrorFromParams(params: Record<string, unknown>): ProviderError {
  const error = typeof params.error === "string" && params.error !== "" ? params.error : "unknown_error";
  const description =
    typeof params.error_description === "string" ? params.error_description : undefined;
  return new ProviderError(error, description);
}

/**
 * Create error from a non-2xx HTTP response.
 */
export function createErrorFromResponse(status: number, body: string): AuthError {
  const errorResponse = parseErrorResponse(body);
  if (errorResponse) {
    return new ProviderError(errorResponse.error, errorResponse.error_description);
  }
  return new TransportError(`Unexpected HTTP ${status} response`, "HttpStatus", { status });
}

/**
 * Convert any failure into an attempt error entry.
 *
 * Non-AuthError values come from injected collaborators and are reported as
 * transport failures.
 */
export function toAttemptError(error: unknown): AttemptError {
  return toAuthError(error).toAttemptError();
}

/**
 * Wrap an unknown failure as an AuthError.
 */
export function toAuthError(error: unknown): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, "ConnectionFailed");
}
