/**
 * Token Types
 *
 * Token returned by the provider's token endpoint.
 */

/**
 * Token produced by a code exchange. Frozen once built.
 */
export interface Token {
  /** The access token; "" when the provider returned none */
  readonly accessToken: string;
  /** Refresh token, carried through untouched */
  readonly refreshToken?: string;
  /** Expiry as a Unix timestamp in seconds */
  readonly expiresAt?: number;
  /** The type of the token (typically "Bearer") */
  readonly tokenType: string;
  /** Provider-specific fields not covered above */
  readonly extra: Readonly<Record<string, unknown>>;
}

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Expose the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns redacted string for logging/debugging.
   */
  toString(): string {
    return "[REDACTED]";
  }

  /**
   * Returns redacted string for JSON serialization.
   */
  toJSON(): string {
    return "[REDACTED]";
  }
}

/**
 * Check if the token carries an access token value.
 */
export function hasAccessToken(token: Token): boolean {
  return token.accessToken !== "";
}

/**
 * Freeze a token and its extras.
 */
export function createToken(fields: {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number;
  tokenType: string;
  extra?: Record<string, unknown>;
}): Token {
  return Object.freeze({
    accessToken: fields.accessToken,
    refreshToken: fields.refreshToken,
    expiresAt: fields.expiresAt,
    tokenType: fields.tokenType,
    extra: Object.freeze({ ...(fields.extra ?? {}) }),
  });
}
