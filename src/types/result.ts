/**
 * Result Types
 *
 * Provider-agnostic output consumed by the host.
 */

import type { Token } from "./token";

/**
 * Raw profile mapping as returned by the provider (or decrypted payload).
 */
export type ProfileMapping = Record<string, unknown>;

/**
 * Discriminated union for fallible construction.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Normalized credentials.
 */
export interface Credentials {
  token: string;
  refreshToken: string | null;
  /** Unix timestamp in seconds */
  expiresAt: number | null;
  tokenType: string;
  /** True when the token carries no expiry */
  noExpiry: boolean;
  /** Granted scopes, in provider order, without duplicates */
  scopes: string[];
  /** Token extras */
  other: Record<string, unknown>;
}

/**
 * Normalized profile fields. Missing fields are null.
 */
export interface Info {
  nickname: string | null;
  name: string | null;
  image: string | null;
  email: string | null;
}

/**
 * Pass-through of the original token and profile.
 */
export interface RawInfo {
  readonly token: Token;
  readonly user: Readonly<ProfileMapping>;
}

/**
 * Extra section of the auth result.
 */
export interface Extra {
  rawInfo: RawInfo;
}

/**
 * Assembled authentication result.
 */
export interface AuthResult {
  provider: string;
  uid: string | null;
  credentials: Credentials;
  info: Info;
  extra: Extra;
}
