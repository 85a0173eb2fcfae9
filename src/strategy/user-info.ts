/**
 * User Info Sources
 *
 * The two ways a profile is obtained after the code exchange.
 */

import type { StrategyConfig } from "../config";
import type { OAuthClient, UserInfoVariant } from "../client";
import { parseJsonObject, stringField } from "../core/json";
import { openSignedPayload } from "../crypto";
import { DataInvalidError } from "../error";
import { Logger, noOpLogger } from "../telemetry";
import type { CallbackParams } from "../types/callback";
import type { ProfileMapping } from "../types/result";
import type { Token } from "../types/token";

/**
 * Profile source for one user-info variant.
 */
export interface UserInfoSource {
  readonly variant: UserInfoVariant;

  /**
   * Obtain the raw profile for an exchanged token.
   */
  fetch(token: Token, params: CallbackParams): Promise<ProfileMapping>;
}

/**
 * Bearer-token call to the provider user-info endpoint.
 */
export class DirectUserInfoSource implements UserInfoSource {
  readonly variant = "direct";
  private client: OAuthClient;
  private endpoint?: string;

  constructor(client: OAuthClient, endpoint?: string) {
    this.client = client;
    this.endpoint = endpoint;
  }

  fetch(token: Token): Promise<ProfileMapping> {
    return this.client.fetchUserInfo(token, this.endpoint);
  }
}

/**
 * Signed, encrypted payload delivered with a session token.
 */
export class MiniappUserInfoSource implements UserInfoSource {
  readonly variant = "miniapp";
  private logger: Logger;

  constructor(logger: Logger = noOpLogger) {
    this.logger = logger;
  }

  async fetch(token: Token, params: CallbackParams): Promise<ProfileMapping> {
    const signed = requireSignedPayload(params);
    const profile = openSignedPayload({ ...signed, sessionKey: resolveSessionKey(token) });
    this.logger.debug("payload.decrypted", { fields: Object.keys(profile).length });
    return profile;
  }
}

/**
 * Find the session key on a token: `extra.session_key`, or `session_key`
 * inside a JSON-encoded access token.
 */
export function resolveSessionKey(token: Token): string {
  const fromExtra = token.extra.session_key;
  if (typeof fromExtra === "string" && fromExtra !== "") {
    return fromExtra;
  }

  const decoded = parseJsonObject(token.accessToken);
  const fromAccessToken = decoded ? stringField(decoded, "session_key") : undefined;
  if (fromAccessToken) {
    return fromAccessToken;
  }

  throw new DataInvalidError("session token carries no session_key");
}

function requireSignedPayload(params: CallbackParams): {
  signature: string;
  rawData: string;
  iv: string;
  encryptedData: string;
} {
  const { signature, rawData, iv, encryptedData } = params;
  if (
    signature === undefined ||
    rawData === undefined ||
    iv === undefined ||
    encryptedData === undefined
  ) {
    const missing = [
      signature === undefined ? "signature" : null,
      rawData === undefined ? "raw_data" : null,
      iv === undefined ? "iv" : null,
      encryptedData === undefined ? "encrypted_data" : null,
    ].filter((name): name is string => name !== null);
    throw new DataInvalidError(`missing signed payload parameters: ${missing.join(", ")}`);
  }
  return { signature, rawData, iv, encryptedData };
}

/**
 * Create the source for the configured variant.
 */
export function createUserInfoSource(
  config: StrategyConfig,
  client: OAuthClient,
  logger: Logger = noOpLogger
): UserInfoSource {
  return config.userInfoVariant === "direct"
    ? new DirectUserInfoSource(client, config.provider.userInfoEndpoint)
    : new MiniappUserInfoSource(logger);
}
