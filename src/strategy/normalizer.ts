/**
 * Result Normalizer
 *
 * Maps provider token and profile fields onto the generic result shape.
 */

import type { ProfileFieldMap } from "../client/providers";
import type { Credentials, Info, ProfileMapping, RawInfo } from "../types/result";
import type { Token } from "../types/token";

/**
 * Split a delimiter-joined scope string. Empty entries are dropped and
 * duplicates keep their first position.
 */
export function splitScopes(scope: unknown, delimiter: string = ","): string[] {
  if (typeof scope !== "string" || scope === "") {
    return [];
  }
  const seen = new Set<string>();
  for (const part of scope.split(delimiter)) {
    const trimmed = part.trim();
    if (trimmed !== "") {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

export class ResultNormalizer {
  private fields: Readonly<ProfileFieldMap>;
  private scopeDelimiter: string;

  constructor(fields: Readonly<ProfileFieldMap>, scopeDelimiter: string = ",") {
    this.fields = fields;
    this.scopeDelimiter = scopeDelimiter;
  }

  credentials(token: Token): Credentials {
    return {
      token: token.accessToken,
      refreshToken: token.refreshToken ?? null,
      expiresAt: token.expiresAt ?? null,
      tokenType: token.tokenType,
      noExpiry: token.expiresAt === undefined,
      scopes: splitScopes(token.extra.scope, this.scopeDelimiter),
      other: { ...token.extra },
    };
  }

  info(profile: ProfileMapping): Info {
    return {
      nickname: pick(profile, this.fields.nickname),
      name: pick(profile, this.fields.name),
      image: pick(profile, this.fields.image),
      email: pick(profile, this.fields.email),
    };
  }

  rawInfo(token: Token, profile: ProfileMapping): RawInfo {
    return Object.freeze({
      token,
      user: Object.freeze({ ...profile }),
    });
  }
}

function pick(profile: ProfileMapping, key: string | undefined): string | null {
  if (key === undefined) {
    return null;
  }
  const value = profile[key];
  return typeof value === "string" ? value : null;
}
