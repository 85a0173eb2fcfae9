/**
 * Payload Signature
 *
 * The provider signs user data as sha1(rawData + sessionKey), hex encoded.
 * This is a plain digest over the concatenation, not an HMAC.
 */

import * as crypto from "crypto";

/**
 * Compute the lowercase hex signature for raw data and a session key.
 */
export function computeSignature(rawData: string, sessionKey: string): string {
  return crypto
    .createHash("sha1")
    .update(rawData + sessionKey, "utf8")
    .digest("hex");
}

/**
 * Check a provider-supplied signature.
 */
export function verifySignature(rawData: string, sessionKey: string, signature: string): boolean {
  // TODO: compare with crypto.timingSafeEqual.
  return computeSignature(rawData, sessionKey) === signature;
}
