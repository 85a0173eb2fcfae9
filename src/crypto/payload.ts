/**
 * Payload Decryption
 *
 * AES-128-CBC decryption of the encrypted user data delivered with a
 * session token.
 */

import * as crypto from "crypto";
import { DataCorruptedError, SignatureMismatchError } from "../error";
import { parseJsonObject } from "../core/json";
import type { ProfileMapping } from "../types";
import { verifySignature } from "./signature";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Inputs for one verify+decrypt call. All values are base64 strings.
 */
export interface DecryptionContext {
  sessionKey: string;
  iv: string;
  encryptedData: string;
}

/**
 * Decryption inputs plus the signature covering the raw user data.
 */
export interface SignedPayload extends DecryptionContext {
  rawData: string;
  signature: string;
}

/**
 * Decode padded base64, rejecting anything Buffer.from would silently skip.
 */
export function decodeBase64Strict(value: string, field: string): Buffer {
  if (!BASE64_PATTERN.test(value)) {
    throw new DataCorruptedError(`Malformed base64 in ${field}`, field);
  }
  return Buffer.from(value, "base64");
}

/**
 * Remove PKCS#7-style padding: the last byte is the number of bytes to drop.
 */
export function unpad(buffer: Buffer): Buffer {
  if (buffer.length === 0) {
    return buffer;
  }
  const padding = buffer.readUInt8(buffer.length - 1);
  if (padding > buffer.length) {
    throw new DataCorruptedError(
      `Padding length ${padding} exceeds payload length ${buffer.length}`
    );
  }
  return buffer.subarray(0, buffer.length - padding);
}

/**
 * Decrypt, unpad and decode the payload.
 */
export function decryptPayload(context: DecryptionContext): ProfileMapping {
  const key = decodeBase64Strict(context.sessionKey, "session_key");
  const iv = decodeBase64Strict(context.iv, "iv");
  const ciphertext = decodeBase64Strict(context.encryptedData, "encrypted_data");

  let decrypted: Buffer;
  try {
    const decipher = crypto.createDecipheriv("aes-128-cbc", key, iv);
    decipher.setAutoPadding(false);
    decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataCorruptedError(`Decryption failed: ${reason}`);
  }

  const data = parseJsonObject(unpad(decrypted).toString("utf8"));
  if (!data) {
    throw new DataCorruptedError("Decrypted payload is not a JSON object");
  }

  if (data.unionId !== undefined) {
    data.unionid = data.unionId;
  }
  return data;
}

/**
 * Verify the signature over the raw data, then decrypt.
 */
export function openSignedPayload(payload: SignedPayload): ProfileMapping {
  if (!verifySignature(payload.rawData, payload.sessionKey, payload.signature)) {
    throw new SignatureMismatchError();
  }
  return decryptPayload(payload);
}
