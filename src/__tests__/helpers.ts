/**
 * Shared fixtures for the test suites.
 */

import * as crypto from "crypto";
import { StrategyConfig, validateConfig } from "../config";

export const SESSION_KEY = Buffer.alloc(16, 7).toString("base64");
export const IV = Buffer.alloc(16, 3).toString("base64");

/**
 * Build a validated config with test credentials.
 */
export function buildConfig(overrides: Record<string, unknown> = {}): StrategyConfig {
  const result = validateConfig({
    clientId: "test-app",
    clientSecret: "test-secret",
    ...overrides,
  });
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Encrypt text the way the provider does: AES-128-CBC with PKCS#7 padding.
 */
export function encryptText(plaintext: string, sessionKey: string = SESSION_KEY, iv: string = IV): string {
  const cipher = crypto.createCipheriv(
    "aes-128-cbc",
    Buffer.from(sessionKey, "base64"),
    Buffer.from(iv, "base64")
  );
  return Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]).toString("base64");
}

export function encryptJson(payload: unknown, sessionKey?: string, iv?: string): string {
  return encryptText(JSON.stringify(payload), sessionKey, iv);
}
