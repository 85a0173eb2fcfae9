/**
 * Signed Payload Crypto
 */

export * from "./signature";
export * from "./payload";
