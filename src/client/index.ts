/**
 * OAuth Client
 */

export * from "./oauth-client";
export * from "./providers";
