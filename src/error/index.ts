/**
 * Auth Errors
 */

export * from "./types";
export * from "./mapping";
