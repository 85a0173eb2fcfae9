/**
 * Core type definitions.
 */

export * from "./token";
export * from "./callback";
export * from "./result";
