/**
 * Core Components
 */

export * from "./transport";
export * from "./json";
