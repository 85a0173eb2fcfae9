/**
 * Strategy
 */

export * from "./attempt";
export * from "./normalizer";
export * from "./user-info";
export * from "./strategy";
