/**
 * Strategy Configuration
 */

export * from "./schema";
export * from "./env";
