/**
 * Telemetry
 */

export * from "./logging";
