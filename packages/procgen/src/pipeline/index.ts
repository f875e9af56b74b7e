/**
 * Pipeline module - passes, streams and tracing.
 */

export * from "./runner";
export * from "./trace";
export * from "./types";
