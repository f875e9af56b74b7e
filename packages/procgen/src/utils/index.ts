/**
 * Utilities - debugging output.
 */

export * from "./ascii-renderer";
