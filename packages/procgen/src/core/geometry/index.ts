/**
 * Geometry module - types and operations for 2D tile geometry.
 */

export * from "./operations";
export * from "./types";
