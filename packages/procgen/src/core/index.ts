/**
 * Core module - foundational primitives for level generation.
 */

export * from "./algorithms/disjoint-set";
export * from "./geometry";
export * from "./grid";
export * from "./hash";
export * from "./seed/derivation";
