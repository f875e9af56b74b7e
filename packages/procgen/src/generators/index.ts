/**
 * Generators module - level generation algorithms.
 */

export * from "./rooms-and-corridors";
