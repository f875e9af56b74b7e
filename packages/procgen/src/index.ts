/**
 * Level Generator - Procedural Generation Package
 *
 * Rooms placed by collision-driven displacement, joined by a spanning set
 * of straight and L-shaped corridors.
 *
 * @example
 * ```typescript
 * import { generateLevel, renderAscii } from "@delve/procgen";
 *
 * const result = generateLevel({
 *   regionWidth: 30,
 *   regionHeight: 30,
 *   targetFloorRatio: 0.35,
 *   seed: 42,
 * });
 *
 * if (result.success) {
 *   console.log(renderAscii(result.level));
 * }
 * ```
 */

// High-level API
export { type GenerateOptions, generateLevel } from "./api";
// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Level grid
export { LevelGrid } from "./level/level-grid";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
// Seeds
export {
  createSeed,
  createSeedFromString,
  seedsAreEquivalent,
  serializeSeed,
} from "./seed";
// Testing
export {
  assertDeterministic,
  DeterminismViolationError,
  testDeterminism,
} from "./testing";
// Utilities
export * from "./utils";
// Validation
export * from "./validation";
