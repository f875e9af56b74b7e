/**
 * Seed Creation Utilities
 */

import type { LevelSeed } from "@delve/contracts";
import { buildSeedFromPrimary } from "./core/seed/derivation";

export { deriveAttemptSeed, SEED_VERSION } from "./core/seed/derivation";

/**
 * Create a level seed from a numeric value.
 */
export function createSeed(input: number): LevelSeed {
  return buildSeedFromPrimary(input);
}

/**
 * Create a level seed from a string
 */
export function createSeedFromString(input: string): LevelSeed {
  // DJB2 hash function for strings
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return createSeed(hash);
}

/**
 * Check if two seeds will produce identical output
 */
export function seedsAreEquivalent(a: LevelSeed, b: LevelSeed): boolean {
  return (
    a.primary === b.primary &&
    a.placement === b.placement &&
    a.carving === b.carving
  );
}

/**
 * Serialize a seed to a JSON-safe plain object.
 */
export function serializeSeed(seed: LevelSeed): {
  primary: number;
  placement: number;
  carving: number;
  version: string;
} {
  return {
    primary: seed.primary,
    placement: seed.placement,
    carving: seed.carving,
    version: seed.version,
  };
}
