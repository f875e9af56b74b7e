import { createValidatedSeed, type LevelSeed, SeededRandom } from "@delve/contracts";

/**
 * Bump when a change to generation alters the output for an existing seed.
 */
export const SEED_VERSION = "1.0.0";

/** Golden-ratio increment; spreads consecutive attempt numbers apart. */
const ATTEMPT_STRIDE = 0x9e3779b9;

/**
 * Derive all sub-seed components from a primary seed.
 */
export function deriveSeedComponents(primaryInput: number): {
  readonly primary: number;
  readonly placement: number;
  readonly carving: number;
} {
  const primary = primaryInput >>> 0;
  const rng = new SeededRandom(primary);

  return {
    primary,
    placement: Math.floor(rng.next() * 0xffffffff),
    carving: Math.floor(rng.next() * 0xffffffff),
  };
}

/**
 * Build a validated LevelSeed from a primary seed.
 */
export function buildSeedFromPrimary(primaryInput: number): LevelSeed {
  return createValidatedSeed({
    ...deriveSeedComponents(primaryInput),
    version: SEED_VERSION,
  });
}

/**
 * Seed for a whole-level retry. Attempt 0 is the seed itself; later attempts
 * get a fresh primary mixed from the first primary and the attempt number.
 */
export function deriveAttemptSeed(seed: LevelSeed, attempt: number): LevelSeed {
  if (attempt === 0) return seed;
  const mixed = (seed.primary + Math.imul(attempt, ATTEMPT_STRIDE)) >>> 0;
  return createValidatedSeed({
    ...deriveSeedComponents(mixed),
    version: seed.version,
  });
}
