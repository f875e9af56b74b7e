/**
 * Testing utilities for level generation.
 * Kept apart from validation.ts, which the generator itself imports.
 */

import type { LevelConfigInput } from "@delve/contracts";
import { generateLevel } from "./api";

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: LevelConfigInput,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Run generation `runs` times and collect the checksums.
 *
 * @throws Error when any run fails to produce a level
 */
function collectChecksums(
  config: LevelConfigInput,
  runs: number,
): { checksums: string[]; durations: number[] } {
  const checksums: string[] = [];
  const durations: number[] = [];

  for (let i = 0; i < runs; i++) {
    const result = generateLevel(config);

    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }

    checksums.push(result.level.checksum);
    durations.push(result.durationMs);
  }

  return { checksums, durations };
}

/**
 * Assert that generation is deterministic for a config.
 *
 * @throws {DeterminismViolationError} If different runs produce different checksums
 *
 * @example
 * ```typescript
 * test("levels are deterministic", () => {
 *   assertDeterministic({
 *     regionWidth: 40,
 *     regionHeight: 30,
 *     targetFloorRatio: 0.3,
 *     seed: 12345,
 *   });
 * });
 * ```
 */
export function assertDeterministic(
  config: LevelConfigInput,
  runs: number = 3,
): void {
  const { checksums } = collectChecksums(config, runs);
  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}

/**
 * Test determinism and return detailed results instead of throwing.
 */
export function testDeterminism(
  config: LevelConfigInput,
  runs: number = 3,
): {
  deterministic: boolean;
  checksums: string[];
  uniqueChecksums: string[];
  durations: number[];
  avgDuration: number;
} {
  const { checksums, durations } = collectChecksums(config, runs);
  const uniqueChecksums = [...new Set(checksums)];
  const avgDuration = durations.reduce((a, b) => a + b, 0) / durations.length;

  return {
    deterministic: uniqueChecksums.length === 1,
    checksums,
    uniqueChecksums,
    durations,
    avgDuration,
  };
}
