/**
 * Generation API
 *
 * High-level API for level generation.
 */

import {
  LevelConfigSchema,
  type LevelConfigInput,
  LevelError,
  resolveLevelConfig,
} from "@delve/contracts";
import {
  createLevelGenerator,
  type LevelGeneratorOptions,
} from "./generators/rooms-and-corridors";
import { createTraceCollector } from "./pipeline/trace";
import type { GenerationResult } from "./pipeline/types";
import { createSeed } from "./seed";

/**
 * Generation options
 */
export interface GenerateOptions extends LevelGeneratorOptions {
  /**
   * Record trace events even when the config leaves `trace` off.
   */
  readonly trace?: boolean;
}

/**
 * Generate a level.
 *
 * The input is validated first; a rejected config fails with CONFIG_INVALID
 * before any attempt runs. Otherwise the result is either a sealed level or
 * GENERATION_EXHAUSTED with every attempt's failure in its details.
 *
 * @example
 * ```typescript
 * const result = generateLevel({
 *   regionWidth: 30,
 *   regionHeight: 30,
 *   targetFloorRatio: 0.35,
 *   seed: 42,
 * });
 *
 * if (result.success) {
 *   console.log(`${result.level.rooms.length} rooms in ${result.attempts} attempts`);
 * }
 * ```
 */
export function generateLevel(
  input: LevelConfigInput,
  options: GenerateOptions = {},
): GenerationResult {
  const startTime = performance.now();
  const parsed = LevelConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return {
      success: false,
      error: LevelError.configInvalid(
        `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
        { issues },
      ),
      attempts: 0,
      trace: [],
      durationMs: performance.now() - startTime,
    };
  }

  const config = resolveLevelConfig(parsed.data);
  const trace = createTraceCollector(options.trace ?? config.trace);
  const generator = createLevelGenerator(options);

  return generator.generate(config, createSeed(config.seed), trace).match<GenerationResult>(
    ({ level, attempts }) => ({
      success: true,
      level,
      attempts,
      trace: trace.getEvents(),
      durationMs: performance.now() - startTime,
    }),
    (error) => ({
      success: false,
      error,
      attempts: config.maxWholeLevelRetries + 1,
      trace: trace.getEvents(),
      durationMs: performance.now() - startTime,
    }),
  );
}
