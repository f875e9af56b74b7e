/**
 * Rooms-and-Corridors Level Generator
 *
 * Runs the attempt state machine
 * `placing → connecting → carving → validating → done | failed`
 * and restarts from placing with a fresh seed until a level validates or
 * the retry budget is spent.
 */

import {
  Err,
  type LevelConfig,
  LevelError,
  type LevelSeed,
  Ok,
  type Result,
} from "@delve/contracts";
import { calculateLevelChecksum } from "../../core/hash/checksum";
import { deriveAttemptSeed } from "../../core/seed/derivation";
import type { ConnectionStrategy } from "../../passes/connectivity/room-connector";
import { createRNGStreams, runPass } from "../../pipeline/runner";
import {
  type AttemptFailure,
  createEmptyArtifact,
  type GenerationState,
  type Level,
  type LevelStateArtifact,
  type PassContext,
  type TraceCollector,
} from "../../pipeline/types";
import {
  carveCorridorsPass,
  connectRoomsPass,
  placeRoomsPass,
  validatePass,
} from "./passes";

/**
 * Where one attempt stands. Terminal states carry the level or the error.
 */
export type AttemptState =
  | { readonly state: "placing" }
  | {
      readonly state: "connecting" | "carving" | "validating" | "done";
      readonly artifact: LevelStateArtifact;
    }
  | {
      readonly state: "failed";
      readonly failedIn: GenerationState;
      readonly error: LevelError;
    };

export interface GeneratedLevel {
  readonly level: Level;
  /** Attempts used, including the successful one */
  readonly attempts: number;
}

export interface LevelGeneratorOptions {
  /** Defaults to the sorted-edge strategy */
  readonly connectionStrategy?: ConnectionStrategy;
}

function advance(
  result: Result<LevelStateArtifact, LevelError>,
  from: GenerationState,
  to: "connecting" | "carving" | "validating" | "done",
): AttemptState {
  return result.match<AttemptState>(
    (artifact) => ({ state: to, artifact }),
    (error) => ({ state: "failed", failedIn: from, error }),
  );
}

/**
 * Generates levels from rooms joined by straight and L-shaped corridors
 */
export class LevelGenerator {
  readonly id = "rooms-and-corridors";
  readonly name = "Rooms and Corridors";
  readonly description =
    "Places rooms by pushing them apart, then links them with a spanning set of corridors";

  private readonly placeRooms = placeRoomsPass();
  private readonly connectRooms: ReturnType<typeof connectRoomsPass>;
  private readonly carveCorridors = carveCorridorsPass();
  private readonly validate = validatePass();

  constructor(options: LevelGeneratorOptions = {}) {
    this.connectRooms = connectRoomsPass(options.connectionStrategy);
  }

  /**
   * Run attempts until one validates.
   *
   * A failed attempt restarts from placing with the next attempt seed;
   * after `maxWholeLevelRetries + 1` attempts the run fails with
   * GENERATION_EXHAUSTED listing every attempt's failure.
   */
  generate(
    config: LevelConfig,
    seed: LevelSeed,
    trace: TraceCollector,
  ): Result<GeneratedLevel, LevelError> {
    const failures: AttemptFailure[] = [];
    const maxAttempts = config.maxWholeLevelRetries + 1;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const attemptSeed = deriveAttemptSeed(seed, attempt);
      const outcome = this.runAttempt(config, attemptSeed, attempt, trace);

      if (outcome.state === "done") {
        return Ok({
          level: this.finalize(outcome.artifact, attemptSeed, config),
          attempts: attempt + 1,
        });
      }
      if (outcome.state !== "failed") {
        throw new Error(`Attempt ${attempt} stopped in non-terminal state ${outcome.state}`);
      }

      const { error, failedIn } = outcome;
      failures.push({
        attempt,
        state: failedIn,
        code: error.code,
        message: error.message,
      });
      trace.attemptFailed(attempt, failedIn, error);
    }

    return Err(
      LevelError.generationExhausted(
        `No valid level after ${maxAttempts} attempt${maxAttempts === 1 ? "" : "s"}`,
        { attempts: failures },
      ),
    );
  }

  /**
   * Drive one attempt from placing to a terminal state.
   */
  runAttempt(
    config: LevelConfig,
    seed: LevelSeed,
    attempt: number,
    trace: TraceCollector,
  ): AttemptState {
    const ctx: PassContext = {
      streams: createRNGStreams(seed),
      config,
      trace,
      seed,
      attempt,
    };

    let current: AttemptState = { state: "placing" };
    while (current.state !== "done" && current.state !== "failed") {
      const next = this.step(current, ctx);
      trace.transition(attempt, current.state, next.state);
      current = next;
    }
    return current;
  }

  private step(current: AttemptState, ctx: PassContext): AttemptState {
    switch (current.state) {
      case "placing":
        return advance(
          runPass(this.placeRooms, createEmptyArtifact(), ctx),
          "placing",
          "connecting",
        );
      case "connecting":
        return advance(
          runPass(this.connectRooms, current.artifact, ctx),
          "connecting",
          "carving",
        );
      case "carving":
        return advance(
          runPass(this.carveCorridors, current.artifact, ctx),
          "carving",
          "validating",
        );
      case "validating":
        return advance(
          runPass(this.validate, current.artifact, ctx),
          "validating",
          "done",
        );
      case "done":
      case "failed":
        return current;
    }
  }

  private finalize(
    artifact: LevelStateArtifact,
    seed: LevelSeed,
    config: LevelConfig,
  ): Level {
    const { grid } = artifact;
    grid.seal();

    return {
      width: grid.width,
      height: grid.height,
      tiles: grid.tiles,
      grid,
      rooms: artifact.rooms,
      corridors: artifact.corridors,
      seed,
      targetFloorRatio: config.targetFloorRatio,
      floorRatio: grid.floorRatio(),
      checksum: calculateLevelChecksum(grid.tiles, artifact.rooms, artifact.corridors),
      success: true,
    };
  }
}

/**
 * Create a rooms-and-corridors generator
 */
export function createLevelGenerator(options?: LevelGeneratorOptions): LevelGenerator {
  return new LevelGenerator(options);
}
