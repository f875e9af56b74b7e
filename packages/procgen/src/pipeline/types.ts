/**
 * Pipeline Types
 *
 * Typed artifacts and passes for the level generation state machine.
 */

import type {
  LevelConfig,
  LevelError,
  LevelSeed,
  Result,
  SeededRandom,
} from "@delve/contracts";
import type { Point, Rect } from "../core/geometry/types";
import type { ReadonlyTileGrid } from "../core/grid/types";
import type { LevelGrid } from "../level/level-grid";

// =============================================================================
// ARTIFACTS - Typed intermediate and final data products
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant and unique ID.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
  readonly id: string;
}

/**
 * Empty artifact - starting point for an attempt
 */
export interface EmptyArtifact extends Artifact<"empty"> {
  readonly type: "empty";
}

/**
 * A committed room. Identifiers follow creation order, starting at 0.
 */
export interface Room extends Rect {
  readonly id: number;
  readonly centerX: number;
  readonly centerY: number;
}

/**
 * Straight corridors join rooms aligned on one axis; L-shaped ones join
 * diagonal neighbours with a single bend.
 */
export type CorridorKind = "straight" | "l-shaped";

/**
 * Direction a straight corridor runs in.
 */
export type CorridorAxis = "horizontal" | "vertical";

/**
 * Candidate connection between two rooms, `a < b`.
 */
export interface Edge {
  readonly a: number;
  readonly b: number;
  readonly distance: number;
  readonly classification: "aligned" | "diagonal";
  /** Set for aligned edges only */
  readonly axis?: CorridorAxis;
}

/**
 * An accepted edge, in emission order.
 */
export interface CarvingInstruction {
  readonly fromRoomId: number;
  readonly toRoomId: number;
  readonly kind: CorridorKind;
  readonly axis?: CorridorAxis;
  readonly distance: number;
}

/**
 * A carved corridor: the instruction plus the tiles it occupies.
 */
export interface Corridor extends CarvingInstruction {
  readonly path: readonly Point[];
  /** Path tiles that run through a third room's floor */
  readonly intersections: number;
}

/**
 * Level state threaded through the passes of one attempt.
 */
export interface LevelStateArtifact extends Artifact<"level-state"> {
  readonly type: "level-state";
  readonly grid: LevelGrid;
  readonly rooms: readonly Room[];
  readonly instructions: readonly CarvingInstruction[];
  readonly corridors: readonly Corridor[];
}

export type AnyArtifact = EmptyArtifact | LevelStateArtifact;

let artifactCounter = 0;

function nextArtifactId(prefix: string): string {
  artifactCounter = (artifactCounter + 1) % Number.MAX_SAFE_INTEGER;
  return `${prefix}-${artifactCounter}`;
}

export function createEmptyArtifact(): EmptyArtifact {
  return { type: "empty", id: "empty" };
}

export function createLevelStateArtifact(
  grid: LevelGrid,
  instructions: readonly CarvingInstruction[] = [],
  corridors: readonly Corridor[] = [],
): LevelStateArtifact {
  return {
    type: "level-state",
    id: nextArtifactId("level-state"),
    grid,
    rooms: grid.rooms,
    instructions,
    corridors,
  };
}

/**
 * One broken invariant found by validation
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}

// =============================================================================
// TRACE
// =============================================================================

interface TraceEventBase {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
}

export interface PassStartEvent extends TraceEventBase {
  readonly eventType: "start";
  readonly passId: string;
}

export interface PassEndEvent extends TraceEventBase {
  readonly eventType: "end";
  readonly passId: string;
  readonly durationMs: number;
}

/**
 * One step of an attempt's state machine
 */
export interface TransitionEvent extends TraceEventBase {
  readonly eventType: "transition";
  readonly attempt: number;
  readonly from: GenerationState;
  readonly to: GenerationState;
}

export interface AttemptFailedEvent extends TraceEventBase {
  readonly eventType: "attempt-failed";
  readonly attempt: number;
  readonly failedIn: GenerationState;
  readonly code: LevelError["code"];
  readonly message: string;
}

export interface WarningEvent extends TraceEventBase {
  readonly eventType: "warning";
  readonly passId: string;
  readonly message: string;
}

export type TraceEvent =
  | PassStartEvent
  | PassEndEvent
  | TransitionEvent
  | AttemptFailedEvent
  | WarningEvent;

export type TraceEventType = TraceEvent["eventType"];

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  transition(attempt: number, from: GenerationState, to: GenerationState): void;
  attemptFailed(attempt: number, failedIn: GenerationState, error: LevelError): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * One isolated random stream per stage.
 */
export interface RNGStreams {
  readonly placement: SeededRandom;
  readonly carving: SeededRandom;
}

export type RNGStreamName = keyof RNGStreams;

/**
 * Context handed to a pass. `streams` only exposes what the pass declared.
 */
export interface PassContext<TStreams extends RNGStreamName = RNGStreamName> {
  readonly streams: Pick<RNGStreams, TStreams>;
  readonly config: LevelConfig;
  readonly trace: TraceCollector;
  readonly seed: LevelSeed;
  /** Zero-based whole-level attempt number */
  readonly attempt: number;
}

/**
 * A pass transforms one artifact type into another, or ends the attempt
 * with a LevelError.
 */
export interface Pass<
  TIn extends Artifact,
  TOut extends Artifact,
  TStreams extends RNGStreamName = never,
> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  readonly requiredStreams: readonly TStreams[];
  run(input: TIn, ctx: PassContext<TStreams>): Result<TOut, LevelError>;
}

// =============================================================================
// GENERATION
// =============================================================================

/**
 * States of one attempt. `done` and `failed` are terminal.
 */
export type GenerationState =
  | "placing"
  | "connecting"
  | "carving"
  | "validating"
  | "done"
  | "failed";

/**
 * A finished, sealed level.
 */
export interface Level {
  readonly width: number;
  readonly height: number;
  readonly tiles: ReadonlyTileGrid;
  /** Sealed grid; its connectivity and ratio queries stay available */
  readonly grid: LevelGrid;
  readonly rooms: readonly Room[];
  readonly corridors: readonly Corridor[];
  /** Seed of the attempt that produced this level */
  readonly seed: LevelSeed;
  readonly targetFloorRatio: number;
  readonly floorRatio: number;
  /** "v{version}:{fnv64}" over tiles, rooms and corridor paths */
  readonly checksum: string;
  readonly success: true;
}

/**
 * Why one attempt ended.
 */
export interface AttemptFailure {
  readonly attempt: number;
  readonly state: GenerationState;
  readonly code: LevelError["code"];
  readonly message: string;
}

export interface GenerationSuccess {
  readonly success: true;
  readonly level: Level;
  /** Attempts used, including the successful one */
  readonly attempts: number;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

export interface GenerationFailure {
  readonly success: false;
  readonly error: LevelError;
  readonly attempts: number;
  readonly trace: readonly TraceEvent[];
  readonly durationMs: number;
}

/**
 * Discriminated union - use `if (result.success)` to narrow.
 */
export type GenerationResult = GenerationSuccess | GenerationFailure;
