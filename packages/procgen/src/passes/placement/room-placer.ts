/**
 * Room placement by collision-driven displacement.
 *
 * A candidate room is dropped at a random spot, then pushed one tile at a
 * time in a random direction until it no longer touches any committed room.
 * What is left after cropping to the region becomes the room, unless it is
 * too small.
 *
 * The loop budgets floor for the corridors the rooms will need, so rooms
 * plus corridors stay at or under the target floor ratio.
 */

import {
  Err,
  LevelError,
  type LevelConfig,
  Ok,
  type Result,
  type SeededRandom,
} from "@delve/contracts";
import {
  cropRect,
  rectArea,
  rectsOverlap,
  rectsOverlapWithPadding,
  translateRect,
} from "../../core/geometry/operations";
import { type Dimensions, type Direction8, DIRECTIONS_8, type Rect } from "../../core/geometry/types";
import type { LevelGrid } from "../../level/level-grid";
import type { Room } from "../../pipeline/types";

/**
 * Why a single candidate was thrown away.
 * - "push-budget": still colliding after `maxPushSteps` pushes
 * - "left-region": pushed entirely out of the region
 * - "undersized": cropped below `minRoomSize` on some axis
 */
export type PlacementFailureReason = "push-budget" | "left-region" | "undersized";

export interface PlacementFailure {
  readonly reason: PlacementFailureReason;
  /** Candidate as it stood when it was rejected */
  readonly candidate: Rect;
  readonly pushes: number;
}

export type RoomPlacementOptions = Pick<
  LevelConfig,
  "minRoomSize" | "maxRoomSize" | "roomPadding" | "maxPushSteps"
>;

export type PlacementLoopOptions = RoomPlacementOptions &
  Pick<LevelConfig, "targetFloorRatio" | "minRoomCount" | "maxPlacementFailuresInARow">;

/**
 * Corridor tiles a set of rooms is expected to need once connected.
 */
export type CorridorEstimate = (rooms: readonly Rect[]) => number;

const noCorridors: CorridorEstimate = () => 0;

function rejected(
  reason: PlacementFailureReason,
  candidate: Rect,
  pushes: number,
): Result<Rect, PlacementFailure> {
  return Err({ reason, candidate, pushes });
}

/**
 * Try to place one room. Never touches the grid; the caller commits.
 */
export function placeRoom(
  region: Dimensions,
  existingRooms: readonly Rect[],
  rng: SeededRandom,
  options: RoomPlacementOptions,
): Result<Rect, PlacementFailure> {
  const width = rng.range(options.minRoomSize, options.maxRoomSize);
  const height = rng.range(options.minRoomSize, options.maxRoomSize);
  const x = rng.range(0, region.width - 1);
  const y = rng.range(0, region.height - 1);
  const direction = rng.choice<Direction8>(DIRECTIONS_8);
  const regionRect: Rect = { x: 0, y: 0, width: region.width, height: region.height };

  let candidate: Rect = { x, y, width, height };
  let pushes = 0;

  while (
    existingRooms.some((room) =>
      rectsOverlapWithPadding(candidate, room, options.roomPadding),
    )
  ) {
    if (pushes >= options.maxPushSteps) {
      return rejected("push-budget", candidate, pushes);
    }
    candidate = translateRect(candidate, direction.x, direction.y);
    pushes++;
    if (!rectsOverlap(candidate, regionRect)) {
      return rejected("left-region", candidate, pushes);
    }
  }

  const cropped = cropRect(candidate, region);
  if (!cropped) {
    return rejected("left-region", candidate, pushes);
  }
  if (cropped.width < options.minRoomSize || cropped.height < options.minRoomSize) {
    return rejected("undersized", cropped, pushes);
  }

  return Ok(cropped);
}

/**
 * Shrink `rect` from its far edges, widest axis first, until its area plus
 * the corridors of `rooms` and `rect` together fit in `budget`.
 *
 * @returns null when a minimum-size room still does not fit
 */
export function fitToBudget(
  rect: Rect,
  rooms: readonly Rect[],
  budget: number,
  minRoomSize: number,
  estimateCorridors: CorridorEstimate = noCorridors,
): Rect | null {
  let fitted = rect;

  for (;;) {
    if (rectArea(fitted) + estimateCorridors([...rooms, fitted]) <= budget) {
      return fitted;
    }
    if (fitted.width > minRoomSize && fitted.width >= fitted.height) {
      fitted = { ...fitted, width: fitted.width - 1 };
    } else if (fitted.height > minRoomSize) {
      fitted = { ...fitted, height: fitted.height - 1 };
    } else {
      return null;
    }
  }
}

/**
 * Place rooms into `grid` until room area plus estimated corridor area
 * reaches the target floor tiles and at least `minRoomCount` rooms exist.
 *
 * The first `minRoomCount` rooms are committed as drawn. Later ones are
 * shrunk to fit what is left of the budget; placement ends early when even
 * a minimum-size room would overshoot it. A success resets the
 * consecutive-failure counter. Hitting `maxPlacementFailuresInARow` fails
 * with PLACEMENT_EXHAUSTED.
 */
export function placeRooms(
  grid: LevelGrid,
  rng: SeededRandom,
  options: PlacementLoopOptions,
  estimateCorridors: CorridorEstimate = noCorridors,
): Result<readonly Room[], LevelError> {
  const failures: Record<PlacementFailureReason, number> = {
    "push-budget": 0,
    "left-region": 0,
    undersized: 0,
  };
  const targetTiles = grid.tileTarget(options.targetFloorRatio);
  let planned = 0;
  let failuresInARow = 0;

  while (planned < targetTiles || grid.rooms.length < options.minRoomCount) {
    const placed = placeRoom(grid.region, grid.rooms, rng, options);

    if (placed.isOk()) {
      const fitted =
        grid.rooms.length < options.minRoomCount
          ? placed.value
          : fitToBudget(
              placed.value,
              grid.rooms,
              targetTiles - grid.roomArea,
              options.minRoomSize,
              estimateCorridors,
            );
      if (!fitted) break;

      grid.commitRoom(fitted);
      planned = grid.roomArea + estimateCorridors(grid.rooms);
      failuresInARow = 0;
      continue;
    }

    failures[placed.error.reason]++;
    failuresInARow++;
    if (failuresInARow >= options.maxPlacementFailuresInARow) {
      return Err(
        LevelError.placementExhausted(
          `${failuresInARow} room placements failed in a row`,
          {
            rooms: grid.rooms.length,
            coverage: grid.roomCoverage(),
            failures,
          },
        ),
      );
    }
  }

  return Ok(grid.rooms);
}
