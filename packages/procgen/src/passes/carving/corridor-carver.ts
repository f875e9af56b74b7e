/**
 * Corridor Carving
 *
 * Straight corridors for aligned rooms, single-bend L-shaped corridors for
 * diagonal ones. Routes are checked against third rooms before anything is
 * written.
 */

import {
  Err,
  LevelError,
  type LevelConfig,
  Ok,
  type Result,
  type SeededRandom,
} from "@delve/contracts";
import { rectCorners, squaredDistance } from "../../core/geometry/operations";
import { DIRECTIONS_8, type Point } from "../../core/geometry/types";
import type { LevelGrid } from "../../level/level-grid";
import type { CarvingInstruction, CorridorAxis, Room } from "../../pipeline/types";

export type CarvingOptions = Pick<LevelConfig, "corridorPolicy" | "maxCarveRetries">;

const CARDINALS = DIRECTIONS_8.slice(0, 4);

export interface CarveOutcome {
  /** Tiles of the committed route, own-room floor excluded */
  readonly path: readonly Point[];
  /** Tiles turned from Void into CorridorFloor */
  readonly written: number;
  /** Route tiles on a third room's floor */
  readonly intersections: number;
  /** Routes evaluated, the committed one included */
  readonly attempts: number;
  /** False when every route crossed a third room and the first was used */
  readonly clean: boolean;
}

/**
 * A route plus the rooms it crosses.
 */
interface Route {
  readonly path: readonly Point[];
  readonly intersections: number;
}

// =============================================================================
// ROUTE SHAPES
// =============================================================================

/**
 * Row (horizontal axis) or column (vertical axis) segment strictly between
 * the facing walls of two aligned rooms.
 */
export function straightPath(
  from: Room,
  to: Room,
  axis: CorridorAxis,
  lane: number,
): Point[] {
  const path: Point[] = [];

  if (axis === "horizontal") {
    const left = from.x < to.x ? from : to;
    const right = left === from ? to : from;
    for (let x = left.x + left.width; x < right.x; x++) {
      path.push({ x, y: lane });
    }
  } else {
    const top = from.y < to.y ? from : to;
    const bottom = top === from ? to : from;
    for (let y = top.y + top.height; y < bottom.y; y++) {
      path.push({ x: lane, y });
    }
  }

  return path;
}

/**
 * Single-bend path from `start` to `end`, both ends included.
 *
 * @param horizontalFirst - If true, go horizontal then vertical; if false, go vertical then horizontal
 */
export function lShapedPath(start: Point, end: Point, horizontalFirst: boolean): Point[] {
  const bend: Point = horizontalFirst
    ? { x: end.x, y: start.y }
    : { x: start.x, y: end.y };
  const path: Point[] = [];

  appendLine(path, start, bend);
  appendLine(path, bend, end);
  path.push(end);
  return path;
}

/**
 * Append the tiles of an axis-aligned segment, excluding `to`.
 */
function appendLine(path: Point[], from: Point, to: Point): void {
  const dx = Math.sign(to.x - from.x);
  const dy = Math.sign(to.y - from.y);
  let x = from.x;
  let y = from.y;

  while (x !== to.x || y !== to.y) {
    path.push({ x, y });
    x += dx;
    y += dy;
  }
}

/**
 * All sixteen corner pairs, nearest first. Ties keep corner order.
 */
export function cornerPairs(from: Room, to: Room): Array<readonly [Point, Point]> {
  const pairs: Array<{ pair: readonly [Point, Point]; distance: number }> = [];
  for (const a of rectCorners(from)) {
    for (const b of rectCorners(to)) {
      pairs.push({ pair: [a, b], distance: squaredDistance(a, b) });
    }
  }
  return pairs
    .sort((x, y) => x.distance - y.distance)
    .map(({ pair }) => pair);
}

/**
 * Shared lanes of two aligned rooms: rows for a horizontal corridor,
 * columns for a vertical one.
 */
function sharedLanes(from: Room, to: Room, axis: CorridorAxis): number[] {
  const lanes: number[] = [];
  const start =
    axis === "horizontal" ? Math.max(from.y, to.y) : Math.max(from.x, to.x);
  const end =
    axis === "horizontal"
      ? Math.min(from.y + from.height, to.y + to.height)
      : Math.min(from.x + from.width, to.x + to.width);

  for (let lane = start; lane < end; lane++) {
    lanes.push(lane);
  }
  return lanes;
}

// =============================================================================
// ROUTE CANDIDATES
// =============================================================================

/**
 * Routes in the order they are tried; the first is the naive route.
 * Straight corridors try shuffled lanes, L-shaped ones try both bends of
 * each corner pair, nearest pair first.
 */
function candidatePaths(
  from: Room,
  to: Room,
  instruction: CarvingInstruction,
  rng: SeededRandom,
  limit: number,
): Point[][] {
  const paths: Point[][] = [];

  if (instruction.kind === "straight" && instruction.axis) {
    const axis = instruction.axis;
    const lanes = rng.shuffle(sharedLanes(from, to, axis));
    for (const lane of lanes.slice(0, limit)) {
      paths.push(straightPath(from, to, axis, lane));
    }
    if (paths.length > 0) return paths;
  }

  const horizontalFirst = rng.probability(0.5);
  for (const [start, end] of cornerPairs(from, to)) {
    if (paths.length >= limit) break;
    paths.push(lShapedPath(start, end, horizontalFirst));
    if (paths.length >= limit) break;
    paths.push(lShapedPath(start, end, !horizontalFirst));
  }
  return paths;
}

/**
 * Drop own-room tiles and count third-room ones.
 */
function evaluate(path: readonly Point[], from: Room, to: Room, grid: LevelGrid): Route {
  const kept: Point[] = [];
  let intersections = 0;

  for (const p of path) {
    const owner = grid.roomAt(p.x, p.y);
    if (owner === from.id || owner === to.id) continue;
    if (owner !== undefined) intersections++;
    kept.push(p);
  }

  return { path: kept, intersections };
}

// =============================================================================
// CARVING
// =============================================================================

/**
 * Carve the corridor for one instruction into `grid`.
 *
 * Up to `maxCarveRetries` alternatives are tried when the naive route
 * crosses a third room. When none is clean the permissive policy carves the
 * naive route; the strict policy fails with CARVING_BLOCKED and writes
 * nothing.
 */
export function carveCorridor(
  from: Room,
  to: Room,
  instruction: CarvingInstruction,
  grid: LevelGrid,
  rng: SeededRandom,
  options: CarvingOptions,
): Result<CarveOutcome, LevelError> {
  const routes = candidatePaths(from, to, instruction, rng, options.maxCarveRetries + 1).map(
    (path) => evaluate(path, from, to, grid),
  );

  const cleanIndex = routes.findIndex((route) => route.intersections === 0);
  const chosen = cleanIndex >= 0 ? routes[cleanIndex] : routes[0];
  const attempts = cleanIndex >= 0 ? cleanIndex + 1 : routes.length;

  if (!chosen) {
    return Err(
      LevelError.carvingBlocked(`No route between rooms ${from.id} and ${to.id}`, {
        from: from.id,
        to: to.id,
      }),
    );
  }

  if (cleanIndex < 0 && options.corridorPolicy === "strict") {
    return Err(
      LevelError.carvingBlocked(
        `Every route between rooms ${from.id} and ${to.id} crosses another room`,
        { from: from.id, to: to.id, attempts, intersections: chosen.intersections },
      ),
    );
  }

  let written = 0;
  for (const p of chosen.path) {
    if (grid.carveCorridorTile(p.x, p.y)) written++;
  }

  return Ok({
    path: chosen.path,
    written,
    intersections: chosen.intersections,
    attempts,
    clean: cleanIndex >= 0,
  });
}

// =============================================================================
// WIDENING
// =============================================================================

/**
 * Grow corridors into neighbouring Void tiles until the grid holds
 * `targetTiles` walkable tiles. The search runs breadth first from the
 * corridor paths in carving order, then from room tiles, so every new tile
 * touches the walkable area it extends.
 *
 * @returns tiles written
 */
export function widenCorridors(
  grid: LevelGrid,
  paths: ReadonlyArray<readonly Point[]>,
  targetTiles: number,
): number {
  let walkable = grid.tiles.countWalkable();
  if (walkable >= targetTiles) return 0;

  const queue: Point[] = [];
  for (const path of paths) queue.push(...path);
  for (const room of grid.rooms) {
    for (let y = room.y; y < room.y + room.height; y++) {
      for (let x = room.x; x < room.x + room.width; x++) {
        queue.push({ x, y });
      }
    }
  }

  let written = 0;
  for (let head = 0; head < queue.length && walkable < targetTiles; head++) {
    const p = queue[head];
    if (!p) break;

    for (const d of CARDINALS) {
      if (walkable >= targetTiles) break;
      const next = { x: p.x + d.x, y: p.y + d.y };
      if (grid.carveCorridorTile(next.x, next.y)) {
        walkable++;
        written++;
        queue.push(next);
      }
    }
  }
  return written;
}
