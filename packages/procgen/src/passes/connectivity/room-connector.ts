/**
 * Room connection: a Kruskal-style spanning structure over every room pair,
 * sorted by distance.
 */

import {
  type DistanceMetric,
  Err,
  LevelError,
  type LevelConfig,
  Ok,
  type Result,
} from "@delve/contracts";
import { DisjointSet } from "../../core/algorithms/disjoint-set";
import {
  centerDistance,
  nearestCornerDistance,
  relateRects,
} from "../../core/geometry/operations";
import type { Rect } from "../../core/geometry/types";
import type {
  CarvingInstruction,
  CorridorAxis,
  Edge,
  Room,
} from "../../pipeline/types";

export type ConnectionOptions = Pick<
  LevelConfig,
  "distanceMetric" | "minConnectionDistance" | "extraConnections"
>;

/**
 * Turns a room list into carving instructions.
 */
export interface ConnectionStrategy {
  readonly id: string;
  connect(
    rooms: readonly Room[],
    set: DisjointSet,
    options: ConnectionOptions,
  ): Result<CarvingInstruction[], LevelError>;
}

/**
 * Aligned iff the rooms' coordinate ranges overlap on exactly one axis.
 * Rooms stacked vertically get a vertical corridor, side-by-side rooms a
 * horizontal one.
 */
export function classifyPair(
  a: Rect,
  b: Rect,
): { classification: Edge["classification"]; axis?: CorridorAxis } {
  switch (relateRects(a, b).kind) {
    case "x-overlap":
      return { classification: "aligned", axis: "vertical" };
    case "y-overlap":
      return { classification: "aligned", axis: "horizontal" };
    default:
      return { classification: "diagonal" };
  }
}

export function roomDistance(a: Rect, b: Rect, metric: DistanceMetric): number {
  return metric === "center" ? centerDistance(a, b) : nearestCornerDistance(a, b);
}

/**
 * One edge per unordered room pair, `a < b`.
 */
export function buildEdges(
  rooms: readonly Room[],
  metric: DistanceMetric = "nearest-corner",
): Edge[] {
  const edges: Edge[] = [];

  for (let i = 0; i < rooms.length; i++) {
    for (let j = i + 1; j < rooms.length; j++) {
      const first = rooms[i];
      const second = rooms[j];
      if (!first || !second) continue;

      const lo = first.id < second.id ? first : second;
      const hi = lo === first ? second : first;
      edges.push({
        a: lo.id,
        b: hi.id,
        distance: roomDistance(lo, hi, metric),
        ...classifyPair(lo, hi),
      });
    }
  }

  return edges;
}

/**
 * Ascending distance, ties broken by (a, b).
 */
export function compareEdges(x: Edge, y: Edge): number {
  return x.distance - y.distance || x.a - y.a || x.b - y.b;
}

function toInstruction(edge: Edge): CarvingInstruction {
  if (edge.classification === "aligned") {
    return {
      fromRoomId: edge.a,
      toRoomId: edge.b,
      kind: "straight",
      axis: edge.axis,
      distance: edge.distance,
    };
  }
  return {
    fromRoomId: edge.a,
    toRoomId: edge.b,
    kind: "l-shaped",
    distance: edge.distance,
  };
}

/**
 * Walk the sorted edges, accepting each one that joins two components,
 * until every room is in one. With `extraConnections > 0` up to that many
 * more edges longer than `minConnectionDistance` are accepted afterwards,
 * which closes loops.
 */
export const sortedEdgeStrategy: ConnectionStrategy = {
  id: "sorted-edge",

  connect(rooms, set, options) {
    const edges = buildEdges(rooms, options.distanceMetric).sort(compareEdges);
    const instructions: CarvingInstruction[] = [];
    let extrasLeft = options.extraConnections;

    for (const edge of edges) {
      if (!set.isSingleSet()) {
        if (set.union(edge.a, edge.b)) {
          instructions.push(toInstruction(edge));
        }
        continue;
      }

      if (extrasLeft === 0) break;
      if (edge.distance > options.minConnectionDistance) {
        instructions.push(toInstruction(edge));
        extrasLeft--;
      }
    }

    if (!set.isSingleSet()) {
      const error = LevelError.disconnectedLevel(
        `${set.count} room groups remain after all ${edges.length} candidate edges`,
        { rooms: rooms.length, components: set.count },
      );
      console.warn(`[room-connector] ${error.message}`);
      return Err(error);
    }

    return Ok(instructions);
  },
};

/**
 * Connect rooms with the sorted-edge strategy.
 */
export function connect(
  rooms: readonly Room[],
  set: DisjointSet,
  options: ConnectionOptions,
): Result<CarvingInstruction[], LevelError> {
  return sortedEdgeStrategy.connect(rooms, set, options);
}

/**
 * Tiles a naive route of `instruction` occupies outside its own rooms:
 * the gap for a straight corridor, one more for the bend of an L.
 */
export function corridorTileEstimate(from: Rect, to: Rect, instruction: CarvingInstruction): number {
  const gap = nearestCornerDistance(from, to);
  return instruction.kind === "l-shaped" ? gap + 1 : gap;
}

/**
 * Corridor tiles the sorted-edge strategy would carve for `rects` taken
 * as rooms in that order. Routes shared with other corridors or moved
 * around third rooms make the real count differ.
 */
export function estimateCorridorTiles(
  rects: readonly Rect[],
  options: ConnectionOptions,
): number {
  if (rects.length < 2) return 0;

  const rooms: Room[] = rects.map((rect, id) => ({
    id,
    x: rect.x,
    y: rect.y,
    width: rect.width,
    height: rect.height,
    centerX: rect.x + Math.floor(rect.width / 2),
    centerY: rect.y + Math.floor(rect.height / 2),
  }));
  const set = new DisjointSet(rooms.map((room) => room.id));
  const instructions = sortedEdgeStrategy.connect(rooms, set, options).getOrThrow();

  let tiles = 0;
  for (const instruction of instructions) {
    const from = rooms[instruction.fromRoomId];
    const to = rooms[instruction.toRoomId];
    if (from && to) tiles += corridorTileEstimate(from, to, instruction);
  }
  return tiles;
}
