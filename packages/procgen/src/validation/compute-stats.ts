import { Tile } from "../core/grid/types";
import type { Level } from "../pipeline/types";

/**
 * Generation statistics for analyzing levels
 */
export interface GenerationStats {
  readonly roomCount: number;
  readonly avgRoomSize: number;
  readonly minRoomSize: number;
  readonly maxRoomSize: number;
  readonly floorTiles: number;
  readonly corridorTiles: number;
  readonly wallTiles: number;
  readonly floorRatio: number;
  readonly corridorCount: number;
  readonly straightCorridors: number;
  readonly avgCorridorLength: number;
  /** Corridor tiles that cut through a third room */
  readonly intersections: number;
}

/**
 * Compute statistics for a generated level
 */
export function computeStats(level: Level): GenerationStats {
  const { rooms, corridors, tiles } = level;

  let totalRoomArea = 0;
  let minRoomSize = Number.POSITIVE_INFINITY;
  let maxRoomSize = 0;
  for (const room of rooms) {
    const size = room.width * room.height;
    totalRoomArea += size;
    if (size < minRoomSize) minRoomSize = size;
    if (size > maxRoomSize) maxRoomSize = size;
  }
  if (rooms.length === 0) {
    minRoomSize = 0;
  }

  let totalCorridorLength = 0;
  let intersections = 0;
  let straightCorridors = 0;
  for (const corridor of corridors) {
    totalCorridorLength += corridor.path.length;
    intersections += corridor.intersections;
    if (corridor.kind === "straight") straightCorridors++;
  }

  return {
    roomCount: rooms.length,
    avgRoomSize: rooms.length > 0 ? totalRoomArea / rooms.length : 0,
    minRoomSize,
    maxRoomSize,
    floorTiles: tiles.countTiles(Tile.FLOOR),
    corridorTiles: tiles.countTiles(Tile.CORRIDOR_FLOOR),
    wallTiles: tiles.countTiles(Tile.WALL),
    floorRatio: level.floorRatio,
    corridorCount: corridors.length,
    straightCorridors,
    avgCorridorLength:
      corridors.length > 0 ? totalCorridorLength / corridors.length : 0,
    intersections,
  };
}
