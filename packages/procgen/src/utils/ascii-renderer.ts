/**
 * ASCII Level Renderer
 *
 * Renders levels as plain text for debugging and tests.
 *
 * @example
 * ```typescript
 * import { generateLevel, renderAscii } from "@delve/procgen";
 *
 * const result = generateLevel({
 *   regionWidth: 40,
 *   regionHeight: 25,
 *   targetFloorRatio: 0.3,
 *   seed: 7,
 * });
 * if (result.success) {
 *   console.log(renderAscii(result.level, { showRoomIds: true }));
 * }
 * ```
 */

import { type ReadonlyTileGrid, Tile } from "../core/grid/types";
import type { Room } from "../pipeline/types";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Character per tile kind
 */
export interface AsciiCharset {
  readonly wall: string;
  readonly floor: string;
  readonly corridor: string;
  readonly void: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "#",
  floor: ".",
  corridor: ",",
  void: " ",
};

/**
 * Box-drawing charset for terminals with unicode support
 */
export const UNICODE_CHARSET: AsciiCharset = {
  wall: "█",
  floor: "·",
  corridor: "░",
  void: " ",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Print the last digit of each room id on its center tile */
  readonly showRoomIds?: boolean;
  /** Prefix rows with their y coordinate */
  readonly showCoordinates?: boolean;
}

/**
 * Anything with tiles and rooms: a finished Level or a LevelGrid
 */
export interface RenderableLevel {
  readonly tiles: ReadonlyTileGrid;
  readonly rooms: readonly Room[];
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

function tileChar(tile: Tile, charset: AsciiCharset): string {
  switch (tile) {
    case Tile.WALL:
      return charset.wall;
    case Tile.FLOOR:
      return charset.floor;
    case Tile.CORRIDOR_FLOOR:
      return charset.corridor;
    case Tile.VOID:
      return charset.void;
  }
}

/**
 * Render a level as text, one line per row
 */
export function renderAscii(
  level: RenderableLevel,
  options: RenderOptions = {},
): string {
  const {
    charset = DEFAULT_CHARSET,
    showRoomIds = false,
    showCoordinates = false,
  } = options;
  const { tiles, rooms } = level;

  const grid: string[][] = [];
  for (let y = 0; y < tiles.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < tiles.width; x++) {
      row.push(tileChar(tiles.get(x, y), charset));
    }
    grid.push(row);
  }

  if (showRoomIds) {
    for (const room of rooms) {
      const row = grid[room.centerY];
      if (row && room.centerX >= 0 && room.centerX < tiles.width) {
        row[room.centerX] = String(room.id % 10);
      }
    }
  }

  return grid
    .map((row, y) =>
      showCoordinates ? `${y.toString().padStart(3)} ${row.join("")}` : row.join(""),
    )
    .join("\n");
}

/**
 * Print level to console
 */
export function printLevel(level: RenderableLevel, options: RenderOptions = {}): void {
  console.log(renderAscii(level, options));
}
