/**
 * Grid types for level generation.
 */

/**
 * Tile states.
 * VOID is untouched region outside every room and corridor.
 */
export const Tile = {
  VOID: 0,
  FLOOR: 1,
  WALL: 2,
  CORRIDOR_FLOOR: 3,
} as const;

export type Tile = (typeof Tile)[keyof typeof Tile];

const TILE_VALUES: ReadonlySet<number> = new Set(Object.values(Tile));

export function isTile(value: number): value is Tile {
  return TILE_VALUES.has(value);
}

/**
 * Floor and corridor floor can be walked on; void and wall cannot.
 */
export function isWalkable(tile: Tile): boolean {
  return tile === Tile.FLOOR || tile === Tile.CORRIDOR_FLOOR;
}

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Generated levels expose their tiles through this type so consumers get
 * compile-time protection against mutation on top of the runtime seal.
 *
 * @example
 * ```typescript
 * function countWalls(grid: ReadonlyTileGrid): number {
 *   return grid.countTiles(Tile.WALL);
 * }
 * ```
 */
export interface ReadonlyTileGrid {
  readonly width: number;
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): Tile;
  isWalkable(x: number, y: number): boolean;

  getRawDataCopy(): Uint8Array;
  forEach(callback: (x: number, y: number, tile: Tile) => void): void;
  countTiles(tile: Tile): number;
  countWalkable(): number;
  equals(other: ReadonlyTileGrid): boolean;
}

/**
 * Mutable grid interface, used while a level is being generated.
 */
export interface MutableTileGrid extends ReadonlyTileGrid {
  set(x: number, y: number, tile: Tile): void;
  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    tile: Tile,
  ): void;
}
