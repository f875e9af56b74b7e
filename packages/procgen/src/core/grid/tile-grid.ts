/**
 * Flat tile buffer for level generation.
 * Uses a Uint8Array in row-major order.
 */

import {
  isTile,
  isWalkable,
  type MutableTileGrid,
  type ReadonlyTileGrid,
  Tile,
} from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * 2D tile grid with bounds-checked access.
 *
 * @remarks
 * The grid stays mutable until `seal()` is called; after that every write
 * throws. Finished levels are always sealed.
 */
export class TileGrid implements MutableTileGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;
  private sealed = false;

  constructor(width: number, height: number, initial: Tile = Tile.VOID) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid grid dimensions: ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (initial !== Tile.VOID) {
      this.data.fill(initial);
    }
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ===========================================================================
  // TILE ACCESS
  // ===========================================================================

  /**
   * Get tile with bounds checking (VOID for out of bounds)
   */
  get(x: number, y: number): Tile {
    if (!this.isInBounds(x, y)) return Tile.VOID;
    const value = this.data[y * this.width + x];
    return value !== undefined && isTile(value) ? value : Tile.VOID;
  }

  isWalkable(x: number, y: number): boolean {
    return isWalkable(this.get(x, y));
  }

  /**
   * Set tile with bounds checking; out-of-bounds writes are dropped
   */
  set(x: number, y: number, tile: Tile): void {
    this.assertWritable();
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `TileGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.data[y * this.width + x] = tile;
  }

  /**
   * Fill the part of a rectangle that lies inside the grid
   */
  fillRect(
    x: number,
    y: number,
    width: number,
    height: number,
    tile: Tile,
  ): void {
    this.assertWritable();
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(this.width, x + width);
    const y1 = Math.min(this.height, y + height);

    for (let py = y0; py < y1; py++) {
      this.data.fill(tile, py * this.width + x0, py * this.width + x1);
    }
  }

  // ===========================================================================
  // SEALING
  // ===========================================================================

  /**
   * Make the grid read-only. Irreversible.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertWritable(): void {
    if (this.sealed) {
      throw new Error("TileGrid is sealed; finished levels are read-only");
    }
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): TileGrid {
    const result = new TileGrid(this.width, this.height);
    result.data.set(this.data);
    return result;
  }

  /**
   * Copy of the raw tile bytes, safe to hand out
   */
  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  forEach(callback: (x: number, y: number, tile: Tile) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.get(x, y));
      }
    }
  }

  countTiles(tile: Tile): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === tile) count++;
    }
    return count;
  }

  /**
   * Count FLOOR and CORRIDOR_FLOOR tiles
   */
  countWalkable(): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      const value = this.data[i];
      if (value !== undefined && isTile(value) && isWalkable(value)) count++;
    }
    return count;
  }

  /**
   * Same dimensions and identical tiles
   */
  equals(other: ReadonlyTileGrid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    const theirs = other.getRawDataCopy();
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== theirs[i]) {
        return false;
      }
    }
    return true;
  }
}
