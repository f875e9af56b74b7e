/**
 * Level grid: the tile buffer plus the room registry.
 */

import { rectArea, rectContains, rectsOverlap } from "../core/geometry/operations";
import type { Dimensions, Rect } from "../core/geometry/types";
import { floodFillBFS } from "../core/grid/flood-fill";
import { TileGrid } from "../core/grid/tile-grid";
import { type ReadonlyTileGrid, Tile } from "../core/grid/types";
import type { Room } from "../pipeline/types";

const NO_OWNER = -1;

/**
 * 8-neighbourhood offsets used by the wall outline
 */
const NEIGHBORS_8: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
];

/**
 * Owns the tiles of one level and the rooms committed to it.
 *
 * Rooms receive identifiers in creation order. Each Floor tile remembers
 * the room it belongs to so corridor carving can tell a room's own floor
 * from a third room's.
 */
export class LevelGrid {
  readonly width: number;
  readonly height: number;
  private readonly grid: TileGrid;
  private readonly owners: Int32Array;
  private readonly roomList: Room[] = [];
  private committedArea = 0;

  constructor(width: number, height: number) {
    this.grid = new TileGrid(width, height);
    this.width = width;
    this.height = height;
    this.owners = new Int32Array(width * height).fill(NO_OWNER);
  }

  get tiles(): ReadonlyTileGrid {
    return this.grid;
  }

  get rooms(): readonly Room[] {
    return this.roomList;
  }

  get region(): Dimensions {
    return { width: this.width, height: this.height };
  }

  get isSealed(): boolean {
    return this.grid.isSealed;
  }

  /** Tiles covered by committed rooms */
  get roomArea(): number {
    return this.committedArea;
  }

  /**
   * Sum of room areas over region area. Ignores corridors.
   */
  roomCoverage(): number {
    return this.committedArea / (this.width * this.height);
  }

  /**
   * Fewest walkable tiles that give a floor ratio of at least `ratio`.
   */
  tileTarget(ratio: number): number {
    const area = this.width * this.height;
    let tiles = Math.ceil(ratio * area);
    while (tiles > 0 && (tiles - 1) / area >= ratio) tiles--;
    while (tiles < area && tiles / area < ratio) tiles++;
    return tiles;
  }

  /**
   * Register a room and fill it with Floor.
   *
   * @throws when the rect leaves the region or overlaps a committed room;
   * the placer guarantees neither happens.
   */
  commitRoom(rect: Rect): Room {
    if (!rectContains({ x: 0, y: 0, width: this.width, height: this.height }, rect)) {
      throw new Error(
        `Room ${rect.width}x${rect.height} at (${rect.x}, ${rect.y}) leaves the ${this.width}x${this.height} region`,
      );
    }
    const clash = this.roomList.find((room) => rectsOverlap(room, rect));
    if (clash) {
      throw new Error(`Room at (${rect.x}, ${rect.y}) overlaps room ${clash.id}`);
    }

    const room: Room = {
      id: this.roomList.length,
      x: rect.x,
      y: rect.y,
      width: rect.width,
      height: rect.height,
      centerX: rect.x + Math.floor(rect.width / 2),
      centerY: rect.y + Math.floor(rect.height / 2),
    };

    this.grid.fillRect(rect.x, rect.y, rect.width, rect.height, Tile.FLOOR);
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      this.owners.fill(room.id, y * this.width + rect.x, y * this.width + rect.x + rect.width);
    }

    this.roomList.push(room);
    this.committedArea += rectArea(rect);
    return room;
  }

  getRoom(id: number): Room | undefined {
    return this.roomList[id];
  }

  /**
   * Room owning the tile, or undefined for corridors, walls, void and
   * out-of-bounds coordinates.
   */
  roomAt(x: number, y: number): number | undefined {
    if (!this.grid.isInBounds(x, y)) return undefined;
    const owner = this.owners[y * this.width + x];
    return owner === undefined || owner === NO_OWNER ? undefined : owner;
  }

  /**
   * Turn a Void tile into CorridorFloor. Floor and corridor tiles are left
   * as they are.
   *
   * @returns true when the tile was written
   */
  carveCorridorTile(x: number, y: number): boolean {
    if (!this.grid.isInBounds(x, y)) return false;
    if (this.grid.get(x, y) !== Tile.VOID) return false;
    this.grid.set(x, y, Tile.CORRIDOR_FLOOR);
    return true;
  }

  /**
   * Wall in every walkable area: each Void tile touching a walkable tile,
   * diagonals included, becomes Wall.
   *
   * @returns number of walls placed
   */
  outlineWalls(): number {
    const walls: number[] = [];

    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.grid.get(x, y) !== Tile.VOID) continue;
        for (const [dx, dy] of NEIGHBORS_8) {
          if (this.grid.isWalkable(x + dx, y + dy)) {
            walls.push(y * this.width + x);
            break;
          }
        }
      }
    }

    for (const index of walls) {
      this.grid.set(index % this.width, Math.floor(index / this.width), Tile.WALL);
    }
    return walls.length;
  }

  /**
   * (Floor + CorridorFloor) / (width × height)
   */
  floorRatio(): number {
    return this.grid.countWalkable() / (this.width * this.height);
  }

  /**
   * Flood-fill from the first room and check every tile of every room was
   * reached. A level without rooms is trivially connected.
   */
  isFullyConnected(): boolean {
    const first = this.roomList[0];
    if (!first) return true;

    const reached = floodFillBFS(this.width, this.height, first.x, first.y, (x, y) =>
      this.grid.isWalkable(x, y),
    );

    for (const room of this.roomList) {
      for (let y = room.y; y < room.y + room.height; y++) {
        for (let x = room.x; x < room.x + room.width; x++) {
          if (reached[y * this.width + x] !== 1) return false;
        }
      }
    }
    return true;
  }

  /**
   * Freeze the level. Later writes throw.
   */
  seal(): void {
    this.grid.seal();
  }
}
