/**
 * Flood fill over walkable tiles, used as the ground-truth connectivity
 * check for generated levels.
 */

import type { Point } from "../geometry/types";
import type { ReadonlyTileGrid } from "./types";

const BFS_DIRECTIONS_4: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
] as const;

/**
 * Generic 4-connected flood fill using BFS with a configurable predicate.
 *
 * @param canVisit - Predicate to test if a cell can be entered
 * @returns Row-major mask with 1 for every reached cell. The start cell is
 * marked only when it passes `canVisit`.
 */
export function floodFillBFS(
  width: number,
  height: number,
  startX: number,
  startY: number,
  canVisit: (x: number, y: number) => boolean,
): Uint8Array {
  const visited = new Uint8Array(width * height);
  if (startX < 0 || startX >= width || startY < 0 || startY >= height) {
    return visited;
  }
  if (!canVisit(startX, startY)) return visited;

  const queue: number[] = [startY * width + startX];
  let queueHead = 0;
  visited[startY * width + startX] = 1;

  while (queueHead < queue.length) {
    const coord = queue[queueHead++];
    if (coord === undefined) break;
    const x = coord % width;
    const y = Math.floor(coord / width);

    for (const [dx, dy] of BFS_DIRECTIONS_4) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;

      const index = ny * width + nx;
      if (visited[index] === 1) continue;
      if (!canVisit(nx, ny)) continue;

      visited[index] = 1;
      queue.push(index);
    }
  }

  return visited;
}

/**
 * Reachability mask of walkable tiles from `start`.
 */
export function floodFillWalkable(
  grid: ReadonlyTileGrid,
  start: Point,
): Uint8Array {
  return floodFillBFS(grid.width, grid.height, start.x, start.y, (x, y) =>
    grid.isWalkable(x, y),
  );
}

/**
 * Check if two tiles are joined by a walkable path
 */
export function areConnected(
  grid: ReadonlyTileGrid,
  a: Point,
  b: Point,
): boolean {
  if (!grid.isWalkable(a.x, a.y) || !grid.isWalkable(b.x, b.y)) return false;
  const reached = floodFillWalkable(grid, a);
  return reached[b.y * grid.width + b.x] === 1;
}

/**
 * Count the separate walkable regions of a grid.
 */
export function countWalkableRegions(grid: ReadonlyTileGrid): number {
  const seen = new Uint8Array(grid.width * grid.height);
  let regions = 0;

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const index = y * grid.width + x;
      if (seen[index] === 1 || !grid.isWalkable(x, y)) continue;

      regions++;
      const reached = floodFillWalkable(grid, { x, y });
      for (let i = 0; i < reached.length; i++) {
        if (reached[i] === 1) seen[i] = 1;
      }
    }
  }

  return regions;
}
