/**
 * Level Checksum Calculator
 *
 * Checksums are prefixed with a version identifier: "v{version}:{hash}".
 */

import type { Corridor, Room } from "../../pipeline/types";
import type { ReadonlyTileGrid } from "../grid/types";
import { FNV64Hasher } from "./fnv64";

/**
 * Increment when changing what data is hashed or how.
 */
export const CHECKSUM_VERSION = 1;

/**
 * Split a checksum into version and hash; null when it has no version prefix.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):([0-9a-f]{16})$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: Number.parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * Deterministic checksum over tiles, room rectangles and corridor paths.
 */
export function calculateLevelChecksum(
  tiles: ReadonlyTileGrid,
  rooms: readonly Room[],
  corridors: readonly Corridor[],
): string {
  const hasher = new FNV64Hasher();

  hasher.updateInt32(CHECKSUM_VERSION);
  hasher.updateInt32(tiles.width);
  hasher.updateInt32(tiles.height);
  hasher.updateBytes(tiles.getRawDataCopy());

  for (const room of rooms) {
    hasher.updateInt32(room.x);
    hasher.updateInt32(room.y);
    hasher.updateInt32(room.width);
    hasher.updateInt32(room.height);
  }

  for (const corridor of corridors) {
    hasher.updateInt32(corridor.fromRoomId);
    hasher.updateInt32(corridor.toRoomId);
    for (const p of corridor.path) {
      hasher.updateInt32(p.x);
      hasher.updateInt32(p.y);
    }
  }

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
