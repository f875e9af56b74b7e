/**
 * Level Validation Invariants
 *
 * Reusable checks run on every attempt before a level is accepted.
 */

import { rectContains, rectsOverlap } from "../../core/geometry/operations";
import type { Dimensions } from "../../core/geometry/types";
import type { LevelGrid } from "../../level/level-grid";
import type { Room, Violation } from "../../pipeline/types";

/**
 * Validation result for a single check
 */
export interface CheckResult {
  readonly success: boolean;
  readonly violations: Violation[];
}

function toCheckResult(violations: Violation[]): CheckResult {
  return { success: violations.length === 0, violations };
}

/**
 * Check that no two rooms share a tile
 */
export function checkRoomsDisjoint(rooms: readonly Room[]): CheckResult {
  const violations: Violation[] = [];

  for (let i = 0; i < rooms.length; i++) {
    for (let j = i + 1; j < rooms.length; j++) {
      const a = rooms[i];
      const b = rooms[j];
      if (a && b && rectsOverlap(a, b)) {
        violations.push({
          type: "invariant.rooms.overlap",
          message: `Rooms ${a.id} and ${b.id} overlap`,
          severity: "error",
        });
      }
    }
  }

  return toCheckResult(violations);
}

/**
 * Check that every room lies inside the region
 */
export function checkRoomsInBounds(
  rooms: readonly Room[],
  region: Dimensions,
): CheckResult {
  const bounds = { x: 0, y: 0, width: region.width, height: region.height };
  return toCheckResult(
    rooms
      .filter((room) => !rectContains(bounds, room))
      .map((room): Violation => ({
        type: "invariant.rooms.bounds",
        message: `Room ${room.id} at (${room.x}, ${room.y}) extends past the ${region.width}x${region.height} region`,
        severity: "error",
      })),
  );
}

export function checkRoomSizes(
  rooms: readonly Room[],
  minRoomSize: number,
): CheckResult {
  return toCheckResult(
    rooms
      .filter((room) => room.width < minRoomSize || room.height < minRoomSize)
      .map((room): Violation => ({
        type: "invariant.rooms.undersized",
        message: `Room ${room.id} is ${room.width}x${room.height}, below the minimum of ${minRoomSize}`,
        severity: "error",
      })),
  );
}

/**
 * Check that every room is reachable from the first one
 */
export function checkConnectivity(grid: LevelGrid): CheckResult {
  if (grid.isFullyConnected()) return toCheckResult([]);
  return toCheckResult([
    {
      type: "invariant.connectivity",
      message: `Not every one of the ${grid.rooms.length} rooms is reachable from room 0`,
      severity: "error",
    },
  ]);
}

/**
 * Floor ratio must land in [target − tolerance, target + tolerance].
 */
export function checkFloorRatio(
  ratio: number,
  target: number,
  tolerance: number,
): CheckResult {
  if (ratio < target - tolerance) {
    return toCheckResult([
      {
        type: "invariant.floor-ratio",
        message: `Floor ratio ${ratio.toFixed(3)} is below the target ${target} (tolerance ${tolerance})`,
        severity: "error",
      },
    ]);
  }
  if (ratio > target + tolerance) {
    return toCheckResult([
      {
        type: "invariant.floor-ratio",
        message: `Floor ratio ${ratio.toFixed(3)} is above the target ${target} (tolerance ${tolerance})`,
        severity: "error",
      },
    ]);
  }
  return toCheckResult([]);
}
