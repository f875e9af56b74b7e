import type { LevelConfig } from "@delve/contracts";
import type { LevelGrid } from "../level/level-grid";
import {
  checkConnectivity,
  checkFloorRatio,
  checkRoomSizes,
  checkRoomsDisjoint,
  checkRoomsInBounds,
} from "../passes/validation/invariant-checks";
import type { Violation } from "../pipeline/types";
import { hasErrorViolations, type LevelValidationResult } from "./result-types";

export type LevelValidationOptions = Pick<
  LevelConfig,
  "minRoomSize" | "targetFloorRatio" | "floorRatioTolerance"
>;

/**
 * Validate a level against its invariants.
 *
 * Checks:
 * - Rooms are pairwise disjoint, inside the region and at least `minRoomSize`
 * - Every room is reachable from the first
 * - Floor ratio is within `floorRatioTolerance` of `targetFloorRatio`
 */
export function validateLevel(
  level: { readonly grid: LevelGrid },
  options: LevelValidationOptions,
): LevelValidationResult {
  const { grid } = level;
  const violations: Violation[] = [
    ...checkRoomsDisjoint(grid.rooms).violations,
    ...checkRoomsInBounds(grid.rooms, grid.region).violations,
    ...checkRoomSizes(grid.rooms, options.minRoomSize).violations,
    ...checkConnectivity(grid).violations,
    ...checkFloorRatio(
      grid.floorRatio(),
      options.targetFloorRatio,
      options.floorRatioTolerance,
    ).violations,
  ];

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
