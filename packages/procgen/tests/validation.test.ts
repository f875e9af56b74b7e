import { describe, expect, it } from "vitest";
import { LevelGrid } from "../src/level/level-grid";
import {
  checkFloorRatio,
  checkRoomsDisjoint,
  checkRoomsInBounds,
} from "../src/passes/validation/invariant-checks";
import type { Room } from "../src/pipeline/types";
import { hasErrorViolations, validateLevel } from "../src/validation";

function room(id: number, x: number, y: number, width: number, height: number): Room {
  return {
    id,
    x,
    y,
    width,
    height,
    centerX: x + Math.floor(width / 2),
    centerY: y + Math.floor(height / 2),
  };
}

describe("validateLevel", () => {
  const options = { minRoomSize: 3, targetFloorRatio: 0.5, floorRatioTolerance: 0.01 };

  it("reports every broken invariant", () => {
    const grid = new LevelGrid(10, 10);
    grid.commitRoom({ x: 1, y: 1, width: 3, height: 3 });
    grid.commitRoom({ x: 6, y: 6, width: 2, height: 2 });

    const result = validateLevel({ grid }, options);

    expect(result.success).toBe(false);
    expect(result.violations.map((v) => v.type)).toEqual([
      "invariant.rooms.undersized",
      "invariant.connectivity",
      "invariant.floor-ratio",
    ]);
    expect(result.violations[2]?.message).toBe(
      "Floor ratio 0.130 is below the target 0.5 (tolerance 0.01)",
    );
  });

  it("accepts a connected level at the target ratio", () => {
    const grid = new LevelGrid(6, 2);
    grid.commitRoom({ x: 0, y: 0, width: 3, height: 2 });
    grid.commitRoom({ x: 4, y: 0, width: 2, height: 2 });
    grid.carveCorridorTile(3, 0);

    const result = validateLevel(
      { grid },
      { minRoomSize: 2, targetFloorRatio: 0.91, floorRatioTolerance: 0.01 },
    );

    expect(result).toEqual({ success: true, violations: [] });
  });

  it("rejects a level that overshoots the target ratio", () => {
    const grid = new LevelGrid(6, 2);
    grid.commitRoom({ x: 0, y: 0, width: 3, height: 2 });
    grid.commitRoom({ x: 4, y: 0, width: 2, height: 2 });
    grid.carveCorridorTile(3, 0);

    const result = validateLevel(
      { grid },
      { minRoomSize: 2, targetFloorRatio: 0.5, floorRatioTolerance: 0.01 },
    );

    expect(result.success).toBe(false);
    expect(result.violations).toEqual([
      {
        type: "invariant.floor-ratio",
        message: "Floor ratio 0.917 is above the target 0.5 (tolerance 0.01)",
        severity: "error",
      },
    ]);
  });
});

describe("invariant checks", () => {
  it("flags overlapping rooms", () => {
    const result = checkRoomsDisjoint([room(0, 0, 0, 4, 4), room(1, 3, 3, 4, 4), room(2, 9, 9, 1, 1)]);

    expect(result.success).toBe(false);
    expect(result.violations).toEqual([
      { type: "invariant.rooms.overlap", message: "Rooms 0 and 1 overlap", severity: "error" },
    ]);
  });

  it("flags rooms past the region edge", () => {
    const result = checkRoomsInBounds([room(0, 8, 0, 4, 4)], { width: 10, height: 10 });

    expect(result.violations[0]?.message).toBe(
      "Room 0 at (8, 0) extends past the 10x10 region",
    );
  });

  it("allows the ratio to fall short by the tolerance", () => {
    expect(checkFloorRatio(0.345, 0.35, 0.01).success).toBe(true);
    expect(checkFloorRatio(0.335, 0.35, 0.01).success).toBe(false);
  });

  it("allows the ratio to exceed the target only by the tolerance", () => {
    expect(checkFloorRatio(0.355, 0.35, 0.01).success).toBe(true);
    expect(checkFloorRatio(0.365, 0.35, 0.01).success).toBe(false);
  });

  it("treats warnings as passing", () => {
    expect(
      hasErrorViolations([{ type: "note", message: "just a note", severity: "warning" }]),
    ).toBe(false);
  });
});
