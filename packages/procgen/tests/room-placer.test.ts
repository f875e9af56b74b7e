import { SeededRandom } from "@delve/contracts";
import { describe, expect, it } from "vitest";
import { rectContains, rectsOverlapWithPadding } from "../src/core/geometry";
import { LevelGrid } from "../src/level/level-grid";
import {
  fitToBudget,
  type PlacementLoopOptions,
  placeRoom,
  placeRooms,
  type RoomPlacementOptions,
} from "../src/passes/placement/room-placer";

const region = { width: 30, height: 30 };
const regionRect = { x: 0, y: 0, ...region };

const options: RoomPlacementOptions = {
  minRoomSize: 4,
  maxRoomSize: 4,
  roomPadding: 1,
  maxPushSteps: 60,
};

describe("placeRoom", () => {
  it("places fixed-size rooms or rejects them as undersized in an empty region", () => {
    for (let seed = 0; seed < 200; seed++) {
      const result = placeRoom(region, [], new SeededRandom(seed), options);

      result.match(
        (rect) => {
          expect(rect.width).toBe(4);
          expect(rect.height).toBe(4);
          expect(rectContains(regionRect, rect)).toBe(true);
        },
        (failure) => {
          expect(failure.reason).toBe("undersized");
          expect(failure.pushes).toBe(0);
        },
      );
    }
  });

  it("keeps the padding gap to existing rooms", () => {
    const blocker = { x: 10, y: 10, width: 8, height: 8 };

    for (let seed = 0; seed < 200; seed++) {
      const result = placeRoom(region, [blocker], new SeededRandom(seed), options);
      if (result.isErr()) continue;

      const rect = result.value;
      expect(rectsOverlapWithPadding(rect, blocker, 1)).toBe(false);
      expect(rectContains(regionRect, rect)).toBe(true);
    }
  });

  it("rejects every candidate that is cropped below the minimum size", () => {
    for (let seed = 0; seed < 50; seed++) {
      const result = placeRoom({ width: 10, height: 10 }, [], new SeededRandom(seed), {
        minRoomSize: 20,
        maxRoomSize: 20,
        roomPadding: 1,
        maxPushSteps: 20,
      });

      expect(result.isErr()).toBe(true);
      expect(result.error.reason).toBe("undersized");
    }
  });

  it("reports candidates pushed out of the region", () => {
    const full = [{ x: 0, y: 0, width: 10, height: 10 }];

    for (let seed = 0; seed < 50; seed++) {
      const result = placeRoom({ width: 10, height: 10 }, full, new SeededRandom(seed), {
        minRoomSize: 2,
        maxRoomSize: 3,
        roomPadding: 0,
        maxPushSteps: 100,
      });

      expect(result.error.reason).toBe("left-region");
      expect(result.error.pushes).toBeGreaterThan(0);
    }
  });

  it("gives up once the push budget is spent", () => {
    const full = [{ x: 0, y: 0, width: 10, height: 10 }];
    const result = placeRoom({ width: 10, height: 10 }, full, new SeededRandom(7), {
      minRoomSize: 2,
      maxRoomSize: 3,
      roomPadding: 0,
      maxPushSteps: 0,
    });

    expect(result.error.reason).toBe("push-budget");
    expect(result.error.pushes).toBe(0);
  });

  it("is deterministic for a seed", () => {
    const existing = [{ x: 5, y: 5, width: 6, height: 6 }];
    const first = placeRoom(region, existing, new SeededRandom(99), options);
    const second = placeRoom(region, existing, new SeededRandom(99), options);

    expect(first.getOrElse(null)).toEqual(second.getOrElse(null));
  });
});

describe("placeRooms", () => {
  const loopOptions: PlacementLoopOptions = {
    minRoomSize: 4,
    maxRoomSize: 6,
    roomPadding: 1,
    maxPushSteps: 60,
    targetFloorRatio: 0.2,
    minRoomCount: 1,
    maxPlacementFailuresInARow: 100,
  };

  it("fills the region up to the target coverage without passing it", () => {
    for (let seed = 1; seed <= 5; seed++) {
      const grid = new LevelGrid(30, 30);
      const result = placeRooms(grid, new SeededRandom(seed), loopOptions);

      expect(result.isOk()).toBe(true);
      // 180 tiles is 0.2 of 900; stopping early leaves less than one 4x4 room
      expect(grid.roomArea).toBeLessThanOrEqual(180);
      expect(grid.roomArea).toBeGreaterThan(180 - 16);

      const rooms = grid.rooms;
      rooms.forEach((room, index) => {
        expect(room.id).toBe(index);
        expect(room.width).toBeGreaterThanOrEqual(4);
        expect(room.height).toBeGreaterThanOrEqual(4);
        for (const other of rooms.slice(index + 1)) {
          expect(rectsOverlapWithPadding(room, other, 1)).toBe(false);
        }
      });
    }
  });

  it("leaves floor for the estimated corridors", () => {
    const perCorridor = (rooms: readonly unknown[]) => 10 * Math.max(0, rooms.length - 1);

    for (let seed = 1; seed <= 5; seed++) {
      const grid = new LevelGrid(30, 30);
      const result = placeRooms(grid, new SeededRandom(seed), loopOptions, perCorridor);
      const planned = grid.roomArea + perCorridor(grid.rooms);

      expect(result.isOk()).toBe(true);
      expect(planned).toBeLessThanOrEqual(180);
      // a further 4x4 room would have added 16 tiles plus one more corridor
      expect(planned).toBeGreaterThan(180 - 16 - 10);
    }
  });

  it("keeps placing until the minimum room count is met", () => {
    const grid = new LevelGrid(30, 30);
    const result = placeRooms(grid, new SeededRandom(3), {
      ...loopOptions,
      targetFloorRatio: 0.01,
      minRoomCount: 3,
    });

    expect(result.isOk()).toBe(true);
    expect(grid.rooms.length).toBeGreaterThanOrEqual(3);
  });

  it("fails after too many placements in a row", () => {
    const grid = new LevelGrid(10, 10);
    const result = placeRooms(grid, new SeededRandom(1), {
      ...loopOptions,
      minRoomSize: 20,
      maxRoomSize: 20,
      maxPlacementFailuresInARow: 5,
    });

    expect(result.error.code).toBe("PLACEMENT_EXHAUSTED");
    expect(result.error.message).toBe("5 room placements failed in a row");
    expect(result.error.details).toEqual({
      rooms: 0,
      coverage: 0,
      failures: { "push-budget": 0, "left-region": 0, undersized: 5 },
    });
    expect(grid.rooms).toHaveLength(0);
  });
});

describe("fitToBudget", () => {
  const rect = { x: 3, y: 2, width: 6, height: 5 };

  it("keeps a room that already fits", () => {
    expect(fitToBudget(rect, [], 30, 4)).toEqual(rect);
  });

  it("trims the widest axis first", () => {
    expect(fitToBudget(rect, [], 20, 4)).toEqual({ x: 3, y: 2, width: 4, height: 5 });
  });

  it("counts the corridors of the enlarged room set", () => {
    const twoPerRoom = (rooms: readonly unknown[]) => 2 * rooms.length;

    expect(fitToBudget(rect, [], 22, 4, twoPerRoom)).toEqual({ x: 3, y: 2, width: 4, height: 5 });
    expect(fitToBudget(rect, [{ x: 20, y: 20, width: 4, height: 4 }], 22, 4, twoPerRoom)).toEqual({
      x: 3,
      y: 2,
      width: 4,
      height: 4,
    });
  });

  it("gives up below the minimum size", () => {
    expect(fitToBudget(rect, [], 15, 4)).toBeNull();
  });
});
