import { describe, expect, it, vi } from "vitest";
import { LevelGrid } from "../src/level/level-grid";
import { printLevel, renderAscii, UNICODE_CHARSET } from "../src/utils";

function corridorLevel(): LevelGrid {
  const grid = new LevelGrid(9, 3);
  grid.commitRoom({ x: 0, y: 0, width: 3, height: 3 });
  grid.commitRoom({ x: 6, y: 0, width: 3, height: 3 });
  for (const x of [3, 4, 5]) {
    grid.carveCorridorTile(x, 1);
  }
  grid.outlineWalls();
  return grid;
}

describe("renderAscii", () => {
  it("draws a walled room", () => {
    const grid = new LevelGrid(5, 4);
    grid.commitRoom({ x: 1, y: 1, width: 3, height: 2 });
    grid.outlineWalls();

    expect(renderAscii(grid)).toBe("#####\n#...#\n#...#\n#####");
  });

  it("draws corridors apart from room floor", () => {
    expect(renderAscii(corridorLevel())).toBe("...###...\n...,,,...\n...###...");
  });

  it("prints room ids on their centers", () => {
    expect(renderAscii(corridorLevel(), { showRoomIds: true }).split("\n")[1]).toBe(".0.,,,.1.");
  });

  it("prefixes rows with coordinates", () => {
    expect(renderAscii(corridorLevel(), { showCoordinates: true }).split("\n")).toEqual([
      "  0 ...###...",
      "  1 ...,,,...",
      "  2 ...###...",
    ]);
  });

  it("renders void as blank space", () => {
    const grid = new LevelGrid(4, 1);
    expect(renderAscii(grid)).toBe("    ");
  });

  it("accepts another charset", () => {
    expect(renderAscii(corridorLevel(), { charset: UNICODE_CHARSET }).split("\n")[0]).toBe(
      "···███···",
    );
  });
});

describe("printLevel", () => {
  it("writes the rendering to the console", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    printLevel(corridorLevel());

    expect(log).toHaveBeenCalledWith("...###...\n...,,,...\n...###...");
    log.mockRestore();
  });
});
