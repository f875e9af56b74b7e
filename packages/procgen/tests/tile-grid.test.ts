import { afterEach, describe, expect, it, vi } from "vitest";
import { Tile, TileGrid } from "../src/core/grid";

describe("TileGrid", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts filled with void", () => {
    const grid = new TileGrid(3, 2);
    expect(grid.countTiles(Tile.VOID)).toBe(6);
    expect(grid.countWalkable()).toBe(0);
  });

  it("rejects empty dimensions", () => {
    expect(() => new TileGrid(0, 5)).toThrow("Invalid grid dimensions: 0x5");
  });

  it("reads void outside the grid", () => {
    const grid = new TileGrid(3, 3, Tile.FLOOR);
    expect(grid.get(-1, 0)).toBe(Tile.VOID);
    expect(grid.get(3, 0)).toBe(Tile.VOID);
    expect(grid.isWalkable(1, 1)).toBe(true);
  });

  it("drops out-of-bounds writes with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const grid = new TileGrid(3, 3);

    grid.set(5, 1, Tile.FLOOR);

    expect(grid.countTiles(Tile.VOID)).toBe(9);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("clips fillRect to the grid", () => {
    const grid = new TileGrid(4, 4);
    grid.fillRect(-1, -1, 3, 3, Tile.FLOOR);

    expect(grid.countTiles(Tile.FLOOR)).toBe(4);
    expect(grid.get(1, 1)).toBe(Tile.FLOOR);
    expect(grid.get(2, 2)).toBe(Tile.VOID);
  });

  it("counts floor and corridor tiles as walkable", () => {
    const grid = new TileGrid(4, 1);
    grid.set(0, 0, Tile.FLOOR);
    grid.set(1, 0, Tile.CORRIDOR_FLOOR);
    grid.set(2, 0, Tile.WALL);

    expect(grid.countWalkable()).toBe(2);
    expect(grid.isWalkable(2, 0)).toBe(false);
  });

  it("compares tiles with equals", () => {
    const grid = new TileGrid(3, 3);
    grid.set(1, 1, Tile.FLOOR);
    const copy = grid.clone();

    expect(copy.equals(grid)).toBe(true);
    copy.set(0, 0, Tile.WALL);
    expect(copy.equals(grid)).toBe(false);
    expect(grid.equals(new TileGrid(3, 4))).toBe(false);
  });

  it("hands out copies of its raw data", () => {
    const grid = new TileGrid(2, 2);
    const raw = grid.getRawDataCopy();
    raw[0] = Tile.FLOOR;
    expect(grid.get(0, 0)).toBe(Tile.VOID);
  });

  it("throws on every write after sealing", () => {
    const grid = new TileGrid(3, 3);
    grid.seal();

    expect(grid.isSealed).toBe(true);
    expect(() => grid.set(0, 0, Tile.FLOOR)).toThrow(
      "TileGrid is sealed; finished levels are read-only",
    );
    expect(() => grid.fillRect(0, 0, 2, 2, Tile.FLOOR)).toThrow(
      "TileGrid is sealed; finished levels are read-only",
    );
    expect(grid.countTiles(Tile.VOID)).toBe(9);
  });
});
