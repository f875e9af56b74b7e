/**
 * Grid module - tile buffer and flood fill.
 */

export * from "./flood-fill";
export { TileGrid } from "./tile-grid";
export * from "./types";
