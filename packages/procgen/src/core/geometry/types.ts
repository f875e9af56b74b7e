/**
 * Core geometry types for level generation.
 * All types are immutable value objects in region-local tile coordinates.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Rectangle defined by its top-left tile and size
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * How two rectangles sit relative to each other.
 * - "overlap": they share tiles
 * - "x-overlap": their column ranges overlap, rows do not (stacked vertically)
 * - "y-overlap": their row ranges overlap, columns do not (side by side)
 * - "separate": neither range overlaps (diagonal to each other)
 */
export type RectRelationKind = "overlap" | "x-overlap" | "y-overlap" | "separate";

/**
 * Relation between two rectangles plus the rectangle between them.
 *
 * For "overlap" `gap` is the shared area. Otherwise it is the empty space
 * between the facing edges (or, for "separate", between the nearest
 * corners); a zero-sized side means the rectangles touch on that axis.
 */
export interface RectRelation {
  readonly kind: RectRelationKind;
  readonly gap: Rect;
}

/**
 * Room push directions: the four cardinals then the four diagonals
 */
export const DIRECTIONS_8 = [
  { x: 0, y: -1 }, // N
  { x: 0, y: 1 }, // S
  { x: 1, y: 0 }, // E
  { x: -1, y: 0 }, // W
  { x: -1, y: -1 }, // NW
  { x: 1, y: -1 }, // NE
  { x: -1, y: 1 }, // SW
  { x: 1, y: 1 }, // SE
] as const;

export type Direction8 = (typeof DIRECTIONS_8)[number];
