/**
 * Geometry operations - pure functions for geometric calculations.
 * All functions are deterministic and side-effect free.
 */

import type { Dimensions, Point, Rect, RectRelation } from "./types";

// =============================================================================
// POINT OPERATIONS
// =============================================================================

/**
 * Manhattan distance between two points
 */
export function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Euclidean distance between two points
 */
export function euclideanDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Squared euclidean distance (no sqrt, exact on integers)
 */
export function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

// =============================================================================
// RECT OPERATIONS
// =============================================================================

/**
 * Center tile of a rect (rounded towards the origin)
 */
export function rectCenter(r: Rect): Point {
  return {
    x: r.x + Math.floor(r.width / 2),
    y: r.y + Math.floor(r.height / 2),
  };
}

export function rectArea(r: Rect): number {
  return r.width * r.height;
}

/**
 * The four corner tiles: top-left, top-right, bottom-left, bottom-right
 */
export function rectCorners(r: Rect): [Point, Point, Point, Point] {
  const right = r.x + r.width - 1;
  const bottom = r.y + r.height - 1;
  return [
    { x: r.x, y: r.y },
    { x: right, y: r.y },
    { x: r.x, y: bottom },
    { x: right, y: bottom },
  ];
}

/**
 * Check if two rects share at least one tile
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return (
    a.x < b.x + b.width &&
    a.x + a.width > b.x &&
    a.y < b.y + b.height &&
    a.y + a.height > b.y
  );
}

/**
 * Check if two rects come closer than `padding` tiles to each other.
 * With padding 1 two rooms always keep one empty tile between them.
 */
export function rectsOverlapWithPadding(
  a: Rect,
  b: Rect,
  padding: number,
): boolean {
  return (
    a.x - padding < b.x + b.width &&
    a.x + a.width + padding > b.x &&
    a.y - padding < b.y + b.height &&
    a.y + a.height + padding > b.y
  );
}

/**
 * Get the intersection of two rects (or null if no overlap)
 */
export function rectIntersection(a: Rect, b: Rect): Rect | null {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const width = Math.min(a.x + a.width, b.x + b.width) - x;
  const height = Math.min(a.y + a.height, b.y + b.height) - y;

  if (width <= 0 || height <= 0) return null;
  return { x, y, width, height };
}

/**
 * Check if outer rect fully contains inner rect
 */
export function rectContains(outer: Rect, inner: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  );
}

export function translateRect(r: Rect, dx: number, dy: number): Rect {
  return { x: r.x + dx, y: r.y + dy, width: r.width, height: r.height };
}

/**
 * Crop a rect to the region `[0, width) x [0, height)`.
 * Returns null when nothing of the rect lies inside.
 */
export function cropRect(r: Rect, region: Dimensions): Rect | null {
  return rectIntersection(r, {
    x: 0,
    y: 0,
    width: region.width,
    height: region.height,
  });
}

/**
 * Classify how two rects sit relative to each other.
 */
export function relateRects(a: Rect, b: Rect): RectRelation {
  const startX = Math.max(a.x, b.x);
  const startY = Math.max(a.y, b.y);
  const endX = Math.min(a.x + a.width, b.x + b.width);
  const endY = Math.min(a.y + a.height, b.y + b.height);
  const overlapX = startX < endX;
  const overlapY = startY < endY;

  if (overlapX && overlapY) {
    return {
      kind: "overlap",
      gap: { x: startX, y: startY, width: endX - startX, height: endY - startY },
    };
  }
  if (overlapX) {
    return {
      kind: "x-overlap",
      gap: { x: startX, y: endY, width: endX - startX, height: startY - endY },
    };
  }
  if (overlapY) {
    return {
      kind: "y-overlap",
      gap: { x: endX, y: startY, width: startX - endX, height: endY - startY },
    };
  }
  return {
    kind: "separate",
    gap: { x: endX, y: endY, width: startX - endX, height: startY - endY },
  };
}

/**
 * Manhattan size of the empty space between two rects, measured from
 * edges or nearest corners. Touching or overlapping rects are 0 apart.
 */
export function nearestCornerDistance(a: Rect, b: Rect): number {
  const { kind, gap } = relateRects(a, b);
  switch (kind) {
    case "overlap":
      return 0;
    case "x-overlap":
      return gap.height;
    case "y-overlap":
      return gap.width;
    case "separate":
      return gap.width + gap.height;
  }
}

/**
 * Euclidean distance between the rect centers
 */
export function centerDistance(a: Rect, b: Rect): number {
  return euclideanDistance(rectCenter(a), rectCenter(b));
}
