/**
 * Shared level-generation vocabulary used by both the schemas and the
 * generator.
 */

/**
 * How the connector measures the distance between two rooms.
 * - "nearest-corner": Manhattan size of the gap between the rooms' facing
 *   edges or corners (0 when they touch)
 * - "center": Euclidean distance between the room centers
 */
export const DISTANCE_METRICS = ["nearest-corner", "center"] as const;
export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

/**
 * What the corridor carver does when every route it tried crosses a third
 * room.
 * - "permissive": carve the first route anyway
 * - "strict": fail the attempt with CARVING_BLOCKED
 */
export const CORRIDOR_POLICIES = ["permissive", "strict"] as const;
export type CorridorPolicy = (typeof CORRIDOR_POLICIES)[number];

/**
 * Seed for one generation run. Each stage draws from its own sub-seed so
 * extra draws in one stage never shift the others.
 */
export interface LevelSeed {
  readonly primary: number;
  readonly placement: number;
  readonly carving: number;
  readonly version: string;
}
