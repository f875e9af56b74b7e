/**
 * Pass Library
 *
 * The building blocks behind the generator passes, usable on their own.
 *
 * @example
 * ```typescript
 * import { passes, DisjointSet } from "@delve/procgen";
 *
 * const set = new DisjointSet(rooms.map((room) => room.id));
 * const instructions = passes.connectivity.connect(rooms, set, {
 *   distanceMetric: "nearest-corner",
 *   minConnectionDistance: 0,
 *   extraConnections: 0,
 * });
 * ```
 */

export * as carving from "./carving";
export * as connectivity from "./connectivity";
export * as placement from "./placement";
export * as validation from "./validation";
