/**
 * Rooms-and-Corridors Generator
 */

export * from "./constants";
export {
  type AttemptState,
  createLevelGenerator,
  type GeneratedLevel,
  LevelGenerator,
  type LevelGeneratorOptions,
} from "./generator";
export * as RoomsAndCorridorsPasses from "./passes";
