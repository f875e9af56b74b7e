/**
 * Rooms-and-Corridors Generator Constants
 */

/** Pass identifiers, one per non-terminal state */
export const PASS_IDS = {
  placeRooms: "level.place-rooms",
  connectRooms: "level.connect-rooms",
  carveCorridors: "level.carve-corridors",
  validate: "level.validate",
} as const;
