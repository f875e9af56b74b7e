import { z } from "zod";
import { CORRIDOR_POLICIES, DISTANCE_METRICS } from "../types/level";
import { SeedValueSchema } from "./seed";

/** Largest region edge; packed tile coordinates use 16 bits per axis. */
export const MAX_REGION_DIMENSION = 4096;

const Dimension = z
  .number()
  .int({ error: "Region dimensions must be integers" })
  .min(1, { error: "Region dimensions must be positive" })
  .max(MAX_REGION_DIMENSION);

const RoomSize = z
  .number()
  .int({ error: "Room sizes must be integers" })
  .min(1, { error: "Room sizes must be at least 1" });

const Count = z.number().int().min(0);

/**
 * Level generation request.
 *
 * A minimum room size larger than the region is accepted: every placement
 * then fails and the run ends in GENERATION_EXHAUSTED.
 */
export const LevelConfigSchema = z
  .object({
    regionWidth: Dimension,
    regionHeight: Dimension,
    targetFloorRatio: z
      .number()
      .gt(0, { error: "targetFloorRatio must be greater than 0" })
      .max(1, { error: "targetFloorRatio cannot exceed 1" }),
    minRoomSize: RoomSize.default(4),
    maxRoomSize: RoomSize.default(8),
    minRoomCount: Count.default(1),
    minConnectionDistance: z.number().min(0).default(0),
    extraConnections: Count.default(0),
    distanceMetric: z.enum(DISTANCE_METRICS).default("nearest-corner"),
    roomPadding: Count.default(1),
    maxPushSteps: z.number().int().min(1).optional(),
    maxPlacementFailuresInARow: z.number().int().min(1).default(100),
    maxWholeLevelRetries: Count.default(10),
    corridorPolicy: z.enum(CORRIDOR_POLICIES).default("permissive"),
    maxCarveRetries: Count.default(4),
    floorRatioTolerance: z.number().min(0).lt(1).default(0.01),
    seed: SeedValueSchema,
    trace: z.boolean().default(false),
  })
  .superRefine((data, ctx) => {
    if (data.minRoomSize > data.maxRoomSize) {
      ctx.addIssue({
        code: "custom",
        message: "minRoomSize cannot be greater than maxRoomSize",
        path: ["minRoomSize"],
      });
    }
  });

/** Configuration as callers write it (defaults optional). */
export type LevelConfigInput = z.input<typeof LevelConfigSchema>;

/** Configuration after parsing, with every default applied. */
export type ParsedLevelConfig = z.output<typeof LevelConfigSchema>;

/** Parsed configuration with the derived defaults resolved too. */
export interface LevelConfig extends ParsedLevelConfig {
  readonly maxPushSteps: number;
}

/**
 * Fill in the defaults that depend on other fields.
 */
export function resolveLevelConfig(parsed: ParsedLevelConfig): LevelConfig {
  return {
    ...parsed,
    maxPushSteps: parsed.maxPushSteps ?? parsed.regionWidth + parsed.regionHeight,
  };
}
