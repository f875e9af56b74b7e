import { z } from "zod";
import type { LevelSeed } from "../types/level";

const UINT32_MAX = 0xffffffff;

export const SeedValueSchema = z
  .number()
  .int({ error: "Seed values must be integers" })
  .min(0, { error: "Seed values must be non-negative integers" })
  .max(UINT32_MAX, { error: "Seed values must fit in uint32" });

export const LevelSeedSchema = z.object({
  primary: SeedValueSchema,
  placement: SeedValueSchema,
  carving: SeedValueSchema,
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, { error: "Invalid version format" }),
});

/**
 * Build a LevelSeed, throwing a ZodError when any part is out of range.
 */
export function createValidatedSeed(parts: LevelSeed): LevelSeed {
  return LevelSeedSchema.parse(parts);
}
