import type { LevelConfigInput } from "@delve/contracts";
import { describe, expect, it } from "vitest";
import { generateLevel } from "../../src/api";
import { assertDeterministic, DeterminismViolationError, testDeterminism } from "../../src/testing";

const config = (seed: number): LevelConfigInput => ({
  regionWidth: 32,
  regionHeight: 24,
  targetFloorRatio: 0.25,
  seed,
});

describe("determinism", () => {
  it("produces identical levels for identical requests", () => {
    for (let seed = 100; seed < 120; seed++) {
      const first = generateLevel(config(seed));
      const second = generateLevel(config(seed));

      expect(second.success).toBe(first.success);
      if (first.success && second.success) {
        expect(second.level.checksum).toBe(first.level.checksum);
        expect(second.level.corridors).toEqual(first.level.corridors);
        expect(second.attempts).toBe(first.attempts);
      }
    }
  });

  it("passes the determinism helpers", () => {
    expect(() => assertDeterministic(config(4242))).not.toThrow();

    const report = testDeterminism(config(4242), 2);
    expect(report.deterministic).toBe(true);
    expect(report.uniqueChecksums).toHaveLength(1);
    expect(report.checksums).toHaveLength(2);
  });

  it("explains a violation", () => {
    const error = new DeterminismViolationError(["v1:a", "v1:b"], config(1));
    expect(error.message).toBe(
      "Non-deterministic generation detected: produced 2 different checksums for the same seed",
    );
    expect(error.name).toBe("DeterminismViolationError");
  });
});
