import { LevelConfigSchema, LevelError, resolveLevelConfig } from "@delve/contracts";
import { describe, expect, it } from "vitest";
import { placeRoomsPass } from "../src/generators/rooms-and-corridors/passes";
import { createRNGStreams, runPass } from "../src/pipeline/runner";
import { createTraceCollector, DefaultTraceCollector, NoOpTraceCollector } from "../src/pipeline/trace";
import { createEmptyArtifact, type PassContext } from "../src/pipeline/types";
import { createSeed } from "../src/seed";

function context(trace = new DefaultTraceCollector(true)): PassContext {
  const seed = createSeed(5);
  return {
    streams: createRNGStreams(seed),
    config: resolveLevelConfig(
      LevelConfigSchema.parse({
        regionWidth: 20,
        regionHeight: 20,
        targetFloorRatio: 0.1,
        seed: 5,
      }),
    ),
    trace,
    seed,
    attempt: 0,
  };
}

describe("runPass", () => {
  it("wraps the pass in start and end events", () => {
    const ctx = context();
    const result = runPass(placeRoomsPass(), createEmptyArtifact(), ctx);

    expect(result.isOk()).toBe(true);
    expect(ctx.trace.getEvents()).toMatchObject([
      { eventType: "start", passId: "level.place-rooms" },
      { eventType: "end", passId: "level.place-rooms" },
    ]);
  });

  it("hands back the level state", () => {
    const result = runPass(placeRoomsPass(), createEmptyArtifact(), context());
    const artifact = result.value;

    expect(artifact.type).toBe("level-state");
    expect(artifact.rooms.length).toBeGreaterThan(0);
    expect(artifact.instructions).toEqual([]);
  });
});

describe("createRNGStreams", () => {
  it("gives each stage its own sequence", () => {
    const streams = createRNGStreams(createSeed(5));
    const again = createRNGStreams(createSeed(5));

    expect(streams.placement.next()).toBe(again.placement.next());
    expect(streams.carving.next()).toBe(again.carving.next());
    expect(streams.placement.next()).not.toBe(streams.carving.next());
  });
});

describe("trace collectors", () => {
  it("records events when enabled", () => {
    const trace = createTraceCollector(true);
    trace.warning("test.pass", "careful");

    expect(trace.enabled).toBe(true);
    expect(trace.getEvents()).toHaveLength(1);
    expect(trace.getEvents()[0]).toMatchObject({
      passId: "test.pass",
      eventType: "warning",
      message: "careful",
    });
  });

  it("records attempt transitions and failures with their error code", () => {
    const trace = new DefaultTraceCollector(true);
    trace.transition(2, "carving", "failed");
    trace.attemptFailed(2, "carving", LevelError.carvingBlocked("route blocked"));

    expect(trace.getEvents()).toMatchObject([
      { eventType: "transition", attempt: 2, from: "carving", to: "failed" },
      {
        eventType: "attempt-failed",
        attempt: 2,
        failedIn: "carving",
        code: "CARVING_BLOCKED",
        message: "route blocked",
      },
    ]);
  });

  it("drops events when disabled", () => {
    const trace = createTraceCollector(false);
    trace.start("test.pass");

    expect(trace).toBeInstanceOf(NoOpTraceCollector);
    expect(trace.getEvents()).toEqual([]);
    expect(new DefaultTraceCollector(false).getEvents()).toEqual([]);
  });
});
