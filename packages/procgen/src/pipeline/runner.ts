/**
 * Pass execution with isolated RNG streams and trace bookkeeping.
 */

import { type LevelError, type LevelSeed, type Result, SeededRandom } from "@delve/contracts";
import type { Artifact, Pass, PassContext, RNGStreamName, RNGStreams } from "./types";

/**
 * Create RNG streams from seed - ensures each stage has isolated randomness
 */
export function createRNGStreams(seed: LevelSeed): RNGStreams {
  return {
    placement: new SeededRandom(seed.placement),
    carving: new SeededRandom(seed.carving),
  };
}

/**
 * Run one pass, wrapping it in trace start/end events.
 *
 * The pass sees the context through `PassContext<TStreams>`, so it can only
 * name the streams it declared in `requiredStreams`. Any context carrying
 * at least those streams can be passed.
 */
export function runPass<
  TIn extends Artifact,
  TOut extends Artifact,
  TStreams extends RNGStreamName,
>(
  pass: Pass<TIn, TOut, TStreams>,
  input: TIn,
  ctx: PassContext<NoInfer<TStreams>>,
): Result<TOut, LevelError> {
  if (input.type !== pass.inputType) {
    throw new Error(
      `Pass ${pass.id} expects a "${pass.inputType}" artifact, got "${input.type}"`,
    );
  }

  for (const stream of pass.requiredStreams) {
    if (!(stream in ctx.streams)) {
      throw new Error(`Pass ${pass.id} requires the "${stream}" stream`);
    }
  }

  ctx.trace.start(pass.id);
  const startTime = performance.now();
  const result = pass.run(input, ctx);
  ctx.trace.end(pass.id, performance.now() - startTime);

  return result.map((output) => {
    if (output.type !== pass.outputType) {
      throw new Error(
        `Pass ${pass.id} declared a "${pass.outputType}" artifact, produced "${output.type}"`,
      );
    }
    return output;
  });
}
