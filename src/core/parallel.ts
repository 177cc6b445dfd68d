import { planChunks } from "./chunks.js";
import { DEFAULT_CONFIG, assertRadius } from "./config.js";
import { WorkerFailureError } from "./errors.js";
import { IntensityBuffer } from "./intensity-buffer.js";
import { threadRunner } from "./runners/threads.js";
import type { ChunkRunnerFactory } from "./runners/types.js";
import { assertFilterable, type FilterOptions } from "./sequential.js";

export interface ParallelOptions extends FilterOptions {
  /** Thread cap for the default runner; 0 = one per available core. */
  maxThreads?: number;
  /** How chunk tasks are executed (default: threadRunner({ maxThreads })). */
  runner?: ChunkRunnerFactory;
}

/**
 * Median-filter the image with one task per `chunkSize` × `chunkSize` chunk.
 *
 * Tasks read the shared input and write disjoint regions of a shared output,
 * so nothing is locked; the only synchronization is the fan-out and the join.
 * The promise settles after every task has settled: with the complete output,
 * or with a WorkerFailureError for the lowest-index failed chunk, in which
 * case the partial output is dropped.
 */
export async function filterParallel(
  buffer: IntensityBuffer,
  chunkSize: number,
  {
    radius = DEFAULT_CONFIG.radius,
    maxThreads = DEFAULT_CONFIG.maxThreads,
    runner = threadRunner({ maxThreads }),
  }: ParallelOptions = {}
): Promise<IntensityBuffer> {
  assertFilterable(buffer);
  assertRadius(radius);
  const chunks = planChunks(buffer.width, buffer.height, chunkSize);

  const output = IntensityBuffer.allocate(buffer.width, buffer.height, { shared: true });
  const session = runner({ source: buffer, target: output, radius });

  let outcomes: PromiseSettledResult<void>[];
  try {
    outcomes = await Promise.allSettled(chunks.map(async (chunk) => session.run(chunk)));
  } finally {
    await session.close();
  }

  outcomes.forEach((outcome, i) => {
    if (outcome.status === "rejected") throw new WorkerFailureError(chunks[i], outcome.reason);
  });
  return output;
}
