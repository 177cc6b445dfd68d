import type { Chunk } from "../chunks.js";
import type { IntensityBuffer } from "../intensity-buffer.js";

/** Everything a runner needs for one parallel-filter call. */
export interface ChunkJob {
  /** Read-only for the duration of the call. */
  source: IntensityBuffer;
  /** Shared output; each chunk task writes only its own region. */
  target: IntensityBuffer;
  radius: number;
}

/**
 * A runner session, opened once per parallel-filter call.
 *
 * `run()` resolves when the chunk has been written and rejects if its task
 * faulted. `close()` releases everything the session started; no task or
 * thread outlives it.
 */
export interface ChunkRunner {
  run(chunk: Chunk): Promise<void>;
  close(): Promise<void>;
}

export type ChunkRunnerFactory = (job: ChunkJob) => ChunkRunner;
