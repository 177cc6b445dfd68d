import { filterRegion } from "../median.js";
import type { ChunkRunnerFactory } from "./types.js";

/**
 * Runs each chunk task on the calling thread.
 *
 * Tasks still start, settle and join exactly like thread-backed ones, which
 * makes this the runner for tests and for hosts without worker threads.
 */
export const inlineRunner: ChunkRunnerFactory = ({ source, target, radius }) => ({
  async run(chunk) {
    // Yield between chunks so the event loop is not starved on big images.
    await new Promise<void>((r) => setImmediate(r));
    filterRegion(source, target, chunk, radius);
  },
  async close() {},
});
