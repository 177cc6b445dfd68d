export { IntensityBuffer, type AllocateOptions } from "./core/intensity-buffer.js";
export { sampleNeighborhood } from "./core/neighborhood.js";
export { selectMedian, filterRegion, type Region } from "./core/median.js";
export { filterSequential, assertFilterable, type FilterOptions } from "./core/sequential.js";
export { planChunks, chunkCount, type Chunk } from "./core/chunks.js";
export { filterParallel, type ParallelOptions } from "./core/parallel.js";
export { inlineRunner } from "./core/runners/inline.js";
export { threadRunner, DEFAULT_WORKER_URL, type ThreadRunnerOptions } from "./core/runners/threads.js";
export type { ChunkJob, ChunkRunner, ChunkRunnerFactory } from "./core/runners/types.js";
export {
  BenchmarkHarness,
  type BenchmarkHarnessOptions,
  type BenchmarkRun,
  type PerformanceRecord,
} from "./core/benchmark.js";
export {
  formatPerformanceTable,
  formatSummary,
  speedup,
  summarizeRecords,
  type BenchmarkSummary,
} from "./core/report.js";
export {
  DEFAULT_CONFIG,
  configFromEnv,
  resolveConfig,
  type FilterConfig,
} from "./core/config.js";
export {
  FilterError,
  InvalidDimensionsError,
  InvalidChunkSizeError,
  InvalidRadiusError,
  ConfigError,
  WorkerFailureError,
  type FilterErrorCode,
} from "./core/errors.js";
export { toGrayscale, type PixelLayout } from "./core/grayscale.js";
