/**
 * Times the sequential and the parallel engine on the same image and keeps an
 * ordered list of PerformanceRecords for the reporting side.
 *
 * The two engines never run at the same time, also across concurrent
 * benchmark() calls: runs are queued and executed one after another, in call
 * order, so records come out in input order.
 */

import type { FilterConfig } from "./config.js";
import type { IntensityBuffer } from "./intensity-buffer.js";
import { filterParallel } from "./parallel.js";
import { threadRunner } from "./runners/threads.js";
import type { ChunkRunnerFactory } from "./runners/types.js";
import { filterSequential } from "./sequential.js";

export interface PerformanceRecord {
  readonly imageId: string;
  /** Milliseconds, as reported by the harness clock. */
  readonly sequentialDuration: number;
  readonly parallelDuration: number;
}

export interface BenchmarkRun {
  record: PerformanceRecord;
  sequential: IntensityBuffer;
  parallel: IntensityBuffer;
}

export interface BenchmarkHarnessOptions {
  /** Chunk executor for the parallel run (default: threadRunner sized by config.maxThreads). */
  runner?: ChunkRunnerFactory;
  /** Monotonic clock in milliseconds (default performance.now). */
  now?: () => number;
}

export class BenchmarkHarness {
  private readonly config: FilterConfig;
  private readonly runner: ChunkRunnerFactory;
  private readonly now: () => number;
  private readonly entries: PerformanceRecord[] = [];
  /** Tail of the run queue; each benchmark() chains onto it. */
  private tail: Promise<unknown> = Promise.resolve();

  constructor(config: FilterConfig, options: BenchmarkHarnessOptions = {}) {
    this.config = config;
    this.runner = options.runner ?? threadRunner({ maxThreads: config.maxThreads });
    this.now = options.now ?? (() => performance.now());
  }

  /** Records so far, oldest first. */
  get records(): readonly PerformanceRecord[] {
    return this.entries;
  }

  /**
   * Run both engines on `buffer` and append one record.
   * If either engine fails, nothing is appended and the error propagates.
   */
  benchmark(imageId: string, buffer: IntensityBuffer): Promise<BenchmarkRun> {
    const run = this.tail.then(
      () => this.measure(imageId, buffer),
      () => this.measure(imageId, buffer)
    );
    this.tail = run;
    return run;
  }

  private async measure(imageId: string, buffer: IntensityBuffer): Promise<BenchmarkRun> {
    const { radius, chunkSize } = this.config;

    const seqStart = this.now();
    const sequential = filterSequential(buffer, { radius });
    const sequentialDuration = this.now() - seqStart;

    const parStart = this.now();
    const parallel = await filterParallel(buffer, chunkSize, { radius, runner: this.runner });
    const parallelDuration = this.now() - parStart;

    const record: PerformanceRecord = Object.freeze({
      imageId,
      sequentialDuration,
      parallelDuration,
    });
    this.entries.push(record);
    return { record, sequential, parallel };
  }
}
