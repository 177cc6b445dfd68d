/**
 * Console reporting for benchmark records.
 */

import type { PerformanceRecord } from "./benchmark.js";
import { selectMedian } from "./median.js";

export interface BenchmarkSummary {
  images: number;
  /** Mean durations, milliseconds. */
  meanSequential: number;
  meanParallel: number;
  /** Median of the per-image sequential / parallel ratios. */
  medianSpeedup: number;
}

/**
 * Tab-separated execution-time table, durations in seconds:
 *
 *   Image\tSequential Time (s)\tParallel Time (s)
 *   --------------------------------------------------
 *   kodim01\t0.412345\t\t0.101234
 */
export function formatPerformanceTable(records: readonly PerformanceRecord[]): string {
  const lines = [
    "Image\tSequential Time (s)\tParallel Time (s)",
    "-".repeat(50),
    ...records.map(
      (r) =>
        `${r.imageId}\t${seconds(r.sequentialDuration)}\t\t${seconds(r.parallelDuration)}`
    ),
  ];
  return lines.join("\n");
}

/** Sequential over parallel duration; > 1 means the parallel run was faster. */
export function speedup(record: PerformanceRecord): number {
  const { sequentialDuration: seq, parallelDuration: par } = record;
  if (par === 0) return seq === 0 ? 1 : Infinity;
  return seq / par;
}

export function summarizeRecords(records: readonly PerformanceRecord[]): BenchmarkSummary {
  if (records.length === 0) {
    throw new RangeError("summarizeRecords() needs at least one record");
  }
  const total = (pick: (r: PerformanceRecord) => number) =>
    records.reduce((sum, r) => sum + pick(r), 0);

  return {
    images: records.length,
    meanSequential: total((r) => r.sequentialDuration) / records.length,
    meanParallel: total((r) => r.parallelDuration) / records.length,
    medianSpeedup: selectMedian(records.map(speedup)),
  };
}

export function formatSummary(summary: BenchmarkSummary): string {
  return (
    `${summary.images} image(s): mean sequential ${seconds(summary.meanSequential)} s, ` +
    `mean parallel ${seconds(summary.meanParallel)} s, ` +
    `median speedup ${summary.medianSpeedup.toFixed(2)}×`
  );
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(6);
}
