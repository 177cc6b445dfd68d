/**
 * Tests for report.ts: the execution-time table and summary.
 */

import { describe, it, expect } from "vitest";
import type { PerformanceRecord } from "../src/core/benchmark.js";
import {
  formatPerformanceTable,
  formatSummary,
  speedup,
  summarizeRecords,
} from "../src/core/report.js";

const RECORDS: PerformanceRecord[] = [
  { imageId: "kodim01", sequentialDuration: 1500, parallelDuration: 500 },
  { imageId: "kodim02", sequentialDuration: 250, parallelDuration: 1000 },
];

describe("formatPerformanceTable", () => {
  it("prints a header, a rule, and one row per record in seconds", () => {
    expect(formatPerformanceTable(RECORDS).split("\n")).toEqual([
      "Image\tSequential Time (s)\tParallel Time (s)",
      "--------------------------------------------------",
      "kodim01\t1.500000\t\t0.500000",
      "kodim02\t0.250000\t\t1.000000",
    ]);
  });

  it("prints only the header and rule with no records", () => {
    expect(formatPerformanceTable([]).split("\n")).toHaveLength(2);
  });
});

describe("speedup", () => {
  it("is sequential over parallel", () => {
    expect(speedup(RECORDS[0])).toBe(3);
    expect(speedup(RECORDS[1])).toBe(0.25);
  });

  it("handles a zero parallel duration", () => {
    expect(speedup({ imageId: "x", sequentialDuration: 0, parallelDuration: 0 })).toBe(1);
    expect(speedup({ imageId: "x", sequentialDuration: 5, parallelDuration: 0 })).toBe(Infinity);
  });
});

describe("summarizeRecords", () => {
  it("averages durations and takes the upper-middle speedup", () => {
    expect(summarizeRecords(RECORDS)).toEqual({
      images: 2,
      meanSequential: 875,
      meanParallel: 750,
      medianSpeedup: 3,
    });
  });

  it("throws RangeError with no records", () => {
    expect(() => summarizeRecords([])).toThrow(RangeError);
  });

  it("formats as one line", () => {
    expect(formatSummary(summarizeRecords(RECORDS))).toBe(
      "2 image(s): mean sequential 0.875000 s, mean parallel 0.750000 s, median speedup 3.00×"
    );
  });
});
