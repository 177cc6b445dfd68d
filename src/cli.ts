#!/usr/bin/env node
/**
 * Node.js CLI: median-filters every image of a dataset directory with both
 * engines and prints how long each took.
 *
 * For each image: decode → grayscale → save the grayscale input → sequential
 * and parallel filter (timed) → save both outputs. Status messages go to
 * stderr; the execution-time table goes to stdout.
 *
 * Usage:
 *   npm run bench -- path/to/dataset
 *   MEDIAN_CHUNK_SIZE=64 MEDIAN_THREADS=4 median-bench dataset
 *
 * Environment variables:
 *   MEDIAN_DATASET     dataset directory when no argument is given (default: dataset)
 *   MEDIAN_NOISY_DIR   where grayscale inputs are written (default: dataset-w-noise)
 *   MEDIAN_OUTPUT_DIR  where filtered outputs are written (default: dataset-output)
 *   MEDIAN_RADIUS      neighborhood radius (default: 1)
 *   MEDIAN_CHUNK_SIZE  parallel chunk edge in pixels (default: 45)
 *   MEDIAN_THREADS     worker threads, 0 = one per core (default: 0)
 */

import { mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { BenchmarkHarness } from "./core/benchmark.js";
import { configFromEnv, type FilterConfig } from "./core/config.js";
import { FilterError } from "./core/errors.js";
import { IMAGE_EXTENSIONS, decodeImage, encodePng } from "./core/image-io.js";
import { formatPerformanceTable, formatSummary, summarizeRecords } from "./core/report.js";

// ── Helpers ───────────────────────────────────────────────────────────────────

function fail(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function loadConfig(): FilterConfig {
  try {
    return configFromEnv(process.env);
  } catch (err) {
    if (err instanceof FilterError) fail(`Invalid configuration: ${err.message}`);
    throw err;
  }
}

function listImages(dir: string): string[] {
  try {
    return readdirSync(dir)
      .filter((f) => IMAGE_EXTENSIONS.has(extname(f).slice(1).toLowerCase()))
      .sort();
  } catch (err) {
    fail(`Cannot read dataset directory ${dir}: ${messageOf(err)}`);
  }
}

// ── Main ──────────────────────────────────────────────────────────────────────

const datasetDir = process.argv[2] ?? process.env.MEDIAN_DATASET ?? "dataset";
const noisyDir = process.env.MEDIAN_NOISY_DIR ?? "dataset-w-noise";
const outputDir = process.env.MEDIAN_OUTPUT_DIR ?? "dataset-output";
const config = loadConfig();

const files = listImages(datasetDir);
if (files.length === 0) {
  fail(`No images in ${datasetDir} (supported: ${[...IMAGE_EXTENSIONS].join(", ")})`);
}

mkdirSync(noisyDir, { recursive: true });
mkdirSync(outputDir, { recursive: true });

console.error(
  `Running median filter (radius ${config.radius}, chunk ${config.chunkSize}px) ` +
    `on ${files.length} image(s), please wait…`
);

const harness = new BenchmarkHarness(config);
for (const file of files) {
  const imageId = basename(file, extname(file));
  const pngName = `${imageId}.png`;
  try {
    const gray = decodeImage(readFileSync(join(datasetDir, file)));
    writeFileSync(join(noisyDir, pngName), encodePng(gray));

    const { record, sequential, parallel } = await harness.benchmark(imageId, gray);
    writeFileSync(join(outputDir, `sequential-${pngName}`), encodePng(sequential));
    writeFileSync(join(outputDir, `parallel-${pngName}`), encodePng(parallel));

    console.error(
      `  ${imageId} (${gray.width}×${gray.height}): ` +
        `sequential ${record.sequentialDuration.toFixed(1)} ms, ` +
        `parallel ${record.parallelDuration.toFixed(1)} ms`
    );
  } catch (err) {
    // One bad image does not sink the batch.
    console.error(`  ${imageId}: skipped: ${messageOf(err)}`);
  }
}

if (harness.records.length === 0) fail("No image could be processed");

console.log(formatPerformanceTable(harness.records));
console.log("");
console.log(formatSummary(summarizeRecords(harness.records)));
