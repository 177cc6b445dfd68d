/**
 * Scaling check: on a large synthetic noisy image, the parallel engine should
 * beat the sequential one once the chunk count approaches the core count.
 *
 * Timing is noisy, so nothing hinges on a single sample: each configuration
 * is run TRIALS times and the median speedup is compared against 1.
 * Not part of `npm test`; it needs the compiled worker entry.
 *
 * Usage:
 *   npm run check:scaling
 *   SCALING_SIZE=2048 SCALING_TRIALS=9 npm run check:scaling
 */

import { availableParallelism } from "node:os";
import {
  BenchmarkHarness,
  IntensityBuffer,
  chunkCount,
  formatPerformanceTable,
  resolveConfig,
  summarizeRecords,
} from "../src/index.js";

const SIZE = Number(process.env.SCALING_SIZE ?? "1024");
const TRIALS = Number(process.env.SCALING_TRIALS ?? "5");

function fail(msg: string): never {
  console.error(`FAIL: ${msg}`);
  process.exit(1);
}

/** Mid-grey with ~10% salt-and-pepper pixels from a seeded LCG. */
function makeNoisyImage(size: number, seed: number): IntensityBuffer {
  const image = IntensityBuffer.allocate(size, size, { shared: true });
  let state = seed;
  const next = () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
  for (let i = 0; i < image.data.length; i++) {
    const r = next();
    image.data[i] = r < 0.05 ? 0 : r < 0.1 ? 255 : 96 + Math.floor(next() * 64);
  }
  return image;
}

// ── Run ───────────────────────────────────────────────────────────────────────

const cores = availableParallelism();
if (cores < 2) {
  console.error(`SKIP: only ${cores} core available, nothing to scale across`);
  process.exit(0);
}

const perSide = Math.ceil(Math.sqrt(cores));
const chunkSize = Math.ceil(SIZE / perSide);
const config = resolveConfig({ chunkSize });
const harness = new BenchmarkHarness(config);

console.error(
  `${SIZE}×${SIZE} image, ${chunkCount(SIZE, SIZE, chunkSize)} chunk(s) of ${chunkSize}px, ` +
    `${cores} core(s), ${TRIALS} trial(s)…`
);

for (let t = 0; t < TRIALS; t++) {
  await harness.benchmark(`trial-${t + 1}`, makeNoisyImage(SIZE, t + 1));
}

console.error(formatPerformanceTable(harness.records));
const { medianSpeedup } = summarizeRecords(harness.records);
console.error(`median speedup ${medianSpeedup.toFixed(2)}×`);
if (medianSpeedup <= 1) fail("parallel engine was not faster than sequential");
console.error("PASS");
