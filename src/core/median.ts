/**
 * Median selection and the per-region kernel shared by the sequential sweep
 * and every chunk worker.
 */

import type { IntensityBuffer } from "./intensity-buffer.js";
import { sampleNeighborhood } from "./neighborhood.js";

/** Half-open rectangle [x0, x1) × [y0, y1). */
export interface Region {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Middle-ranked value of a non-empty sample set: the element at index
 * ⌊n/2⌋ after an ascending sort. Even-length sets (image borders only)
 * give the upper-middle element; there is no interpolation.
 *
 * The input array is left untouched.
 */
export function selectMedian(samples: readonly number[]): number {
  if (samples.length === 0) {
    throw new RangeError("selectMedian() needs at least one sample");
  }
  const sorted = [...samples].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * Median-filter every coordinate of `region`, reading only `source` and
 * writing only the same coordinates of `target`.
 */
export function filterRegion(
  source: IntensityBuffer,
  target: IntensityBuffer,
  region: Region,
  radius: number
): void {
  for (let y = region.y0; y < region.y1; y++) {
    for (let x = region.x0; x < region.x1; x++) {
      target.set(x, y, selectMedian(sampleNeighborhood(source, x, y, radius)));
    }
  }
}
