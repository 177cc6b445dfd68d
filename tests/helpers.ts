/**
 * Shared fixtures for the filter tests.
 */

import { IntensityBuffer } from "../src/core/intensity-buffer.js";

/** The 3×3 gradient used throughout: 10, 20, … 90 row by row. */
export const GRADIENT_3X3 = [
  [10, 20, 30],
  [40, 50, 60],
  [70, 80, 90],
];

/**
 * Deterministic salt-and-pepper image: mid-grey values with roughly one pixel
 * in five forced to 0 or 255. Seeded LCG so every run sees the same pixels.
 */
export function noisyImage(width: number, height: number, seed = 7): IntensityBuffer {
  const image = new IntensityBuffer(width, height);
  let state = seed;
  const next = () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
  for (let i = 0; i < image.data.length; i++) {
    const r = next();
    image.data[i] = r < 0.1 ? 0 : r < 0.2 ? 255 : 100 + Math.floor(next() * 56);
  }
  return image;
}
