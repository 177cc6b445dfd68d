import type { IntensityBuffer } from "./intensity-buffer.js";

/**
 * Collect the intensities within Chebyshev distance `radius` of (x, y).
 *
 * Offsets that fall outside the image are skipped rather than padded or
 * mirrored, so an interior pixel yields (2r+1)² samples, an edge pixel fewer,
 * and a corner pixel at r=1 exactly 4. The center is always included.
 *
 * The caller guarantees (x, y) is in bounds and radius ≥ 0.
 */
export function sampleNeighborhood(
  buffer: IntensityBuffer,
  x: number,
  y: number,
  radius: number
): number[] {
  const { width, height, data } = buffer;
  const x0 = Math.max(0, x - radius);
  const x1 = Math.min(width - 1, x + radius);
  const y0 = Math.max(0, y - radius);
  const y1 = Math.min(height - 1, y + radius);

  const samples: number[] = [];
  for (let ny = y0; ny <= y1; ny++) {
    const row = ny * width;
    for (let nx = x0; nx <= x1; nx++) samples.push(data[row + nx]);
  }
  return samples;
}
