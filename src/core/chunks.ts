import { InvalidChunkSizeError } from "./errors.js";
import type { Region } from "./median.js";

/** One rectangular unit of parallel work. Chunks of a plan tile the image. */
export interface Chunk extends Region {
  /** Row-major position in the plan; failures are reported by lowest index. */
  index: number;
}

export function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidChunkSizeError(chunkSize);
  }
}

/** ⌈W/C⌉ · ⌈H/C⌉ */
export function chunkCount(width: number, height: number, chunkSize: number): number {
  assertChunkSize(chunkSize);
  return Math.ceil(width / chunkSize) * Math.ceil(height / chunkSize);
}

/**
 * Partition a width × height image into chunks of edge `chunkSize`, striding
 * from the origin. The last row and column are clipped to the image, so a
 * chunk size larger than one dimension yields a single strip along it.
 */
export function planChunks(width: number, height: number, chunkSize: number): Chunk[] {
  assertChunkSize(chunkSize);
  const chunks: Chunk[] = [];
  for (let y0 = 0; y0 < height; y0 += chunkSize) {
    for (let x0 = 0; x0 < width; x0 += chunkSize) {
      chunks.push({
        index: chunks.length,
        x0,
        y0,
        x1: Math.min(x0 + chunkSize, width),
        y1: Math.min(y0 + chunkSize, height),
      });
    }
  }
  return chunks;
}
