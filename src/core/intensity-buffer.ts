/**
 * Single-channel 8-bit image held in row-major order.
 *
 * The backing store is either a plain ArrayBuffer or a SharedArrayBuffer.
 * Shared buffers are what the thread runner hands to its workers: the input
 * is read by every thread without copying, and the output is written by each
 * thread only inside its own chunk.
 */

import { InvalidDimensionsError } from "./errors.js";

export interface AllocateOptions {
  /** Back the pixels with a SharedArrayBuffer (default false). */
  shared?: boolean;
}

export class IntensityBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number, data?: Uint8ClampedArray) {
    if (!isDimension(width) || !isDimension(height)) {
      throw new InvalidDimensionsError(
        width,
        height,
        "dimensions must be non-negative integers"
      );
    }
    const pixels = data ?? new Uint8ClampedArray(width * height);
    if (pixels.length !== width * height) {
      throw new InvalidDimensionsError(
        width,
        height,
        `expected ${width * height} pixels, got ${pixels.length}`
      );
    }
    this.width = width;
    this.height = height;
    this.data = pixels;
  }

  static allocate(
    width: number,
    height: number,
    { shared = false }: AllocateOptions = {}
  ): IntensityBuffer {
    if (!shared) return new IntensityBuffer(width, height);
    if (!isDimension(width) || !isDimension(height)) {
      throw new InvalidDimensionsError(
        width,
        height,
        "dimensions must be non-negative integers"
      );
    }
    const store = new SharedArrayBuffer(width * height);
    return new IntensityBuffer(width, height, new Uint8ClampedArray(store));
  }

  /** Build from a list of rows, e.g. `[[10, 20], [30, 40]]`. Rows must be equal length. */
  static fromRows(rows: readonly (readonly number[])[]): IntensityBuffer {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    const buffer = new IntensityBuffer(width, height);
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new InvalidDimensionsError(
          row.length,
          height,
          `row ${y} has ${row.length} pixels, expected ${width}`
        );
      }
      buffer.data.set(row, y * width);
    });
    return buffer;
  }

  get area(): number {
    return this.width * this.height;
  }

  get(x: number, y: number): number {
    return this.data[y * this.width + x];
  }

  set(x: number, y: number, value: number): void {
    this.data[y * this.width + x] = value;
  }

  isShared(): boolean {
    return this.data.buffer instanceof SharedArrayBuffer;
  }

  /** This buffer if it is already shared, otherwise a shared copy. */
  toShared(): IntensityBuffer {
    if (this.isShared()) return this;
    const copy = IntensityBuffer.allocate(this.width, this.height, { shared: true });
    copy.data.set(this.data);
    return copy;
  }

  equals(other: IntensityBuffer): boolean {
    if (this.width !== other.width || this.height !== other.height) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let y = 0; y < this.height; y++) {
      rows.push(Array.from(this.data.subarray(y * this.width, (y + 1) * this.width)));
    }
    return rows;
  }
}

function isDimension(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}
