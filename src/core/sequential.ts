import { DEFAULT_CONFIG, assertRadius } from "./config.js";
import { InvalidDimensionsError } from "./errors.js";
import { IntensityBuffer } from "./intensity-buffer.js";
import { filterRegion } from "./median.js";

export interface FilterOptions {
  /** Neighborhood radius (default DEFAULT_CONFIG.radius). */
  radius?: number;
}

/** Throws InvalidDimensionsError for a zero-area buffer. */
export function assertFilterable(buffer: IntensityBuffer): void {
  if (buffer.area === 0) throw new InvalidDimensionsError(buffer.width, buffer.height);
}

/**
 * Median-filter the whole image on the calling thread.
 *
 * Returns a new buffer of the same dimensions; the input is only read.
 */
export function filterSequential(
  buffer: IntensityBuffer,
  { radius = DEFAULT_CONFIG.radius }: FilterOptions = {}
): IntensityBuffer {
  assertFilterable(buffer);
  assertRadius(radius);

  const output = IntensityBuffer.allocate(buffer.width, buffer.height);
  filterRegion(
    buffer,
    output,
    { x0: 0, y0: 0, x1: buffer.width, y1: buffer.height },
    radius
  );
  return output;
}
