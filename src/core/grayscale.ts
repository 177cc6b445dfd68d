import { InvalidDimensionsError } from "./errors.js";
import { IntensityBuffer } from "./intensity-buffer.js";

export interface PixelLayout {
  width: number;
  height: number;
  /** Interleaved components per pixel, alpha included (1–4). */
  channels: number;
  /** Bytes per row (default width × channels). */
  stride?: number;
}

/**
 * Collapse interleaved pixels to one intensity per pixel.
 *
 * Three or more channels: floor((r + g + b) / 3), alpha ignored.
 * One or two channels: the first channel is taken as-is.
 *
 * The result is backed by a SharedArrayBuffer so the thread runner can hand
 * it to its workers without a copy.
 */
export function toGrayscale(
  pixels: ArrayLike<number>,
  { width, height, channels, stride = width * channels }: PixelLayout
): IntensityBuffer {
  if (!Number.isInteger(channels) || channels < 1 || channels > 4) {
    throw new RangeError(`Unsupported channel count: ${channels}`);
  }
  if (pixels.length < (height - 1) * stride + width * channels) {
    throw new InvalidDimensionsError(width, height, "pixel data is shorter than the layout");
  }

  const gray = IntensityBuffer.allocate(width, height, { shared: true });
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * stride + x * channels;
      gray.set(
        x,
        y,
        channels >= 3
          ? Math.floor((pixels[i] + pixels[i + 1] + pixels[i + 2]) / 3)
          : pixels[i]
      );
    }
  }
  return gray;
}
