/**
 * Image decode / encode through mupdf (WASM, no native deps, no DOM).
 */

import * as mupdf from "mupdf";
import { toGrayscale } from "./grayscale.js";
import type { IntensityBuffer } from "./intensity-buffer.js";

export const IMAGE_EXTENSIONS = new Set(["png", "jpg", "jpeg", "bmp", "tif", "tiff", "webp"]);

/** Decode any raster format mupdf understands into a shared grayscale buffer. */
export function decodeImage(bytes: Uint8Array): IntensityBuffer {
  const image = new mupdf.Image(bytes);
  const pixmap = image.toPixmap();
  // Normalise CMYK / indexed / alpha sources to plain RGB before averaging.
  const rgb = pixmap.convertToColorSpace(mupdf.ColorSpace.DeviceRGB, false);
  try {
    return toGrayscale(rgb.getPixels(), {
      width: rgb.getWidth(),
      height: rgb.getHeight(),
      channels: rgb.getNumberOfComponents(),
      stride: rgb.getStride(),
    });
  } finally {
    rgb.destroy();
    pixmap.destroy();
    image.destroy();
  }
}

/** Encode an intensity buffer as an 8-bit grayscale PNG. */
export function encodePng(buffer: IntensityBuffer): Uint8Array {
  const { width, height, data } = buffer;
  const pixmap = new mupdf.Pixmap(mupdf.ColorSpace.DeviceGray, [0, 0, width, height], false);
  try {
    const samples = pixmap.getPixels();
    const stride = pixmap.getStride();
    for (let y = 0; y < height; y++) {
      samples.set(data.subarray(y * width, (y + 1) * width), y * stride);
    }
    return pixmap.asPNG();
  } finally {
    pixmap.destroy();
  }
}
