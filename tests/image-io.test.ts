/**
 * Tests for image-io.ts: PNG encode / decode through mupdf.
 */

import { describe, it, expect } from "vitest";
import * as mupdf from "mupdf";
import { IntensityBuffer } from "../src/core/intensity-buffer.js";
import { IMAGE_EXTENSIONS, decodeImage, encodePng } from "../src/core/image-io.js";
import { noisyImage } from "./helpers.js";

const PNG_SIGNATURE = [137, 80, 78, 71, 13, 10, 26, 10];

/** Encode interleaved RGB rows as a PNG, independently of encodePng(). */
function rgbPng(rows: readonly (readonly [number, number, number])[][]): Uint8Array {
  const height = rows.length;
  const width = rows[0].length;
  const pixmap = new mupdf.Pixmap(mupdf.ColorSpace.DeviceRGB, [0, 0, width, height], false);
  try {
    const samples = pixmap.getPixels();
    const stride = pixmap.getStride();
    rows.forEach((row, y) => {
      row.forEach((rgb, x) => samples.set(rgb, y * stride + x * 3));
    });
    return pixmap.asPNG();
  } finally {
    pixmap.destroy();
  }
}

// ── encodePng ─────────────────────────────────────────────────────────────────

describe("encodePng", () => {
  it("produces PNG bytes", () => {
    const png = encodePng(IntensityBuffer.fromRows([[0, 128, 255]]));
    expect(Array.from(png.subarray(0, 8))).toEqual(PNG_SIGNATURE);
  });

  it("round-trips through decodeImage with dimensions and pixels intact", () => {
    const image = IntensityBuffer.fromRows([
      [0, 64, 128],
      [192, 255, 7],
    ]);
    const decoded = decodeImage(encodePng(image));
    expect([decoded.width, decoded.height]).toEqual([3, 2]);
    expect(decoded.toRows()).toEqual(image.toRows());
  });

  it("round-trips a noisy image whose width is not a multiple of 4", () => {
    const image = noisyImage(13, 9);
    expect(decodeImage(encodePng(image)).equals(image)).toBe(true);
  });
});

// ── decodeImage ───────────────────────────────────────────────────────────────

describe("decodeImage", () => {
  it("averages RGB channels with floor((r + g + b) / 3)", () => {
    const png = rgbPng([
      [
        [30, 60, 90],
        [255, 0, 1],
      ],
      [
        [10, 11, 13],
        [255, 255, 255],
      ],
    ]);
    expect(decodeImage(png).toRows()).toEqual([
      [60, 85],
      [11, 255],
    ]);
  });

  it("returns a shared buffer ready for the thread runner", () => {
    expect(decodeImage(encodePng(noisyImage(4, 4))).isShared()).toBe(true);
  });

  it("throws on bytes that are not an image", () => {
    expect(() => decodeImage(new TextEncoder().encode("not an image"))).toThrow();
  });
});

describe("IMAGE_EXTENSIONS", () => {
  it("lists lower-case extensions without the dot", () => {
    expect([...IMAGE_EXTENSIONS].sort()).toEqual([
      "bmp",
      "jpeg",
      "jpg",
      "png",
      "tif",
      "tiff",
      "webp",
    ]);
  });
});
