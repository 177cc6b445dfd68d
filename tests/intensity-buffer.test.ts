/**
 * Tests for IntensityBuffer: construction rules and helpers.
 */

import { describe, it, expect } from "vitest";
import { IntensityBuffer } from "../src/core/intensity-buffer.js";
import { InvalidDimensionsError } from "../src/core/errors.js";

describe("IntensityBuffer", () => {
  it("stores rows in row-major order", () => {
    const buffer = IntensityBuffer.fromRows([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect([buffer.width, buffer.height]).toEqual([3, 2]);
    expect(Array.from(buffer.data)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(buffer.get(2, 1)).toBe(6);
  });

  it("clamps written values to [0, 255]", () => {
    const buffer = new IntensityBuffer(2, 1);
    buffer.set(0, 0, 300);
    buffer.set(1, 0, -4);
    expect(buffer.toRows()).toEqual([[255, 0]]);
  });

  it("allows zero-area buffers", () => {
    expect(new IntensityBuffer(0, 5).area).toBe(0);
    expect(IntensityBuffer.fromRows([]).area).toBe(0);
  });

  it.each([
    [-1, 2],
    [2, 1.5],
  ])("rejects %s×%s", (w, h) => {
    expect(() => new IntensityBuffer(w, h)).toThrow(InvalidDimensionsError);
    expect(() => IntensityBuffer.allocate(w, h, { shared: true })).toThrow(InvalidDimensionsError);
  });

  it("rejects pixel data of the wrong length", () => {
    expect(() => new IntensityBuffer(2, 2, new Uint8ClampedArray(3))).toThrow(
      "expected 4 pixels, got 3"
    );
  });

  it("rejects ragged rows", () => {
    expect(() => IntensityBuffer.fromRows([[1, 2], [3]])).toThrow(InvalidDimensionsError);
  });

  describe("shared memory", () => {
    it("allocate({ shared: true }) is backed by a SharedArrayBuffer", () => {
      expect(IntensityBuffer.allocate(2, 2, { shared: true }).isShared()).toBe(true);
      expect(IntensityBuffer.allocate(2, 2).isShared()).toBe(false);
    });

    it("toShared() copies a plain buffer once", () => {
      const plain = IntensityBuffer.fromRows([[9, 8]]);
      const shared = plain.toShared();
      expect(shared).not.toBe(plain);
      expect(shared.isShared()).toBe(true);
      expect(shared.equals(plain)).toBe(true);
    });

    it("toShared() returns an already shared buffer as-is", () => {
      const shared = IntensityBuffer.allocate(1, 1, { shared: true });
      expect(shared.toShared()).toBe(shared);
    });
  });

  it("equals() compares dimensions as well as pixels", () => {
    const a = IntensityBuffer.fromRows([[1, 2]]);
    expect(a.equals(IntensityBuffer.fromRows([[1], [2]]))).toBe(false);
    expect(a.equals(IntensityBuffer.fromRows([[1, 3]]))).toBe(false);
    expect(a.equals(IntensityBuffer.fromRows([[1, 2]]))).toBe(true);
  });
});
