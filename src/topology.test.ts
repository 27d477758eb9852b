import { describe, it, expect } from "vitest";
import { cellCoords, cellCount, cellIndex, validateGridSize } from "./topology.js";
import { InvalidGridSizeError } from "./errors.js";

describe("cellIndex", () => {
  const size = { width: 5, height: 3 };

  it("maps every in-range coordinate to a unique row-major offset", () => {
    const seen = new Set<number>();
    for (let y = 0; y < size.height; y++) {
      for (let x = 0; x < size.width; x++) {
        const i = cellIndex(size, x, y);
        expect(i).toBe(y * size.width + x);
        seen.add(i);
      }
    }
    expect(seen.size).toBe(cellCount(size));
    expect(Math.min(...seen)).toBe(0);
    expect(Math.max(...seen)).toBe(14);
  });

  it("wraps -1 onto the far edge", () => {
    for (let y = 0; y < size.height; y++) {
      expect(cellIndex(size, -1, y)).toBe(cellIndex(size, size.width - 1, y));
    }
    for (let x = 0; x < size.width; x++) {
      expect(cellIndex(size, x, -1)).toBe(cellIndex(size, x, size.height - 1));
    }
    expect(cellIndex(size, -1, -1)).toBe(14);
  });

  it("wraps coordinates past the far edge back to zero", () => {
    expect(cellIndex(size, 5, 0)).toBe(0);
    expect(cellIndex(size, 0, 3)).toBe(0);
    expect(cellIndex(size, 12, 7)).toBe(1 * 5 + 2);
  });

  it("round-trips through cellCoords", () => {
    expect(cellCoords(size, 13)).toEqual([3, 2]);
    expect(cellIndex(size, ...cellCoords(size, 13))).toBe(13);
  });
});

describe("validateGridSize", () => {
  it("accepts positive integer sizes", () => {
    expect(() => validateGridSize({ width: 1, height: 1 })).not.toThrow();
    expect(() => validateGridSize({ width: 64, height: 32 })).not.toThrow();
  });

  it.each([
    [0, 4],
    [4, 0],
    [-2, 4],
    [2.5, 4],
    [Number.NaN, 4],
  ])("rejects %s x %s", (width, height) => {
    expect(() => validateGridSize({ width, height })).toThrow(InvalidGridSizeError);
  });
});
