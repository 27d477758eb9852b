import { InvalidGridSizeError } from "./errors.js";

export interface GridSize {
  width: number;
  height: number;
}

export function validateGridSize(size: GridSize): void {
  const { width, height } = size;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidGridSizeError(width, height);
  }
}

export function cellCount(size: GridSize): number {
  return size.width * size.height;
}

// Non-negative modulo, so -1 lands on n - 1.
function wrap(value: number, n: number): number {
  return ((value % n) + n) % n;
}

/**
 * Maps (x, y) to its row-major offset, wrapping both coordinates around the
 * torus first. Must agree with `cellIndex` in the simulation shader.
 */
export function cellIndex(size: GridSize, x: number, y: number): number {
  return wrap(y, size.height) * size.width + wrap(x, size.width);
}

export function cellCoords(size: GridSize, i: number): [x: number, y: number] {
  return [i % size.width, Math.floor(i / size.width)];
}
