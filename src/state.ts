import { cellCount, cellIndex, validateGridSize, type GridSize } from "./topology.js";
import { BufferSizeError } from "./errors.js";
import type { CellState } from "./kernel.js";

export function createCellState(size: GridSize): CellState {
  validateGridSize(size);
  return new Float32Array(cellCount(size));
}

export function validateCellState(state: CellState, size: GridSize, label = "state"): void {
  const expected = cellCount(size);
  if (state.length !== expected) {
    throw new BufferSizeError(label, state.length, expected);
  }
}

// Set each cell to a random state.
export function seedRandom(size: GridSize, density: number, random: () => number = Math.random): CellState {
  const state = createCellState(size);
  const threshold = 1 - density;
  for (let i = 0; i < state.length; ++i) {
    state[i] = random() > threshold ? 1 : 0;
  }
  return state;
}

export type Pattern = ReadonlyArray<readonly [x: number, y: number]>;

export const PATTERNS = {
  blinker: [[0, 0], [1, 0], [2, 0]],
  block: [[0, 0], [1, 0], [0, 1], [1, 1]],
  glider: [[1, 0], [2, 1], [0, 2], [1, 2], [2, 2]],
  rPentomino: [[1, 0], [2, 0], [0, 1], [1, 1], [1, 2]],
} satisfies Record<string, Pattern>;

export type PatternName = keyof typeof PATTERNS;

export function isPatternName(name: string): name is PatternName {
  return Object.hasOwn(PATTERNS, name);
}

/** Writes live cells at `origin + offset`, wrapping around the grid edges. */
export function seedPattern(
  size: GridSize,
  pattern: Pattern,
  origin: readonly [x: number, y: number] = [0, 0],
  state: CellState = createCellState(size),
): CellState {
  validateCellState(state, size);
  for (const [dx, dy] of pattern) {
    state[cellIndex(size, origin[0] + dx, origin[1] + dy)] = 1;
  }
  return state;
}

export function population(state: CellState): number {
  let alive = 0;
  for (const value of state) {
    alive += value;
  }
  return alive;
}

export function isAlive(state: CellState, size: GridSize, x: number, y: number): boolean {
  return state[cellIndex(size, x, y)] === 1;
}

/**
 * Two-state cycle over a pair of buffers. `current` is read this step,
 * `next` is written; `advance` swaps them.
 */
export class PingPong<T> {
  private index = 0;

  constructor(private readonly buffers: readonly [T, T]) {}

  get step(): number {
    return this.index;
  }

  get current(): T {
    return this.buffers[this.index % 2];
  }

  get next(): T {
    return this.buffers[(this.index + 1) % 2];
  }

  advance(): void {
    this.index++;
  }
}
