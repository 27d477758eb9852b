import { cellCount, cellIndex, validateGridSize, type GridSize } from "./topology.js";
import { AliasedBufferError, BufferSizeError } from "./errors.js";

export const WORKGROUP_SIZE = 8;

export type CellState = Float32Array;

export interface Tile {
  x: number;
  y: number;
}

/** Reorders tiles before they run. Results must not depend on the order. */
export type TileScheduler = (tiles: Tile[]) => Tile[];

export function workgroupCount(size: GridSize): [x: number, y: number] {
  return [Math.ceil(size.width / WORKGROUP_SIZE), Math.ceil(size.height / WORKGROUP_SIZE)];
}

/** Moore neighborhood offsets, shared with the simulation shader. */
export const NEIGHBORS: ReadonlyArray<readonly [dx: number, dy: number]> = [
  [1, 1], [1, 0], [1, -1], [0, -1],
  [-1, -1], [-1, 0], [-1, 1], [0, 1],
];

export function activeNeighbors(input: CellState, size: GridSize, x: number, y: number): number {
  let count = 0;
  for (const [dx, dy] of NEIGHBORS) {
    count += input[cellIndex(size, x + dx, y + dy)];
  }
  return count;
}

/** One invocation of the simulation kernel. */
export function stepCell(input: CellState, output: CellState, size: GridSize, x: number, y: number): void {
  const i = cellIndex(size, x, y);

  switch (activeNeighbors(input, size, x, y)) {
    case 2:
      output[i] = input[i];
      break;
    case 3:
      output[i] = 1;
      break;
    default:
      output[i] = 0;
  }
}

export function validateStep(input: CellState, output: CellState, size: GridSize): void {
  validateGridSize(size);
  if (input === output || input.buffer === output.buffer) {
    throw new AliasedBufferError();
  }
  const expected = cellCount(size);
  if (input.length !== expected) {
    throw new BufferSizeError("input", input.length, expected);
  }
  if (output.length !== expected) {
    throw new BufferSizeError("output", output.length, expected);
  }
}

/**
 * Runs the simulation kernel on the CPU the way the GPU dispatches it:
 * ceil(width / 8) x ceil(height / 8) tiles of 8x8 invocations, with
 * out-of-grid invocations returning early.
 */
export function step(
  input: CellState,
  output: CellState,
  size: GridSize,
  schedule: TileScheduler = (tiles) => tiles,
): void {
  validateStep(input, output, size);

  const [countX, countY] = workgroupCount(size);
  const tiles: Tile[] = [];
  for (let y = 0; y < countY; y++) {
    for (let x = 0; x < countX; x++) {
      tiles.push({ x, y });
    }
  }

  for (const tile of schedule(tiles)) {
    for (let ly = 0; ly < WORKGROUP_SIZE; ly++) {
      for (let lx = 0; lx < WORKGROUP_SIZE; lx++) {
        const x = tile.x * WORKGROUP_SIZE + lx;
        const y = tile.y * WORKGROUP_SIZE + ly;
        if (x >= size.width || y >= size.height) {
          continue;
        }
        stepCell(input, output, size, x, y);
      }
    }
  }
}
