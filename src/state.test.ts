import { describe, it, expect } from "vitest";
import {
  PATTERNS,
  PingPong,
  createCellState,
  isAlive,
  isPatternName,
  population,
  seedPattern,
  seedRandom,
} from "./state.js";
import { BufferSizeError, InvalidGridSizeError } from "./errors.js";

function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++];
}

describe("createCellState", () => {
  it("allocates one zeroed float per cell", () => {
    const state = createCellState({ width: 3, height: 2 });
    expect(state).toBeInstanceOf(Float32Array);
    expect(Array.from(state)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("rejects an invalid grid", () => {
    expect(() => createCellState({ width: 3, height: 0 })).toThrow(InvalidGridSizeError);
  });
});

describe("seedRandom", () => {
  it("marks cells alive above the density threshold", () => {
    const state = seedRandom({ width: 2, height: 2 }, 0.4, sequence([0.1, 0.7, 0.61, 0.6]));
    expect(Array.from(state)).toEqual([0, 1, 1, 0]);
  });

  it("produces no live cells at zero density", () => {
    const state = seedRandom({ width: 4, height: 4 }, 0, () => 0.99);
    expect(population(state)).toBe(0);
  });
});

describe("seedPattern", () => {
  const size = { width: 4, height: 4 };

  it("places pattern cells relative to the origin", () => {
    const state = seedPattern(size, PATTERNS.block, [1, 2]);
    expect(isAlive(state, size, 1, 2)).toBe(true);
    expect(isAlive(state, size, 2, 2)).toBe(true);
    expect(isAlive(state, size, 1, 3)).toBe(true);
    expect(isAlive(state, size, 2, 3)).toBe(true);
    expect(population(state)).toBe(4);
  });

  it("wraps cells past the edge", () => {
    const state = seedPattern(size, PATTERNS.blinker, [3, 0]);
    expect(Array.from(state.subarray(0, 4))).toEqual([1, 1, 0, 1]);
    expect(population(state)).toBe(3);
  });

  it("adds to an existing state", () => {
    const state = seedPattern(size, [[0, 0]]);
    seedPattern(size, [[3, 3]], [0, 0], state);
    expect(population(state)).toBe(2);
    expect(isAlive(state, size, -1, -1)).toBe(true);
  });

  it("rejects a state of the wrong length", () => {
    expect(() => seedPattern(size, [[0, 0]], [0, 0], new Float32Array(15))).toThrow(BufferSizeError);
  });
});

describe("isPatternName", () => {
  it("recognises only the built-in patterns", () => {
    expect(isPatternName("glider")).toBe(true);
    expect(isPatternName("rPentomino")).toBe(true);
    expect(isPatternName("toString")).toBe(false);
    expect(isPatternName("spaceship")).toBe(false);
  });
});

describe("PingPong", () => {
  it("alternates current and next", () => {
    const cycle = new PingPong(["a", "b"] as const);
    expect(cycle.step).toBe(0);
    expect(cycle.current).toBe("a");
    expect(cycle.next).toBe("b");

    cycle.advance();
    expect(cycle.step).toBe(1);
    expect(cycle.current).toBe("b");
    expect(cycle.next).toBe("a");

    cycle.advance();
    expect(cycle.current).toBe("a");
    expect(cycle.next).toBe("b");
  });
});
