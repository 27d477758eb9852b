import { describe, it, expect } from "vitest";
import { CELL_SHADER, SIMULATION_SHADER } from "./shaders.js";
import { NEIGHBORS } from "./kernel.js";

describe("SIMULATION_SHADER", () => {
  it("runs in 8x8 workgroups", () => {
    expect(SIMULATION_SHADER).toContain("@workgroup_size(8, 8)");
  });

  it("binds the grid, the input state and the output state", () => {
    expect(SIMULATION_SHADER).toContain("@group(0) @binding(0) var<uniform> grid: vec2f;");
    expect(SIMULATION_SHADER).toContain("@group(0) @binding(1) var<storage> cellStateIn: array<f32>;");
    expect(SIMULATION_SHADER).toContain("@group(0) @binding(2) var<storage, read_write> cellStateOut: array<f32>;");
  });

  it("sums the same eight neighbors as the CPU kernel", () => {
    expect(SIMULATION_SHADER.match(/cellActive\(cell\./g)).toHaveLength(NEIGHBORS.length);
    expect(SIMULATION_SHADER).toContain("cellActive(cell.x + 1, cell.y + 1) +");
    expect(SIMULATION_SHADER).toContain("cellActive(cell.x, cell.y - 1) +");
    expect(SIMULATION_SHADER).toContain("cellActive(cell.x - 1, cell.y - 1) +");
    expect(SIMULATION_SHADER).toContain("cellActive(cell.x, cell.y + 1));");
  });

  it("wraps signed coordinates", () => {
    expect(SIMULATION_SHADER).toContain("let wrapped = ((cell % size) + size) % size;");
  });
});

describe("CELL_SHADER", () => {
  it("binds the grid and the read-only state", () => {
    expect(CELL_SHADER).toContain("@group(0) @binding(0) var<uniform> grid: vec2f;");
    expect(CELL_SHADER).toContain("@group(0) @binding(1) var<storage> cellState: array<f32>;");
  });

  it("derives the cell row from the grid height", () => {
    expect(CELL_SHADER).toContain("let cellOffset = vec2f(i % grid.x, floor(i / grid.y));");
  });

  it("declares both entry points", () => {
    expect(CELL_SHADER).toContain("fn vertexMain(input: VertexInput) -> VertexOutput");
    expect(CELL_SHADER).toContain("fn fragmentMain(@location(0) hue: vec2f) -> @location(0) vec4f");
  });
});
