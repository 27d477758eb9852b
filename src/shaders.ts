import { NEIGHBORS, WORKGROUP_SIZE } from "./kernel.js";

function offset(axis: string, delta: number): string {
    if (delta === 0) {
        return axis;
    }
    return delta > 0 ? `${axis} + ${delta}` : `${axis} - ${-delta}`;
}

// One cellActive() term per neighbor, in the CPU reference's order.
const NEIGHBOR_SUM = NEIGHBORS
    .map(([dx, dy]) => `cellActive(${offset("cell.x", dx)}, ${offset("cell.y", dy)})`)
    .join(" +\n        ");

export const SIMULATION_SHADER = `
@group(0) @binding(0) var<uniform> grid: vec2f;

@group(0) @binding(1) var<storage> cellStateIn: array<f32>;
@group(0) @binding(2) var<storage, read_write> cellStateOut: array<f32>;

// Maps the cell coordinates to the index in the storage buffer,
// wrapping within the grid. Signed so that -1 lands on the far edge.
fn cellIndex(cell: vec2i) -> u32 {
    let size = vec2i(grid);
    let wrapped = ((cell % size) + size) % size;
    return u32(wrapped.y * size.x + wrapped.x);
}

fn cellActive(x: i32, y: i32) -> f32 {
    return cellStateIn[cellIndex(vec2(x, y))];
}

@compute
@workgroup_size(${WORKGROUP_SIZE}, ${WORKGROUP_SIZE})
fn computeMain(@builtin(global_invocation_id) id: vec3u) {
    // Rounded-up dispatches overshoot the grid edge.
    if (id.x >= u32(grid.x) || id.y >= u32(grid.y)) {
        return;
    }

    let cell = vec2i(id.xy);

    // Determine how many active neighbors this cell has.
    let activeNeighbors = u32(
        ${NEIGHBOR_SUM});

    let i = cellIndex(cell);

    // Conway's game of life rules:
    switch activeNeighbors {
        // Active cells with 2 neighbors stay active.
        case 2u: {
            cellStateOut[i] = cellStateIn[i];
        }

        // Cells with 3 neighbors become or stay active.
        case 3u: {
            cellStateOut[i] = 1.0;
        }

        // Cells with < 2 or > 3 neighbors become inactive.
        default: {
            cellStateOut[i] = 0.0;
        }
    }
}
`;

export const CELL_SHADER = `
struct VertexInput {
    @location(0) pos: vec2f,
    @builtin(instance_index) instance: u32,
};

struct VertexOutput {
    @builtin(position) pos: vec4f,
    @location(0) hue: vec2f,
};

@group(0) @binding(0) var<uniform> grid: vec2f;
@group(0) @binding(1) var<storage> cellState: array<f32>;

@vertex
fn vertexMain(input: VertexInput) -> VertexOutput {
    let i = f32(input.instance);

    // The row divides by grid.y; rendering matches the simulation only on square grids.
    let cellOffset = vec2f(i % grid.x, floor(i / grid.y));
    let alive = cellState[input.instance];

    let gridPos = (input.pos * alive + 1) / grid - 1 + cellOffset * 2 / grid;

    var output: VertexOutput;
    output.pos = vec4f(gridPos, 0, 1);
    output.hue = cellOffset / 2;
    return output;
}

@fragment
fn fragmentMain(@location(0) hue: vec2f) -> @location(0) vec4f {
    return vec4f(hue.x, hue.y, 1 - hue.x, 1);
}
`;
