import type { GridSize } from "./topology.js";
import type { CellState } from "./kernel.js";

export type Vec2 = [x: number, y: number];
export type Rgba = [r: number, g: number, b: number, a: number];

// Unit cell quad, drawn as a triangle strip.
export const QUAD_VERTICES = new Float32Array([
  -0.8, -0.8,
  0.8, -0.8,
  -0.8, 0.8,
  0.8, 0.8,
]);

export const QUAD_VERTEX_COUNT = QUAD_VERTICES.length / 2;

export interface VertexOutput {
  position: Vec2;
  hue: Vec2;
}

/**
 * Grid coordinate of an instance. The row divides by the grid height, which
 * only matches the row-major cell index on square grids.
 */
export function cellOffset(size: GridSize, instance: number): Vec2 {
  return [instance % size.width, Math.floor(instance / size.height)];
}

export function vertexMain(size: GridSize, state: CellState, instance: number, local: Vec2): VertexOutput {
  const alive = state[instance];
  const [cx, cy] = cellOffset(size, instance);

  return {
    position: [
      (local[0] * alive + 1) / size.width - 1 + (cx * 2) / size.width,
      (local[1] * alive + 1) / size.height - 1 + (cy * 2) / size.height,
    ],
    hue: [cx / 2, cy / 2],
  };
}

export function fragmentMain(hue: Vec2): Rgba {
  return [hue[0], hue[1], 1 - hue[0], 1];
}

function toUnorm8(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 255);
}

export interface RasterTarget {
  width: number;
  height: number;
  clearColor: Rgba;
}

/**
 * Draws every cell instance into a tightly packed RGBA8 image. Cell quads are
 * axis-aligned, so a pixel is covered when its center lies inside the quad's
 * [min, max) bounds. Rows run top to bottom.
 */
export function rasterize(size: GridSize, state: CellState, target: RasterTarget): Uint8Array {
  const pixels = new Uint8Array(target.width * target.height * 4);
  const clear = target.clearColor.map(toUnorm8);
  for (let p = 0; p < pixels.length; p += 4) {
    pixels.set(clear, p);
  }

  const instances = size.width * size.height;
  for (let instance = 0; instance < instances; instance++) {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    let hue: Vec2 = [0, 0];

    for (let v = 0; v < QUAD_VERTEX_COUNT; v++) {
      const out = vertexMain(size, state, instance, [QUAD_VERTICES[v * 2], QUAD_VERTICES[v * 2 + 1]]);
      minX = Math.min(minX, out.position[0]);
      maxX = Math.max(maxX, out.position[0]);
      minY = Math.min(minY, out.position[1]);
      maxY = Math.max(maxY, out.position[1]);
      hue = out.hue;
    }

    // Clip space to framebuffer space; y flips.
    const left = ((minX + 1) / 2) * target.width;
    const right = ((maxX + 1) / 2) * target.width;
    const top = ((1 - maxY) / 2) * target.height;
    const bottom = ((1 - minY) / 2) * target.height;

    const x0 = Math.max(0, Math.ceil(left - 0.5));
    const x1 = Math.min(target.width, Math.ceil(right - 0.5));
    const y0 = Math.max(0, Math.ceil(top - 0.5));
    const y1 = Math.min(target.height, Math.ceil(bottom - 0.5));
    if (x0 >= x1 || y0 >= y1) {
      continue;
    }

    const color = fragmentMain(hue).map(toUnorm8);
    for (let y = y0; y < y1; y++) {
      for (let x = x0; x < x1; x++) {
        pixels.set(color, (y * target.width + x) * 4);
      }
    }
  }

  return pixels;
}
