#!/usr/bin/env node
export { };

import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { create, globals } from "webgpu";
import { LifeSimulation } from "./gol.js";
import { resolveConfig } from "./config.js";
import { InvalidConfigError, WebGPUUnavailableError } from "./errors.js";
import { PATTERNS, isPatternName, population, seedPattern } from "./state.js";
import { encodePpm } from "./snapshot.js";

Object.assign(globalThis, globals);

const { values } = parseArgs({
    options: {
        width: { type: "string" },
        height: { type: "string" },
        generations: { type: "string", short: "n" },
        density: { type: "string" },
        pattern: { type: "string", short: "p" },
        snapshot: { type: "string", short: "o" },
        scale: { type: "string", default: "4" },
    },
});

function parseNumber(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number(value);
}

const defaults = resolveConfig();
const config = resolveConfig({
    grid: {
        width: parseNumber(values.width) ?? defaults.grid.width,
        height: parseNumber(values.height) ?? parseNumber(values.width) ?? defaults.grid.height,
    },
    generations: parseNumber(values.generations) ?? defaults.generations,
    density: parseNumber(values.density) ?? defaults.density,
});

let initialState: Float32Array | undefined;
if (values.pattern !== undefined) {
    if (!isPatternName(values.pattern)) {
        throw new Error(`Unknown pattern "${values.pattern}". Known patterns: ${Object.keys(PATTERNS).join(", ")}`);
    }
    const { width, height } = config.grid;
    initialState = seedPattern(config.grid, PATTERNS[values.pattern], [Math.floor(width / 2), Math.floor(height / 2)]);
}

const gpu = create([]);
if (!gpu) {
    throw new WebGPUUnavailableError("gpu");
}

console.log(`Setting up ${config.grid.width}x${config.grid.height} simulation...`);
const gol = await LifeSimulation.create(gpu, { ...config, initialState });
console.log(`Generation 0: ${population(await gol.readState())} alive`);

await gol.step(config.generations);
console.log(`Generation ${gol.generation}: ${population(await gol.readState())} alive`);

if (values.snapshot !== undefined) {
    const scale = Number(values.scale);
    if (!Number.isInteger(scale) || scale <= 0) {
        throw new InvalidConfigError("scale", values.scale, "a positive integer");
    }
    const width = config.grid.width * scale;
    const height = config.grid.height * scale;
    const pixels = await gol.renderToPixels(width, height);
    await writeFile(values.snapshot, encodePpm(pixels, width, height));
    console.log(`Wrote ${width}x${height} snapshot to ${values.snapshot}`);
}

gol.destroy();
