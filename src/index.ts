export { LifeSimulation, type LifeSimulationOptions } from "./gol.js";
export { DEFAULT_CONFIG, resolveConfig, type ConfigOverrides, type SimulationConfig } from "./config.js";
export { cellCoords, cellCount, cellIndex, validateGridSize, type GridSize } from "./topology.js";
export { WORKGROUP_SIZE, activeNeighbors, step, stepCell, workgroupCount, type CellState, type Tile, type TileScheduler } from "./kernel.js";
export { QUAD_VERTICES, cellOffset, fragmentMain, rasterize, vertexMain, type RasterTarget, type Rgba } from "./render.js";
export { CELL_SHADER, SIMULATION_SHADER } from "./shaders.js";
export { PATTERNS, PingPong, createCellState, isAlive, population, seedPattern, seedRandom, type Pattern, type PatternName } from "./state.js";
export { encodePpm } from "./snapshot.js";
export * from "./errors.js";
