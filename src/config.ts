import { InvalidConfigError } from "./errors.js";
import { validateGridSize, type GridSize } from "./topology.js";
import type { Rgba } from "./render.js";

export const GRID_SIZE = 256;
export const UPDATE_INTERVAL_MS = 1000 / 60; // 60 FPS

export interface SimulationConfig {
  grid: GridSize;
  /** Share of cells alive after random seeding, in [0, 1]. */
  density: number;
  clearColor: Rgba;
  updateIntervalMs: number;
  generations: number;
}

export const DEFAULT_CONFIG: SimulationConfig = {
  grid: { width: GRID_SIZE, height: GRID_SIZE },
  density: 0.4,
  clearColor: [0.0, 0.05, 0.2, 1.0],
  updateIntervalMs: UPDATE_INTERVAL_MS,
  generations: 100,
};

export type ConfigOverrides = Partial<SimulationConfig>;

export function resolveConfig(overrides: ConfigOverrides = {}): SimulationConfig {
  const config: SimulationConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    grid: { ...(overrides.grid ?? DEFAULT_CONFIG.grid) },
    clearColor: overrides.clearColor ?? DEFAULT_CONFIG.clearColor,
  };

  validateGridSize(config.grid);
  if (!(config.density >= 0 && config.density <= 1)) {
    throw new InvalidConfigError("density", config.density, "a number in [0, 1]");
  }
  if (!(config.updateIntervalMs > 0)) {
    throw new InvalidConfigError("updateIntervalMs", config.updateIntervalMs, "a positive number");
  }
  if (!Number.isInteger(config.generations) || config.generations < 0) {
    throw new InvalidConfigError("generations", config.generations, "a non-negative integer");
  }
  if (config.clearColor.some((channel) => !(channel >= 0 && channel <= 1))) {
    throw new InvalidConfigError("clearColor", config.clearColor.join(","), "four channels in [0, 1]");
  }

  return config;
}
