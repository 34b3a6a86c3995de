import path from "path";
import { SIMULATION_CONSTANTS } from "../shared/constants/SimulationConstants";

/**
 * Application configuration loaded from environment variables.
 *
 * @module config
 */

/**
 * Settings consumed by the simulation core.
 */
export interface SimulationConfig {
  /** Path of the graph source file */
  graphFile: string;
  /** RNG seed for drive initialization; time-based when absent */
  seed?: string;
  /** Hard cap on loop iterations */
  maxIterations: number;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Application configuration object.
 *
 * @property {string} GRAPH_FILE - Graph source path (default: ./data/graphWeights.txt)
 * @property {string} SEED - Optional RNG seed for the rat's drives
 * @property {string} RAT_NAME - Name used when the name prompt is left empty
 * @property {number} MAX_ITERATIONS - Iteration cap for a run (default: 100)
 * @property {boolean} PAUSE - Whether the console waits for Enter between iterations
 */
export const CONFIG = {
  GRAPH_FILE: path.resolve(
    process.env.MAZE_GRAPH_FILE ||
      path.join(process.cwd(), "data", "graphWeights.txt"),
  ),
  SEED: process.env.RAT_SEED || undefined,
  RAT_NAME: process.env.RAT_NAME || "Algernon",
  MAX_ITERATIONS: parsePositiveInt(
    process.env.RAT_MAX_ITERATIONS,
    SIMULATION_CONSTANTS.LOOP.DEFAULT_MAX_ITERATIONS,
  ),
  PAUSE: process.env.RAT_PAUSE !== "false",
};

/**
 * Builds the core settings from the application configuration.
 */
export function toSimulationConfig(config: typeof CONFIG = CONFIG): SimulationConfig {
  return {
    graphFile: config.GRAPH_FILE,
    seed: config.SEED,
    maxIterations: config.MAX_ITERATIONS,
  };
}
