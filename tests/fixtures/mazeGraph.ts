import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { GraphLoader } from "../../src/infrastructure/services/graph/GraphLoader.js";
import type { MazeGraph } from "../../src/domain/maze/MazeGraph.js";
import type { SimulationConfig } from "../../src/config/config.js";

export const BUNDLED_GRAPH_FILE = fileURLToPath(
  new URL("../../data/graphWeights.txt", import.meta.url),
);

export function createTestConfig(
  overrides: Partial<SimulationConfig> = {},
): SimulationConfig {
  return {
    graphFile: BUNDLED_GRAPH_FILE,
    seed: "test-seed",
    maxIterations: 20,
    ...overrides,
  };
}

export function loadBundledGraph(): MazeGraph {
  return new GraphLoader(createTestConfig()).parse(
    readFileSync(BUNDLED_GRAPH_FILE, "utf-8"),
  );
}
