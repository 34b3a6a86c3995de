import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import path from "path";

const ENV_KEYS = [
  "MAZE_GRAPH_FILE",
  "RAT_SEED",
  "RAT_NAME",
  "RAT_MAX_ITERATIONS",
  "RAT_PAUSE",
];

async function loadConfig() {
  vi.resetModules();
  return import("../../src/config/config.js");
}

describe("Config", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it("debe tener valores por defecto", async () => {
    const { CONFIG } = await loadConfig();
    expect(CONFIG.GRAPH_FILE).toBe(
      path.resolve(process.cwd(), "data", "graphWeights.txt"),
    );
    expect(CONFIG.SEED).toBeUndefined();
    expect(CONFIG.RAT_NAME).toBe("Algernon");
    expect(CONFIG.MAX_ITERATIONS).toBe(100);
    expect(CONFIG.PAUSE).toBe(true);
  });

  it("debe usar valores de entorno cuando están disponibles", async () => {
    process.env.MAZE_GRAPH_FILE = "/tmp/maze.txt";
    process.env.RAT_SEED = "test-seed";
    process.env.RAT_NAME = "Nibbles";
    process.env.RAT_MAX_ITERATIONS = "12";
    process.env.RAT_PAUSE = "false";

    const { CONFIG, toSimulationConfig } = await loadConfig();

    expect(CONFIG.RAT_NAME).toBe("Nibbles");
    expect(CONFIG.PAUSE).toBe(false);
    expect(toSimulationConfig(CONFIG)).toEqual({
      graphFile: "/tmp/maze.txt",
      seed: "test-seed",
      maxIterations: 12,
    });
  });

  it("debe ignorar límites de iteración inválidos", async () => {
    process.env.RAT_MAX_ITERATIONS = "-3";
    expect((await loadConfig()).CONFIG.MAX_ITERATIONS).toBe(100);

    process.env.RAT_MAX_ITERATIONS = "many";
    expect((await loadConfig()).CONFIG.MAX_ITERATIONS).toBe(100);
  });
});
