import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync } from "fs";
import { GraphLoader } from "../../src/infrastructure/services/graph/GraphLoader.js";
import { GraphLoadError } from "../../src/shared/errors/SimulationErrors.js";
import { MazeNode } from "../../src/shared/constants/MazeEnums.js";
import { logger } from "../../src/infrastructure/utils/logger.js";
import { BUNDLED_GRAPH_FILE, createTestConfig } from "../fixtures/mazeGraph.js";

const bundledText = readFileSync(BUNDLED_GRAPH_FILE, "utf-8");
const bundledLines = bundledText.trim().split("\n");

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("GraphLoader", () => {
  let loader: GraphLoader;

  beforeEach(() => {
    loader = new GraphLoader(createTestConfig());
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("load", () => {
    it("debe cargar las 18 aristas del archivo incluido", () => {
      const graph = loader.load();
      expect(graph.edges).toHaveLength(18);
      expect(graph.edges[0]).toEqual({
        from: MazeNode.EXIT,
        to: MazeNode.NEST,
        weight: 3,
      });
      expect(graph.totalWeight).toBe(40);
      expect(graph.infinity).toBe(41);
    });

    it("debe lanzar GraphLoadError si el archivo no existe", () => {
      const missing = new GraphLoader(
        createTestConfig({ graphFile: "/nonexistent/graphWeights.txt" }),
      );
      const error = captureError(() => missing.load());
      expect(error).toBeInstanceOf(GraphLoadError);
      expect(error).toHaveProperty(
        "message",
        "Unable to read graph source /nonexistent/graphWeights.txt",
      );
    });
  });

  describe("parse", () => {
    it("debe rechazar una fuente con solo 17 tripletas", () => {
      const text = bundledLines.slice(0, 17).join("\n");
      const error = captureError(() => loader.parse(text));
      expect(error).toBeInstanceOf(GraphLoadError);
      expect(error).toHaveProperty("message", "Expected 18 edges but found 17");
      expect(error).toHaveProperty("line", 17);
    });

    it("debe rechazar datos sobrantes tras la arista 18", () => {
      const text = `${bundledText}E F 1\n`;
      const error = captureError(() => loader.parse(text));
      expect(error).toBeInstanceOf(GraphLoadError);
      expect(error).toHaveProperty("line", 19);
    });

    it("debe rechazar símbolos de nodo desconocidos", () => {
      const lines = [...bundledLines];
      lines[4] = "A Z 2";
      const error = captureError(() => loader.parse(lines.join("\n")));
      expect(error).toHaveProperty("message", 'Unknown node "Z"');
      expect(error).toHaveProperty("line", 5);
    });

    it("debe rechazar pesos negativos o no enteros", () => {
      for (const weight of ["-1", "2.5", "x"]) {
        const lines = [...bundledLines];
        lines[0] = `E N ${weight}`;
        const error = captureError(() => loader.parse(lines.join("\n")));
        expect(error).toBeInstanceOf(GraphLoadError);
        expect(error).toHaveProperty(
          "message",
          `Weight must be a non-negative integer, got "${weight}"`,
        );
      }
    });

    it("debe rechazar pesos que no se pueden representar con exactitud", () => {
      const lines = [
        "E F 9007199254740993",
        ...Array.from({ length: 17 }, () => "N W 0"),
      ];
      const error = captureError(() => loader.parse(lines.join("\n")));
      expect(error).toBeInstanceOf(GraphLoadError);
      expect(error).toHaveProperty(
        "message",
        'Weight "9007199254740993" is too large to represent exactly',
      );
      expect(error).toHaveProperty("line", 1);
    });

    it("debe rechazar un peso total que desborda la distancia centinela", () => {
      const lines = [
        "E F 4503599627370496",
        "F E 4503599627370496",
        ...Array.from({ length: 16 }, () => "N W 0"),
      ];
      const error = captureError(() => loader.parse(lines.join("\n")));
      expect(error).toBeInstanceOf(GraphLoadError);
      expect(error).toHaveProperty(
        "message",
        "Total edge weight 9007199254740992 is too large to compare exactly",
      );
    });

    it("debe aceptar cualquier separación por espacios en blanco", () => {
      const text = bundledLines.join("\t\r\n  ");
      expect(loader.parse(text).edges).toHaveLength(18);
    });

    it("debe advertir cuando el peso total supera el presupuesto clásico", () => {
      const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => {});
      const lines = [...bundledLines];
      lines[0] = "E N 10";
      const graph = loader.parse(lines.join("\n"));

      expect(graph.totalWeight).toBe(47);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });
});
