import * as fs from "fs";
import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { SimulationConfig } from "@/config/config";
import { MazeGraph } from "@/domain/maze/MazeGraph";
import { parseMazeNode } from "@/shared/constants/MazeEnums";
import { SIMULATION_CONSTANTS } from "@/shared/constants/SimulationConstants";
import { GraphLoadError } from "@/shared/errors/SimulationErrors";
import type { Edge } from "@/shared/types/simulation/maze";
import { logger, LogCategory } from "@/infrastructure/utils/logger";

interface Token {
  value: string;
  line: number;
}

const WEIGHT_PATTERN = /^\d+$/;

/**
 * Loads the maze from a text source of whitespace-separated
 * `<from> <to> <weight>` triples.
 *
 * The source must hold exactly {@link SIMULATION_CONSTANTS.GRAPH.EDGE_COUNT}
 * triples. Anything else fails with {@link GraphLoadError}.
 */
@injectable()
export class GraphLoader {
  private readonly edgeCount: number;

  constructor(
    @inject(TYPES.SimulationConfig) private readonly config: SimulationConfig,
  ) {
    this.edgeCount = SIMULATION_CONSTANTS.GRAPH.EDGE_COUNT;
  }

  public load(): MazeGraph {
    const file = this.config.graphFile;
    let text: string;
    try {
      text = fs.readFileSync(file, "utf-8");
    } catch (error) {
      throw new GraphLoadError(`Unable to read graph source ${file}`, {
        cause: error,
      });
    }

    const graph = this.parse(text);
    logger.info(
      `Loaded ${graph.edges.length} edges from ${file}`,
      LogCategory.GRAPH,
      { totalWeight: graph.totalWeight },
    );
    return graph;
  }

  public parse(text: string): MazeGraph {
    const tokens = tokenize(text);
    const needed = this.edgeCount * 3;

    if (tokens.length < needed) {
      const found = Math.floor(tokens.length / 3);
      throw new GraphLoadError(
        `Expected ${this.edgeCount} edges but found ${found}`,
        { line: tokens.at(-1)?.line },
      );
    }
    if (tokens.length > needed) {
      throw new GraphLoadError(
        `Unexpected data after edge ${this.edgeCount}: "${tokens[needed].value}"`,
        { line: tokens[needed].line },
      );
    }

    const edges: Edge[] = [];
    for (let i = 0; i < needed; i += 3) {
      edges.push(parseTriple(tokens[i], tokens[i + 1], tokens[i + 2]));
    }

    const graph = new MazeGraph(edges);
    if (!Number.isSafeInteger(graph.totalWeight + 1)) {
      throw new GraphLoadError(
        `Total edge weight ${graph.totalWeight} is too large to compare exactly`,
      );
    }
    const budget = SIMULATION_CONSTANTS.GRAPH.CLASSIC_DISTANCE_BUDGET;
    if (graph.totalWeight >= budget) {
      logger.warn(
        `Total edge weight ${graph.totalWeight} exceeds the classic budget of ${budget}`,
        LogCategory.GRAPH,
      );
    }
    return graph;
  }
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  text.split(/\r?\n/).forEach((content, index) => {
    for (const value of content.split(/\s+/)) {
      if (value) tokens.push({ value, line: index + 1 });
    }
  });
  return tokens;
}

function parseTriple(fromToken: Token, toToken: Token, weightToken: Token): Edge {
  const from = parseMazeNode(fromToken.value);
  if (!from) {
    throw new GraphLoadError(`Unknown node "${fromToken.value}"`, {
      line: fromToken.line,
    });
  }
  const to = parseMazeNode(toToken.value);
  if (!to) {
    throw new GraphLoadError(`Unknown node "${toToken.value}"`, {
      line: toToken.line,
    });
  }
  if (!WEIGHT_PATTERN.test(weightToken.value)) {
    throw new GraphLoadError(
      `Weight must be a non-negative integer, got "${weightToken.value}"`,
      { line: weightToken.line },
    );
  }
  const weight = parseInt(weightToken.value, 10);
  if (!Number.isSafeInteger(weight)) {
    throw new GraphLoadError(
      `Weight "${weightToken.value}" is too large to represent exactly`,
      { line: weightToken.line },
    );
  }
  return { from, to, weight };
}
