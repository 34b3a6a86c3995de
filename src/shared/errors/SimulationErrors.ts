import type { MazeNode } from "../constants/MazeEnums";

/**
 * Structural failures of the maze simulation.
 *
 * None of these are retryable. Each is raised once and surfaced by the
 * entry point with a non-zero exit code.
 *
 * @module shared/errors/SimulationErrors
 */

export enum SimulationErrorCode {
  GRAPH_LOAD = "GRAPH_LOAD",
  UNREACHABLE = "UNREACHABLE",
  ITERATION_LIMIT = "ITERATION_LIMIT",
  INVALID_STATE = "INVALID_STATE",
}

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Graph source missing or malformed. No partial graph is ever produced.
 */
export class GraphLoadError extends SimulationError {
  /** 1-based line in the source where parsing stopped, when known */
  public readonly line?: number;

  constructor(message: string, options?: { line?: number; cause?: unknown }) {
    super(SimulationErrorCode.GRAPH_LOAD, message, { cause: options?.cause });
    this.line = options?.line;
  }
}

export class UnreachableNodeError extends SimulationError {
  constructor(
    public readonly from: MazeNode,
    public readonly target: MazeNode,
  ) {
    super(
      SimulationErrorCode.UNREACHABLE,
      `Node ${target} cannot be reached from ${from}`,
    );
  }
}

export class IterationLimitError extends SimulationError {
  constructor(public readonly limit: number) {
    super(
      SimulationErrorCode.ITERATION_LIMIT,
      `Simulation did not reach the exit within ${limit} iterations`,
    );
  }
}

export class SimulationStateError extends SimulationError {
  constructor(message: string) {
    super(SimulationErrorCode.INVALID_STATE, message);
  }
}
