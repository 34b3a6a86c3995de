import type { MazeNode } from "../../constants/MazeEnums";

/**
 * Directed weighted edge between two maze locations.
 */
export interface Edge {
  from: MazeNode;
  to: MazeNode;
  /** Non-negative integer cost */
  weight: number;
}

export type EdgeList = readonly Edge[];

/**
 * Result of a shortest-path search.
 */
export interface RouteResult {
  /** Accumulated cost from origin to destination */
  distance: number;
  /** Node the rat ends up at; always the requested target */
  destination: MazeNode;
  /** Node sequence from origin to destination, both included */
  path: MazeNode[];
}
