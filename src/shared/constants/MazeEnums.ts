/**
 * Maze topology enumerations.
 *
 * The maze has a fixed set of seven locations. Each enum value is the
 * single-character symbol used in the graph source file, and each node owns
 * a stable integer index for array-backed distance tracking.
 *
 * @module shared/constants/MazeEnums
 */

/**
 * Enumeration of maze locations.
 */
export enum MazeNode {
  EXIT = "E",
  NEST = "N",
  FOOD = "F",
  /** Junction without an attached drive */
  JUNCTION_A = "A",
  WHEEL = "W",
  /** Junction without an attached drive */
  JUNCTION_B = "B",
  MEDICINE = "M",
}

/**
 * Index-to-node table. Position in this array is the node index.
 */
export const NODE_ORDER: readonly MazeNode[] = [
  MazeNode.EXIT,
  MazeNode.NEST,
  MazeNode.FOOD,
  MazeNode.JUNCTION_A,
  MazeNode.WHEEL,
  MazeNode.JUNCTION_B,
  MazeNode.MEDICINE,
];

/**
 * Node-to-index table.
 */
export const NODE_INDEX: Readonly<Record<MazeNode, number>> = {
  [MazeNode.EXIT]: 0,
  [MazeNode.NEST]: 1,
  [MazeNode.FOOD]: 2,
  [MazeNode.JUNCTION_A]: 3,
  [MazeNode.WHEEL]: 4,
  [MazeNode.JUNCTION_B]: 5,
  [MazeNode.MEDICINE]: 6,
};

export const NODE_COUNT = NODE_ORDER.length;

/** The rat is released here and collected from here. */
export const ENTRANCE_NODE = MazeNode.EXIT;

const NODE_BY_SYMBOL = new Map<string, MazeNode>(
  NODE_ORDER.map((node) => [node, node]),
);

/**
 * Resolves a graph-file symbol to its node.
 */
export function parseMazeNode(symbol: string): MazeNode | undefined {
  return NODE_BY_SYMBOL.get(symbol);
}
