/**
 * Consolidated simulation constants.
 *
 * @module shared/constants/SimulationConstants
 */

import { DriveType, NeedKind } from "./DriveEnums";
import { MazeNode } from "./MazeEnums";

/**
 * Consolidated simulation constants organized by domain.
 */
export const SIMULATION_CONSTANTS = {
  GRAPH: {
    /** Number of directed edges in a graph source. */
    EDGE_COUNT: 18,
    /** Historical distance budget the bundled maze was designed under. */
    CLASSIC_DISTANCE_BUDGET: 42,
  },

  DRIVES: {
    /** Upper bound of each drive. */
    MAX: {
      [DriveType.FUN]: 35,
      [DriveType.HEALTH]: 60,
      [DriveType.HUNGER]: 30,
      [DriveType.SLEEP]: 40,
    },
    /** Above this percentage the dominant need becomes EXIT. */
    EXIT_THRESHOLD_PERCENT: 50,
  },

  LOOP: {
    DEFAULT_MAX_ITERATIONS: 100,
  },
} as const;

export const DRIVE_MAX = SIMULATION_CONSTANTS.DRIVES.MAX;

/**
 * Node the rat heads to for each need.
 */
export const NEED_DESTINATION: Readonly<Record<NeedKind, MazeNode>> = {
  [NeedKind.EXERCISE]: MazeNode.WHEEL,
  [NeedKind.MEDICINE]: MazeNode.MEDICINE,
  [NeedKind.FOOD]: MazeNode.FOOD,
  [NeedKind.NAP]: MazeNode.NEST,
  [NeedKind.EXIT]: MazeNode.EXIT,
};

/**
 * Drive refilled on arrival at a node. Nodes without an entry refill nothing.
 */
export const NODE_DRIVE: Readonly<Partial<Record<MazeNode, DriveType>>> = {
  [MazeNode.FOOD]: DriveType.HUNGER,
  [MazeNode.MEDICINE]: DriveType.HEALTH,
  [MazeNode.NEST]: DriveType.SLEEP,
  [MazeNode.WHEEL]: DriveType.FUN,
};
