import type { MazeNode } from "../../constants/MazeEnums";
import type { NeedKind } from "../../constants/DriveEnums";

/**
 * Raw drive levels, each bounded to [0, max].
 */
export interface DriveState {
  fun: number;
  health: number;
  hunger: number;
  sleep: number;
}

/**
 * Drive levels as truncated percentages of their maxima.
 */
export type DrivePercentages = DriveState;

/**
 * Everything observable about a single loop iteration.
 */
export interface IterationReport {
  iteration: number;
  origin: MazeNode;
  destination: MazeNode;
  need: NeedKind;
  percentages: DrivePercentages;
  distance: number;
  path: MazeNode[];
  /** Drives after decay and satisfaction */
  drives: DriveState;
  terminated: boolean;
}

export interface SimulationSummary {
  iterations: number;
  finalLocation: MazeNode;
  finalDrives: DriveState;
  totalDistance: number;
  reports: IterationReport[];
}
