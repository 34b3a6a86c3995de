/**
 * Dependency injection type symbols.
 *
 * Used by Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationRunner: Symbol.for("SimulationRunner"),
  SimulationConfig: Symbol.for("SimulationConfig"),
  RandomSource: Symbol.for("RandomSource"),

  GraphLoader: Symbol.for("GraphLoader"),
  MazeGraph: Symbol.for("MazeGraph"),
  ShortestPathEngine: Symbol.for("ShortestPathEngine"),
  DriveTracker: Symbol.for("DriveTracker"),
};
