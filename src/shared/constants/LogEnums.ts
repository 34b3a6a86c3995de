/**
 * Log level enumerations for the simulation system.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which subsystem generated the log.
 */
export enum LogCategory {
  /** Simulation loop and state transitions */
  SIMULATION = "simulation",
  /** Drive decay, satisfaction and need classification */
  DRIVES = "drives",
  /** Shortest-path searches */
  PATHFINDING = "pathfinding",
  /** Graph source loading */
  GRAPH = "graph",
  /** Console interaction */
  CLI = "cli",
  /** General/uncategorized logs */
  GENERAL = "general",
}

/**
 * Severity order used for minimum-level filtering.
 */
export const LOG_LEVEL_SEVERITY: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};
