/**
 * Simulation event names emitted by the runner.
 *
 * @module shared/constants/EventEnums
 */
export enum SimulationEventType {
  ITERATION_STARTED = "iterationStarted",
  ROUTE_FOUND = "routeFound",
  NEED_SATISFIED = "needSatisfied",
  ITERATION_COMPLETED = "iterationCompleted",
  SIMULATION_FINISHED = "simulationFinished",
}

/**
 * Runner lifecycle states.
 */
export enum RunnerState {
  TRAVELING = "traveling",
  SATISFYING = "satisfying",
  TERMINATED = "terminated",
}
