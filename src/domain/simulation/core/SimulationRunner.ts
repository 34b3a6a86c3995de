import { EventEmitter } from "node:events";
import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { SimulationConfig } from "@/config/config";
import type { MazeGraph } from "@/domain/maze/MazeGraph";
import type { ShortestPathEngine } from "@/domain/simulation/systems/pathfinding/ShortestPathEngine";
import type { DriveTracker } from "@/domain/simulation/systems/drives/DriveTracker";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { ENTRANCE_NODE, MazeNode } from "@/shared/constants/MazeEnums";
import type { DriveType, NeedKind } from "@/shared/constants/DriveEnums";
import { NODE_DRIVE } from "@/shared/constants/SimulationConstants";
import {
  RunnerState,
  SimulationEventType,
} from "@/shared/constants/EventEnums";
import {
  IterationLimitError,
  SimulationStateError,
} from "@/shared/errors/SimulationErrors";
import type {
  DrivePercentages,
  DriveState,
  IterationReport,
  SimulationSummary,
} from "@/shared/types/simulation/drives";
import type { RouteResult } from "@/shared/types/simulation/maze";

/**
 * Payloads carried by each runner event.
 */
export interface SimulationEvents {
  [SimulationEventType.ITERATION_STARTED]: {
    iteration: number;
    location: MazeNode;
    drives: DriveState;
    percentages: DrivePercentages;
    need: NeedKind;
  };
  [SimulationEventType.ROUTE_FOUND]: {
    iteration: number;
    origin: MazeNode;
    route: RouteResult;
  };
  [SimulationEventType.NEED_SATISFIED]: {
    iteration: number;
    node: MazeNode;
    drive: DriveType;
    drives: DriveState;
  };
  [SimulationEventType.ITERATION_COMPLETED]: IterationReport;
  [SimulationEventType.SIMULATION_FINISHED]: SimulationSummary;
}

type Listener<E extends SimulationEventType> = (
  payload: SimulationEvents[E],
) => void;

/**
 * Drives the rat through the maze until it returns to the entrance.
 *
 * Each iteration classifies the dominant need, routes to the node that
 * satisfies it, decays every drive by the distance travelled and refills the
 * drive of the node reached. The first iteration always runs, even for a rat
 * that starts satisfied at the entrance.
 */
@injectable()
export class SimulationRunner {
  private readonly emitter = new EventEmitter();
  private drives?: DriveState;
  private location: MazeNode = ENTRANCE_NODE;
  private iteration = 0;
  private totalDistance = 0;
  private reports: IterationReport[] = [];
  private runnerState = RunnerState.TRAVELING;

  constructor(
    @inject(TYPES.MazeGraph) private readonly graph: MazeGraph,
    @inject(TYPES.ShortestPathEngine)
    private readonly pathEngine: ShortestPathEngine,
    @inject(TYPES.DriveTracker) private readonly driveTracker: DriveTracker,
    @inject(TYPES.SimulationConfig) private readonly config: SimulationConfig,
  ) {}

  public on<E extends SimulationEventType>(event: E, listener: Listener<E>): void {
    this.emitter.on(event, listener);
  }

  public off<E extends SimulationEventType>(event: E, listener: Listener<E>): void {
    this.emitter.off(event, listener);
  }

  private emit<E extends SimulationEventType>(
    event: E,
    payload: SimulationEvents[E],
  ): void {
    this.emitter.emit(event, payload);
  }

  /**
   * Resets the run. Drives are drawn from the tracker unless supplied.
   */
  public initialize(drives?: DriveState): void {
    this.drives = drives ? { ...drives } : this.driveTracker.init();
    this.location = ENTRANCE_NODE;
    this.iteration = 0;
    this.totalDistance = 0;
    this.reports = [];
    this.runnerState = RunnerState.TRAVELING;
    logger.setTick(0);
    logger.info("Rat placed at the entrance", LogCategory.SIMULATION, {
      drives: this.drives,
    });
  }

  public get state(): RunnerState {
    return this.runnerState;
  }

  public get currentLocation(): MazeNode {
    return this.location;
  }

  public get currentDrives(): DriveState | undefined {
    return this.drives ? { ...this.drives } : undefined;
  }

  public currentPercentages(): DrivePercentages {
    return this.driveTracker.percentages(this.currentDrivesOrThrow());
  }

  public isTerminated(): boolean {
    return this.runnerState === RunnerState.TERMINATED;
  }

  /**
   * Runs a single travel-and-satisfy iteration.
   */
  public step(): IterationReport {
    if (this.runnerState === RunnerState.TERMINATED) {
      throw new SimulationStateError("Simulation already terminated");
    }
    if (!this.drives) {
      this.initialize();
    }
    if (this.iteration >= this.config.maxIterations) {
      logger.error(
        `Iteration limit ${this.config.maxIterations} reached at ${this.location}`,
        LogCategory.SIMULATION,
      );
      throw new IterationLimitError(this.config.maxIterations);
    }

    const drivesBefore = this.currentDrivesOrThrow();
    const iteration = ++this.iteration;
    logger.setTick(iteration);

    const percentages = this.driveTracker.percentages(drivesBefore);
    const need = this.driveTracker.classify(percentages);
    const origin = this.location;
    this.emit(SimulationEventType.ITERATION_STARTED, {
      iteration,
      location: origin,
      drives: { ...drivesBefore },
      percentages,
      need,
    });

    const route = this.pathEngine.shortestPath(
      this.graph.copyEdges(),
      origin,
      this.driveTracker.destinationFor(need),
    );
    this.emit(SimulationEventType.ROUTE_FOUND, { iteration, origin, route });

    const decayed = this.driveTracker.decay(drivesBefore, route.distance);
    this.location = route.destination;
    this.totalDistance += route.distance;
    this.runnerState = RunnerState.SATISFYING;

    const satisfied = this.driveTracker.satisfy(decayed, this.location);
    this.drives = satisfied;
    const drive = NODE_DRIVE[this.location];
    if (drive) {
      this.emit(SimulationEventType.NEED_SATISFIED, {
        iteration,
        node: this.location,
        drive,
        drives: { ...satisfied },
      });
    }

    this.runnerState =
      this.location === ENTRANCE_NODE
        ? RunnerState.TERMINATED
        : RunnerState.TRAVELING;

    const report: IterationReport = {
      iteration,
      origin,
      destination: route.destination,
      need,
      percentages,
      distance: route.distance,
      path: route.path,
      drives: { ...satisfied },
      terminated: this.isTerminated(),
    };
    this.reports.push(report);
    logger.info(
      `Iteration ${iteration}: ${need} ${origin} -> ${route.destination} (${route.distance})`,
      LogCategory.SIMULATION,
    );
    this.emit(SimulationEventType.ITERATION_COMPLETED, report);

    if (report.terminated) {
      this.emit(SimulationEventType.SIMULATION_FINISHED, this.getSummary());
    }
    return report;
  }

  /**
   * Steps until the rat is back at the entrance.
   */
  public run(): SimulationSummary {
    do {
      this.step();
    } while (!this.isTerminated());
    return this.getSummary();
  }

  public getSummary(): SimulationSummary {
    return {
      iterations: this.iteration,
      finalLocation: this.location,
      finalDrives: this.currentDrivesOrThrow(),
      totalDistance: this.totalDistance,
      reports: [...this.reports],
    };
  }

  private currentDrivesOrThrow(): DriveState {
    if (!this.drives) {
      throw new SimulationStateError("Simulation has not been initialized");
    }
    return { ...this.drives };
  }
}
