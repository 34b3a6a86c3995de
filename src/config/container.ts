import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, toSimulationConfig, type SimulationConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * All services are singletons. The maze graph is loaded lazily on first
 * resolution, so building a container never touches the filesystem and a
 * missing graph surfaces as a GraphLoadError from `get`.
 *
 * @module config
 */
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { ShortestPathEngine } from "../domain/simulation/systems/pathfinding/ShortestPathEngine";
import { DriveTracker } from "../domain/simulation/systems/drives/DriveTracker";
import { GraphLoader } from "../infrastructure/services/graph/GraphLoader";
import type { MazeGraph } from "../domain/maze/MazeGraph";
import { SeededRandom, type RandomSource } from "../shared/utils/RandomUtils";

export function buildContainer(
  config: SimulationConfig = toSimulationConfig(CONFIG),
): Container {
  const container = new Container();

  container
    .bind<SimulationConfig>(TYPES.SimulationConfig)
    .toConstantValue(config);

  container
    .bind<RandomSource>(TYPES.RandomSource)
    .toDynamicValue(() => new SeededRandom(config.seed))
    .inSingletonScope();

  container.bind<GraphLoader>(TYPES.GraphLoader).to(GraphLoader).inSingletonScope();

  container
    .bind<MazeGraph>(TYPES.MazeGraph)
    .toDynamicValue((context) =>
      context.container.get<GraphLoader>(TYPES.GraphLoader).load(),
    )
    .inSingletonScope();

  container
    .bind<ShortestPathEngine>(TYPES.ShortestPathEngine)
    .to(ShortestPathEngine)
    .inSingletonScope();

  container
    .bind<DriveTracker>(TYPES.DriveTracker)
    .to(DriveTracker)
    .inSingletonScope();

  container
    .bind<SimulationRunner>(TYPES.SimulationRunner)
    .to(SimulationRunner)
    .inSingletonScope();

  return container;
}

export const container = buildContainer();
