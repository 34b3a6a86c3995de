import type { Readable, Writable } from "node:stream";
import type { Container } from "inversify";
import type { CONFIG } from "./config/config";
import { TYPES } from "./config/Types";
import type { SimulationRunner } from "./domain/simulation/core/SimulationRunner";
import { SimulationEventType } from "./shared/constants/EventEnums";
import { GraphLoadError } from "./shared/errors/SimulationErrors";
import { ConsoleInterface } from "./application/cli/ConsoleInterface";
import {
  arrivalLines,
  driveLines,
  graphLoadFailureLines,
  introLines,
  needLine,
  outroLines,
  travelLines,
} from "./application/narrative/Narrator";
import { logger, LogCategory } from "./infrastructure/utils/logger";

export interface AppOptions {
  container: Container;
  config: Pick<typeof CONFIG, "PAUSE" | "RAT_NAME">;
  input: Readable;
  output: Writable;
}

/**
 * Runs one console session and resolves with the process exit code.
 */
export async function runApp({
  container,
  config,
  input,
  output,
}: AppOptions): Promise<number> {
  const cli = new ConsoleInterface({
    input,
    output,
    pause: config.PAUSE,
    defaultName: config.RAT_NAME,
  });

  try {
    let runner: SimulationRunner;
    try {
      runner = container.get<SimulationRunner>(TYPES.SimulationRunner);
    } catch (error) {
      if (error instanceof GraphLoadError) {
        logger.error(error.message, LogCategory.GRAPH, { line: error.line });
        cli.print(graphLoadFailureLines());
        await cli.pause();
        return 1;
      }
      throw error;
    }

    cli.print(introLines());
    const name = await cli.promptName();

    runner.on(SimulationEventType.SIMULATION_FINISHED, (summary) => {
      logger.info(
        `${name} left the maze after ${summary.iterations} iterations`,
        LogCategory.SIMULATION,
        { totalDistance: summary.totalDistance },
      );
    });

    runner.initialize();
    do {
      cli.print(driveLines(name, runner.currentPercentages()));
      await cli.pause();
      const report = runner.step();
      cli.print(needLine(name, report.need));
      cli.print(travelLines(report.destination, report.distance));
      cli.print(arrivalLines(name, report.destination));
    } while (!runner.isTerminated());

    cli.print(outroLines(name));
    await cli.pause();
    return 0;
  } catch (error) {
    logger.error(
      error instanceof Error ? error.message : String(error),
      LogCategory.SIMULATION,
    );
    return 1;
  } finally {
    cli.close();
    await logger.flush();
  }
}
