import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { RandomSource } from "@/shared/utils/RandomUtils";
import type {
  DrivePercentages,
  DriveState,
} from "@/shared/types/simulation/drives";
import {
  DRIVE_INIT_ORDER,
  DriveType,
  NeedKind,
} from "@/shared/constants/DriveEnums";
import type { MazeNode } from "@/shared/constants/MazeEnums";
import {
  DRIVE_MAX,
  NEED_DESTINATION,
  NODE_DRIVE,
  SIMULATION_CONSTANTS,
} from "@/shared/constants/SimulationConstants";
import { logger, LogCategory } from "@/infrastructure/utils/logger";

/**
 * Challengers compared against the health baseline, in precedence order.
 * A challenger only wins on a strictly lower percentage.
 */
const CHALLENGERS: ReadonlyArray<{ drive: DriveType; need: NeedKind }> = [
  { drive: DriveType.HUNGER, need: NeedKind.FOOD },
  { drive: DriveType.SLEEP, need: NeedKind.NAP },
  { drive: DriveType.FUN, need: NeedKind.EXERCISE },
];

/**
 * Finite state machine over the rat's four bounded drives.
 *
 * Every operation returns a new {@link DriveState}; inputs are never mutated.
 */
@injectable()
export class DriveTracker {
  constructor(@inject(TYPES.RandomSource) private readonly random: RandomSource) {}

  /**
   * Draws each drive uniformly from [0, max).
   */
  public init(): DriveState {
    const draw = (drive: DriveType): number =>
      Math.floor(this.random.float() * DRIVE_MAX[drive]);

    // Draw order is part of the replay contract for a given seed.
    const drives: DriveState = { fun: 0, health: 0, hunger: 0, sleep: 0 };
    for (const drive of DRIVE_INIT_ORDER) {
      drives[drive] = draw(drive);
    }
    logger.debug("Initialized drives", LogCategory.DRIVES, drives);
    return drives;
  }

  public percentages(state: DriveState): DrivePercentages {
    const percent = (drive: DriveType): number =>
      Math.trunc((100 * state[drive]) / DRIVE_MAX[drive]);

    return {
      fun: percent(DriveType.FUN),
      health: percent(DriveType.HEALTH),
      hunger: percent(DriveType.HUNGER),
      sleep: percent(DriveType.SLEEP),
    };
  }

  /**
   * Picks the lowest drive, health first, then hunger, sleep and fun.
   * Returns EXIT once even the lowest drive is above the exit threshold.
   */
  public classify(percentages: DrivePercentages): NeedKind {
    let need = NeedKind.MEDICINE;
    let lowest = percentages.health;

    for (const { drive, need: challenger } of CHALLENGERS) {
      if (percentages[drive] < lowest) {
        lowest = percentages[drive];
        need = challenger;
      }
    }

    if (lowest > SIMULATION_CONSTANTS.DRIVES.EXIT_THRESHOLD_PERCENT) {
      return NeedKind.EXIT;
    }
    return need;
  }

  public decay(state: DriveState, distance: number): DriveState {
    return {
      fun: Math.max(0, state.fun - distance),
      health: Math.max(0, state.health - distance),
      hunger: Math.max(0, state.hunger - distance),
      sleep: Math.max(0, state.sleep - distance),
    };
  }

  /**
   * Refills the drive tied to the node the rat arrived at.
   */
  public satisfy(state: DriveState, arrivedAt: MazeNode): DriveState {
    const drive = NODE_DRIVE[arrivedAt];
    if (!drive) return { ...state };

    logger.debug(`Satisfied ${drive} at ${arrivedAt}`, LogCategory.DRIVES);
    return { ...state, [drive]: DRIVE_MAX[drive] };
  }

  public destinationFor(need: NeedKind): MazeNode {
    return NEED_DESTINATION[need];
  }
}
