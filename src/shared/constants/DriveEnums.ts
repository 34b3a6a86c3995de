/**
 * Drive and need enumerations for the rat.
 *
 * @module shared/constants/DriveEnums
 */

/**
 * Enumeration of the rat's internal drives.
 */
export enum DriveType {
  FUN = "fun",
  HEALTH = "health",
  HUNGER = "hunger",
  SLEEP = "sleep",
}

/**
 * Enumeration of need classifications.
 * EXIT means every drive is satisfied enough to leave the maze.
 */
export enum NeedKind {
  EXERCISE = "exercise",
  MEDICINE = "medicine",
  FOOD = "food",
  NAP = "nap",
  EXIT = "exit",
}

/**
 * Order in which drives are drawn at initialization.
 */
export const DRIVE_INIT_ORDER: readonly DriveType[] = [
  DriveType.FUN,
  DriveType.HEALTH,
  DriveType.HUNGER,
  DriveType.SLEEP,
];
