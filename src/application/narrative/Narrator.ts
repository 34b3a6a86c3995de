import { MazeNode } from "@/shared/constants/MazeEnums";
import { NeedKind } from "@/shared/constants/DriveEnums";
import type { DrivePercentages } from "@/shared/types/simulation/drives";

/**
 * Flavor text for the console run. Every function returns the lines to print
 * and leaves printing to the caller.
 */

export function introLines(): string[] {
  return [
    "~~ Flowers for Algorithm ~~",
    "",
    "The scientist places the rat in the vestibule of a maze.",
    "The rat is a thinly veiled metaphor for the tenuous nature of human existence.",
  ];
}

export function driveLines(name: string, percent: DrivePercentages): string[] {
  return [
    `${name} is currently feeling: `,
    `\t${percent.fun}% entertained`,
    `\t${percent.health}% healthy`,
    `\t${percent.hunger}% nourished`,
    `\t${percent.sleep}% rested`,
  ];
}

const NEED_SENTENCES: Record<NeedKind, (name: string) => string> = {
  [NeedKind.EXIT]: (name) =>
    `${name} is feeling satisfied and is going to the exit for release.`,
  [NeedKind.FOOD]: (name) => `${name} is hungry and is going to the food bowl.`,
  [NeedKind.MEDICINE]: (name) =>
    `${name} is feeling sick and is going to the medicine dispenser.`,
  [NeedKind.NAP]: (name) => `${name} is sleepy and is going to the nest for a nap.`,
  [NeedKind.EXERCISE]: (name) =>
    `${name} is bored and is going to the exercise wheel.`,
};

export function needLine(name: string, need: NeedKind): string {
  return NEED_SENTENCES[need](name);
}

export function travelLines(destination: MazeNode, distance: number): string[] {
  return [
    `\tTraveling to node ${destination}.`,
    `\tTraveled a total of ${distance} distance units.`,
  ];
}

const ARRIVAL_TEXT: Partial<Record<MazeNode, (name: string) => string[]>> = {
  [MazeNode.FOOD]: (name) => [
    `${name} has reached the food bowl.`,
    `${name} finds a tasty kibble to chew on. Mmmm, lab diets.`,
  ],
  [MazeNode.MEDICINE]: (name) => [
    `${name} has reached the medical pod.`,
    `YUCK! That medicine is disgusting, but ${name} feels much better now.`,
  ],
  [MazeNode.NEST]: (name) => [
    `${name} has reached the rat's nest.`,
    "Off to dreamland!",
    `${name} is bright-eyed and ready to go after that refreshing nap!`,
  ],
  [MazeNode.WHEEL]: (name) => [
    `${name} has reached the exercise wheel.`,
    "The wheel goes squeak, squeak, squeak, squeak, squeak, squeak.",
  ],
};

/**
 * Arrival text for nodes that refill a drive; empty for the others.
 */
export function arrivalLines(name: string, node: MazeNode): string[] {
  return ARRIVAL_TEXT[node]?.(name) ?? [];
}

export function outroLines(name: string): string[] {
  return [
    `The scientist removes ${name} from the maze and jots in her notebook:`,
    "\t'Science accomplished.'",
    "THE END",
  ];
}

export function graphLoadFailureLines(): string[] {
  return [
    "Failed to load graph. Program unable to continue.",
    "Check the location of graphWeights and try again.",
  ];
}
