import { injectable } from "inversify";
import type { EdgeList, RouteResult } from "@/shared/types/simulation/maze";
import {
  MazeNode,
  NODE_COUNT,
  NODE_INDEX,
  NODE_ORDER,
} from "@/shared/constants/MazeEnums";
import { UnreachableNodeError } from "@/shared/errors/SimulationErrors";
import { copyEdges, sentinelDistance } from "@/domain/maze/MazeGraph";
import { logger, LogCategory } from "@/infrastructure/utils/logger";

/**
 * Dijkstra-style single-source search over a small directed maze.
 *
 * The search consumes a private copy of the edge list: once a node is
 * finalized, every edge terminating at it is dropped from the working set so
 * it can never be entered again. Visited nodes are tracked explicitly; a
 * distance of 0 is only ever the distance of the origin.
 */
@injectable()
export class ShortestPathEngine {
  public shortestPath(edges: EdgeList, from: MazeNode, to: MazeNode): RouteResult {
    const infinity = sentinelDistance(edges);
    const distance = new Array<number>(NODE_COUNT).fill(infinity);
    const previous = new Array<MazeNode | undefined>(NODE_COUNT).fill(undefined);
    const visited = new Set<MazeNode>();
    let working = copyEdges(edges);

    let current = from;
    distance[NODE_INDEX[from]] = 0;

    // Each pass finalizes one node, so the loop runs at most NODE_COUNT times.
    while (current !== to) {
      const currentDistance = distance[NODE_INDEX[current]];

      for (const edge of working) {
        if (edge.from !== current) continue;
        const target = NODE_INDEX[edge.to];
        const candidate = currentDistance + edge.weight;
        if (candidate < distance[target]) {
          distance[target] = candidate;
          previous[target] = current;
        }
      }

      const finalized = current;
      working = working.filter((edge) => edge.to !== finalized);
      visited.add(finalized);

      const next = selectNearest(distance, visited, infinity);
      if (next === undefined) {
        logger.warn(
          `No route from ${from} to ${to}`,
          LogCategory.PATHFINDING,
          { visited: [...visited] },
        );
        throw new UnreachableNodeError(from, to);
      }
      current = next;
    }

    const result: RouteResult = {
      distance: distance[NODE_INDEX[to]],
      destination: to,
      path: buildPath(previous, from, to),
    };
    logger.debug(
      `Route ${result.path.join(" -> ")} costs ${result.distance}`,
      LogCategory.PATHFINDING,
    );
    return result;
  }
}

/**
 * Unvisited node with the strictly smallest finite distance.
 * Ties go to the lowest node index.
 */
function selectNearest(
  distance: readonly number[],
  visited: ReadonlySet<MazeNode>,
  infinity: number,
): MazeNode | undefined {
  let best: MazeNode | undefined;
  let bestDistance = infinity;

  for (let index = 0; index < NODE_ORDER.length; index++) {
    const node = NODE_ORDER[index];
    if (visited.has(node)) continue;
    if (distance[index] < bestDistance) {
      bestDistance = distance[index];
      best = node;
    }
  }

  return best;
}

function buildPath(
  previous: ReadonlyArray<MazeNode | undefined>,
  from: MazeNode,
  to: MazeNode,
): MazeNode[] {
  const path: MazeNode[] = [to];
  let node = to;
  while (node !== from) {
    const prior = previous[NODE_INDEX[node]];
    if (prior === undefined) break;
    path.unshift(prior);
    node = prior;
  }
  return path;
}
