import type { Edge, EdgeList } from "@/shared/types/simulation/maze";
import type { MazeNode } from "@/shared/constants/MazeEnums";

/**
 * Canonical, read-only edge list of the maze.
 *
 * Searches prune their working set, so they always receive a copy via
 * {@link MazeGraph.copyEdges}; the canonical list is frozen.
 */
export class MazeGraph {
  public readonly edges: EdgeList;
  public readonly totalWeight: number;

  constructor(edges: EdgeList) {
    this.edges = Object.freeze(edges.map((edge) => Object.freeze({ ...edge })));
    this.totalWeight = this.edges.reduce((sum, edge) => sum + edge.weight, 0);
  }

  /**
   * Sentinel "not reached" distance: larger than any path the graph can
   * produce, since no simple path uses an edge twice.
   */
  public get infinity(): number {
    return sentinelDistance(this.edges);
  }

  /**
   * Independent mutable duplicate of the edge list.
   */
  public copyEdges(): Edge[] {
    return copyEdges(this.edges);
  }

  public edgesFrom(node: MazeNode): EdgeList {
    return this.edges.filter((edge) => edge.from === node);
  }
}

export function copyEdges(edges: EdgeList): Edge[] {
  return edges.map((edge) => ({ ...edge }));
}

export function sentinelDistance(edges: EdgeList): number {
  return edges.reduce((sum, edge) => sum + edge.weight, 0) + 1;
}
