/**
 * Weighted shortest paths over a WeightedGraph.
 */

import { MinHeap } from "../data-structures/min-heap";
import type { GraphNode, ReadonlyWeightedGraph } from "./weighted-graph";

/**
 * Dijkstra distances from `sourceId` to every reachable node.
 * Unreachable nodes are absent from the returned map.
 */
export function shortestPathLengths<TNode extends GraphNode>(
  graph: ReadonlyWeightedGraph<TNode>,
  sourceId: string,
): Map<string, number> {
  const distances = new Map<string, number>();
  if (!graph.hasNode(sourceId)) return distances;

  const settled = new Set<string>();
  const heap = new MinHeap<string>();
  distances.set(sourceId, 0);
  heap.push(sourceId, 0);

  while (!heap.isEmpty) {
    const current = heap.pop();
    if (current === undefined || settled.has(current)) continue;
    settled.add(current);

    const base = distances.get(current) ?? 0;
    for (const [neighbor, weight] of graph.neighbors(current)) {
      if (settled.has(neighbor)) continue;
      const candidate = base + weight;
      const known = distances.get(neighbor);
      if (known === undefined || candidate < known) {
        distances.set(neighbor, candidate);
        heap.push(neighbor, candidate);
      }
    }
  }

  return distances;
}

/**
 * Weighted distance between two nodes, or `undefined` when unreachable.
 */
export function shortestPathLength<TNode extends GraphNode>(
  graph: ReadonlyWeightedGraph<TNode>,
  fromId: string,
  toId: string,
): number | undefined {
  return shortestPathLengths(graph, fromId).get(toId);
}
