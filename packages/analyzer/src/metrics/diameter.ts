/**
 * Weighted diameter and connectivity of a graph.
 */

import type {
  GraphNode,
  ReadonlyWeightedGraph,
} from "../core/graph/weighted-graph";
import { shortestPathLengths } from "../core/graph/shortest-paths";

/**
 * Longest finite shortest-path distance between any two nodes.
 * Pairs in different components are ignored; a graph without a connected
 * pair has diameter 0.
 */
export function computeDiameter<TNode extends GraphNode>(
  graph: ReadonlyWeightedGraph<TNode>,
): number {
  let diameter = 0;
  for (const node of graph.nodes()) {
    for (const distance of shortestPathLengths(graph, node.id).values()) {
      if (distance > diameter) diameter = distance;
    }
  }
  return diameter;
}

/**
 * Check that every node is reachable from the first one.
 * Empty graphs count as connected.
 */
export function isConnected<TNode extends GraphNode>(
  graph: ReadonlyWeightedGraph<TNode>,
): boolean {
  for (const node of graph.nodes()) {
    return shortestPathLengths(graph, node.id).size === graph.nodeCount;
  }
  return true;
}
