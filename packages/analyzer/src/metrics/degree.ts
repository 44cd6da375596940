/**
 * Degree normalization and interval fitting used to rank rooms by
 * connectivity.
 */

import type {
  GraphNode,
  ReadonlyWeightedGraph,
} from "../core/graph/weighted-graph";

/**
 * Closed target interval on normalized degree
 */
export interface DegreeInterval {
  readonly low: number;
  readonly high: number;
}

/**
 * Map each node id to `degree / (maxDegree + minDegree)`.
 * Every node maps to 0 when the denominator is 0.
 */
export function normalizeDegrees<TNode extends GraphNode>(
  graph: ReadonlyWeightedGraph<TNode>,
): Map<string, number> {
  let max = -Infinity;
  let min = Infinity;
  for (const node of graph.nodes()) {
    const degree = graph.degree(node.id);
    if (degree > max) max = degree;
    if (degree < min) min = degree;
  }

  const denominator = max + min;
  const normalized = new Map<string, number>();
  for (const node of graph.nodes()) {
    normalized.set(
      node.id,
      denominator > 0 ? graph.degree(node.id) / denominator : 0,
    );
  }
  return normalized;
}

/**
 * Distance of `value` from both ends of an interval, on absolute values.
 */
export function intervalDistance(
  low: number,
  high: number,
  value: number,
): number {
  const v = Math.abs(value);
  return Math.abs(Math.abs(low) - v) + Math.abs(Math.abs(high) - v);
}

/**
 * Rescale interval distances so the closest value scores 1 and the farthest
 * scores 0. When every distance is equal, every entry scores 1.
 */
export function intervalFit(
  values: ReadonlyMap<string, number>,
  interval: DegreeInterval,
): Map<string, number> {
  const distances = new Map<string, number>();
  let min = Infinity;
  let max = -Infinity;
  for (const [id, value] of values) {
    const d = intervalDistance(interval.low, interval.high, value);
    distances.set(id, d);
    if (d < min) min = d;
    if (d > max) max = d;
  }

  const range = max - min;
  const fit = new Map<string, number>();
  for (const [id, d] of distances) {
    fit.set(id, range > 0 ? 1 - (d - min) / range : 1);
  }
  return fit;
}
