import type { PopulatedLevel } from "../pipeline/types";
import { isConnected } from "./diameter";

/**
 * Summary numbers of an analyzed level
 */
export interface LevelMetrics {
  readonly roomCount: number;
  readonly corridorCount: number;
  /** Edges between two areas, resource links excluded */
  readonly areaEdgeCount: number;
  readonly diameter: number;
  readonly resourceCounts: Readonly<Record<string, number>>;
  /** Mean normalized visibility of the placed objects, 0 when none */
  readonly meanPlacedVisibility: number;
  readonly connected: boolean;
}

export function collectLevelMetrics(level: PopulatedLevel): LevelMetrics {
  const graph = level.roomGraph;

  let corridorCount = 0;
  for (const area of graph.areaNodes()) {
    if (area.isCorridor) corridorCount++;
  }

  let areaEdgeCount = 0;
  for (const edge of graph.edges()) {
    if (
      graph.getNode(edge.from)?.kind === "area" &&
      graph.getNode(edge.to)?.kind === "area"
    ) {
      areaEdgeCount++;
    }
  }

  const resourceCounts: Record<string, number> = {};
  let visibilitySum = 0;
  for (const object of level.placed) {
    resourceCounts[object.symbol] = (resourceCounts[object.symbol] ?? 0) + 1;
    visibilitySum += level.visibility.get(object.x, object.y);
  }

  return {
    roomCount: graph.areaNodes().length - corridorCount,
    corridorCount,
    areaEdgeCount,
    diameter: level.diameter,
    resourceCounts,
    meanPlacedVisibility:
      level.placed.length > 0 ? visibilitySum / level.placed.length : 0,
    connected: isConnected(graph),
  };
}
