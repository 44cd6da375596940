/**
 * Room scoring: how well an area suits the next object of a kind.
 */

import { shortestPathLengths } from "../core/graph/shortest-paths";
import type { ReadonlyTileGrid } from "../core/grid/types";
import type { AreaNode, ReadonlyRoomGraph } from "../graphs/room-graph";
import { PROXIMITY_WEIGHT } from "./constants";
import { candidateTiles } from "./tile-fit";
import type { PlacementStep } from "./types";

export interface RoomFitContext {
  readonly graph: ReadonlyRoomGraph;
  /** Interval fit of every area node for the current step */
  readonly degreeFit: ReadonlyMap<string, number>;
  readonly diameter: number;
}

export interface RoomScore {
  readonly fit: number;
  /** Graph distance to the nearest related resource, over the diameter */
  readonly distance: number;
  readonly redundancy: number;
  readonly total: number;
}

/**
 * Smallest weighted path length from `areaId` to a resource whose symbol is
 * in `symbols`. Unreachable resources count as 0. `undefined` when the graph
 * holds no such resource.
 */
export function nearestResourceDistance(
  graph: ReadonlyRoomGraph,
  areaId: string,
  symbols: ReadonlySet<string>,
): number | undefined {
  const related = graph
    .resourceNodes()
    .filter((node) => symbols.has(node.symbol));
  if (related.length === 0) return undefined;

  const distances = shortestPathLengths(graph, areaId);
  let nearest = Infinity;
  for (const node of related) {
    const distance = distances.get(node.id) ?? 0;
    if (distance < nearest) nearest = distance;
  }
  return nearest;
}

export function scoreRoom(
  area: AreaNode,
  step: PlacementStep,
  ctx: RoomFitContext,
): RoomScore {
  const fit = ctx.degreeFit.get(area.id) ?? 0;

  const nearest = nearestResourceDistance(
    ctx.graph,
    area.id,
    step.proximitySymbols,
  );
  const distance =
    nearest === undefined || ctx.diameter === 0 ? 0 : nearest / ctx.diameter;

  let sameKind = 0;
  for (const neighborId of ctx.graph.neighbors(area.id).keys()) {
    const neighbor = ctx.graph.getNode(neighborId);
    if (neighbor?.kind === "resource" && neighbor.symbol === step.symbol) {
      sameKind++;
    }
  }
  const redundancy = step.targetCount > 0 ? sameKind / step.targetCount : 0;

  return {
    fit,
    distance,
    redundancy,
    total: fit + distance * PROXIMITY_WEIGHT - redundancy,
  };
}

/**
 * Area nodes with at least one free floor tile in the step's tile span,
 * in graph order.
 */
export function candidateRooms(
  graph: ReadonlyRoomGraph,
  grid: ReadonlyTileGrid,
  step: PlacementStep,
): AreaNode[] {
  return graph
    .areaNodes()
    .filter(
      (area) => candidateTiles(area.bounds, grid, step.includeFarEdge).length > 0,
    );
}
