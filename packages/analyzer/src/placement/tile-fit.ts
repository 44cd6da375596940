/**
 * Tile scoring inside the chosen room.
 */

import { euclideanDistance } from "../core/geometry/operations";
import type { Bounds, Point } from "../core/geometry/types";
import type { ReadonlyTileGrid } from "../core/grid/types";
import type { VisibilityMatrix } from "../graphs/visibility";
import { OBJECT_DISTANCE_WEIGHT } from "./constants";
import type { PlacedObject, PlacementStep } from "./types";

export interface TileFitContext {
  readonly visibility: VisibilityMatrix;
  readonly placed: readonly PlacedObject[];
  /** `sqrt(width² + height²)` of the grid */
  readonly mapDiagonal: number;
}

export interface TileScore {
  readonly visibility: number;
  readonly wall: number;
  readonly object: number;
  readonly total: number;
}

/**
 * Free floor tiles of a room, x-major. Without `includeFarEdge` the scan
 * stops one tile short of `endX` and `endY`.
 */
export function candidateTiles(
  bounds: Bounds,
  grid: ReadonlyTileGrid,
  includeFarEdge: boolean,
): Point[] {
  const lastX = includeFarEdge ? bounds.endX : bounds.endX - 1;
  const lastY = includeFarEdge ? bounds.endY : bounds.endY - 1;
  const tiles: Point[] = [];
  for (let x = bounds.originX; x <= lastX; x++) {
    for (let y = bounds.originY; y <= lastY; y++) {
      if (grid.isFloor(x, y)) tiles.push({ x, y });
    }
  }
  return tiles;
}

/**
 * Manhattan-style distance from the nearest side on each axis
 */
export function wallDistance(tile: Point, bounds: Bounds): number {
  return (
    Math.min(Math.abs(bounds.originX - tile.x), Math.abs(bounds.endX - tile.x)) +
    Math.min(Math.abs(bounds.originY - tile.y), Math.abs(bounds.endY - tile.y))
  );
}

export function scoreTile(
  tile: Point,
  bounds: Bounds,
  step: PlacementStep,
  ctx: TileFitContext,
): TileScore {
  const visibility = step.visibilityScore(ctx.visibility.get(tile.x, tile.y));

  const halfExtent =
    (bounds.endX - bounds.originX) / 2 + (bounds.endY - bounds.originY) / 2;
  const wall =
    halfExtent > 0 ? (wallDistance(tile, bounds) / halfExtent) * step.wallWeight : 0;

  let object = 0;
  if (ctx.placed.length > 0 && ctx.mapDiagonal > 0) {
    let nearest = Infinity;
    for (const placed of ctx.placed) {
      nearest = Math.min(nearest, euclideanDistance(tile, placed));
    }
    object = (nearest / ctx.mapDiagonal) * OBJECT_DISTANCE_WEIGHT;
  }

  return { visibility, wall, object, total: visibility + wall + object };
}
