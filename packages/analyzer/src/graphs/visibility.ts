/**
 * Line-of-sight visibility between tiles.
 *
 * The diagonal test samples the line `y = m * x + c` once per step along the
 * major axis, truncating toward zero. It is a coarse approximation rather
 * than a rasterization; placement only compares visibility values against
 * each other.
 */

import { ConfigurationError } from "@arena/contracts";
import type { Point } from "../core/geometry/types";
import { WeightedGraph } from "../core/graph/weighted-graph";
import type { ReadonlyTileGrid } from "../core/grid/types";
import { addTileNodes, type TileNode, tileNodeId } from "./tile-graph";

/**
 * Order a pair so the line equation is always formed from the same end.
 */
function canonicalPair(a: Point, b: Point): [Point, Point] {
  return a.x < b.x || (a.x === b.x && a.y <= b.y) ? [a, b] : [b, a];
}

/**
 * Check whether a straight segment from `a` to `b` crosses no wall tile.
 * Axis-aligned segments test the tiles strictly between the endpoints.
 */
export function isTileVisible(
  grid: ReadonlyTileGrid,
  a: Point,
  b: Point,
): boolean {
  const [from, to] = canonicalPair(a, b);
  const dx = to.x - from.x;
  const dy = to.y - from.y;

  if (dx === 0) {
    for (let y = from.y + 1; y < to.y; y++) {
      if (grid.isWall(from.x, y)) return false;
    }
    return true;
  }

  if (dy === 0) {
    for (let x = from.x + 1; x < to.x; x++) {
      if (grid.isWall(x, from.y)) return false;
    }
    return true;
  }

  const m = dy / dx;
  const c = from.y - m * from.x;

  if (Math.abs(dx) > Math.abs(dy)) {
    for (let x = from.x; x < to.x; x++) {
      if (grid.isWall(x, Math.trunc(c + m * x))) return false;
    }
  } else {
    const low = Math.min(from.y, to.y);
    const high = Math.max(from.y, to.y);
    for (let y = low; y < high; y++) {
      if (grid.isWall(Math.trunc(y / m - c / m), y)) return false;
    }
  }

  return true;
}

/**
 * Visit every unordered pair of mutually visible non-wall tiles once,
 * in x-major order of the first tile.
 */
function forEachVisiblePair(
  grid: ReadonlyTileGrid,
  callback: (a: Point, b: Point) => void,
): void {
  const tiles = grid.findNonWall();
  for (let i = 0; i < tiles.length; i++) {
    const a = tiles[i];
    if (!a) continue;
    for (let j = i + 1; j < tiles.length; j++) {
      const b = tiles[j];
      if (b && isTileVisible(grid, a, b)) callback(a, b);
    }
  }
}

/**
 * Per-tile count of other non-wall tiles in line of sight.
 * Wall tiles count zero. Indexed `x * height + y`.
 */
export function computeVisibilityCounts(grid: ReadonlyTileGrid): Int32Array {
  const counts = new Int32Array(grid.width * grid.height);
  forEachVisiblePair(grid, (a, b) => {
    const from = a.x * grid.height + a.y;
    const to = b.x * grid.height + b.y;
    counts[from] = (counts[from] ?? 0) + 1;
    counts[to] = (counts[to] ?? 0) + 1;
  });
  return counts;
}

/**
 * Min-max normalized visibility of every tile.
 */
export class VisibilityMatrix {
  readonly width: number;
  readonly height: number;
  readonly minCount: number;
  readonly maxCount: number;
  private readonly counts: Int32Array;
  private readonly values: Float64Array;

  private constructor(
    width: number,
    height: number,
    counts: Int32Array,
    values: Float64Array,
    minCount: number,
    maxCount: number,
  ) {
    this.width = width;
    this.height = height;
    this.counts = counts;
    this.values = values;
    this.minCount = minCount;
    this.maxCount = maxCount;
  }

  /**
   * Normalize raw counts over the non-wall tiles of `grid`.
   *
   * @throws ConfigurationError when every tile sees the same number of
   *   tiles, which leaves the normalization undefined
   */
  static fromGrid(grid: ReadonlyTileGrid): VisibilityMatrix {
    const counts = computeVisibilityCounts(grid);
    const tiles = grid.findNonWall();

    let min = Infinity;
    let max = -Infinity;
    for (const { x, y } of tiles) {
      const count = counts[x * grid.height + y] ?? 0;
      if (count < min) min = count;
      if (count > max) max = count;
    }

    if (tiles.length === 0 || max === min) {
      throw new ConfigurationError(
        "VISIBILITY_DEGENERATE",
        tiles.length === 0
          ? "Map has no walkable tile"
          : `Every walkable tile sees ${max} tiles; visibility cannot be normalized`,
        { tileCount: tiles.length, visibleCount: tiles.length === 0 ? 0 : max },
      );
    }

    const values = new Float64Array(grid.width * grid.height);
    const range = max - min;
    for (const { x, y } of tiles) {
      const index = x * grid.height + y;
      values[index] = ((counts[index] ?? 0) - min) / range;
    }

    return new VisibilityMatrix(grid.width, grid.height, counts, values, min, max);
  }

  /**
   * Normalized visibility in [0, 1]; 0 for walls and out-of-bounds tiles.
   */
  get(x: number, y: number): number {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return 0;
    return this.values[x * this.height + y] ?? 0;
  }

  /**
   * Number of tiles visible from (x, y)
   */
  rawCount(x: number, y: number): number {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return 0;
    return this.counts[x * this.height + y] ?? 0;
  }
}

export interface VisibilityNode extends TileNode {
  /** Number of tiles visible from this tile */
  readonly visibility: number;
}

/**
 * Graph linking every pair of mutually visible non-wall tiles.
 */
export function buildVisibilityGraph(
  grid: ReadonlyTileGrid,
): WeightedGraph<VisibilityNode> {
  const counts = computeVisibilityCounts(grid);
  const graph = new WeightedGraph<VisibilityNode>();
  addTileNodes(graph, grid, (base) => ({
    ...base,
    visibility: counts[base.x * grid.height + base.y] ?? 0,
  }));

  forEachVisiblePair(grid, (a, b) => {
    graph.addEdge(tileNodeId(a.x, a.y), tileNodeId(b.x, b.y));
  });

  return graph;
}

export function buildVisibilityMatrix(grid: ReadonlyTileGrid): VisibilityMatrix {
  return VisibilityMatrix.fromGrid(grid);
}
