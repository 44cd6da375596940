/**
 * Tile reachability graph: one node per non-wall tile, king-move edges.
 */

import { DIRECTIONS_8 } from "../core/geometry/types";
import { WeightedGraph } from "../core/graph/weighted-graph";
import type { ReadonlyTileGrid } from "../core/grid/types";

export interface TileNode {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly symbol: string;
}

export function tileNodeId(x: number, y: number): string {
  return `t:${x},${y}`;
}

/**
 * Add a node for every non-wall tile of `grid`, in x-major order.
 */
export function addTileNodes<TNode extends TileNode>(
  graph: WeightedGraph<TNode>,
  grid: ReadonlyTileGrid,
  createNode: (base: TileNode) => TNode,
): void {
  for (const { x, y } of grid.findNonWall()) {
    graph.addNode(createNode({ id: tileNodeId(x, y), x, y, symbol: grid.get(x, y) }));
  }
}

export function buildTileGraph(grid: ReadonlyTileGrid): WeightedGraph<TileNode> {
  const graph = new WeightedGraph<TileNode>();
  addTileNodes(graph, grid, (base) => base);

  for (const node of graph.nodes()) {
    for (const dir of DIRECTIONS_8) {
      const neighborId = tileNodeId(node.x + dir.x, node.y + dir.y);
      if (graph.hasNode(neighborId)) {
        graph.addEdge(node.id, neighborId);
      }
    }
  }

  return graph;
}
