/**
 * Room adjacency graph.
 *
 * Area nodes (rooms and corridors) are fixed at construction; placement can
 * only append resource nodes linked to the areas that contain them.
 */

import { ConfigurationError } from "@arena/contracts";
import {
  boundsCenter,
  boundsContainsPoint,
  boundsTouch,
  euclideanDistance,
} from "../core/geometry/operations";
import type { Bounds, Point } from "../core/geometry/types";
import {
  type ReadonlyWeightedGraph,
  WeightedGraph,
} from "../core/graph/weighted-graph";
import type { ReadonlyTileGrid } from "../core/grid/types";
import { TileSymbol } from "../core/grid/types";
import type { Room } from "../rooms/types";

/**
 * Node standing for a room or corridor rectangle
 */
export interface AreaNode {
  readonly kind: "area";
  readonly id: string;
  /** Index of the room in the reduced room list */
  readonly index: number;
  readonly bounds: Bounds;
  readonly isCorridor: boolean;
  readonly center: Point;
}

/**
 * Node standing for a placed object
 */
export interface ResourceNode {
  readonly kind: "resource";
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly symbol: string;
}

export type RoomGraphNode = AreaNode | ResourceNode;

export function areaNodeId(index: number): string {
  return `r${index}`;
}

export function resourceNodeId(x: number, y: number): string {
  return `res:${x},${y}`;
}

/**
 * Position used to draw or measure a node: area center or resource tile.
 */
export function nodePosition(node: RoomGraphNode): Point {
  return node.kind === "area" ? node.center : { x: node.x, y: node.y };
}

export function isAreaNode(node: RoomGraphNode): node is AreaNode {
  return node.kind === "area";
}

export function isResourceNode(node: RoomGraphNode): node is ResourceNode {
  return node.kind === "resource";
}

/**
 * Read-only view of the room graph for metrics and export collaborators
 */
export interface ReadonlyRoomGraph extends ReadonlyWeightedGraph<RoomGraphNode> {
  areaNodes(): readonly AreaNode[];
  resourceNodes(): ResourceNode[];
  areasContaining(x: number, y: number): AreaNode[];
}

export class RoomGraph
  extends WeightedGraph<RoomGraphNode>
  implements ReadonlyRoomGraph
{
  private readonly areas: AreaNode[] = [];

  /**
   * Build the area portion of the graph. Two areas are linked when their
   * tile ranges intersect on both axes; the weight is the distance between
   * their centers.
   */
  static fromRooms(rooms: readonly Room[]): RoomGraph {
    const graph = new RoomGraph();

    rooms.forEach((room, index) => {
      const bounds: Bounds = {
        originX: room.originX,
        originY: room.originY,
        endX: room.endX,
        endY: room.endY,
      };
      const node: AreaNode = {
        kind: "area",
        id: areaNodeId(index),
        index,
        bounds,
        isCorridor: room.isCorridor,
        center: boundsCenter(bounds),
      };
      graph.addNode(node);
      graph.areas.push(node);
    });

    for (let i = 0; i < graph.areas.length; i++) {
      for (let j = i + 1; j < graph.areas.length; j++) {
        const a = graph.areas[i];
        const b = graph.areas[j];
        if (!a || !b || !boundsTouch(a.bounds, b.bounds)) continue;
        graph.addEdge(a.id, b.id, euclideanDistance(a.center, b.center));
      }
    }

    return graph;
  }

  areaNodes(): readonly AreaNode[] {
    return this.areas;
  }

  resourceNodes(): ResourceNode[] {
    const result: ResourceNode[] = [];
    for (const node of this.nodes()) {
      if (isResourceNode(node)) result.push(node);
    }
    return result;
  }

  areasContaining(x: number, y: number): AreaNode[] {
    return this.areas.filter((area) => boundsContainsPoint(area.bounds, x, y));
  }

  /**
   * Append a resource node and link it to every area containing its tile.
   *
   * @throws ConfigurationError if the tile already holds a resource node
   */
  addResource(x: number, y: number, symbol: string): ResourceNode {
    const id = resourceNodeId(x, y);
    if (this.hasNode(id)) {
      throw new ConfigurationError(
        "TILE_OCCUPIED",
        `Tile (${x}, ${y}) already holds a resource`,
        { x, y, symbol },
      );
    }

    const node: ResourceNode = { kind: "resource", id, x, y, symbol };
    this.addNode(node);
    for (const area of this.areasContaining(x, y)) {
      this.addEdge(area.id, id, euclideanDistance(area.center, { x, y }));
    }
    return node;
  }
}

/**
 * Attach a resource node for every object already present in `grid`.
 * Symbols in `ignored` (besides walls and floor) are left out.
 */
export function attachGridResources(
  graph: RoomGraph,
  grid: ReadonlyTileGrid,
  ignored: readonly string[] = ["d"],
): ResourceNode[] {
  const added: ResourceNode[] = [];
  grid.forEach((x, y, symbol) => {
    if (
      symbol === TileSymbol.WALL ||
      symbol === TileSymbol.FLOOR ||
      ignored.includes(symbol)
    ) {
      return;
    }
    added.push(graph.addResource(x, y, symbol));
  });
  return added;
}

export function buildRoomGraph(rooms: readonly Room[]): RoomGraph {
  return RoomGraph.fromRooms(rooms);
}
