import { WeightedGraph } from "../core/graph/weighted-graph";
import type { Room } from "../rooms/types";

export interface OutlineNode {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  /** Index of the room this corner belongs to */
  readonly room: number;
}

/**
 * Corner graph of the room outlines: four nodes per room, linked around the
 * rectangle (origin, far x, far corner, far y).
 */
export function buildOutlineGraph(
  rooms: readonly Room[],
): WeightedGraph<OutlineNode> {
  const graph = new WeightedGraph<OutlineNode>();

  rooms.forEach((room, index) => {
    const corners = [
      { x: room.originX, y: room.originY },
      { x: room.endX, y: room.originY },
      { x: room.endX, y: room.endY },
      { x: room.originX, y: room.endY },
    ];
    const ids = corners.map((_corner, corner) => `o${index}:${corner}`);

    corners.forEach((corner, i) => {
      graph.addNode({ id: `o${index}:${i}`, x: corner.x, y: corner.y, room: index });
    });
    ids.forEach((id, i) => {
      const next = ids[(i + 1) % ids.length];
      if (next !== undefined) graph.addEdge(id, next);
    });
  });

  return graph;
}
