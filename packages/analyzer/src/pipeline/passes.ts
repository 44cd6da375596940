/**
 * Analysis passes, in pipeline order.
 */

import type { TileGrid } from "../core/grid/tile-grid";
import { parseGenome } from "../genome/parser";
import { RoomGraph } from "../graphs/room-graph";
import { VisibilityMatrix } from "../graphs/visibility";
import { normalizeDegrees } from "../metrics/degree";
import { computeDiameter, isConnected } from "../metrics/diameter";
import { placeResources } from "../placement/engine";
import { reduceRooms } from "../rooms/reduce";
import type {
  GraphsArtifact,
  MeasuredArtifact,
  Pass,
  PopulatedArtifact,
  RoomsArtifact,
  SourceArtifact,
} from "./types";

/**
 * Decode the genome into its rooms and corridors
 */
export function decodeGenome(): Pass<SourceArtifact, RoomsArtifact> {
  return {
    id: "genome.decode",
    inputType: "source",
    outputType: "rooms",
    run(input) {
      return { type: "rooms", grid: input.grid, rooms: parseGenome(input.genome) };
    },
  };
}

/**
 * Merge adjacent rooms and drop contained ones
 */
export function reduceLayout(): Pass<RoomsArtifact, RoomsArtifact> {
  return {
    id: "rooms.reduce",
    inputType: "rooms",
    outputType: "rooms",
    run(input, ctx) {
      const rooms = reduceRooms(input.rooms);
      ctx.trace.decision(
        "rooms.reduce",
        "How many areas remain after reduction?",
        [input.rooms.length],
        rooms.length,
        `${input.rooms.length - rooms.length} areas merged or contained`,
      );
      return { type: "rooms", grid: input.grid, rooms };
    },
  };
}

/**
 * Build the room graph and the visibility matrix
 */
export function buildGraphs(): Pass<RoomsArtifact, GraphsArtifact> {
  return {
    id: "graphs.build",
    inputType: "rooms",
    outputType: "graphs",
    run(input) {
      return {
        type: "graphs",
        grid: input.grid,
        rooms: input.rooms,
        roomGraph: RoomGraph.fromRooms(input.rooms),
        visibility: VisibilityMatrix.fromGrid(input.grid),
      };
    },
  };
}

/**
 * Diameter and normalized degrees of the area-only graph
 */
export function measureGraph(): Pass<GraphsArtifact, MeasuredArtifact> {
  return {
    id: "metrics.measure",
    inputType: "graphs",
    outputType: "measured",
    run(input, ctx) {
      if (!isConnected(input.roomGraph)) {
        ctx.trace.warning(
          "metrics.measure",
          "Room graph is disconnected; distances between components count as 0",
        );
      }
      return {
        ...input,
        type: "measured",
        diameter: computeDiameter(input.roomGraph),
        degrees: normalizeDegrees(input.roomGraph),
      };
    },
  };
}

/**
 * Place every resource of the plan
 */
export function populate(): Pass<MeasuredArtifact, PopulatedArtifact> {
  return {
    id: "placement",
    inputType: "measured",
    outputType: "populated",
    run(input, ctx) {
      const placed = placeResources(
        {
          grid: input.grid,
          roomGraph: input.roomGraph,
          visibility: input.visibility,
          diameter: input.diameter,
          degrees: input.degrees,
          plan: ctx.plan,
        },
        ctx.trace,
      );
      return {
        type: "populated",
        grid: input.grid,
        rooms: input.rooms,
        roomGraph: input.roomGraph,
        visibility: input.visibility,
        diameter: input.diameter,
        placed,
      };
    },
  };
}

/**
 * Source artifact for a map and its genome
 */
export function sourceArtifact(grid: TileGrid, genome: string): SourceArtifact {
  return { type: "source", grid, genome };
}
