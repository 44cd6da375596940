/**
 * Placement engine: greedy, deterministic placement of spawns, medkits and
 * ammo. Each object first picks the best room, then the best free tile in
 * that room, and is committed before the next one is scored.
 */

import { ConfigurationError, type ResourcePlan } from "@arena/contracts";
import type { Point } from "../core/geometry/types";
import type { TileGrid } from "../core/grid/tile-grid";
import type { AreaNode, RoomGraph } from "../graphs/room-graph";
import type { VisibilityMatrix } from "../graphs/visibility";
import { intervalFit } from "../metrics/degree";
import type { TraceCollector } from "../pipeline/types";
import { TRACED_CANDIDATES } from "./constants";
import { buildPlacementSteps } from "./recipes";
import { candidateRooms, type RoomScore, scoreRoom } from "./room-fit";
import { candidateTiles, scoreTile, type TileScore } from "./tile-fit";
import type { PlacedObject, PlacementStep, ScoredCandidate } from "./types";

export interface PlacementInput {
  readonly grid: TileGrid;
  readonly roomGraph: RoomGraph;
  readonly visibility: VisibilityMatrix;
  /** Weighted diameter of the area-only room graph */
  readonly diameter: number;
  /** Normalized degree of every area node */
  readonly degrees: ReadonlyMap<string, number>;
  readonly plan: ResourcePlan;
}

/**
 * Highest-scoring candidate; ties keep the first one seen.
 */
function pickBest<T>(
  candidates: readonly T[],
  score: (candidate: T) => number,
): { best: ScoredCandidate<T> | undefined; scored: ScoredCandidate<T>[] } {
  let best: ScoredCandidate<T> | undefined;
  const scored: ScoredCandidate<T>[] = [];
  for (const candidate of candidates) {
    const entry = { candidate, score: score(candidate) };
    scored.push(entry);
    if (best === undefined || entry.score > best.score) best = entry;
  }
  return { best, scored };
}

function topCandidates<T, U>(
  scored: readonly ScoredCandidate<T>[],
  describe: (candidate: T) => U,
): { candidate: U; score: number }[] {
  return [...scored]
    .sort((a, b) => b.score - a.score)
    .slice(0, TRACED_CANDIDATES)
    .map((entry) => ({ candidate: describe(entry.candidate), score: entry.score }));
}

function formatRoomReason(score: RoomScore): string {
  return (
    `fit ${score.fit.toFixed(2)} + distance ${score.distance.toFixed(2)} * 0.25` +
    ` - redundancy ${score.redundancy.toFixed(2)} = ${score.total.toFixed(2)}`
  );
}

function formatTileReason(score: TileScore): string {
  return (
    `visibility ${score.visibility.toFixed(2)} + wall ${score.wall.toFixed(2)}` +
    ` + objects ${score.object.toFixed(2)} = ${score.total.toFixed(2)}`
  );
}

class PlacementEngine {
  private readonly placed: PlacedObject[] = [];
  private readonly mapDiagonal: number;

  constructor(
    private readonly input: PlacementInput,
    private readonly trace: TraceCollector,
  ) {
    this.mapDiagonal = Math.sqrt(
      input.grid.width * input.grid.width + input.grid.height * input.grid.height,
    );
  }

  run(): PlacedObject[] {
    const cleared = this.input.grid.clearResources();
    if (cleared > 0) {
      this.trace.warning(
        "placement",
        `Cleared ${cleared} pre-existing objects before placement`,
      );
    }

    for (const step of buildPlacementSteps(this.input.plan)) {
      const degreeFit = intervalFit(this.input.degrees, step.interval);
      for (let i = 0; i < step.count; i++) {
        this.placeOne(step, degreeFit, step.offset + i);
      }
    }

    return this.placed;
  }

  private placeOne(
    step: PlacementStep,
    degreeFit: ReadonlyMap<string, number>,
    iteration: number,
  ): void {
    const { grid, roomGraph } = this.input;

    const rooms = candidateRooms(roomGraph, grid, step);
    const roomScores = new Map<AreaNode, RoomScore>();
    const roomPick = pickBest(rooms, (area) => {
      const score = scoreRoom(area, step, {
        graph: roomGraph,
        degreeFit,
        diameter: this.input.diameter,
      });
      roomScores.set(area, score);
      return score.total;
    });
    const room = roomPick.best?.candidate;
    if (room === undefined) {
      throw new ConfigurationError(
        "NO_CANDIDATE_ROOM",
        `No room has a free tile left for ${step.kind} #${iteration}`,
        { kind: step.kind, iteration },
      );
    }

    const tiles = candidateTiles(room.bounds, grid, step.includeFarEdge);
    const tileScores = new Map<Point, TileScore>();
    const tilePick = pickBest(tiles, (tile) => {
      const score = scoreTile(tile, room.bounds, step, {
        visibility: this.input.visibility,
        placed: this.placed,
        mapDiagonal: this.mapDiagonal,
      });
      tileScores.set(tile, score);
      return score.total;
    });
    const tile = tilePick.best?.candidate;
    if (tile === undefined) {
      throw new ConfigurationError(
        "NO_CANDIDATE_TILE",
        `Room ${room.id} has no free tile left for ${step.kind} #${iteration}`,
        { kind: step.kind, iteration, room: room.id },
      );
    }

    if (this.trace.enabled) {
      const roomScore = roomScores.get(room);
      const tileScore = tileScores.get(tile);
      this.trace.decision(
        step.label,
        `Which room receives ${step.kind} #${iteration}?`,
        topCandidates(roomPick.scored, (area) => area.id),
        room.id,
        roomScore ? formatRoomReason(roomScore) : "",
      );
      this.trace.decision(
        step.label,
        `Which tile of ${room.id} receives ${step.kind} #${iteration}?`,
        topCandidates(tilePick.scored, (point) => `${point.x},${point.y}`),
        `${tile.x},${tile.y}`,
        tileScore ? formatTileReason(tileScore) : "",
      );
    }

    grid.set(tile.x, tile.y, step.symbol);
    roomGraph.addResource(tile.x, tile.y, step.symbol);
    this.placed.push({ x: tile.x, y: tile.y, symbol: step.symbol });
  }
}

/**
 * Clear every object from `grid`, then place the resources of `plan`,
 * writing them into the grid and the room graph.
 *
 * @throws ConfigurationError (`NO_CANDIDATE_ROOM`, `NO_CANDIDATE_TILE`)
 *   when the level runs out of free floor
 */
export function placeResources(
  input: PlacementInput,
  trace: TraceCollector,
): PlacedObject[] {
  return new PlacementEngine(input, trace).run();
}
