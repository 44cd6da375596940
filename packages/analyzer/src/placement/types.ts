import type { ResourceKind } from "@arena/contracts";
import type { DegreeInterval } from "../metrics/degree";

/**
 * Object written into the grid by the placement engine
 */
export interface PlacedObject {
  readonly x: number;
  readonly y: number;
  readonly symbol: string;
}

/**
 * One run of the placement loop: a kind, its degree interval and how many
 * objects to place with it. Ammo is split into two steps.
 */
export interface PlacementStep {
  readonly kind: ResourceKind;
  /** Trace pass id, e.g. `placement.ammo` */
  readonly label: string;
  readonly symbol: string;
  readonly count: number;
  /** Objects of this kind placed by earlier steps */
  readonly offset: number;
  /** Full planned count of the kind, used to scale redundancy */
  readonly targetCount: number;
  readonly interval: DegreeInterval;
  /** Symbols whose graph distance rewards a room */
  readonly proximitySymbols: ReadonlySet<string>;
  /** Whether the tile scan includes the room's far edge */
  readonly includeFarEdge: boolean;
  readonly wallWeight: number;
  visibilityScore(visibility: number): number;
}

export interface ScoredCandidate<T> {
  readonly candidate: T;
  readonly score: number;
}
