/**
 * Placement weights and degree intervals.
 */

import type { DegreeInterval } from "../metrics/degree";

export const DEGREE_INTERVALS = {
  spawn: { low: 0.1, high: 0.3 },
  medkit: { low: 0.3, high: 0.5 },
  /** First half of the ammo: poorly connected rooms */
  ammoLow: { low: 0.2, high: 0.4 },
  /** Second half of the ammo: hubs */
  ammoHigh: { low: 0.8, high: 0.9 },
} as const satisfies Record<string, DegreeInterval>;

/** Weight of the graph distance to related resources in the room score */
export const PROXIMITY_WEIGHT = 0.25;

/** Weight of the distance to already placed objects in the tile score */
export const OBJECT_DISTANCE_WEIGHT = 0.5;

export const WALL_DISTANCE_WEIGHT = {
  spawn: 0.5,
  medkit: 0.25,
  ammo: 0.25,
} as const;

/** Number of scored candidates kept in trace decisions */
export const TRACED_CANDIDATES = 3;
