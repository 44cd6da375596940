/**
 * Per-kind placement recipes.
 *
 * Spawns hide in low-visibility tiles of poorly connected rooms, medkits sit
 * at medium visibility, ammo is spread between dead ends and hubs.
 */

import type { ResourceKind, ResourcePlan } from "@arena/contracts";
import type { DegreeInterval } from "../metrics/degree";
import { DEGREE_INTERVALS, WALL_DISTANCE_WEIGHT } from "./constants";
import type { PlacementStep } from "./types";

interface PlacementRecipe {
  readonly proximityKinds: readonly ResourceKind[];
  readonly includeFarEdge: boolean;
  visibilityScore(visibility: number): number;
}

const RECIPES: Record<ResourceKind, PlacementRecipe> = {
  spawn: {
    proximityKinds: ["spawn"],
    includeFarEdge: true,
    visibilityScore: (v) => 1 - v,
  },
  medkit: {
    proximityKinds: ["spawn", "medkit"],
    includeFarEdge: false,
    visibilityScore: (v) => 1 - Math.abs(0.5 - v) * 2,
  },
  ammo: {
    proximityKinds: ["ammo", "medkit"],
    includeFarEdge: false,
    visibilityScore: (v) => v,
  },
};

function createStep(
  plan: ResourcePlan,
  kind: ResourceKind,
  interval: DegreeInterval,
  count: number,
  offset: number,
): PlacementStep {
  const recipe = RECIPES[kind];
  return {
    kind,
    label: `placement.${kind}`,
    symbol: plan[kind].symbol,
    count,
    offset,
    targetCount: plan[kind].count,
    interval,
    proximitySymbols: new Set(recipe.proximityKinds.map((k) => plan[k].symbol)),
    includeFarEdge: recipe.includeFarEdge,
    wallWeight: WALL_DISTANCE_WEIGHT[kind],
    visibilityScore: recipe.visibilityScore,
  };
}

/**
 * Steps in placement order: spawns, medkits, then the lower half of the ammo
 * in weakly connected rooms and the rest in hubs.
 */
export function buildPlacementSteps(plan: ResourcePlan): PlacementStep[] {
  const lowAmmo = Math.floor(plan.ammo.count / 2);
  return [
    createStep(plan, "spawn", DEGREE_INTERVALS.spawn, plan.spawn.count, 0),
    createStep(plan, "medkit", DEGREE_INTERVALS.medkit, plan.medkit.count, 0),
    createStep(plan, "ammo", DEGREE_INTERVALS.ammoLow, lowAmmo, 0),
    createStep(
      plan,
      "ammo",
      DEGREE_INTERVALS.ammoHigh,
      plan.ammo.count - lowAmmo,
      lowAmmo,
    ),
  ];
}
