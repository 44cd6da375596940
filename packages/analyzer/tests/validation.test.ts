import { DEFAULT_RESOURCE_PLAN } from "@arena/contracts";
import { describe, expect, it } from "vitest";
import { TileGrid } from "../src/core/grid";
import { collectLevelMetrics } from "../src/metrics";
import { populateLevel } from "../src/pipeline";
import { validatePopulatedLevel } from "../src/validation";
import { ARENA_GENOME, ARENA_MAP } from "./fixtures";

describe("validatePopulatedLevel", () => {
  it("accepts a freshly populated level", () => {
    const level = populateLevel(ARENA_MAP, ARENA_GENOME);
    const result = validatePopulatedLevel(
      level,
      DEFAULT_RESOURCE_PLAN,
      TileGrid.fromText(ARENA_MAP),
    );

    expect(result).toEqual({ success: true, violations: [] });
  });

  it("flags objects missing from the grid", () => {
    const level = populateLevel(ARENA_MAP, ARENA_GENOME);
    level.grid.set(5, 10, "r");

    const result = validatePopulatedLevel(level, DEFAULT_RESOURCE_PLAN);

    expect(result.success).toBe(false);
    expect(result.violations.map((violation) => violation.type)).toEqual([
      "invariant.count.spawn",
      "invariant.placed.grid",
    ]);
  });

  it("flags walls that changed", () => {
    const level = populateLevel(ARENA_MAP, ARENA_GENOME);
    level.grid.set(0, 0, "r");

    const result = validatePopulatedLevel(
      level,
      DEFAULT_RESOURCE_PLAN,
      TileGrid.fromText(ARENA_MAP),
    );

    expect(result.violations).toEqual([
      {
        type: "invariant.grid.wall",
        message: "Wall layout changed at (0, 0)",
        severity: "error",
      },
    ]);
  });
});

describe("collectLevelMetrics", () => {
  it("summarizes the arena", () => {
    const level = populateLevel(ARENA_MAP, ARENA_GENOME);
    const metrics = collectLevelMetrics(level);

    expect(metrics.roomCount).toBe(3);
    expect(metrics.corridorCount).toBe(2);
    expect(metrics.areaEdgeCount).toBe(4);
    expect(metrics.resourceCounts).toEqual({ s: 5, h: 4, a: 4 });
    expect(metrics.connected).toBe(true);
    expect(metrics.meanPlacedVisibility).toBeGreaterThan(0);
    expect(metrics.meanPlacedVisibility).toBeLessThanOrEqual(1);
  });
});
