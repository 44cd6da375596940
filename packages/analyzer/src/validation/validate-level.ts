import { RESOURCE_KINDS, type ResourcePlan } from "@arena/contracts";
import type { ReadonlyTileGrid } from "../core/grid/types";
import { isConnected } from "../metrics/diameter";
import type { PopulatedLevel } from "../pipeline/types";
import {
  hasErrorViolations,
  type LevelValidationResult,
  type Violation,
} from "./result-types";

function appendPlacedViolations(
  violations: Violation[],
  level: PopulatedLevel,
): void {
  const seen = new Set<string>();
  for (const object of level.placed) {
    const at = `(${object.x}, ${object.y})`;
    const key = `${object.x},${object.y}`;

    if (seen.has(key)) {
      violations.push({
        type: "invariant.placed.unique",
        message: `Two objects share tile ${at}`,
        severity: "error",
      });
    }
    seen.add(key);

    const symbol = level.grid.get(object.x, object.y);
    if (symbol !== object.symbol) {
      violations.push({
        type: "invariant.placed.grid",
        message: `Object "${object.symbol}" at ${at} reads "${symbol}" in the grid`,
        severity: "error",
      });
    }

    if (level.roomGraph.areasContaining(object.x, object.y).length === 0) {
      violations.push({
        type: "invariant.placed.room",
        message: `Object "${object.symbol}" at ${at} lies outside every room`,
        severity: "error",
      });
    }
  }
}

function appendWallViolations(
  violations: Violation[],
  level: PopulatedLevel,
  source: ReadonlyTileGrid,
): void {
  if (source.width !== level.grid.width || source.height !== level.grid.height) {
    violations.push({
      type: "invariant.grid.size",
      message: `Grid is ${level.grid.width}x${level.grid.height}, source is ${source.width}x${source.height}`,
      severity: "error",
    });
    return;
  }

  source.forEach((x, y) => {
    if (source.isWall(x, y) !== level.grid.isWall(x, y)) {
      violations.push({
        type: "invariant.grid.wall",
        message: `Wall layout changed at (${x}, ${y})`,
        severity: "error",
      });
    }
  });
}

/**
 * Validate a populated level against its resource plan.
 *
 * Checks:
 * - Every planned symbol appears exactly its count in the grid and the list
 * - Every placed object matches the grid and lies inside a room
 * - No two objects share a tile
 * - Walls match `source`, when given
 * - The room graph is connected (warning only)
 */
export function validatePopulatedLevel(
  level: PopulatedLevel,
  plan: ResourcePlan,
  source?: ReadonlyTileGrid,
): LevelValidationResult {
  const violations: Violation[] = [];

  for (const kind of RESOURCE_KINDS) {
    const { symbol, count } = plan[kind];
    const inGrid = level.grid.countSymbol(symbol);
    if (inGrid !== count) {
      violations.push({
        type: `invariant.count.${kind}`,
        message: `Expected ${count} "${symbol}" tiles, found ${inGrid}`,
        severity: "error",
      });
    }
    const listed = level.placed.filter((object) => object.symbol === symbol).length;
    if (listed !== count) {
      violations.push({
        type: `invariant.placed.${kind}`,
        message: `Expected ${count} placed "${symbol}" objects, found ${listed}`,
        severity: "error",
      });
    }
  }

  appendPlacedViolations(violations, level);

  if (source) {
    appendWallViolations(violations, level, source);
  }

  if (!isConnected(level.roomGraph)) {
    violations.push({
      type: "connectivity.rooms",
      message: "Room graph has more than one component",
      severity: "warning",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
