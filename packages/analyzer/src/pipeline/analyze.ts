/**
 * High-level entry points.
 */

import {
  ConfigurationError,
  DEFAULT_RESOURCE_PLAN,
  LevelError,
  type ResourcePlan,
  ResourcePlanSchema,
  Result,
} from "@arena/contracts";
import { TileGrid } from "../core/grid/tile-grid";
import { createPipeline } from "./builder";
import {
  buildGraphs,
  decodeGenome,
  measureGraph,
  populate,
  reduceLayout,
  sourceArtifact,
} from "./passes";
import { createTraceCollector } from "./trace";
import type { AnalyzeOptions, PopulatedLevel, SourceArtifact } from "./types";

/**
 * Full analysis: decode, reduce, build graphs, measure, place.
 */
export const ANALYSIS_PIPELINE = createPipeline<SourceArtifact>("level-analysis")
  .pipe(decodeGenome())
  .pipe(reduceLayout())
  .pipe(buildGraphs())
  .pipe(measureGraph())
  .pipe(populate())
  .build();

/**
 * Merge per-kind overrides over the default plan and validate the result.
 *
 * @throws ConfigurationError (`RESOURCE_PLAN_INVALID`)
 */
export function resolveResourcePlan(
  overrides: AnalyzeOptions["resources"] = {},
): ResourcePlan {
  const parsed = ResourcePlanSchema.safeParse({
    spawn: { ...DEFAULT_RESOURCE_PLAN.spawn, ...overrides.spawn },
    medkit: { ...DEFAULT_RESOURCE_PLAN.medkit, ...overrides.medkit },
    ammo: { ...DEFAULT_RESOURCE_PLAN.ammo, ...overrides.ammo },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(
      "RESOURCE_PLAN_INVALID",
      `Invalid resource plan: ${issues.join("; ")}`,
      { issues },
    );
  }

  return parsed.data;
}

/**
 * Analyze a map and place its resources. A TileGrid argument is cloned,
 * never modified.
 *
 * @throws LevelError on malformed input or when placement cannot complete
 */
export function populateLevel(
  map: string | TileGrid,
  genome: string,
  options: AnalyzeOptions = {},
): PopulatedLevel {
  const plan = resolveResourcePlan(options.resources);
  const trace = createTraceCollector(options.trace ?? false);
  const grid = typeof map === "string" ? TileGrid.fromText(map) : map.clone();

  const level = ANALYSIS_PIPELINE.run(sourceArtifact(grid, genome), {
    plan,
    trace,
  });

  return {
    grid: level.grid,
    rooms: level.rooms,
    roomGraph: level.roomGraph,
    visibility: level.visibility,
    placed: level.placed,
    diameter: level.diameter,
    trace: trace.getEvents(),
  };
}

/**
 * Result-returning variant of {@link populateLevel}. Errors that are not
 * LevelErrors still propagate.
 *
 * @example
 * ```typescript
 * const result = analyzeLevel(mapText, "<0,0,5><5,0,5>|<2,5,6>");
 * if (result.isOk()) {
 *   console.log(result.value.grid.toText());
 * }
 * ```
 */
export function analyzeLevel(
  map: string | TileGrid,
  genome: string,
  options: AnalyzeOptions = {},
): Result<PopulatedLevel, LevelError> {
  return Result.fromThrowable(
    () => populateLevel(map, genome, options),
    LevelError.isLevelError,
  );
}
