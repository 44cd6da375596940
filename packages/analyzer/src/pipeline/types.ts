/**
 * Pipeline types: typed artifacts flowing between analysis passes.
 */

import type { ResourcePlan } from "@arena/contracts";
import type { TileGrid } from "../core/grid/tile-grid";
import type { RoomGraph } from "../graphs/room-graph";
import type { VisibilityMatrix } from "../graphs/visibility";
import type { PlacedObject } from "../placement/types";
import type { Room } from "../rooms/types";

// =============================================================================
// ARTIFACTS
// =============================================================================

/**
 * Base artifact interface. All artifacts have a type discriminant.
 */
export interface Artifact<T extends string = string> {
  readonly type: T;
}

/**
 * Map text and genome as handed in by the caller
 */
export interface SourceArtifact extends Artifact<"source"> {
  readonly type: "source";
  readonly grid: TileGrid;
  readonly genome: string;
}

/**
 * Room list, as decoded or after reduction
 */
export interface RoomsArtifact extends Artifact<"rooms"> {
  readonly type: "rooms";
  readonly grid: TileGrid;
  readonly rooms: readonly Room[];
}

/**
 * Room graph and visibility of a reduced layout
 */
export interface GraphsArtifact extends Artifact<"graphs"> {
  readonly type: "graphs";
  readonly grid: TileGrid;
  readonly rooms: readonly Room[];
  readonly roomGraph: RoomGraph;
  readonly visibility: VisibilityMatrix;
}

/**
 * Graphs plus the metrics placement ranks rooms with
 */
export interface MeasuredArtifact extends Artifact<"measured"> {
  readonly type: "measured";
  readonly grid: TileGrid;
  readonly rooms: readonly Room[];
  readonly roomGraph: RoomGraph;
  readonly visibility: VisibilityMatrix;
  readonly diameter: number;
  /** Normalized degree of every area node, before any resource is added */
  readonly degrees: ReadonlyMap<string, number>;
}

/**
 * Final artifact: the level with every resource placed
 */
export interface PopulatedArtifact extends Artifact<"populated"> {
  readonly type: "populated";
  readonly grid: TileGrid;
  readonly rooms: readonly Room[];
  readonly roomGraph: RoomGraph;
  readonly visibility: VisibilityMatrix;
  readonly diameter: number;
  readonly placed: readonly PlacedObject[];
}

// =============================================================================
// TRACE
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "artifact" | "warning";

export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Decision event for "explain why" debugging
 */
export interface DecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    readonly options: readonly unknown[];
    readonly chosen: unknown;
    readonly reason: string;
  };
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  artifact(passId: string, artifact: Artifact): void;
  getEvents(): readonly TraceEvent[];
  getDecisions(passId?: string): readonly DecisionEvent[];
  clear(): void;
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * Composed passes, run in order
 */
export interface Pipeline<TStart extends Artifact, TEnd extends Artifact> {
  readonly id: string;
  readonly passIds: readonly string[];
  run(input: TStart, ctx: PassContext): TEnd;
}

export interface PassContext {
  readonly plan: ResourcePlan;
  readonly trace: TraceCollector;
}

/**
 * A single analysis step turning one artifact into the next
 */
export interface Pass<TIn extends Artifact, TOut extends Artifact> {
  readonly id: string;
  readonly inputType: TIn["type"];
  readonly outputType: TOut["type"];
  run(input: TIn, ctx: PassContext): TOut;
}

// =============================================================================
// RESULT
// =============================================================================

/**
 * Analyzed and populated level
 */
export interface PopulatedLevel {
  readonly grid: TileGrid;
  readonly rooms: readonly Room[];
  readonly roomGraph: RoomGraph;
  readonly visibility: VisibilityMatrix;
  readonly placed: readonly PlacedObject[];
  readonly diameter: number;
  readonly trace: readonly TraceEvent[];
}

export interface AnalyzeOptions {
  /** Per-kind overrides merged over the default plan */
  readonly resources?: {
    readonly spawn?: Partial<ResourcePlan["spawn"]>;
    readonly medkit?: Partial<ResourcePlan["medkit"]>;
    readonly ammo?: Partial<ResourcePlan["ammo"]>;
  };
  /** Record trace events (default false) */
  readonly trace?: boolean;
}
