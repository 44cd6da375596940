/**
 * Trace collector implementation for debugging and observability.
 */

import type {
  Artifact,
  DecisionEvent,
  TraceCollector,
  TraceEvent,
  TraceEventType,
} from "./types";

function isDecisionEvent(event: TraceEvent): event is DecisionEvent {
  return event.eventType === "decision";
}

/**
 * Default trace collector implementation
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(passId: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      passId,
      eventType,
      data,
    });
  }

  start(passId: string): void {
    this.emit(passId, "start");
  }

  end(passId: string, durationMs: number): void {
    this.emit(passId, "end", { durationMs });
  }

  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    if (!this.enabled) return;

    const event: DecisionEvent = {
      timestamp: performance.now() - this.startTime,
      passId,
      eventType: "decision",
      data: { question, options, chosen, reason },
    };
    this.events.push(event);
  }

  warning(passId: string, message: string): void {
    this.emit(passId, "warning", { message });
  }

  artifact(passId: string, artifact: Artifact): void {
    this.emit(passId, "artifact", { artifactType: artifact.type });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  /**
   * Decision events, optionally restricted to one pass id
   */
  getDecisions(passId?: string): readonly DecisionEvent[] {
    return this.events
      .filter(isDecisionEvent)
      .filter((event) => passId === undefined || event.passId === passId);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_passId: string): void {}
  end(_passId: string, _durationMs: number): void {}
  decision(
    _passId: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_passId: string, _message: string): void {}
  artifact(_passId: string, _artifact: Artifact): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  getDecisions(_passId?: string): readonly DecisionEvent[] {
    return [];
  }
  clear(): void {}
}

/**
 * Create a trace collector based on configuration
 */
export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
