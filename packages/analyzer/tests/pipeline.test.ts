/**
 * Pipeline builder and trace collector tests
 */

import { DEFAULT_RESOURCE_PLAN } from "@arena/contracts";
import { describe, expect, it } from "vitest";
import {
  type Artifact,
  createPipeline,
  createTraceCollector,
  DefaultTraceCollector,
  NoOpTraceCollector,
  type Pass,
  type PassContext,
} from "../src/pipeline";

interface CountArtifact extends Artifact<"count"> {
  readonly type: "count";
  readonly value: number;
}

interface LabelArtifact extends Artifact<"label"> {
  readonly type: "label";
  readonly label: string;
}

const increment: Pass<CountArtifact, CountArtifact> = {
  id: "count.increment",
  inputType: "count",
  outputType: "count",
  run: (input) => ({ type: "count", value: input.value + 1 }),
};

const label: Pass<CountArtifact, LabelArtifact> = {
  id: "count.label",
  inputType: "count",
  outputType: "label",
  run: (input, ctx) => {
    ctx.trace.decision("count.label", "Prefix?", ["n", "#"], "n", "default");
    return { type: "label", label: `n${input.value}` };
  },
};

const explode: Pass<CountArtifact, CountArtifact> = {
  id: "count.explode",
  inputType: "count",
  outputType: "count",
  run: () => {
    throw new Error("boom");
  },
};

function context(enabled: boolean): PassContext {
  return { plan: DEFAULT_RESOURCE_PLAN, trace: createTraceCollector(enabled) };
}

describe("createPipeline", () => {
  it("runs passes in order and records their ids", () => {
    const pipeline = createPipeline<CountArtifact>("test")
      .pipe(increment)
      .pipe(increment)
      .pipe(label)
      .build();

    expect(pipeline.id).toBe("test");
    expect(pipeline.passIds).toEqual([
      "count.increment",
      "count.increment",
      "count.label",
    ]);
    expect(pipeline.run({ type: "count", value: 1 }, context(false))).toEqual({
      type: "label",
      label: "n3",
    });
  });

  it("returns the input unchanged with no passes", () => {
    const pipeline = createPipeline<CountArtifact>("empty").build();

    expect(pipeline.passIds).toEqual([]);
    expect(pipeline.run({ type: "count", value: 7 }, context(false)).value).toBe(7);
  });

  it("emits start, end and artifact events per pass", () => {
    const ctx = context(true);
    createPipeline<CountArtifact>("test")
      .pipe(label)
      .build()
      .run({ type: "count", value: 0 }, ctx);

    expect(ctx.trace.getEvents().map((event) => event.eventType)).toEqual([
      "start",
      "decision",
      "end",
      "artifact",
    ]);
    expect(ctx.trace.getEvents()[3]?.data).toEqual({ artifactType: "label" });
  });

  it("records a warning and rethrows when a pass fails", () => {
    const ctx = context(true);
    const pipeline = createPipeline<CountArtifact>("test")
      .pipe(increment)
      .pipe(explode)
      .build();

    expect(() => pipeline.run({ type: "count", value: 0 }, ctx)).toThrow("boom");

    const last = ctx.trace.getEvents().at(-1);
    expect(last?.eventType).toBe("warning");
    expect(last?.passId).toBe("count.explode");
    expect(last?.data).toEqual({ message: "Pass failed: boom" });
  });
});

describe("trace collectors", () => {
  it("filters decisions by pass id", () => {
    const trace = new DefaultTraceCollector(true);
    trace.decision("a", "q1", [1, 2], 1, "first");
    trace.warning("a", "note");
    trace.decision("b", "q2", [3], 3, "only");

    expect(trace.getDecisions()).toHaveLength(2);
    expect(trace.getDecisions("b").map((event) => event.data.question)).toEqual([
      "q2",
    ]);
  });

  it("records nothing when disabled", () => {
    const trace = new DefaultTraceCollector(false);
    trace.start("a");
    trace.decision("a", "q", [], null, "none");

    expect(trace.getEvents()).toEqual([]);
  });

  it("clears collected events", () => {
    const trace = new DefaultTraceCollector(true);
    trace.start("a");
    trace.clear();

    expect(trace.getEvents()).toEqual([]);
  });

  it("creates a no-op collector when tracing is off", () => {
    expect(createTraceCollector(false)).toBeInstanceOf(NoOpTraceCollector);
    expect(createTraceCollector(true).enabled).toBe(true);
  });
});
