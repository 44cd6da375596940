/**
 * Type-safe pipeline builder.
 *
 * Each `pipe()` checks at compile time that the pass accepts the artifact
 * produced by the previous one.
 */

import type { Artifact, Pass, PassContext, Pipeline } from "./types";

function runPass<TIn extends Artifact, TOut extends Artifact>(
  pass: Pass<TIn, TOut>,
  input: TIn,
  ctx: PassContext,
): TOut {
  ctx.trace.start(pass.id);
  const passStart = performance.now();

  let output: TOut;
  try {
    output = pass.run(input, ctx);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.trace.warning(pass.id, `Pass failed: ${message}`);
    throw error;
  }

  ctx.trace.end(pass.id, performance.now() - passStart);
  ctx.trace.artifact(pass.id, output);
  return output;
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 */
export class PipelineBuilder<TStart extends Artifact, TCurrent extends Artifact> {
  private constructor(
    private readonly id: string,
    private readonly execute: (input: TStart, ctx: PassContext) => TCurrent,
    private readonly passIds: readonly string[],
  ) {}

  static create<TStart extends Artifact>(
    id: string,
  ): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, (input) => input, []);
  }

  pipe<TNext extends Artifact>(
    pass: Pass<TCurrent, TNext>,
  ): PipelineBuilder<TStart, TNext> {
    const previous = this.execute;
    return new PipelineBuilder<TStart, TNext>(
      this.id,
      (input, ctx) => runPass(pass, previous(input, ctx), ctx),
      [...this.passIds, pass.id],
    );
  }

  build(): Pipeline<TStart, TCurrent> {
    return {
      id: this.id,
      passIds: this.passIds,
      run: this.execute,
    };
  }
}

/**
 * Convenience function to create a pipeline
 */
export function createPipeline<TStart extends Artifact>(
  id: string,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id);
}
