import type { AccumulatedArtifact, ArtifactAccumulator } from './accumulator.js';
import type { Plan } from './plan.js';
import type { RunStreamer } from './streamer.js';
import type { StepOutcome, StepRunInput } from './tool-loop.js';
import type { AssetEntry, Step } from './types.js';

export const EXHAUSTED_CAVEAT = 'Stopped after reaching the tool call limit';

export type StepRunner = {
  run(input: StepRunInput): Promise<StepOutcome>;
};

export type DispatchInput = {
  sessionId: string;
  query: string;
  assets: AssetEntry[];
  signal?: AbortSignal;
};

export type DispatchResult = {
  steps: Step[];
  artifacts: AccumulatedArtifact[];
  cancelled: boolean;
  invocations: number;
};

export function buildContextSummary(assets: AssetEntry[], finished: Step[]): string {
  const lines: string[] = [];
  if (assets.length > 0) {
    lines.push('Assets:');
    for (const asset of assets) {
      lines.push(`- ${asset.context.file_name} (${asset.context.file_type}) at ${asset.path}: ${asset.context.description}`);
    }
  }
  if (finished.length > 0) {
    lines.push('Previous steps:');
    for (const step of finished) {
      const result = step.status === 'failed' ? `failed: ${step.error ?? 'unknown error'}` : step.resultSummary;
      lines.push(`- Step ${step.order} (${step.description}): ${result}`);
    }
  }
  return lines.join('\n');
}

/**
 * Runs plan steps one at a time in plan order. A failed step does not stop the plan; cancellation
 * does, leaving the remaining steps pending.
 */
export class TaskDispatcher {
  constructor(
    private readonly runner: StepRunner,
    private readonly accumulator: ArtifactAccumulator,
    private readonly streamer: RunStreamer
  ) {}

  async run(plan: Plan, input: DispatchInput): Promise<DispatchResult> {
    const resourceRefs = input.assets.map((asset) => asset.path);
    let invocations = 0;
    let cancelled = false;

    for (let next = plan.nextPending(); next; next = plan.nextPending()) {
      if (input.signal?.aborted) {
        plan.start(next.order);
        plan.record(next.order, { status: 'failed', resultSummary: '', error: 'cancelled' });
        cancelled = true;
        break;
      }

      const step = plan.start(next.order);
      await this.streamer.emitStateChange({ step: step.order, from: 'pending', to: 'in_progress' });

      const outcome = await this.runner.run({
        query: input.query,
        step,
        sessionId: input.sessionId,
        contextSummary: buildContextSummary(input.assets, plan.finished()),
        resourceRefs,
        signal: input.signal
      });
      invocations += 1;
      this.accumulator.append(step.order, outcome.artifacts);
      for (const artifact of outcome.artifacts) {
        await this.streamer.emitArtifact({ step: step.order, kind: artifact.kind, payload: artifact.payload });
      }

      const recorded = this.record(plan, step.order, outcome);
      await this.streamer.emitStateChange({ step: step.order, from: 'in_progress', to: recorded.status, caveat: recorded.caveat, error: recorded.error });
      if (outcome.exit === 'cancelled') {
        cancelled = true;
        break;
      }
    }

    return { steps: plan.snapshot(), artifacts: this.accumulator.all(), cancelled, invocations };
  }

  private record(plan: Plan, order: number, outcome: StepOutcome): Step {
    switch (outcome.exit) {
      case 'completed':
        return plan.record(order, { status: 'completed', resultSummary: outcome.summary });
      case 'iteration_exhausted':
        return plan.record(order, { status: 'completed', resultSummary: outcome.summary, caveat: EXHAUSTED_CAVEAT });
      case 'failed':
        return plan.record(order, { status: 'failed', resultSummary: outcome.summary, error: outcome.error?.message ?? 'step failed' });
      case 'cancelled':
        return plan.record(order, { status: 'failed', resultSummary: outcome.summary, error: 'cancelled' });
    }
  }
}
