import type { Artifact, ExecutionBackend, ToolErrorKind, ToolOutput } from '../execution/types.js';
import { failed, isStepFatal, succeeded } from '../execution/tool-output.js';
import { parseShellCommand } from '../execution/shell-command.js';
import { errorMessage } from '../lib/json.js';
import { allowsTool, roleFor } from './roles.js';
import type { RunStreamer } from './streamer.js';
import type { Reasoner, Step, ToolCall, ToolTurn } from './types.js';

export type LoopState = 'awaiting_tool_call' | 'tool_running' | 'reflecting' | 'completed' | 'iteration_exhausted';

export type LoopExit = 'completed' | 'iteration_exhausted' | 'failed' | 'cancelled';

export type StepRunInput = {
  query: string;
  step: Step;
  sessionId: string;
  contextSummary: string;
  resourceRefs: string[];
  signal?: AbortSignal;
};

export type StepOutcome = {
  exit: LoopExit;
  summary: string;
  artifacts: Artifact[];
  transcript: ToolTurn[];
  iterations: number;
  error: { kind: ToolErrorKind; message: string } | null;
};

function describeCall(call: ToolCall): Record<string, unknown> {
  switch (call.tool) {
    case 'execute_code':
      return { tool: call.tool, code: call.code, rationale: call.rationale };
    case 'execute_shell':
      return { tool: call.tool, command: call.command, rationale: call.rationale };
    case 'reflect':
      return { tool: call.tool, note: call.note };
    case 'complete_step':
      return { tool: call.tool, summary: call.summary };
  }
}

function partialSummary(transcript: ToolTurn[]): string {
  for (let i = transcript.length - 1; i >= 0; i -= 1) {
    const turn = transcript[i];
    if (turn.call?.tool === 'execute_code' && turn.output.success && turn.output.output.trim()) {
      return `Partial result: ${turn.output.output.trim()}`;
    }
  }
  for (let i = transcript.length - 1; i >= 0; i -= 1) {
    const call = transcript[i].call;
    if (call?.tool === 'reflect') {
      return `Partial result (last reflection): ${call.note}`;
    }
  }
  return 'No result was produced before the tool call limit was reached';
}

/**
 * Drives one plan step: ask the reasoner for a tool call, run it, feed the output back, and repeat
 * until the reasoner calls `complete_step` or the iteration budget runs out. Infrastructure and
 * timeout failures end the step; code-level failures go back to the reasoner for another attempt.
 */
export class ToolExecutionLoop {
  constructor(
    private readonly reasoner: Reasoner,
    private readonly backend: ExecutionBackend,
    private readonly streamer: RunStreamer,
    private readonly limits: { maxIterations: number }
  ) {
    if (!Number.isInteger(limits.maxIterations) || limits.maxIterations < 1) {
      throw new Error('maxIterations must be a positive integer');
    }
  }

  async run(input: StepRunInput): Promise<StepOutcome> {
    const role = roleFor(input.step.role);
    const transcript: ToolTurn[] = [];
    const artifacts: Artifact[] = [];
    const order = input.step.order;
    let state: LoopState = 'awaiting_tool_call';

    const moveTo = async (to: LoopState): Promise<void> => {
      if (to !== state) {
        await this.streamer.emitStateChange({ step: order, from: state, to });
        state = to;
      }
    };

    const outcome = (exit: LoopExit, summary: string, error: StepOutcome['error'] = null): StepOutcome => ({
      exit,
      summary,
      artifacts,
      transcript,
      iterations: transcript.length,
      error
    });

    await this.streamer.emitEvent({ level: 'info', message: 'Step started', data: { step: order, role: role.kind, max_iterations: this.limits.maxIterations } });

    for (let iteration = 1; iteration <= this.limits.maxIterations; iteration += 1) {
      if (input.signal?.aborted) {
        return outcome('cancelled', partialSummary(transcript), { kind: 'cancelled', message: 'step cancelled' });
      }

      let call: ToolCall;
      try {
        call = await this.reasoner.nextToolCall({
          query: input.query,
          step: input.step,
          role,
          contextSummary: input.contextSummary,
          transcript,
          iteration,
          maxIterations: this.limits.maxIterations
        }, input.signal);
      } catch (error) {
        if (input.signal?.aborted) {
          return outcome('cancelled', partialSummary(transcript), { kind: 'cancelled', message: 'step cancelled' });
        }
        const output = failed('reasoning', `reasoning failed: ${errorMessage(error)}`);
        transcript.push({ iteration, call: null, output });
        await this.streamer.emitError({ code: 'REASONING_FAILED', step: order, iteration, message: output.error });
        continue;
      }

      await this.streamer.emitAction({ step: order, iteration, ...describeCall(call) });

      if (!allowsTool(role, call.tool)) {
        const output = failed('rejected', `tool ${call.tool} is not available to the ${role.kind} role`);
        transcript.push({ iteration, call, output });
        await this.streamer.emitToolResult({ step: order, iteration, tool: call.tool, success: false, error: output.error });
        continue;
      }

      if (call.tool === 'complete_step') {
        await moveTo('completed');
        transcript.push({ iteration, call, output: succeeded(call.summary) });
        return outcome('completed', call.summary);
      }

      if (call.tool === 'reflect') {
        await moveTo('reflecting');
        transcript.push({ iteration, call, output: succeeded(`Reflection recorded: ${call.note}`) });
        await moveTo('awaiting_tool_call');
        continue;
      }

      await moveTo('tool_running');
      const output = call.tool === 'execute_code'
        ? await this.runCode(call.code, input)
        : await this.runShell(call.command, input);
      transcript.push({ iteration, call, output });
      await this.streamer.emitToolResult({
        step: order,
        iteration,
        tool: call.tool,
        success: output.success,
        error_kind: output.errorKind,
        error: output.error,
        output: output.output
      });

      if (output.success && call.tool === 'execute_code') {
        if (output.output.trim()) {
          artifacts.push({ kind: 'code-result', payload: output.output });
        }
        artifacts.push(...output.artifacts);
      }

      if (output.errorKind === 'cancelled') {
        return outcome('cancelled', partialSummary(transcript), { kind: 'cancelled', message: output.error ?? 'cancelled' });
      }
      const kind = output.errorKind;
      if (isStepFatal(kind)) {
        await this.streamer.emitError({ code: 'STEP_TOOL_FAILURE', step: order, kind, message: output.error });
        return outcome('failed', partialSummary(transcript), { kind, message: output.error ?? kind });
      }
      await moveTo('awaiting_tool_call');
    }

    await moveTo('iteration_exhausted');
    await this.streamer.emitEvent({ level: 'warn', message: 'Tool call limit reached', data: { step: order, max_iterations: this.limits.maxIterations } });
    return outcome('iteration_exhausted', partialSummary(transcript));
  }

  private runCode(code: string, input: StepRunInput): Promise<ToolOutput> {
    return this.backend.execute({
      sessionId: input.sessionId,
      code,
      resourceRefs: input.resourceRefs,
      signal: input.signal
    });
  }

  private async runShell(command: string, input: StepRunInput): Promise<ToolOutput> {
    const parsed = parseShellCommand(command);
    if (!parsed.ok) {
      return failed('rejected', parsed.error);
    }
    const lines: string[] = [];
    for (const packageSpec of parsed.packages) {
      const result = await this.backend.installPackage({ sessionId: input.sessionId, packageSpec, signal: input.signal });
      if (!result.success) {
        return { ...result, output: [...lines, result.output].filter(Boolean).join('\n') };
      }
      lines.push(result.output);
    }
    return succeeded(lines.join('\n'));
  }
}

