import type { ProviderName } from '../engine/config.js';
import type {
  PlanDraft,
  PlanInput,
  Reasoner,
  ReplyInput,
  RouteInput,
  RouterDecision,
  SuperviseInput,
  SupervisorDecision,
  ToolCall,
  ToolCallInput,
  ToolTurn
} from '../engine/types.js';
import { extractJsonObject } from '../lib/json.js';
import { runCommand, type CommandResult } from '../lib/run-command.js';
import { parsePlanDraft, parseReply, parseRouterDecision, parseSupervisorDecision, parseToolCall } from './decisions.js';
import { buildPhasePrompt, readPhaseSchema, readSystemPromptFile, type ReasoningPhase } from './prompts.js';
import { buildProviderCommand } from './providers.js';

export type ProviderReasonerOptions = {
  provider: ProviderName;
  cwd: string;
  phaseTimeoutMs: number;
  streamLogs?: boolean;
  // Largest tool output forwarded in a transcript entry.
  maxTranscriptOutputChars?: number;
};

export type PhaseRunner = (command: string, args: string[], options: { cwd: string; stdin: string | null; timeoutMs: number; signal?: AbortSignal }) => Promise<CommandResult>;

function clip(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}\n...[truncated]` : text;
}

/**
 * Reasoner backed by a provider CLI. Each phase renders its system prompt plus an INPUT_JSON block,
 * asks the provider for schema-constrained JSON, and validates the reply.
 */
export class ProviderReasoner implements Reasoner {
  private readonly base: string;

  constructor(
    private readonly options: ProviderReasonerOptions,
    private readonly runner: PhaseRunner = runCommand
  ) {
    this.base = readSystemPromptFile('base.md');
  }

  async route(input: RouteInput, signal?: AbortSignal): Promise<RouterDecision> {
    const output = await this.runPhase('route', {
      query: input.query,
      has_assets: input.hasAssets,
      has_previous_analysis: input.hasPreviousAnalysis,
      recent_turns: input.recentTurns
    }, signal);
    return parseRouterDecision(output);
  }

  async supervise(input: SuperviseInput, signal?: AbortSignal): Promise<SupervisorDecision> {
    const output = await this.runPhase('supervise', {
      query: input.query,
      previous_analysis: input.previousAnalysis,
      assets: input.assets.map((asset) => asset.context)
    }, signal);
    return parseSupervisorDecision(output);
  }

  async plan(input: PlanInput, signal?: AbortSignal): Promise<PlanDraft> {
    const output = await this.runPhase('plan', {
      query: input.query,
      assets: input.assets.map((asset) => ({ path: asset.path, ...asset.context })),
      available_agents: input.roles
    }, signal);
    return parsePlanDraft(output);
  }

  async nextToolCall(input: ToolCallInput, signal?: AbortSignal): Promise<ToolCall> {
    const output = await this.runPhase('tool-call', {
      query: input.query,
      step: { order: input.step.order, description: input.step.description },
      role: input.role.kind,
      allowed_tools: input.role.tools,
      context: input.contextSummary,
      iteration: input.iteration,
      max_iterations: input.maxIterations,
      transcript: input.transcript.map((turn) => this.describeTurn(turn))
    }, signal);
    return parseToolCall(output);
  }

  async reply(input: ReplyInput, signal?: AbortSignal): Promise<string> {
    let payload: Record<string, unknown>;
    switch (input.kind) {
      case 'chat':
        payload = { kind: input.kind, query: input.query, recent_turns: input.recentTurns };
        break;
      case 'followup':
        payload = {
          kind: input.kind,
          query: input.query,
          previous_analysis: input.previousAnalysis,
          assets: input.assets.map((asset) => asset.context)
        };
        break;
      case 'report':
        payload = {
          kind: input.kind,
          query: input.query,
          plan_summary: input.planSummary,
          steps: input.steps.map((step) => ({
            order: step.order,
            description: step.description,
            status: step.status,
            result: step.resultSummary,
            error: step.error,
            caveat: step.caveat
          })),
          artifacts: input.artifacts
        };
        break;
    }
    return parseReply(await this.runPhase('reply', payload, signal));
  }

  private describeTurn(turn: ToolTurn): Record<string, unknown> {
    const limit = this.options.maxTranscriptOutputChars ?? 8000;
    return {
      iteration: turn.iteration,
      call: turn.call,
      success: turn.output.success,
      output: clip(turn.output.output, limit),
      error: turn.output.error,
      error_kind: turn.output.errorKind
    };
  }

  private async runPhase(phase: ReasoningPhase, input: Record<string, unknown>, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const { provider, streamLogs } = this.options;
    if (streamLogs) {
      console.log(`[reasoner][${phase}] start`);
    }

    const prompt = buildPhasePrompt(this.base, readSystemPromptFile(`${phase}.md`), input);
    const cmd = buildProviderCommand(provider, prompt, readPhaseSchema(phase));
    const result = await this.runner(cmd.command, cmd.args, {
      cwd: this.options.cwd,
      stdin: cmd.stdin,
      timeoutMs: this.options.phaseTimeoutMs,
      signal
    });

    if (result.spawnError) {
      if (streamLogs) {
        console.log(`[reasoner][${phase}] spawn_error=${result.spawnError}`);
      }
      throw new Error(result.spawnError);
    }
    if (result.exitCode !== 0) {
      if (streamLogs) {
        console.log(`[reasoner][${phase}] exit_code=${result.exitCode}`);
      }
      throw new Error(`${phase} failed with exit code ${result.exitCode}: ${(result.stderr || result.stdout).trim()}`);
    }

    const parsed = extractJsonObject(result.stdout || result.stderr);
    if (streamLogs) {
      console.log(`[reasoner][${phase}] done`);
    }
    return parsed;
  }
}
