import { randomUUID } from 'node:crypto';
import type { ExecutionBackend } from '../execution/types.js';
import { errorMessage } from '../lib/json.js';
import { ArtifactAccumulator } from './accumulator.js';
import { TaskDispatcher, type DispatchResult } from './dispatcher.js';
import { Plan } from './plan.js';
import { ROLE_KINDS } from './roles.js';
import { discardEnvelopes, RunStreamer, type EmitFn } from './streamer.js';
import { ToolExecutionLoop } from './tool-loop.js';
import type {
  AssetEntry,
  AssetInspector,
  ConversationSnapshot,
  ConversationStore,
  OrchestrationResult,
  OrchestratorState,
  Reasoner,
  Route,
  RouterDecision,
  Step,
  SupervisorDecision,
  TurnOutcome
} from './types.js';

const VALID_TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
  classify: ['respond', 'dispatch_assets', 'decide_supervision'],
  dispatch_assets: ['decide_supervision', 'respond'],
  decide_supervision: ['plan', 'answer_from_context', 'respond'],
  plan: ['execute', 'respond'],
  execute: ['respond'],
  answer_from_context: ['respond'],
  respond: []
};

export type OrchestratorDeps = {
  reasoner: Reasoner;
  backend: ExecutionBackend;
  inspector: AssetInspector;
  store: ConversationStore;
  maxIterations: number;
  emit?: EmitFn;
  newTurnId?: () => string;
};

export type TurnRequest = {
  sessionId: string;
  query: string;
  assetPaths: string[];
  signal?: AbortSignal;
};

type TurnState = {
  conversation: ConversationSnapshot;
  assets: AssetEntry[];
  route: Route | null;
  router: RouterDecision | null;
  supervisor: SupervisorDecision | null;
  plan: Plan | null;
  dispatch: DispatchResult | null;
  answer: string;
  fault: string | null;
};

export function compileReport(steps: Step[]): string {
  const lines = steps.map((step) => {
    let result: string;
    if (step.status === 'failed') {
      result = `failed (${step.error ?? 'unknown error'})`;
    } else if (step.status === 'completed') {
      result = step.resultSummary;
    } else {
      result = 'not run';
    }
    return `${step.order}. ${step.description}: ${result}${step.caveat ? ` [${step.caveat}]` : ''}`;
  });
  return ['Analysis results:', ...lines].join('\n');
}

export function planOutcome(dispatch: DispatchResult): TurnOutcome {
  if (dispatch.cancelled) {
    return 'cancelled';
  }
  if (dispatch.steps.every((step) => step.status === 'failed')) {
    return 'failed';
  }
  if (dispatch.steps.some((step) => step.status !== 'completed' || step.caveat)) {
    return 'partial';
  }
  return 'complete';
}

/**
 * One conversational turn as an explicit state machine: route the query, inspect assets, decide
 * whether prior results already answer it, plan, execute the plan, and respond. Any fault jumps to
 * `respond` with what has been gathered so far; the turn is always recorded.
 */
export class Orchestrator {
  private readonly newTurnId: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.newTurnId = deps.newTurnId ?? (() => `turn_${randomUUID()}`);
  }

  async run(request: TurnRequest): Promise<OrchestrationResult> {
    const turnId = this.newTurnId();
    const streamer = new RunStreamer(turnId, 'classify', this.deps.emit ?? discardEnvelopes);
    const accumulator = new ArtifactAccumulator();
    const transitions: OrchestrationResult['transitions'] = [];
    const turn: TurnState = {
      conversation: { assets: [], recentTurns: [], lastAnalysis: null },
      assets: [],
      route: null,
      router: null,
      supervisor: null,
      plan: null,
      dispatch: null,
      answer: '',
      fault: null
    };

    const transition = async (from: OrchestratorState, to: OrchestratorState): Promise<OrchestratorState> => {
      if (!VALID_TRANSITIONS[from].includes(to)) {
        throw new Error(`invalid orchestrator transition ${from} -> ${to}`);
      }
      transitions.push({ from, to });
      await streamer.forPhase(to).emitStateChange({ from, to });
      return to;
    };

    await streamer.emitEvent({ level: 'info', message: 'Turn started', data: { session_id: request.sessionId, query: request.query } });

    let state: OrchestratorState = 'classify';
    try {
      while (state !== 'respond') {
        if (request.signal?.aborted) {
          throw new Error('turn cancelled');
        }
        const next = await this.advance(state, request, turn, streamer, accumulator);
        state = await transition(state, next);
      }
    } catch (error) {
      turn.fault = errorMessage(error);
      await streamer.forPhase(state).emitError({ code: 'ORCHESTRATION_FAULT', state, message: turn.fault });
      if (state !== 'respond') {
        state = await transition(state, 'respond');
      }
    }

    const result = await this.respond(turnId, request, turn, streamer.forPhase('respond'), accumulator, transitions);
    try {
      this.deps.store.recordTurn({ ...result, query: request.query, createdAt: new Date().toISOString() });
    } catch (error) {
      const message = `failed to record turn: ${errorMessage(error)}`;
      console.error(`[stepflow] ${message}`);
      return { ...result, outcome: 'failed', error: result.error ?? message };
    }
    return result;
  }

  private async advance(
    state: OrchestratorState,
    request: TurnRequest,
    turn: TurnState,
    streamer: RunStreamer,
    accumulator: ArtifactAccumulator
  ): Promise<OrchestratorState> {
    const { reasoner } = this.deps;

    switch (state) {
      case 'classify': {
        turn.conversation = this.deps.store.getConversation(request.sessionId);
        turn.assets = turn.conversation.assets;
        turn.router = await reasoner.route({
          query: request.query,
          hasAssets: request.assetPaths.length > 0 || turn.assets.length > 0,
          hasPreviousAnalysis: turn.conversation.lastAnalysis !== null,
          recentTurns: turn.conversation.recentTurns
        }, request.signal);
        turn.route = turn.router.route;
        await streamer.forPhase('classify').emitAction({ route: turn.router.route, reasoning: turn.router.reasoning });
        if (turn.router.route === 'chat') {
          return 'respond';
        }
        return turn.router.route === 'analysis' ? 'dispatch_assets' : 'decide_supervision';
      }

      case 'dispatch_assets': {
        const paths = [...new Set([...turn.assets.map((asset) => asset.path), ...request.assetPaths])];
        turn.assets = await this.deps.inspector.inspect(paths, turn.assets, request.signal);
        this.deps.store.saveAssetContexts(request.sessionId, turn.assets);
        await streamer.forPhase('dispatch_assets').emitEvent({
          level: 'info',
          message: 'Assets inspected',
          data: { assets: turn.assets.map((asset) => asset.context.file_name) }
        });
        return 'decide_supervision';
      }

      case 'decide_supervision': {
        const previousAnalysis = turn.conversation.lastAnalysis;
        if (previousAnalysis === null) {
          turn.supervisor = { needsAnalysis: true, reasoning: 'No previous analysis in this conversation' };
        } else {
          turn.supervisor = await reasoner.supervise({ query: request.query, previousAnalysis, assets: turn.assets }, request.signal);
          await streamer.forPhase('decide_supervision').emitAction({ needs_analysis: turn.supervisor.needsAnalysis, reasoning: turn.supervisor.reasoning });
        }
        return turn.supervisor.needsAnalysis ? 'plan' : 'answer_from_context';
      }

      case 'plan': {
        const draft = await reasoner.plan({ query: request.query, assets: turn.assets, roles: [...ROLE_KINDS] }, request.signal);
        turn.plan = Plan.fromDraft(draft, { query: request.query, role: 'general' });
        await streamer.forPhase('plan').emitAction({
          summary: turn.plan.summary,
          steps: turn.plan.snapshot().map((step) => ({ order: step.order, description: step.description, role: step.role }))
        });
        return 'execute';
      }

      case 'execute': {
        if (!turn.plan) {
          throw new Error('execute reached without a plan');
        }
        const phase = streamer.forPhase('execute');
        const loop = new ToolExecutionLoop(reasoner, this.deps.backend, phase, { maxIterations: this.deps.maxIterations });
        const dispatcher = new TaskDispatcher(loop, accumulator, phase);
        turn.dispatch = await dispatcher.run(turn.plan, {
          sessionId: request.sessionId,
          query: request.query,
          assets: turn.assets,
          signal: request.signal
        });
        return 'respond';
      }

      case 'answer_from_context': {
        turn.answer = await reasoner.reply({
          kind: 'followup',
          query: request.query,
          previousAnalysis: turn.conversation.lastAnalysis ?? '',
          assets: turn.assets
        }, request.signal);
        return 'respond';
      }

      case 'respond':
        return 'respond';
    }
  }

  private async respond(
    turnId: string,
    request: TurnRequest,
    turn: TurnState,
    streamer: RunStreamer,
    accumulator: ArtifactAccumulator,
    transitions: OrchestrationResult['transitions']
  ): Promise<OrchestrationResult> {
    const steps = turn.plan?.snapshot() ?? [];
    let outcome: TurnOutcome;
    let answer = turn.answer;
    let error = turn.fault;

    if (error !== null) {
      outcome = request.signal?.aborted ? 'cancelled' : 'failed';
      if (!answer) {
        answer = steps.some((step) => step.status !== 'pending')
          ? compileReport(steps)
          : `The request could not be completed: ${error}`;
      }
    } else if (turn.dispatch) {
      outcome = planOutcome(turn.dispatch);
      answer = compileReport(steps);
      if (!turn.dispatch.cancelled) {
        try {
          answer = await this.deps.reasoner.reply({
            kind: 'report',
            query: request.query,
            planSummary: turn.plan?.summary ?? '',
            steps,
            artifacts: accumulator.all().map(({ kind, payload }) => ({ kind, payload }))
          }, request.signal);
        } catch (replyError) {
          await streamer.emitError({ code: 'REPORT_FAILED', message: errorMessage(replyError) });
        }
      }
    } else if (turn.route === 'chat') {
      try {
        answer = await this.deps.reasoner.reply({ kind: 'chat', query: request.query, recentTurns: turn.conversation.recentTurns }, request.signal);
        outcome = 'answered';
      } catch (replyError) {
        error = errorMessage(replyError);
        outcome = request.signal?.aborted ? 'cancelled' : 'failed';
        answer = `The request could not be completed: ${error}`;
      }
    } else {
      outcome = 'answered';
    }

    await streamer.emitEvent({ level: outcome === 'failed' ? 'error' : 'info', message: 'Turn finished', data: { outcome } });

    return {
      turnId,
      sessionId: request.sessionId,
      route: turn.route,
      answer,
      outcome,
      plan: turn.plan ? { summary: turn.plan.summary, steps } : null,
      artifacts: accumulator.all(),
      decisions: { router: turn.router, supervisor: turn.supervisor },
      transitions,
      error
    };
  }
}
