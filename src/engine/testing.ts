import type { ExecuteRequest, ExecutionBackend, InstallRequest, ToolOutput } from '../execution/types.js';
import { succeeded } from '../execution/tool-output.js';
import type {
  AssetEntry,
  AssetInspector,
  ConversationSnapshot,
  ConversationStore,
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
  TurnRecord
} from './types.js';

/**
 * Reasoner stand-in for tests: overridable handlers per phase and a callback that picks tool calls.
 */
export class ScriptedReasoner implements Reasoner {
  readonly routeInputs: RouteInput[] = [];
  readonly superviseInputs: SuperviseInput[] = [];
  readonly planInputs: PlanInput[] = [];
  readonly toolCallInputs: ToolCallInput[] = [];
  readonly replyInputs: ReplyInput[] = [];

  onRoute: (input: RouteInput) => RouterDecision | Promise<RouterDecision> = () => ({
    route: 'analysis',
    reasoning: 'the question needs computation'
  });
  onSupervise: (input: SuperviseInput) => SupervisorDecision | Promise<SupervisorDecision> = () => ({
    needsAnalysis: true,
    reasoning: 'new question'
  });
  onPlan: (input: PlanInput) => PlanDraft | Promise<PlanDraft> = () => ({
    summary: 'single step',
    steps: [{ order: 1, description: 'Analyze', assignedAgent: 'general' }]
  });
  onReply: (input: ReplyInput) => string | Promise<string> = () => 'final answer';

  constructor(private readonly pickToolCall: (input: ToolCallInput, signal?: AbortSignal) => ToolCall | Promise<ToolCall> = () => ({
    tool: 'complete_step',
    summary: 'done'
  })) {}

  async route(input: RouteInput): Promise<RouterDecision> {
    this.routeInputs.push(input);
    return this.onRoute(input);
  }

  async supervise(input: SuperviseInput): Promise<SupervisorDecision> {
    this.superviseInputs.push(input);
    return this.onSupervise(input);
  }

  async plan(input: PlanInput): Promise<PlanDraft> {
    this.planInputs.push(input);
    return this.onPlan(input);
  }

  async nextToolCall(input: ToolCallInput, signal?: AbortSignal): Promise<ToolCall> {
    this.toolCallInputs.push({ ...input, transcript: [...input.transcript] });
    return this.pickToolCall(input, signal);
  }

  async reply(input: ReplyInput): Promise<string> {
    this.replyInputs.push(input);
    return this.onReply(input);
  }
}

/**
 * Execution backend stand-in that records requests and answers from a callback.
 */
export class FakeBackend implements ExecutionBackend {
  readonly name = 'fake';
  readonly executed: ExecuteRequest[] = [];
  readonly installed: InstallRequest[] = [];
  readonly resets: string[] = [];

  constructor(private readonly respond: (request: ExecuteRequest) => ToolOutput | Promise<ToolOutput> = () => succeeded('')) {}

  async execute(request: ExecuteRequest): Promise<ToolOutput> {
    this.executed.push(request);
    return this.respond(request);
  }

  async installPackage(request: InstallRequest): Promise<ToolOutput> {
    this.installed.push(request);
    return succeeded(`Successfully installed ${request.packageSpec}`);
  }

  async resetSession(sessionId: string): Promise<boolean> {
    this.resets.push(sessionId);
    return true;
  }
}

/**
 * In-memory conversation store. The last analysis is whatever the test sets.
 */
export class MemoryConversationStore implements ConversationStore {
  readonly turns: TurnRecord[] = [];
  readonly savedAssets = new Map<string, AssetEntry[]>();
  lastAnalysis: string | null = null;
  recordError: Error | null = null;

  getConversation(sessionId: string): ConversationSnapshot {
    return {
      assets: this.savedAssets.get(sessionId) ?? [],
      recentTurns: this.turns.filter((turn) => turn.sessionId === sessionId).map((turn) => ({ query: turn.query, answer: turn.answer })),
      lastAnalysis: this.lastAnalysis
    };
  }

  saveAssetContexts(sessionId: string, assets: AssetEntry[]): void {
    this.savedAssets.set(sessionId, assets);
  }

  recordTurn(turn: TurnRecord): void {
    if (this.recordError) {
      throw this.recordError;
    }
    this.turns.push(turn);
  }
}

/**
 * Describes every path as a CSV file without touching the filesystem.
 */
export class FakeAssetInspector implements AssetInspector {
  readonly requests: string[][] = [];

  async inspect(paths: string[]): Promise<AssetEntry[]> {
    this.requests.push(paths);
    return paths.map((path) => ({
      assetId: path,
      path,
      context: { description: `rows from ${path}`, file_name: path.split('/').pop() ?? path, file_type: 'csv', metadata: {} }
    }));
  }
}
