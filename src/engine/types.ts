import type { Artifact, ToolOutput } from '../execution/types.js';

export type StepStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export type ToolName = 'execute_code' | 'execute_shell' | 'reflect' | 'complete_step';

export type ExecutorRole =
  | { kind: 'spreadsheet'; tools: readonly ['execute_code', 'execute_shell', 'reflect', 'complete_step'] }
  | { kind: 'code'; tools: readonly ['execute_code', 'execute_shell', 'reflect', 'complete_step'] }
  | { kind: 'general'; tools: readonly ['execute_code', 'execute_shell', 'reflect', 'complete_step'] }
  | { kind: 'document'; tools: readonly ['execute_code', 'execute_shell', 'complete_step'] }
  | { kind: 'presentation'; tools: readonly ['execute_code', 'execute_shell', 'complete_step'] };

export type RoleKind = ExecutorRole['kind'];

export type Step = {
  order: number;
  description: string;
  role: RoleKind;
  status: StepStatus;
  resultSummary: string;
  error: string | null;
  caveat: string | null;
};

export type ToolCall =
  | { tool: 'execute_code'; code: string; rationale: string }
  | { tool: 'execute_shell'; command: string; rationale: string }
  | { tool: 'reflect'; note: string }
  | { tool: 'complete_step'; summary: string };

export type ToolTurn = {
  iteration: number;
  call: ToolCall | null;
  output: ToolOutput;
};

export type Route = 'chat' | 'analysis' | 'analysis_followup';

export type RouterDecision = {
  route: Route;
  reasoning: string;
};

export type SupervisorDecision = {
  needsAnalysis: boolean;
  reasoning: string;
};

export type PlanDraftStep = {
  order: number;
  description: string;
  assignedAgent: string;
};

export type PlanDraft = {
  summary: string;
  steps: PlanDraftStep[];
};

export type AssetContext = {
  description: string;
  file_name: string;
  file_type: string;
  metadata: Record<string, unknown>;
};

export type AssetEntry = {
  assetId: string;
  path: string;
  context: AssetContext;
};

export type ConversationTurnSummary = {
  query: string;
  answer: string;
};

export type RouteInput = {
  query: string;
  hasAssets: boolean;
  hasPreviousAnalysis: boolean;
  recentTurns: ConversationTurnSummary[];
};

export type SuperviseInput = {
  query: string;
  previousAnalysis: string;
  assets: AssetEntry[];
};

export type PlanInput = {
  query: string;
  assets: AssetEntry[];
  roles: RoleKind[];
};

export type ToolCallInput = {
  query: string;
  step: Step;
  role: ExecutorRole;
  contextSummary: string;
  transcript: ToolTurn[];
  iteration: number;
  maxIterations: number;
};

export type ReplyInput =
  | { kind: 'chat'; query: string; recentTurns: ConversationTurnSummary[] }
  | { kind: 'followup'; query: string; previousAnalysis: string; assets: AssetEntry[] }
  | { kind: 'report'; query: string; planSummary: string; steps: Step[]; artifacts: Artifact[] };

/**
 * The reasoning collaborator. Every method may throw; callers decide whether a failure is fatal.
 */
export interface Reasoner {
  route(input: RouteInput, signal?: AbortSignal): Promise<RouterDecision>;
  supervise(input: SuperviseInput, signal?: AbortSignal): Promise<SupervisorDecision>;
  plan(input: PlanInput, signal?: AbortSignal): Promise<PlanDraft>;
  nextToolCall(input: ToolCallInput, signal?: AbortSignal): Promise<ToolCall>;
  reply(input: ReplyInput, signal?: AbortSignal): Promise<string>;
}

export type OrchestratorState =
  | 'classify'
  | 'dispatch_assets'
  | 'decide_supervision'
  | 'plan'
  | 'execute'
  | 'answer_from_context'
  | 'respond';

export type TurnOutcome = 'answered' | 'complete' | 'partial' | 'failed' | 'cancelled';

export type TurnArtifact = Artifact & { stepOrder: number; sequence: number };

export type OrchestrationResult = {
  turnId: string;
  sessionId: string;
  route: Route | null;
  answer: string;
  outcome: TurnOutcome;
  plan: { summary: string; steps: Step[] } | null;
  artifacts: TurnArtifact[];
  decisions: { router: RouterDecision | null; supervisor: SupervisorDecision | null };
  transitions: Array<{ from: OrchestratorState; to: OrchestratorState }>;
  error: string | null;
};

export type TurnRecord = OrchestrationResult & {
  query: string;
  createdAt: string;
};

export type ConversationSnapshot = {
  assets: AssetEntry[];
  recentTurns: ConversationTurnSummary[];
  lastAnalysis: string | null;
};

/**
 * Durable conversation state the orchestrator reads before a turn and writes after it.
 */
export interface ConversationStore {
  getConversation(sessionId: string): ConversationSnapshot;
  saveAssetContexts(sessionId: string, assets: AssetEntry[]): void;
  recordTurn(turn: TurnRecord): void;
}

/**
 * Produces the opaque data context for each asset path. `cached` entries may be reused when the
 * file has not changed since they were built.
 */
export interface AssetInspector {
  inspect(paths: string[], cached: AssetEntry[], signal?: AbortSignal): Promise<AssetEntry[]>;
}
