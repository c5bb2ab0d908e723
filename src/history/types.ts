import type { StreamProducer, StreamType } from '../engine/streamer.js';
import type { RoleKind, Route, StepStatus, TurnOutcome } from '../engine/types.js';

export type AssetContextRow = {
  session_id: string;
  path: string;
  asset_id: string;
  context_json: string;
  position: number;
  updated_at: string;
};

export type TurnRow = {
  id: string;
  session_id: string;
  query: string;
  route: Route | null;
  router_json: string | null;
  supervisor_json: string | null;
  plan_summary: string | null;
  answer: string;
  outcome: TurnOutcome;
  error: string | null;
  transitions_json: string;
  created_at: string;
};

export type TurnStepRow = {
  turn_id: string;
  step_order: number;
  description: string;
  role: RoleKind;
  status: StepStatus;
  result_summary: string;
  error: string | null;
  caveat: string | null;
};

export type ArtifactRow = {
  id: number;
  turn_id: string;
  step_order: number;
  sequence: number;
  kind: string;
  payload_json: string;
  created_at: string;
};

export type EventRow = {
  id: number;
  run_id: string;
  sequence: number;
  type: StreamType;
  phase: string;
  producer: StreamProducer;
  payload_json: string;
  created_at: string;
};

export type TurnListFilter = {
  sessionId?: string;
  limit: number;
};
