import type Database from 'better-sqlite3';
import type { StreamEnvelope } from '../engine/streamer.js';
import type {
  AssetContext,
  AssetEntry,
  ConversationSnapshot,
  ConversationStore,
  ConversationTurnSummary,
  Step,
  TurnArtifact,
  TurnRecord
} from '../engine/types.js';
import { isRecord } from '../lib/json.js';
import type { ArtifactRow, AssetContextRow, EventRow, TurnListFilter, TurnRow, TurnStepRow } from './types.js';

const RECENT_TURNS = 6;

function nowIso(): string {
  return new Date().toISOString();
}

function parseJsonValue(text: string): unknown {
  return JSON.parse(text) as unknown;
}

function parseAssetContext(row: AssetContextRow): AssetContext {
  const value = parseJsonValue(row.context_json);
  if (!isRecord(value)) {
    throw new Error(`asset context for ${row.path} is not an object`);
  }
  return {
    description: typeof value.description === 'string' ? value.description : '',
    file_name: typeof value.file_name === 'string' ? value.file_name : row.path,
    file_type: typeof value.file_type === 'string' ? value.file_type : 'unknown',
    metadata: isRecord(value.metadata) ? value.metadata : {}
  };
}

function toStep(row: TurnStepRow): Step {
  return {
    order: row.step_order,
    description: row.description,
    role: row.role,
    status: row.status,
    resultSummary: row.result_summary,
    error: row.error,
    caveat: row.caveat
  };
}

export type TurnDetail = {
  turn: TurnRow;
  steps: Step[];
  artifacts: TurnArtifact[];
};

/**
 * SQLite ledger of conversations. Turns are written once, together with their steps and artifacts;
 * run events are appended as they stream.
 */
export class HistoryRepository implements ConversationStore {
  constructor(private readonly db: Database.Database) {}

  private touchConversation(sessionId: string, now: string): void {
    this.db
      .prepare(
        `INSERT INTO conversations (session_id, created_at, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(session_id) DO UPDATE SET updated_at = excluded.updated_at`
      )
      .run(sessionId, now, now);
  }

  getConversation(sessionId: string): ConversationSnapshot {
    const recentTurns = this.db
      .prepare<[string, number], ConversationTurnSummary>(
        'SELECT query, answer FROM turns WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?'
      )
      .all(sessionId, RECENT_TURNS)
      .reverse();
    return {
      assets: this.listAssetContexts(sessionId),
      recentTurns,
      lastAnalysis: this.lastAnalysis(sessionId)
    };
  }

  lastAnalysis(sessionId: string): string | null {
    const row = this.db
      .prepare<[string], Pick<TurnRow, 'answer'>>(
        `SELECT answer FROM turns
         WHERE session_id = ? AND plan_summary IS NOT NULL AND outcome IN ('complete', 'partial')
         ORDER BY created_at DESC, rowid DESC
         LIMIT 1`
      )
      .get(sessionId);
    return row?.answer ?? null;
  }

  listAssetContexts(sessionId: string): AssetEntry[] {
    return this.db
      .prepare<[string], AssetContextRow>('SELECT * FROM asset_contexts WHERE session_id = ? ORDER BY position ASC')
      .all(sessionId)
      .map((row) => ({ assetId: row.asset_id, path: row.path, context: parseAssetContext(row) }));
  }

  saveAssetContexts(sessionId: string, assets: AssetEntry[]): void {
    const tx = this.db.transaction(() => {
      const now = nowIso();
      this.touchConversation(sessionId, now);
      this.db.prepare('DELETE FROM asset_contexts WHERE session_id = ?').run(sessionId);
      const insert = this.db.prepare(
        `INSERT INTO asset_contexts (session_id, path, asset_id, context_json, position, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      assets.forEach((asset, position) => {
        insert.run(sessionId, asset.path, asset.assetId, JSON.stringify(asset.context), position, now);
      });
    });
    tx();
  }

  recordTurn(turn: TurnRecord): void {
    const tx = this.db.transaction(() => {
      this.touchConversation(turn.sessionId, turn.createdAt);
      this.db
        .prepare(
          `INSERT INTO turns (
            id, session_id, query, route, router_json, supervisor_json, plan_summary,
            answer, outcome, error, transitions_json, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          turn.turnId,
          turn.sessionId,
          turn.query,
          turn.route,
          turn.decisions.router ? JSON.stringify(turn.decisions.router) : null,
          turn.decisions.supervisor ? JSON.stringify(turn.decisions.supervisor) : null,
          turn.plan ? turn.plan.summary : null,
          turn.answer,
          turn.outcome,
          turn.error,
          JSON.stringify(turn.transitions),
          turn.createdAt
        );

      const insertStep = this.db.prepare(
        `INSERT INTO turn_steps (turn_id, step_order, description, role, status, result_summary, error, caveat)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      );
      for (const step of turn.plan?.steps ?? []) {
        insertStep.run(turn.turnId, step.order, step.description, step.role, step.status, step.resultSummary, step.error, step.caveat);
      }

      const insertArtifact = this.db.prepare(
        `INSERT INTO artifacts (turn_id, step_order, sequence, kind, payload_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      for (const artifact of turn.artifacts) {
        insertArtifact.run(turn.turnId, artifact.stepOrder, artifact.sequence, artifact.kind, JSON.stringify(artifact.payload ?? null), turn.createdAt);
      }
    });
    tx();
  }

  appendEvent(envelope: StreamEnvelope): void {
    this.db
      .prepare(
        `INSERT INTO events (run_id, sequence, type, phase, producer, payload_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(envelope.run_id, envelope.sequence, envelope.type, envelope.phase, envelope.producer, JSON.stringify(envelope.payload), envelope.timestamp);
  }

  listTurns(filter: TurnListFilter): TurnRow[] {
    if (filter.sessionId) {
      return this.db
        .prepare<[string, number], TurnRow>('SELECT * FROM turns WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?')
        .all(filter.sessionId, filter.limit);
    }
    return this.db
      .prepare<[number], TurnRow>('SELECT * FROM turns ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(filter.limit);
  }

  getTurn(turnId: string): TurnDetail | null {
    const turn = this.db.prepare<[string], TurnRow>('SELECT * FROM turns WHERE id = ?').get(turnId);
    if (!turn) {
      return null;
    }
    const steps = this.db
      .prepare<[string], TurnStepRow>('SELECT * FROM turn_steps WHERE turn_id = ? ORDER BY step_order ASC')
      .all(turnId)
      .map(toStep);
    return { turn, steps, artifacts: this.listArtifacts(turnId) };
  }

  listArtifacts(turnId: string): TurnArtifact[] {
    return this.db
      .prepare<[string], ArtifactRow>('SELECT * FROM artifacts WHERE turn_id = ? ORDER BY sequence ASC')
      .all(turnId)
      .map((row) => ({ kind: row.kind, payload: parseJsonValue(row.payload_json), stepOrder: row.step_order, sequence: row.sequence }));
  }

  listEvents(runId: string): StreamEnvelope[] {
    return this.db
      .prepare<[string], EventRow>('SELECT * FROM events WHERE run_id = ? ORDER BY sequence ASC')
      .all(runId)
      .map((row) => {
        const payload = parseJsonValue(row.payload_json);
        return {
          run_id: row.run_id,
          sequence: row.sequence,
          timestamp: row.created_at,
          type: row.type,
          phase: row.phase,
          producer: row.producer,
          payload: isRecord(payload) ? payload : {}
        };
      });
  }
}
