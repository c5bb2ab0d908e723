import type Database from 'better-sqlite3';

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS conversations (
      session_id TEXT PRIMARY KEY,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS asset_contexts (
      session_id TEXT NOT NULL,
      path TEXT NOT NULL,
      asset_id TEXT NOT NULL,
      context_json TEXT NOT NULL,
      position INTEGER NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY(session_id, path),
      FOREIGN KEY(session_id) REFERENCES conversations(session_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS turns (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      query TEXT NOT NULL,
      route TEXT,
      router_json TEXT,
      supervisor_json TEXT,
      plan_summary TEXT,
      answer TEXT NOT NULL,
      outcome TEXT NOT NULL,
      error TEXT,
      transitions_json TEXT NOT NULL DEFAULT '[]',
      created_at TEXT NOT NULL,
      FOREIGN KEY(session_id) REFERENCES conversations(session_id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_turns_session_id_created_at ON turns(session_id, created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_turns_created_at ON turns(created_at DESC);

    CREATE TABLE IF NOT EXISTS turn_steps (
      turn_id TEXT NOT NULL,
      step_order INTEGER NOT NULL,
      description TEXT NOT NULL,
      role TEXT NOT NULL,
      status TEXT NOT NULL,
      result_summary TEXT NOT NULL,
      error TEXT,
      caveat TEXT,
      PRIMARY KEY(turn_id, step_order),
      FOREIGN KEY(turn_id) REFERENCES turns(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS artifacts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      turn_id TEXT NOT NULL,
      step_order INTEGER NOT NULL,
      sequence INTEGER NOT NULL,
      kind TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      created_at TEXT NOT NULL,
      FOREIGN KEY(turn_id) REFERENCES turns(id) ON DELETE CASCADE,
      UNIQUE(turn_id, sequence)
    );

    CREATE INDEX IF NOT EXISTS idx_artifacts_turn_id_sequence ON artifacts(turn_id, sequence);

    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL,
      sequence INTEGER NOT NULL,
      type TEXT NOT NULL,
      phase TEXT NOT NULL,
      producer TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_events_run_id_sequence ON events(run_id, sequence);
  `);
}
