import vm from 'node:vm';
import { KeyedMutex } from '../lib/keyed-mutex.js';

export type Session = {
  id: string;
  /** Contextified global object; names bound by executed code persist here between calls. */
  bindings: vm.Context;
  /** Successfully executed submissions, oldest first. */
  history: string[];
  /** Package specs installed for this session. */
  packages: string[];
  createdAt: string;
  lastAccessAt: string;
};

function nowIso(): string {
  return new Date().toISOString();
}

// Promise jobs queued by evaluated code drain right after each evaluation, inside its timeout.
function createBindings(): vm.Context {
  return vm.createContext({}, { microtaskMode: 'afterEvaluate' });
}

/**
 * Swaps in a fresh context and forgets the history. Code still running against the old context can
 * no longer reach the session.
 */
export function discardSessionState(session: Session): void {
  session.bindings = createBindings();
  session.history = [];
}

function createSession(id: string): Session {
  const now = nowIso();
  return {
    id,
    bindings: createBindings(),
    history: [],
    packages: [],
    createdAt: now,
    lastAccessAt: now
  };
}

/**
 * In-memory session table. Every mutation of a session's state happens inside `withSession`, which
 * holds that session's lock; different sessions proceed in parallel. Nothing is persisted, so a
 * process restart drops all sessions.
 */
export class ExecutionContextStore {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new KeyedMutex();

  getOrCreate(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastAccessAt = nowIso();
      return existing;
    }
    const session = createSession(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  withSession<T>(sessionId: string, fn: (session: Session) => Promise<T> | T): Promise<T> {
    if (!sessionId.trim()) {
      return Promise.reject(new Error('session id must be a non-empty string'));
    }
    return this.locks.runExclusive(sessionId, () => fn(this.getOrCreate(sessionId)));
  }

  /**
   * Drops the session's state and starts it over empty. Waits for any in-flight call on the same
   * session. Returns whether the session existed.
   */
  reset(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, () => {
      const existed = this.sessions.has(sessionId);
      this.sessions.set(sessionId, createSession(sessionId));
      return existed;
    });
  }

  listSessions(): string[] {
    return [...this.sessions.values()]
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((session) => session.id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
