import { randomUUID } from 'node:crypto';

export type RemoteJobState = 'created' | 'uploaded' | 'deploying' | 'running' | 'succeeded' | 'failed' | 'timed_out';

const VALID_TRANSITIONS: Record<RemoteJobState, RemoteJobState[]> = {
  created: ['uploaded', 'failed', 'timed_out'],
  uploaded: ['deploying', 'failed', 'timed_out'],
  deploying: ['running', 'failed', 'timed_out'],
  running: ['succeeded', 'failed', 'timed_out'],
  succeeded: [],
  failed: [],
  timed_out: []
};

export type RemoteJobTransition = {
  jobId: string;
  from: RemoteJobState | null;
  to: RemoteJobState;
  at: string;
};

/**
 * One submission's lifecycle on the deployment platform. Only forward transitions are allowed, and
 * a terminal state is final.
 */
export class RemoteJob {
  readonly jobId = `job_${randomUUID()}`;
  applicationId: string | null = null;
  appName: string | null = null;
  bundleBytes = 0;
  /** Characters of log text consumed so far. */
  logCursor = 0;
  private current: RemoteJobState | null = null;
  private readonly transitions: RemoteJobTransition[] = [];

  constructor(private readonly onTransition?: (transition: RemoteJobTransition) => void) {}

  get state(): RemoteJobState | null {
    return this.current;
  }

  get history(): readonly RemoteJobTransition[] {
    return this.transitions;
  }

  isTerminal(): boolean {
    return this.current !== null && VALID_TRANSITIONS[this.current].length === 0;
  }

  transition(to: RemoteJobState): void {
    if (this.current === null ? to !== 'created' : !VALID_TRANSITIONS[this.current].includes(to)) {
      throw new Error(`invalid remote job transition ${this.current ?? 'none'} -> ${to}`);
    }
    const transition: RemoteJobTransition = { jobId: this.jobId, from: this.current, to, at: new Date().toISOString() };
    this.current = to;
    this.transitions.push(transition);
    this.onTransition?.(transition);
  }

  /** Moves to a terminal failure state unless the job already ended. */
  settleFailure(to: 'failed' | 'timed_out'): void {
    if (this.current === null) {
      this.transition('created');
    }
    if (!this.isTerminal()) {
      this.transition(to);
    }
  }
}
