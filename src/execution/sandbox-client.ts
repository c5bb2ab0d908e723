import { errorMessage, isRecord } from '../lib/json.js';
import { withDeadline } from '../lib/deadline.js';
import { failed, parseResultPayload, succeeded, timeoutMessage } from './tool-output.js';
import type { ExecuteRequest, ExecutionBackend, InstallRequest, ToolOutput } from './types.js';

export type SandboxClientOptions = {
  baseUrl: string;
  /** Limit for one submission, enforced by the server. */
  executeTimeoutMs: number;
  /** Added to `executeTimeoutMs` for the request deadline so the server reports its own timeouts. */
  deadlineMarginMs?: number;
  installTimeoutMs: number;
  controlTimeoutMs: number;
};

const DEFAULT_DEADLINE_MARGIN_MS = 10_000;

type CallResult =
  | { ok: true; body: unknown }
  | { ok: false; failure: ToolOutput };

/**
 * HTTP client for the sandbox server. Every call carries its own deadline; transport problems,
 * deadlines and caller cancellation come back as classified ToolOutputs instead of exceptions.
 */
export class SandboxClient implements ExecutionBackend {
  readonly name = 'sandbox';
  private readonly baseUrl: string;

  constructor(private readonly options: SandboxClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private async call(method: 'GET' | 'POST', path: string, body: unknown, timeoutMs: number, signal?: AbortSignal): Promise<CallResult> {
    const deadline = withDeadline(timeoutMs, signal);
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: method === 'POST' ? { 'Content-Type': 'application/json' } : undefined,
        body: method === 'POST' ? JSON.stringify(body) : undefined,
        signal: deadline.signal
      });
      const text = await response.text();
      let parsed: unknown = null;
      try {
        parsed = text ? JSON.parse(text) : {};
      } catch {
        return { ok: false, failure: failed('malformed_result', `sandbox returned non-JSON response (HTTP ${response.status})`, text) };
      }
      if (!response.ok) {
        const message = isRecord(parsed) && typeof parsed.error === 'string' ? parsed.error : `HTTP ${response.status}`;
        return { ok: false, failure: failed('infrastructure', `sandbox error: ${message}`) };
      }
      return { ok: true, body: parsed };
    } catch (error) {
      if (deadline.timedOut()) {
        return { ok: false, failure: failed('timeout', timeoutMessage(timeoutMs)) };
      }
      if (signal?.aborted) {
        return { ok: false, failure: failed('cancelled', 'execution cancelled') };
      }
      return { ok: false, failure: failed('infrastructure', `sandbox unreachable at ${this.baseUrl}: ${errorMessage(error)}`) };
    } finally {
      deadline.dispose();
    }
  }

  async execute(request: ExecuteRequest): Promise<ToolOutput> {
    const result = await this.call(
      'POST',
      '/execute',
      {
        code: request.code,
        session_id: request.sessionId,
        resource_refs: request.resourceRefs,
        timeout_ms: this.options.executeTimeoutMs
      },
      this.options.executeTimeoutMs + (this.options.deadlineMarginMs ?? DEFAULT_DEADLINE_MARGIN_MS),
      request.signal
    );
    if (!result.ok) {
      return result.failure;
    }
    return parseResultPayload(result.body)
      ?? failed('malformed_result', 'sandbox response does not match {success, output, error, artifacts}', JSON.stringify(result.body));
  }

  async installPackage(request: InstallRequest): Promise<ToolOutput> {
    const result = await this.call(
      'POST',
      '/install',
      { package: request.packageSpec, session_id: request.sessionId },
      this.options.installTimeoutMs,
      request.signal
    );
    if (!result.ok) {
      return result.failure;
    }
    const body = result.body;
    if (!isRecord(body) || typeof body.success !== 'boolean') {
      return failed('malformed_result', 'sandbox install response is malformed', JSON.stringify(body));
    }
    const output = typeof body.output === 'string' ? body.output : '';
    if (body.success) {
      return succeeded(output);
    }
    return failed('execution', typeof body.error === 'string' ? body.error : 'install failed', output);
  }

  async resetSession(sessionId: string): Promise<boolean> {
    const result = await this.call('POST', '/reset', { session_id: sessionId }, this.options.controlTimeoutMs);
    if (!result.ok) {
      throw new Error(result.failure.error ?? 'reset failed');
    }
    return isRecord(result.body) && result.body.existed === true;
  }

  async listSessions(): Promise<string[]> {
    const result = await this.call('GET', '/sessions', null, this.options.controlTimeoutMs);
    if (!result.ok) {
      throw new Error(result.failure.error ?? 'listing sessions failed');
    }
    const sessions = isRecord(result.body) ? result.body.sessions : null;
    if (!Array.isArray(sessions)) {
      throw new Error('sandbox sessions response is malformed');
    }
    return sessions.filter((id): id is string => typeof id === 'string');
  }
}
