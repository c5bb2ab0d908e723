import { createRequire } from 'node:module';
import { basename, resolve } from 'node:path';
import { format } from 'node:util';
import vm from 'node:vm';
import type { Artifact, ToolOutput } from '../execution/types.js';
import { failed, succeeded, timeoutMessage } from '../execution/tool-output.js';
import { discardSessionState, type Session } from './context-store.js';

export type EvaluateOptions = {
  timeoutMs: number;
  resourceRefs: string[];
  /** Directory whose node_modules backs `require` inside evaluated code. */
  modulesDir: string;
  maxOutputChars?: number;
};

const DEFAULT_MAX_OUTPUT_CHARS = 20_000;
const DRAIN_INTERVAL_MS = 5;

// Evaluating anything in the context runs the promise jobs queued on it.
const drainScript = new vm.Script('undefined');

class EvaluationTimeout extends Error {}

function isScriptTimeout(error: unknown): boolean {
  return error instanceof EvaluationTimeout
    || (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT');
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

// Errors raised inside the vm context come from another realm, so instanceof Error does not hold.
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return `${name}: ${error.message}`;
  }
  return String(error);
}

function truncate(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, max)}\n...[output truncated, ${text.length - max} more characters]`;
}

function resolveResource(refs: string[], name: string): string {
  const match = refs.find((ref) => ref === name || basename(ref) === name);
  if (!match) {
    throw new Error(`unknown resource: ${name}`);
  }
  return resolve(match);
}

/**
 * Waits for a promise produced inside the context. Its jobs sit on the context's own microtask
 * queue, so the queue is drained on an interval until the promise settles or the time runs out.
 */
async function settleInContext(value: PromiseLike<unknown>, context: vm.Context, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  let timer: NodeJS.Timeout | undefined;
  let drain: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      Promise.resolve(value),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new EvaluationTimeout()), timeoutMs);
        drain = setInterval(() => {
          try {
            drainScript.runInContext(context, { timeout: Math.max(deadline - Date.now(), 1) });
          } catch (error) {
            reject(error);
          }
        }, DRAIN_INTERVAL_MS);
      })
    ]);
  } finally {
    clearTimeout(timer);
    clearInterval(drain);
  }
}

/**
 * Runs one submission inside the session's context. Console output is captured line by line,
 * `emitArtifact(kind, payload)` collects artifacts, and `resourcePath(name)` resolves attached
 * files. A submission that evaluates to a promise is awaited within the same timeout. Successful
 * code is appended to the session history; a timeout discards the session's state.
 */
export async function evaluateInSession(session: Session, code: string, options: EvaluateOptions): Promise<ToolOutput> {
  const lines: string[] = [];
  const artifacts: Artifact[] = [];
  const write = (...args: unknown[]): void => {
    lines.push(format(...args));
  };

  const context = session.bindings;
  context.console = { log: write, info: write, warn: write, error: write, debug: write };
  context.emitArtifact = (kind: unknown, payload: unknown): void => {
    if (typeof kind !== 'string' || !kind.trim()) {
      throw new Error('emitArtifact kind must be a non-empty string');
    }
    const cloned: unknown = payload === undefined ? null : JSON.parse(JSON.stringify(payload));
    artifacts.push({ kind, payload: cloned });
  };
  context.resourcePath = (name: string): string => resolveResource(options.resourceRefs, name);
  context.require = createRequire(resolve(options.modulesDir, 'index.js'));

  const maxOutput = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  const collected = (): string => truncate(lines.join('\n'), maxOutput);

  try {
    const script = new vm.Script(code, { filename: `${session.id}.js` });
    const value: unknown = script.runInContext(context, { timeout: options.timeoutMs });
    if (isThenable(value)) {
      await settleInContext(value, context, options.timeoutMs);
    }
  } catch (error) {
    if (isScriptTimeout(error)) {
      discardSessionState(session);
      return failed('timeout', `${timeoutMessage(options.timeoutMs)}; session state was reset`, collected());
    }
    return { ...failed('execution', describeError(error), collected()), artifacts };
  }

  session.history.push(code);
  return succeeded(collected(), artifacts);
}
