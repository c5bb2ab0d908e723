import { isRecord } from '../lib/json.js';
import { TOOL_ERROR_KINDS, type Artifact, type ToolErrorKind, type ToolOutput } from './types.js';

export function succeeded(output: string, artifacts: Artifact[] = []): ToolOutput {
  return { success: true, output, error: null, errorKind: null, artifacts };
}

export function failed(errorKind: ToolErrorKind, error: string, output = ''): ToolOutput {
  return { success: false, output, error, errorKind, artifacts: [] };
}

/** Failures that end the step instead of going back to the reasoner. */
export function isStepFatal(kind: ToolErrorKind | null): kind is 'infrastructure' | 'timeout' {
  return kind === 'infrastructure' || kind === 'timeout';
}

export function timeoutMessage(timeoutMs: number): string {
  if (timeoutMs % 1000 !== 0) {
    return `Code execution timed out after ${timeoutMs}ms`;
  }
  const seconds = timeoutMs / 1000;
  return `Code execution timed out after ${seconds} second${seconds === 1 ? '' : 's'}`;
}

function parseErrorKind(value: unknown): ToolErrorKind {
  return TOOL_ERROR_KINDS.find((kind) => kind === value) ?? 'execution';
}

function parseArtifacts(value: unknown): Artifact[] | null {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    return null;
  }
  const artifacts: Artifact[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.kind !== 'string' || !item.kind.trim()) {
      return null;
    }
    artifacts.push({ kind: item.kind, payload: item.payload ?? null });
  }
  return artifacts;
}

/**
 * Validates the `{success, output, error, error_kind?, artifacts}` result shape produced by the
 * sandbox server and the remote job entry program. A failure without a recognised `error_kind` is
 * an execution failure. Returns null when the value does not match.
 */
export function parseResultPayload(value: unknown): ToolOutput | null {
  if (!isRecord(value) || typeof value.success !== 'boolean') {
    return null;
  }
  const output = value.output ?? '';
  const error = value.error ?? null;
  if (typeof output !== 'string' || (error !== null && typeof error !== 'string')) {
    return null;
  }
  const artifacts = parseArtifacts(value.artifacts);
  if (!artifacts) {
    return null;
  }
  if (value.success) {
    return succeeded(output, artifacts);
  }
  return {
    success: false,
    output,
    error: error ?? 'execution failed',
    errorKind: parseErrorKind(value.error_kind),
    artifacts
  };
}
