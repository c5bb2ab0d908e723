import type { ToolOutput } from '../execution/types.js';
import { failed, parseResultPayload } from '../execution/tool-output.js';

export const RESULT_START_MARKER = '__STEPFLOW_RESULT_START__';
export const RESULT_END_MARKER = '__STEPFLOW_RESULT_END__';

const TIMESTAMP_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})\s?/;

export type TimestampSplit = {
  prefix: string;
  content: string;
};

/**
 * Separates a log line's leading ISO-8601 timestamp (and the single space after it) from its
 * content. `prefix + content` always equals the input line.
 */
export function splitTimestampPrefix(line: string): TimestampSplit {
  const match = TIMESTAMP_PREFIX.exec(line);
  if (!match) {
    return { prefix: '', content: line };
  }
  return { prefix: match[0], content: line.slice(match[0].length) };
}

function stripLines(text: string): string[] {
  return text.split(/\r?\n/).map((line) => splitTimestampPrefix(line).content);
}

export function stripTimestamps(text: string): string {
  return stripLines(text).join('\n');
}

export function hasCompleteResult(log: string): boolean {
  const start = log.indexOf(RESULT_START_MARKER);
  return start >= 0 && log.indexOf(RESULT_END_MARKER, start + RESULT_START_MARKER.length) >= 0;
}

export function formatResultBlock(payload: unknown): string {
  return `${RESULT_START_MARKER}\n${JSON.stringify(payload)}\n${RESULT_END_MARKER}`;
}

/**
 * Recovers the result payload a job printed between the start and end markers. Never throws: every
 * failure mode maps onto a ToolOutput with errorKind `no_result` or `malformed_result`.
 */
export function extractResult(log: string): ToolOutput {
  const start = log.indexOf(RESULT_START_MARKER);
  if (start < 0) {
    return failed('no_result', 'no result marker found in job logs', stripTimestamps(log).trim());
  }

  const bodyStart = start + RESULT_START_MARKER.length;
  const end = log.indexOf(RESULT_END_MARKER, bodyStart);
  if (end < 0) {
    return failed(
      'no_result',
      'result truncated: end marker not found before the log stream ended',
      stripTimestamps(log.slice(bodyStart)).trim()
    );
  }

  const cleaned = stripLines(log.slice(bodyStart, end)).join('').trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return failed('malformed_result', `result payload is not valid JSON: ${reason}`, cleaned);
  }

  const result = parseResultPayload(parsed);
  if (!result) {
    return failed('malformed_result', 'result payload does not match {success, output, error, artifacts}', cleaned);
  }
  return result;
}
