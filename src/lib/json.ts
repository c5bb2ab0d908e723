export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function extractJsonFromText(raw: string): Record<string, unknown> {
  const fenced = raw.match(/```json\s*([\s\S]*?)```/i);
  const direct = fenced?.[1] ?? raw;
  const firstBrace = direct.indexOf('{');
  const lastBrace = direct.lastIndexOf('}');
  if (firstBrace < 0 || lastBrace <= firstBrace) {
    throw new Error('No JSON object found in model output');
  }
  const parsed = JSON.parse(direct.slice(firstBrace, lastBrace + 1)) as unknown;
  if (!isRecord(parsed)) {
    throw new Error('Model output JSON is not an object');
  }
  return parsed;
}

const WRAPPER_KEYS = ['structured_output', 'result', 'output', 'text', 'message', 'content'];

function unwrapProviderEnvelope(value: Record<string, unknown>): Record<string, unknown> {
  for (const key of WRAPPER_KEYS) {
    const candidate = value[key];
    if (isRecord(candidate) && key === 'structured_output') {
      return candidate;
    }
    if (typeof candidate === 'string') {
      try {
        return extractJsonFromText(candidate);
      } catch {
        // not this key
      }
    }
    if (Array.isArray(candidate)) {
      const joined = candidate
        .map((entry) => (isRecord(entry) ? entry.text : ''))
        .filter((x): x is string => typeof x === 'string' && x.length > 0)
        .join('\n');
      if (joined) {
        try {
          return extractJsonFromText(joined);
        } catch {
          // not this key
        }
      }
    }
  }
  return value;
}

/**
 * Pulls the JSON object a provider CLI answered with out of its raw stdout. Handles bare JSON,
 * fenced ```json blocks, and result envelopes such as `{"type":"result","result":"{...}"}`.
 */
export function extractJsonObject(raw: string): Record<string, unknown> {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error('No JSON object found in model output');
  }

  let parsedTop: unknown;
  try {
    parsedTop = JSON.parse(trimmed);
  } catch {
    return extractJsonFromText(trimmed);
  }

  if (!isRecord(parsedTop)) {
    throw new Error('Model output JSON is not an object');
  }
  return unwrapProviderEnvelope(parsedTop);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
