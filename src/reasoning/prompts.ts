import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');
export const SYSTEM_PROMPTS_DIR = resolve(PROJECT_ROOT, 'prompts', 'system');

export type ReasoningPhase = 'route' | 'supervise' | 'plan' | 'tool-call' | 'reply';

export type PhaseSchema = { schemaJson: string; schemaPath: string };

export function readSystemPromptFile(name: string, dir = SYSTEM_PROMPTS_DIR): string {
  const filePath = resolve(dir, name);
  if (!existsSync(filePath)) {
    throw new Error(`Missing prompt file: ${filePath}`);
  }
  return readFileSync(filePath, 'utf8').trim();
}

export function readPhaseSchema(phase: ReasoningPhase, dir = SYSTEM_PROMPTS_DIR): PhaseSchema {
  const schemaPath = resolve(dir, 'schemas', `${phase}.schema.json`);
  if (!existsSync(schemaPath)) {
    throw new Error(`Missing schema file: ${schemaPath}`);
  }
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf8'));
  return {
    schemaJson: JSON.stringify(parsed),
    schemaPath
  };
}

export function buildPhasePrompt(base: string, phaseText: string, input: Record<string, unknown>): string {
  return [
    base,
    '',
    phaseText,
    '',
    'INPUT_JSON:',
    JSON.stringify(input, null, 2)
  ].join('\n');
}
