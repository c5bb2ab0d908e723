import type { ProviderName } from '../engine/config.js';
import type { PhaseSchema } from './prompts.js';

export type ProviderCommand = { command: string; args: string[]; stdin: string | null };

export function buildProviderCommand(provider: ProviderName, prompt: string, schema: PhaseSchema): ProviderCommand {
  if (provider === 'claude') {
    return {
      command: 'claude',
      args: ['--print', '--output-format', 'json', '--json-schema', schema.schemaJson],
      stdin: prompt
    };
  }

  return {
    command: 'codex',
    args: ['exec', '--skip-git-repo-check', '--output-schema', schema.schemaPath, prompt],
    stdin: null
  };
}
