import { resolve } from 'node:path';
import { intFromEnv, oneOfFromEnv } from '../lib/env.js';

export const BACKEND_NAMES = ['sandbox', 'remote'] as const;
export const PROVIDER_NAMES = ['claude', 'codex'] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type EngineConfig = {
  maxToolIterations: number;
  backend: BackendName;
  provider: ProviderName;
  phaseTimeoutMs: number;
  // Limit for one code submission on either backend.
  jobTimeoutMs: number;
  dbPath: string;
  sandboxUrl: string;
  sandboxInstallTimeoutMs: number;
  sandboxControlTimeoutMs: number;
};

export function loadEngineConfig(): EngineConfig {
  return {
    maxToolIterations: intFromEnv('STEPFLOW_MAX_TOOL_ITERATIONS', 20),
    backend: oneOfFromEnv('STEPFLOW_BACKEND', BACKEND_NAMES, 'sandbox'),
    provider: oneOfFromEnv('STEPFLOW_PROVIDER', PROVIDER_NAMES, 'claude'),
    phaseTimeoutMs: intFromEnv('STEPFLOW_PHASE_TIMEOUT_MS', 5 * 60 * 1000),
    jobTimeoutMs: intFromEnv('STEPFLOW_JOB_TIMEOUT_MS', 5 * 60 * 1000),
    dbPath: resolve(process.env.STEPFLOW_DB_PATH ?? './data/stepflow.sqlite'),
    sandboxUrl: process.env.SANDBOX_URL ?? 'http://localhost:8765',
    // The install deadline adds a margin over the server's own install limit.
    sandboxInstallTimeoutMs: intFromEnv('SANDBOX_INSTALL_TIMEOUT_MS', 180_000) + 10_000,
    sandboxControlTimeoutMs: intFromEnv('SANDBOX_CONTROL_TIMEOUT_MS', 10_000)
  };
}
