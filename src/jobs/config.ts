import { intFromEnv } from '../lib/env.js';

export type RemoteJobConfig = {
  baseUrl: string;
  apiKey: string;
  environmentId: string;
  jobTimeoutMs: number;
  pollMs: number;
  pollRetries: number;
  teardownTimeoutMs: number;
  logTailLines: number;
};

export function loadRemoteJobConfig(): RemoteJobConfig {
  return {
    baseUrl: (process.env.DOKPLOY_BASE_URL ?? 'http://localhost:3000').replace(/\/+$/, ''),
    apiKey: process.env.DOKPLOY_API_KEY ?? '',
    environmentId: process.env.DOKPLOY_ENVIRONMENT_ID ?? '',
    jobTimeoutMs: intFromEnv('STEPFLOW_JOB_TIMEOUT_MS', 5 * 60 * 1000),
    pollMs: intFromEnv('JOB_POLL_MS', 2000),
    pollRetries: intFromEnv('JOB_POLL_RETRIES', 5),
    teardownTimeoutMs: intFromEnv('JOB_TEARDOWN_TIMEOUT_MS', 15_000),
    logTailLines: intFromEnv('JOB_LOG_TAIL_LINES', 10_000)
  };
}

export function assertRemoteConfigured(config: RemoteJobConfig): void {
  if (!config.apiKey) {
    throw new Error('DOKPLOY_API_KEY is required for the remote backend');
  }
  if (!config.environmentId) {
    throw new Error('DOKPLOY_ENVIRONMENT_ID is required for the remote backend');
  }
}
