import { resolve } from 'node:path';
import { intFromEnv } from '../lib/env.js';

export type SandboxConfig = {
  host: string;
  port: number;
  sandboxDir: string;
  execTimeoutMs: number;
  installTimeoutMs: number;
  maxOutputChars: number;
};

export function loadSandboxConfig(): SandboxConfig {
  return {
    host: process.env.SANDBOX_HOST ?? '127.0.0.1',
    port: intFromEnv('SANDBOX_PORT', 8765),
    sandboxDir: resolve(process.env.SANDBOX_DIR ?? './data/sandbox'),
    execTimeoutMs: intFromEnv('SANDBOX_EXEC_TIMEOUT_MS', 5 * 60 * 1000),
    installTimeoutMs: intFromEnv('SANDBOX_INSTALL_TIMEOUT_MS', 180_000),
    maxOutputChars: intFromEnv('SANDBOX_MAX_OUTPUT_CHARS', 20_000)
  };
}
