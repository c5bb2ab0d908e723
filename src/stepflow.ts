#!/usr/bin/env node

import { randomUUID } from 'node:crypto';
import { FileAssetInspector } from './assets/file-inspector.js';
import { BACKEND_NAMES, PROVIDER_NAMES, loadEngineConfig, type BackendName, type EngineConfig, type ProviderName } from './engine/config.js';
import { Orchestrator } from './engine/orchestrator.js';
import type { StreamEnvelope } from './engine/streamer.js';
import { SandboxClient } from './execution/sandbox-client.js';
import type { ExecutionBackend } from './execution/types.js';
import { openHistoryDb } from './history/db.js';
import { HistoryRepository } from './history/repository.js';
import { assertRemoteConfigured, loadRemoteJobConfig } from './jobs/config.js';
import { DokployClient } from './jobs/dokploy-client.js';
import { WebSocketLogTail } from './jobs/log-tail.js';
import { RemoteJobClient } from './jobs/remote-job-client.js';
import { parseCliArgs, type ParsedCliArgs } from './lib/cli-args.js';
import { errorMessage } from './lib/json.js';
import { ProviderReasoner } from './reasoning/provider-reasoner.js';
import { ExecutionContextStore } from './sandbox/context-store.js';
import { startSandboxServer } from './sandbox/server.js';

function usage(): string {
  return [
    'Usage:',
    '  stepflow sandbox',
    '  stepflow ask "<query>" [--session ID] [--asset PATH]... [--backend sandbox|remote] [--provider claude|codex] [--max-iterations N] [--stream-logs]',
    '  stepflow sessions',
    '  stepflow reset --session ID',
    '  stepflow history [--session ID] [--limit N]',
    '  stepflow events --turn ID',
    '  stepflow db:migrate'
  ].join('\n');
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function parseChoice<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T, flag: string): T {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`${flag} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function parsePositiveInt(value: string | undefined, fallback: number, flag: string, max = Number.MAX_SAFE_INTEGER): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new Error(`${flag} must be an integer between 1 and ${max}`);
  }
  return parsed;
}

function requireNamed(parsed: ParsedCliArgs, flag: string, command: string): string {
  const value = parsed.named.get(flag)?.trim();
  if (!value) {
    throw new Error(`${command} requires ${flag}`);
  }
  return value;
}

function withHistory<T>(dbPath: string, fn: (repo: HistoryRepository) => T): T {
  const db = openHistoryDb(dbPath);
  try {
    return fn(new HistoryRepository(db));
  } finally {
    db.close();
  }
}

function sandboxClient(config: EngineConfig): SandboxClient {
  return new SandboxClient({
    baseUrl: config.sandboxUrl,
    executeTimeoutMs: config.jobTimeoutMs,
    installTimeoutMs: config.sandboxInstallTimeoutMs,
    controlTimeoutMs: config.sandboxControlTimeoutMs
  });
}

function createBackend(name: BackendName, config: EngineConfig): ExecutionBackend {
  if (name === 'sandbox') {
    return sandboxClient(config);
  }

  const remote = loadRemoteJobConfig();
  assertRemoteConfigured(remote);
  const platform = new DokployClient({ baseUrl: remote.baseUrl, apiKey: remote.apiKey, environmentId: remote.environmentId });
  const logs = new WebSocketLogTail({
    urlFor: (containerId) => platform.logStreamUrl(containerId, remote.logTailLines),
    headers: { 'x-api-key': remote.apiKey }
  });
  return new RemoteJobClient(platform, logs, new ExecutionContextStore(), {
    jobTimeoutMs: remote.jobTimeoutMs,
    pollMs: remote.pollMs,
    pollRetries: remote.pollRetries,
    teardownTimeoutMs: remote.teardownTimeoutMs
  });
}

function printEnvelope(envelope: StreamEnvelope): void {
  console.error(`[stepflow][${envelope.sequence}][${envelope.phase}][${envelope.type}] ${JSON.stringify(envelope.payload)}`);
}

async function runAsk(argv: string[], config: EngineConfig): Promise<void> {
  const parsed = parseCliArgs(argv);
  const query = parsed.positional[0]?.trim();
  if (!query) {
    throw new Error('ask requires a positional query argument');
  }

  const backendName = parseChoice<BackendName>(parsed.named.get('--backend'), BACKEND_NAMES, config.backend, '--backend');
  const provider = parseChoice<ProviderName>(parsed.named.get('--provider'), PROVIDER_NAMES, config.provider, '--provider');
  const maxIterations = parsePositiveInt(parsed.named.get('--max-iterations'), config.maxToolIterations, '--max-iterations');
  const streamLogs = parsed.flags.has('--stream-logs');
  const sessionId = parsed.named.get('--session') ?? `session-${randomUUID()}`;
  const assetPaths = parsed.repeated.get('--asset') ?? [];

  const controller = new AbortController();
  const onSigint = (): void => {
    console.error('[stepflow] cancelling...');
    controller.abort(new Error('cancelled by user'));
  };
  process.once('SIGINT', onSigint);

  const db = openHistoryDb(config.dbPath);
  try {
    const history = new HistoryRepository(db);
    const orchestrator = new Orchestrator({
      reasoner: new ProviderReasoner({ provider, cwd: process.cwd(), phaseTimeoutMs: config.phaseTimeoutMs, streamLogs }),
      backend: createBackend(backendName, config),
      inspector: new FileAssetInspector(),
      store: history,
      maxIterations,
      emit: (envelope) => {
        history.appendEvent(envelope);
        if (streamLogs) {
          printEnvelope(envelope);
        }
      }
    });

    const result = await orchestrator.run({ sessionId, query, assetPaths, signal: controller.signal });
    printJson(result);
    if (result.outcome === 'failed' || result.outcome === 'cancelled') {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
    db.close();
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    console.log(usage());
    process.exit(0);
  }

  if (command === 'sandbox') {
    startSandboxServer();
    return;
  }

  const config = loadEngineConfig();

  if (command === 'db:migrate') {
    withHistory(config.dbPath, () => undefined);
    console.log(`[db] schema ready: ${config.dbPath}`);
    return;
  }

  if (command === 'ask') {
    await runAsk(args.slice(1), config);
    return;
  }

  if (command === 'sessions') {
    const client = sandboxClient(config);
    const sessions = await client.listSessions();
    printJson({ sessions, count: sessions.length });
    return;
  }

  if (command === 'reset') {
    const sessionId = requireNamed(parseCliArgs(args.slice(1)), '--session', 'reset');
    const existed = await sandboxClient(config).resetSession(sessionId);
    printJson({ session_id: sessionId, existed });
    return;
  }

  if (command === 'history') {
    const parsed = parseCliArgs(args.slice(1));
    const limit = parsePositiveInt(parsed.named.get('--limit'), 20, '--limit', 500);
    const sessionId = parsed.named.get('--session');
    const turns = withHistory(config.dbPath, (repo) => repo.listTurns({ sessionId, limit }));
    printJson({ turns });
    return;
  }

  if (command === 'events') {
    const turnId = requireNamed(parseCliArgs(args.slice(1)), '--turn', 'events');
    const detail = withHistory(config.dbPath, (repo) => ({ turn: repo.getTurn(turnId), events: repo.listEvents(turnId) }));
    if (!detail.turn && detail.events.length === 0) {
      throw new Error(`turn not found: ${turnId}`);
    }
    printJson(detail);
    return;
  }

  console.error(`Unknown command: ${command}`);
  console.error(usage());
  process.exit(2);
}

main().catch((error) => {
  console.error(errorMessage(error));
  process.exit(1);
});
