import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { resolve } from 'node:path';
import type { ToolOutput } from '../execution/types.js';
import { errorMessage, isRecord } from '../lib/json.js';
import { loadSandboxConfig, type SandboxConfig } from './config.js';
import { ExecutionContextStore } from './context-store.js';
import { evaluateInSession } from './evaluator.js';
import { createNpmInstaller, type PackageInstaller } from './installer.js';

class BadRequest extends Error {}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  const serialized = JSON.stringify(body);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(serialized)
  });
  res.end(serialized);
}

async function readJsonBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  if (chunks.length === 0) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.concat(chunks).toString('utf8'));
  } catch {
    throw new BadRequest('request body must be valid JSON');
  }
  if (!isRecord(parsed)) {
    throw new BadRequest('request body must be a JSON object');
  }
  return parsed;
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new BadRequest(`${field} is required`);
  }
  return value;
}

function optionalStringArray(body: Record<string, unknown>, field: string): string[] {
  const value = body[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new BadRequest(`${field} must be an array of strings`);
  }
  return value;
}

// A requested limit may shorten the server's own, never extend it.
function executionTimeout(body: Record<string, unknown>, limitMs: number): number {
  const requested = body.timeout_ms;
  if (requested === undefined || requested === null) {
    return limitMs;
  }
  if (typeof requested !== 'number' || !Number.isInteger(requested) || requested < 1) {
    throw new BadRequest('timeout_ms must be a positive integer');
  }
  return Math.min(requested, limitMs);
}

function toWire(result: ToolOutput): Record<string, unknown> {
  return {
    success: result.success,
    output: result.output,
    error: result.error,
    error_kind: result.errorKind,
    artifacts: result.artifacts
  };
}

export type SandboxServerDeps = {
  store?: ExecutionContextStore;
  installer?: PackageInstaller;
};

export function createSandboxServer(config: SandboxConfig, deps: SandboxServerDeps = {}): Server {
  const store = deps.store ?? new ExecutionContextStore();
  const modulesDir = resolve(config.sandboxDir, 'modules');
  const install = deps.installer ?? createNpmInstaller(modulesDir, config.installTimeoutMs);

  return createServer(async (req, res) => {
    try {
      const method = req.method ?? 'GET';
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

      if (method === 'GET' && url.pathname === '/health') {
        sendJson(res, 200, { status: 'healthy', active_sessions: store.size });
        return;
      }

      if (method === 'GET' && url.pathname === '/sessions') {
        const sessions = store.listSessions();
        sendJson(res, 200, { sessions, count: sessions.length });
        return;
      }

      if (method === 'POST' && url.pathname === '/execute') {
        const body = await readJsonBody(req);
        const code = requireString(body, 'code');
        const sessionId = requireString(body, 'session_id');
        const resourceRefs = optionalStringArray(body, 'resource_refs');
        const timeoutMs = executionTimeout(body, config.execTimeoutMs);

        const result = await store.withSession(sessionId, (session) => evaluateInSession(session, code, {
          timeoutMs,
          resourceRefs,
          modulesDir,
          maxOutputChars: config.maxOutputChars
        }));
        console.log(`[sandbox] execute session=${sessionId} success=${result.success}${result.errorKind ? ` error_kind=${result.errorKind}` : ''}`);
        sendJson(res, 200, toWire(result));
        return;
      }

      if (method === 'POST' && url.pathname === '/install') {
        const body = await readJsonBody(req);
        const packageSpec = requireString(body, 'package');
        const sessionId = typeof body.session_id === 'string' && body.session_id.trim() ? body.session_id : null;

        const result = await install(packageSpec);
        if (result.success && sessionId) {
          await store.withSession(sessionId, (session) => {
            if (!session.packages.includes(packageSpec)) {
              session.packages.push(packageSpec);
            }
          });
        }
        console.log(`[sandbox] install package=${packageSpec} success=${result.success}`);
        sendJson(res, 200, { success: result.success, output: result.output, error: result.error });
        return;
      }

      if (method === 'POST' && url.pathname === '/reset') {
        const body = await readJsonBody(req);
        const sessionId = requireString(body, 'session_id');
        const existed = await store.reset(sessionId);
        sendJson(res, 200, {
          success: true,
          existed,
          message: existed ? `Session ${sessionId} reset` : `Session ${sessionId} did not exist; started empty`
        });
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      if (error instanceof BadRequest) {
        sendJson(res, 400, { error: error.message });
        return;
      }
      console.error(`[sandbox] request failed: ${errorMessage(error)}`);
      sendJson(res, 500, { error: errorMessage(error) });
    }
  });
}

export function startSandboxServer(): Server {
  const config = loadSandboxConfig();
  const server = createSandboxServer(config);
  server.listen(config.port, config.host, () => {
    console.log(`[sandbox] listening on http://${config.host}:${config.port}`);
  });
  return server;
}
