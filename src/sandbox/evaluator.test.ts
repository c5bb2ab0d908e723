import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ExecutionContextStore } from './context-store.js';
import { evaluateInSession, type EvaluateOptions } from './evaluator.js';

const modulesDir = mkdtempSync(join(tmpdir(), 'stepflow-eval-'));
const options: EvaluateOptions = { timeoutMs: 200, resourceRefs: [], modulesDir };

test('bindings persist across submissions in one session', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const first = await evaluateInSession(session, 'var rows = 5000; console.log(rows + " rows");', options);
  const second = await evaluateInSession(session, 'console.log(rows * 2);', options);

  assert.equal(first.output, '5000 rows');
  assert.equal(second.success, true);
  assert.equal(second.output, '10000');
  assert.equal(session.history.length, 2);
});

test('a thrown error is reported as an execution failure and keeps earlier output', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(session, 'console.log("before"); missingFunction();', options);

  assert.equal(result.success, false);
  assert.equal(result.errorKind, 'execution');
  assert.equal(result.error, 'ReferenceError: missingFunction is not defined');
  assert.equal(result.output, 'before');
  assert.deepEqual(session.history, []);
});

test('syntax errors are execution failures', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(session, 'var = ;', options);

  assert.equal(result.errorKind, 'execution');
  assert.match(result.error ?? '', /^SyntaxError/);
});

test('emitArtifact collects artifacts in order', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(
    session,
    'emitArtifact("table", { columns: ["a"], rows: [[1], [2]] }); emitArtifact("insight", "mean=120");',
    options
  );

  assert.deepEqual(result.artifacts, [
    { kind: 'table', payload: { columns: ['a'], rows: [[1], [2]] } },
    { kind: 'insight', payload: 'mean=120' }
  ]);
});

test('synchronous code past the timeout is a timeout and resets the session', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');
  await evaluateInSession(session, 'var kept = 1;', options);

  const result = await evaluateInSession(session, 'console.log("started"); while (true) {}', { ...options, timeoutMs: 50 });

  assert.equal(result.success, false);
  assert.equal(result.errorKind, 'timeout');
  assert.equal(result.error, 'Code execution timed out after 50ms; session state was reset');
  assert.equal(result.output, 'started');
  assert.deepEqual(session.history, []);

  const after = await evaluateInSession(session, 'console.log(typeof kept);', options);
  assert.equal(after.output, 'undefined');
});

test('a returned promise is awaited', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(session, '(async () => { await null; console.log("later"); })()', options);

  assert.equal(result.success, true);
  assert.equal(result.output, 'later');
});

test('a promise settled by a timer is awaited', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(
    session,
    '(async () => { await new Promise((done) => require("node:timers").setTimeout(done, 20)); console.log("ticked"); })()',
    options
  );

  assert.equal(result.error, null);
  assert.equal(result.output, 'ticked');
});

test('work left running by a timed out promise never reaches the session', async () => {
  const session = new ExecutionContextStore().getOrCreate('late');

  const result = await evaluateInSession(
    session,
    'new Promise((done) => require("node:timers").setTimeout(() => { globalThis.late = "written"; done(); }, 150))',
    { ...options, timeoutMs: 50 }
  );
  await new Promise((resolve) => setTimeout(resolve, 250));
  const after = await evaluateInSession(session, 'console.log(typeof late);', options);

  assert.equal(result.errorKind, 'timeout');
  assert.equal(result.error, 'Code execution timed out after 50ms; session state was reset');
  assert.equal(after.output, 'undefined');
  assert.deepEqual(session.history, ['console.log(typeof late);']);
});

test('a promise that spins on microtasks is stopped by the timeout', async () => {
  const session = new ExecutionContextStore().getOrCreate('spin');

  const result = await evaluateInSession(session, '(async () => { for (;;) await null; })()', { ...options, timeoutMs: 50 });

  assert.equal(result.errorKind, 'timeout');
  assert.equal(result.error, 'Code execution timed out after 50ms; session state was reset');
});

test('resourcePath resolves attached files by base name', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'stepflow-res-'));
  const file = join(dir, 'sales.csv');
  writeFileSync(file, 'a,b\n1,2\n');
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(
    session,
    'const fs = require("node:fs"); console.log(fs.readFileSync(resourcePath("sales.csv"), "utf8").split("\\n")[1]);',
    { ...options, resourceRefs: [file] }
  );

  assert.equal(result.error, null);
  assert.equal(result.output, '1,2');
});

test('long output is truncated', async () => {
  const session = new ExecutionContextStore().getOrCreate('s1');

  const result = await evaluateInSession(session, 'console.log("x".repeat(50));', { ...options, maxOutputChars: 10 });

  assert.equal(result.output, 'xxxxxxxxxx\n...[output truncated, 40 more characters]');
});
