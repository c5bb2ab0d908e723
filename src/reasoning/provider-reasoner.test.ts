import test from 'node:test';
import assert from 'node:assert/strict';
import type { CommandResult } from '../lib/run-command.js';
import { roleFor } from '../engine/roles.js';
import { ProviderReasoner, type PhaseRunner } from './provider-reasoner.js';

type Invocation = { command: string; args: string[]; stdin: string | null; timeoutMs: number };

function stubRunner(result: Partial<CommandResult>): { invocations: Invocation[]; runner: PhaseRunner } {
  const invocations: Invocation[] = [];
  const runner: PhaseRunner = async (command, args, options) => {
    invocations.push({ command, args, stdin: options.stdin, timeoutMs: options.timeoutMs });
    return { exitCode: 0, stdout: '', stderr: '', spawnError: null, ...result };
  };
  return { invocations, runner };
}

test('claude phases send the prompt on stdin with the phase schema', async () => {
  const { invocations, runner } = stubRunner({
    stdout: JSON.stringify({ type: 'result', result: '', structured_output: { route: 'chat', reasoning: 'greeting' } })
  });
  const reasoner = new ProviderReasoner({ provider: 'claude', cwd: process.cwd(), phaseTimeoutMs: 1000 }, runner);

  const decision = await reasoner.route({ query: 'hello', hasAssets: false, hasPreviousAnalysis: false, recentTurns: [] });

  assert.deepEqual(decision, { route: 'chat', reasoning: 'greeting' });
  assert.equal(invocations[0].command, 'claude');
  assert.deepEqual(invocations[0].args.slice(0, 4), ['--print', '--output-format', 'json', '--json-schema']);
  assert.match(invocations[0].args[4], /"analysis_followup"/);
  assert.match(invocations[0].stdin ?? '', /PHASE: route/);
  assert.match(invocations[0].stdin ?? '', /"query": "hello"/);
  assert.equal(invocations[0].timeoutMs, 1000);
});

test('codex phases pass the schema path and the prompt as an argument', async () => {
  const { invocations, runner } = stubRunner({
    stdout: '{"tool":"complete_step","code":"","command":"","note":"","summary":"3 sheets","rationale":""}'
  });
  const reasoner = new ProviderReasoner({ provider: 'codex', cwd: process.cwd(), phaseTimeoutMs: 1000 }, runner);

  const call = await reasoner.nextToolCall({
    query: 'how many sheets?',
    step: { order: 1, description: 'Count sheets', role: 'spreadsheet', status: 'in_progress', resultSummary: '', error: null, caveat: null },
    role: roleFor('spreadsheet'),
    contextSummary: '',
    transcript: [],
    iteration: 1,
    maxIterations: 5
  });

  assert.deepEqual(call, { tool: 'complete_step', summary: '3 sheets' });
  assert.equal(invocations[0].command, 'codex');
  assert.deepEqual(invocations[0].args.slice(0, 3), ['exec', '--skip-git-repo-check', '--output-schema']);
  assert.match(invocations[0].args[3], /tool-call\.schema\.json$/);
  assert.match(invocations[0].args[4], /PHASE: tool-call/);
  assert.equal(invocations[0].stdin, null);
});

test('a failing provider surfaces its exit code and stderr', async () => {
  const { runner } = stubRunner({ exitCode: 2, stderr: 'rate limited\n' });
  const reasoner = new ProviderReasoner({ provider: 'claude', cwd: process.cwd(), phaseTimeoutMs: 1000 }, runner);

  await assert.rejects(
    reasoner.supervise({ query: 'q', previousAnalysis: 'p', assets: [] }),
    { message: 'supervise failed with exit code 2: rate limited' }
  );
});

test('a spawn failure is rethrown as is', async () => {
  const { runner } = stubRunner({ exitCode: null, spawnError: 'Command not found: claude' });
  const reasoner = new ProviderReasoner({ provider: 'claude', cwd: process.cwd(), phaseTimeoutMs: 1000 }, runner);

  await assert.rejects(reasoner.reply({ kind: 'chat', query: 'hi', recentTurns: [] }), { message: 'Command not found: claude' });
});
