import test from 'node:test';
import assert from 'node:assert/strict';
import { failed, succeeded } from '../execution/tool-output.js';
import type { ExecuteRequest, ToolOutput } from '../execution/types.js';
import { ArtifactAccumulator } from './accumulator.js';
import { buildContextSummary, TaskDispatcher } from './dispatcher.js';
import { Plan } from './plan.js';
import { discardEnvelopes, RunStreamer } from './streamer.js';
import { FakeBackend, ScriptedReasoner } from './testing.js';
import { ToolExecutionLoop } from './tool-loop.js';
import type { AssetEntry, ToolCall, ToolCallInput } from './types.js';

const assets: AssetEntry[] = [{
  assetId: 'a1',
  path: '/data/sales.csv',
  context: { description: 'Monthly sales', file_name: 'sales.csv', file_type: 'csv', metadata: {} }
}];

function twoStepPlan(): Plan {
  return Plan.fromDraft({
    summary: 'load then total',
    steps: [
      { order: 1, description: 'Load data', assignedAgent: 'spreadsheet' },
      { order: 2, description: 'Compute totals', assignedAgent: 'spreadsheet' }
    ]
  }, { query: 'totals?', role: 'general' });
}

function runOnceThenComplete(callInput: ToolCallInput): ToolCall {
  if (callInput.iteration === 1) {
    return { tool: 'execute_code', code: `step${callInput.step.order}`, rationale: 'run' };
  }
  return { tool: 'complete_step', summary: `done ${callInput.step.order}` };
}

function setup(reasoner: ScriptedReasoner, respond: (request: ExecuteRequest) => ToolOutput, maxIterations = 5) {
  const backend = new FakeBackend(respond);
  const streamer = new RunStreamer('run_1', 'execute', discardEnvelopes);
  const loop = new ToolExecutionLoop(reasoner, backend, streamer, { maxIterations });
  return { backend, dispatcher: new TaskDispatcher(loop, new ArtifactAccumulator(), streamer) };
}

test('runs every step in order and accumulates their artifacts', async () => {
  const reasoner = new ScriptedReasoner(runOnceThenComplete);
  const { dispatcher } = setup(reasoner, (request) => succeeded(`out ${request.code}`));

  const result = await dispatcher.run(twoStepPlan(), { sessionId: 's1', query: 'totals?', assets });

  assert.deepEqual(result.steps.map((step) => [step.order, step.status, step.resultSummary]), [
    [1, 'completed', 'done 1'],
    [2, 'completed', 'done 2']
  ]);
  assert.deepEqual(result.artifacts, [
    { kind: 'code-result', payload: 'out step1', stepOrder: 1, sequence: 1 },
    { kind: 'code-result', payload: 'out step2', stepOrder: 2, sequence: 2 }
  ]);
  assert.equal(result.invocations, 2);
  assert.equal(result.cancelled, false);

  const secondStepContext = reasoner.toolCallInputs.find((input) => input.step.order === 2)?.contextSummary;
  assert.equal(secondStepContext, [
    'Assets:',
    '- sales.csv (csv) at /data/sales.csv: Monthly sales',
    'Previous steps:',
    '- Step 1 (Load data): done 1'
  ].join('\n'));
});

test('a failed step does not stop the steps after it', async () => {
  const reasoner = new ScriptedReasoner(runOnceThenComplete);
  const { dispatcher } = setup(reasoner, (request) => (
    request.code === 'step1' ? failed('timeout', 'remote job timed out after 60ms') : succeeded('42')
  ));

  const result = await dispatcher.run(twoStepPlan(), { sessionId: 's1', query: 'totals?', assets });

  assert.deepEqual(result.steps.map((step) => [step.status, step.error]), [
    ['failed', 'remote job timed out after 60ms'],
    ['completed', null]
  ]);
  assert.equal(result.invocations, 2);
  assert.deepEqual(result.artifacts.map((artifact) => artifact.stepOrder), [2]);
});

test('an exhausted step completes with a caveat', async () => {
  const reasoner = new ScriptedReasoner(() => ({ tool: 'execute_code', code: 'again()', rationale: 'retry' }));
  const { dispatcher } = setup(reasoner, () => succeeded('rows: 10'), 2);
  const plan = Plan.fromDraft({ summary: '', steps: [] }, { query: 'count rows', role: 'spreadsheet' });

  const result = await dispatcher.run(plan, { sessionId: 's1', query: 'count rows', assets: [] });

  assert.equal(result.steps[0].status, 'completed');
  assert.equal(result.steps[0].caveat, 'Stopped after reaching the tool call limit');
  assert.equal(result.steps[0].resultSummary, 'Partial result: rows: 10');
  assert.equal(result.artifacts.length, 2);
});

test('cancellation fails the running step and leaves the rest pending', async () => {
  const controller = new AbortController();
  const reasoner = new ScriptedReasoner(runOnceThenComplete);
  const { backend, dispatcher } = setup(reasoner, () => {
    controller.abort();
    return failed('cancelled', 'execution cancelled');
  });

  const result = await dispatcher.run(twoStepPlan(), { sessionId: 's1', query: 'totals?', assets, signal: controller.signal });

  assert.equal(result.cancelled, true);
  assert.equal(result.invocations, 1);
  assert.deepEqual(result.steps.map((step) => [step.status, step.error]), [
    ['failed', 'cancelled'],
    ['pending', null]
  ]);
  assert.equal(backend.executed.length, 1);
});

test('context summary is empty without assets or finished steps', () => {
  assert.equal(buildContextSummary([], []), '');
});
