import test from 'node:test';
import assert from 'node:assert/strict';
import { succeeded } from '../execution/tool-output.js';
import { compileReport, Orchestrator } from './orchestrator.js';
import type { StreamEnvelope } from './streamer.js';
import { FakeAssetInspector, FakeBackend, MemoryConversationStore, ScriptedReasoner } from './testing.js';
import type { OrchestrationResult, Step } from './types.js';

function setup(reasoner: ScriptedReasoner, maxIterations = 5) {
  const store = new MemoryConversationStore();
  const inspector = new FakeAssetInspector();
  const backend = new FakeBackend(() => succeeded('42'));
  const envelopes: StreamEnvelope[] = [];
  const orchestrator = new Orchestrator({
    reasoner,
    backend,
    inspector,
    store,
    maxIterations,
    emit: (envelope) => {
      envelopes.push(envelope);
    },
    newTurnId: () => 'turn_1'
  });
  return { store, inspector, backend, envelopes, orchestrator };
}

function path(result: OrchestrationResult): string[] {
  return [result.transitions[0]?.from ?? '', ...result.transitions.map((transition) => transition.to)];
}

test('chat turns go straight to respond', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onRoute = () => ({ route: 'chat', reasoning: 'greeting' });
  reasoner.onReply = () => 'Hello there';
  const { store, orchestrator } = setup(reasoner);

  const result = await orchestrator.run({ sessionId: 's1', query: 'hi', assetPaths: [] });

  assert.deepEqual(path(result), ['classify', 'respond']);
  assert.equal(result.outcome, 'answered');
  assert.equal(result.answer, 'Hello there');
  assert.equal(result.plan, null);
  assert.equal(reasoner.replyInputs[0].kind, 'chat');
  assert.equal(store.turns.length, 1);
  assert.equal(store.turns[0].query, 'hi');
});

test('a fresh analysis inspects assets, plans, executes and reports', async () => {
  const reasoner = new ScriptedReasoner((input) => (
    input.iteration === 1
      ? { tool: 'execute_code', code: 'sum()', rationale: 'total' }
      : { tool: 'complete_step', summary: 'Total is 42' }
  ));
  const { store, inspector, backend, envelopes, orchestrator } = setup(reasoner);

  const result = await orchestrator.run({ sessionId: 's1', query: 'total sales?', assetPaths: ['/data/sales.csv'] });

  assert.deepEqual(path(result), ['classify', 'dispatch_assets', 'decide_supervision', 'plan', 'execute', 'respond']);
  assert.equal(result.outcome, 'complete');
  assert.equal(result.answer, 'final answer');
  assert.deepEqual(result.decisions.supervisor, { needsAnalysis: true, reasoning: 'No previous analysis in this conversation' });
  assert.equal(reasoner.superviseInputs.length, 0);
  assert.deepEqual(inspector.requests, [['/data/sales.csv']]);
  assert.equal(store.savedAssets.get('s1')?.[0].context.file_name, 'sales.csv');
  assert.deepEqual(backend.executed.map((request) => request.resourceRefs), [['/data/sales.csv']]);
  assert.deepEqual(result.plan?.steps.map((step) => [step.status, step.resultSummary]), [['completed', 'Total is 42']]);
  assert.deepEqual(result.artifacts, [{ kind: 'code-result', payload: '42', stepOrder: 1, sequence: 1 }]);

  const report = reasoner.replyInputs[0];
  assert.equal(report.kind, 'report');
  assert.equal(store.turns[0].outcome, 'complete');

  const sequences = envelopes.map((envelope) => envelope.sequence);
  assert.deepEqual(sequences, sequences.map((_, index) => index + 1));
  assert.ok(envelopes.every((envelope) => envelope.run_id === 'turn_1'));
});

test('a follow-up already covered by the last analysis is answered from context', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onRoute = () => ({ route: 'analysis_followup', reasoning: 'asks about earlier results' });
  reasoner.onSupervise = () => ({ needsAnalysis: false, reasoning: 'the total is in the previous report' });
  reasoner.onReply = () => 'It was 42';
  const { store, backend, orchestrator } = setup(reasoner);
  store.lastAnalysis = 'Total sales were 42';

  const result = await orchestrator.run({ sessionId: 's1', query: 'what was the total again?', assetPaths: [] });

  assert.deepEqual(path(result), ['classify', 'decide_supervision', 'answer_from_context', 'respond']);
  assert.equal(result.outcome, 'answered');
  assert.equal(result.answer, 'It was 42');
  assert.deepEqual(reasoner.superviseInputs.map((input) => input.previousAnalysis), ['Total sales were 42']);
  const reply = reasoner.replyInputs[0];
  assert.equal(reply.kind === 'followup' ? reply.previousAnalysis : null, 'Total sales were 42');
  assert.equal(backend.executed.length, 0);
});

test('a follow-up that needs new work goes through planning', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onRoute = () => ({ route: 'analysis_followup', reasoning: 'builds on earlier results' });
  reasoner.onSupervise = () => ({ needsAnalysis: true, reasoning: 'needs a new breakdown' });
  const { store, orchestrator } = setup(reasoner);
  store.lastAnalysis = 'Total sales were 42';

  const result = await orchestrator.run({ sessionId: 's1', query: 'break it down by region', assetPaths: [] });

  assert.deepEqual(path(result), ['classify', 'decide_supervision', 'plan', 'execute', 'respond']);
  assert.equal(result.outcome, 'complete');
});

test('a planning contract violation ends the turn as failed and is still recorded', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onPlan = () => ({
    summary: 'bad order',
    steps: [
      { order: 2, description: 'second', assignedAgent: 'general' },
      { order: 1, description: 'first', assignedAgent: 'general' }
    ]
  });
  const { store, orchestrator } = setup(reasoner);

  const result = await orchestrator.run({ sessionId: 's1', query: 'analyze', assetPaths: [] });

  assert.deepEqual(path(result), ['classify', 'dispatch_assets', 'decide_supervision', 'plan', 'respond']);
  assert.equal(result.outcome, 'failed');
  assert.equal(result.error, 'plan step order must be strictly increasing and unique (order 1 follows 2)');
  assert.equal(result.answer, 'The request could not be completed: plan step order must be strictly increasing and unique (order 1 follows 2)');
  assert.equal(store.turns[0].outcome, 'failed');
});

test('a router failure is a fault', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onRoute = () => {
    throw new Error('claude exited with code 1');
  };
  const { orchestrator } = setup(reasoner);

  const result = await orchestrator.run({ sessionId: 's1', query: 'analyze', assetPaths: [] });

  assert.deepEqual(path(result), ['classify', 'respond']);
  assert.equal(result.outcome, 'failed');
  assert.equal(result.route, null);
  assert.equal(result.error, 'claude exited with code 1');
});

test('the report falls back to the step summaries when the reply fails', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onReply = () => {
    throw new Error('provider unavailable');
  };
  const { orchestrator } = setup(reasoner);

  const result = await orchestrator.run({ sessionId: 's1', query: 'analyze', assetPaths: [] });

  assert.equal(result.outcome, 'complete');
  assert.equal(result.error, null);
  assert.equal(result.answer, 'Analysis results:\n1. Analyze: done');
});

test('an exhausted step makes the outcome partial', async () => {
  const reasoner = new ScriptedReasoner(() => ({ tool: 'execute_code', code: 'loop()', rationale: 'again' }));
  const { orchestrator } = setup(reasoner, 1);

  const result = await orchestrator.run({ sessionId: 's1', query: 'analyze', assetPaths: [] });

  assert.equal(result.outcome, 'partial');
  assert.equal(result.plan?.steps[0].caveat, 'Stopped after reaching the tool call limit');
});

test('a store failure while recording marks the turn failed', async () => {
  const reasoner = new ScriptedReasoner();
  reasoner.onRoute = () => ({ route: 'chat', reasoning: 'small talk' });
  const { store, orchestrator } = setup(reasoner);
  store.recordError = new Error('disk full');

  const result = await orchestrator.run({ sessionId: 's1', query: 'hi', assetPaths: [] });

  assert.equal(result.outcome, 'failed');
  assert.equal(result.error, 'failed to record turn: disk full');
});

test('an aborted turn is reported as cancelled', async () => {
  const controller = new AbortController();
  controller.abort();
  const { orchestrator } = setup(new ScriptedReasoner());

  const result = await orchestrator.run({ sessionId: 's1', query: 'analyze', assetPaths: [], signal: controller.signal });

  assert.equal(result.outcome, 'cancelled');
  assert.equal(result.error, 'turn cancelled');
  assert.deepEqual(path(result), ['classify', 'respond']);
});

test('compileReport marks failed, pending and caveated steps', () => {
  const steps: Step[] = [
    { order: 1, description: 'Load', role: 'general', status: 'completed', resultSummary: 'loaded', error: null, caveat: 'Stopped after reaching the tool call limit' },
    { order: 2, description: 'Total', role: 'general', status: 'failed', resultSummary: '', error: 'timeout', caveat: null },
    { order: 3, description: 'Chart', role: 'general', status: 'pending', resultSummary: '', error: null, caveat: null }
  ];

  assert.equal(compileReport(steps), [
    'Analysis results:',
    '1. Load: loaded [Stopped after reaching the tool call limit]',
    '2. Total: failed (timeout)',
    '3. Chart: not run'
  ].join('\n'));
});
