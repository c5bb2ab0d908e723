import test from 'node:test';
import assert from 'node:assert/strict';
import { RunStreamer, type StreamEnvelope } from './streamer.js';

test('phase streamers share one strictly increasing sequence', async () => {
  const envelopes: StreamEnvelope[] = [];
  const root = new RunStreamer('run_001', 'orchestrator', async (envelope) => {
    envelopes.push(envelope);
  });
  const step = root.forPhase('step:1');

  await root.emitStateChange({ from: 'classify', to: 'plan' });
  await step.emitAction({ tool: 'execute_code' });
  await step.emitToolResult({ success: true });
  await root.emitEvent({ message: 'done' });

  assert.deepEqual(envelopes.map((e) => e.sequence), [1, 2, 3, 4]);
  assert.deepEqual(envelopes.map((e) => e.phase), ['orchestrator', 'step:1', 'step:1', 'orchestrator']);
  assert.deepEqual(envelopes.map((e) => e.type), ['state_change', 'action', 'tool_result', 'event']);
  assert.equal(envelopes[1].producer, 'model');
  assert.ok(envelopes.every((e) => e.run_id === 'run_001'));
});
