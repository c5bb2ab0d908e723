import test from 'node:test';
import assert from 'node:assert/strict';
import { KeyedMutex } from './keyed-mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

test('calls for the same key never overlap', async () => {
  const mutex = new KeyedMutex();
  const trace: string[] = [];

  const run = (label: string, ms: number) => mutex.runExclusive('s1', async () => {
    trace.push(`start:${label}`);
    await delay(ms);
    trace.push(`end:${label}`);
    return label;
  });

  const results = await Promise.all([run('a', 20), run('b', 1), run('c', 5)]);

  assert.deepEqual(results, ['a', 'b', 'c']);
  assert.deepEqual(trace, ['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  assert.equal(mutex.isLocked('s1'), false);
});

test('different keys run concurrently', async () => {
  const mutex = new KeyedMutex();
  const trace: string[] = [];

  await Promise.all([
    mutex.runExclusive('s1', async () => {
      trace.push('start:s1');
      await delay(20);
      trace.push('end:s1');
    }),
    mutex.runExclusive('s2', async () => {
      trace.push('start:s2');
      trace.push('end:s2');
    })
  ]);

  assert.deepEqual(trace, ['start:s1', 'start:s2', 'end:s2', 'end:s1']);
});

test('a rejected call releases the key for the next caller', async () => {
  const mutex = new KeyedMutex();

  await assert.rejects(
    mutex.runExclusive('s1', async () => {
      throw new Error('boom');
    }),
    /boom/
  );

  const value = await mutex.runExclusive('s1', () => 42);
  assert.equal(value, 42);
});
