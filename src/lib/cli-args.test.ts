import test from 'node:test';
import assert from 'node:assert/strict';
import { parseCliArgs } from './cli-args.js';

test('parseCliArgs separates positionals, named options and flags', () => {
  const parsed = parseCliArgs(['ask', 'how many rows?', '--session', 's1', '--stream-logs']);

  assert.deepEqual(parsed.positional, ['ask', 'how many rows?']);
  assert.equal(parsed.named.get('--session'), 's1');
  assert.equal(parsed.flags.has('--stream-logs'), true);
});

test('parseCliArgs keeps every value of a repeated option', () => {
  const parsed = parseCliArgs(['--asset', 'a.csv', '--asset', 'b.xlsx']);

  assert.deepEqual(parsed.repeated.get('--asset'), ['a.csv', 'b.xlsx']);
  assert.equal(parsed.named.get('--asset'), 'b.xlsx');
});

test('parseCliArgs treats an option followed by another option as a flag', () => {
  const parsed = parseCliArgs(['--stream-logs', '--limit', '5']);

  assert.equal(parsed.flags.has('--stream-logs'), true);
  assert.equal(parsed.named.get('--limit'), '5');
});
