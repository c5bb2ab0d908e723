import test from 'node:test';
import assert from 'node:assert/strict';
import {
  RESULT_END_MARKER,
  RESULT_START_MARKER,
  extractResult,
  formatResultBlock,
  hasCompleteResult,
  splitTimestampPrefix
} from './result-markers.js';

test('extracts a payload surrounded by noise', () => {
  const log = [
    'npm notice booting',
    RESULT_START_MARKER,
    '{"success":true,"output":"ok","error":null,"artifacts":[]}',
    RESULT_END_MARKER,
    'server listening on 3000'
  ].join('\n');

  assert.deepEqual(extractResult(log), {
    success: true,
    output: 'ok',
    error: null,
    errorKind: null,
    artifacts: []
  });
});

test('strips timestamp prefixes from every payload line', () => {
  const log = [
    `2024-05-01T10:00:00.123456789Z ${RESULT_START_MARKER}`,
    '2024-05-01T10:00:00.200Z {"success":true,"output":"5000 rows",',
    '2024-05-01T10:00:00.201Z "error":null,"artifacts":[{"kind":"table","payload":{"rows":2}}]}',
    `2024-05-01T10:00:00.300Z ${RESULT_END_MARKER}`
  ].join('\n');

  const result = extractResult(log);
  assert.equal(result.success, true);
  assert.equal(result.output, '5000 rows');
  assert.deepEqual(result.artifacts, [{ kind: 'table', payload: { rows: 2 } }]);
});

test('markers sharing a line with payload text still delimit it', () => {
  const log = `${RESULT_START_MARKER}{"success":false,"output":"","error":"boom"}${RESULT_END_MARKER}`;

  const result = extractResult(log);
  assert.equal(result.success, false);
  assert.equal(result.errorKind, 'execution');
  assert.equal(result.error, 'boom');
});

test('missing start marker yields no_result with the cleaned log as output', () => {
  const log = '2024-05-01T10:00:00Z starting\n2024-05-01T10:00:01Z Traceback here';

  const result = extractResult(log);
  assert.equal(result.success, false);
  assert.equal(result.errorKind, 'no_result');
  assert.equal(result.error, 'no result marker found in job logs');
  assert.equal(result.output, 'starting\nTraceback here');
});

test('missing end marker reports truncation and keeps the text after the start marker', () => {
  const log = `boot\n${RESULT_START_MARKER}\n2024-05-01T10:00:00Z {"success":tr`;

  const result = extractResult(log);
  assert.equal(result.success, false);
  assert.equal(result.errorKind, 'no_result');
  assert.match(result.error ?? '', /truncated/);
  assert.equal(result.output, '{"success":tr');
});

test('non-JSON payload yields malformed_result', () => {
  const log = `${RESULT_START_MARKER}\nnot json at all\n${RESULT_END_MARKER}`;

  const result = extractResult(log);
  assert.equal(result.errorKind, 'malformed_result');
  assert.equal(result.output, 'not json at all');
});

test('JSON with the wrong shape yields malformed_result', () => {
  const log = `${RESULT_START_MARKER}\n{"ok":true}\n${RESULT_END_MARKER}`;

  const result = extractResult(log);
  assert.equal(result.errorKind, 'malformed_result');
  assert.match(result.error ?? '', /does not match/);
});

test('only the first result block is used', () => {
  const first = formatResultBlock({ success: true, output: 'first', error: null, artifacts: [] });
  const second = formatResultBlock({ success: true, output: 'second', error: null, artifacts: [] });

  assert.equal(extractResult(`${first}\n${second}`).output, 'first');
});

test('splitTimestampPrefix is lossless', () => {
  const lines = [
    '2024-05-01T10:00:00Z hello',
    '2024-05-01T10:00:00.5+02:00 offset',
    'no prefix here',
    '',
    '2024-05-01 not iso'
  ];
  for (const line of lines) {
    const { prefix, content } = splitTimestampPrefix(line);
    assert.equal(prefix + content, line);
  }
  assert.deepEqual(splitTimestampPrefix('2024-05-01T10:00:00Z hello'), { prefix: '2024-05-01T10:00:00Z ', content: 'hello' });
  assert.deepEqual(splitTimestampPrefix('2024-05-01 not iso'), { prefix: '', content: '2024-05-01 not iso' });
});

test('hasCompleteResult needs both markers in order', () => {
  assert.equal(hasCompleteResult(`${RESULT_START_MARKER} x ${RESULT_END_MARKER}`), true);
  assert.equal(hasCompleteResult(`${RESULT_START_MARKER} x`), false);
  assert.equal(hasCompleteResult(`${RESULT_END_MARKER} ${RESULT_START_MARKER}`), false);
});
