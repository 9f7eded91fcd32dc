import test from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_LIMITS, HrxArchive, HrxError } from '../src/index.js';

function assertLimit(run: () => unknown, context: Record<string, string>): void {
  assert.throws(run, (err: unknown) => {
    if (!(err instanceof HrxError)) return false;
    assert.equal(err.code, 'HRX_LIMIT_EXCEEDED');
    assert.deepEqual(err.context, context);
    return true;
  });
}

test('default limits are frozen', () => {
  assert.ok(Object.isFrozen(DEFAULT_LIMITS));
  assert.equal(DEFAULT_LIMITS.maxEntries, 100_000);
});

test('maxEntries caps the number of parsed entries', () => {
  const text = '<=> a\n<=> b\n<=> c\n';
  assert.equal(HrxArchive.parse(text, { limits: { maxEntries: 3 } }).entries.size, 3);
  assertLimit(() => HrxArchive.parse(text, { limits: { maxEntries: 2 } }), {
    limit: 'maxEntries',
    value: '3',
    max: '2'
  });
});

test('maxInputLength is checked before scanning', () => {
  assertLimit(() => HrxArchive.parse('no boundary at all', { limits: { maxInputLength: 4 } }), {
    limit: 'maxInputLength',
    value: '18',
    max: '4'
  });
});

test('maxBoundaryLength bounds the discovered width', () => {
  assertLimit(() => HrxArchive.parse('<===> a\n', { limits: { maxBoundaryLength: 2 } }), {
    limit: 'maxBoundaryLength',
    value: '3',
    max: '2'
  });
  assert.equal(HrxArchive.parse('<==> a\n', { limits: { maxBoundaryLength: 2 } }).boundaryLength, 2);
});
