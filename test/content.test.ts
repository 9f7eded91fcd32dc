import test from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import {
  HrxArchive,
  HrxError,
  HrxPath,
  MAX_BOUNDARY_LENGTH,
  boundaryMarker,
  fileEntry,
  findContentViolation,
  listContentViolations
} from '../src/index.js';

const BOUNDARIES_FIXTURE = new URL('./fixtures/hrx/boundaries.hrx', import.meta.url);

function withRootComment(length: number, comment: string): HrxArchive {
  const archive = new HrxArchive(length);
  archive.comment = comment;
  return archive;
}

test('root comment containing the boundary fails only at that width', () => {
  const comment = 'Hello\n<=====>\nworld';
  assert.throws(
    () => withRootComment(5, comment).validateContent(),
    (err: unknown) => {
      if (!(err instanceof HrxError)) return false;
      assert.equal(err.code, 'HRX_BOUNDARY_IN_CONTENT');
      assert.deepEqual(err.violation, { location: 'root-comment' });
      assert.equal(err.entryName, undefined);
      assert.equal(err.message, 'Archive comment contains the boundary <=====>');
      return true;
    }
  );
  assert.doesNotThrow(() => withRootComment(3, comment).validateContent());
  assert.doesNotThrow(() => withRootComment(7, comment).validateContent());
});

test('text starting with the boundary collides too', () => {
  const archive = new HrxArchive(3);
  archive.entries.set(HrxPath.parse('a'), fileEntry('<===> b'));
  assert.deepEqual(findContentViolation(archive, 3), { location: 'entry-data', path: 'a' });
  assert.equal(findContentViolation(archive, 2), undefined);
});

test('violations are reported root comment first, then comment before body', () => {
  const archive = new HrxArchive(1);
  archive.entries.set(HrxPath.parse('first'), fileEntry('x\n<=>', 'y\n<=>'));
  archive.entries.set(HrxPath.parse('second'), fileEntry('<=>'));
  assert.deepEqual(findContentViolation(archive, 1), { location: 'entry-comment', path: 'first' });

  archive.comment = '<=> root';
  assert.deepEqual(findContentViolation(archive, 1), { location: 'root-comment' });
  assert.deepEqual(listContentViolations(archive, 1), [
    { location: 'root-comment' },
    { location: 'entry-comment', path: 'first' },
    { location: 'entry-data', path: 'first' },
    { location: 'entry-data', path: 'second' }
  ]);
});

test('directories have no body to check', () => {
  const archive = new HrxArchive(2);
  archive.entries.set(HrxPath.parse('dir'), { data: { type: 'directory' } });
  archive.entries.set(HrxPath.parse('dir/f'), fileEntry('\n<==>'));
  assert.deepEqual(findContentViolation(archive, 2), { location: 'entry-data', path: 'dir/f' });
});

test('setBoundaryLength is transactional', async () => {
  const text = await readFile(BOUNDARIES_FIXTURE, 'utf8');
  const archive = HrxArchive.parse(text);
  assert.equal(archive.boundaryLength, 3);

  archive.setBoundaryLength(4);
  assert.equal(archive.boundaryLength, 4);
  const atFour = archive.toString();

  assert.throws(
    () => archive.setBoundaryLength(5),
    (err: unknown) => {
      if (!(err instanceof HrxError)) return false;
      assert.equal(err.code, 'HRX_BOUNDARY_IN_CONTENT');
      assert.deepEqual(err.violation, { location: 'entry-data', path: 'boundary-5.txt' });
      assert.equal(err.entryName, 'boundary-5.txt');
      assert.equal(err.context?.boundaryLength, '5');
      return true;
    }
  );
  assert.equal(archive.boundaryLength, 4);
  assert.equal(archive.toString(), atFour);

  archive.setBoundaryLength(6);
  assert.equal(archive.boundaryLength, 6);

  assert.throws(
    () => archive.setBoundaryLength(7),
    (err: unknown) =>
      err instanceof HrxError &&
      err.violation?.location === 'entry-comment' &&
      err.violation.path === 'fine.txt'
  );
  assert.equal(archive.boundaryLength, 6);

  archive.setBoundaryLength(8);
  assert.equal(archive.boundaryLength, 8);

  archive.setBoundaryLength(3);
  assert.equal(archive.toString(), text);
});

test('validateContent sees mutations made after parsing', () => {
  const archive = HrxArchive.parse('<===>\nA HRX file may consist of only a comment and nothing else.');
  archive.validateContent();
  archive.comment = `${archive.comment ?? ''}\n<===>\nNow the comment contains the boundary!`;
  assert.throws(
    () => archive.validateContent(),
    (err: unknown) => err instanceof HrxError && err.violation?.location === 'root-comment'
  );
});

test('boundary lengths must be integers within range', () => {
  for (const length of [0, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY, MAX_BOUNDARY_LENGTH + 1, 2 ** 30]) {
    assert.throws(
      () => new HrxArchive(length),
      (err: unknown) => err instanceof HrxError && err.code === 'HRX_INVALID_BOUNDARY_LENGTH'
    );
  }
  const archive = new HrxArchive(2);
  assert.throws(
    () => archive.setBoundaryLength(0),
    (err: unknown) => err instanceof HrxError && err.code === 'HRX_INVALID_BOUNDARY_LENGTH'
  );
  assert.throws(
    () => archive.setBoundaryLength(2 ** 30),
    (err: unknown) =>
      err instanceof HrxError &&
      err.code === 'HRX_INVALID_BOUNDARY_LENGTH' &&
      err.context?.boundaryLength === String(2 ** 30)
  );
  assert.equal(archive.boundaryLength, 2);
  assert.throws(
    () => boundaryMarker(2 ** 30),
    (err: unknown) => err instanceof HrxError && err.code === 'HRX_INVALID_BOUNDARY_LENGTH'
  );

  archive.setBoundaryLength(MAX_BOUNDARY_LENGTH);
  assert.equal(archive.boundaryLength, MAX_BOUNDARY_LENGTH);
});
