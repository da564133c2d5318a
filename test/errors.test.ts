import test from 'node:test';
import assert from 'node:assert/strict';
import { ArchiveError } from '../src/archive/errors.js';
import { CompressionError } from '../src/compression/errors.js';
import { classifyError, errnoCode, exitCodeFor, IoError, UserInputError, withIo } from '../src/errors.js';
import { ManifestError } from '../src/manifest/errors.js';
import { PolicyError } from '../src/policy/errors.js';

function enoent(): Error {
  return Object.assign(new Error('no such file'), { code: 'ENOENT' });
}

test('errors map to exit codes by class', () => {
  assert.equal(exitCodeFor(new PolicyError('POLICY_ROOT_ESCAPE', 'escape')), 3);
  assert.equal(exitCodeFor(new ManifestError('MANIFEST_MISSING_ENTRY', 'missing', { path: 'a' })), 3);
  assert.equal(exitCodeFor(new UserInputError('INPUT_NOT_FOUND', 'missing')), 2);
  assert.equal(exitCodeFor(new IoError('IO_FAILED', 'open', '/x')), 1);
  assert.equal(exitCodeFor(new ArchiveError('ARCHIVE_TRUNCATED', 'short')), 1);
  assert.equal(exitCodeFor(new CompressionError('COMPRESSION_BAD_DATA', 'bad', { algorithm: 'gzip' })), 1);
  assert.equal(exitCodeFor(new Error('plain')), 1);
  assert.equal(exitCodeFor('not an error'), 1);
});

test('classifyError follows the cause chain', () => {
  const policy = new PolicyError('POLICY_LINK_OUTSIDE_ROOT', 'link');
  const wrapped = new IoError('IO_FAILED', 'extract', '/x', { cause: new Error('outer', { cause: policy }) });
  assert.equal(classifyError(wrapped), 'policy');
  assert.equal(classifyError(new Error('io', { cause: new UserInputError('INPUT_INVALID_OPTION', 'bad') })), 'user-input');
});

test('classifyError stops on cyclic causes', () => {
  const first = new Error('first');
  const second = new Error('second', { cause: first });
  Object.defineProperty(first, 'cause', { value: second });
  assert.equal(classifyError(second), 'io');
});

test('IoError carries the errno of its cause', () => {
  const error = new IoError('IO_FAILED', 'mkdir', '/x', { cause: enoent() });
  assert.equal(error.message, 'mkdir failed for /x (ENOENT)');
  assert.equal(error.errno, 'ENOENT');
  assert.deepEqual(error.toJSON(), {
    schemaVersion: '1',
    name: 'IoError',
    code: 'IO_FAILED',
    message: 'mkdir failed for /x (ENOENT)',
    hint: 'mkdir failed for /x (ENOENT)',
    context: { operation: 'mkdir', path: '/x', errno: 'ENOENT' }
  });
});

test('withIo wraps failures and passes results through', async () => {
  assert.equal(await withIo('read', '/x', async () => 42), 42);
  await assert.rejects(
    withIo('read', '/x', async () => {
      throw enoent();
    }),
    (err: unknown) => err instanceof IoError && err.operation === 'read' && err.errno === 'ENOENT'
  );
});

test('errnoCode reads string codes only', () => {
  assert.equal(errnoCode(enoent()), 'ENOENT');
  assert.equal(errnoCode(Object.assign(new Error('x'), { code: 5 })), undefined);
  assert.equal(errnoCode('ENOENT'), undefined);
});

test('serialized errors use schema version 1', () => {
  const policy = new PolicyError('POLICY_FILE_COUNT_EXCEEDED', 'too many', { path: 'a', limit: 1, actual: 2 }).toJSON();
  assert.equal(policy.schemaVersion, '1');
  assert.equal(policy.code, 'POLICY_FILE_COUNT_EXCEEDED');
  const input = new UserInputError('INPUT_NOT_FOUND', 'archive not found: a.tar', { path: 'a.tar' }).toJSON();
  assert.equal(input.schemaVersion, '1');
  assert.equal(input.path, 'a.tar');
  assert.equal(input.message, 'archive not found: a.tar');
});
