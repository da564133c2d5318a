import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { UserInputError } from '../src/errors.js';
import { PolicyError } from '../src/policy/errors.js';
import { SecurityPolicy } from '../src/policy/SecurityPolicy.js';
import type { PolicyErrorCode } from '../src/policy/errors.js';

const PROPERTY_CONFIG = {
  numRuns: 200,
  seed: 0x7a2ba5d
} as const;

const ROOT = '/srv/extract';

function expectPolicy(action: () => unknown, code: PolicyErrorCode): void {
  assert.throws(action, (err: unknown) => {
    assert.ok(err instanceof PolicyError);
    assert.equal(err.code, code);
    return true;
  });
}

const segment = fc.stringMatching(/^[a-z0-9_][a-z0-9_.-]{0,7}$/).filter((part) => part !== '..' && part !== '.');
const relativePath = fc.array(segment, { minLength: 1, maxLength: 6 }).map((parts) => parts.join('/'));

test('normalizeAndValidate confines relative paths to the root', () => {
  const policy = SecurityPolicy.create();
  assert.deepEqual(policy.normalizeAndValidate('a/b.txt', ROOT), { rel: 'a/b.txt', abs: '/srv/extract/a/b.txt' });
  assert.deepEqual(policy.normalizeAndValidate('./a//b/', ROOT), { rel: 'a/b', abs: '/srv/extract/a/b' });
  assert.deepEqual(policy.normalizeAndValidate('.', ROOT), { rel: '', abs: ROOT });
});

test('normalizeAndValidate rejects empty, absolute and traversing paths', () => {
  const policy = SecurityPolicy.create();
  expectPolicy(() => policy.normalizeAndValidate('', ROOT), 'POLICY_EMPTY_PATH');
  expectPolicy(() => policy.normalizeAndValidate('/etc/passwd', ROOT), 'POLICY_ABSOLUTE_PATH');
  expectPolicy(() => policy.normalizeAndValidate('../x', ROOT), 'POLICY_PARENT_TRAVERSAL');
  expectPolicy(() => policy.normalizeAndValidate('a/../b', ROOT), 'POLICY_PARENT_TRAVERSAL');
  expectPolicy(() => policy.normalizeAndValidate('bad\u0000name', ROOT), 'POLICY_INVALID_UTF8');
});

test('permissive flags still enforce containment', () => {
  const policy = SecurityPolicy.create({ allowAbsolute: true, allowParentComponents: true });
  assert.deepEqual(policy.normalizeAndValidate('a/../b', ROOT), { rel: 'b', abs: '/srv/extract/b' });
  assert.deepEqual(policy.normalizeAndValidate('/srv/extract/inside', ROOT), {
    rel: 'inside',
    abs: '/srv/extract/inside'
  });
  expectPolicy(() => policy.normalizeAndValidate('../x', ROOT), 'POLICY_ROOT_ESCAPE');
  expectPolicy(() => policy.normalizeAndValidate('/etc/passwd', ROOT), 'POLICY_ROOT_ESCAPE');
  expectPolicy(() => policy.normalizeAndValidate('/srv/extractor', ROOT), 'POLICY_ROOT_ESCAPE');
});

test('a backslash is an ordinary name character', () => {
  const policy = SecurityPolicy.create();
  assert.deepEqual(policy.normalizeAndValidate('a\\..\\b', ROOT), { rel: 'a\\..\\b', abs: '/srv/extract/a\\..\\b' });
});

test('relative roots are rejected as caller errors', () => {
  const policy = SecurityPolicy.create();
  assert.throws(
    () => policy.normalizeAndValidate('a', 'relative/root'),
    (err: unknown) => err instanceof UserInputError && err.code === 'INPUT_INVALID_PATH'
  );
});

test('enforceLinkPolicy accepts targets inside the root', () => {
  const policy = SecurityPolicy.create();
  policy.enforceLinkPolicy('/srv/extract/a/target', ROOT, 'symlink');
  policy.enforceLinkPolicy('a/target', ROOT, 'hardlink');
});

test('enforceLinkPolicy reports escaping targets as link violations', () => {
  const policy = SecurityPolicy.create();
  assert.throws(
    () => policy.enforceLinkPolicy('/etc/passwd', ROOT, 'symlink'),
    (err: unknown) => {
      assert.ok(err instanceof PolicyError);
      assert.equal(err.code, 'POLICY_LINK_OUTSIDE_ROOT');
      assert.equal(err.message, 'link target escapes root: /etc/passwd');
      assert.deepEqual(err.context, { linkKind: 'symlink' });
      return true;
    }
  );
  assert.throws(
    () => policy.enforceLinkPolicy('../outside', ROOT, 'hardlink'),
    (err: unknown) => {
      assert.ok(err instanceof PolicyError);
      assert.equal(err.code, 'POLICY_LINK_OUTSIDE_ROOT');
      assert.ok(err.cause instanceof PolicyError);
      assert.equal(err.cause.code, 'POLICY_PARENT_TRAVERSAL');
      return true;
    }
  );
});

test('link toggles are independent per link kind', () => {
  const policy = SecurityPolicy.create({ allowSymlinkOutsideRoot: true });
  policy.enforceLinkPolicy('/etc/passwd', ROOT, 'symlink');
  expectPolicy(() => policy.enforceLinkPolicy('/etc/passwd', ROOT, 'hardlink'), 'POLICY_LINK_OUTSIDE_ROOT');
});

test('policies are frozen and builders return new instances', () => {
  const policy = SecurityPolicy.create();
  assert.ok(Object.isFrozen(policy));
  assert.ok(Object.isFrozen(policy.limits));
  const narrowed = policy.withMaxFiles(3).withMaxDepth(2);
  assert.notEqual(narrowed, policy);
  assert.equal(narrowed.limits.maxFiles, 3);
  assert.equal(narrowed.limits.maxDepth, 2);
  assert.equal(policy.limits.maxFiles, 200_000);
  assert.equal(policy.withMaxTotalBytes(undefined), policy);
  assert.equal(policy.withFlags({ followSymlinks: true }).flags.followSymlinks, true);
  assert.equal(policy.flags.followSymlinks, false);
});

test('invalid limits are rejected as option errors', () => {
  assert.throws(
    () => SecurityPolicy.create().withMaxFiles(-1),
    (err: unknown) => err instanceof UserInputError && err.code === 'INPUT_INVALID_OPTION'
  );
  assert.throws(
    () => SecurityPolicy.create().withMaxDepth(1.5),
    (err: unknown) => err instanceof UserInputError && err.code === 'INPUT_INVALID_OPTION'
  );
});

test('property: validated paths stay under the root and revalidate to themselves', () => {
  const policy = SecurityPolicy.create();
  fc.assert(
    fc.property(relativePath, (path) => {
      const validated = policy.normalizeAndValidate(path, ROOT);
      assert.ok(validated.abs.startsWith(`${ROOT}/`));
      assert.deepEqual(policy.normalizeAndValidate(validated.rel, ROOT), validated);
    }),
    PROPERTY_CONFIG
  );
});

test('property: any parent component is rejected', () => {
  const policy = SecurityPolicy.create();
  fc.assert(
    fc.property(fc.array(segment, { maxLength: 4 }), fc.array(segment, { maxLength: 4 }), (before, after) => {
      const path = [...before, '..', ...after].join('/');
      expectPolicy(() => policy.normalizeAndValidate(path, ROOT), 'POLICY_PARENT_TRAVERSAL');
    }),
    PROPERTY_CONFIG
  );
});

test('property: absolute paths are rejected by default', () => {
  const policy = SecurityPolicy.create();
  fc.assert(
    fc.property(relativePath, (path) => {
      expectPolicy(() => policy.normalizeAndValidate(`/${path}`, ROOT), 'POLICY_ABSOLUTE_PATH');
    }),
    PROPERTY_CONFIG
  );
});
