import test from 'node:test';
import assert from 'node:assert/strict';
import {
  cleanPath,
  hasInvalidText,
  hasParentComponent,
  isWithinRoot,
  joinPath,
  parentPath,
  pathComponents,
  relativeToRoot
} from '../src/policy/paths.js';

test('cleanPath collapses separators and dot segments', () => {
  assert.equal(cleanPath('/a/./b//c/'), '/a/b/c');
  assert.equal(cleanPath('/a/b/../c'), '/a/c');
  assert.equal(cleanPath('/'), '/');
  assert.equal(cleanPath(''), '.');
});

test('cleanPath never climbs above the filesystem root', () => {
  assert.equal(cleanPath('/../x'), '/x');
  assert.equal(cleanPath('/a/../../b'), '/b');
});

test('cleanPath keeps leading parent components of relative paths', () => {
  assert.equal(cleanPath('a/../../b'), '../b');
  assert.equal(cleanPath('./a/b/..'), 'a');
});

test('isWithinRoot compares whole components', () => {
  assert.equal(isWithinRoot('/a/b/c', '/a/b'), true);
  assert.equal(isWithinRoot('/a/b', '/a/b'), true);
  assert.equal(isWithinRoot('/a/bc', '/a/b'), false);
  assert.equal(isWithinRoot('/x', '/'), true);
});

test('relativeToRoot strips the root prefix', () => {
  assert.equal(relativeToRoot('/r/a/b', '/r'), 'a/b');
  assert.equal(relativeToRoot('/r', '/r'), '');
  assert.equal(relativeToRoot('/x', '/'), 'x');
});

test('parentPath and joinPath', () => {
  assert.equal(parentPath('/a/b'), '/a');
  assert.equal(parentPath('/a'), '/');
  assert.equal(parentPath('a'), '.');
  assert.equal(joinPath('/r', 'a'), '/r/a');
  assert.equal(joinPath('/', 'a'), '/a');
  assert.equal(joinPath('/r', ''), '/r');
});

test('component helpers treat backslash as a name character', () => {
  assert.deepEqual(pathComponents('./a//b\\c/.'), ['a', 'b\\c']);
  assert.equal(hasParentComponent('a\\..\\b'), false);
  assert.equal(hasParentComponent('a/../b'), true);
  assert.equal(hasParentComponent('a/..b'), false);
});

test('hasInvalidText flags NUL and lone surrogates', () => {
  assert.equal(hasInvalidText('a\u0000b'), true);
  assert.equal(hasInvalidText('\uD800x'), true);
  assert.equal(hasInvalidText('x\uDC00'), true);
  assert.equal(hasInvalidText('café/😀'), false);
});
