import test from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadAccountDatabase, parseAccountFile, resolveOwner, type AccountDatabase } from '../src/archive/owner.js';
import { withTempDir } from './helpers.js';

const PASSWD = [
  'root:x:0:0:root:/root:/bin/sh',
  '# local accounts',
  'builder:x:1000:1000::/home/builder:/bin/sh',
  'broken',
  'weird:x:not-a-number:1::/:/bin/false',
  'builder:x:2000:2000::/:/bin/sh',
  ''
].join('\n');

const ACCOUNTS: AccountDatabase = {
  users: new Map([['builder', 1000]]),
  groups: new Map([['staff', 50]])
};

test('parseAccountFile keeps the first numeric record per name', () => {
  assert.deepEqual(
    [...parseAccountFile(PASSWD)],
    [
      ['root', 0],
      ['builder', 1000]
    ]
  );
  assert.deepEqual([...parseAccountFile('wheel:x:10:builder\n')], [['wheel', 10]]);
});

test('known names take precedence over recorded ids', () => {
  assert.deepEqual(
    resolveOwner({ uid: 5, gid: 6, uname: 'builder', gname: 'staff' }, { numericOwner: false, accounts: ACCOUNTS }),
    { uid: 1000, gid: 50 }
  );
});

test('numeric ownership ignores names', () => {
  assert.deepEqual(
    resolveOwner({ uid: 5, gid: 6, uname: 'builder', gname: 'staff' }, { numericOwner: true, accounts: ACCOUNTS }),
    { uid: 5, gid: 6 }
  );
});

test('unknown names fall back to recorded ids', () => {
  assert.deepEqual(
    resolveOwner({ uid: 5, gid: 6, uname: 'nobody-here', gname: 'staff' }, { numericOwner: false, accounts: ACCOUNTS }),
    { uid: 5, gid: 50 }
  );
});

test('headers without ids restore nothing', () => {
  assert.equal(resolveOwner({ gid: 6 }, { numericOwner: true }), undefined);
  assert.equal(resolveOwner({}, { numericOwner: false, accounts: ACCOUNTS }), undefined);
});

test('missing account files read as empty tables', async () => {
  await withTempDir(async (dir) => {
    const group = join(dir, 'group');
    await writeFile(group, 'staff:x:50:\n');
    const accounts = await loadAccountDatabase({ passwd: join(dir, 'passwd'), group });
    assert.equal(accounts.users.size, 0);
    assert.equal(accounts.groups.get('staff'), 50);
  });
});
