import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  COLLECTION_DOCUMENTS,
  SETTINGS_DOCUMENT,
  SettingsDocumentSchema,
  findFileInDirectory,
  readContainerMetadata,
  readDocument,
  resolveDocumentDirectory,
  writeDefaultDocuments,
  writeDocument
} from '../src/container/documents.js';
import { ContainerError } from '../src/errors.js';
import { makeTempDir, removeDir, writeTree } from './temp-dir.js';

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await makeTempDir();
  try {
    await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

test('default documents cover settings, counters, collections and attachments', async () => {
  await withDir(async (dir) => {
    await writeDefaultDocuments(dir, 'Acme');
    const names = (await readdir(dir)).sort();
    assert.equal(names.length, COLLECTION_DOCUMENTS.length + 3);
    assert.ok(names.includes('idCounters.json'));
    assert.ok(names.includes('receipts'));

    const settings = SettingsDocumentSchema.parse(JSON.parse(await readFile(path.join(dir, SETTINGS_DOCUMENT), 'utf8')));
    assert.equal(settings.company?.name, 'Acme');
    assert.equal(settings.security?.biometricEnabled, false);

    assert.equal(await readFile(path.join(dir, 'customers.json'), 'utf8'), '[]');
    const counters: unknown = JSON.parse(await readFile(path.join(dir, 'idCounters.json'), 'utf8'));
    assert.equal(z.record(z.literal(0)).parse(counters)['customer'], 0);
  });
});

test('findFileInDirectory searches three levels below the root', async () => {
  await withDir(async (dir) => {
    await writeTree(dir, { 'a/b/c/target.json': '1', 'a/b/c/d/deep.json': '2' });
    assert.equal(await findFileInDirectory(dir, 'target.json'), path.join(dir, 'a', 'b', 'c', 'target.json'));
    assert.equal(await findFileInDirectory(dir, 'deep.json'), undefined);
    assert.equal(await findFileInDirectory(path.join(dir, 'a'), 'deep.json'), path.join(dir, 'a', 'b', 'c', 'd', 'deep.json'));
    assert.equal(await findFileInDirectory(dir, 'target.json', 2), undefined);
  });
});

test('findFileInDirectory prefers the directory itself, then name order', async () => {
  await withDir(async (dir) => {
    await writeTree(dir, { 'b/x.json': 'b', 'a/nested/x.json': 'a', 'y.json': 'root', 'a/y.json': 'nested' });
    assert.equal(await findFileInDirectory(dir, 'x.json'), path.join(dir, 'a', 'nested', 'x.json'));
    assert.equal(await findFileInDirectory(dir, 'y.json'), path.join(dir, 'y.json'));
  });
});

test('metadata comes from settings and accountants', async () => {
  await withDir(async (dir) => {
    await writeTree(dir, {
      'Acme Ltd/appSettings.json': JSON.stringify({ company: { name: 'Acme' }, security: { biometricEnabled: true } }),
      'Acme Ltd/accountants.json': JSON.stringify([{ id: 'ACC-1', name: 'Ann' }, { name: 'Bob' }])
    });
    assert.deepEqual(await readContainerMetadata(dir), {
      companyName: 'Acme',
      accountants: ['Ann', 'Bob'],
      biometricEnabled: true
    });
    assert.equal(await resolveDocumentDirectory(dir), path.join(dir, 'Acme Ltd'));
  });
});

test('company name falls back to the first subdirectory, then the directory name', async () => {
  await withDir(async (dir) => {
    await mkdir(path.join(dir, 'zeta'));
    await mkdir(path.join(dir, 'Alpha'));
    assert.deepEqual(await readContainerMetadata(dir), { companyName: 'Alpha', accountants: [], biometricEnabled: false });
  });
  await withDir(async (dir) => {
    await writeFile(path.join(dir, SETTINGS_DOCUMENT), '{"company": {');
    assert.deepEqual(await readContainerMetadata(dir), {
      companyName: path.basename(dir),
      accountants: [],
      biometricEnabled: false
    });
    assert.equal(await resolveDocumentDirectory(dir), dir);
  });
});

test('readDocument validates against the given schema', async () => {
  await withDir(async (dir) => {
    await writeTree(dir, { 'Acme/numbers.json': '[1, 2, 3]', 'Acme/words.json': '["x"]' });
    const Numbers = z.array(z.number());
    assert.deepEqual(await readDocument(dir, 'numbers.json', Numbers), [1, 2, 3]);
    assert.equal(await readDocument(dir, 'missing.json', Numbers), undefined);
    await assert.rejects(readDocument(dir, 'words.json', Numbers), (err: unknown) => {
      assert.ok(err instanceof ContainerError);
      assert.equal(err.code, 'CONTAINER_BAD_FORMAT');
      assert.deepEqual(err.context, { document: 'words.json' });
      return true;
    });
  });
});

test('writeDocument replaces in place or lands beside the settings', async () => {
  await withDir(async (dir) => {
    await writeTree(dir, { 'Acme/appSettings.json': '{}', 'Acme/deep/customers.json': '[]' });
    const created = await writeDocument(dir, 'notes.json', { a: 1 });
    assert.equal(created, path.join(dir, 'Acme', 'notes.json'));
    assert.equal(await readFile(created, 'utf8'), '{\n  "a": 1\n}');

    const replaced = await writeDocument(dir, 'customers.json', [{ name: 'Cy' }]);
    assert.equal(replaced, path.join(dir, 'Acme', 'deep', 'customers.json'));
    assert.deepEqual(JSON.parse(await readFile(replaced, 'utf8')), [{ name: 'Cy' }]);
  });
});
