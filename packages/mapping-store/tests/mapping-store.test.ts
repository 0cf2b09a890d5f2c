import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SyncError } from '@catalog-sync/core';
import {
  InMemoryMappingStore,
  createCsvMappingStore,
  createJsonMappingStore,
} from '../src/index.js';

let tmpDir = '';

function makeTmpDir(): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'mapping-store-'));
  return tmpDir;
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('InMemoryMappingStore', () => {
  it('puts, overwrites and removes entries by key', () => {
    const store = new InMemoryMappingStore();
    store.put({ key: 'A', assetType: 'Collection', uuid: 'u-1', parentPath: '' });
    store.put({ key: 'A', assetType: 'Collection', uuid: 'u-2', parentPath: 'Top' });

    expect(store.size).toBe(1);
    expect(store.get('A')).toEqual({ key: 'A', assetType: 'Collection', uuid: 'u-2', parentPath: 'Top' });
    expect(store.remove('A')).toBe(true);
    expect(store.remove('A')).toBe(false);
    expect(store.get('A')).toBeUndefined();
  });

  it('hands out copies so callers cannot mutate the table', () => {
    const store = new InMemoryMappingStore([{ key: 'A', assetType: 'Collection', uuid: 'u-1', parentPath: '' }]);
    const entry = store.get('A');
    if (entry) entry.uuid = 'changed';

    expect(store.get('A')?.uuid).toBe('u-1');
  });

  it('lists entries ordered by key', () => {
    const store = new InMemoryMappingStore([
      { key: 'b', assetType: 'T', uuid: '2', parentPath: '' },
      { key: 'B', assetType: 'T', uuid: '1', parentPath: '' },
      { key: 'a', assetType: 'T', uuid: '3', parentPath: '' },
    ]);

    expect(store.all().map((e) => e.key)).toEqual(['B', 'a', 'b']);
  });
});

describe('CsvMappingStore', () => {
  it('starts empty when the file does not exist yet', async () => {
    const store = createCsvMappingStore({ filePath: join(makeTmpDir(), 'missing.csv') });
    await store.load();

    expect(store.all()).toEqual([]);
  });

  it('rewrites the whole table with the key as first column', async () => {
    const filePath = join(makeTmpDir(), 'nested', 'mapping.csv');
    const store = createCsvMappingStore({ filePath });
    store.put({ key: 'B', assetType: 'Collection', uuid: 'u-2', parentPath: 'Top/"a/b"' });
    store.put({ key: 'A', assetType: 'Collection', uuid: 'u-1', parentPath: '' });
    await store.persist();

    expect(readFileSync(filePath, 'utf-8')).toBe(
      'key,asset_type,uuid,parent_path\nA,Collection,u-1,\nB,Collection,u-2,"Top/""a/b"""\n'
    );
    expect(store.persistCount).toBe(1);
  });

  it('loads what it persisted, keeping keys as strings', async () => {
    const filePath = join(makeTmpDir(), 'mapping.csv');
    const first = createCsvMappingStore({ filePath });
    first.put({ key: '0042', assetType: 'ReferenceObject', uuid: 'u-9', parentPath: 'Laws' });
    await first.persist();

    const second = createCsvMappingStore({ filePath });
    await second.load();

    expect(second.get('0042')).toEqual({
      key: '0042',
      assetType: 'ReferenceObject',
      uuid: 'u-9',
      parentPath: 'Laws',
    });
  });

  it('replaces the in-memory table on load', async () => {
    const filePath = join(makeTmpDir(), 'mapping.csv');
    writeFileSync(filePath, 'key,asset_type,uuid,parent_path\nX,Collection,u-x,\n', 'utf-8');
    const store = createCsvMappingStore({ filePath });
    store.put({ key: 'stale', assetType: 'Collection', uuid: 'u-s', parentPath: '' });

    await store.load();

    expect(store.all().map((e) => e.key)).toEqual(['X']);
  });

  it('rejects files with duplicate keys', async () => {
    const filePath = join(makeTmpDir(), 'mapping.csv');
    writeFileSync(
      filePath,
      'key,asset_type,uuid,parent_path\nX,Collection,u-1,\nX,Collection,u-2,\n',
      'utf-8'
    );
    const store = createCsvMappingStore({ filePath });

    await expect(store.load()).rejects.toMatchObject({ code: 'MAPPING_FILE_INVALID' });
  });

  it('rejects files without the expected columns', async () => {
    const filePath = join(makeTmpDir(), 'mapping.csv');
    writeFileSync(filePath, 'id,uuid\nX,u-1\n', 'utf-8');
    const store = createCsvMappingStore({ filePath });

    await expect(store.load()).rejects.toBeInstanceOf(SyncError);
  });
});

describe('JsonMappingStore', () => {
  it('round-trips entries through the file', async () => {
    const filePath = join(makeTmpDir(), 'mapping.json');
    const store = createJsonMappingStore({ filePath });
    store.put({ key: 'DS-1', assetType: 'UmlClass', uuid: 'u-1', parentPath: '' });
    await store.persist();

    const reloaded = createJsonMappingStore({ filePath });
    await reloaded.load();

    expect(reloaded.all()).toEqual([{ key: 'DS-1', assetType: 'UmlClass', uuid: 'u-1', parentPath: '' }]);
  });

  it('rejects rows with missing fields', async () => {
    const filePath = join(makeTmpDir(), 'mapping.json');
    writeFileSync(filePath, JSON.stringify([{ key: 'DS-1', uuid: 'u-1' }]), 'utf-8');
    const store = createJsonMappingStore({ filePath });

    await expect(store.load()).rejects.toMatchObject({ code: 'MAPPING_FILE_INVALID' });
  });
});
