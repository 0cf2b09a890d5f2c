import { describe, it, expect } from 'vitest';
import type { SourceRecord } from '@catalog-sync/core';
import { InMemoryCatalog } from '@catalog-sync/catalog-client';
import { InMemoryMappingStore } from '@catalog-sync/mapping-store';
import { LiveSubtree, Reconciler, RunStateRecorder, orgUnitProfile } from '../src/index.js';

function setup() {
  const catalog = new InMemoryCatalog();
  catalog.seed({ uuid: 'root', type: 'Collection', label: 'Organisation' });
  catalog.seed({ uuid: 'old', type: 'Collection', label: 'Archive', parentId: 'root', fields: { directory_id: 'X' } });
  const mapping = new InMemoryMappingStore([{ key: 'X', assetType: 'Collection', uuid: 'old', parentPath: '' }]);
  const reconciler = new Reconciler({ profile: orgUnitProfile, accessor: catalog, rootId: 'root' });
  return { catalog, mapping, reconciler };
}

const records: SourceRecord[] = [
  { key: '2', label: 'Health', fields: {}, parentPath: 'Finance' },
  { key: ' "1" ', label: 'Finance', fields: {} },
];

describe('Reconciler', () => {
  it('should plan and apply in one pass', async () => {
    const { catalog, mapping, reconciler } = setup();
    const subtree = await LiveSubtree.fetch(catalog, 'root');
    const state = new RunStateRecorder('run-1', 'org-units');

    const plan = await reconciler.reconcile(records, mapping, subtree, state);

    expect(plan.records.map((op) => [op.key, op.action])).toEqual([
      ['1', 'create'],
      ['2', 'create'],
    ]);
    expect(plan.deletes).toEqual([
      {
        action: 'delete',
        key: 'X',
        uuid: 'old',
        label: 'Archive',
        assetType: 'Collection',
        depth: 1,
        disposition: 'hard-delete',
        mapped: true,
      },
    ]);
    expect(state.toReport().counts).toMatchObject({ created: 2, deleted: 1, directlyDeleted: 1, errors: 0 });
    expect(catalog.peek('asset-2')?.parentId).toBe('asset-1');
    expect(catalog.peek('old')).toBeUndefined();
    expect(mapping.all()).toEqual([
      { key: '1', assetType: 'Collection', uuid: 'asset-1', parentPath: '' },
      { key: '2', assetType: 'Collection', uuid: 'asset-2', parentPath: 'Finance' },
    ]);
    expect(mapping.persistCount).toBe(0);
  });

  it('should plan without writing anything', async () => {
    const { catalog, mapping, reconciler } = setup();
    const subtree = await LiveSubtree.fetch(catalog, 'root');

    const plan = await reconciler.plan(records, mapping, subtree);

    expect(plan.errors).toEqual([]);
    expect(plan.records).toHaveLength(2);
    expect(catalog.mutationCount).toBe(0);
    expect(mapping.get('X')?.uuid).toBe('old');
  });
});
