import { describe, it, expect } from 'vitest';
import type { TargetAsset } from '@catalog-sync/core';
import { InMemoryCatalog } from '@catalog-sync/catalog-client';
import { DeletionPolicy, LiveSubtree } from '../src/index.js';

function asset(uuid: string, label: string, parentId: string | null, type = 'Collection'): TargetAsset {
  return { uuid, type, label, parentId, status: 'PUBLISHED', fields: {} };
}

function tree(): LiveSubtree {
  return new LiveSubtree(asset('root', 'Scope', null), [
    asset('a', 'Finance', 'root'),
    asset('b', 'Tax/Customs', 'root'),
    asset('a1', 'Payroll', 'a'),
    asset('a1x', 'Archive', 'a1'),
  ]);
}

describe('LiveSubtree', () => {
  it('should list assets breadth-first without the root', () => {
    expect(tree().all().map((a) => a.uuid)).toEqual(['a', 'b', 'a1', 'a1x']);
  });

  it('should compute depth and escaped paths', () => {
    const subtree = tree();

    expect(subtree.depthOf('a1x')).toBe(3);
    expect(subtree.depthOf('unknown')).toBe(0);
    expect(subtree.pathOf('root')).toBe('');
    expect(subtree.pathOf('a1')).toBe('Finance/Payroll');
    expect(subtree.pathOf('b')).toBe('"Tax/Customs"');
  });

  it('should resolve paths by label', () => {
    const subtree = tree();

    expect(subtree.findByPath('Finance/Payroll')?.uuid).toBe('a1');
    expect(subtree.findByPath('"Tax/Customs"')?.uuid).toBe('b');
    expect(subtree.findByPath('Finance/Missing')).toBeUndefined();
  });

  it('should relink an asset whose parent changed', () => {
    const subtree = tree();

    subtree.add(asset('a1', 'Payroll', 'b'));

    expect(subtree.childrenOf('a').map((a) => a.uuid)).toEqual([]);
    expect(subtree.childrenOf('b').map((a) => a.uuid)).toEqual(['a1']);
    expect(subtree.pathOf('a1x')).toBe('"Tax/Customs"/Payroll/Archive');
  });

  it('should never remove the root', () => {
    const subtree = tree();

    subtree.remove('a1x');
    subtree.remove('root');

    expect(subtree.has('a1x')).toBe(false);
    expect(subtree.has('root')).toBe(true);
    expect(subtree.size).toBe(4);
  });

  it('should fetch the tree below a root and not expand leaf types', async () => {
    const catalog = new InMemoryCatalog();
    catalog.seed({ uuid: 'root', type: 'Collection', label: 'Scope' });
    catalog.seed({ uuid: 'cls', type: 'UmlClass', label: 'Trees', parentId: 'root' });
    catalog.seed({ uuid: 'attr', type: 'UmlAttribute', label: 'height', parentId: 'cls' });
    catalog.seed({ uuid: 'other', type: 'Collection', label: 'Elsewhere' });

    const subtree = await LiveSubtree.fetch(catalog, 'root', { leafTypes: ['UmlAttribute'] });

    expect(subtree.all().map((a) => a.uuid)).toEqual(['cls', 'attr']);
    expect(catalog.calls.filter((c) => c.op === 'listChildren').map((c) => c.ref)).toEqual(['root', 'cls']);
  });

  it('should reject a missing root', async () => {
    const catalog = new InMemoryCatalog();

    await expect(LiveSubtree.fetch(catalog, 'nope')).rejects.toThrow('Sync scope root nope not found in catalog');
  });
});

describe('DeletionPolicy', () => {
  const policy = new DeletionPolicy();

  it('should hard-delete an asset without children', () => {
    const subtree = tree();
    expect(policy.decide(asset('b', 'Tax/Customs', 'root'), subtree)).toBe('hard-delete');
  });

  it('should flag an asset with children', () => {
    const subtree = tree();
    expect(policy.decide(asset('a1', 'Payroll', 'a'), subtree)).toBe('mark-for-review');
  });

  it('should discount children that are deleted in the same run', () => {
    const subtree = tree();
    expect(policy.decide(asset('a1', 'Payroll', 'a'), subtree, new Set(['a1x']))).toBe('hard-delete');
  });

  it('should flag assets outside the fetched subtree', () => {
    const subtree = tree();
    expect(policy.decide(asset('far', 'Far away', 'x'), subtree)).toBe('mark-for-review');
  });
});
