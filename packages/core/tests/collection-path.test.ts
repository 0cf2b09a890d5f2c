import { describe, expect, it } from 'vitest';
import {
  appendToCollectionPath,
  canonicalCollectionPath,
  collectionPathDepth,
  escapeLabel,
  joinCollectionPath,
  splitCollectionPath,
} from '../src/index.js';

describe('collection paths', () => {
  it('leaves plain labels untouched', () => {
    expect(escapeLabel('Finance Department')).toBe('Finance Department');
  });

  it('quotes labels with separators and doubles inner quotes', () => {
    expect(escapeLabel('Data/Analytics')).toBe('"Data/Analytics"');
    expect(escapeLabel('Dept. of "Roads"')).toBe('"Dept. of ""Roads"""');
  });

  it('splits quoted paths back into labels', () => {
    const path = joinCollectionPath(['Government', 'Data/Analytics', 'Dept. of "Roads"']);
    expect(path).toBe('Government/"Data/Analytics"/"Dept. of ""Roads"""');
    expect(splitCollectionPath(path)).toEqual(['Government', 'Data/Analytics', 'Dept. of "Roads"']);
  });

  it('returns no labels for the root path', () => {
    expect(splitCollectionPath('')).toEqual([]);
    expect(collectionPathDepth('')).toBe(0);
    expect(collectionPathDepth(undefined)).toBe(0);
  });

  it('appends labels below a parent', () => {
    expect(appendToCollectionPath('', 'Top')).toBe('Top');
    expect(appendToCollectionPath('Top', 'a/b')).toBe('Top/"a/b"');
    expect(collectionPathDepth('Top/"a/b"')).toBe(2);
  });

  it('canonicalises redundant quoting', () => {
    expect(canonicalCollectionPath('"Top"/Sub')).toBe('Top/Sub');
  });
});
