import { describe, expect, it } from 'vitest';
import { normalizeSystematicNumber, parseParagraphs, stripHtml } from '../src/legal/paragraphs.js';

function article(code: string, title: string): string {
  return (
    '<div class="article">' +
    '<div class="article_number"><span class="article_symbol">§</span> ' +
    `<span class="number">${code}</span></div>` +
    `<div class="article_title"><span class="title_text">${title}</span></div>` +
    '</div>'
  );
}

describe('normalizeSystematicNumber', () => {
  it('trims and removes wrapping quotes', () => {
    expect(normalizeSystematicNumber('  "\'153.100\'" ')).toBe('153.100');
    expect(normalizeSystematicNumber(' 410.100 ')).toBe('410.100');
  });

  it('keeps unbalanced quotes', () => {
    expect(normalizeSystematicNumber('"153.100')).toBe('"153.100');
  });

  it('stringifies numbers and maps missing values to empty', () => {
    expect(normalizeSystematicNumber(42)).toBe('42');
    expect(normalizeSystematicNumber(null)).toBe('');
    expect(normalizeSystematicNumber(undefined)).toBe('');
  });
});

describe('stripHtml', () => {
  it('drops tags, decodes entities and collapses whitespace', () => {
    expect(stripHtml('<b>Zweck</b> &amp;\n  Geltung&nbsp;&#167;&#x31;')).toBe('Zweck & Geltung §1');
  });
});

describe('parseParagraphs', () => {
  it('extracts code and title per article', () => {
    const html = article('1', 'Zweck &amp; Geltung') + '\n' + article('<b>2</b>', 'Begriffe');

    expect(parseParagraphs(html)).toEqual([
      { code: '1', shortText: 'Zweck & Geltung' },
      { code: '2', shortText: 'Begriffe' },
    ]);
  });

  it('blanks placeholder titles', () => {
    expect(parseParagraphs(article('2a', '§') + article('2b', '\uFFFD'))).toEqual([
      { code: '2a', shortText: '' },
      { code: '2b', shortText: '' },
    ]);
  });

  it('keeps the first occurrence of a code and drops empty codes', () => {
    const html = article('1', 'First') + article('1', 'Second') + article(' ', 'No code');

    expect(parseParagraphs(html)).toEqual([{ code: '1', shortText: 'First' }]);
  });

  it('returns nothing for empty input', () => {
    expect(parseParagraphs('')).toEqual([]);
    expect(parseParagraphs(null)).toEqual([]);
    expect(parseParagraphs('<p>No articles here</p>')).toEqual([]);
  });
});
