/**
 * Law text helpers: systematic numbers and paragraph extraction
 */

import { normalizeKey } from '@catalog-sync/core';

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  sect: '§',
  auml: 'ä',
  ouml: 'ö',
  uuml: 'ü',
  Auml: 'Ä',
  Ouml: 'Ö',
  Uuml: 'Ü',
  szlig: 'ß',
};

export interface Paragraph {
  code: string;
  shortText: string;
}

/**
 * Trim and remove wrapping quote pairs ('"12.3"' and "'12.3'" become 12.3)
 */
export function normalizeSystematicNumber(value: unknown): string {
  return normalizeKey(value);
}

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity] ?? match;
  });
}

/** Drop tags, decode entities, collapse whitespace */
export function stripHtml(raw: string): string {
  const text = decodeHtmlEntities(raw.replace(/<[^>]+>/g, ''));
  return text.split(/\s+/).filter(Boolean).join(' ');
}

const ARTICLE_PATTERN = new RegExp(
  [
    `<div class=['"]article['"]>\\s*`,
    `<div class=['"]article_number['"]>.*?<span class=['"]article_symbol['"]>.*?</span>\\s*`,
    `<span class=['"]number['"]>(?<code>.*?)</span>.*?</div>\\s*`,
    `<div class=['"]article_title['"]>.*?<span class=['"]title_text['"]>(?<title>.*?)</span>.*?</div>\\s*`,
    `</div>`,
  ].join(''),
  'gis'
);

/** Titles that stand for "no title" in the law text markup */
const PLACEHOLDER_TITLES = new Set(['§', '\uFFFD']);

/**
 * Extract paragraphs (code + short title) from a law's HTML text.
 * The first occurrence of a code wins; paragraphs without a code are dropped.
 */
export function parseParagraphs(html: string | null | undefined): Paragraph[] {
  if (!html) {
    return [];
  }

  const paragraphs: Paragraph[] = [];
  const seen = new Set<string>();

  for (const match of html.matchAll(ARTICLE_PATTERN)) {
    const code = stripHtml(match.groups?.code ?? '');
    if (!code || seen.has(code)) continue;

    let shortText = stripHtml(match.groups?.title ?? '');
    if (PLACEHOLDER_TITLES.has(shortText)) {
      shortText = '';
    }

    paragraphs.push({ code, shortText });
    seen.add(code);
  }

  return paragraphs;
}
