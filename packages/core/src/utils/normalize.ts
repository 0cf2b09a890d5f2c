/**
 * Value normalisation for field comparison
 *
 * Two values are equal when their normalised forms are: strings are trimmed,
 * empty strings, null and undefined collapse to null, object keys are sorted.
 */

import type { FieldMap, FieldValue } from '../types/index.js';

export function normalizeValue(value: FieldValue | undefined): FieldValue {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }

  const out: { [key: string]: FieldValue } = {};
  for (const key of Object.keys(value).sort()) {
    const normalized = normalizeValue(value[key]);
    if (normalized !== null) {
      out[key] = normalized;
    }
  }
  return Object.keys(out).length === 0 ? null : out;
}

export function valuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  return JSON.stringify(normalizeValue(a)) === JSON.stringify(normalizeValue(b));
}

/**
 * Normalise every field of a map, dropping fields that normalise to null
 */
export function normalizeFields(fields: FieldMap): FieldMap {
  const out: FieldMap = {};
  for (const key of Object.keys(fields).sort()) {
    const normalized = normalizeValue(fields[key]);
    if (normalized !== null) {
      out[key] = normalized;
    }
  }
  return out;
}
