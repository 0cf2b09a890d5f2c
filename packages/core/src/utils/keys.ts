/**
 * Natural key normalisation: trimmed, with wrapping quote pairs removed.
 * Values that cannot carry a key normalise to ''.
 */
export function normalizeKey(value: unknown): string {
  if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
    return '';
  }

  let key = String(value).trim();
  while (key.length >= 2 && (key.startsWith('"') || key.startsWith("'")) && key.endsWith(key.charAt(0))) {
    key = key.slice(1, -1).trim();
  }
  return key;
}
