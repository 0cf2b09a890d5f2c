/**
 * Duplicate Guard
 *
 * Scans a whole set before anything is written and reports every key
 * that occurs more than once, with all carriers of that key.
 */

import { DuplicateKeyError, type DuplicateKeyCollision } from '@catalog-sync/core';

export interface CheckUniqueOptions<T> {
  side: 'source' | 'catalog';
  /** Identifier of an item in the error message (default: "#index") */
  describe?: (item: T, index: number) => string;
}

/**
 * Collect every duplicated key; items without a key are not managed and are skipped
 */
export function findDuplicateKeys<T>(
  items: readonly T[],
  keyOf: (item: T) => string | undefined,
  describe: (item: T, index: number) => string = (_item, index) => `#${index}`
): DuplicateKeyCollision[] {
  const carriers = new Map<string, string[]>();

  items.forEach((item, index) => {
    const key = keyOf(item);
    if (!key) return;
    const list = carriers.get(key);
    if (list) {
      list.push(describe(item, index));
    } else {
      carriers.set(key, [describe(item, index)]);
    }
  });

  const collisions: DuplicateKeyCollision[] = [];
  for (const [key, identifiers] of carriers) {
    if (identifiers.length > 1) {
      collisions.push({ key, identifiers });
    }
  }
  return collisions;
}

/**
 * @throws DuplicateKeyError listing all colliding keys
 */
export function checkUnique<T>(
  items: readonly T[],
  keyOf: (item: T) => string | undefined,
  options: CheckUniqueOptions<T>
): void {
  const collisions = findDuplicateKeys(items, keyOf, options.describe);
  if (collisions.length > 0) {
    throw new DuplicateKeyError(options.side, collisions);
  }
}
