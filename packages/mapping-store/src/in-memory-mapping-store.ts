/**
 * In-memory identity mapping
 *
 * Holds the key -> asset table for one run. File-backed stores extend it
 * with load/persist; used as is for dry runs and tests.
 */

import type { IMappingStore, MappingEntry } from '@catalog-sync/core';

export class InMemoryMappingStore implements IMappingStore {
  protected readonly entries = new Map<string, MappingEntry>();
  private _persistCount = 0;

  constructor(initial: readonly MappingEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(entry.key, { ...entry });
    }
  }

  /** Number of successful persist() calls */
  get persistCount(): number {
    return this._persistCount;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): MappingEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  put(entry: MappingEntry): void {
    this.entries.set(entry.key, { ...entry });
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Entries ordered by key */
  all(): MappingEntry[] {
    return Array.from(this.entries.values())
      .map((entry) => ({ ...entry }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async load(): Promise<void> {
    // Nothing persisted
  }

  async persist(): Promise<void> {
    this._persistCount++;
  }

  protected markPersisted(): void {
    this._persistCount++;
  }
}
