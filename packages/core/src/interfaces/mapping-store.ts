/**
 * Identity Mapping Store Interface
 */

import type { MappingEntry } from '../types/index.js';

export interface IMappingStore {
  get(key: string): MappingEntry | undefined;
  /** Insert or overwrite the entry for entry.key */
  put(entry: MappingEntry): void;
  remove(key: string): boolean;
  all(): MappingEntry[];
  /** Replace the in-memory table with the persisted one */
  load(): Promise<void>;
  /** Rewrite the persisted table from the in-memory one */
  persist(): Promise<void>;
}
