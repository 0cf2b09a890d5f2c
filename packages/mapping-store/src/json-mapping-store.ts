/**
 * JSON Mapping Store
 * Persists the mapping as a JSON array of entries
 */

import type { MappingEntry } from '@catalog-sync/core';
import { SyncError } from '@catalog-sync/core';
import { BaseFileMappingStore, type FileMappingStoreConfig } from './base-file-mapping-store.js';

export interface JsonMappingStoreConfig extends FileMappingStoreConfig {
  /** Indentation spaces (default: 2) */
  indent?: number;
}

export class JsonMappingStore extends BaseFileMappingStore<JsonMappingStoreConfig> {
  protected parseContent(content: string): unknown[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SyncError({
        code: 'MAPPING_FILE_INVALID',
        message: `Invalid JSON in mapping file ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!Array.isArray(parsed)) {
      throw new SyncError({
        code: 'MAPPING_FILE_INVALID',
        message: `Mapping file ${this.config.filePath} must contain an array of entries`,
      });
    }
    return parsed;
  }

  protected serializeContent(entries: MappingEntry[]): string {
    return `${JSON.stringify(entries, null, this.config.indent ?? 2)}\n`;
  }
}

/**
 * Factory function to create a JSON mapping store
 */
export function createJsonMappingStore(config: JsonMappingStoreConfig): JsonMappingStore {
  return new JsonMappingStore(config);
}
