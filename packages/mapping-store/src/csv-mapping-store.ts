/**
 * CSV Mapping Store
 *
 * One row per mapping entry, natural key in the first column:
 *
 *   key,asset_type,uuid,parent_path
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { MappingEntry } from '@catalog-sync/core';
import { SyncError } from '@catalog-sync/core';
import { BaseFileMappingStore, type FileMappingStoreConfig } from './base-file-mapping-store.js';

export interface CsvMappingStoreConfig extends FileMappingStoreConfig {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
}

export const CSV_MAPPING_COLUMNS = ['key', 'asset_type', 'uuid', 'parent_path'] as const;

const csvRowSchema = z.array(
  z.object({
    key: z.string(),
    asset_type: z.string(),
    uuid: z.string(),
    parent_path: z.string().optional(),
  })
);

export class CsvMappingStore extends BaseFileMappingStore<CsvMappingStoreConfig> {
  protected parseContent(content: string): unknown[] {
    let rows: unknown;
    try {
      rows = parse(content, {
        columns: true,
        delimiter: this.config.delimiter ?? ',',
        skip_empty_lines: true,
        // Keys such as '0042' must stay strings
        cast: false,
      });
    } catch (error) {
      throw new SyncError({
        code: 'MAPPING_FILE_INVALID',
        message: `Malformed CSV in mapping file ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const result = csvRowSchema.safeParse(rows);
    if (!result.success) {
      throw new SyncError({
        code: 'MAPPING_FILE_INVALID',
        message: `Mapping file ${this.config.filePath} must have the columns ${CSV_MAPPING_COLUMNS.join(', ')}`,
        suggestion: 'Restore the header row or delete the file to rebuild the mapping.',
      });
    }

    return result.data.map((row) => ({
      key: row.key,
      assetType: row.asset_type,
      uuid: row.uuid,
      parentPath: row.parent_path ?? '',
    }));
  }

  protected serializeContent(entries: MappingEntry[]): string {
    return stringify(
      entries.map((entry) => [entry.key, entry.assetType, entry.uuid, entry.parentPath]),
      {
        header: true,
        columns: [...CSV_MAPPING_COLUMNS],
        delimiter: this.config.delimiter ?? ',',
      }
    );
  }
}

/**
 * Factory function to create a CSV mapping store
 */
export function createCsvMappingStore(config: CsvMappingStoreConfig): CsvMappingStore {
  return new CsvMappingStore(config);
}
