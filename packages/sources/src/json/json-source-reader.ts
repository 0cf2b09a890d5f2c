/**
 * JSON Source Reader
 *
 * Reads prepared records from a JSON file, either a bare array or
 * { "records": [...] }. Rows failing validation are skipped and reported.
 */

import { readFile } from 'node:fs/promises';
import { SyncError, sourceRecordSchema, type SourceRecord } from '@catalog-sync/core';
import { BaseSourceReader, type SourceReaderConfig } from '../base-source-reader.js';

export interface JsonSourceReaderConfig extends SourceReaderConfig {
  family: string;
  filePath: string;
}

export class JsonSourceReader extends BaseSourceReader<JsonSourceReaderConfig> {
  readonly family: string;

  constructor(config: JsonSourceReaderConfig) {
    super(config);
    this.family = config.family;
  }

  protected async fetchRecords(): Promise<SourceRecord[]> {
    let parsed: unknown;
    try {
      const content = await readFile(this.config.filePath, 'utf-8');
      parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new SyncError({
        code: 'CONFIGURATION_ERROR',
        message: `Cannot read source file ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        suggestion: 'Check that the file exists and contains valid JSON.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows = Array.isArray(parsed)
      ? parsed
      : typeof parsed === 'object' && parsed !== null && 'records' in parsed && Array.isArray(parsed.records)
        ? parsed.records
        : null;

    if (rows === null) {
      throw new SyncError({
        code: 'CONFIGURATION_ERROR',
        message: `Source file ${this.config.filePath} holds neither an array nor { "records": [...] }`,
      });
    }

    const records: SourceRecord[] = [];
    rows.forEach((row: unknown, index: number) => {
      const result = sourceRecordSchema.safeParse(row);
      if (!result.success) {
        const issue = result.error.issues[0];
        this.skip(
          undefined,
          'INVALID_RECORD',
          `Record #${index}: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid'}`
        );
        return;
      }
      records.push(result.data);
    });

    return records;
  }
}

/**
 * Factory function to create a JSON source reader
 */
export function createJsonSourceReader(config: JsonSourceReaderConfig): JsonSourceReader {
  return new JsonSourceReader(config);
}
