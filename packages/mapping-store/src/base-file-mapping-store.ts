/**
 * Base class for file-backed mapping stores
 *
 * Load reads the whole table, persist rewrites it; there is no append mode
 * and no protocol for concurrent writers.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { MappingEntry } from '@catalog-sync/core';
import { Logger, SyncError, mappingEntrySchema, silentLogger } from '@catalog-sync/core';
import { InMemoryMappingStore } from './in-memory-mapping-store.js';

export interface FileMappingStoreConfig {
  /** Path to the mapping file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export abstract class BaseFileMappingStore<
  TConfig extends FileMappingStoreConfig = FileMappingStoreConfig,
> extends InMemoryMappingStore {
  readonly config: TConfig;
  protected readonly logger: Logger;

  constructor(config: TConfig) {
    super();
    this.config = config;
    this.logger = config.logger ?? silentLogger;
  }

  override async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info('No mapping file yet, starting with an empty mapping', {
          filePath: this.config.filePath,
        });
        this.entries.clear();
        return;
      }
      throw new SyncError({
        code: 'MAPPING_FILE_INVALID',
        message: `Failed to read mapping file: ${this.config.filePath}`,
        suggestion: 'Check file permissions.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const text = content.replace(/^\uFEFF/, '');
    const rows = text.trim() === '' ? [] : this.parseContent(text);
    const loaded = new Map<string, MappingEntry>();

    rows.forEach((row, index) => {
      const result = mappingEntrySchema.safeParse(row);
      if (!result.success) {
        throw new SyncError({
          code: 'MAPPING_FILE_INVALID',
          message: `Invalid mapping row ${index + 1} in ${this.config.filePath}: ${result.error.issues
            .map((issue) => `${issue.path.join('.') || '(row)'} ${issue.message}`)
            .join(', ')}`,
          suggestion: 'Repair or remove the row; the run did not change anything.',
        });
      }
      if (loaded.has(result.data.key)) {
        throw new SyncError({
          code: 'MAPPING_FILE_INVALID',
          message: `Duplicate key '${result.data.key}' in mapping file ${this.config.filePath}`,
          suggestion: 'Remove the duplicate row; keys must be unique.',
        });
      }
      loaded.set(result.data.key, result.data);
    });

    this.entries.clear();
    for (const [key, entry] of loaded) {
      this.entries.set(key, entry);
    }
    this.logger.debug('Mapping loaded', { filePath: this.config.filePath, entries: loaded.size });
  }

  override async persist(): Promise<void> {
    try {
      await mkdir(dirname(this.config.filePath), { recursive: true });
      await writeFile(
        this.config.filePath,
        this.serializeContent(this.all()),
        this.config.encoding ?? 'utf-8'
      );
    } catch (error) {
      throw new SyncError({
        code: 'MAPPING_FILE_INVALID',
        message: `Failed to write mapping file: ${this.config.filePath}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
    this.markPersisted();
    this.logger.debug('Mapping persisted', { filePath: this.config.filePath, entries: this.size });
  }

  /**
   * Parse file content into raw rows (implemented by subclasses)
   */
  protected abstract parseContent(content: string): unknown[];

  /**
   * Serialize entries back to file content (implemented by subclasses)
   */
  protected abstract serializeContent(entries: MappingEntry[]): string;
}
