/**
 * Base Source Reader
 *
 * Shared read() for all readers. Subclasses implement fetchRecords() and
 * call skip() for rows they cannot turn into a record; read() resets the
 * issue list and freezes the result.
 */

import type { ErrorCode, ISourceReader, Logger, RunError, SourceRecord } from '@catalog-sync/core';
import { silentLogger } from '@catalog-sync/core';

export interface SourceReaderConfig {
  logger?: Logger;
}

export abstract class BaseSourceReader<TConfig extends SourceReaderConfig = SourceReaderConfig>
  implements ISourceReader
{
  abstract readonly family: string;

  protected readonly config: TConfig;
  protected readonly logger: Logger;
  private _issues: RunError[] = [];

  constructor(config: TConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
  }

  get issues(): readonly RunError[] {
    return this._issues;
  }

  async read(): Promise<readonly SourceRecord[]> {
    this._issues = [];
    const records = await this.fetchRecords();

    this.logger.info('Read source records', {
      family: this.family,
      records: records.length,
      skipped: this._issues.length,
    });

    return Object.freeze(records.map((record) => Object.freeze(record)));
  }

  protected abstract fetchRecords(): Promise<SourceRecord[]>;

  /** Record a source row that was left out of the result */
  protected skip(key: string | undefined, code: ErrorCode, message: string): void {
    this._issues.push(key === undefined ? { code, message } : { key, code, message });
    this.logger.warn(message, { family: this.family, key, code });
  }
}
