/**
 * Source Reader Interface
 */

import type { RunError, SourceRecord } from '../types/index.js';

export interface ISourceReader {
  /** Entity family the records belong to */
  readonly family: string;

  /**
   * Fetch the complete record set of one entity family.
   * Records are not assumed to be unique by key.
   */
  read(): Promise<readonly SourceRecord[]>;

  /** Source rows the last read() skipped, with the reason */
  readonly issues?: readonly RunError[];
}
