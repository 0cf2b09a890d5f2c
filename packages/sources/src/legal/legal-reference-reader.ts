/**
 * Legal Reference Reader
 *
 * Reads the law registry dataset; one record per law keyed by its
 * normalised systematic number, with one child per paragraph.
 */

import type { FieldMap, SourceRecord } from '@catalog-sync/core';
import { BaseSourceReader, type SourceReaderConfig } from '../base-source-reader.js';
import type { OdsRecordSource } from '../ods/client.js';
import { normalizeSystematicNumber, parseParagraphs } from './paragraphs.js';

export interface LegalReferenceReaderConfig extends SourceReaderConfig {
  client: OdsRecordSource;
  datasetId: string;
  /** Portal filter selecting the laws in force */
  where?: string;
}

export const DEFAULT_LAW_FILTER = "is_active=true AND info_badge='current'";

function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export class LegalReferenceReader extends BaseSourceReader<LegalReferenceReaderConfig> {
  readonly family = 'legal-references';

  protected async fetchRecords(): Promise<SourceRecord[]> {
    const rows = await this.config.client.fetchAllRecords(this.config.datasetId, {
      where: this.config.where ?? DEFAULT_LAW_FILTER,
      orderBy: 'systematic_number',
    });

    const records: SourceRecord[] = [];
    for (const row of rows) {
      const record = this.toRecord(row);
      if (record) records.push(record);
    }
    return records;
  }

  toRecord(row: Record<string, unknown>): SourceRecord | null {
    const systematicNumber = normalizeSystematicNumber(row.systematic_number);
    const title = text(row.title_de);

    if (!systematicNumber) {
      this.skip(title || undefined, 'INVALID_RECORD', `Law '${title || '(untitled)'}' has no systematic number`);
      return null;
    }
    if (!title) {
      this.skip(systematicNumber, 'INVALID_RECORD', `Law ${systematicNumber} has no title`);
      return null;
    }

    const fields: FieldMap = { systematic_number: systematicNumber };
    const url = text(row.original_url_de);
    if (url) {
      fields.description = url;
    }

    const html = typeof row.gesetzestext_html === 'string' ? row.gesetzestext_html : '';

    return {
      key: systematicNumber,
      label: `SG ${systematicNumber} - ${title}`,
      fields,
      children: parseParagraphs(html).map((paragraph) => ({
        name: paragraph.code,
        fields: { shortText: paragraph.shortText },
      })),
    };
  }
}

/**
 * Factory function to create a legal-reference reader
 */
export function createLegalReferenceReader(config: LegalReferenceReaderConfig): LegalReferenceReader {
  return new LegalReferenceReader(config);
}
