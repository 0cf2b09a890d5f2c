/**
 * Dataset Reader
 *
 * One record per portal dataset carrying its descriptive metadata.
 * Absent metadata is written as null so that values removed on the
 * portal are cleared in the catalog too.
 */

import type { FieldMap, SourceRecord } from '@catalog-sync/core';
import { BaseSourceReader, type SourceReaderConfig } from '../base-source-reader.js';
import type { OdsDataset, OdsDatasetSource } from '../ods/client.js';

export interface DatasetReaderConfig extends SourceReaderConfig {
  client: OdsDatasetSource;
  /** Datasets to read; all visible datasets when omitted */
  datasetIds?: string[];
  /** Public portal URL used for dataset links */
  portalUrl?: string;
  /** Appended to every dataset title (default: " (OGD)") */
  labelSuffix?: string;
}

const ISO_DATE = /^(\d{4}-\d{2}-\d{2})/;

function text(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export class DatasetReader extends BaseSourceReader<DatasetReaderConfig> {
  readonly family = 'datasets';

  protected async fetchRecords(): Promise<SourceRecord[]> {
    const ids = this.config.datasetIds ?? (await this.config.client.listDatasetIds());
    const records: SourceRecord[] = [];

    for (const id of ids) {
      const dataset = await this.config.client.getDataset(id);
      const title = text(dataset.metas?.default?.title);
      if (!title) {
        this.skip(dataset.dataset_id, 'INVALID_RECORD', `Dataset '${dataset.dataset_id}' has no title`);
        continue;
      }

      records.push({
        key: dataset.dataset_id,
        label: `${title}${this.config.labelSuffix ?? ' (OGD)'}`,
        fields: this.toFields(dataset),
      });
    }

    return records;
  }

  private toFields(dataset: OdsDataset): FieldMap {
    const meta = dataset.metas?.default;
    const dcat = dataset.metas?.dcat;

    const keywords = (meta?.keyword ?? []).map((keyword) => keyword.trim()).filter(Boolean);
    const territories = (meta?.territory ?? []).map((territory) => territory.trim()).filter(Boolean).sort();
    const issued = dcat?.issued ? ISO_DATE.exec(dcat.issued.trim()) : null;

    return {
      portal_id: dataset.dataset_id,
      description: text(meta?.description),
      keywords: keywords.length > 0 ? keywords : null,
      publisher: text(meta?.publisher),
      geographic_dimension: territories.length > 0 ? territories.join(', ') : null,
      license: text(meta?.license_url) ?? text(meta?.license),
      accrual_periodicity: text(dcat?.accrualperiodicity),
      publication_date: issued?.[1] ?? null,
      portal_link: this.config.portalUrl
        ? `${this.config.portalUrl.replace(/\/+$/, '')}/explore/dataset/${encodeURIComponent(dataset.dataset_id)}/`
        : null,
    };
  }
}

/**
 * Factory function to create a dataset reader
 */
export function createDatasetReader(config: DatasetReaderConfig): DatasetReader {
  return new DatasetReader(config);
}
