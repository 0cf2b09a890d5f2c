/**
 * Dataset Composition Reader
 *
 * One record per portal dataset, one child per column. Columns are keyed by
 * their technical name; the declared portal type is passed through and
 * mapped to a catalog datatype by the entity profile.
 */

import type { ChildItem, FieldMap, SourceRecord } from '@catalog-sync/core';
import { BaseSourceReader, type SourceReaderConfig } from '../base-source-reader.js';
import type { OdsDatasetSource } from '../ods/client.js';

export interface DatasetCompositionReaderConfig extends SourceReaderConfig {
  client: OdsDatasetSource;
  /** Datasets to read; all visible datasets when omitted */
  datasetIds?: string[];
  /** Public portal URL used for dataset links */
  portalUrl?: string;
}

export class DatasetCompositionReader extends BaseSourceReader<DatasetCompositionReaderConfig> {
  readonly family = 'dataset-compositions';

  protected async fetchRecords(): Promise<SourceRecord[]> {
    const ids = this.config.datasetIds ?? (await this.config.client.listDatasetIds());
    const records: SourceRecord[] = [];

    for (const id of ids) {
      const dataset = await this.config.client.getDataset(id);
      const title = dataset.metas?.default?.title?.trim();

      const fields: FieldMap = { dataset_id: dataset.dataset_id };
      if (this.config.portalUrl) {
        fields.dataset_link = `${this.config.portalUrl.replace(/\/+$/, '')}/explore/dataset/${encodeURIComponent(dataset.dataset_id)}/`;
      }

      const children: ChildItem[] = dataset.fields.map((column) => {
        const childFields: FieldMap = { label: column.label?.trim() || column.name };
        if (column.description?.trim()) {
          childFields.description = column.description.trim();
        }
        return { name: column.name, type: column.type, fields: childFields };
      });

      if (!title) {
        this.logger.warn('Dataset has no title, using its id as label', { datasetId: id });
      }

      records.push({
        key: dataset.dataset_id,
        label: title || dataset.dataset_id,
        fields,
        children,
      });
    }

    return records;
  }
}

/**
 * Factory function to create a dataset-composition reader
 */
export function createDatasetCompositionReader(
  config: DatasetCompositionReaderConfig
): DatasetCompositionReader {
  return new DatasetCompositionReader(config);
}
