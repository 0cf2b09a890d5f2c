import { normalizeKey, type AssetPayload, type SourceRecord, type TargetAsset } from '@catalog-sync/core';
import type { EntityProfile } from './entity-profile.js';

const KEY_FIELD = 'portal_id';
const STEREOTYPE = 'ogd';

/**
 * Portal datasets: one Dataset per published dataset, described by its
 * portal metadata. Compositions of the same dataset are a separate family.
 */
export const datasetProfile: EntityProfile = {
  family: 'datasets',
  assetType: 'Dataset',
  keyField: KEY_FIELD,

  keyOf(asset: TargetAsset): string | undefined {
    if (asset.type !== 'Dataset' || asset.fields.stereotype !== STEREOTYPE) return undefined;
    return normalizeKey(asset.fields[KEY_FIELD]) || undefined;
  },

  buildPayload(record: SourceRecord): AssetPayload {
    return {
      type: 'Dataset',
      label: record.label,
      fields: { ...record.fields, stereotype: STEREOTYPE, [KEY_FIELD]: record.key },
    };
  },
};
