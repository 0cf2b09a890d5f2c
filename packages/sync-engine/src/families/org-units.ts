import { normalizeKey, type AssetPayload, type SourceRecord, type TargetAsset } from '@catalog-sync/core';
import type { EntityProfile } from './entity-profile.js';

const KEY_FIELD = 'directory_id';

/**
 * Organisational units: one Collection per staff-directory unit.
 * Sub-units are records of their own, placed through parentPath.
 */
export const orgUnitProfile: EntityProfile = {
  family: 'org-units',
  assetType: 'Collection',
  keyField: KEY_FIELD,

  keyOf(asset: TargetAsset): string | undefined {
    if (asset.type !== 'Collection') return undefined;
    return normalizeKey(asset.fields[KEY_FIELD]) || undefined;
  },

  buildPayload(record: SourceRecord): AssetPayload {
    return {
      type: 'Collection',
      label: record.label,
      fields: { ...record.fields, [KEY_FIELD]: record.key },
    };
  },
};
