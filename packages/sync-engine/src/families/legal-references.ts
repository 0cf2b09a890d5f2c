import {
  normalizeKey,
  type AssetPayload,
  type ChildItem,
  type SourceRecord,
  type TargetAsset,
} from '@catalog-sync/core';
import type { ChildProfile, EntityProfile } from './entity-profile.js';

const KEY_FIELD = 'systematic_number';
const STEREOTYPE = 'LAW';

const paragraphProfile: ChildProfile = {
  assetType: 'ReferenceValue',

  keyOf(asset: TargetAsset): string | undefined {
    if (asset.type !== 'ReferenceValue') return undefined;
    return normalizeKey(asset.fields.code) || undefined;
  },

  buildPayload(item: ChildItem): AssetPayload {
    const shortText = item.fields.shortText;
    return {
      type: 'ReferenceValue',
      label: item.name,
      fields: {
        code: item.name,
        shortText: typeof shortText === 'string' ? shortText : '',
      },
    };
  },
};

/**
 * Legal references: one ReferenceObject (stereotype LAW) per law with one
 * ReferenceValue per paragraph, keyed by paragraph code.
 */
export const legalReferenceProfile: EntityProfile = {
  family: 'legal-references',
  assetType: 'ReferenceObject',
  keyField: KEY_FIELD,

  keyOf(asset: TargetAsset): string | undefined {
    if (asset.type !== 'ReferenceObject' || asset.fields.stereotype !== STEREOTYPE) return undefined;
    return normalizeKey(asset.fields[KEY_FIELD]) || undefined;
  },

  buildPayload(record: SourceRecord): AssetPayload {
    return {
      type: 'ReferenceObject',
      label: record.label,
      fields: { ...record.fields, stereotype: STEREOTYPE, [KEY_FIELD]: record.key },
    };
  },

  children: paragraphProfile,
};
