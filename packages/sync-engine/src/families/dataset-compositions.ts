/**
 * Dataset compositions: one UmlClass per portal dataset with one
 * UmlAttribute per column, keyed by the column's technical name.
 */

import {
  UnknownTypeError,
  normalizeKey,
  type AssetPayload,
  type ChildItem,
  type FieldMap,
  type SourceRecord,
  type TargetAsset,
} from '@catalog-sync/core';
import type { ChildProfile, EntityProfile } from './entity-profile.js';

const KEY_FIELD = 'dataset_id';
const STEREOTYPE = 'ogd_dataset';
const CHILD_KEY_FIELD = 'technical_name';

/** Portal column types and the catalog datatype each one is stored as */
export const DATATYPE_BY_COLUMN_TYPE: Readonly<Record<string, string>> = {
  text: 'String',
  int: 'Integer',
  identifier: 'Identifier',
  boolean: 'Boolean',
  double: 'Decimal',
  datetime: 'Timestamp',
  date: 'Date',
  geo_point_2d: 'GeoPoint2D',
  geo_shape: 'GeoShape',
  file: 'Binary',
  json_blob: 'String',
};

export function datatypeFor(columnType: string | undefined): string {
  const type = (columnType ?? 'text').trim().toLowerCase();
  const datatype = DATATYPE_BY_COLUMN_TYPE[type];
  if (!datatype) {
    throw new UnknownTypeError(columnType ?? '', Object.keys(DATATYPE_BY_COLUMN_TYPE));
  }
  return datatype;
}

const columnProfile: ChildProfile = {
  assetType: 'UmlAttribute',

  keyOf(asset: TargetAsset): string | undefined {
    if (asset.type !== 'UmlAttribute') return undefined;
    return normalizeKey(asset.fields[CHILD_KEY_FIELD]) || undefined;
  },

  buildPayload(item: ChildItem): AssetPayload {
    const { label, ...rest } = item.fields;
    const fields: FieldMap = {
      ...rest,
      [CHILD_KEY_FIELD]: item.name,
      hasRange: datatypeFor(item.type),
    };
    return {
      type: 'UmlAttribute',
      label: typeof label === 'string' && label.trim() ? label : item.name,
      fields,
    };
  },
};

export const datasetCompositionProfile: EntityProfile = {
  family: 'dataset-compositions',
  assetType: 'UmlClass',
  keyField: KEY_FIELD,

  keyOf(asset: TargetAsset): string | undefined {
    if (asset.type !== 'UmlClass' || asset.fields.stereotype !== STEREOTYPE) return undefined;
    return normalizeKey(asset.fields[KEY_FIELD]) || undefined;
  },

  buildPayload(record: SourceRecord): AssetPayload {
    return {
      type: 'UmlClass',
      label: record.label,
      fields: { ...record.fields, stereotype: STEREOTYPE, [KEY_FIELD]: record.key },
    };
  },

  children: columnProfile,
};
