/**
 * Field Diff
 *
 * Compares a desired payload with a live asset on normalised values.
 * Only the label and the fields the payload names are compared; fields
 * present only on the live asset are left alone (merge semantics).
 */

import { valuesEqual, type AssetPatch, type AssetPayload, type FieldChange, type FieldMap, type TargetAsset } from '@catalog-sync/core';

export interface PayloadDiff {
  changes: FieldChange[];
  /** Minimal merge patch; empty when nothing differs */
  patch: AssetPatch;
}

export function diffPayload(desired: AssetPayload, live: TargetAsset): PayloadDiff {
  const changes: FieldChange[] = [];
  const patch: AssetPatch = {};

  if (!valuesEqual(desired.label, live.label)) {
    changes.push({ field: 'label', oldValue: live.label, newValue: desired.label });
    patch.label = desired.label;
  }

  const fields: FieldMap = {};
  for (const [field, value] of Object.entries(desired.fields)) {
    const current = live.fields[field];
    if (!valuesEqual(value, current)) {
      changes.push({ field, oldValue: current, newValue: value });
      fields[field] = value;
    }
  }
  if (Object.keys(fields).length > 0) {
    patch.fields = fields;
  }

  return { changes, patch };
}

export function isEmptyPatch(patch: AssetPatch): boolean {
  return (
    patch.label === undefined &&
    patch.fields === undefined &&
    patch.parentId === undefined &&
    patch.status === undefined
  );
}
