/**
 * Target catalog asset types
 */

import type { FieldMap } from './values.js';

/**
 * Lifecycle status of a catalog asset.
 *
 * FLAGGED is the "marked for review" state used instead of deleting assets
 * that still have dependents; bindings translate it to the catalog's own code.
 */
export type AssetStatus = 'WORKING' | 'PUBLISHED' | 'FLAGGED';

export const ASSET_STATUSES: readonly AssetStatus[] = ['WORKING', 'PUBLISHED', 'FLAGGED'];

export interface TargetAsset {
  /** Opaque catalog identifier */
  uuid: string;
  /** Asset type (Collection, UmlClass, ReferenceObject, ...) */
  type: string;
  label: string;
  status: AssetStatus;
  /** Identifier of the containing collection or parent asset */
  parentId: string | null;
  /** Custom and type-specific fields (description, stereotype, ...) */
  fields: FieldMap;
}

/** Payload for creating an asset */
export interface AssetPayload {
  type: string;
  label: string;
  fields: FieldMap;
  status?: AssetStatus;
}

/** Partial change to an existing asset */
export interface AssetPatch {
  label?: string;
  fields?: FieldMap;
  /** Moves the asset under another parent */
  parentId?: string | null;
  status?: AssetStatus;
}
