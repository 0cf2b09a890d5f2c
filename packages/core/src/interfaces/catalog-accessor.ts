/**
 * Catalog Accessor Interface
 *
 * Read/create/update/delete primitives against the target catalog's asset
 * tree. Implementations hide the wire format; every method rejects with a
 * RemoteError on transport or protocol failure.
 */

import type { AssetPatch, AssetPayload, TargetAsset } from '../types/index.js';

export interface ICatalogAccessor {
  /**
   * Look up an asset by identifier
   * @returns null when the asset does not exist (anymore)
   */
  get(ref: string): Promise<TargetAsset | null>;

  /** Create an asset below a collection or parent asset */
  create(parentId: string, payload: AssetPayload): Promise<TargetAsset>;

  /**
   * Update an asset
   * @param merge - true keeps fields absent from the patch, false replaces them
   */
  update(ref: string, patch: AssetPatch, merge?: boolean): Promise<TargetAsset>;

  delete(ref: string): Promise<void>;

  /** Direct children of a collection or asset (sub-collections, assets, attributes, values) */
  listChildren(parentId: string): Promise<TargetAsset[]>;

  /** Move the asset to the flagged-for-review status without removing it */
  markForReview(ref: string): Promise<TargetAsset>;
}
