/**
 * Entity Profile
 *
 * The narrow capability set the reconciler needs per entity family:
 * which live assets it manages, how their natural key is read, and how a
 * source record becomes a desired asset payload.
 */

import type { AssetPayload, ChildItem, SourceRecord, TargetAsset } from '@catalog-sync/core';

export interface ChildProfile {
  /** Asset type of child assets (UmlAttribute, ReferenceValue, ...) */
  readonly assetType: string;

  /** Technical name of a live child asset; undefined for assets the profile does not manage */
  keyOf(asset: TargetAsset): string | undefined;

  /**
   * Desired payload of a child item
   * @throws UnknownTypeError when the item's declared type has no catalog counterpart
   */
  buildPayload(item: ChildItem): AssetPayload;
}

export interface EntityProfile {
  readonly family: string;
  readonly assetType: string;
  /** Field of the target asset carrying the natural key */
  readonly keyField: string;

  /** Natural key of a live asset; undefined when the asset is not engine-managed */
  keyOf(asset: TargetAsset): string | undefined;

  buildPayload(record: SourceRecord): AssetPayload;

  /** Present for composite entities */
  readonly children?: ChildProfile;
}
