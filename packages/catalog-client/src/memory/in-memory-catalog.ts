/**
 * In-process catalog
 *
 * Keeps an asset tree in a Map and implements ICatalogAccessor on top of it.
 * Records every call and can be told to fail specific operations, which is
 * what the engine tests use in place of a catalog server.
 */

import type {
  AssetPatch,
  AssetPayload,
  AssetStatus,
  FieldMap,
  ICatalogAccessor,
  TargetAsset,
} from '@catalog-sync/core';
import { RemoteError } from '@catalog-sync/core';

export type CatalogOperation = 'get' | 'create' | 'update' | 'delete' | 'listChildren' | 'markForReview';

export interface CatalogCall {
  op: CatalogOperation;
  /** Asset id, or parent id for create/listChildren */
  ref: string;
}

export interface SeedAsset {
  uuid?: string;
  type: string;
  label: string;
  parentId?: string | null;
  status?: AssetStatus;
  fields?: FieldMap;
}

type FailureRule = {
  op: CatalogOperation;
  matches: (ref: string) => boolean;
  message: string;
  status?: number;
};

const MUTATING: ReadonlySet<CatalogOperation> = new Set(['create', 'update', 'delete', 'markForReview']);

function cloneAsset(asset: TargetAsset): TargetAsset {
  return { ...asset, fields: structuredClone(asset.fields) };
}

export class InMemoryCatalog implements ICatalogAccessor {
  private readonly assets = new Map<string, TargetAsset>();
  private readonly failures: FailureRule[] = [];
  private readonly _calls: CatalogCall[] = [];
  private sequence = 0;

  constructor(private readonly idPrefix = 'asset') {}

  /** Every accessor call in order */
  get calls(): readonly CatalogCall[] {
    return this._calls;
  }

  /** Number of create/update/delete/markForReview calls so far */
  get mutationCount(): number {
    return this._calls.filter((call) => MUTATING.has(call.op)).length;
  }

  get size(): number {
    return this.assets.size;
  }

  /**
   * Insert an asset directly, bypassing call recording
   */
  seed(input: SeedAsset): TargetAsset {
    const uuid = input.uuid ?? this.nextId();
    const asset: TargetAsset = {
      uuid,
      type: input.type,
      label: input.label,
      parentId: input.parentId ?? null,
      status: input.status ?? 'PUBLISHED',
      fields: structuredClone(input.fields ?? {}),
    };
    this.assets.set(uuid, asset);
    return cloneAsset(asset);
  }

  /** Remove an asset behind the engine's back (simulates edits outside a run) */
  drop(uuid: string): void {
    this.assets.delete(uuid);
  }

  /** Synchronous read for assertions */
  peek(uuid: string): TargetAsset | undefined {
    const asset = this.assets.get(uuid);
    return asset ? cloneAsset(asset) : undefined;
  }

  /** Synchronous search for assertions */
  find(predicate: (asset: TargetAsset) => boolean): TargetAsset[] {
    return Array.from(this.assets.values()).filter(predicate).map(cloneAsset);
  }

  /**
   * Make matching calls reject with a RemoteError
   * @param ref - asset id (or parent id) to fail on; all calls of the operation when omitted
   */
  failOn(op: CatalogOperation, ref?: string, message = 'Simulated catalog failure', status = 500): void {
    this.failures.push({
      op,
      matches: (candidate) => ref === undefined || candidate === ref,
      message,
      status,
    });
  }

  clearFailures(): void {
    this.failures.length = 0;
  }

  async get(ref: string): Promise<TargetAsset | null> {
    this.record('get', ref);
    const asset = this.assets.get(ref);
    return asset ? cloneAsset(asset) : null;
  }

  async create(parentId: string, payload: AssetPayload): Promise<TargetAsset> {
    this.record('create', parentId);
    this.require(parentId);

    const asset: TargetAsset = {
      uuid: this.nextId(),
      type: payload.type,
      label: payload.label,
      parentId,
      status: payload.status ?? 'WORKING',
      fields: structuredClone(payload.fields),
    };
    this.assets.set(asset.uuid, asset);
    return cloneAsset(asset);
  }

  async update(ref: string, patch: AssetPatch, merge = true): Promise<TargetAsset> {
    this.record('update', ref);
    const asset = this.require(ref);

    if (patch.parentId !== undefined && patch.parentId !== null) {
      this.require(patch.parentId);
    }

    const fields = patch.fields
      ? merge
        ? { ...asset.fields, ...structuredClone(patch.fields) }
        : structuredClone(patch.fields)
      : asset.fields;

    const updated: TargetAsset = {
      ...asset,
      label: patch.label ?? asset.label,
      status: patch.status ?? asset.status,
      parentId: patch.parentId !== undefined ? patch.parentId : asset.parentId,
      fields,
    };
    this.assets.set(ref, updated);
    return cloneAsset(updated);
  }

  async delete(ref: string): Promise<void> {
    this.record('delete', ref);
    this.require(ref);

    if (this.childrenOf(ref).length > 0) {
      throw new RemoteError(`Asset ${ref} still has children`, { status: 409 });
    }
    this.assets.delete(ref);
  }

  async listChildren(parentId: string): Promise<TargetAsset[]> {
    this.record('listChildren', parentId);
    this.require(parentId);
    return this.childrenOf(parentId).map(cloneAsset);
  }

  async markForReview(ref: string): Promise<TargetAsset> {
    this.record('markForReview', ref);
    const asset = this.require(ref);
    const flagged: TargetAsset = { ...asset, status: 'FLAGGED' };
    this.assets.set(ref, flagged);
    return cloneAsset(flagged);
  }

  private childrenOf(parentId: string): TargetAsset[] {
    return Array.from(this.assets.values()).filter((asset) => asset.parentId === parentId);
  }

  private record(op: CatalogOperation, ref: string): void {
    this._calls.push({ op, ref });
    const failure = this.failures.find((rule) => rule.op === op && rule.matches(ref));
    if (failure) {
      throw new RemoteError(failure.message, { status: failure.status, context: { op, ref } });
    }
  }

  private require(ref: string): TargetAsset {
    const asset = this.assets.get(ref);
    if (!asset) {
      throw new RemoteError(`Asset ${ref} not found`, { status: 404 });
    }
    return asset;
  }

  private nextId(): string {
    this.sequence++;
    return `${this.idPrefix}-${this.sequence}`;
  }
}
