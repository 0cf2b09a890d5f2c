/**
 * REST Catalog Accessor
 *
 * Implements ICatalogAccessor on top of CatalogClient. Type-specific fields
 * (description, stereotype, code, ...) travel at the top level of the wire
 * asset, everything else inside customProperties.
 */

import type {
  AssetPatch,
  AssetPayload,
  AssetStatus,
  FieldMap,
  ICatalogAccessor,
  TargetAsset,
} from '@catalog-sync/core';
import { fieldValueSchema } from '@catalog-sync/core';
import { CatalogClient, type CatalogClientConfig, type WireAsset, type WireAssetBody } from './client.js';

export interface RestCatalogAccessorConfig extends CatalogClientConfig {
  /** Catalog status code used for FLAGGED (default: REVIEWDCC2) */
  reviewStatus?: string;
  /** Fields written at the top level instead of customProperties */
  topLevelFields?: string[];
}

export const DEFAULT_TOP_LEVEL_FIELDS = ['description', 'stereotype', 'code', 'shortText', 'hasRange', 'title'];

const RESERVED_WIRE_KEYS = new Set(['id', '_type', 'label', 'status', 'inCollection', 'parentId', 'customProperties']);

export class RestCatalogAccessor implements ICatalogAccessor {
  private readonly client: CatalogClient;
  private readonly reviewStatus: string;
  private readonly topLevelFields: ReadonlySet<string>;

  constructor(config: RestCatalogAccessorConfig, client?: CatalogClient) {
    this.client = client ?? new CatalogClient(config);
    this.reviewStatus = config.reviewStatus ?? 'REVIEWDCC2';
    this.topLevelFields = new Set(config.topLevelFields ?? DEFAULT_TOP_LEVEL_FIELDS);
  }

  async get(ref: string): Promise<TargetAsset | null> {
    const wire = await this.client.getAsset(ref);
    return wire ? this.toTargetAsset(wire) : null;
  }

  async create(parentId: string, payload: AssetPayload): Promise<TargetAsset> {
    const body = this.toBody({
      type: payload.type,
      label: payload.label,
      fields: payload.fields,
      status: payload.status ?? 'WORKING',
    });
    body.inCollection = parentId;
    return this.toTargetAsset(await this.client.createAsset(parentId, body));
  }

  async update(ref: string, patch: AssetPatch, merge = true): Promise<TargetAsset> {
    const body = this.toBody(patch);
    if (patch.parentId !== undefined) {
      body.inCollection = patch.parentId;
    }
    return this.toTargetAsset(await this.client.updateAsset(ref, body, !merge));
  }

  async delete(ref: string): Promise<void> {
    await this.client.deleteAsset(ref);
  }

  async listChildren(parentId: string): Promise<TargetAsset[]> {
    const children = await this.client.listChildren(parentId);
    return children.map((wire) => this.toTargetAsset(wire));
  }

  async markForReview(ref: string): Promise<TargetAsset> {
    return this.toTargetAsset(await this.client.updateAsset(ref, { status: this.reviewStatus }));
  }

  toTargetAsset(wire: WireAsset): TargetAsset {
    const fields: FieldMap = {};

    for (const [key, value] of Object.entries(wire)) {
      if (RESERVED_WIRE_KEYS.has(key) || key.startsWith('_') || !this.topLevelFields.has(key)) continue;
      const parsed = fieldValueSchema.safeParse(value);
      if (parsed.success) fields[key] = parsed.data;
    }

    for (const [key, value] of Object.entries(wire.customProperties ?? {})) {
      const parsed = fieldValueSchema.safeParse(value);
      if (parsed.success) fields[key] = parsed.data;
    }

    return {
      uuid: wire.id,
      type: wire._type,
      label: wire.label,
      status: this.fromWireStatus(wire.status),
      parentId: wire.parentId ?? wire.inCollection ?? null,
      fields,
    };
  }

  private toBody(input: { type?: string; label?: string; fields?: FieldMap; status?: AssetStatus }): WireAssetBody {
    const body: WireAssetBody = {};
    if (input.type) body._type = input.type;
    if (input.label !== undefined) body.label = input.label;
    if (input.status) body.status = this.toWireStatus(input.status);

    if (input.fields) {
      const customProperties: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(input.fields)) {
        if (this.topLevelFields.has(key)) {
          body[key] = value;
        } else {
          customProperties[key] = value;
        }
      }
      if (Object.keys(customProperties).length > 0) {
        body.customProperties = customProperties;
      }
    }

    return body;
  }

  private toWireStatus(status: AssetStatus): string {
    return status === 'FLAGGED' ? this.reviewStatus : status;
  }

  private fromWireStatus(status: string | undefined): AssetStatus {
    if (status === this.reviewStatus) return 'FLAGGED';
    if (status === 'PUBLISHED') return 'PUBLISHED';
    return 'WORKING';
  }
}

/**
 * Factory function to create a REST catalog accessor
 */
export function createRestCatalogAccessor(config: RestCatalogAccessorConfig): RestCatalogAccessor {
  return new RestCatalogAccessor(config);
}
