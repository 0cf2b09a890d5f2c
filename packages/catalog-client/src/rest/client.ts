/**
 * Catalog REST Client
 *
 * JSON REST client for a hierarchical metadata catalog:
 *
 *   GET    /rest/{database}/assets/{id}
 *   GET    /rest/{database}/assets/{id}/children
 *   POST   /rest/{database}/assets/{parentId}/children
 *   PATCH  /rest/{database}/assets/{id}        (merge)
 *   PUT    /rest/{database}/assets/{id}        (replace)
 *   DELETE /rest/{database}/assets/{id}
 */

import { z } from 'zod';
import { RemoteError, silentLogger, type Logger } from '@catalog-sync/core';

export interface CatalogClientConfig {
  /** Catalog base URL, e.g. https://catalog.example.org */
  baseUrl: string;
  /** Database (tenant) name in the REST path */
  database: string;
  /** Bearer token */
  accessToken?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

/** Asset as it travels over the wire */
export const wireAssetSchema = z
  .object({
    id: z.string().min(1),
    _type: z.string().min(1),
    label: z.string().default(''),
    status: z.string().optional(),
    inCollection: z.string().nullable().optional(),
    parentId: z.string().nullable().optional(),
    customProperties: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type WireAsset = z.infer<typeof wireAssetSchema>;

const childrenResponseSchema = z.object({
  _embedded: z
    .object({
      assets: z.array(wireAssetSchema).default([]),
    })
    .optional(),
});

export type WireAssetBody = { _type?: string; label?: string; status?: string } & {
  [key: string]: unknown;
};

export class CatalogClient {
  private readonly config: CatalogClientConfig;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(config: CatalogClientConfig) {
    this.config = config;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Get an asset, or null when the catalog answers 404/410
   */
  async getAsset(id: string): Promise<WireAsset | null> {
    const body = await this.request('GET', this.assetPath(id), undefined, { allowMissing: true });
    return body === null ? null : this.parseAsset(body);
  }

  async listChildren(parentId: string): Promise<WireAsset[]> {
    const body = await this.request('GET', `${this.assetPath(parentId)}/children`);
    const result = childrenResponseSchema.safeParse(body ?? {});
    if (!result.success) {
      throw new RemoteError(`Unexpected children response for ${parentId}`, {
        context: { issues: result.error.issues },
      });
    }
    return result.data._embedded?.assets ?? [];
  }

  async createAsset(parentId: string, body: WireAssetBody): Promise<WireAsset> {
    return this.parseAsset(await this.request('POST', `${this.assetPath(parentId)}/children`, body));
  }

  /**
   * Update an asset; PATCH merges, PUT replaces
   */
  async updateAsset(id: string, body: WireAssetBody, replace = false): Promise<WireAsset> {
    return this.parseAsset(await this.request(replace ? 'PUT' : 'PATCH', this.assetPath(id), body));
  }

  async deleteAsset(id: string): Promise<void> {
    await this.request('DELETE', this.assetPath(id));
  }

  private assetPath(id: string): string {
    return `/rest/${encodeURIComponent(this.config.database)}/assets/${encodeURIComponent(id)}`;
  }

  private parseAsset(body: unknown): WireAsset {
    const result = wireAssetSchema.safeParse(body);
    if (!result.success) {
      throw new RemoteError('Catalog returned an asset without id or type', {
        context: { issues: result.error.issues },
      });
    }
    return result.data;
  }

  /**
   * Make an API request
   */
  private async request(
    method: string,
    path: string,
    body?: unknown,
    options: { allowMissing?: boolean } = {}
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.accessToken) {
      headers.Authorization = `Bearer ${this.config.accessToken}`;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new RemoteError(`Catalog request timed out after ${timeoutMs}ms: ${method} ${path}`);
      }
      throw new RemoteError(
        `Failed to reach catalog: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err instanceof Error ? err : undefined }
      );
    } finally {
      clearTimeout(timeout);
    }

    this.logger.debug('Catalog request', { method, path, status: response.status });

    if (options.allowMissing && (response.status === 404 || response.status === 410)) {
      return null;
    }

    if (!response.ok) {
      let errorMessage = `HTTP ${response.status}`;
      try {
        const errorBody: unknown = await response.json();
        if (typeof errorBody === 'object' && errorBody !== null && 'message' in errorBody) {
          errorMessage = String(errorBody.message);
        }
      } catch {
        // Body is not JSON; keep the status line
      }

      throw new RemoteError(`Catalog API error on ${method} ${path}: ${errorMessage}`, {
        status: response.status,
      });
    }

    // Handle 204 No Content
    if (response.status === 204) {
      return undefined;
    }

    try {
      return await response.json();
    } catch (err) {
      throw new RemoteError(`Catalog returned invalid JSON for ${method} ${path}`, {
        status: response.status,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}
