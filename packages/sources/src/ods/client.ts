/**
 * Open-Data Portal Client
 *
 * Read-only client for the portal's explore API (v2.1):
 *
 *   GET /api/explore/v2.1/catalog/datasets                    (dataset listing)
 *   GET /api/explore/v2.1/catalog/datasets/{id}               (metadata, columns)
 *   GET /api/explore/v2.1/catalog/datasets/{id}/records       (records, paged)
 */

import { z } from 'zod';
import { RemoteError, silentLogger, type Logger } from '@catalog-sync/core';

export interface OdsClientConfig {
  /** Portal base URL, e.g. https://data.example.org */
  baseUrl: string;
  /** API key, sent as "Authorization: Apikey ..." */
  apiKey?: string;
  /** Page size for listing endpoints (default: 100, portal maximum) */
  pageSize?: number;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

export interface OdsRecordQuery {
  where?: string;
  orderBy?: string;
  select?: string;
}

const odsFieldSchema = z.object({
  name: z.string().min(1),
  label: z.string().nullish(),
  type: z.string().default('text'),
  description: z.string().nullish(),
});

export type OdsField = z.infer<typeof odsFieldSchema>;

const odsDatasetSchema = z.object({
  dataset_id: z.string().min(1),
  metas: z
    .object({
      default: z
        .object({
          title: z.string().nullish(),
          description: z.string().nullish(),
          keyword: z.array(z.string()).nullish(),
          publisher: z.string().nullish(),
          territory: z.array(z.string()).nullish(),
          license: z.string().nullish(),
          license_url: z.string().nullish(),
        })
        .passthrough()
        .optional(),
      dcat: z
        .object({
          accrualperiodicity: z.string().nullish(),
          issued: z.string().nullish(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
  fields: z.array(odsFieldSchema).default([]),
});

export type OdsDataset = z.infer<typeof odsDatasetSchema>;

const pageSchema = z.object({
  total_count: z.number().optional(),
  results: z.array(z.record(z.unknown())).default([]),
});

/** Anything that can hand out a dataset's full record list */
export interface OdsRecordSource {
  fetchAllRecords(datasetId: string, query?: OdsRecordQuery): Promise<Record<string, unknown>[]>;
}

/** Anything that can describe datasets */
export interface OdsDatasetSource {
  getDataset(datasetId: string): Promise<OdsDataset>;
  listDatasetIds(): Promise<string[]>;
}

const API_PREFIX = '/api/explore/v2.1/catalog/datasets';

export class OdsClient implements OdsRecordSource, OdsDatasetSource {
  private readonly config: OdsClientConfig;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(config: OdsClientConfig) {
    this.config = config;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.pageSize = Math.min(Math.max(config.pageSize ?? 100, 1), 100);
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Fetch every record of a dataset, following limit/offset pages
   * until the portal returns a short or empty page
   */
  async fetchAllRecords(datasetId: string, query: OdsRecordQuery = {}): Promise<Record<string, unknown>[]> {
    const path = `${API_PREFIX}/${encodeURIComponent(datasetId)}/records`;
    const records: Record<string, unknown>[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.fetchPage(path, {
        where: query.where,
        order_by: query.orderBy,
        select: query.select,
        limit: String(this.pageSize),
        offset: String(offset),
      });

      records.push(...page.results);
      this.logger.debug('Fetched portal records', {
        datasetId,
        offset,
        batch: page.results.length,
        collected: records.length,
      });

      if (page.results.length < this.pageSize) break;
      offset += this.pageSize;
    }

    return records;
  }

  async getDataset(datasetId: string): Promise<OdsDataset> {
    const body = await this.request(`${API_PREFIX}/${encodeURIComponent(datasetId)}`);
    const result = odsDatasetSchema.safeParse(body);
    if (!result.success) {
      throw new RemoteError(`Unexpected dataset metadata for ${datasetId}`, {
        context: { issues: result.error.issues },
      });
    }
    return result.data;
  }

  /** Ids of every dataset visible to the configured key */
  async listDatasetIds(): Promise<string[]> {
    const ids: string[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.fetchPage(API_PREFIX, {
        select: 'dataset_id',
        order_by: 'dataset_id',
        limit: String(this.pageSize),
        offset: String(offset),
      });

      for (const row of page.results) {
        if (typeof row.dataset_id === 'string' && row.dataset_id) {
          ids.push(row.dataset_id);
        }
      }

      if (page.results.length < this.pageSize) break;
      offset += this.pageSize;
    }

    return ids;
  }

  private async fetchPage(path: string, params: Record<string, string | undefined>) {
    const body = await this.request(path, params);
    const result = pageSchema.safeParse(body);
    if (!result.success) {
      throw new RemoteError(`Unexpected page format from ${path}`, {
        context: { issues: result.error.issues },
      });
    }
    return result.data;
  }

  private async request(path: string, params: Record<string, string | undefined> = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') {
        url.searchParams.set(key, value);
      }
    }

    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Apikey ${this.config.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(url, { headers, signal: controller.signal });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new RemoteError(`Portal request timed out after ${timeoutMs}ms: ${path}`);
      }
      throw new RemoteError(
        `Failed to reach portal: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err instanceof Error ? err : undefined }
      );
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new RemoteError(`Portal API error on ${path}: HTTP ${response.status}`, {
        status: response.status,
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new RemoteError(`Portal returned invalid JSON for ${path}`, {
        status: response.status,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}

/**
 * Factory function to create a portal client
 */
export function createOdsClient(config: OdsClientConfig): OdsClient {
  return new OdsClient(config);
}
