/**
 * Builds readers, mapping stores and catalog accessors from a validated config
 */

import { resolve } from 'node:path';
import type { ICatalogAccessor, IMappingStore, ISourceReader, Logger } from '@catalog-sync/core';
import { createRestCatalogAccessor } from '@catalog-sync/catalog-client';
import { createCsvMappingStore, createJsonMappingStore } from '@catalog-sync/mapping-store';
import {
  createDatasetCompositionReader,
  createDatasetReader,
  createJsonSourceReader,
  createLegalReferenceReader,
  createOdsClient,
  createOrgUnitReader,
} from '@catalog-sync/sources';
import { ConfigError, type CatalogConfig, type ConfigFile, type MappingConfig } from './config.js';

export function createReader(config: ConfigFile, logger: Logger): ISourceReader {
  const { source, family } = config;

  if (source.type === 'json') {
    return createJsonSourceReader({ family, filePath: resolve(process.cwd(), source.filePath), logger });
  }

  const client = createOdsClient({
    baseUrl: source.baseUrl,
    apiKey: source.apiKey,
    pageSize: source.pageSize,
    timeoutMs: source.timeoutMs,
    logger,
  });

  switch (family) {
    case 'org-units':
      return createOrgUnitReader({ client, datasetId: requireDatasetId(source.datasetId, family), logger });

    case 'legal-references':
      return createLegalReferenceReader({
        client,
        datasetId: requireDatasetId(source.datasetId, family),
        where: source.where,
        logger,
      });

    case 'datasets':
      return createDatasetReader({
        client,
        datasetIds: source.datasetIds,
        portalUrl: source.portalUrl,
        logger,
      });

    case 'dataset-compositions':
      return createDatasetCompositionReader({
        client,
        datasetIds: source.datasetIds,
        portalUrl: source.portalUrl,
        logger,
      });
  }
}

// config validation guarantees this for portal sources of these families
function requireDatasetId(datasetId: string | undefined, family: string): string {
  if (!datasetId) {
    throw new ConfigError(`source.datasetId is required for ${family}`);
  }
  return datasetId;
}

export function createMappingStore(config: MappingConfig, logger: Logger): IMappingStore {
  const filePath = resolve(process.cwd(), config.filePath);
  return config.format === 'json'
    ? createJsonMappingStore({ filePath, logger })
    : createCsvMappingStore({ filePath, delimiter: config.delimiter, logger });
}

export function createAccessor(config: CatalogConfig, logger: Logger): ICatalogAccessor {
  return createRestCatalogAccessor({
    baseUrl: config.baseUrl,
    database: config.database,
    accessToken: config.accessToken,
    reviewStatus: config.reviewStatus,
    topLevelFields: config.topLevelFields,
    timeoutMs: config.timeoutMs,
    logger,
  });
}
