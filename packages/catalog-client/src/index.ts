/**
 * @catalog-sync/catalog-client
 *
 * Catalog accessor bindings: REST over fetch, and an in-process catalog
 */

export * from './rest/index.js';

export { InMemoryCatalog } from './memory/in-memory-catalog.js';
export type { CatalogOperation, CatalogCall, SeedAsset } from './memory/in-memory-catalog.js';

// Re-export core types for convenience
export type { ICatalogAccessor, TargetAsset, AssetPayload, AssetPatch } from '@catalog-sync/core';
