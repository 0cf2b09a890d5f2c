export { CatalogClient, wireAssetSchema } from './client.js';
export type { CatalogClientConfig, WireAsset, WireAssetBody } from './client.js';

export { RestCatalogAccessor, createRestCatalogAccessor, DEFAULT_TOP_LEVEL_FIELDS } from './accessor.js';
export type { RestCatalogAccessorConfig } from './accessor.js';
