export type { ICatalogAccessor } from './catalog-accessor.js';
export type { ISourceReader } from './source-reader.js';
export type { IMappingStore } from './mapping-store.js';
