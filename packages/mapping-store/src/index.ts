/**
 * @catalog-sync/mapping-store
 *
 * Identity mapping stores: in-memory, CSV and JSON files
 */

export { InMemoryMappingStore } from './in-memory-mapping-store.js';

export { BaseFileMappingStore } from './base-file-mapping-store.js';
export type { FileMappingStoreConfig } from './base-file-mapping-store.js';

export { CsvMappingStore, createCsvMappingStore, CSV_MAPPING_COLUMNS } from './csv-mapping-store.js';
export type { CsvMappingStoreConfig } from './csv-mapping-store.js';

export { JsonMappingStore, createJsonMappingStore } from './json-mapping-store.js';
export type { JsonMappingStoreConfig } from './json-mapping-store.js';

// Re-export core types for convenience
export type { IMappingStore, MappingEntry } from '@catalog-sync/core';
