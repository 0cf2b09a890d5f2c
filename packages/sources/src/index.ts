/**
 * @catalog-sync/sources
 *
 * Source readers producing SourceRecords for each entity family
 */

export { BaseSourceReader } from './base-source-reader.js';
export type { SourceReaderConfig } from './base-source-reader.js';

export { OdsClient, createOdsClient } from './ods/client.js';
export type {
  OdsClientConfig,
  OdsRecordQuery,
  OdsDataset,
  OdsField,
  OdsRecordSource,
  OdsDatasetSource,
} from './ods/client.js';

export { OrgUnitReader, createOrgUnitReader, orgUnitRowSchema } from './org-units/org-unit-reader.js';
export type { OrgUnitReaderConfig, OrgUnitRow } from './org-units/org-unit-reader.js';

export { DatasetReader, createDatasetReader } from './datasets/dataset-reader.js';
export type { DatasetReaderConfig } from './datasets/dataset-reader.js';

export {
  DatasetCompositionReader,
  createDatasetCompositionReader,
} from './datasets/dataset-composition-reader.js';
export type { DatasetCompositionReaderConfig } from './datasets/dataset-composition-reader.js';

export {
  LegalReferenceReader,
  createLegalReferenceReader,
  DEFAULT_LAW_FILTER,
} from './legal/legal-reference-reader.js';
export type { LegalReferenceReaderConfig } from './legal/legal-reference-reader.js';
export {
  normalizeSystematicNumber,
  parseParagraphs,
  stripHtml,
  decodeHtmlEntities,
} from './legal/paragraphs.js';
export type { Paragraph } from './legal/paragraphs.js';

export { JsonSourceReader, createJsonSourceReader } from './json/json-source-reader.js';
export type { JsonSourceReaderConfig } from './json/json-source-reader.js';
