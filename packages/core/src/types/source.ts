/**
 * Source record types
 *
 * Produced fresh on every run by a source reader and never mutated afterwards.
 */

import type { FieldMap } from './values.js';

/** A sub-item of a composite record (a dataset column, a law paragraph) */
export interface ChildItem {
  /** Technical name or code; children are matched on this, never by position */
  name: string;
  /** Declared type, translated to a catalog schema element by the entity profile */
  type?: string;
  /** Desired field values */
  fields: FieldMap;
  /** Target identifier, when the reader already knows it */
  uuid?: string;
}

export interface SourceRecord {
  /** Natural key: non-empty, case-preserving */
  key: string;
  /** Declared type of the record (optional, family specific) */
  type?: string;
  /** Display label of the target asset */
  label: string;
  /** Desired field values */
  fields: FieldMap;
  /** Desired child items for composite entities */
  children?: ChildItem[];
  /**
   * Collection path of the parent, relative to the sync scope
   * (labels joined with '/', see splitCollectionPath)
   */
  parentPath?: string;
}
