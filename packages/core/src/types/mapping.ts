/**
 * Identity mapping types
 */

/**
 * One row of the identity mapping: which target asset corresponds to which
 * source entity. Keys are unique within a store.
 */
export interface MappingEntry {
  /** Natural key of the source entity */
  key: string;
  /** Asset type of the target */
  assetType: string;
  /** Target identifier */
  uuid: string;
  /** Collection path of the target's parent ('' for the scope root) */
  parentPath: string;
}
