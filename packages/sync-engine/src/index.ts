/**
 * @catalog-sync/sync-engine
 *
 * Reconciliation of source records against the live catalog subtree
 */

export { SyncRun } from './sync-run.js';
export type { SyncRunOptions } from './sync-run.js';

// Reconciliation
export { Reconciler } from './reconciliation/reconciler.js';
export type { ReconcilerOptions, PacingOptions } from './reconciliation/reconciler.js';
export { DeletionPolicy } from './reconciliation/deletion-policy.js';
export { diffPayload, isEmptyPatch } from './reconciliation/field-diff.js';
export type { PayloadDiff } from './reconciliation/field-diff.js';
export { diffChildren } from './reconciliation/child-diff.js';
export type { ChildDiff, ChildDiffInput } from './reconciliation/child-diff.js';
export type {
  ParentRef,
  ChildOperation,
  CreateOperation,
  UpdateOperation,
  UnchangedOperation,
  RecordOperation,
  DeleteOperation,
  SyncPlan,
} from './reconciliation/plan.js';

// Live state
export { LiveSubtree } from './live/live-subtree.js';
export type { FetchSubtreeOptions } from './live/live-subtree.js';
export { checkUnique, findDuplicateKeys } from './duplicates/duplicate-guard.js';
export { normalizeRecordKeys } from './duplicates/record-keys.js';
export type { NormalizedRecords } from './duplicates/record-keys.js';
export type { CheckUniqueOptions } from './duplicates/duplicate-guard.js';

// Entity families
export {
  ENTITY_FAMILIES,
  ENTITY_PROFILES,
  getEntityProfile,
  orgUnitProfile,
  datasetProfile,
  datasetCompositionProfile,
  legalReferenceProfile,
  datatypeFor,
  DATATYPE_BY_COLUMN_TYPE,
} from './families/index.js';
export type { EntityFamily, EntityProfile, ChildProfile } from './families/index.js';

// Reporting
export { RunStateRecorder } from './report/run-state.js';
export { formatRunReport, reportFileName, writeRunReport } from './report/run-report.js';
export type { FormatOptions } from './report/run-report.js';
