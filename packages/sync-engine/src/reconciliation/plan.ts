/**
 * Sync plan: the operations a reconciliation intends to perform
 */

import type {
  AssetPatch,
  AssetPayload,
  DeletionDisposition,
  FieldChange,
  MappingEntry,
  RunError,
} from '@catalog-sync/core';

/** Parent of a create or move: an existing asset, or a record created earlier in the same run */
export type ParentRef = { kind: 'asset'; uuid: string } | { kind: 'pending'; key: string };

export type ChildOperation =
  | { action: 'create'; name: string; label: string; payload: AssetPayload }
  | { action: 'update'; name: string; label: string; uuid: string; patch: AssetPatch; changes: FieldChange[] }
  | { action: 'unchanged'; name: string; label: string; uuid: string }
  | { action: 'delete'; name: string; label: string; uuid: string; disposition: DeletionDisposition };

interface RecordOperationBase {
  key: string;
  label: string;
  assetType: string;
  /** Canonical parent path written to the mapping entry */
  parentPath: string;
  /** Depth of the desired parent path; creates and updates run shallowest first */
  depth: number;
  children: ChildOperation[];
  childErrors: RunError[];
  notes: string[];
}

export interface CreateOperation extends RecordOperationBase {
  action: 'create';
  payload: AssetPayload;
  parent: ParentRef;
  /** Mapping entry whose asset no longer exists */
  staleEntry?: MappingEntry;
}

export interface UpdateOperation extends RecordOperationBase {
  action: 'update';
  uuid: string;
  patch: AssetPatch;
  changes: FieldChange[];
  /** New parent when the record moved */
  move?: ParentRef;
  writeMapping: boolean;
}

export interface UnchangedOperation extends RecordOperationBase {
  action: 'unchanged';
  uuid: string;
  writeMapping: boolean;
}

export type RecordOperation = CreateOperation | UpdateOperation | UnchangedOperation;

export type DeleteOperation =
  | {
      action: 'delete';
      key: string;
      uuid: string;
      label: string;
      assetType: string;
      depth: number;
      disposition: DeletionDisposition;
      /** Whether the mapping entry for key points at this asset */
      mapped: boolean;
    }
  | { action: 'keep-flagged'; key: string; uuid: string; label: string; assetType: string }
  /** Mapping entry of a vanished asset whose record is gone too */
  | { action: 'forget'; key: string; uuid: string };

export interface SyncPlan {
  family: string;
  records: RecordOperation[];
  deletes: DeleteOperation[];
  /** Records that could not be planned */
  errors: RunError[];
}
