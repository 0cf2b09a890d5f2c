/**
 * Run report types
 *
 * The run report is the only output contract of a sync run.
 */

import type { FieldValue } from './values.js';
import type { ErrorCode } from '../errors/index.js';

export type RunStatus = 'success' | 'warning' | 'error';

export type ItemAction = 'created' | 'updated' | 'unchanged' | 'deleted';

/** How a delete candidate was handled */
export type DeletionDisposition = 'hard-delete' | 'mark-for-review';

export interface FieldChange {
  field: string;
  oldValue: FieldValue | undefined;
  newValue: FieldValue | undefined;
}

export interface ChildChange {
  name: string;
  action: ItemAction;
  uuid?: string;
  disposition?: DeletionDisposition;
  changes: FieldChange[];
}

export interface ItemChange {
  key: string;
  action: ItemAction;
  label?: string;
  uuid?: string;
  assetType?: string;
  /** Set for deleted items */
  disposition?: DeletionDisposition;
  changes: FieldChange[];
  /** Child-level changes of composite entities (unchanged children omitted) */
  children: ChildChange[];
  /** Self-healed anomalies (stale mapping, adoption) */
  notes: string[];
}

export interface RunError {
  /** Natural key of the offending record, when the error concerns one */
  key?: string;
  /** Technical name of the offending child item */
  child?: string;
  code: ErrorCode;
  message: string;
}

export interface RunCounts {
  created: number;
  updated: number;
  unchanged: number;
  /** Delete candidates handled, hard deletions and review marks alike */
  deleted: number;
  directlyDeleted: number;
  markedForReview: number;
  errors: number;
}

export interface RunReport {
  runId: string;
  family: string;
  status: RunStatus;
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  counts: RunCounts;
  childCounts: RunCounts;
  created: ItemChange[];
  updated: ItemChange[];
  unchanged: ItemChange[];
  deleted: ItemChange[];
  errors: RunError[];
  /** Message of the fatal error that aborted the run */
  fatal?: string;
}
