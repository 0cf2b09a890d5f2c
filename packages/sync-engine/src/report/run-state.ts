/**
 * Run State
 *
 * Accumulates counts, per-item changes and errors of one run and freezes
 * them into the RunReport handed to reporting.
 */

import type {
  DeletionDisposition,
  ItemAction,
  ItemChange,
  RunCounts,
  RunError,
  RunReport,
  RunStatus,
  SyncError,
} from '@catalog-sync/core';

function emptyCounts(): RunCounts {
  return {
    created: 0,
    updated: 0,
    unchanged: 0,
    deleted: 0,
    directlyDeleted: 0,
    markedForReview: 0,
    errors: 0,
  };
}

function bump(counts: RunCounts, action: ItemAction, disposition?: DeletionDisposition): void {
  counts[action]++;
  if (action === 'deleted') {
    if (disposition === 'hard-delete') {
      counts.directlyDeleted++;
    } else {
      counts.markedForReview++;
    }
  }
}

export class RunStateRecorder {
  readonly startedAt: Date;

  private readonly counts = emptyCounts();
  private readonly childCounts = emptyCounts();
  private readonly items: Record<ItemAction, ItemChange[]> = {
    created: [],
    updated: [],
    unchanged: [],
    deleted: [],
  };
  private readonly errors: RunError[] = [];
  private fatalMessage?: string;

  constructor(
    readonly runId: string,
    readonly family: string,
    readonly dryRun = false,
    private readonly now: () => Date = () => new Date()
  ) {
    this.startedAt = now();
  }

  get status(): RunStatus {
    if (this.fatalMessage !== undefined) return 'error';
    return this.errors.length > 0 ? 'warning' : 'success';
  }

  item(change: ItemChange): void {
    this.items[change.action].push(change);
    bump(this.counts, change.action, change.disposition);
  }

  child(action: ItemAction, disposition?: DeletionDisposition): void {
    bump(this.childCounts, action, disposition);
  }

  error(error: RunError, level: 'item' | 'child' = 'item'): void {
    this.errors.push(error);
    this.counts.errors++;
    if (level === 'child') {
      this.childCounts.errors++;
    }
  }

  /** Mark the run as aborted */
  fatal(error: SyncError): void {
    this.fatalMessage = error.message;
    this.error({ code: error.code, message: error.message });
  }

  toReport(): RunReport {
    const report: RunReport = {
      runId: this.runId,
      family: this.family,
      status: this.status,
      dryRun: this.dryRun,
      startedAt: this.startedAt,
      finishedAt: this.now(),
      counts: { ...this.counts },
      childCounts: { ...this.childCounts },
      created: [...this.items.created],
      updated: [...this.items.updated],
      unchanged: [...this.items.unchanged],
      deleted: [...this.items.deleted],
      errors: [...this.errors],
    };
    if (this.fatalMessage !== undefined) {
      report.fatal = this.fatalMessage;
    }
    return report;
  }
}
