/**
 * Run Report Formatter
 *
 * Plain-text rendering of a run report for the console, and the JSON
 * report file written after every run.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { FieldChange, FieldValue, ItemChange, RunCounts, RunReport } from '@catalog-sync/core';

export interface FormatOptions {
  /** Items listed per section before eliding (default: 10) */
  maxItems?: number;
}

function formatValue(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return '(empty)';
  return typeof value === 'string' ? `'${value}'` : JSON.stringify(value);
}

function formatChange(change: FieldChange): string {
  return `${change.field}: ${formatValue(change.oldValue)} -> ${formatValue(change.newValue)}`;
}

function describeItem(item: ItemChange): string {
  const label = item.label && item.label !== item.key ? ` (${item.label})` : '';
  return `${item.key}${label}`;
}

function pushCounts(lines: string[], counts: RunCounts): void {
  lines.push(`- Created: ${counts.created}`);
  lines.push(`- Updated: ${counts.updated}`);
  lines.push(`- Unchanged: ${counts.unchanged}`);
  lines.push(`- Deleted: ${counts.deleted} (${counts.directlyDeleted} removed, ${counts.markedForReview} marked for review)`);
  lines.push(`- Errors: ${counts.errors}`);
}

function pushSection(
  lines: string[],
  title: string,
  items: readonly ItemChange[],
  maxItems: number,
  detail: (item: ItemChange) => string[]
): void {
  if (items.length === 0) return;

  lines.push(`### ${title} (${items.length})`);
  for (const item of items.slice(0, maxItems)) {
    lines.push(`- ${describeItem(item)}`);
    for (const line of detail(item)) {
      lines.push(`  ${line}`);
    }
  }
  if (items.length > maxItems) {
    lines.push(`... and ${items.length - maxItems} more`);
  }
  lines.push('');
}

/**
 * Format a run report as plain text
 */
export function formatRunReport(report: RunReport, options: FormatOptions = {}): string {
  const maxItems = options.maxItems ?? 10;
  const lines: string[] = [];

  lines.push(`## Sync Report: ${report.family}${report.dryRun ? ' (dry run)' : ''}`);
  lines.push(`Run: ${report.runId}`);
  lines.push(`Status: ${report.status}`);
  lines.push(`Started: ${report.startedAt.toISOString()}`);
  lines.push(`Finished: ${report.finishedAt.toISOString()}`);
  lines.push('');

  if (report.fatal !== undefined) {
    lines.push(`### Aborted`);
    lines.push(report.fatal);
    lines.push('');
  }

  lines.push(`### Summary`);
  pushCounts(lines, report.counts);
  lines.push('');

  const childTotal =
    report.childCounts.created +
    report.childCounts.updated +
    report.childCounts.unchanged +
    report.childCounts.deleted +
    report.childCounts.errors;
  if (childTotal > 0) {
    lines.push(`### Children`);
    pushCounts(lines, report.childCounts);
    lines.push('');
  }

  const notes = (item: ItemChange): string[] => item.notes.map((note) => `note: ${note}`);

  pushSection(lines, 'Created', report.created, maxItems, (item) => [
    ...notes(item),
    ...(item.children.length > 0 ? [`children: ${item.children.length}`] : []),
  ]);

  pushSection(lines, 'Updated', report.updated, maxItems, (item) => [
    ...item.changes.map(formatChange),
    ...item.children.map((child) => `${child.action} child ${child.name}`),
    ...notes(item),
  ]);

  pushSection(lines, 'Deleted', report.deleted, maxItems, (item) => [
    item.disposition === 'hard-delete' ? 'removed' : 'marked for review',
  ]);

  if (report.errors.length > 0) {
    lines.push(`### Errors (${report.errors.length})`);
    for (const error of report.errors.slice(0, maxItems)) {
      const subject = [error.key, error.child].filter((part) => part !== undefined).join(' / ');
      lines.push(`- [${error.code}] ${subject ? `${subject}: ` : ''}${error.message}`);
    }
    if (report.errors.length > maxItems) {
      lines.push(`... and ${report.errors.length - maxItems} more`);
    }
    lines.push('');
  }

  lines.push(`---`);
  lines.push(`Processing time: ${report.finishedAt.getTime() - report.startedAt.getTime()}ms`);

  return lines.join('\n');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `{family}_sync_report_{yyyyMMdd_HHmmss}.json`, timestamp in UTC
 */
export function reportFileName(report: RunReport): string {
  const d = report.startedAt;
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `${report.family}_sync_report_${date}_${time}.json`;
}

/**
 * Write the report as JSON into dir
 * @returns path of the written file
 */
export async function writeRunReport(report: RunReport, dir: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, reportFileName(report));
  await fs.writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  return filePath;
}
