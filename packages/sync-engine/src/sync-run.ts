/**
 * Sync Run
 *
 * One reconciliation run for one entity family:
 * load mapping -> read source -> duplicate checks -> fetch live subtree ->
 * plan -> apply (or preview) -> persist mapping -> report.
 *
 * Duplicate keys and failures before planning abort the run without a
 * single catalog mutation; the mapping is then left as it was.
 */

import {
  createRunId,
  silentLogger,
  wrapError,
  type AssetStatus,
  type ICatalogAccessor,
  type IMappingStore,
  type ISourceReader,
  type Logger,
  type RunReport,
  type SleepFn,
} from '@catalog-sync/core';
import { checkUnique } from './duplicates/duplicate-guard.js';
import { normalizeRecordKeys } from './duplicates/record-keys.js';
import type { EntityProfile } from './families/index.js';
import { LiveSubtree } from './live/live-subtree.js';
import { Reconciler, type PacingOptions } from './reconciliation/reconciler.js';
import { RunStateRecorder } from './report/run-state.js';

export interface SyncRunOptions {
  profile: EntityProfile;
  reader: ISourceReader;
  accessor: ICatalogAccessor;
  mapping: IMappingStore;
  /** Catalog collection that scopes the run */
  rootId: string;
  writeStatus?: AssetStatus;
  adoptUnmapped?: boolean;
  pacing?: PacingOptions;
  sleep?: SleepFn;
  /** Plan and report without touching the catalog or the mapping file */
  dryRun?: boolean;
  logger?: Logger;
  runId?: string;
  now?: () => Date;
}

export class SyncRun {
  readonly runId: string;
  private readonly logger: Logger;

  constructor(private readonly options: SyncRunOptions) {
    this.runId = options.runId ?? createRunId();
    this.logger = (options.logger ?? silentLogger).child({
      runId: this.runId,
      family: options.profile.family,
    });
  }

  /**
   * Execute the run. Never rejects: fatal errors end up in the report
   * with status 'error'.
   */
  async execute(): Promise<RunReport> {
    const { profile, reader, accessor, mapping, rootId } = this.options;
    const dryRun = this.options.dryRun ?? false;
    const state = new RunStateRecorder(this.runId, profile.family, dryRun, this.options.now);

    this.logger.info('Sync run started', { rootId, dryRun });

    try {
      await mapping.load();

      const { records, errors: keyErrors } = normalizeRecordKeys(await reader.read());
      for (const issue of [...(reader.issues ?? []), ...keyErrors]) {
        state.error(issue);
      }

      checkUnique(records, (record) => record.key, { side: 'source' });

      const subtree = await LiveSubtree.fetch(accessor, rootId, {
        leafTypes: profile.children ? [profile.children.assetType] : [],
      });

      checkUnique(subtree.all(), (asset) => profile.keyOf(asset), {
        side: 'catalog',
        describe: (asset) => asset.uuid,
      });

      this.logger.debug('Inputs loaded', { records: records.length, liveAssets: subtree.size });

      const reconciler = new Reconciler({
        profile,
        accessor,
        rootId,
        writeStatus: this.options.writeStatus,
        adoptUnmapped: this.options.adoptUnmapped,
        pacing: this.options.pacing,
        sleep: this.options.sleep,
        logger: this.logger,
      });

      const plan = await reconciler.plan(records, mapping, subtree);

      if (dryRun) {
        reconciler.preview(plan, state);
      } else {
        await reconciler.apply(plan, mapping, subtree, state);
        await mapping.persist();
      }
    } catch (error) {
      const syncError = wrapError(error);
      state.fatal(syncError);
      this.logger.error('Sync run aborted', { code: syncError.code, error: syncError.message });
    }

    const report = state.toReport();
    this.logger.info('Sync run finished', { status: report.status, ...report.counts });
    return report;
  }
}
