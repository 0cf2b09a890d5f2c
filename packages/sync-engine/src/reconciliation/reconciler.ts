/**
 * Reconciler
 *
 * Classifies each source record against the identity mapping and the live
 * subtree (create / update / unchanged), collects delete candidates, and
 * applies the resulting plan through the catalog accessor.
 *
 * Mapping entries change only after the catalog call they depend on has
 * succeeded; persisting the mapping is left to the caller.
 */

import {
  SyncError,
  StaleMappingError,
  appendToCollectionPath,
  canonicalCollectionPath,
  collectionPathDepth,
  silentLogger,
  sleep,
  wrapError,
  type AssetPatch,
  type AssetStatus,
  type ChildChange,
  type DeletionDisposition,
  type ICatalogAccessor,
  type IMappingStore,
  type Logger,
  type MappingEntry,
  type RunError,
  type SleepFn,
  type SourceRecord,
  type TargetAsset,
} from '@catalog-sync/core';
import type { EntityProfile } from '../families/index.js';
import type { LiveSubtree } from '../live/live-subtree.js';
import type { RunStateRecorder } from '../report/run-state.js';
import { normalizeRecordKeys } from '../duplicates/record-keys.js';
import { diffChildren, type ChildDiff } from './child-diff.js';
import { DeletionPolicy } from './deletion-policy.js';
import { diffPayload, isEmptyPatch } from './field-diff.js';
import type {
  ChildOperation,
  DeleteOperation,
  ParentRef,
  RecordOperation,
  SyncPlan,
} from './plan.js';

export interface PacingOptions {
  /** Wait after every mutating catalog call (default: 0) */
  mutationDelayMs?: number;
}

export interface ReconcilerOptions {
  profile: EntityProfile;
  accessor: ICatalogAccessor;
  /** Sync scope root; parent of records without a parent path */
  rootId: string;
  /** Status written on creates and on restored flagged assets (default: WORKING) */
  writeStatus?: AssetStatus;
  /** Take over live managed assets that have no mapping entry (default: true) */
  adoptUnmapped?: boolean;
  pacing?: PacingOptions;
  sleep?: SleepFn;
  deletionPolicy?: DeletionPolicy;
  logger?: Logger;
}

interface PlanContext {
  mapping: IMappingStore;
  subtree: LiveSubtree;
  /** Managed live assets by natural key */
  managed: ReadonlyMap<string, TargetAsset>;
  /** Desired collection path of each record -> record key */
  desiredPaths: ReadonlyMap<string, string>;
  /** Record key -> its own asset, for records planned so far */
  resolved: Map<string, ParentRef>;
}

export class Reconciler {
  private readonly profile: EntityProfile;
  private readonly accessor: ICatalogAccessor;
  private readonly rootId: string;
  private readonly writeStatus: AssetStatus;
  private readonly adoptUnmapped: boolean;
  private readonly mutationDelayMs: number;
  private readonly sleep: SleepFn;
  private readonly policy: DeletionPolicy;
  private readonly logger: Logger;

  constructor(options: ReconcilerOptions) {
    this.profile = options.profile;
    this.accessor = options.accessor;
    this.rootId = options.rootId;
    this.writeStatus = options.writeStatus ?? 'WORKING';
    this.adoptUnmapped = options.adoptUnmapped ?? true;
    this.mutationDelayMs = Math.max(options.pacing?.mutationDelayMs ?? 0, 0);
    this.sleep = options.sleep ?? sleep;
    this.policy = options.deletionPolicy ?? new DeletionPolicy();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Plan and apply in one go
   */
  async reconcile(
    records: readonly SourceRecord[],
    mapping: IMappingStore,
    subtree: LiveSubtree,
    state: RunStateRecorder
  ): Promise<SyncPlan> {
    const plan = await this.plan(records, mapping, subtree);
    await this.apply(plan, mapping, subtree, state);
    return plan;
  }

  // ---------------------------------------------------------------------------
  // Planning
  // ---------------------------------------------------------------------------

  /**
   * Build the plan. Reads the catalog (existence checks of mapped assets
   * outside the subtree) but never writes to it or to the mapping.
   */
  async plan(source: readonly SourceRecord[], mapping: IMappingStore, subtree: LiveSubtree): Promise<SyncPlan> {
    const { records, errors } = normalizeRecordKeys(source);
    const managed = new Map<string, TargetAsset>();
    for (const asset of subtree.all()) {
      const key = this.profile.keyOf(asset);
      if (key && !managed.has(key)) managed.set(key, asset);
    }

    const desiredPaths = new Map<string, string>();
    for (const record of records) {
      const path = appendToCollectionPath(canonicalCollectionPath(record.parentPath), record.label);
      if (!desiredPaths.has(path)) desiredPaths.set(path, record.key);
    }

    const ctx: PlanContext = { mapping, subtree, managed, desiredPaths, resolved: new Map() };
    const ordered = [...records].sort(
      (a, b) => collectionPathDepth(a.parentPath) - collectionPathDepth(b.parentPath)
    );

    const operations: RecordOperation[] = [];
    const claimed = new Set<string>();

    for (const record of ordered) {
      try {
        const operation = await this.planRecord(record, ctx);
        operations.push(operation);
        if (operation.action === 'create') {
          ctx.resolved.set(record.key, { kind: 'pending', key: record.key });
        } else {
          ctx.resolved.set(record.key, { kind: 'asset', uuid: operation.uuid });
          claimed.add(operation.uuid);
        }
      } catch (error) {
        const syncError = wrapError(error);
        errors.push({ key: record.key, code: syncError.code, message: syncError.message });
        this.logger.warn('Record skipped', { key: record.key, code: syncError.code, error: syncError.message });
        const entry = mapping.get(record.key);
        if (entry) claimed.add(entry.uuid);
        const live = managed.get(record.key);
        if (live) claimed.add(live.uuid);
      }
    }

    const deletes = await this.planDeletes(records, ctx, claimed, errors);

    this.logger.debug('Plan ready', {
      family: this.profile.family,
      records: operations.length,
      deletes: deletes.length,
      errors: errors.length,
    });

    return { family: this.profile.family, records: operations, deletes, errors };
  }

  private async planRecord(record: SourceRecord, ctx: PlanContext): Promise<RecordOperation> {
    const payload = this.profile.buildPayload(record);
    const notes: string[] = [];

    const hasParentHint = record.parentPath !== undefined;
    const desiredParentPath = canonicalCollectionPath(record.parentPath);
    const parent = hasParentHint ? this.resolveParent(desiredParentPath, ctx) : undefined;
    if (hasParentHint && !parent) {
      throw new SyncError({
        code: 'PARENT_NOT_FOUND',
        message: `Parent collection '${desiredParentPath}' of '${record.key}' not found`,
        context: { key: record.key, parentPath: desiredParentPath },
      });
    }

    // Locate the live asset: mapping first (re-verified), then adoption
    const entry = ctx.mapping.get(record.key);
    let live: TargetAsset | undefined;
    let staleEntry: MappingEntry | undefined;

    if (entry) {
      live = ctx.subtree.get(entry.uuid) ?? (await this.accessor.get(entry.uuid)) ?? undefined;
      if (!live) {
        staleEntry = entry;
        notes.push(new StaleMappingError(record.key, entry.uuid).message);
      }
    }

    if (!live && this.adoptUnmapped) {
      live = ctx.managed.get(record.key);
      if (live) {
        notes.push(`Adopted existing asset ${live.uuid}`);
      }
    }

    const base = {
      key: record.key,
      label: payload.label,
      assetType: payload.type,
      depth: collectionPathDepth(desiredParentPath),
      notes,
    };

    if (!live) {
      const childDiff = this.diffChildrenOf(record, [], ctx.subtree);
      return {
        ...base,
        action: 'create',
        payload,
        parent: parent ?? { kind: 'asset', uuid: this.rootId },
        parentPath: desiredParentPath,
        staleEntry,
        children: childDiff.operations,
        childErrors: childDiff.errors,
      };
    }

    const { changes, patch } = diffPayload(payload, live);

    if (live.status === 'FLAGGED') {
      changes.push({ field: 'status', oldValue: live.status, newValue: this.writeStatus });
      patch.status = this.writeStatus;
    }

    const currentParentPath = live.parentId ? ctx.subtree.pathOf(live.parentId) : undefined;
    let move: ParentRef | undefined;
    if (parent && (parent.kind === 'pending' || parent.uuid !== live.parentId)) {
      move = parent;
      changes.push({
        field: 'parentPath',
        oldValue: currentParentPath ?? entry?.parentPath ?? null,
        newValue: desiredParentPath,
      });
    }

    const parentPath = hasParentHint ? desiredParentPath : (currentParentPath ?? entry?.parentPath ?? '');
    const writeMapping =
      !entry || entry.uuid !== live.uuid || entry.parentPath !== parentPath || entry.assetType !== payload.type;

    const liveChildren = ctx.subtree.has(live.uuid)
      ? ctx.subtree.childrenOf(live.uuid)
      : this.profile.children
        ? await this.accessor.listChildren(live.uuid)
        : [];
    const childDiff = this.diffChildrenOf(record, liveChildren, ctx.subtree);
    const childrenChanged = childDiff.operations.some((op) => op.action !== 'unchanged');

    if (changes.length === 0 && !childrenChanged) {
      return {
        ...base,
        action: 'unchanged',
        uuid: live.uuid,
        parentPath,
        writeMapping,
        children: childDiff.operations,
        childErrors: childDiff.errors,
      };
    }

    return {
      ...base,
      action: 'update',
      uuid: live.uuid,
      patch,
      changes,
      move,
      parentPath,
      writeMapping,
      children: childDiff.operations,
      childErrors: childDiff.errors,
    };
  }

  private diffChildrenOf(
    record: SourceRecord,
    live: readonly TargetAsset[],
    subtree: LiveSubtree
  ): ChildDiff {
    const profile = this.profile.children;
    if (!profile) {
      return { operations: [], errors: [] };
    }
    return diffChildren({
      key: record.key,
      desired: record.children ?? [],
      live,
      profile,
      subtree,
      policy: this.policy,
      writeStatus: this.writeStatus,
    });
  }

  /**
   * Same-run desired paths win over live label paths, so renamed or new
   * parents resolve to the asset their record maps to
   */
  private resolveParent(path: string, ctx: PlanContext): ParentRef | undefined {
    if (path === '') {
      return { kind: 'asset', uuid: this.rootId };
    }

    const ownerKey = ctx.desiredPaths.get(path);
    const owner = ownerKey !== undefined ? ctx.resolved.get(ownerKey) : undefined;
    if (owner) {
      return owner;
    }

    const live = ctx.subtree.findByPath(path);
    return live ? { kind: 'asset', uuid: live.uuid } : undefined;
  }

  private async planDeletes(
    records: readonly SourceRecord[],
    ctx: PlanContext,
    claimed: ReadonlySet<string>,
    errors: RunError[]
  ): Promise<DeleteOperation[]> {
    const sourceKeys = new Set(records.map((record) => record.key));
    const candidates: { key: string; asset: TargetAsset; mapped: boolean }[] = [];
    const seen = new Set<string>();
    const forgets: DeleteOperation[] = [];

    for (const [key, asset] of ctx.managed) {
      if (sourceKeys.has(key) || claimed.has(asset.uuid)) continue;
      candidates.push({ key, asset, mapped: ctx.mapping.get(key)?.uuid === asset.uuid });
      seen.add(asset.uuid);
    }

    for (const entry of ctx.mapping.all()) {
      if (sourceKeys.has(entry.key) || seen.has(entry.uuid) || claimed.has(entry.uuid)) continue;

      let asset = ctx.subtree.get(entry.uuid);
      if (!asset) {
        try {
          asset = (await this.accessor.get(entry.uuid)) ?? undefined;
        } catch (error) {
          const syncError = wrapError(error);
          errors.push({ key: entry.key, code: syncError.code, message: syncError.message });
          continue;
        }
      }

      if (!asset) {
        forgets.push({ action: 'forget', key: entry.key, uuid: entry.uuid });
        continue;
      }

      candidates.push({ key: entry.key, asset, mapped: true });
      seen.add(entry.uuid);
    }

    // Deepest first, so children are decided before their parents
    const withDepth = candidates.map((candidate) => ({
      ...candidate,
      depth: ctx.subtree.depthOf(candidate.asset.uuid),
    }));
    withDepth.sort((a, b) => b.depth - a.depth);

    const pending = new Set<string>();
    const deletes: DeleteOperation[] = [...forgets];

    for (const { key, asset, mapped, depth } of withDepth) {
      if (asset.status === 'FLAGGED') {
        deletes.push({ action: 'keep-flagged', key, uuid: asset.uuid, label: asset.label, assetType: asset.type });
        continue;
      }

      const disposition = this.policy.decide(asset, ctx.subtree, pending);
      if (disposition === 'hard-delete') pending.add(asset.uuid);
      deletes.push({
        action: 'delete',
        key,
        uuid: asset.uuid,
        label: asset.label,
        assetType: asset.type,
        depth,
        disposition,
        mapped,
      });
    }

    return deletes;
  }

  // ---------------------------------------------------------------------------
  // Applying
  // ---------------------------------------------------------------------------

  /**
   * Execute the plan: creates and updates first (parents before children),
   * deletes last (deepest first). Failures are recorded per item.
   */
  async apply(plan: SyncPlan, mapping: IMappingStore, subtree: LiveSubtree, state: RunStateRecorder): Promise<void> {
    for (const error of plan.errors) {
      state.error(error);
    }

    const created = new Map<string, string>();

    for (const operation of plan.records) {
      for (const error of operation.childErrors) {
        state.error(error, 'child');
      }
      await this.applyRecord(operation, mapping, subtree, state, created);
    }

    for (const operation of plan.deletes) {
      await this.applyDelete(operation, mapping, subtree, state);
    }
  }

  private async applyRecord(
    operation: RecordOperation,
    mapping: IMappingStore,
    subtree: LiveSubtree,
    state: RunStateRecorder,
    created: Map<string, string>
  ): Promise<void> {
    const { key } = operation;

    switch (operation.action) {
      case 'create': {
        if (operation.staleEntry) {
          mapping.remove(key);
        }

        const parentId = this.resolveRef(operation.parent, created);
        if (!parentId) {
          state.error({
            key,
            code: 'PARENT_NOT_FOUND',
            message: `Parent collection '${operation.parentPath}' of '${key}' was not created`,
          });
          return;
        }

        let asset: TargetAsset;
        try {
          asset = await this.mutate(() =>
            this.accessor.create(parentId, { ...operation.payload, status: this.writeStatus })
          );
        } catch (error) {
          this.fail(state, key, error);
          return;
        }

        subtree.add({ ...asset, parentId });
        mapping.put({ key, assetType: operation.assetType, uuid: asset.uuid, parentPath: operation.parentPath });
        created.set(key, asset.uuid);
        this.logger.info('Created asset', { key, uuid: asset.uuid, label: operation.label });

        const children = await this.applyChildren(operation.children, asset.uuid, key, subtree, state);
        state.item({
          key,
          action: 'created',
          label: operation.label,
          uuid: asset.uuid,
          assetType: operation.assetType,
          changes: [],
          children,
          notes: operation.notes,
        });
        return;
      }

      case 'update': {
        const patch: AssetPatch = { ...operation.patch };
        if (operation.move) {
          const parentId = this.resolveRef(operation.move, created);
          if (!parentId) {
            state.error({
              key,
              code: 'PARENT_NOT_FOUND',
              message: `Parent collection '${operation.parentPath}' of '${key}' was not created`,
            });
            return;
          }
          patch.parentId = parentId;
        }

        const patched = !isEmptyPatch(patch);
        if (patched) {
          try {
            const previous = subtree.get(operation.uuid);
            const updated = await this.mutate(() => this.accessor.update(operation.uuid, patch, true));
            subtree.add({ ...updated, parentId: patch.parentId ?? previous?.parentId ?? updated.parentId });
          } catch (error) {
            this.fail(state, key, error);
            return;
          }
          this.logger.info('Updated asset', {
            key,
            uuid: operation.uuid,
            fields: operation.changes.map((change) => change.field),
          });
        }

        if (operation.writeMapping) {
          mapping.put({ key, assetType: operation.assetType, uuid: operation.uuid, parentPath: operation.parentPath });
        }

        const children = await this.applyChildren(operation.children, operation.uuid, key, subtree, state);
        state.item({
          key,
          action: patched || children.length > 0 ? 'updated' : 'unchanged',
          label: operation.label,
          uuid: operation.uuid,
          assetType: operation.assetType,
          changes: patched ? operation.changes : [],
          children,
          notes: operation.notes,
        });
        return;
      }

      case 'unchanged': {
        if (operation.writeMapping) {
          mapping.put({ key, assetType: operation.assetType, uuid: operation.uuid, parentPath: operation.parentPath });
        }
        for (let i = 0; i < operation.children.length; i++) {
          state.child('unchanged');
        }
        state.item({
          key,
          action: 'unchanged',
          label: operation.label,
          uuid: operation.uuid,
          assetType: operation.assetType,
          changes: [],
          children: [],
          notes: operation.notes,
        });
        return;
      }
    }
  }

  private async applyChildren(
    operations: readonly ChildOperation[],
    parentId: string,
    key: string,
    subtree: LiveSubtree,
    state: RunStateRecorder
  ): Promise<ChildChange[]> {
    const changes: ChildChange[] = [];

    for (const operation of operations) {
      try {
        switch (operation.action) {
          case 'create': {
            const asset = await this.mutate(() =>
              this.accessor.create(parentId, { ...operation.payload, status: this.writeStatus })
            );
            subtree.add({ ...asset, parentId });
            changes.push({ name: operation.name, action: 'created', uuid: asset.uuid, changes: [] });
            state.child('created');
            break;
          }
          case 'update': {
            const updated = await this.mutate(() => this.accessor.update(operation.uuid, operation.patch, true));
            subtree.add({ ...updated, parentId });
            changes.push({ name: operation.name, action: 'updated', uuid: operation.uuid, changes: operation.changes });
            state.child('updated');
            break;
          }
          case 'unchanged':
            state.child('unchanged');
            break;
          case 'delete': {
            const live = subtree.get(operation.uuid);
            const disposition = live ? this.policy.decide(live, subtree) : operation.disposition;
            await this.deleteOrFlag(operation.uuid, disposition, subtree);
            changes.push({ name: operation.name, action: 'deleted', uuid: operation.uuid, disposition, changes: [] });
            state.child('deleted', disposition);
            break;
          }
        }
      } catch (error) {
        const syncError = wrapError(error);
        state.error({ key, child: operation.name, code: syncError.code, message: syncError.message }, 'child');
        this.logger.warn('Child operation failed', { key, child: operation.name, error: syncError.message });
      }
    }

    return changes;
  }

  private async applyDelete(
    operation: DeleteOperation,
    mapping: IMappingStore,
    subtree: LiveSubtree,
    state: RunStateRecorder
  ): Promise<void> {
    switch (operation.action) {
      case 'forget':
        mapping.remove(operation.key);
        this.logger.info('Dropped mapping entry of vanished asset', { key: operation.key, uuid: operation.uuid });
        return;

      case 'keep-flagged':
        state.item({
          key: operation.key,
          action: 'unchanged',
          label: operation.label,
          uuid: operation.uuid,
          assetType: operation.assetType,
          changes: [],
          children: [],
          notes: ['Already flagged for review'],
        });
        return;

      case 'delete': {
        // Re-decide against the current subtree: earlier moves and deletes may have emptied
        // the candidate, a failed child deletion may have kept it non-empty
        const live = subtree.get(operation.uuid);
        const disposition = live ? this.policy.decide(live, subtree) : operation.disposition;

        try {
          await this.deleteOrFlag(operation.uuid, disposition, subtree);
        } catch (error) {
          this.fail(state, operation.key, error);
          return;
        }

        if (disposition === 'hard-delete' && operation.mapped) {
          mapping.remove(operation.key);
        }
        this.logger.info(disposition === 'hard-delete' ? 'Deleted asset' : 'Flagged asset for review', {
          key: operation.key,
          uuid: operation.uuid,
        });

        state.item({
          key: operation.key,
          action: 'deleted',
          label: operation.label,
          uuid: operation.uuid,
          assetType: operation.assetType,
          disposition,
          changes:
            disposition === 'mark-for-review'
              ? [{ field: 'status', oldValue: live?.status, newValue: 'FLAGGED' }]
              : [],
          children: [],
          notes: [],
        });
        return;
      }
    }
  }

  private async deleteOrFlag(uuid: string, disposition: DeletionDisposition, subtree: LiveSubtree): Promise<void> {
    if (disposition === 'hard-delete') {
      await this.mutate(() => this.accessor.delete(uuid));
      subtree.remove(uuid);
      return;
    }

    const previous = subtree.get(uuid);
    const flagged = await this.mutate(() => this.accessor.markForReview(uuid));
    if (previous) {
      subtree.add({ ...flagged, parentId: previous.parentId });
    }
  }

  // ---------------------------------------------------------------------------
  // Preview (dry run)
  // ---------------------------------------------------------------------------

  /**
   * Record the plan as if it had been applied, without any catalog or mapping writes
   */
  preview(plan: SyncPlan, state: RunStateRecorder): void {
    for (const error of plan.errors) {
      state.error(error);
    }

    for (const operation of plan.records) {
      for (const error of operation.childErrors) {
        state.error(error, 'child');
      }

      const children: ChildChange[] = [];
      for (const child of operation.children) {
        const change = toChildChange(child);
        state.child(change.action, change.disposition);
        if (change.action !== 'unchanged') children.push(change);
      }

      state.item({
        key: operation.key,
        action: operation.action === 'create' ? 'created' : operation.action === 'update' ? 'updated' : 'unchanged',
        label: operation.label,
        uuid: operation.action === 'create' ? undefined : operation.uuid,
        assetType: operation.assetType,
        changes: operation.action === 'update' ? operation.changes : [],
        children,
        notes: operation.notes,
      });
    }

    for (const operation of plan.deletes) {
      if (operation.action === 'forget') continue;
      state.item({
        key: operation.key,
        action: operation.action === 'delete' ? 'deleted' : 'unchanged',
        label: operation.label,
        uuid: operation.uuid,
        assetType: operation.assetType,
        disposition: operation.action === 'delete' ? operation.disposition : undefined,
        changes: [],
        children: [],
        notes: operation.action === 'keep-flagged' ? ['Already flagged for review'] : [],
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private resolveRef(ref: ParentRef, created: ReadonlyMap<string, string>): string | undefined {
    return ref.kind === 'asset' ? ref.uuid : created.get(ref.key);
  }

  /** Run a mutating catalog call, then wait the configured pacing delay */
  private async mutate<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } finally {
      if (this.mutationDelayMs > 0) {
        await this.sleep(this.mutationDelayMs);
      }
    }
  }

  private fail(state: RunStateRecorder, key: string, error: unknown): void {
    const syncError = wrapError(error);
    state.error({ key, code: syncError.code, message: syncError.message });
    this.logger.warn('Catalog call failed', { key, code: syncError.code, error: syncError.message });
  }
}

function toChildChange(operation: ChildOperation): ChildChange {
  switch (operation.action) {
    case 'create':
      return { name: operation.name, action: 'created', changes: [] };
    case 'update':
      return { name: operation.name, action: 'updated', uuid: operation.uuid, changes: operation.changes };
    case 'unchanged':
      return { name: operation.name, action: 'unchanged', uuid: operation.uuid, changes: [] };
    case 'delete':
      return {
        name: operation.name,
        action: 'deleted',
        uuid: operation.uuid,
        disposition: operation.disposition,
        changes: [],
      };
  }
}
