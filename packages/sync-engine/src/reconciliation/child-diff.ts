/**
 * Child Diff
 *
 * Diffs the child items of a composite record against the live child
 * assets of its target, matching by technical name. Children whose type
 * cannot be mapped are reported and their live counterpart is left alone.
 */

import {
  SyncError,
  normalizeKey,
  wrapError,
  type AssetPayload,
  type AssetStatus,
  type ChildItem,
  type RunError,
  type TargetAsset,
} from '@catalog-sync/core';
import type { ChildProfile } from '../families/index.js';
import { findDuplicateKeys } from '../duplicates/duplicate-guard.js';
import type { LiveSubtree } from '../live/live-subtree.js';
import type { DeletionPolicy } from './deletion-policy.js';
import { diffPayload, isEmptyPatch } from './field-diff.js';
import type { ChildOperation } from './plan.js';

export interface ChildDiffInput {
  /** Natural key of the parent record */
  key: string;
  desired: readonly ChildItem[];
  /** All live children of the parent asset */
  live: readonly TargetAsset[];
  profile: ChildProfile;
  subtree: LiveSubtree;
  policy: DeletionPolicy;
  writeStatus: AssetStatus;
}

export interface ChildDiff {
  operations: ChildOperation[];
  errors: RunError[];
}

function describeCollisions(collisions: { key: string; identifiers: string[] }[]): string {
  return collisions.map((c) => `'${c.key}' (${c.identifiers.join(', ')})`).join('; ');
}

/**
 * @throws SyncError DUPLICATE_CHILD when names collide on either side
 */
export function diffChildren(input: ChildDiffInput): ChildDiff {
  const { key, profile, subtree, policy, writeStatus } = input;

  const desiredDuplicates = findDuplicateKeys(input.desired, (item) => normalizeKey(item.name));
  if (desiredDuplicates.length > 0) {
    throw new SyncError({
      code: 'DUPLICATE_CHILD',
      message: `Duplicate child names in record '${key}': ${describeCollisions(desiredDuplicates)}`,
      context: { key, collisions: desiredDuplicates },
    });
  }

  const managed = input.live.filter((asset) => profile.keyOf(asset) !== undefined);
  const liveDuplicates = findDuplicateKeys(managed, (asset) => profile.keyOf(asset), (asset) => asset.uuid);
  if (liveDuplicates.length > 0) {
    throw new SyncError({
      code: 'DUPLICATE_CHILD',
      message: `Duplicate child names below the asset of '${key}': ${describeCollisions(liveDuplicates)}`,
      context: { key, collisions: liveDuplicates },
    });
  }

  const liveByName = new Map<string, TargetAsset>();
  for (const asset of managed) {
    const name = profile.keyOf(asset);
    if (name) liveByName.set(name, asset);
  }

  const operations: ChildOperation[] = [];
  const errors: RunError[] = [];
  const wanted = new Set<string>();

  for (const item of input.desired) {
    const name = normalizeKey(item.name);
    wanted.add(name);

    let payload: AssetPayload;
    try {
      payload = profile.buildPayload(item);
    } catch (error) {
      const syncError = wrapError(error, 'INVALID_RECORD');
      errors.push({ key, child: name, code: syncError.code, message: syncError.message });
      continue;
    }

    const live = liveByName.get(name);
    if (!live) {
      operations.push({ action: 'create', name, label: payload.label, payload });
      continue;
    }

    const { changes, patch } = diffPayload(payload, live);
    if (live.status === 'FLAGGED') {
      changes.push({ field: 'status', oldValue: live.status, newValue: writeStatus });
      patch.status = writeStatus;
    }

    operations.push(
      isEmptyPatch(patch)
        ? { action: 'unchanged', name, label: live.label, uuid: live.uuid }
        : { action: 'update', name, label: payload.label, uuid: live.uuid, patch, changes }
    );
  }

  const pending = new Set<string>();
  for (const [name, live] of liveByName) {
    if (wanted.has(name)) continue;

    if (live.status === 'FLAGGED') {
      operations.push({ action: 'unchanged', name, label: live.label, uuid: live.uuid });
      continue;
    }

    const disposition = policy.decide(live, subtree, pending);
    if (disposition === 'hard-delete') pending.add(live.uuid);
    operations.push({ action: 'delete', name, label: live.label, uuid: live.uuid, disposition });
  }

  return { operations, errors };
}
