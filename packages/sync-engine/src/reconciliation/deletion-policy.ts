/**
 * Deletion Policy
 *
 * A delete candidate is removed only when nothing is left below it;
 * everything else is flagged for review and kept, mapping entry included.
 */

import type { DeletionDisposition, TargetAsset } from '@catalog-sync/core';
import type { LiveSubtree } from '../live/live-subtree.js';

export class DeletionPolicy {
  /**
   * @param pendingHardDeletes - assets already scheduled for hard deletion in this run;
   *   they no longer count as children of the candidate
   */
  decide(
    candidate: TargetAsset,
    subtree: LiveSubtree,
    pendingHardDeletes: ReadonlySet<string> = new Set()
  ): DeletionDisposition {
    // Children of assets outside the fetched subtree are unknown
    if (!subtree.has(candidate.uuid)) {
      return 'mark-for-review';
    }

    const remaining = subtree.childrenOf(candidate.uuid).filter((child) => !pendingHardDeletes.has(child.uuid));
    return remaining.length === 0 ? 'hard-delete' : 'mark-for-review';
  }
}
