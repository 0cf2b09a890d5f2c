/**
 * Live Subtree
 *
 * Snapshot of the catalog below the sync scope root, fetched breadth-first
 * through the accessor. The reconciler keeps it current while applying
 * mutations so that later decisions (parent lookup, deletion policy) see
 * the effects of earlier ones.
 */

import {
  RemoteError,
  appendToCollectionPath,
  splitCollectionPath,
  type ICatalogAccessor,
  type TargetAsset,
} from '@catalog-sync/core';

export interface FetchSubtreeOptions {
  /** Asset types whose children are not listed (leaf assets such as attributes) */
  leafTypes?: Iterable<string>;
}

export class LiveSubtree {
  private readonly assets = new Map<string, TargetAsset>();
  private readonly childIds = new Map<string, string[]>();

  constructor(
    readonly root: TargetAsset,
    descendants: Iterable<TargetAsset> = []
  ) {
    this.assets.set(root.uuid, root);
    for (const asset of descendants) {
      this.add(asset);
    }
  }

  /**
   * Fetch the scope root and everything below it
   * @throws RemoteError when the root does not exist or a listing fails
   */
  static async fetch(
    accessor: ICatalogAccessor,
    rootId: string,
    options: FetchSubtreeOptions = {}
  ): Promise<LiveSubtree> {
    const root = await accessor.get(rootId);
    if (!root) {
      throw new RemoteError(`Sync scope root ${rootId} not found in catalog`, { status: 404 });
    }

    const leafTypes = new Set(options.leafTypes ?? []);
    const subtree = new LiveSubtree(root);
    const queue: string[] = [root.uuid];

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      for (const child of await accessor.listChildren(next)) {
        if (subtree.has(child.uuid)) continue;
        subtree.add({ ...child, parentId: next });
        if (!leafTypes.has(child.type)) {
          queue.push(child.uuid);
        }
      }
    }

    return subtree;
  }

  get size(): number {
    return this.assets.size;
  }

  has(uuid: string): boolean {
    return this.assets.has(uuid);
  }

  get(uuid: string): TargetAsset | undefined {
    return this.assets.get(uuid);
  }

  /** Every asset below the root, breadth-first */
  all(): TargetAsset[] {
    const out: TargetAsset[] = [];
    const queue = [this.root.uuid];
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      for (const child of this.childrenOf(next)) {
        out.push(child);
        queue.push(child.uuid);
      }
    }
    return out;
  }

  childrenOf(uuid: string): TargetAsset[] {
    const ids = this.childIds.get(uuid) ?? [];
    const out: TargetAsset[] = [];
    for (const id of ids) {
      const asset = this.assets.get(id);
      if (asset) out.push(asset);
    }
    return out;
  }

  /** Number of ancestors below the root (root children have depth 1); 0 when not in the subtree */
  depthOf(uuid: string): number {
    let depth = 0;
    let current = this.assets.get(uuid);
    while (current && current.uuid !== this.root.uuid) {
      depth++;
      current = current.parentId ? this.assets.get(current.parentId) : undefined;
    }
    return current ? depth : 0;
  }

  /**
   * Collection path of an asset relative to the root ('' for the root itself);
   * undefined when the asset is not connected to the root
   */
  pathOf(uuid: string): string | undefined {
    const labels: string[] = [];
    let current = this.assets.get(uuid);
    while (current && current.uuid !== this.root.uuid) {
      labels.unshift(current.label);
      current = current.parentId ? this.assets.get(current.parentId) : undefined;
    }
    if (!current) return undefined;
    return labels.reduce((path, label) => appendToCollectionPath(path, label), '');
  }

  /** Resolve a collection path by walking labels down from the root; first match wins */
  findByPath(path: string): TargetAsset | undefined {
    let current: TargetAsset | undefined = this.root;
    for (const label of splitCollectionPath(path)) {
      if (!current) return undefined;
      const parentId: string = current.uuid;
      current = this.childrenOf(parentId).find((child) => child.label === label);
    }
    return current;
  }

  /** Insert or replace an asset, re-linking it when its parent changed */
  add(asset: TargetAsset): void {
    const previous = this.assets.get(asset.uuid);
    if (previous && previous.parentId !== asset.parentId) {
      this.unlink(previous);
    }
    this.assets.set(asset.uuid, asset);
    if ((!previous || previous.parentId !== asset.parentId) && asset.parentId) {
      const siblings = this.childIds.get(asset.parentId);
      if (siblings) {
        siblings.push(asset.uuid);
      } else {
        this.childIds.set(asset.parentId, [asset.uuid]);
      }
    }
  }

  remove(uuid: string): void {
    const asset = this.assets.get(uuid);
    if (!asset || uuid === this.root.uuid) return;
    this.unlink(asset);
    this.assets.delete(uuid);
  }

  private unlink(asset: TargetAsset): void {
    if (!asset.parentId) return;
    const siblings = this.childIds.get(asset.parentId);
    if (!siblings) return;
    const index = siblings.indexOf(asset.uuid);
    if (index >= 0) siblings.splice(index, 1);
  }
}
