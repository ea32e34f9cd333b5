import type { SortKey } from '@histree/shared';
import { statsOf, type LoadState, type NodeKind, type NodeStats, type PathNode, type StatsAggregator } from '../aggregator';
import { TypedEmitter } from '../events';
import type { LazyLoadController } from '../lazy/controller';
import type { ActivitySession, SessionStatus } from '../pipeline/session';
import { ROOT_PATH, toRepoPath } from '../paths';

export interface NodeView {
  path: string;
  name: string;
  kind: NodeKind;
  loadState: LoadState;
  /** Null while the node has no aggregate, and for the root in lazy mode */
  stats: NodeStats | null;
  childCount: number;
  expanded: boolean;
  /** Last load failure, lazy mode only */
  error?: string;
}

export type BrowseMode = 'full' | 'lazy';

export interface NavigationStatus {
  mode: BrowseMode;
  sortKey: SortKey;
  /** Progress of the background scan, full mode only */
  scan: SessionStatus | null;
  pendingLoads: number;
}

export interface NavigationUpdate {
  reason: 'scan' | 'status' | 'subtree' | 'sort' | 'expand' | 'collapse';
  path?: string;
}

/**
 * What a front end reads. Every call returns immediately from the latest
 * applied state; background work is reported through {@link onUpdate}.
 */
export interface NavigationModel {
  getNode(path: string): NodeView | undefined;
  children(path: string): NodeView[];
  readonly sortKey: SortKey;
  setSortKey(key: SortKey): void;
  requestExpand(path: string): void;
  collapse(path: string): void;
  onUpdate(callback: (update: NavigationUpdate) => void): () => void;
  status(): NavigationStatus;
}

export type NavigatorSource =
  | { mode: 'full'; session: ActivitySession }
  | { mode: 'lazy'; controller: LazyLoadController };

type NavigatorEvents = {
  update: NavigationUpdate;
};

export class ActivityNavigator implements NavigationModel {
  private readonly emitter = new TypedEmitter<NavigatorEvents>();
  private readonly expanded = new Set<string>([ROOT_PATH]);
  private readonly unsubscribe: Array<() => void> = [];
  private currentSortKey: SortKey;

  constructor(
    private readonly source: NavigatorSource,
    sortKey: SortKey,
  ) {
    this.currentSortKey = sortKey;
    if (source.mode === 'full') {
      this.unsubscribe.push(
        source.session.on('update', () => this.notify({ reason: 'scan' })),
        source.session.on('status', () => this.notify({ reason: 'status' })),
      );
    } else {
      this.unsubscribe.push(
        source.controller.onUpdate((update) => this.notify({ reason: 'subtree', path: update.path })),
      );
    }
  }

  get sortKey(): SortKey {
    return this.currentSortKey;
  }

  private get tree(): StatsAggregator {
    return this.source.mode === 'full' ? this.source.session.aggregator : this.source.controller.tree;
  }

  getNode(path: string): NodeView | undefined {
    const node = this.tree.getNode(path);
    return node ? this.toView(node) : undefined;
  }

  children(path: string): NodeView[] {
    const node = this.tree.getNode(path);
    if (!node) {
      return [];
    }
    return this.tree.sortedChildren(node, this.currentSortKey).map((child) => this.toView(child));
  }

  setSortKey(key: SortKey): void {
    if (key === this.currentSortKey) {
      return;
    }
    this.currentSortKey = key;
    this.notify({ reason: 'sort' });
  }

  /** Marks `path` expanded; in lazy mode this also starts loading it. */
  requestExpand(path: string): void {
    // Load failures are recorded on the node, expand() never rejects.
    void this.expand(path);
  }

  /** Like {@link requestExpand}, resolving once a lazy load has settled. */
  async expand(path: string, signal?: AbortSignal): Promise<void> {
    const target = toRepoPath(path);
    this.expanded.add(target);
    this.notify({ reason: 'expand', path: target });
    if (this.source.mode === 'lazy') {
      await this.source.controller.expand(target, signal);
    }
  }

  /** Hides children; loaded aggregates are kept. */
  collapse(path: string): void {
    const target = toRepoPath(path);
    if (this.expanded.delete(target)) {
      this.notify({ reason: 'collapse', path: target });
    }
  }

  isExpanded(path: string): boolean {
    return this.expanded.has(toRepoPath(path));
  }

  onUpdate(callback: (update: NavigationUpdate) => void): () => void {
    return this.emitter.on('update', callback);
  }

  status(): NavigationStatus {
    return {
      mode: this.source.mode,
      sortKey: this.currentSortKey,
      scan: this.source.mode === 'full' ? this.source.session.status() : null,
      pendingLoads: this.source.mode === 'lazy' ? this.source.controller.pending : 0,
    };
  }

  dispose(): void {
    for (const off of this.unsubscribe.splice(0)) {
      off();
    }
    this.emitter.removeAllListeners();
  }

  private toView(node: PathNode): NodeView {
    const lazy = this.source.mode === 'lazy';
    const hasAggregate = !lazy || (node.path !== ROOT_PATH && node.loadState === 'loaded');
    const view: NodeView = {
      path: node.path,
      name: node.name,
      kind: node.kind,
      loadState: node.loadState,
      stats: hasAggregate ? statsOf(node) : null,
      childCount: node.children.size,
      expanded: this.expanded.has(node.path),
    };
    const error = this.source.mode === 'lazy' ? this.source.controller.error(node.path) : undefined;
    if (error) {
      view.error = error;
    }
    return view;
  }
}
