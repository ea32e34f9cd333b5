import { baseName, isWithinScope, joinRepoPath, ROOT_PATH, splitRepoPath, toRepoPath } from '../paths';
import { eventKey, type ChangeEvent } from '../types';
import type { SortKey } from '@histree/shared';
import type { LoadState, NodeKind, NodeStats, PathNode } from './types';

export * from './types';
export * from './summary';

export function createNode(path: string, kind: NodeKind, loadState: LoadState = 'loaded'): PathNode {
  return {
    name: path === ROOT_PATH ? '' : baseName(path),
    path,
    kind,
    children: new Map(),
    commitIds: new Set(),
    authors: new Set(),
    insertions: 0,
    deletions: 0,
    latestChange: null,
    firstChange: null,
    latestAuthor: null,
    latestCommitId: null,
    loadState,
  };
}

export function statsOf(node: PathNode): NodeStats {
  return {
    commitCount: node.commitIds.size,
    insertions: node.insertions,
    deletions: node.deletions,
    totalChanges: node.insertions + node.deletions,
    authorCount: node.authors.size,
    latestChange: node.latestChange,
    firstChange: node.firstChange,
    latestAuthor: node.latestAuthor,
    latestCommitId: node.latestCommitId,
  };
}

function fold(node: PathNode, event: ChangeEvent): void {
  node.commitIds.add(event.commitId);
  node.authors.add(event.author);
  node.insertions += event.insertions;
  node.deletions += event.deletions;
  if (node.latestChange === null || event.timestamp >= node.latestChange) {
    node.latestChange = event.timestamp;
    node.latestAuthor = event.author;
    node.latestCommitId = event.commitId;
  }
  if (node.firstChange === null || event.timestamp < node.firstChange) {
    node.firstChange = event.timestamp;
  }
}

function metric(node: PathNode, key: SortKey): number | null {
  switch (key) {
    case 'commitCount':
      return node.commitIds.size;
    case 'latestChange':
      return node.latestChange;
    case 'totalChanges':
      return node.insertions + node.deletions;
    case 'authorCount':
      return node.authors.size;
  }
}

/**
 * Orders by `key` descending; nodes without a value go last; ties by name.
 */
export function compareNodes(a: PathNode, b: PathNode, key: SortKey): number {
  const left = metric(a, key);
  const right = metric(b, key);
  if (left !== right) {
    if (left === null) return 1;
    if (right === null) return -1;
    return right - left;
  }
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export interface StatsAggregatorOptions {
  /** Subtree the tree is rooted at; events outside it are ignored */
  scope?: string;
}

/**
 * Folds change events into an in-memory activity tree.
 */
export class StatsAggregator {
  readonly scope: string;
  private rootNode: PathNode;
  private applied = new Set<string>();

  constructor(options: StatsAggregatorOptions = {}) {
    this.scope = toRepoPath(options.scope ?? ROOT_PATH);
    this.rootNode = createNode(this.scope, 'dir');
  }

  get root(): PathNode {
    return this.rootNode;
  }

  get eventCount(): number {
    return this.applied.size;
  }

  /**
   * Folds one event into its file and every ancestor.
   * Returns false when the event lies outside the scope or was already applied.
   */
  apply(event: ChangeEvent): boolean {
    if (!isWithinScope(event.path, this.scope)) {
      return false;
    }
    const key = eventKey(event);
    if (this.applied.has(key)) {
      return false;
    }
    this.applied.add(key);

    let node = this.rootNode;
    fold(node, event);
    for (const segment of this.relativeSegments(event.path)) {
      node = this.childOf(node, segment);
      fold(node, event);
    }
    if (node.children.size === 0) {
      node.kind = 'file';
    }
    return true;
  }

  hasEvent(event: Pick<ChangeEvent, 'path' | 'commitId'>): boolean {
    return this.applied.has(eventKey(event));
  }

  applyAll(events: Iterable<ChangeEvent>): number {
    let applied = 0;
    for (const event of events) {
      if (this.apply(event)) {
        applied++;
      }
    }
    return applied;
  }

  /** Replaces the tree with one folded from `events` in order. */
  rebuild(events: Iterable<ChangeEvent>): void {
    this.rootNode = createNode(this.scope, 'dir');
    this.applied = new Set();
    this.applyAll(events);
  }

  getNode(path: string): PathNode | undefined {
    const target = toRepoPath(path);
    if (!isWithinScope(target, this.scope)) {
      return undefined;
    }
    let node: PathNode | undefined = this.rootNode;
    for (const segment of this.relativeSegments(target)) {
      node = node.children.get(segment);
      if (!node) {
        return undefined;
      }
    }
    return node;
  }

  /**
   * Adds a node without stats, creating missing ancestors. Used for the lazy skeleton.
   */
  ensureNode(path: string, kind: NodeKind, loadState: LoadState): PathNode {
    let node = this.rootNode;
    const segments = this.relativeSegments(toRepoPath(path));
    segments.forEach((segment, index) => {
      const last = index === segments.length - 1;
      node = this.childOf(node, segment, last ? kind : 'dir', loadState);
    });
    return node;
  }

  sortedChildren(node: PathNode, key: SortKey): PathNode[] {
    return [...node.children.values()].sort((a, b) => compareNodes(a, b, key));
  }

  private relativeSegments(path: string): string[] {
    if (this.scope === ROOT_PATH) {
      return splitRepoPath(path);
    }
    return path === this.scope ? [] : splitRepoPath(path.slice(this.scope.length + 1));
  }

  private childOf(
    parent: PathNode,
    name: string,
    kind: NodeKind = 'dir',
    loadState: LoadState = 'loaded',
  ): PathNode {
    let child = parent.children.get(name);
    if (!child) {
      child = createNode(joinRepoPath(parent.path, name), kind, loadState);
      parent.children.set(name, child);
    }
    parent.kind = 'dir';
    return child;
  }
}
