import { NoopLogger, type Logger } from '@histree/shared';
import { StatsAggregator, type LoadState, type PathNode } from '../aggregator';
import { TypedEmitter } from '../events';
import type { GitDataSource } from '../git/types';
import { parentPath, ROOT_PATH, toRepoPath } from '../paths';
import type { PathMatcher } from '../scanner';
import type { SubtreeLoader } from './loader';

export interface SubtreeUpdate {
  path: string;
  state: LoadState;
  error?: string;
}

type LazyEvents = {
  update: SubtreeUpdate;
};

/**
 * Tree of tracked files with no stats yet. The root is loaded but carries no
 * aggregate; every other node starts unloaded.
 */
export async function buildSkeleton(source: GitDataSource, matcher: PathMatcher): Promise<StatsAggregator> {
  const tree = new StatsAggregator();
  for (const file of await source.listFiles()) {
    const path = toRepoPath(file);
    if (path && matcher(path)) {
      tree.ensureNode(path, 'file', 'unloaded');
    }
  }
  return tree;
}

export interface LazyLoadControllerOptions {
  tree: StatsAggregator;
  loader: SubtreeLoader;
  logger?: Logger;
}

/**
 * Loads subtree aggregates when they are first expanded.
 */
export class LazyLoadController {
  readonly tree: StatsAggregator;
  private readonly loader: SubtreeLoader;
  private readonly logger: Logger;
  private readonly emitter = new TypedEmitter<LazyEvents>();
  private readonly inflight = new Map<string, Promise<void>>();
  private readonly errors = new Map<string, string>();

  constructor(options: LazyLoadControllerOptions) {
    this.tree = options.tree;
    this.loader = options.loader;
    this.logger = options.logger ?? new NoopLogger();
  }

  state(path: string): LoadState | undefined {
    return this.tree.getNode(path)?.loadState;
  }

  /** Message of the last failed load of `path`, cleared by a successful one. */
  error(path: string): string | undefined {
    return this.errors.get(toRepoPath(path));
  }

  get pending(): number {
    return this.inflight.size;
  }

  onUpdate(listener: (update: SubtreeUpdate) => void): () => void {
    return this.emitter.on('update', listener);
  }

  /**
   * Loads the subtree at `path` unless it is loaded already. Requests for a
   * path that is loading share its run. Failures are recorded, not thrown.
   */
  expand(path: string, signal?: AbortSignal): Promise<void> {
    const target = toRepoPath(path);
    const running = this.inflight.get(target);
    if (running) {
      return running;
    }

    const node = this.tree.getNode(target);
    if (!node) {
      this.fail(target, new Error(`No tracked path '${target}'`));
      return Promise.resolve();
    }
    if (node.loadState === 'loaded') {
      return Promise.resolve();
    }

    this.setState(node, 'loading');
    const run = this.load(node, signal).finally(() => {
      this.inflight.delete(target);
    });
    this.inflight.set(target, run);
    return run;
  }

  private async load(node: PathNode, signal?: AbortSignal): Promise<void> {
    try {
      const result = await this.loader(node.path, signal);
      if (!result.complete) {
        this.setState(node, 'unloaded');
        return;
      }
      this.graft(node, result.aggregator.root);
      this.errors.delete(node.path);
      this.emitter.emit('update', { path: node.path, state: 'loaded' });
    } catch (error) {
      node.loadState = 'unloaded';
      this.fail(node.path, error);
      await this.logger.error(
        error instanceof Error ? error : new Error(String(error)),
        `Failed to load history for '${node.path}'`,
      );
    }
  }

  private graft(skeleton: PathNode, loaded: PathNode): void {
    loaded.loadState = 'loaded';
    if (loaded.children.size === 0) {
      loaded.kind = skeleton.kind;
    }
    if (skeleton.path === ROOT_PATH) {
      return;
    }
    const parent = this.tree.getNode(parentPath(skeleton.path));
    parent?.children.set(skeleton.name, loaded);
  }

  private setState(node: PathNode, state: LoadState): void {
    node.loadState = state;
    this.emitter.emit('update', { path: node.path, state });
  }

  private fail(path: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.errors.set(path, message);
    this.emitter.emit('update', { path, state: 'unloaded', error: message });
  }
}
