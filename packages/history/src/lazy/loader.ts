import { CacheCorruptionError, createEvent, NoopLogger, type Config, type Logger } from '@histree/shared';
import { StatsAggregator } from '../aggregator';
import { freshness } from '../cache/freshness';
import { resolveCacheLocation } from '../cache/location';
import type { WriterLockOptions } from '../cache/lock';
import { CacheStore, type CacheSnapshot } from '../cache/store';
import type { CacheRecord } from '../cache/types';
import type { GitDataSource } from '../git/types';
import { openScopeCache, resolveCacheDir, skippedCommitIds } from '../pipeline/open';
import { runScan } from '../pipeline/runner';
import { isWithinScope, ROOT_PATH } from '../paths';
import type { PathMatcher } from '../scanner';

export interface LoadedSubtree {
  aggregator: StatsAggregator;
  source: 'shared-cache' | 'scoped-scan';
  /** False when the scan was cancelled before reaching the head */
  complete: boolean;
}

export type SubtreeLoader = (path: string, signal?: AbortSignal) => Promise<LoadedSubtree>;

export interface SubtreeLoaderOptions {
  repoRoot: string;
  source: GitDataSource;
  config: Config;
  matcher: PathMatcher;
  /** Discard each subtree's cache before its first load */
  refresh?: boolean;
  logger?: Logger;
  sessionId: string;
  lockOptions?: WriterLockOptions;
}

/**
 * Aggregates one subtree on demand. A full-repository cache that already
 * covers the head answers directly; otherwise the subtree gets its own cache
 * and a path-limited scan. An empty subtree cache starts from whatever a
 * partial or stale full-repository cache already holds.
 */
export function createSubtreeLoader(options: SubtreeLoaderOptions): SubtreeLoader {
  const logger = options.logger ?? new NoopLogger();
  const cacheDir = resolveCacheDir(options.repoRoot, options.config);
  const glob = options.config.scan.glob;

  const inspectSharedCache = async (path: string): Promise<CacheSnapshot | null> => {
    const location = resolveCacheLocation(cacheDir, { repoRoot: options.repoRoot, glob, scope: ROOT_PATH });
    try {
      return await CacheStore.inspect(location);
    } catch (error) {
      if (error instanceof CacheCorruptionError) {
        await logger.debug(`Shared cache unusable for ${path}: ${error.message}`);
        return null;
      }
      throw error;
    }
  };

  /**
   * Copies the shared cache's in-scope records and its checkpoint into an
   * empty subtree cache, so the scan only walks commits after that checkpoint.
   */
  const seedFromSharedCache = async (
    path: string,
    store: CacheStore,
    shared: CacheSnapshot,
  ): Promise<CacheSnapshot | null> => {
    const cursor = shared.cursor;
    if (!cursor || !(await options.source.hasCommit(cursor.lastProcessedCommitId))) {
      return null;
    }
    const events = shared.events.filter((event) => isWithinScope(event.path, path));
    const records: CacheRecord[] = [
      ...events.map((event): CacheRecord => ({ type: 'event', ...event })),
      ...shared.skipped.map((skip): CacheRecord => ({ type: 'skip', ...skip })),
    ];
    await store.append(records);
    await store.checkpoint(cursor);
    await logger.debug(
      `Seeded ${path} with ${events.length} events up to ${cursor.lastProcessedCommitId} from the shared cache`,
    );
    return { ...shared, events, cursor };
  };

  return async (path, signal) => {
    const startedAt = Date.now();
    const head = await options.source.headId();

    const shared = options.refresh ? null : await inspectSharedCache(path);
    const sharedFreshness = freshness(shared?.cursor ?? null, head);
    if (shared && sharedFreshness === 'current') {
      const aggregator = new StatsAggregator({ scope: path });
      aggregator.applyAll(shared.events);
      await logSubtree(path, 'shared-cache', aggregator.eventCount, startedAt);
      return { aggregator, source: 'shared-cache', complete: true };
    }

    const opened = await openScopeCache({
      source: options.source,
      identity: { repoRoot: options.repoRoot, glob, scope: path },
      cacheDir,
      refresh: options.refresh,
      logger: logger.child({ scope: path }),
      sessionId: options.sessionId,
      lockOptions: options.lockOptions,
    });
    const aggregator = new StatsAggregator({ scope: path });
    let complete: boolean;
    try {
      let snapshot = opened.snapshot;
      if (shared && sharedFreshness !== 'empty' && isEmptyCache(snapshot)) {
        snapshot = (await seedFromSharedCache(path, opened.store, shared)) ?? snapshot;
      }
      aggregator.rebuild(snapshot.events);
      const skipped = skippedCommitIds(snapshot);
      const outcome = await runScan({
        source: options.source,
        store: opened.store,
        cursor: snapshot.cursor,
        head: opened.head,
        scope: path,
        matcher: options.matcher,
        batchSize: options.config.scan.batchSize,
        queueCapacity: options.config.scan.queueCapacity,
        isRecorded: (commitId) => skipped.has(commitId),
        isEventRecorded: (event) => aggregator.hasEvent(event),
        signal,
        logger,
        sessionId: options.sessionId,
        onBatch: (batch) => {
          aggregator.applyAll(batch.events);
        },
      });
      complete = outcome.status === 'complete';
    } finally {
      await opened.store.close();
    }

    if (complete) {
      await logSubtree(path, 'scoped-scan', aggregator.eventCount, startedAt);
    }
    return { aggregator, source: 'scoped-scan', complete };
  };

  async function logSubtree(
    path: string,
    source: LoadedSubtree['source'],
    events: number,
    startedAt: number,
  ): Promise<void> {
    await logger.log(
      createEvent(options.sessionId, {
        type: 'SubtreeLoaded',
        payload: { path, source, events, durationMs: Date.now() - startedAt },
      }),
    );
  }
}

function isEmptyCache(snapshot: CacheSnapshot): boolean {
  return !snapshot.cursor && snapshot.events.length === 0 && snapshot.skipped.length === 0;
}
