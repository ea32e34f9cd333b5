import path from 'path';
import { CacheCorruptionError, createEvent, type Config, type Logger } from '@histree/shared';
import { freshness, type Freshness } from '../cache/freshness';
import { resolveCacheLocation } from '../cache/location';
import type { WriterLockOptions } from '../cache/lock';
import { CacheStore, type CacheSnapshot } from '../cache/store';
import type { CacheIdentity } from '../cache/types';
import type { GitDataSource } from '../git/types';

export interface OpenScopeCacheOptions {
  source: GitDataSource;
  identity: CacheIdentity;
  cacheDir: string;
  /** Discard every record before use */
  refresh?: boolean;
  logger: Logger;
  sessionId: string;
  lockOptions?: WriterLockOptions;
}

export interface OpenedScopeCache {
  store: CacheStore;
  snapshot: CacheSnapshot;
  head: string | null;
  freshness: Freshness;
}

export function resolveCacheDir(repoRoot: string, config: Config): string {
  return path.resolve(repoRoot, config.cache.dir);
}

/**
 * Opens and loads the cache for one scope, recovering from damage and
 * rewritten history by starting over.
 */
export async function openScopeCache(options: OpenScopeCacheOptions): Promise<OpenedScopeCache> {
  const { source, identity, logger } = options;
  const location = resolveCacheLocation(options.cacheDir, identity);
  const store = await CacheStore.open(location, identity, {
    ...options.lockOptions,
    logger,
  });

  try {
    let snapshot: CacheSnapshot;
    try {
      snapshot = await store.load();
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        throw error;
      }
      await logger.warn(`${error.message}; rebuilding the cache`);
      await store.reset();
      snapshot = await store.load();
    }

    if (snapshot.discardedTail || snapshot.corruptLines > 0) {
      await logger.log(
        createEvent(options.sessionId, {
          type: 'CacheRecovered',
          payload: {
            cachePath: location.logPath,
            discardedTail: snapshot.discardedTail,
            corruptLines: snapshot.corruptLines,
          },
        }),
      );
    }

    const head = await source.headId();
    const checkpointed = snapshot.cursor?.lastProcessedCommitId;
    if (options.refresh) {
      await store.reset();
      snapshot = await store.load();
    } else if (checkpointed && !(await source.hasCommit(checkpointed))) {
      await logger.warn(
        `Checkpoint commit ${checkpointed} is no longer in the repository; rescanning from scratch`,
      );
      await store.reset();
      snapshot = await store.load();
    }

    return { store, snapshot, head, freshness: freshness(snapshot.cursor, head) };
  } catch (error) {
    await store.close();
    throw error;
  }
}

/** Commits the cache holds a skip record for. */
export function skippedCommitIds(snapshot: CacheSnapshot): Set<string> {
  return new Set(snapshot.skipped.map((skip) => skip.commitId));
}
