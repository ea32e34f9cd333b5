import { createEvent, NoopLogger, type Logger } from '@histree/shared';
import type { CacheStore } from '../cache/store';
import type { CacheRecord } from '../cache/types';
import type { GitDataSource } from '../git/types';
import { scanHistory, type PathMatcher, type ScanStep } from '../scanner';
import type { ChangeEvent, ScanCursor } from '../types';
import { BoundedQueue } from './queue';

/** A batch that is durable in the cache and ready for the aggregator. */
export interface FlushedBatch {
  events: ChangeEvent[];
  commits: number;
  skipped: number;
  cursor: ScanCursor;
}

export interface ScanRunOptions {
  source: GitDataSource;
  store: CacheStore;
  /** Cursor the cache was loaded with, null for a fresh scan */
  cursor: ScanCursor | null;
  /** Live head at scan start */
  head: string | null;
  scope: string;
  matcher?: PathMatcher;
  batchSize: number;
  queueCapacity: number;
  /** Commits that must not be emitted again */
  isRecorded?: (commitId: string) => boolean;
  /** Events already in the cache; these are not appended twice */
  isEventRecorded?: (event: ChangeEvent) => boolean;
  signal?: AbortSignal;
  logger?: Logger;
  sessionId: string;
  /** Called once per durable batch, in commit order */
  onBatch: (batch: FlushedBatch) => void;
}

export interface ScanOutcome {
  status: 'complete' | 'cancelled';
  cursor: ScanCursor | null;
  /** Commits processed during this run */
  commits: number;
  skipped: number;
  events: number;
  durationMs: number;
}

/**
 * Runs one scan as three stages joined by bounded queues: the scanner, a
 * writer that makes each batch durable and then checkpoints it, and the
 * `onBatch` consumer. Aborting `signal` stops the scanner between commits;
 * whatever it already produced is still written and checkpointed.
 */
export async function runScan(options: ScanRunOptions): Promise<ScanOutcome> {
  const logger = options.logger ?? new NoopLogger();
  const startedAt = Date.now();
  const stop = new AbortController();
  const onAbort = () => stop.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });
  if (options.signal?.aborted) {
    stop.abort();
  }

  const steps = new BoundedQueue<ScanStep>(options.queueCapacity);
  const batches = new BoundedQueue<FlushedBatch>(options.queueCapacity);

  let cursor = options.cursor;
  let commits = 0;
  let skipped = 0;
  let events = 0;
  // Failures in the order they happened; later ones are knock-on effects.
  const failures: unknown[] = [];

  const produce = async (): Promise<void> => {
    try {
      const scan = scanHistory(options.source, options.cursor, {
        head: options.head,
        scope: options.scope,
        matcher: options.matcher,
        signal: stop.signal,
        isRecorded: options.isRecorded,
      });
      for await (const step of scan) {
        await steps.push(step);
      }
      steps.close();
    } catch (error) {
      steps.fail(error);
    }
  };

  const flush = async (pending: ScanStep[]): Promise<void> => {
    if (pending.length === 0) {
      return;
    }
    const records: CacheRecord[] = [];
    const batchEvents: ChangeEvent[] = [];
    let batchSkipped = 0;
    for (const step of pending) {
      if (step.kind === 'commit') {
        for (const event of step.events) {
          if (options.isEventRecorded?.(event)) {
            continue;
          }
          records.push({ type: 'event', ...event });
          batchEvents.push(event);
        }
      } else {
        records.push({ type: 'skip', commitId: step.commit.commitId, reason: step.error.message });
        batchSkipped++;
      }
    }

    await options.store.append(records);
    const next: ScanCursor = {
      lastProcessedCommitId: pending[pending.length - 1].commit.commitId,
      processedCount: (cursor?.processedCount ?? 0) + pending.length,
      repoHeadAtScanStart: options.head,
    };
    await options.store.checkpoint(next);
    cursor = next;
    commits += pending.length;
    skipped += batchSkipped;
    events += batchEvents.length;

    await logger.log(
      createEvent(options.sessionId, {
        type: 'BatchFlushed',
        payload: {
          scope: options.scope,
          commits: pending.length,
          events: batchEvents.length,
          processedCount: next.processedCount,
          lastProcessedCommitId: next.lastProcessedCommitId,
        },
      }),
    );
    await batches.push({
      events: batchEvents,
      commits: pending.length,
      skipped: batchSkipped,
      cursor: next,
    });
  };

  const write = async (): Promise<void> => {
    try {
      let pending: ScanStep[] = [];
      let upstream: { error: unknown } | null = null;
      try {
        for await (const step of steps) {
          if (step.kind === 'skipped') {
            await logger.warn(`Skipping commit ${step.commit.commitId}: ${step.error.message}`);
            await logger.log(
              createEvent(options.sessionId, {
                type: 'CommitSkipped',
                payload: { commitId: step.commit.commitId, reason: step.error.message },
              }),
            );
          }
          pending.push(step);
          if (pending.length >= options.batchSize) {
            const batch = pending;
            pending = [];
            await flush(batch);
          }
        }
      } catch (error) {
        upstream = { error };
      }
      // Commits already extracted are written even when the scan stopped early.
      await flush(pending);
      if (upstream) {
        throw upstream.error;
      }
      batches.close();
    } catch (error) {
      failures.push(error);
      stop.abort();
      steps.close();
      batches.fail(error);
      throw error;
    }
  };

  const consume = async (): Promise<void> => {
    try {
      for await (const batch of batches) {
        options.onBatch(batch);
      }
    } catch (error) {
      failures.push(error);
      stop.abort();
      steps.close();
      batches.close();
      throw error;
    }
  };

  try {
    await Promise.allSettled([produce(), write(), consume()]);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
  if (failures.length > 0) {
    throw failures[0];
  }

  const cancelled = options.signal?.aborted ?? false;
  if (!cancelled && options.head !== null && cursor?.lastProcessedCommitId !== options.head) {
    // A path-limited walk may end before the head; record that the head is covered.
    const covered: ScanCursor = {
      lastProcessedCommitId: options.head,
      processedCount: cursor?.processedCount ?? 0,
      repoHeadAtScanStart: options.head,
    };
    await options.store.checkpoint(covered);
    cursor = covered;
  }

  const durationMs = Date.now() - startedAt;
  if (cancelled) {
    await logger.log(
      createEvent(options.sessionId, {
        type: 'ScanCancelled',
        payload: {
          scope: options.scope,
          processedCount: cursor?.processedCount ?? 0,
          lastProcessedCommitId: cursor?.lastProcessedCommitId,
        },
      }),
    );
  } else {
    await logger.log(
      createEvent(options.sessionId, {
        type: 'ScanFinished',
        payload: {
          scope: options.scope,
          processedCount: cursor?.processedCount ?? 0,
          skippedCount: skipped,
          durationMs,
        },
      }),
    );
  }

  return {
    status: cancelled ? 'cancelled' : 'complete',
    cursor,
    commits,
    skipped,
    events,
    durationMs,
  };
}
