import { randomUUID } from 'crypto';
import { createEvent, NoopLogger, type Config, type Logger } from '@histree/shared';
import { StatsAggregator } from '../aggregator';
import type { Freshness } from '../cache/freshness';
import type { WriterLockOptions } from '../cache/lock';
import type { CacheStore } from '../cache/store';
import { TypedEmitter } from '../events';
import type { GitDataSource } from '../git/types';
import { toRepoPath } from '../paths';
import { compileGlob, type PathMatcher } from '../scanner';
import type { ScanCursor } from '../types';
import { openScopeCache, skippedCommitIds, resolveCacheDir } from './open';
import { runScan, type FlushedBatch, type ScanOutcome } from './runner';

export type ScanPhase = 'idle' | 'scanning' | 'complete' | 'cancelled' | 'failed';

export interface SessionStatus {
  phase: ScanPhase;
  /** Freshness of the cache when the session opened */
  freshness: Freshness;
  scope: string;
  head: string | null;
  /** Commits covered by the cache so far */
  processedCommits: number;
  skippedCommits: number;
  eventsApplied: number;
  lastProcessedCommitId: string | null;
  error?: string;
}

export type SessionEvents = {
  /** A durable batch was folded into the tree */
  update: FlushedBatch;
  status: SessionStatus;
};

export interface ActivitySessionOptions {
  repoRoot: string;
  source: GitDataSource;
  config: Config;
  /** Subtree to scan, empty for the whole repository */
  scope?: string;
  refresh?: boolean;
  logger?: Logger;
  sessionId?: string;
  lockOptions?: WriterLockOptions;
}

/**
 * One browsing session over one cache: the aggregate tree is rebuilt from the
 * cache on open and kept current by a background scan.
 */
export class ActivitySession {
  readonly aggregator: StatsAggregator;
  readonly sessionId: string;
  private readonly emitter = new TypedEmitter<SessionEvents>();
  private current: SessionStatus;
  private cursor: ScanCursor | null;
  private running: Promise<ScanOutcome> | null = null;
  private closed = false;

  private constructor(
    private readonly options: ActivitySessionOptions,
    private readonly store: CacheStore,
    private readonly matcher: PathMatcher,
    private readonly skippedIds: Set<string>,
    private readonly logger: Logger,
    init: {
      sessionId: string;
      scope: string;
      head: string | null;
      freshness: Freshness;
      cursor: ScanCursor | null;
      skipped: number;
      aggregator: StatsAggregator;
    },
  ) {
    this.sessionId = init.sessionId;
    this.aggregator = init.aggregator;
    this.cursor = init.cursor;
    this.current = {
      phase: 'idle',
      freshness: init.freshness,
      scope: init.scope,
      head: init.head,
      processedCommits: init.cursor?.processedCount ?? 0,
      skippedCommits: init.skipped,
      eventsApplied: init.aggregator.eventCount,
      lastProcessedCommitId: init.cursor?.lastProcessedCommitId ?? null,
    };
  }

  /**
   * Validates the glob, takes the cache lock and folds the cached events.
   * Nothing is scanned until {@link start}.
   */
  static async open(options: ActivitySessionOptions): Promise<ActivitySession> {
    const matcher = compileGlob(options.config.scan.glob);
    const scope = toRepoPath(options.scope ?? '');
    const sessionId = options.sessionId ?? randomUUID();
    const logger = (options.logger ?? new NoopLogger()).child({ session: sessionId.slice(0, 8) });

    const opened = await openScopeCache({
      source: options.source,
      identity: { repoRoot: options.repoRoot, glob: options.config.scan.glob, scope },
      cacheDir: resolveCacheDir(options.repoRoot, options.config),
      refresh: options.refresh,
      logger,
      sessionId,
      lockOptions: options.lockOptions,
    });

    const aggregator = new StatsAggregator({ scope });
    aggregator.rebuild(opened.snapshot.events);
    await logger.debug(
      `Loaded ${opened.snapshot.events.length} cached event(s), cache is ${opened.freshness}`,
    );

    return new ActivitySession(
      options,
      opened.store,
      matcher,
      skippedCommitIds(opened.snapshot),
      logger,
      {
        sessionId,
        scope,
        head: opened.head,
        freshness: opened.freshness,
        cursor: opened.snapshot.cursor,
        skipped: opened.snapshot.skipped.length,
        aggregator,
      },
    );
  }

  get freshness(): Freshness {
    return this.current.freshness;
  }

  status(): SessionStatus {
    return { ...this.current };
  }

  on<K extends keyof SessionEvents & string>(
    event: K,
    listener: (payload: SessionEvents[K]) => void,
  ): () => void {
    return this.emitter.on(event, listener);
  }

  /**
   * Scans from the checkpoint to the head. Calling it again while a scan runs
   * returns the same run.
   */
  start(signal?: AbortSignal): Promise<ScanOutcome> {
    if (!this.running) {
      this.running = this.scan(signal);
    }
    return this.running;
  }

  private async scan(signal?: AbortSignal): Promise<ScanOutcome> {
    if (this.closed) {
      throw new Error('Session is closed');
    }
    const { config, source } = this.options;
    const scope = this.current.scope;
    this.setStatus({ phase: 'scanning', error: undefined });

    await this.logger.log(
      createEvent(this.sessionId, {
        type: 'ScanStarted',
        payload: {
          scope,
          resumeFrom: this.cursor?.lastProcessedCommitId,
          repoHead: this.current.head,
          freshness: this.current.freshness,
        },
      }),
    );

    try {
      const outcome = await runScan({
        source,
        store: this.store,
        cursor: this.cursor,
        head: this.current.head,
        scope,
        matcher: this.matcher,
        batchSize: config.scan.batchSize,
        queueCapacity: config.scan.queueCapacity,
        isRecorded: (commitId) => this.skippedIds.has(commitId),
        isEventRecorded: (event) => this.aggregator.hasEvent(event),
        signal,
        logger: this.logger,
        sessionId: this.sessionId,
        onBatch: (batch) => this.applyBatch(batch),
      });
      this.cursor = outcome.cursor;
      this.setStatus({
        phase: outcome.status,
        processedCommits: outcome.cursor?.processedCount ?? 0,
        lastProcessedCommitId: outcome.cursor?.lastProcessedCommitId ?? null,
      });
      return outcome;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.setStatus({ phase: 'failed', error: message });
      await this.logger.log(
        createEvent(this.sessionId, { type: 'ScanFailed', payload: { scope, error: message } }),
      );
      throw error;
    }
  }

  private applyBatch(batch: FlushedBatch): void {
    this.aggregator.applyAll(batch.events);
    this.cursor = batch.cursor;
    this.emitter.emit('update', batch);
    this.setStatus({
      processedCommits: batch.cursor.processedCount,
      skippedCommits: this.current.skippedCommits + batch.skipped,
      eventsApplied: this.aggregator.eventCount,
      lastProcessedCommitId: batch.cursor.lastProcessedCommitId,
    });
  }

  private setStatus(patch: Partial<SessionStatus>): void {
    this.current = { ...this.current, ...patch };
    this.emitter.emit('status', this.status());
  }

  /** Waits for a running scan, then releases the cache. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.running) {
      // A failed scan was already reported to the caller of start().
      await this.running.catch(() => undefined);
    }
    this.emitter.removeAllListeners();
    await this.store.close();
  }
}
