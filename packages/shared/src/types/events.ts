/**
 * Base interface for all histree session events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the browsing session */
  sessionId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a history scan starts or resumes.
 */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    /** Subtree the scan is restricted to, empty for the whole repository */
    scope: string;
    /** Commit the scan resumes after, if any */
    resumeFrom?: string;
    repoHead: string | null;
    freshness: 'empty' | 'current' | 'partial' | 'stale';
  };
}

/** Emitted when a commit could not be read and was recorded as skipped */
export interface CommitSkipped extends BaseEvent {
  type: 'CommitSkipped';
  payload: {
    commitId: string;
    reason: string;
  };
}

/** Emitted after a batch of records is durable and the cursor advanced */
export interface BatchFlushed extends BaseEvent {
  type: 'BatchFlushed';
  payload: {
    scope: string;
    commits: number;
    events: number;
    processedCount: number;
    lastProcessedCommitId: string;
  };
}

/** Emitted when a scan reached the repository head */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    scope: string;
    processedCount: number;
    skippedCount: number;
    durationMs: number;
  };
}

/** Emitted when a scan stopped on request after its last checkpoint */
export interface ScanCancelled extends BaseEvent {
  type: 'ScanCancelled';
  payload: {
    scope: string;
    processedCount: number;
    lastProcessedCommitId?: string;
  };
}

/** Emitted when a scan stopped on an unrecoverable error */
export interface ScanFailed extends BaseEvent {
  type: 'ScanFailed';
  payload: {
    scope: string;
    error: string;
  };
}

/** Emitted when damaged cache lines were dropped on load */
export interface CacheRecovered extends BaseEvent {
  type: 'CacheRecovered';
  payload: {
    cachePath: string;
    discardedTail: boolean;
    corruptLines: number;
  };
}

/** Emitted when a lazily expanded subtree finished aggregating */
export interface SubtreeLoaded extends BaseEvent {
  type: 'SubtreeLoaded';
  payload: {
    path: string;
    /** Whether the events came from the shared cache or a scoped scan */
    source: 'shared-cache' | 'scoped-scan';
    events: number;
    durationMs: number;
  };
}

/**
 * Union of all histree session event types.
 */
export type HistoryEvent =
  | ScanStarted
  | CommitSkipped
  | BatchFlushed
  | ScanFinished
  | ScanCancelled
  | ScanFailed
  | CacheRecovered
  | SubtreeLoaded;

type EventBody<E> = E extends HistoryEvent ? Pick<E, 'type' | 'payload'> : never;

/** The `type` and `payload` of any session event, without its envelope. */
export type HistoryEventBody = EventBody<HistoryEvent>;

/**
 * Wraps an event body in an envelope stamped with the current time.
 */
export function createEvent(sessionId: string, body: HistoryEventBody): HistoryEvent {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    sessionId,
    ...body,
  };
}
