import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import {
  CacheCorruptionError,
  NoopLogger,
  atomicWrite,
  readFileIfExists,
  type Logger,
} from '@histree/shared';
import { eventKey, type ChangeEvent, type ScanCursor } from '../types';
import type { CacheLocation } from './location';
import { WriterLock, type WriterLockOptions } from './lock';
import { Mutex } from './mutex';
import {
  CACHE_SCHEMA_VERSION,
  CacheRecordSchema,
  CursorFileSchema,
  type CacheIdentity,
  type CacheRecord,
  type CheckpointRecord,
  type HeaderRecord,
  type SkippedCommit,
} from './types';

export interface CacheSnapshot {
  header: HeaderRecord | null;
  /** Distinct events in write order; later duplicates are dropped */
  events: ChangeEvent[];
  skipped: SkippedCommit[];
  cursor: ScanCursor | null;
  /** A partial trailing line was found and discarded */
  discardedTail: boolean;
  /** Complete lines that were not valid records */
  corruptLines: number;
  duplicateEvents: number;
  recordCount: number;
}

export interface CompactResult {
  recordsBefore: number;
  recordsAfter: number;
}

export interface CacheStoreOptions extends WriterLockOptions {
  logger?: Logger;
}

function emptySnapshot(): CacheSnapshot {
  return {
    header: null,
    events: [],
    skipped: [],
    cursor: null,
    discardedTail: false,
    corruptLines: 0,
    duplicateEvents: 0,
    recordCount: 0,
  };
}

function toLine(record: CacheRecord): string {
  return `${JSON.stringify(record)}\n`;
}

function headerFor(identity: CacheIdentity): HeaderRecord {
  return {
    type: 'header',
    schemaVersion: CACHE_SCHEMA_VERSION,
    repoRoot: identity.repoRoot,
    glob: identity.glob,
    scope: identity.scope,
  };
}

function checkpointFor(cursor: ScanCursor): CheckpointRecord {
  return {
    type: 'checkpoint',
    lastProcessedCommitId: cursor.lastProcessedCommitId,
    processedCount: cursor.processedCount,
    repoHeadAtScanStart: cursor.repoHeadAtScanStart,
    writtenAt: new Date().toISOString(),
  };
}

/**
 * Parses log text. Returns the snapshot and the byte length of the valid prefix,
 * i.e. everything up to and including the last newline.
 */
export function parseCacheLog(
  content: string,
  logPath: string,
): { snapshot: CacheSnapshot; validBytes: number; checkpoints: Set<string> } {
  const lastNewline = content.lastIndexOf('\n');
  const complete = lastNewline === -1 ? '' : content.slice(0, lastNewline);
  const tail = content.slice(lastNewline + 1);

  let header: HeaderRecord | null = null;
  const events: ChangeEvent[] = [];
  const seenEvents = new Set<string>();
  const skipped = new Map<string, string>();
  let cursor: ScanCursor | null = null;
  const checkpoints = new Set<string>();
  let corruptLines = 0;
  let duplicateEvents = 0;
  let recordCount = 0;

  for (const line of complete === '' ? [] : complete.split('\n')) {
    const record = parseRecord(line);
    if (!record) {
      corruptLines++;
      continue;
    }
    recordCount++;

    switch (record.type) {
      case 'header':
        if (record.schemaVersion !== CACHE_SCHEMA_VERSION) {
          throw new CacheCorruptionError(
            `Cache at ${logPath} has schema version ${record.schemaVersion}, expected ${CACHE_SCHEMA_VERSION}`,
            { details: { logPath, schemaVersion: record.schemaVersion } },
          );
        }
        header = header ?? record;
        break;
      case 'event': {
        const { type: _type, ...event } = record;
        const key = eventKey(event);
        if (seenEvents.has(key)) {
          duplicateEvents++;
        } else {
          seenEvents.add(key);
          events.push(event);
        }
        break;
      }
      case 'skip':
        if (!skipped.has(record.commitId)) {
          skipped.set(record.commitId, record.reason);
        }
        break;
      case 'checkpoint':
        checkpoints.add(cursorKey(record));
        if (!cursor || record.processedCount >= cursor.processedCount) {
          cursor = {
            lastProcessedCommitId: record.lastProcessedCommitId,
            processedCount: record.processedCount,
            repoHeadAtScanStart: record.repoHeadAtScanStart,
          };
        }
        break;
    }
  }

  return {
    snapshot: {
      header,
      events,
      skipped: [...skipped].map(([commitId, reason]) => ({ commitId, reason })),
      cursor,
      discardedTail: tail.length > 0,
      corruptLines,
      duplicateEvents,
      recordCount,
    },
    validBytes: Buffer.byteLength(content.slice(0, lastNewline + 1), 'utf8'),
    checkpoints,
  };
}

function cursorKey(cursor: Pick<ScanCursor, 'lastProcessedCommitId' | 'processedCount'>): string {
  return `${cursor.lastProcessedCommitId}\0${cursor.processedCount}`;
}

function parseRecord(line: string): CacheRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = CacheRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

async function readCursorFile(cursorPath: string): Promise<ScanCursor | null> {
  const raw = await readFileIfExists(cursorPath);
  if (raw === null) {
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = CursorFileSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const { writtenAt: _writtenAt, ...cursor } = parsed.data;
  return cursor;
}

function newerCursor(a: ScanCursor | null, b: ScanCursor | null): ScanCursor | null {
  if (!a) return b;
  if (!b) return a;
  return b.processedCount > a.processedCount ? b : a;
}

interface ReadSnapshot {
  snapshot: CacheSnapshot;
  validBytes: number;
  /** `cursor.json` names a checkpoint the log no longer holds */
  orphanedCursorFile: boolean;
}

/**
 * The log is authoritative: `cursor.json` only counts when its checkpoint
 * survived in the log, so a log cut short is rescanned from what it still holds.
 */
async function readSnapshot(location: CacheLocation): Promise<ReadSnapshot | null> {
  const content = await readFileIfExists(location.logPath);
  if (content === null) {
    return null;
  }
  const { snapshot, validBytes, checkpoints } = parseCacheLog(content, location.logPath);
  const fileCursor = await readCursorFile(location.cursorPath);
  const orphanedCursorFile = fileCursor !== null && !checkpoints.has(cursorKey(fileCursor));
  if (fileCursor && !orphanedCursorFile) {
    snapshot.cursor = newerCursor(snapshot.cursor, fileCursor);
  }
  return { snapshot, validBytes, orphanedCursorFile };
}

/**
 * Append-only, crash-consistent event log for one cache identity.
 * Only one process may hold a store open at a time.
 */
export class CacheStore {
  private handle: FileHandle | null = null;
  private readonly mutex = new Mutex();
  private readonly logger: Logger;

  private constructor(
    readonly location: CacheLocation,
    readonly identity: CacheIdentity,
    private readonly lock: WriterLock,
    options: CacheStoreOptions,
  ) {
    this.logger = (options.logger ?? new NoopLogger()).child({ cache: location.key });
  }

  /**
   * Takes the writer lock. Throws ConcurrentWriterError when another live process holds it.
   */
  static async open(
    location: CacheLocation,
    identity: CacheIdentity,
    options: CacheStoreOptions = {},
  ): Promise<CacheStore> {
    await fs.mkdir(location.dir, { recursive: true });
    const lock = await WriterLock.acquire(location.lockPath, options);
    const store = new CacheStore(location, identity, lock, options);
    try {
      store.handle = await fs.open(location.logPath, 'a');
    } catch (error) {
      await lock.release();
      throw error;
    }
    return store;
  }

  /**
   * Reads a cache without locking or repairing it. Null when nothing was ever written.
   */
  static async inspect(location: CacheLocation): Promise<CacheSnapshot | null> {
    const read = await readSnapshot(location);
    return read ? read.snapshot : null;
  }

  /**
   * Loads every record, truncating a partial trailing line and writing the
   * header of a new log. Throws CacheCorruptionError for a log of another
   * schema version or identity; {@link reset} recovers from that.
   */
  async load(): Promise<CacheSnapshot> {
    return this.mutex.runExclusive(async () => {
      const { snapshot, validBytes, orphanedCursorFile } = (await readSnapshot(this.location)) ?? {
        snapshot: emptySnapshot(),
        validBytes: 0,
        orphanedCursorFile: false,
      };

      if (snapshot.discardedTail) {
        await fs.truncate(this.location.logPath, validBytes);
        await this.logger.warn(`Discarded partial trailing record in ${this.location.logPath}`);
      }
      if (orphanedCursorFile) {
        await this.writeCursorFile(snapshot.cursor);
        await this.logger.warn(
          `${this.location.cursorPath} is ahead of ${this.location.logPath}; resuming from the log's last checkpoint`,
        );
      }
      if (snapshot.corruptLines > 0) {
        const error = new CacheCorruptionError(
          `Skipped ${snapshot.corruptLines} malformed record(s) in ${this.location.logPath}`,
        );
        await this.logger.warn(error.message);
      }

      if (snapshot.header) {
        this.assertIdentity(snapshot.header);
      } else if (snapshot.recordCount === 0) {
        await this.write([headerFor(this.identity)]);
        snapshot.header = headerFor(this.identity);
      } else {
        throw new CacheCorruptionError(`Cache at ${this.location.logPath} has no header record`);
      }
      return snapshot;
    });
  }

  /** Appends records as whole lines in one durable write. */
  async append(records: CacheRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await this.mutex.runExclusive(() => this.write(records));
  }

  /**
   * Records the cursor in the log, then replaces `cursor.json`.
   * Callers checkpoint only after the covered records were appended.
   */
  async checkpoint(cursor: ScanCursor): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.write([checkpointFor(cursor)]);
      await this.writeCursorFile(cursor);
    });
  }

  /** Discards every record, leaving only a fresh header. */
  async reset(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await fs.rm(this.location.cursorPath, { force: true });
      await this.replaceLog(toLine(headerFor(this.identity)));
      await this.logger.debug('Cache reset');
    });
  }

  /**
   * Rewrites the log with duplicates and superseded checkpoints removed.
   */
  async compact(): Promise<CompactResult> {
    return this.mutex.runExclusive(async () => {
      const read = await readSnapshot(this.location);
      const snapshot = read ? read.snapshot : emptySnapshot();
      if (snapshot.header) {
        this.assertIdentity(snapshot.header);
      }

      const records: CacheRecord[] = [headerFor(this.identity)];
      for (const event of snapshot.events) {
        records.push({ type: 'event', ...event });
      }
      for (const skip of snapshot.skipped) {
        records.push({ type: 'skip', ...skip });
      }
      if (snapshot.cursor) {
        records.push(checkpointFor(snapshot.cursor));
      }

      await this.replaceLog(records.map(toLine).join(''));
      await this.writeCursorFile(snapshot.cursor);
      return { recordsBefore: snapshot.recordCount, recordsAfter: records.length };
    });
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const handle = this.handle;
      this.handle = null;
      try {
        await handle?.close();
      } finally {
        await this.lock.release();
      }
    });
  }

  private assertIdentity(header: HeaderRecord): void {
    const { repoRoot, glob, scope } = this.identity;
    if (header.repoRoot !== repoRoot || header.glob !== glob || header.scope !== scope) {
      throw new CacheCorruptionError(
        `Cache at ${this.location.logPath} was written for a different cache identity`,
        { details: { header, identity: { ...this.identity } } },
      );
    }
  }

  private async write(records: CacheRecord[]): Promise<void> {
    if (!this.handle) {
      throw new CacheCorruptionError(`Cache at ${this.location.logPath} is closed`);
    }
    await this.handle.appendFile(records.map(toLine).join(''), 'utf8');
    await this.handle.sync();
  }

  private async writeCursorFile(cursor: ScanCursor | null): Promise<void> {
    if (!cursor) {
      await fs.rm(this.location.cursorPath, { force: true });
      return;
    }
    const { type: _type, ...cursorFile } = checkpointFor(cursor);
    await atomicWrite(this.location.cursorPath, `${JSON.stringify(cursorFile, null, 2)}\n`);
  }

  private async replaceLog(content: string): Promise<void> {
    await this.handle?.close();
    this.handle = null;
    await atomicWrite(this.location.logPath, content);
    this.handle = await fs.open(this.location.logPath, 'a');
  }
}
