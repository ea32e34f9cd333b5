import type { ScanCursor } from '../types';

/**
 * - `empty`: nothing scanned yet
 * - `current`: the cursor covers the live head
 * - `partial`: a scan of the live head was interrupted
 * - `stale`: the repository moved on since the cache was written
 */
export type Freshness = 'empty' | 'current' | 'partial' | 'stale';

export function freshness(cursor: ScanCursor | null, liveHead: string | null): Freshness {
  if (!cursor) {
    return 'empty';
  }
  if (cursor.lastProcessedCommitId === liveHead) {
    return 'current';
  }
  if (cursor.repoHeadAtScanStart === liveHead) {
    return 'partial';
  }
  return 'stale';
}
