/**
 * One file touched by one commit. Unique by `(path, commitId)`.
 */
export interface ChangeEvent {
  path: string;
  commitId: string;
  /** Author e-mail */
  author: string;
  /** Author time, Unix seconds */
  timestamp: number;
  insertions: number;
  deletions: number;
}

/**
 * How far a scan has durably progressed.
 */
export interface ScanCursor {
  lastProcessedCommitId: string;
  processedCount: number;
  /** HEAD when the scan that wrote this cursor began */
  repoHeadAtScanStart: string | null;
}

export function eventKey(event: Pick<ChangeEvent, 'path' | 'commitId'>): string {
  return `${event.commitId}\0${event.path}`;
}
