/**
 * Line counts for one file in one commit, relative to the commit's first parent.
 */
export interface FileDiffStat {
  path: string;
  insertions: number;
  deletions: number;
  /** Binary files report no line counts */
  binary: boolean;
}

export interface RawCommit {
  commitId: string;
  parentIds: string[];
  /** Author e-mail, the identity used for distinct-author counts */
  author: string;
  authorName: string;
  /** Author time, Unix seconds */
  timestamp: number;
  subject: string;
  files: FileDiffStat[];
  /** Set when the commit's diff could not be read */
  error?: string;
}

export interface CommitQuery {
  /** Only commits not reachable from this one */
  since?: string;
  /** Walk back from this commit instead of HEAD */
  until?: string;
  /** Restrict history to these repository-relative paths */
  paths?: string[];
}

/**
 * Read access to a repository's history.
 * `commits()` yields oldest ancestor first, in a stable topological order.
 */
export interface GitDataSource {
  headId(): Promise<string | null>;
  hasCommit(commitId: string): Promise<boolean>;
  commits(query?: CommitQuery): AsyncIterable<RawCommit>;
  /** Tracked files at HEAD, repository-relative */
  listFiles(): Promise<string[]>;
}
