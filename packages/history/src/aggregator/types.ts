export type LoadState = 'unloaded' | 'loading' | 'loaded';

export type NodeKind = 'file' | 'dir';

export interface NodeStats {
  /** Distinct commits touching this path or anything beneath it */
  commitCount: number;
  insertions: number;
  deletions: number;
  totalChanges: number;
  authorCount: number;
  /** Unix seconds of the newest change, null before any event */
  latestChange: number | null;
  firstChange: number | null;
  latestAuthor: string | null;
  latestCommitId: string | null;
}

/**
 * A node of the activity tree. Directories derive their counts from the
 * distinct sets, so a commit touching two files in one directory counts once.
 */
export interface PathNode {
  name: string;
  /** Repository-relative, empty for the repository root */
  path: string;
  kind: NodeKind;
  children: Map<string, PathNode>;
  commitIds: Set<string>;
  authors: Set<string>;
  insertions: number;
  deletions: number;
  latestChange: number | null;
  firstChange: number | null;
  latestAuthor: string | null;
  latestCommitId: string | null;
  loadState: LoadState;
}
