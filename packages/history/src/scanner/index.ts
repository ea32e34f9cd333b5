import { CommitReadError } from '@histree/shared';
import type { GitDataSource, RawCommit } from '../git/types';
import { ROOT_PATH, isWithinScope, toRepoPath } from '../paths';
import type { ChangeEvent, ScanCursor } from '../types';
import type { PathMatcher } from './glob';

export * from './glob';

export interface ScanOptions {
  matcher?: PathMatcher;
  /** Restrict the walk to this subtree; empty for the whole repository */
  scope?: string;
  /** Head to walk back from; resolved from the source when omitted */
  head?: string | null;
  /** Checked between commits */
  signal?: AbortSignal;
  /** Commits already recorded in the cache are not emitted again */
  isRecorded?: (commitId: string) => boolean;
}

export type ScanStep =
  | { kind: 'commit'; commit: RawCommit; events: ChangeEvent[] }
  | { kind: 'skipped'; commit: RawCommit; error: CommitReadError };

/**
 * Walks history after `cursor`, oldest first, turning each commit into its
 * per-file change events. Ends when the source is exhausted or `signal` aborts.
 */
export async function* scanHistory(
  source: GitDataSource,
  cursor: ScanCursor | null,
  options: ScanOptions = {},
): AsyncGenerator<ScanStep> {
  const scope = toRepoPath(options.scope ?? ROOT_PATH);
  const head = options.head !== undefined ? options.head : await source.headId();
  if (head === null || cursor?.lastProcessedCommitId === head) {
    return;
  }

  const commits = source.commits({
    since: cursor?.lastProcessedCommitId,
    until: head,
    paths: scope === ROOT_PATH ? undefined : [scope],
  });

  for await (const commit of commits) {
    if (options.signal?.aborted) {
      return;
    }
    if (options.isRecorded?.(commit.commitId)) {
      continue;
    }

    if (commit.error) {
      yield {
        kind: 'skipped',
        commit,
        error: new CommitReadError(commit.commitId, commit.error),
      };
      continue;
    }

    yield { kind: 'commit', commit, events: toChangeEvents(commit, scope, options.matcher) };
  }
}

export function toChangeEvents(
  commit: RawCommit,
  scope: string = ROOT_PATH,
  matcher?: PathMatcher,
): ChangeEvent[] {
  const events: ChangeEvent[] = [];
  const seen = new Set<string>();
  for (const file of commit.files) {
    const path = toRepoPath(file.path);
    if (!path || seen.has(path) || !isWithinScope(path, scope)) {
      continue;
    }
    if (matcher && !matcher(path)) {
      continue;
    }
    seen.add(path);
    events.push({
      path,
      commitId: commit.commitId,
      author: commit.author,
      timestamp: commit.timestamp,
      insertions: file.insertions,
      deletions: file.deletions,
    });
  }
  return events;
}
