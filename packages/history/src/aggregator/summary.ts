import type { PathNode } from './types';

export interface TreeSummary {
  files: number;
  directories: number;
  commits: number;
  insertions: number;
  deletions: number;
  authors: string[];
}

/** Totals over a tree; the root itself is not counted as a directory. */
export function summarizeTree(root: PathNode): TreeSummary {
  let files = 0;
  let directories = 0;
  const stack = [...root.children.values()];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.kind === 'file') {
      files++;
    } else {
      directories++;
    }
    stack.push(...node.children.values());
  }

  return {
    files,
    directories,
    commits: root.commitIds.size,
    insertions: root.insertions,
    deletions: root.deletions,
    authors: [...root.authors].sort(),
  };
}
