/** Repository-relative path of the root node. */
export const ROOT_PATH = '';

/**
 * Normalizes a repository-relative path: forward slashes, no leading `./` or `/`,
 * no trailing slash. The root is the empty string.
 */
export function toRepoPath(p: string): string {
  let normalized = p.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  normalized = normalized.replace(/^\/+/, '').replace(/\/+$/, '');
  return normalized === '.' ? ROOT_PATH : normalized;
}

export function splitRepoPath(p: string): string[] {
  return p === ROOT_PATH ? [] : p.split('/');
}

export function joinRepoPath(parent: string, name: string): string {
  return parent === ROOT_PATH ? name : `${parent}/${name}`;
}

export function baseName(p: string): string {
  const index = p.lastIndexOf('/');
  return index === -1 ? p : p.slice(index + 1);
}

export function parentPath(p: string): string {
  const index = p.lastIndexOf('/');
  return index === -1 ? ROOT_PATH : p.slice(0, index);
}

/**
 * True when `p` is `scope` itself or lies beneath it. Every path is within the root scope.
 */
export function isWithinScope(p: string, scope: string): boolean {
  if (scope === ROOT_PATH) {
    return true;
  }
  return p === scope || p.startsWith(`${scope}/`);
}
