import { Minimatch } from 'minimatch';
import { DEFAULT_GLOB_PATTERN, GlobPatternError } from '@histree/shared';

export type PathMatcher = (path: string) => boolean;

const matchAll: PathMatcher = () => true;

/**
 * Compiles a `--glob` pattern into a matcher over repository-relative paths.
 * Throws {@link GlobPatternError} for patterns that cannot select anything.
 */
export function compileGlob(pattern: string): PathMatcher {
  if (pattern.trim() === '') {
    throw new GlobPatternError(pattern, 'pattern is empty');
  }
  if (pattern.includes('\0')) {
    throw new GlobPatternError(pattern, 'pattern contains a NUL byte');
  }
  if (pattern.startsWith('/')) {
    throw new GlobPatternError(pattern, 'pattern must be relative to the repository root');
  }
  if (pattern === DEFAULT_GLOB_PATTERN || pattern === '**') {
    return matchAll;
  }

  let matcher: Minimatch;
  try {
    matcher = new Minimatch(pattern, { dot: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GlobPatternError(pattern, message, { cause: error });
  }
  if (matcher.makeRe() === false) {
    throw new GlobPatternError(pattern, 'pattern could not be compiled');
  }

  return (path) => matcher.match(path);
}
