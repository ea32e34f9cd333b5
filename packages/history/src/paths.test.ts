import { describe, it, expect } from 'vitest';
import {
  baseName,
  isWithinScope,
  joinRepoPath,
  parentPath,
  splitRepoPath,
  toRepoPath,
} from './paths';

describe('repo paths', () => {
  it('normalizes separators and edges', () => {
    expect(toRepoPath('./src\\lib/')).toBe('src/lib');
    expect(toRepoPath('/a//b')).toBe('a/b');
    expect(toRepoPath('.')).toBe('');
    expect(toRepoPath('')).toBe('');
  });

  it('splits and joins', () => {
    expect(splitRepoPath('')).toEqual([]);
    expect(splitRepoPath('a/b/c')).toEqual(['a', 'b', 'c']);
    expect(joinRepoPath('', 'a')).toBe('a');
    expect(joinRepoPath('a/b', 'c')).toBe('a/b/c');
  });

  it('finds base names and parents', () => {
    expect(baseName('a/b/c.ts')).toBe('c.ts');
    expect(baseName('top')).toBe('top');
    expect(parentPath('a/b/c.ts')).toBe('a/b');
    expect(parentPath('top')).toBe('');
  });

  it('checks scope membership on segment boundaries', () => {
    expect(isWithinScope('src/a.ts', '')).toBe(true);
    expect(isWithinScope('src', 'src')).toBe(true);
    expect(isWithinScope('src/a.ts', 'src')).toBe(true);
    expect(isWithinScope('srcx/a.ts', 'src')).toBe(false);
    expect(isWithinScope('lib/a.ts', 'src')).toBe(false);
  });
});
