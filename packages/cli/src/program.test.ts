import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { GlobPatternError, RepositoryAccessError, UsageError } from '@histree/shared';
import { FakeGitDataSource } from '@histree/history/src/testing/fake-git';
import { INTERRUPTED_MESSAGE } from './commands/browse';
import { createProgram } from './program';

describe('histree program', () => {
  let repoDir: string;
  let homeDir: string;
  let git: FakeGitDataSource;
  let interrupt: AbortController;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    repoDir = await fs.mkdtemp(path.join(os.tmpdir(), 'histree-cli-'));
    homeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'histree-home-'));
    await fs.mkdir(path.join(repoDir, '.git'));
    git = new FakeGitDataSource([
      {
        id: 'c1',
        author: 'ana@example.com',
        files: [
          ['src/a.ts', 3, 1],
          ['README.md', 1, 0],
        ],
      },
      { id: 'c2', author: 'bo@example.com', files: [['src/a.ts', 2, 2]] },
    ]);
    interrupt = new AbortController();
    stdout = [];
    stderr = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      stdout.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      stderr.push(String(line));
    });
    vi.spyOn(console, 'warn').mockImplementation((line: unknown) => {
      stderr.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(repoDir, { recursive: true, force: true });
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({
      createSource: () => git,
      homeDir,
      onInterrupt: () => ({ signal: interrupt.signal, dispose: () => undefined }),
    });
    await program.parseAsync(args, { from: 'user' });
  }

  function lastJson(): Record<string, unknown> {
    const parsed: unknown = JSON.parse(stdout[stdout.length - 1]);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('expected a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  describe('browse', () => {
    it('scans the history and prints the tree', async () => {
      await run('--json', repoDir);

      const output = lastJson();
      expect(output.repoRoot).toBe(repoDir);
      expect(output.status).toMatchObject({
        mode: 'full',
        sortKey: 'commitCount',
        scan: { phase: 'complete', freshness: 'empty', processedCommits: 2 },
      });
      expect(output.tree).toMatchObject({
        stats: { commitCount: 2, insertions: 6, deletions: 3, authorCount: 2 },
        children: [
          { name: 'src', stats: { commitCount: 2 }, children: [{ name: 'a.ts', kind: 'file' }] },
          { name: 'README.md', stats: { commitCount: 1 } },
        ],
      });
    });

    it('scans only the new commits on the next run', async () => {
      await run('--json', repoDir);
      git.add({ id: 'c3', author: 'ana@example.com', files: [['README.md', 4, 0]] });

      await run('--json', repoDir);

      expect(lastJson().status).toMatchObject({ scan: { freshness: 'stale', processedCommits: 3 } });
      expect(git.queries[git.queries.length - 1]).toMatchObject({ since: 'c2', until: 'c3' });
    });

    it('saves progress when interrupted and resumes from there', async () => {
      git.beforeYield = (commitId) => {
        if (commitId === 'c2') {
          interrupt.abort();
        }
      };
      await run('--json', repoDir);

      expect(lastJson().status).toMatchObject({ scan: { phase: 'cancelled', processedCommits: 1 } });
      expect(stderr).toContain(INTERRUPTED_MESSAGE);

      git.beforeYield = undefined;
      interrupt = new AbortController();
      await run('--json', '--resume', repoDir);

      expect(lastJson().status).toMatchObject({
        scan: { phase: 'complete', freshness: 'partial', processedCommits: 2 },
      });
    });

    it('rebuilds from scratch with --refresh', async () => {
      await run('--json', repoDir);
      await run('--json', '--refresh', repoDir);

      expect(lastJson().status).toMatchObject({ scan: { freshness: 'empty', processedCommits: 2 } });
      expect(git.queries[git.queries.length - 1].since).toBeUndefined();
    });

    it('shows the cache without scanning under --no-scan', async () => {
      await run('--json', '--no-scan', repoDir);

      expect(lastJson().status).toMatchObject({ scan: { phase: 'idle', processedCommits: 0 } });
      expect(git.queries).toEqual([]);
    });

    it('loads only the expanded subtrees in lazy mode', async () => {
      await run('--json', '--lazy', '--expand', 'src', '--', repoDir);

      const output = lastJson();
      expect(output.status).toEqual({ mode: 'lazy', sortKey: 'commitCount', scan: null, pendingLoads: 0 });
      expect(output.tree).toMatchObject({
        stats: null,
        children: [
          { name: 'src', loadState: 'loaded', stats: { commitCount: 2, insertions: 5 } },
          { name: 'README.md', loadState: 'unloaded', stats: null },
        ],
      });
      expect(git.queries).toEqual([{ since: undefined, until: 'c2', paths: ['src'] }]);
    });

    it('rejects --refresh together with --resume', async () => {
      await expect(run('--refresh', '--resume', repoDir)).rejects.toThrow(
        new UsageError('--refresh and --resume cannot be combined'),
      );
    });

    it('rejects an unknown sort key', async () => {
      await expect(run('--sort', 'size', repoDir)).rejects.toThrow(
        "Unknown sort key 'size', expected one of: commitCount, latestChange, totalChanges, authorCount",
      );
    });

    it('rejects an absolute glob before touching the cache', async () => {
      await expect(run('--glob', '/src/**', repoDir)).rejects.toBeInstanceOf(GlobPatternError);
      await expect(fs.access(path.join(repoDir, '.histree'))).rejects.toThrow();
    });

    it('fails outside a repository', async () => {
      await expect(run(path.join(repoDir, 'missing'))).rejects.toBeInstanceOf(RepositoryAccessError);
    });
  });

  describe('status', () => {
    it('lists the caches of the repository', async () => {
      await run('--json', repoDir);
      await run('--json', 'status', repoDir);

      expect(lastJson()).toMatchObject({
        repoRoot: repoDir,
        head: 'c2',
        caches: [{ scope: '(root)', glob: '**/*', events: 3, commits: 2, freshness: 'current' }],
      });
    });

    it('says when there is nothing cached', async () => {
      await run('status', repoDir);
      expect(stdout).toEqual([`No caches for ${repoDir}. Run 'histree' to build one.`]);
    });
  });

  describe('analyze', () => {
    it('totals the cached history', async () => {
      await run('--json', repoDir);
      await run('--json', 'analyze', repoDir);

      expect(lastJson()).toEqual({
        repoRoot: repoDir,
        freshness: 'current',
        files: 2,
        directories: 1,
        commits: 2,
        insertions: 6,
        deletions: 3,
        authors: ['ana@example.com', 'bo@example.com'],
      });
    });
  });

  describe('compact', () => {
    it('rewrites each cache with one checkpoint', async () => {
      await run('--json', repoDir);
      await run('--json', 'compact', repoDir);

      const results: unknown = JSON.parse(stdout[stdout.length - 1]);
      expect(results).toMatchObject([{ scope: '', recordsAfter: 5 }]);
    });
  });
});
