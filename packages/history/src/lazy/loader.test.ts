import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { statsOf } from '../aggregator';
import { ActivitySession } from '../pipeline/session';
import { compileGlob } from '../scanner';
import { testConfig } from '../testing/config';
import { FakeGitDataSource } from '../testing/fake-git';
import { createSubtreeLoader, type SubtreeLoaderOptions } from './loader';

describe('createSubtreeLoader', () => {
  let cacheDir: string;
  let git: FakeGitDataSource;

  beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'histree-loader-'));
    git = new FakeGitDataSource([
      { id: 'c1', files: [['src/a.ts', 1, 0], ['docs/x.md', 2, 0]] },
      { id: 'c2', files: [['src/b.ts', 3, 1]] },
    ]);
  });

  afterEach(async () => {
    await fs.rm(cacheDir, { recursive: true, force: true });
  });

  function loaderOptions(extra: Partial<SubtreeLoaderOptions> = {}): SubtreeLoaderOptions {
    return {
      repoRoot: '/work/repo',
      source: git,
      config: testConfig(cacheDir),
      matcher: compileGlob('**/*'),
      sessionId: 'session-1',
      ...extra,
    };
  }

  async function scanEverything(): Promise<void> {
    const session = await ActivitySession.open({ repoRoot: '/work/repo', source: git, config: testConfig(cacheDir) });
    await session.start();
    await session.close();
  }

  it('scans a subtree into its own cache and reuses it', async () => {
    const load = createSubtreeLoader(loaderOptions());

    const first = await load('src');
    expect(first).toMatchObject({ source: 'scoped-scan', complete: true });
    expect(statsOf(first.aggregator.root)).toMatchObject({ commitCount: 2, insertions: 4, deletions: 1 });
    expect(git.queries).toEqual([{ since: undefined, until: 'c2', paths: ['src'] }]);

    const second = await load('src');
    expect(statsOf(second.aggregator.root).commitCount).toBe(2);
    expect(git.queries).toHaveLength(1);
  });

  it('answers from a current full-repository cache', async () => {
    await scanEverything();
    const load = createSubtreeLoader(loaderOptions());

    const loaded = await load('docs');

    expect(loaded.source).toBe('shared-cache');
    expect(statsOf(loaded.aggregator.root)).toMatchObject({ commitCount: 1, insertions: 2 });
    expect(git.queries).toHaveLength(1);
  });

  it('starts a subtree from a stale full-repository cache and scans only newer commits', async () => {
    await scanEverything();
    git.add({ id: 'c3', files: [['src/c.ts', 5, 0], ['docs/x.md', 1, 1]] });
    const load = createSubtreeLoader(loaderOptions());

    const loaded = await load('src');

    expect(loaded).toMatchObject({ source: 'scoped-scan', complete: true });
    expect(statsOf(loaded.aggregator.root)).toMatchObject({ commitCount: 3, insertions: 9, deletions: 1 });
    expect(git.queries).toHaveLength(2);
    expect(git.queries[1]).toEqual({ since: 'c2', until: 'c3', paths: ['src'] });

    const again = await load('src');
    expect(statsOf(again.aggregator.root)).toMatchObject({ commitCount: 3, insertions: 9 });
    expect(git.queries).toHaveLength(2);
  });

  it('rescans instead of reading the shared cache on refresh', async () => {
    await scanEverything();
    const load = createSubtreeLoader(loaderOptions({ refresh: true }));

    const loaded = await load('docs');

    expect(loaded.source).toBe('scoped-scan');
    expect(git.queries[1]).toEqual({ since: undefined, until: 'c2', paths: ['docs'] });
  });

  it('reports an interrupted load as incomplete', async () => {
    const load = createSubtreeLoader(loaderOptions());
    const controller = new AbortController();
    controller.abort();

    const loaded = await load('src', controller.signal);

    expect(loaded.complete).toBe(false);
    expect(loaded.aggregator.eventCount).toBe(0);
  });
});
