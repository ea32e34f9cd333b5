import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { StatsAggregator } from '../aggregator';
import { LazyLoadController } from '../lazy/controller';
import type { SubtreeLoader } from '../lazy/loader';
import { ActivitySession } from '../pipeline/session';
import { testConfig } from '../testing/config';
import { FakeGitDataSource } from '../testing/fake-git';
import { ActivityNavigator, type NavigationUpdate } from './navigation';

describe('ActivityNavigator', () => {
  describe('full mode', () => {
    let cacheDir: string;
    let session: ActivitySession;

    beforeEach(async () => {
      cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'histree-nav-'));
      const git = new FakeGitDataSource([
        { id: 'c1', author: 'ana@example.com', timestamp: 100, files: [['lib/a.ts', 10, 0], ['docs/x.md', 1, 0]] },
        { id: 'c2', author: 'bo@example.com', timestamp: 200, files: [['lib/a.ts', 1, 0]] },
        { id: 'c3', author: 'ana@example.com', timestamp: 300, files: [['docs/y.md', 1, 1]] },
      ]);
      session = await ActivitySession.open({ repoRoot: '/work/repo', source: git, config: testConfig(cacheDir) });
    });

    afterEach(async () => {
      await session.close();
      await fs.rm(cacheDir, { recursive: true, force: true });
    });

    it('reads the tree as the background scan fills it', async () => {
      const nav = new ActivityNavigator({ mode: 'full', session }, 'commitCount');
      const reasons: NavigationUpdate['reason'][] = [];
      nav.onUpdate((u) => reasons.push(u.reason));

      expect(nav.children('')).toEqual([]);
      await session.start();

      expect(reasons).toContain('scan');
      expect(nav.status().scan?.phase).toBe('complete');
      expect(nav.children('').map((n) => [n.name, n.stats?.commitCount])).toEqual([
        ['docs', 2],
        ['lib', 2],
      ]);
      expect(nav.getNode('')?.stats?.commitCount).toBe(3);
      nav.dispose();
    });

    it('re-sorts without touching the data', async () => {
      await session.start();
      const nav = new ActivityNavigator({ mode: 'full', session }, 'commitCount');
      const updates: NavigationUpdate[] = [];
      nav.onUpdate((u) => updates.push(u));

      nav.setSortKey('totalChanges');
      nav.setSortKey('totalChanges');

      expect(updates).toEqual([{ reason: 'sort' }]);
      expect(nav.sortKey).toBe('totalChanges');
      expect(nav.children('').map((n) => n.name)).toEqual(['lib', 'docs']);
      nav.dispose();
    });

    it('tracks expansion state', async () => {
      await session.start();
      const nav = new ActivityNavigator({ mode: 'full', session }, 'commitCount');

      expect(nav.getNode('lib')?.expanded).toBe(false);
      nav.requestExpand('lib/');
      expect(nav.getNode('lib')?.expanded).toBe(true);
      nav.collapse('lib');
      expect(nav.isExpanded('lib')).toBe(false);
      expect(nav.getNode('lib')?.stats?.totalChanges).toBe(11);
      nav.dispose();
    });
  });

  describe('lazy mode', () => {
    function lazyNavigator(loader: SubtreeLoader) {
      const tree = new StatsAggregator();
      tree.ensureNode('src/a.ts', 'file', 'unloaded');
      tree.ensureNode('test/a.test.ts', 'file', 'unloaded');
      const controller = new LazyLoadController({ tree, loader });
      return { controller, nav: new ActivityNavigator({ mode: 'lazy', controller }, 'commitCount') };
    }

    it('shows no aggregates until a subtree is loaded', async () => {
      const { controller, nav } = lazyNavigator(async (p) => {
        const aggregator = new StatsAggregator({ scope: p });
        aggregator.apply({ path: `${p}/a.ts`, commitId: 'c1', author: 'a@x', timestamp: 5, insertions: 2, deletions: 0 });
        return { aggregator, source: 'scoped-scan', complete: true };
      });

      expect(nav.getNode('')?.stats).toBeNull();
      expect(nav.getNode('src')).toMatchObject({ loadState: 'unloaded', stats: null });

      nav.requestExpand('src');
      expect(nav.getNode('src')?.loadState).toBe('loading');
      expect(nav.status().pendingLoads).toBe(1);
      await controller.expand('src');

      expect(nav.getNode('src')?.stats?.insertions).toBe(2);
      expect(nav.getNode('src')?.expanded).toBe(true);
      expect(nav.getNode('test')?.stats).toBeNull();
      expect(nav.getNode('')?.stats).toBeNull();
      expect(nav.status()).toEqual({ mode: 'lazy', sortKey: 'commitCount', scan: null, pendingLoads: 0 });

      nav.collapse('src');
      expect(nav.getNode('src')?.stats?.insertions).toBe(2);
      nav.dispose();
    });

    it('waits for a load and puts a cancelled one back', async () => {
      const { nav } = lazyNavigator(async (p, signal) => {
        const aggregator = new StatsAggregator({ scope: p });
        if (!signal?.aborted) {
          aggregator.apply({ path: `${p}/a.ts`, commitId: 'c1', author: 'a@x', timestamp: 5, insertions: 1, deletions: 1 });
        }
        return { aggregator, source: 'scoped-scan', complete: !signal?.aborted };
      });

      await nav.expand('src');
      expect(nav.getNode('src')).toMatchObject({ loadState: 'loaded', expanded: true });
      expect(nav.getNode('src')?.stats?.totalChanges).toBe(2);

      const controller = new AbortController();
      controller.abort();
      await nav.expand('test', controller.signal);
      expect(nav.getNode('test')).toMatchObject({ loadState: 'unloaded', stats: null, expanded: true });
      nav.dispose();
    });

    it('surfaces load failures on the node', async () => {
      const { controller, nav } = lazyNavigator(async () => {
        throw new Error('permission denied');
      });
      const paths: Array<string | undefined> = [];
      nav.onUpdate((u) => paths.push(u.path));

      nav.requestExpand('test');
      await controller.expand('test');

      expect(nav.getNode('test')).toMatchObject({ loadState: 'unloaded', error: 'permission denied' });
      expect(paths).toEqual(['test', 'test', 'test']);
      nav.dispose();
    });
  });
});
