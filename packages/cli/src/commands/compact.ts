import { Command } from 'commander';
import { CacheStore, listCaches, resolveCacheDir } from '@histree/history';
import { createContext, rootOptions, type CliDeps } from '../context';
import { cachesOf, scopeLabel } from './status';

export interface CompactedCache {
  key: string;
  scope: string;
  recordsBefore: number;
  recordsAfter: number;
}

export function registerCompactCommand(program: Command, deps: CliDeps) {
  program
    .command('compact [repo]')
    .description('Rewrite the caches of a repository without duplicate records')
    .action(async (repo: string | undefined, _options: unknown, command: Command) => {
      const ctx = await createContext(repo, rootOptions(command), {}, deps);
      const entries = cachesOf(await listCaches(resolveCacheDir(ctx.repoRoot, ctx.config)), ctx.repoRoot);

      const results: CompactedCache[] = [];
      for (const { location, snapshot, error } of entries) {
        const header = snapshot?.header;
        if (!header) {
          await ctx.logger.warn(`Skipping cache ${location.key}: ${error ?? 'no header'}`);
          continue;
        }
        const identity = { repoRoot: header.repoRoot, glob: header.glob, scope: header.scope };
        const store = await CacheStore.open(location, identity, { logger: ctx.logger });
        try {
          await store.load();
          const result = await store.compact();
          results.push({ key: location.key, scope: header.scope, ...result });
        } finally {
          await store.close();
        }
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }
      if (results.length === 0) {
        console.log(`No caches for ${ctx.repoRoot}.`);
        return;
      }
      for (const result of results) {
        console.log(
          `Compacted ${scopeLabel(result.scope)}: ${result.recordsBefore} -> ${result.recordsAfter} records`,
        );
      }
    });
}
