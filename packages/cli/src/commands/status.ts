import { Command } from 'commander';
import { freshness, listCaches, resolveCacheDir, type CatalogEntry } from '@histree/history';
import { createContext, rootOptions, type CliDeps } from '../context';
import { printTable } from '../output';

export type CacheStatusRow = {
  scope: string;
  glob: string;
  events: number;
  commits: number;
  freshness: string;
  key: string;
};

export function scopeLabel(scope: string): string {
  return scope === '' ? '(root)' : scope;
}

/** Caches written for `repoRoot`, plus any whose header cannot be read. */
export function cachesOf(entries: CatalogEntry[], repoRoot: string): CatalogEntry[] {
  return entries.filter((entry) => !entry.snapshot || entry.snapshot.header?.repoRoot === repoRoot);
}

export function registerStatusCommand(program: Command, deps: CliDeps) {
  program
    .command('status [repo]')
    .description('Show the caches of a repository and how current they are')
    .action(async (repo: string | undefined, _options: unknown, command: Command) => {
      const ctx = await createContext(repo, rootOptions(command), {}, deps);
      const head = await ctx.source.headId();
      const entries = cachesOf(await listCaches(resolveCacheDir(ctx.repoRoot, ctx.config)), ctx.repoRoot);

      const rows: CacheStatusRow[] = entries.map(({ location, snapshot, error }) => {
        const header = snapshot?.header;
        return {
          scope: header ? scopeLabel(header.scope) : '?',
          glob: header?.glob ?? '?',
          events: snapshot?.events.length ?? 0,
          commits: snapshot?.cursor?.processedCount ?? 0,
          freshness: snapshot ? freshness(snapshot.cursor, head) : `unreadable: ${error ?? 'unknown'}`,
          key: location.key,
        };
      });

      if (ctx.options.json) {
        console.log(JSON.stringify({ repoRoot: ctx.repoRoot, head, caches: rows }, null, 2));
        return;
      }
      if (rows.length === 0) {
        console.log(`No caches for ${ctx.repoRoot}. Run 'histree' to build one.`);
        return;
      }
      printTable(rows, { head: ['Scope', 'Glob', 'Events', 'Commits', 'Freshness', 'Key'] });
    });
}
