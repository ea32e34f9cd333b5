import { Command } from 'commander';
import {
  CacheStore,
  freshness,
  resolveCacheDir,
  resolveCacheLocation,
  ROOT_PATH,
  StatsAggregator,
  summarizeTree,
} from '@histree/history';
import { createContext, rootOptions, type CliDeps } from '../context';
import { printTable } from '../output';

export function registerAnalyzeCommand(program: Command, deps: CliDeps) {
  program
    .command('analyze [repo]')
    .description('Print totals over the cached history of a repository')
    .action(async (repo: string | undefined, _options: unknown, command: Command) => {
      const ctx = await createContext(repo, rootOptions(command), {}, deps);
      const location = resolveCacheLocation(resolveCacheDir(ctx.repoRoot, ctx.config), {
        repoRoot: ctx.repoRoot,
        glob: ctx.config.scan.glob,
        scope: ROOT_PATH,
      });
      const snapshot = await CacheStore.inspect(location);
      if (!snapshot) {
        console.log(`No cache for ${ctx.repoRoot}. Run 'histree' to build one.`);
        return;
      }

      const aggregator = new StatsAggregator();
      aggregator.rebuild(snapshot.events);
      const summary = summarizeTree(aggregator.root);
      const state = freshness(snapshot.cursor, await ctx.source.headId());

      if (ctx.options.json) {
        console.log(JSON.stringify({ repoRoot: ctx.repoRoot, freshness: state, ...summary }, null, 2));
        return;
      }

      if (state !== 'current') {
        await ctx.logger.warn(`Cache is ${state}; run 'histree' to bring it up to date`);
      }
      printTable(
        [
          { metric: 'Files', value: summary.files },
          { metric: 'Directories', value: summary.directories },
          { metric: 'Commits', value: summary.commits },
          { metric: 'Insertions', value: summary.insertions },
          { metric: 'Deletions', value: summary.deletions },
          { metric: 'Authors', value: summary.authors.length },
        ],
        { head: ['Metric', 'Value'], colAligns: ['right', 'left'] },
      );
      if (summary.authors.length > 0) {
        console.log('\nAuthors:');
        summary.authors.forEach((author) => console.log(`- ${author}`));
      }
    });
}
