import { Command } from 'commander';
import { randomUUID } from 'crypto';
import { SORT_KEYS, SortKeySchema, UsageError, type ConfigInput, type SortKey } from '@histree/shared';
import {
  ActivityNavigator,
  ActivitySession,
  buildSkeleton,
  compileGlob,
  createSubtreeLoader,
  LazyLoadController,
  resolveLazyMode,
} from '@histree/history';
import { createContext, rootOptions, type CliDeps, type CommandContext } from '../context';
import { OutputRenderer, type BrowseView } from '../output';
import { onInterrupt, type InterruptHandle } from '../utils/interrupt';
import type { BrowseOptions } from '../types';

export const INTERRUPTED_MESSAGE = 'Interrupted. Progress saved; run again to resume.';

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseSortKey(value: string | undefined): SortKey | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = SortKeySchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Unknown sort key '${value}', expected one of: ${SORT_KEYS.join(', ')}`);
  }
  return parsed.data;
}

function browseFlags(options: BrowseOptions): ConfigInput {
  return {
    view: {
      sortKey: parseSortKey(options.sort),
      // NaN is rejected by the config schema
      depth: toNumber(options.depth),
      limit: toNumber(options.limit),
    },
  };
}

export function registerBrowseCommand(program: Command, deps: CliDeps) {
  program
    .argument('[repo]', 'Repository to browse (defaults to the current directory)')
    .option('--refresh', 'Discard the cache and rescan the whole history')
    .option('--resume', 'Continue from the last checkpoint (the default)')
    .option('--lazy', 'Load directory statistics only when expanded')
    .option('--no-lazy', 'Aggregate the whole repository up front')
    .option('--sort <key>', 'commitCount, latestChange, totalChanges or authorCount')
    .option('--depth <n>', 'Directory levels to show')
    .option('--limit <n>', 'Entries shown per directory')
    .option('--expand <paths...>', 'Directories to expand (and load, in lazy mode)')
    .option('--no-scan', 'Show cached results without scanning')
    .action(async (repo: string | undefined, _options: unknown, command: Command) => {
      const options = rootOptions<BrowseOptions>(command);
      if (options.refresh && options.resume) {
        throw new UsageError('--refresh and --resume cannot be combined');
      }

      const ctx = await createContext(repo, options, browseFlags(options), deps);
      compileGlob(ctx.config.scan.glob);

      const estimated =
        options.lazy === undefined && ctx.config.lazy.mode === 'auto'
          ? (await ctx.source.listFiles()).length
          : 0;
      const interrupts = deps.onInterrupt ?? onInterrupt;
      if (resolveLazyMode(ctx.config.lazy, estimated, options.lazy)) {
        await browseLazily(ctx, options, interrupts);
      } else {
        await browseFully(ctx, options, interrupts);
      }
    });
}

async function browseFully(
  ctx: CommandContext,
  options: BrowseOptions,
  interrupts: () => InterruptHandle,
): Promise<void> {
  const { config, logger } = ctx;
  const session = await ActivitySession.open({
    repoRoot: ctx.repoRoot,
    source: ctx.source,
    config,
    refresh: options.refresh,
    logger,
  });
  const navigator = new ActivityNavigator({ mode: 'full', session }, config.view.sortKey);
  const renderer = new OutputRenderer(options.json ?? false);
  const view: BrowseView = {
    repoRoot: ctx.repoRoot,
    navigator,
    depth: config.view.depth,
    limit: config.view.limit,
  };

  try {
    for (const path of options.expand ?? []) {
      navigator.requestExpand(path);
    }
    if (options.resume && session.freshness === 'empty') {
      await logger.warn('No checkpoint to resume from; starting a fresh scan');
    }

    let interrupted = false;
    if (options.scan) {
      if (session.freshness === 'stale' || session.freshness === 'partial') {
        renderer.preview(view, `Cached activity (${session.freshness}), updating...`);
      }
      const interrupt = interrupts();
      try {
        const outcome = await session.start(interrupt.signal);
        interrupted = outcome.status === 'cancelled';
      } finally {
        interrupt.dispose();
      }
    }

    renderer.render(view);
    if (interrupted) {
      console.error(INTERRUPTED_MESSAGE);
    }
  } finally {
    navigator.dispose();
    await session.close();
  }
}

async function browseLazily(
  ctx: CommandContext,
  options: BrowseOptions,
  interrupts: () => InterruptHandle,
): Promise<void> {
  const { config, logger } = ctx;
  const matcher = compileGlob(config.scan.glob);
  const tree = await buildSkeleton(ctx.source, matcher);
  const loader = createSubtreeLoader({
    repoRoot: ctx.repoRoot,
    source: ctx.source,
    config,
    matcher,
    refresh: options.refresh,
    logger,
    sessionId: randomUUID(),
  });
  const controller = new LazyLoadController({ tree, loader, logger });
  const navigator = new ActivityNavigator({ mode: 'lazy', controller }, config.view.sortKey);
  const renderer = new OutputRenderer(options.json ?? false);

  const interrupt = interrupts();
  try {
    const paths = options.expand ?? [];
    if (options.scan) {
      await Promise.all(paths.map((path) => navigator.expand(path, interrupt.signal)));
    }
    for (const path of paths) {
      const error = controller.error(path);
      if (error) {
        await logger.warn(`Could not load '${path}': ${error}`);
      }
    }

    renderer.render({
      repoRoot: ctx.repoRoot,
      navigator,
      depth: config.view.depth,
      limit: config.view.limit,
    });
    if (interrupt.signal.aborted) {
      console.error(INTERRUPTED_MESSAGE);
    }
  } finally {
    interrupt.dispose();
    navigator.dispose();
  }
}
