import { Command } from 'commander';
import {
  ConfigLoader,
  ConsoleLogger,
  JsonlLogger,
  type Config,
  type ConfigInput,
  type Logger,
} from '@histree/shared';
import { findRepoRoot, GitService, type GitDataSource } from '@histree/history';
import type { GlobalOptions } from './types';
import type { InterruptHandle } from './utils/interrupt';

export interface CliDeps {
  /** Git access for a repository root; spawns git by default */
  createSource?: (repoRoot: string) => GitDataSource;
  /** Where the user config is looked up */
  homeDir?: string;
  /** Source of the abort that stops a running scan; Ctrl-C by default */
  onInterrupt?: () => InterruptHandle;
}

export interface CommandContext {
  repoRoot: string;
  config: Config;
  logger: Logger;
  source: GitDataSource;
  options: GlobalOptions;
}

export function rootOptions<T extends GlobalOptions>(command: Command): T {
  let program = command;
  while (program.parent) {
    program = program.parent;
  }
  return program.opts<T>();
}

/**
 * Locates the repository and loads its configuration. Fails before any
 * output is written.
 */
export async function createContext(
  repo: string | undefined,
  options: GlobalOptions,
  flags: ConfigInput,
  deps: CliDeps,
): Promise<CommandContext> {
  const repoRoot = await findRepoRoot(repo ?? process.cwd());
  const config = ConfigLoader.load({
    configPath: options.config,
    cwd: repoRoot,
    homeDir: deps.homeDir,
    flags: { ...flags, scan: { ...flags.scan, glob: options.glob } },
  });
  const logger: Logger = options.logFile
    ? new JsonlLogger(options.logFile)
    : new ConsoleLogger({ verbose: options.verbose });
  const source = deps.createSource ? deps.createSource(repoRoot) : new GitService({ repoRoot });
  return { repoRoot, config, logger, source, options };
}
