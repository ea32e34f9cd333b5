import { Command } from 'commander';
import { version } from '../package.json';
import { registerBrowseCommand } from './commands/browse';
import { registerStatusCommand } from './commands/status';
import { registerAnalyzeCommand } from './commands/analyze';
import { registerCompactCommand } from './commands/compact';
import type { CliDeps } from './context';

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('histree')
    .description('Browse where and when a git repository changed')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured session events to a JSONL file')
    .option('--glob <pattern>', 'Only count files matching this pattern');

  registerBrowseCommand(program, deps);
  registerStatusCommand(program, deps);
  registerAnalyzeCommand(program, deps);
  registerCompactCommand(program, deps);

  return program;
}
