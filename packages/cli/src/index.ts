#!/usr/bin/env node
import { AppError, exitCodeFor } from '@histree/shared';
import { createProgram } from './program';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts();

    if (opts.json) {
      if (e instanceof AppError) {
        console.log(
          JSON.stringify({
            error: {
              code: e.code,
              message: e.message,
              details: e.details,
            },
          }),
        );
      } else {
        console.log(
          JSON.stringify({
            error: {
              code: 'UnknownError',
              message: e instanceof Error ? e.message : String(e),
            },
          }),
        );
      }
    } else {
      console.error(`Error: ${(e instanceof Error && e.message) || String(e)}`);
      if (e instanceof AppError && e.details) {
        console.error(
          `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
        );
      }
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      } else {
        console.error(`\nFor more details, run with the --verbose flag.`);
      }
    }

    process.exit(exitCodeFor(e));
  }
}

void main();
