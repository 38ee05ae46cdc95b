#!/usr/bin/env tsx
import { AppError, exitCodeFor } from '@treecat/shared';
import { createProgram } from './program';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts();

    if (opts.json) {
      console.error(
        JSON.stringify({
          error: {
            code: e instanceof AppError ? e.code : 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
            details: e instanceof AppError ? e.details : undefined,
          },
        }),
      );
    } else {
      console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
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
