import { Command, Option } from 'commander';
import {
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_SIZE,
  formatAsUnit,
  parseSize,
  UsageError,
} from '@treecat/shared';
import { version } from '../package.json';
import { runCollect, type CollectCommandOptions } from './commands/collect';

export type CollectAction = (paths: string[], options: CollectCommandOptions) => Promise<number>;

function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`Invalid concurrency: ${value}. Use a whole number of at least 1`);
  }
  return n;
}

function appendPattern(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(action: CollectAction = runCollect): Command {
  const program = new Command();

  program
    .name('treecat')
    .description('Concatenate a file tree into one stream for the clipboard or stdout')
    .version(version)
    .argument('[paths...]', 'files or directories to collect (default: current directory)')
    .option('-a, --all', 'include hidden and gitignored files; embed binary files as base64')
    .addOption(
      new Option('-m, --max-size <size>', 'maximum total output size (e.g. 10MB, 500KB)')
        .default(DEFAULT_MAX_SIZE, formatAsUnit(DEFAULT_MAX_SIZE))
        .argParser(parseSize),
    )
    .addOption(
      new Option('-f, --max-file-size <size>', 'skip files larger than this')
        .default(DEFAULT_MAX_FILE_SIZE, formatAsUnit(DEFAULT_MAX_FILE_SIZE))
        .argParser(parseSize),
    )
    .option(
      '-e, --exclude <pattern>',
      'exclude paths matching a gitignore-style pattern (repeatable)',
      appendPattern,
      [],
    )
    .option('-o, --stdout', 'write to stdout instead of the clipboard')
    .option('-j, --concurrency <n>', 'number of files read at once', parseConcurrency)
    .option('--verbose', 'Enable verbose logging')
    .option('--json', 'Print statistics as JSON')
    .action(async (paths: string[], options: CollectCommandOptions) => {
      process.exitCode = await action(paths, options);
    });

  return program;
}
