import { collect } from '@treecat/collector';
import { ConsoleLogger, formatAsUnit, formatBytes, type Logger } from '@treecat/shared';
import { StatusRenderer } from '../output/renderer';
import { ClipboardSink, StdoutSink, type OutputSink } from '../sink';

export interface CollectCommandOptions {
  all?: boolean;
  maxSize: number;
  maxFileSize: number;
  exclude: string[];
  stdout?: boolean;
  concurrency?: number;
  verbose?: boolean;
  json?: boolean;
}

export interface CollectCommandDeps {
  sink?: OutputSink;
  logger?: Logger;
  renderer?: StatusRenderer;
}

/**
 * Collects `paths` and delivers the result to stdout or the clipboard.
 *
 * @returns the process exit code
 */
export async function runCollect(
  paths: string[],
  options: CollectCommandOptions,
  deps: CollectCommandDeps = {},
): Promise<number> {
  const logger =
    deps.logger ?? new ConsoleLogger({ level: options.verbose ? 'debug' : 'warn' });
  const renderer = deps.renderer ?? new StatusRenderer(!!options.json);
  const sink = deps.sink ?? (options.stdout ? new StdoutSink() : new ClipboardSink());

  // Fail before walking anything when the clipboard utility is missing.
  await sink.ensureAvailable();

  const result = await collect(
    paths,
    {
      all: !!options.all,
      maxSize: options.maxSize,
      maxFileSize: options.maxFileSize,
      exclude: options.exclude,
      concurrency: options.concurrency,
    },
    { logger },
  );

  const rootCount = paths.length > 0 ? paths.length : 1;
  if (result.rootErrors.length === rootCount) {
    renderer.summary(result);
    return 1;
  }

  const size = Buffer.byteLength(result.output, 'utf8');
  if (size === 0) {
    renderer.status(sink.describeEmpty());
    renderer.summary(result);
    return 0;
  }

  await sink.write(result.output);

  if (result.truncated) {
    renderer.warn(`Content truncated at ${formatAsUnit(options.maxSize)} limit`);
  }
  renderer.status(sink.describeSuccess(formatBytes(size)));
  renderer.summary(result);
  return 0;
}
