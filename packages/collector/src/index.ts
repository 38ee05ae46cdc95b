import nodeFs from 'node:fs/promises';
import {
  parseCollectOptions,
  PathError,
  SilentLogger,
  type CollectOptionsInput,
  type Logger,
} from '@treecat/shared';
import { Aggregator } from './aggregate';
import { StatsCollector } from './stats';
import type { CollectResult, PathEntry } from './types';
import { Walker, type WalkContext } from './walker';

export const name = '@treecat/collector';

export * from './types';
export * from './patterns';
export * from './ignore';
export * from './classify';
export * from './stats';
export * from './walker';
export * from './aggregate';

export interface CollectContext {
  /** Diagnostics sink; silent by default */
  logger?: Logger;
  /** File system implementation, for tests */
  fs?: typeof nodeFs;
}

/**
 * Collects every eligible file under `roots` into one output string.
 *
 * Roots are walked in argument order; an empty list means the current
 * directory. A root that cannot be read is recorded in `rootErrors` and the
 * rest are still collected.
 *
 * @throws ConfigError when `options` fail validation.
 */
export async function collect(
  roots: string[],
  options: CollectOptionsInput = {},
  context: CollectContext = {},
): Promise<CollectResult> {
  const resolved = parseCollectOptions(options);
  const logger = context.logger ?? new SilentLogger();
  const fs = context.fs ?? nodeFs;

  const stats = new StatsCollector();
  const walker = new Walker({ all: resolved.all, exclude: resolved.exclude }, fs, logger);
  const aggregator = new Aggregator(resolved, stats, fs, logger);
  const walkContext: WalkContext = { stats, seen: new Set() };
  const rootErrors: PathError[] = [];
  const targets = roots.length > 0 ? roots : ['.'];

  logger.debug(
    `Collecting ${targets.join(', ')} (concurrency ${resolved.concurrency}, max ${resolved.maxSize} bytes)`,
  );

  async function* candidates(): AsyncGenerator<PathEntry> {
    for (const root of targets) {
      try {
        yield* walker.walk(root, walkContext);
      } catch (e) {
        if (!(e instanceof PathError)) {
          throw e;
        }
        logger.warn(e.message);
        rootErrors.push(e);
      }
    }
  }

  await aggregator.run(candidates());

  return {
    output: aggregator.output,
    stats: stats.snapshot(),
    truncated: aggregator.truncated,
    rootErrors,
  };
}
