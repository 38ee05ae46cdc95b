import os from 'node:os';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { KB, MB } from '../format/bytes';

export const DEFAULT_MAX_SIZE = 5 * MB;
export const DEFAULT_MAX_FILE_SIZE = 500 * KB;

export const CollectOptionsSchema = z.object({
  /** Bypass hidden-file and gitignore filtering; embed binary content */
  all: z.boolean().default(false),
  /** Ceiling on the whole output, in bytes */
  maxSize: z.number().int().positive().default(DEFAULT_MAX_SIZE),
  /** Files larger than this are skipped without being read */
  maxFileSize: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
  /** Unconditional exclusion patterns, gitignore syntax */
  exclude: z.array(z.string()).default([]),
  /** Number of reads allowed in flight at once */
  concurrency: z
    .number()
    .int()
    .min(1)
    .default(() => os.availableParallelism()),
});

export type CollectOptionsInput = z.input<typeof CollectOptionsSchema>;
export type CollectOptions = z.infer<typeof CollectOptionsSchema>;

/**
 * Validates caller-supplied options and fills in defaults.
 *
 * @throws ConfigError listing every invalid field.
 */
export function parseCollectOptions(input: CollectOptionsInput = {}): CollectOptions {
  const result = CollectOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid collect options:\n${issues}`);
  }

  return result.data;
}
