import nodeFs from 'node:fs/promises';
import path from 'node:path';
import { join, SilentLogger, toError, type Logger } from '@treecat/shared';
import { compilePatternList, parseRules, type PatternList } from '../patterns';
import type { EntryRef, IgnoreOptions, IgnoreRuleSet, Resolution } from './types';

export * from './types';

export const GITIGNORE_FILENAME = '.gitignore';

type Fs = typeof nodeFs;

function relativeToBase(base: string, relativePath: string): string {
  return base === '' ? relativePath : relativePath.slice(base.length + 1);
}

/**
 * Whether the rule chain excludes `entry`. Rule sets are applied root first,
 * so a deeper `.gitignore` can negate what a shallower one excluded.
 */
export function isIgnored(entry: EntryRef, chain: IgnoreRuleSet | undefined): boolean {
  const sets: IgnoreRuleSet[] = [];
  for (let set = chain; set; set = set.parent) {
    sets.unshift(set);
  }

  let ignored = false;
  for (const set of sets) {
    const verdict = set.rules.verdict(
      relativeToBase(set.base, entry.relativePath),
      entry.isDirectory,
    );
    if (verdict !== undefined) ignored = verdict;
  }
  return ignored;
}

export function isHidden(entry: EntryRef): boolean {
  return entry.name.startsWith('.');
}

/**
 * Decides whether traversal drops an entry, and why.
 *
 * User excludes are checked first and cannot be negated by `.gitignore`
 * content. `all` turns off the hidden and gitignore rules but not the excludes.
 */
export function resolveEntry(
  entry: EntryRef,
  chain: IgnoreRuleSet | undefined,
  options: { all: boolean; excludes: PatternList },
): Resolution {
  if (options.excludes.verdict(entry.relativePath, entry.isDirectory)) {
    return { skip: true, reason: 'excluded' };
  }
  if (options.all) {
    return { skip: false };
  }
  if (isHidden(entry)) {
    return { skip: true, reason: 'hidden' };
  }
  if (isIgnored(entry, chain)) {
    return { skip: true, reason: 'ignored' };
  }
  return { skip: false };
}

export function shouldSkip(
  entry: EntryRef,
  chain: IgnoreRuleSet | undefined,
  all: boolean,
  exclude: string[] = [],
): boolean {
  return resolveEntry(entry, chain, { all, excludes: compileExcludes(exclude) }).skip;
}

export function compileExcludes(exclude: string[]): PatternList {
  return compilePatternList(exclude);
}

/**
 * Per-run resolver: compiles the user excludes once and loads `.gitignore`
 * files as directories are entered.
 */
export class IgnoreResolver {
  private readonly excludes: PatternList;
  private readonly fs: Fs;
  private readonly logger: Logger;

  constructor(
    private readonly options: IgnoreOptions,
    fs: Fs = nodeFs,
    logger: Logger = new SilentLogger(),
  ) {
    this.excludes = compileExcludes(options.exclude);
    this.fs = fs;
    this.logger = logger;
  }

  /**
   * Extends `parent` with the rules of `absoluteDir/.gitignore`.
   * Returns `parent` unchanged when the directory has no readable rules, or
   * when `all` is set.
   *
   * @param relativeDir root-relative path of the directory ('' for the root)
   * @param displayDir the directory as it is printed
   * @param logger overrides the resolver's logger for this directory
   */
  async loadRuleSet(
    absoluteDir: string,
    relativeDir: string,
    displayDir: string,
    parent: IgnoreRuleSet | undefined,
    logger: Logger = this.logger,
  ): Promise<IgnoreRuleSet | undefined> {
    if (this.options.all) {
      return parent;
    }

    let content: string;
    try {
      content = await this.fs.readFile(path.join(absoluteDir, GITIGNORE_FILENAME), 'utf-8');
    } catch (e) {
      const code = e instanceof Error && 'code' in e ? e.code : undefined;
      if (code !== 'ENOENT') {
        logger.debug(
          `Could not read ${join(displayDir, GITIGNORE_FILENAME)}: ${toError(e).message}`,
        );
      }
      return parent;
    }

    const rules = parseRules(content);
    if (rules.patterns.length === 0) {
      return parent;
    }
    return {
      base: relativeDir,
      source: join(displayDir, GITIGNORE_FILENAME),
      rules,
      parent,
    };
  }

  resolve(entry: EntryRef, chain: IgnoreRuleSet | undefined): Resolution {
    return resolveEntry(entry, chain, { all: this.options.all, excludes: this.excludes });
  }
}
