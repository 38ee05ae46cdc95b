import type { PatternList } from '../patterns';

/**
 * Rules read from one directory's `.gitignore`, linked to the nearest
 * ancestor directory that also had rules.
 */
export interface IgnoreRuleSet {
  /** Directory the rules are relative to, as a root-relative path ('' for the root) */
  base: string;
  /** Display path of the `.gitignore` the rules came from */
  source: string;
  rules: PatternList;
  parent?: IgnoreRuleSet;
}

export type PruneReason = 'hidden' | 'ignored' | 'excluded';

export type Resolution = { skip: false } | { skip: true; reason: PruneReason };

/**
 * The parts of an entry the resolver looks at. Content is never consulted.
 */
export interface EntryRef {
  name: string;
  /** Root-relative path, forward slashes */
  relativePath: string;
  isDirectory: boolean;
}

export interface IgnoreOptions {
  /** Bypass the hidden-file rule and every `.gitignore` */
  all: boolean;
  /** User patterns, always applied */
  exclude: string[];
}
