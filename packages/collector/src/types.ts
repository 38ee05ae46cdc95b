import type { PathError, ReadError } from '@treecat/shared';
import type { IgnoreRuleSet } from './ignore/types';

export type EntryKind = 'file' | 'directory';

/**
 * A file or directory met during traversal.
 */
export interface PathEntry {
  kind: EntryKind;
  /** Absolute path on disk */
  absolutePath: string;
  /** Path relative to the root it was found under, forward slashes; '' for the root itself */
  relativePath: string;
  /** The root argument joined with `relativePath`; used in output headers */
  displayPath: string;
  /** 0 for a root, parent depth + 1 otherwise */
  depth: number;
  /** Innermost rule set in effect for this entry's directory (non-owning) */
  rules?: IgnoreRuleSet;
}

/** Why a directory was not descended into. */
export type DirectorySkipReason = 'hidden' | 'ignored' | 'excluded' | 'duplicate' | 'symlink';

/** Why a file contributed nothing to the output. */
export type FileSkipReason =
  | 'hidden'
  | 'ignored'
  | 'excluded'
  | 'duplicate'
  | 'oversized'
  | 'budget'
  | 'read-error';

export type Disposition =
  | { kind: 'text'; content: string }
  | { kind: 'binary-marker' }
  | { kind: 'binary-embedded'; base64: string }
  | { kind: 'skipped'; reason: FileSkipReason };

/** Dispositions that produce an output block. */
export type EmittedDisposition = Exclude<Disposition, { kind: 'skipped' }>;

export interface FileRecord {
  entry: PathEntry;
  /** Byte size on disk; undefined when the file was never stat'ed */
  size?: number;
  disposition: Disposition;
  /** Set for a `read-error` skip */
  error?: ReadError;
}

export interface Statistics {
  /** Files appended to the output */
  filesProcessed: number;
  textFiles: number;
  binaryFiles: number;
  /** Binary files written as a marker instead of their content */
  binaryMarked: number;
  filesSkipped: Record<FileSkipReason, number>;
  directoriesVisited: number;
  directoriesSkipped: Record<DirectorySkipReason, number>;
  /** UTF-8 byte length of the output */
  totalBytes: number;
  elapsedMs: number;
  /** Display paths of every `.gitignore` that was loaded, in load order */
  gitignoreFiles: string[];
  /** Processed files per lower-cased extension, without the dot */
  extensions: Record<string, number>;
  truncated: boolean;
}

export interface CollectResult {
  output: string;
  stats: Statistics;
  truncated: boolean;
  /** One entry per root that could not be collected */
  rootErrors: PathError[];
}
