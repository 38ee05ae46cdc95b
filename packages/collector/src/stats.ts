import path from 'node:path';
import { performance } from 'node:perf_hooks';
import type {
  DirectorySkipReason,
  EmittedDisposition,
  FileSkipReason,
  PathEntry,
  Statistics,
} from './types';

function emptyFileSkips(): Record<FileSkipReason, number> {
  return {
    hidden: 0,
    ignored: 0,
    excluded: 0,
    duplicate: 0,
    oversized: 0,
    budget: 0,
    'read-error': 0,
  };
}

function emptyDirectorySkips(): Record<DirectorySkipReason, number> {
  return { hidden: 0, ignored: 0, excluded: 0, duplicate: 0, symlink: 0 };
}

/**
 * Run-scoped statistics. Owned by one collect() call and handed explicitly to
 * the walker and the aggregator; every update happens on the coordinating
 * event-loop turn.
 */
export class StatsCollector {
  private readonly startedAt = performance.now();
  private filesProcessed = 0;
  private textFiles = 0;
  private binaryFiles = 0;
  private binaryMarked = 0;
  private readonly filesSkipped = emptyFileSkips();
  private directoriesVisited = 0;
  private readonly directoriesSkipped = emptyDirectorySkips();
  private totalBytes = 0;
  private readonly gitignoreFiles: string[] = [];
  private readonly extensions = new Map<string, number>();
  private truncated = false;

  visitDirectory(): void {
    this.directoriesVisited++;
  }

  skipDirectory(reason: DirectorySkipReason): void {
    this.directoriesSkipped[reason]++;
  }

  skipFile(reason: FileSkipReason): void {
    this.filesSkipped[reason]++;
  }

  recordGitignore(source: string): void {
    this.gitignoreFiles.push(source);
  }

  markTruncated(): void {
    this.truncated = true;
  }

  /**
   * Counts a file whose block was appended to the output.
   */
  recordEmitted(entry: PathEntry, disposition: EmittedDisposition, bytes: number): void {
    this.filesProcessed++;
    this.totalBytes += bytes;

    switch (disposition.kind) {
      case 'text':
        this.textFiles++;
        break;
      case 'binary-marker':
        this.binaryFiles++;
        this.binaryMarked++;
        break;
      case 'binary-embedded':
        this.binaryFiles++;
        break;
    }

    const ext = path.extname(entry.absolutePath).slice(1).toLowerCase();
    if (ext) {
      this.extensions.set(ext, (this.extensions.get(ext) ?? 0) + 1);
    }
  }

  snapshot(): Statistics {
    return {
      filesProcessed: this.filesProcessed,
      textFiles: this.textFiles,
      binaryFiles: this.binaryFiles,
      binaryMarked: this.binaryMarked,
      filesSkipped: { ...this.filesSkipped },
      directoriesVisited: this.directoriesVisited,
      directoriesSkipped: { ...this.directoriesSkipped },
      totalBytes: this.totalBytes,
      elapsedMs: performance.now() - this.startedAt,
      gitignoreFiles: [...this.gitignoreFiles],
      extensions: Object.fromEntries(this.extensions),
      truncated: this.truncated,
    };
  }
}
