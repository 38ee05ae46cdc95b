import pc from 'picocolors';
import type { CollectResult, Statistics } from '@treecat/collector';
import { MB } from '@treecat/shared';

const SKIP_LABELS: Record<string, string> = {
  hidden: 'hidden',
  ignored: 'gitignored',
  excluded: 'excluded',
  duplicate: 'duplicate',
  symlink: 'symlinked',
  oversized: 'oversized',
  budget: 'over budget',
  'read-error': 'unreadable',
};

function sum(counts: Record<string, number>): number {
  return Object.values(counts).reduce((total, n) => total + n, 0);
}

/**
 * Human-readable statistics summary, one line per entry.
 */
export function formatStats(stats: Statistics): string[] {
  const seconds = stats.elapsedMs / 1000;
  const lines = [
    `Processed ${stats.filesProcessed} files and ${stats.directoriesVisited} directories in ${seconds.toFixed(2)}s`,
  ];

  if (stats.gitignoreFiles.length > 0) {
    lines.push(`Using .gitignore: ${stats.gitignoreFiles.join(', ')}`);
  }

  if (stats.filesProcessed > 0) {
    lines.push(
      `Files: ${stats.textFiles} text, ${stats.binaryFiles} binary, ${stats.filesSkipped['read-error']} unreadable`,
    );
  }

  const skippedFiles = sum(stats.filesSkipped);
  const skippedDirs = sum(stats.directoriesSkipped);
  if (skippedFiles > 0 || skippedDirs > 0) {
    const byReason = new Map<string, number>();
    for (const counts of [stats.filesSkipped, stats.directoriesSkipped]) {
      for (const [reason, n] of Object.entries(counts)) {
        if (n > 0) byReason.set(reason, (byReason.get(reason) ?? 0) + n);
      }
    }
    const reasons = [...byReason].map(([reason, n]) => `${n} ${SKIP_LABELS[reason] ?? reason}`);
    lines.push(
      `Skipped: ${skippedFiles} files, ${skippedDirs} directories (${reasons.join(', ')})`,
    );
  }

  const extensions = Object.entries(stats.extensions)
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
    .slice(0, 10)
    .map(([ext, n]) => `.${ext} (${n})`);
  if (extensions.length > 0) {
    lines.push(`Top extensions: ${extensions.join(', ')}`);
  }

  if (seconds > 0) {
    const filesPerSec = stats.filesProcessed / seconds;
    const mbPerSec = stats.totalBytes / MB / seconds;
    lines.push(`Speed: ${filesPerSec.toFixed(0)} files/sec, ${mbPerSec.toFixed(2)} MB/sec`);
  }

  return lines;
}

/**
 * Writes status and statistics to stderr. Stdout carries only the collected
 * content.
 */
export class StatusRenderer {
  constructor(private isJson: boolean) {}

  status(message: string): void {
    if (this.isJson) {
      // JSON mode prints only the final report
    } else {
      console.error(message);
    }
  }

  warn(message: string): void {
    if (!this.isJson) {
      console.error(pc.yellow(message));
    }
  }

  summary(result: CollectResult): void {
    if (this.isJson) {
      console.error(
        JSON.stringify(
          {
            stats: result.stats,
            truncated: result.truncated,
            rootErrors: result.rootErrors.map((e) => ({ path: e.path, message: e.message })),
          },
          null,
          2,
        ),
      );
      return;
    }

    const [headline, ...rest] = formatStats(result.stats);
    console.error(`\n${pc.bold(headline)}`);
    rest.forEach((line) => console.error(pc.gray(line)));
  }
}
