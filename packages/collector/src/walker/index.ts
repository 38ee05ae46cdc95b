import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import {
  basename,
  join,
  normalizePath,
  PathError,
  SilentLogger,
  toError,
  type Logger,
} from '@treecat/shared';
import { IgnoreResolver, type IgnoreOptions } from '../ignore';
import type { StatsCollector } from '../stats';
import type { EntryKind, PathEntry } from '../types';

type Fs = typeof nodeFs;

export interface WalkContext {
  stats: StatsCollector;
  /**
   * Real paths of directories entered and files yielded so far. Shared by
   * every root of one run so overlapping roots and links yield a file once.
   */
  seen: Set<string>;
}

interface Child {
  name: string;
  kind: EntryKind;
  /** Dedupe key; the real path for links, parent real path + name otherwise */
  key: string;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Breadth-first traversal of one root at a time.
 *
 * Every directory at depth d is listed and filtered before any directory at
 * depth d+1. Within a directory, files are yielded in name order. Pruned
 * directories are never listed, and links to directories are never followed.
 */
export class Walker {
  private readonly resolver: IgnoreResolver;
  private readonly fs: Fs;
  private readonly logger: Logger;

  constructor(
    options: IgnoreOptions,
    fs: Fs = nodeFs,
    logger: Logger = new SilentLogger(),
  ) {
    this.fs = fs;
    this.logger = logger;
    this.resolver = new IgnoreResolver(options, fs, logger);
  }

  /**
   * Yields the candidate files under `root`.
   *
   * @throws PathError when the root itself cannot be stat'ed or listed.
   */
  async *walk(root: string, context: WalkContext): AsyncGenerator<PathEntry> {
    const displayRoot = normalizePath(root);
    const absoluteRoot = path.resolve(root);
    const logger = this.logger.child({ root: displayRoot });

    let realRoot: string;
    let rootIsDirectory: boolean;
    try {
      const stats = await this.fs.stat(absoluteRoot);
      realRoot = await this.fs.realpath(absoluteRoot);
      rootIsDirectory = stats.isDirectory();
    } catch (e) {
      throw new PathError(root, `Path '${root}' does not exist or is not accessible`, {
        cause: e,
      });
    }

    if (!rootIsDirectory) {
      yield* this.walkFileRoot(displayRoot, absoluteRoot, realRoot, context);
      return;
    }

    const queue: PathEntry[] = [
      {
        kind: 'directory',
        absolutePath: absoluteRoot,
        relativePath: '',
        displayPath: displayRoot,
        depth: 0,
      },
    ];

    let current: PathEntry | undefined;
    while ((current = queue.shift())) {
      const isRoot = current.depth === 0;

      let realDir: string;
      try {
        realDir = isRoot ? realRoot : await this.fs.realpath(current.absolutePath);
      } catch (e) {
        logger.warn(`Skipping ${current.displayPath}: ${toError(e).message}`);
        continue;
      }
      if (context.seen.has(realDir)) {
        context.stats.skipDirectory('duplicate');
        continue;
      }
      context.seen.add(realDir);

      let dirents: Dirent[];
      try {
        dirents = await this.fs.readdir(current.absolutePath, { withFileTypes: true });
      } catch (e) {
        if (isRoot) {
          throw new PathError(root, `Path '${root}' could not be read`, { cause: e });
        }
        logger.warn(`Skipping ${current.displayPath}: ${toError(e).message}`);
        continue;
      }
      context.stats.visitDirectory();

      const rules = await this.resolver.loadRuleSet(
        current.absolutePath,
        current.relativePath,
        current.displayPath,
        current.rules,
        logger,
      );
      if (rules && rules !== current.rules) {
        context.stats.recordGitignore(rules.source);
      }

      dirents.sort((a, b) => compareNames(a.name, b.name));

      const files: PathEntry[] = [];
      for (const dirent of dirents) {
        const child = await this.resolveDirent(current.absolutePath, realDir, dirent, logger);
        if (!child) continue;

        const relativePath = current.relativePath
          ? `${current.relativePath}/${child.name}`
          : child.name;
        const isDirectory = child.kind === 'directory';
        const resolution = this.resolver.resolve(
          { name: child.name, relativePath, isDirectory },
          rules,
        );
        if (resolution.skip) {
          if (isDirectory) {
            context.stats.skipDirectory(resolution.reason);
          } else {
            context.stats.skipFile(resolution.reason);
          }
          continue;
        }

        if (isDirectory && dirent.isSymbolicLink()) {
          context.stats.skipDirectory('symlink');
          continue;
        }

        const entry: PathEntry = {
          kind: child.kind,
          absolutePath: path.join(current.absolutePath, child.name),
          relativePath,
          displayPath: join(displayRoot, relativePath),
          depth: current.depth + 1,
          rules,
        };

        if (isDirectory) {
          queue.push(entry);
        } else if (context.seen.has(child.key)) {
          context.stats.skipFile('duplicate');
        } else {
          context.seen.add(child.key);
          files.push(entry);
        }
      }

      yield* files;
    }
  }

  private async *walkFileRoot(
    displayRoot: string,
    absoluteRoot: string,
    realRoot: string,
    context: WalkContext,
  ): AsyncGenerator<PathEntry> {
    const name = basename(displayRoot);
    const resolution = this.resolver.resolve(
      { name, relativePath: name, isDirectory: false },
      undefined,
    );
    if (resolution.skip && resolution.reason === 'excluded') {
      context.stats.skipFile('excluded');
      return;
    }
    if (context.seen.has(realRoot)) {
      context.stats.skipFile('duplicate');
      return;
    }
    context.seen.add(realRoot);

    yield {
      kind: 'file',
      absolutePath: absoluteRoot,
      relativePath: name,
      displayPath: displayRoot,
      depth: 0,
    };
  }

  /**
   * Resolves a directory entry to a file or directory. Links are classified
   * by their target. A dangling link stays a file so the failed read is
   * counted; sockets, FIFOs and devices are dropped.
   */
  private async resolveDirent(
    parentPath: string,
    parentRealPath: string,
    dirent: Dirent,
    logger: Logger,
  ): Promise<Child | undefined> {
    const name = dirent.name;
    if (dirent.isDirectory()) {
      return { name, kind: 'directory', key: path.join(parentRealPath, name) };
    }
    if (dirent.isFile()) {
      return { name, kind: 'file', key: path.join(parentRealPath, name) };
    }
    if (!dirent.isSymbolicLink()) {
      logger.debug(`Ignoring special file ${path.join(parentPath, name)}`);
      return undefined;
    }

    const linkPath = path.join(parentPath, name);
    try {
      const target = await this.fs.stat(linkPath);
      const key = await this.fs.realpath(linkPath);
      if (target.isDirectory()) return { name, kind: 'directory', key };
      if (target.isFile()) return { name, kind: 'file', key };
      return undefined;
    } catch (e) {
      logger.debug(`Dangling link ${linkPath}: ${toError(e).message}`);
      return { name, kind: 'file', key: linkPath };
    }
  }
}
