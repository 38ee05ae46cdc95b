import nodeFs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { ReadError, SilentLogger, toError, type Logger } from '@treecat/shared';
import { BINARY_CHECK_BYTES, classifyFile } from '../classify';
import type { StatsCollector } from '../stats';
import type { FileRecord, PathEntry } from '../types';
import { formatBlock } from './format';

export * from './format';

type Fs = typeof nodeFs;

export interface AggregatorOptions {
  /** Embed binary files as base64 instead of writing a marker */
  all: boolean;
  /** Ceiling on the UTF-8 byte length of the whole output */
  maxSize: number;
  /** Files larger than this are never opened */
  maxFileSize: number;
  /** Reads allowed in flight at once, at least 1 */
  concurrency: number;
}

/**
 * Reads candidate files concurrently and appends their blocks in the order
 * the candidates arrived.
 *
 * Completed reads wait in a buffer keyed by sequence number until every
 * earlier candidate has been emitted. Emission is synchronous, so the budget
 * check and the statistics update for one block cannot interleave with
 * another's.
 */
export class Aggregator {
  private readonly chunks: string[] = [];
  private readonly buffer = new Map<number, FileRecord>();
  private dispatched = 0;
  private nextToEmit = 0;
  private bytes = 0;
  private exhausted = false;
  private readonly fs: Fs;
  private readonly logger: Logger;

  constructor(
    private readonly options: AggregatorOptions,
    private readonly stats: StatsCollector,
    fs: Fs = nodeFs,
    logger: Logger = new SilentLogger(),
  ) {
    this.fs = fs;
    this.logger = logger;
  }

  get output(): string {
    return this.chunks.join('');
  }

  get truncated(): boolean {
    return this.exhausted;
  }

  get totalBytes(): number {
    return this.bytes;
  }

  /**
   * Consumes `candidates` to the end. Resolves once every dispatched read has
   * settled and been emitted or discarded.
   */
  async run(candidates: AsyncIterable<PathEntry>): Promise<void> {
    const { concurrency } = this.options;
    const inFlight = new Set<Promise<void>>();

    for await (const entry of candidates) {
      const seq = this.dispatched++;

      if (this.exhausted) {
        this.complete(seq, { entry, disposition: { kind: 'skipped', reason: 'budget' } });
        continue;
      }

      const task: Promise<void> = this.read(entry).then((record) => {
        inFlight.delete(task);
        this.complete(seq, record);
      });
      inFlight.add(task);

      // Wait for a free slot, and keep the reorder buffer bounded while an
      // early slow read holds everything behind it.
      while (
        inFlight.size > 0 &&
        (inFlight.size >= concurrency || this.buffer.size >= concurrency * 2)
      ) {
        await Promise.race(inFlight);
      }
    }

    await Promise.all(inFlight);
  }

  private complete(seq: number, record: FileRecord): void {
    this.buffer.set(seq, record);

    let next: FileRecord | undefined;
    while ((next = this.buffer.get(this.nextToEmit))) {
      this.buffer.delete(this.nextToEmit);
      this.nextToEmit++;
      this.emit(next);
    }
  }

  private emit(record: FileRecord): void {
    const { entry, disposition } = record;

    if (this.exhausted) {
      this.stats.skipFile('budget');
      return;
    }
    if (disposition.kind === 'skipped') {
      this.stats.skipFile(disposition.reason);
      return;
    }

    const block = formatBlock(entry.displayPath, disposition);
    const size = Buffer.byteLength(block, 'utf8');
    if (this.bytes + size > this.options.maxSize) {
      this.exhausted = true;
      this.stats.markTruncated();
      this.stats.skipFile('budget');
      this.logger.debug(`Budget exhausted at ${entry.displayPath} (${this.bytes} bytes written)`);
      return;
    }

    this.chunks.push(block);
    this.bytes += size;
    this.stats.recordEmitted(entry, disposition, size);
  }

  /**
   * Reads one file into its disposition. Never rejects: I/O failures become a
   * `read-error` skip.
   */
  private async read(entry: PathEntry): Promise<FileRecord> {
    const { maxFileSize, all } = this.options;
    let size: number | undefined;
    let handle: FileHandle | undefined;

    try {
      size = (await this.fs.stat(entry.absolutePath)).size;
      if (size > maxFileSize) {
        return { entry, size, disposition: { kind: 'skipped', reason: 'oversized' } };
      }

      handle = await this.fs.open(entry.absolutePath, 'r');
      const prefix = Buffer.alloc(BINARY_CHECK_BYTES);
      const { bytesRead } = await handle.read(prefix, 0, BINARY_CHECK_BYTES, 0);
      const head = prefix.subarray(0, bytesRead);

      const binary = classifyFile(entry.absolutePath, head) === 'binary';
      if (binary && !all) {
        return { entry, size, disposition: { kind: 'binary-marker' } };
      }

      const data =
        bytesRead < BINARY_CHECK_BYTES ? head : await this.fs.readFile(entry.absolutePath);
      // The file may have grown since it was stat'ed.
      if (data.length > maxFileSize) {
        return {
          entry,
          size: data.length,
          disposition: { kind: 'skipped', reason: 'oversized' },
        };
      }

      return {
        entry,
        size: data.length,
        disposition: binary
          ? { kind: 'binary-embedded', base64: data.toString('base64') }
          : { kind: 'text', content: data.toString('utf8') },
      };
    } catch (e) {
      const error = new ReadError(`Could not read ${entry.displayPath}: ${toError(e).message}`, {
        cause: e,
        details: { path: entry.displayPath },
      });
      this.logger.warn(error.message);
      return { entry, size, disposition: { kind: 'skipped', reason: 'read-error' }, error };
    } finally {
      if (handle) {
        await handle
          .close()
          .catch((e: unknown) =>
            this.logger.debug(`Failed to close ${entry.displayPath}: ${toError(e).message}`),
          );
      }
    }
  }
}
