import * as fs from 'fs/promises';
import nodeFs from 'node:fs/promises';
import * as path from 'path';
import * as os from 'os';
import { KB, MB, type Logger } from '@treecat/shared';
import { StatsCollector } from '../stats';
import type { PathEntry } from '../types';
import { Aggregator, BINARY_MARKER, formatBlock, type AggregatorOptions } from './index';

async function* stream(entries: PathEntry[]): AsyncGenerator<PathEntry> {
  for (const entry of entries) {
    yield entry;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('formatBlock', () => {
  it('adds a missing trailing newline to text', () => {
    expect(formatBlock('a.txt', { kind: 'text', content: 'hello' })).toBe(
      '--- a.txt ---\nhello\n\n',
    );
    expect(formatBlock('a.txt', { kind: 'text', content: 'hello\n' })).toBe(
      '--- a.txt ---\nhello\n\n',
    );
  });

  it('keeps empty content empty', () => {
    expect(formatBlock('empty', { kind: 'text', content: '' })).toBe('--- empty ---\n\n');
  });

  it('renders binary markers and embedded content', () => {
    expect(formatBlock('img.png', { kind: 'binary-marker' })).toBe(
      `--- img.png ---\n${BINARY_MARKER}\n\n`,
    );
    expect(formatBlock('img.png', { kind: 'binary-embedded', base64: 'AAEC' })).toBe(
      '--- img.png (binary, base64) ---\nAAEC\n\n',
    );
  });
});

describe('Aggregator', () => {
  let tmpDir: string;
  let stats: StatsCollector;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treecat-aggregate-test-'));
    stats = new StatsCollector();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>): Promise<PathEntry[]> {
    const entries: PathEntry[] = [];
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(tmpDir, name), content);
      entries.push(entry(name));
    }
    return entries;
  }

  function entry(name: string): PathEntry {
    return {
      kind: 'file',
      absolutePath: path.join(tmpDir, name),
      relativePath: name,
      displayPath: name,
      depth: 1,
    };
  }

  function aggregator(
    overrides: Partial<AggregatorOptions> = {},
    fsImpl: typeof nodeFs = nodeFs,
    logger?: Logger,
  ): Aggregator {
    return new Aggregator(
      { all: false, maxSize: 5 * MB, maxFileSize: 500 * KB, concurrency: 4, ...overrides },
      stats,
      fsImpl,
      logger,
    );
  }

  it('concatenates text files in candidate order', async () => {
    const entries = await createFiles({
      'a.txt': 'hello',
      'b.txt': 'world\n',
      'empty.txt': '',
    });
    const agg = aggregator();

    await agg.run(stream(entries));

    const expected = '--- a.txt ---\nhello\n\n--- b.txt ---\nworld\n\n--- empty.txt ---\n\n';
    expect(agg.output).toBe(expected);
    expect(agg.totalBytes).toBe(Buffer.byteLength(expected));
    const snapshot = stats.snapshot();
    expect(snapshot.filesProcessed).toBe(3);
    expect(snapshot.textFiles).toBe(3);
    expect(snapshot.totalBytes).toBe(Buffer.byteLength(expected));
    expect(snapshot.extensions).toEqual({ txt: 3 });
  });

  it('counts multi-byte content in bytes', async () => {
    const entries = await createFiles({ 'u.md': 'héllo' });
    const agg = aggregator();

    await agg.run(stream(entries));

    expect(agg.output).toBe('--- u.md ---\nhéllo\n\n');
    expect(agg.totalBytes).toBe(21);
  });

  it('writes a marker for binary files', async () => {
    const entries = await createFiles({
      'data.dat': Buffer.from([0x00, 0x01, 0x02, 0x03]),
      'logo.png': 'not really an image',
    });
    const agg = aggregator();

    await agg.run(stream(entries));

    expect(agg.output).toBe(
      `--- data.dat ---\n${BINARY_MARKER}\n\n--- logo.png ---\n${BINARY_MARKER}\n\n`,
    );
    const snapshot = stats.snapshot();
    expect(snapshot.binaryFiles).toBe(2);
    expect(snapshot.binaryMarked).toBe(2);
  });

  it('embeds binary files as base64 with all', async () => {
    const small = Buffer.from([0x00, 0xff, 0x10, 0x80]);
    const large = Buffer.alloc(10_000, 0);
    large.write('tail', 9_990);
    const entries = await createFiles({ 'small.bin': small, 'large.bin': large });
    const agg = aggregator({ all: true });

    await agg.run(stream(entries));

    const blocks = agg.output.split('\n\n').filter(Boolean);
    expect(blocks).toHaveLength(2);
    expect(blocks[0]).toBe(`--- small.bin (binary, base64) ---\n${small.toString('base64')}`);
    const [header, body] = blocks[1].split('\n');
    expect(header).toBe('--- large.bin (binary, base64) ---');
    expect(Buffer.from(body, 'base64').equals(large)).toBe(true);
    const snapshot = stats.snapshot();
    expect(snapshot.binaryFiles).toBe(2);
    expect(snapshot.binaryMarked).toBe(0);
  });

  it('reads text files longer than the classifier window in full', async () => {
    const content = 'line\n'.repeat(3_000);
    const entries = await createFiles({ 'long.txt': content });
    const agg = aggregator();

    await agg.run(stream(entries));

    expect(agg.output).toBe(`--- long.txt ---\n${content}\n`);
  });

  it('skips files over the per-file ceiling without opening them', async () => {
    const entries = await createFiles({
      'exact.txt': 'x'.repeat(10),
      'over.txt': 'x'.repeat(11),
    });
    const spyFs = { ...nodeFs };
    const openSpy = vi.spyOn(spyFs, 'open');
    const agg = aggregator({ maxFileSize: 10 }, spyFs);

    await agg.run(stream(entries));

    expect(agg.output).toBe(`--- exact.txt ---\n${'x'.repeat(10)}\n\n`);
    expect(openSpy).toHaveBeenCalledTimes(1);
    expect(stats.snapshot().filesSkipped.oversized).toBe(1);
  });

  it('records unreadable files as read errors', async () => {
    const entries = await createFiles({ 'ok.txt': 'ok' });
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    const agg = aggregator({}, nodeFs, logger);

    await agg.run(stream([entry('missing.txt'), ...entries]));

    expect(agg.output).toBe('--- ok.txt ---\nok\n\n');
    expect(stats.snapshot().filesSkipped['read-error']).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^Could not read missing\.txt: ENOENT/),
    );
  });

  it('stops at the first block over the total ceiling', async () => {
    const content = `${'x'.repeat(59)}\n`;
    const entries = await createFiles({ f1: content, f2: content, f3: content });
    const agg = aggregator({ maxSize: 100 });

    await agg.run(stream(entries));

    expect(agg.output).toBe(`--- f1 ---\n${content}\n`);
    expect(agg.totalBytes).toBe(72);
    expect(agg.truncated).toBe(true);
    const snapshot = stats.snapshot();
    expect(snapshot.filesProcessed).toBe(1);
    expect(snapshot.filesSkipped.budget).toBe(2);
    expect(snapshot.truncated).toBe(true);
  });

  it('allows output exactly at the ceiling', async () => {
    // Each block is '--- a ---\naaaa\n\n', 16 bytes
    const entries = await createFiles({ a: 'aaaa\n', b: 'bbbb\n' });

    const exact = aggregator({ maxSize: 32 });
    await exact.run(stream(entries));
    expect(exact.totalBytes).toBe(32);
    expect(exact.truncated).toBe(false);

    stats = new StatsCollector();
    const under = aggregator({ maxSize: 31 });
    await under.run(stream(entries));
    expect(under.output).toBe('--- a ---\naaaa\n\n');
    expect(under.truncated).toBe(true);
  });

  it('stops dispatching reads once the budget is exhausted', async () => {
    const entries = await createFiles({ a: 'aaaa\n', b: 'bbbb\n', c: 'cccc\n', d: 'dddd\n' });
    const spyFs = { ...nodeFs };
    const statSpy = vi.spyOn(spyFs, 'stat');
    const agg = aggregator({ maxSize: 20, concurrency: 1 }, spyFs);

    await agg.run(stream(entries));

    expect(agg.output).toBe('--- a ---\naaaa\n\n');
    expect(statSpy).toHaveBeenCalledTimes(2);
    expect(stats.snapshot().filesSkipped.budget).toBe(3);
  });

  describe('concurrency', () => {
    const delays: Record<string, number> = { a: 40, b: 0, c: 25, d: 5, e: 15, f: 0 };

    function delayedFs(onActive?: (active: number) => void): typeof nodeFs {
      const spyFs = { ...nodeFs };
      let active = 0;
      vi.spyOn(spyFs, 'stat').mockImplementation(async (p) => {
        active++;
        onActive?.(active);
        await sleep(delays[path.basename(String(p))] ?? 0);
        active--;
        return nodeFs.stat(p);
      });
      return spyFs;
    }

    async function runWith(concurrency: number, fsImpl: typeof nodeFs): Promise<string> {
      const entries = await createFiles({
        a: 'A',
        b: 'B',
        c: 'C',
        d: 'D',
        e: 'E',
        f: 'F',
      });
      const agg = aggregator({ concurrency }, fsImpl);
      await agg.run(stream(entries));
      return agg.output;
    }

    it('emits in candidate order regardless of completion order', async () => {
      const sequential = await runWith(1, delayedFs());
      stats = new StatsCollector();
      const parallel = await runWith(8, delayedFs());

      expect(parallel).toBe(sequential);
      expect(parallel).toBe(
        ['a', 'b', 'c', 'd', 'e', 'f'].map((n) => `--- ${n} ---\n${n.toUpperCase()}\n\n`).join(''),
      );
    });

    it('never runs more reads than the concurrency limit', async () => {
      let peak = 0;
      await runWith(
        2,
        delayedFs((active) => {
          peak = Math.max(peak, active);
        }),
      );

      expect(peak).toBeGreaterThan(0);
      expect(peak).toBeLessThanOrEqual(2);
    });
  });
});
