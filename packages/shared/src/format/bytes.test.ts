import { describe, it, expect } from 'vitest';
import { UsageError } from '../errors';
import { formatAsUnit, formatBytes, parseSize } from './bytes';

describe('parseSize', () => {
  it('parses bare numbers and units', () => {
    expect(parseSize('100')).toBe(100);
    expect(parseSize('100B')).toBe(100);
    expect(parseSize('1KB')).toBe(1024);
    expect(parseSize('1K')).toBe(1024);
    expect(parseSize('5MB')).toBe(5 * 1024 * 1024);
    expect(parseSize('5m')).toBe(5 * 1024 * 1024);
    expect(parseSize('1GB')).toBe(1024 * 1024 * 1024);
    expect(parseSize('1G')).toBe(1024 * 1024 * 1024);
  });

  it('accepts fractions and surrounding spaces', () => {
    expect(parseSize('1.5MB')).toBe(1572864);
    expect(parseSize(' 10 MB ')).toBe(10 * 1024 * 1024);
  });

  it('rejects invalid input with a UsageError', () => {
    expect(() => parseSize('invalid')).toThrow(UsageError);
    expect(() => parseSize('invalid')).toThrow('Invalid number: ');
    expect(() => parseSize('-5MB')).toThrow('Size cannot be negative');
    expect(() => parseSize('5TB')).toThrow('Unknown unit: TB. Use B, KB, MB, or GB');
    expect(() => parseSize('0')).toThrow('Size must be greater than 0');
    expect(() => parseSize('0.0001KB')).toThrow('Size must be greater than 0');
  });
});

describe('formatBytes', () => {
  it('picks the largest fitting unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(15 * 1024 + 512)).toBe('15.5 KB');
    expect(formatBytes(150 * 1024 + 512)).toBe('151 KB');
    expect(formatBytes(1024 * 1024)).toBe('1 MB');
    expect(formatBytes(1024 * 1024 * 1024)).toBe('1 GB');
  });
});

describe('formatAsUnit', () => {
  it('formats whole multiples without decimals', () => {
    expect(formatAsUnit(5 * 1024 * 1024)).toBe('5MB');
    expect(formatAsUnit(500 * 1024)).toBe('500KB');
    expect(formatAsUnit(1024 * 1024 * 1024)).toBe('1GB');
    expect(formatAsUnit(100)).toBe('100 bytes');
  });
});
