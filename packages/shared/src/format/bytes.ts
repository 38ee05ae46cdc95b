import { UsageError } from '../errors';

export const KB = 1024;
export const MB = 1024 * KB;
export const GB = 1024 * MB;

const UNIT_MULTIPLIERS: Record<string, number> = {
  '': 1,
  B: 1,
  K: KB,
  KB,
  M: MB,
  MB,
  G: GB,
  GB,
};

/**
 * Parses a human-readable size such as `500KB`, `1.5MB` or ` 10 mb `.
 * Units are binary multiples; a bare number is a byte count.
 *
 * @throws UsageError for non-numeric, negative, zero or unknown-unit input.
 */
export function parseSize(input: string): number {
  const normalized = input.trim().toUpperCase();
  const unitStart = normalized.search(/[A-Z]/);
  const numberPart = (unitStart === -1 ? normalized : normalized.slice(0, unitStart)).trim();
  const unitPart = unitStart === -1 ? '' : normalized.slice(unitStart).trim();

  const value = Number(numberPart);
  if (numberPart === '' || Number.isNaN(value)) {
    throw new UsageError(`Invalid number: ${numberPart}`);
  }
  if (value < 0) {
    throw new UsageError('Size cannot be negative');
  }

  const multiplier = UNIT_MULTIPLIERS[unitPart];
  if (multiplier === undefined) {
    throw new UsageError(`Unknown unit: ${unitPart}. Use B, KB, MB, or GB`);
  }

  const size = Math.floor(value * multiplier);
  if (size === 0) {
    throw new UsageError('Size must be greater than 0');
  }
  return size;
}

/**
 * Formats a byte count with the largest fitting unit, e.g. `1.50 KB`.
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  if (bytes === 0) {
    return '0 B';
  }

  let size = bytes;
  let unitIndex = 0;
  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  const unit = units[unitIndex];
  if (Number.isInteger(size)) return `${size} ${unit}`;
  if (size < 10) return `${size.toFixed(2)} ${unit}`;
  if (size < 100) return `${size.toFixed(1)} ${unit}`;
  return `${size.toFixed(0)} ${unit}`;
}

/**
 * Formats a limit in the unit it was most likely written in (`5MB`, `500KB`),
 * falling back to a plain byte count.
 */
export function formatAsUnit(bytes: number): string {
  if (bytes >= GB && bytes % GB === 0) return `${bytes / GB}GB`;
  if (bytes >= MB && bytes % MB === 0) return `${bytes / MB}MB`;
  if (bytes >= KB && bytes % KB === 0) return `${bytes / KB}KB`;
  return `${bytes} bytes`;
}
