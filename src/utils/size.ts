/**
 * Byte sizes: parsing `10M` style thresholds and printing byte counts
 */

import { invalidArgumentsError } from '../cli/errors.js';

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

const UNIT_MULTIPLIERS: Record<string, number> = {
  '': 1,
  B: 1,
  K: KB,
  KB: KB,
  M: MB,
  MB: MB,
  G: GB,
  GB: GB,
  T: GB * 1024,
  TB: GB * 1024,
};

/**
 * Parse `512K`, `10M`, `1.5G` or a plain byte count
 */
export function parseSize(value: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*([A-Za-z]*)$/.exec(value.trim());
  const multiplier = match ? UNIT_MULTIPLIERS[match[2].toUpperCase()] : undefined;
  if (!match || multiplier === undefined) {
    throw invalidArgumentsError(`Invalid size "${value}". Use a number with an optional K, M, G or T suffix`);
  }
  return Math.floor(parseFloat(match[1]) * multiplier);
}

export function formatBytes(bytes: number): string {
  if (bytes < KB) return `${bytes} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(1)} KB`;
  if (bytes < GB) return `${(bytes / MB).toFixed(1)} MB`;
  return `${(bytes / GB).toFixed(1)} GB`;
}
