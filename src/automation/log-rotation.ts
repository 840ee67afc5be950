/**
 * Copy-and-truncate log rotation with numbered retention.
 *
 * Rotated copies are named `<name>.<YYYYMMDD-HHMMSS>` (plus `.gz` when
 * compressed). A second rotation within the same second adds `-1`, `-2`
 * and so on after the timestamp.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, statSync, truncateSync, unlinkSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { gzipFile } from './log-cleanup.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as `YYYYMMDD-HHMMSS`
 */
export function rotationStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rotated copies of `logName` in `dir`, newest first. Only names this
 * module produces match; other files are never touched.
 */
export function listRotated(dir: string, logName: string): string[] {
  if (!existsSync(dir)) return [];
  const pattern = new RegExp(`^${escapeRegExp(logName)}\\.(\\d{8}-\\d{6})(?:-(\\d+))?(?:\\.gz)?$`);
  const copies: { name: string; stamp: string; sequence: number }[] = [];
  for (const name of readdirSync(dir)) {
    const match = pattern.exec(name);
    if (match) {
      copies.push({ name, stamp: match[1], sequence: match[2] === undefined ? 0 : parseInt(match[2], 10) });
    }
  }
  return copies
    .sort((a, b) => b.stamp.localeCompare(a.stamp) || b.sequence - a.sequence)
    .map((copy) => copy.name);
}

/**
 * First free copy path for this stamp, compressed or not
 */
export function rotatedCopyPath(dir: string, logName: string, stamp: string): string {
  const base = join(dir, `${logName}.${stamp}`);
  const taken = (path: string): boolean => existsSync(path) || existsSync(`${path}.gz`);
  let copy = base;
  for (let sequence = 1; taken(copy); sequence++) {
    copy = `${base}-${sequence}`;
  }
  return copy;
}

export interface RotateOptions {
  numBackups: number;
  compress: boolean;
  /** Rotate only when the log is at least this big */
  minSizeBytes?: number;
  force: boolean;
  /** Where rotated copies go; defaults to the log's directory */
  targetDir?: string;
  dryRun?: boolean;
  now?: Date;
}

export type RotateOutcome =
  | { rotated: false; reason: string; size: number }
  | { rotated: true; size: number; rotatedTo: string; removed: string[] };

export function shouldRotate(size: number, options: Pick<RotateOptions, 'minSizeBytes' | 'force'>): string | null {
  if (options.force) return null;
  if (options.minSizeBytes === undefined) return 'neither --size nor --force given';
  if (size < options.minSizeBytes) return `size ${size} bytes is below the ${options.minSizeBytes} byte threshold`;
  return null;
}

/**
 * Rotated copies past the newest `keep`
 */
export function staleCopies(rotated: string[], keep: number): string[] {
  return rotated.slice(Math.max(keep, 0));
}

export async function rotateLog(logPath: string, options: RotateOptions): Promise<RotateOutcome> {
  const size = statSync(logPath).size;
  const skip = shouldRotate(size, options);
  if (skip) {
    return { rotated: false, reason: skip, size };
  }

  const name = basename(logPath);
  const dir = options.targetDir ?? dirname(logPath);
  const copy = rotatedCopyPath(dir, name, rotationStamp(options.now ?? new Date()));
  const rotatedTo = options.compress ? `${copy}.gz` : copy;

  if (options.dryRun) {
    const after = [basename(rotatedTo), ...listRotated(dir, name)];
    const removed = staleCopies(after, options.numBackups).map((n) => join(dir, n));
    return { rotated: true, size, rotatedTo, removed };
  }

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  copyFileSync(logPath, copy);
  if (options.compress) {
    await gzipFile(copy, rotatedTo);
  }
  truncateSync(logPath, 0);

  const removed: string[] = [];
  for (const stale of staleCopies(listRotated(dir, name), options.numBackups)) {
    const path = join(dir, stale);
    unlinkSync(path);
    removed.push(path);
  }

  return { rotated: true, size, rotatedTo, removed };
}
