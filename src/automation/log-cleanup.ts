/**
 * Cleanup of old or oversized log files.
 *
 * Selected files are gzipped, truncated or deleted. Failures on one file
 * are collected and the rest continue.
 */

import { createReadStream, createWriteStream, statSync, truncateSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import { glob } from 'glob';
import { errorMessage } from '../cli/errors.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export type CleanupAction = 'delete' | 'compress' | 'truncate';

export interface SelectOptions {
  /** Whole days a file must exceed; 0 disables the age test */
  maxAgeDays: number;
  /** Bytes a file must exceed; undefined disables the size test */
  minSizeBytes?: number;
  /** Without the leading dot */
  extension: string;
  recursive: boolean;
  /** Inject current time for deterministic tests */
  nowMs?: number;
}

export interface LogFile {
  path: string;
  size: number;
  ageDays: number;
}

/**
 * Age in whole days, the way `find -mtime` counts it
 */
export function ageInDays(mtimeMs: number, nowMs: number): number {
  return Math.floor((nowMs - mtimeMs) / DAY_MS);
}

export async function selectLogFiles(dir: string, options: SelectOptions): Promise<LogFile[]> {
  const nowMs = options.nowMs ?? Date.now();
  const pattern = `${options.recursive ? '**/' : ''}*.${options.extension}`;
  const found = await glob(pattern, { cwd: dir, nodir: true, dot: true });

  const selected: LogFile[] = [];
  for (const relative of found.sort()) {
    const path = join(dir, relative);
    const st = statSync(path, { throwIfNoEntry: false });
    if (!st) continue; // rotated away while listing
    const ageDays = ageInDays(st.mtimeMs, nowMs);
    if (options.maxAgeDays > 0 && ageDays <= options.maxAgeDays) continue;
    if (options.minSizeBytes !== undefined && st.size <= options.minSizeBytes) continue;
    selected.push({ path, size: st.size, ageDays });
  }
  return selected;
}

/**
 * gzip `path` to `path.gz` and remove the original; returns the
 * compressed size
 */
export async function gzipFile(path: string, target = `${path}.gz`): Promise<number> {
  await pipeline(createReadStream(path), createGzip(), createWriteStream(target));
  unlinkSync(path);
  return statSync(target).size;
}

export interface CleanupResult {
  processed: { path: string; action: CleanupAction; freedBytes: number }[];
  failed: { path: string; error: string }[];
  freedBytes: number;
}

export async function cleanupLogFiles(
  files: LogFile[],
  action: CleanupAction,
  options: { dryRun?: boolean; onFile?: (file: LogFile) => void } = {}
): Promise<CleanupResult> {
  const result: CleanupResult = { processed: [], failed: [], freedBytes: 0 };

  for (const file of files) {
    options.onFile?.(file);
    if (options.dryRun) {
      result.processed.push({ path: file.path, action, freedBytes: 0 });
      continue;
    }
    try {
      let freed = file.size;
      switch (action) {
        case 'compress':
          freed = file.size - (await gzipFile(file.path));
          break;
        case 'truncate':
          truncateSync(file.path, 0);
          break;
        case 'delete':
          unlinkSync(file.path);
          break;
      }
      result.processed.push({ path: file.path, action, freedBytes: freed });
      result.freedBytes += freed;
    } catch (error) {
      result.failed.push({ path: file.path, error: errorMessage(error) });
    }
  }

  return result;
}
