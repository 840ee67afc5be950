/**
 * File and directory backups: tar.gz archives, plain copies or rsync
 * mirrors, with age-based retention of earlier backups.
 *
 * Backups of `<source>` are named `<base>_<YYYY-MM-DD_HH-MM-SS>` where
 * `<base>` is the source's basename.
 */

import { copyFileSync, createWriteStream, existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import archiver from 'archiver';
import { glob } from 'glob';
import type { CommandRunner } from '../exec/runner.js';
import { CliError, ErrorCode } from '../cli/errors.js';
import { ageInDays } from './log-cleanup.js';

export type BackupMode = 'archive' | 'copy' | 'incremental';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `_YYYY-MM-DD_HH-MM-SS` in local time
 */
export function backupStamp(date: Date): string {
  return (
    `_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export interface BackupPlan {
  source: string;
  destination: string;
  mode: BackupMode;
  /** Full path of the archive, copy or mirror */
  target: string;
  exclude: string[];
}

/**
 * Where a backup goes. Incremental mirrors keep one stable name so rsync
 * only transfers what changed.
 */
export function planBackup(
  source: string,
  destination: string,
  options: { mode: BackupMode; timestamp: boolean; exclude: string[]; now: Date }
): BackupPlan {
  const absolute = resolve(source);
  const base = basename(absolute);
  const stamp = options.timestamp && options.mode !== 'incremental' ? backupStamp(options.now) : '';
  const name = options.mode === 'archive' ? `${base}${stamp}.tar.gz` : `${base}${stamp}`;
  return {
    source: absolute,
    destination: resolve(destination),
    mode: options.mode,
    target: join(resolve(destination), name),
    exclude: options.exclude,
  };
}

function ignorePatterns(exclude: string[]): string[] {
  return exclude.flatMap((pattern) => (pattern.includes('/') ? [pattern] : [`**/${pattern}`, `**/${pattern}/**`]));
}

/**
 * gzip-compressed tar of a file, or of a directory under its own name. A
 * failed archive leaves no partial file behind.
 */
export async function createArchive(plan: BackupPlan): Promise<number> {
  const base = basename(plan.source);
  await new Promise<void>((resolvePromise, reject) => {
    const output = createWriteStream(plan.target);
    const archive = archiver('tar', { gzip: true, gzipOptions: { level: 9 } });
    let failure: Error | undefined;

    const fail = (error: Error): void => {
      if (failure) return;
      failure = error;
      archive.abort();
      output.destroy();
    };

    output.on('close', () => {
      if (failure === undefined) {
        resolvePromise();
        return;
      }
      const error = failure;
      rm(plan.target, { force: true }).then(() => reject(error), reject);
    });
    output.on('error', fail);
    archive.on('error', fail);
    archive.on('warning', fail);
    archive.pipe(output);

    if (statSync(plan.source).isDirectory()) {
      archive.glob('**/*', { cwd: plan.source, dot: true, ignore: ignorePatterns(plan.exclude) }, { prefix: base });
    } else {
      archive.file(plan.source, { name: base });
    }
    archive.finalize().catch(fail);
  });
  return statSync(plan.target).size;
}

/**
 * Copy a file, or a directory tree minus excluded entries; returns bytes
 * copied
 */
export async function copyTree(plan: BackupPlan): Promise<number> {
  if (!statSync(plan.source).isDirectory()) {
    copyFileSync(plan.source, plan.target);
    return statSync(plan.target).size;
  }

  const files = await glob('**/*', { cwd: plan.source, nodir: true, dot: true, ignore: ignorePatterns(plan.exclude) });
  mkdirSync(plan.target, { recursive: true });
  let bytes = 0;
  for (const relative of files.sort()) {
    const from = join(plan.source, relative);
    const to = join(plan.target, relative);
    mkdirSync(dirname(to), { recursive: true });
    copyFileSync(from, to);
    bytes += statSync(to).size;
  }
  return bytes;
}

export function rsyncArgs(plan: BackupPlan): string[] {
  const from = statSync(plan.source).isDirectory() ? `${plan.source}/` : plan.source;
  return ['-a', '--delete', ...plan.exclude.map((pattern) => `--exclude=${pattern}`), from, `${plan.target}/`];
}

export async function syncMirror(plan: BackupPlan, runner: CommandRunner): Promise<void> {
  mkdirSync(plan.target, { recursive: true });
  const result = await runner('rsync', rsyncArgs(plan));
  if (!result.success) {
    throw new CliError(ErrorCode.COMMAND_FAILED, `rsync failed: ${result.error ?? ''} ${result.stderr.trim()}`.trim());
  }
}

export async function runBackup(plan: BackupPlan, runner: CommandRunner): Promise<number | null> {
  mkdirSync(plan.destination, { recursive: true });
  switch (plan.mode) {
    case 'archive':
      return createArchive(plan);
    case 'copy':
      return copyTree(plan);
    case 'incremental':
      await syncMirror(plan, runner);
      return null;
  }
}

export interface ExpiredBackup {
  path: string;
  ageDays: number;
}

/**
 * Earlier backups of `base` in `destination` older than `retentionDays`
 * whole days. Retention 0 keeps everything.
 */
export function expiredBackups(
  destination: string,
  base: string,
  retentionDays: number,
  options: { nowMs?: number; keep?: string } = {}
): ExpiredBackup[] {
  if (retentionDays <= 0 || !existsSync(destination)) return [];
  const nowMs = options.nowMs ?? Date.now();
  const expired: ExpiredBackup[] = [];

  for (const name of readdirSync(destination).sort()) {
    if (!name.startsWith(`${base}_`)) continue;
    const path = join(destination, name);
    if (path === options.keep) continue;
    const st = statSync(path, { throwIfNoEntry: false });
    if (!st) continue;
    const ageDays = ageInDays(st.mtimeMs, nowMs);
    if (ageDays > retentionDays) {
      expired.push({ path, ageDays });
    }
  }
  return expired;
}

export function removeBackups(backups: ExpiredBackup[]): void {
  for (const backup of backups) {
    rmSync(backup.path, { recursive: true, force: true });
  }
}
