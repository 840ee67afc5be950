/**
 * File integrity baselines
 *
 * Files under the watched paths are hashed and compared against the
 * baseline stored in the state database. Every comparison is a run with
 * its own id; the changes it finds are stored as integrity events.
 */

import { createHash } from 'node:crypto';
import { createReadStream, existsSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { glob } from 'glob';
import { v4 as uuidv4 } from 'uuid';
import { configError, errorMessage } from '../cli/errors.js';
import { formatTimestamp } from '../cli/logger.js';
import { csvLine, toJsonText } from '../utils/formats.js';
import {
  getBaseline,
  isUnder,
  recordEvents,
  replaceBaseline,
  type BaselineEntry,
  type ChangeType,
  type IntegrityEvent,
  type NewEvent,
} from '../database/queries.js';

export const HASH_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha512'] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export interface CollectOptions {
  recursive: boolean;
  /** Glob patterns; a pattern without a slash matches a name at any depth */
  exclude: string[];
}

export interface CollectedFiles {
  /** Absolute paths, sorted */
  files: string[];
  /** Requested paths that do not exist */
  missing: string[];
  /** Absolute forms of the requested paths */
  roots: string[];
}

function ignorePatterns(exclude: string[]): string[] {
  return exclude.flatMap((pattern) =>
    pattern.includes('/') ? [pattern] : [`**/${pattern}`, `**/${pattern}/**`]
  );
}

/**
 * Expand the watched paths to files. Directories contribute their direct
 * files, or every file below them with `recursive`. Files named directly
 * are never excluded.
 */
export async function collectFiles(paths: string[], options: CollectOptions): Promise<CollectedFiles> {
  const files = new Set<string>();
  const missing: string[] = [];
  const roots = paths.map((p) => resolve(p));
  const ignore = ignorePatterns(options.exclude);

  for (const root of roots) {
    if (!existsSync(root)) {
      missing.push(root);
      continue;
    }
    if (!statSync(root).isDirectory()) {
      files.add(root);
      continue;
    }
    const found = await glob(options.recursive ? '**/*' : '*', {
      cwd: root,
      nodir: true,
      dot: true,
      ignore,
    });
    for (const relative of found) {
      files.add(join(root, relative));
    }
  }

  return { files: [...files].sort(), missing, roots };
}

/**
 * Whether a baseline path lies inside the selection `collected` was made
 * with: a watched path itself, a direct child of a watched directory, or
 * any file below one with `recursive`. A file still on disk that the
 * selection skipped was excluded and is out of scope.
 */
export function selectionScope(collected: CollectedFiles, recursive: boolean): (path: string) => boolean {
  const selected = new Set(collected.files);
  return (path) => {
    const inDepth = collected.roots.some(
      (root) => path === root || dirname(path) === root || (recursive && isUnder(path, [root]))
    );
    return inDepth && (selected.has(path) || !existsSync(path));
  };
}

export function hashFile(path: string, algorithm: HashAlgorithm): Promise<string> {
  return new Promise((resolvePromise, reject) => {
    const hash = createHash(algorithm);
    createReadStream(path)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolvePromise(hash.digest('hex')));
  });
}

export interface FingerprintResult {
  entries: BaselineEntry[];
  /** Files that vanished or could not be read while hashing */
  unreadable: { path: string; error: string }[];
}

export async function fingerprint(files: string[], algorithm: HashAlgorithm): Promise<FingerprintResult> {
  const entries: BaselineEntry[] = [];
  const unreadable: FingerprintResult['unreadable'] = [];
  for (const path of files) {
    try {
      const stat = statSync(path);
      entries.push({
        path,
        hash: await hashFile(path, algorithm),
        algorithm,
        size: stat.size,
        mtime: stat.mtime.toISOString(),
      });
    } catch (error) {
      unreadable.push({ path, error: errorMessage(error) });
    }
  }
  return { entries, unreadable };
}

/**
 * Classify the current files against the baseline. The baseline must be
 * the slice the current selection covers (see selectionScope). Paths in `unreadable` exist but could
 * not be hashed, so they are never reported missing.
 */
export function compareBaseline(
  baseline: BaselineEntry[],
  current: BaselineEntry[],
  algorithm: HashAlgorithm,
  unreadable: string[] = []
): NewEvent[] {
  const foreign = baseline.find((entry) => entry.algorithm !== algorithm);
  if (foreign) {
    throw configError(
      `Baseline for ${foreign.path} was recorded with ${foreign.algorithm}, not ${algorithm}. ` +
        `Check with --algorithm ${foreign.algorithm} or run init again`
    );
  }

  const known = new Map(baseline.map((entry) => [entry.path, entry]));
  const seen = new Set<string>(unreadable);
  const changes: NewEvent[] = [];

  for (const entry of current) {
    seen.add(entry.path);
    const previous = known.get(entry.path);
    if (!previous) {
      changes.push({ path: entry.path, change_type: 'NEW', old_hash: null, new_hash: entry.hash });
    } else if (previous.hash !== entry.hash) {
      changes.push({ path: entry.path, change_type: 'MODIFIED', old_hash: previous.hash, new_hash: entry.hash });
    }
  }
  for (const entry of baseline) {
    if (!seen.has(entry.path)) {
      changes.push({ path: entry.path, change_type: 'MISSING', old_hash: entry.hash, new_hash: null });
    }
  }

  return changes.sort((a, b) => a.path.localeCompare(b.path));
}

export interface InitResult {
  recorded: number;
  removed: number;
  unreadable: FingerprintResult['unreadable'];
  missing: string[];
}

export async function initBaseline(
  db: Database.Database,
  paths: string[],
  options: CollectOptions & { algorithm: HashAlgorithm }
): Promise<InitResult> {
  const collected = await collectFiles(paths, options);
  const { entries, unreadable } = await fingerprint(collected.files, options.algorithm);
  const { recorded, removed } = replaceBaseline(
    db,
    collected.roots,
    entries,
    selectionScope(collected, options.recursive)
  );
  return { recorded, removed, unreadable, missing: collected.missing };
}

export interface CheckResult {
  runId: string;
  checked: number;
  events: IntegrityEvent[];
  unreadable: FingerprintResult['unreadable'];
  missing: string[];
}

export async function checkIntegrity(
  db: Database.Database,
  paths: string[],
  options: CollectOptions & { algorithm: HashAlgorithm }
): Promise<CheckResult> {
  const collected = await collectFiles(paths, options);
  const inScope = selectionScope(collected, options.recursive);
  const baseline = getBaseline(db, collected.roots).filter((entry) => inScope(entry.path));
  const { entries, unreadable } = await fingerprint(collected.files, options.algorithm);
  const runId = uuidv4();
  const events = recordEvents(
    db,
    runId,
    compareBaseline(baseline, entries, options.algorithm, unreadable.map((u) => u.path))
  );
  return { runId, checked: entries.length, events, unreadable, missing: collected.missing };
}

export function countByType(events: readonly { change_type: ChangeType }[]): Record<ChangeType, number> {
  const counts: Record<ChangeType, number> = { MODIFIED: 0, NEW: 0, MISSING: 0 };
  for (const event of events) {
    counts[event.change_type]++;
  }
  return counts;
}

/**
 * `2025-04-15 10:32:07 - MODIFIED: /etc/passwd`
 */
export function changeLine(event: { change_type: ChangeType; path: string }, at: Date): string {
  return `${formatTimestamp(at)} - ${event.change_type}: ${event.path}`;
}

export function changeSummary(result: { checked: number; events: readonly { change_type: ChangeType }[] }): string {
  const counts = countByType(result.events);
  return (
    `${result.events.length} change(s) in ${result.checked} file(s): ` +
    `${counts.MODIFIED} modified, ${counts.NEW} new, ${counts.MISSING} missing`
  );
}

export const INTEGRITY_FORMATS = ['text', 'csv', 'json'] as const;
export type IntegrityFormat = (typeof INTEGRITY_FORMATS)[number];

export const CSV_HEADER = 'run_id,detected_at,change_type,path,old_hash,new_hash';

export function renderIntegrityReport(format: IntegrityFormat, result: CheckResult, at: Date): string {
  switch (format) {
    case 'text': {
      const lines = [`File integrity report - ${formatTimestamp(at)}`, `Run: ${result.runId}`, changeSummary(result), ''];
      for (const event of result.events) {
        lines.push(`${event.change_type.padEnd(8)} ${event.path}`);
      }
      return lines.join('\n') + '\n';
    }
    case 'csv':
      return (
        [
          CSV_HEADER,
          ...result.events.map((e) => csvLine([e.run_id, e.detected_at, e.change_type, e.path, e.old_hash, e.new_hash])),
        ].join('\n') + '\n'
      );
    case 'json':
      return toJsonText({
        run_id: result.runId,
        generated_at: at.toISOString(),
        checked: result.checked,
        counts: countByType(result.events),
        events: result.events,
      });
  }
}
