/**
 * Database query functions for integrity baselines, integrity events and
 * blocked addresses
 */

import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';

export type ChangeType = 'MODIFIED' | 'NEW' | 'MISSING';

export interface BaselineEntry {
  path: string;
  hash: string;
  algorithm: string;
  size: number;
  mtime: string;
  recorded_at?: string;
}

export interface IntegrityEvent {
  id: string;
  run_id: string;
  path: string;
  change_type: ChangeType;
  old_hash: string | null;
  new_hash: string | null;
  detected_at: string;
}

export interface BlockedIp {
  ip: string;
  attempts: number;
  method: string;
  blocked_at: string;
}

/**
 * Whether `path` is one of `roots` or lies below one of them
 */
export function isUnder(path: string, roots: string[]): boolean {
  return roots.some((root) => {
    const base = root.endsWith('/') ? root.slice(0, -1) : root;
    return path === base || path.startsWith(`${base}/`);
  });
}

// ============ Integrity Baseline ============

export function getBaseline(db: Database.Database, roots?: string[]): BaselineEntry[] {
  const rows = db
    .prepare<[], BaselineEntry>(
      'SELECT path, hash, algorithm, size, mtime, recorded_at FROM integrity_baseline ORDER BY path'
    )
    .all();
  return roots ? rows.filter((row) => isUnder(row.path, roots)) : rows;
}

/**
 * Replace the baseline rows below `roots` with `entries`, atomically.
 * With `covers`, only the rows it accepts are replaced; the rest are kept.
 */
export function replaceBaseline(
  db: Database.Database,
  roots: string[],
  entries: BaselineEntry[],
  covers: (path: string) => boolean = () => true
): { removed: number; recorded: number } {
  const remove = db.prepare<[string]>('DELETE FROM integrity_baseline WHERE path = ?');
  const insert = db.prepare<[string, string, string, number, string]>(
    `INSERT OR REPLACE INTO integrity_baseline (path, hash, algorithm, size, mtime)
     VALUES (?, ?, ?, ?, ?)`
  );

  const apply = db.transaction(() => {
    const stale = getBaseline(db, roots).filter((row) => covers(row.path));
    for (const row of stale) {
      remove.run(row.path);
    }
    for (const entry of entries) {
      insert.run(entry.path, entry.hash, entry.algorithm, entry.size, entry.mtime);
    }
    return { removed: stale.length, recorded: entries.length };
  });

  return apply();
}

export function baselineSummary(db: Database.Database): { algorithm: string; files: number; last_recorded: string }[] {
  return db
    .prepare<[], { algorithm: string; files: number; last_recorded: string }>(
      `SELECT algorithm, COUNT(*) AS files, MAX(recorded_at) AS last_recorded
       FROM integrity_baseline GROUP BY algorithm ORDER BY algorithm`
    )
    .all();
}

// ============ Integrity Events ============

export interface NewEvent {
  path: string;
  change_type: ChangeType;
  old_hash: string | null;
  new_hash: string | null;
}

export function recordEvents(db: Database.Database, runId: string, events: NewEvent[]): IntegrityEvent[] {
  const insert = db.prepare<[string, string, string, ChangeType, string | null, string | null, string]>(
    `INSERT INTO integrity_events (id, run_id, path, change_type, old_hash, new_hash, detected_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  );
  const detectedAt = new Date().toISOString();

  const apply = db.transaction(() =>
    events.map((event) => {
      const id = uuidv4();
      insert.run(id, runId, event.path, event.change_type, event.old_hash, event.new_hash, detectedAt);
      return { id, run_id: runId, detected_at: detectedAt, ...event };
    })
  );

  return apply();
}

export function latestEvents(db: Database.Database, limit = 20): IntegrityEvent[] {
  return db
    .prepare<[number], IntegrityEvent>(
      `SELECT id, run_id, path, change_type, old_hash, new_hash, detected_at
       FROM integrity_events ORDER BY detected_at DESC, rowid DESC LIMIT ?`
    )
    .all(limit);
}

// ============ Blocked Addresses ============

export function isBlocked(db: Database.Database, ip: string): boolean {
  return db.prepare<[string], { ip: string }>('SELECT ip FROM blocked_ips WHERE ip = ?').get(ip) !== undefined;
}

export function recordBlocked(db: Database.Database, ip: string, attempts: number, method: string): void {
  db.prepare<[string, number, string]>(
    `INSERT OR REPLACE INTO blocked_ips (ip, attempts, method) VALUES (?, ?, ?)`
  ).run(ip, attempts, method);
}

export function listBlocked(db: Database.Database): BlockedIp[] {
  return db
    .prepare<[], BlockedIp>('SELECT ip, attempts, method, blocked_at FROM blocked_ips ORDER BY blocked_at, ip')
    .all();
}
