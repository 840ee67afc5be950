/**
 * Tests for the state database: schema, baselines, events and blocks
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getDbPath, getSchemaVersion, openDatabase, type DatabaseConnection } from '../src/database/connection.js';
import { SCHEMA_VERSION } from '../src/database/schema.js';
import {
  baselineSummary,
  getBaseline,
  isBlocked,
  latestEvents,
  listBlocked,
  recordBlocked,
  recordEvents,
  replaceBaseline,
} from '../src/database/queries.js';

const entry = (path: string, hash = 'h') => ({ path, hash, algorithm: 'sha256', size: 1, mtime: '2025-04-15T10:00:00.000Z' });

describe('getDbPath', () => {
  it('should prefer explicit, then configured, then the state directory', () => {
    expect(getDbPath('/tmp/a.db', '/tmp/b.db', {})).toBe('/tmp/a.db');
    expect(getDbPath(undefined, '/tmp/b.db', {})).toBe('/tmp/b.db');
    expect(getDbPath(undefined, undefined, { OPSKIT_HOME: '/srv/opskit' })).toBe('/srv/opskit/opskit.db');
  });
});

describe('queries', () => {
  let conn: DatabaseConnection;

  beforeEach(() => {
    conn = openDatabase(':memory:');
  });

  afterEach(() => {
    conn.close();
  });

  it('should record the schema version', () => {
    expect(getSchemaVersion(conn.db)).toBe(SCHEMA_VERSION);
  });

  it('should replace only the baseline below the given roots', () => {
    replaceBaseline(conn.db, ['/etc'], [entry('/etc/a'), entry('/etc/b')]);
    replaceBaseline(conn.db, ['/srv'], [entry('/srv/x')]);
    expect(replaceBaseline(conn.db, ['/etc'], [entry('/etc/a', 'h2')])).toEqual({ removed: 2, recorded: 1 });

    expect(getBaseline(conn.db).map((e) => [e.path, e.hash])).toEqual([
      ['/etc/a', 'h2'],
      ['/srv/x', 'h'],
    ]);
    expect(getBaseline(conn.db, ['/srv']).map((e) => e.path)).toEqual(['/srv/x']);
    expect(baselineSummary(conn.db)).toEqual([{ algorithm: 'sha256', files: 2, last_recorded: expect.any(String) }]);
  });

  it('should keep the newest events first', () => {
    recordEvents(conn.db, 'run-1', [{ path: '/etc/a', change_type: 'MODIFIED', old_hash: '1', new_hash: '2' }]);
    const [added] = recordEvents(conn.db, 'run-2', [{ path: '/etc/c', change_type: 'NEW', old_hash: null, new_hash: '3' }]);
    expect(added.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);

    const events = latestEvents(conn.db);
    expect(events.map((e) => e.run_id)).toEqual(['run-2', 'run-1']);
    expect(latestEvents(conn.db, 1)).toHaveLength(1);
  });

  it('should remember blocked addresses', () => {
    expect(isBlocked(conn.db, '203.0.113.5')).toBe(false);
    recordBlocked(conn.db, '203.0.113.5', 12, 'iptables');
    expect(isBlocked(conn.db, '203.0.113.5')).toBe(true);
    expect(listBlocked(conn.db)).toEqual([
      { ip: '203.0.113.5', attempts: 12, method: 'iptables', blocked_at: expect.any(String) },
    ]);
  });
});

describe('openDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'opskit-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create missing directories', () => {
    const conn = openDatabase(join(dir, 'nested', 'state', 'opskit.db'));
    expect(getSchemaVersion(conn.db)).toBe(SCHEMA_VERSION);
    conn.close();
  });

  it('should refuse a database from another schema version', () => {
    const path = join(dir, 'opskit.db');
    const first = openDatabase(path);
    first.db.prepare("UPDATE schema_meta SET value = '0' WHERE key = 'version'").run();
    first.close();
    expect(() => openDatabase(path)).toThrow(`Database ${path} has schema version 0, expected ${SCHEMA_VERSION}`);
  });
});
