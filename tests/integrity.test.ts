/**
 * Tests for file integrity baselines on a temporary tree and database
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  changeLine,
  changeSummary,
  collectFiles,
  compareBaseline,
  hashFile,
  selectionScope,
} from '../src/security/integrity.js';
import { openDatabase } from '../src/database/connection.js';
import { getBaseline, isUnder, latestEvents } from '../src/database/queries.js';
import { integrityCommand } from '../src/commands/integrity.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, stubRunner, testFlags } from './helpers/capture.js';

const HELLO_SHA256 = '5891b5b522d5df086d0ff0b110fbd9d21bb4fc7163af34d08286a2e846f6be03';
const AT = new Date(2025, 3, 15, 10, 32, 7);

let root: string;
let etc: string;
let db: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'opskit-integrity-'));
  etc = join(root, 'etc');
  mkdirSync(join(etc, 'sub'), { recursive: true });
  writeFileSync(join(etc, 'a.conf'), 'hello\n');
  writeFileSync(join(etc, 'b.conf'), 'b\n');
  writeFileSync(join(etc, 'sub', 'c.conf'), 'c\n');
  writeFileSync(join(etc, 'skip.swp'), 'x');
  db = join(root, 'state', 'opskit.db');
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('collectFiles', () => {
  it('should list direct files unless recursive', async () => {
    const flat = await collectFiles([etc], { recursive: false, exclude: ['*.swp'] });
    expect(flat.files).toEqual([join(etc, 'a.conf'), join(etc, 'b.conf')]);
    const deep = await collectFiles([etc], { recursive: true, exclude: [] });
    expect(deep.files).toEqual([join(etc, 'a.conf'), join(etc, 'b.conf'), join(etc, 'skip.swp'), join(etc, 'sub', 'c.conf')]);
  });

  it('should keep files named directly and report missing paths', async () => {
    const result = await collectFiles([join(etc, 'skip.swp'), join(root, 'nope')], { recursive: false, exclude: ['*.swp'] });
    expect(result.files).toEqual([join(etc, 'skip.swp')]);
    expect(result.missing).toEqual([join(root, 'nope')]);
  });
});

describe('selectionScope', () => {
  it('should cover what the selection would pick and files gone from disk', async () => {
    const collected = await collectFiles([etc], { recursive: false, exclude: ['*.swp'] });
    const covers = selectionScope(collected, false);
    expect(covers(join(etc, 'a.conf'))).toBe(true);
    expect(covers(join(etc, 'deleted.conf'))).toBe(true);
    expect(covers(join(etc, 'skip.swp'))).toBe(false);
    expect(covers(join(etc, 'sub', 'c.conf'))).toBe(false);
    expect(selectionScope(collected, true)(join(etc, 'sub', 'gone.conf'))).toBe(true);
    expect(covers(join(root, 'other', 'x.conf'))).toBe(false);
  });
});

describe('hashing and comparison', () => {
  it('should hash file contents', async () => {
    expect(await hashFile(join(etc, 'a.conf'), 'sha256')).toBe(HELLO_SHA256);
    expect(await hashFile(join(etc, 'a.conf'), 'md5')).toBe('b1946ac92492d2347c6235b4d2611184');
  });

  it('should classify modified, missing and new files', () => {
    const entry = (path: string, hash: string) => ({ path, hash, algorithm: 'sha256', size: 1, mtime: '' });
    const changes = compareBaseline([entry('/x/a', '1'), entry('/x/b', '2'), entry('/x/e', '5')], [entry('/x/a', '9'), entry('/x/c', '3')], 'sha256', ['/x/e']);
    expect(changes).toEqual([
      { path: '/x/a', change_type: 'MODIFIED', old_hash: '1', new_hash: '9' },
      { path: '/x/b', change_type: 'MISSING', old_hash: '2', new_hash: null },
      { path: '/x/c', change_type: 'NEW', old_hash: null, new_hash: '3' },
    ]);
    expect(changeSummary({ checked: 2, events: changes })).toBe('3 change(s) in 2 file(s): 1 modified, 1 new, 1 missing');
    expect(changeLine(changes[0], AT)).toBe('2025-04-15 10:32:07 - MODIFIED: /x/a');
  });

  it('should refuse a baseline recorded with another algorithm', () => {
    expect(() => compareBaseline([{ path: '/x/a', hash: '1', algorithm: 'md5', size: 1, mtime: '' }], [], 'sha256')).toThrow(
      'Baseline for /x/a was recorded with md5, not sha256'
    );
  });

  it('should match paths below roots only', () => {
    expect(isUnder('/etc/ssh/sshd_config', ['/etc'])).toBe(true);
    expect(isUnder('/etcetera/file', ['/etc'])).toBe(false);
    expect(isUnder('/etc', ['/etc/'])).toBe(true);
  });
});

describe('integrityCommand', () => {
  const base = (): string[] => ['-p', etc, '-r', '-e', '*.swp', '--database', db];

  it('should record a baseline and report later changes', async () => {
    const init = capture();
    expect(await integrityCommand(['init', ...base()], testFlags(), init.overrides)).toBe(ExitCode.SUCCESS);
    expect(init.logs).toContain('[SUCCESS] Baseline recorded: 3 file(s) with sha256');

    writeFileSync(join(etc, 'a.conf'), 'changed\n');
    unlinkSync(join(etc, 'b.conf'));
    writeFileSync(join(etc, 'd.conf'), 'd\n');

    const log = join(root, 'integrity.log');
    const check = capture();
    const code = await integrityCommand(['check', ...base(), '-l', log], testFlags(), { ...check.overrides, now: () => AT });
    expect(code).toBe(ExitCode.CHECK_FAILED);
    const expected = [
      `2025-04-15 10:32:07 - MODIFIED: ${join(etc, 'a.conf')}`,
      `2025-04-15 10:32:07 - MISSING: ${join(etc, 'b.conf')}`,
      `2025-04-15 10:32:07 - NEW: ${join(etc, 'd.conf')}`,
    ];
    expect(check.lines).toEqual(expected);
    expect(check.logs).toContain('[WARNING] 3 change(s) in 3 file(s): 1 modified, 1 new, 1 missing');
    expect(readFileSync(log, 'utf-8')).toBe(expected.join('\n') + '\n');

    const conn = openDatabase(db);
    try {
      expect(getBaseline(conn.db).map((e) => e.path)).toEqual([join(etc, 'a.conf'), join(etc, 'b.conf'), join(etc, 'sub', 'c.conf')]);
      expect(latestEvents(conn.db).map((e) => e.change_type).sort()).toEqual(['MISSING', 'MODIFIED', 'NEW']);
    } finally {
      conn.close();
    }
  });

  it('should exit 0 when nothing changed', async () => {
    await integrityCommand(['init', ...base()], testFlags(), capture().overrides);
    const { lines, overrides } = capture();
    expect(await integrityCommand(['check', ...base(), '-s'], testFlags(), overrides)).toBe(ExitCode.SUCCESS);
    expect(lines).toEqual(['0 change(s) in 3 file(s): 0 modified, 0 new, 0 missing']);
  });

  it('should not report excluded or unselected files as missing', async () => {
    await integrityCommand(['init', ...base()], testFlags(), capture().overrides);

    const excluded = capture();
    const code = await integrityCommand(['check', ...base(), '-e', 'b.conf', '-s'], testFlags(), excluded.overrides);
    expect(code).toBe(ExitCode.SUCCESS);
    expect(excluded.lines).toEqual(['0 change(s) in 2 file(s): 0 modified, 0 new, 0 missing']);

    const shallow = capture();
    expect(await integrityCommand(['check', '-p', etc, '-e', '*.swp', '--database', db, '-s'], testFlags(), shallow.overrides)).toBe(
      ExitCode.SUCCESS
    );
    expect(shallow.lines).toEqual(['0 change(s) in 2 file(s): 0 modified, 0 new, 0 missing']);
  });

  it('should keep nested baselines when a parent is recorded without -r', async () => {
    const sub = join(etc, 'sub');
    await integrityCommand(['init', '-p', sub, '--database', db], testFlags(), capture().overrides);
    await integrityCommand(['init', '-p', etc, '-e', '*.swp', '--database', db], testFlags(), capture().overrides);

    const conn = openDatabase(db);
    try {
      expect(getBaseline(conn.db).map((e) => e.path)).toEqual([join(etc, 'a.conf'), join(etc, 'b.conf'), join(sub, 'c.conf')]);
    } finally {
      conn.close();
    }

    const { lines, overrides } = capture();
    expect(await integrityCommand(['check', '-p', sub, '--database', db, '-s'], testFlags(), overrides)).toBe(ExitCode.SUCCESS);
    expect(lines).toEqual(['0 change(s) in 1 file(s): 0 modified, 0 new, 0 missing']);
  });

  it('should feed the summary to a notify command', async () => {
    await integrityCommand(['init', ...base()], testFlags(), capture().overrides);
    writeFileSync(join(etc, 'a.conf'), 'changed\n');
    const { runner, calls } = stubRunner();
    const { overrides } = capture();
    await integrityCommand(['check', ...base(), '-n', 'mail -s integrity ops'], testFlags(), { ...overrides, runner, now: () => AT });
    expect(calls).toHaveLength(1);
    expect(calls[0].args).toEqual(['-c', 'mail -s integrity ops']);
    expect(calls[0].options?.input).toBe(
      `1 change(s) in 3 file(s): 1 modified, 0 new, 0 missing\n2025-04-15 10:32:07 - MODIFIED: ${join(etc, 'a.conf')}\n`
    );
  });

  it('should stop monitoring after --count checks', async () => {
    await integrityCommand(['init', ...base()], testFlags(), capture().overrides);
    const waits: number[] = [];
    const { overrides } = capture();
    const code = await integrityCommand(['monitor', ...base(), '-i', '5', '--count', '2'], testFlags(), {
      ...overrides,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(waits).toEqual([5000]);
  });

  it('should show the baseline in status', async () => {
    await integrityCommand(['init', ...base()], testFlags(), capture().overrides);
    const { lines, overrides } = capture();
    await integrityCommand(['status', '--database', db], testFlags({ json: true }), overrides);
    const envelope = JSON.parse(lines[0]);
    expect(envelope.data.baseline).toHaveLength(1);
    expect(envelope.data.baseline[0]).toMatchObject({ algorithm: 'sha256', files: 3 });
    expect(envelope.data.events).toEqual([]);
  });

  it('should not touch the database under --dry-run', async () => {
    const { logs, overrides } = capture();
    await integrityCommand(['init', ...base()], testFlags({ dryRun: true }), overrides);
    expect(logs).toContain(`[INFO] Would record sha256 baseline for ${etc}`);
    const conn = openDatabase(db);
    try {
      expect(getBaseline(conn.db)).toEqual([]);
    } finally {
      conn.close();
    }
  });

  it('should need paths and a known subcommand', async () => {
    const { overrides } = capture();
    await expect(integrityCommand(['check', '--database', db], testFlags(), overrides)).rejects.toThrow('integrity check needs --paths');
    await expect(integrityCommand(['verify'], testFlags(), overrides)).rejects.toThrow('Unknown subcommand: verify');
  });
});
