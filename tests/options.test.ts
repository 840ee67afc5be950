/**
 * Tests for option parsing helpers
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  intOption,
  numberOption,
  choiceOption,
  listOption,
  parseListContent,
  readListFile,
  timeoutOption,
} from '../src/cli/options.js';
import { getDefaultFlags } from '../src/cli/flags.js';
import { ErrorCode } from '../src/cli/errors.js';

describe('intOption', () => {
  it('should use the fallback when absent', () => {
    expect(intOption('count', undefined, 5)).toBe(5);
  });

  it('should parse and range-check', () => {
    expect(intOption('count', '12', 5, { min: 1, max: 100 })).toBe(12);
    expect(() => intOption('count', '0', 5, { min: 1 })).toThrow('--count must be at least 1 (got 0)');
    expect(() => intOption('count', '1.5', 5)).toThrow('--count must be an integer (got "1.5")');
  });
});

describe('numberOption', () => {
  it('should accept decimals and reject text', () => {
    expect(numberOption('wait', '0.25', 1)).toBe(0.25);
    expect(() => numberOption('wait', 'soon', 1)).toThrow('--wait must be a number (got "soon")');
  });
});

describe('choiceOption', () => {
  it('should match case-insensitively and return the canonical choice', () => {
    expect(choiceOption('format', 'CSV', ['text', 'csv'] as const, 'text')).toBe('csv');
  });

  it('should list choices on a bad value', () => {
    expect(() => choiceOption('format', 'xml', ['text', 'csv'] as const, 'text')).toThrow(
      'Invalid --format "xml". Use one of: text, csv'
    );
  });
});

describe('listOption', () => {
  it('should flatten repeated and comma-separated values', () => {
    expect(listOption(['22,80', ' 443 ', ''])).toEqual(['22', '80', '443']);
    expect(listOption(undefined)).toEqual([]);
  });
});

describe('list files', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'opskit-options-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should skip blanks and comments', () => {
    expect(parseListContent('# hosts\nweb1\n\n  db1  \r\n#db2\n')).toEqual(['web1', 'db1']);
  });

  it('should read a list file', () => {
    const path = join(dir, 'hosts.txt');
    writeFileSync(path, 'a\nb\n');
    expect(readListFile(path)).toEqual(['a', 'b']);
  });

  it('should report a missing file', () => {
    expect(() => readListFile(join(dir, 'missing.txt'))).toThrow(
      expect.objectContaining({ code: ErrorCode.FILE_NOT_FOUND })
    );
  });
});

describe('timeoutOption', () => {
  it('should prefer the command option, then --timeout, then config', () => {
    const flags = { ...getDefaultFlags(), timeout: 2500 };
    expect(timeoutOption('3', flags, 10)).toBe(3000);
    expect(timeoutOption(undefined, flags, 10)).toBe(2500);
    expect(timeoutOption(undefined, getDefaultFlags(), 10)).toBe(10000);
  });
});
