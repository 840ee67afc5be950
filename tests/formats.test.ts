/**
 * Tests for byte sizes and report file helpers
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { formatBytes, parseSize } from '../src/utils/size.js';
import { csvField, escapeXml, toCsv, writeReport } from '../src/utils/formats.js';

describe('formatBytes', () => {
  it('formats bytes', () => expect(formatBytes(500)).toBe('500 B'));
  it('formats 1024 as 1.0 KB', () => expect(formatBytes(1024)).toBe('1.0 KB'));
  it('formats 1048576 as 1.0 MB', () => expect(formatBytes(1048576)).toBe('1.0 MB'));
  it('formats gigabytes', () => expect(formatBytes(2.5 * 1024 * 1024 * 1024)).toBe('2.5 GB'));
  it('formats zero', () => expect(formatBytes(0)).toBe('0 B'));
});

describe('parseSize', () => {
  it('reads suffixes in either case', () => {
    expect(parseSize('512')).toBe(512);
    expect(parseSize('512K')).toBe(524288);
    expect(parseSize('10mb')).toBe(10485760);
    expect(parseSize('1.5G')).toBe(1610612736);
  });

  it('rejects unknown units', () => {
    expect(() => parseSize('10X')).toThrow('Invalid size "10X". Use a number with an optional K, M, G or T suffix');
    expect(() => parseSize('-1')).toThrow('Invalid size "-1"');
  });
});

describe('csv and xml', () => {
  it('quotes fields that need it', () => {
    expect(csvField('plain')).toBe('plain');
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField(null)).toBe('');
    expect(toCsv(['a', 'b'], [[1, 'x\ny']])).toBe('a,b\n1,"x\ny"\n');
  });

  it('escapes xml entities', () => {
    expect(escapeXml(`<a href="x">&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&apos;&lt;/a&gt;');
  });
});

describe('writeReport', () => {
  let tmp: string;
  beforeEach(() => { tmp = mkdtempSync(join(tmpdir(), 'opskit-report-')); });
  afterEach(() => { rmSync(tmp, { recursive: true, force: true }); });

  it('creates directories and writes the header once', () => {
    const path = join(tmp, 'sub', 'report.csv');
    writeReport(path, '1,2\n', { append: true, header: 'a,b\n' });
    writeReport(path, '3,4\n', { append: true, header: 'a,b\n' });
    expect(readFileSync(path, 'utf-8')).toBe('a,b\n1,2\n3,4\n');
  });

  it('overwrites without append', () => {
    const path = join(tmp, 'report.txt');
    writeReport(path, 'first\n');
    writeReport(path, 'second\n');
    expect(readFileSync(path, 'utf-8')).toBe('second\n');
  });
});
