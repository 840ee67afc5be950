/**
 * Tests for DNSBL lookups with a stubbed resolver
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  checkListing,
  dnsblQueryName,
  loadDnsblCatalog,
  parseDnsblList,
  renderBlacklistReport,
  resultLine,
  reverseIp,
  selectDnsbls,
  summarizeByAddress,
  type DnsblLookup,
} from '../src/net/blacklist.js';
import { blacklistCommand } from '../src/commands/blacklist.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, testFlags } from './helpers/capture.js';

function dnsError(code: string): Error {
  return Object.assign(new Error(`queryA ${code}`), { code });
}

/**
 * 192.0.2.66 is listed on bad.example; every lookup on slow.example times out
 */
const lookup: DnsblLookup = {
  async resolve4(name) {
    if (name === '66.2.0.192.bad.example') return ['127.0.0.2'];
    if (name.endsWith('slow.example')) throw dnsError('ETIMEOUT');
    throw dnsError('ENOTFOUND');
  },
  async resolveTxt(name) {
    if (name === '66.2.0.192.bad.example') return [['Listed for ', 'spam']];
    throw dnsError('ENODATA');
  },
};

describe('query names', () => {
  it('should reverse the octets', () => {
    expect(reverseIp('192.0.2.10')).toBe('10.2.0.192');
    expect(dnsblQueryName('192.0.2.10', 'zen.example.')).toBe('10.2.0.192.zen.example');
  });
});

describe('checkListing', () => {
  it('should report a listing with its TXT reason', async () => {
    const result = await checkListing('192.0.2.66', { zone: 'bad.example', description: 'Bad' }, 1000, lookup);
    expect(result).toEqual({
      ip: '192.0.2.66',
      zone: 'bad.example',
      description: 'Bad',
      status: 'LISTED',
      answers: ['127.0.0.2'],
      reason: 'Listed for spam',
    });
    expect(resultLine(result)).toBe('LISTED: 192.0.2.66 on bad.example (Bad) - 127.0.0.2 (Listed for spam)');
  });

  it('should treat NXDOMAIN as clean and other failures as errors', async () => {
    const clean = await checkListing('192.0.2.1', { zone: 'bad.example', description: 'Bad' }, 1000, lookup);
    expect(clean.status).toBe('CLEAN');
    const failed = await checkListing('192.0.2.1', { zone: 'slow.example', description: 'Slow' }, 1000, lookup);
    expect(failed.status).toBe('ERROR');
    expect(failed.error).toBe('queryA ETIMEOUT');
  });
});

describe('catalogs', () => {
  it('should load every category and de-duplicate zones', () => {
    const catalog = loadDnsblCatalog();
    const all = selectDnsbls(catalog, []);
    expect(new Set(all.map((l) => l.zone.toLowerCase())).size).toBe(all.length);
    expect(selectDnsbls(catalog, ['mail']).length).toBe(catalog.mail.length);
  });

  it('should parse zone:description lines', () => {
    expect(parseDnsblList('# custom\nbad.example: Bad list\nplain.example\nBAD.example\n')).toEqual([
      { zone: 'bad.example', description: 'Bad list' },
      { zone: 'plain.example', description: 'plain.example' },
    ]);
  });
});

describe('summaries and reports', () => {
  it('should count listings per address', async () => {
    const results = [
      await checkListing('192.0.2.66', { zone: 'bad.example', description: 'Bad' }, 1000, lookup),
      await checkListing('192.0.2.66', { zone: 'slow.example', description: 'Slow' }, 1000, lookup),
    ];
    expect(summarizeByAddress(results)).toEqual([
      { ip: '192.0.2.66', checked: 2, listed: 1, errors: 1, zones: ['bad.example'] },
    ]);
    expect(renderBlacklistReport('csv', '2025-01-01T00:00:00.000Z', results)).toBe(
      'IP,Blacklist,Description,Status,Response\n' +
        '192.0.2.66,bad.example,Bad,LISTED,127.0.0.2 (Listed for spam)\n' +
        '192.0.2.66,slow.example,Slow,ERROR,queryA ETIMEOUT\n'
    );
  });
});

describe('blacklistCommand', () => {
  let dir: string;
  let listFile: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'opskit-dnsbl-'));
    listFile = join(dir, 'lists.txt');
    writeFileSync(listFile, 'bad.example:Bad\nok.example:Fine\n');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should exit 7 and print listings when an address is listed', async () => {
    const { lines, overrides } = capture();
    const report = join(dir, 'report.txt');
    const code = await blacklistCommand(
      ['192.0.2.66', '-d', 'mail.example', '-l', listFile, '-o', report],
      testFlags(),
      { ...overrides, lookup, resolver: async () => '192.0.2.1' }
    );
    expect(code).toBe(ExitCode.CHECK_FAILED);
    expect(lines).toEqual(['LISTED: 192.0.2.66 on bad.example (Bad) - 127.0.0.2 (Listed for spam)']);
    const text = readFileSync(report, 'utf-8').split('\n');
    expect(text[0]).toBe('=== IP Blacklist Check Results ===');
    expect(text.slice(3, 7)).toEqual([
      'LISTED: 192.0.2.66 on bad.example (Bad) - 127.0.0.2 (Listed for spam)',
      'CLEAN: 192.0.2.66 on ok.example (Fine)',
      'CLEAN: 192.0.2.1 on bad.example (Bad)',
      'CLEAN: 192.0.2.1 on ok.example (Fine)',
    ]);
  });

  it('should exit 0 when nothing is listed', async () => {
    const { overrides } = capture();
    const code = await blacklistCommand(['192.0.2.1', '-l', listFile], testFlags(), { ...overrides, lookup });
    expect(code).toBe(ExitCode.SUCCESS);
  });

  it('should skip names with --no-resolve', async () => {
    const { overrides } = capture();
    await expect(
      blacklistCommand(['mail.example', '-n', '-l', listFile], testFlags(), { ...overrides, lookup })
    ).rejects.toThrow('No valid addresses to check');
  });
});
