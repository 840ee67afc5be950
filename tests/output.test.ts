/**
 * Tests for the JSON output envelope and table rendering
 */

import { describe, it, expect } from '@jest/globals';
import { successEnvelope, errorEnvelope, createOutput, formatTable } from '../src/cli/output.js';
import { getDefaultFlags, type GlobalFlags } from '../src/cli/flags.js';

function capture(flags: Partial<GlobalFlags>, subcommand?: string) {
  const lines: string[] = [];
  const out = createOutput({
    command: 'disk',
    subcommand,
    flags: { ...getDefaultFlags(), ...flags },
    write: (line) => lines.push(line),
  });
  return { out, lines };
}

describe('successEnvelope', () => {
  it('should wrap data', () => {
    expect(successEnvelope('scan', null, { open: 2 })).toEqual({
      success: true,
      command: 'scan',
      subcommand: null,
      data: { open: 2 },
      error: null,
    });
  });
});

describe('errorEnvelope', () => {
  it('should carry code, message and details', () => {
    expect(errorEnvelope('integrity', 'check', 'NOT_FOUND', 'No baseline', { db: '/tmp/x.db' })).toEqual({
      success: false,
      command: 'integrity',
      subcommand: 'check',
      data: null,
      error: { code: 'NOT_FOUND', message: 'No baseline', details: { db: '/tmp/x.db' } },
    });
  });
});

describe('Output', () => {
  it('should print log, result and verbose lines in text mode', () => {
    const { out, lines } = capture({ verbose: true });
    out.log('log line');
    out.result('result line');
    out.verbose('verbose line');
    out.success({ ignored: true });
    expect(lines).toEqual(['log line', 'result line', 'verbose line']);
  });

  it('should keep results but drop log lines in quiet mode', () => {
    const { out, lines } = capture({ quiet: true });
    out.log('hidden');
    out.result('shown');
    expect(lines).toEqual(['shown']);
  });

  it('should print only the envelope in JSON mode', () => {
    const { out, lines } = capture({ json: true }, 'usage');
    out.log('hidden');
    out.result('hidden');
    out.table(['A'], [['1']]);
    out.success({ filesystems: 1 });
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({
      success: true,
      command: 'disk',
      subcommand: 'usage',
      data: { filesystems: 1 },
      error: null,
    });
  });
});

describe('formatTable', () => {
  it('should pad columns and right-align numbers', () => {
    const lines = formatTable(['HOST', 'MS'], [['a.example', '5'], ['b', '120']], { alignRight: [1] });
    expect(lines).toEqual([
      'HOST        MS',
      '──────────────',
      'a.example    5',
      'b          120',
    ]);
  });

  it('should ignore color escapes when measuring', () => {
    const lines = formatTable(['S', 'X'], [['\x1b[32mOK\x1b[0m', 'y']]);
    expect(lines[2]).toBe('\x1b[32mOK\x1b[0m  y');
  });
});
