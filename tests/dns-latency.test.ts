/**
 * Tests for DNS latency measurement
 */

import { describe, it, expect } from '@jest/globals';
import {
  computeStats,
  loadPublicResolvers,
  measurePair,
  renderCsv,
  serverSummary,
  sortRows,
  type LatencyRow,
} from '../src/net/dns-latency.js';
import { dnsCommand } from '../src/commands/dns.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, testFlags } from './helpers/capture.js';

function sequenceClock(values: number[]): () => number {
  let index = 0;
  return () => values[index++] ?? 0;
}

function row(partial: Partial<LatencyRow>): LatencyRow {
  return {
    domain: 'example.com',
    server: '1.1.1.1',
    min: 1,
    avg: 1,
    max: 1,
    stdev: 0,
    successRate: 100,
    successful: 1,
    total: 1,
    ...partial,
  };
}

describe('computeStats', () => {
  it('should use the sample standard deviation', () => {
    expect(computeStats([10, 20, 30], 3)).toEqual({
      min: 10, avg: 20, max: 30, stdev: 10, successRate: 100, successful: 3, total: 3,
    });
  });

  it('should report zeros when nothing answered', () => {
    expect(computeStats([], 4)).toEqual({ min: 0, avg: 0, max: 0, stdev: 0, successRate: 0, successful: 0, total: 4 });
  });

  it('should round to one decimal', () => {
    expect(computeStats([1.26], 3)).toEqual({
      min: 1.3, avg: 1.3, max: 1.3, stdev: 0, successRate: 33.3, successful: 1, total: 3,
    });
  });
});

describe('measurePair', () => {
  it('should time successful queries and skip failed ones', async () => {
    let attempt = 0;
    const waits: number[] = [];
    const result = await measurePair('example.com', '1.1.1.1', {
      count: 3,
      record: 'A',
      timeoutMs: 1000,
      waitMs: 100,
      query: async () => {
        attempt++;
        if (attempt === 2) throw new Error('SERVFAIL');
      },
      clock: sequenceClock([0, 12, 50, 100, 108]),
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    expect(result).toEqual({
      domain: 'example.com', server: '1.1.1.1',
      min: 8, avg: 10, max: 12, stdev: 2.8, successRate: 66.7, successful: 2, total: 3,
    });
    expect(waits).toEqual([100, 100]);
  });
});

describe('sorting and summaries', () => {
  const rows = [
    row({ server: 'a', avg: 30 }),
    row({ server: 'b', avg: 0, successful: 0, successRate: 0 }),
    row({ server: 'c', avg: 10 }),
  ];

  it('should sort ascending with failed pairs last', () => {
    expect(sortRows(rows, 'avg').map((r) => r.server)).toEqual(['c', 'a', 'b']);
    expect(sortRows(rows, 'server').map((r) => r.server)).toEqual(['a', 'c', 'b']);
  });

  it('should average per server over answered pairs', () => {
    const summary = serverSummary([...rows, row({ server: 'a', avg: 10 })]);
    expect(summary).toEqual([
      { server: 'a', avg: 20, domains: 2 },
      { server: 'b', avg: 0, domains: 0 },
      { server: 'c', avg: 10, domains: 1 },
    ]);
  });

  it('should render CSV', () => {
    expect(renderCsv([row({ min: 1.5, avg: 2, max: 2.5, stdev: 0.7, successful: 2, total: 2 })])).toBe(
      'Domain,Nameserver,Min (ms),Avg (ms),Max (ms),StDev,Success Rate (%),Successful Queries,Total Queries\n' +
        'example.com,1.1.1.1,1.5,2,2.5,0.7,100,2,2\n'
    );
  });
});

describe('bundled resolvers', () => {
  it('should load named public resolvers', () => {
    const resolvers = loadPublicResolvers();
    expect(resolvers.length).toBeGreaterThan(0);
    expect(resolvers.every((r) => r.address.length > 0 && r.name.length > 0)).toBe(true);
  });
});

describe('dnsCommand', () => {
  it('should query every domain against every nameserver', async () => {
    const queried: string[] = [];
    const { lines, overrides } = capture();
    const code = await dnsCommand(
      ['example.com', 'example.org', '-n', '192.0.2.1,192.0.2.2', '-c', '2', '-w', '0', '-r', 'mx'],
      testFlags({ json: true }),
      {
        ...overrides,
        query: async (domain, server, record) => {
          queried.push(`${domain}@${server}/${record}`);
          if (server === '192.0.2.2') throw new Error('timeout');
        },
      }
    );
    expect(code).toBe(ExitCode.SUCCESS);
    expect(queried).toHaveLength(8);
    expect(queried[0]).toBe('example.com@192.0.2.1/MX');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      success: true,
      command: 'dns',
      data: {
        query_information: { domains: 2, nameservers: 2, record_type: 'MX', queries_per_domain: 2 },
        results: [
          { nameserver: '192.0.2.1', successful_queries: 2, total_queries: 2 },
          { nameserver: '192.0.2.1', successful_queries: 2, total_queries: 2 },
          { domain: 'example.com', nameserver: '192.0.2.2', successful_queries: 0, success_rate_percent: 0 },
          { domain: 'example.org', nameserver: '192.0.2.2', successful_queries: 0, success_rate_percent: 0 },
        ],
      },
    });
  });
});
