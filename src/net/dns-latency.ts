/**
 * DNS query latency measurement
 *
 * Each (domain, nameserver) pair is queried `count` times in sequence,
 * timed with the monotonic clock. Failed queries count toward the total
 * but not toward the timing statistics.
 */

import { Resolver } from 'node:dns/promises';
import { loadDataFile } from '../utils/data.js';
import { csvLine, toJsonText } from '../utils/formats.js';

export const RECORD_TYPES = ['A', 'AAAA', 'MX', 'NS', 'TXT', 'SOA', 'CNAME', 'PTR'] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

export const SORT_FIELDS = ['name', 'server', 'min', 'avg', 'max', 'stdev'] as const;
export type SortField = (typeof SORT_FIELDS)[number];

export const SYSTEM_RESOLVER = 'system';

export interface PublicResolver {
  address: string;
  name: string;
}

function isResolverList(value: unknown): value is PublicResolver[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item: unknown) =>
        item !== null &&
        typeof item === 'object' &&
        'address' in item &&
        typeof item.address === 'string' &&
        'name' in item &&
        typeof item.name === 'string'
    )
  );
}

export function loadPublicResolvers(): PublicResolver[] {
  return loadDataFile('public-resolvers.json', isResolverList);
}

/**
 * Issue one query; resolves on an answer, rejects on any failure
 */
export type DnsQuery = (domain: string, server: string, record: RecordType, timeoutMs: number) => Promise<void>;

export const defaultQuery: DnsQuery = async (domain, server, record, timeoutMs) => {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  if (server !== SYSTEM_RESOLVER) {
    resolver.setServers([server]);
  }
  await resolver.resolve(domain, record);
};

export interface LatencyStats {
  min: number;
  avg: number;
  max: number;
  stdev: number;
  /** Percent, one decimal */
  successRate: number;
  successful: number;
  total: number;
}

export interface LatencyRow extends LatencyStats {
  domain: string;
  server: string;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * min/avg/max and the sample standard deviation of the successful timings
 */
export function computeStats(samples: number[], total: number): LatencyStats {
  const successful = samples.length;
  if (successful === 0) {
    return { min: 0, avg: 0, max: 0, stdev: 0, successRate: 0, successful: 0, total };
  }

  const sum = samples.reduce((acc, s) => acc + s, 0);
  const mean = sum / successful;
  const variance =
    successful > 1 ? samples.reduce((acc, s) => acc + (s - mean) ** 2, 0) / (successful - 1) : 0;

  return {
    min: round1(Math.min(...samples)),
    avg: round1(mean),
    max: round1(Math.max(...samples)),
    stdev: round1(Math.sqrt(variance)),
    successRate: total > 0 ? round1((successful * 100) / total) : 0,
    successful,
    total,
  };
}

export interface MeasureOptions {
  count: number;
  record: RecordType;
  timeoutMs: number;
  /** Pause between consecutive queries of one pair */
  waitMs: number;
  query?: DnsQuery;
  sleep?: (ms: number) => Promise<void>;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
  onQuery?: (domain: string, server: string, attempt: number, ms: number | null) => void;
}

function monotonicMs(): number {
  return Number(process.hrtime.bigint()) / 1e6;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function measurePair(domain: string, server: string, options: MeasureOptions): Promise<LatencyRow> {
  const query = options.query ?? defaultQuery;
  const clock = options.clock ?? monotonicMs;
  const sleep = options.sleep ?? defaultSleep;
  const samples: number[] = [];

  for (let attempt = 1; attempt <= options.count; attempt++) {
    const start = clock();
    let elapsed: number | null;
    try {
      await query(domain, server, options.record, options.timeoutMs);
      elapsed = clock() - start;
      samples.push(elapsed);
    } catch {
      elapsed = null;
    }
    options.onQuery?.(domain, server, attempt, elapsed);

    if (attempt < options.count && options.waitMs > 0) {
      await sleep(options.waitMs);
    }
  }

  return { domain, server, ...computeStats(samples, options.count) };
}

export async function measureLatency(
  domains: string[],
  servers: string[],
  options: MeasureOptions
): Promise<LatencyRow[]> {
  const rows: LatencyRow[] = [];
  for (const domain of domains) {
    for (const server of servers) {
      rows.push(await measurePair(domain, server, options));
    }
  }
  return rows;
}

/**
 * Ascending by the chosen field; pairs with no successful query sort last
 */
export function sortRows(rows: LatencyRow[], field: SortField): LatencyRow[] {
  const key = (row: LatencyRow): string | number => {
    switch (field) {
      case 'name':
        return row.domain;
      case 'server':
        return row.server;
      default:
        return row[field];
    }
  };

  return [...rows].sort((a, b) => {
    const aFailed = a.successful === 0;
    const bFailed = b.successful === 0;
    if (aFailed !== bFailed) return aFailed ? 1 : -1;
    const ka = key(a);
    const kb = key(b);
    if (typeof ka === 'number' && typeof kb === 'number') return ka - kb;
    return String(ka).localeCompare(String(kb));
  });
}

/**
 * Average of the per-domain averages for each server (successful pairs only)
 */
export function serverSummary(rows: LatencyRow[]): { server: string; avg: number; domains: number }[] {
  const byServer = new Map<string, number[]>();
  for (const row of rows) {
    const list = byServer.get(row.server) ?? [];
    if (row.successful > 0) list.push(row.avg);
    byServer.set(row.server, list);
  }
  return [...byServer.entries()].map(([server, avgs]) => ({
    server,
    avg: avgs.length > 0 ? round1(avgs.reduce((a, b) => a + b, 0) / avgs.length) : 0,
    domains: avgs.length,
  }));
}

export const CSV_HEADER = [
  'Domain',
  'Nameserver',
  'Min (ms)',
  'Avg (ms)',
  'Max (ms)',
  'StDev',
  'Success Rate (%)',
  'Successful Queries',
  'Total Queries',
];

export function rowValues(row: LatencyRow): (string | number)[] {
  return [row.domain, row.server, row.min, row.avg, row.max, row.stdev, row.successRate, row.successful, row.total];
}

export function renderCsv(rows: LatencyRow[]): string {
  return [CSV_HEADER.join(','), ...rows.map((row) => csvLine(rowValues(row)))].join('\n') + '\n';
}

export interface QueryInformation {
  timestamp: string;
  domains: number;
  nameservers: number;
  record_type: RecordType;
  queries_per_domain: number;
}

export function latencyJson(info: QueryInformation, rows: LatencyRow[]): Record<string, unknown> {
  return {
    query_information: info,
    results: rows.map((row) => ({
      domain: row.domain,
      nameserver: row.server,
      min_time_ms: row.min,
      avg_time_ms: row.avg,
      max_time_ms: row.max,
      standard_deviation: row.stdev,
      success_rate_percent: row.successRate,
      successful_queries: row.successful,
      total_queries: row.total,
    })),
  };
}

export function renderJson(info: QueryInformation, rows: LatencyRow[]): string {
  return toJsonText(latencyJson(info, rows));
}
