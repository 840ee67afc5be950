/**
 * Failed login analysis over auth logs
 */

import { existsSync } from 'node:fs';
import type { CommandRunner } from '../exec/runner.js';
import { parseIPv4 } from '../net/targets.js';
import { formatTimestamp } from '../cli/logger.js';

export const DEFAULT_LOG_FILES = ['/var/log/auth.log', '/var/log/secure', '/var/log/messages'];

export const DEFAULT_FILTER = 'Failed|Failure|Invalid';

export function findLogFile(candidates: string[] = DEFAULT_LOG_FILES, exists: (path: string) => boolean = existsSync): string | null {
  return candidates.find((path) => exists(path)) ?? null;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const SYSLOG_TIME = /^([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\b/;
const ISO_TIME = /^(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)/;

/**
 * Timestamp at the start of a log line: syslog (`Apr 15 10:32:07`, local
 * time, year inferred) or ISO 8601. Null when the line has neither.
 */
export function parseLineTime(line: string, now: Date): Date | null {
  const iso = ISO_TIME.exec(line);
  if (iso) {
    const date = new Date(iso[1].replace(' ', 'T'));
    return Number.isNaN(date.getTime()) ? null : date;
  }

  const syslog = SYSLOG_TIME.exec(line);
  if (!syslog) return null;
  const month = MONTHS.indexOf(syslog[1]);
  if (month < 0) return null;
  const [hours, minutes, seconds] = [syslog[3], syslog[4], syslog[5]].map(Number);
  const date = new Date(now.getFullYear(), month, Number(syslog[2]), hours, minutes, seconds);
  // Syslog omits the year; a date ahead of now belongs to last year
  if (date.getTime() - now.getTime() > 86_400_000) {
    date.setFullYear(now.getFullYear() - 1);
  }
  return date;
}

const IPV4_PATTERN = /\b(?:\d{1,3}\.){3}\d{1,3}\b/g;

export function extractAddresses(line: string): string[] {
  return (line.match(IPV4_PATTERN) ?? []).filter((candidate) => parseIPv4(candidate) !== null);
}

export interface AddressCount {
  ip: string;
  count: number;
}

export interface AnalyzeOptions {
  filter: RegExp;
  /** Minutes back from now; 0 reads the whole file */
  periodMinutes: number;
  now: Date;
  whitelist: Set<string>;
}

export interface LoginAnalysis {
  matchedLines: number;
  /** Sorted by count descending, then address */
  counts: AddressCount[];
  whitelisted: AddressCount[];
}

function compareAddresses(a: string, b: string): number {
  const pa = parseIPv4(a) ?? [];
  const pb = parseIPv4(b) ?? [];
  for (let i = 0; i < 4; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function sortCounts(map: Map<string, number>): AddressCount[] {
  return [...map.entries()]
    .map(([ip, count]) => ({ ip, count }))
    .sort((a, b) => b.count - a.count || compareAddresses(a.ip, b.ip));
}

/**
 * Count every IPv4 address on lines matching the filter. Lines with a
 * timestamp older than the period are skipped; lines without one count.
 */
export function analyzeLog(content: string, options: AnalyzeOptions): LoginAnalysis {
  const cutoff = options.periodMinutes > 0 ? options.now.getTime() - options.periodMinutes * 60_000 : null;
  const counts = new Map<string, number>();
  const whitelisted = new Map<string, number>();
  let matchedLines = 0;

  for (const line of content.split('\n')) {
    if (!options.filter.test(line)) continue;
    if (cutoff !== null) {
      const at = parseLineTime(line, options.now);
      if (at && at.getTime() < cutoff) continue;
    }
    matchedLines++;
    for (const ip of extractAddresses(line)) {
      const target = options.whitelist.has(ip) ? whitelisted : counts;
      target.set(ip, (target.get(ip) ?? 0) + 1);
    }
  }

  return { matchedLines, counts: sortCounts(counts), whitelisted: sortCounts(whitelisted) };
}

export function atOrAbove(counts: AddressCount[], threshold: number): AddressCount[] {
  return counts.filter((entry) => entry.count >= threshold);
}

export type BlockMethod = 'firewalld' | 'iptables';

/**
 * firewalld when it is installed, iptables otherwise
 */
export function detectBlockMethod(exists: (name: string) => boolean): BlockMethod | null {
  if (exists('firewall-cmd')) return 'firewalld';
  if (exists('iptables')) return 'iptables';
  return null;
}

export interface BlockStep {
  command: string;
  args: string[];
}

export function blockSteps(ip: string, method: BlockMethod): BlockStep[] {
  if (method === 'firewalld') {
    return [
      {
        command: 'firewall-cmd',
        args: ['--permanent', `--add-rich-rule=rule family='ipv4' source address='${ip}' reject`],
      },
      { command: 'firewall-cmd', args: ['--reload'] },
    ];
  }
  return [{ command: 'iptables', args: ['-A', 'INPUT', '-s', ip, '-j', 'DROP'] }];
}

export function describeStep(step: BlockStep): string {
  return [step.command, ...step.args.map((arg) => (/[\s']/.test(arg) ? `"${arg}"` : arg))].join(' ');
}

/**
 * Run the block steps in order; resolves to an error message, or null
 */
export async function blockAddress(
  runner: CommandRunner,
  ip: string,
  method: BlockMethod,
  timeoutMs: number
): Promise<string | null> {
  for (const step of blockSteps(ip, method)) {
    const result = await runner(step.command, step.args, { timeoutMs });
    if (!result.success) {
      return `${describeStep(step)}: ${result.error ?? result.stderr.trim()}`;
    }
  }
  return null;
}

export interface ReportInput {
  logFile: string;
  generatedAt: Date;
  periodMinutes: number;
  threshold: number;
  analysis: LoginAnalysis;
  blocked: string[];
}

export function renderLoginReport(input: ReportInput): string {
  const lines = [
    'Failed Login Report',
    `Generated: ${formatTimestamp(input.generatedAt)}`,
    `Log file: ${input.logFile}`,
    `Period: ${input.periodMinutes > 0 ? `last ${input.periodMinutes} minutes` : 'whole file'}`,
    `Threshold: ${input.threshold}`,
    `Matching lines: ${input.analysis.matchedLines}`,
    '',
    'Attempts  Address',
  ];
  for (const entry of input.analysis.counts) {
    const marks = [
      entry.count >= input.threshold ? 'ALERT' : '',
      input.blocked.includes(entry.ip) ? 'BLOCKED' : '',
    ].filter(Boolean);
    lines.push(`${String(entry.count).padStart(8)}  ${entry.ip}${marks.length > 0 ? `  [${marks.join(', ')}]` : ''}`);
  }
  if (input.analysis.whitelisted.length > 0) {
    lines.push('', 'Whitelisted:');
    for (const entry of input.analysis.whitelisted) {
      lines.push(`${String(entry.count).padStart(8)}  ${entry.ip}`);
    }
  }
  return lines.join('\n') + '\n';
}
