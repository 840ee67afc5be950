/**
 * DNSBL lookups
 *
 * An address is checked against a zone by resolving the A record of
 * `<reversed-octets>.<zone>`. Any answer means the zone lists it.
 */

import { readFileSync, existsSync } from 'node:fs';
import { Resolver } from 'node:dns/promises';
import { runPool } from '../exec/pool.js';
import { errorMessage, fileNotFoundError, systemErrorCode } from '../cli/errors.js';
import { loadDataFile } from '../utils/data.js';
import { csvLine, toJsonText } from '../utils/formats.js';
import { parseIPv4 } from './targets.js';
import { parseListContent } from '../cli/options.js';

export const DNSBL_CATEGORIES = ['mail', 'spam', 'proxy'] as const;
export type DnsblCategory = (typeof DNSBL_CATEGORIES)[number];

export interface Dnsbl {
  zone: string;
  description: string;
}

export type DnsblCatalog = Record<DnsblCategory, Dnsbl[]>;

export type ListingStatus = 'LISTED' | 'CLEAN' | 'ERROR';

export interface ListingResult {
  ip: string;
  zone: string;
  description: string;
  status: ListingStatus;
  /** A record answers, e.g. 127.0.0.2 */
  answers: string[];
  reason: string;
  error?: string;
}

export interface DnsblLookup {
  resolve4(name: string, timeoutMs: number): Promise<string[]>;
  resolveTxt(name: string, timeoutMs: number): Promise<string[][]>;
}

function resolverFor(timeoutMs: number): Resolver {
  return new Resolver({ timeout: timeoutMs, tries: 1 });
}

export const defaultLookup: DnsblLookup = {
  resolve4: (name, timeoutMs) => resolverFor(timeoutMs).resolve4(name),
  resolveTxt: (name, timeoutMs) => resolverFor(timeoutMs).resolveTxt(name),
};

/**
 * Codes meaning "no such name": the address is not listed
 */
const NOT_LISTED_CODES = new Set(['ENOTFOUND', 'ENODATA', 'NXDOMAIN']);

function isDnsbl(value: unknown): value is Dnsbl {
  return (
    value !== null &&
    typeof value === 'object' &&
    'zone' in value &&
    typeof value.zone === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

function isCatalog(value: unknown): value is DnsblCatalog {
  if (value === null || typeof value !== 'object') return false;
  const record = new Map(Object.entries(value));
  return DNSBL_CATEGORIES.every((category) => {
    const list: unknown = record.get(category);
    return Array.isArray(list) && list.every(isDnsbl);
  });
}

export function loadDnsblCatalog(): DnsblCatalog {
  return loadDataFile('dnsbl.json', isCatalog);
}

/**
 * Zones from the chosen categories (all when none chosen), first occurrence wins
 */
export function selectDnsbls(catalog: DnsblCatalog, categories: DnsblCategory[]): Dnsbl[] {
  const chosen = categories.length > 0 ? categories : [...DNSBL_CATEGORIES];
  return dedupeZones(chosen.flatMap((category) => catalog[category]));
}

export function dedupeZones(lists: Dnsbl[]): Dnsbl[] {
  const seen = new Set<string>();
  return lists.filter((list) => {
    const key = list.zone.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * `zone[:description]` lines; blank lines and # comments are skipped
 */
export function parseDnsblList(content: string): Dnsbl[] {
  return dedupeZones(
    parseListContent(content).map((line) => {
      const colon = line.indexOf(':');
      if (colon === -1) return { zone: line, description: line };
      const zone = line.slice(0, colon).trim();
      const description = line.slice(colon + 1).trim();
      return { zone, description: description || zone };
    })
  );
}

export function readDnsblList(path: string): Dnsbl[] {
  if (!existsSync(path)) {
    throw fileNotFoundError(path);
  }
  return parseDnsblList(readFileSync(path, 'utf-8'));
}

/**
 * 192.0.2.10 -> 10.2.0.192
 */
export function reverseIp(ip: string): string {
  const octets = parseIPv4(ip);
  if (!octets) {
    throw new Error(`Not an IPv4 address: ${ip}`);
  }
  return [...octets].reverse().join('.');
}

export function dnsblQueryName(ip: string, zone: string): string {
  return `${reverseIp(ip)}.${zone.replace(/\.$/, '')}`;
}

export async function checkListing(
  ip: string,
  list: Dnsbl,
  timeoutMs: number,
  lookup: DnsblLookup = defaultLookup
): Promise<ListingResult> {
  const base = { ip, zone: list.zone, description: list.description, answers: [], reason: '' };
  const name = dnsblQueryName(ip, list.zone);

  let answers: string[];
  try {
    answers = await lookup.resolve4(name, timeoutMs);
  } catch (error) {
    const code = systemErrorCode(error);
    if (code && NOT_LISTED_CODES.has(code)) {
      return { ...base, status: 'CLEAN' };
    }
    return { ...base, status: 'ERROR', error: errorMessage(error) };
  }

  if (answers.length === 0) {
    return { ...base, status: 'CLEAN' };
  }

  // A missing TXT record leaves the listing without a reason
  const txt = await lookup.resolveTxt(name, timeoutMs).catch((): string[][] => []);
  const reason = txt.map((chunks) => chunks.join('')).join(' ');

  return { ...base, status: 'LISTED', answers, reason };
}

export interface CheckOptions {
  timeoutMs: number;
  concurrency: number;
  lookup?: DnsblLookup;
  onResult?: (result: ListingResult) => void;
}

/**
 * Check every address against every list; results keep address then list order
 */
export async function checkAddresses(ips: string[], lists: Dnsbl[], options: CheckOptions): Promise<ListingResult[]> {
  const pairs = ips.flatMap((ip) => lists.map((list) => ({ ip, list })));
  const outcomes = await runPool(
    pairs,
    options.concurrency,
    ({ ip, list }) => checkListing(ip, list, options.timeoutMs, options.lookup),
    {
      onSettled: (outcome) => {
        if (outcome.ok) options.onResult?.(outcome.value);
      },
    }
  );

  return outcomes.map((outcome, index) => {
    if (outcome.ok) return outcome.value;
    const { ip, list } = pairs[index];
    return {
      ip,
      zone: list.zone,
      description: list.description,
      status: 'ERROR',
      answers: [],
      reason: '',
      error: outcome.error.message,
    };
  });
}

export interface AddressSummary {
  ip: string;
  checked: number;
  listed: number;
  errors: number;
  zones: string[];
}

export function summarizeByAddress(results: ListingResult[]): AddressSummary[] {
  const byIp = new Map<string, AddressSummary>();
  for (const result of results) {
    const summary = byIp.get(result.ip) ?? { ip: result.ip, checked: 0, listed: 0, errors: 0, zones: [] };
    summary.checked++;
    if (result.status === 'LISTED') {
      summary.listed++;
      summary.zones.push(result.zone);
    } else if (result.status === 'ERROR') {
      summary.errors++;
    }
    byIp.set(result.ip, summary);
  }
  return [...byIp.values()];
}

export const BLACKLIST_FORMATS = ['text', 'csv', 'json'] as const;
export type BlacklistFormat = (typeof BLACKLIST_FORMATS)[number];

export function responseText(result: ListingResult): string {
  if (result.status === 'ERROR') return result.error ?? '';
  const answers = result.answers.join(' ');
  return result.reason ? `${answers} (${result.reason})` : answers;
}

export function resultLine(result: ListingResult): string {
  const response = responseText(result);
  const line = `${result.status}: ${result.ip} on ${result.zone} (${result.description})`;
  return response ? `${line} - ${response}` : line;
}

export function renderBlacklistReport(
  format: BlacklistFormat,
  timestamp: string,
  results: ListingResult[]
): string {
  switch (format) {
    case 'csv':
      return (
        ['IP,Blacklist,Description,Status,Response',
          ...results.map((r) => csvLine([r.ip, r.zone, r.description, r.status, responseText(r)]))].join('\n') + '\n'
      );
    case 'json':
      return toJsonText({
        timestamp,
        results: results.map((r) => ({
          ip: r.ip,
          blacklist: r.zone,
          description: r.description,
          status: r.status,
          answers: r.answers,
          reason: r.reason,
          ...(r.error ? { error: r.error } : {}),
        })),
      });
    case 'text':
      return (
        ['=== IP Blacklist Check Results ===', `Timestamp: ${timestamp}`, '', ...results.map(resultLine)].join('\n') +
        '\n'
      );
  }
}
