/**
 * Scan target expansion
 *
 *   10.0.0.5            single address
 *   10.0.0.1-10.0.0.20  full range
 *   10.0.0.1-20         last-octet range
 *   10.0.0.0/24         CIDR block (hosts only)
 *   db.internal         hostname, resolved later
 */

import { invalidArgumentsError } from '../cli/errors.js';

/**
 * Shortest CIDR prefix accepted; a /16 already expands to 65534 hosts
 */
export const MIN_CIDR_PREFIX = 16;

const MAX_IPV4 = 0xffffffff;

export function parseIPv4(address: string): number[] | null {
  const parts = address.split('.');
  if (parts.length !== 4) return null;
  const octets: number[] = [];
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const value = parseInt(part, 10);
    if (value > 255) return null;
    octets.push(value);
  }
  return octets;
}

/**
 * Unsigned 32-bit value of a dotted address
 */
export function ipToNumber(address: string): number {
  const octets = parseIPv4(address);
  if (!octets) {
    throw invalidArgumentsError(`Invalid IPv4 address: ${address}`);
  }
  return octets.reduce((acc, octet) => acc * 256 + octet, 0);
}

export function numberToIp(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > MAX_IPV4) {
    throw invalidArgumentsError(`Address out of range: ${value}`);
  }
  return [
    Math.floor(value / 0x1000000) % 256,
    Math.floor(value / 0x10000) % 256,
    Math.floor(value / 0x100) % 256,
    value % 256,
  ].join('.');
}

function range(start: number, end: number): string[] {
  const result: string[] = [];
  for (let n = start; n <= end; n++) {
    result.push(numberToIp(n));
  }
  return result;
}

function expandCidr(target: string): string[] {
  const parts = target.split('/');
  const [base, prefixText] = parts;
  if (parts.length !== 2 || !parseIPv4(base) || !/^\d{1,2}$/.test(prefixText)) {
    throw invalidArgumentsError(`Invalid CIDR block: ${target}`);
  }
  const prefix = parseInt(prefixText, 10);
  if (prefix > 32) {
    throw invalidArgumentsError(`Invalid CIDR prefix /${prefix} in ${target}`);
  }
  if (prefix < MIN_CIDR_PREFIX) {
    throw invalidArgumentsError(
      `CIDR block ${target} is too large; use /${MIN_CIDR_PREFIX} or a longer prefix`
    );
  }

  const size = 2 ** (32 - prefix);
  const network = Math.floor(ipToNumber(base) / size) * size;

  if (prefix === 32) return [numberToIp(network)];
  if (prefix === 31) return range(network, network + 1);
  return range(network + 1, network + size - 2);
}

function expandRange(target: string): string[] {
  const [startText, endText] = target.split('-');
  const start = parseIPv4(startText);
  if (!start) {
    throw invalidArgumentsError(`Invalid range start in ${target}`);
  }

  // 10.0.0.1-20
  if (/^\d{1,3}$/.test(endText)) {
    const first = start[3];
    const last = parseInt(endText, 10);
    if (first < 1 || last > 255 || first > last) {
      throw invalidArgumentsError(`Invalid last-octet range ${target}; need 1 <= start <= end <= 255`);
    }
    const prefix = start.slice(0, 3).join('.');
    const result: string[] = [];
    for (let n = first; n <= last; n++) {
      result.push(`${prefix}.${n}`);
    }
    return result;
  }

  if (!parseIPv4(endText)) {
    throw invalidArgumentsError(`Invalid range end in ${target}`);
  }
  const from = ipToNumber(startText);
  const to = ipToNumber(endText);
  if (from > to) {
    throw invalidArgumentsError(`Range start is after range end in ${target}`);
  }
  if (to - from >= 2 ** (32 - MIN_CIDR_PREFIX)) {
    throw invalidArgumentsError(`Range ${target} is too large`);
  }
  return range(from, to);
}

/**
 * Expand one target expression into addresses or a hostname
 */
export function expandTarget(target: string): string[] {
  const trimmed = target.trim();
  if (trimmed.length === 0) {
    return [];
  }
  if (trimmed.includes('/')) {
    return expandCidr(trimmed);
  }
  if (/^[\d.]+-[\d.]+$/.test(trimmed)) {
    return expandRange(trimmed);
  }
  if (/^[\d.]+$/.test(trimmed)) {
    if (!parseIPv4(trimmed)) {
      throw invalidArgumentsError(`Invalid IPv4 address: ${trimmed}`);
    }
    return [trimmed];
  }
  if (!/^[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?(\.[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?)*\.?$/.test(trimmed)) {
    throw invalidArgumentsError(`Invalid target: ${trimmed}`);
  }
  return [trimmed];
}

/**
 * Expand every target, dropping duplicates (first occurrence wins)
 */
export function expandTargets(targets: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const target of targets) {
    for (const host of expandTarget(target)) {
      if (!seen.has(host)) {
        seen.add(host);
        result.push(host);
      }
    }
  }
  return result;
}
