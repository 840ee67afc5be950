/**
 * Port list parsing and well-known service names
 */

import { invalidArgumentsError } from '../cli/errors.js';

export const COMMON_PORTS: readonly number[] = [
  21, 22, 23, 25, 53, 80, 110, 111, 135, 139, 143, 443, 445, 993, 995, 1723, 3306, 3389, 5900, 8080,
];

const SERVICES: Record<number, string> = {
  21: 'ftp',
  22: 'ssh',
  23: 'telnet',
  25: 'smtp',
  53: 'domain',
  80: 'http',
  110: 'pop3',
  111: 'rpcbind',
  135: 'msrpc',
  139: 'netbios-ssn',
  143: 'imap',
  443: 'https',
  445: 'microsoft-ds',
  993: 'imaps',
  995: 'pop3s',
  1723: 'pptp',
  3306: 'mysql',
  3389: 'ms-wbt-server',
  5432: 'postgresql',
  5900: 'vnc',
  8080: 'http-proxy',
};

export function serviceName(port: number): string {
  return SERVICES[port] ?? 'unknown';
}

function parsePort(text: string, spec: string): number {
  if (!/^\d+$/.test(text)) {
    throw invalidArgumentsError(`Invalid port "${text}" in "${spec}"`);
  }
  const port = parseInt(text, 10);
  if (port < 1 || port > 65535) {
    throw invalidArgumentsError(`Port ${port} is out of range (1-65535)`);
  }
  return port;
}

/**
 * Parse `22,80,8000-8010` into a sorted, de-duplicated list; an empty
 * spec means the common ports
 */
export function parsePorts(spec: string | undefined): number[] {
  const trimmed = (spec ?? '').trim();
  if (trimmed.length === 0) {
    return [...COMMON_PORTS];
  }

  const ports = new Set<number>();
  for (const raw of trimmed.split(',')) {
    const part = raw.trim();
    if (part.length === 0) continue;

    const dash = part.indexOf('-');
    if (dash === -1) {
      ports.add(parsePort(part, spec ?? ''));
      continue;
    }

    const start = parsePort(part.slice(0, dash), part);
    const end = parsePort(part.slice(dash + 1), part);
    if (start > end) {
      throw invalidArgumentsError(`Invalid port range ${part}: start is after end`);
    }
    for (let port = start; port <= end; port++) {
      ports.add(port);
    }
  }

  if (ports.size === 0) {
    throw invalidArgumentsError(`No ports in "${spec ?? ''}"`);
  }
  return [...ports].sort((a, b) => a - b);
}
