/**
 * Port scanner
 *
 * TCP scans use a plain connect probe; UDP and SYN scans hand each port to
 * nmap. Probes run through the shared pool, so `concurrency` bounds the
 * number of open sockets (or nmap processes) at any moment.
 */

import { createConnection } from 'node:net';
import { lookup } from 'node:dns/promises';
import { runPool } from '../exec/pool.js';
import type { CommandRunner } from '../exec/runner.js';
import { parseIPv4 } from './targets.js';
import { serviceName } from './ports.js';
import { csvLine, escapeXml, toJsonText } from '../utils/formats.js';
import { errorMessage } from '../cli/errors.js';

export const SCAN_TYPES = ['tcp', 'udp', 'syn'] as const;
export type ScanType = (typeof SCAN_TYPES)[number];

export type PortStatus = 'open' | 'closed' | 'filtered' | 'error';

export interface PortResult {
  host: string;
  ip: string;
  port: number;
  status: PortStatus;
  service: string;
  banner: string;
  error?: string;
}

export interface ScanProgress {
  completed: number;
  total: number;
  elapsedMs: number;
}

export type Resolver = (host: string) => Promise<string>;

export interface ScanOptions {
  ports: number[];
  timeoutMs: number;
  concurrency: number;
  scanType: ScanType;
  banner?: boolean;
  /** Minimum gap between probe starts */
  waitMs?: number;
  /** Resolve hostnames once per target (default true) */
  resolve?: boolean;
  runner?: CommandRunner;
  resolver?: Resolver;
  /** Called every `progressEvery` completed probes */
  onProgress?: (progress: ScanProgress) => void;
  progressEvery?: number;
}

const BANNER_MAX_LENGTH = 50;

export const defaultResolver: Resolver = async (host) => {
  const { address } = await lookup(host, { family: 4 });
  return address;
};

/**
 * Connect probe: open on connect, closed on refusal, filtered on timeout
 */
export function tcpProbe(host: string, port: number, timeoutMs: number): Promise<'open' | 'closed' | 'filtered'> {
  return new Promise((resolve) => {
    const socket = createConnection({ host, port });
    const timer = setTimeout(() => finish('filtered'), timeoutMs);

    function finish(status: 'open' | 'closed' | 'filtered'): void {
      clearTimeout(timer);
      socket.destroy();
      resolve(status);
    }

    socket.once('connect', () => finish('open'));
    socket.once('error', () => finish('closed'));
  });
}

/**
 * Bytes sent to coax a greeting out of the service on `port`
 */
export function bannerProbe(port: number): string {
  switch (port) {
    case 21:
    case 25:
    case 110:
    case 587:
      return 'QUIT\r\n';
    case 80:
    case 443:
    case 8080:
      return 'HEAD / HTTP/1.0\r\n\r\n';
    case 143:
      return 'a1 LOGOUT\r\n';
    case 22:
    case 3306:
      return '';
    default:
      return '\r\n';
  }
}

/**
 * First line, printable ASCII only, at most 50 characters
 */
export function cleanBanner(raw: string): string {
  const firstLine = raw.split('\n')[0] ?? '';
  return firstLine.replace(/[^\x20-\x7e]/g, '').slice(0, BANNER_MAX_LENGTH);
}

export function grabBanner(host: string, port: number, timeoutMs: number): Promise<string> {
  return new Promise((resolve) => {
    let data = '';
    const socket = createConnection({ host, port });
    const timer = setTimeout(() => finish(), timeoutMs);

    function finish(): void {
      clearTimeout(timer);
      socket.destroy();
      resolve(cleanBanner(data));
    }

    socket.setEncoding('latin1');
    socket.once('connect', () => {
      const probe = bannerProbe(port);
      if (probe) socket.write(probe);
    });
    socket.on('data', (chunk: string) => {
      data += chunk;
      if (data.includes('\n')) finish();
    });
    socket.once('end', finish);
    socket.once('error', finish);
  });
}

/**
 * nmap reports `80/tcp open http`; `open|filtered` counts as open
 */
export function parseNmapState(stdout: string, port: number): 'open' | 'closed' {
  const pattern = new RegExp(`^${port}/(tcp|udp)\\s+open\\b`, 'm');
  return pattern.test(stdout) ? 'open' : 'closed';
}

export async function nmapProbe(
  runner: CommandRunner,
  ip: string,
  port: number,
  scanType: 'udp' | 'syn',
  timeoutMs: number
): Promise<'open' | 'closed'> {
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  const result = await runner(
    'nmap',
    ['-T4', '-Pn', scanType === 'udp' ? '-sU' : '-sS', '-p', String(port), '--host-timeout', `${seconds}s`, ip],
    { timeoutMs: timeoutMs + 30_000 }
  );
  if (!result.success) {
    throw new Error(result.error ?? `nmap exited with code ${result.exitCode}`);
  }
  return parseNmapState(result.stdout, port);
}

interface Probe {
  host: string;
  port: number;
}

/**
 * Scan every port of every host; results come back ordered by host (input
 * order) then port
 */
export async function scanTargets(hosts: string[], options: ScanOptions): Promise<PortResult[]> {
  const resolver = options.resolver ?? defaultResolver;
  const resolved = new Map<string, { ip: string } | { error: string }>();

  for (const host of hosts) {
    if (parseIPv4(host) || options.resolve === false) {
      resolved.set(host, { ip: host });
      continue;
    }
    try {
      resolved.set(host, { ip: await resolver(host) });
    } catch (error) {
      resolved.set(host, { error: `Cannot resolve ${host}: ${errorMessage(error)}` });
    }
  }

  const ports = [...options.ports].sort((a, b) => a - b);
  const probes: Probe[] = hosts.flatMap((host) => ports.map((port) => ({ host, port })));
  const every = options.progressEvery ?? 10;
  const started = Date.now();

  const probeOne = async ({ host, port }: Probe): Promise<PortResult> => {
    const base = { host, port, service: serviceName(port), banner: '' };
    const target = resolved.get(host);
    if (!target || 'error' in target) {
      return { ...base, ip: '', status: 'error', error: target && 'error' in target ? target.error : 'unresolved' };
    }

    let status: PortStatus;
    if (options.scanType === 'tcp') {
      status = await tcpProbe(target.ip, port, options.timeoutMs);
    } else {
      if (!options.runner) {
        throw new Error('nmap scans need a process runner');
      }
      status = await nmapProbe(options.runner, target.ip, port, options.scanType, options.timeoutMs);
    }

    const banner = status === 'open' && options.banner ? await grabBanner(target.ip, port, options.timeoutMs) : '';
    return { ...base, ip: target.ip, status, banner };
  };

  const outcomes = await runPool(probes, options.concurrency, probeOne, {
    delayMs: options.waitMs,
    onSettled: (_outcome, _probe, _index, completed) => {
      if (options.onProgress && completed % every === 0) {
        options.onProgress({ completed, total: probes.length, elapsedMs: Date.now() - started });
      }
    },
  });

  return outcomes.map((outcome, index) => {
    if (outcome.ok) return outcome.value;
    const { host, port } = probes[index];
    const target = resolved.get(host);
    return {
      host,
      ip: target && 'ip' in target ? target.ip : '',
      port,
      status: 'error',
      service: serviceName(port),
      banner: '',
      error: outcome.error.message,
    };
  });
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `Progress: 40/254 (15%) - 20 scans/sec - ETA: 0:00:10`
 */
export function formatProgress({ completed, total, elapsedMs }: ScanProgress): string {
  const elapsed = Math.floor(elapsedMs / 1000);
  const rate = elapsed > 0 ? Math.floor(completed / elapsed) : 0;
  const percent = total > 0 ? Math.floor((completed * 100) / total) : 100;
  const eta = rate > 0 ? Math.floor((total - completed) / rate) : 0;
  return (
    `Progress: ${completed}/${total} (${percent}%) - ${rate} scans/sec - ` +
    `ETA: ${Math.floor(eta / 3600)}:${pad2(Math.floor((eta % 3600) / 60))}:${pad2(eta % 60)}`
  );
}

export function openLine(result: PortResult): string {
  const line = `OPEN: ${result.host}:${result.port} (${result.service})`;
  return result.banner ? `${line} - ${result.banner}` : line;
}

export const SCAN_FORMATS = ['text', 'json', 'csv', 'xml'] as const;
export type ScanFormat = (typeof SCAN_FORMATS)[number];

export interface ScanInfo {
  scan_time: string;
  targets: string[];
  ports: number[];
  scan_type: ScanType;
}

/**
 * Render results for the -o file
 */
export function renderScanReport(format: ScanFormat, info: ScanInfo, results: PortResult[]): string {
  const rows = results.map(({ host, ip, port, status, service, banner }) => ({ host, ip, port, status, service, banner }));

  switch (format) {
    case 'json':
      return toJsonText({ scan_info: info, results: rows });
    case 'csv':
      return [
        'host,ip,port,status,service,banner',
        ...rows.map((r) => csvLine([r.host, r.ip, r.port, r.status, r.service, r.banner])),
      ].join('\n') + '\n';
    case 'xml': {
      const lines = [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<portscanner>',
        `  <scan_time>${escapeXml(info.scan_time)}</scan_time>`,
        `  <scan_type>${info.scan_type}</scan_type>`,
        `  <targets>${escapeXml(info.targets.join(','))}</targets>`,
      ];
      for (const r of rows) {
        lines.push(
          '  <host>',
          `    <hostname>${escapeXml(r.host)}</hostname>`,
          `    <ip>${escapeXml(r.ip)}</ip>`,
          `    <port>${r.port}</port>`,
          `    <status>${r.status}</status>`,
          `    <service>${escapeXml(r.service)}</service>`,
          `    <banner>${escapeXml(r.banner)}</banner>`,
          '  </host>'
        );
      }
      lines.push('</portscanner>');
      return lines.join('\n') + '\n';
    }
    case 'text':
      return results.filter((r) => r.status === 'open').map((r) => openLine(r) + '\n').join('');
  }
}
