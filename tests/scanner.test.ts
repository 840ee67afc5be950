/**
 * Tests for the port scanner against in-process TCP servers
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { createServer, type Server, type Socket } from 'node:net';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  bannerProbe,
  cleanBanner,
  formatProgress,
  openLine,
  parseNmapState,
  renderScanReport,
  scanTargets,
  tcpProbe,
  nmapProbe,
  type PortResult,
} from '../src/net/scanner.js';
import { scanCommand } from '../src/commands/scan.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, stubRunner, testFlags } from './helpers/capture.js';

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

let greeter: Server;
let greeterPort: number;
let closedPort: number;
const sockets = new Set<Socket>();

beforeAll(async () => {
  greeter = createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    // Scans hang up without reading; a reset is expected
    socket.on('error', () => undefined);
    socket.end('SSH-2.0-TestServer_1.0\r\nsecond line\r\n');
  });
  greeterPort = await listen(greeter);

  const temporary = createServer();
  closedPort = await listen(temporary);
  await close(temporary);
});

afterAll(async () => {
  for (const socket of sockets) socket.destroy();
  await close(greeter);
});

describe('tcpProbe', () => {
  it('should report open and closed ports', async () => {
    expect(await tcpProbe('127.0.0.1', greeterPort, 1000)).toBe('open');
    expect(await tcpProbe('127.0.0.1', closedPort, 1000)).toBe('closed');
  });
});

describe('banners', () => {
  it('should keep the first printable line, at most 50 characters', () => {
    expect(cleanBanner('220 mail.example ESMTP\r\nmore')).toBe('220 mail.example ESMTP');
    expect(cleanBanner('x'.repeat(80))).toHaveLength(50);
    expect(cleanBanner('\x00\x01ok\x7f')).toBe('ok');
  });

  it('should pick a probe per protocol', () => {
    expect(bannerProbe(80)).toBe('HEAD / HTTP/1.0\r\n\r\n');
    expect(bannerProbe(22)).toBe('');
    expect(bannerProbe(6379)).toBe('\r\n');
  });
});

describe('scanTargets', () => {
  it('should scan ports in order and grab banners', async () => {
    const results = await scanTargets(['127.0.0.1'], {
      ports: [greeterPort, closedPort],
      timeoutMs: 1000,
      concurrency: 2,
      scanType: 'tcp',
      banner: true,
    });
    const byPort = new Map(results.map((r) => [r.port, r]));
    expect(results.map((r) => r.port)).toEqual([greeterPort, closedPort].sort((a, b) => a - b));
    expect(byPort.get(greeterPort)?.status).toBe('open');
    expect(byPort.get(greeterPort)?.banner).toBe('SSH-2.0-TestServer_1.0');
    expect(byPort.get(closedPort)?.status).toBe('closed');
  });

  it('should mark every port of an unresolvable host as an error', async () => {
    const results = await scanTargets(['nowhere.invalid'], {
      ports: [22, 80],
      timeoutMs: 1000,
      concurrency: 1,
      scanType: 'tcp',
      resolver: async () => {
        throw new Error('ENOTFOUND');
      },
    });
    expect(results.map((r) => [r.port, r.status, r.error])).toEqual([
      [22, 'error', 'Cannot resolve nowhere.invalid: ENOTFOUND'],
      [80, 'error', 'Cannot resolve nowhere.invalid: ENOTFOUND'],
    ]);
  });

  it('should report progress', async () => {
    const seen: number[] = [];
    await scanTargets(['127.0.0.1'], {
      ports: [closedPort],
      timeoutMs: 1000,
      concurrency: 1,
      scanType: 'tcp',
      progressEvery: 1,
      onProgress: (progress) => seen.push(progress.completed),
    });
    expect(seen).toEqual([1]);
  });
});

describe('nmap scans', () => {
  it('should parse nmap port states', () => {
    const stdout = 'PORT    STATE         SERVICE\n53/udp  open|filtered domain\n161/udp closed snmp\n';
    expect(parseNmapState(stdout, 53)).toBe('open');
    expect(parseNmapState(stdout, 161)).toBe('closed');
  });

  it('should run nmap with the scan flags', async () => {
    const { runner, calls } = stubRunner(() => ({ stdout: '53/udp open domain\n' }));
    expect(await nmapProbe(runner, '10.0.0.1', 53, 'udp', 2500)).toBe('open');
    expect(calls[0].args).toEqual(['-T4', '-Pn', '-sU', '-p', '53', '--host-timeout', '3s', '10.0.0.1']);
  });
});

describe('reports', () => {
  const results: PortResult[] = [
    { host: 'web', ip: '10.0.0.1', port: 80, status: 'open', service: 'http', banner: 'nginx, "edge"' },
    { host: 'web', ip: '10.0.0.1', port: 23, status: 'closed', service: 'telnet', banner: '' },
  ];
  const info = { scan_time: '2025-04-15T10:00:00.000Z', targets: ['web'], ports: [23, 80], scan_type: 'tcp' as const };

  it('should write open ports as text lines', () => {
    expect(renderScanReport('text', info, results)).toBe('OPEN: web:80 (http) - nginx, "edge"\n');
  });

  it('should quote CSV fields', () => {
    expect(renderScanReport('csv', info, results)).toBe(
      'host,ip,port,status,service,banner\n' +
        'web,10.0.0.1,80,open,http,"nginx, ""edge"""\n' +
        'web,10.0.0.1,23,closed,telnet,\n'
    );
  });

  it('should escape XML', () => {
    expect(renderScanReport('xml', info, results)).toContain('    <banner>nginx, &quot;edge&quot;</banner>\n');
  });

  it('should format progress with an ETA', () => {
    expect(formatProgress({ completed: 40, total: 240, elapsedMs: 2000 })).toBe(
      'Progress: 40/240 (16%) - 20 scans/sec - ETA: 0:00:10'
    );
    expect(openLine(results[1])).toBe('OPEN: web:23 (telnet)');
  });
});

describe('scanCommand', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'opskit-scan-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print open ports and write a CSV report', async () => {
    const { lines, overrides } = capture();
    const output = join(dir, 'scan.csv');
    const code = await scanCommand(
      ['127.0.0.1', '-p', `${greeterPort},${closedPort}`, '-o', output, '-f', 'csv', '--open-only'],
      testFlags({ quiet: true }),
      overrides
    );
    expect(code).toBe(ExitCode.SUCCESS);
    expect(lines).toEqual([`OPEN: 127.0.0.1:${greeterPort} (unknown)`]);
    expect(readFileSync(output, 'utf-8')).toBe(
      `host,ip,port,status,service,banner\n127.0.0.1,127.0.0.1,${greeterPort},open,unknown,\n`
    );
  });

  it('should require nmap for UDP scans', async () => {
    const { overrides } = capture();
    await expect(
      scanCommand(['127.0.0.1', '-s', 'udp', '-p', '53'], testFlags(), { ...overrides, exists: () => false })
    ).rejects.toThrow('Required command not found: nmap');
  });

  it('should reject a sub-second timeout', async () => {
    const { overrides } = capture();
    await expect(scanCommand(['127.0.0.1', '-t', '0.5'], testFlags(), overrides)).rejects.toThrow(
      '--timeout must be at least 1 second'
    );
  });
});
