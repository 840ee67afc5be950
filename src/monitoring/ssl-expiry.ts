/**
 * TLS certificate expiry checks for live endpoints and PEM files
 */

import { connect } from 'node:tls';
import { X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { errorMessage, invalidArgumentsError } from '../cli/errors.js';
import { csvLine, toJsonText } from '../utils/formats.js';

const SECONDS_PER_DAY = 86_400;

export interface CertificateInfo {
  commonName: string;
  sans: string[];
  issuer: string;
  /** ISO 8601 */
  notAfter: string;
}

export type SslStatus = 'OK' | 'WARNING' | 'CRITICAL' | 'EXPIRED' | 'ERROR';

export interface SslResult extends Partial<CertificateInfo> {
  identifier: string;
  source: 'domain' | 'file';
  daysLeft: number | null;
  status: SslStatus;
  error?: string;
}

/**
 * Value of one attribute in a distinguished name printed one per line
 * (`C=US\nO=Example\nCN=example.com`)
 */
export function dnAttribute(dn: string, attribute: string): string {
  for (const line of dn.split('\n')) {
    const eq = line.indexOf('=');
    if (eq > 0 && line.slice(0, eq).trim() === attribute) {
      return line.slice(eq + 1).trim();
    }
  }
  return '';
}

/**
 * `DNS:a.example.com, DNS:b.example.com, IP Address:10.0.0.1` -> names
 */
export function parseSubjectAltName(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((part) => part.trim())
    .map((part) => part.replace(/^(DNS|IP Address):/, ''))
    .filter(Boolean);
}

export function certificateInfo(cert: X509Certificate): CertificateInfo {
  const notAfter = new Date(cert.validTo);
  if (Number.isNaN(notAfter.getTime())) {
    throw new Error(`Unparsable expiry date "${cert.validTo}"`);
  }
  const issuer = dnAttribute(cert.issuer, 'O') || dnAttribute(cert.issuer, 'CN') || cert.issuer.replace(/\n/g, ', ');
  return {
    commonName: dnAttribute(cert.subject, 'CN'),
    sans: parseSubjectAltName(cert.subjectAltName),
    issuer,
    notAfter: notAfter.toISOString(),
  };
}

/**
 * `host`, `host:port` or `[v6]:port`
 */
export function parseEndpoint(value: string, defaultPort: number): { host: string; port: number } {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(value);
  if (bracketed) {
    return { host: bracketed[1], port: bracketed[2] ? Number(bracketed[2]) : defaultPort };
  }
  const hostPort = /^([^:]+):(\d+)$/.exec(value);
  if (hostPort) {
    const port = Number(hostPort[2]);
    if (port < 1 || port > 65535) {
      throw invalidArgumentsError(`Invalid port in ${value}`);
    }
    return { host: hostPort[1], port };
  }
  return { host: value, port: defaultPort };
}

export type CertificateFetcher = (host: string, port: number, timeoutMs: number) => Promise<X509Certificate>;

/**
 * Handshake with SNI and read the peer certificate; verification is off so
 * expired and self-signed certificates can still be inspected
 */
export const fetchPeerCertificate: CertificateFetcher = (host, port, timeoutMs) =>
  new Promise((resolve, reject) => {
    const socket = connect({ host, port, servername: host, rejectUnauthorized: false, timeout: timeoutMs });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('secureConnect', () => {
      clearTimeout(timer);
      const peer = socket.getPeerCertificate();
      socket.end();
      if (!peer || !peer.raw) {
        reject(new Error(`${host}:${port} presented no certificate`));
        return;
      }
      try {
        resolve(new X509Certificate(peer.raw));
      } catch (error) {
        reject(error);
      }
    });
    socket.once('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
  });

export function readCertificateFile(path: string): X509Certificate {
  return new X509Certificate(readFileSync(path));
}

/**
 * Whole days left, rounded down; negative once expired
 */
export function daysUntil(notAfter: Date, now: Date): number {
  return Math.floor((notAfter.getTime() - now.getTime()) / 1000 / SECONDS_PER_DAY);
}

export function expiryStatus(daysLeft: number, warningDays: number, criticalDays: number): SslStatus {
  if (daysLeft < 0) return 'EXPIRED';
  if (daysLeft <= criticalDays) return 'CRITICAL';
  if (daysLeft <= warningDays) return 'WARNING';
  return 'OK';
}

export interface SslCheckOptions {
  warningDays: number;
  criticalDays: number;
  now?: Date;
}

export function evaluateCertificate(
  identifier: string,
  source: SslResult['source'],
  cert: X509Certificate,
  options: SslCheckOptions
): SslResult {
  const info = certificateInfo(cert);
  const daysLeft = daysUntil(new Date(info.notAfter), options.now ?? new Date());
  return {
    identifier,
    source,
    ...info,
    daysLeft,
    status: expiryStatus(daysLeft, options.warningDays, options.criticalDays),
  };
}

export async function checkDomain(
  value: string,
  options: SslCheckOptions & { port: number; timeoutMs: number; fetcher?: CertificateFetcher }
): Promise<SslResult> {
  const fetcher = options.fetcher ?? fetchPeerCertificate;
  try {
    const { host, port } = parseEndpoint(value, options.port);
    const cert = await fetcher(host, port, options.timeoutMs);
    return evaluateCertificate(`${host}:${port}`, 'domain', cert, options);
  } catch (error) {
    return { identifier: value, source: 'domain', daysLeft: null, status: 'ERROR', error: errorMessage(error) };
  }
}

export function checkFile(path: string, options: SslCheckOptions): SslResult {
  try {
    return evaluateCertificate(path, 'file', readCertificateFile(path), options);
  } catch (error) {
    return { identifier: path, source: 'file', daysLeft: null, status: 'ERROR', error: errorMessage(error) };
  }
}

export const SSL_FORMATS = ['text', 'csv', 'json'] as const;
export type SslFormat = (typeof SSL_FORMATS)[number];

export const CSV_HEADER = 'Identifier,Common Name,SANs,Issuer,Expiry Date,Days Left,Status';

export function textLine(result: SslResult): string {
  if (result.status === 'ERROR') {
    return `${result.identifier}: ERROR - ${result.error ?? 'unknown error'}`;
  }
  return `${result.identifier}: ${result.status} - expires ${result.notAfter ?? '?'} (${result.daysLeft ?? '?'} days), CN=${result.commonName ?? ''}`;
}

export function renderSslReport(format: SslFormat, results: SslResult[], header: boolean): string {
  switch (format) {
    case 'text':
      return results.map((r) => textLine(r) + '\n').join('');
    case 'csv': {
      const rows = results.map((r) =>
        csvLine([r.identifier, r.commonName ?? '', (r.sans ?? []).join(' '), r.issuer ?? '', r.notAfter ?? '', r.daysLeft ?? '', r.status])
      );
      return (header ? [CSV_HEADER, ...rows] : rows).join('\n') + '\n';
    }
    case 'json':
      return toJsonText(
        results.map((r) => ({
          identifier: r.identifier,
          source: r.source,
          common_name: r.commonName ?? null,
          sans: r.sans ?? [],
          issuer: r.issuer ?? null,
          expiry_date: r.notAfter ?? null,
          days_left: r.daysLeft,
          status: r.status,
          ...(r.error ? { error: r.error } : {}),
        }))
      );
  }
}
