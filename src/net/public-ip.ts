/**
 * Public address discovery through HTTP "what is my IP" services
 */

import { isIPv6 } from 'node:net';
import { CliError, ErrorCode, errorMessage } from '../cli/errors.js';
import { loadDataFile } from '../utils/data.js';
import { parseIPv4 } from './targets.js';

export type ResponseFormat = 'text' | 'trace' | 'html';
export type AddressFamily = 4 | 6;

export interface IpProvider {
  name: string;
  ipv4: string;
  ipv6?: string;
  parse: ResponseFormat;
}

function isProvider(value: unknown): value is IpProvider {
  return (
    value !== null &&
    typeof value === 'object' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'ipv4' in value &&
    typeof value.ipv4 === 'string' &&
    (!('ipv6' in value) || typeof value.ipv6 === 'string') &&
    'parse' in value &&
    (value.parse === 'text' || value.parse === 'trace' || value.parse === 'html')
  );
}

function isProviderList(value: unknown): value is IpProvider[] {
  return Array.isArray(value) && value.every(isProvider);
}

export function loadProviders(): IpProvider[] {
  return loadDataFile('ip-providers.json', isProviderList);
}

export function isValidAddress(address: string, family: AddressFamily): boolean {
  return family === 4 ? parseIPv4(address) !== null : isIPv6(address);
}

/**
 * Pull the address out of a provider response
 */
export function extractAddress(body: string, format: ResponseFormat, family: AddressFamily): string | null {
  let candidate: string | undefined;
  switch (format) {
    case 'text':
      candidate = body.trim().split(/\s+/)[0];
      break;
    case 'trace':
      candidate = /^ip=(.+)$/m.exec(body)?.[1]?.trim();
      break;
    case 'html': {
      const pattern = family === 4 ? /\b(?:\d{1,3}\.){3}\d{1,3}\b/ : /\b[0-9a-fA-F:]*:[0-9a-fA-F:]+\b/;
      candidate = pattern.exec(body)?.[0];
      break;
    }
  }
  return candidate && isValidAddress(candidate, family) ? candidate : null;
}

export interface LookupAttempt {
  provider: string;
  url: string;
  address: string | null;
  error?: string;
  /** Milliseconds */
  duration: number;
}

export interface LookupOptions {
  family: AddressFamily;
  timeoutMs: number;
  fetch?: typeof fetch;
  onAttempt?: (attempt: LookupAttempt) => void;
}

export async function queryProvider(provider: IpProvider, options: LookupOptions): Promise<LookupAttempt> {
  const url = options.family === 4 ? provider.ipv4 : provider.ipv6;
  const started = Date.now();
  if (!url) {
    return { provider: provider.name, url: '', address: null, error: 'no IPv6 endpoint', duration: 0 };
  }

  const doFetch = options.fetch ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  try {
    const response = await doFetch(url, { signal: controller.signal, headers: { 'User-Agent': 'opskit' } });
    if (!response.ok) {
      return { provider: provider.name, url, address: null, error: `HTTP ${response.status}`, duration: Date.now() - started };
    }
    const address = extractAddress(await response.text(), provider.parse, options.family);
    return {
      provider: provider.name,
      url,
      address,
      error: address ? undefined : 'response held no valid address',
      duration: Date.now() - started,
    };
  } catch (error) {
    const message = controller.signal.aborted ? `timed out after ${options.timeoutMs}ms` : errorMessage(error);
    return { provider: provider.name, url, address: null, error: message, duration: Date.now() - started };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Try providers in order until one returns a valid address
 */
export async function findPublicIp(
  providers: IpProvider[],
  options: LookupOptions
): Promise<{ address: string; provider: string; attempts: LookupAttempt[] }> {
  const attempts: LookupAttempt[] = [];
  for (const provider of providers) {
    const attempt = await queryProvider(provider, options);
    attempts.push(attempt);
    options.onAttempt?.(attempt);
    if (attempt.address) {
      return { address: attempt.address, provider: provider.name, attempts };
    }
  }
  throw new CliError(
    ErrorCode.GENERAL_ERROR,
    `Could not determine the public IPv${options.family} address`,
    { attempts: attempts.map((a) => `${a.provider}: ${a.error ?? 'no address'}`) }
  );
}
