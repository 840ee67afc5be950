/**
 * HTTP endpoint checks
 *
 * Requests go through node:http(s) directly so connect and total times can
 * be measured per attempt.
 */

import { request as httpRequest, type IncomingMessage } from 'node:http';
import { request as httpsRequest } from 'node:https';
import { errorMessage, invalidArgumentsError } from '../cli/errors.js';
import { csvLine, toJsonText } from '../utils/formats.js';

/**
 * Largest response body kept for pattern matching
 */
const MAX_BODY_BYTES = 1024 * 1024;

export interface HttpRequestSpec {
  method: string;
  headers: Record<string, string>;
  body?: string;
  /** `user:password` */
  auth?: string;
  insecure: boolean;
  timeoutMs: number;
}

export interface HttpResponseInfo {
  statusCode: number;
  body: string;
  /** Seconds until the TCP connection was up */
  connectTime: number;
  /** Seconds until the whole body arrived */
  totalTime: number;
}

export type HttpClient = (url: string, spec: HttpRequestSpec) => Promise<HttpResponseInfo>;

/**
 * `Name: value` header arguments
 */
export function parseHeaders(values: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values) {
    const colon = value.indexOf(':');
    if (colon <= 0) {
      throw invalidArgumentsError(`Invalid header "${value}". Use "Name: value"`);
    }
    headers[value.slice(0, colon).trim()] = value.slice(colon + 1).trim();
  }
  return headers;
}

export function parseExpectedCodes(value: string): number[] {
  const codes = value
    .split(',')
    .map((c) => c.trim())
    .filter(Boolean);
  if (codes.length === 0 || codes.some((c) => !/^\d{3}$/.test(c))) {
    throw invalidArgumentsError(`Invalid expected status codes "${value}". Use e.g. 200,301`);
  }
  return codes.map(Number);
}

function seconds(from: bigint): number {
  return Number(process.hrtime.bigint() - from) / 1e9;
}

export const nodeHttpClient: HttpClient = (url, spec) =>
  new Promise((resolve, reject) => {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      reject(new Error(`Invalid URL ${url}: ${errorMessage(error)}`));
      return;
    }
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      reject(new Error(`Unsupported protocol ${target.protocol}`));
      return;
    }

    const started = process.hrtime.bigint();
    let connectTime = 0;
    const headers = { ...spec.headers };
    if (spec.body !== undefined && !Object.keys(headers).some((h) => h.toLowerCase() === 'content-type')) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const options = {
      method: spec.method,
      headers,
      auth: spec.auth,
      timeout: spec.timeoutMs,
      ...(target.protocol === 'https:' ? { rejectUnauthorized: !spec.insecure } : {}),
    };

    const onResponse = (response: IncomingMessage): void => {
      const chunks: Buffer[] = [];
      let size = 0;
      response.on('data', (chunk: Buffer) => {
        if (size < MAX_BODY_BYTES) {
          chunks.push(chunk);
          size += chunk.length;
        }
      });
      response.on('end', () => {
        clearTimeout(deadline);
        resolve({
          statusCode: response.statusCode ?? 0,
          body: Buffer.concat(chunks).toString('utf-8'),
          connectTime,
          totalTime: seconds(started),
        });
      });
      response.on('error', (error) => {
        clearTimeout(deadline);
        reject(error);
      });
    };

    const req =
      target.protocol === 'https:' ? httpsRequest(target, options, onResponse) : httpRequest(target, options, onResponse);

    const deadline = setTimeout(() => {
      req.destroy(new Error(`Request timed out after ${spec.timeoutMs}ms`));
    }, spec.timeoutMs);

    req.on('socket', (socket) => {
      if (!socket.connecting) {
        connectTime = seconds(started);
        return;
      }
      socket.once('connect', () => {
        connectTime = seconds(started);
      });
    });
    req.on('timeout', () => req.destroy(new Error(`Request timed out after ${spec.timeoutMs}ms`)));
    req.on('error', (error) => {
      clearTimeout(deadline);
      reject(error);
    });

    if (spec.body !== undefined) {
      req.write(spec.body);
    }
    req.end();
  });

export interface CheckCriteria {
  expect: number[];
  pattern?: RegExp;
  /** Seconds; 0 means no limit */
  maxConnect: number;
  maxTime: number;
}

export type CheckStatus = 'OK' | 'FAIL';

export interface HttpCheckResult {
  url: string;
  timestamp: string;
  /** Status code, or ERROR when no response arrived */
  statusCode: number | 'ERROR';
  connectTime: number;
  totalTime: number;
  /** null when no pattern was given */
  patternMatch: boolean | null;
  status: CheckStatus;
  attempts: number;
  reasons: string[];
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function evaluateResponse(url: string, response: HttpResponseInfo, criteria: CheckCriteria): Omit<HttpCheckResult, 'timestamp' | 'attempts'> {
  const reasons: string[] = [];
  if (!criteria.expect.includes(response.statusCode)) {
    reasons.push(`status ${response.statusCode} not in ${criteria.expect.join(',')}`);
  }
  const patternMatch = criteria.pattern ? criteria.pattern.test(response.body) : null;
  if (patternMatch === false) {
    reasons.push('pattern not found');
  }
  if (criteria.maxConnect > 0 && response.connectTime > criteria.maxConnect) {
    reasons.push(`connect ${round3(response.connectTime)}s over ${criteria.maxConnect}s`);
  }
  if (criteria.maxTime > 0 && response.totalTime > criteria.maxTime) {
    reasons.push(`total ${round3(response.totalTime)}s over ${criteria.maxTime}s`);
  }
  return {
    url,
    statusCode: response.statusCode,
    connectTime: round3(response.connectTime),
    totalTime: round3(response.totalTime),
    patternMatch,
    status: reasons.length === 0 ? 'OK' : 'FAIL',
    reasons,
  };
}

export interface CheckOptions {
  request: HttpRequestSpec;
  criteria: CheckCriteria;
  /** Extra attempts after a failed one */
  retries: number;
  retryDelayMs?: number;
  client?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check one URL, retrying failed attempts; the last attempt's result stands
 */
export async function checkUrl(url: string, options: CheckOptions): Promise<HttpCheckResult> {
  const client = options.client ?? nodeHttpClient;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const attempts = options.retries + 1;

  let result: Omit<HttpCheckResult, 'timestamp' | 'attempts'> = {
    url,
    statusCode: 'ERROR',
    connectTime: 0,
    totalTime: 0,
    patternMatch: null,
    status: 'FAIL',
    reasons: [],
  };

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await client(url, options.request);
      result = evaluateResponse(url, response, options.criteria);
    } catch (error) {
      result = {
        url,
        statusCode: 'ERROR',
        connectTime: 0,
        totalTime: 0,
        patternMatch: options.criteria.pattern ? false : null,
        status: 'FAIL',
        reasons: [errorMessage(error)],
      };
    }
    if (result.status === 'OK') {
      return { ...result, timestamp: now().toISOString(), attempts: attempt };
    }
    if (attempt < attempts) {
      await sleep(options.retryDelayMs ?? 1000);
    }
  }

  return { ...result, timestamp: now().toISOString(), attempts };
}

export const HTTP_FORMATS = ['text', 'csv', 'json'] as const;
export type HttpFormat = (typeof HTTP_FORMATS)[number];

export const CSV_HEADER = 'timestamp,url,status_code,connect_time,total_time,pattern_match,status';

function patternText(value: boolean | null): string {
  return value === null ? 'n/a' : String(value);
}

export function textLine(result: HttpCheckResult): string {
  return (
    `${result.timestamp} ${result.url} ${result.statusCode} ` +
    `connect=${result.connectTime.toFixed(3)}s total=${result.totalTime.toFixed(3)}s ` +
    `pattern=${patternText(result.patternMatch)} ${result.status}`
  );
}

export function renderHttpReport(format: HttpFormat, results: HttpCheckResult[], header: boolean): string {
  switch (format) {
    case 'text':
      return results.map((r) => textLine(r) + '\n').join('');
    case 'csv': {
      const rows = results.map((r) =>
        csvLine([r.timestamp, r.url, r.statusCode, r.connectTime.toFixed(3), r.totalTime.toFixed(3), patternText(r.patternMatch), r.status])
      );
      return (header ? [CSV_HEADER, ...rows] : rows).join('\n') + '\n';
    }
    case 'json':
      return toJsonText(
        results.map((r) => ({
          timestamp: r.timestamp,
          url: r.url,
          status_code: r.statusCode,
          connect_time: r.connectTime,
          total_time: r.totalTime,
          pattern_match: r.patternMatch,
          status: r.status,
          attempts: r.attempts,
          reasons: r.reasons,
        }))
      );
  }
}
