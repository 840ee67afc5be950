/**
 * Tests for HTTP endpoint checks against an in-process server
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { createServer, type Server } from 'node:http';
import {
  checkUrl,
  evaluateResponse,
  nodeHttpClient,
  parseExpectedCodes,
  parseHeaders,
  renderHttpReport,
  textLine,
  type HttpClient,
  type HttpRequestSpec,
} from '../src/monitoring/http-check.js';
import { httpCommand } from '../src/commands/http.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, testFlags } from './helpers/capture.js';

let server: Server;
let base: string;

const spec = (partial: Partial<HttpRequestSpec> = {}): HttpRequestSpec => ({
  method: 'GET',
  headers: {},
  insecure: false,
  timeoutMs: 2000,
  ...partial,
});

beforeAll(async () => {
  server = createServer((req, res) => {
    if (req.url === '/slow') return;
    if (req.url === '/echo') {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        res.end(JSON.stringify({
          method: req.method,
          body,
          contentType: req.headers['content-type'] ?? null,
          authorization: req.headers.authorization ?? null,
        }));
      });
      return;
    }
    res.statusCode = req.url === '/ok' ? 200 : 404;
    res.end(req.url === '/ok' ? 'status: healthy' : 'not here');
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  base = `http://127.0.0.1:${typeof address === 'object' && address !== null ? address.port : 0}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('argument parsing', () => {
  it('should parse headers', () => {
    expect(parseHeaders(['Accept: text/plain', 'X-Token:  abc:def '])).toEqual({ Accept: 'text/plain', 'X-Token': 'abc:def' });
    expect(() => parseHeaders(['NoColon'])).toThrow('Invalid header "NoColon". Use "Name: value"');
  });

  it('should parse expected status codes', () => {
    expect(parseExpectedCodes('200, 301')).toEqual([200, 301]);
    expect(() => parseExpectedCodes('2xx')).toThrow('Invalid expected status codes "2xx". Use e.g. 200,301');
  });
});

describe('nodeHttpClient', () => {
  it('should fetch the status, body and timings', async () => {
    const response = await nodeHttpClient(`${base}/ok`, spec());
    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('status: healthy');
    expect(response.totalTime).toBeGreaterThanOrEqual(response.connectTime);
  });

  it('should send a form body and basic auth', async () => {
    const response = await nodeHttpClient(`${base}/echo`, spec({ method: 'POST', body: 'a=1', auth: 'ops:test-secret' }));
    expect(JSON.parse(response.body)).toEqual({
      method: 'POST',
      body: 'a=1',
      contentType: 'application/x-www-form-urlencoded',
      authorization: `Basic ${Buffer.from('ops:test-secret').toString('base64')}`,
    });
  });

  it('should time out', async () => {
    await expect(nodeHttpClient(`${base}/slow`, spec({ timeoutMs: 200 }))).rejects.toThrow('Request timed out after 200ms');
  });

  it('should refuse other protocols', async () => {
    await expect(nodeHttpClient('ftp://files.example/', spec())).rejects.toThrow('Unsupported protocol ftp:');
  });
});

describe('evaluateResponse', () => {
  it('should list every failed criterion', () => {
    const result = evaluateResponse(
      'https://a.example/',
      { statusCode: 503, body: 'down', connectTime: 0.7, totalTime: 1.23456 },
      { expect: [200], pattern: /healthy/, maxConnect: 0.5, maxTime: 1 }
    );
    expect(result.status).toBe('FAIL');
    expect(result.patternMatch).toBe(false);
    expect(result.reasons).toEqual([
      'status 503 not in 200',
      'pattern not found',
      'connect 0.7s over 0.5s',
      'total 1.235s over 1s',
    ]);
  });
});

describe('checkUrl', () => {
  const now = () => new Date('2025-04-15T10:00:00.000Z');

  it('should retry until an attempt passes', async () => {
    let calls = 0;
    const waits: number[] = [];
    const client: HttpClient = async () => {
      calls++;
      if (calls === 1) throw new Error('ECONNRESET');
      return { statusCode: 200, body: '', connectTime: 0.012, totalTime: 0.1 };
    };
    const result = await checkUrl('https://a.example/', {
      request: spec(),
      criteria: { expect: [200], maxConnect: 0, maxTime: 0 },
      retries: 2,
      client,
      sleep: async (ms) => {
        waits.push(ms);
      },
      now,
    });
    expect(result.attempts).toBe(2);
    expect(waits).toEqual([1000]);
    expect(textLine(result)).toBe('2025-04-15T10:00:00.000Z https://a.example/ 200 connect=0.012s total=0.100s pattern=n/a OK');
  });

  it('should keep the last failure', async () => {
    const result = await checkUrl('https://a.example/', {
      request: spec(),
      criteria: { expect: [200], pattern: /ok/, maxConnect: 0, maxTime: 0 },
      retries: 1,
      client: async () => {
        throw new Error('ECONNREFUSED');
      },
      sleep: async () => undefined,
      now,
    });
    expect(result).toMatchObject({ statusCode: 'ERROR', patternMatch: false, status: 'FAIL', attempts: 2, reasons: ['ECONNREFUSED'] });
    expect(renderHttpReport('csv', [result], true)).toBe(
      'timestamp,url,status_code,connect_time,total_time,pattern_match,status\n' +
        '2025-04-15T10:00:00.000Z,https://a.example/,ERROR,0.000,0.000,false,FAIL\n'
    );
  });
});

describe('httpCommand', () => {
  it('should print each check and exit 7 when one fails', async () => {
    const methods: string[] = [];
    const client: HttpClient = async (url, request) => {
      methods.push(request.method);
      return { statusCode: url.includes('b.example') ? 500 : 200, body: '', connectTime: 0.01, totalTime: 0.02 };
    };
    const { lines, logs, overrides } = capture();
    const code = await httpCommand(['https://a.example/', 'https://b.example/', '-r', '0'], testFlags(), { ...overrides, client });
    expect(code).toBe(ExitCode.CHECK_FAILED);
    expect(methods).toEqual(['GET', 'GET']);
    expect(lines).toHaveLength(2);
    expect(lines[0].endsWith(' https://a.example/ 200 connect=0.010s total=0.020s pattern=n/a OK')).toBe(true);
    expect(lines[1].endsWith(' https://b.example/ 500 connect=0.010s total=0.020s pattern=n/a FAIL')).toBe(true);
    expect(logs).toContain('[ERROR] https://b.example/ failed: status 500 not in 200');
  });

  it('should default to POST when a body is given', async () => {
    const methods: string[] = [];
    const client: HttpClient = async (_url, request) => {
      methods.push(request.method);
      return { statusCode: 201, body: '', connectTime: 0, totalTime: 0 };
    };
    const { overrides } = capture();
    const code = await httpCommand(['https://a.example/api', '-d', '{}', '-e', '201'], testFlags(), { ...overrides, client });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(methods).toEqual(['POST']);
  });

  it('should validate arguments', async () => {
    const { overrides } = capture();
    await expect(httpCommand([], testFlags(), overrides)).rejects.toThrow('No URLs given');
    await expect(httpCommand(['https://a.example/', '-u', 'nobody'], testFlags(), overrides)).rejects.toThrow(
      '--user must be user:password'
    );
    await expect(httpCommand(['https://a.example/', '-p', '('], testFlags(), overrides)).rejects.toThrow('Invalid --pattern');
  });
});
