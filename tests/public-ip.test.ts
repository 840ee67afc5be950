/**
 * Tests for public address lookup with a stubbed fetch
 */

import { describe, it, expect } from '@jest/globals';
import { extractAddress, findPublicIp, loadProviders, queryProvider, type IpProvider } from '../src/net/public-ip.js';
import { publicIpCommand } from '../src/commands/public-ip.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, testFlags } from './helpers/capture.js';

function stubFetch(handler: (url: string) => Response | Error, seen: string[] = []): typeof fetch {
  return async (input) => {
    const url = String(input);
    seen.push(url);
    const answer = handler(url);
    if (answer instanceof Error) throw answer;
    return answer;
  };
}

const options = { family: 4 as const, timeoutMs: 1000 };

describe('extractAddress', () => {
  it('should read each response format', () => {
    expect(extractAddress(' 203.0.113.7\n', 'text', 4)).toBe('203.0.113.7');
    expect(extractAddress('fl=1\nip=203.0.113.7\nts=1\n', 'trace', 4)).toBe('203.0.113.7');
    expect(extractAddress('<body>Current IP Address: 203.0.113.7</body>', 'html', 4)).toBe('203.0.113.7');
    expect(extractAddress('2001:db8::7\n', 'text', 6)).toBe('2001:db8::7');
  });

  it('should reject text that is not an address of the family', () => {
    expect(extractAddress('<html>rate limited</html>', 'text', 4)).toBeNull();
    expect(extractAddress('2001:db8::7', 'text', 4)).toBeNull();
    expect(extractAddress('999.1.1.1', 'text', 4)).toBeNull();
  });
});

describe('lookup', () => {
  const providers: IpProvider[] = [
    { name: 'down', ipv4: 'https://down.example/', parse: 'text' },
    { name: 'junk', ipv4: 'https://junk.example/', parse: 'text' },
    { name: 'good', ipv4: 'https://good.example/', parse: 'text' },
  ];

  it('should fall through to the first provider that answers', async () => {
    const fetch = stubFetch((url) => {
      if (url.includes('down')) return new Response('', { status: 503 });
      if (url.includes('junk')) return new Response('<html>oops</html>');
      return new Response('203.0.113.7\n');
    });
    const result = await findPublicIp(providers, { ...options, fetch });
    expect(result.address).toBe('203.0.113.7');
    expect(result.provider).toBe('good');
    expect(result.attempts.map((a) => a.error)).toEqual(['HTTP 503', 'response held no valid address', undefined]);
  });

  it('should fail when no provider answers', async () => {
    const fetch = stubFetch(() => new Error('getaddrinfo ENOTFOUND'));
    await expect(findPublicIp(providers, { ...options, fetch })).rejects.toThrow('Could not determine the public IPv4 address');
  });

  it('should time out slow providers', async () => {
    const slow: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const attempt = await queryProvider(providers[0], { family: 4, timeoutMs: 20, fetch: slow });
    expect(attempt.error).toBe('timed out after 20ms');
  });

  it('should skip providers without an IPv6 endpoint', async () => {
    const attempt = await queryProvider(providers[0], { family: 6, timeoutMs: 1000 });
    expect(attempt).toEqual({ provider: 'down', url: '', address: null, error: 'no IPv6 endpoint', duration: 0 });
  });

  it('should load the bundled providers', () => {
    const names = loadProviders().map((p) => p.name);
    expect(names[0]).toBe('ipify');
    expect(names).toContain('cloudflare');
  });
});

describe('publicIpCommand', () => {
  it('should print the address from the chosen provider', async () => {
    const seen: string[] = [];
    const { lines, logs, overrides } = capture();
    const code = await publicIpCommand(['-m', 'cloudflare'], testFlags(), {
      ...overrides,
      fetch: stubFetch(() => new Response('ip=203.0.113.7\n'), seen),
    });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(seen).toEqual(['https://1.1.1.1/cdn-cgi/trace']);
    expect(lines).toEqual(['203.0.113.7']);
    expect(logs).toContain('[INFO] Source: cloudflare');
  });

  it('should only ask IPv6-capable providers with -6', async () => {
    const seen: string[] = [];
    const { lines, overrides } = capture();
    await publicIpCommand(['-6'], testFlags(), {
      ...overrides,
      fetch: stubFetch((url) => (url.includes('ipify') ? new Error('unreachable') : new Response('2001:db8::7')), seen),
    });
    expect(seen).toEqual(['https://api6.ipify.org', 'https://ipv6.icanhazip.com']);
    expect(lines).toEqual(['2001:db8::7']);
  });

  it('should validate the method and family', async () => {
    const { overrides } = capture();
    await expect(publicIpCommand(['-m', 'nosuch'], testFlags(), overrides)).rejects.toThrow('Unknown method "nosuch".');
    await expect(publicIpCommand(['-m', 'cloudfare'], testFlags(), overrides)).rejects.toThrow(
      `Unknown method "cloudfare". Did you mean 'cloudflare'? Use one of: all,`
    );
    await expect(publicIpCommand(['-m', 'aws', '-6'], testFlags(), overrides)).rejects.toThrow('Method "aws" has no IPv6 endpoint');
    await expect(publicIpCommand(['-4', '-6'], testFlags(), overrides)).rejects.toThrow('Use either -4 or -6, not both');
  });
});
