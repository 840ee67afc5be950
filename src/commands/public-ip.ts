/**
 * opskit public-ip - Print this host's public address
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { didYouMean, generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, invalidArgumentsError } from '../cli/errors.js';
import { timeoutOption } from '../cli/options.js';
import { findPublicIp, loadProviders, type AddressFamily } from '../net/public-ip.js';

export async function publicIpCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides = {}
): Promise<ExitCode> {
  const providers = loadProviders();

  if (flags.help) {
    console.log(
      generateHelp({
        command: 'public-ip',
        description: 'Show the public IP address of this host',
        usage: ['opskit public-ip [options]'],
        details: `Providers: ${providers.map((p) => p.name).join(', ')}.
With --method all they are tried in order until one answers.`,
        options: [
          { short: 'm', long: 'method', description: 'Provider name or all', values: '<name|all>', default: 'all' },
          { short: '4', long: 'ipv4', description: 'IPv4 address (default)' },
          { short: '6', long: 'ipv6', description: 'IPv6 address' },
          { short: 't', long: 'timeout', description: 'Request timeout in seconds', values: '<s>', default: '5' },
        ],
        examples: [
          { command: 'opskit public-ip', description: 'First provider that answers' },
          { command: 'opskit public-ip -m cloudflare -q', description: 'Address only, from Cloudflare' },
          { command: 'opskit public-ip -6', description: 'IPv6 address' },
        ],
      })
    );
    return ExitCode.SUCCESS;
  }

  const { values } = parseArgs({
    args,
    options: {
      method: { type: 'string', short: 'm' },
      ipv4: { type: 'boolean', short: '4', default: false },
      ipv6: { type: 'boolean', short: '6', default: false },
      timeout: { type: 'string', short: 't' },
    },
    allowPositionals: false,
  });

  const ctx = createContext('public-ip', flags, overrides);
  const { logger, out } = ctx;

  if (values.ipv4 && values.ipv6) {
    throw invalidArgumentsError('Use either -4 or -6, not both');
  }
  const family: AddressFamily = values.ipv6 ? 6 : 4;
  const timeoutMs = timeoutOption(values.timeout, flags, 5);

  const method = (values.method ?? 'all').toLowerCase();
  let selected = providers;
  if (method !== 'all') {
    const provider = providers.find((p) => p.name === method);
    if (!provider) {
      const names = providers.map((p) => p.name);
      const suggestion = didYouMean(method, names);
      throw invalidArgumentsError(
        `Unknown method "${method}".${suggestion ? ` ${suggestion}` : ''} Use one of: all, ${names.join(', ')}`
      );
    }
    selected = [provider];
  }
  if (family === 6) {
    selected = selected.filter((p) => p.ipv6);
    if (selected.length === 0) {
      throw invalidArgumentsError(`Method "${method}" has no IPv6 endpoint`);
    }
  }

  const result = await findPublicIp(selected, {
    family,
    timeoutMs,
    fetch: overrides.fetch,
    onAttempt: (attempt) => {
      if (attempt.address) {
        logger.debug(`${attempt.provider} answered ${attempt.address} in ${attempt.duration}ms`);
      } else {
        logger.debug(`${attempt.provider} failed: ${attempt.error ?? 'no address'}`);
      }
    },
  });

  out.result(result.address);
  logger.info(`Source: ${result.provider}`);
  out.success({ address: result.address, family: `ipv${family}`, provider: result.provider, attempts: result.attempts });
  return ExitCode.SUCCESS;
}
