/**
 * opskit blacklist - Check addresses against DNS blocklists
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, errorMessage, invalidArgumentsError } from '../cli/errors.js';
import { choiceOption, intOption, readListFile, timeoutOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { parseIPv4 } from '../net/targets.js';
import { defaultResolver, type Resolver } from '../net/scanner.js';
import {
  checkAddresses,
  loadDnsblCatalog,
  readDnsblList,
  renderBlacklistReport,
  resultLine,
  selectDnsbls,
  summarizeByAddress,
  BLACKLIST_FORMATS,
  type DnsblCategory,
  type DnsblLookup,
} from '../net/blacklist.js';
import { writeReport } from '../utils/formats.js';

const HELP = generateHelp({
  command: 'blacklist',
  description: 'Check IP addresses against DNS blocklists',
  usage: ['opskit blacklist <ip|domain...> [options]', 'opskit blacklist -F targets.txt [options]'],
  details: `Domains are resolved to their first IPv4 address. Without --mail, --spam or
--proxy every built-in list is checked. Exit code 7 when any address is listed.`,
  options: [
    { short: 'i', long: 'ip', description: 'Address to check (repeatable)', values: '<ip>' },
    { short: 'd', long: 'domain', description: 'Domain to resolve and check (repeatable)', values: '<name>' },
    { short: 'F', long: 'file', description: 'File with one address or domain per line', values: '<file>' },
    { short: 'n', long: 'no-resolve', description: 'Skip targets that are not addresses' },
    { long: 'mail', description: 'Mail server blocklists' },
    { long: 'spam', description: 'Spam source blocklists' },
    { long: 'proxy', description: 'Open proxy blocklists' },
    { short: 'l', long: 'list', description: 'Custom zone list (zone[:description] per line)', values: '<file>' },
    { short: 't', long: 'timeout', description: 'Lookup timeout in seconds', values: '<s>', default: '2' },
    { short: 'c', long: 'concurrent', description: 'Concurrent lookups', values: '<n>', default: '5' },
    { short: 'f', long: 'format', description: 'File format', values: 'text|csv|json', default: 'text' },
    { short: 'o', long: 'output', description: 'Write results to a file', values: '<file>' },
    { short: 'r', long: 'report', description: 'Print a summary per address' },
  ],
  examples: [
    { command: 'opskit blacklist 192.0.2.10', description: 'Check one address everywhere' },
    { command: 'opskit blacklist -d mail.example.com --mail', description: 'Check a mail host on mail lists' },
    { command: 'opskit blacklist -F servers.txt -r -o bl.csv -f csv', description: 'Batch check with a report' },
  ],
});

export interface BlacklistCommandOverrides extends ContextOverrides {
  lookup?: DnsblLookup;
  resolver?: Resolver;
}

export async function blacklistCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: BlacklistCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      ip: { type: 'string', short: 'i', multiple: true },
      domain: { type: 'string', short: 'd', multiple: true },
      file: { type: 'string', short: 'F' },
      'no-resolve': { type: 'boolean', short: 'n', default: false },
      mail: { type: 'boolean', default: false },
      spam: { type: 'boolean', default: false },
      proxy: { type: 'boolean', default: false },
      list: { type: 'string', short: 'l' },
      timeout: { type: 'string', short: 't' },
      concurrent: { type: 'string', short: 'c' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      report: { type: 'boolean', short: 'r', default: false },
    },
    allowPositionals: true,
  });

  const ctx = createContext('blacklist', flags, overrides);
  const { config, logger, out } = ctx;

  const targets = [
    ...positionals,
    ...(values.ip ?? []),
    ...(values.domain ?? []),
    ...(values.file ? readListFile(values.file) : []),
  ];
  if (targets.length === 0) {
    throw invalidArgumentsError('No targets given. Pass addresses, --ip, --domain or --file');
  }

  const timeoutMs = timeoutOption(values.timeout, flags, config.blacklist?.timeout ?? 2);
  const concurrency = intOption('concurrent', values.concurrent, config.blacklist?.concurrency ?? 5, { min: 1 });
  const format = choiceOption('format', values.format, BLACKLIST_FORMATS, 'text');

  const categories: DnsblCategory[] = [];
  if (values.mail) categories.push('mail');
  if (values.spam) categories.push('spam');
  if (values.proxy) categories.push('proxy');
  const lists = values.list ? readDnsblList(values.list) : selectDnsbls(loadDnsblCatalog(), categories);
  if (lists.length === 0) {
    throw invalidArgumentsError('No blocklists to check');
  }

  const resolver = overrides.resolver ?? defaultResolver;
  const ips: string[] = [];
  for (const target of targets) {
    if (parseIPv4(target)) {
      ips.push(target);
      continue;
    }
    if (values['no-resolve']) {
      logger.warning(`Skipping ${target}: not an IPv4 address`);
      continue;
    }
    try {
      const ip = await resolver(target);
      logger.debug(`${target} resolved to ${ip}`);
      ips.push(ip);
    } catch (error) {
      logger.warning(`Could not resolve ${target}, skipping: ${errorMessage(error)}`);
    }
  }
  const addresses = [...new Set(ips)];
  if (addresses.length === 0) {
    throw invalidArgumentsError('No valid addresses to check');
  }

  logger.info(`Checking ${addresses.length} address(es) against ${lists.length} blocklist(s)`);

  const results = await checkAddresses(addresses, lists, {
    timeoutMs,
    concurrency,
    lookup: overrides.lookup,
  });

  for (const result of results) {
    const line = resultLine(result).replace(result.status, colorStatus(result.status));
    if (result.status === 'LISTED') {
      out.result(line);
    } else {
      out.verbose(line);
    }
  }

  const summaries = summarizeByAddress(results);
  for (const summary of summaries) {
    if (summary.listed > 0) {
      logger.warning(`${summary.ip} is listed on ${summary.listed} of ${summary.checked} checked blocklists`);
    } else {
      logger.success(`${summary.ip} is not listed on any of ${summary.checked} checked blocklists`);
    }
    if (summary.errors > 0) {
      logger.warning(`${summary.errors} lookup(s) for ${summary.ip} failed`);
    }
  }

  if (values.report) {
    logger.section('Report');
    out.table(
      ['Address', 'Checked', 'Listed', 'Errors', 'Listed on'],
      summaries.map((s) => [s.ip, String(s.checked), String(s.listed), String(s.errors), s.zones.join(', ') || '-']),
      { alignRight: [1, 2, 3] }
    );
  }

  if (values.output) {
    writeReport(values.output, renderBlacklistReport(format, new Date().toISOString(), results));
    logger.success(`Results saved to ${values.output}`);
  }

  const listed = results.filter((r) => r.status === 'LISTED');
  if (listed.length > 0) {
    const ipsListed = [...new Set(listed.map((r) => r.ip))];
    await ctx.notifier.notify('blacklist.listed', 'blacklist', `${ipsListed.join(', ')} listed on ${listed.length} blocklist(s)`, {
      addresses: ipsListed,
      listings: listed.map((r) => ({ ip: r.ip, zone: r.zone, reason: r.reason })),
    });
  }

  out.success({ addresses, blocklists: lists.length, summary: summaries, results });
  return listed.length > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}
