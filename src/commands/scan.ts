/**
 * opskit scan - TCP/UDP port scanner
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, invalidArgumentsError } from '../cli/errors.js';
import { choiceOption, intOption, readListFile, timeoutOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { requireCommands } from '../exec/runner.js';
import { expandTargets } from '../net/targets.js';
import { parsePorts } from '../net/ports.js';
import {
  formatProgress,
  openLine,
  renderScanReport,
  scanTargets,
  SCAN_FORMATS,
  SCAN_TYPES,
  type Resolver,
} from '../net/scanner.js';
import { writeReport } from '../utils/formats.js';

const HELP = generateHelp({
  command: 'scan',
  description: 'Scan hosts for open ports',
  usage: ['opskit scan <target...> [options]', 'opskit scan -i targets.txt [options]'],
  details: `Targets are addresses, hostnames, ranges (10.0.0.1-10.0.0.20 or 10.0.0.1-20)
or CIDR blocks (/16 or longer). TCP scans use a connect probe; udp and syn
scans need nmap.`,
  options: [
    { short: 'p', long: 'ports', description: 'Ports, e.g. 22,80,8000-8010', values: '<list>', default: 'common ports' },
    { short: 't', long: 'timeout', description: 'Probe timeout in seconds', values: '<s>', default: '1' },
    { short: 'T', long: 'threads', description: 'Concurrent probes', values: '<n>', default: '10' },
    { short: 's', long: 'scan-type', description: 'Scan type', values: 'tcp|udp|syn', default: 'tcp' },
    { short: 'b', long: 'banner', description: 'Grab service banners from open ports' },
    { short: 'w', long: 'wait', description: 'Delay between probe starts', values: '<ms>', default: '0' },
    { short: 'i', long: 'input', description: 'Read targets from a file', values: '<file>' },
    { short: 'n', long: 'no-resolve', description: 'Do not resolve hostnames' },
    { short: 'o', long: 'output', description: 'Write results to a file', values: '<file>' },
    { short: 'f', long: 'format', description: 'File format', values: 'text|json|csv|xml', default: 'text' },
    { long: 'open-only', description: 'Keep only open ports in the file report' },
  ],
  examples: [
    { command: 'opskit scan 192.168.1.1 -p 22,80,443', description: 'Scan three ports on one host' },
    { command: 'opskit scan 10.0.0.0/24 -T 50 -b', description: 'Scan a subnet with banners' },
    { command: 'opskit scan -i hosts.txt -o scan.csv -f csv', description: 'Scan a target list into CSV' },
  ],
});

export interface ScanCommandOverrides extends ContextOverrides {
  resolver?: Resolver;
}

export async function scanCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ScanCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      ports: { type: 'string', short: 'p' },
      timeout: { type: 'string', short: 't' },
      threads: { type: 'string', short: 'T' },
      'scan-type': { type: 'string', short: 's' },
      banner: { type: 'boolean', short: 'b', default: false },
      wait: { type: 'string', short: 'w' },
      input: { type: 'string', short: 'i' },
      'no-resolve': { type: 'boolean', short: 'n', default: false },
      output: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      'open-only': { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const ctx = createContext('scan', flags, overrides);
  const { config, logger, out } = ctx;

  const rawTargets = [...positionals, ...(values.input ? readListFile(values.input) : [])];
  if (rawTargets.length === 0) {
    throw invalidArgumentsError('No targets given. Pass targets as arguments or with --input');
  }

  const targets = expandTargets(rawTargets);
  const ports = parsePorts(values.ports ?? config.scan?.ports);
  const timeoutMs = timeoutOption(values.timeout, flags, config.scan?.timeout ?? 1);
  if (timeoutMs < 1000) {
    throw invalidArgumentsError('--timeout must be at least 1 second');
  }
  const concurrency = intOption('threads', values.threads, config.scan?.concurrency ?? 10, { min: 1 });
  const scanType = choiceOption('scan-type', values['scan-type'], SCAN_TYPES, 'tcp');
  const waitMs = intOption('wait', values.wait, 0, { min: 0 });
  const format = choiceOption('format', values.format, SCAN_FORMATS, 'text');

  if (scanType !== 'tcp') {
    requireCommands(['nmap'], ctx.exists);
  }

  const total = targets.length * ports.length;
  logger.info(`Scanning ${targets.length} host(s), ${ports.length} port(s) each (${total} probes, ${scanType})`);
  const scanTime = new Date().toISOString();

  const results = await scanTargets(targets, {
    ports,
    timeoutMs,
    concurrency,
    scanType,
    banner: values.banner,
    waitMs,
    resolve: !values['no-resolve'],
    runner: ctx.runner,
    resolver: overrides.resolver,
    onProgress: (progress) => out.log(formatProgress(progress)),
  });

  for (const failed of results.filter((r) => r.status === 'error' && r.port === ports[0])) {
    logger.warning(failed.error ?? `Scan of ${failed.host} failed`);
  }

  const open = results.filter((r) => r.status === 'open');
  for (const result of results) {
    if (result.status === 'open') {
      out.result(openLine(result));
    } else if (result.status !== 'error') {
      out.verbose(`${colorStatus(result.status)}: ${result.host}:${result.port} (${result.service})`);
    }
  }

  const summary = {
    open: open.length,
    closed: results.filter((r) => r.status === 'closed').length,
    filtered: results.filter((r) => r.status === 'filtered').length,
    error: results.filter((r) => r.status === 'error').length,
  };
  logger.success(
    `Scan complete: ${summary.open} open, ${summary.closed} closed, ${summary.filtered} filtered, ${summary.error} errors`
  );

  const info = { scan_time: scanTime, targets, ports, scan_type: scanType };
  if (values.output) {
    const fileResults = values['open-only'] ? open : results;
    writeReport(values.output, renderScanReport(format, info, fileResults));
    logger.success(`Scan results saved to ${values.output}`);
  }

  out.success({ scan_info: info, summary, results });
  return ExitCode.SUCCESS;
}
