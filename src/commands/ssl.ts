/**
 * opskit ssl - Certificate expiry checks
 */

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, invalidArgumentsError } from '../cli/errors.js';
import { choiceOption, intOption, timeoutOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { writeReport } from '../utils/formats.js';
import {
  checkDomain,
  checkFile,
  renderSslReport,
  textLine,
  SSL_FORMATS,
  type CertificateFetcher,
  type SslResult,
} from '../monitoring/ssl-expiry.js';

const HELP = generateHelp({
  command: 'ssl',
  description: 'Check TLS certificate expiry for hosts and PEM files',
  usage: ['opskit ssl <host[:port]|file.pem...> [options]'],
  details: `Positionals naming an existing file are read as PEM certificates; anything
else is a host to connect to. Exit code 7 when any certificate is expired,
inside a threshold or could not be read.`,
  options: [
    { short: 'd', long: 'domain', description: 'Host to check (repeatable)', values: '<host[:port]>' },
    { short: 'F', long: 'file', description: 'PEM certificate file (repeatable)', values: '<file>' },
    { short: 'p', long: 'port', description: 'Port when a host names none', values: '<port>', default: '443' },
    { short: 'w', long: 'warning', description: 'Warning threshold in days', values: '<days>', default: '30' },
    { short: 'c', long: 'critical', description: 'Critical threshold in days', values: '<days>', default: '7' },
    { short: 't', long: 'timeout', description: 'Connection timeout in seconds', values: '<s>', default: '10' },
    { short: 'f', long: 'format', description: 'File format', values: SSL_FORMATS.join('|'), default: 'text' },
    { short: 'o', long: 'output', description: 'Write results to a file', values: '<file>' },
    { short: 'a', long: 'append', description: 'Append to the output file' },
  ],
  examples: [
    { command: 'opskit ssl example.com', description: 'Check one site' },
    { command: 'opskit ssl mail.example.com:993 -w 21 -c 5', description: 'IMAPS with tighter limits' },
    { command: 'opskit ssl -F /etc/ssl/certs/site.pem -f csv -o ssl.csv -a', description: 'Log a local certificate' },
  ],
});

export interface SslCommandOverrides extends ContextOverrides {
  fetcher?: CertificateFetcher;
  now?: Date;
}

export async function sslCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: SslCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      domain: { type: 'string', short: 'd', multiple: true },
      file: { type: 'string', short: 'F', multiple: true },
      port: { type: 'string', short: 'p' },
      warning: { type: 'string', short: 'w' },
      critical: { type: 'string', short: 'c' },
      timeout: { type: 'string', short: 't' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      append: { type: 'boolean', short: 'a', default: false },
    },
    allowPositionals: true,
  });

  const ctx = createContext('ssl', flags, overrides);
  const { config, logger, out } = ctx;

  const domains = [...(values.domain ?? [])];
  const files = [...(values.file ?? [])];
  for (const value of positionals) {
    (existsSync(value) ? files : domains).push(value);
  }
  if (domains.length === 0 && files.length === 0) {
    throw invalidArgumentsError('No hosts or certificate files given');
  }

  const port = intOption('port', values.port, config.ssl?.port ?? 443, { min: 1, max: 65535 });
  const criticalDays = intOption('critical', values.critical, config.ssl?.critical ?? 7, { min: 0 });
  let warningDays = intOption('warning', values.warning, config.ssl?.warning ?? 30, { min: 0 });
  if (warningDays <= criticalDays) {
    logger.warning(`Warning threshold (${warningDays}d) is not above critical (${criticalDays}d); using ${criticalDays + 1}d`);
    warningDays = criticalDays + 1;
  }
  const timeoutMs = timeoutOption(values.timeout, flags, config.ssl?.timeout ?? 10);
  const format = choiceOption('format', values.format, SSL_FORMATS, 'text');
  const thresholds = { warningDays, criticalDays, now: overrides.now };

  const results: SslResult[] = [];
  for (const domain of domains) {
    logger.debug(`Connecting to ${domain}`);
    results.push(await checkDomain(domain, { ...thresholds, port, timeoutMs, fetcher: overrides.fetcher }));
  }
  for (const file of files) {
    logger.debug(`Reading ${file}`);
    results.push(checkFile(file, thresholds));
  }

  for (const result of results) {
    const line = textLine(result).replace(`: ${result.status}`, `: ${colorStatus(result.status)}`);
    if (result.status === 'OK') {
      out.log(line);
    } else {
      out.result(line);
    }
    if (result.sans && result.sans.length > 0) {
      out.verbose(`  SANs: ${result.sans.join(', ')}`);
    }
    if (result.issuer) {
      out.verbose(`  Issuer: ${result.issuer}`);
    }
  }

  if (values.output) {
    writeReport(values.output, renderSslReport(format, results, !values.append), {
      append: values.append,
      header: values.append && format === 'csv' ? renderSslReport('csv', [], true) : undefined,
    });
    logger.success(`Results ${values.append ? 'appended' : 'saved'} to ${values.output}`);
  }

  const flagged = results.filter((r) => r.status !== 'OK');
  if (flagged.length > 0) {
    logger.warning(`${flagged.length} of ${results.length} certificate(s) need attention`);
    await ctx.notifier.notify(
      'ssl.expiring',
      'ssl',
      flagged.map((r) => `${r.identifier} ${r.status}${r.daysLeft !== null ? ` (${r.daysLeft} days)` : ''}`).join(', '),
      {
        warning_days: warningDays,
        critical_days: criticalDays,
        certificates: flagged.map((r) => ({
          identifier: r.identifier,
          status: r.status,
          days_left: r.daysLeft,
          expiry_date: r.notAfter ?? null,
          error: r.error ?? null,
        })),
      }
    );
  } else {
    logger.success(`All ${results.length} certificate(s) valid for more than ${warningDays} days`);
  }

  out.success({
    results,
    summary: { total: results.length, ok: results.length - flagged.length, flagged: flagged.length },
  });
  return flagged.length > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}
