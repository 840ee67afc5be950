/**
 * opskit logins - Failed login analysis and blocking
 */

import { existsSync, readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type CommandContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, errorMessage, fileNotFoundError, invalidArgumentsError, missingDependencyError, notFoundError } from '../cli/errors.js';
import { intOption, numberOption, readListFile } from '../cli/options.js';
import { writeReport } from '../utils/formats.js';
import { getDbPath, openDatabase } from '../database/connection.js';
import { isBlocked, recordBlocked } from '../database/queries.js';
import {
  analyzeLog,
  atOrAbove,
  blockAddress,
  blockSteps,
  describeStep,
  detectBlockMethod,
  findLogFile,
  renderLoginReport,
  DEFAULT_FILTER,
  DEFAULT_LOG_FILES,
  type LoginAnalysis,
} from '../security/failed-logins.js';

const HELP = generateHelp({
  command: 'logins',
  description: 'Count failed logins per address and alert or block offenders',
  usage: ['opskit logins [options]'],
  details: `Without --log-file the first existing of ${DEFAULT_LOG_FILES.join(', ')} is read.
Exit code 7 when any address reaches the threshold.`,
  options: [
    { short: 'l', long: 'log-file', description: 'Auth log to read', values: '<file>' },
    { short: 'f', long: 'filter', description: 'Regex selecting failed attempts', values: '<regex>', default: DEFAULT_FILTER },
    { short: 'P', long: 'period', description: 'Only the last N minutes (0 = whole file)', values: '<min>', default: '10' },
    { short: 't', long: 'threshold', description: 'Attempts that raise an alert', values: '<n>', default: '5' },
    { long: 'block', description: 'Block addresses at the block threshold' },
    { short: 'B', long: 'block-threshold', description: 'Attempts that trigger a block', values: '<n>', default: '10' },
    { short: 'W', long: 'whitelist', description: 'File of addresses to ignore', values: '<file>' },
    { short: 'r', long: 'report', description: 'Write a report file', values: '<file>' },
    { long: 'watch', description: 'Repeat the analysis every interval' },
    { short: 'i', long: 'interval', description: 'Seconds between watch passes', values: '<s>', default: '300' },
    { long: 'count', description: 'Stop watching after this many passes (0 = never)', values: '<n>', default: '0' },
    { long: 'database', description: 'State database file', values: '<file>', default: '~/.opskit/opskit.db' },
  ],
  examples: [
    { command: 'opskit logins', description: 'Last 10 minutes of the system auth log' },
    { command: 'opskit logins -P 0 -t 3 -r /tmp/logins.txt', description: 'Whole file, report to a file' },
    { command: 'sudo opskit logins --block -B 20 -W /etc/opskit/whitelist.txt', description: 'Block brute forcers' },
  ],
});

export interface LoginsCommandOverrides extends ContextOverrides {
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface PassSettings {
  logFile: string;
  filter: RegExp;
  periodMinutes: number;
  threshold: number;
  blockThreshold: number | null;
  whitelist: Set<string>;
  report?: string;
  databasePath: string;
  now: () => Date;
}

export async function loginsCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: LoginsCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values } = parseArgs({
    args,
    options: {
      'log-file': { type: 'string', short: 'l' },
      filter: { type: 'string', short: 'f' },
      period: { type: 'string', short: 'P' },
      threshold: { type: 'string', short: 't' },
      block: { type: 'boolean', default: false },
      'block-threshold': { type: 'string', short: 'B' },
      whitelist: { type: 'string', short: 'W' },
      report: { type: 'string', short: 'r' },
      watch: { type: 'boolean', default: false },
      interval: { type: 'string', short: 'i' },
      count: { type: 'string' },
      database: { type: 'string' },
    },
    allowPositionals: false,
  });

  const ctx = createContext('logins', flags, overrides);
  const { config, logger } = ctx;

  let logFile = values['log-file'];
  if (logFile !== undefined) {
    if (!existsSync(logFile)) throw fileNotFoundError(logFile);
  } else {
    logFile = findLogFile() ?? undefined;
    if (logFile === undefined) {
      throw notFoundError(`No auth log found (tried ${DEFAULT_LOG_FILES.join(', ')}). Use --log-file`);
    }
  }

  const filterSource = values.filter ?? config.logins?.filter ?? DEFAULT_FILTER;
  let filter: RegExp;
  try {
    filter = new RegExp(filterSource);
  } catch (error) {
    throw invalidArgumentsError(`Invalid --filter: ${errorMessage(error)}`);
  }

  const settings: PassSettings = {
    logFile,
    filter,
    periodMinutes: intOption('period', values.period, config.logins?.period ?? 10, { min: 0 }),
    threshold: intOption('threshold', values.threshold, config.logins?.threshold ?? 5, { min: 1 }),
    blockThreshold: values.block
      ? intOption('block-threshold', values['block-threshold'], config.logins?.blockThreshold ?? 10, { min: 1 })
      : null,
    whitelist: new Set(values.whitelist ? readListFile(values.whitelist) : []),
    report: values.report,
    databasePath: getDbPath(values.database, config.database?.path, ctx.env),
    now: overrides.now ?? (() => new Date()),
  };

  if (settings.blockThreshold !== null && detectBlockMethod(ctx.exists) === null) {
    throw missingDependencyError('iptables', 'install iptables or firewalld to block addresses');
  }
  if (settings.whitelist.size > 0) {
    logger.debug(`Whitelist: ${settings.whitelist.size} address(es)`);
  }

  if (!values.watch) {
    const alerts = await runPass(ctx, settings, new Set());
    return alerts > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
  }

  const intervalSeconds = numberOption('interval', values.interval, 300, { min: 1 });
  const count = intOption('count', values.count, 0, { min: 0 });
  const sleep = overrides.sleep ?? defaultSleep;

  let interrupted = false;
  const onSigint = (): void => {
    interrupted = true;
  };
  process.once('SIGINT', onSigint);

  logger.info(`Watching ${logFile} every ${intervalSeconds}s (Ctrl+C to stop)`);
  const alerted = new Set<string>();
  let totalAlerts = 0;
  try {
    for (let pass = 1; !interrupted; pass++) {
      totalAlerts += await runPass(ctx, settings, alerted);
      if (count > 0 && pass >= count) break;
      await sleep(intervalSeconds * 1000);
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
  return totalAlerts > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}

/**
 * One analysis pass; returns how many addresses reached the threshold.
 * Addresses in `alerted` were already notified in an earlier pass.
 */
async function runPass(ctx: CommandContext, settings: PassSettings, alerted: Set<string>): Promise<number> {
  const { logger, out } = ctx;
  const now = settings.now();

  const analysis = analyzeLog(readFileSync(settings.logFile, 'utf-8'), {
    filter: settings.filter,
    periodMinutes: settings.periodMinutes,
    now,
    whitelist: settings.whitelist,
  });
  logger.debug(`${analysis.matchedLines} matching line(s) in ${settings.logFile}`);

  for (const entry of analysis.whitelisted) {
    logger.info(`${entry.ip} is whitelisted; ignoring ${entry.count} failed attempt(s)`);
  }

  if (analysis.counts.length === 0) {
    out.log('No failed login attempts found');
  } else {
    out.table(
      ['Attempts', 'Address'],
      analysis.counts.map((entry) => [String(entry.count), entry.ip]),
      { alignRight: [0] }
    );
  }

  const offenders = atOrAbove(analysis.counts, settings.threshold);
  for (const entry of offenders) {
    logger.warning(`ALERT: ${entry.ip} has ${entry.count} failed login attempts (threshold ${settings.threshold})`);
  }

  const blocked = settings.blockThreshold !== null ? await blockOffenders(ctx, settings, analysis, settings.blockThreshold) : [];

  if (settings.report) {
    writeReport(
      settings.report,
      renderLoginReport({
        logFile: settings.logFile,
        generatedAt: now,
        periodMinutes: settings.periodMinutes,
        threshold: settings.threshold,
        analysis,
        blocked,
      })
    );
    logger.info(`Report written to ${settings.report}`);
  }

  const fresh = offenders.filter((entry) => !alerted.has(entry.ip));
  if (fresh.length > 0) {
    for (const entry of fresh) alerted.add(entry.ip);
    await ctx.notifier.notify(
      'logins.threshold',
      'logins',
      `${fresh.length} address(es) reached ${settings.threshold} failed logins: ${fresh.map((e) => `${e.ip} (${e.count})`).join(', ')}`,
      {
        log_file: settings.logFile,
        threshold: settings.threshold,
        addresses: fresh.map((e) => ({ ip: e.ip, attempts: e.count })),
        blocked,
      }
    );
  } else if (offenders.length === 0) {
    logger.success(`No address reached ${settings.threshold} failed attempts`);
  }

  out.success({
    log_file: settings.logFile,
    period_minutes: settings.periodMinutes,
    threshold: settings.threshold,
    matched_lines: analysis.matchedLines,
    addresses: analysis.counts,
    alerts: offenders,
    blocked,
  });
  return offenders.length;
}

async function blockOffenders(
  ctx: CommandContext,
  settings: PassSettings,
  analysis: LoginAnalysis,
  blockThreshold: number
): Promise<string[]> {
  const { logger } = ctx;
  const method = detectBlockMethod(ctx.exists);
  const candidates = atOrAbove(analysis.counts, blockThreshold);
  if (method === null || candidates.length === 0) return [];

  const conn = openDatabase(settings.databasePath);
  const blocked: string[] = [];
  try {
    for (const entry of candidates) {
      if (isBlocked(conn.db, entry.ip)) {
        logger.debug(`${entry.ip} already blocked`);
        continue;
      }
      if (ctx.flags.dryRun) {
        for (const step of blockSteps(entry.ip, method)) {
          logger.info(`Would run: ${describeStep(step)}`);
        }
        continue;
      }
      const failure = await blockAddress(ctx.runner, entry.ip, method, 30_000);
      if (failure) {
        logger.error(`Failed to block ${entry.ip}: ${failure}`);
        continue;
      }
      recordBlocked(conn.db, entry.ip, entry.count, method);
      blocked.push(entry.ip);
      logger.success(`Blocked ${entry.ip} using ${method} (${entry.count} attempts)`);
    }
  } finally {
    conn.close();
  }
  return blocked;
}
