/**
 * opskit integrity - File integrity baselines and checks
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type CommandContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, invalidArgumentsError } from '../cli/errors.js';
import { choiceOption, listOption, numberOption, intOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { writeReport } from '../utils/formats.js';
import { getDbPath, openDatabase, type DatabaseConnection } from '../database/connection.js';
import { baselineSummary, latestEvents } from '../database/queries.js';
import {
  changeLine,
  changeSummary,
  checkIntegrity,
  countByType,
  initBaseline,
  renderIntegrityReport,
  HASH_ALGORITHMS,
  INTEGRITY_FORMATS,
  type CheckResult,
  type HashAlgorithm,
  type IntegrityFormat,
} from '../security/integrity.js';

const HELP = generateHelp({
  command: 'integrity',
  description: 'Record file hashes and detect modified, new and missing files',
  usage: ['opskit integrity <subcommand> -p <paths> [options]'],
  details: `The baseline lives in the state database. "check" exits 7 when anything
changed since the last "init" for the same paths.`,
  subcommands: [
    { name: 'init', description: 'Record (or replace) the baseline for the paths' },
    { name: 'check', description: 'Compare the paths against the baseline' },
    { name: 'monitor', description: 'Run check every interval until interrupted' },
    { name: 'status', description: 'Show baseline counts and the latest changes' },
  ],
  options: [
    { short: 'p', long: 'paths', description: 'Files or directories (comma-separated, repeatable)', values: '<a,b>' },
    { short: 'r', long: 'recursive', description: 'Descend into subdirectories' },
    { short: 'e', long: 'exclude', description: 'Glob patterns to skip (comma-separated)', values: '<globs>' },
    { short: 'a', long: 'algorithm', description: 'Hash algorithm', values: HASH_ALGORITHMS.join('|'), default: 'sha256' },
    { long: 'database', description: 'State database file', values: '<file>', default: '~/.opskit/opskit.db' },
    { short: 'b', long: 'backup', description: 'Back up the database before init' },
    { short: 'l', long: 'log', description: 'Append change lines to a log file', values: '<file>' },
    { short: 'n', long: 'notify', description: 'Shell command fed the change summary on stdin', values: '<command>' },
    { short: 'R', long: 'report', description: 'Write a report file', values: '<file>' },
    { short: 'f', long: 'format', description: 'Report format', values: INTEGRITY_FORMATS.join('|'), default: 'text' },
    { short: 's', long: 'summary', description: 'Print only the summary line' },
    { short: 'i', long: 'interval', description: 'Seconds between monitor checks', values: '<s>', default: '300' },
    { long: 'count', description: 'Stop monitor after this many checks (0 = never)', values: '<n>', default: '0' },
  ],
  examples: [
    { command: 'opskit integrity init -p /etc,/usr/local/bin -r', description: 'Record a baseline' },
    { command: 'opskit integrity check -p /etc,/usr/local/bin -r -l /var/log/integrity.log', description: 'Check and log' },
    { command: "opskit integrity monitor -p /etc -r -e '*.swp' -i 60", description: 'Check every minute' },
    { command: 'opskit integrity status', description: 'Show what is recorded' },
  ],
});

const SUBCOMMANDS = ['init', 'check', 'monitor', 'status'] as const;
type Subcommand = (typeof SUBCOMMANDS)[number];

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some((s) => s === value);
}

export interface IntegrityCommandOverrides extends ContextOverrides {
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseIntegrityArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      paths: { type: 'string', short: 'p', multiple: true },
      recursive: { type: 'boolean', short: 'r', default: false },
      exclude: { type: 'string', short: 'e', multiple: true },
      algorithm: { type: 'string', short: 'a' },
      database: { type: 'string' },
      backup: { type: 'boolean', short: 'b', default: false },
      log: { type: 'string', short: 'l' },
      notify: { type: 'string', short: 'n' },
      report: { type: 'string', short: 'R' },
      format: { type: 'string', short: 'f' },
      summary: { type: 'boolean', short: 's', default: false },
      interval: { type: 'string', short: 'i' },
      count: { type: 'string' },
    },
    allowPositionals: false,
  });
}

type IntegrityValues = ReturnType<typeof parseIntegrityArgs>['values'];

interface RunSettings {
  paths: string[];
  recursive: boolean;
  exclude: string[];
  algorithm: HashAlgorithm;
  format: IntegrityFormat;
  now: () => Date;
}

export async function integrityCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: IntegrityCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help || args.length === 0) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const [subcommand, ...rest] = args;
  if (!isSubcommand(subcommand)) {
    throw invalidArgumentsError(`Unknown subcommand: ${subcommand}. Use one of: ${SUBCOMMANDS.join(', ')}`);
  }

  const { values } = parseIntegrityArgs(rest);
  const ctx = createContext('integrity', flags, overrides, subcommand);
  const { config } = ctx;

  const settings: RunSettings = {
    paths: listOption(values.paths),
    recursive: values.recursive,
    exclude: values.exclude ? listOption(values.exclude) : config.integrity?.exclude ?? [],
    algorithm: choiceOption('algorithm', values.algorithm ?? config.integrity?.algorithm, HASH_ALGORITHMS, 'sha256'),
    format: choiceOption('format', values.format, INTEGRITY_FORMATS, 'text'),
    now: overrides.now ?? (() => new Date()),
  };
  if (subcommand !== 'status' && settings.paths.length === 0) {
    throw invalidArgumentsError(`integrity ${subcommand} needs --paths`);
  }

  const conn = openDatabase(getDbPath(values.database, config.database?.path, ctx.env));
  try {
    switch (subcommand) {
      case 'init':
        return await runInit(ctx, conn, values, settings);
      case 'check':
        return (await runCheck(ctx, conn, values, settings)).events.length > 0
          ? ExitCode.CHECK_FAILED
          : ExitCode.SUCCESS;
      case 'monitor':
        return await runMonitor(ctx, conn, values, settings, overrides.sleep ?? defaultSleep);
      case 'status':
        return runStatus(ctx, conn);
    }
  } finally {
    conn.close();
  }
}

async function runInit(
  ctx: CommandContext,
  conn: DatabaseConnection,
  values: IntegrityValues,
  settings: RunSettings
): Promise<ExitCode> {
  const { logger, out } = ctx;

  if (values.backup) {
    const stamp = settings.now().toISOString().replace(/[:.]/g, '-');
    const target = `${conn.path}.${stamp}.bak`;
    if (ctx.flags.dryRun) {
      logger.info(`Would back up ${conn.path} to ${target}`);
    } else {
      await conn.db.backup(target);
      logger.info(`Database backed up to ${target}`);
    }
  }

  if (ctx.flags.dryRun) {
    logger.info(`Would record ${settings.algorithm} baseline for ${settings.paths.join(', ')}`);
    out.success({ dry_run: true, paths: settings.paths, algorithm: settings.algorithm });
    return ExitCode.SUCCESS;
  }

  const result = await initBaseline(conn.db, settings.paths, settings);
  for (const path of result.missing) {
    logger.warning(`Path not found: ${path}`);
  }
  for (const entry of result.unreadable) {
    logger.warning(`Cannot read ${entry.path}: ${entry.error}`);
  }
  logger.success(
    `Baseline recorded: ${result.recorded} file(s) with ${settings.algorithm}` +
      (result.removed > 0 ? ` (replaced ${result.removed} previous entries)` : '')
  );

  out.success({
    database: conn.path,
    algorithm: settings.algorithm,
    recorded: result.recorded,
    replaced: result.removed,
    missing: result.missing,
    unreadable: result.unreadable,
  });
  return ExitCode.SUCCESS;
}

async function runCheck(
  ctx: CommandContext,
  conn: DatabaseConnection,
  values: IntegrityValues,
  settings: RunSettings
): Promise<CheckResult> {
  const { logger, out } = ctx;

  const result = await checkIntegrity(conn.db, settings.paths, settings);
  const at = settings.now();

  for (const path of result.missing) {
    logger.warning(`Path not found: ${path}`);
  }
  for (const entry of result.unreadable) {
    logger.warning(`Cannot read ${entry.path}: ${entry.error}`);
  }

  if (!values.summary) {
    for (const event of result.events) {
      out.result(changeLine(event, at).replace(`${event.change_type}:`, `${colorStatus(event.change_type)}:`));
    }
  }

  const summary = changeSummary(result);
  if (result.events.length > 0) {
    logger.warning(summary);
  } else {
    logger.success(`No changes in ${result.checked} file(s)`);
  }
  if (values.summary) {
    out.result(summary);
  }

  if (values.log && result.events.length > 0) {
    writeReport(values.log, result.events.map((e) => changeLine(e, at) + '\n').join(''), { append: true });
  }
  if (values.report) {
    writeReport(values.report, renderIntegrityReport(settings.format, result, at));
    logger.info(`Report written to ${values.report}`);
  }

  if (result.events.length > 0) {
    if (values.notify) {
      await runNotifyCommand(ctx, values.notify, summary, result, at);
    }
    await ctx.notifier.notify('integrity.changed', 'integrity', summary, {
      run_id: result.runId,
      counts: countByType(result.events),
      changes: result.events.map((e) => ({ path: e.path, change_type: e.change_type })),
    });
  }

  out.success({
    run_id: result.runId,
    checked: result.checked,
    counts: countByType(result.events),
    events: result.events,
    missing: result.missing,
    unreadable: result.unreadable,
  });
  return result;
}

async function runNotifyCommand(
  ctx: CommandContext,
  command: string,
  summary: string,
  result: CheckResult,
  at: Date
): Promise<void> {
  if (ctx.flags.dryRun) {
    ctx.logger.info(`Would run notify command: ${command}`);
    return;
  }
  const input = [summary, ...result.events.map((e) => changeLine(e, at))].join('\n') + '\n';
  const outcome = await ctx.runner('sh', ['-c', command], { input, timeoutMs: 60_000, env: ctx.env });
  if (!outcome.success) {
    ctx.logger.warning(`Notify command failed: ${outcome.error ?? outcome.stderr.trim()}`);
  }
}

async function runMonitor(
  ctx: CommandContext,
  conn: DatabaseConnection,
  values: IntegrityValues,
  settings: RunSettings,
  sleep: (ms: number) => Promise<void>
): Promise<ExitCode> {
  const intervalSeconds = numberOption('interval', values.interval, ctx.config.integrity?.interval ?? 300, { min: 1 });
  const count = intOption('count', values.count, 0, { min: 0 });

  let interrupted = false;
  const onSigint = (): void => {
    interrupted = true;
  };
  process.once('SIGINT', onSigint);

  ctx.logger.info(`Monitoring ${settings.paths.join(', ')} every ${intervalSeconds}s (Ctrl+C to stop)`);
  let changed = false;
  try {
    for (let iteration = 1; !interrupted; iteration++) {
      const result = await runCheck(ctx, conn, values, settings);
      changed = changed || result.events.length > 0;
      if (count > 0 && iteration >= count) break;
      await sleep(intervalSeconds * 1000);
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
  return changed ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}

function runStatus(ctx: CommandContext, conn: DatabaseConnection): ExitCode {
  const { logger, out } = ctx;
  const baseline = baselineSummary(conn.db);
  const events = latestEvents(conn.db, 20);

  logger.section(`Baseline (${conn.path})`);
  if (baseline.length === 0) {
    out.log('No baseline recorded. Run: opskit integrity init -p <paths>');
  } else {
    out.table(
      ['Algorithm', 'Files', 'Last recorded'],
      baseline.map((b) => [b.algorithm, String(b.files), b.last_recorded]),
      { alignRight: [1] }
    );
  }

  logger.section('Latest changes');
  if (events.length === 0) {
    out.log('No changes recorded');
  } else {
    out.table(
      ['Detected', 'Change', 'Path'],
      events.map((e) => [e.detected_at, colorStatus(e.change_type), e.path])
    );
  }

  out.success({ database: conn.path, baseline, events });
  return ExitCode.SUCCESS;
}
