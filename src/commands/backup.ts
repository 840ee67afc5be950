/**
 * opskit backup - Back up a file or directory
 */

import { existsSync } from 'node:fs';
import { basename } from 'node:path';
import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, fileNotFoundError, invalidArgumentsError } from '../cli/errors.js';
import { intOption } from '../cli/options.js';
import { requireCommands } from '../exec/runner.js';
import { formatBytes } from '../utils/size.js';
import {
  expiredBackups,
  planBackup,
  removeBackups,
  rsyncArgs,
  runBackup,
  type BackupMode,
} from '../automation/backup.js';

const HELP = generateHelp({
  command: 'backup',
  description: 'Back up a file or directory with retention',
  usage: ['opskit backup <source> <destination> [options]'],
  details: `Backups are named <name>_YYYY-MM-DD_HH-MM-SS (plus .tar.gz with --compress)
inside the destination. Incremental backups keep one rsync mirror named <name>.`,
  options: [
    { short: 'c', long: 'compress', description: 'Write a .tar.gz archive' },
    { short: 't', long: 'timestamp', description: 'Add a timestamp to the name (default)' },
    { long: 'no-timestamp', description: 'Use the plain source name' },
    { short: 'i', long: 'incremental', description: 'Mirror with rsync -a --delete' },
    { short: 'e', long: 'exclude', description: 'Glob to skip (repeatable)', values: '<pattern>' },
    { short: 'r', long: 'retention', description: 'Remove backups older than N days (0 = keep all)', values: '<days>', default: '30' },
  ],
  examples: [
    { command: 'opskit backup /etc /backup -c', description: 'Timestamped /etc archive' },
    { command: "opskit backup /srv/www /backup -e '*.log' -e cache -r 7", description: 'Copy without logs and cache' },
    { command: 'opskit backup /home /mnt/mirror -i --dry-run', description: 'Preview an rsync mirror' },
  ],
});

export async function backupCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides & { now?: Date } = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      compress: { type: 'boolean', short: 'c', default: false },
      timestamp: { type: 'boolean', short: 't', default: false },
      'no-timestamp': { type: 'boolean', default: false },
      incremental: { type: 'boolean', short: 'i', default: false },
      exclude: { type: 'string', short: 'e', multiple: true },
      retention: { type: 'string', short: 'r' },
    },
    allowPositionals: true,
  });

  const ctx = createContext('backup', flags, overrides);
  const { config, logger, out } = ctx;

  const [source, destination] = positionals;
  if (source === undefined || destination === undefined) {
    throw invalidArgumentsError('backup needs <source> and <destination>');
  }
  if (!existsSync(source)) {
    throw fileNotFoundError(source);
  }
  if (values.compress && values.incremental) {
    throw invalidArgumentsError('--compress and --incremental are mutually exclusive');
  }
  if (values.timestamp && values['no-timestamp']) {
    throw invalidArgumentsError('--timestamp and --no-timestamp are mutually exclusive');
  }

  const mode: BackupMode = values.compress ? 'archive' : values.incremental ? 'incremental' : 'copy';
  if (mode === 'incremental') {
    requireCommands(['rsync'], ctx.exists);
  }
  const retentionDays = intOption('retention', values.retention, config.backup?.retention ?? 30, { min: 0 });
  const now = overrides.now ?? new Date();

  const plan = planBackup(source, destination, {
    mode,
    timestamp: !values['no-timestamp'],
    exclude: values.exclude ?? [],
    now,
  });
  if (plan.target === plan.source || plan.destination.startsWith(`${plan.source}/`)) {
    throw invalidArgumentsError('The destination must not be inside the source');
  }

  const expired = expiredBackups(plan.destination, basename(plan.source), retentionDays, {
    nowMs: now.getTime(),
    keep: plan.target,
  });

  if (flags.dryRun) {
    logger.info(`[DRY RUN] Would back up ${plan.source} to ${plan.target} (${mode})`);
    if (mode === 'incremental') {
      out.log(`[DRY RUN] rsync ${rsyncArgs(plan).join(' ')}`);
    }
    for (const entry of expired) {
      out.log(`[DRY RUN] Would remove ${entry.path} (${entry.ageDays} days old)`);
    }
    out.success({ dry_run: true, source: plan.source, target: plan.target, mode, would_remove: expired.map((e) => e.path) });
    return ExitCode.SUCCESS;
  }

  logger.info(`Backing up ${plan.source} to ${plan.target}`);
  const bytes = await runBackup(plan, ctx.runner);
  logger.success(`Backup complete: ${plan.target}${bytes !== null ? ` (${formatBytes(bytes)})` : ''}`);

  removeBackups(expired);
  for (const entry of expired) {
    out.log(`Removed ${entry.path} (${entry.ageDays} days old)`);
  }
  if (expired.length > 0) {
    logger.info(`Removed ${expired.length} backup(s) older than ${retentionDays} days`);
  }

  out.success({
    source: plan.source,
    target: plan.target,
    mode,
    bytes,
    removed: expired.map((e) => e.path),
  });
  return ExitCode.SUCCESS;
}
