/**
 * opskit logs - Log cleanup and rotation
 *
 * Subcommands:
 * - clean: Compress, truncate or delete old or oversized logs in a directory
 * - rotate: Copy-and-truncate one log file, keeping N rotated copies
 */

import { existsSync, statSync } from 'node:fs';
import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, fileNotFoundError, invalidArgumentsError } from '../cli/errors.js';
import { intOption } from '../cli/options.js';
import { formatBytes, parseSize } from '../utils/size.js';
import { cleanupLogFiles, selectLogFiles, type CleanupAction } from '../automation/log-cleanup.js';
import { rotateLog } from '../automation/log-rotation.js';

const HELP = generateHelp({
  command: 'logs',
  description: 'Clean up old logs and rotate log files',
  usage: ['opskit logs clean <dir> [options]', 'opskit logs rotate <file> [options]'],
  subcommands: [
    { name: 'clean', args: '<dir>', description: 'Compress, truncate or delete old or large logs' },
    { name: 'rotate', args: '<file>', description: 'Rotate a log into a timestamped copy' },
  ],
  sections: [
    {
      title: 'CLEAN OPTIONS',
      content: `  -a, --age <days>          Files older than this many whole days (0 = any age) [default: 30]
  -s, --size <size>         Files larger than this (512K, 10M, 1G)
  -e, --extension <ext>     File extension to match [default: log]
  -r, --recursive           Descend into subdirectories
  -c, --compress            gzip instead of deleting
  -T, --truncate            Empty instead of deleting`,
    },
    {
      title: 'ROTATE OPTIONS',
      content: `  -n, --num-backups <n>     Rotated copies to keep [default: 5]
  -c, --compress            gzip the rotated copy
  -s, --size <size>         Rotate only at or above this size
  -F, --force               Rotate regardless of size
  -p, --path <dir>          Directory for rotated copies [default: the log's]`,
    },
  ],
  examples: [
    { command: 'opskit logs clean /var/log/myapp -a 14 -c', description: 'gzip logs older than two weeks' },
    { command: 'opskit logs clean /var/log -r -s 1G -T --dry-run', description: 'Preview truncating huge logs' },
    { command: 'opskit logs rotate /var/log/myapp/app.log -s 50M -n 7 -c', description: 'Rotate at 50 MB' },
  ],
});

export async function logsCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides & { now?: Date } = {}
): Promise<ExitCode> {
  if (flags.help || args.length === 0) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const [subcommand, ...rest] = args;
  switch (subcommand) {
    case 'clean':
      return runClean(rest, flags, overrides);
    case 'rotate':
      return runRotate(rest, flags, overrides);
    default:
      throw invalidArgumentsError(`Unknown subcommand: ${subcommand}. Use clean or rotate`);
  }
}

async function runClean(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides & { now?: Date }
): Promise<ExitCode> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      age: { type: 'string', short: 'a' },
      size: { type: 'string', short: 's' },
      extension: { type: 'string', short: 'e' },
      recursive: { type: 'boolean', short: 'r', default: false },
      compress: { type: 'boolean', short: 'c', default: false },
      truncate: { type: 'boolean', short: 'T', default: false },
    },
    allowPositionals: true,
  });

  const ctx = createContext('logs', flags, overrides, 'clean');
  const { config, logger, out } = ctx;

  const dir = positionals[0];
  if (dir === undefined) {
    throw invalidArgumentsError('logs clean needs a directory');
  }
  if (!existsSync(dir)) {
    throw fileNotFoundError(dir);
  }
  if (!statSync(dir).isDirectory()) {
    throw invalidArgumentsError(`${dir} is not a directory`);
  }
  if (values.compress && values.truncate) {
    throw invalidArgumentsError('--compress and --truncate are mutually exclusive');
  }

  const maxAgeDays = intOption('age', values.age, config.logs?.age ?? 30, { min: 0 });
  const minSizeBytes = values.size !== undefined ? parseSize(values.size) : undefined;
  if (maxAgeDays === 0 && minSizeBytes === undefined) {
    throw invalidArgumentsError('With --age 0 a --size is required');
  }
  const extension = (values.extension ?? config.logs?.extension ?? 'log').replace(/^\./, '');
  const action: CleanupAction = values.compress ? 'compress' : values.truncate ? 'truncate' : 'delete';

  const files = await selectLogFiles(dir, {
    maxAgeDays,
    minSizeBytes,
    extension,
    recursive: values.recursive,
    nowMs: overrides.now?.getTime(),
  });
  if (files.length === 0) {
    logger.info(`No *.${extension} files in ${dir} match`);
  }

  const verb = { compress: 'Compress', truncate: 'Truncate', delete: 'Delete' }[action];
  const result = await cleanupLogFiles(files, action, {
    dryRun: flags.dryRun,
    onFile: (file) =>
      out.log(`${flags.dryRun ? '[DRY RUN] Would ' + verb.toLowerCase() : verb}: ${file.path} (${formatBytes(file.size)}, ${file.ageDays}d)`),
  });

  for (const failure of result.failed) {
    logger.error(`Failed to ${action} ${failure.path}: ${failure.error}`);
  }
  if (files.length > 0) {
    logger.success(
      `${flags.dryRun ? 'Would process' : 'Processed'} ${result.processed.length} file(s), ` +
        `${result.failed.length} failed, ${formatBytes(result.freedBytes)} freed`
    );
  }

  out.success({
    directory: dir,
    action,
    dry_run: flags.dryRun,
    processed: result.processed,
    failed: result.failed,
    freed_bytes: result.freedBytes,
  });
  return result.failed.length > 0 ? ExitCode.GENERAL_ERROR : ExitCode.SUCCESS;
}

async function runRotate(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides & { now?: Date }
): Promise<ExitCode> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      'num-backups': { type: 'string', short: 'n' },
      compress: { type: 'boolean', short: 'c', default: false },
      size: { type: 'string', short: 's' },
      force: { type: 'boolean', short: 'F', default: false },
      path: { type: 'string', short: 'p' },
    },
    allowPositionals: true,
  });

  const ctx = createContext('logs', flags, overrides, 'rotate');
  const { config, logger, out } = ctx;

  const logPath = positionals[0];
  if (logPath === undefined) {
    throw invalidArgumentsError('logs rotate needs a log file');
  }
  if (!existsSync(logPath)) {
    throw fileNotFoundError(logPath);
  }

  const outcome = await rotateLog(logPath, {
    numBackups: intOption('num-backups', values['num-backups'], config.logs?.keep ?? 5, { min: 1 }),
    compress: values.compress,
    minSizeBytes: values.size !== undefined ? parseSize(values.size) : undefined,
    force: values.force,
    targetDir: values.path,
    dryRun: flags.dryRun,
    now: overrides.now,
  });

  if (!outcome.rotated) {
    logger.info(`Not rotating ${logPath}: ${outcome.reason}`);
    out.success({ file: logPath, rotated: false, reason: outcome.reason, size: outcome.size });
    return ExitCode.SUCCESS;
  }

  const prefix = flags.dryRun ? '[DRY RUN] Would rotate' : 'Rotated';
  logger.success(`${prefix} ${logPath} (${formatBytes(outcome.size)}) to ${outcome.rotatedTo}`);
  for (const path of outcome.removed) {
    out.log(`${flags.dryRun ? '[DRY RUN] Would remove' : 'Removed'} old copy ${path}`);
  }

  out.success({
    file: logPath,
    rotated: true,
    dry_run: flags.dryRun,
    size: outcome.size,
    rotated_to: outcome.rotatedTo,
    removed: outcome.removed,
  });
  return ExitCode.SUCCESS;
}
