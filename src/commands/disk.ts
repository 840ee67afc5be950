/**
 * opskit disk - Filesystem usage alerts
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode } from '../cli/errors.js';
import { choiceOption, intOption, listOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { formatTimestamp } from '../cli/logger.js';
import { requireCommands } from '../exec/runner.js';
import { writeReport } from '../utils/formats.js';
import {
  diskJson,
  evaluate,
  filterFilesystems,
  readDiskUsage,
  renderDiskReport,
  tableRow,
  DISK_FORMATS,
  TABLE_HEADER,
} from '../monitoring/disk.js';

const HELP = generateHelp({
  command: 'disk',
  description: 'Check filesystem usage against thresholds',
  usage: ['opskit disk [options]'],
  details: `Exit code 7 when any filesystem is at or above the critical threshold.
Pseudo filesystems (tmpfs, devtmpfs, squashfs, overlay) are skipped unless
named with --include-type.`,
  options: [
    { short: 'c', long: 'critical', description: 'Critical usage percent', values: '<pct>', default: '90' },
    { short: 'w', long: 'warning', description: 'Warning usage percent', values: '<pct>', default: '80' },
    { short: 'm', long: 'mount', description: 'Only this mount point (repeatable)', values: '<path>' },
    { short: 'e', long: 'exclude', description: 'Skip this mount point (repeatable)', values: '<path>' },
    { long: 'include-type', description: 'Only this filesystem type (repeatable)', values: '<type>' },
    { long: 'exclude-type', description: 'Skip this filesystem type (repeatable)', values: '<type>' },
    { short: 'f', long: 'format', description: 'Output format', values: DISK_FORMATS.join('|'), default: 'table' },
    { short: 'o', long: 'output', description: 'Write results to a file', values: '<file>' },
    { short: 'a', long: 'append', description: 'Append to the output file' },
    { long: 'no-header', description: 'Omit header lines' },
  ],
  examples: [
    { command: 'opskit disk', description: 'Check every real filesystem' },
    { command: 'opskit disk -w 70 -c 85 -m / -m /var', description: 'Tighter limits on two mounts' },
    { command: 'opskit disk -f csv -o disk.csv -a --no-header', description: 'Append CSV rows from cron' },
  ],
});

export async function diskCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values } = parseArgs({
    args,
    options: {
      critical: { type: 'string', short: 'c' },
      warning: { type: 'string', short: 'w' },
      mount: { type: 'string', short: 'm', multiple: true },
      exclude: { type: 'string', short: 'e', multiple: true },
      'include-type': { type: 'string', multiple: true },
      'exclude-type': { type: 'string', multiple: true },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      append: { type: 'boolean', short: 'a', default: false },
      'no-header': { type: 'boolean', default: false },
    },
    allowPositionals: false,
  });

  const ctx = createContext('disk', flags, overrides);
  const { config, logger, out } = ctx;

  const critical = intOption('critical', values.critical, config.disk?.critical ?? 90, { min: 0, max: 100 });
  const warning = intOption('warning', values.warning, config.disk?.warning ?? 80, { min: 0, max: 100 });
  if (warning >= critical) {
    logger.warning(`Warning threshold (${warning}%) is not below critical (${critical}%)`);
  }
  const format = choiceOption('format', values.format, DISK_FORMATS, 'table');
  const header = !values['no-header'];

  requireCommands(['df'], ctx.exists);
  const usage = await readDiskUsage(ctx.runner, flags.timeout ?? 30_000);

  const includeTypes = listOption(values['include-type']);
  const excludeTypes = values['exclude-type'] ? listOption(values['exclude-type']) : config.disk?.excludeTypes ?? [];
  const rows = evaluate(
    filterFilesystems(usage, {
      mounts: values.mount,
      excludeMounts: values.exclude,
      includeTypes,
      excludeTypes,
    }),
    warning,
    critical
  );

  const timestamp = formatTimestamp(new Date());
  const shown = out.isQuiet() ? rows.filter((r) => r.status !== 'OK') : rows;

  switch (format) {
    case 'table':
      if (header) {
        out.table(
          TABLE_HEADER,
          shown.map((r) => {
            const cells = tableRow(r);
            cells[cells.length - 1] = colorStatus(r.status);
            return cells;
          }),
          { alignRight: [2, 3, 4, 5] }
        );
      } else {
        for (const r of shown) out.result(tableRow(r).join('  '));
      }
      break;
    case 'csv':
    case 'json':
      if (!out.isJson()) {
        out.result(renderDiskReport(format, timestamp, { warning, critical }, shown, header).trimEnd());
      }
      break;
  }

  if (values.output) {
    const thresholds = { warning, critical };
    if (values.append && format !== 'json') {
      writeReport(values.output, renderDiskReport(format, timestamp, thresholds, rows, false), {
        append: true,
        header: header ? renderDiskReport(format, timestamp, thresholds, [], true) : undefined,
      });
    } else {
      writeReport(values.output, renderDiskReport(format, timestamp, thresholds, rows, header));
    }
    logger.success(`Results ${values.append ? 'appended' : 'saved'} to ${values.output}`);
  }

  const criticalRows = rows.filter((r) => r.status === 'CRITICAL');
  const warningRows = rows.filter((r) => r.status === 'WARNING');
  for (const r of criticalRows) {
    logger.error(`CRITICAL: ${r.mount} is ${r.usePercent}% full (threshold ${critical}%)`);
  }
  for (const r of warningRows) {
    logger.warning(`WARNING: ${r.mount} is ${r.usePercent}% full (threshold ${warning}%)`);
  }
  if (criticalRows.length === 0 && warningRows.length === 0) {
    logger.success(`All ${rows.length} filesystem(s) below ${warning}%`);
  }

  const describe = (list: typeof rows): string => list.map((r) => `${r.mount} ${r.usePercent}%`).join(', ');
  if (criticalRows.length > 0) {
    await ctx.notifier.notify('disk.critical', 'disk', `Disk usage critical: ${describe(criticalRows)}`, {
      threshold: critical,
      filesystems: criticalRows.map((r) => ({ mount: r.mount, use_percent: r.usePercent })),
    });
  }
  if (warningRows.length > 0) {
    await ctx.notifier.notify('disk.warning', 'disk', `Disk usage warning: ${describe(warningRows)}`, {
      threshold: warning,
      filesystems: warningRows.map((r) => ({ mount: r.mount, use_percent: r.usePercent })),
    });
  }

  out.success(diskJson(timestamp, warning, critical, rows));
  return criticalRows.length > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}
