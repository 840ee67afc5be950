/**
 * opskit bandwidth - Sample interface throughput
 */

import { parseArgs } from 'node:util';
import { existsSync } from 'node:fs';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, notFoundError } from '../cli/errors.js';
import { choiceOption, numberOption } from '../cli/options.js';
import { formatBytes } from '../utils/size.js';
import { writeReport } from '../utils/formats.js';
import {
  averageMbps,
  exceeded,
  formatRate,
  monitorBandwidth,
  readNetDev,
  sampleLogLine,
  selectInterfaces,
  LOG_HEADER,
  NET_DEV_PATH,
  RATE_UNITS,
  type CounterSnapshot,
  type Direction,
} from '../net/bandwidth.js';

const STATS = ['rx', 'tx', 'both'] as const;

const HELP = generateHelp({
  command: 'bandwidth',
  description: 'Monitor network bandwidth per interface',
  usage: ['opskit bandwidth [options]'],
  details: `Reads ${NET_DEV_PATH} every interval and prints receive and transmit rates.
Runs until interrupted unless --duration is given.`,
  options: [
    { short: 'I', long: 'interface', description: 'Interface to watch (repeatable)', values: '<name>', default: 'all but lo' },
    { short: 't', long: 'interval', description: 'Seconds between samples', values: '<s>', default: '1' },
    { short: 'd', long: 'duration', description: 'Stop after this many seconds', values: '<s>' },
    { short: 'a', long: 'alert', description: 'Alert above this rate', values: '<Mbps>' },
    { short: 's', long: 'stat', description: 'Directions to show and alert on', values: 'rx|tx|both', default: 'both' },
    { short: 'u', long: 'unit', description: 'Rate unit', values: RATE_UNITS.join('|'), default: 'auto' },
    { short: 'l', long: 'log', description: 'Append samples to a CSV file', values: '<file>' },
    { short: 'P', long: 'peak', description: 'Track peak rates' },
    { short: 'r', long: 'report', description: 'Print totals when sampling ends' },
  ],
  examples: [
    { command: 'opskit bandwidth -I eth0 -d 60 -r', description: 'One minute on eth0 with a report' },
    { command: 'opskit bandwidth -a 100 -u Mbps', description: 'Alert above 100 Mbps' },
    { command: 'opskit bandwidth -t 5 -l bandwidth.csv', description: 'Log every five seconds' },
  ],
});

interface InterfaceReport {
  interface: string;
  rx_bytes: number;
  tx_bytes: number;
  avg_rx_mbps: number;
  avg_tx_mbps: number;
  peak_rx_mbps?: number;
  peak_tx_mbps?: number;
}

function round2(value: number): number {
  return Number(value.toFixed(2));
}

export interface BandwidthCommandOverrides extends ContextOverrides {
  read?: () => CounterSnapshot;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  clock?: () => number;
}

export async function bandwidthCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: BandwidthCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values } = parseArgs({
    args,
    options: {
      interface: { type: 'string', short: 'I', multiple: true },
      interval: { type: 'string', short: 't' },
      duration: { type: 'string', short: 'd' },
      alert: { type: 'string', short: 'a' },
      stat: { type: 'string', short: 's' },
      unit: { type: 'string', short: 'u' },
      log: { type: 'string', short: 'l' },
      peak: { type: 'boolean', short: 'P', default: false },
      report: { type: 'boolean', short: 'r', default: false },
    },
    allowPositionals: false,
  });

  const ctx = createContext('bandwidth', flags, overrides);
  const { config, logger, out } = ctx;

  const intervalSeconds = numberOption('interval', values.interval, config.bandwidth?.interval ?? 1, { min: 0.1 });
  const durationSeconds =
    values.duration === undefined ? undefined : numberOption('duration', values.duration, 0, { min: 1 });
  const alertMbps = numberOption('alert', values.alert, config.bandwidth?.alertMbps ?? 0, { min: 0 });
  const stat = choiceOption('stat', values.stat, STATS, 'both');
  const unit = choiceOption('unit', values.unit, RATE_UNITS, 'auto');

  let read = overrides.read;
  if (!read) {
    if (!existsSync(NET_DEV_PATH)) {
      throw notFoundError(`${NET_DEV_PATH} not found; interface counters are unavailable`);
    }
    read = () => readNetDev();
  }

  const initial = read();
  const interfaces = selectInterfaces(initial, values.interface ?? []);
  if (interfaces.length === 0) {
    throw notFoundError('No network interfaces to monitor');
  }

  if (values.log) {
    writeReport(values.log, '', { append: true, header: LOG_HEADER + '\n' });
  }

  logger.info(
    `Monitoring ${interfaces.join(', ')} every ${intervalSeconds}s` +
      (durationSeconds ? ` for ${durationSeconds}s` : ' (Ctrl+C to stop)')
  );

  const interrupt = new AbortController();
  const onSigint = (): void => {
    interrupt.abort();
  };
  process.once('SIGINT', onSigint);

  const alerted = new Set<string>();
  const pending: Promise<unknown>[] = [];

  const result = await monitorBandwidth({
    interfaces,
    intervalMs: intervalSeconds * 1000,
    durationMs: durationSeconds === undefined ? undefined : durationSeconds * 1000,
    read,
    initial,
    sleep: overrides.sleep,
    clock: overrides.clock,
    signal: interrupt.signal,
    onSample: (samples) => {
      for (const sample of samples) {
        const parts: string[] = [];
        if (stat !== 'tx') parts.push(`RX ${formatRate(sample.rxBps, unit)}`);
        if (stat !== 'rx') parts.push(`TX ${formatRate(sample.txBps, unit)}`);
        out.log(`${sample.iface}: ${parts.join('  ')}`);

        if (values.log) {
          writeReport(values.log, sampleLogLine(sample) + '\n', { append: true });
        }

        for (const alert of exceeded(sample, alertMbps, stat)) {
          logger.error(
            `ALERT: ${alert.iface} ${directionName(alert.direction)} ${alert.mbps.toFixed(2)} Mbps exceeds ${alertMbps} Mbps`
          );
          const key = `${alert.iface}:${alert.direction}`;
          if (!alerted.has(key)) {
            alerted.add(key);
            pending.push(
              ctx.notifier.notify(
                'bandwidth.threshold',
                'bandwidth',
                `${alert.iface} ${directionName(alert.direction)} at ${alert.mbps.toFixed(2)} Mbps (threshold ${alertMbps} Mbps)`,
                { interface: alert.iface, direction: alert.direction, mbps: alert.mbps, threshold: alertMbps }
              )
            );
          }
        }
      }
    },
  }).finally(() => process.removeListener('SIGINT', onSigint));
  await Promise.all(pending);

  const report = result.totals.map(
    (totals): InterfaceReport => ({
      interface: totals.iface,
      rx_bytes: totals.rxBytes,
      tx_bytes: totals.txBytes,
      avg_rx_mbps: round2(averageMbps(totals.rxBytes, result.elapsedSeconds)),
      avg_tx_mbps: round2(averageMbps(totals.txBytes, result.elapsedSeconds)),
      peak_rx_mbps: values.peak ? round2(totals.peakRxMbps) : undefined,
      peak_tx_mbps: values.peak ? round2(totals.peakTxMbps) : undefined,
    })
  );

  if (values.report || values.peak) {
    logger.section(`Bandwidth report (${result.elapsedSeconds.toFixed(1)}s, ${result.samples} samples)`);
    for (const row of report) {
      out.result(`${row.interface}:`);
      out.result(`  Total received:  ${formatBytes(row.rx_bytes)}`);
      out.result(`  Total sent:      ${formatBytes(row.tx_bytes)}`);
      out.result(`  Average RX:      ${row.avg_rx_mbps.toFixed(2)} Mbps`);
      out.result(`  Average TX:      ${row.avg_tx_mbps.toFixed(2)} Mbps`);
      if (row.peak_rx_mbps !== undefined && row.peak_tx_mbps !== undefined) {
        out.result(`  Peak RX:         ${row.peak_rx_mbps.toFixed(2)} Mbps`);
        out.result(`  Peak TX:         ${row.peak_tx_mbps.toFixed(2)} Mbps`);
      }
    }
  }

  out.success({
    interfaces,
    interval_seconds: intervalSeconds,
    elapsed_seconds: Number(result.elapsedSeconds.toFixed(3)),
    samples: result.samples,
    alerts: [...alerted],
    report,
  });
  return ExitCode.SUCCESS;
}

function directionName(direction: Direction): string {
  return direction === 'rx' ? 'download' : 'upload';
}
