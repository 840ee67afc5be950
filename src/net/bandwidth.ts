/**
 * Interface throughput from /proc/net/dev counter deltas
 */

import { readFileSync } from 'node:fs';
import { setTimeout as delay } from 'node:timers/promises';
import { notFoundError } from '../cli/errors.js';
import { formatTimestamp } from '../cli/logger.js';
import { csvLine } from '../utils/formats.js';

export const NET_DEV_PATH = '/proc/net/dev';

export interface InterfaceCounters {
  rxBytes: number;
  txBytes: number;
}

export type CounterSnapshot = Map<string, InterfaceCounters>;

/**
 * `  eth0: 1234 10 0 0 0 0 0 0 5678 ...`: receive bytes are the first field
 * after the colon, transmit bytes the ninth
 */
export function parseNetDev(content: string): CounterSnapshot {
  const snapshot: CounterSnapshot = new Map();
  for (const line of content.split('\n')) {
    const match = /^\s*([^:\s]+):\s*(.*)$/.exec(line);
    if (!match) continue;
    const fields = match[2].trim().split(/\s+/);
    if (fields.length < 9) continue;
    const rxBytes = Number(fields[0]);
    const txBytes = Number(fields[8]);
    if (Number.isNaN(rxBytes) || Number.isNaN(txBytes)) continue;
    snapshot.set(match[1], { rxBytes, txBytes });
  }
  return snapshot;
}

export function readNetDev(path = NET_DEV_PATH): CounterSnapshot {
  return parseNetDev(readFileSync(path, 'utf-8'));
}

/**
 * Interfaces to watch: the requested ones (each must exist) or every one but lo
 */
export function selectInterfaces(snapshot: CounterSnapshot, requested: string[]): string[] {
  if (requested.length === 0) {
    return [...snapshot.keys()].filter((name) => name !== 'lo');
  }
  for (const name of requested) {
    if (!snapshot.has(name)) {
      throw notFoundError(`Interface not found: ${name}`, { interface: name, available: [...snapshot.keys()] });
    }
  }
  return requested;
}

/**
 * A counter that went backwards (reset or wrap) contributes nothing
 */
export function counterDelta(previous: number, current: number): number {
  return current >= previous ? current - previous : 0;
}

export function toMbps(bytesPerSecond: number): number {
  return (bytesPerSecond * 8) / 1_000_000;
}

export interface RateSample {
  timestamp: Date;
  iface: string;
  rxBytes: number;
  txBytes: number;
  rxBps: number;
  txBps: number;
  rxMbps: number;
  txMbps: number;
}

export function computeRates(
  previous: CounterSnapshot,
  current: CounterSnapshot,
  interfaces: string[],
  elapsedSeconds: number,
  timestamp: Date
): RateSample[] {
  const samples: RateSample[] = [];
  for (const iface of interfaces) {
    const before = previous.get(iface);
    const after = current.get(iface);
    if (!before || !after) continue;
    const rxBytes = counterDelta(before.rxBytes, after.rxBytes);
    const txBytes = counterDelta(before.txBytes, after.txBytes);
    const rxBps = elapsedSeconds > 0 ? rxBytes / elapsedSeconds : 0;
    const txBps = elapsedSeconds > 0 ? txBytes / elapsedSeconds : 0;
    samples.push({
      timestamp,
      iface,
      rxBytes,
      txBytes,
      rxBps,
      txBps,
      rxMbps: toMbps(rxBps),
      txMbps: toMbps(txBps),
    });
  }
  return samples;
}

export const RATE_UNITS = ['auto', 'B', 'KB', 'MB', 'GB', 'Mbps'] as const;
export type RateUnit = (typeof RATE_UNITS)[number];

const UNIT_DIVISORS: Record<'B' | 'KB' | 'MB' | 'GB', number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
};

export function formatRate(bytesPerSecond: number, unit: RateUnit): string {
  if (unit === 'Mbps') {
    return `${toMbps(bytesPerSecond).toFixed(2)} Mbps`;
  }
  let chosen: keyof typeof UNIT_DIVISORS;
  if (unit === 'auto') {
    if (bytesPerSecond >= UNIT_DIVISORS.GB) chosen = 'GB';
    else if (bytesPerSecond >= UNIT_DIVISORS.MB) chosen = 'MB';
    else if (bytesPerSecond >= UNIT_DIVISORS.KB) chosen = 'KB';
    else chosen = 'B';
  } else {
    chosen = unit;
  }
  const value = bytesPerSecond / UNIT_DIVISORS[chosen];
  return chosen === 'B' ? `${Math.round(value)} B/s` : `${value.toFixed(2)} ${chosen}/s`;
}

export const LOG_HEADER = 'Timestamp,Interface,RX_bytes,TX_bytes,RX_bps,TX_bps,RX_Mbps,TX_Mbps';

export function sampleLogLine(sample: RateSample): string {
  return csvLine([
    formatTimestamp(sample.timestamp),
    sample.iface,
    sample.rxBytes,
    sample.txBytes,
    sample.rxBps.toFixed(2),
    sample.txBps.toFixed(2),
    sample.rxMbps.toFixed(2),
    sample.txMbps.toFixed(2),
  ]);
}

export type Direction = 'rx' | 'tx';

export interface ThresholdAlert {
  iface: string;
  direction: Direction;
  mbps: number;
}

/**
 * Directions of a sample above the threshold (strictly greater)
 */
export function exceeded(sample: RateSample, thresholdMbps: number, stat: 'rx' | 'tx' | 'both'): ThresholdAlert[] {
  if (thresholdMbps <= 0) return [];
  const alerts: ThresholdAlert[] = [];
  if (stat !== 'tx' && sample.rxMbps > thresholdMbps) {
    alerts.push({ iface: sample.iface, direction: 'rx', mbps: sample.rxMbps });
  }
  if (stat !== 'rx' && sample.txMbps > thresholdMbps) {
    alerts.push({ iface: sample.iface, direction: 'tx', mbps: sample.txMbps });
  }
  return alerts;
}

export interface InterfaceTotals {
  iface: string;
  rxBytes: number;
  txBytes: number;
  peakRxMbps: number;
  peakTxMbps: number;
}

export class UsageTracker {
  private readonly totals = new Map<string, InterfaceTotals>();

  add(sample: RateSample): void {
    const entry = this.totals.get(sample.iface) ?? {
      iface: sample.iface,
      rxBytes: 0,
      txBytes: 0,
      peakRxMbps: 0,
      peakTxMbps: 0,
    };
    entry.rxBytes += sample.rxBytes;
    entry.txBytes += sample.txBytes;
    entry.peakRxMbps = Math.max(entry.peakRxMbps, sample.rxMbps);
    entry.peakTxMbps = Math.max(entry.peakTxMbps, sample.txMbps);
    this.totals.set(sample.iface, entry);
  }

  list(): InterfaceTotals[] {
    return [...this.totals.values()];
  }
}

/**
 * Average Mbps over the whole run: total × 8 / 10⁶ / elapsed
 */
export function averageMbps(totalBytes: number, elapsedSeconds: number): number {
  return elapsedSeconds > 0 ? (totalBytes * 8) / 1_000_000 / elapsedSeconds : 0;
}

export interface MonitorOptions {
  interfaces: string[];
  intervalMs: number;
  /** Stop after this long; sample until stopped otherwise */
  durationMs?: number;
  read?: () => CounterSnapshot;
  /** Counters to measure the first interval from; read afresh otherwise */
  initial?: CounterSnapshot;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Milliseconds, monotonic */
  clock?: () => number;
  now?: () => Date;
  shouldStop?: () => boolean;
  /** Aborting ends the current wait and stops sampling */
  signal?: AbortSignal;
  onSample?: (samples: RateSample[]) => void;
}

export interface MonitorResult {
  samples: number;
  elapsedSeconds: number;
  totals: InterfaceTotals[];
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal }).catch((error: unknown) => {
    if (signal?.aborted) return;
    throw error;
  });
}

/**
 * Sample counters every interval until the duration passes, shouldStop
 * turns true or the signal aborts
 */
export async function monitorBandwidth(options: MonitorOptions): Promise<MonitorResult> {
  const read = options.read ?? (() => readNetDev());
  const sleep = options.sleep ?? abortableSleep;
  const clock = options.clock ?? (() => Number(process.hrtime.bigint()) / 1e6);
  const now = options.now ?? (() => new Date());
  const { signal } = options;
  const stop = (): boolean => signal?.aborted === true || (options.shouldStop?.() ?? false);
  const tracker = new UsageTracker();

  const started = clock();
  let previous = options.initial ?? read();
  let previousAt = started;
  let samples = 0;

  while (!stop()) {
    if (options.durationMs !== undefined && clock() - started >= options.durationMs) break;
    await sleep(options.intervalMs, signal);
    if (stop()) break;

    const current = read();
    const at = clock();
    const rates = computeRates(previous, current, options.interfaces, (at - previousAt) / 1000, now());
    for (const rate of rates) tracker.add(rate);
    options.onSample?.(rates);
    samples++;
    previous = current;
    previousAt = at;
  }

  return { samples, elapsedSeconds: (previousAt - started) / 1000, totals: tracker.list() };
}
