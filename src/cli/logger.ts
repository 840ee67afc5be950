/**
 * Levelled, timestamped logger shared by every command
 *
 *   2025-04-15 10:32:07 [INFO] Scanning 254 hosts
 *   2025-04-15 10:32:09 [WARNING] host 10.0.0.7 did not resolve
 *
 * info/success/debug go to stdout, warning/error to stderr. In JSON mode
 * everything goes to stderr so stdout carries only the envelope.
 */

import { paint, colorsEnabled, type ColorName } from './colors.js';
import type { GlobalFlags } from './flags.js';
import { configError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

type Tag = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR' | 'DEBUG';

const TAG_COLOR: Record<Tag, ColorName> = {
  INFO: 'blue',
  SUCCESS: 'green',
  WARNING: 'yellow',
  ERROR: 'red',
  DEBUG: 'cyan',
};

export interface LoggerOptions {
  level?: LogLevel;
  timestamps?: boolean;
  color?: boolean;
  /** Route every line to stderr */
  json?: boolean;
  /** Suppress everything below warning */
  quiet?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: () => Date;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const LEVEL_NAMES: readonly string[] = LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  const level = normalized === 'warn' ? 'warning' : normalized;
  if (!isLogLevel(level)) {
    throw configError(`Invalid log level: ${value}. Use one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly timestamps: boolean;
  private readonly color: boolean;
  private readonly json: boolean;
  private readonly quiet: boolean;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.timestamps = options.timestamps ?? true;
    this.color = options.color ?? colorsEnabled();
    this.json = options.json ?? false;
    this.quiet = options.quiet ?? false;
    this.out = options.stdout ?? ((line: string) => console.log(line));
    this.err = options.stderr ?? ((line: string) => console.error(line));
    this.now = options.now ?? (() => new Date());
  }

  isEnabled(level: LogLevel): boolean {
    if (this.quiet && LEVEL_RANK[level] < LEVEL_RANK.warning) {
      return false;
    }
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  info(message: string): void {
    this.emit('info', 'INFO', message);
  }

  success(message: string): void {
    this.emit('info', 'SUCCESS', message);
  }

  warning(message: string): void {
    this.emit('warning', 'WARNING', message);
  }

  error(message: string): void {
    this.emit('error', 'ERROR', message);
  }

  debug(message: string): void {
    this.emit('debug', 'DEBUG', message);
  }

  /**
   * `=== title ===` block, suppressed in quiet and JSON modes
   */
  header(title: string): void {
    if (this.quiet || this.json) return;
    const rule = '='.repeat(Math.max(title.length + 8, 40));
    this.out(paint(rule, 'bold', this.color));
    this.out(paint(`=== ${title} ===`, 'bold', this.color));
    this.out(paint(rule, 'bold', this.color));
  }

  section(title: string): void {
    if (this.quiet || this.json) return;
    this.out(paint(`--- ${title} ---`, 'bold', this.color));
  }

  /**
   * Render one log line without writing it
   */
  format(tag: Tag, message: string): string {
    const label = paint(`[${tag}]`, TAG_COLOR[tag], this.color);
    if (!this.timestamps) {
      return `${label} ${message}`;
    }
    return `${paint(formatTimestamp(this.now()), 'dim', this.color)} ${label} ${message}`;
  }

  private emit(level: LogLevel, tag: Tag, message: string): void {
    if (!this.isEnabled(level)) return;
    const line = this.format(tag, message);
    if (this.json || LEVEL_RANK[level] >= LEVEL_RANK.warning) {
      this.err(line);
    } else {
      this.out(line);
    }
  }
}

/**
 * Build the command logger from global flags and the `logging` config section
 */
export function createLogger(
  flags: GlobalFlags,
  logging: { level?: string; timestamps?: boolean } = {},
  env: NodeJS.ProcessEnv = process.env
): Logger {
  let level: LogLevel = parseLogLevel(env.OPSKIT_LOG_LEVEL ?? logging.level ?? 'info');
  if (flags.verbose) {
    level = 'debug';
  }
  return new Logger({
    level,
    timestamps: logging.timestamps ?? true,
    json: flags.json,
    quiet: flags.quiet,
  });
}
