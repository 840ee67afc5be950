/**
 * Colored output support for opskit
 *
 * Respects NO_COLOR, OPSKIT_NO_COLOR and --no-color (no-color.org), and
 * turns itself off when stdout is not a terminal.
 */

import { shouldDisableColors } from './env.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export type ColorName = Exclude<keyof typeof COLORS, 'reset'>;

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function colorsEnabled(): boolean {
  return !shouldDisableColors() && process.stdout.isTTY === true;
}

/**
 * Wrap text in a color when `enabled`, regardless of the terminal
 */
export function paint(text: string, color: ColorName, enabled: boolean): string {
  return enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function colorize(text: string, color: ColorName): string {
  return paint(text, color, colorsEnabled());
}

/**
 * Remove ANSI escape sequences (for width calculations and log files)
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function visibleLength(text: string): number {
  return stripAnsi(text).length;
}

export const colors = {
  red: (text: string): string => colorize(text, 'red'),
  green: (text: string): string => colorize(text, 'green'),
  yellow: (text: string): string => colorize(text, 'yellow'),
  blue: (text: string): string => colorize(text, 'blue'),
  magenta: (text: string): string => colorize(text, 'magenta'),
  cyan: (text: string): string => colorize(text, 'cyan'),
  gray: (text: string): string => colorize(text, 'gray'),
  bold: (text: string): string => colorize(text, 'bold'),
  dim: (text: string): string => colorize(text, 'dim'),
};

/**
 * Status markers with colors
 */
export const markers = {
  success(text?: string): string {
    const marker = colors.green('✓');
    return text ? `${marker} ${text}` : marker;
  },

  error(text?: string): string {
    const marker = colors.red('✗');
    return text ? `${marker} ${text}` : marker;
  },

  warning(text?: string): string {
    const marker = colors.yellow('⚠');
    return text ? `${marker} ${text}` : marker;
  },

  info(text?: string): string {
    const marker = colors.blue('ℹ');
    return text ? `${marker} ${text}` : marker;
  },

  bullet(text?: string): string {
    const marker = colors.dim('•');
    return text ? `${marker} ${text}` : marker;
  },
};

/**
 * Color a check status word the same way in every report
 */
export function colorStatus(status: string): string {
  switch (status) {
    case 'OK':
    case 'CLEAN':
    case 'open':
    case 'Ready':
      return colors.green(status);
    case 'WARNING':
    case 'filtered':
      return colors.yellow(status);
    case 'CRITICAL':
    case 'EXPIRED':
    case 'FAIL':
    case 'LISTED':
    case 'ERROR':
    case 'NotReady':
    case 'MODIFIED':
    case 'MISSING':
      return colors.red(status);
    case 'NEW':
      return colors.yellow(status);
    default:
      return status;
  }
}
