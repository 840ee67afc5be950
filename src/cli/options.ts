/**
 * Parsing helpers for command options
 *
 * parseArgs hands every value over as a string; these turn them into
 * checked numbers, choices and lists, failing with INVALID_ARGUMENTS.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { GlobalFlags } from './flags.js';
import { fileNotFoundError, invalidArgumentsError } from './errors.js';

export interface RangeOptions {
  min?: number;
  max?: number;
}

function checkRange(name: string, value: number, range: RangeOptions): number {
  if (range.min !== undefined && value < range.min) {
    throw invalidArgumentsError(`--${name} must be at least ${range.min} (got ${value})`);
  }
  if (range.max !== undefined && value > range.max) {
    throw invalidArgumentsError(`--${name} must be at most ${range.max} (got ${value})`);
  }
  return value;
}

/**
 * Parse an integer option; `fallback` is used when the option is absent
 */
export function intOption(
  name: string,
  value: string | undefined,
  fallback: number,
  range: RangeOptions = {}
): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw invalidArgumentsError(`--${name} must be an integer (got "${value}")`);
  }
  return checkRange(name, parseInt(value, 10), range);
}

export function numberOption(
  name: string,
  value: string | undefined,
  fallback: number,
  range: RangeOptions = {}
): number {
  if (value === undefined) {
    return fallback;
  }
  const num = Number(value);
  if (value.trim() === '' || Number.isNaN(num)) {
    throw invalidArgumentsError(`--${name} must be a number (got "${value}")`);
  }
  return checkRange(name, num, range);
}

/**
 * Match a value against a fixed set of choices (case-insensitive)
 */
export function choiceOption<T extends string>(
  name: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T
): T {
  if (value === undefined) {
    return fallback;
  }
  const match = choices.find((c) => c.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw invalidArgumentsError(`Invalid --${name} "${value}". Use one of: ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Flatten repeated and comma-separated values: -p 22,80 -p 443 -> [22, 80, 443]
 */
export function listOption(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const values = Array.isArray(value) ? value : [value];
  return values
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

/**
 * Split file content into entries, skipping blank lines and # comments
 */
export function parseListContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Read a one-entry-per-line file (hosts, commands, targets, whitelists)
 */
export function readListFile(path: string): string[] {
  if (!existsSync(path)) {
    throw fileNotFoundError(path);
  }
  return parseListContent(readFileSync(path, 'utf-8'));
}

/**
 * Timeout for one network operation in milliseconds.
 * A command's -t <seconds> wins over the global --timeout <duration>,
 * which wins over the configured seconds.
 */
export function timeoutOption(
  seconds: string | undefined,
  flags: GlobalFlags,
  configuredSeconds: number
): number {
  if (seconds !== undefined) {
    return Math.round(numberOption('timeout', seconds, configuredSeconds, { min: 0.001 }) * 1000);
  }
  if (flags.timeout !== undefined) {
    return flags.timeout;
  }
  return Math.round(configuredSeconds * 1000);
}
