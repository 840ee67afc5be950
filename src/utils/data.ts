/**
 * Bundled data files (resolver lists, DNSBL zones, IP providers)
 *
 * The data/ directory sits at the package root, two levels above the
 * sources and three above the compiled output, so walk up until it shows.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { errorMessage, fileNotFoundError, CliError, ErrorCode } from '../cli/errors.js';

export function dataPath(name: string, from: string = __dirname): string {
  let dir = from;
  for (;;) {
    const candidate = join(dir, 'data', name);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw fileNotFoundError(join('data', name));
    }
    dir = parent;
  }
}

/**
 * Read and validate a bundled JSON file
 */
export function loadDataFile<T>(name: string, guard: (value: unknown) => value is T): T {
  const path = dataPath(name);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new CliError(ErrorCode.INTERNAL_ERROR, `Failed to read ${path}: ${errorMessage(error)}`);
  }
  if (!guard(parsed)) {
    throw new CliError(ErrorCode.INTERNAL_ERROR, `Unexpected content in ${path}`);
  }
  return parsed;
}
