/**
 * Global flags parser for opskit
 *
 * Parses global flags that apply to all commands:
 * - Output format: --json, --quiet, --verbose
 * - Display: --no-color, --help
 * - Behaviour: --config, --dry-run, --timeout, --no-notify
 * - Version: --version
 *
 * Global flags may appear anywhere before a bare `--`; everything else is
 * handed to the command's own parseArgs call.
 */

import { invalidArgumentsError } from './errors.js';
import { isTruthy } from './env.js';

/**
 * Parsed global options available to all commands
 */
export interface GlobalFlags {
  /** Output as JSON (-j, --json) */
  json: boolean;
  /** Minimal output (-q, --quiet) */
  quiet: boolean;
  /** Detailed output (-v, --verbose) */
  verbose: boolean;
  /** Show help (-h, --help) */
  help: boolean;
  /** Show version (--version) */
  version: boolean;
  /** Disable colors (--no-color) */
  noColor: boolean;
  /** Custom config path (--config) */
  configPath?: string;
  /** Report what would change without changing it (--dry-run) */
  dryRun: boolean;
  /** Per-operation timeout in milliseconds (--timeout) */
  timeout?: number;
  /** Skip notification hooks (--no-notify) */
  noNotify: boolean;
}

export interface ParsedArgs {
  flags: GlobalFlags;
  /** Remaining args after global flags are extracted */
  remaining: string[];
}

export function getDefaultFlags(): GlobalFlags {
  return {
    json: false,
    quiet: false,
    verbose: false,
    help: false,
    version: false,
    noColor: false,
    configPath: undefined,
    dryRun: false,
    timeout: undefined,
    noNotify: false,
  };
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Parse duration string to milliseconds
 * Supports: 500ms, 30s, 5m, 1h, 7d, or a plain number (ms)
 */
export function parseDuration(value: string): number {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)?$/);
  if (!match) {
    throw invalidArgumentsError(
      `Invalid duration format: ${value}. Use format: 30s, 5m, 1h, 7d, or milliseconds`
    );
  }

  const num = parseFloat(match[1]);
  const unit = match[2] ?? 'ms';
  return Math.round(num * DURATION_UNITS[unit]);
}

/**
 * Load flags from environment variables
 * Environment variables provide defaults that can be overridden by CLI flags
 */
export function loadEnvFlags(env: NodeJS.ProcessEnv = process.env): Partial<GlobalFlags> {
  const flags: Partial<GlobalFlags> = {};

  if (isTruthy(env.OPSKIT_JSON)) {
    flags.json = true;
  }
  if (isTruthy(env.OPSKIT_QUIET)) {
    flags.quiet = true;
  }
  if (isTruthy(env.OPSKIT_VERBOSE)) {
    flags.verbose = true;
  }
  if (isTruthy(env.OPSKIT_NO_NOTIFY)) {
    flags.noNotify = true;
  }
  if (isTruthy(env.OPSKIT_DRY_RUN)) {
    flags.dryRun = true;
  }
  if (isTruthy(env.OPSKIT_NO_COLOR) || env.NO_COLOR !== undefined) {
    flags.noColor = true;
  }
  if (env.OPSKIT_CONFIG) {
    flags.configPath = env.OPSKIT_CONFIG;
  }
  if (env.OPSKIT_TIMEOUT) {
    flags.timeout = parseDuration(env.OPSKIT_TIMEOUT);
  }

  return flags;
}

function requireValue(args: string[], i: number, flag: string, what: string): string {
  if (i + 1 >= args.length) {
    throw invalidArgumentsError(`${flag} requires a ${what} argument`);
  }
  return args[i + 1];
}

/**
 * Parse global flags from command line arguments
 *
 * Global flags can appear anywhere in the args and are extracted,
 * leaving the remaining args for command-specific parsing.
 */
export function parseGlobalFlags(
  args: string[],
  env: NodeJS.ProcessEnv = process.env
): ParsedArgs {
  const flags: GlobalFlags = {
    ...getDefaultFlags(),
    ...loadEnvFlags(env),
  };

  const remaining: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];

    if (arg === '--') {
      remaining.push(...args.slice(i));
      break;
    }

    // Combined short flags like -jqv
    if (/^-[jqvh]+$/.test(arg) && arg.length > 2) {
      for (const char of arg.slice(1)) {
        switch (char) {
          case 'j':
            flags.json = true;
            break;
          case 'q':
            flags.quiet = true;
            break;
          case 'v':
            flags.verbose = true;
            break;
          case 'h':
            flags.help = true;
            break;
        }
      }
      i++;
      continue;
    }

    switch (arg) {
      case '-j':
      case '--json':
        flags.json = true;
        i++;
        break;

      case '-q':
      case '--quiet':
        flags.quiet = true;
        i++;
        break;

      case '-v':
      case '--verbose':
        flags.verbose = true;
        i++;
        break;

      case '-h':
      case '--help':
        flags.help = true;
        i++;
        break;

      case '--version':
        flags.version = true;
        i++;
        break;

      case '--no-color':
        flags.noColor = true;
        i++;
        break;

      case '--dry-run':
        flags.dryRun = true;
        i++;
        break;

      case '--no-notify':
        flags.noNotify = true;
        i++;
        break;

      case '--config':
        flags.configPath = requireValue(args, i, '--config', 'path');
        i += 2;
        break;

      case '--timeout':
        flags.timeout = parseDuration(requireValue(args, i, '--timeout', 'duration'));
        i += 2;
        break;

      default:
        if (arg.startsWith('--config=')) {
          flags.configPath = arg.slice('--config='.length);
        } else if (arg.startsWith('--timeout=')) {
          flags.timeout = parseDuration(arg.slice('--timeout='.length));
        } else {
          remaining.push(arg);
        }
        i++;
    }
  }

  if (flags.quiet && flags.verbose) {
    throw invalidArgumentsError('Cannot use --quiet and --verbose together');
  }

  return { flags, remaining };
}

/**
 * Apply global flags to affect runtime behavior
 */
export function applyGlobalFlags(flags: GlobalFlags): void {
  if (flags.noColor) {
    process.env.NO_COLOR = '1';
  }
}
