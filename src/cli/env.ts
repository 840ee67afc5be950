/**
 * Environment variable support for opskit
 *
 * Environment variables override defaults but are themselves overridden by
 * explicit CLI flags. Config keys can also be set as OPSKIT_<SECTION>_<KEY>
 * (see config/loader.ts).
 */

export const ENV_VARS = {
  OPSKIT_CONFIG: 'OPSKIT_CONFIG',
  OPSKIT_JSON: 'OPSKIT_JSON',
  OPSKIT_QUIET: 'OPSKIT_QUIET',
  OPSKIT_VERBOSE: 'OPSKIT_VERBOSE',
  OPSKIT_NO_NOTIFY: 'OPSKIT_NO_NOTIFY',
  OPSKIT_NO_COLOR: 'OPSKIT_NO_COLOR',
  OPSKIT_DRY_RUN: 'OPSKIT_DRY_RUN',
  OPSKIT_TIMEOUT: 'OPSKIT_TIMEOUT',
  OPSKIT_LOG_LEVEL: 'OPSKIT_LOG_LEVEL',
  OPSKIT_HOME: 'OPSKIT_HOME',
  NO_COLOR: 'NO_COLOR',
  CI: 'CI',
} as const;

/**
 * Names that map to global flags or runtime behaviour rather than config keys
 */
export const RESERVED_ENV_VARS: ReadonlySet<string> = new Set(Object.values(ENV_VARS));

/**
 * Check if a value is truthy for boolean environment variables
 *
 * Accepts: '1', 'true' (case-insensitive), 'yes', 'on'
 */
export function isTruthy(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.toLowerCase().trim();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function getEnv(key: keyof typeof ENV_VARS): string | undefined {
  return process.env[ENV_VARS[key]];
}

/**
 * Detect if running in CI environment
 */
export function isCI(): boolean {
  return isTruthy(getEnv('CI'));
}

/**
 * Check if colors should be disabled based on env vars
 */
export function shouldDisableColors(): boolean {
  return getEnv('NO_COLOR') !== undefined || isTruthy(getEnv('OPSKIT_NO_COLOR'));
}

/**
 * Environment variable documentation for help text
 */
export const ENV_VAR_DOCS: ReadonlyArray<{ name: string; description: string }> = [
  { name: ENV_VARS.OPSKIT_CONFIG, description: 'Custom config path (--config)' },
  { name: ENV_VARS.OPSKIT_JSON, description: 'Output as JSON (--json)' },
  { name: ENV_VARS.OPSKIT_QUIET, description: 'Minimal output (--quiet)' },
  { name: ENV_VARS.OPSKIT_VERBOSE, description: 'Detailed output (--verbose)' },
  { name: ENV_VARS.OPSKIT_NO_NOTIFY, description: 'Skip notification hooks (--no-notify)' },
  { name: ENV_VARS.OPSKIT_NO_COLOR, description: 'Disable colors (--no-color)' },
  { name: ENV_VARS.OPSKIT_DRY_RUN, description: 'Preview changes only (--dry-run)' },
  { name: ENV_VARS.OPSKIT_TIMEOUT, description: 'Per-operation timeout (duration)' },
  { name: ENV_VARS.OPSKIT_LOG_LEVEL, description: 'debug | info | warning | error' },
  { name: ENV_VARS.OPSKIT_HOME, description: 'State directory (default ~/.opskit)' },
  { name: ENV_VARS.NO_COLOR, description: 'Standard no-color variable' },
];
