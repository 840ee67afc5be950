/**
 * Configuration loader
 * Loads and merges global and project config files
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { parse, stringify } from 'yaml';
import { configError, errorMessage } from '../cli/errors.js';
import { RESERVED_ENV_VARS } from '../cli/env.js';
import { CONFIG_SCHEMA, isSchemaField, schemaChildren, schemaDefaults, type SchemaNode } from './schema.js';
import { assertValidConfig, parseValue } from './validator.js';

const STATE_DIR = '.opskit';
const CONFIG_FILE = 'config.yaml';
const ENV_PREFIX = 'OPSKIT_';

export type ConfigRecord = Record<string, unknown>;

export interface NotificationHookConfig {
  name: string;
  type: 'webhook' | 'script';
  events?: string[];
  enabled?: boolean;
  url?: string;
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  body?: Record<string, unknown> | string;
  command?: string;
  args?: string[];
  cwd?: string;
  timeout?: number | string;
  retry?: number;
}

export interface OpskitConfig {
  output?: { colors?: boolean };
  logging?: { level?: string; timestamps?: boolean };
  scan?: { ports?: string; timeout?: number; concurrency?: number };
  ssh?: { user?: string; identity?: string; parallel?: number; connectTimeout?: number };
  dns?: { nameservers?: string[]; count?: number; timeout?: number; wait?: number; record?: string };
  blacklist?: { timeout?: number; concurrency?: number };
  bandwidth?: { interval?: number; alertMbps?: number };
  disk?: { warning?: number; critical?: number; excludeTypes?: string[] };
  http?: { timeout?: number; retries?: number; expect?: string };
  ssl?: { port?: number; warning?: number; critical?: number; timeout?: number };
  integrity?: { algorithm?: string; interval?: number; exclude?: string[] };
  logins?: { threshold?: number; blockThreshold?: number; period?: number; filter?: string };
  logs?: { age?: number; extension?: string; keep?: number };
  backup?: { retention?: number };
  database?: { path?: string };
  notifications?: NotificationHookConfig[];
}

export function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ConfigRecord = schemaDefaults();

/**
 * Directory holding the global config and the state database
 * (~/.opskit, or OPSKIT_HOME)
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.OPSKIT_HOME || join(homedir(), STATE_DIR);
}

export function getGlobalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getStateDir(env), CONFIG_FILE);
}

export function getProjectConfigPath(projectPath?: string): string {
  return join(projectPath ?? process.cwd(), STATE_DIR, CONFIG_FILE);
}

/**
 * Load config from a file
 * Returns empty object if file doesn't exist
 */
export function loadConfigFile(filePath: string): ConfigRecord {
  if (!existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw configError(`Failed to parse config at ${filePath}: ${errorMessage(error)}`, { path: filePath });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw configError(`Config at ${filePath} must be a mapping of sections`, { path: filePath });
  }
  return parsed;
}

/**
 * Deep merge two config objects
 * Second object values override first
 */
export function mergeConfigs(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, overrideValue] of Object.entries(override)) {
    // Empty strings, null and undefined do not override; false and 0 do
    if (overrideValue === undefined || overrideValue === null || overrideValue === '') {
      continue;
    }

    const baseValue = base[key];
    if (isRecord(baseValue) && isRecord(overrideValue)) {
      result[key] = mergeConfigs(baseValue, overrideValue);
    } else {
      result[key] = overrideValue;
    }
  }

  return result;
}

/**
 * Resolve OPSKIT_DISK_EXCLUDE_TYPES to ['disk', 'excludeTypes'] by walking the
 * schema, matching underscore-separated words against camelCase keys
 */
export function resolveEnvPath(words: string[]): string[] | null {
  const path: string[] = [];
  let node: SchemaNode = CONFIG_SCHEMA;
  let index = 0;

  while (index < words.length) {
    if (isSchemaField(node)) {
      return null;
    }
    let matched = false;
    for (const [key, child] of schemaChildren(node)) {
      for (let end = words.length; end > index; end--) {
        if (words.slice(index, end).join('') === key.toLowerCase()) {
          path.push(key);
          node = child;
          index = end;
          matched = true;
          break;
        }
      }
      if (matched) break;
    }
    if (!matched) {
      return null;
    }
  }

  return isSchemaField(node) ? path : null;
}

/**
 * Apply environment variable overrides
 * OPSKIT_SCAN_CONCURRENCY=20 -> scan.concurrency = 20
 */
export function applyEnvOverrides(
  config: ConfigRecord,
  env: NodeJS.ProcessEnv = process.env
): ConfigRecord {
  let result = config;

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || RESERVED_ENV_VARS.has(name) || value === undefined) continue;

    const words = name.substring(ENV_PREFIX.length).toLowerCase().split('_');
    const path = resolveEnvPath(words);
    if (!path) continue;

    result = setConfigValue(result, path.join('.'), parseValue(path.join('.'), value));
  }

  return result;
}

export interface LoadConfigOptions {
  /** Replaces the project config file (--config) */
  configPath?: string;
  projectPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load merged configuration as an untyped tree
 * Priority: defaults < global < project < environment
 */
export function loadConfigRecord(options: LoadConfigOptions = {}): ConfigRecord {
  const env = options.env ?? process.env;

  let config = mergeConfigs({}, DEFAULT_CONFIG);
  config = mergeConfigs(config, loadConfigFile(getGlobalConfigPath(env)));

  if (options.configPath) {
    if (!existsSync(options.configPath)) {
      throw configError(`Config file not found: ${options.configPath}`, { path: options.configPath });
    }
    config = mergeConfigs(config, loadConfigFile(options.configPath));
  } else {
    config = mergeConfigs(config, loadConfigFile(getProjectConfigPath(options.projectPath)));
  }

  return applyEnvOverrides(config, env);
}

/**
 * Load and validate the merged configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): OpskitConfig {
  const record = loadConfigRecord(options);
  assertValidConfig(record);
  return record;
}

export function saveConfig(config: ConfigRecord, filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(filePath, stringify(config, { indent: 2 }), 'utf-8');
}

/**
 * Get a config value by dot-notation path
 * e.g., getConfigValue(config, 'disk.warning')
 */
export function getConfigValue(config: unknown, path: string): unknown {
  let current: unknown = config;

  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a config value by dot-notation path
 * Returns a new config object with the value set
 */
export function setConfigValue(config: ConfigRecord, path: string, value: unknown): ConfigRecord {
  const [head, ...rest] = path.split('.');
  if (rest.length === 0) {
    return { ...config, [head]: value };
  }
  const child = config[head];
  return {
    ...config,
    [head]: setConfigValue(isRecord(child) ? child : {}, rest.join('.'), value),
  };
}
