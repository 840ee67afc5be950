/**
 * opskit config - Manage configuration
 */

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { stringify } from 'yaml';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type CommandContext, type ContextOverrides } from '../cli/context.js';
import { CliError, ErrorCode, ExitCode, configError, invalidArgumentsError, notFoundError } from '../cli/errors.js';
import { choiceOption } from '../cli/options.js';
import {
  loadConfigFile,
  loadConfigRecord,
  saveConfig,
  getGlobalConfigPath,
  getProjectConfigPath,
  getConfigValue,
  setConfigValue,
  DEFAULT_CONFIG,
  type ConfigRecord,
} from '../config/loader.js';
import { validateConfig, formatValidationResult, parseValue, validateValue } from '../config/validator.js';
import { getCategories } from '../config/schema.js';
import { toJsonSchema, getCategoryJsonSchema } from '../config/json-schema.js';

const TEMPLATES = ['minimal', 'standard', 'full'] as const;
type Template = (typeof TEMPLATES)[number];

const HELP = generateHelp({
  command: 'config',
  description: 'Manage configuration',
  details: `Global config lives in ~/.opskit/config.yaml, project config in
./.opskit/config.yaml. Values merge as defaults < global < project <
environment (OPSKIT_<SECTION>_<KEY>).`,
  usage: ['opskit config <subcommand> [options]'],
  subcommands: [
    { name: 'init', description: 'Create a configuration file' },
    { name: 'show', args: '[key]', description: 'Display the merged configuration or one value' },
    { name: 'get', args: '<key>', description: 'Get a configuration value' },
    { name: 'set', args: '<key> <value>', description: 'Set a configuration value' },
    { name: 'validate', description: 'Validate the merged configuration' },
    { name: 'schema', args: '[category]', description: 'Output the configuration JSON Schema' },
    { name: 'path', description: 'Show configuration file paths' },
  ],
  options: [
    { long: 'template', description: 'Config template (init)', values: TEMPLATES.join(' | '), default: 'standard' },
    { long: 'global', description: 'Use the global config (~/.opskit/)' },
    { long: 'local', description: 'Use the project config (.opskit/)' },
    { long: 'force', description: 'Overwrite an existing config (init)' },
  ],
  examples: [
    { command: 'opskit config init --global', description: 'Create the global config' },
    { command: 'opskit config show disk', description: 'Show the disk section' },
    { command: 'opskit config get ssl.warning', description: 'Get one value' },
    { command: 'opskit config set disk.critical 95 --global', description: 'Set a global value' },
    { command: 'opskit config validate', description: 'Check the merged config' },
    { command: 'opskit config schema notifications', description: 'Schema of one section' },
  ],
});

export interface ConfigCommandOverrides extends ContextOverrides {
  /** Directory holding the project .opskit/ (default: cwd) */
  projectPath?: string;
}

function pick(config: ConfigRecord, keys: string[]): ConfigRecord {
  const result: ConfigRecord = {};
  for (const key of keys) {
    if (key in config) result[key] = config[key];
  }
  return result;
}

export function templateConfig(template: Template): ConfigRecord {
  switch (template) {
    case 'minimal':
      return { disk: pick(DEFAULT_CONFIG, ['disk']).disk, notifications: [] };
    case 'standard':
      return { ...pick(DEFAULT_CONFIG, ['output', 'logging', 'disk', 'http', 'ssl', 'integrity', 'logins']), notifications: [] };
    case 'full':
      return DEFAULT_CONFIG;
  }
}

function display(ctx: CommandContext, value: unknown): void {
  if (typeof value === 'object' && value !== null) {
    ctx.out.result(stringify(value, { indent: 2 }).trimEnd());
  } else {
    ctx.out.result(String(value));
  }
}

export async function configCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ConfigCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help || args.length === 0) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const [subcommand, ...rest] = args;
  const { values, positionals } = parseArgs({
    args: rest,
    options: {
      template: { type: 'string' },
      global: { type: 'boolean', default: false },
      local: { type: 'boolean', default: false },
      force: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });
  if (values.global && values.local) {
    throw invalidArgumentsError('--global and --local are mutually exclusive');
  }

  // The merged config may be the thing under inspection, so it is not
  // validated on the way in
  const ctx = createContext('config', flags, { ...overrides, config: overrides.config ?? {} }, subcommand);
  const globalPath = getGlobalConfigPath(ctx.env);
  const projectPath = getProjectConfigPath(overrides.projectPath);
  const merged = (): ConfigRecord =>
    loadConfigRecord({ configPath: flags.configPath, projectPath: overrides.projectPath, env: ctx.env });

  switch (subcommand) {
    case 'init': {
      const template = choiceOption('template', values.template, TEMPLATES, 'standard');
      const target = values.global ? globalPath : projectPath;
      if (existsSync(target) && !values.force) {
        throw new CliError(ErrorCode.CONFIG_ERROR, `Config already exists: ${target}. Use --force to overwrite`, {
          path: target,
        });
      }
      saveConfig(templateConfig(template), target);
      ctx.logger.success(`Created config: ${target} (template: ${template})`);
      ctx.out.success({ created: target, template });
      return ExitCode.SUCCESS;
    }

    case 'show': {
      const config = values.global ? loadConfigFile(globalPath) : values.local ? loadConfigFile(projectPath) : merged();
      const key = positionals[0];
      const value = key === undefined ? config : getConfigValue(config, key);
      if (value === undefined) {
        throw notFoundError(`Key not found: ${key ?? ''}`);
      }
      if (!ctx.out.isJson()) display(ctx, value);
      ctx.out.success(key === undefined ? { config: value } : { key, value });
      return ExitCode.SUCCESS;
    }

    case 'get': {
      const key = positionals[0];
      if (key === undefined) {
        throw invalidArgumentsError('config get needs a key');
      }
      const value = getConfigValue(merged(), key);
      if (value === undefined) {
        throw notFoundError(`Key not found: ${key}`);
      }
      if (!ctx.out.isJson()) display(ctx, value);
      ctx.out.success({ key, value });
      return ExitCode.SUCCESS;
    }

    case 'set': {
      const [key, ...words] = positionals;
      if (key === undefined || words.length === 0) {
        throw invalidArgumentsError('config set needs <key> <value>');
      }
      const value = parseValue(key, words.join(' '));
      const error = validateValue(key, value);
      if (error) {
        throw configError(`Invalid value for ${key}: ${error.message}`, {
          path: error.path,
          ...(error.suggestion ? { suggestion: error.suggestion } : {}),
        });
      }
      const target = values.global ? globalPath : projectPath;
      if (ctx.flags.dryRun) {
        ctx.logger.info(`Would set ${key} = ${JSON.stringify(value)} in ${target}`);
        ctx.out.success({ key, value, path: target, dry_run: true });
        return ExitCode.SUCCESS;
      }
      saveConfig(setConfigValue(loadConfigFile(target), key, value), target);
      ctx.logger.success(`Set ${key} = ${JSON.stringify(value)} in ${target}`);
      ctx.out.success({ key, value, path: target });
      return ExitCode.SUCCESS;
    }

    case 'validate': {
      const result = validateConfig(merged());
      if (!ctx.out.isJson()) ctx.out.result(formatValidationResult(result));
      ctx.out.success(result);
      return result.valid ? ExitCode.SUCCESS : ExitCode.CONFIG_ERROR;
    }

    case 'schema': {
      const category = positionals[0];
      const schema = category === undefined ? toJsonSchema() : getCategoryJsonSchema(category);
      if (!schema) {
        throw notFoundError(`Unknown category: ${category ?? ''}. Categories: ${getCategories().join(', ')}`);
      }
      // A schema is JSON either way
      ctx.out.result(JSON.stringify(schema, null, 2));
      return ExitCode.SUCCESS;
    }

    case 'path': {
      const paths = {
        global: { path: globalPath, exists: existsSync(globalPath) },
        project: { path: projectPath, exists: existsSync(projectPath) },
      };
      if (!ctx.out.isJson()) {
        ctx.out.result(`Global:  ${globalPath} ${paths.global.exists ? '(exists)' : '(not found)'}`);
        ctx.out.result(`Project: ${projectPath} ${paths.project.exists ? '(exists)' : '(not found)'}`);
      }
      ctx.out.success(paths);
      return ExitCode.SUCCESS;
    }

    default:
      throw invalidArgumentsError(
        `Unknown subcommand: ${subcommand}. Use one of: init, show, get, set, validate, schema, path`
      );
  }
}
