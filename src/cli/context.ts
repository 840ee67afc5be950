/**
 * Per-command runtime: merged config, logger, output, notifier and the
 * process runner. Tests pass overrides instead of touching real files,
 * binaries or endpoints.
 */

import type { GlobalFlags } from './flags.js';
import { createLogger, type Logger } from './logger.js';
import { createOutput, type Output } from './output.js';
import { loadConfig, type OpskitConfig } from '../config/loader.js';
import { Notifier } from '../notify/dispatcher.js';
import { commandExists, runCommand, type CommandRunner } from '../exec/runner.js';

export interface CommandContext {
  command: string;
  subcommand?: string;
  flags: GlobalFlags;
  config: OpskitConfig;
  logger: Logger;
  out: Output;
  notifier: Notifier;
  runner: CommandRunner;
  /** Whether an external tool is installed */
  exists: (name: string) => boolean;
  env: NodeJS.ProcessEnv;
}

export interface ContextOverrides {
  config?: OpskitConfig;
  logger?: Logger;
  /** Line sink for command output */
  write?: (line: string) => void;
  runner?: CommandRunner;
  exists?: (name: string) => boolean;
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
}

export function createContext(
  command: string,
  flags: GlobalFlags,
  overrides: ContextOverrides = {},
  subcommand?: string
): CommandContext {
  const env = overrides.env ?? process.env;
  const config = overrides.config ?? loadConfig({ configPath: flags.configPath, env });

  if (config.output?.colors === false) {
    process.env.NO_COLOR = '1';
  }

  const logger = overrides.logger ?? createLogger(flags, config.logging, env);
  const runner = overrides.runner ?? runCommand;

  return {
    command,
    subcommand,
    flags,
    config,
    logger,
    out: createOutput({ command, subcommand, flags, write: overrides.write }),
    notifier: new Notifier(config.notifications ?? [], {
      logger,
      disabled: flags.noNotify,
      dryRun: flags.dryRun,
      env,
      runner,
      fetch: overrides.fetch,
    }),
    runner,
    exists: overrides.exists ?? ((name: string) => commandExists(name, env)),
    env,
  };
}
