/**
 * Script Hook Runner
 *
 * Runs the hook command (argv, no shell) with the payload as JSON on stdin
 * and the main fields in OPSKIT_* environment variables.
 */

import type { NotificationPayload } from './payload.js';
import { parseTemplate } from './templates.js';
import { hookTimeoutMs, type ScriptHook } from './hooks.js';
import { runCommand, type CommandResult, type CommandRunner } from '../exec/runner.js';

const DEFAULT_TIMEOUT_MS = 60_000;

export interface ScriptOptions {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}

export function executeScript(
  hook: ScriptHook,
  payload: NotificationPayload,
  options: ScriptOptions = {}
): Promise<CommandResult> {
  const env = options.env ?? process.env;
  const runner = options.runner ?? runCommand;

  return runner(
    parseTemplate(hook.command, payload, env),
    (hook.args ?? []).map((arg) => parseTemplate(arg, payload, env)),
    {
      cwd: hook.cwd ? parseTemplate(hook.cwd, payload, env) : undefined,
      env: {
        ...env,
        OPSKIT_EVENT: payload.event,
        OPSKIT_COMMAND: payload.command,
        OPSKIT_SUMMARY: payload.summary,
        OPSKIT_HOST: payload.host,
        OPSKIT_TIMESTAMP: payload.timestamp,
      },
      input: JSON.stringify(payload),
      timeoutMs: hookTimeoutMs(hook.timeout, DEFAULT_TIMEOUT_MS),
    }
  );
}
