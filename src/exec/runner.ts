/**
 * External command execution
 *
 * Every binary opskit drives (ssh, df, iptables, kubectl, rsync, nmap...)
 * goes through runCommand: argv only, never a shell, bounded by a timeout.
 * Commands accept a CommandRunner so tests can hand in a stub.
 */

import { spawn } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';
import { missingDependencyError } from '../cli/errors.js';

/**
 * Grace period between SIGTERM and SIGKILL
 */
const KILL_GRACE_MS = 5000;

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to stdin, then stdin is closed */
  input?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Append stderr to stdout as it arrives (2>&1) */
  mergeOutput?: boolean;
}

export interface CommandResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Execution time in milliseconds */
  duration: number;
  error?: string;
  timedOut?: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions
) => Promise<CommandResult>;

/**
 * Run a command and collect its output. Never rejects: spawn failures
 * (ENOENT, EACCES) come back as success: false with `error` set.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const startTime = Date.now();

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | null = null;
    let timeoutHandle: NodeJS.Timeout | null = null;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: false,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const finish = (result: Omit<CommandResult, 'duration'>): void => {
      if (settled) return;
      settled = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (killTimer) clearTimeout(killTimer);
      resolve({ ...result, duration: Date.now() - startTime });
    };

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      if (options.mergeOutput) {
        stdout += data.toString();
      } else {
        stderr += data.toString();
      }
    });

    // EPIPE when the child exits without reading its input
    child.stdin.on('error', (error) => {
      stderr += `stdin: ${error.message}\n`;
    });
    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timeoutHandle = setTimeout(() => {
        if (settled) return;
        timedOut = true;
        child.kill('SIGTERM');

        // child.killed turns true right after kill(), so check exitCode instead
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS);
        killTimer.unref();
      }, timeoutMs);
      timeoutHandle.unref();
    }

    child.on('close', (code, signal) => {
      const result: Omit<CommandResult, 'duration'> = {
        success: !timedOut && code === 0,
        exitCode: code,
        stdout,
        stderr,
      };

      if (timedOut) {
        result.timedOut = true;
        result.error = `${command} timed out after ${options.timeoutMs}ms`;
      } else if (signal) {
        result.error = `${command} killed by signal: ${signal}`;
      } else if (code !== 0) {
        result.error = `${command} exited with code ${code}`;
      }

      finish(result);
    });

    child.on('error', (error) => {
      finish({
        success: false,
        exitCode: null,
        stdout,
        stderr,
        error: error.message,
      });
    });
  });
};

function isExecutable(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether `name` resolves to an executable file on PATH (or is one, when
 * it contains a slash)
 */
export function commandExists(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
  if (name.includes('/')) {
    return isExecutable(name);
  }
  const dirs = (env.PATH ?? '').split(delimiter).filter((d) => d.length > 0);
  return dirs.some((dir) => isExecutable(join(dir, name)));
}

/**
 * Throw MISSING_DEPENDENCY for the first tool that is not installed
 */
export function requireCommands(
  names: string[],
  exists: (name: string) => boolean = commandExists
): void {
  for (const name of names) {
    if (!exists(name)) {
      throw missingDependencyError(name, `install ${name} or add it to PATH`);
    }
  }
}
