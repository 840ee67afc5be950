/**
 * Mass SSH execution
 *
 * One job per host and command. Jobs run through the shared pool and each
 * result is handed to onResult as soon as it finishes.
 */

import { v4 as uuidv4 } from 'uuid';
import { runPool } from '../exec/pool.js';
import type { CommandRunner } from '../exec/runner.js';

export interface SshJob {
  id: string;
  host: string;
  command: string;
}

export interface SshJobResult extends SshJob {
  success: boolean;
  exitCode: number | null;
  /** stdout and stderr, interleaved */
  output: string;
  /** Milliseconds */
  duration: number;
  error?: string;
}

export interface SshOptions {
  user?: string;
  identity?: string;
  /** Seconds, passed as ConnectTimeout */
  connectTimeout: number;
}

export function createJobs(hosts: string[], commands: string[]): SshJob[] {
  return hosts.flatMap((host) => commands.map((command) => ({ id: uuidv4(), host, command })));
}

/**
 * `user@host`, unless the host already names its user
 */
export function sshDestination(host: string, user?: string): string {
  if (host.includes('@') || !user) {
    return host;
  }
  return `${user}@${host}`;
}

export function buildSshArgs(host: string, command: string, options: SshOptions): string[] {
  return [
    '-o', `ConnectTimeout=${options.connectTimeout}`,
    '-o', 'BatchMode=yes',
    '-o', 'StrictHostKeyChecking=no',
    ...(options.identity ? ['-i', options.identity] : []),
    sshDestination(host, options.user),
    command,
  ];
}

/**
 * Report block for one finished job
 */
export function formatJobResult(result: SshJobResult): string {
  const status = result.success ? '' : ' (FAILED)';
  const output = result.output.replace(/\n+$/, '');
  return `=== Host: ${result.host}, Command: ${result.command}${status} ===\n${output}\n\n`;
}

export interface RunJobsOptions extends SshOptions {
  parallel: number;
  runner: CommandRunner;
  /** Kill a job after this many milliseconds */
  jobTimeoutMs?: number;
  onResult?: (result: SshJobResult, completed: number) => void;
}

function failedResult(job: SshJob, error: Error): SshJobResult {
  return { ...job, success: false, exitCode: null, output: error.message, duration: 0, error: error.message };
}

export async function runSshJobs(jobs: SshJob[], options: RunJobsOptions): Promise<SshJobResult[]> {
  const runJob = async (job: SshJob): Promise<SshJobResult> => {
    const result = await options.runner('ssh', buildSshArgs(job.host, job.command, options), {
      mergeOutput: true,
      timeoutMs: options.jobTimeoutMs,
    });
    return {
      ...job,
      success: result.success,
      exitCode: result.exitCode,
      output: result.stdout,
      duration: result.duration,
      error: result.error,
    };
  };

  const outcomes = await runPool(jobs, options.parallel, runJob, {
    onSettled: (outcome, job, _index, completed) => {
      options.onResult?.(outcome.ok ? outcome.value : failedResult(job, outcome.error), completed);
    },
  });

  return outcomes.map((outcome, index) => (outcome.ok ? outcome.value : failedResult(jobs[index], outcome.error)));
}
