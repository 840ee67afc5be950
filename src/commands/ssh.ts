/**
 * opskit ssh - Run commands on many hosts over SSH
 */

import { parseArgs } from 'node:util';
import { existsSync } from 'node:fs';
import { userInfo } from 'node:os';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, fileNotFoundError, invalidArgumentsError } from '../cli/errors.js';
import { intOption, numberOption, readListFile } from '../cli/options.js';
import { requireCommands } from '../exec/runner.js';
import { buildSshArgs, createJobs, formatJobResult, runSshJobs } from '../automation/ssh-runner.js';
import { writeReport } from '../utils/formats.js';

const HELP = generateHelp({
  command: 'ssh',
  description: 'Execute commands on multiple hosts via SSH',
  usage: ['opskit ssh -H <host> [-H <host>...] -c <command> [options]', 'opskit ssh --hosts <file> -f <file> [options]'],
  details: `Each command runs on each host, up to --parallel jobs at a time. Output is
printed per job as it finishes. Hosts written user@host keep their user.`,
  options: [
    { short: 'H', long: 'host', description: 'Host to connect to (repeatable)', values: '<host>' },
    { long: 'hosts', description: 'File with one host per line', values: '<file>' },
    { short: 'c', long: 'command', description: 'Command to run (repeatable)', values: '<cmd>' },
    { short: 'f', long: 'file', description: 'File with one command per line', values: '<file>' },
    { short: 'u', long: 'user', description: 'SSH user', values: '<user>', default: 'current user' },
    { short: 'i', long: 'identity', description: 'Private key file', values: '<file>' },
    { short: 'p', long: 'parallel', description: 'Concurrent connections', values: '<n>', default: '5' },
    { short: 't', long: 'timeout', description: 'Connect timeout in seconds', values: '<s>', default: '10' },
    { short: 'o', long: 'output', description: 'Write job output to a file', values: '<file>' },
  ],
  examples: [
    { command: "opskit ssh --hosts hosts.txt -c 'uptime'", description: 'Run uptime everywhere' },
    { command: "opskit ssh -H web1 -H web2 -c 'df -h' -c 'free -m'", description: 'Two commands on two hosts' },
    { command: 'opskit ssh --hosts hosts.txt -f commands.txt -p 10', description: 'Command file, ten at a time' },
  ],
});

function currentUser(env: NodeJS.ProcessEnv): string {
  if (env.USER) return env.USER;
  return userInfo().username;
}

export async function sshCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values } = parseArgs({
    args,
    options: {
      host: { type: 'string', short: 'H', multiple: true },
      hosts: { type: 'string' },
      command: { type: 'string', short: 'c', multiple: true },
      file: { type: 'string', short: 'f' },
      user: { type: 'string', short: 'u' },
      identity: { type: 'string', short: 'i' },
      parallel: { type: 'string', short: 'p' },
      timeout: { type: 'string', short: 't' },
      output: { type: 'string', short: 'o' },
    },
    allowPositionals: false,
  });

  const ctx = createContext('ssh', flags, overrides);
  const { config, logger, out } = ctx;

  const hosts = [...(values.host ?? []), ...(values.hosts ? readListFile(values.hosts) : [])];
  const commands = [...(values.command ?? []), ...(values.file ? readListFile(values.file) : [])];
  if (hosts.length === 0) {
    throw invalidArgumentsError('No hosts given. Use --host or --hosts <file>');
  }
  if (commands.length === 0) {
    throw invalidArgumentsError('No commands given. Use --command or --file <file>');
  }

  const identity = values.identity ?? (config.ssh?.identity || undefined);
  if (identity && !existsSync(identity)) {
    throw fileNotFoundError(identity);
  }

  const options = {
    user: values.user ?? (config.ssh?.user || currentUser(ctx.env)),
    identity,
    connectTimeout: numberOption('timeout', values.timeout, config.ssh?.connectTimeout ?? 10, { min: 1 }),
  };
  const parallel = intOption('parallel', values.parallel, config.ssh?.parallel ?? 5, { min: 1 });
  const jobs = createJobs(hosts, commands);

  if (flags.dryRun) {
    const planned = jobs.map((job) => ['ssh', ...buildSshArgs(job.host, job.command, options)]);
    for (const argv of planned) {
      out.result(`[dry-run] ${argv.map((a) => (/\s/.test(a) ? `'${a}'` : a)).join(' ')}`);
    }
    out.success({ dryRun: true, jobs: jobs.map((job, i) => ({ ...job, argv: planned[i] })) });
    return ExitCode.SUCCESS;
  }

  requireCommands(['ssh'], ctx.exists);

  if (values.output) {
    writeReport(values.output, '');
  }
  logger.info(`Running ${jobs.length} job(s) on ${hosts.length} host(s), ${parallel} at a time`);

  const results = await runSshJobs(jobs, {
    ...options,
    parallel,
    runner: ctx.runner,
    jobTimeoutMs: flags.timeout,
    onResult: (result) => {
      const block = formatJobResult(result);
      if (values.output) {
        writeReport(values.output, block, { append: true });
      } else {
        out.result(block.replace(/\n$/, ''));
      }
    },
  });

  const successful = results.filter((r) => r.success).length;
  const failed = results.length - successful;

  logger.section('Summary');
  logger.info(`  Total tasks:      ${jobs.length}`);
  logger.info(`  Completed:        ${results.length}`);
  logger.success(`  Successful:       ${successful}`);
  if (failed > 0) {
    logger.error(`  Failed:           ${failed}`);
  } else {
    logger.info(`  Failed:           ${failed}`);
  }
  if (values.output) {
    logger.success(`Output saved to ${values.output}`);
  }

  out.success({
    total: jobs.length,
    completed: results.length,
    successful,
    failed,
    results,
  });

  return failed > 0 ? ExitCode.GENERAL_ERROR : ExitCode.SUCCESS;
}
