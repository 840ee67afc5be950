#!/usr/bin/env node
/**
 * opskit - Operations toolkit
 * Entry point for the CLI
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parseGlobalFlags, applyGlobalFlags, type GlobalFlags } from './cli/flags.js';
import { CliError, ErrorCode, ExitCode, errorMessage, toCliError } from './cli/errors.js';
import { outputJsonError } from './cli/output.js';
import { didYouMean, helpHint, EXIT_CODES } from './cli/help.js';
import { ENV_VAR_DOCS } from './cli/env.js';
import { scanCommand } from './commands/scan.js';
import { sshCommand } from './commands/ssh.js';
import { dnsCommand } from './commands/dns.js';
import { blacklistCommand } from './commands/blacklist.js';
import { bandwidthCommand } from './commands/bandwidth.js';
import { firewallCommand } from './commands/firewall.js';
import { diskCommand } from './commands/disk.js';
import { httpCommand } from './commands/http.js';
import { sslCommand } from './commands/ssl.js';
import { integrityCommand } from './commands/integrity.js';
import { loginsCommand } from './commands/logins.js';
import { logsCommand } from './commands/logs.js';
import { backupCommand } from './commands/backup.js';
import { k8sCommand } from './commands/k8s.js';
import { csv2jsonCommand } from './commands/csv2json.js';
import { publicIpCommand } from './commands/public-ip.js';
import { configCommand } from './commands/config.js';

type CommandHandler = (args: string[], flags: GlobalFlags) => Promise<ExitCode>;

interface CommandEntry {
  run: CommandHandler;
  summary: string;
}

export const COMMANDS: Record<string, CommandEntry> = {
  scan: { run: scanCommand, summary: 'TCP port scan of hosts, ranges and CIDR blocks' },
  ssh: { run: sshCommand, summary: 'Run a command on many hosts over SSH' },
  dns: { run: dnsCommand, summary: 'DNS resolution latency per nameserver' },
  blacklist: { run: blacklistCommand, summary: 'Check IPs against DNS blocklists' },
  bandwidth: { run: bandwidthCommand, summary: 'Interface throughput from /proc/net/dev' },
  firewall: { run: firewallCommand, summary: 'Snapshot and diff firewall rules' },
  disk: { run: diskCommand, summary: 'Disk usage thresholds' },
  http: { run: httpCommand, summary: 'HTTP endpoint health checks' },
  ssl: { run: sslCommand, summary: 'TLS certificate expiry' },
  integrity: { run: integrityCommand, summary: 'File integrity baselines and checks' },
  logins: { run: loginsCommand, summary: 'Failed login detection and blocking' },
  logs: { run: logsCommand, summary: 'Clean up and rotate log files' },
  backup: { run: backupCommand, summary: 'Back up files with retention' },
  k8s: { run: k8sCommand, summary: 'Kubernetes node status' },
  csv2json: { run: csv2jsonCommand, summary: 'Convert CSV to JSON' },
  'public-ip': { run: publicIpCommand, summary: 'Show the public IP address' },
  config: { run: configCommand, summary: 'Manage configuration' },
};

// package.json sits two levels up from dist/src and one up from src
function getVersion(): string {
  const paths = [join(__dirname, '..', '..', 'package.json'), join(__dirname, '..', 'package.json')];
  for (const p of paths) {
    if (!existsSync(p)) continue;
    const pkg: unknown = JSON.parse(readFileSync(p, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && pkg.name === 'opskit' && 'version' in pkg) {
      return String(pkg.version);
    }
  }
  return '0.0.0';
}

export const VERSION = getVersion();

const HELP = [
  'opskit - Operations toolkit for servers, networks and certificates',
  '',
  'USAGE:',
  '  opskit <command> [options]',
  '',
  'COMMANDS:',
  ...Object.entries(COMMANDS).map(([name, entry]) => `  ${name.padEnd(18)}${entry.summary}`),
  '',
  'GLOBAL OPTIONS:',
  '  -h, --help        Show help',
  '  --version         Show version',
  '  -j, --json        Output as JSON',
  '  -q, --quiet       Minimal output',
  '  -v, --verbose     Detailed output',
  '  --no-color        Disable colored output',
  '  --config <path>   Custom config file path',
  '  --dry-run         Show what would change without changing it',
  '  --timeout <dur>   Per-operation timeout (e.g., 500ms, 5s)',
  '  --no-notify       Skip notification hooks',
  '',
  'ENVIRONMENT VARIABLES:',
  ...ENV_VAR_DOCS.map((env) => `  ${env.name.padEnd(20)}${env.description}`),
  '',
  'EXIT CODES:',
  ...EXIT_CODES.map(([code, desc]) => `  ${code}  ${desc}`),
  '',
  'EXAMPLES:',
  '  opskit scan 192.168.1.0/24 -p 22,80,443',
  '  opskit disk -w 80 -c 90',
  '  opskit ssl -d example.com -d example.org --json',
  '  opskit integrity init -p /etc',
  '',
].join('\n');

function reportError(error: unknown, command: string, flags: Pick<GlobalFlags, 'json' | 'verbose'>): ExitCode {
  const cliError = toCliError(error);
  if (flags.json) {
    outputJsonError(command, null, cliError.code, cliError.message, cliError.details);
  } else {
    console.error(`Error: ${cliError.message}`);
    if (flags.verbose && cliError.details) {
      console.error('Details:', JSON.stringify(cliError.details, null, 2));
    }
    if (flags.verbose && !(error instanceof CliError) && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
  return cliError.exitCode;
}

/**
 * Parse argv, dispatch to a command and return the exit code
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<ExitCode> {
  let flags: Pick<GlobalFlags, 'json' | 'verbose'> = { json: false, verbose: false };
  let command = 'opskit';

  try {
    const parsed = parseGlobalFlags(argv, env);
    flags = parsed.flags;
    applyGlobalFlags(parsed.flags);
    const [name, ...commandArgs] = parsed.remaining;

    if (name === undefined) {
      if (parsed.flags.version) {
        console.log(parsed.flags.json ? JSON.stringify({ version: VERSION }, null, 2) : `opskit v${VERSION}`);
      } else {
        console.log(HELP);
      }
      return ExitCode.SUCCESS;
    }

    const entry = Object.prototype.hasOwnProperty.call(COMMANDS, name) ? COMMANDS[name] : undefined;
    if (!entry) {
      const suggestion = didYouMean(name, Object.keys(COMMANDS));
      throw new CliError(
        ErrorCode.INVALID_ARGUMENTS,
        `Unknown command: ${name}${suggestion ? `. ${suggestion}` : ''}`,
        { command: name }
      );
    }

    command = name;
    return await entry.run(commandArgs, parsed.flags);
  } catch (error) {
    const code = reportError(error, command, flags);
    if (!flags.json && command === 'opskit' && error instanceof CliError) {
      console.error(helpHint());
    }
    return code;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = ExitCode.GENERAL_ERROR;
    }
  );
}
