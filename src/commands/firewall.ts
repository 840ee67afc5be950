/**
 * opskit firewall - Report firewall rules
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, errorMessage, missingDependencyError } from '../cli/errors.js';
import { choiceOption, intOption } from '../cli/options.js';
import { writeReport } from '../utils/formats.js';
import {
  collectFirewall,
  diffReports,
  filterRules,
  loadPreviousReport,
  renderFirewallReport,
  summarize,
  FIREWALL_BINARIES,
  FIREWALL_FORMATS,
  FIREWALL_TYPES,
  type FirewallReport,
  type FirewallType,
} from '../net/firewall.js';

const TYPE_CHOICES = ['auto', 'all', ...FIREWALL_TYPES] as const;

const HELP = generateHelp({
  command: 'firewall',
  description: 'Report firewall rules from iptables, nftables, ufw and firewalld',
  usage: ['opskit firewall [options]'],
  details: `auto reports every firewall whose tool is installed. Reading rules usually
needs root.`,
  options: [
    { short: 't', long: 'type', description: 'Firewall to read', values: TYPE_CHOICES.join('|'), default: 'auto' },
    { short: 'p', long: 'port', description: 'Only rules covering this port', values: '<port>' },
    { short: 'i', long: 'interface', description: 'Only rules on this interface', values: '<name>' },
    { short: 'S', long: 'summary', description: 'Print rule counts only' },
    { short: 'f', long: 'format', description: 'Output format', values: FIREWALL_FORMATS.join('|'), default: 'plain' },
    { short: 'o', long: 'output', description: 'Write the report to a file', values: '<file>' },
    { short: 'd', long: 'diff', description: 'Compare with a previous JSON report', values: '<file>' },
  ],
  examples: [
    { command: 'sudo opskit firewall', description: 'Report every installed firewall' },
    { command: 'sudo opskit firewall -t iptables -p 22', description: 'iptables rules for SSH' },
    { command: 'sudo opskit firewall -f json -o today.json -d yesterday.json', description: 'Save and diff' },
  ],
});

export interface FirewallCommandOverrides extends ContextOverrides {
  isRoot?: boolean;
}

export async function firewallCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: FirewallCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values } = parseArgs({
    args,
    options: {
      type: { type: 'string', short: 't' },
      port: { type: 'string', short: 'p' },
      interface: { type: 'string', short: 'i' },
      summary: { type: 'boolean', short: 'S', default: false },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      diff: { type: 'string', short: 'd' },
    },
    allowPositionals: false,
  });

  const ctx = createContext('firewall', flags, overrides);
  const { logger, out } = ctx;

  const type = choiceOption('type', values.type, TYPE_CHOICES, 'auto');
  const port = values.port === undefined ? undefined : intOption('port', values.port, 0, { min: 1, max: 65535 });
  const format = choiceOption('format', values.format, FIREWALL_FORMATS, 'plain');
  const previous = values.diff ? loadPreviousReport(values.diff) : undefined;

  const isRoot = overrides.isRoot ?? (typeof process.getuid === 'function' ? process.getuid() === 0 : true);
  if (!isRoot) {
    logger.warning('Not running as root; some firewall rules may not be readable');
  }

  let types: FirewallType[];
  if (type === 'auto' || type === 'all') {
    types = FIREWALL_TYPES.filter((t) => ctx.exists(FIREWALL_BINARIES[t]));
    if (types.length === 0) {
      throw missingDependencyError('iptables, nft, ufw or firewall-cmd', 'no supported firewall is installed');
    }
  } else {
    if (!ctx.exists(FIREWALL_BINARIES[type])) {
      throw missingDependencyError(FIREWALL_BINARIES[type]);
    }
    types = [type];
  }

  const timeoutMs = flags.timeout ?? 30_000;
  const reports: FirewallReport[] = [];
  let failures = 0;
  for (const t of types) {
    try {
      const report = await collectFirewall(t, ctx.runner, timeoutMs);
      reports.push({ ...report, rules: filterRules(report.rules, { port, iface: values.interface }) });
      logger.debug(`${t}: ${report.rules.length} rule(s)`);
    } catch (error) {
      failures++;
      logger.error(errorMessage(error));
    }
  }

  const summaries = reports.map(summarize);
  const generatedAt = new Date().toISOString();

  if (values.summary) {
    out.table(
      ['Firewall', 'Active', 'Chains', 'Rules', 'Actions'],
      summaries.map((s) => [
        s.firewall,
        s.active ? 'yes' : 'no',
        String(s.chains),
        String(s.rules),
        Object.entries(s.actions)
          .map(([action, count]) => `${action}=${count}`)
          .join(' '),
      ]),
      { alignRight: [2, 3] }
    );
  } else if (!values.output && !out.isJson()) {
    out.result(renderFirewallReport(format, generatedAt, reports).trimEnd());
  }

  if (values.output) {
    writeReport(values.output, renderFirewallReport(format, generatedAt, reports));
    logger.success(`Report saved to ${values.output}`);
  }

  const diff = previous ? diffReports(previous, reports) : undefined;
  if (diff) {
    logger.section('Changes since previous report');
    const changed = diff.filter((d) => d.added.length > 0 || d.removed.length > 0);
    if (changed.length === 0) {
      logger.info('No differences found');
    }
    for (const d of changed) {
      out.result(`${d.firewall}:`);
      for (const raw of d.added) out.result(`  + ${raw}`);
      for (const raw of d.removed) out.result(`  - ${raw}`);
    }
  }

  out.success({ generated_at: generatedAt, summary: summaries, firewalls: reports, ...(diff ? { diff } : {}) });
  return failures > 0 ? ExitCode.GENERAL_ERROR : ExitCode.SUCCESS;
}
