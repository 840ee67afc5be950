/**
 * Firewall rule reports
 *
 * Each backend's listing is parsed into FirewallRule records so one set of
 * filters, formats and diffs covers iptables, nftables, ufw and firewalld.
 */

import Ajv from 'ajv';
import { readFileSync, existsSync } from 'node:fs';
import { configError, fileNotFoundError, errorMessage } from '../cli/errors.js';
import type { CommandRunner } from '../exec/runner.js';
import { csvLine, toJsonText } from '../utils/formats.js';

export const FIREWALL_TYPES = ['iptables', 'nftables', 'ufw', 'firewalld'] as const;
export type FirewallType = (typeof FIREWALL_TYPES)[number];

/**
 * Binary that lists each backend's rules
 */
export const FIREWALL_BINARIES: Record<FirewallType, string> = {
  iptables: 'iptables',
  nftables: 'nft',
  ufw: 'ufw',
  firewalld: 'firewall-cmd',
};

const LIST_ARGS: Record<FirewallType, string[]> = {
  iptables: ['-S'],
  nftables: ['list', 'ruleset'],
  ufw: ['status', 'numbered'],
  firewalld: ['--list-all'],
};

export interface FirewallRule {
  firewall: FirewallType;
  /** Chain, zone or ufw direction */
  chain: string;
  protocol: string;
  source: string;
  destination: string;
  inInterface: string;
  outInterface: string;
  sport: string;
  /** Destination port(s), `22`, `8000:8010`, `80,443` or a service name */
  dport: string;
  state: string;
  action: string;
  raw: string;
}

export interface FirewallReport {
  firewall: FirewallType;
  active: boolean;
  /** Default policies by chain */
  policies: Record<string, string>;
  chains: string[];
  rules: FirewallRule[];
  /** Extra key/value facts (firewalld zone settings, nft tables) */
  info: Record<string, string>;
}

function emptyRule(firewall: FirewallType, raw: string): FirewallRule {
  return {
    firewall,
    chain: '',
    protocol: '',
    source: '',
    destination: '',
    inInterface: '',
    outInterface: '',
    sport: '',
    dport: '',
    state: '',
    action: '',
    raw,
  };
}

/**
 * Split a command line into words, keeping double-quoted strings together
 */
export function splitWords(line: string): string[] {
  const words: string[] = [];
  const pattern = /"((?:[^"\\]|\\.)*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(line)) !== null) {
    words.push(match[1] !== undefined ? match[1] : match[2]);
  }
  return words;
}

/**
 * `iptables -S` output: -P policies, -N chains, -A rules
 */
export function parseIptables(output: string): FirewallReport {
  const report: FirewallReport = {
    firewall: 'iptables',
    active: true,
    policies: {},
    chains: [],
    rules: [],
    info: {},
  };

  for (const line of output.split('\n').map((l) => l.trim())) {
    if (!line) continue;
    const words = splitWords(line);
    switch (words[0]) {
      case '-P':
        if (words[1] && words[2]) {
          report.policies[words[1]] = words[2];
          if (!report.chains.includes(words[1])) report.chains.push(words[1]);
        }
        break;
      case '-N':
        if (words[1] && !report.chains.includes(words[1])) report.chains.push(words[1]);
        break;
      case '-A':
        report.rules.push(parseIptablesRule(words, line));
        break;
    }
  }

  return report;
}

function parseIptablesRule(words: string[], raw: string): FirewallRule {
  const rule = emptyRule('iptables', raw);
  rule.chain = words[1] ?? '';

  for (let i = 2; i < words.length; i++) {
    const next = words[i + 1] ?? '';
    switch (words[i]) {
      case '-p':
      case '--protocol':
        rule.protocol = next;
        i++;
        break;
      case '-s':
      case '--source':
        rule.source = next;
        i++;
        break;
      case '-d':
      case '--destination':
        rule.destination = next;
        i++;
        break;
      case '-i':
      case '--in-interface':
        rule.inInterface = next;
        i++;
        break;
      case '-o':
      case '--out-interface':
        rule.outInterface = next;
        i++;
        break;
      case '--sport':
      case '--sports':
        rule.sport = next;
        i++;
        break;
      case '--dport':
      case '--dports':
        rule.dport = next;
        i++;
        break;
      case '--state':
      case '--ctstate':
        rule.state = next;
        i++;
        break;
      case '-j':
      case '--jump':
      case '-g':
      case '--goto':
        rule.action = next;
        i++;
        break;
    }
  }

  return rule;
}

/**
 * `ufw status numbered`
 *
 *   Status: active
 *        To                         Action      From
 *   [ 1] 22/tcp                     ALLOW IN    Anywhere
 *   [ 2] 80/tcp on eth0             DENY IN     10.0.0.0/8
 *   [ 3] 22/tcp (v6)                ALLOW IN    Anywhere (v6)
 */
export function parseUfw(output: string): FirewallReport {
  const report: FirewallReport = {
    firewall: 'ufw',
    active: /^Status:\s*active/m.test(output),
    policies: {},
    chains: [],
    rules: [],
    info: {},
  };

  const rulePattern = /^\[\s*(\d+)\]\s+(.+?)\s+(ALLOW|DENY|REJECT|LIMIT)(?:\s+(IN|OUT|FWD))?\s+(.+?)\s*$/;
  for (const line of output.split('\n')) {
    const match = rulePattern.exec(line.trim());
    if (!match) continue;

    const [, , toText, action, direction, fromText] = match;
    const rule = emptyRule('ufw', line.trim());
    const v6 = /\(v6\)/.test(toText) || /\(v6\)/.test(fromText);
    let to = toText.replace(/\s*\(v6\)/, '').trim();

    const onIface = /\s+on\s+(\S+)$/.exec(to);
    if (onIface) {
      if (direction === 'OUT') rule.outInterface = onIface[1];
      else rule.inInterface = onIface[1];
      to = to.slice(0, onIface.index).trim();
    }

    const portMatch = /^(\d+(?::\d+)?(?:,\d+)*)(?:\/(tcp|udp))?$/.exec(to);
    if (portMatch) {
      rule.dport = portMatch[1];
      rule.protocol = portMatch[2] ?? '';
    } else {
      const addressPort = /^(\S+)\s+(\d+(?::\d+)?)(?:\/(tcp|udp))?$/.exec(to);
      if (addressPort) {
        rule.destination = addressPort[1];
        rule.dport = addressPort[2];
        rule.protocol = addressPort[3] ?? '';
      } else {
        rule.destination = to;
      }
    }

    rule.chain = direction ?? 'IN';
    rule.action = action;
    rule.source = fromText.replace(/\s*\(v6\)/, '').trim();
    rule.state = v6 ? 'v6' : '';
    report.rules.push(rule);
    if (!report.chains.includes(rule.chain)) report.chains.push(rule.chain);
  }

  report.info = { rules: String(report.rules.length) };
  return report;
}

const NFT_ACTION = /\b(accept|drop|reject|return|masquerade|(?:jump|goto)\s+\S+|(?:dnat|snat)\s+to\s+\S+)\s*$/;

/**
 * `nft list ruleset`: tables, chains with hook/policy, and rule lines.
 * Set, map and other nested blocks are skipped.
 */
export function parseNftables(output: string): FirewallReport {
  const report: FirewallReport = {
    firewall: 'nftables',
    active: true,
    policies: {},
    chains: [],
    rules: [],
    info: {},
  };

  const stack: { kind: 'table' | 'chain' | 'other'; name: string }[] = [];
  const tables: string[] = [];

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    if (line === '}') {
      stack.pop();
      continue;
    }

    const table = /^table\s+(\S+)\s+(\S+)\s*\{$/.exec(line);
    if (table) {
      const name = `${table[1]} ${table[2]}`;
      tables.push(name);
      stack.push({ kind: 'table', name });
      continue;
    }

    const chain = /^chain\s+(\S+)\s*\{$/.exec(line);
    if (chain) {
      const tableName = stack.length > 0 ? stack[stack.length - 1].name : '';
      const name = tableName ? `${tableName}/${chain[1]}` : chain[1];
      report.chains.push(name);
      stack.push({ kind: 'chain', name });
      continue;
    }

    if (line.endsWith('{')) {
      stack.push({ kind: 'other', name: line });
      continue;
    }

    const current = stack[stack.length - 1];
    if (!current || current.kind !== 'chain') continue;

    if (/^type\s+\S+\s+hook\s+/.test(line)) {
      const hook = /hook\s+(\S+)/.exec(line);
      const policy = /policy\s+(\w+)/.exec(line);
      if (policy) report.policies[current.name] = policy[1];
      if (hook) report.info[`${current.name}.hook`] = hook[1];
      continue;
    }

    report.rules.push(parseNftRule(current.name, line));
  }

  report.info.tables = tables.join(', ');
  return report;
}

function parseNftRule(chain: string, line: string): FirewallRule {
  const rule = emptyRule('nftables', line);
  rule.chain = chain;

  const valueAfter = (keyword: RegExp): string => {
    const match = keyword.exec(line);
    if (!match) return '';
    return match[1].replace(/[{}\s]/g, '');
  };

  rule.protocol = valueAfter(/\b(tcp|udp|icmp|icmpv6)\b/);
  rule.dport = valueAfter(/\bdport\s+(\{[^}]*\}|\S+)/);
  rule.sport = valueAfter(/\bsport\s+(\{[^}]*\}|\S+)/);
  rule.source = valueAfter(/\bsaddr\s+(\{[^}]*\}|\S+)/);
  rule.destination = valueAfter(/\bdaddr\s+(\{[^}]*\}|\S+)/);
  rule.inInterface = valueAfter(/\biifname\s+"?([^"\s]+)"?/);
  rule.outInterface = valueAfter(/\boifname\s+"?([^"\s]+)"?/);
  rule.state = valueAfter(/\bct\s+state\s+(\{[^}]*\}|\S+)/);
  const action = NFT_ACTION.exec(line);
  rule.action = action ? action[1] : '';
  return rule;
}

/**
 * `firewall-cmd --list-all`
 *
 *   public (active)
 *     interfaces: eth0
 *     services: ssh dhcpv6-client
 *     ports: 8080/tcp
 *     rich rules:
 *       rule family="ipv4" source address="10.0.0.0/8" port port="22" protocol="tcp" accept
 */
export function parseFirewalld(output: string): FirewallReport {
  const report: FirewallReport = {
    firewall: 'firewalld',
    active: false,
    policies: {},
    chains: [],
    rules: [],
    info: {},
  };

  let zone = '';
  let inRichRules = false;
  let interfaces: string[] = [];
  const services: string[] = [];
  const ports: string[] = [];
  const richRules: string[] = [];

  for (const rawLine of output.split('\n')) {
    if (!rawLine.trim()) continue;

    if (!/^\s/.test(rawLine)) {
      const header = /^(\S+)(?:\s+\(([^)]*)\))?/.exec(rawLine.trim());
      if (header) {
        zone = header[1];
        report.active = (header[2] ?? '').includes('active');
        report.chains.push(zone);
      }
      inRichRules = false;
      continue;
    }

    const line = rawLine.trim();
    const keyValue = /^([a-z][a-z -]*):\s*(.*)$/.exec(line);
    if (keyValue && !line.startsWith('rule ')) {
      const [, key, value] = keyValue;
      inRichRules = key === 'rich rules';
      switch (key) {
        case 'target':
          report.policies[zone] = value;
          break;
        case 'interfaces':
          interfaces = value.split(/\s+/).filter(Boolean);
          break;
        case 'services':
          services.push(...value.split(/\s+/).filter(Boolean));
          break;
        case 'ports':
          ports.push(...value.split(/\s+/).filter(Boolean));
          break;
        case 'rich rules':
          if (value) richRules.push(value);
          break;
      }
      if (key !== 'rich rules') report.info[key] = value;
      continue;
    }

    if (inRichRules) {
      richRules.push(line);
    }
  }

  const inInterface = interfaces.join(',');
  for (const service of services) {
    report.rules.push({ ...emptyRule('firewalld', `service ${service}`), chain: zone, dport: service, action: 'accept', inInterface });
  }
  for (const port of ports) {
    const [number, protocol] = port.split('/');
    report.rules.push({
      ...emptyRule('firewalld', `port ${port}`),
      chain: zone,
      dport: number.replace('-', ':'),
      protocol: protocol ?? '',
      action: 'accept',
      inInterface,
    });
  }
  for (const text of richRules) {
    report.rules.push(parseRichRule(zone, text, inInterface));
  }

  return report;
}

function parseRichRule(zone: string, text: string, inInterface: string): FirewallRule {
  const rule = emptyRule('firewalld', text);
  const attr = (pattern: RegExp): string => pattern.exec(text)?.[1] ?? '';
  rule.chain = zone;
  rule.inInterface = inInterface;
  rule.source = attr(/source address="([^"]+)"/);
  rule.destination = attr(/destination address="([^"]+)"/);
  rule.dport = attr(/port port="([^"]+)"/).replace('-', ':') || attr(/service name="([^"]+)"/);
  rule.protocol = attr(/protocol="([^"]+)"/);
  rule.action = attr(/\b(accept|reject|drop|mark)\b\s*(?:limit.*)?$/) || attr(/\b(accept|reject|drop)\b/);
  return rule;
}

const PARSERS: Record<FirewallType, (output: string) => FirewallReport> = {
  iptables: parseIptables,
  nftables: parseNftables,
  ufw: parseUfw,
  firewalld: parseFirewalld,
};

export function parseFirewallOutput(type: FirewallType, output: string): FirewallReport {
  return PARSERS[type](output);
}

export async function collectFirewall(type: FirewallType, runner: CommandRunner, timeoutMs: number): Promise<FirewallReport> {
  const binary = FIREWALL_BINARIES[type];
  const result = await runner(binary, LIST_ARGS[type], { timeoutMs });
  if (!result.success) {
    const reason = result.error ?? (result.stderr.trim() || `exit code ${result.exitCode}`);
    throw new Error(`${binary} ${LIST_ARGS[type].join(' ')} failed: ${reason}`);
  }
  return parseFirewallOutput(type, result.stdout);
}

/**
 * Whether a port expression (`22`, `8000:8010`, `80,443`, `1000-2000`)
 * covers `port`
 */
export function portMatches(expression: string, port: number): boolean {
  return expression
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .some((part) => {
      const range = /^(\d+)[:-](\d+)$/.exec(part);
      if (range) return port >= Number(range[1]) && port <= Number(range[2]);
      return /^\d+$/.test(part) && Number(part) === port;
    });
}

export interface RuleFilter {
  port?: number;
  iface?: string;
}

export function filterRules(rules: FirewallRule[], filter: RuleFilter): FirewallRule[] {
  return rules.filter((rule) => {
    if (filter.port !== undefined && !portMatches(rule.dport, filter.port) && !portMatches(rule.sport, filter.port)) {
      return false;
    }
    if (filter.iface !== undefined) {
      const ifaces = [...rule.inInterface.split(','), ...rule.outInterface.split(',')];
      if (!ifaces.includes(filter.iface)) return false;
    }
    return true;
  });
}

export interface FirewallSummary {
  firewall: FirewallType;
  active: boolean;
  chains: number;
  rules: number;
  /** Rule count per action */
  actions: Record<string, number>;
}

export function summarize(report: FirewallReport): FirewallSummary {
  const actions: Record<string, number> = {};
  for (const rule of report.rules) {
    const action = rule.action || 'none';
    actions[action] = (actions[action] ?? 0) + 1;
  }
  return {
    firewall: report.firewall,
    active: report.active,
    chains: report.chains.length,
    rules: report.rules.length,
    actions,
  };
}

export const FIREWALL_FORMATS = ['plain', 'json', 'csv'] as const;
export type FirewallFormat = (typeof FIREWALL_FORMATS)[number];

export const CSV_HEADER = [
  'Firewall',
  'Chain',
  'Protocol',
  'Source',
  'Destination',
  'In',
  'Out',
  'Port',
  'State',
  'Action',
  'Rule',
];

function ruleValues(rule: FirewallRule): string[] {
  return [
    rule.firewall,
    rule.chain,
    rule.protocol,
    rule.source,
    rule.destination,
    rule.inInterface,
    rule.outInterface,
    rule.dport,
    rule.state,
    rule.action,
    rule.raw,
  ];
}

export function renderFirewallReport(format: FirewallFormat, generatedAt: string, reports: FirewallReport[]): string {
  switch (format) {
    case 'json':
      return toJsonText({ generated_at: generatedAt, firewalls: reports });
    case 'csv':
      return [CSV_HEADER.join(','), ...reports.flatMap((r) => r.rules.map((rule) => csvLine(ruleValues(rule))))].join('\n') + '\n';
    case 'plain': {
      const lines = [`Firewall rules report (${generatedAt})`, ''];
      for (const report of reports) {
        lines.push(`=== ${report.firewall}${report.active ? '' : ' (inactive)'} ===`);
        for (const [chain, policy] of Object.entries(report.policies)) {
          lines.push(`Policy ${chain}: ${policy}`);
        }
        for (const rule of report.rules) {
          lines.push(rule.raw);
        }
        lines.push('');
      }
      return lines.join('\n');
    }
  }
}

interface PreviousReport {
  firewalls: { firewall: string; rules: { raw: string }[] }[];
}

const ajv = new Ajv({ allErrors: true });
const validatePrevious = ajv.compile<PreviousReport>({
  type: 'object',
  required: ['firewalls'],
  properties: {
    firewalls: {
      type: 'array',
      items: {
        type: 'object',
        required: ['firewall', 'rules'],
        properties: {
          firewall: { type: 'string' },
          rules: {
            type: 'array',
            items: { type: 'object', required: ['raw'], properties: { raw: { type: 'string' } } },
          },
        },
      },
    },
  },
});

export function loadPreviousReport(path: string): PreviousReport {
  if (!existsSync(path)) {
    throw fileNotFoundError(path);
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw configError(`Cannot parse previous report ${path}: ${errorMessage(error)}`, { path });
  }
  if (!validatePrevious(data)) {
    throw configError(`${path} is not a JSON firewall report`, {
      path,
      errors: (validatePrevious.errors ?? []).map((e) => `${e.instancePath || '(root)'} ${e.message ?? ''}`),
    });
  }
  return data;
}

export interface FirewallDiff {
  firewall: string;
  added: string[];
  removed: string[];
}

/**
 * Rule lines added and removed per firewall since the previous report
 */
export function diffReports(previous: PreviousReport, current: FirewallReport[]): FirewallDiff[] {
  const before = new Map<string, string[]>(previous.firewalls.map((f) => [f.firewall, f.rules.map((r) => r.raw)]));
  const after = new Map<string, string[]>(current.map((r) => [r.firewall, r.rules.map((rule) => rule.raw)]));
  const names = [...new Set([...after.keys(), ...before.keys()])];

  return names.map((firewall) => {
    const oldRules = before.get(firewall) ?? [];
    const newRules = after.get(firewall) ?? [];
    const oldSet = new Set(oldRules);
    const newSet = new Set(newRules);
    return {
      firewall,
      added: newRules.filter((raw) => !oldSet.has(raw)),
      removed: oldRules.filter((raw) => !newSet.has(raw)),
    };
  });
}
