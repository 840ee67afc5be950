/**
 * Kubernetes node status from `kubectl get nodes -o json` and usage from
 * `kubectl top nodes`
 */

import type { CommandRunner } from '../exec/runner.js';
import { CliError, ErrorCode, errorMessage } from '../cli/errors.js';

export type NodeCondition = 'Ready' | 'NotReady' | 'Unknown';

export interface NodeInfo {
  name: string;
  condition: NodeCondition;
  /** `Ready`, or `Ready,SchedulingDisabled` when cordoned */
  status: string;
  ready: boolean;
  roles: string[];
  version: string;
  internalIp: string;
  createdAt: string;
  /** Active pressure conditions, e.g. DiskPressure */
  pressures: string[];
  capacity: { cpu: string; memory: string };
  allocatable: { cpu: string; memory: string };
  taints: string[];
}

const ROLE_LABEL_PREFIX = 'node-role.kubernetes.io/';
const PRESSURE_CONDITIONS = ['MemoryPressure', 'DiskPressure', 'PIDPressure', 'NetworkUnavailable'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function nodeRoles(labels: Record<string, unknown>): string[] {
  const roles = new Set<string>();
  for (const [key, value] of Object.entries(labels)) {
    if (key.startsWith(ROLE_LABEL_PREFIX) && key.length > ROLE_LABEL_PREFIX.length) {
      roles.add(key.slice(ROLE_LABEL_PREFIX.length));
    } else if (key === 'kubernetes.io/role' && typeof value === 'string' && value) {
      roles.add(value);
    }
  }
  return [...roles].sort();
}

export function formatTaint(taint: Record<string, unknown>): string {
  const key = text(taint.key);
  const value = text(taint.value);
  const effect = text(taint.effect);
  return `${key}${value ? `=${value}` : ''}${effect ? `:${effect}` : ''}`;
}

export function parseNode(item: unknown): NodeInfo {
  const node = record(item);
  const metadata = record(node.metadata);
  const spec = record(node.spec);
  const status = record(node.status);
  const conditions = records(status.conditions);

  const readyCondition = conditions.find((c) => c.type === 'Ready');
  const condition: NodeCondition =
    readyCondition?.status === 'True' ? 'Ready' : readyCondition?.status === 'False' ? 'NotReady' : 'Unknown';
  const capacity = record(status.capacity);
  const allocatable = record(status.allocatable);

  return {
    name: text(metadata.name),
    condition,
    status: spec.unschedulable === true ? `${condition},SchedulingDisabled` : condition,
    ready: condition === 'Ready',
    roles: nodeRoles(record(metadata.labels)),
    version: text(record(status.nodeInfo).kubeletVersion),
    internalIp: text(records(status.addresses).find((a) => a.type === 'InternalIP')?.address),
    createdAt: text(metadata.creationTimestamp),
    pressures: conditions
      .filter((c) => typeof c.type === 'string' && PRESSURE_CONDITIONS.includes(c.type) && c.status === 'True')
      .map((c) => text(c.type)),
    capacity: { cpu: text(capacity.cpu), memory: text(capacity.memory) },
    allocatable: { cpu: text(allocatable.cpu), memory: text(allocatable.memory) },
    taints: records(spec.taints).map(formatTaint),
  };
}

/**
 * A NodeList, or a single Node when one name was requested
 */
export function parseNodes(json: string): NodeInfo[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new CliError(ErrorCode.COMMAND_FAILED, `kubectl returned invalid JSON: ${errorMessage(error)}`);
  }
  const root = record(data);
  if (root.kind === 'Node') {
    return [parseNode(root)];
  }
  if (!Array.isArray(root.items)) {
    throw new CliError(ErrorCode.COMMAND_FAILED, 'kubectl output has no node items');
  }
  return root.items.map(parseNode);
}

export function kubectlArgs(options: { node?: string; selector?: string }): string[] {
  const args = ['get', 'nodes'];
  if (options.node) args.push(options.node);
  if (options.selector) args.push('-l', options.selector);
  args.push('-o', 'json');
  return args;
}

export async function fetchNodes(
  runner: CommandRunner,
  options: { node?: string; selector?: string; timeoutMs: number }
): Promise<NodeInfo[]> {
  const result = await runner('kubectl', kubectlArgs(options), { timeoutMs: options.timeoutMs });
  if (!result.success) {
    const detail = result.stderr.trim() || result.error || 'unknown error';
    if (/NotFound/.test(detail)) {
      throw new CliError(ErrorCode.NOT_FOUND, `Node not found: ${options.node ?? ''}`.trim(), { detail });
    }
    throw new CliError(ErrorCode.COMMAND_FAILED, `kubectl get nodes failed: ${detail}`);
  }
  return parseNodes(result.stdout);
}

export interface NodeUsage {
  /** As kubectl prints it, e.g. 250m */
  cpu: string;
  cpuMillicores: number;
  cpuPercent: number | null;
  /** As kubectl prints it, e.g. 1024Mi */
  memory: string;
  memoryBytes: number;
  memoryPercent: number | null;
}

const MEMORY_UNITS: Record<string, number> = {
  '': 1,
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
};

/**
 * Kubernetes CPU quantity in millicores: `2` is 2000, `250m` is 250
 */
export function cpuMillicores(quantity: string): number {
  const match = /^(\d+(?:\.\d+)?)(n|u|m)?$/.exec(quantity);
  if (!match) return Number.NaN;
  const value = Number(match[1]);
  switch (match[2]) {
    case 'n':
      return value / 1e6;
    case 'u':
      return value / 1e3;
    case 'm':
      return value;
    default:
      return value * 1000;
  }
}

export function memoryBytes(quantity: string): number {
  const match = /^(\d+(?:\.\d+)?)([kKMGT]i?)?$/.exec(quantity);
  if (!match) return Number.NaN;
  const multiplier = MEMORY_UNITS[match[2] ?? ''];
  return multiplier === undefined ? Number.NaN : Number(match[1]) * multiplier;
}

function percent(field: string): number | null {
  const match = /^(\d+)%$/.exec(field);
  return match ? Number(match[1]) : null;
}

/**
 * Rows of `kubectl top nodes --no-headers`: name, cpu, cpu%, memory, memory%
 */
export function parseTopNodes(output: string): Map<string, NodeUsage> {
  const usage = new Map<string, NodeUsage>();
  for (const line of output.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 5) continue;
    const [name, cpu, cpuPct, memory, memoryPct] = fields;
    usage.set(name, {
      cpu,
      cpuMillicores: cpuMillicores(cpu),
      cpuPercent: percent(cpuPct),
      memory,
      memoryBytes: memoryBytes(memory),
      memoryPercent: percent(memoryPct),
    });
  }
  return usage;
}

export function topArgs(options: { node?: string; selector?: string }): string[] {
  const args = ['top', 'nodes'];
  if (options.node) args.push(options.node);
  if (options.selector) args.push('-l', options.selector);
  args.push('--no-headers');
  return args;
}

/**
 * Current usage per node; needs metrics-server in the cluster
 */
export async function fetchNodeUsage(
  runner: CommandRunner,
  options: { node?: string; selector?: string; timeoutMs: number }
): Promise<Map<string, NodeUsage>> {
  const result = await runner('kubectl', topArgs(options), { timeoutMs: options.timeoutMs });
  if (!result.success) {
    const detail = result.stderr.trim() || result.error || 'unknown error';
    throw new CliError(ErrorCode.COMMAND_FAILED, `kubectl top nodes failed: ${detail}`);
  }
  return parseTopNodes(result.stdout);
}

export const NODE_ROLES = ['control-plane', 'master', 'worker'] as const;
export type NodeRole = (typeof NODE_ROLES)[number];

/**
 * `master` and `control-plane` are the same role; nodes without a role
 * label count as workers
 */
export function hasRole(node: NodeInfo, role: NodeRole): boolean {
  if (role === 'worker') {
    return node.roles.length === 0 || node.roles.includes('worker');
  }
  return node.roles.includes('control-plane') || node.roles.includes('master');
}

export const SORT_FIELDS = ['name', 'status', 'age', 'cpu', 'memory'] as const;
export type NodeSortField = (typeof SORT_FIELDS)[number];

/**
 * Sort by name, by status (not ready first), by age (oldest first), or by
 * cpu or memory usage (busiest first, nodes without metrics last)
 */
export function sortNodes(
  nodes: NodeInfo[],
  field: NodeSortField,
  usage: Map<string, NodeUsage> = new Map()
): NodeInfo[] {
  const byName = (a: NodeInfo, b: NodeInfo): number => a.name.localeCompare(b.name);
  const used = (node: NodeInfo, key: 'cpuMillicores' | 'memoryBytes'): number => {
    const value = usage.get(node.name)?.[key];
    return value === undefined || Number.isNaN(value) ? -1 : value;
  };
  const sorted = [...nodes];
  switch (field) {
    case 'name':
      return sorted.sort(byName);
    case 'status':
      return sorted.sort((a, b) => Number(a.ready) - Number(b.ready) || a.status.localeCompare(b.status) || byName(a, b));
    case 'age':
      return sorted.sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt) || byName(a, b));
    case 'cpu':
      return sorted.sort((a, b) => used(b, 'cpuMillicores') - used(a, 'cpuMillicores') || byName(a, b));
    case 'memory':
      return sorted.sort((a, b) => used(b, 'memoryBytes') - used(a, 'memoryBytes') || byName(a, b));
  }
}

/**
 * kubectl-style short age: 45s, 12m, 5h, 30d
 */
export function formatAge(createdAt: string, now: Date): string {
  const created = Date.parse(createdAt);
  if (Number.isNaN(created)) return '<unknown>';
  const seconds = Math.max(0, Math.floor((now.getTime() - created) / 1000));
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h`;
  return `${Math.floor(hours / 24)}d`;
}

export function roleText(node: NodeInfo): string {
  return node.roles.length > 0 ? node.roles.join(',') : '<none>';
}
