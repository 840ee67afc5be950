/**
 * opskit k8s - Kubernetes checks
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type CommandContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, invalidArgumentsError } from '../cli/errors.js';
import { choiceOption, intOption, numberOption, timeoutOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { formatTimestamp } from '../cli/logger.js';
import { requireCommands } from '../exec/runner.js';
import {
  fetchNodeUsage,
  fetchNodes,
  formatAge,
  hasRole,
  roleText,
  sortNodes,
  NODE_ROLES,
  SORT_FIELDS,
  type NodeRole,
  type NodeSortField,
  type NodeUsage,
} from '../containers/k8s-nodes.js';

const HELP = generateHelp({
  command: 'k8s',
  description: 'Kubernetes cluster checks',
  usage: ['opskit k8s nodes [name] [options]'],
  details: `Exit code 7 when any listed node is not Ready. Sorting by cpu or memory
and --usage read \`kubectl top nodes\`, which needs metrics-server.`,
  subcommands: [{ name: 'nodes', args: '[name]', description: 'Node status, roles and resources' }],
  options: [
    { short: 'l', long: 'selector', description: 'Label selector passed to kubectl', values: '<selector>' },
    { long: 'role', description: 'Only nodes with this role', values: NODE_ROLES.join('|') },
    { long: 'sort', description: 'Sort order', values: SORT_FIELDS.join('|'), default: 'name' },
    { long: 'detailed', description: 'Show resources, pressure conditions and taints' },
    { long: 'usage', description: 'Add current CPU and memory usage columns' },
    { short: 'w', long: 'watch', description: 'Refresh every interval', values: '<seconds>' },
    { long: 'count', description: 'Stop watching after this many refreshes (0 = never)', values: '<n>', default: '0' },
    { short: 't', long: 'timeout', description: 'kubectl timeout in seconds', values: '<s>', default: '30' },
  ],
  examples: [
    { command: 'opskit k8s nodes', description: 'All nodes' },
    { command: 'opskit k8s nodes --role worker --sort status', description: 'Unhealthy workers first' },
    { command: 'opskit k8s nodes node-1 --detailed', description: 'One node in detail' },
    { command: 'opskit k8s nodes --sort memory -w 5', description: 'Busiest nodes first, every 5 seconds' },
  ],
});

export interface K8sCommandOverrides extends ContextOverrides {
  now?: Date;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface PassSettings {
  node?: string;
  selector?: string;
  role?: NodeRole;
  sort: NodeSortField;
  detailed: boolean;
  usage: boolean;
  timeoutMs: number;
  now: Date;
}

function percentText(value: number | null): string {
  return value === null ? '<unknown>' : `${value}%`;
}

export async function k8sCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: K8sCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help || args.length === 0) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const [subcommand, ...rest] = args;
  if (subcommand !== 'nodes') {
    throw invalidArgumentsError(`Unknown subcommand: ${subcommand}. Use nodes`);
  }

  const { values, positionals } = parseArgs({
    args: rest,
    options: {
      selector: { type: 'string', short: 'l' },
      role: { type: 'string' },
      sort: { type: 'string' },
      detailed: { type: 'boolean', default: false },
      usage: { type: 'boolean', default: false },
      timeout: { type: 'string', short: 't' },
      watch: { type: 'string', short: 'w' },
      count: { type: 'string' },
    },
    allowPositionals: true,
  });

  const ctx = createContext('k8s', flags, overrides, 'nodes');
  const { logger } = ctx;

  const sort = choiceOption('sort', values.sort, SORT_FIELDS, 'name');
  const settings: PassSettings = {
    node: positionals[0],
    selector: values.selector,
    role: values.role === undefined ? undefined : choiceOption('role', values.role, NODE_ROLES, 'worker'),
    sort,
    detailed: values.detailed,
    usage: values.usage || sort === 'cpu' || sort === 'memory',
    timeoutMs: timeoutOption(values.timeout, flags, 30),
    now: overrides.now ?? new Date(),
  };
  requireCommands(['kubectl'], ctx.exists);

  if (values.watch === undefined) {
    const notReady = await runPass(ctx, settings);
    return notReady > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
  }

  const intervalSeconds = numberOption('watch', values.watch, 2, { min: 1 });
  const count = intOption('count', values.count, 0, { min: 0 });
  const sleep = overrides.sleep ?? defaultSleep;

  let interrupted = false;
  const onSigint = (): void => {
    interrupted = true;
  };
  process.once('SIGINT', onSigint);

  logger.info(`Watching nodes every ${intervalSeconds}s (Ctrl+C to stop)`);
  let failedPasses = 0;
  try {
    for (let pass = 1; !interrupted; pass++) {
      const now = overrides.now ?? new Date();
      logger.section(`Node status at ${formatTimestamp(now)}`);
      if ((await runPass(ctx, { ...settings, now })) > 0) failedPasses++;
      if (count > 0 && pass >= count) break;
      await sleep(intervalSeconds * 1000);
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
  return failedPasses > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}

/**
 * List nodes once and return how many are not Ready
 */
async function runPass(ctx: CommandContext, settings: PassSettings): Promise<number> {
  const { logger, out } = ctx;
  const query = { node: settings.node, selector: settings.selector, timeoutMs: settings.timeoutMs };

  const fetched = await fetchNodes(ctx.runner, query);
  const usage: Map<string, NodeUsage> = settings.usage ? await fetchNodeUsage(ctx.runner, query) : new Map();
  const role = settings.role;
  const nodes = sortNodes(role ? fetched.filter((node) => hasRole(node, role)) : fetched, settings.sort, usage);

  if (nodes.length === 0) {
    logger.warning('No nodes match');
  } else {
    const headers = ['NAME', 'STATUS', 'ROLES', 'AGE', 'VERSION', 'INTERNAL-IP'];
    if (settings.usage) headers.push('CPU', 'CPU%', 'MEMORY', 'MEMORY%');
    out.table(
      headers,
      nodes.map((node) => {
        const row = [
          node.name,
          node.status.replace(node.condition, colorStatus(node.condition)),
          roleText(node),
          formatAge(node.createdAt, settings.now),
          node.version,
          node.internalIp || '<none>',
        ];
        if (settings.usage) {
          const used = usage.get(node.name);
          row.push(
            used?.cpu ?? '<unknown>',
            percentText(used?.cpuPercent ?? null),
            used?.memory ?? '<unknown>',
            percentText(used?.memoryPercent ?? null)
          );
        }
        return row;
      })
    );
  }

  if (settings.detailed) {
    for (const node of nodes) {
      logger.section(node.name);
      out.log(`  Capacity:     cpu ${node.capacity.cpu}, memory ${node.capacity.memory}`);
      out.log(`  Allocatable:  cpu ${node.allocatable.cpu}, memory ${node.allocatable.memory}`);
      out.log(`  Pressure:     ${node.pressures.length > 0 ? node.pressures.join(', ') : 'none'}`);
      out.log(`  Taints:       ${node.taints.length > 0 ? node.taints.join(', ') : 'none'}`);
    }
  }

  const notReady = nodes.filter((node) => !node.ready);
  for (const node of notReady) {
    logger.error(`Node ${node.name} is ${node.condition}`);
  }
  for (const node of nodes.filter((n) => n.pressures.length > 0)) {
    logger.warning(`Node ${node.name} reports ${node.pressures.join(', ')}`);
  }
  if (nodes.length > 0 && notReady.length === 0) {
    logger.success(`All ${nodes.length} node(s) Ready`);
  }

  out.success({
    nodes: settings.usage ? nodes.map((node) => ({ ...node, usage: usage.get(node.name) ?? null })) : nodes,
    summary: { total: nodes.length, ready: nodes.length - notReady.length, not_ready: notReady.length },
  });
  return notReady.length;
}
