/**
 * Tests for Kubernetes node status parsing and the k8s command
 */

import { describe, it, expect } from '@jest/globals';
import {
  cpuMillicores,
  formatAge,
  formatTaint,
  hasRole,
  kubectlArgs,
  memoryBytes,
  nodeRoles,
  parseNodes,
  parseTopNodes,
  sortNodes,
  topArgs,
} from '../src/containers/k8s-nodes.js';
import { k8sCommand } from '../src/commands/k8s.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, stubRunner, testFlags } from './helpers/capture.js';

const NOW = new Date('2025-04-15T10:00:00Z');

const CONTROL = {
  kind: 'Node',
  metadata: {
    name: 'node-b',
    creationTimestamp: '2025-01-01T00:00:00Z',
    labels: { 'kubernetes.io/hostname': 'node-b', 'node-role.kubernetes.io/control-plane': '' },
  },
  spec: { taints: [{ key: 'node-role.kubernetes.io/control-plane', effect: 'NoSchedule' }] },
  status: {
    conditions: [
      { type: 'MemoryPressure', status: 'False' },
      { type: 'Ready', status: 'True' },
    ],
    addresses: [
      { type: 'InternalIP', address: '10.0.0.2' },
      { type: 'Hostname', address: 'node-b' },
    ],
    nodeInfo: { kubeletVersion: 'v1.29.2' },
    capacity: { cpu: '4', memory: '8Gi' },
    allocatable: { cpu: '3800m', memory: '7Gi' },
  },
};

const NODE_LIST = JSON.stringify({
  kind: 'NodeList',
  items: [
    {
      metadata: { name: 'node-c', creationTimestamp: '2025-04-15T09:00:00Z', labels: { 'kubernetes.io/role': 'worker' } },
      spec: {},
      status: { conditions: [], nodeInfo: { kubeletVersion: 'v1.28.9' } },
    },
    CONTROL,
    {
      metadata: { name: 'node-a', creationTimestamp: '2025-04-10T00:00:00Z', labels: {} },
      spec: { unschedulable: true },
      status: {
        conditions: [
          { type: 'DiskPressure', status: 'True' },
          { type: 'Ready', status: 'False' },
        ],
        addresses: [{ type: 'InternalIP', address: '10.0.0.1' }],
        nodeInfo: { kubeletVersion: 'v1.29.2' },
      },
    },
  ],
});

const TOP = `node-a   250m        6%          7Gi         95%
node-b   1500m       39%         6Gi         85%
node-c   <unknown>   <unknown>   <unknown>   <unknown>
`;

describe('parseNodes', () => {
  it('should read conditions, roles and resources', () => {
    const [c, b, a] = parseNodes(NODE_LIST);
    expect(b).toEqual({
      name: 'node-b',
      condition: 'Ready',
      status: 'Ready',
      ready: true,
      roles: ['control-plane'],
      version: 'v1.29.2',
      internalIp: '10.0.0.2',
      createdAt: '2025-01-01T00:00:00Z',
      pressures: [],
      capacity: { cpu: '4', memory: '8Gi' },
      allocatable: { cpu: '3800m', memory: '7Gi' },
      taints: ['node-role.kubernetes.io/control-plane:NoSchedule'],
    });
    expect(a).toMatchObject({ condition: 'NotReady', status: 'NotReady,SchedulingDisabled', pressures: ['DiskPressure'], roles: [] });
    expect(c).toMatchObject({ condition: 'Unknown', roles: ['worker'], internalIp: '' });
  });

  it('should accept a single node', () => {
    expect(parseNodes(JSON.stringify(CONTROL)).map((n) => n.name)).toEqual(['node-b']);
  });

  it('should reject output it cannot read', () => {
    expect(() => parseNodes('not json')).toThrow('kubectl returned invalid JSON');
    expect(() => parseNodes('{"kind":"Status"}')).toThrow('kubectl output has no node items');
  });

  it('should format roles and taints', () => {
    expect(nodeRoles({ 'node-role.kubernetes.io/master': '', 'node-role.kubernetes.io/': '', 'kubernetes.io/role': 'infra' })).toEqual([
      'infra',
      'master',
    ]);
    expect(formatTaint({ key: 'dedicated', value: 'gpu', effect: 'NoExecute' })).toBe('dedicated=gpu:NoExecute');
  });
});

describe('selection and sorting', () => {
  const nodes = parseNodes(NODE_LIST);

  it('should treat unlabelled nodes as workers', () => {
    expect(nodes.filter((n) => hasRole(n, 'worker')).map((n) => n.name)).toEqual(['node-c', 'node-a']);
    expect(nodes.filter((n) => hasRole(n, 'master')).map((n) => n.name)).toEqual(['node-b']);
  });

  it('should sort by name, status and age', () => {
    expect(sortNodes(nodes, 'name').map((n) => n.name)).toEqual(['node-a', 'node-b', 'node-c']);
    expect(sortNodes(nodes, 'status').map((n) => n.name)).toEqual(['node-a', 'node-c', 'node-b']);
    expect(sortNodes(nodes, 'age').map((n) => n.name)).toEqual(['node-b', 'node-a', 'node-c']);
  });

  it('should print short ages', () => {
    expect(formatAge('2025-04-15T09:59:15Z', NOW)).toBe('45s');
    expect(formatAge('2025-04-15T09:48:00Z', NOW)).toBe('12m');
    expect(formatAge('2025-04-15T05:00:00Z', NOW)).toBe('5h');
    expect(formatAge('2025-01-01T00:00:00Z', NOW)).toBe('104d');
    expect(formatAge('', NOW)).toBe('<unknown>');
  });

  it('should build kubectl arguments', () => {
    expect(kubectlArgs({})).toEqual(['get', 'nodes', '-o', 'json']);
    expect(kubectlArgs({ node: 'node-a', selector: 'zone=a' })).toEqual(['get', 'nodes', 'node-a', '-l', 'zone=a', '-o', 'json']);
  });
});

describe('node usage', () => {
  it('should convert resource quantities', () => {
    expect(cpuMillicores('2')).toBe(2000);
    expect(cpuMillicores('250m')).toBe(250);
    expect(cpuMillicores('1500000n')).toBe(1.5);
    expect(cpuMillicores('<unknown>')).toBeNaN();
    expect(memoryBytes('1024Mi')).toBe(1024 ** 3);
    expect(memoryBytes('2G')).toBe(2e9);
    expect(memoryBytes('512')).toBe(512);
    expect(memoryBytes('3Xi')).toBeNaN();
  });

  it('should read kubectl top rows', () => {
    const usage = parseTopNodes(TOP);
    expect(usage.get('node-a')).toEqual({
      cpu: '250m',
      cpuMillicores: 250,
      cpuPercent: 6,
      memory: '7Gi',
      memoryBytes: 7 * 1024 ** 3,
      memoryPercent: 95,
    });
    const unknown = usage.get('node-c');
    expect(unknown?.cpuPercent).toBeNull();
    expect(unknown?.memoryBytes).toBeNaN();
    expect(topArgs({ selector: 'zone=a' })).toEqual(['top', 'nodes', '-l', 'zone=a', '--no-headers']);
  });

  it('should sort by cpu and memory, busiest first', () => {
    const nodes = parseNodes(NODE_LIST);
    const usage = parseTopNodes(TOP);
    expect(sortNodes(nodes, 'cpu', usage).map((n) => n.name)).toEqual(['node-b', 'node-a', 'node-c']);
    expect(sortNodes(nodes, 'memory', usage).map((n) => n.name)).toEqual(['node-a', 'node-b', 'node-c']);
    expect(sortNodes(nodes, 'cpu').map((n) => n.name)).toEqual(['node-a', 'node-b', 'node-c']);
  });
});

describe('k8sCommand', () => {
  it('should list workers and exit 7 when one is not ready', async () => {
    const { runner, calls } = stubRunner(() => ({ stdout: NODE_LIST }));
    const { lines, logs, overrides } = capture();
    const code = await k8sCommand(['nodes', '--role', 'worker'], testFlags(), { ...overrides, runner, exists: () => true, now: NOW });
    expect(code).toBe(ExitCode.CHECK_FAILED);
    expect(calls[0].args).toEqual(['get', 'nodes', '-o', 'json']);
    expect(lines[0].split(/\s+/)).toEqual(['NAME', 'STATUS', 'ROLES', 'AGE', 'VERSION', 'INTERNAL-IP']);
    expect(lines[2].split(/\s+/)).toEqual(['node-a', 'NotReady,SchedulingDisabled', '<none>', '5d', 'v1.29.2', '10.0.0.1']);
    expect(lines[3].split(/\s+/)).toEqual(['node-c', 'Unknown', 'worker', '1h', 'v1.28.9', '<none>']);
    expect(logs).toContain('[ERROR] Node node-a is NotReady');
    expect(logs).toContain('[ERROR] Node node-c is Unknown');
    expect(logs).toContain('[WARNING] Node node-a reports DiskPressure');
  });

  it('should show details for a named node', async () => {
    const { runner, calls } = stubRunner(() => ({ stdout: JSON.stringify(CONTROL) }));
    const { lines, logs, overrides } = capture();
    const code = await k8sCommand(['nodes', 'node-b', '--detailed'], testFlags(), { ...overrides, runner, exists: () => true, now: NOW });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(calls[0].args).toEqual(['get', 'nodes', 'node-b', '-o', 'json']);
    expect(lines.slice(3)).toEqual([
      '  Capacity:     cpu 4, memory 8Gi',
      '  Allocatable:  cpu 3800m, memory 7Gi',
      '  Pressure:     none',
      '  Taints:       node-role.kubernetes.io/control-plane:NoSchedule',
    ]);
    expect(logs).toContain('[SUCCESS] All 1 node(s) Ready');
  });

  it('should report a missing node', async () => {
    const { runner } = stubRunner(() => ({ success: false, stderr: 'Error from server (NotFound): nodes "node-x" not found' }));
    const { overrides } = capture();
    await expect(k8sCommand(['nodes', 'node-x'], testFlags(), { ...overrides, runner, exists: () => true })).rejects.toThrow(
      'Node not found: node-x'
    );
  });

  it('should add usage columns when sorting by cpu', async () => {
    const { runner, calls } = stubRunner((_command, args) => ({ stdout: args[0] === 'top' ? TOP : NODE_LIST }));
    const { lines, overrides } = capture();
    const code = await k8sCommand(['nodes', '--sort', 'cpu'], testFlags(), { ...overrides, runner, exists: () => true, now: NOW });
    expect(code).toBe(ExitCode.CHECK_FAILED);
    expect(calls.map((call) => call.args)).toEqual([
      ['get', 'nodes', '-o', 'json'],
      ['top', 'nodes', '--no-headers'],
    ]);
    expect(lines[0].trimEnd().split(/\s+/)).toEqual([
      'NAME', 'STATUS', 'ROLES', 'AGE', 'VERSION', 'INTERNAL-IP', 'CPU', 'CPU%', 'MEMORY', 'MEMORY%',
    ]);
    expect(lines.slice(2).map((line) => line.split(/\s+/))).toEqual([
      ['node-b', 'Ready', 'control-plane', '104d', 'v1.29.2', '10.0.0.2', '1500m', '39%', '6Gi', '85%'],
      ['node-a', 'NotReady,SchedulingDisabled', '<none>', '5d', 'v1.29.2', '10.0.0.1', '250m', '6%', '7Gi', '95%'],
      ['node-c', 'Unknown', 'worker', '1h', 'v1.28.9', '<none>', '<unknown>', '<unknown>', '<unknown>', '<unknown>'],
    ]);
  });

  it('should report when metrics are unavailable', async () => {
    const { runner } = stubRunner((_command, args) =>
      args[0] === 'top' ? { success: false, stderr: 'error: Metrics API not available' } : { stdout: NODE_LIST }
    );
    const { overrides } = capture();
    await expect(
      k8sCommand(['nodes', '--usage'], testFlags(), { ...overrides, runner, exists: () => true, now: NOW })
    ).rejects.toThrow('kubectl top nodes failed: error: Metrics API not available');
  });

  it('should refresh in watch mode until the count is reached', async () => {
    const { runner, calls } = stubRunner(() => ({ stdout: JSON.stringify(CONTROL) }));
    const { logs, overrides } = capture();
    const sleeps: number[] = [];
    const code = await k8sCommand(['nodes', '-w', '5', '--count', '3'], testFlags(), {
      ...overrides,
      runner,
      exists: () => true,
      now: NOW,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([5000, 5000]);
    expect(logs).toContain('[INFO] Watching nodes every 5s (Ctrl+C to stop)');
    expect(logs.filter((line) => line.startsWith('--- Node status at '))).toHaveLength(3);
    expect(logs.filter((line) => line === '[SUCCESS] All 1 node(s) Ready')).toHaveLength(3);
  });

  it('should exit 7 when any watch refresh finds a node not ready', async () => {
    let pass = 0;
    const { runner } = stubRunner(() => ({ stdout: pass++ === 0 ? NODE_LIST : JSON.stringify(CONTROL) }));
    const { overrides } = capture();
    const code = await k8sCommand(['nodes', '--watch', '1', '--count', '2'], testFlags(), {
      ...overrides,
      runner,
      exists: () => true,
      now: NOW,
      sleep: async () => undefined,
    });
    expect(code).toBe(ExitCode.CHECK_FAILED);
    await expect(
      k8sCommand(['nodes', '-w', '0'], testFlags(), { ...overrides, runner, exists: () => true })
    ).rejects.toThrow('--watch must be at least 1 (got 0)');
  });

  it('should need kubectl and a known subcommand', async () => {
    const { overrides } = capture();
    await expect(k8sCommand(['nodes'], testFlags(), { ...overrides, exists: () => false })).rejects.toThrow(
      'Required command not found: kubectl'
    );
    await expect(k8sCommand(['pods'], testFlags(), overrides)).rejects.toThrow('Unknown subcommand: pods. Use nodes');
    await expect(k8sCommand(['nodes', '--sort', 'size'], testFlags(), { ...overrides, exists: () => true })).rejects.toThrow(
      'Invalid --sort "size". Use one of: name, status, age, cpu, memory'
    );
  });
});
