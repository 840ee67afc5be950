/**
 * Tests for mass SSH execution
 */

import { describe, it, expect } from '@jest/globals';
import { buildSshArgs, createJobs, formatJobResult, runSshJobs, sshDestination } from '../src/automation/ssh-runner.js';
import { sshCommand } from '../src/commands/ssh.js';
import { ExitCode } from '../src/cli/errors.js';
import { capture, stubRunner, testFlags } from './helpers/capture.js';

describe('ssh arguments', () => {
  it('should add the user unless the host names one', () => {
    expect(sshDestination('web1', 'deploy')).toBe('deploy@web1');
    expect(sshDestination('root@web1', 'deploy')).toBe('root@web1');
    expect(sshDestination('web1')).toBe('web1');
  });

  it('should build a non-interactive command line', () => {
    expect(buildSshArgs('web1', 'uptime', { user: 'ops', identity: '/keys/id', connectTimeout: 5 })).toEqual([
      '-o', 'ConnectTimeout=5',
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=no',
      '-i', '/keys/id',
      'ops@web1',
      'uptime',
    ]);
  });

  it('should create one job per host and command', () => {
    const jobs = createJobs(['a', 'b'], ['uptime', 'df -h']);
    expect(jobs.map((j) => `${j.host}:${j.command}`)).toEqual(['a:uptime', 'a:df -h', 'b:uptime', 'b:df -h']);
    expect(new Set(jobs.map((j) => j.id)).size).toBe(4);
  });

  it('should format a job block', () => {
    const block = formatJobResult({
      id: '1', host: 'web1', command: 'uptime', success: false, exitCode: 255,
      output: 'Connection refused\n\n', duration: 3,
    });
    expect(block).toBe('=== Host: web1, Command: uptime (FAILED) ===\nConnection refused\n\n');
  });
});

describe('runSshJobs', () => {
  it('should keep going when one host fails', async () => {
    const { runner, calls } = stubRunner((_cmd, args) =>
      args.includes('down') ? { success: false, exitCode: 255, stdout: 'ssh: connect to host down port 22: Connection refused\n' } : { stdout: ' 10:00 up 3 days\n' }
    );
    const seen: string[] = [];
    const results = await runSshJobs(createJobs(['up', 'down'], ['uptime']), {
      connectTimeout: 10,
      parallel: 2,
      runner,
      onResult: (result) => seen.push(result.host),
    });
    expect(results.map((r) => [r.host, r.success])).toEqual([['up', true], ['down', false]]);
    expect(seen.sort()).toEqual(['down', 'up']);
    expect(calls.every((c) => c.options?.mergeOutput === true)).toBe(true);
  });
});

describe('sshCommand', () => {
  it('should print each job and exit 1 when any failed', async () => {
    const { runner } = stubRunner((_cmd, args) =>
      args.includes('ops@b') ? { success: false, exitCode: 1, stdout: 'boom\n' } : { stdout: 'ok\n' }
    );
    const { lines, overrides } = capture();
    const code = await sshCommand(['-H', 'a', '-H', 'b', '-c', 'true', '-u', 'ops', '-p', '1'], testFlags(), {
      ...overrides,
      runner,
      exists: () => true,
    });
    expect(code).toBe(ExitCode.GENERAL_ERROR);
    expect(lines).toEqual([
      '=== Host: a, Command: true ===\nok\n',
      '=== Host: b, Command: true (FAILED) ===\nboom\n',
    ]);
  });

  it('should only print the ssh command lines under --dry-run', async () => {
    const { runner, calls } = stubRunner();
    const { lines, overrides } = capture({ ssh: { connectTimeout: 3 } });
    const code = await sshCommand(['-H', 'web1', '-c', 'df -h', '-u', 'ops'], testFlags({ dryRun: true }), {
      ...overrides,
      runner,
    });
    expect(code).toBe(ExitCode.SUCCESS);
    expect(calls).toHaveLength(0);
    expect(lines).toEqual([
      "[dry-run] ssh -o ConnectTimeout=3 -o BatchMode=yes -o StrictHostKeyChecking=no ops@web1 'df -h'",
    ]);
  });

  it('should need hosts and commands', async () => {
    const { overrides } = capture();
    await expect(sshCommand(['-c', 'uptime'], testFlags(), overrides)).rejects.toThrow('No hosts given');
    await expect(sshCommand(['-H', 'a'], testFlags(), overrides)).rejects.toThrow('No commands given');
  });
});
