/**
 * Filesystem usage from `df -PT`
 */

import type { CommandRunner } from '../exec/runner.js';
import { CliError, ErrorCode } from '../cli/errors.js';
import { csvLine, toJsonText } from '../utils/formats.js';
import { formatBytes } from '../utils/size.js';

export interface FilesystemUsage {
  filesystem: string;
  type: string;
  sizeBytes: number;
  usedBytes: number;
  availableBytes: number;
  usePercent: number;
  mount: string;
}

export type DiskStatus = 'OK' | 'WARNING' | 'CRITICAL';

export interface DiskRow extends FilesystemUsage {
  status: DiskStatus;
}

/**
 * Parse POSIX `df -PT` output. The block size comes from the header
 * (`1024-blocks`); mount points keep their spaces.
 */
export function parseDf(output: string): FilesystemUsage[] {
  const lines = output.split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) return [];

  const blockMatch = /(\d+)-blocks/.exec(lines[0]);
  const blockSize = blockMatch ? parseInt(blockMatch[1], 10) : 1024;
  const body = /^Filesystem\b/.test(lines[0]) ? lines.slice(1) : lines;

  const rows: FilesystemUsage[] = [];
  for (const line of body) {
    const match = /^(\S+)\s+(\S+)\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+|-)%?\s+(.+)$/.exec(line.trim());
    if (!match) continue;
    const [, filesystem, type, size, used, available, percent, mount] = match;
    const sizeBlocks = Number(size);
    const usedBlocks = Number(used);
    const usePercent =
      percent === '-' ? (sizeBlocks > 0 ? Math.ceil((usedBlocks * 100) / sizeBlocks) : 0) : Number(percent);
    rows.push({
      filesystem,
      type,
      sizeBytes: sizeBlocks * blockSize,
      usedBytes: usedBlocks * blockSize,
      availableBytes: Number(available) * blockSize,
      usePercent,
      mount,
    });
  }
  return rows;
}

export async function readDiskUsage(runner: CommandRunner, timeoutMs: number): Promise<FilesystemUsage[]> {
  const result = await runner('df', ['-PT'], { timeoutMs });
  // df exits 1 when one mount is unreadable but still prints the rest
  if (!result.stdout.trim()) {
    throw new CliError(ErrorCode.COMMAND_FAILED, `df failed: ${result.error ?? result.stderr.trim()}`);
  }
  return parseDf(result.stdout);
}

export function diskStatus(usePercent: number, warning: number, critical: number): DiskStatus {
  if (usePercent >= critical) return 'CRITICAL';
  if (usePercent >= warning) return 'WARNING';
  return 'OK';
}

export interface DiskFilter {
  mounts?: string[];
  excludeMounts?: string[];
  includeTypes?: string[];
  excludeTypes?: string[];
}

/**
 * Include lists restrict; exclude lists remove. An explicit type include
 * beats the type exclude list.
 */
export function filterFilesystems(rows: FilesystemUsage[], filter: DiskFilter): FilesystemUsage[] {
  return rows.filter((row) => {
    if (filter.mounts && filter.mounts.length > 0 && !filter.mounts.includes(row.mount)) return false;
    if (filter.excludeMounts?.includes(row.mount)) return false;
    if (filter.includeTypes && filter.includeTypes.length > 0) {
      return filter.includeTypes.includes(row.type);
    }
    return !filter.excludeTypes?.includes(row.type);
  });
}

export function evaluate(rows: FilesystemUsage[], warning: number, critical: number): DiskRow[] {
  return rows.map((row) => ({ ...row, status: diskStatus(row.usePercent, warning, critical) }));
}

export const DISK_FORMATS = ['table', 'csv', 'json'] as const;
export type DiskFormat = (typeof DISK_FORMATS)[number];

export const TABLE_HEADER = ['Filesystem', 'Type', 'Size', 'Used', 'Avail', 'Use%', 'Mounted on', 'Status'];

export function tableRow(row: DiskRow): string[] {
  return [
    row.filesystem,
    row.type,
    formatBytes(row.sizeBytes),
    formatBytes(row.usedBytes),
    formatBytes(row.availableBytes),
    `${row.usePercent}%`,
    row.mount,
    row.status,
  ];
}

export const CSV_HEADER = 'Timestamp,Filesystem,Type,Size_bytes,Used_bytes,Available_bytes,Use_percent,Mount,Status';

export function renderDiskCsv(timestamp: string, rows: DiskRow[], header: boolean): string {
  const lines = rows.map((r) =>
    csvLine([timestamp, r.filesystem, r.type, r.sizeBytes, r.usedBytes, r.availableBytes, r.usePercent, r.mount, r.status])
  );
  return (header ? [CSV_HEADER, ...lines] : lines).join('\n') + '\n';
}

export function diskJson(timestamp: string, warning: number, critical: number, rows: DiskRow[]): Record<string, unknown> {
  return {
    timestamp,
    thresholds: { warning, critical },
    filesystems: rows.map((r) => ({
      filesystem: r.filesystem,
      type: r.type,
      size_bytes: r.sizeBytes,
      used_bytes: r.usedBytes,
      available_bytes: r.availableBytes,
      use_percent: r.usePercent,
      mount: r.mount,
      status: r.status,
    })),
  };
}

export function renderDiskReport(
  format: DiskFormat,
  timestamp: string,
  thresholds: { warning: number; critical: number },
  rows: DiskRow[],
  header: boolean
): string {
  switch (format) {
    case 'csv':
      return renderDiskCsv(timestamp, rows, header);
    case 'json':
      return toJsonText(diskJson(timestamp, thresholds.warning, thresholds.critical, rows));
    case 'table': {
      const lines = rows.map((r) => tableRow(r).join('  '));
      return (header ? [`Disk usage at ${timestamp}`, TABLE_HEADER.join('  '), ...lines] : lines).join('\n') + '\n';
    }
  }
}
