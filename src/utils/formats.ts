/**
 * Report serialization shared by the commands that write files
 */

import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Quote a CSV field when it holds a comma, quote or line break (RFC 4180)
 */
export function csvField(value: unknown): string {
  const text = value === null || value === undefined ? '' : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function csvLine(values: unknown[]): string {
  return values.map(csvField).join(',');
}

export function toCsv(header: string[], rows: unknown[][]): string {
  return [csvLine(header), ...rows.map(csvLine)].join('\n') + '\n';
}

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: unknown): string {
  return String(value ?? '').replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

export function toJsonText(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}

export interface WriteReportOptions {
  append?: boolean;
  /** Written first when the file is created (e.g. a CSV header) */
  header?: string;
}

/**
 * Write (or append to) a report file, creating its directory
 */
export function writeReport(path: string, content: string, options: WriteReportOptions = {}): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  if (options.append && existsSync(path)) {
    appendFileSync(path, content, 'utf-8');
    return;
  }
  writeFileSync(path, (options.header ?? '') + content, 'utf-8');
}
