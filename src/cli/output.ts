/**
 * JSON output envelope and human output helpers
 *
 * With --json every command prints exactly one envelope on stdout; log
 * lines go to stderr so the envelope stays parseable.
 */

import type { GlobalFlags } from './flags.js';
import { visibleLength } from './colors.js';

export interface ErrorDetails {
  /** Machine-readable error code */
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface JsonEnvelope<T = unknown> {
  success: boolean;
  command: string;
  subcommand: string | null;
  /** Response data (null on error) */
  data: T | null;
  /** Error information (null on success) */
  error: ErrorDetails | null;
}

export interface OutputContext {
  command: string;
  subcommand?: string;
  flags: GlobalFlags;
  /** Line sink, console.log by default */
  write?: (line: string) => void;
}

export function successEnvelope<T>(
  command: string,
  subcommand: string | null,
  data: T
): JsonEnvelope<T> {
  return {
    success: true,
    command,
    subcommand,
    data,
    error: null,
  };
}

export function errorEnvelope(
  command: string,
  subcommand: string | null,
  code: string,
  message: string,
  details?: Record<string, unknown>
): JsonEnvelope<null> {
  return {
    success: false,
    command,
    subcommand,
    data: null,
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Pad a cell to a visible width, ignoring color escapes
 */
function padCell(cell: string, width: number, alignRight: boolean): string {
  const padding = ' '.repeat(Math.max(0, width - visibleLength(cell)));
  return alignRight ? padding + cell : cell + padding;
}

/**
 * Render rows as aligned columns
 */
export function formatTable(
  headers: string[],
  rows: string[][],
  options: { separator?: string; alignRight?: number[] } = {}
): string[] {
  const sep = options.separator ?? '  ';
  const right = new Set(options.alignRight ?? []);

  const widths = headers.map((h, i) =>
    Math.max(visibleLength(h), ...rows.map((r) => visibleLength(r[i] ?? '')))
  );

  const headerLine = headers.map((h, i) => padCell(h, widths[i], right.has(i))).join(sep);
  const lines = [headerLine, '─'.repeat(visibleLength(headerLine))];

  for (const row of rows) {
    lines.push(
      headers.map((_, i) => padCell(row[i] ?? '', widths[i], right.has(i))).join(sep).trimEnd()
    );
  }

  return lines;
}

/**
 * Output helper class for consistent command output
 */
export class Output {
  private readonly command: string;
  private readonly subcommand: string | null;
  private readonly flags: GlobalFlags;
  private readonly write: (line: string) => void;

  constructor(ctx: OutputContext) {
    this.command = ctx.command;
    this.subcommand = ctx.subcommand ?? null;
    this.flags = ctx.flags;
    this.write = ctx.write ?? ((line: string) => console.log(line));
  }

  /**
   * Print the success envelope (JSON mode only)
   */
  success<T>(data: T): void {
    if (this.flags.json) {
      this.write(JSON.stringify(successEnvelope(this.command, this.subcommand, data), null, 2));
    }
  }

  /**
   * Output a message (respects quiet mode)
   */
  log(message: string): void {
    if (!this.flags.quiet && !this.flags.json) {
      this.write(message);
    }
  }

  /**
   * Output a message even in quiet mode (results the user asked for)
   */
  result(message: string): void {
    if (!this.flags.json) {
      this.write(message);
    }
  }

  /**
   * Output verbose information (only in verbose mode)
   */
  verbose(message: string): void {
    if (this.flags.verbose && !this.flags.json) {
      this.write(message);
    }
  }

  isJson(): boolean {
    return this.flags.json;
  }

  isQuiet(): boolean {
    return this.flags.quiet;
  }

  isVerbose(): boolean {
    return this.flags.verbose;
  }

  /**
   * Print a formatted table
   */
  table(headers: string[], rows: string[][], options?: { separator?: string; alignRight?: number[] }): void {
    if (this.flags.json) {
      return;
    }
    for (const line of formatTable(headers, rows, options)) {
      this.write(line);
    }
  }

  divider(width = 80): void {
    if (!this.flags.json && !this.flags.quiet) {
      this.write('─'.repeat(width));
    }
  }
}

export function createOutput(ctx: OutputContext): Output {
  return new Output(ctx);
}

/**
 * Quick JSON error output for the entry point
 */
export function outputJsonError(
  command: string,
  subcommand: string | null,
  code: string,
  message: string,
  details?: Record<string, unknown>
): void {
  console.log(JSON.stringify(errorEnvelope(command, subcommand, code, message, details), null, 2));
}
