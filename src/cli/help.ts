/**
 * Help system for opskit
 *
 * Every command builds its help text from a HelpTemplate so the layout,
 * global options, environment variables and exit codes stay identical.
 */

import { ENV_VAR_DOCS } from './env.js';

export interface HelpSection {
  title: string;
  content: string;
}

export interface CommandExample {
  command: string;
  description: string;
}

export interface OptionDef {
  short?: string;
  long: string;
  description: string;
  values?: string;
  default?: string;
}

export interface SubcommandDef {
  name: string;
  description: string;
  args?: string;
}

export interface HelpTemplate {
  /** Command name (e.g., 'scan', 'logs rotate') */
  command: string;
  /** Short one-line description */
  description: string;
  details?: string;
  usage?: string[];
  subcommands?: SubcommandDef[];
  options?: OptionDef[];
  examples?: CommandExample[];
  sections?: HelpSection[];
  /** Whether to show global options (default: true) */
  showGlobalOptions?: boolean;
  /** Whether to show exit codes (default: true) */
  showExitCodes?: boolean;
  /** Whether to show environment variables (default: false) */
  showEnvVars?: boolean;
}

const OPTION_COLUMN = 26;

function formatOption(opt: OptionDef): string {
  const long = opt.values ? `--${opt.long} ${opt.values}` : `--${opt.long}`;
  const flags = opt.short ? `-${opt.short}, ${long}` : `    ${long}`;

  let desc = opt.description;
  if (opt.default) {
    desc += ` (default: ${opt.default})`;
  }

  if (flags.length >= OPTION_COLUMN) {
    return `  ${flags}\n  ${' '.repeat(OPTION_COLUMN)}${desc}`;
  }
  return `  ${flags.padEnd(OPTION_COLUMN)}${desc}`;
}

function formatSubcommand(sub: SubcommandDef): string {
  const name = sub.args ? `${sub.name} ${sub.args}` : sub.name;
  return `  ${name.padEnd(22)}${sub.description}`;
}

function formatExample(ex: CommandExample): string {
  return `  ${ex.command}\n      ${ex.description}`;
}

export const GLOBAL_OPTIONS: OptionDef[] = [
  { short: 'h', long: 'help', description: 'Show help' },
  { long: 'version', description: 'Show version' },
  { short: 'j', long: 'json', description: 'Output as JSON' },
  { short: 'q', long: 'quiet', description: 'Minimal output' },
  { short: 'v', long: 'verbose', description: 'Detailed output' },
  { long: 'no-color', description: 'Disable colored output' },
  { long: 'config', values: '<path>', description: 'Custom config file path' },
  { long: 'dry-run', description: 'Show what would change without changing it' },
  { long: 'timeout', values: '<dur>', description: 'Per-operation timeout (e.g., 500ms, 5s)' },
  { long: 'no-notify', description: 'Skip notification hooks' },
];

export const EXIT_CODES: ReadonlyArray<[number, string]> = [
  [0, 'Success'],
  [1, 'General error or some jobs failed'],
  [2, 'Invalid arguments'],
  [3, 'Configuration error'],
  [4, 'Resource not found'],
  [5, 'Permission denied'],
  [6, 'Resource locked'],
  [7, 'Check failed (threshold exceeded, unhealthy, listed, changed)'],
  [8, 'Required external command missing'],
];

/**
 * Generate help text from template
 */
export function generateHelp(template: HelpTemplate): string {
  const lines: string[] = [];

  lines.push(`opskit ${template.command} - ${template.description}`);
  lines.push('');

  lines.push('USAGE:');
  const usage = template.usage && template.usage.length > 0
    ? template.usage
    : [`opskit ${template.command} [options]`];
  for (const u of usage) {
    lines.push(`  ${u}`);
  }
  lines.push('');

  if (template.details) {
    lines.push('DESCRIPTION:');
    for (const line of template.details.trim().split('\n')) {
      lines.push(line ? `  ${line}` : '');
    }
    lines.push('');
  }

  if (template.subcommands && template.subcommands.length > 0) {
    lines.push('SUBCOMMANDS:');
    for (const sub of template.subcommands) {
      lines.push(formatSubcommand(sub));
    }
    lines.push('');
  }

  if (template.options && template.options.length > 0) {
    lines.push('OPTIONS:');
    for (const opt of template.options) {
      lines.push(formatOption(opt));
    }
    lines.push('');
  }

  if (template.showGlobalOptions !== false) {
    lines.push('GLOBAL OPTIONS:');
    for (const opt of GLOBAL_OPTIONS) {
      lines.push(formatOption(opt));
    }
    lines.push('');
  }

  if (template.examples && template.examples.length > 0) {
    lines.push('EXAMPLES:');
    for (const ex of template.examples) {
      lines.push(formatExample(ex));
    }
    lines.push('');
  }

  for (const section of template.sections ?? []) {
    lines.push(`${section.title}:`);
    for (const line of section.content.trim().split('\n')) {
      lines.push(line ? `  ${line}` : '');
    }
    lines.push('');
  }

  if (template.showEnvVars === true) {
    lines.push('ENVIRONMENT VARIABLES:');
    for (const env of ENV_VAR_DOCS) {
      lines.push(`  ${env.name.padEnd(20)}${env.description}`);
    }
    lines.push('');
  }

  if (template.showExitCodes !== false) {
    lines.push('EXIT CODES:');
    for (const [code, desc] of EXIT_CODES) {
      lines.push(`  ${code}  ${desc}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function helpHint(command?: string): string {
  if (command) {
    return `Run 'opskit ${command} --help' for usage information.`;
  }
  return `Run 'opskit --help' for usage information.`;
}

/**
 * Format a "Did you mean?" suggestion
 */
export function didYouMean(provided: string, options: readonly string[]): string | null {
  const distances = options.map((opt) => ({
    option: opt,
    distance: levenshtein(provided.toLowerCase(), opt.toLowerCase()),
  }));

  distances.sort((a, b) => a.distance - b.distance);

  // Only suggest if distance is small enough (at most half the length)
  if (distances[0] && distances[0].distance <= provided.length / 2) {
    return `Did you mean '${distances[0].option}'?`;
  }

  return null;
}

export function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1,     // insertion
          matrix[i - 1][j] + 1      // deletion
        );
      }
    }
  }

  return matrix[b.length][a.length];
}
