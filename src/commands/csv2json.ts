/**
 * opskit csv2json - Convert CSV to JSON
 */

import { existsSync, readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, fileNotFoundError, invalidArgumentsError } from '../cli/errors.js';
import { listOption } from '../cli/options.js';
import { writeReport } from '../utils/formats.js';
import { parseCsv, rowsToJson } from '../utils/csv.js';

const HELP = generateHelp({
  command: 'csv2json',
  description: 'Convert CSV (RFC 4180) to JSON',
  usage: ['opskit csv2json <file|-> [options]'],
  details: `Rows whose field count differs from the header are an error naming the line,
or are skipped with --ignore-errors.`,
  options: [
    { short: 'd', long: 'delimiter', description: 'Field delimiter (\\t for tab)', values: '<char>', default: ',' },
    { short: 'A', long: 'array', description: 'Emit arrays instead of objects' },
    { short: 'N', long: 'no-header', description: 'First row is data; fields are field1..n' },
    { long: 'fields', description: 'Field names to use', values: '<a,b,c>' },
    { short: 'p', long: 'pretty', description: 'Indent the JSON' },
    { short: 'T', long: 'types', description: 'Convert numbers, booleans and nulls' },
    { long: 'true', description: 'Text read as true with --types', values: '<s>', default: 'true' },
    { long: 'false', description: 'Text read as false with --types', values: '<s>', default: 'false' },
    { long: 'null', description: 'Text read as null with --types', values: '<s>', default: '""' },
    { short: 'D', long: 'date-fields', description: 'Fields converted to ISO 8601', values: '<a,b>' },
    { short: 'i', long: 'ignore-errors', description: 'Skip malformed rows' },
    { short: 'o', long: 'output', description: 'Write JSON to a file', values: '<file>' },
  ],
  examples: [
    { command: 'opskit csv2json hosts.csv -p -T', description: 'Typed, pretty objects' },
    { command: 'cat data.tsv | opskit csv2json - -d "\\t" -A', description: 'Tab-separated stdin to arrays' },
    { command: 'opskit csv2json events.csv -D created,updated -o events.json', description: 'Dates to ISO 8601' },
  ],
});

function readStdin(): string {
  return readFileSync(0, 'utf-8');
}

export async function csv2jsonCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: ContextOverrides & { stdin?: () => string } = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      delimiter: { type: 'string', short: 'd' },
      array: { type: 'boolean', short: 'A', default: false },
      'no-header': { type: 'boolean', short: 'N', default: false },
      fields: { type: 'string' },
      pretty: { type: 'boolean', short: 'p', default: false },
      types: { type: 'boolean', short: 'T', default: false },
      true: { type: 'string' },
      false: { type: 'string' },
      null: { type: 'string' },
      'date-fields': { type: 'string', short: 'D', multiple: true },
      'ignore-errors': { type: 'boolean', short: 'i', default: false },
      output: { type: 'string', short: 'o' },
    },
    allowPositionals: true,
  });

  const ctx = createContext('csv2json', flags, overrides);
  const { logger, out } = ctx;

  const input = positionals[0];
  if (input === undefined) {
    throw invalidArgumentsError('csv2json needs a file, or - for stdin');
  }
  let text: string;
  if (input === '-') {
    text = (overrides.stdin ?? readStdin)();
  } else {
    if (!existsSync(input)) throw fileNotFoundError(input);
    text = readFileSync(input, 'utf-8');
  }
  // Byte order mark from spreadsheet exports
  text = text.replace(/^\uFEFF/, '');

  const rawDelimiter = values.delimiter ?? ',';
  const delimiter = rawDelimiter === '\\t' || rawDelimiter === 'tab' ? '\t' : rawDelimiter;
  if (delimiter.length !== 1) {
    throw invalidArgumentsError(`--delimiter must be a single character (got "${rawDelimiter}")`);
  }

  let skipped = 0;
  const records = rowsToJson(parseCsv(text, delimiter), {
    header: !values['no-header'],
    fields: listOption(values.fields),
    asArray: values.array,
    detectTypes: values.types,
    trueString: values.true,
    falseString: values.false,
    nullString: values.null,
    dateFields: listOption(values['date-fields']),
    ignoreErrors: values['ignore-errors'],
    onSkip: (_line, message) => {
      skipped++;
      logger.warning(`Skipped: ${message}`);
    },
  });

  const json = JSON.stringify(records, null, values.pretty ? 2 : undefined) + '\n';
  if (values.output) {
    writeReport(values.output, json);
    logger.success(`Wrote ${records.length} record(s) to ${values.output}${skipped > 0 ? `, skipped ${skipped}` : ''}`);
  } else {
    out.result(json.trimEnd());
  }

  out.success({ records, count: records.length, skipped });
  return ExitCode.SUCCESS;
}
