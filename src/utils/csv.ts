/**
 * CSV parsing (RFC 4180) and conversion of rows to JSON values
 */

import { invalidArgumentsError, CliError, ErrorCode } from '../cli/errors.js';

export interface ParsedRow {
  fields: string[];
  /** 1-based line the record starts on */
  line: number;
}

/**
 * Split CSV text into records. Quoted fields may contain the delimiter,
 * doubled quotes and line breaks; CRLF and LF both end a record.
 */
export function parseCsv(text: string, delimiter = ','): ParsedRow[] {
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw invalidArgumentsError(`Invalid delimiter "${delimiter}"`);
  }

  const rows: ParsedRow[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;
  let rowHasContent = false;

  const endRow = (): void => {
    fields.push(field);
    if (rowHasContent || fields.length > 1 || field.length > 0) {
      rows.push({ fields, line: rowStart });
    }
    fields = [];
    field = '';
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = '';
      rowHasContent = true;
    } else if (ch === '\r' && text[i + 1] === '\n') {
      // handled with the \n
    } else if (ch === '\n') {
      endRow();
      line++;
      rowStart = line;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new CliError(ErrorCode.VALIDATION_ERROR, `Unterminated quoted field starting on line ${rowStart}`);
  }
  if (field.length > 0 || fields.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

export interface ConvertOptions {
  header?: boolean;
  /** Field names to use instead of the header row */
  fields?: string[];
  asArray?: boolean;
  detectTypes?: boolean;
  trueString?: string;
  falseString?: string;
  nullString?: string;
  dateFields?: string[];
  ignoreErrors?: boolean;
  /** Called for each row skipped under ignoreErrors */
  onSkip?: (line: number, message: string) => void;
}

export type JsonScalar = string | number | boolean | null;

const NUMBER_PATTERN = /^-?(?:\d+|\d*\.\d+)(?:[eE][+-]?\d+)?$/;

export function convertValue(raw: string, options: ConvertOptions): JsonScalar {
  if (!options.detectTypes) {
    return raw;
  }
  if (raw === (options.nullString ?? '')) return null;
  if (raw === (options.trueString ?? 'true')) return true;
  if (raw === (options.falseString ?? 'false')) return false;
  if (NUMBER_PATTERN.test(raw)) return Number(raw);
  return raw;
}

/**
 * ISO 8601 form of a date-like value; unparsable text is kept as is
 */
export function convertDate(raw: string): string {
  const time = Date.parse(raw);
  return Number.isNaN(time) ? raw : new Date(time).toISOString();
}

/**
 * Turn parsed rows into objects keyed by the header (or arrays)
 */
export function rowsToJson(
  rows: ParsedRow[],
  options: ConvertOptions = {}
): Record<string, JsonScalar>[] | JsonScalar[][] {
  const hasHeader = options.header ?? true;
  const dataRows = hasHeader ? rows.slice(1) : rows;
  const width = hasHeader ? (rows[0]?.fields.length ?? 0) : (dataRows[0]?.fields.length ?? 0);

  let names = options.fields && options.fields.length > 0 ? options.fields : undefined;
  if (!names) {
    names = hasHeader
      ? (rows[0]?.fields ?? []).map((n) => n.trim())
      : Array.from({ length: width }, (_, i) => `field${i + 1}`);
  }
  const fieldNames = names;
  const dateFields = new Set(options.dateFields ?? []);

  const valid: ParsedRow[] = [];
  for (const row of dataRows) {
    if (row.fields.length !== fieldNames.length) {
      const message = `Line ${row.line}: expected ${fieldNames.length} fields, found ${row.fields.length}`;
      if (!options.ignoreErrors) {
        throw new CliError(ErrorCode.VALIDATION_ERROR, message, { line: row.line });
      }
      options.onSkip?.(row.line, message);
      continue;
    }
    valid.push(row);
  }

  const convert = (name: string, raw: string): JsonScalar =>
    dateFields.has(name) ? convertDate(raw) : convertValue(raw, options);

  if (options.asArray) {
    return valid.map((row) => row.fields.map((raw, i) => convert(fieldNames[i], raw)));
  }

  return valid.map((row) => {
    const record: Record<string, JsonScalar> = {};
    row.fields.forEach((raw, i) => {
      // A header such as __proto__ must land as an own property
      Object.defineProperty(record, fieldNames[i], {
        value: convert(fieldNames[i], raw),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    });
    return record;
  });
}
