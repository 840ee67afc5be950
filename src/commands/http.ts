/**
 * opskit http - Check HTTP endpoints
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, errorMessage, invalidArgumentsError } from '../cli/errors.js';
import { intOption, numberOption, choiceOption, timeoutOption } from '../cli/options.js';
import { colorStatus } from '../cli/colors.js';
import { writeReport } from '../utils/formats.js';
import {
  checkUrl,
  parseExpectedCodes,
  parseHeaders,
  renderHttpReport,
  textLine,
  HTTP_FORMATS,
  type HttpClient,
  type HttpCheckResult,
} from '../monitoring/http-check.js';

const METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

const HELP = generateHelp({
  command: 'http',
  description: 'Check HTTP endpoints for status, content and response time',
  usage: ['opskit http <url...> [options]'],
  details: `A URL passes when its status is expected, the pattern (if any) matches and
the times are within the limits. Exit code 7 when any URL fails.`,
  options: [
    { short: 'm', long: 'method', description: 'HTTP method', values: METHODS.join('|'), default: 'GET' },
    { short: 'd', long: 'data', description: 'Request body', values: '<body>' },
    { short: 'H', long: 'header', description: 'Request header (repeatable)', values: '"Name: value"' },
    { short: 'u', long: 'user', description: 'Basic auth credentials', values: '<user:pass>' },
    { short: 't', long: 'timeout', description: 'Request timeout in seconds', values: '<s>', default: '10' },
    { short: 'r', long: 'retries', description: 'Extra attempts after a failure', values: '<n>', default: '1' },
    { short: 'e', long: 'expect', description: 'Expected status codes', values: '<codes>', default: '200' },
    { short: 'p', long: 'pattern', description: 'Regex the body must match', values: '<regex>' },
    { short: 'k', long: 'insecure', description: 'Skip TLS certificate verification' },
    { long: 'max-connect', description: 'Fail when connecting takes longer', values: '<s>' },
    { long: 'max-time', description: 'Fail when the response takes longer', values: '<s>' },
    { short: 'f', long: 'format', description: 'File format', values: HTTP_FORMATS.join('|'), default: 'text' },
    { short: 'o', long: 'output', description: 'Write results to a file', values: '<file>' },
    { short: 'a', long: 'append', description: 'Append to the output file' },
  ],
  examples: [
    { command: 'opskit http https://example.com', description: 'Expect a 200' },
    { command: "opskit http https://example.com/health -p '\"status\":\"ok\"' --max-time 2", description: 'Body and speed' },
    { command: 'opskit http https://example.com/api -m POST -d "{}" -H "Content-Type: application/json" -e 201', description: 'POST check' },
  ],
});

export interface HttpCommandOverrides extends ContextOverrides {
  client?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
}

export async function httpCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: HttpCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      method: { type: 'string', short: 'm' },
      data: { type: 'string', short: 'd' },
      header: { type: 'string', short: 'H', multiple: true },
      user: { type: 'string', short: 'u' },
      timeout: { type: 'string', short: 't' },
      retries: { type: 'string', short: 'r' },
      expect: { type: 'string', short: 'e' },
      pattern: { type: 'string', short: 'p' },
      insecure: { type: 'boolean', short: 'k', default: false },
      'max-connect': { type: 'string' },
      'max-time': { type: 'string' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      append: { type: 'boolean', short: 'a', default: false },
    },
    allowPositionals: true,
  });

  const ctx = createContext('http', flags, overrides);
  const { config, logger, out } = ctx;

  if (positionals.length === 0) {
    throw invalidArgumentsError('No URLs given');
  }

  const method = choiceOption('method', values.method, METHODS, values.data !== undefined ? 'POST' : 'GET');
  const timeoutMs = timeoutOption(values.timeout, flags, config.http?.timeout ?? 10);
  const retries = intOption('retries', values.retries, config.http?.retries ?? 1, { min: 0 });
  const expect = parseExpectedCodes(values.expect ?? config.http?.expect ?? '200');
  const format = choiceOption('format', values.format, HTTP_FORMATS, 'text');
  if (values.user !== undefined && !values.user.includes(':')) {
    throw invalidArgumentsError('--user must be user:password');
  }

  let pattern: RegExp | undefined;
  if (values.pattern !== undefined) {
    try {
      pattern = new RegExp(values.pattern);
    } catch (error) {
      throw invalidArgumentsError(`Invalid --pattern: ${errorMessage(error)}`);
    }
  }

  const results: HttpCheckResult[] = [];
  for (const url of positionals) {
    logger.debug(`${method} ${url}`);
    const result = await checkUrl(url, {
      request: {
        method,
        headers: parseHeaders(values.header ?? []),
        body: values.data,
        auth: values.user,
        insecure: values.insecure,
        timeoutMs,
      },
      criteria: {
        expect,
        pattern,
        maxConnect: numberOption('max-connect', values['max-connect'], 0, { min: 0 }),
        maxTime: numberOption('max-time', values['max-time'], 0, { min: 0 }),
      },
      retries,
      client: overrides.client,
      sleep: overrides.sleep,
    });
    results.push(result);

    const line = textLine(result).replace(new RegExp(`${result.status}$`), colorStatus(result.status));
    if (result.status === 'OK') {
      out.log(line);
    } else {
      out.result(line);
      logger.error(`${url} failed: ${result.reasons.join('; ')}`);
    }
  }

  if (values.output) {
    writeReport(values.output, renderHttpReport(format, results, !values.append), {
      append: values.append,
      header: values.append && format === 'csv' ? renderHttpReport('csv', [], true) : undefined,
    });
    logger.success(`Results ${values.append ? 'appended' : 'saved'} to ${values.output}`);
  }

  const failed = results.filter((r) => r.status === 'FAIL');
  if (failed.length > 0) {
    await ctx.notifier.notify(
      'http.failed',
      'http',
      `${failed.length} of ${results.length} URL check(s) failed: ${failed.map((r) => r.url).join(', ')}`,
      { failed: failed.map((r) => ({ url: r.url, status_code: r.statusCode, reasons: r.reasons })) }
    );
  } else {
    logger.success(`All ${results.length} URL check(s) passed`);
  }

  out.success({ results, summary: { total: results.length, ok: results.length - failed.length, failed: failed.length } });
  return failed.length > 0 ? ExitCode.CHECK_FAILED : ExitCode.SUCCESS;
}
