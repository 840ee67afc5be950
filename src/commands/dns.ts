/**
 * opskit dns - Measure DNS query latency per nameserver
 */

import { parseArgs } from 'node:util';
import type { GlobalFlags } from '../cli/flags.js';
import { generateHelp } from '../cli/help.js';
import { createContext, type ContextOverrides } from '../cli/context.js';
import { ExitCode, invalidArgumentsError } from '../cli/errors.js';
import { choiceOption, intOption, listOption, timeoutOption } from '../cli/options.js';
import {
  latencyJson,
  loadPublicResolvers,
  measureLatency,
  renderCsv,
  renderJson,
  rowValues,
  serverSummary,
  sortRows,
  CSV_HEADER,
  RECORD_TYPES,
  SORT_FIELDS,
  SYSTEM_RESOLVER,
  type DnsQuery,
  type QueryInformation,
} from '../net/dns-latency.js';
import { writeReport } from '../utils/formats.js';

const FORMATS = ['table', 'csv', 'json'] as const;

const HELP = generateHelp({
  command: 'dns',
  description: 'Measure DNS resolution latency',
  usage: ['opskit dns <domain...> [options]'],
  details: `Every domain is queried --count times against every nameserver. Without
--nameservers or --public-resolvers the system resolver is used.`,
  options: [
    { short: 'n', long: 'nameservers', description: 'Nameservers, comma separated', values: '<a,b>' },
    { short: 'P', long: 'public-resolvers', description: 'Add well-known public resolvers' },
    { short: 'c', long: 'count', description: 'Queries per domain and server', values: '<n>', default: '3' },
    { short: 't', long: 'timeout', description: 'Query timeout in seconds', values: '<s>', default: '2' },
    { short: 'w', long: 'wait', description: 'Pause between queries', values: '<ms>', default: '100' },
    { short: 'r', long: 'record', description: 'Record type', values: RECORD_TYPES.join('|'), default: 'A' },
    { short: 's', long: 'sort', description: 'Sort field', values: SORT_FIELDS.join('|'), default: 'avg' },
    { short: 'f', long: 'format', description: 'Output format', values: FORMATS.join('|'), default: 'table' },
    { short: 'o', long: 'output', description: 'Write results to a file', values: '<file>' },
  ],
  examples: [
    { command: 'opskit dns example.com -P', description: 'Compare public resolvers' },
    { command: 'opskit dns example.com -n 1.1.1.1,8.8.8.8 -c 10 -r AAAA', description: 'Ten AAAA queries each' },
    { command: 'opskit dns example.org -f csv -o dns.csv', description: 'Save results as CSV' },
  ],
});

export interface DnsCommandOverrides extends ContextOverrides {
  query?: DnsQuery;
  sleep?: (ms: number) => Promise<void>;
}

export async function dnsCommand(
  args: string[],
  flags: GlobalFlags,
  overrides: DnsCommandOverrides = {}
): Promise<ExitCode> {
  if (flags.help) {
    console.log(HELP);
    return ExitCode.SUCCESS;
  }

  const { values, positionals } = parseArgs({
    args,
    options: {
      nameservers: { type: 'string', short: 'n', multiple: true },
      'public-resolvers': { type: 'boolean', short: 'P', default: false },
      count: { type: 'string', short: 'c' },
      timeout: { type: 'string', short: 't' },
      wait: { type: 'string', short: 'w' },
      record: { type: 'string', short: 'r' },
      sort: { type: 'string', short: 's' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
    },
    allowPositionals: true,
  });

  const ctx = createContext('dns', flags, overrides);
  const { config, logger, out } = ctx;

  if (positionals.length === 0) {
    throw invalidArgumentsError('No domains given');
  }

  const servers = listOption(values.nameservers);
  if (servers.length === 0) {
    servers.push(...(config.dns?.nameservers ?? []));
  }
  const names = new Map<string, string>();
  if (values['public-resolvers']) {
    for (const resolver of loadPublicResolvers()) {
      servers.push(resolver.address);
      names.set(resolver.address, resolver.name);
    }
  }
  const nameservers = servers.length > 0 ? [...new Set(servers)] : [SYSTEM_RESOLVER];

  const count = intOption('count', values.count, config.dns?.count ?? 3, { min: 1 });
  const timeoutMs = timeoutOption(values.timeout, flags, config.dns?.timeout ?? 2);
  const waitMs = intOption('wait', values.wait, config.dns?.wait ?? 100, { min: 0 });
  const record = choiceOption('record', values.record, RECORD_TYPES, choiceOption('record', config.dns?.record, RECORD_TYPES, 'A'));
  const sortField = choiceOption('sort', values.sort, SORT_FIELDS, 'avg');
  const format = choiceOption('format', values.format, FORMATS, 'table');

  logger.info(
    `Querying ${positionals.length} domain(s) against ${nameservers.length} nameserver(s), ${count} ${record} queries each`
  );

  const rows = sortRows(
    await measureLatency(positionals, nameservers, {
      count,
      record,
      timeoutMs,
      waitMs,
      query: overrides.query,
      sleep: overrides.sleep,
      onQuery: (domain, server, attempt, ms) =>
        logger.debug(`${domain} @${server} #${attempt}: ${ms === null ? 'failed' : `${ms.toFixed(1)} ms`}`),
    }),
    sortField
  );

  const info: QueryInformation = {
    timestamp: new Date().toISOString(),
    domains: positionals.length,
    nameservers: nameservers.length,
    record_type: record,
    queries_per_domain: count,
  };

  for (const row of rows.filter((r) => r.successful === 0)) {
    logger.warning(`All queries for ${row.domain} via ${row.server} failed`);
  }

  const label = (server: string): string => {
    const name = names.get(server);
    return name ? `${server} (${name})` : server;
  };

  switch (format) {
    case 'csv':
      out.result(renderCsv(rows).trimEnd());
      break;
    case 'json':
      if (!out.isJson()) out.result(renderJson(info, rows).trimEnd());
      break;
    case 'table':
      out.table(
        CSV_HEADER,
        rows.map((row) => rowValues({ ...row, server: label(row.server) }).map(String)),
        { alignRight: [2, 3, 4, 5, 6, 7, 8] }
      );
      if (nameservers.length > 1) {
        logger.section('Average by nameserver');
        for (const summary of serverSummary(rows)) {
          out.log(`  ${label(summary.server)}: ${summary.domains > 0 ? `${summary.avg} ms` : 'no answers'}`);
        }
      }
      break;
  }

  if (values.output) {
    writeReport(values.output, format === 'json' ? renderJson(info, rows) : renderCsv(rows));
    logger.success(`Results saved to ${values.output}`);
  }

  out.success(latencyJson(info, rows));
  return ExitCode.SUCCESS;
}
