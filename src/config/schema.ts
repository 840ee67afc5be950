/**
 * Configuration schema with descriptions, options, and defaults
 *
 * This tree is the single description of config.yaml: `config show`
 * annotates from it, `config schema` converts it to JSON Schema, and
 * DEFAULT_CONFIG is derived from its _default values.
 */

export interface SchemaField {
  _description: string;
  _type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  _options?: readonly (string | number | boolean)[];
  _default?: unknown;
  _min?: number;
  _max?: number;
  /** Element type for arrays */
  _items?: 'string' | 'number' | 'object';
}

export interface SchemaObject {
  _description?: string;
  [key: string]: SchemaField | SchemaObject | string | undefined;
}

export type SchemaNode = SchemaField | SchemaObject;

export const CONFIG_SCHEMA: SchemaObject = {
  output: {
    _description: 'Output formatting options',
    colors: {
      _description: 'Enable colored output',
      _type: 'boolean',
      _default: true,
    },
  },
  logging: {
    _description: 'Logger settings',
    level: {
      _description: 'Minimum level printed',
      _type: 'string',
      _options: ['debug', 'info', 'warning', 'error'],
      _default: 'info',
    },
    timestamps: {
      _description: 'Prefix log lines with YYYY-MM-DD HH:MM:SS',
      _type: 'boolean',
      _default: true,
    },
  },
  scan: {
    _description: 'Port scanner defaults',
    ports: {
      _description: 'Port list such as "22,80,8000-8100" (empty = common ports)',
      _type: 'string',
      _default: '',
    },
    timeout: {
      _description: 'Connect timeout per probe in seconds',
      _type: 'number',
      _min: 1,
      _default: 1,
    },
    concurrency: {
      _description: 'Probes in flight at once',
      _type: 'number',
      _min: 1,
      _max: 1000,
      _default: 10,
    },
  },
  ssh: {
    _description: 'Mass SSH runner defaults',
    user: {
      _description: 'Remote user (empty = current user)',
      _type: 'string',
      _default: '',
    },
    identity: {
      _description: 'Private key file passed with -i',
      _type: 'string',
      _default: '',
    },
    parallel: {
      _description: 'Concurrent SSH jobs',
      _type: 'number',
      _min: 1,
      _default: 5,
    },
    connectTimeout: {
      _description: 'ssh ConnectTimeout in seconds',
      _type: 'number',
      _min: 1,
      _default: 10,
    },
  },
  dns: {
    _description: 'DNS latency defaults',
    nameservers: {
      _description: 'Resolvers to query (empty = system resolver)',
      _type: 'array',
      _items: 'string',
      _default: [],
    },
    count: {
      _description: 'Queries per domain and resolver',
      _type: 'number',
      _min: 1,
      _default: 3,
    },
    timeout: {
      _description: 'Query timeout in seconds',
      _type: 'number',
      _min: 1,
      _default: 2,
    },
    wait: {
      _description: 'Pause between queries in milliseconds',
      _type: 'number',
      _min: 0,
      _default: 100,
    },
    record: {
      _description: 'Record type queried',
      _type: 'string',
      _options: ['A', 'AAAA', 'MX', 'NS', 'TXT', 'SOA', 'CNAME', 'PTR'],
      _default: 'A',
    },
  },
  blacklist: {
    _description: 'DNSBL checker defaults',
    timeout: {
      _description: 'Lookup timeout in seconds',
      _type: 'number',
      _min: 1,
      _default: 2,
    },
    concurrency: {
      _description: 'Lookups in flight at once',
      _type: 'number',
      _min: 1,
      _default: 5,
    },
  },
  bandwidth: {
    _description: 'Bandwidth monitor defaults',
    interval: {
      _description: 'Sampling interval in seconds',
      _type: 'number',
      _min: 1,
      _default: 1,
    },
    alertMbps: {
      _description: 'Alert when rx or tx exceeds this many Mbps (0 = off)',
      _type: 'number',
      _min: 0,
      _default: 0,
    },
  },
  disk: {
    _description: 'Disk usage alert thresholds',
    warning: {
      _description: 'Warning threshold (percent used)',
      _type: 'number',
      _min: 0,
      _max: 100,
      _default: 80,
    },
    critical: {
      _description: 'Critical threshold (percent used)',
      _type: 'number',
      _min: 0,
      _max: 100,
      _default: 90,
    },
    excludeTypes: {
      _description: 'Filesystem types skipped unless included explicitly',
      _type: 'array',
      _items: 'string',
      _default: ['tmpfs', 'devtmpfs', 'squashfs', 'overlay'],
    },
  },
  http: {
    _description: 'HTTP checker defaults',
    timeout: {
      _description: 'Request timeout in seconds',
      _type: 'number',
      _min: 1,
      _default: 10,
    },
    retries: {
      _description: 'Extra attempts after a failed check',
      _type: 'number',
      _min: 0,
      _default: 1,
    },
    expect: {
      _description: 'Accepted status codes, comma separated',
      _type: 'string',
      _default: '200',
    },
  },
  ssl: {
    _description: 'Certificate expiry thresholds',
    port: {
      _description: 'Default TLS port',
      _type: 'number',
      _min: 1,
      _max: 65535,
      _default: 443,
    },
    warning: {
      _description: 'Warn when fewer days remain',
      _type: 'number',
      _min: 0,
      _default: 30,
    },
    critical: {
      _description: 'Critical when fewer days remain',
      _type: 'number',
      _min: 0,
      _default: 7,
    },
    timeout: {
      _description: 'Handshake timeout in seconds',
      _type: 'number',
      _min: 1,
      _default: 10,
    },
  },
  integrity: {
    _description: 'File integrity monitor',
    algorithm: {
      _description: 'Hash algorithm',
      _type: 'string',
      _options: ['md5', 'sha1', 'sha256', 'sha512'],
      _default: 'sha256',
    },
    interval: {
      _description: 'Seconds between checks in monitor mode',
      _type: 'number',
      _min: 1,
      _default: 300,
    },
    exclude: {
      _description: 'Glob patterns never hashed',
      _type: 'array',
      _items: 'string',
      _default: [],
    },
  },
  logins: {
    _description: 'Failed login analysis',
    threshold: {
      _description: 'Attempts from one IP that raise an alert',
      _type: 'number',
      _min: 1,
      _default: 5,
    },
    blockThreshold: {
      _description: 'Attempts from one IP that trigger a block with --block',
      _type: 'number',
      _min: 1,
      _default: 10,
    },
    period: {
      _description: 'Minutes of log history examined (0 = whole file)',
      _type: 'number',
      _min: 0,
      _default: 10,
    },
    filter: {
      _description: 'Regular expression selecting failed-login lines',
      _type: 'string',
      _default: 'Failed|Failure|Invalid',
    },
  },
  logs: {
    _description: 'Log cleanup and rotation',
    age: {
      _description: 'Clean files older than this many days',
      _type: 'number',
      _min: 0,
      _default: 30,
    },
    extension: {
      _description: 'Extension of files cleaned',
      _type: 'string',
      _default: 'log',
    },
    keep: {
      _description: 'Rotated copies kept per log',
      _type: 'number',
      _min: 1,
      _default: 5,
    },
  },
  backup: {
    _description: 'Backup retention',
    retention: {
      _description: 'Delete backups older than this many days (0 = keep all)',
      _type: 'number',
      _min: 0,
      _default: 30,
    },
  },
  database: {
    _description: 'State database',
    path: {
      _description: 'SQLite file (empty = ~/.opskit/opskit.db)',
      _type: 'string',
      _default: '',
    },
  },
  notifications: {
    _description: 'Webhook and script hooks run on alert events',
    _type: 'array',
    _items: 'object',
    _default: [],
  },
};

/**
 * Check if a schema node is a leaf field
 */
export function isSchemaField(node: SchemaNode): node is SchemaField {
  return typeof node._type === 'string';
}

/**
 * Child nodes of a schema object, without the meta keys
 */
export function schemaChildren(node: SchemaObject): Array<[string, SchemaNode]> {
  const children: Array<[string, SchemaNode]> = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('_') || value === undefined || typeof value === 'string') continue;
    children.push([key, value]);
  }
  return children;
}

export function getSchemaForPath(path: string): SchemaNode | null {
  let current: SchemaNode = CONFIG_SCHEMA;

  for (const part of path.split('.')) {
    if (isSchemaField(current) || part.startsWith('_')) {
      return null;
    }
    const next: SchemaNode | undefined = schemaChildren(current).find(([key]) => key === part)?.[1];
    if (!next) {
      return null;
    }
    current = next;
  }

  return current;
}

export function getCategories(): string[] {
  return schemaChildren(CONFIG_SCHEMA).map(([key]) => key);
}

/**
 * Build the defaults tree from the schema's _default values
 */
export function schemaDefaults(node: SchemaObject = CONFIG_SCHEMA): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, child] of schemaChildren(node)) {
    if (isSchemaField(child)) {
      if (child._default !== undefined) {
        result[key] = structuredClone(child._default);
      }
    } else {
      result[key] = schemaDefaults(child);
    }
  }
  return result;
}
