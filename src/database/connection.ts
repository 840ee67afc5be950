/**
 * SQLite database connection management
 * Uses better-sqlite3 for synchronous operations with WAL mode
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { SCHEMA_SQL, INITIAL_SCHEMA_DATA, SCHEMA_VERSION } from './schema.js';
import { getStateDir } from '../config/loader.js';
import { CliError, ErrorCode, errorMessage } from '../cli/errors.js';

const DB_NAME = 'opskit.db';

export interface DatabaseConnection {
  db: Database.Database;
  path: string;
  close: () => void;
}

/**
 * Resolve the database path: an explicit path, then `database.path` from
 * config, then ~/.opskit/opskit.db
 */
export function getDbPath(explicit?: string, configured?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return explicit;
  if (configured) return configured;
  return join(getStateDir(env), DB_NAME);
}

/**
 * Open (creating when needed) the database and apply the schema
 */
export function openDatabase(dbPath: string): DatabaseConnection {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new CliError(ErrorCode.GENERAL_ERROR, `Cannot open database ${dbPath}: ${errorMessage(error)}`);
  }

  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA_SQL);
  const version = getSchemaVersion(db);
  if (version !== null && version !== SCHEMA_VERSION) {
    db.close();
    throw new CliError(
      ErrorCode.CONFIG_ERROR,
      `Database ${dbPath} has schema version ${version}, expected ${SCHEMA_VERSION}`
    );
  }
  db.exec(INITIAL_SCHEMA_DATA);

  return {
    db,
    path: dbPath,
    close: () => db.close(),
  };
}

/**
 * Get schema version from database
 */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[string], { value: string }>('SELECT value FROM schema_meta WHERE key = ?')
    .get('version');
  return row?.value ?? null;
}
