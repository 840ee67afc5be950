/**
 * Database schema for the opskit state store
 */

export const SCHEMA_VERSION = '1';

export const SCHEMA_SQL = `
-- Schema metadata (version tracking)
CREATE TABLE IF NOT EXISTS schema_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);

-- File integrity baseline (one row per file)
CREATE TABLE IF NOT EXISTS integrity_baseline (
    path TEXT PRIMARY KEY,
    hash TEXT NOT NULL,
    algorithm TEXT NOT NULL,
    size INTEGER NOT NULL,
    mtime TEXT NOT NULL,
    recorded_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Changes detected by integrity checks
CREATE TABLE IF NOT EXISTS integrity_events (
    id TEXT PRIMARY KEY,
    run_id TEXT NOT NULL,
    path TEXT NOT NULL,
    change_type TEXT NOT NULL CHECK (change_type IN ('MODIFIED', 'NEW', 'MISSING')),
    old_hash TEXT,
    new_hash TEXT,
    detected_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_integrity_events_run ON integrity_events(run_id);
CREATE INDEX IF NOT EXISTS idx_integrity_events_detected ON integrity_events(detected_at);

-- Addresses blocked by failed-login analysis
CREATE TABLE IF NOT EXISTS blocked_ips (
    ip TEXT PRIMARY KEY,
    attempts INTEGER NOT NULL,
    method TEXT NOT NULL,
    blocked_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

export const INITIAL_SCHEMA_DATA = `
INSERT OR REPLACE INTO schema_meta (key, value) VALUES ('version', '${SCHEMA_VERSION}');
INSERT OR IGNORE INTO schema_meta (key, value) VALUES ('created_at', datetime('now'));
`;
