/**
 * Database schema for locations and route samples.
 *
 * Every statement is idempotent, so ensureSchema() runs safely before each
 * invocation as well as from the `init-db` command.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_UP = `
  CREATE TABLE IF NOT EXISTS locations (
    id INTEGER PRIMARY KEY,
    label TEXT NOT NULL UNIQUE,
    address TEXT NOT NULL,
    lat REAL,
    lon REAL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  -- One row per route alternative; rows of one provider call share batch_id and batch_ts
  CREATE TABLE IF NOT EXISTS samples (
    id INTEGER PRIMARY KEY,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    batch_id TEXT NOT NULL,
    batch_ts DATETIME NOT NULL,
    origin_label TEXT NOT NULL,
    dest_label TEXT NOT NULL,
    description TEXT NOT NULL,
    meters INTEGER NOT NULL,
    miles REAL NOT NULL,
    duration_seconds INTEGER NOT NULL,
    duration_static_minutes INTEGER NOT NULL,
    duration_minutes INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_samples_batch ON samples(batch_id);
  CREATE INDEX IF NOT EXISTS idx_samples_batch_ts ON samples(batch_ts);
  CREATE INDEX IF NOT EXISTS idx_samples_route ON samples(origin_label, dest_label);
  CREATE INDEX IF NOT EXISTS idx_samples_created_at ON samples(created_at);
`;

export function ensureSchema(db: Database.Database): void {
  db.exec(SCHEMA_UP);
}
