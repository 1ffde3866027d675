/**
 * Database initialization and schema.
 *
 * Owns the CREATE TABLE statements. `openDb` returns a ready handle that
 * the store modules prepare their statements against; tests pass
 * `:memory:` for an isolated database per suite.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';

export type Db = InstanceType<typeof Database>;

export function openDb(path: string): Db {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: Db = new Database(path, { timeout: 5000 });

  // busy_timeout before the journal_mode switch
  db.pragma('busy_timeout = 5000');
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  migrate(db);
  logger.info({ path }, 'SQLite database opened');
  return db;
}

function migrate(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS subscribers (
      subscriber_id TEXT PRIMARY KEY,
      preferred_city TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS subscriber_jobs (
      subscriber_id TEXT NOT NULL REFERENCES subscribers (subscriber_id),
      job_type TEXT NOT NULL
        CHECK (job_type IN ('DailyWeather', 'WeekendForecast', 'TyphoonWatch', 'SolarTermReminder')),
      enabled_at INTEGER NOT NULL,
      PRIMARY KEY (subscriber_id, job_type)
    );

    CREATE INDEX IF NOT EXISTS idx_subscriber_jobs_type
      ON subscriber_jobs (job_type);

    CREATE TABLE IF NOT EXISTS delivery_log (
      subscriber_id TEXT NOT NULL,
      job_type TEXT NOT NULL,
      trigger_ts INTEGER NOT NULL,
      outcome TEXT NOT NULL CHECK (outcome IN ('Delivered', 'Failed', 'Skipped')),
      reason TEXT,
      attempt_count INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (subscriber_id, job_type, trigger_ts)
    );

    CREATE INDEX IF NOT EXISTS idx_delivery_log_updated
      ON delivery_log (updated_at);

    CREATE TABLE IF NOT EXISTS system_metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);
}

export function closeDb(db: Db): void {
  db.close();
  logger.info('SQLite database closed');
}
