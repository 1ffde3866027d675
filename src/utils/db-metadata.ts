/**
 * System-wide key/value metadata (e.g. the last typhoon advisory that
 * produced a notification).
 */

import type Database from 'better-sqlite3';
import { StoreUnavailableError, errorMessage } from '../core/errors.js';
import type { MetadataStore } from './db-backend.js';
import type { Db } from './db-schema.js';
import type { MetadataRow } from './db-types.js';

export class SqliteMetadataStore implements MetadataStore {
  private readonly select: Database.Statement<[string], MetadataRow>;
  private readonly upsert: Database.Statement<[string, string, number]>;

  constructor(db: Db) {
    this.select = db.prepare<[string], MetadataRow>(`SELECT value FROM system_metadata WHERE key = ?`);
    this.upsert = db.prepare<[string, string, number]>(`
      INSERT INTO system_metadata (key, value, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
    `);
  }

  async getMetadata(key: string): Promise<string | undefined> {
    try {
      return this.select.get(key)?.value;
    } catch (err) {
      throw new StoreUnavailableError(`Metadata read failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async setMetadata(key: string, value: string): Promise<void> {
    try {
      this.upsert.run(key, value, Date.now());
    } catch (err) {
      throw new StoreUnavailableError(`Metadata write failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
