/**
 * Delivery log: the durable dedup record for (subscriber, job, trigger).
 *
 * A Delivered row is written with a single conditional INSERT, so two
 * racing writers (a restarted process and a still-running attempt) can
 * never both observe "first mark". Failed/Skipped rows are kept for
 * operators and may later be upgraded to Delivered, never the reverse.
 */

import type Database from 'better-sqlite3';
import type { DeliveryAttempt, DedupKey } from '../core/job-types.js';
import { StoreUnavailableError, errorMessage } from '../core/errors.js';
import type { DeliveryLog } from './db-backend.js';
import type { Db } from './db-schema.js';

type KeyParams = [string, string, number];

export class SqliteDeliveryLog implements DeliveryLog {
  private readonly markDelivered: Database.Statement<[string, string, number, number, number]>;
  private readonly selectDelivered: Database.Statement<KeyParams, { found: number }>;
  private readonly upsertOutcome: Database.Statement<[string, string, number, string, string | null, number, number]>;
  private readonly deleteOlder: Database.Statement<[number]>;

  constructor(db: Db) {
    // Upgrades a Failed/Skipped row; leaves an existing Delivered row untouched
    this.markDelivered = db.prepare<[string, string, number, number, number]>(`
      INSERT INTO delivery_log (subscriber_id, job_type, trigger_ts, outcome, reason, attempt_count, updated_at)
      VALUES (?, ?, ?, 'Delivered', NULL, ?, ?)
      ON CONFLICT(subscriber_id, job_type, trigger_ts) DO UPDATE
        SET outcome = 'Delivered', reason = NULL,
            attempt_count = excluded.attempt_count, updated_at = excluded.updated_at
        WHERE delivery_log.outcome <> 'Delivered'
    `);
    this.selectDelivered = db.prepare<KeyParams, { found: number }>(`
      SELECT 1 AS found FROM delivery_log
      WHERE subscriber_id = ? AND job_type = ? AND trigger_ts = ? AND outcome = 'Delivered'
    `);
    this.upsertOutcome = db.prepare<[string, string, number, string, string | null, number, number]>(`
      INSERT INTO delivery_log (subscriber_id, job_type, trigger_ts, outcome, reason, attempt_count, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(subscriber_id, job_type, trigger_ts) DO UPDATE
        SET outcome = excluded.outcome, reason = excluded.reason,
            attempt_count = excluded.attempt_count, updated_at = excluded.updated_at
        WHERE delivery_log.outcome <> 'Delivered'
    `);
    this.deleteOlder = db.prepare<[number]>(`DELETE FROM delivery_log WHERE updated_at < ?`);
  }

  async markIfAbsent(key: DedupKey, attemptCount = 1): Promise<boolean> {
    const result = this.guard('markIfAbsent', () =>
      this.markDelivered.run(key.subscriberId, key.jobType, key.triggerTimestamp, attemptCount, Date.now()),
    );
    return result.changes === 1;
  }

  async isDelivered(key: DedupKey): Promise<boolean> {
    const row = this.guard('isDelivered', () =>
      this.selectDelivered.get(key.subscriberId, key.jobType, key.triggerTimestamp),
    );
    return row !== undefined;
  }

  async recordOutcome(attempt: DeliveryAttempt): Promise<void> {
    // Delivered goes through markIfAbsent; Pending is never persisted
    if (attempt.outcome === 'Delivered' || attempt.outcome === 'Pending') return;
    this.guard('recordOutcome', () =>
      this.upsertOutcome.run(
        attempt.subscriberId,
        attempt.jobType,
        attempt.triggerTimestamp,
        attempt.outcome,
        attempt.reason ?? null,
        attempt.attemptCount,
        Date.now(),
      ),
    );
  }

  async pruneOlderThan(cutoffMs: number): Promise<number> {
    return this.guard('pruneOlderThan', () => this.deleteOlder.run(cutoffMs).changes);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreUnavailableError(`Delivery log ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
