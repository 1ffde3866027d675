/**
 * Subscriber settings: preferred city and enabled notification jobs.
 *
 * Every write is a synchronous SQLite transaction on the same handle the
 * dispatcher reads from, so a settings change is visible to the very next
 * eligibility lookup.
 */

import type Database from 'better-sqlite3';
import { JOB_TYPES, JobTypeSchema, type JobType, type Subscriber } from '../core/job-types.js';
import { StoreUnavailableError, errorMessage } from '../core/errors.js';
import type { SubscriptionStore } from './db-backend.js';
import type { Db } from './db-schema.js';
import type { SubscriberRow } from './db-types.js';

const SUBSCRIBER_COLUMNS = `
  s.subscriber_id,
  s.preferred_city,
  (SELECT GROUP_CONCAT(job_type) FROM subscriber_jobs WHERE subscriber_id = s.subscriber_id) AS jobs
`;

export class SqliteSubscriptionStore implements SubscriptionStore {
  private readonly selectEligible: Database.Statement<[string], SubscriberRow>;
  private readonly selectOne: Database.Statement<[string], SubscriberRow>;
  private readonly insertSubscriber: Database.Statement<[string, string, number, number]>;
  private readonly updateCity: Database.Statement<[string, number, string]>;
  private readonly touch: Database.Statement<[number, string]>;
  private readonly enableJob: Database.Statement<[string, string, number]>;
  private readonly disableJob: Database.Statement<[string, string]>;
  private readonly disableJobs: Database.Statement<[string]>;

  constructor(
    private readonly db: Db,
    private readonly defaultCity: string,
  ) {
    this.selectEligible = db.prepare<[string], SubscriberRow>(`
      SELECT ${SUBSCRIBER_COLUMNS}
      FROM subscribers s
      JOIN subscriber_jobs j ON j.subscriber_id = s.subscriber_id
      WHERE j.job_type = ?
      ORDER BY s.subscriber_id
    `);
    this.selectOne = db.prepare<[string], SubscriberRow>(`SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers s WHERE s.subscriber_id = ?`);
    this.insertSubscriber = db.prepare<[string, string, number, number]>(`
      INSERT INTO subscribers (subscriber_id, preferred_city, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(subscriber_id) DO NOTHING
    `);
    this.updateCity = db.prepare<[string, number, string]>(`UPDATE subscribers SET preferred_city = ?, updated_at = ? WHERE subscriber_id = ?`);
    this.touch = db.prepare<[number, string]>(`UPDATE subscribers SET updated_at = ? WHERE subscriber_id = ?`);
    this.enableJob = db.prepare<[string, string, number]>(`
      INSERT INTO subscriber_jobs (subscriber_id, job_type, enabled_at)
      VALUES (?, ?, ?)
      ON CONFLICT(subscriber_id, job_type) DO NOTHING
    `);
    this.disableJob = db.prepare<[string, string]>(`DELETE FROM subscriber_jobs WHERE subscriber_id = ? AND job_type = ?`);
    this.disableJobs = db.prepare<[string]>(`DELETE FROM subscriber_jobs WHERE subscriber_id = ?`);
  }

  async getEligibleSubscribers(jobType: JobType): Promise<Subscriber[]> {
    const type = JobTypeSchema.parse(jobType);
    const rows = this.guard('getEligibleSubscribers', () => this.selectEligible.all(type));
    return rows.map(toSubscriber);
  }

  async getSettings(subscriberId: string): Promise<Subscriber | undefined> {
    const row = this.guard('getSettings', () => this.selectOne.get(subscriberId));
    return row ? toSubscriber(row) : undefined;
  }

  async ensureSubscriber(subscriberId: string): Promise<Subscriber> {
    return this.guard('ensureSubscriber', () => {
      const now = Date.now();
      this.insertSubscriber.run(subscriberId, this.defaultCity, now, now);
      return this.readBack(subscriberId);
    });
  }

  async setEnabled(subscriberId: string, jobType: JobType, enabled: boolean): Promise<Subscriber> {
    const type = JobTypeSchema.parse(jobType);
    return this.guard('setEnabled', () =>
      this.db.transaction(() => {
        const now = Date.now();
        this.insertSubscriber.run(subscriberId, this.defaultCity, now, now);
        if (enabled) this.enableJob.run(subscriberId, type, now);
        else this.disableJob.run(subscriberId, type);
        this.touch.run(now, subscriberId);
        return this.readBack(subscriberId);
      })(),
    );
  }

  async setCity(subscriberId: string, city: string): Promise<Subscriber> {
    return this.guard('setCity', () =>
      this.db.transaction(() => {
        const now = Date.now();
        this.insertSubscriber.run(subscriberId, city, now, now);
        this.updateCity.run(city, now, subscriberId);
        return this.readBack(subscriberId);
      })(),
    );
  }

  async disableAll(subscriberId: string): Promise<void> {
    this.guard('disableAll', () =>
      this.db.transaction(() => {
        this.disableJobs.run(subscriberId);
        this.touch.run(Date.now(), subscriberId);
      })(),
    );
  }

  private readBack(subscriberId: string): Subscriber {
    const row = this.selectOne.get(subscriberId);
    if (!row) throw new Error(`Subscriber ${subscriberId} vanished after write`);
    return toSubscriber(row);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreUnavailableError(`Subscription store ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function toSubscriber(row: SubscriberRow): Subscriber {
  const enabled = new Set((row.jobs ?? '').split(',').filter(Boolean));
  return {
    subscriberId: row.subscriber_id,
    preferredCity: row.preferred_city,
    // Unknown job types in storage are dropped at the boundary
    enabledJobs: JOB_TYPES.filter((t) => enabled.has(t)),
  };
}
