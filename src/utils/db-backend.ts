import type { DeliveryAttempt, DedupKey, JobType, Subscriber } from '../core/job-types.js';

/**
 * Storage contracts the scheduler and delivery coordinator depend on.
 *
 * The SQLite implementations live in `db-subscriptions.ts` and
 * `db-deliveries.ts`; tests may substitute in-memory fakes.
 */

export interface SubscriptionStore {
  getEligibleSubscribers(jobType: JobType): Promise<Subscriber[]>;
  getSettings(subscriberId: string): Promise<Subscriber | undefined>;
  /** Create with defaults (default city, nothing enabled) if absent */
  ensureSubscriber(subscriberId: string): Promise<Subscriber>;
  setEnabled(subscriberId: string, jobType: JobType, enabled: boolean): Promise<Subscriber>;
  setCity(subscriberId: string, city: string): Promise<Subscriber>;
  /** Soft delete: disable every job, keep the record */
  disableAll(subscriberId: string): Promise<void>;
}

export interface DeliveryLog {
  /** True only for the call that recorded the first Delivered mark */
  markIfAbsent(key: DedupKey, attemptCount?: number): Promise<boolean>;
  isDelivered(key: DedupKey): Promise<boolean>;
  /** Keep a non-Delivered outcome for inspection; never overwrites Delivered */
  recordOutcome(attempt: DeliveryAttempt): Promise<void>;
  pruneOlderThan(cutoffMs: number): Promise<number>;
}

export interface MetadataStore {
  getMetadata(key: string): Promise<string | undefined>;
  setMetadata(key: string, value: string): Promise<void>;
}
