/**
 * Delivery coordinator: turns one firing event into per-subscriber
 * deliveries.
 *
 * Flow per dispatch:
 * 1. Load eligible subscribers (a store failure aborts the whole batch).
 * 2. Per subscriber, on a bounded worker pool and under an overall
 *    deadline: re-read settings, check the dedup key, fetch content
 *    (bounded immediate retries, cached per city for this dispatch),
 *    push with exponential backoff, then mark Delivered.
 *
 * The Delivered mark is written only after the gateway accepts. A crash
 * in between leaves the key unmarked; the gateway retry key lets the
 * platform collapse the resend.
 */

import { createHash } from 'node:crypto';
import { logger, redactId } from '../middleware/logger.js';
import { runWithRetry, type RetryPolicy, type RetryResult, type Sleep } from '../middleware/retry.js';
import type { DeliveryLog, SubscriptionStore } from '../utils/db-backend.js';
import type { ContentProvider } from './content-provider.js';
import type { DeliveryGateway, Payload } from './delivery-gateway.js';
import { DeadlineExceededError, GatewayPermanentError, errorMessage } from './errors.js';
import {
  dedupKeyString,
  type DedupKey,
  type DeliveryAttempt,
  type DispatchReport,
  type JobType,
  type Subscriber,
} from './job-types.js';
import { WorkerPool } from './worker-pool.js';

export interface DeliveryCoordinatorOptions {
  subscriptions: SubscriptionStore;
  deliveries: DeliveryLog;
  content: Pick<ContentProvider, 'fetch'>;
  gateway: DeliveryGateway;
  contentPolicy: RetryPolicy;
  gatewayPolicy: RetryPolicy;
  concurrency: number;
  /** Overall limit for content fetch + send of one subscriber */
  attemptDeadlineMs: number;
  sleep?: Sleep;
  /** Called once per resolved attempt (stats) */
  onAttempt?: (attempt: DeliveryAttempt) => void;
}

type ContentCache = Map<string, Promise<RetryResult<Payload>>>;

/**
 * Deterministic UUID-shaped key for the push API's idempotent retry
 * header, derived from the dedup key.
 */
export function retryKeyFor(key: DedupKey): string {
  const hex = createHash('sha256').update(dedupKeyString(key)).digest('hex');
  // version 4, RFC 4122 variant
  const variant = ((parseInt(hex[16] ?? '0', 16) & 0x3) | 0x8).toString(16);
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-4${hex.slice(13, 16)}-${variant}${hex.slice(17, 20)}-${hex.slice(20, 32)}`;
}

export class DeliveryCoordinator {
  private readonly pool: WorkerPool;
  private readonly inFlight = new Set<string>();

  constructor(private readonly opts: DeliveryCoordinatorOptions) {
    this.pool = new WorkerPool(opts.concurrency);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async dispatch(jobType: JobType, triggerTimestamp: number): Promise<DispatchReport> {
    const startedAt = Date.now();
    let subscribers: Subscriber[];
    try {
      subscribers = await this.opts.subscriptions.getEligibleSubscribers(jobType);
    } catch (err) {
      logger.error(
        { jobType, triggerTimestamp, err: errorMessage(err) },
        'Subscription store unavailable — dispatch aborted, notification missed for this window',
      );
      return summarize(jobType, triggerTimestamp, [], errorMessage(err));
    }

    if (subscribers.length === 0) {
      logger.info({ jobType, triggerTimestamp }, 'No eligible subscribers');
      return summarize(jobType, triggerTimestamp, []);
    }

    logger.info({ jobType, triggerTimestamp, subscribers: subscribers.length }, 'Dispatch started');

    const cache: ContentCache = new Map();
    const attempts = await this.pool.map(subscribers, (s) => this.deliverTo(s, jobType, triggerTimestamp, cache));
    const report = summarize(jobType, triggerTimestamp, attempts);

    logger.info(
      {
        jobType,
        triggerTimestamp,
        delivered: report.delivered,
        failed: report.failed,
        skipped: report.skipped,
        durationMs: Date.now() - startedAt,
      },
      'Dispatch finished',
    );
    return report;
  }

  private async deliverTo(
    snapshot: Subscriber,
    jobType: JobType,
    triggerTimestamp: number,
    cache: ContentCache,
  ): Promise<DeliveryAttempt> {
    const key: DedupKey = { subscriberId: snapshot.subscriberId, jobType, triggerTimestamp };
    const keyString = dedupKeyString(key);
    const attempt: DeliveryAttempt = { ...key, attemptCount: 0, outcome: 'Pending' };

    if (this.inFlight.has(keyString)) {
      return this.resolve(attempt, 'Skipped', 'duplicate');
    }
    this.inFlight.add(keyString);

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new DeadlineExceededError(`Delivery attempt exceeded ${this.opts.attemptDeadlineMs}ms`));
    }, this.opts.attemptDeadlineMs);

    try {
      return await this.attemptDelivery(snapshot, key, attempt, cache, controller.signal);
    } catch (err) {
      logger.error({ ...logKey(key), err }, 'Delivery attempt crashed');
      return this.resolve(attempt, 'Failed', 'gateway_unavailable', errorMessage(err));
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(keyString);
    }
  }

  private async attemptDelivery(
    snapshot: Subscriber,
    key: DedupKey,
    attempt: DeliveryAttempt,
    cache: ContentCache,
    signal: AbortSignal,
  ): Promise<DeliveryAttempt> {
    const subscriber = await this.currentSettings(snapshot, key);
    if (!subscriber) {
      return this.resolve(attempt, 'Skipped', 'ineligible');
    }

    if (await this.alreadyDelivered(key)) {
      return this.resolve(attempt, 'Skipped', 'duplicate');
    }

    const content = await untilDeadline(this.contentFor(key.jobType, subscriber.preferredCity, cache), signal);
    if (!content.ok) {
      const reason = content.error instanceof DeadlineExceededError ? 'deadline_exceeded' : 'content_unavailable';
      return this.resolve(attempt, 'Skipped', reason, content.error.message);
    }

    const retryKey = retryKeyFor(key);
    const sent = await untilDeadline(
      runWithRetry(
        (n) => {
          attempt.attemptCount = n;
          return this.opts.gateway.send(key.subscriberId, content.value, { retryKey, signal });
        },
        this.opts.gatewayPolicy,
        { sleep: this.opts.sleep, signal, context: logKey(key) },
      ),
      signal,
    );

    if (!sent.ok) {
      if (signal.aborted) {
        return this.resolve(attempt, 'Failed', 'deadline_exceeded', sent.error.message);
      }
      const reason = sent.error instanceof GatewayPermanentError ? 'gateway_rejected' : 'gateway_unavailable';
      return this.resolve(attempt, 'Failed', reason, sent.error.message);
    }

    try {
      const marked = await this.opts.deliveries.markIfAbsent(key, attempt.attemptCount);
      if (!marked) {
        logger.warn(logKey(key), 'Delivered concurrently by another attempt — duplicate send');
        return this.resolve(attempt, 'Skipped', 'duplicate');
      }
    } catch (err) {
      // Sent but unrecorded: the next dispatch of this key may send again
      logger.error({ ...logKey(key), err: errorMessage(err) }, 'Gateway accepted but Delivered mark failed');
      return this.resolve(attempt, 'Delivered', undefined, errorMessage(err));
    }

    return this.resolve(attempt, 'Delivered');
  }

  /** Fresh settings right before sending; falls back to the batch snapshot */
  private async currentSettings(snapshot: Subscriber, key: DedupKey): Promise<Subscriber | undefined> {
    try {
      const current = await this.opts.subscriptions.getSettings(snapshot.subscriberId);
      if (!current || !current.enabledJobs.includes(key.jobType)) return undefined;
      return current;
    } catch (err) {
      logger.warn({ ...logKey(key), err: errorMessage(err) }, 'Settings re-read failed — using batch snapshot');
      return snapshot;
    }
  }

  private async alreadyDelivered(key: DedupKey): Promise<boolean> {
    try {
      return await this.opts.deliveries.isDelivered(key);
    } catch (err) {
      logger.warn({ ...logKey(key), err: errorMessage(err) }, 'Dedup lookup failed — proceeding with send');
      return false;
    }
  }

  private contentFor(jobType: JobType, city: string, cache: ContentCache): Promise<RetryResult<Payload>> {
    let pending = cache.get(city);
    if (!pending) {
      const signal = AbortSignal.timeout(this.opts.attemptDeadlineMs);
      pending = runWithRetry(
        () => this.opts.content.fetch(jobType, city, signal),
        this.opts.contentPolicy,
        { sleep: this.opts.sleep, signal, context: { jobType, city } },
      );
      cache.set(city, pending);
    }
    return pending;
  }

  private async resolve(
    attempt: DeliveryAttempt,
    outcome: DeliveryAttempt['outcome'],
    reason?: DeliveryAttempt['reason'],
    error?: string,
  ): Promise<DeliveryAttempt> {
    const resolved: DeliveryAttempt = { ...attempt, outcome };
    if (reason) resolved.reason = reason;
    if (error) resolved.error = error;

    const context = { ...logKey(resolved), outcome, reason, attempts: resolved.attemptCount };
    if (outcome === 'Failed') logger.warn({ ...context, err: error }, 'Delivery failed');
    else if (outcome === 'Skipped') logger.info(context, 'Delivery skipped');
    else logger.debug(context, 'Delivered');

    if (reason !== 'duplicate') {
      try {
        await this.opts.deliveries.recordOutcome(resolved);
      } catch (err) {
        logger.warn({ ...logKey(resolved), err: errorMessage(err) }, 'Failed to record delivery outcome');
      }
    }

    this.opts.onAttempt?.(resolved);
    return resolved;
  }
}

function untilDeadline<T>(pending: Promise<RetryResult<T>>, signal: AbortSignal): Promise<RetryResult<T>> {
  const expired = (): RetryResult<T> => ({
    ok: false,
    error: signal.reason instanceof Error ? signal.reason : new DeadlineExceededError('Delivery attempt deadline exceeded'),
    attempts: 0,
    retryable: false,
  });
  if (signal.aborted) return Promise.resolve(expired());

  return new Promise((resolve) => {
    const onAbort = (): void => resolve(expired());
    signal.addEventListener('abort', onAbort, { once: true });
    void pending.then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ ok: false, error: err instanceof Error ? err : new Error(String(err)), attempts: 0, retryable: false });
      },
    );
  });
}

function logKey(key: DedupKey): Record<string, unknown> {
  return { subscriber: redactId(key.subscriberId), jobType: key.jobType, triggerTimestamp: key.triggerTimestamp };
}

function summarize(jobType: JobType, triggerTimestamp: number, attempts: DeliveryAttempt[], error?: string): DispatchReport {
  return {
    jobType,
    triggerTimestamp,
    aborted: error !== undefined,
    ...(error !== undefined ? { error } : {}),
    attempts,
    delivered: attempts.filter((a) => a.outcome === 'Delivered').length,
    failed: attempts.filter((a) => a.outcome === 'Failed').length,
    skipped: attempts.filter((a) => a.outcome === 'Skipped').length,
  };
}
