/**
 * Scheduler runtime: owns the tick loop and hands firing events to the
 * delivery coordinator.
 *
 * The tick callback never waits on a dispatch: it only enqueues. A slow
 * dispatch therefore cannot delay the next job's firing, and `stop()`
 * drains whatever is still in flight.
 */

import { logger } from '../middleware/logger.js';
import type { DeliveryLog } from '../utils/db-backend.js';
import { getZonedParts, localDateKey, truncateToMinute } from '../utils/zoned-time.js';
import { errorMessage } from './errors.js';
import type { JobScheduler } from './job-scheduler.js';
import type { DispatchReport, FiringEvent, JobType } from './job-types.js';

const LIVENESS_FACTOR = 3;
const DEFAULT_RETENTION_MS = 30 * 24 * 60 * 60 * 1000; // 30 days
const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

export interface NotificationSchedulerOptions {
  scheduler: JobScheduler;
  coordinator: { dispatch(jobType: JobType, triggerTimestamp: number): Promise<DispatchReport> };
  tickIntervalMs: number;
  /** Firings older than this when their dispatch starts are dropped */
  firingWindowMs: number;
  /** Delivery log housekeeping, once per local day */
  deliveries?: Pick<DeliveryLog, 'pruneOlderThan'>;
  retentionMs?: number;
  now?: () => number;
  onReport?: (report: DispatchReport) => void;
}

export class NotificationScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private startedAt: number | null = null;
  private lastTick: number | null = null;
  private lastPruneDate: string | null = null;
  /** (jobType, trigger minute) pairs already enqueued → trigger timestamp */
  private readonly fired = new Map<string, number>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly now: () => number;

  constructor(private readonly opts: NotificationSchedulerOptions) {
    this.now = opts.now ?? Date.now;
  }

  get lastTickAt(): number | null {
    return this.lastTick;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.startedAt = this.now();
    this.timer = setInterval(() => this.scheduleTick(), this.opts.tickIntervalMs);
    this.scheduleTick();

    logger.info(
      {
        timeZone: this.opts.scheduler.timeZone,
        tickIntervalMs: this.opts.tickIntervalMs,
        jobs: this.opts.scheduler.getDefinitions().map((d) => d.jobType),
      },
      'Notification scheduler started',
    );
  }

  /** Stop ticking and wait (bounded) for in-flight dispatches */
  async stop(timeoutMs = DEFAULT_DRAIN_TIMEOUT_MS): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const drained = await this.drain(timeoutMs);
    if (!drained) {
      logger.warn({ pending: this.inFlight.size, timeoutMs }, 'Shutdown drain timed out with dispatches in flight');
    }
    logger.info('Notification scheduler stopped');
  }

  /** Resolves true once nothing is in flight, false on timeout */
  async drain(timeoutMs = DEFAULT_DRAIN_TIMEOUT_MS): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      while (this.inFlight.size > 0) {
        const settled = Promise.allSettled([...this.inFlight]).then(() => true);
        if (!(await Promise.race([settled, timeout]))) return false;
      }
      return true;
    } finally {
      clearTimeout(timer);
    }
  }

  isAlive(now = this.now()): boolean {
    if (!this.timer) return false;
    const reference = this.lastTick ?? this.startedAt;
    if (reference === null) return false;
    return now - reference <= LIVENESS_FACTOR * this.opts.tickIntervalMs;
  }

  /**
   * Evaluate the scheduler once and enqueue what fires. Overlapping calls
   * are skipped while a previous tick's condition probes are pending.
   */
  async runTick(now = this.now()): Promise<FiringEvent[]> {
    if (this.ticking) {
      logger.debug('Previous tick still running — skipping');
      return [];
    }
    this.ticking = true;
    try {
      const events = await this.opts.scheduler.tick(now);
      const enqueued: FiringEvent[] = [];
      for (const event of events) {
        const key = firingKey(event);
        if (this.fired.has(key)) continue;
        this.fired.set(key, event.triggerTimestamp);
        logger.info({ jobType: event.jobType, triggerTimestamp: event.triggerTimestamp }, 'Job fired');
        this.enqueue(event);
        enqueued.push(event);
      }
      this.forgetOldFirings(now);
      await this.maybePrune(now);
      return enqueued;
    } finally {
      this.lastTick = now;
      this.ticking = false;
    }
  }

  /**
   * Manual trigger for the current minute. Bypasses the trigger rule;
   * conditional jobs still consult the probe unless `force` is set.
   * Returns the enqueued event, or null when nothing was enqueued.
   */
  async runNow(jobType: JobType, opts: { force?: boolean } = {}): Promise<FiringEvent | null> {
    const triggerTimestamp = truncateToMinute(this.now());
    const definition = this.opts.scheduler.getDefinition(jobType);
    const event: FiringEvent = { jobType, triggerTimestamp };

    if (definition?.conditional && !opts.force) {
      const localDate = localDateKey(getZonedParts(triggerTimestamp, this.opts.scheduler.timeZone));
      const verdict = await this.opts.scheduler.evaluateCondition(jobType, localDate, triggerTimestamp);
      if (verdict.fire === false) {
        logger.info({ jobType }, 'Manual trigger: condition not met — nothing enqueued');
        return null;
      }
      if (verdict.occurrenceKey !== undefined) event.occurrenceKey = verdict.occurrenceKey;
    }

    this.fired.set(firingKey(event), triggerTimestamp);
    logger.info({ jobType, triggerTimestamp, force: opts.force ?? false }, 'Manual trigger enqueued');
    this.enqueue(event);
    return event;
  }

  private scheduleTick(): void {
    this.runTick().catch((err: unknown) => {
      logger.error({ err }, 'Scheduler tick failed');
    });
  }

  private enqueue(event: FiringEvent): void {
    const task: Promise<void> = this.runDispatch(event)
      .catch((err: unknown) => {
        logger.error({ jobType: event.jobType, triggerTimestamp: event.triggerTimestamp, err }, 'Dispatch crashed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async runDispatch(event: FiringEvent): Promise<void> {
    const lateByMs = this.now() - event.triggerTimestamp;
    if (lateByMs > this.opts.firingWindowMs) {
      logger.error(
        { jobType: event.jobType, triggerTimestamp: event.triggerTimestamp, lateByMs },
        'Firing outside its window — notification missed',
      );
      return;
    }
    const report = await this.opts.coordinator.dispatch(event.jobType, event.triggerTimestamp);
    if (report.aborted) {
      // Let a later tick inside the same trigger minute enqueue it again
      this.fired.delete(firingKey(event));
      logger.warn(
        { jobType: event.jobType, triggerTimestamp: event.triggerTimestamp, err: report.error },
        'Dispatch aborted — will retry while the job is still due',
      );
    } else {
      await this.recordOccurrence(event);
    }
    this.opts.onReport?.(report);
  }

  private async recordOccurrence(event: FiringEvent): Promise<void> {
    try {
      await this.opts.scheduler.recordOccurrence(event);
    } catch (err) {
      logger.warn(
        { jobType: event.jobType, occurrence: event.occurrenceKey, err: errorMessage(err) },
        'Failed to record notified occurrence',
      );
    }
  }

  private forgetOldFirings(now: number): void {
    const horizon = now - this.opts.firingWindowMs - 60_000;
    for (const [key, ts] of this.fired) {
      if (ts < horizon) this.fired.delete(key);
    }
  }

  private async maybePrune(now: number): Promise<void> {
    if (!this.opts.deliveries) return;
    const today = localDateKey(getZonedParts(now, this.opts.scheduler.timeZone));
    if (this.lastPruneDate === today) return;
    this.lastPruneDate = today;

    const retentionMs = this.opts.retentionMs ?? DEFAULT_RETENTION_MS;
    try {
      const removed = await this.opts.deliveries.pruneOlderThan(now - retentionMs);
      if (removed > 0) logger.info({ removed, retentionMs }, 'Pruned delivery log');
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Delivery log pruning failed');
    }
  }
}

function firingKey(event: FiringEvent): string {
  return `${event.jobType}:${event.triggerTimestamp}`;
}
