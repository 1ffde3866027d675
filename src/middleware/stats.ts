/**
 * Daily delivery statistics: in-memory counters that reset at local
 * midnight in the scheduler's time zone.
 *
 * Fed by the delivery coordinator (per attempt) and the scheduler
 * runtime (per dispatch); read by the health endpoint.
 */

import { logger } from './logger.js';
import type { DeliveryAttempt, DispatchReport, JobType } from '../core/job-types.js';
import { getZonedParts, localDateKey } from '../utils/zoned-time.js';

export interface JobStats {
  dispatches: number;
  aborted: number;
  delivered: number;
  failed: number;
  skipped: number;
  /** Failed + Skipped attempts by reason */
  reasons: Record<string, number>;
}

export interface DailyStats {
  /** YYYY-MM-DD in the stats time zone */
  date: string;
  jobs: Map<JobType, JobStats>;
}

let timeZone = 'UTC';
let current: DailyStats = freshStats();

/** Day boundaries follow this zone (defaults to UTC) */
export function setStatsTimeZone(zone: string): void {
  timeZone = zone;
  current.date = todayISO();
}

function freshStats(): DailyStats {
  return { date: todayISO(), jobs: new Map() };
}

function todayISO(): string {
  return localDateKey(getZonedParts(Date.now(), timeZone));
}

function getJobStats(jobType: JobType): JobStats {
  let stats = current.jobs.get(jobType);
  if (!stats) {
    stats = { dispatches: 0, aborted: 0, delivered: 0, failed: 0, skipped: 0, reasons: {} };
    current.jobs.set(jobType, stats);
  }
  return stats;
}

/** Roll over to a new day if needed. Returns the old stats if rolled. */
function maybeRollover(): DailyStats | null {
  const today = todayISO();
  if (current.date !== today) {
    const old = current;
    current = freshStats();
    logger.info({ oldDate: old.date, newDate: today, summary: summarize(old) }, 'Daily stats rolled over');
    return old;
  }
  return null;
}

// ── Public recording functions ──────────────────────────────────────

/** Record one resolved delivery attempt. */
export function recordAttempt(attempt: DeliveryAttempt): void {
  maybeRollover();
  const stats = getJobStats(attempt.jobType);
  if (attempt.outcome === 'Delivered') stats.delivered++;
  else if (attempt.outcome === 'Failed') stats.failed++;
  else if (attempt.outcome === 'Skipped') stats.skipped++;
  if (attempt.reason) stats.reasons[attempt.reason] = (stats.reasons[attempt.reason] ?? 0) + 1;
}

/** Record a finished (or aborted) dispatch batch. */
export function recordDispatch(report: DispatchReport): void {
  maybeRollover();
  const stats = getJobStats(report.jobType);
  stats.dispatches++;
  if (report.aborted) stats.aborted++;
}

// ── Public query functions ──────────────────────────────────────────

/** Get current day's stats (triggers rollover if needed) */
export function getCurrentStats(): DailyStats {
  maybeRollover();
  return current;
}

/** JSON-friendly view of a stats period */
export function summarize(stats: DailyStats = getCurrentStats()): { date: string; jobs: Record<string, JobStats> } {
  return { date: stats.date, jobs: Object.fromEntries(stats.jobs) };
}

/** Snapshot and reset */
export function snapshotAndReset(): DailyStats {
  const snapshot = current;
  current = freshStats();
  return snapshot;
}
