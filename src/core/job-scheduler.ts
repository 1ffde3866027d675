/**
 * Job scheduler: turns job definitions into firing events.
 *
 * `tick(now)` is evaluated at minute granularity in the configured time
 * zone. It is side-effect free apart from the condition probe, and
 * returns the same trigger timestamps for any `now` inside the same
 * minute. The repeat-occurrence marker is written by `recordOccurrence`
 * once a dispatch for the occurrence has run.
 */

import { logger } from '../middleware/logger.js';
import type { ContentProvider } from './content-provider.js';
import { errorMessage } from './errors.js';
import type { FiringEvent, JobDefinition, JobType, TriggerRule } from './job-types.js';
import type { MetadataStore } from '../utils/db-backend.js';
import {
  getZonedParts,
  localDateKey,
  minutesOfDay,
  parseHHmm,
  truncateToMinute,
  type ZonedParts,
} from '../utils/zoned-time.js';

const DEFAULT_CONDITION_TIMEOUT_MS = 10_000;

export interface JobSchedulerOptions {
  definitions: JobDefinition[];
  timeZone: string;
  conditions: Pick<ContentProvider, 'checkCondition'>;
  /** Remembers the last occurrence key per conditional job */
  metadata?: MetadataStore;
  conditionTimeoutMs?: number;
}

interface OccurrenceMarker {
  key: string;
  triggerTimestamp: number;
}

export type ConditionVerdict = { fire: false } | { fire: true; occurrenceKey?: string };

export function ruleMatches(rule: TriggerRule, parts: Pick<ZonedParts, 'hour' | 'minute'>): boolean {
  const nowMinutes = minutesOfDay(parts);
  switch (rule.kind) {
    case 'daily':
      return parseHHmm(rule.time) === nowMinutes;
    case 'interval':
      return nowMinutes % rule.everyMinutes === 0;
  }
}

export function dayAllowed(def: JobDefinition, parts: Pick<ZonedParts, 'weekday'>): boolean {
  return !def.days || def.days.includes(parts.weekday);
}

export class JobScheduler {
  private readonly definitions: readonly JobDefinition[];
  private readonly conditionTimeoutMs: number;

  constructor(private readonly opts: JobSchedulerOptions) {
    this.definitions = [...opts.definitions];
    this.conditionTimeoutMs = opts.conditionTimeoutMs ?? DEFAULT_CONDITION_TIMEOUT_MS;
  }

  getDefinitions(): readonly JobDefinition[] {
    return this.definitions;
  }

  getDefinition(jobType: JobType): JobDefinition | undefined {
    return this.definitions.find((d) => d.jobType === jobType);
  }

  get timeZone(): string {
    return this.opts.timeZone;
  }

  /** Firing events due at `now` (minute granularity, configured zone) */
  async tick(now: Date | number): Promise<FiringEvent[]> {
    const triggerTimestamp = truncateToMinute(now);
    const parts = getZonedParts(triggerTimestamp, this.opts.timeZone);

    const due = this.definitions.filter((def) => dayAllowed(def, parts) && ruleMatches(def.trigger, parts));
    if (due.length === 0) return [];

    const events: FiringEvent[] = [];
    for (const def of due) {
      if (!def.conditional) {
        events.push({ jobType: def.jobType, triggerTimestamp });
        continue;
      }
      const verdict = await this.evaluateCondition(def.jobType, localDateKey(parts), triggerTimestamp);
      if (verdict.fire === false) continue;
      events.push(
        verdict.occurrenceKey === undefined
          ? { jobType: def.jobType, triggerTimestamp }
          : { jobType: def.jobType, triggerTimestamp, occurrenceKey: verdict.occurrenceKey },
      );
    }
    return events;
  }

  /**
   * Evaluate the condition probe for a conditional job. Any probe or
   * marker failure skips the job for this tick only.
   */
  async evaluateCondition(jobType: JobType, localDate: string, triggerTimestamp: number): Promise<ConditionVerdict> {
    try {
      const result = await this.opts.conditions.checkCondition(
        jobType,
        localDate,
        AbortSignal.timeout(this.conditionTimeoutMs),
      );
      if (!result.active) {
        logger.debug({ jobType, localDate }, 'Condition not met — no firing');
        return { fire: false };
      }
      if (result.key === undefined || !this.opts.metadata) return { fire: true };

      const markerKey = `condition:${jobType}`;
      const previous = parseMarker(await this.opts.metadata.getMetadata(markerKey));
      if (previous && previous.key === result.key && previous.triggerTimestamp !== triggerTimestamp) {
        logger.debug({ jobType, occurrence: result.key }, 'Occurrence already notified — no firing');
        return { fire: false };
      }

      logger.info({ jobType, occurrence: result.key }, 'New occurrence detected');
      return { fire: true, occurrenceKey: result.key };
    } catch (err) {
      logger.warn({ jobType, localDate, err: errorMessage(err) }, 'Condition check failed — skipping this tick');
      return { fire: false };
    }
  }

  /** Remember the occurrence behind a dispatched firing so it is not notified again */
  async recordOccurrence(event: FiringEvent): Promise<void> {
    if (event.occurrenceKey === undefined || !this.opts.metadata) return;
    const marker: OccurrenceMarker = { key: event.occurrenceKey, triggerTimestamp: event.triggerTimestamp };
    await this.opts.metadata.setMetadata(`condition:${event.jobType}`, JSON.stringify(marker));
  }
}

function parseMarker(raw: string | undefined): OccurrenceMarker | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === 'object' && parsed !== null
      && 'key' in parsed && typeof parsed.key === 'string'
      && 'triggerTimestamp' in parsed && typeof parsed.triggerTimestamp === 'number'
    ) {
      return { key: parsed.key, triggerTimestamp: parsed.triggerTimestamp };
    }
    return null;
  } catch {
    return null;
  }
}
