import { z } from 'zod';

/**
 * Notification job domain types shared by the scheduler, the delivery
 * coordinator and the stores.
 */

export const JOB_TYPES = ['DailyWeather', 'WeekendForecast', 'TyphoonWatch', 'SolarTermReminder'] as const;

export const JobTypeSchema = z.enum(JOB_TYPES);

export type JobType = z.infer<typeof JobTypeSchema>;

export function isJobType(value: string): value is JobType {
  return JobTypeSchema.safeParse(value).success;
}

// ── Subscribers ─────────────────────────────────────────────────────

export interface Subscriber {
  subscriberId: string;
  preferredCity: string;
  enabledJobs: JobType[];
}

// ── Job definitions ─────────────────────────────────────────────────

export const TriggerRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('daily'),
    /** Local HH:mm in the scheduler's time zone */
    time: z.string().regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'time must be HH:mm (24h)'),
  }),
  z.object({
    kind: z.literal('interval'),
    /** Fires whenever minutes since local midnight is a multiple of this */
    everyMinutes: z.number().int().min(1).max(1440),
  }),
]);

export type TriggerRule = z.infer<typeof TriggerRuleSchema>;

export const JobDefinitionSchema = z.object({
  jobType: JobTypeSchema,
  trigger: TriggerRuleSchema,
  /** Weekday filter, 0 = Sunday … 6 = Saturday. Absent means every day. */
  days: z.array(z.number().int().min(0).max(6)).min(1).optional(),
  /** Consult the condition probe before firing */
  conditional: z.boolean().default(false),
});

export type JobDefinition = z.infer<typeof JobDefinitionSchema>;

// ── Firing + delivery ───────────────────────────────────────────────

export interface FiringEvent {
  jobType: JobType;
  /** Logical firing time: epoch ms truncated to the minute */
  triggerTimestamp: number;
  /** Advisory id behind a conditional firing, remembered once delivered */
  occurrenceKey?: string;
}

export type DeliveryOutcome = 'Pending' | 'Delivered' | 'Failed' | 'Skipped';

export type SkipReason = 'duplicate' | 'content_unavailable' | 'ineligible' | 'deadline_exceeded';
export type FailReason = 'gateway_rejected' | 'gateway_unavailable' | 'deadline_exceeded';

export interface DeliveryAttempt {
  subscriberId: string;
  jobType: JobType;
  triggerTimestamp: number;
  /** Gateway send attempts made (0 when content never arrived) */
  attemptCount: number;
  outcome: DeliveryOutcome;
  reason?: SkipReason | FailReason;
  error?: string;
}

export interface DedupKey {
  subscriberId: string;
  jobType: JobType;
  triggerTimestamp: number;
}

export function dedupKeyString(key: DedupKey): string {
  return `${key.subscriberId}:${key.jobType}:${key.triggerTimestamp}`;
}

export interface DispatchReport {
  jobType: JobType;
  triggerTimestamp: number;
  /** True when the batch never started (subscription store unavailable) */
  aborted: boolean;
  error?: string;
  attempts: DeliveryAttempt[];
  delivered: number;
  failed: number;
  skipped: number;
}
