import type { JobType } from './job-types.js';
import type { Payload } from './delivery-gateway.js';

export interface ConditionResult {
  active: boolean;
  /** Identifies the occurrence (e.g. advisory number) so a repeat can be recognised */
  key?: string;
}

/**
 * Content provider surface. `fetch` throws `ContentUnavailableError`
 * (retryable or not); `checkCondition` throws on any failure.
 */
export interface ContentProvider {
  fetch(jobType: JobType, city: string, signal?: AbortSignal): Promise<Payload>;
  checkCondition(jobType: JobType, localDate: string, signal?: AbortSignal): Promise<ConditionResult>;
}
