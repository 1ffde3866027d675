import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { logger } from '../middleware/logger.js';
import { JobDefinitionSchema, type JobDefinition } from '../core/job-types.js';

/**
 * Built-in push schedule (Asia/Taipei):
 * - DailyWeather        every day 08:00
 * - WeekendForecast     Friday 19:00
 * - TyphoonWatch        hourly, only while an advisory is active
 * - SolarTermReminder   07:30, only on a solar-term day
 */
export const DEFAULT_JOB_DEFINITIONS: JobDefinition[] = [
  { jobType: 'DailyWeather', trigger: { kind: 'daily', time: '08:00' }, conditional: false },
  { jobType: 'WeekendForecast', trigger: { kind: 'daily', time: '19:00' }, days: [5], conditional: false },
  { jobType: 'TyphoonWatch', trigger: { kind: 'interval', everyMinutes: 60 }, conditional: true },
  { jobType: 'SolarTermReminder', trigger: { kind: 'daily', time: '07:30' }, conditional: true },
];

// ── Zod schema for config/jobs.json ─────────────────────────────────

const JobsFileSchema = z.object({
  jobs: z.array(JobDefinitionSchema).min(1).refine(
    (jobs) => new Set(jobs.map((j) => j.jobType)).size === jobs.length,
    { message: 'each jobType may appear only once' },
  ),
});

/** Validate an already-parsed jobs document */
export function parseJobDefinitions(raw: unknown): JobDefinition[] {
  return JobsFileSchema.parse(raw).jobs;
}

/**
 * Job definitions from `path`, or the built-in defaults when no path is
 * configured. A file that is present but invalid is a startup error.
 */
export function loadJobDefinitions(path?: string): JobDefinition[] {
  if (!path) return DEFAULT_JOB_DEFINITIONS;

  const jobs = parseJobDefinitions(JSON.parse(readFileSync(path, 'utf-8')));
  logger.info({ path, jobs: jobs.map((j) => j.jobType) }, 'Loaded job definitions');
  return jobs;
}
