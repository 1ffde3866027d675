import { PROJECT_ROOT } from './env.js';
import { z } from 'zod';
import { resolve, isAbsolute } from 'path';
import { isSupportedCity } from './cities.js';
import { isValidTimeZone } from './zoned-time.js';

const envSchema = z.object({
  // Push API (LINE Messaging API)
  LINE_CHANNEL_ACCESS_TOKEN: z.string().min(1, 'LINE_CHANNEL_ACCESS_TOKEN is required — set in .env'),
  LINE_API_BASE_URL: z.string().url().default('https://api.line.me'),

  // Content provider (weather / typhoon / solar-term payloads)
  CONTENT_SERVICE_URL: z.string().url(),
  CONTENT_SERVICE_TOKEN: z.string().optional(),

  // Scheduling
  SCHEDULER_TIMEZONE: z.string().default('Asia/Taipei'),
  DEFAULT_CITY: z.string().default('臺北市'),
  TICK_INTERVAL_MS: z.coerce.number().int().min(1000).default(15_000),
  FIRING_WINDOW_MINUTES: z.coerce.number().int().min(1).default(30),
  JOBS_CONFIG_PATH: z.string().optional(),

  // Delivery
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  ATTEMPT_DEADLINE_MS: z.coerce.number().int().min(1000).default(30_000),
  CONTENT_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(3),
  CONTENT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  GATEWAY_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  GATEWAY_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1000),
  GATEWAY_RETRY_BUDGET_MS: z.coerce.number().int().min(0).default(10_000),

  // Infrastructure
  DB_PATH: z.string().default('data/skycast.db'),
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HEALTH_BIND_HOST: z.string().default('127.0.0.1'),
  TRIGGER_TOKEN: z.string().min(16, 'TRIGGER_TOKEN must be at least 16 characters').optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

if (!isValidTimeZone(parsed.data.SCHEDULER_TIMEZONE)) {
  console.error(`❌ SCHEDULER_TIMEZONE is not a valid IANA time zone: ${parsed.data.SCHEDULER_TIMEZONE}`);
  process.exit(1);
}

if (!isSupportedCity(parsed.data.DEFAULT_CITY)) {
  console.error(`❌ DEFAULT_CITY is not a supported city: ${parsed.data.DEFAULT_CITY}`);
  process.exit(1);
}

function resolveFromRoot(path: string): string {
  return isAbsolute(path) ? path : resolve(PROJECT_ROOT, path);
}

export const config: AppConfig = {
  ...parsed.data,
  DB_PATH: resolveFromRoot(parsed.data.DB_PATH),
  JOBS_CONFIG_PATH: parsed.data.JOBS_CONFIG_PATH ? resolveFromRoot(parsed.data.JOBS_CONFIG_PATH) : undefined,
};
