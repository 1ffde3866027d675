/**
 * Health check HTTP endpoint + manual job trigger.
 *
 * Exposes a tiny HTTP server that returns JSON with:
 * - Scheduler liveness (last tick within 3× the tick interval)
 * - Dispatches in flight
 * - Today's delivery counters per job
 * - Uptime and memory usage
 *
 * `/health` answers 503 when the scheduler is not alive, so a process
 * supervisor can restart a wedged tick loop.
 *
 * When a trigger token is configured, `POST /jobs/{jobType}/run` runs a
 * job for the current minute (what an external cron would call).
 */

import { timingSafeEqual } from 'node:crypto';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { logger } from './logger.js';
import { summarize } from './stats.js';
import { isJobType, type FiringEvent, type JobType } from '../core/job-types.js';

export interface SchedulerHealthSource {
  isAlive(now?: number): boolean;
  readonly lastTickAt: number | null;
  readonly inFlightCount: number;
  runNow(jobType: JobType, opts?: { force?: boolean }): Promise<FiringEvent | null>;
}

export interface HealthServerOptions {
  port: number;
  host: string;
  scheduler: SchedulerHealthSource;
  /** Enables POST /jobs/{jobType}/run when set */
  triggerToken?: string;
}

const startedAt = Date.now();
let server: Server | null = null;

const HEALTH_RATE_WINDOW_MS = 60_000;
const HEALTH_RATE_LIMIT = 120;

const healthRateWindow = new Map<string, { windowStart: number; count: number }>();

function isHealthRequestRateLimited(ip: string, now: number): boolean {
  const existing = healthRateWindow.get(ip);
  if (!existing || now - existing.windowStart >= HEALTH_RATE_WINDOW_MS) {
    healthRateWindow.set(ip, { windowStart: now, count: 1 });
    return false;
  }

  existing.count += 1;
  return existing.count > HEALTH_RATE_LIMIT;
}

export interface HealthReport {
  status: 'ok' | 'stalled';
  alive: boolean;
  lastTickAgo: number | null;
  inFlightDispatches: number;
  uptime: number;
  memory: { rss: number; heapUsed: number; heapTotal: number };
  deliveries: ReturnType<typeof summarize>;
}

export function buildHealthReport(scheduler: SchedulerHealthSource, now = Date.now()): HealthReport {
  const mem = process.memoryUsage();
  const alive = scheduler.isAlive(now);
  return {
    status: alive ? 'ok' : 'stalled',
    alive,
    lastTickAgo: scheduler.lastTickAt !== null ? Math.floor((now - scheduler.lastTickAt) / 1000) : null,
    inFlightDispatches: scheduler.inFlightCount,
    uptime: Math.floor((now - startedAt) / 1000),
    memory: {
      rss: Math.round(mem.rss / 1024 / 1024),
      heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
      heapTotal: Math.round(mem.heapTotal / 1024 / 1024),
    },
    deliveries: summarize(),
  };
}

/** Constant-time bearer token comparison */
export function isTriggerAuthorized(header: string | undefined, token: string | undefined): boolean {
  if (!token || !header?.startsWith('Bearer ')) return false;
  const left = Buffer.from(header.slice('Bearer '.length));
  const right = Buffer.from(token);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/** `/jobs/DailyWeather/run?force=1` → { jobType, force } */
export function parseTriggerPath(url: string): { jobType: JobType; force: boolean } | null {
  const parsed = new URL(url, 'http://localhost');
  const match = parsed.pathname.match(/^\/jobs\/([A-Za-z]+)\/run$/);
  const candidate = match?.[1];
  if (!candidate || !isJobType(candidate)) return null;
  const force = parsed.searchParams.get('force');
  return { jobType: candidate, force: force === '1' || force === 'true' };
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader('content-type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(body));
}

async function handleTrigger(req: IncomingMessage, res: ServerResponse, opts: HealthServerOptions): Promise<void> {
  if (!isTriggerAuthorized(req.headers.authorization, opts.triggerToken)) {
    writeJson(res, 401, { error: 'unauthorized' });
    return;
  }
  const target = parseTriggerPath(req.url ?? '');
  if (!target) {
    writeJson(res, 404, { error: 'unknown_job' });
    return;
  }
  const event = await opts.scheduler.runNow(target.jobType, { force: target.force });
  writeJson(res, 202, event ? { accepted: true, ...event } : { accepted: false, reason: 'condition_not_met' });
}

/**
 * Start the HTTP health endpoint (`/health`) with lightweight abuse protection.
 */
export function startHealthServer(opts: HealthServerOptions): void {
  server = createServer((req, res) => {
    const now = Date.now();
    const ip = req.socket.remoteAddress ?? 'unknown';

    if (isHealthRequestRateLimited(ip, now)) {
      writeJson(res, 429, { error: 'rate_limited', message: 'Too many requests' });
      return;
    }

    if (req.url === '/health' && req.method === 'GET') {
      const report = buildHealthReport(opts.scheduler, now);
      writeJson(res, report.alive ? 200 : 503, report);
      return;
    }

    if (opts.triggerToken && req.method === 'POST' && req.url?.startsWith('/jobs/')) {
      handleTrigger(req, res, opts).catch((err: unknown) => {
        logger.error({ err, url: req.url }, 'Manual trigger failed');
        writeJson(res, 500, { error: 'internal_error' });
      });
      return;
    }

    res.writeHead(404);
    res.end();
  });

  server.listen(opts.port, opts.host, () => {
    logger.info(
      { port: opts.port, url: `http://${opts.host}:${opts.port}/health`, manualTrigger: Boolean(opts.triggerToken) },
      'Health check server started',
    );
  });

  server.on('error', (err) => {
    logger.error({ err, port: opts.port }, 'Health check server error');
  });
}

/** Stop the health endpoint and memory watchdog timers. */
export function stopHealthServer(): void {
  if (server) {
    server.close();
    server = null;
  }
  stopMemoryWatchdog();
  healthRateWindow.clear();
}

// ── Memory watchdog ─────────────────────────────────────────────────

const MEMORY_CHECK_INTERVAL_MS = 60_000; // every minute
const MEMORY_WARN_MB = 300;
const MEMORY_RESTART_MB = 768;

let memoryTimer: ReturnType<typeof setInterval> | null = null;
let memoryWarned = false;

/**
 * Start periodic memory monitoring.
 * Logs a warning at 300MB RSS, forces exit at 768MB (let the supervisor restart).
 */
export function startMemoryWatchdog(): void {
  memoryTimer = setInterval(() => {
    const rssMB = Math.round(process.memoryUsage().rss / 1024 / 1024);

    if (rssMB >= MEMORY_RESTART_MB) {
      logger.fatal({ rssMB, limit: MEMORY_RESTART_MB }, 'Memory limit exceeded — restarting');
      process.exit(1);
    }

    if (rssMB >= MEMORY_WARN_MB && !memoryWarned) {
      memoryWarned = true;
      logger.warn({ rssMB, threshold: MEMORY_WARN_MB }, 'High memory usage detected');
    } else if (rssMB < MEMORY_WARN_MB && memoryWarned) {
      memoryWarned = false;
    }
  }, MEMORY_CHECK_INTERVAL_MS);
  memoryTimer.unref();

  logger.info({ warnMB: MEMORY_WARN_MB, restartMB: MEMORY_RESTART_MB }, 'Memory watchdog started');
}

function stopMemoryWatchdog(): void {
  if (memoryTimer) {
    clearInterval(memoryTimer);
    memoryTimer = null;
  }
}
