import { logger } from './middleware/logger.js';
import { config } from './utils/config.js';
import { openDb, closeDb } from './utils/db-schema.js';
import { SqliteSubscriptionStore } from './utils/db-subscriptions.js';
import { SqliteDeliveryLog } from './utils/db-deliveries.js';
import { SqliteMetadataStore } from './utils/db-metadata.js';
import { startHealthServer, stopHealthServer, startMemoryWatchdog } from './middleware/health.js';
import { exponentialBackoff, fixedDelay } from './middleware/retry.js';
import { recordAttempt, recordDispatch, setStatsTimeZone } from './middleware/stats.js';
import { DeliveryCoordinator } from './core/delivery-coordinator.js';
import { JobScheduler } from './core/job-scheduler.js';
import { NotificationScheduler } from './core/scheduler-runtime.js';
import { ContentServiceClient } from './features/content-service.js';
import { loadJobDefinitions } from './features/job-definitions.js';
import { LinePushGateway } from './platforms/line/push-gateway.js';

const db = openDb(config.DB_PATH);
let runtime: NotificationScheduler | null = null;

async function main(): Promise<void> {
  logger.info('Skycast notifier starting...');

  logger.info({
    timeZone: config.SCHEDULER_TIMEZONE,
    tickIntervalMs: config.TICK_INTERVAL_MS,
    concurrency: config.DISPATCH_CONCURRENCY,
    contentService: config.CONTENT_SERVICE_URL,
    healthPort: config.HEALTH_PORT,
    healthBindHost: config.HEALTH_BIND_HOST,
    manualTrigger: Boolean(config.TRIGGER_TOKEN),
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  setStatsTimeZone(config.SCHEDULER_TIMEZONE);

  const subscriptions = new SqliteSubscriptionStore(db, config.DEFAULT_CITY);
  const deliveries = new SqliteDeliveryLog(db);
  const metadata = new SqliteMetadataStore(db);

  const content = new ContentServiceClient({
    baseUrl: config.CONTENT_SERVICE_URL,
    token: config.CONTENT_SERVICE_TOKEN,
  });
  const gateway = new LinePushGateway({
    channelAccessToken: config.LINE_CHANNEL_ACCESS_TOKEN,
    baseUrl: config.LINE_API_BASE_URL,
  });

  const coordinator = new DeliveryCoordinator({
    subscriptions,
    deliveries,
    content,
    gateway,
    contentPolicy: fixedDelay('content', config.CONTENT_RETRY_ATTEMPTS, config.CONTENT_RETRY_DELAY_MS),
    gatewayPolicy: exponentialBackoff(
      'gateway',
      config.GATEWAY_RETRY_ATTEMPTS,
      config.GATEWAY_RETRY_BASE_MS,
      config.GATEWAY_RETRY_BUDGET_MS,
    ),
    concurrency: config.DISPATCH_CONCURRENCY,
    attemptDeadlineMs: config.ATTEMPT_DEADLINE_MS,
    onAttempt: recordAttempt,
  });

  const scheduler = new JobScheduler({
    definitions: loadJobDefinitions(config.JOBS_CONFIG_PATH),
    timeZone: config.SCHEDULER_TIMEZONE,
    conditions: content,
    metadata,
  });

  runtime = new NotificationScheduler({
    scheduler,
    coordinator,
    deliveries,
    tickIntervalMs: config.TICK_INTERVAL_MS,
    firingWindowMs: config.FIRING_WINDOW_MINUTES * 60_000,
    onReport: recordDispatch,
  });

  // Start health check server + memory watchdog for monitoring
  startHealthServer({
    port: config.HEALTH_PORT,
    host: config.HEALTH_BIND_HOST,
    scheduler: runtime,
    triggerToken: config.TRIGGER_TOKEN,
  });
  startMemoryWatchdog();

  runtime.start();
  logger.info('Skycast notifier is running');
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error — shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection — shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception — shutting down');
  process.exit(1);
});

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal — draining dispatches');
  stopHealthServer();

  try {
    await runtime?.stop();
  } catch (err) {
    logger.error({ err, signal }, 'Scheduler did not stop cleanly');
  }

  try {
    closeDb(db);
  } catch (err) {
    logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
