import '../utils/env.js';
import pino from 'pino';

/**
 * Shared structured logger.
 *
 * Reads LOG_LEVEL from the environment (after `.env` is loaded) so it can
 * be imported before the config module without a cycle.
 */
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  level,
  base: { service: 'skycast-notifier' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

/** Shorten opaque subscriber ids for log lines */
export function redactId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}…` : id;
}
