/**
 * Calendar helpers for a configured IANA time zone.
 *
 * Everything the scheduler decides (time of day, weekday, local date) is
 * derived here from an absolute instant, never from the process's own
 * local time.
 */

export interface ZonedParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  /** 0 = Sunday … 6 = Saturday, in the zone's calendar */
  weekday: number;
}

const MINUTE_MS = 60_000;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format();
    return true;
  } catch {
    return false;
  }
}

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, fmt);
  }
  return fmt;
}

export function getZonedParts(instant: Date | number, timeZone: string): ZonedParts {
  const date = typeof instant === 'number' ? new Date(instant) : instant;
  const lookup: Record<string, string> = {};
  for (const p of formatterFor(timeZone).formatToParts(date)) {
    if (p.type !== 'literal') lookup[p.type] = p.value;
  }

  const year = Number(lookup.year ?? '1970');
  const month = Number(lookup.month ?? '1');
  const day = Number(lookup.day ?? '1');
  // Some ICU builds still render midnight as "24" even with h23
  const hour = Number(lookup.hour ?? '0') % 24;
  const minute = Number(lookup.minute ?? '0');

  // Noon UTC keeps the weekday calculation clear of any offset
  const weekday = new Date(Date.UTC(year, month - 1, day, 12)).getUTCDay();

  return { year, month, day, hour, minute, weekday };
}

/** Truncate an instant to the start of its minute (epoch ms) */
export function truncateToMinute(instant: Date | number): number {
  const ms = typeof instant === 'number' ? instant : instant.getTime();
  return Math.floor(ms / MINUTE_MS) * MINUTE_MS;
}

/** YYYY-MM-DD in the zone's calendar */
export function localDateKey(parts: Pick<ZonedParts, 'year' | 'month' | 'day'>): string {
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function minutesOfDay(parts: Pick<ZonedParts, 'hour' | 'minute'>): number {
  return parts.hour * 60 + parts.minute;
}

/** Parse a 24-hour HH:mm string into minutes since midnight, or null */
export function parseHHmm(time: string): number | null {
  const m = time.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!m) return null;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) return null;
  return hour * 60 + minute;
}

export function formatZoned(instant: Date | number, timeZone: string): string {
  const p = getZonedParts(instant, timeZone);
  return `${localDateKey(p)} ${pad2(p.hour)}:${pad2(p.minute)}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}
