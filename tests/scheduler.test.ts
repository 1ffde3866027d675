import { describe, expect, it, vi } from 'vitest';

vi.mock('../src/middleware/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() },
  redactId: (id: string) => id,
}));

import { JobScheduler, ruleMatches } from '../src/core/job-scheduler.js';
import type { ConditionResult } from '../src/core/content-provider.js';
import type { JobDefinition, JobType } from '../src/core/job-types.js';
import { DEFAULT_JOB_DEFINITIONS } from '../src/features/job-definitions.js';
import type { MetadataStore } from '../src/utils/db-backend.js';
import {
  formatZoned,
  getZonedParts,
  localDateKey,
  parseHHmm,
  truncateToMinute,
} from '../src/utils/zoned-time.js';

const TZ = 'Asia/Taipei';

// Asia/Taipei is UTC+8 all year
const SAT_0800 = Date.parse('2026-10-17T00:00:00Z');
const SUN_0800 = Date.parse('2026-10-18T00:00:00Z');
const SAT_0730 = Date.parse('2026-10-16T23:30:00Z');
const FRI_1900 = Date.parse('2026-10-16T11:00:00Z');
const SAT_1900 = Date.parse('2026-10-17T11:00:00Z');

class MemoryMetadata implements MetadataStore {
  readonly values = new Map<string, string>();
  async getMetadata(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }
  async setMetadata(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}

function probe(answer: ConditionResult | Error) {
  return {
    checkCondition: vi.fn(async (_jobType: JobType, _localDate: string): Promise<ConditionResult> => {
      if (answer instanceof Error) throw answer;
      return answer;
    }),
  };
}

function scheduler(definitions: JobDefinition[], conditions = probe({ active: false }), metadata?: MetadataStore) {
  return new JobScheduler({ definitions, timeZone: TZ, conditions, metadata });
}

const typhoonOnly: JobDefinition[] = [
  { jobType: 'TyphoonWatch', trigger: { kind: 'interval', everyMinutes: 60 }, conditional: true },
];

describe('zoned time helpers', () => {
  it('reads the calendar of the configured zone, not UTC', () => {
    expect(getZonedParts(SAT_0730, TZ)).toEqual({ year: 2026, month: 10, day: 17, hour: 7, minute: 30, weekday: 6 });
    expect(getZonedParts(SAT_0730, 'UTC').weekday).toBe(5);
  });

  it('truncates to the start of the minute', () => {
    expect(truncateToMinute(Date.parse('2026-10-17T00:00:42.500Z'))).toBe(SAT_0800);
    expect(truncateToMinute(new Date(SAT_0800))).toBe(SAT_0800);
  });

  it('parses HH:mm and rejects out-of-range times', () => {
    expect(parseHHmm('08:00')).toBe(480);
    expect(parseHHmm('7:30')).toBe(450);
    expect(parseHHmm('24:00')).toBeNull();
    expect(parseHHmm('8:5')).toBeNull();
  });

  it('formats local dates', () => {
    expect(localDateKey(getZonedParts(SAT_0800, TZ))).toBe('2026-10-17');
    expect(formatZoned(SAT_0730, TZ)).toBe('2026-10-17 07:30');
  });
});

describe('trigger rules', () => {
  it('matches daily rules at exactly HH:mm', () => {
    expect(ruleMatches({ kind: 'daily', time: '08:00' }, { hour: 8, minute: 0 })).toBe(true);
    expect(ruleMatches({ kind: 'daily', time: '08:00' }, { hour: 8, minute: 1 })).toBe(false);
  });

  it('matches interval rules on multiples of the period since midnight', () => {
    expect(ruleMatches({ kind: 'interval', everyMinutes: 60 }, { hour: 9, minute: 0 })).toBe(true);
    expect(ruleMatches({ kind: 'interval', everyMinutes: 60 }, { hour: 9, minute: 30 })).toBe(false);
    expect(ruleMatches({ kind: 'interval', everyMinutes: 15 }, { hour: 9, minute: 45 })).toBe(true);
  });
});

describe('JobScheduler.tick', () => {
  it('fires the daily job on Saturday 08:00 local time', async () => {
    const events = await scheduler(DEFAULT_JOB_DEFINITIONS).tick(SAT_0800 + 30_000);

    expect(events).toEqual([{ jobType: 'DailyWeather', triggerTimestamp: SAT_0800 }]);
  });

  it('fires the weekend forecast once a week, on Friday 19:00 local time', async () => {
    expect(await scheduler(DEFAULT_JOB_DEFINITIONS).tick(FRI_1900)).toEqual([
      { jobType: 'WeekendForecast', triggerTimestamp: FRI_1900 },
    ]);
    expect(await scheduler(DEFAULT_JOB_DEFINITIONS).tick(SAT_1900)).toEqual([]);
  });

  it('applies the weekday filter on Sunday', async () => {
    const events = await scheduler(DEFAULT_JOB_DEFINITIONS).tick(SUN_0800);
    expect(events).toEqual([{ jobType: 'DailyWeather', triggerTimestamp: SUN_0800 }]);
  });

  it('evaluates the day filter in the configured zone when UTC is still Friday', async () => {
    const saturdayOnly: JobDefinition[] = [
      { jobType: 'WeekendForecast', trigger: { kind: 'daily', time: '07:30' }, days: [6], conditional: false },
    ];
    const events = await scheduler(saturdayOnly).tick(SAT_0730);
    expect(events).toEqual([{ jobType: 'WeekendForecast', triggerTimestamp: SAT_0730 }]);
  });

  it('returns the same trigger timestamps anywhere inside one minute', async () => {
    const s = scheduler(DEFAULT_JOB_DEFINITIONS);
    const early = await s.tick(SAT_0800 + 5_000);
    const late = await s.tick(SAT_0800 + 55_000);
    expect(late).toEqual(early);
  });

  it('produces nothing for TyphoonWatch when no advisory is active', async () => {
    const conditions = probe({ active: false });
    const events = await scheduler(typhoonOnly, conditions).tick(Date.parse('2026-10-17T01:00:00Z'));

    expect(events).toEqual([]);
    expect(conditions.checkCondition).toHaveBeenCalledTimes(1);
    expect(conditions.checkCondition.mock.calls[0]?.slice(0, 2)).toEqual(['TyphoonWatch', '2026-10-17']);
  });

  it('skips a conditional job for this tick when the probe fails', async () => {
    const events = await scheduler(typhoonOnly, probe(new Error('advisory feed down'))).tick(SAT_0800);
    expect(events).toEqual([]);
  });

  it('asks the probe about the local date for the solar-term reminder', async () => {
    const conditions = probe({ active: false });
    const events = await scheduler(DEFAULT_JOB_DEFINITIONS, conditions).tick(SAT_0730);

    expect(events).toEqual([]);
    expect(conditions.checkCondition.mock.calls[0]?.slice(0, 2)).toEqual(['SolarTermReminder', '2026-10-17']);
  });

  it('does not fire twice for the same advisory', async () => {
    const metadata = new MemoryMetadata();
    const conditions = probe({ active: true, key: 'TY-2026-18' });
    const s = scheduler(typhoonOnly, conditions, metadata);
    const nine = Date.parse('2026-10-17T01:00:00Z');
    const ten = Date.parse('2026-10-17T02:00:00Z');

    const firing = { jobType: 'TyphoonWatch' as const, triggerTimestamp: nine, occurrenceKey: 'TY-2026-18' };
    expect(await s.tick(nine)).toEqual([firing]);
    expect(metadata.values.has('condition:TyphoonWatch')).toBe(false);

    await s.recordOccurrence(firing);
    // A re-evaluated minute still yields its firing
    expect(await s.tick(nine + 20_000)).toEqual([firing]);
    expect(await s.tick(ten)).toEqual([]);
    expect(JSON.parse(metadata.values.get('condition:TyphoonWatch') ?? '{}')).toEqual({
      key: 'TY-2026-18',
      triggerTimestamp: nine,
    });
  });

  it('keeps an advisory eligible until its firing is recorded', async () => {
    const metadata = new MemoryMetadata();
    const s = scheduler(typhoonOnly, probe({ active: true, key: 'TY-2026-18' }), metadata);
    const nine = Date.parse('2026-10-17T01:00:00Z');
    const ten = Date.parse('2026-10-17T02:00:00Z');

    await s.tick(nine);

    expect(await s.tick(ten)).toEqual([{ jobType: 'TyphoonWatch', triggerTimestamp: ten, occurrenceKey: 'TY-2026-18' }]);
  });

  it('fires again when a new advisory replaces the old one', async () => {
    const metadata = new MemoryMetadata();
    await metadata.setMetadata('condition:TyphoonWatch', JSON.stringify({ key: 'TY-2026-17', triggerTimestamp: 1 }));
    const eleven = Date.parse('2026-10-17T03:00:00Z');

    const events = await scheduler(typhoonOnly, probe({ active: true, key: 'TY-2026-18' }), metadata).tick(eleven);

    expect(events).toEqual([{ jobType: 'TyphoonWatch', triggerTimestamp: eleven, occurrenceKey: 'TY-2026-18' }]);
  });
});
