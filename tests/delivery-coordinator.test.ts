import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/middleware/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() },
  redactId: (id: string) => id,
}));

import { DeliveryCoordinator, retryKeyFor, type DeliveryCoordinatorOptions } from '../src/core/delivery-coordinator.js';
import type { Ack, Payload, SendOptions } from '../src/core/delivery-gateway.js';
import {
  ContentUnavailableError,
  GatewayPermanentError,
  GatewayTransientError,
  StoreUnavailableError,
} from '../src/core/errors.js';
import type { DeliveryAttempt, JobType, Subscriber } from '../src/core/job-types.js';
import { exponentialBackoff, fixedDelay } from '../src/middleware/retry.js';
import { openDb, type Db } from '../src/utils/db-schema.js';
import { SqliteDeliveryLog } from '../src/utils/db-deliveries.js';
import { SqliteSubscriptionStore } from '../src/utils/db-subscriptions.js';

const SAT_0800 = Date.parse('2026-10-17T00:00:00Z');

const openDbs: Db[] = [];

function textPayload(jobType: JobType, city: string): Payload {
  return { messages: [{ type: 'text', text: `${jobType}:${city}` }] };
}

function setup(overrides: Partial<DeliveryCoordinatorOptions> = {}) {
  const db = openDb(':memory:');
  openDbs.push(db);
  const subscriptions = new SqliteSubscriptionStore(db, '臺北市');
  const deliveries = new SqliteDeliveryLog(db);
  const content = {
    fetch: vi.fn(async (jobType: JobType, city: string, _signal?: AbortSignal): Promise<Payload> => textPayload(jobType, city)),
  };
  const gateway = {
    send: vi.fn(async (_subscriberId: string, _payload: Payload, _options: SendOptions): Promise<Ack> => ({ requestId: 'req-1' })),
  };
  const delays: number[] = [];
  const attempts: DeliveryAttempt[] = [];

  const options: DeliveryCoordinatorOptions = {
    subscriptions,
    deliveries,
    content,
    gateway,
    contentPolicy: fixedDelay('content', 3, 10),
    gatewayPolicy: exponentialBackoff('gateway', 3, 100, 10_000),
    concurrency: 4,
    attemptDeadlineMs: 5_000,
    sleep: async (ms) => {
      delays.push(ms);
    },
    onAttempt: (a) => attempts.push(a),
    ...overrides,
  };

  return { db, subscriptions, deliveries, content, gateway, delays, attempts, options, coordinator: new DeliveryCoordinator(options) };
}

afterEach(() => {
  for (const db of openDbs.splice(0)) db.close();
});

describe('retryKeyFor', () => {
  const key = { subscriberId: 'U-alpha', jobType: 'DailyWeather' as const, triggerTimestamp: SAT_0800 };

  it('is a stable UUID-shaped value per dedup key', () => {
    expect(retryKeyFor(key)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(retryKeyFor({ ...key })).toBe(retryKeyFor(key));
    expect(retryKeyFor({ ...key, triggerTimestamp: SAT_0800 + 60_000 })).not.toBe(retryKeyFor(key));
  });
});

describe('DeliveryCoordinator.dispatch', () => {
  it('delivers the weekend forecast only to the subscriber who enabled it', async () => {
    const { subscriptions, content, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'WeekendForecast', true);
    await subscriptions.setEnabled('U-bravo', 'WeekendForecast', true);
    await subscriptions.setEnabled('U-bravo', 'WeekendForecast', false);

    const report = await coordinator.dispatch('WeekendForecast', SAT_0800);

    expect(report).toMatchObject({ jobType: 'WeekendForecast', triggerTimestamp: SAT_0800, aborted: false, delivered: 1, failed: 0, skipped: 0 });
    expect(report.attempts).toEqual([
      { subscriberId: 'U-alpha', jobType: 'WeekendForecast', triggerTimestamp: SAT_0800, attemptCount: 1, outcome: 'Delivered' },
    ]);
    expect(content.fetch).toHaveBeenCalledTimes(1);
    expect(content.fetch.mock.calls[0]?.slice(0, 2)).toEqual(['WeekendForecast', '臺北市']);
    expect(gateway.send).toHaveBeenCalledTimes(1);
    expect(gateway.send.mock.calls[0]?.[0]).toBe('U-alpha');
    expect(gateway.send.mock.calls[0]?.[1]).toEqual(textPayload('WeekendForecast', '臺北市'));
    expect(gateway.send.mock.calls[0]?.[2].retryKey).toBe(
      retryKeyFor({ subscriberId: 'U-alpha', jobType: 'WeekendForecast', triggerTimestamp: SAT_0800 }),
    );
  });

  it('returns an empty report when nobody is subscribed', async () => {
    const { content, gateway, coordinator } = setup();

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report).toEqual({
      jobType: 'DailyWeather',
      triggerTimestamp: SAT_0800,
      aborted: false,
      attempts: [],
      delivered: 0,
      failed: 0,
      skipped: 0,
    });
    expect(content.fetch).not.toHaveBeenCalled();
    expect(gateway.send).not.toHaveBeenCalled();
  });

  it('aborts the whole batch when the subscription store is unavailable', async () => {
    const { db, options, content, gateway } = setup();

    class LockedStore extends SqliteSubscriptionStore {
      override async getEligibleSubscribers(): Promise<Subscriber[]> {
        throw new StoreUnavailableError('database is locked');
      }
    }
    const coordinator = new DeliveryCoordinator({ ...options, subscriptions: new LockedStore(db, '臺北市') });

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.aborted).toBe(true);
    expect(report.error).toBe('database is locked');
    expect(report.attempts).toEqual([]);
    expect(content.fetch).not.toHaveBeenCalled();
    expect(gateway.send).not.toHaveBeenCalled();
  });

  it('retries a failing content fetch and then delivers', async () => {
    const { subscriptions, content, delays, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    content.fetch
      .mockRejectedValueOnce(new ContentUnavailableError('upstream 503', { retryable: true }))
      .mockRejectedValueOnce(new ContentUnavailableError('upstream 503', { retryable: true }));

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]?.outcome).toBe('Delivered');
    expect(content.fetch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([10, 10]);
  });

  it('skips without contacting the gateway once content retries are exhausted', async () => {
    const { subscriptions, deliveries, content, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    content.fetch.mockRejectedValue(new ContentUnavailableError('upstream 503', { retryable: true }));

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts).toEqual([
      {
        subscriberId: 'U-alpha',
        jobType: 'DailyWeather',
        triggerTimestamp: SAT_0800,
        attemptCount: 0,
        outcome: 'Skipped',
        reason: 'content_unavailable',
        error: 'upstream 503',
      },
    ]);
    expect(content.fetch).toHaveBeenCalledTimes(3);
    expect(gateway.send).not.toHaveBeenCalled();
    expect(await deliveries.isDelivered({ subscriberId: 'U-alpha', jobType: 'DailyWeather', triggerTimestamp: SAT_0800 })).toBe(false);
  });

  it('does not retry content the provider reports as permanently missing', async () => {
    const { subscriptions, content, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    content.fetch.mockRejectedValue(new ContentUnavailableError('no forecast for city', { retryable: false }));

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]?.reason).toBe('content_unavailable');
    expect(content.fetch).toHaveBeenCalledTimes(1);
  });

  it('fails after exactly one call when the gateway rejects permanently', async () => {
    const { subscriptions, gateway, delays, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    gateway.send.mockRejectedValue(new GatewayPermanentError('Push rejected 400: invalid user', { status: 400 }));

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]).toMatchObject({ outcome: 'Failed', reason: 'gateway_rejected', attemptCount: 1 });
    expect(gateway.send).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('backs off longer before each gateway retry and reuses the retry key', async () => {
    const { subscriptions, gateway, delays, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    gateway.send
      .mockRejectedValueOnce(new GatewayTransientError('Push API error 500'))
      .mockRejectedValueOnce(new GatewayTransientError('Push API error 502'));

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]).toMatchObject({ outcome: 'Delivered', attemptCount: 3 });
    expect(delays).toEqual([100, 200]);
    const keys = new Set(gateway.send.mock.calls.map((call) => call[2].retryKey));
    expect(keys.size).toBe(1);
  });

  it('fails as gateway_unavailable when transient errors outlast the policy', async () => {
    const { subscriptions, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    gateway.send.mockRejectedValue(new GatewayTransientError('Push API error 503'));

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]).toMatchObject({ outcome: 'Failed', reason: 'gateway_unavailable', attemptCount: 3 });
    expect(gateway.send).toHaveBeenCalledTimes(3);
  });

  it('skips a subscriber already delivered for the same firing', async () => {
    const { subscriptions, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);

    const first = await coordinator.dispatch('DailyWeather', SAT_0800);
    const second = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(first.delivered).toBe(1);
    expect(second.attempts[0]).toMatchObject({ outcome: 'Skipped', reason: 'duplicate' });
    expect(gateway.send).toHaveBeenCalledTimes(1);
  });

  it('delivers again for a different trigger timestamp', async () => {
    const { subscriptions, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);

    await coordinator.dispatch('DailyWeather', SAT_0800);
    const nextDay = await coordinator.dispatch('DailyWeather', SAT_0800 + 24 * 60 * 60_000);

    expect(nextDay.delivered).toBe(1);
    expect(gateway.send).toHaveBeenCalledTimes(2);
  });

  it('sends once when the same firing is dispatched concurrently', async () => {
    const { subscriptions, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);

    const reports = await Promise.all([
      coordinator.dispatch('DailyWeather', SAT_0800),
      coordinator.dispatch('DailyWeather', SAT_0800),
    ]);

    const outcomes = reports.flatMap((r) => r.attempts).map((a) => `${a.outcome}:${a.reason ?? ''}`).sort();
    expect(outcomes).toEqual(['Delivered:', 'Skipped:duplicate']);
    expect(gateway.send).toHaveBeenCalledTimes(1);
  });

  it('records at most one Delivered across processes sharing the dedup store', async () => {
    const a = setup();
    await a.subscriptions.setEnabled('U-alpha', 'DailyWeather', true);

    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    const send = vi.fn(async (): Promise<Ack> => {
      await gate;
      return {};
    });
    const first = new DeliveryCoordinator({ ...a.options, gateway: { send } });
    const second = new DeliveryCoordinator({ ...a.options, gateway: { send } });

    const pending = Promise.all([first.dispatch('DailyWeather', SAT_0800), second.dispatch('DailyWeather', SAT_0800)]);
    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(2));
    release();
    const reports = await pending;

    expect(reports.reduce((n, r) => n + r.delivered, 0)).toBe(1);
    expect(reports.flatMap((r) => r.attempts).filter((x) => x.reason === 'duplicate')).toHaveLength(1);
  });

  it('skips a subscriber who disabled the job after the batch was loaded', async () => {
    const { db, options, content, gateway } = setup();

    class StaleStore extends SqliteSubscriptionStore {
      override async getEligibleSubscribers(jobType: JobType) {
        const snapshot = await super.getEligibleSubscribers(jobType);
        await this.setEnabled('U-alpha', jobType, false);
        return snapshot;
      }
    }
    const subscriptions = new StaleStore(db, '臺北市');
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    const coordinator = new DeliveryCoordinator({ ...options, subscriptions });

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]).toMatchObject({ outcome: 'Skipped', reason: 'ineligible' });
    expect(content.fetch).not.toHaveBeenCalled();
    expect(gateway.send).not.toHaveBeenCalled();
  });

  it('fetches content once per city and sends each subscriber their city', async () => {
    const { subscriptions, content, gateway, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    await subscriptions.setEnabled('U-bravo', 'DailyWeather', true);
    await subscriptions.setEnabled('U-charlie', 'DailyWeather', true);
    await subscriptions.setCity('U-charlie', '高雄市');

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.delivered).toBe(3);
    expect(content.fetch).toHaveBeenCalledTimes(2);
    const sent = Object.fromEntries(gateway.send.mock.calls.map((call) => [call[0], call[1]]));
    expect(sent).toEqual({
      'U-alpha': textPayload('DailyWeather', '臺北市'),
      'U-bravo': textPayload('DailyWeather', '臺北市'),
      'U-charlie': textPayload('DailyWeather', '高雄市'),
    });
  });

  it('fails a hung send at the deadline without holding up other subscribers', async () => {
    const send = vi.fn((subscriberId: string, _payload: Payload, options: SendOptions): Promise<Ack> => {
      if (subscriberId !== 'U-slow') return Promise.resolve({});
      return new Promise((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new GatewayTransientError('request aborted')));
      });
    });
    const { subscriptions, coordinator } = setup({ gateway: { send }, attemptDeadlineMs: 50 });
    await subscriptions.setEnabled('U-fast', 'DailyWeather', true);
    await subscriptions.setEnabled('U-slow', 'DailyWeather', true);

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts.map((a) => [a.subscriberId, a.outcome, a.reason])).toEqual([
      ['U-fast', 'Delivered', undefined],
      ['U-slow', 'Failed', 'deadline_exceeded'],
    ]);
  });

  it('fails at the deadline when the gateway ignores the abort signal', async () => {
    const send = vi.fn((): Promise<Ack> => new Promise(() => {}));
    const { subscriptions, coordinator } = setup({ gateway: { send }, attemptDeadlineMs: 50 });
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report).toMatchObject({ delivered: 0, failed: 1, skipped: 0 });
    expect(report.attempts[0]).toMatchObject({ outcome: 'Failed', reason: 'deadline_exceeded', attemptCount: 1 });
    expect(coordinator.inFlightCount).toBe(0);
  });

  it('skips at the deadline when content never arrives', async () => {
    const fetch = vi.fn((): Promise<Payload> => new Promise(() => {}));
    const { subscriptions, gateway, coordinator } = setup({ content: { fetch }, attemptDeadlineMs: 50 });
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);

    const report = await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(report.attempts[0]).toMatchObject({ outcome: 'Skipped', reason: 'deadline_exceeded' });
    expect(gateway.send).not.toHaveBeenCalled();
  });

  it('reports every resolved attempt to the onAttempt hook', async () => {
    const { subscriptions, gateway, attempts, coordinator } = setup();
    await subscriptions.setEnabled('U-alpha', 'DailyWeather', true);
    await subscriptions.setEnabled('U-bravo', 'DailyWeather', true);
    gateway.send.mockImplementation(async (subscriberId) => {
      if (subscriberId === 'U-bravo') throw new GatewayPermanentError('blocked', { status: 403 });
      return {};
    });

    await coordinator.dispatch('DailyWeather', SAT_0800);

    expect(attempts.map((a) => [a.subscriberId, a.outcome]).sort()).toEqual([
      ['U-alpha', 'Delivered'],
      ['U-bravo', 'Failed'],
    ]);
  });
});
