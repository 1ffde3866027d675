import { z } from 'zod';
import { logger } from '../middleware/logger.js';
import type { ConditionResult, ContentProvider } from '../core/content-provider.js';
import type { Payload } from '../core/delivery-gateway.js';
import { ContentUnavailableError, errorMessage } from '../core/errors.js';
import type { JobType } from '../core/job-types.js';

/**
 * Content service client: fetches ready-to-send LINE messages per job
 * and city, and answers the condition probe (typhoon advisory active?
 * solar term today?).
 *
 * Rendering happens on the service side; this client only validates the
 * shape before anything reaches the gateway.
 */

const TIMEOUT_MS = 10_000;

// ── Zod schemas (runtime validation for external API responses) ─────

const MessageSchema = z.record(z.string(), z.unknown()).refine((m) => typeof m.type === 'string', {
  message: 'message object needs a string "type"',
});

const ContentResponseSchema = z.object({
  messages: z.array(MessageSchema).min(1).max(5),
});

const ConditionResponseSchema = z.object({
  active: z.boolean(),
  key: z.string().min(1).optional(),
});

/** Status codes after which asking again will not help */
const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 422]);

export interface ContentServiceClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class ContentServiceClient implements ContentProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: ContentServiceClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async fetch(jobType: JobType, city: string, signal?: AbortSignal): Promise<Payload> {
    const url = `${this.baseUrl}/content/${jobType}?city=${encodeURIComponent(city)}`;
    const body = await this.getJson(url, signal, `${jobType} content for ${city}`);

    const parsed = ContentResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ jobType, city, issues: parsed.error.issues.length }, 'Content service returned an invalid payload');
      throw new ContentUnavailableError(`Invalid ${jobType} payload for ${city}`, { retryable: false, cause: parsed.error });
    }
    return { messages: parsed.data.messages };
  }

  async checkCondition(jobType: JobType, localDate: string, signal?: AbortSignal): Promise<ConditionResult> {
    const url = `${this.baseUrl}/conditions/${jobType}?date=${encodeURIComponent(localDate)}`;
    const body = await this.getJson(url, signal, `${jobType} condition`);
    return ConditionResponseSchema.parse(body);
  }

  private async getJson(url: string, signal: AbortSignal | undefined, what: string): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const headers: Record<string, string> = { accept: 'application/json' };
    if (this.opts.token) headers.authorization = `Bearer ${this.opts.token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      throw new ContentUnavailableError(`Content service unreachable (${what}): ${errorMessage(err)}`, {
        retryable: true,
        cause: err,
      });
    }

    if (!res.ok) {
      const errText = await res.text().catch(() => '');
      throw new ContentUnavailableError(`Content service error ${res.status} (${what}): ${errText.slice(0, 200)}`, {
        retryable: !PERMANENT_STATUSES.has(res.status),
      });
    }

    try {
      return await res.json();
    } catch (err) {
      throw new ContentUnavailableError(`Content service sent malformed JSON (${what})`, { retryable: true, cause: err });
    }
  }
}
