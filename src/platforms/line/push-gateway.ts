import { z } from 'zod';
import { logger, redactId } from '../../middleware/logger.js';
import type { Ack, DeliveryGateway, Payload, SendOptions } from '../../core/delivery-gateway.js';
import { GatewayPermanentError, GatewayTransientError, errorMessage } from '../../core/errors.js';

/**
 * LINE Messaging API push gateway.
 *
 * Every request carries `X-Line-Retry-Key`; LINE answers a repeated key
 * with 409 and the id of the request it already accepted, which counts
 * as success here.
 */

const PUSH_PATH = '/v2/bot/message/push';
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_MESSAGES_PER_PUSH = 5;

const ErrorBodySchema = z.object({
  message: z.string(),
  details: z.array(z.object({ message: z.string().optional(), property: z.string().optional() })).optional(),
});

export interface LinePushGatewayOptions {
  channelAccessToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** Seconds (or an HTTP date) from a Retry-After header, as milliseconds */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export class LinePushGateway implements DeliveryGateway {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: LinePushGatewayOptions) {
    this.endpoint = `${(opts.baseUrl ?? 'https://api.line.me').replace(/\/+$/, '')}${PUSH_PATH}`;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async send(subscriberId: string, payload: Payload, options: SendOptions): Promise<Ack> {
    if (payload.messages.length === 0 || payload.messages.length > MAX_MESSAGES_PER_PUSH) {
      throw new GatewayPermanentError(`Push takes 1-${MAX_MESSAGES_PER_PUSH} messages, got ${payload.messages.length}`);
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${this.opts.channelAccessToken}`,
          'content-type': 'application/json',
          'x-line-retry-key': options.retryKey,
        },
        body: JSON.stringify({ to: subscriberId, messages: payload.messages }),
        signal,
      });
    } catch (err) {
      throw new GatewayTransientError(`Push request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.ok) {
      return { requestId: res.headers.get('x-line-request-id') ?? undefined };
    }

    if (res.status === 409) {
      const accepted = res.headers.get('x-line-accepted-request-id');
      if (accepted) {
        logger.debug({ subscriber: redactId(subscriberId), acceptedRequestId: accepted }, 'Push already accepted for retry key');
        return { requestId: accepted };
      }
    }

    const detail = await readErrorMessage(res);

    if (res.status === 429) {
      throw new GatewayTransientError(`Push rate limited (429): ${detail}`, {
        retryAfterMs: parseRetryAfter(res.headers.get('retry-after')),
      });
    }
    if (res.status >= 500) {
      throw new GatewayTransientError(`Push API error ${res.status}: ${detail}`);
    }
    throw new GatewayPermanentError(`Push rejected ${res.status}: ${detail}`, { status: res.status });
  }
}

async function readErrorMessage(res: Response): Promise<string> {
  try {
    const text = await res.text();
    const parsed = ErrorBodySchema.safeParse(safeJson(text));
    if (!parsed.success) return text.slice(0, 200) || res.statusText;
    const details = (parsed.data.details ?? [])
      .map((d) => [d.property, d.message].filter(Boolean).join(': '))
      .filter(Boolean);
    return details.length > 0 ? `${parsed.data.message} (${details.join('; ')})` : parsed.data.message;
  } catch (err) {
    return `unreadable body: ${errorMessage(err)}`;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
