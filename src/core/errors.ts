/**
 * Error taxonomy for notification delivery.
 *
 * `retryable` is what the retry policy looks at; nothing downstream
 * inspects messages or status codes to decide whether to try again.
 */

export abstract class DeliveryError extends Error {
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Content provider could not produce a payload */
export class ContentUnavailableError extends DeliveryError {
  readonly retryable: boolean;

  constructor(message: string, opts: { retryable: boolean; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.retryable = opts.retryable;
  }
}

/** Network error, 5xx or rate limit from the push API */
export class GatewayTransientError extends DeliveryError {
  readonly retryable = true;
  /** Minimum wait the gateway asked for (Retry-After), if any */
  readonly retryAfterMs: number | undefined;

  constructor(message: string, opts: { retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.retryAfterMs = opts.retryAfterMs;
  }
}

/** Invalid recipient or rejected payload; never retried */
export class GatewayPermanentError extends DeliveryError {
  readonly retryable = false;
  readonly status: number | undefined;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.status = opts.status;
  }
}

/** Subscription or dedup storage failed; aborts a whole dispatch batch */
export class StoreUnavailableError extends DeliveryError {
  readonly retryable = false;
}

export class DeadlineExceededError extends DeliveryError {
  readonly retryable = false;
}

/** Settings mutation with a value outside the allowed set */
export class InvalidSettingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSettingError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
