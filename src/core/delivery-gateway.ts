/**
 * Ready-to-send notification content. Produced by the content provider
 * and handed to the gateway untouched; the core never looks inside the
 * messages.
 */
export interface Payload {
  messages: Record<string, unknown>[];
}

export interface Ack {
  /** Platform-side request id, when the API returns one */
  requestId?: string;
}

export interface SendOptions {
  /** Stable per dedup key; identical across retries of one logical send */
  retryKey: string;
  signal?: AbortSignal;
}

/**
 * Push API surface. Implementations throw `GatewayTransientError` or
 * `GatewayPermanentError` on failure.
 */
export interface DeliveryGateway {
  send(subscriberId: string, payload: Payload, options: SendOptions): Promise<Ack>;
}
