/**
 * Error types
 *
 * Everything the shipper raises extends TelegramLogError so hosts can tell
 * delivery diagnostics apart from their own failures.
 */

export class TelegramLogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TelegramLogError';
  }
}

/**
 * Invalid handler options or environment
 */
export class ConfigurationError extends TelegramLogError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Telegram flood control: the request may be repeated after `retryAfterMs`
 */
export class FloodWaitError extends TelegramLogError {
  constructor(public readonly retryAfterMs: number, description?: string) {
    super(description ?? `Flood wait of ${retryAfterMs}ms requested`);
    this.name = 'FloodWaitError';
  }
}

/**
 * Any other Bot API or network failure.
 * `status` is absent when the request never got an HTTP response.
 */
export class TransportError extends TelegramLogError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }

  get isBadRequest(): boolean {
    return this.status === 400;
  }
}

/**
 * Back-off interrupted because the handler is shutting down
 */
export class DeliveryCancelledError extends TelegramLogError {
  constructor() {
    super('Delivery cancelled by shutdown');
    this.name = 'DeliveryCancelledError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
