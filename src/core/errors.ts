export type BotErrorCode =
  | 'FETCH_FAILED'
  | 'DELIVERY_FAILED'
  | 'STORE_FAILED'
  | 'CONFIG_INVALID'
  | 'HTTP_STATUS';

export class BotError extends Error {
  readonly code: BotErrorCode;

  constructor(code: BotErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The marketplace could not be reached or returned nothing usable.
 * The cycle is skipped and retried on the next tick.
 */
export class FetchError extends BotError {
  constructor(
    message: string,
    readonly url?: string,
    cause?: unknown
  ) {
    super('FETCH_FAILED', message, cause);
  }
}

/**
 * A notification was not confirmed. The listing stays out of the seen set.
 */
export class DeliveryError extends BotError {
  constructor(
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super('DELIVERY_FAILED', message, cause);
  }
}

export class StoreError extends BotError {
  constructor(message: string, cause?: unknown) {
    super('STORE_FAILED', message, cause);
  }
}

export class ConfigError extends BotError {
  constructor(readonly problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`);
  }
}

export class HttpStatusError extends BotError {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly body: unknown,
    readonly retryAfterMs: number | null = null
  ) {
    super('HTTP_STATUS', `HTTP ${status}: ${statusText}`);
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
