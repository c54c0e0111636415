import { StructuredLogger } from './StructuredLogger';

export type CircuitBreakerState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  errorsBeforeOpen: number;
  openDurationMs: number;
  /** Errors for which this returns false pass through without counting */
  isFailure?: (error: unknown) => boolean;
}

export interface CircuitBreakerStats {
  state: CircuitBreakerState;
  errorCount: number;
  lastErrorTime: number | null;
  lastSuccessTime: number | null;
  openCount: number;
  totalRequests: number;
  failedRequests: number;
  successfulRequests: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly breaker: string, readonly retryInMs: number) {
    super(`Circuit breaker ${breaker} is OPEN (retry in ${retryInMs}ms)`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitBreakerState = 'CLOSED';
  private errorCount = 0;
  private lastErrorTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private openedAt = 0;
  private openCount = 0;
  private totalRequests = 0;
  private failedRequests = 0;
  private successfulRequests = 0;

  constructor(
    private readonly name: string,
    private readonly config: CircuitBreakerConfig,
    private readonly logger?: StructuredLogger
  ) {}

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.totalRequests++;

    if (this.state === 'OPEN') {
      if (this.shouldAttemptReset()) {
        this.transitionToHalfOpen();
      } else {
        this.failedRequests++;
        throw new CircuitOpenError(this.name, this.openedAt + this.config.openDurationMs - Date.now());
      }
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.config.isFailure && !this.config.isFailure(error)) {
        this.onSuccess();
      } else {
        this.onError();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.errorCount = 0;
    this.lastSuccessTime = Date.now();
    this.successfulRequests++;

    if (this.state === 'HALF_OPEN') {
      this.transitionToClosed();
    }
  }

  private onError(): void {
    this.errorCount++;
    this.lastErrorTime = Date.now();
    this.failedRequests++;

    // A failed probe reopens immediately
    if (this.state === 'HALF_OPEN' || (this.state === 'CLOSED' && this.errorCount >= this.config.errorsBeforeOpen)) {
      this.transitionToOpen();
    }
  }

  private transitionToOpen(): void {
    this.state = 'OPEN';
    this.openedAt = Date.now();
    this.openCount++;
    this.logger?.warn(`Circuit breaker ${this.name} OPEN after ${this.errorCount} errors`, {
      openDurationMs: this.config.openDurationMs
    });
  }

  private transitionToHalfOpen(): void {
    this.state = 'HALF_OPEN';
    this.logger?.info(`Circuit breaker ${this.name} HALF_OPEN, testing recovery`);
  }

  private transitionToClosed(): void {
    this.state = 'CLOSED';
    this.logger?.info(`Circuit breaker ${this.name} CLOSED, recovered`);
  }

  private shouldAttemptReset(): boolean {
    return Date.now() - this.openedAt >= this.config.openDurationMs;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      errorCount: this.errorCount,
      lastErrorTime: this.lastErrorTime,
      lastSuccessTime: this.lastSuccessTime,
      openCount: this.openCount,
      totalRequests: this.totalRequests,
      failedRequests: this.failedRequests,
      successfulRequests: this.successfulRequests
    };
  }

  isOpen(): boolean {
    return this.state === 'OPEN';
  }
}
