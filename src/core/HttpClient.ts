import axios, { AxiosRequestConfig, AxiosResponse, ResponseType } from 'axios';
import { CircuitBreaker, CircuitBreakerStats, CircuitOpenError } from './CircuitBreaker';
import { HttpStatusError } from './errors';
import { StructuredLogger } from './StructuredLogger';

export interface HttpClientConfig {
  timeoutMs: number;
  maxRetries: number;
  baseRetryDelayMs: number;
  maxRetryDelayMs: number;
  jitterPercent: number;
  userAgent?: string;
  errorsBeforeOpen?: number;
  openDurationMs?: number;
}

export interface HttpClientResponse<T> {
  data: T;
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  responseType?: ResponseType;
}

/**
 * The part of an axios instance the client needs; tests hand in a fake.
 */
export interface HttpTransport {
  request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>>;
}

export class HttpClient {
  private circuitBreaker: CircuitBreaker;
  private readonly logger?: StructuredLogger;

  constructor(
    private readonly name: string,
    private readonly config: HttpClientConfig,
    private readonly transport: HttpTransport = axios.create(),
    logger?: StructuredLogger
  ) {
    this.logger = logger?.child(`http:${name}`);
    this.circuitBreaker = new CircuitBreaker(
      name,
      {
        errorsBeforeOpen: config.errorsBeforeOpen ?? 3,
        openDurationMs: config.openDurationMs ?? 60_000,
        isFailure: isRetryableError
      },
      this.logger
    );
  }

  async get<T>(url: string, options: RequestOptions = {}): Promise<HttpClientResponse<T>> {
    return this.circuitBreaker.execute(
      () => this.executeWithRetry(url, () => this.makeRequest<T>(url, 'GET', undefined, options))
    );
  }

  async post<T>(url: string, data?: unknown, options: RequestOptions = {}): Promise<HttpClientResponse<T>> {
    return this.circuitBreaker.execute(
      () => this.executeWithRetry(url, () => this.makeRequest<T>(url, 'POST', data, options))
    );
  }

  /**
   * GET returning the body as text, for HTML pages
   */
  async getText(url: string, options: RequestOptions = {}): Promise<HttpClientResponse<string>> {
    const response = await this.get<unknown>(url, { ...options, responseType: 'text' });
    return { ...response, data: typeof response.data === 'string' ? response.data : String(response.data) };
  }

  private async executeWithRetry<T>(
    url: string,
    operation: () => Promise<HttpClientResponse<T>>
  ): Promise<HttpClientResponse<T>> {
    let attempt = 0;

    for (;;) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= this.config.maxRetries || !isRetryableError(error)) {
          throw error;
        }

        const retryAfterMs = error instanceof HttpStatusError ? error.retryAfterMs : null;
        // A server-requested wait longer than we are willing to block is left
        // to the caller's next cycle
        if (retryAfterMs !== null && retryAfterMs > this.config.maxRetryDelayMs) {
          this.logger?.warn(`Server asked to wait ${retryAfterMs}ms, above the ${this.config.maxRetryDelayMs}ms limit; giving up`, { url });
          throw error;
        }

        const delay = retryAfterMs ?? this.calculateRetryDelay(attempt);
        attempt++;
        this.logger?.warn(`Request failed, retrying in ${delay}ms (attempt ${attempt + 1}/${this.config.maxRetries + 1})`, {
          url,
          reason: error instanceof Error ? error.message : String(error)
        });

        await this.sleep(delay);
      }
    }
  }

  private async makeRequest<T>(
    url: string,
    method: 'GET' | 'POST',
    data: unknown,
    options: RequestOptions
  ): Promise<HttpClientResponse<T>> {
    let response: AxiosResponse<T>;

    try {
      response = await this.transport.request<T>({
        url,
        method,
        data,
        timeout: this.config.timeoutMs,
        responseType: options.responseType ?? 'json',
        headers: {
          'User-Agent': this.config.userAgent || 'Mozilla/5.0',
          ...(data !== undefined ? { 'Content-Type': 'application/json' } : {}),
          ...options.headers
        },
        // Status handling is ours, see below
        validateStatus: () => true
      });
    } catch (error) {
      if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        throw new Error(`Request timeout after ${this.config.timeoutMs}ms: ${url}`, { cause: error });
      }
      throw error;
    }

    const headers = extractHeaders(response.headers);

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(
        response.status,
        response.statusText,
        response.data,
        parseRetryAfter(headers['retry-after'], response.data)
      );
    }

    return {
      data: response.data,
      status: response.status,
      statusText: response.statusText,
      headers
    };
  }

  private calculateRetryDelay(attempt: number): number {
    const baseDelay = this.config.baseRetryDelayMs * Math.pow(2, attempt);
    const maxDelay = Math.min(baseDelay, this.config.maxRetryDelayMs);
    const jitter = maxDelay * (this.config.jitterPercent / 100) * Math.random();

    return Math.floor(maxDelay + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  getCircuitBreakerStats(): CircuitBreakerStats {
    return this.circuitBreaker.getStats();
  }

  isCircuitBreakerOpen(): boolean {
    return this.circuitBreaker.isOpen();
  }
}

/**
 * Network failures, timeouts, 429 and 5xx are worth another attempt; other
 * HTTP statuses and an open breaker are not.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpStatusError) return error.retryable;
  if (error instanceof CircuitOpenError) return false;
  return true;
}

/**
 * Retry-After header in seconds, or Telegram's `parameters.retry_after` in the body
 */
export function parseRetryAfter(header: string | undefined, body: unknown): number | null {
  if (header !== undefined && header.trim() !== '') {
    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }

  if (typeof body === 'object' && body !== null && 'parameters' in body) {
    const parameters = body.parameters;
    if (typeof parameters === 'object' && parameters !== null && 'retry_after' in parameters) {
      const seconds = parameters.retry_after;
      if (typeof seconds === 'number' && seconds >= 0) return seconds * 1000;
    }
  }

  return null;
}

function extractHeaders(headers: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof headers !== 'object' || headers === null) return result;

  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string' || typeof value === 'number') {
      result[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}
