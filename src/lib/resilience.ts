/**
 * Resilience patterns for provider integration
 * - Logger
 * - Rate Limiter
 * - Retry Logic
 * - Timeouts
 */

// ============================================================================
// LOGGER
// ============================================================================
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'info', sink: LogSink = console) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  formatData(data?: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data;
    if (data instanceof Error) return `${data.name}: ${data.message}\n${data.stack || ''}`;

    if (typeof data === 'object') {
      try {
        return JSON.stringify(data, (_key, value: unknown) => {
          // Errors nested inside the data
          if (value instanceof Error) {
            return { name: value.name, message: value.message, stack: value.stack };
          }
          return value;
        });
      } catch {
        return String(data);
      }
    }
    return String(data);
  }

  debug(context: string, message: string, data?: unknown) {
    if (this.enabled('debug')) this.sink.debug(`[${context}] ${message}`, this.formatData(data));
  }

  info(context: string, message: string, data?: unknown) {
    if (this.enabled('info')) this.sink.info(`[${context}] ${message}`, this.formatData(data));
  }

  warn(context: string, message: string, data?: unknown) {
    if (this.enabled('warn')) this.sink.warn(`[${context}] ${message}`, this.formatData(data));
  }

  error(context: string, message: string, data?: unknown) {
    if (this.enabled('error')) this.sink.error(`[${context}] ${message}`, this.formatData(data));
  }
}

export const logger = new Logger();

// ============================================================================
// ERRORS
// ============================================================================
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, body = '') {
    super(`Request failed with status ${status}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

/** 429, 5xx, timeouts and network failures */
export function isRetryableError(e: unknown): boolean {
  if (e instanceof HttpError) return e.status === 429 || e.status >= 500;
  if (e instanceof Error) {
    return e.name === 'TimeoutError' || e.name === 'AbortError' || e.message.startsWith('Timeout:') || e instanceof TypeError;
  }
  return false;
}

// ============================================================================
// RATE LIMITER
// ============================================================================
export interface RateLimiterOptions {
  /** Bucket capacity */
  maxRequests: number;
  /** Time to refill the full bucket */
  windowMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Token bucket. acquire() resolves once a token is taken, waiting for the
 * next refill when the bucket is empty.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.maxRequests = Math.max(1, options.maxRequests);
    this.windowMs = Math.max(0, options.windowMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.tokens = this.maxRequests;
    this.lastRefill = this.now();
  }

  /** One call per interval: the first acquire is immediate */
  static spacing(intervalMs: number, overrides: Pick<RateLimiterOptions, 'now' | 'sleep'> = {}): RateLimiter {
    return new RateLimiter({ maxRequests: 1, windowMs: intervalMs, ...overrides });
  }

  acquire(): Promise<void> {
    // callers are served in arrival order
    const next = this.pending.then(() => this.take());
    this.pending = next;
    return next;
  }

  private async take(): Promise<void> {
    this.refill();
    while (this.tokens < 1) {
      const perToken = this.windowMs / this.maxRequests;
      const wait = Math.max(0, Math.ceil(perToken - (this.now() - this.lastRefill)));
      await this.sleep(wait);
      this.refill();
    }
    this.tokens--;
  }

  private refill() {
    if (this.windowMs === 0) {
      this.tokens = this.maxRequests;
      return;
    }
    const now = this.now();
    const perToken = this.windowMs / this.maxRequests;
    const earned = Math.floor((now - this.lastRefill) / perToken);
    if (earned > 0) {
      this.tokens = Math.min(this.maxRequests, this.tokens + earned);
      this.lastRefill += earned * perToken;
      if (this.tokens === this.maxRequests) this.lastRefill = now;
    }
  }

  getAvailableTokens() {
    this.refill();
    return this.tokens;
  }
}

// ============================================================================
// UTILS
// ============================================================================
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, context: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout: ${context}`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  isRetryable?: (e: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

export async function withRetry<T>(fn: () => Promise<T>, context: string, opts: RetryOptions = {}): Promise<T> {
  const maxAttempts = opts.maxAttempts ?? 3;
  const baseDelayMs = opts.baseDelayMs ?? 400;
  const maxDelayMs = opts.maxDelayMs ?? 8000;
  const isRetryable = opts.isRetryable ?? isRetryableError;
  const wait = opts.sleep ?? sleep;
  const log = opts.log ?? logger;

  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isRetryable(e) || attempt >= maxAttempts) break;

      const exp = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
      const jitter = Math.floor(Math.random() * 250);
      log.warn('Retry', `${context}: attempt ${attempt} failed, waiting ${exp + jitter}ms`, e);
      await wait(exp + jitter);
    }
  }

  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ResilientFetchConfig {
  timeoutMs?: number;
  retry?: RetryOptions;
  fetchImpl?: FetchLike;
}

/**
 * fetch that throws HttpError on any non-2xx response, retried on 429/5xx
 */
export async function resilientFetch(url: string, init: RequestInit = {}, config: ResilientFetchConfig = {}): Promise<Response> {
  const fetchImpl = config.fetchImpl ?? fetch;
  const doFetch = async () => {
    // a fresh signal per attempt; the race below only rejects, the abort closes the socket
    const signal = config.timeoutMs && !init.signal ? AbortSignal.timeout(config.timeoutMs) : init.signal;
    const request = fetchImpl(url, signal ? { ...init, signal } : init);
    const res = await (config.timeoutMs ? withTimeout(request, config.timeoutMs, `fetch:${redactUrl(url)}`) : request);
    if (!res.ok) {
      const body = await res.text().catch((e: unknown) => `<unreadable body: ${String(e)}>`);
      throw new HttpError(res.status, redactUrl(url), body);
    }
    return res;
  };

  return withRetry(doFetch, `fetch:${redactUrl(url)}`, config.retry);
}

/** Strips api keys from URLs before they reach logs */
export function redactUrl(url: string): string {
  return url.replace(/([?&]apiKey=)[^&]*/i, '$1***');
}
