/**
 * Rate Limit and Retry Utilities
 *
 * Rate limiting, retry logic and error classification for exchange calls.
 *
 * Features:
 * - Exponential backoff with jitter
 * - Token bucket rate limiting with a priority lane for protective calls
 * - Retry logic with a bounded attempt count
 * - Error classification (retryable vs non-retryable)
 */

import { ExchangeApiError, FatalSafetyTriggerError, TransientExchangeError } from "../errors/app.errors";

// ============================================================================
// Configuration
// ============================================================================

export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomization */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 4,
  baseDelayMs: 250,
  maxDelayMs: 8000,
  jitterFactor: 0.2,
};

export interface RateLimitConfig {
  /** Tokens added per second */
  ratePerSecond: number;
  /** Bucket size; the largest burst allowed after idling */
  capacity: number;
}

export const DEFAULT_RATE_LIMIT_CONFIG: Readonly<RateLimitConfig> = {
  ratePerSecond: 10,
  capacity: 20,
};

// ============================================================================
// Error Classification
// ============================================================================

const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ENETUNREACH",
  "EPIPE",
  "EAI_AGAIN",
  "ECONNABORTED",
]);

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/** Exchange body codes that mean "slow down" */
const RATE_LIMIT_EXCHANGE_CODES = new Set(["429", "40429", "43011"]);

function readStatus(error: unknown): number | undefined {
  if (error instanceof ExchangeApiError) return error.status;
  if (typeof error !== "object" || error === null) return undefined;
  if ("response" in error) {
    const response = error.response;
    if (typeof response === "object" && response !== null && "status" in response) {
      return typeof response.status === "number" ? response.status : undefined;
    }
  }
  if ("status" in error && typeof error.status === "number") return error.status;
  return undefined;
}

function readErrno(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Check if error is a rate limit error (HTTP 429 or exchange throttle code)
 */
export function isRateLimitError(error: unknown): boolean {
  if (readStatus(error) === 429) return true;
  return error instanceof ExchangeApiError && error.exchangeCode !== undefined
    ? RATE_LIMIT_EXCHANGE_CODES.has(error.exchangeCode)
    : false;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;
  if (error instanceof FatalSafetyTriggerError) return false;
  if (error instanceof TransientExchangeError) return true;
  if (isRateLimitError(error)) return true;

  const status = readStatus(error);
  if (status !== undefined) return RETRYABLE_STATUS_CODES.has(status);
  if (error instanceof ExchangeApiError) return false;

  const errno = readErrno(error);
  if (errno && RETRYABLE_ERROR_CODES.has(errno)) return true;

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return message.includes("timeout") || message.includes("econnreset") || message.includes("socket hang up");
}

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Calculate delay for exponential backoff with jitter
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs" | "jitterFactor"> = DEFAULT_RETRY_CONFIG,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;

  // Exponential backoff: base * 2^attempt
  const exponentialDelay = Math.min(baseDelayMs * Math.pow(2, Math.max(attempt, 0)), maxDelayMs);

  const jitter = exponentialDelay * jitterFactor * Math.random();

  return Math.round(exponentialDelay + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number }
  | {
      success: false;
      error: Error;
      attempts: number;
      /** True when the last error was retryable and attempts ran out */
      exhausted: boolean;
    };

/**
 * Execute a function with retry logic
 *
 * @param onRetry - Called before each backoff sleep
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void,
): Promise<RetryResult<T>> {
  const fullConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, fullConfig.maxAttempts);

  let lastError = new Error("no attempt made");
  let attempts = 0;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    attempts++;

    try {
      const data = await fn();
      return { success: true, data, attempts };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (!isRetryableError(err)) {
        return { success: false, error: lastError, attempts, exhausted: false };
      }

      if (attempt + 1 >= maxAttempts) {
        break;
      }

      const delayMs = calculateBackoff(attempt, fullConfig);
      onRetry?.(attempt + 1, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  return { success: false, error: lastError, attempts, exhausted: true };
}

// ============================================================================
// Rate Limiter
// ============================================================================

export type CallPriority = "high" | "normal";

/**
 * Token bucket shared by every exchange call.
 * Waiters on the "high" lane are always admitted before "normal" waiters,
 * so protective closes are never stuck behind routine polling.
 */
export class TokenBucketRateLimiter {
  private readonly ratePerSecond: number;
  private readonly capacity: number;
  private tokens: number;
  private updatedAt: number;
  private readonly waiters: Record<CallPriority, Array<() => void>> = { high: [], normal: [] };
  private timer: NodeJS.Timeout | null = null;

  constructor(
    config: Partial<RateLimitConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    const fullConfig = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
    this.ratePerSecond = Math.max(fullConfig.ratePerSecond, 0.1);
    this.capacity = Math.max(fullConfig.capacity, 1);
    this.tokens = this.capacity;
    this.updatedAt = this.now();
  }

  /**
   * Take a token if one is available right now
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait for a token. Resolves in priority order, FIFO within a lane.
   */
  acquire(priority: CallPriority = "normal"): Promise<void> {
    if (this.pendingCount() === 0 && this.tryAcquire()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters[priority].push(resolve);
      this.schedule();
    });
  }

  getAvailableTokens(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  pendingCount(): number {
    return this.waiters.high.length + this.waiters.normal.length;
  }

  /**
   * Refill the bucket and release every waiter
   */
  reset(): void {
    this.tokens = this.capacity;
    this.updatedAt = this.now();
    this.drain();
  }

  private refill(): void {
    const current = this.now();
    const elapsedSeconds = Math.max(0, current - this.updatedAt) / 1000;
    this.updatedAt = current;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.ratePerSecond);
  }

  private schedule(): void {
    if (this.timer) return;
    this.refill();
    const missing = Math.max(0, 1 - this.tokens);
    const waitMs = Math.max(1, Math.ceil((missing / this.ratePerSecond) * 1000));
    this.timer = setTimeout(() => {
      this.timer = null;
      this.drain();
    }, waitMs);
  }

  private drain(): void {
    while (this.pendingCount() > 0 && this.tryAcquire()) {
      const next = this.waiters.high.shift() ?? this.waiters.normal.shift();
      next?.();
    }
    if (this.pendingCount() > 0) {
      this.schedule();
    } else if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
