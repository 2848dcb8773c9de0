/**
 * Rate-Limited Call Executor
 *
 * The single gate in front of the exchange gateway. Every call:
 * - waits for a rate-limit token (high priority calls jump the queue)
 * - runs under a deadline
 * - retries transient failures with exponential backoff + jitter
 * - surfaces exhausted retries as RetriesExhaustedError
 */

import type { ExecutionConfig } from "../config/schema";
import { CallTimeoutError, RetriesExhaustedError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import {
  TokenBucketRateLimiter,
  withRetry,
  type CallPriority,
} from "./rate-limit";

export interface CallOptions {
  /** "high" for protective orders and closes (default: normal) */
  priority?: CallPriority;
  /** Per-attempt deadline in ms (default: config.callTimeoutMs) */
  timeoutMs?: number;
  /** Override the attempt budget (default: config.maxAttempts) */
  maxAttempts?: number;
}

export type CallFailureListener = (operation: string, error: Error) => void;

export interface CallExecutorStats {
  calls: number;
  failures: number;
  retries: number;
  exhausted: number;
}

/**
 * Race a promise against a deadline. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CallTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export class RateLimitedCallExecutor {
  private readonly limiter: TokenBucketRateLimiter;
  private readonly failureListeners: CallFailureListener[] = [];
  private readonly stats: CallExecutorStats = { calls: 0, failures: 0, retries: 0, exhausted: 0 };

  constructor(
    private readonly config: ExecutionConfig,
    private readonly logger: Logger,
    limiter?: TokenBucketRateLimiter,
  ) {
    this.limiter =
      limiter ??
      new TokenBucketRateLimiter({
        ratePerSecond: config.rateLimitPerSecond,
        capacity: config.burstCapacity,
      });
  }

  /**
   * Run an exchange call through the rate limiter, deadline and retry policy.
   * Non-retryable errors are rethrown as-is; retryable ones that run out of
   * attempts become RetriesExhaustedError.
   */
  async call<T>(operation: string, fn: () => Promise<T>, options: CallOptions = {}): Promise<T> {
    const priority = options.priority ?? "normal";
    const timeoutMs = options.timeoutMs ?? this.config.callTimeoutMs;
    this.stats.calls++;

    const attempt = async (): Promise<T> => {
      await this.limiter.acquire(priority);
      try {
        return await withTimeout(fn(), timeoutMs, operation);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        this.stats.failures++;
        this.emitFailure(operation, error);
        throw error;
      }
    };

    const result = await withRetry(
      attempt,
      {
        maxAttempts: options.maxAttempts ?? this.config.maxAttempts,
        baseDelayMs: this.config.baseDelayMs,
        maxDelayMs: this.config.maxDelayMs,
        jitterFactor: this.config.jitterFactor,
      },
      (attemptNo, error, delayMs) => {
        this.stats.retries++;
        this.logger.warn(
          `[Executor] ${operation} attempt ${attemptNo} failed (${error.message}); retrying in ${delayMs}ms`,
        );
      },
    );

    if (result.success) {
      return result.data;
    }

    const error = result.error;
    if (result.exhausted) {
      this.stats.exhausted++;
      this.logger.error(`[Executor] ${operation} exhausted ${result.attempts} attempt(s)`, error);
      throw new RetriesExhaustedError(operation, result.attempts, error);
    }
    throw error;
  }

  /**
   * Subscribe to every failed attempt (used by the API error burst breaker)
   */
  onFailure(listener: CallFailureListener): void {
    this.failureListeners.push(listener);
  }

  getStats(): CallExecutorStats {
    return { ...this.stats };
  }

  private emitFailure(operation: string, error: Error): void {
    for (const listener of this.failureListeners) {
      try {
        listener(operation, error);
      } catch (listenerErr) {
        this.logger.warn(`[Executor] failure listener threw: ${String(listenerErr)}`);
      }
    }
  }
}
