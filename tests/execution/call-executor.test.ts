/**
 * Tests for the rate-limited call executor
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { RateLimitedCallExecutor, withTimeout } from "../../src/execution/call-executor";
import type { ExecutionConfig } from "../../src/config/schema";
import {
  CallTimeoutError,
  ExchangeApiError,
  RetriesExhaustedError,
  TransientExchangeError,
} from "../../src/errors/app.errors";
import { createNullLogger } from "../../src/utils/logger.util";

const config: ExecutionConfig = {
  rateLimitPerSecond: 1000,
  burstCapacity: 100,
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 2,
  jitterFactor: 0,
  callTimeoutMs: 200,
};

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

describe("withTimeout", () => {
  it("should resolve when the promise settles first", async () => {
    assert.strictEqual(await withTimeout(Promise.resolve(42), 50, "fast"), 42);
  });

  it("should reject with CallTimeoutError on the deadline", async () => {
    await assert.rejects(
      withTimeout(never<number>(), 10, "getOrder"),
      (err: unknown) =>
        err instanceof CallTimeoutError &&
        err.message === "getOrder timed out after 10ms" &&
        err.code === "CALL_TIMEOUT",
    );
  });
});

describe("RateLimitedCallExecutor", () => {
  it("should return the call result", async () => {
    const executor = new RateLimitedCallExecutor(config, createNullLogger());
    const value = await executor.call("getEquity", async () => 1000);

    assert.strictEqual(value, 1000);
    assert.deepStrictEqual(executor.getStats(), { calls: 1, failures: 0, retries: 0, exhausted: 0 });
  });

  it("should retry a transient failure and notify failure listeners", async () => {
    const executor = new RateLimitedCallExecutor(config, createNullLogger());
    const seen: string[] = [];
    executor.onFailure((operation, error) => seen.push(`${operation}:${error.message}`));

    let calls = 0;
    const value = await executor.call("placeOrder", async () => {
      calls++;
      if (calls === 1) throw new TransientExchangeError("reset by peer");
      return "order-1";
    });

    assert.strictEqual(value, "order-1");
    assert.deepStrictEqual(seen, ["placeOrder:reset by peer"]);
    assert.deepStrictEqual(executor.getStats(), { calls: 1, failures: 1, retries: 1, exhausted: 0 });
  });

  it("should rethrow a non-retryable error unchanged", async () => {
    const executor = new RateLimitedCallExecutor(config, createNullLogger());
    const rejection = new ExchangeApiError("insufficient margin", "/api/v2/mix/order/place-order", 400, "40762");

    await assert.rejects(
      executor.call("placeOrder", async () => {
        throw rejection;
      }),
      (err: unknown) => err === rejection,
    );
    assert.strictEqual(executor.getStats().retries, 0);
  });

  it("should surface exhausted retries as RetriesExhaustedError", async () => {
    const executor = new RateLimitedCallExecutor(config, createNullLogger());

    await assert.rejects(
      executor.call("getPositions", async () => {
        throw new TransientExchangeError("gateway down");
      }),
      (err: unknown) =>
        err instanceof RetriesExhaustedError &&
        err.attempts === 3 &&
        err.message === "getPositions failed after 3 attempt(s): gateway down",
    );
    assert.deepStrictEqual(executor.getStats(), { calls: 1, failures: 3, retries: 2, exhausted: 1 });
  });

  it("should apply the per-call deadline and attempt budget", async () => {
    const executor = new RateLimitedCallExecutor(config, createNullLogger());

    await assert.rejects(
      executor.call("cancelOrder", () => never<void>(), { timeoutMs: 10, maxAttempts: 1 }),
      (err: unknown) => err instanceof RetriesExhaustedError && err.cause instanceof CallTimeoutError,
    );
  });

  it("should keep going when a failure listener throws", async () => {
    const executor = new RateLimitedCallExecutor(config, createNullLogger());
    executor.onFailure(() => {
      throw new Error("listener broke");
    });

    let calls = 0;
    const value = await executor.call(
      "getTicker",
      async () => {
        calls++;
        if (calls < 2) throw new TransientExchangeError("blip");
        return 7;
      },
      { priority: "high" },
    );
    assert.strictEqual(value, 7);
  });
});
