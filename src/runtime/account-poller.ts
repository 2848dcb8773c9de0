import type { AccountSnapshot } from "../domain/trade.types";
import type { ExchangeGateway } from "../exchange/gateway";
import type { RateLimitedCallExecutor } from "../execution/call-executor";
import type { OrderLifecycleManager } from "../lifecycle/order-lifecycle-manager";
import type { Logger } from "../utils/logger.util";
import type { AccountSource } from "./signal-processor";

export interface AccountPollerDeps {
  gateway: ExchangeGateway;
  executor: RateLimitedCallExecutor;
  lifecycle: OrderLifecycleManager;
  logger: Logger;
  /** A cached snapshot younger than this is served without a call */
  maxAgeMs: number;
  now?: () => number;
}

/**
 * Keeps the latest account snapshot and drives fill detection for tracked
 * orders. The snapshot feeds the risk engine and the drawdown breaker.
 */
export class AccountPoller implements AccountSource {
  private latest: AccountSnapshot | null = null;
  private lastPollAt: number | null = null;
  private readonly now: () => number;

  constructor(private readonly deps: AccountPollerDeps) {
    this.now = deps.now ?? Date.now;
  }

  /** One poll: balance first, then order state for every tracked position */
  async pollOnce(): Promise<AccountSnapshot> {
    const account = await this.fetchAccount();
    await this.deps.lifecycle.refreshOrders();
    this.lastPollAt = this.now();
    return account;
  }

  async getAccount(): Promise<AccountSnapshot> {
    if (this.latest && this.now() - this.latest.fetchedAt <= this.deps.maxAgeMs) {
      return this.latest;
    }
    return this.fetchAccount();
  }

  getLatest(): AccountSnapshot | null {
    return this.latest;
  }

  getLastPollAt(): number | null {
    return this.lastPollAt;
  }

  private async fetchAccount(): Promise<AccountSnapshot> {
    const balance = await this.deps.executor.call("getBalance", () => this.deps.gateway.getBalance());
    this.latest = { ...balance, fetchedAt: this.now() };
    this.deps.logger.debug(
      `[Account] equity ${balance.equity.toFixed(2)} available ${balance.available.toFixed(2)} uPnL ${balance.unrealizedPnl.toFixed(2)}`,
    );
    return this.latest;
  }
}
