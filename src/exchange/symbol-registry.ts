import type { MarketSnapshot, SymbolRules } from "../domain/trade.types";
import type { RateLimitedCallExecutor } from "../execution/call-executor";
import { TtlCache } from "../infra/persistence/ttl-cache";
import type { ExchangeGateway } from "./gateway";

/**
 * Caches per-symbol precision and tradability rules. Unknown symbols are
 * cached too (as not tradable) so a bad symbol does not hit the exchange on every signal.
 */
export class SymbolRegistry {
  private readonly cache: TtlCache<string, SymbolRules>;

  constructor(
    private readonly gateway: ExchangeGateway,
    private readonly executor: RateLimitedCallExecutor,
    ttlMs: number,
    now: () => number = Date.now,
  ) {
    this.cache = new TtlCache(ttlMs, now);
  }

  async getRules(symbol: string): Promise<SymbolRules> {
    const cached = this.cache.get(symbol);
    if (cached) return cached;

    const rules = await this.executor.call("getSymbolRules", () => this.gateway.getSymbolRules(symbol));
    const resolved: SymbolRules = rules ?? { symbol, qtyStep: 0, priceStep: 0, minQty: 0, tradable: false };
    this.cache.set(symbol, resolved);
    return resolved;
  }

  /**
   * Rules plus a fresh ticker, as consumed by the risk engine
   */
  async getMarket(symbol: string): Promise<MarketSnapshot> {
    const rules = await this.getRules(symbol);
    if (!rules.tradable) {
      return { symbol, price: 0, rules };
    }
    const ticker = await this.executor.call("getTicker", () => this.gateway.getTicker(symbol));
    return { symbol, price: ticker.lastPrice, rules, quoteVolume24h: ticker.quoteVolume24h };
  }
}
