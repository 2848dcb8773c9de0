/**
 * Tests for the symbol rules registry
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { SymbolRegistry } from "../../src/exchange/symbol-registry";
import { PaperExchangeGateway } from "../../src/exchange/paper-gateway";
import { RateLimitedCallExecutor } from "../../src/execution/call-executor";
import { DEFAULT_EXECUTION_CONFIG } from "../../src/config/schema";
import { createNullLogger } from "../../src/utils/logger.util";

const BTC_RULES = { symbol: "BTCUSDT", qtyStep: 0.001, priceStep: 0.1, minQty: 0.001, tradable: true };

function setup() {
  const clock = { now: 0 };
  const gateway = new PaperExchangeGateway({
    rules: [BTC_RULES],
    prices: { BTCUSDT: 60000 },
    quoteVolumes: { BTCUSDT: 5_000_000 },
  });
  const executor = new RateLimitedCallExecutor(DEFAULT_EXECUTION_CONFIG, createNullLogger());
  const registry = new SymbolRegistry(gateway, executor, 1000, () => clock.now);
  return { gateway, registry, clock };
}

describe("SymbolRegistry", () => {
  it("should cache rules until the TTL passes", async () => {
    const { gateway, registry, clock } = setup();

    assert.deepStrictEqual(await registry.getRules("BTCUSDT"), BTC_RULES);
    await registry.getRules("BTCUSDT");
    assert.strictEqual(gateway.callCount("getSymbolRules"), 1);

    clock.now = 1000;
    await registry.getRules("BTCUSDT");
    assert.strictEqual(gateway.callCount("getSymbolRules"), 2);
  });

  it("should cache unknown symbols as not tradable", async () => {
    const { gateway, registry } = setup();

    const rules = await registry.getRules("FOOUSDT");
    assert.deepStrictEqual(rules, { symbol: "FOOUSDT", qtyStep: 0, priceStep: 0, minQty: 0, tradable: false });

    await registry.getRules("FOOUSDT");
    assert.strictEqual(gateway.callCount("getSymbolRules"), 1);
  });

  it("should combine rules with a fresh ticker", async () => {
    const { registry } = setup();

    const market = await registry.getMarket("BTCUSDT");
    assert.deepStrictEqual(market, {
      symbol: "BTCUSDT",
      price: 60000,
      rules: BTC_RULES,
      quoteVolume24h: 5_000_000,
    });
  });

  it("should skip the ticker for untradable symbols", async () => {
    const { gateway, registry } = setup();

    const market = await registry.getMarket("FOOUSDT");
    assert.strictEqual(market.price, 0);
    assert.strictEqual(gateway.callCount("getTicker"), 0);
  });
});
