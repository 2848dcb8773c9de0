/**
 * Tests for entry price selection, stop-loss resolution and position sizing
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  computeSize,
  ladderAveragePrice,
  ladderWeights,
  pickEntryPrice,
  resolveStopLoss,
  splitEntries,
} from "../../src/risk/sizing";

const RULES = { qtyStep: 0.001, minQty: 0.001 };

describe("pickEntryPrice", () => {
  it("should pick the configured point of the range", () => {
    const entry = { low: 99, high: 101 };
    assert.strictEqual(pickEntryPrice(entry, "MID"), 100);
    assert.strictEqual(pickEntryPrice(entry, "LOW"), 99);
    assert.strictEqual(pickEntryPrice(entry, "HIGH"), 101);
  });
});

describe("resolveStopLoss", () => {
  it("should keep an explicit protective stop", () => {
    assert.deepStrictEqual(resolveStopLoss({ side: "LONG", stopLoss: 95 }, 100, 1.0), {
      ok: true,
      price: 95,
      derived: false,
      distanceRatio: 0.05,
    });
  });

  it("should reject an explicit stop on the wrong side", () => {
    const result = resolveStopLoss({ side: "SHORT", stopLoss: 99 }, 100, 1.0);
    assert.strictEqual(result.ok, false);
    if (!result.ok) {
      assert.strictEqual(result.reason, "INVALID_STOP_LOSS");
      assert.strictEqual(result.detail, "stop 99 is not on the protective side of SHORT entry 100");
    }
  });

  it("should derive a stop from the default percent, floored to the price step", () => {
    const long = resolveStopLoss({ side: "LONG" }, 100, 1.0, 0.1);
    const short = resolveStopLoss({ side: "SHORT" }, 100, 1.0, 0.1);
    const odd = resolveStopLoss({ side: "LONG" }, 123.45, 1.0, 0.01);

    assert.ok(long.ok && short.ok && odd.ok);
    assert.strictEqual(long.price, 99);
    assert.strictEqual(long.derived, true);
    assert.strictEqual(short.price, 101);
    assert.strictEqual(odd.price, 122.21);
  });

  it("should read small defaults as ratios", () => {
    const result = resolveStopLoss({ side: "LONG" }, 200, 0.02, 0.1);
    assert.ok(result.ok);
    assert.strictEqual(result.price, 196);
  });

  it("should report a missing stop when no default is configured", () => {
    const result = resolveStopLoss({ side: "LONG" }, 100, 0);
    assert.strictEqual(result.ok, false);
    if (!result.ok) assert.strictEqual(result.reason, "MISSING_STOP_LOSS");
  });
});

describe("computeSize", () => {
  it("should size from the risk amount and stop distance", () => {
    assert.deepStrictEqual(
      computeSize({
        equity: 1000,
        accountRiskPerTrade: 0.005,
        entryPrice: 100,
        stopPrice: 99,
        maxNotional: 1000,
        rules: RULES,
      }),
      {
        size: 5,
        rawSize: 5,
        riskAmount: 5,
        stopDistance: 1,
        cappedByNotional: false,
        notional: 500,
        belowMinQty: false,
      },
    );
  });

  it("should cap the size at the max notional", () => {
    const result = computeSize({
      equity: 1000,
      accountRiskPerTrade: 0.005,
      entryPrice: 100,
      stopPrice: 99,
      maxNotional: 200,
      rules: RULES,
    });
    assert.strictEqual(result.size, 2);
    assert.strictEqual(result.cappedByNotional, true);
    assert.strictEqual(result.notional, 200);
  });

  it("should floor to the quantity step and never round up to the minimum", () => {
    const result = computeSize({
      equity: 10,
      accountRiskPerTrade: 0.005,
      entryPrice: 100,
      stopPrice: 99,
      maxNotional: 1000,
      rules: { qtyStep: 0.1, minQty: 0.1 },
    });
    assert.strictEqual(result.size, 0);
    assert.strictEqual(result.belowMinQty, true);
  });

  it("should return zero for a zero stop distance", () => {
    const result = computeSize({
      equity: 1000,
      accountRiskPerTrade: 0.005,
      entryPrice: 100,
      stopPrice: 100,
      maxNotional: 1000,
      rules: RULES,
    });
    assert.strictEqual(result.rawSize, 0);
    assert.strictEqual(result.belowMinQty, true);
  });
});

describe("splitEntries", () => {
  it("should keep the listed order and weight the later leg heavier", () => {
    assert.deepStrictEqual(splitEntries(3, [10, 8], [1, 2], RULES), [
      { index: 0, price: 10, size: 1 },
      { index: 1, price: 8, size: 2 },
    ]);
  });

  it("should give the rounding remainder to the last leg", () => {
    assert.deepStrictEqual(splitEntries(1, [10, 9, 8], [1, 1, 1], RULES), [
      { index: 0, price: 10, size: 0.333 },
      { index: 1, price: 9, size: 0.333 },
      { index: 2, price: 8, size: 0.334 },
    ]);
  });

  it("should refuse a split with a leg below the minimum", () => {
    assert.strictEqual(splitEntries(0.002, [10, 8], [1, 1], { qtyStep: 0.001, minQty: 0.002 }), undefined);
  });
});

describe("ladderWeights", () => {
  it("should repeat the last weight for extra points", () => {
    assert.deepStrictEqual(ladderWeights(3, [1, 2]), [1, 2, 2]);
    assert.deepStrictEqual(ladderWeights(2, [3]), [3, 3]);
  });

  it("should average the points by weight", () => {
    assert.strictEqual(ladderAveragePrice([10, 7], [1, 2]), 8);
  });
});
