/**
 * Tests for the Bitget REST gateway: request signing, body building and response parsing
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import crypto from "node:crypto";
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import {
  BITGET_ENDPOINTS,
  BitgetRestGateway,
  buildPlaceOrderBody,
  buildQueryString,
  buildStopLossBody,
  normalizeOrderStatus,
  parseContract,
  parseOrder,
  parsePosition,
  signRequest,
  tpslHoldSide,
} from "../../src/exchange/bitget-gateway";
import { DEFAULT_EXCHANGE_CONFIG } from "../../src/config/schema";
import type { OrderSpec } from "../../src/domain/trade.types";
import { ExchangeApiError, TransientExchangeError } from "../../src/errors/app.errors";
import { createNullLogger } from "../../src/utils/logger.util";

const EXCHANGE = {
  ...DEFAULT_EXCHANGE_CONFIG,
  apiKey: "test-key",
  apiSecret: "test-secret",
  passphrase: "test-passphrase",
};

type Responder = (config: InternalAxiosRequestConfig) => unknown;

function respond(config: InternalAxiosRequestConfig, data: unknown): AxiosResponse {
  return { data, status: 200, statusText: "OK", headers: {}, config };
}

function fakeGateway(responder: Responder, positionMode: "one_way" | "hedge" = "one_way") {
  const seen: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      seen.push(config);
      return respond(config, responder(config));
    },
  });
  const gateway = new BitgetRestGateway({
    exchange: { ...EXCHANGE, positionMode },
    timeoutMs: 1000,
    logger: createNullLogger(),
    http,
    now: () => 1700000000000,
  });
  return { gateway, seen };
}

const LONG_CLOSE: OrderSpec = {
  clientOrderId: "close-abc",
  symbol: "BTCUSDT",
  side: "sell",
  holdSide: "LONG",
  type: "market",
  size: 0.01,
  purpose: "close",
  close: { kind: "reduce_only" },
};

describe("Bitget helpers", () => {
  it("should sign timestamp + method + path + body with HMAC-SHA256 base64", () => {
    const expected = crypto
      .createHmac("sha256", "test-secret")
      .update('1700000000000POST/api/v2/mix/order/place-order{"a":1}')
      .digest("base64");

    assert.strictEqual(
      signRequest("test-secret", "1700000000000", "POST", "/api/v2/mix/order/place-order", '{"a":1}'),
      expected,
    );
  });

  it("should drop undefined query parameters", () => {
    assert.strictEqual(
      buildQueryString({ symbol: "BTCUSDT", orderId: undefined, productType: "USDT-FUTURES" }),
      "symbol=BTCUSDT&productType=USDT-FUTURES",
    );
  });

  it("should normalize order states", () => {
    assert.strictEqual(normalizeOrderStatus("live"), "NEW");
    assert.strictEqual(normalizeOrderStatus("partially_filled"), "PARTIAL");
    assert.strictEqual(normalizeOrderStatus("filled"), "FILLED");
    assert.strictEqual(normalizeOrderStatus("cancelled"), "CANCELED");
    assert.strictEqual(normalizeOrderStatus("fail_trigger"), "REJECTED");
    assert.strictEqual(normalizeOrderStatus(undefined), "UNKNOWN");
    assert.strictEqual(normalizeOrderStatus("paused"), "UNKNOWN");
  });

  it("should express closes as reduceOnly in one-way mode", () => {
    const body = buildPlaceOrderBody(LONG_CLOSE, EXCHANGE, "one_way");

    assert.deepStrictEqual(body, {
      symbol: "BTCUSDT",
      productType: "USDT-FUTURES",
      marginCoin: "USDT",
      marginMode: "crossed",
      side: "sell",
      orderType: "market",
      size: "0.01",
      clientOid: "close-abc",
      reduceOnly: "YES",
    });
  });

  it("should express closes as tradeSide=close with the position direction in hedge mode", () => {
    const body = buildPlaceOrderBody(
      { ...LONG_CLOSE, close: { kind: "close_side", holdSide: "LONG" } },
      EXCHANGE,
      "hedge",
    );

    assert.strictEqual(body.side, "buy");
    assert.strictEqual(body.tradeSide, "close");
    assert.strictEqual(body.reduceOnly, undefined);
  });

  it("should add price and gtc to limit entries", () => {
    const body = buildPlaceOrderBody(
      { ...LONG_CLOSE, side: "buy", type: "limit", price: 60000.5, purpose: "entry", close: undefined },
      EXCHANGE,
      "one_way",
    );

    assert.strictEqual(body.reduceOnly, "NO");
    assert.strictEqual(body.price, "60000.5");
    assert.strictEqual(body.force, "gtc");
  });

  it("should build loss_plan stop-loss bodies with the mode-specific holdSide", () => {
    const spec = {
      clientOrderId: "sl-1",
      symbol: "ETHUSDT",
      holdSide: "SHORT" as const,
      size: 0.5,
      triggerPrice: 3100,
      close: { kind: "reduce_only" as const },
    };

    const body = buildStopLossBody(spec, EXCHANGE, "one_way");
    assert.strictEqual(body.planType, "loss_plan");
    assert.strictEqual(body.triggerPrice, "3100");
    assert.strictEqual(body.holdSide, "sell");
    assert.strictEqual(tpslHoldSide("SHORT", "hedge"), "short");
  });

  it("should parse orders including plan orders", () => {
    const order = parseOrder(
      {
        orderId: "123",
        clientOid: "sl-xyz",
        symbol: "BTCUSDT",
        side: "sell",
        size: "0.01",
        triggerPrice: "59000",
        planType: "loss_plan",
        planStatus: "live",
      },
      "one_way",
    );

    assert.strictEqual(order.purpose, "stop_loss");
    assert.strictEqual(order.holdSide, "LONG");
    assert.strictEqual(order.reduceOnly, true);
    assert.strictEqual(order.triggerPrice, 59000);
    assert.strictEqual(order.status, "NEW");
  });

  it("should read the hold side from posSide in hedge mode", () => {
    const order = parseOrder(
      { orderId: "9", clientOid: "entry-1", symbol: "BTCUSDT", side: "buy", posSide: "short", tradeSide: "close" },
      "hedge",
    );
    assert.strictEqual(order.holdSide, "SHORT");
    assert.strictEqual(order.purpose, "close");
  });

  it("should skip empty positions", () => {
    assert.strictEqual(parsePosition({ symbol: "BTCUSDT", total: "0" }), undefined);
    assert.deepStrictEqual(
      parsePosition({
        symbol: "BTCUSDT",
        holdSide: "short",
        total: "0.02",
        openPriceAvg: "61000",
        markPrice: "60000",
        unrealizedPL: "20",
      }),
      {
        symbol: "BTCUSDT",
        holdSide: "SHORT",
        size: 0.02,
        entryPrice: 61000,
        markPrice: 60000,
        unrealizedPnl: 20,
        liquidationPrice: undefined,
      },
    );
  });

  it("should derive precision rules from contract metadata", () => {
    assert.deepStrictEqual(
      parseContract({
        symbol: "BTCUSDT",
        sizeMultiplier: "0.001",
        pricePlace: "1",
        priceEndStep: "5",
        minTradeNum: "0.001",
        symbolStatus: "normal",
      }),
      { symbol: "BTCUSDT", qtyStep: 0.001, priceStep: 0.5, minQty: 0.001, tradable: true },
    );
  });
});

describe("BitgetRestGateway", () => {
  it("should sign authenticated requests and parse the balance", async () => {
    const { gateway, seen } = fakeGateway(() => ({
      code: "00000",
      data: [{ marginCoin: "USDT", usdtEquity: "1234.5", crossedMaxAvailable: "1000", unrealizedPL: "-3" }],
    }));

    const balance = await gateway.getBalance();
    assert.deepStrictEqual(balance, {
      equity: 1234.5,
      available: 1000,
      unrealizedPnl: -3,
      fetchedAt: 1700000000000,
    });

    const request = seen[0];
    const path = `${BITGET_ENDPOINTS.ACCOUNTS}?productType=USDT-FUTURES`;
    assert.strictEqual(request.url, path);
    assert.strictEqual(request.headers.get("ACCESS-KEY"), "test-key");
    assert.strictEqual(
      request.headers.get("ACCESS-SIGN"),
      signRequest("test-secret", "1700000000000", "GET", path, ""),
    );
  });

  it("should turn a non-success body code into ExchangeApiError", async () => {
    const { gateway } = fakeGateway(() => ({ code: "40762", msg: "balance not enough", data: null }));

    await assert.rejects(
      gateway.placeOrder(LONG_CLOSE),
      (err: unknown) =>
        err instanceof ExchangeApiError &&
        err.exchangeCode === "40762" &&
        err.message === "Bitget API error 40762: balance not enough",
    );
  });

  it("should send the built body for orders", async () => {
    const { gateway, seen } = fakeGateway(() => ({ code: "00000", data: { orderId: "555", clientOid: "close-abc" } }));

    const ack = await gateway.placeOrder(LONG_CLOSE);
    assert.deepStrictEqual(ack, { orderId: "555", clientOrderId: "close-abc", status: "NEW", filledSize: 0 });

    const sent: unknown = typeof seen[0].data === "string" ? JSON.parse(seen[0].data) : undefined;
    assert.deepStrictEqual(sent, buildPlaceOrderBody(LONG_CLOSE, EXCHANGE, "one_way"));
  });

  it("should route stop-loss cancels to the plan endpoint", async () => {
    const { gateway, seen } = fakeGateway(() => ({ code: "00000", data: {} }));

    await gateway.cancelOrder({ symbol: "BTCUSDT", orderId: "1", purpose: "stop_loss" });
    await gateway.cancelOrder({ symbol: "BTCUSDT", orderId: "2", purpose: "entry" });

    assert.strictEqual(seen[0].url, BITGET_ENDPOINTS.CANCEL_PLAN);
    assert.strictEqual(seen[1].url, BITGET_ENDPOINTS.CANCEL_ORDER);
  });

  describe("probeCapability", () => {
    it("should report supported when plan orders can be listed", async () => {
      const { gateway } = fakeGateway(() => ({ code: "00000", data: { entrustedList: null } }));
      assert.strictEqual(await gateway.probeCapability("trigger_orders"), "supported");
    });

    it("should report unsupported on a definitive exchange rejection", async () => {
      const { gateway } = fakeGateway(() => ({ code: "40034", msg: "not allowed", data: null }));
      assert.strictEqual(await gateway.probeCapability("trigger_orders"), "unsupported");
    });

    it("should report timeout on a network failure", async () => {
      const http = axios.create({
        adapter: async (config) => {
          throw new AxiosError("socket hang up", "ECONNRESET", config);
        },
      });
      const gateway = new BitgetRestGateway({ exchange: EXCHANGE, timeoutMs: 1000, logger: createNullLogger(), http });

      assert.strictEqual(await gateway.probeCapability("trigger_orders"), "timeout");
      await assert.rejects(gateway.getPositions(), TransientExchangeError);
    });
  });
});
