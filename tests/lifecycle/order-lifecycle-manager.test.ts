/**
 * Tests for the order lifecycle manager against the paper exchange
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { OrderLifecycleManager, type CloseReason } from "../../src/lifecycle/order-lifecycle-manager";
import { PositionBook } from "../../src/lifecycle/position-book";
import { PaperExchangeGateway, type PaperExchangeOptions } from "../../src/exchange/paper-gateway";
import { CapabilityCache } from "../../src/exchange/capability-cache";
import { SymbolRegistry } from "../../src/exchange/symbol-registry";
import type { FeedMode, PriceSource } from "../../src/exchange/price-feed";
import { RateLimitedCallExecutor } from "../../src/execution/call-executor";
import { MemoryLedger } from "../../src/ledger/ledger";
import { SafetySupervisor } from "../../src/safety/safety-supervisor";
import { AlertManager } from "../../src/services/alert-manager";
import type { NotificationEvent, NotificationSink } from "../../src/services/notification.service";
import type { OrderPlan } from "../../src/risk/risk-engine";
import {
  DEFAULT_SAFETY_CONFIG,
  DEFAULT_STOP_LOSS_CONFIG,
  type ExecutionConfig,
  type StopLossConfig,
} from "../../src/config/schema";
import type { PriceTick, Side } from "../../src/domain/trade.types";
import { ExchangeApiError, TransientExchangeError } from "../../src/errors/app.errors";
import { createNullLogger } from "../../src/utils/logger.util";

const execution: ExecutionConfig = {
  rateLimitPerSecond: 1000,
  burstCapacity: 100,
  maxAttempts: 2,
  baseDelayMs: 1,
  maxDelayMs: 2,
  jitterFactor: 0,
  callTimeoutMs: 200,
};

const BTC_RULES = { symbol: "BTCUSDT", qtyStep: 0.001, priceStep: 0.01, minQty: 0.001, tradable: true };

class RecordingSink implements NotificationSink {
  readonly name = "recording";
  readonly events: NotificationEvent[] = [];

  async notify(event: NotificationEvent): Promise<boolean> {
    this.events.push(event);
    return true;
  }
}

class FakePriceSource implements PriceSource {
  readonly watched = new Set<string>();

  getLatest(): PriceTick | undefined {
    return undefined;
  }

  getMode(): FeedMode {
    return "poll";
  }

  watch(symbol: string): void {
    this.watched.add(symbol);
  }

  unwatch(symbol: string): void {
    this.watched.delete(symbol);
  }
}

function plan(overrides: Partial<OrderPlan> = {}): OrderPlan {
  const base: Omit<OrderPlan, "entries"> = {
    planId: "plan-1",
    signalId: "sig-1",
    symbol: "BTCUSDT",
    side: "LONG",
    size: 1,
    leverage: 5,
    entryPrice: 100,
    entryType: "limit",
    stopLoss: { triggerPrice: 99, derived: false, requestedMode: "trigger" },
    takeProfits: [],
    notional: 100,
    riskAmount: 1,
    ...overrides,
  };
  return { ...base, entries: overrides.entries ?? [{ index: 0, price: base.entryPrice, size: base.size }] };
}

function setup(options: PaperExchangeOptions = {}, stopLoss: Partial<StopLossConfig> = {}) {
  const clock = { now: 1000 };
  const logger = createNullLogger();
  const gateway = new PaperExchangeGateway({
    rules: [BTC_RULES],
    prices: { BTCUSDT: 100, ETHUSDT: 2000 },
    fillLimitOrders: true,
    ...options,
  });
  const ledger = new MemoryLedger(() => clock.now);
  const sink = new RecordingSink();
  const alerts = new AlertManager({ ledger, sink, logger, now: () => clock.now });
  const supervisor = new SafetySupervisor({ config: { ...DEFAULT_SAFETY_CONFIG }, ledger, alerts, logger, now: () => clock.now });
  const executor = new RateLimitedCallExecutor(execution, logger);
  const capabilities = new CapabilityCache(
    { ttlMs: 60_000, unknownTtlMs: 100, probeTimeoutMs: 20 },
    (kind) => gateway.probeCapability(kind),
    logger,
    () => clock.now,
  );
  const symbols = new SymbolRegistry(gateway, executor, 60_000, () => clock.now);
  const prices = new FakePriceSource();
  const manager = new OrderLifecycleManager({
    gateway,
    executor,
    capabilities,
    symbols,
    ledger,
    alerts,
    supervisor,
    config: { ...DEFAULT_STOP_LOSS_CONFIG, ...stopLoss },
    logger,
    prices,
    now: () => clock.now,
  });
  const closed: Array<[string, CloseReason]> = [];
  manager.onPositionClosed((position, reason) => closed.push([position.key, reason]));
  const alertCodes = () => ledger.query({ kind: "ALERT" }).map((r) => r.data.code);
  return { clock, gateway, ledger, supervisor, capabilities, prices, manager, closed, alertCodes };
}

async function openStops(gateway: PaperExchangeGateway): Promise<string[]> {
  const open = await gateway.getOpenOrders();
  return open.filter((o) => o.purpose === "stop_loss").map((o) => o.orderId);
}

function ladderPlan(): OrderPlan {
  return plan({
    size: 3,
    entryPrice: 98,
    stopLoss: { triggerPrice: 95, derived: false, requestedMode: "trigger" },
    entries: [
      { index: 0, price: 100, size: 1 },
      { index: 1, price: 97, size: 2 },
    ],
  });
}

async function openFilled(manager: OrderLifecycleManager, side: Side = "LONG") {
  const result = await manager.openFromPlan(
    plan(side === "SHORT" ? { side, stopLoss: { triggerPrice: 101, derived: false, requestedMode: "trigger" } } : {}),
  );
  assert.strictEqual(result.status, "opened");
  return result;
}

describe("OrderLifecycleManager", () => {
  describe("entry", () => {
    it("should open, fill and protect with a trigger stop sized to the fill", async () => {
      const { manager, gateway, ledger } = setup();

      const result = await openFilled(manager);

      assert.strictEqual(result.position?.state, "FILLED_PROTECTED");
      assert.strictEqual(gateway.leverage.get("BTCUSDT:LONG"), 5);
      assert.deepStrictEqual(
        gateway.placedStopLosses.map((s) => [s.size, s.triggerPrice, s.holdSide, s.close]),
        [[1, 99, "LONG", { kind: "reduce_only" }]],
      );
      assert.strictEqual(result.position?.stopLoss?.mode, "trigger");
      assert.strictEqual(result.position?.stopLoss?.orderId, "paper-2");
      assert.strictEqual(ledger.hasProtectiveOrder("BTCUSDT:LONG"), true);
      assert.deepStrictEqual(manager.unprotectedPositions(), []);
    });

    it("should size the stop to each partial fill", async () => {
      const { manager, gateway } = setup({ fillLimitOrders: false });

      const result = await manager.openFromPlan(plan());
      assert.strictEqual(result.position?.state, "PENDING_ENTRY");
      assert.strictEqual(gateway.placedStopLosses.length, 0);

      gateway.fillOrder("paper-1", 0.6);
      await manager.refreshOrders();
      const partial = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(partial?.state, "PARTIALLY_FILLED");
      assert.strictEqual(partial?.filledSize, 0.6);

      gateway.fillOrder("paper-1", 0.4);
      await manager.refreshOrders();
      const full = manager.book.get("BTCUSDT:LONG");

      assert.deepStrictEqual(
        gateway.placedStopLosses.map((s) => s.size),
        [0.6, 1],
      );
      assert.deepStrictEqual(
        gateway.cancelled.map((c) => c.orderId),
        ["paper-2"],
      );
      assert.strictEqual(full?.state, "FILLED_PROTECTED");
      assert.strictEqual(full?.stopLoss?.orderId, "paper-3");
      assert.strictEqual(full?.protectionPending, false);
    });

    it("should skip a second position on the same symbol", async () => {
      const { manager } = setup();
      await openFilled(manager);

      const again = await manager.openFromPlan(plan({ planId: "plan-2" }));
      assert.deepStrictEqual(again, { status: "skipped", detail: "position BTCUSDT:LONG already open" });
    });

    it("should skip entries outside NORMAL", async () => {
      const { manager, supervisor, gateway } = setup();
      await supervisor.enterSafeMode(["test"], "operator");

      const result = await manager.openFromPlan(plan());
      assert.deepStrictEqual(result, { status: "skipped", detail: "entries blocked in SAFE_MODE" });
      assert.strictEqual(gateway.callCount("placeOrder"), 0);
    });

    it("should reject the position when leverage cannot be set", async () => {
      const { manager, gateway } = setup();
      gateway.failNext("setLeverage", new ExchangeApiError("leverage not allowed", "setLeverage", 400, "40797"));

      const result = await manager.openFromPlan(plan());

      assert.strictEqual(result.status, "failed");
      assert.strictEqual(result.detail, "setLeverage failed: leverage not allowed");
      assert.strictEqual(result.position?.state, "REJECTED");
      assert.strictEqual(manager.book.get("BTCUSDT:LONG"), undefined);
      assert.strictEqual(gateway.callCount("placeOrder"), 0);
    });
  });

  describe("entry ladder", () => {
    it("should rest one entry order per leg and protect each fill", async () => {
      const { manager, gateway } = setup({ fillLimitOrders: false });

      const result = await manager.openFromPlan(ladderPlan());
      assert.strictEqual(result.status, "opened");
      assert.deepStrictEqual(
        gateway.placedOrders.map((o) => [o.purpose, o.price, o.size]),
        [
          ["entry", 100, 1],
          ["entry", 97, 2],
        ],
      );
      assert.deepStrictEqual(
        result.position?.entryOrders.map((leg) => [leg.index, leg.orderId]),
        [
          [0, "paper-1"],
          [1, "paper-2"],
        ],
      );

      gateway.fillOrder("paper-1", 1);
      await manager.refreshOrders();
      const partial = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(partial?.state, "PARTIALLY_FILLED");
      assert.strictEqual(partial?.avgEntryPrice, 100);
      assert.strictEqual(partial?.stopLoss?.size, 1);

      gateway.fillOrder("paper-2", 2);
      await manager.refreshOrders();
      const full = manager.book.get("BTCUSDT:LONG");

      assert.strictEqual(full?.state, "FILLED_PROTECTED");
      assert.strictEqual(full?.filledSize, 3);
      assert.strictEqual(full?.avgEntryPrice, 98);
      assert.deepStrictEqual(
        gateway.placedStopLosses.map((s) => [s.size, s.triggerPrice]),
        [
          [1, 95],
          [3, 95],
        ],
      );
      assert.strictEqual(full?.stopLoss?.orderId, "paper-4");
      assert.strictEqual(gateway.placedOrders.length, 2);
    });

    it("should cancel the unfilled legs on close", async () => {
      const { manager, gateway, closed } = setup({ fillLimitOrders: false });
      await manager.openFromPlan(ladderPlan());
      gateway.fillOrder("paper-1", 1);
      await manager.refreshOrders();

      assert.strictEqual(await manager.closePosition("BTCUSDT:LONG", "manual"), true);

      assert.deepStrictEqual(
        gateway.cancelled.map((c) => c.orderId),
        ["paper-2", "paper-3"],
      );
      assert.deepStrictEqual(closed, [["BTCUSDT:LONG", "manual"]]);
      assert.deepStrictEqual(await gateway.getPositions(), []);
    });

    it("should shrink the position when a leg is cancelled on the exchange", async () => {
      const { manager, gateway } = setup({ fillLimitOrders: false });
      await manager.openFromPlan(ladderPlan());
      gateway.fillOrder("paper-1", 1);
      await gateway.cancelOrder({ symbol: "BTCUSDT", orderId: "paper-2", purpose: "entry" });

      await manager.refreshOrders();
      const position = manager.book.get("BTCUSDT:LONG");

      assert.strictEqual(position?.state, "FILLED_PROTECTED");
      assert.strictEqual(position?.intendedSize, 1);
      assert.strictEqual(position?.filledSize, 1);
      assert.strictEqual(position?.stopLoss?.size, 1);
    });

    it("should keep the legs across a restore", async () => {
      const { manager, gateway, ledger } = setup({ fillLimitOrders: false });
      await manager.openFromPlan(ladderPlan());
      gateway.fillOrder("paper-1", 1);
      await manager.refreshOrders();

      const book = new PositionBook();
      book.restore(ledger);

      assert.deepStrictEqual(
        book.get("BTCUSDT:LONG")?.entryOrders.map((leg) => [leg.orderId, leg.size, leg.filledSize]),
        [
          ["paper-1", 1, 1],
          ["paper-2", 2, 0],
        ],
      );
    });

    it("should rest a break-even reduce at the average of the first two legs", async () => {
      const { manager, gateway, alertCodes } = setup(
        { fillLimitOrders: false },
        { beReduceOnTwoEntries: true, beReducePct: 50 },
      );
      await manager.openFromPlan(ladderPlan());
      gateway.fillOrder("paper-1", 1);
      await manager.refreshOrders();
      assert.strictEqual(manager.book.get("BTCUSDT:LONG")?.breakEvenReduce, undefined);

      gateway.fillOrder("paper-2", 2);
      await manager.refreshOrders();

      const reduce = gateway.placedOrders[2];
      assert.deepStrictEqual(
        [reduce?.purpose, reduce?.type, reduce?.price, reduce?.size, reduce?.close],
        ["take_profit", "limit", 98, 1.5, { kind: "reduce_only" }],
      );
      const position = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(position?.breakEvenReduce?.orderId, "paper-5");
      assert.strictEqual(position?.breakEvenReduceDone, true);
      assert.ok(alertCodes().includes("BREAK_EVEN_REDUCE_PLACED"));

      gateway.fillOrder("paper-5", 1.5);
      await manager.refreshOrders();
      await manager.refreshOrders();

      const reduced = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(reduced?.filledSize, 1.5);
      assert.strictEqual(reduced?.stopLoss?.size, 1.5);
      assert.strictEqual(reduced?.stopLoss?.orderId, "paper-6");
      assert.strictEqual(gateway.placedOrders.filter((o) => o.purpose === "take_profit").length, 1);
    });

    it("should not rest a break-even reduce when it is disabled", async () => {
      const { manager, gateway } = setup({ fillLimitOrders: false });
      await manager.openFromPlan(ladderPlan());
      gateway.fillOrder("paper-1", 1);
      gateway.fillOrder("paper-2", 2);

      await manager.refreshOrders();

      assert.strictEqual(gateway.placedOrders.length, 2);
      assert.strictEqual(manager.book.get("BTCUSDT:LONG")?.breakEvenReduceDone, false);
    });
  });

  describe("stop confirmation", () => {
    it("should keep a single stop when one read-back fails", async () => {
      const { manager, gateway } = setup();
      gateway.failNext("getOrder", new ExchangeApiError("order query rejected", "getOrder", 400, "40000"));

      const result = await openFilled(manager);

      assert.strictEqual(gateway.callCount("placeStopLoss"), 1);
      assert.strictEqual(result.position?.stopLoss?.orderId, "paper-2");
      assert.deepStrictEqual(await openStops(gateway), ["paper-2"]);
    });

    it("should cancel a stop it cannot read back before placing another", async () => {
      const { manager, gateway } = setup();
      gateway.failNext("getOrder", new ExchangeApiError("order query rejected", "getOrder", 400, "40000"), 3);

      const result = await openFilled(manager);

      assert.deepStrictEqual(
        gateway.cancelled.map((c) => c.orderId),
        ["paper-2"],
      );
      assert.strictEqual(gateway.callCount("placeStopLoss"), 2);
      assert.strictEqual(result.position?.state, "FILLED_PROTECTED");
      assert.strictEqual(result.position?.stopLoss?.orderId, "paper-3");
      assert.deepStrictEqual(await openStops(gateway), ["paper-3"]);
    });

    it("should hold an unverified stop as pending when it can be neither read nor cancelled", async () => {
      const { manager, gateway, supervisor, alertCodes } = setup();
      gateway.failNext("getOrder", new ExchangeApiError("order query rejected", "getOrder", 400, "40000"), 4);
      gateway.failNext("cancelOrder", new TransientExchangeError("connection reset", "cancelOrder"), 2);

      const result = await openFilled(manager);

      assert.strictEqual(gateway.callCount("placeStopLoss"), 1);
      assert.strictEqual(result.position?.stopLoss?.orderId, "paper-2");
      assert.strictEqual(result.position?.protectionPending, true);
      assert.deepStrictEqual(await openStops(gateway), ["paper-2"]);
      assert.strictEqual(supervisor.getMode(), "SAFE_MODE");
      assert.strictEqual(alertCodes().includes("PROTECTION_FAILED"), true);
    });
  });

  describe("stop repair", () => {
    it("should not replace a stop whose exchange state is unrecognised", async () => {
      const { manager, gateway } = setup();
      await openFilled(manager);
      const [stop] = (await gateway.getOpenOrders()).filter((o) => o.purpose === "stop_loss");
      gateway.seedOrder({ ...stop, status: "UNKNOWN" });

      const repaired = await manager.repairProtection("BTCUSDT:LONG", { missingStopOrderId: "paper-2" });

      assert.strictEqual(repaired, false);
      assert.strictEqual(gateway.callCount("placeStopLoss"), 1);
      assert.strictEqual(manager.book.get("BTCUSDT:LONG")?.stopLoss?.orderId, "paper-2");
    });

    it("should re-place a stop the exchange reports cancelled", async () => {
      const { manager, gateway } = setup();
      await openFilled(manager);
      await gateway.cancelOrder({ symbol: "BTCUSDT", orderId: "paper-2", purpose: "stop_loss" });

      const repaired = await manager.repairProtection("BTCUSDT:LONG", { missingStopOrderId: "paper-2" });

      assert.strictEqual(repaired, true);
      assert.strictEqual(manager.book.get("BTCUSDT:LONG")?.stopLoss?.orderId, "paper-3");
      assert.deepStrictEqual(await openStops(gateway), ["paper-3"]);
    });
  });

  describe("stop-loss mode", () => {
    it("should fall back to a local guard when the probe hangs, without placing a trigger", async () => {
      const { manager, gateway, prices, alertCodes } = setup({ triggerOrders: "hang" });

      const result = await openFilled(manager);

      assert.strictEqual(result.position?.stopLoss?.mode, "local_guard");
      assert.strictEqual(result.position?.stopLoss?.size, 1);
      assert.strictEqual(gateway.callCount("placeStopLoss"), 0);
      assert.strictEqual(prices.watched.has("BTCUSDT"), true);
      assert.strictEqual(manager.hasArmedLocalGuard(), true);
      assert.deepStrictEqual(alertCodes(), ["STOP_LOSS_MODE_FALLBACK"]);
    });

    it("should re-probe after an inconclusive answer", async () => {
      const { manager, gateway, capabilities } = setup({ triggerOrders: "hang" });
      assert.strictEqual(await manager.resolveStopLossMode("BTCUSDT"), "local_guard");

      gateway.setTriggerOrders("supported");
      capabilities.invalidate("trigger_orders");
      assert.strictEqual(await manager.resolveStopLossMode("BTCUSDT"), "trigger");
    });

    it("should keep an unsupported symbol on the local guard for the session", async () => {
      const { manager, gateway, capabilities, ledger } = setup({ triggerOrders: "unsupported" });

      assert.strictEqual(await manager.resolveStopLossMode("BTCUSDT"), "local_guard");
      gateway.setTriggerOrders("supported");
      capabilities.invalidate("trigger_orders");

      assert.strictEqual(await manager.resolveStopLossMode("BTCUSDT"), "local_guard");
      assert.strictEqual(await manager.resolveStopLossMode("ETHUSDT"), "trigger");
      const [alert] = ledger.query({ kind: "ALERT" });
      assert.strictEqual(alert.data.sticky, true);
    });

    it("should fall back when the exchange rejects the trigger order", async () => {
      const { manager, gateway } = setup();
      gateway.failNext("placeStopLoss", new ExchangeApiError("plan order rejected", "placeStopLoss", 400, "40034"));

      const result = await openFilled(manager);

      assert.strictEqual(result.position?.stopLoss?.mode, "local_guard");
      assert.strictEqual(gateway.callCount("placeStopLoss"), 1);
      assert.strictEqual(await manager.resolveStopLossMode("BTCUSDT"), "local_guard");
    });

    it("should always use the guard when configured for it", async () => {
      const { manager, gateway } = setup({}, { mode: "local_guard" });

      const result = await openFilled(manager);
      assert.strictEqual(result.position?.stopLoss?.mode, "local_guard");
      assert.strictEqual(gateway.callCount("probeCapability"), 0);
    });
  });

  describe("management", () => {
    it("should not move to break-even before the profit trigger", async () => {
      const { manager, gateway } = setup();
      await openFilled(manager);
      gateway.setPrice("BTCUSDT", 100.5);

      const result = await manager.moveStopToBreakEven("BTCUSDT:LONG");
      assert.deepStrictEqual(result, { moved: false, reason: "profit 0.50% below 1%" });
    });

    it("should move the stop to entry plus the buffer", async () => {
      const { manager, gateway, alertCodes } = setup();
      await openFilled(manager);
      gateway.setPrice("BTCUSDT", 101.5);

      const result = await manager.moveStopToBreakEven("BTCUSDT:LONG");

      assert.deepStrictEqual(result, { moved: true, price: 100.05 });
      assert.deepStrictEqual(
        gateway.placedStopLosses.map((s) => s.triggerPrice),
        [99, 100.05],
      );
      assert.deepStrictEqual(
        gateway.cancelled.map((c) => c.orderId),
        ["paper-2"],
      );
      const position = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(position?.state, "MANAGING");
      assert.strictEqual(position?.breakEvenDone, true);
      assert.strictEqual(position?.stopLoss?.orderId, "paper-3");
      assert.strictEqual(alertCodes().includes("BREAK_EVEN_MOVED"), true);
    });

    it("should escalate when the break-even stop cannot be placed", async () => {
      const { manager, gateway, supervisor, alertCodes } = setup();
      await openFilled(manager);
      gateway.setPrice("BTCUSDT", 101.5);
      gateway.failNext("placeStopLoss", new TransientExchangeError("connection reset", "placeStopLoss"), 6);

      const result = await manager.moveStopToBreakEven("BTCUSDT:LONG");

      assert.deepStrictEqual(result, { moved: false, price: 100.05, reason: "stop re-placement not confirmed" });
      assert.strictEqual(gateway.callCount("placeStopLoss"), 7);
      const position = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(position?.stopLoss, undefined);
      assert.strictEqual(position?.stopLossPrice, 99);
      assert.strictEqual(position?.breakEvenDone, false);
      assert.strictEqual(supervisor.getMode(), "SAFE_MODE");
      assert.strictEqual(alertCodes().includes("PROTECTION_FAILED"), true);
    });

    it("should keep the old stop when it cannot be cancelled", async () => {
      const { manager, gateway } = setup();
      await openFilled(manager);
      gateway.setPrice("BTCUSDT", 101.5);
      gateway.failNext("cancelOrder", new TransientExchangeError("connection reset", "cancelOrder"), 2);

      const result = await manager.moveStopToBreakEven("BTCUSDT:LONG");

      assert.deepStrictEqual(result, { moved: false, price: 100.05, reason: "stop re-placement not confirmed" });
      assert.strictEqual(gateway.callCount("placeStopLoss"), 1);
      const position = manager.book.get("BTCUSDT:LONG");
      assert.strictEqual(position?.stopLoss?.orderId, "paper-2");
      assert.strictEqual(position?.stopLossPrice, 99);
      assert.strictEqual(position?.protectionPending, false);
      assert.deepStrictEqual(await openStops(gateway), ["paper-2"]);
    });

    it("should reduce by a percentage and re-size the stop", async () => {
      const { manager, gateway } = setup();
      await openFilled(manager);

      const result = await manager.reduce("BTCUSDT:LONG", 40);

      assert.deepStrictEqual(result, { reduced: 0.4, remaining: 0.6 });
      const reduceOrder = gateway.placedOrders[1];
      assert.strictEqual(reduceOrder.size, 0.4);
      assert.strictEqual(reduceOrder.side, "sell");
      assert.deepStrictEqual(reduceOrder.close, { kind: "reduce_only" });
      assert.deepStrictEqual(
        gateway.placedStopLosses.map((s) => s.size),
        [1, 0.6],
      );
      assert.strictEqual(manager.book.get("BTCUSDT:LONG")?.stopLoss?.size, 0.6);
    });

    it("should ignore manage actions for symbols without a position", async () => {
      const { manager } = setup();
      const result = await manager.handleManageAction({
        kind: "MANAGE_ACTION",
        signalId: "m-1",
        source: { chatId: "chat", messageId: "2", version: 1 },
        symbol: "ETHUSDT",
        action: "move_sl_to_be",
        receivedAt: 1000,
      });
      assert.deepStrictEqual(result, { status: "ignored", detail: "no open position on ETHUSDT" });
    });
  });

  describe("closing", () => {
    it("should close on a local guard crossing", async () => {
      const { manager, gateway, prices, closed } = setup({ triggerOrders: "hang" });
      await openFilled(manager);

      await manager.processPriceTick({ symbol: "BTCUSDT", price: 99.5, at: 1000, source: "stream" });
      assert.deepStrictEqual(closed, []);

      await manager.processPriceTick({ symbol: "BTCUSDT", price: 98.9, at: 1000, source: "stream" });

      assert.deepStrictEqual(closed, [["BTCUSDT:LONG", "stop_loss"]]);
      const closeOrder = gateway.placedOrders[1];
      assert.strictEqual(closeOrder.purpose, "close");
      assert.strictEqual(closeOrder.size, 1);
      assert.strictEqual(manager.book.get("BTCUSDT:LONG"), undefined);
      assert.strictEqual(prices.watched.has("BTCUSDT"), false);
    });

    it("should name the hold side when closing in hedge mode", async () => {
      const { manager, gateway, closed } = setup({ positionMode: "hedge" });
      await openFilled(manager, "SHORT");

      assert.deepStrictEqual(gateway.placedStopLosses[0].close, { kind: "close_side", holdSide: "SHORT" });
      assert.strictEqual(await manager.closePosition("BTCUSDT:SHORT", "manual"), true);

      const closeOrder = gateway.placedOrders[1];
      assert.strictEqual(closeOrder.side, "buy");
      assert.deepStrictEqual(closeOrder.close, { kind: "close_side", holdSide: "SHORT" });
      assert.deepStrictEqual(closed, [["BTCUSDT:SHORT", "manual"]]);
    });

    it("should not close while the resting entry cannot be cancelled or read", async () => {
      const { manager, gateway, closed, alertCodes } = setup({ fillLimitOrders: false });
      await manager.openFromPlan(plan());
      gateway.failNext("cancelOrder", new TransientExchangeError("connection reset", "cancelOrder"), 2);
      gateway.failNext("getOrder", new TransientExchangeError("connection reset", "getOrder"), 2);

      assert.strictEqual(await manager.closePosition("BTCUSDT:LONG", "manual"), false);

      assert.deepStrictEqual(closed, []);
      assert.strictEqual(manager.book.get("BTCUSDT:LONG")?.state, "PENDING_ENTRY");
      const resting = (await gateway.getOpenOrders()).filter((o) => o.purpose === "entry");
      assert.deepStrictEqual(
        resting.map((o) => o.orderId),
        ["paper-1"],
      );
      assert.strictEqual(alertCodes().includes("CLOSE_FAILED"), true);
    });

    it("should use reduce-only in one-way mode", () => {
      const { manager } = setup();
      assert.deepStrictEqual(manager.closeInstructionFor("SHORT"), { kind: "reduce_only" });
    });

    it("should close tracked and untracked positions in a panic sweep", async () => {
      const { manager, gateway, closed } = setup();
      await openFilled(manager);
      gateway.seedPosition({
        symbol: "ETHUSDT",
        holdSide: "SHORT",
        size: 2,
        entryPrice: 2000,
        markPrice: 2000,
        unrealizedPnl: 0,
      });

      const result = await manager.panicCloseAll();

      assert.deepStrictEqual(result, { attempted: 2, closed: 2, failed: [] });
      assert.deepStrictEqual(closed, [["BTCUSDT:LONG", "panic_close"]]);
      assert.deepStrictEqual(await gateway.getPositions(), []);
      const ethClose = gateway.placedOrders[2];
      assert.deepStrictEqual([ethClose.symbol, ethClose.side, ethClose.size], ["ETHUSDT", "buy", 2]);
    });

    it("should mark a position closed by the stop when the trigger fired", async () => {
      const { manager, gateway, closed } = setup();
      await openFilled(manager);

      gateway.setPrice("BTCUSDT", 98);
      await manager.refreshOrders();

      assert.deepStrictEqual(closed, [["BTCUSDT:LONG", "stop_loss"]]);
      assert.strictEqual(manager.book.countOpen(), 0);
    });
  });
});
