/**
 * PaperExchangeGateway - in-process exchange used for dry runs and tests
 *
 * Behaves like a futures venue closely enough for the engine:
 * - market orders fill at the current price, limit orders rest until filled
 * - trigger stop-losses fire when the price crosses them
 * - closing instructions must match the account position mode
 * - position-attached protective orders are cancelled when the position goes flat
 *
 * Test hooks: scripted failures per method, capability answers, manual fills.
 */

import { ExchangeApiError } from "../errors/app.errors";
import {
  positionKey,
  type AccountSnapshot,
  type CapabilityKind,
  type ExchangeOrder,
  type ExchangePosition,
  type OrderResult,
  type OrderSpec,
  type PositionMode,
  type ProbeResult,
  type Side,
  type StopLossSpec,
  type SymbolRules,
  type Ticker,
} from "../domain/trade.types";
import type { CancelRequest, ExchangeGateway } from "./gateway";

export type PaperMethod =
  | "getBalance"
  | "getPositions"
  | "getOpenOrders"
  | "getOrder"
  | "placeOrder"
  | "placeStopLoss"
  | "cancelOrder"
  | "getSymbolRules"
  | "getTicker"
  | "setLeverage"
  | "probeCapability";

/** "hang" never settles, so callers only get out through their own deadline */
export type PaperProbeAnswer = ProbeResult | "hang";

export interface PaperExchangeOptions {
  positionMode?: PositionMode;
  /** Starting equity (default: 1000) */
  equity?: number;
  /** Answer to probeCapability and whether placeStopLoss works (default: supported) */
  triggerOrders?: PaperProbeAnswer;
  /** Fill market orders immediately (default: true) */
  fillMarketOrders?: boolean;
  /** Fill limit orders immediately (default: false) */
  fillLimitOrders?: boolean;
  rules?: SymbolRules[];
  prices?: Record<string, number>;
  quoteVolumes?: Record<string, number>;
}

const OPEN_STATUSES = new Set(["NEW", "PARTIAL"]);

export class PaperExchangeGateway implements ExchangeGateway {
  readonly name = "paper";
  readonly positionMode: PositionMode;

  /** Every order submitted through placeOrder, in order */
  readonly placedOrders: OrderSpec[] = [];
  /** Every trigger stop-loss submitted, in order */
  readonly placedStopLosses: StopLossSpec[] = [];
  /** Every cancel request, in order */
  readonly cancelled: CancelRequest[] = [];
  readonly leverage = new Map<string, number>();

  private equity: number;
  private triggerOrders: PaperProbeAnswer;
  private readonly fillMarketOrders: boolean;
  private readonly fillLimitOrders: boolean;
  private readonly rules = new Map<string, SymbolRules>();
  private readonly prices = new Map<string, number>();
  private readonly quoteVolumes = new Map<string, number>();
  private readonly orders = new Map<string, ExchangeOrder>();
  private readonly positions = new Map<string, ExchangePosition>();
  private readonly failures = new Map<PaperMethod, Error[]>();
  private readonly callCounts = new Map<PaperMethod, number>();
  private orderSeq = 0;

  constructor(options: PaperExchangeOptions = {}) {
    this.positionMode = options.positionMode ?? "one_way";
    this.equity = options.equity ?? 1000;
    this.triggerOrders = options.triggerOrders ?? "supported";
    this.fillMarketOrders = options.fillMarketOrders ?? true;
    this.fillLimitOrders = options.fillLimitOrders ?? false;
    for (const rule of options.rules ?? []) this.rules.set(rule.symbol, rule);
    for (const [symbol, price] of Object.entries(options.prices ?? {})) this.prices.set(symbol, price);
    for (const [symbol, volume] of Object.entries(options.quoteVolumes ?? {})) this.quoteVolumes.set(symbol, volume);
  }

  // ===========================================================================
  // Test / dry-run controls
  // ===========================================================================

  /** Queue an error for the next call(s) of a method */
  failNext(method: PaperMethod, error: Error, times = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(method, queue);
  }

  callCount(method: PaperMethod): number {
    return this.callCounts.get(method) ?? 0;
  }

  totalCalls(): number {
    let total = 0;
    for (const count of this.callCounts.values()) total += count;
    return total;
  }

  setTriggerOrders(answer: PaperProbeAnswer): void {
    this.triggerOrders = answer;
  }

  setEquity(equity: number): void {
    this.equity = equity;
  }

  setRules(rule: SymbolRules): void {
    this.rules.set(rule.symbol, rule);
  }

  /** Move the price and fire any trigger stop-loss it crosses */
  setPrice(symbol: string, price: number): void {
    this.prices.set(symbol, price);
    for (const order of [...this.orders.values()]) {
      if (order.symbol !== symbol || order.purpose !== "stop_loss" || !OPEN_STATUSES.has(order.status)) continue;
      const trigger = order.triggerPrice ?? 0;
      const crossed = order.holdSide === "LONG" ? price <= trigger : price >= trigger;
      if (crossed) this.applyFill(order, order.size - order.filledSize, price);
    }
  }

  /** Fill part of a resting order; fillSize is the increment, not the cumulative total */
  fillOrder(orderId: string, fillSize: number, price?: number): ExchangeOrder {
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`paper order ${orderId} not found`);
    this.applyFill(order, fillSize, price ?? order.price ?? this.prices.get(order.symbol) ?? 0);
    return { ...order };
  }

  /** Seed a position that the engine did not open (orphan scenarios) */
  seedPosition(position: ExchangePosition): void {
    this.positions.set(positionKey(position.symbol, position.holdSide), { ...position });
  }

  /** Seed a resting order that the engine did not place */
  seedOrder(order: ExchangeOrder): void {
    this.orders.set(order.orderId, { ...order });
  }

  // ===========================================================================
  // ExchangeGateway
  // ===========================================================================

  async getBalance(): Promise<AccountSnapshot> {
    this.enter("getBalance");
    const unrealizedPnl = [...this.positions.values()].reduce((sum, p) => sum + this.unrealized(p), 0);
    return { equity: this.equity, available: this.equity, unrealizedPnl, fetchedAt: Date.now() };
  }

  async getPositions(): Promise<ExchangePosition[]> {
    this.enter("getPositions");
    return [...this.positions.values()].map((position) => {
      const markPrice = this.prices.get(position.symbol) ?? position.markPrice;
      return { ...position, markPrice, unrealizedPnl: this.unrealized({ ...position, markPrice }) };
    });
  }

  async getOpenOrders(): Promise<ExchangeOrder[]> {
    this.enter("getOpenOrders");
    return [...this.orders.values()].filter((o) => OPEN_STATUSES.has(o.status)).map((o) => ({ ...o }));
  }

  async getOrder(symbol: string, orderId: string): Promise<ExchangeOrder | undefined> {
    this.enter("getOrder");
    const order = this.orders.get(orderId);
    return order && order.symbol === symbol ? { ...order } : undefined;
  }

  async placeOrder(spec: OrderSpec): Promise<OrderResult> {
    this.enter("placeOrder");
    this.placedOrders.push({ ...spec });
    this.checkCloseInstruction(spec);

    const rule = this.rules.get(spec.symbol);
    if (rule && spec.size < rule.minQty) {
      throw new ExchangeApiError(`size ${spec.size} below min ${rule.minQty}`, "placeOrder", 400, "45110");
    }

    const order: ExchangeOrder = {
      orderId: this.nextOrderId(),
      clientOrderId: spec.clientOrderId,
      symbol: spec.symbol,
      side: spec.side,
      holdSide: spec.holdSide,
      purpose: spec.purpose,
      size: spec.size,
      filledSize: 0,
      price: spec.price,
      status: "NEW",
      reduceOnly: spec.close !== undefined,
    };
    this.orders.set(order.orderId, order);

    const fillNow = spec.type === "market" ? this.fillMarketOrders : this.fillLimitOrders;
    if (fillNow) {
      const price = spec.type === "limit" && spec.price !== undefined ? spec.price : this.currentPrice(spec.symbol);
      this.applyFill(order, order.size, price);
    }
    return this.toResult(order);
  }

  async placeStopLoss(spec: StopLossSpec): Promise<OrderResult> {
    this.enter("placeStopLoss");
    this.placedStopLosses.push({ ...spec });
    if (this.triggerOrders !== "supported") {
      throw new ExchangeApiError("trigger orders are not available for this account", "placeStopLoss", 400, "40034");
    }
    const order: ExchangeOrder = {
      orderId: this.nextOrderId(),
      clientOrderId: spec.clientOrderId,
      symbol: spec.symbol,
      side: spec.holdSide === "LONG" ? "sell" : "buy",
      holdSide: spec.holdSide,
      purpose: "stop_loss",
      size: spec.size,
      filledSize: 0,
      triggerPrice: spec.triggerPrice,
      status: "NEW",
      reduceOnly: true,
    };
    this.orders.set(order.orderId, order);
    return this.toResult(order);
  }

  async cancelOrder(request: CancelRequest): Promise<void> {
    this.enter("cancelOrder");
    this.cancelled.push({ ...request });
    const order = this.orders.get(request.orderId);
    if (!order || order.symbol !== request.symbol || !OPEN_STATUSES.has(order.status)) {
      throw new ExchangeApiError(`order ${request.orderId} not open`, "cancelOrder", 400, "40768");
    }
    order.status = "CANCELED";
  }

  async getSymbolRules(symbol: string): Promise<SymbolRules | undefined> {
    this.enter("getSymbolRules");
    const rule = this.rules.get(symbol);
    return rule ? { ...rule } : undefined;
  }

  async getTicker(symbol: string): Promise<Ticker> {
    this.enter("getTicker");
    return { symbol, lastPrice: this.currentPrice(symbol), quoteVolume24h: this.quoteVolumes.get(symbol) };
  }

  async setLeverage(symbol: string, leverage: number, holdSide: Side): Promise<void> {
    this.enter("setLeverage");
    this.leverage.set(positionKey(symbol, holdSide), leverage);
  }

  probeCapability(kind: CapabilityKind): Promise<ProbeResult> {
    try {
      this.enter("probeCapability");
    } catch (err) {
      return Promise.reject(err);
    }
    if (kind !== "trigger_orders") return Promise.resolve("unsupported");
    const answer = this.triggerOrders;
    if (answer === "hang") return new Promise<ProbeResult>(() => undefined);
    return Promise.resolve(answer);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private enter(method: PaperMethod): void {
    this.callCounts.set(method, this.callCount(method) + 1);
    const queue = this.failures.get(method);
    const failure = queue?.shift();
    if (failure) throw failure;
  }

  private checkCloseInstruction(spec: OrderSpec): void {
    if (!spec.close) return;
    const expected = this.positionMode === "one_way" ? "reduce_only" : "close_side";
    if (spec.close.kind !== expected) {
      throw new ExchangeApiError(
        `${spec.close.kind} is not valid in ${this.positionMode} mode`,
        "placeOrder",
        400,
        "40774",
      );
    }
  }

  private applyFill(order: ExchangeOrder, fillSize: number, price: number): void {
    const remaining = order.size - order.filledSize;
    const qty = Math.min(Math.max(fillSize, 0), remaining);
    if (qty <= 0) return;

    const prevFilled = order.filledSize;
    order.filledSize = Number((prevFilled + qty).toFixed(10));
    order.avgFillPrice = ((order.avgFillPrice ?? price) * prevFilled + price * qty) / order.filledSize;
    order.status = order.filledSize >= order.size ? "FILLED" : "PARTIAL";

    const key = positionKey(order.symbol, order.holdSide);
    const existing = this.positions.get(key);
    if (order.purpose === "entry") {
      const size = (existing?.size ?? 0) + qty;
      const entryPrice = existing ? (existing.entryPrice * existing.size + price * qty) / size : price;
      this.positions.set(key, {
        symbol: order.symbol,
        holdSide: order.holdSide,
        size: Number(size.toFixed(10)),
        entryPrice,
        markPrice: price,
        unrealizedPnl: 0,
      });
      return;
    }

    if (!existing) return;
    const size = Number(Math.max(0, existing.size - qty).toFixed(10));
    if (size <= 0) {
      this.positions.delete(key);
      for (const other of this.orders.values()) {
        if (
          other.symbol === order.symbol &&
          other.holdSide === order.holdSide &&
          other.reduceOnly &&
          OPEN_STATUSES.has(other.status)
        ) {
          other.status = "CANCELED";
        }
      }
      return;
    }
    this.positions.set(key, { ...existing, size });
  }

  private unrealized(position: ExchangePosition): number {
    const mark = this.prices.get(position.symbol) ?? position.markPrice;
    const direction = position.holdSide === "LONG" ? 1 : -1;
    return (mark - position.entryPrice) * position.size * direction;
  }

  private currentPrice(symbol: string): number {
    const price = this.prices.get(symbol);
    if (price === undefined) {
      throw new ExchangeApiError(`no price for ${symbol}`, "getTicker", 400, "40034");
    }
    return price;
  }

  private nextOrderId(): string {
    this.orderSeq++;
    return `paper-${this.orderSeq}`;
  }

  private toResult(order: ExchangeOrder): OrderResult {
    return {
      orderId: order.orderId,
      clientOrderId: order.clientOrderId,
      status: order.status,
      filledSize: order.filledSize,
      avgFillPrice: order.avgFillPrice,
    };
  }
}

