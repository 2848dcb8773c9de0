/**
 * Order Lifecycle Manager
 *
 * Owns every managed position from entry to close:
 * - entry placement and fill tracking (partial fills included), one limit
 *   order per ladder leg
 * - a protective stop sized to the filled quantity, never the intended one
 * - stop-loss mode selection: native trigger orders when the exchange
 *   confirms support, otherwise a local guard watching the price feed
 * - break-even moves as a two-phase cancel-then-replace with verification
 * - partial take-profits and reductions that re-size the stop, including the
 *   break-even reduce once the first two ladder legs have filled
 * - closes, emergency closes and the panic sweep
 *
 * Every mutation runs under the per-symbol mutex and every exchange call goes
 * through the rate-limited executor. Methods that take the mutex must not be
 * called from inside another locked section.
 */

import type { StopLossConfig } from "../config/schema";
import type { ManageAction } from "../domain/signal.types";
import {
  entrySideFor,
  exitSideFor,
  positionKey,
  type CloseInstruction,
  type ExchangeOrder,
  type ExchangePosition,
  type OrderPurpose,
  type OrderResult,
  type OrderSpec,
  type OrderStatus,
  type PriceTick,
  type Side,
  type StopLossMode,
  type StopLossSpec,
} from "../domain/trade.types";
import { CapabilityUnknownError, ExchangeApiError } from "../errors/app.errors";
import type { CapabilityCache, CapabilityRecord } from "../exchange/capability-cache";
import type { ExchangeGateway } from "../exchange/gateway";
import type { PriceSource } from "../exchange/price-feed";
import type { SymbolRegistry } from "../exchange/symbol-registry";
import type { RateLimitedCallExecutor } from "../execution/call-executor";
import type { CallPriority } from "../execution/rate-limit";
import type { Ledger } from "../ledger/ledger";
import type { OrderPlan } from "../risk/risk-engine";
import { KeyedMutex } from "../runtime/keyed-mutex";
import type { SafetySupervisor } from "../safety/safety-supervisor";
import type { PanicSweepResult } from "../safety/types";
import type { AlertManager } from "../services/alert-manager";
import { newClientOrderId, newTraceId } from "../utils/id.util";
import { describeError, toError, type Logger } from "../utils/logger.util";
import { floorToStep, relativeDiff, roundToStep } from "../utils/price.util";
import {
  PositionBook,
  type EntryOrderRef,
  type ManagedPosition,
  type StopLossRef,
  type TakeProfitRef,
} from "./position-book";

const SIZE_EPSILON = 1e-9;
const OPEN_ORDER_STATUSES = new Set<OrderStatus>(["NEW", "PARTIAL"]);
const FINAL_ORDER_STATUSES = new Set<OrderStatus>(["FILLED", "CANCELED", "REJECTED"]);
/** Reads of a freshly placed stop before its state counts as unknown */
const STOP_CONFIRM_READS = 3;

export type CloseReason =
  | "stop_loss"
  | "take_profit"
  | "manual"
  | "manage_action"
  | "panic_close"
  | "emergency_unprotected"
  | "entry_cancelled"
  | "break_even_reduce"
  | "closed_externally";

export type PositionClosedListener = (position: ManagedPosition, reason: CloseReason) => void;

export interface OpenResult {
  status: "opened" | "skipped" | "failed";
  position?: ManagedPosition;
  detail?: string;
}

export interface MoveResult {
  moved: boolean;
  price?: number;
  reason?: string;
}

export interface ReduceResult {
  reduced: number;
  remaining: number;
  reason?: string;
}

export interface ManageResult {
  status: "applied" | "ignored" | "failed";
  detail: string;
}

export interface RepairRequest {
  /** The stop order the exchange no longer lists */
  missingStopOrderId?: string;
  /** Position size reported by the exchange */
  exchangeSize?: number;
  exchangeEntryPrice?: number;
  /** Size of the live stop order on the exchange */
  stopOrderSize?: number;
}

export interface OrderLifecycleDeps {
  gateway: ExchangeGateway;
  executor: RateLimitedCallExecutor;
  capabilities: CapabilityCache;
  symbols: SymbolRegistry;
  ledger: Ledger;
  alerts: AlertManager;
  supervisor: SafetySupervisor;
  config: StopLossConfig;
  logger: Logger;
  prices?: PriceSource;
  book?: PositionBook;
  mutex?: KeyedMutex;
  now?: () => number;
}

interface OrderTarget {
  symbol: string;
  key: string;
  signalId?: string;
}

/** A failed read is not the same answer as an order the exchange does not have */
type OrderLookup =
  | { kind: "found"; order: ExchangeOrder }
  | { kind: "not_found" }
  | { kind: "failed"; error: Error };

type StopState = "live" | "gone" | "unknown";

export class OrderLifecycleManager {
  readonly book: PositionBook;
  readonly mutex: KeyedMutex;
  private readonly now: () => number;
  /** Symbols that fell back to a local guard for the session */
  private readonly guardFallback = new Set<string>();
  private readonly fallbackAlerts = new Set<string>();
  private readonly closedListeners: PositionClosedListener[] = [];

  constructor(private readonly deps: OrderLifecycleDeps) {
    this.book = deps.book ?? new PositionBook();
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.now = deps.now ?? Date.now;
  }

  onPositionClosed(listener: PositionClosedListener): void {
    this.closedListeners.push(listener);
  }

  /**
   * One-way accounts reduce with a reduce-only flag; hedge accounts name the
   * hold side being closed.
   */
  closeInstructionFor(side: Side): CloseInstruction {
    return this.deps.gateway.positionMode === "hedge" ? { kind: "close_side", holdSide: side } : { kind: "reduce_only" };
  }

  // ===========================================================================
  // Entry
  // ===========================================================================

  async openFromPlan(plan: OrderPlan, traceId: string = newTraceId()): Promise<OpenResult> {
    return this.mutex.runExclusive(plan.symbol, async () => {
      const existing = this.book.findBySymbol(plan.symbol);
      if (existing) {
        const detail = `position ${existing.key} already open`;
        this.deps.logger.warn(`[Lifecycle] Skip ${plan.planId}: ${detail}`);
        return { status: "skipped", detail };
      }
      if (!this.deps.supervisor.allowsNewEntries()) {
        const detail = `entries blocked in ${this.deps.supervisor.getMode()}`;
        this.deps.logger.warn(`[Lifecycle] Skip ${plan.planId}: ${detail}`);
        return { status: "skipped", detail };
      }

      const now = this.now();
      const position: ManagedPosition = {
        key: positionKey(plan.symbol, plan.side),
        planId: plan.planId,
        signalId: plan.signalId,
        symbol: plan.symbol,
        side: plan.side,
        state: "PENDING_ENTRY",
        leverage: plan.leverage,
        intendedSize: plan.size,
        filledSize: 0,
        avgEntryPrice: plan.entryPrice,
        stopLossPrice: plan.stopLoss.triggerPrice,
        protectionPending: false,
        breakEvenDone: false,
        takeProfits: [...plan.takeProfits],
        takeProfitOrders: [],
        entryOrders: [],
        breakEvenReduceDone: false,
        adopted: false,
        openedAt: now,
        updatedAt: now,
      };
      this.book.put(position);
      await this.book.persist(this.deps.ledger, position, traceId);

      try {
        await this.deps.executor.call("setLeverage", () =>
          this.deps.gateway.setLeverage(plan.symbol, plan.leverage, plan.side),
        );
      } catch (err) {
        const detail = `setLeverage failed: ${describeError(err)}`;
        await this.markRejected(position, detail, traceId);
        return { status: "failed", position, detail };
      }

      const legs = plan.entries.length > 0 ? plan.entries : [{ index: 0, price: plan.entryPrice, size: plan.size }];
      const placed: Array<{ leg: EntryOrderRef; result: OrderResult }> = [];
      for (const planned of legs) {
        const spec: OrderSpec = {
          clientOrderId: newClientOrderId("entry"),
          symbol: plan.symbol,
          side: entrySideFor(plan.side),
          holdSide: plan.side,
          type: plan.entryType,
          size: planned.size,
          price: plan.entryType === "limit" ? planned.price : undefined,
          purpose: "entry",
        };

        let result: OrderResult;
        try {
          result = await this.submitOrder(position, spec, traceId, "normal");
        } catch (err) {
          const detail = `entry order failed: ${describeError(err)}`;
          if (placed.length === 0) {
            await this.markRejected(position, detail, traceId);
            await this.deps.alerts.warn("ENTRY_FAILED", detail, { symbol: plan.symbol, traceId });
            return { status: "failed", position, detail };
          }
          // earlier legs already rest on the book; the position carries on without this one
          position.intendedSize = roundSize(position.intendedSize - planned.size);
          await this.deps.alerts.warn("ENTRY_FAILED", `leg ${planned.index} ${detail}`, { symbol: plan.symbol, traceId });
          continue;
        }

        const leg: EntryOrderRef = {
          index: planned.index,
          orderId: result.orderId,
          clientOrderId: spec.clientOrderId,
          price: planned.price,
          size: planned.size,
          filledSize: 0,
        };
        position.entryOrders.push(leg);
        placed.push({ leg, result });
        this.deps.logger.info(
          `[Lifecycle] Entry ${result.orderId} ${plan.side} ${planned.size} ${plan.symbol} @ ${planned.price} (${result.status})`,
        );
      }
      this.touch(position);
      await this.book.persist(this.deps.ledger, position, traceId);

      for (const { leg, result } of placed) {
        if (result.filledSize > 0) {
          await this.applyEntryFill(position, leg, result.filledSize, result.avgFillPrice ?? leg.price, traceId);
        }
      }
      return { status: "opened", position };
    });
  }

  /**
   * Cumulative fill report for one entry leg. Repeated or stale reports are
   * ignored. Position size and average entry follow the sum of the legs.
   */
  private async applyEntryFill(
    position: ManagedPosition,
    leg: EntryOrderRef,
    cumulativeFilled: number,
    avgPrice: number,
    traceId: string,
  ): Promise<void> {
    if (cumulativeFilled <= leg.filledSize + SIZE_EPSILON) return;

    const increment = roundSize(cumulativeFilled - leg.filledSize);
    leg.filledSize = roundSize(cumulativeFilled);
    leg.avgFillPrice = avgPrice;
    position.filledSize = roundSize(position.filledSize + increment);
    position.avgEntryPrice = averageEntryPrice(position.entryOrders) ?? avgPrice;
    const full = position.filledSize + SIZE_EPSILON >= position.intendedSize;
    if (position.state === "PENDING_ENTRY" || position.state === "PARTIALLY_FILLED") {
      position.state = full ? position.state : "PARTIALLY_FILLED";
    }
    if (!position.stopLoss && position.unprotectedSince === undefined) {
      position.unprotectedSince = this.now();
    }
    this.touch(position);

    await this.deps.ledger.append({
      kind: "FILL",
      signalId: position.signalId,
      symbol: position.symbol,
      positionKey: position.key,
      traceId,
      data: {
        purpose: "entry",
        orderId: leg.orderId,
        entryIndex: leg.index,
        cumulative: leg.filledSize,
        increment,
        avgPrice,
        positionSize: position.filledSize,
      },
    });

    const protectedNow = await this.ensureProtection(position, traceId);
    if (protectedNow && position.state !== "MANAGING" && position.state !== "CLOSING") {
      position.state = full ? "FILLED_PROTECTED" : "PARTIALLY_FILLED";
    }
    this.touch(position);
    await this.book.persist(this.deps.ledger, position, traceId);

    if (!protectedNow) return;
    if (full) await this.placeTakeProfitLadder(position, traceId);
    await this.placeBreakEvenReduce(position, traceId);
  }

  /**
   * Once the first two legs of a ladder have filled, rest a reduce order at
   * their size-weighted average. Attempted once per position.
   */
  private async placeBreakEvenReduce(position: ManagedPosition, traceId: string): Promise<void> {
    if (!this.deps.config.beReduceOnTwoEntries || position.breakEvenReduceDone || position.filledSize <= 0) return;
    const first = position.entryOrders.find((leg) => leg.index === 0);
    const second = position.entryOrders.find((leg) => leg.index === 1);
    if (!first || !second || first.filledSize <= 0 || second.filledSize <= 0) return;

    const average = averageEntryPrice([first, second]);
    if (average === undefined) return;
    position.breakEvenReduceDone = true;

    const rules = await this.deps.symbols.getRules(position.symbol);
    const legsFilled = first.filledSize + second.filledSize;
    const qty = floorToStep(
      Math.min((legsFilled * this.deps.config.beReducePct) / 100, position.filledSize),
      rules.qtyStep,
    );
    const price = roundToStep(average, rules.priceStep);
    if (qty <= 0 || qty < rules.minQty) {
      this.deps.logger.warn(`[Lifecycle] Break-even reduce size ${qty} for ${position.key} below min ${rules.minQty}`);
      await this.book.persist(this.deps.ledger, position, traceId);
      return;
    }

    const spec = this.closeSpec(position, qty, "take_profit", "limit", price);
    try {
      const result = await this.submitOrder(position, spec, traceId, "normal");
      const reduce: TakeProfitRef = {
        orderId: result.orderId,
        clientOrderId: spec.clientOrderId,
        price,
        size: qty,
        filledSize: 0,
      };
      position.breakEvenReduce = reduce;
      this.touch(position);
      await this.book.persist(this.deps.ledger, position, traceId);
      await this.deps.alerts.info("BREAK_EVEN_REDUCE_PLACED", `${position.key} reduces ${qty} at ${price}`, {
        symbol: position.symbol,
        traceId,
      });
      if (result.filledSize > 0) {
        reduce.filledSize = result.filledSize;
        await this.applyReduceFill(position, result.filledSize, "break_even_reduce", traceId);
      }
    } catch (err) {
      await this.book.persist(this.deps.ledger, position, traceId);
      await this.deps.alerts.warn(
        "BREAK_EVEN_REDUCE_FAILED",
        `Break-even reduce for ${position.key} failed: ${describeError(err)}`,
        { symbol: position.symbol, traceId },
      );
    }
  }

  // ===========================================================================
  // Protection
  // ===========================================================================

  /**
   * Startup capability probe. Optionally enters SAFE_MODE when trigger orders
   * are unsupported.
   */
  async probeAtStartup(): Promise<CapabilityRecord> {
    const record = await this.deps.capabilities.resolve("trigger_orders");
    if (record.value === "unsupported" && this.deps.config.mode === "trigger") {
      await this.deps.alerts.warn(
        "STOP_LOSS_MODE_FALLBACK",
        "Trigger orders unsupported at startup; stops will use a local guard",
        { data: { capability: record.kind } },
      );
      if (this.deps.config.safeModeOnProbeFailure) {
        await this.deps.supervisor.enterSafeMode(["trigger order probe failed at startup"], "capability_probe");
      }
    }
    return record;
  }

  /** Re-probe capabilities whose record expired */
  async refreshCapabilities(): Promise<CapabilityRecord> {
    return this.deps.capabilities.resolve("trigger_orders");
  }

  async resolveStopLossMode(symbol: string): Promise<StopLossMode> {
    if (this.deps.config.mode === "local_guard") return "local_guard";
    if (this.guardFallback.has(symbol)) return "local_guard";

    try {
      const record = await this.deps.capabilities.resolveKnown("trigger_orders");
      if (record.value === "supported") return "trigger";
      await this.fallBackToGuard(symbol, "trigger orders unsupported", true);
    } catch (err) {
      if (!(err instanceof CapabilityUnknownError)) throw err;
      await this.fallBackToGuard(symbol, `trigger order support unresolved (${err.cause?.message ?? "inconclusive"})`, false);
    }
    return "local_guard";
  }

  private async ensureProtection(position: ManagedPosition, traceId: string): Promise<boolean> {
    if (position.filledSize <= 0) return true;
    const current = position.stopLoss;
    if (
      current &&
      !position.protectionPending &&
      relativeDiff(current.size, position.filledSize) <= this.deps.config.sizeTolerance &&
      current.triggerPrice === position.stopLossPrice
    ) {
      return true;
    }
    return this.replaceStopLoss(position, position.filledSize, position.stopLossPrice, traceId);
  }

  /**
   * Cancel-then-replace. protectionPending is set before the cancel and only
   * cleared once a new stop is confirmed on the exchange.
   */
  private async replaceStopLoss(
    position: ManagedPosition,
    size: number,
    triggerPrice: number,
    traceId: string,
  ): Promise<boolean> {
    const previous = position.stopLoss;
    if (previous) {
      position.protectionPending = true;
      await this.recordProtection(position, "pending", traceId, previous);
      const released = await this.releaseStopLoss(position, previous, traceId);
      if (!released) {
        position.protectionPending = false;
        await this.recordProtection(position, "active", traceId, previous);
        return false;
      }
      position.stopLoss = undefined;
      if (position.unprotectedSince === undefined) position.unprotectedSince = this.now();
    }

    const attempts = Math.max(1, this.deps.config.maxReplaceAttempts);
    for (let attempt = 1; attempt <= attempts; attempt++) {
      let ref: StopLossRef;
      try {
        ref = await this.placeStopLoss(position, size, triggerPrice, traceId);
      } catch (err) {
        this.deps.logger.warn(
          `[Lifecycle] Stop placement for ${position.key} failed (attempt ${attempt}/${attempts}): ${describeError(err)}`,
        );
        continue;
      }

      const state = await this.confirmStopLoss(position, ref);
      if (state === "live") {
        position.stopLoss = ref;
        position.stopLossPrice = triggerPrice;
        position.protectionPending = false;
        position.unprotectedSince = undefined;
        this.touch(position);
        await this.recordProtection(position, "active", traceId, ref);
        await this.book.persist(this.deps.ledger, position, traceId);
        this.deps.logger.info(
          `[Lifecycle] Stop ${ref.mode} ${position.key} size ${size} @ ${triggerPrice}${ref.orderId ? ` (${ref.orderId})` : ""}`,
        );
        return true;
      }
      this.deps.logger.warn(`[Lifecycle] Stop for ${position.key} not confirmed: ${state} (attempt ${attempt}/${attempts})`);

      // an unconfirmed stop may still rest on the exchange; it has to be gone before another is placed
      if (state === "unknown" && !(ref.orderId && (await this.cancelOrder(position, ref.orderId, "stop_loss", traceId)))) {
        position.stopLoss = ref;
        position.protectionPending = true;
        await this.recordProtection(position, "pending", traceId, ref);
        break;
      }
    }

    this.touch(position);
    await this.recordProtection(position, "failed", traceId);
    await this.book.persist(this.deps.ledger, position, traceId);
    await this.deps.alerts.critical(
      "PROTECTION_FAILED",
      `No confirmed stop for ${position.key} after ${attempts} attempt(s)`,
      { symbol: position.symbol, traceId },
    );
    await this.deps.supervisor.enterSafeMode([`stop placement failed for ${position.key}`], "protection_failure");
    return false;
  }

  private async placeStopLoss(
    position: ManagedPosition,
    size: number,
    triggerPrice: number,
    traceId: string,
  ): Promise<StopLossRef> {
    const mode = await this.resolveStopLossMode(position.symbol);
    if (mode === "local_guard") return this.armGuard(position, size, triggerPrice);

    const spec: StopLossSpec = {
      clientOrderId: newClientOrderId("sl"),
      symbol: position.symbol,
      holdSide: position.side,
      size,
      triggerPrice,
      close: this.closeInstructionFor(position.side),
    };
    await this.recordAttempt(position, "stop_loss", { ...spec }, traceId);
    try {
      const result = await this.deps.executor.call("placeStopLoss", () => this.deps.gateway.placeStopLoss(spec), {
        priority: "high",
      });
      await this.recordResult(position, "stop_loss", { ...result }, traceId);
      return {
        mode: "trigger",
        orderId: result.orderId,
        clientOrderId: spec.clientOrderId,
        triggerPrice,
        size,
        placedAt: this.now(),
      };
    } catch (err) {
      await this.recordResult(position, "stop_loss", { clientOrderId: spec.clientOrderId, error: describeError(err) }, traceId);
      if (err instanceof ExchangeApiError) {
        await this.fallBackToGuard(position.symbol, `trigger order rejected: ${err.message}`, true);
        return this.armGuard(position, size, triggerPrice);
      }
      throw err;
    }
  }

  private armGuard(position: ManagedPosition, size: number, triggerPrice: number): StopLossRef {
    this.deps.prices?.watch(position.symbol);
    return {
      mode: "local_guard",
      clientOrderId: newClientOrderId("guard"),
      triggerPrice,
      size,
      placedAt: this.now(),
    };
  }

  /**
   * Read a placed stop back. Failed reads and unmapped states are re-read,
   * and stay "unknown" if no read gives an answer.
   */
  private async confirmStopLoss(position: ManagedPosition, ref: StopLossRef): Promise<StopState> {
    if (ref.mode === "local_guard") return "live";
    if (!ref.orderId) return "unknown";
    for (let read = 1; read <= STOP_CONFIRM_READS; read++) {
      const lookup = await this.lookupOrder(position.symbol, ref.orderId);
      if (lookup.kind === "found") {
        if (OPEN_ORDER_STATUSES.has(lookup.order.status)) return "live";
        if (FINAL_ORDER_STATUSES.has(lookup.order.status)) return "gone";
      }
    }
    return "unknown";
  }

  /**
   * Take down a stop. A cancel that fails for an order that is no longer open
   * still counts as released.
   */
  private async releaseStopLoss(position: ManagedPosition, ref: StopLossRef, traceId: string): Promise<boolean> {
    if (ref.mode === "local_guard" || !ref.orderId) return true;
    return this.cancelOrder(position, ref.orderId, "stop_loss", traceId);
  }

  private async fallBackToGuard(symbol: string, reason: string, sticky: boolean): Promise<void> {
    if (sticky) this.guardFallback.add(symbol);
    const alertKey = `${symbol}|${reason}`;
    if (this.fallbackAlerts.has(alertKey)) return;
    this.fallbackAlerts.add(alertKey);
    await this.deps.alerts.warn("STOP_LOSS_MODE_FALLBACK", `${symbol}: trigger -> local_guard (${reason})`, {
      symbol,
      data: { sticky },
    });
  }

  hasArmedLocalGuard(): boolean {
    return this.book.list().some((p) => p.stopLoss?.mode === "local_guard");
  }

  /** Positions holding size without a confirmed stop, for the safety supervisor */
  unprotectedPositions(): Array<{ positionKey: string; since: number }> {
    return this.book.unprotected().map((p) => ({ positionKey: p.key, since: p.unprotectedSince ?? p.updatedAt }));
  }

  // ===========================================================================
  // Management
  // ===========================================================================

  async moveStopToBreakEven(key: string, options: { force?: boolean } = {}): Promise<MoveResult> {
    const initial = this.book.get(key);
    if (!initial) return { moved: false, reason: "no open position" };

    return this.mutex.runExclusive(initial.symbol, async () => {
      const position = this.book.get(key);
      if (!position || position.filledSize <= 0 || position.state === "CLOSING") {
        return { moved: false, reason: "no filled position" };
      }

      const price = await this.currentPrice(position.symbol);
      const avg = position.avgEntryPrice;
      const profitPct = ((position.side === "LONG" ? price - avg : avg - price) / avg) * 100;
      if (!options.force && profitPct < this.deps.config.breakEvenTriggerPct) {
        return {
          moved: false,
          reason: `profit ${profitPct.toFixed(2)}% below ${this.deps.config.breakEvenTriggerPct}%`,
        };
      }

      const buffer = this.deps.config.breakEvenBufferPct / 100;
      const rules = await this.deps.symbols.getRules(position.symbol);
      const raw = position.side === "LONG" ? avg * (1 + buffer) : avg * (1 - buffer);
      const target = rules.priceStep > 0 ? roundToStep(raw, rules.priceStep) : raw;
      const below = position.side === "LONG" ? target < price : target > price;
      if (!below) {
        return { moved: false, reason: `break-even level ${target} is through the current price ${price}` };
      }

      const traceId = newTraceId();
      const moved = await this.replaceStopLoss(position, position.filledSize, target, traceId);
      if (!moved) return { moved: false, price: target, reason: "stop re-placement not confirmed" };

      position.breakEvenDone = true;
      position.state = "MANAGING";
      this.touch(position);
      await this.book.persist(this.deps.ledger, position, traceId);
      await this.deps.alerts.info("BREAK_EVEN_MOVED", `${position.key} stop moved to ${target}`, {
        symbol: position.symbol,
        traceId,
      });
      return { moved: true, price: target };
    });
  }

  async reduce(key: string, pct: number, reason: CloseReason = "manage_action"): Promise<ReduceResult> {
    const initial = this.book.get(key);
    if (!initial) return { reduced: 0, remaining: 0, reason: "no open position" };

    return this.mutex.runExclusive(initial.symbol, async () => {
      const position = this.book.get(key);
      if (!position || position.filledSize <= 0) return { reduced: 0, remaining: 0, reason: "no filled position" };
      const traceId = newTraceId();

      if (pct >= 100) {
        const size = position.filledSize;
        const closed = await this.closeLocked(position, reason, traceId);
        return closed ? { reduced: size, remaining: 0 } : { reduced: 0, remaining: position.filledSize, reason: "close failed" };
      }

      const rules = await this.deps.symbols.getRules(position.symbol);
      const qty = floorToStep((position.filledSize * pct) / 100, rules.qtyStep);
      if (qty <= 0 || qty < rules.minQty) {
        return { reduced: 0, remaining: position.filledSize, reason: `reduce size ${qty} below min ${rules.minQty}` };
      }

      position.state = "MANAGING";
      const spec = this.closeSpec(position, qty, "close", "market");
      try {
        const result = await this.submitOrder(position, spec, traceId, "high");
        if (result.filledSize > 0) await this.applyReduceFill(position, result.filledSize, reason, traceId);
        return { reduced: result.filledSize, remaining: position.filledSize };
      } catch (err) {
        this.deps.logger.error(`[Lifecycle] Reduce ${position.key} by ${pct}% failed`, toError(err));
        return { reduced: 0, remaining: position.filledSize, reason: describeError(err) };
      }
    });
  }

  async placeTakeProfit(key: string, price: number, pct = 100): Promise<TakeProfitRef | undefined> {
    const initial = this.book.get(key);
    if (!initial) return undefined;
    return this.mutex.runExclusive(initial.symbol, async () => {
      const position = this.book.get(key);
      if (!position || position.filledSize <= 0) return undefined;
      return this.placeTakeProfitLocked(position, price, pct, newTraceId());
    });
  }

  private async placeTakeProfitLocked(
    position: ManagedPosition,
    price: number,
    pct: number,
    traceId: string,
    sizeOverride?: number,
  ): Promise<TakeProfitRef | undefined> {
    const profitable = position.side === "LONG" ? price > position.avgEntryPrice : price < position.avgEntryPrice;
    if (!profitable) {
      this.deps.logger.warn(`[Lifecycle] Take-profit ${price} is not on the profit side of ${position.key}`);
      return undefined;
    }

    const rules = await this.deps.symbols.getRules(position.symbol);
    const qty = sizeOverride ?? (pct >= 100 ? position.filledSize : floorToStep((position.filledSize * pct) / 100, rules.qtyStep));
    if (qty <= 0 || qty < rules.minQty) {
      this.deps.logger.warn(`[Lifecycle] Take-profit size ${qty} for ${position.key} below min ${rules.minQty}`);
      return undefined;
    }

    const tpPrice = rules.priceStep > 0 ? roundToStep(price, rules.priceStep) : price;
    const spec = this.closeSpec(position, qty, "take_profit", "limit", tpPrice);
    try {
      const result = await this.submitOrder(position, spec, traceId, "normal");
      const ref: TakeProfitRef = {
        orderId: result.orderId,
        clientOrderId: spec.clientOrderId,
        price: tpPrice,
        size: qty,
        filledSize: 0,
      };
      position.takeProfitOrders.push(ref);
      if (position.state === "FILLED_PROTECTED") position.state = "MANAGING";
      this.touch(position);
      await this.book.persist(this.deps.ledger, position, traceId);
      if (result.filledSize > 0) {
        ref.filledSize = result.filledSize;
        await this.applyReduceFill(position, result.filledSize, "take_profit", traceId);
      }
      return ref;
    } catch (err) {
      this.deps.logger.warn(`[Lifecycle] Take-profit for ${position.key} failed: ${describeError(err)}`);
      return undefined;
    }
  }

  /**
   * Spread the signal's take-profit levels over the filled size once the
   * entry is complete. The last leg takes the rounding remainder.
   */
  private async placeTakeProfitLadder(position: ManagedPosition, traceId: string): Promise<void> {
    if (position.takeProfits.length === 0 || position.takeProfitOrders.length > 0) return;
    const rules = await this.deps.symbols.getRules(position.symbol);
    const levels = position.takeProfits;
    const leg = floorToStep(position.filledSize / levels.length, rules.qtyStep);
    let allocated = 0;
    for (let i = 0; i < levels.length; i++) {
      const last = i === levels.length - 1;
      const size = last ? roundSize(position.filledSize - allocated) : leg;
      if (size <= 0 || size < rules.minQty) continue;
      const ref = await this.placeTakeProfitLocked(position, levels[i], 0, traceId, size);
      if (ref) allocated = roundSize(allocated + ref.size);
      if (position.filledSize <= 0) return;
    }
  }

  private async applyReduceFill(
    position: ManagedPosition,
    qty: number,
    reason: CloseReason,
    traceId: string,
  ): Promise<void> {
    position.filledSize = roundSize(Math.max(0, position.filledSize - qty));
    position.intendedSize = Math.max(position.filledSize, roundSize(position.intendedSize - qty));
    this.touch(position);
    await this.deps.ledger.append({
      kind: "FILL",
      signalId: position.signalId,
      symbol: position.symbol,
      positionKey: position.key,
      traceId,
      data: { purpose: reason, reduced: qty, remaining: position.filledSize },
    });

    if (position.filledSize <= SIZE_EPSILON) {
      await this.markClosed(position, reason, traceId);
      return;
    }
    await this.ensureProtection(position, traceId);
    await this.book.persist(this.deps.ledger, position, traceId);
  }

  async handleManageAction(action: ManageAction): Promise<ManageResult> {
    const position = this.book.findBySymbol(action.symbol);
    if (!position) return { status: "ignored", detail: `no open position on ${action.symbol}` };

    switch (action.action) {
      case "reduce_pct": {
        const result = await this.reduce(position.key, action.pct ?? 100, "manage_action");
        return result.reduced > 0
          ? { status: "applied", detail: `reduced ${result.reduced}, remaining ${result.remaining}` }
          : { status: "failed", detail: result.reason ?? "nothing reduced" };
      }
      case "move_sl_to_be": {
        const result = await this.moveStopToBreakEven(position.key, { force: true });
        return result.moved
          ? { status: "applied", detail: `stop moved to ${result.price}` }
          : { status: "failed", detail: result.reason ?? "stop not moved" };
      }
      case "take_profit": {
        if (action.price === undefined) return { status: "failed", detail: "take_profit needs a price" };
        const ref = await this.placeTakeProfit(position.key, action.price, action.pct ?? 100);
        return ref
          ? { status: "applied", detail: `take-profit ${ref.size} @ ${ref.price}` }
          : { status: "failed", detail: "take-profit not placed" };
      }
    }
  }

  // ===========================================================================
  // Price-driven guards and order sync
  // ===========================================================================

  /**
   * Close any local-guarded position whose stop level the tick crossed
   */
  async processPriceTick(tick: PriceTick): Promise<void> {
    for (const position of this.book.list()) {
      const stop = position.stopLoss;
      if (position.symbol !== tick.symbol || stop?.mode !== "local_guard" || position.state === "CLOSING") continue;
      const crossed = position.side === "LONG" ? tick.price <= stop.triggerPrice : tick.price >= stop.triggerPrice;
      if (!crossed) continue;
      this.deps.logger.warn(
        `[Lifecycle] Local guard hit for ${position.key}: ${tick.price} crossed ${stop.triggerPrice} (${tick.source})`,
      );
      await this.closePosition(position.key, "stop_loss");
    }
  }

  /** Evaluate every local guard against the latest known price */
  async checkLocalGuards(): Promise<void> {
    const symbols = new Set(this.book.list().filter((p) => p.stopLoss?.mode === "local_guard").map((p) => p.symbol));
    for (const symbol of symbols) {
      const tick = this.deps.prices?.getLatest(symbol);
      const price = tick?.price ?? (await this.currentPrice(symbol));
      await this.processPriceTick({ symbol, price, at: tick?.at ?? this.now(), source: tick?.source ?? "poll" });
    }
  }

  /**
   * Pull order state for tracked positions: entry fills, take-profit fills,
   * and stops that fired on the exchange.
   */
  async refreshOrders(): Promise<void> {
    for (const snapshot of this.book.list()) {
      if (this.deps.supervisor.isPanic()) return;
      await this.mutex.runExclusive(snapshot.symbol, async () => {
        const position = this.book.get(snapshot.key);
        if (position) await this.syncPosition(position);
      });
    }
  }

  private async syncPosition(position: ManagedPosition): Promise<void> {
    const traceId = newTraceId();

    const resting = position.entryOrders.filter((leg) => !entryLegDone(leg));
    if (resting.length > 0 && position.state !== "CLOSING") {
      for (const leg of resting) {
        const lookup = await this.lookupOrder(position.symbol, leg.orderId);
        if (lookup.kind !== "found") continue;
        const entry = lookup.order;
        if (entry.filledSize > leg.filledSize + SIZE_EPSILON) {
          await this.applyEntryFill(position, leg, entry.filledSize, entry.avgFillPrice ?? leg.price, traceId);
        }
        if (entry.status === "CANCELED" || entry.status === "REJECTED") {
          position.intendedSize = roundSize(Math.max(position.filledSize, position.intendedSize - (leg.size - leg.filledSize)));
          leg.size = leg.filledSize;
          this.touch(position);
          await this.book.persist(this.deps.ledger, position, traceId);
        }
      }
      if (position.entryOrders.every(entryLegDone)) {
        if (position.filledSize <= 0) {
          await this.markClosed(position, "entry_cancelled", traceId);
          return;
        }
        position.intendedSize = position.filledSize;
        await this.book.persist(this.deps.ledger, position, traceId);
        if (await this.ensureProtection(position, traceId)) {
          if (position.state === "PARTIALLY_FILLED") position.state = "FILLED_PROTECTED";
          await this.placeTakeProfitLadder(position, traceId);
        }
      }
    }

    const stop = position.stopLoss;
    if (stop?.mode === "trigger" && stop.orderId) {
      const lookup = await this.lookupOrder(position.symbol, stop.orderId);
      const order = lookup.kind === "found" ? lookup.order : undefined;
      if (order?.status === "FILLED") {
        await this.deps.ledger.append({
          kind: "FILL",
          signalId: position.signalId,
          symbol: position.symbol,
          positionKey: position.key,
          traceId,
          data: { purpose: "stop_loss", orderId: order.orderId, reduced: order.filledSize },
        });
        if (!(await this.releaseRestingOrders(position, traceId))) return;
        await this.markClosed(position, "stop_loss", traceId);
        return;
      }
    }

    for (const tp of position.takeProfitOrders) {
      if (tp.filledSize + SIZE_EPSILON >= tp.size) continue;
      const lookup = await this.lookupOrder(position.symbol, tp.orderId);
      if (lookup.kind !== "found") continue;
      const order = lookup.order;
      if (order.filledSize <= tp.filledSize + SIZE_EPSILON) continue;
      const increment = roundSize(order.filledSize - tp.filledSize);
      tp.filledSize = order.filledSize;
      await this.applyReduceFill(position, increment, "take_profit", traceId);
      if (position.state === "CLOSED") return;
    }

    const reduce = position.breakEvenReduce;
    if (reduce && reduce.filledSize + SIZE_EPSILON < reduce.size) {
      const lookup = await this.lookupOrder(position.symbol, reduce.orderId);
      if (lookup.kind !== "found" || lookup.order.filledSize <= reduce.filledSize + SIZE_EPSILON) return;
      const increment = roundSize(lookup.order.filledSize - reduce.filledSize);
      reduce.filledSize = lookup.order.filledSize;
      await this.applyReduceFill(position, increment, "break_even_reduce", traceId);
    }
  }

  // ===========================================================================
  // Closing
  // ===========================================================================

  async closePosition(key: string, reason: CloseReason): Promise<boolean> {
    const initial = this.book.get(key);
    if (!initial) return false;
    return this.mutex.runExclusive(initial.symbol, async () => {
      const position = this.book.get(key);
      if (!position) return false;
      return this.closeLocked(position, reason, newTraceId());
    });
  }

  /** Close hook for the safety supervisor; throws when the close did not complete */
  async emergencyClose(key: string): Promise<void> {
    const closed = await this.closePosition(key, "emergency_unprotected");
    if (!closed && this.book.get(key)) {
      throw new Error(`emergency close of ${key} did not complete`);
    }
  }

  /**
   * Close everything: tracked positions first, then any exchange position the
   * book does not know about.
   */
  async panicCloseAll(): Promise<PanicSweepResult> {
    const result: PanicSweepResult = { attempted: 0, closed: 0, failed: [] };
    const handled = new Set<string>();

    for (const position of this.book.list()) {
      result.attempted++;
      handled.add(position.key);
      const closed = await this.mutex.runExclusive(position.symbol, async () => {
        const current = this.book.get(position.key);
        return current ? this.closeLocked(current, "panic_close", newTraceId()) : true;
      });
      if (closed) result.closed++;
      else result.failed.push(position.key);
    }

    let exchangePositions: ExchangePosition[];
    try {
      exchangePositions = await this.deps.executor.call("getPositions", () => this.deps.gateway.getPositions(), {
        priority: "high",
      });
    } catch (err) {
      this.deps.logger.error("[Lifecycle] Panic sweep could not list exchange positions", toError(err));
      result.failed.push("getPositions");
      return result;
    }

    for (const live of exchangePositions) {
      const key = positionKey(live.symbol, live.holdSide);
      if (handled.has(key) || live.size <= 0) continue;
      result.attempted++;
      const closed = await this.mutex.runExclusive(live.symbol, () => this.closeUntracked(live));
      if (closed) result.closed++;
      else result.failed.push(key);
    }

    this.deps.logger.warn(`[Lifecycle] Panic sweep: ${result.closed}/${result.attempted} closed`);
    return result;
  }

  private async closeLocked(position: ManagedPosition, reason: CloseReason, traceId: string): Promise<boolean> {
    const previousState = position.state;
    position.state = "CLOSING";
    this.touch(position);
    await this.book.persist(this.deps.ledger, position, traceId);

    if (!(await this.releaseRestingOrders(position, traceId))) {
      // the entry may still fill, so the position stays tracked as it was
      position.state = previousState;
      this.touch(position);
      await this.book.persist(this.deps.ledger, position, traceId);
      await this.deps.alerts.critical("CLOSE_FAILED", `Close of ${position.key} stopped: resting entry not cancelled`, {
        symbol: position.symbol,
        traceId,
      });
      return false;
    }

    if (position.filledSize > 0) {
      try {
        const spec = this.closeSpec(position, position.filledSize, "close", "market");
        const result = await this.submitOrder(position, spec, traceId, "high");
        if (result.filledSize + SIZE_EPSILON < position.filledSize) {
          position.filledSize = roundSize(position.filledSize - result.filledSize);
          this.touch(position);
          await this.book.persist(this.deps.ledger, position, traceId);
          this.deps.logger.warn(`[Lifecycle] Close of ${position.key} left ${position.filledSize} open`);
          return false;
        }
      } catch (err) {
        this.deps.logger.error(`[Lifecycle] Close of ${position.key} failed`, toError(err));
        await this.deps.alerts.critical("CLOSE_FAILED", `Close of ${position.key} failed: ${describeError(err)}`, {
          symbol: position.symbol,
          traceId,
        });
        return false;
      }
    }

    const stop = position.stopLoss;
    if (stop?.mode === "trigger" && stop.orderId) {
      await this.cancelOrder(position, stop.orderId, "stop_loss", traceId);
    }
    await this.markClosed(position, reason, traceId);
    return true;
  }

  private async closeUntracked(live: ExchangePosition): Promise<boolean> {
    const target: OrderTarget = { symbol: live.symbol, key: positionKey(live.symbol, live.holdSide) };
    const spec: OrderSpec = {
      clientOrderId: newClientOrderId("close"),
      symbol: live.symbol,
      side: exitSideFor(live.holdSide),
      holdSide: live.holdSide,
      type: "market",
      size: live.size,
      purpose: "close",
      close: this.closeInstructionFor(live.holdSide),
    };
    try {
      await this.submitOrder(target, spec, newTraceId(), "high");
      return true;
    } catch (err) {
      this.deps.logger.error(`[Lifecycle] Close of untracked ${target.key} failed`, toError(err));
      return false;
    }
  }

  /**
   * Cancel every still-resting entry leg and any open reduce orders. False
   * when an entry leg could not be confirmed cancelled; reduce orders do not
   * hold up a close.
   */
  private async releaseRestingOrders(position: ManagedPosition, traceId: string): Promise<boolean> {
    let entryReleased = true;
    for (const leg of position.entryOrders) {
      if (entryLegDone(leg)) continue;
      if (!(await this.cancelOrder(position, leg.orderId, "entry", traceId))) entryReleased = false;
    }
    const reduces = position.breakEvenReduce ? [...position.takeProfitOrders, position.breakEvenReduce] : position.takeProfitOrders;
    for (const tp of reduces) {
      if (tp.filledSize + SIZE_EPSILON < tp.size) {
        await this.cancelOrder(position, tp.orderId, "take_profit", traceId);
      }
    }
    return entryReleased;
  }

  private async markClosed(position: ManagedPosition, reason: CloseReason, traceId: string): Promise<void> {
    const hadGuard = position.stopLoss?.mode === "local_guard";
    position.state = "CLOSED";
    position.closeReason = reason;
    position.stopLoss = undefined;
    position.protectionPending = false;
    position.unprotectedSince = undefined;
    this.touch(position);
    this.book.put(position);

    if (hadGuard && !this.book.list().some((p) => p.symbol === position.symbol && p.stopLoss?.mode === "local_guard")) {
      this.deps.prices?.unwatch(position.symbol);
    }

    await this.recordProtection(position, "released", traceId);
    await this.book.persist(this.deps.ledger, position, traceId);
    await this.deps.alerts.info("POSITION_CLOSED", `${position.key} closed (${reason})`, {
      symbol: position.symbol,
      traceId,
    });

    for (const listener of this.closedListeners) {
      try {
        listener(position, reason);
      } catch (err) {
        this.deps.logger.error("[Lifecycle] Close listener failed", toError(err));
      }
    }
  }

  private async markRejected(position: ManagedPosition, detail: string, traceId: string): Promise<void> {
    position.state = "REJECTED";
    position.closeReason = detail;
    this.touch(position);
    this.book.put(position);
    await this.book.persist(this.deps.ledger, position, traceId);
    this.deps.logger.warn(`[Lifecycle] ${position.key} rejected: ${detail}`);
  }

  // ===========================================================================
  // Reconciliation hooks
  // ===========================================================================

  /**
   * Re-establish protection for a tracked position using exchange truth
   */
  async repairProtection(key: string, request: RepairRequest): Promise<boolean> {
    const initial = this.book.get(key);
    if (!initial) return false;
    return this.mutex.runExclusive(initial.symbol, async () => {
      const position = this.book.get(key);
      if (!position || position.state === "CLOSING") return false;
      const traceId = newTraceId();

      if (request.exchangeSize !== undefined && request.exchangeSize > 0) {
        const delta = roundSize(request.exchangeSize - position.filledSize);
        position.filledSize = roundSize(request.exchangeSize);
        // an outside reduction also shrinks the entry target, so a later order sync does not re-grow it
        position.intendedSize = roundSize(Math.max(position.filledSize, position.intendedSize + Math.min(delta, 0)));
      }
      if (request.exchangeEntryPrice !== undefined && request.exchangeEntryPrice > 0) {
        position.avgEntryPrice = request.exchangeEntryPrice;
      }
      if (request.missingStopOrderId !== undefined) {
        if (position.stopLoss?.orderId !== request.missingStopOrderId) return true;
        // the open-order snapshot may predate the stop; only a stop the exchange no longer holds is missing
        const lookup = await this.lookupOrder(position.symbol, request.missingStopOrderId);
        if (lookup.kind === "failed" || (lookup.kind === "found" && lookup.order.status === "UNKNOWN")) return false;
        const stillOpen = lookup.kind === "found" && OPEN_ORDER_STATUSES.has(lookup.order.status);
        if (!stillOpen) {
          position.stopLoss = undefined;
          if (position.unprotectedSince === undefined) position.unprotectedSince = this.now();
          await this.recordProtection(position, "missing", traceId);
        }
      }
      if (request.stopOrderSize !== undefined && position.stopLoss) {
        position.stopLoss = { ...position.stopLoss, size: request.stopOrderSize };
      }

      const ok = await this.ensureProtection(position, traceId);
      if (ok && position.state === "PENDING_ENTRY") position.state = "PARTIALLY_FILLED";
      this.touch(position);
      await this.book.persist(this.deps.ledger, position, traceId);
      return ok;
    });
  }

  /**
   * Take over an exchange position the engine did not open and protect it
   */
  async adoptPosition(live: ExchangePosition, stopLossPrice: number, signalId = "adopted"): Promise<ManagedPosition | undefined> {
    return this.mutex.runExclusive(live.symbol, async () => {
      const key = positionKey(live.symbol, live.holdSide);
      if (this.book.get(key)) return this.book.get(key);
      const now = this.now();
      const traceId = newTraceId();
      const position: ManagedPosition = {
        key,
        planId: `adopt-${newTraceId()}`,
        signalId,
        symbol: live.symbol,
        side: live.holdSide,
        state: "MANAGING",
        leverage: 1,
        intendedSize: live.size,
        filledSize: live.size,
        avgEntryPrice: live.entryPrice,
        stopLossPrice,
        protectionPending: false,
        unprotectedSince: now,
        breakEvenDone: false,
        takeProfits: [],
        takeProfitOrders: [],
        entryOrders: [],
        breakEvenReduceDone: false,
        adopted: true,
        openedAt: now,
        updatedAt: now,
      };
      this.book.put(position);
      await this.book.persist(this.deps.ledger, position, traceId);
      await this.ensureProtection(position, traceId);
      return position;
    });
  }

  /**
   * A tracked position the exchange no longer reports. Decides whether the
   * stop fired or it was closed elsewhere.
   */
  async resolveVanished(key: string): Promise<CloseReason | undefined> {
    const initial = this.book.get(key);
    if (!initial) return undefined;
    return this.mutex.runExclusive(initial.symbol, async () => {
      const position = this.book.get(key);
      if (!position || position.filledSize <= 0) return undefined;

      // the caller's snapshot can predate an entry made while it was read
      let live: ExchangePosition[];
      try {
        live = await this.deps.executor.call("getPositions", () => this.deps.gateway.getPositions(), {
          priority: "high",
        });
      } catch (err) {
        this.deps.logger.warn(`[Lifecycle] Could not confirm ${key} is gone: ${describeError(err)}`);
        return undefined;
      }
      if (live.some((p) => p.size > 0 && positionKey(p.symbol, p.holdSide) === key)) {
        this.deps.logger.debug(`[Lifecycle] ${key} is open on the exchange, not closing it`);
        return undefined;
      }

      const traceId = newTraceId();
      const stop = position.stopLoss;
      let reason: CloseReason = "closed_externally";
      if (stop?.mode === "trigger" && stop.orderId) {
        const lookup = await this.lookupOrder(position.symbol, stop.orderId);
        if (lookup.kind === "found" && lookup.order.status === "FILLED") reason = "stop_loss";
      }
      if (!(await this.releaseRestingOrders(position, traceId))) return undefined;
      await this.markClosed(position, reason, traceId);
      return reason;
    });
  }

  /** Rebuild the book from the ledger and re-arm local guards */
  restore(): { restored: number; duplicates: string[] } {
    const result = this.book.restore(this.deps.ledger);
    for (const position of this.book.list()) {
      if (position.stopLoss?.mode === "local_guard") this.deps.prices?.watch(position.symbol);
    }
    return result;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private closeSpec(
    position: ManagedPosition,
    size: number,
    purpose: OrderPurpose,
    type: "market" | "limit",
    price?: number,
  ): OrderSpec {
    return {
      clientOrderId: newClientOrderId(purpose === "take_profit" ? "tp" : "close"),
      symbol: position.symbol,
      side: exitSideFor(position.side),
      holdSide: position.side,
      type,
      size,
      price,
      purpose,
      close: this.closeInstructionFor(position.side),
    };
  }

  private async submitOrder(
    target: OrderTarget,
    spec: OrderSpec,
    traceId: string,
    priority: CallPriority,
  ): Promise<OrderResult> {
    await this.recordAttempt(target, spec.purpose, { ...spec }, traceId);
    try {
      const result = await this.deps.executor.call(`placeOrder:${spec.purpose}`, () => this.deps.gateway.placeOrder(spec), {
        priority,
      });
      await this.recordResult(target, spec.purpose, { ...result }, traceId);
      return result;
    } catch (err) {
      await this.recordResult(target, spec.purpose, { clientOrderId: spec.clientOrderId, error: describeError(err) }, traceId);
      throw err;
    }
  }

  /**
   * Cancel an order. A failed cancel counts as done only when a read shows the
   * order finished or unknown to the exchange.
   */
  private async cancelOrder(target: OrderTarget, orderId: string, purpose: OrderPurpose, traceId: string): Promise<boolean> {
    try {
      await this.deps.executor.call(
        "cancelOrder",
        () => this.deps.gateway.cancelOrder({ symbol: target.symbol, orderId, purpose }),
        { priority: "high" },
      );
      await this.recordResult(target, purpose, { orderId, status: "CANCELED" }, traceId);
      return true;
    } catch (err) {
      const lookup = await this.lookupOrder(target.symbol, orderId);
      if (lookup.kind === "not_found" || (lookup.kind === "found" && FINAL_ORDER_STATUSES.has(lookup.order.status))) {
        this.deps.logger.debug(`[Lifecycle] ${purpose} order ${orderId} already gone (${describeError(err)})`);
        return true;
      }
      const state = lookup.kind === "found" ? lookup.order.status : "unreadable";
      this.deps.logger.warn(`[Lifecycle] Cancel of ${purpose} order ${orderId} failed (${state}): ${describeError(err)}`);
      return false;
    }
  }

  private async lookupOrder(symbol: string, orderId: string): Promise<OrderLookup> {
    try {
      const order = await this.deps.executor.call("getOrder", () => this.deps.gateway.getOrder(symbol, orderId), {
        priority: "high",
      });
      return order ? { kind: "found", order } : { kind: "not_found" };
    } catch (err) {
      this.deps.logger.warn(`[Lifecycle] Lookup of order ${orderId} failed: ${describeError(err)}`);
      return { kind: "failed", error: toError(err) };
    }
  }

  private async currentPrice(symbol: string): Promise<number> {
    const tick = this.deps.prices?.getLatest(symbol);
    if (tick) return tick.price;
    const ticker = await this.deps.executor.call("getTicker", () => this.deps.gateway.getTicker(symbol));
    return ticker.lastPrice;
  }

  private async recordAttempt(
    target: OrderTarget,
    purpose: OrderPurpose,
    data: Record<string, unknown>,
    traceId: string,
  ): Promise<void> {
    await this.deps.ledger.append({
      kind: "ORDER_ATTEMPT",
      signalId: target.signalId,
      symbol: target.symbol,
      positionKey: target.key,
      traceId,
      data: { purpose, ...data },
    });
  }

  private async recordResult(
    target: OrderTarget,
    purpose: OrderPurpose,
    data: Record<string, unknown>,
    traceId: string,
  ): Promise<void> {
    await this.deps.ledger.append({
      kind: "ORDER_RESULT",
      signalId: target.signalId,
      symbol: target.symbol,
      positionKey: target.key,
      traceId,
      data: { purpose, ...data },
    });
  }

  private async recordProtection(
    position: ManagedPosition,
    status: "active" | "pending" | "failed" | "missing" | "released",
    traceId: string,
    ref?: StopLossRef,
  ): Promise<void> {
    await this.deps.ledger.append({
      kind: "PROTECTION",
      signalId: position.signalId,
      symbol: position.symbol,
      positionKey: position.key,
      traceId,
      data: {
        status,
        mode: ref?.mode,
        orderId: ref?.orderId,
        triggerPrice: ref?.triggerPrice,
        size: ref?.size,
      },
    });
  }

  private touch(position: ManagedPosition): void {
    position.updatedAt = this.now();
  }
}

function roundSize(value: number): number {
  return Number(value.toFixed(10));
}

function entryLegDone(leg: EntryOrderRef): boolean {
  return leg.filledSize + SIZE_EPSILON >= leg.size;
}

/** Size-weighted fill price across entry legs */
function averageEntryPrice(legs: EntryOrderRef[]): number | undefined {
  let size = 0;
  let notional = 0;
  for (const leg of legs) {
    if (leg.filledSize <= 0) continue;
    size += leg.filledSize;
    notional += leg.filledSize * (leg.avgFillPrice ?? leg.price);
  }
  return size > 0 ? notional / size : undefined;
}
