/**
 * Risk & Sizing Engine
 *
 * Turns a validated entry signal into a sized OrderPlan or a typed rejection.
 * Checks run in a fixed order and stop at the first failure:
 * - safety gate, signal age
 * - symbol policy (blacklist, allowlist, tradability, liquidity), side
 * - quality, stop-loss streak cooldown, per-symbol cooldown
 * - leverage policy, prices, stop-loss, entry slippage
 * - open position limit, sizing, margin
 *
 * The engine never places orders. Cooldown and stop-loss streak state live
 * here; everything else comes in with each evaluation.
 */

import type { PolicyConfig } from "../config/schema";
import type { EntrySignal } from "../domain/signal.types";
import type { AccountSnapshot, MarketSnapshot, Side, StopLossMode } from "../domain/trade.types";
import type { SafetyMode } from "../safety/types";
import { newTraceId } from "../utils/id.util";
import type { Logger } from "../utils/logger.util";
import { floorToStep, ratioFromPercentOrRatio } from "../utils/price.util";
import { computeSize, ladderAveragePrice, pickEntryPrice, resolveStopLoss, splitEntries, type EntryLeg } from "./sizing";

export type RejectReason =
  | "SAFETY_GATE"
  | "STALE_SIGNAL"
  | "SYMBOL_BLACKLISTED"
  | "SYMBOL_NOT_ALLOWED"
  | "SYMBOL_NOT_TRADABLE"
  | "LOW_LIQUIDITY"
  | "SIDE_NOT_ALLOWED"
  | "LOW_QUALITY"
  | "STOP_LOSS_COOLDOWN"
  | "SYMBOL_COOLDOWN"
  | "LEVERAGE_OVER_CAP"
  | "INVALID_PRICE"
  | "INVALID_STOP_LOSS"
  | "MISSING_STOP_LOSS"
  | "ENTRY_SLIPPAGE"
  | "MAX_OPEN_POSITIONS"
  | "BELOW_MIN_QTY"
  | "INSUFFICIENT_MARGIN";

export interface OrderPlan {
  planId: string;
  signalId: string;
  symbol: string;
  side: Side;
  /** Total size over every entry leg */
  size: number;
  leverage: number;
  /** Size-weighted price of the entry legs */
  entryPrice: number;
  entryType: "limit" | "market";
  /** One limit order per leg, in fill order */
  entries: EntryLeg[];
  stopLoss: {
    triggerPrice: number;
    /** Derived from defaultStopLossPct rather than carried by the signal */
    derived: boolean;
    requestedMode: StopLossMode;
  };
  takeProfits: number[];
  notional: number;
  riskAmount: number;
}

export type RiskOutcome =
  | { status: "accepted"; plan: OrderPlan; warnings: string[] }
  | { status: "rejected"; reason: RejectReason; detail: string }
  | { status: "pending_confirmation"; plan: OrderPlan; detail: string; warnings: string[] };

export interface RiskInput {
  account: AccountSnapshot;
  market: MarketSnapshot;
  safetyMode: SafetyMode;
  openPositions: number;
  now: number;
}

export interface RiskMemory {
  /** Last entry time on the signal's symbol */
  lastEntryAt?: number;
  /** Entries are paused until this time after a stop-loss streak */
  stopLossCooldownUntil?: number;
}

function reject(reason: RejectReason, detail: string): RiskOutcome {
  return { status: "rejected", reason, detail };
}

/**
 * Pure evaluation. Identical inputs always produce the identical plan,
 * apart from the generated planId.
 */
export function evaluateSignal(
  signal: EntrySignal,
  input: RiskInput,
  policy: PolicyConfig,
  memory: RiskMemory = {},
  stopLossMode: StopLossMode = "trigger",
): RiskOutcome {
  const symbol = signal.symbol.toUpperCase();
  const warnings: string[] = [];

  if (input.safetyMode !== "NORMAL") {
    return reject("SAFETY_GATE", `new entries blocked in ${input.safetyMode}`);
  }

  const ageSeconds = (input.now - signal.receivedAt) / 1000;
  if (ageSeconds > policy.maxSignalAgeSeconds) {
    return reject("STALE_SIGNAL", `signal age ${ageSeconds.toFixed(1)}s exceeds ${policy.maxSignalAgeSeconds}s`);
  }

  // === Symbol policy ===
  if (policy.symbolBlacklist.includes(symbol)) {
    return reject("SYMBOL_BLACKLISTED", `${symbol} is blacklisted`);
  }
  if (policy.symbolPolicy === "ALLOWLIST" && !policy.symbolAllowlist.includes(symbol)) {
    return reject("SYMBOL_NOT_ALLOWED", `${symbol} is not in the allowlist`);
  }
  if (policy.requireExchangeSymbol && !input.market.rules.tradable) {
    return reject("SYMBOL_NOT_TRADABLE", `${symbol} is not tradable on the exchange`);
  }
  if (policy.minQuoteVolume24h > 0) {
    const volume = input.market.quoteVolume24h;
    if (volume === undefined) {
      return reject("LOW_LIQUIDITY", `24h volume unavailable for ${symbol}`);
    }
    if (volume < policy.minQuoteVolume24h) {
      return reject("LOW_LIQUIDITY", `24h volume ${volume.toFixed(2)} below ${policy.minQuoteVolume24h}`);
    }
  }
  if (!policy.allowedSides.includes(signal.side)) {
    return reject("SIDE_NOT_ALLOWED", `${signal.side} entries are not allowed`);
  }

  if (signal.quality < policy.minSignalQuality) {
    return reject("LOW_QUALITY", `quality ${signal.quality.toFixed(2)} below ${policy.minSignalQuality.toFixed(2)}`);
  }

  // === Cooldowns ===
  if (memory.stopLossCooldownUntil !== undefined && input.now < memory.stopLossCooldownUntil) {
    return reject(
      "STOP_LOSS_COOLDOWN",
      `stop-loss streak cooldown active until ${new Date(memory.stopLossCooldownUntil).toISOString()}`,
    );
  }
  if (memory.lastEntryAt !== undefined && input.now - memory.lastEntryAt < policy.symbolCooldownSeconds * 1000) {
    return reject("SYMBOL_COOLDOWN", `${symbol} entered less than ${policy.symbolCooldownSeconds}s ago`);
  }

  // === Leverage ===
  let leverage = signal.leverage ?? 1;
  if (leverage > policy.maxLeverage) {
    if (policy.leveragePolicy === "REJECT") {
      return reject("LEVERAGE_OVER_CAP", `leverage ${leverage} exceeds max ${policy.maxLeverage}`);
    }
    warnings.push(`leverage capped from ${leverage} to ${policy.maxLeverage}`);
    leverage = policy.maxLeverage;
  }

  // === Prices ===
  const marketPrice = input.market.price;
  if (!(marketPrice > 0)) {
    return reject("INVALID_PRICE", `no valid market price for ${symbol}`);
  }
  const priceStep = input.market.rules.priceStep;
  const onStep = (price: number): number => (priceStep > 0 ? floorToStep(price, priceStep) : price);
  const points = (signal.entryPoints ?? []).map(onStep);
  const rawEntry = points[0] ?? pickEntryPrice(signal.entry, policy.limitPriceStrategy);
  const entryPrice = onStep(rawEntry);
  if (!(entryPrice > 0) || points.some((point) => !(point > 0))) {
    return reject("INVALID_PRICE", `entry price ${rawEntry} is not positive`);
  }
  const ladder = points.length > 1 ? points : undefined;
  // sized at the ladder average, while the stop has to clear the deepest leg
  const sizingPrice = ladder ? ladderAveragePrice(ladder, policy.entrySplitRatio) : entryPrice;
  const stopAnchor = ladder ? (signal.side === "LONG" ? Math.min(...ladder) : Math.max(...ladder)) : entryPrice;

  const stop = resolveStopLoss(signal, stopAnchor, policy.defaultStopLossPct, priceStep);
  if (!stop.ok) {
    const detail =
      stop.reason === "MISSING_STOP_LOSS" && policy.hardStopLossRequired
        ? `hardStopLossRequired: ${stop.detail}`
        : stop.detail;
    return reject(stop.reason, detail);
  }
  if (stop.derived) warnings.push(`stop-loss derived at ${stop.price}`);

  const deviation = entryDeviation(marketPrice, signal.entry.low, signal.entry.high);
  const maxSlippage = ratioFromPercentOrRatio(policy.entrySlippagePct);
  if (deviation > maxSlippage) {
    return reject(
      "ENTRY_SLIPPAGE",
      `price ${marketPrice} deviates ${(deviation * 100).toFixed(3)}% from entry range, max ${(maxSlippage * 100).toFixed(3)}%`,
    );
  }

  if (input.openPositions >= policy.maxOpenPositions) {
    return reject("MAX_OPEN_POSITIONS", `${input.openPositions}/${policy.maxOpenPositions} positions open`);
  }

  // === Sizing ===
  const sizing = computeSize({
    equity: input.account.equity,
    accountRiskPerTrade: policy.accountRiskPerTrade,
    entryPrice: sizingPrice,
    stopPrice: stop.price,
    maxNotional: policy.maxNotionalPerTrade,
    rules: input.market.rules,
  });
  if (sizing.belowMinQty) {
    return reject(
      "BELOW_MIN_QTY",
      `size ${sizing.size} (raw ${sizing.rawSize.toFixed(8)}) below min qty ${input.market.rules.minQty}`,
    );
  }
  if (sizing.cappedByNotional) warnings.push(`size capped by max notional ${policy.maxNotionalPerTrade}`);

  let entries: EntryLeg[] = [{ index: 0, price: entryPrice, size: sizing.size }];
  if (ladder) {
    const legs = splitEntries(sizing.size, ladder, policy.entrySplitRatio, input.market.rules);
    if (legs) {
      entries = legs;
    } else {
      warnings.push(`ladder legs below min qty ${input.market.rules.minQty}, single entry at ${entryPrice}`);
    }
  }
  const notional = entries.reduce((sum, leg) => sum + leg.size * leg.price, 0);
  const planEntryPrice = entries.length > 1 ? notional / sizing.size : entryPrice;

  const requiredMargin = notional / leverage;
  if (requiredMargin > input.account.available) {
    return reject(
      "INSUFFICIENT_MARGIN",
      `required margin ${requiredMargin.toFixed(2)} exceeds available ${input.account.available.toFixed(2)}`,
    );
  }

  const plan: OrderPlan = {
    planId: `plan-${newTraceId()}`,
    signalId: signal.signalId,
    symbol,
    side: signal.side,
    size: sizing.size,
    leverage,
    entryPrice: planEntryPrice,
    entryType: "limit",
    entries,
    stopLoss: { triggerPrice: stop.price, derived: stop.derived, requestedMode: stopLossMode },
    takeProfits: [...signal.takeProfits],
    notional,
    riskAmount: sizing.riskAmount,
  };

  if (policy.requireConfirmationBelowConfidence && signal.confidence < policy.minConfidence) {
    return {
      status: "pending_confirmation",
      plan,
      detail: `confidence ${signal.confidence.toFixed(2)} below ${policy.minConfidence.toFixed(2)}`,
      warnings,
    };
  }

  return { status: "accepted", plan, warnings };
}

/** Distance of the price outside [low, high], relative to the nearest bound */
function entryDeviation(price: number, low: number, high: number): number {
  if (price < low) return (low - price) / low;
  if (price > high) return (price - high) / high;
  return 0;
}

export interface RiskEngineOptions {
  policy: PolicyConfig;
  stopLossMode?: StopLossMode;
  logger: Logger;
  now?: () => number;
}

/**
 * Stateful wrapper: remembers entries per symbol and the stop-loss streak.
 */
export class RiskEngine {
  private readonly lastEntryAt = new Map<string, number>();
  private consecutiveStopLosses = 0;
  private stopLossCooldownUntil: number | undefined;
  private readonly now: () => number;

  constructor(private readonly options: RiskEngineOptions) {
    this.now = options.now ?? Date.now;
  }

  evaluate(signal: EntrySignal, input: Omit<RiskInput, "now"> & { now?: number }): RiskOutcome {
    const symbol = signal.symbol.toUpperCase();
    const outcome = evaluateSignal(
      signal,
      { ...input, now: input.now ?? this.now() },
      this.options.policy,
      { lastEntryAt: this.lastEntryAt.get(symbol), stopLossCooldownUntil: this.stopLossCooldownUntil },
      this.options.stopLossMode,
    );

    if (outcome.status === "rejected") {
      this.options.logger.info(`[Risk] REJECT ${signal.signalId} ${symbol} ${outcome.reason}: ${outcome.detail}`);
    } else {
      const { plan } = outcome;
      this.options.logger.info(
        `[Risk] ${outcome.status.toUpperCase()} ${signal.signalId} ${plan.side} ${plan.size} ${symbol} @ ${plan.entryPrice} SL ${plan.stopLoss.triggerPrice} ${plan.leverage}x`,
      );
      for (const warning of outcome.warnings) this.options.logger.warn(`[Risk] ${signal.signalId}: ${warning}`);
    }
    return outcome;
  }

  recordEntry(symbol: string, at: number = this.now()): void {
    this.lastEntryAt.set(symbol.toUpperCase(), at);
  }

  /** A position closed at its stop-loss; a long enough streak pauses entries */
  recordStopLoss(at: number = this.now()): void {
    this.consecutiveStopLosses++;
    const { maxConsecutiveStopLosses, stopLossCooldownSeconds } = this.options.policy;
    if (maxConsecutiveStopLosses > 0 && this.consecutiveStopLosses >= maxConsecutiveStopLosses) {
      this.stopLossCooldownUntil = at + stopLossCooldownSeconds * 1000;
      this.options.logger.warn(
        `[Risk] ${this.consecutiveStopLosses} consecutive stop-losses, entries paused for ${stopLossCooldownSeconds}s`,
      );
    }
  }

  recordNonStopLossClose(): void {
    this.consecutiveStopLosses = 0;
  }

  getConsecutiveStopLosses(): number {
    return this.consecutiveStopLosses;
  }

  getStopLossCooldownUntil(): number | undefined {
    return this.stopLossCooldownUntil;
  }
}
