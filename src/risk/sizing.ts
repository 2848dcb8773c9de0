import type { EntryRange, EntrySignal } from "../domain/signal.types";
import type { Side, SymbolRules } from "../domain/trade.types";
import type { LimitPriceStrategy } from "../config/schema";
import { floorToStep, ratioFromPercentOrRatio } from "../utils/price.util";

export function pickEntryPrice(entry: EntryRange, strategy: LimitPriceStrategy): number {
  switch (strategy) {
    case "LOW":
      return entry.low;
    case "HIGH":
      return entry.high;
    default:
      return (entry.low + entry.high) / 2;
  }
}

export type StopLossResolution =
  | { ok: true; price: number; derived: boolean; distanceRatio: number }
  | { ok: false; reason: "INVALID_STOP_LOSS" | "MISSING_STOP_LOSS"; detail: string };

/**
 * Explicit stop from the signal, or one derived from defaultStopLossPct.
 * An explicit stop must sit on the losing side of the entry.
 */
export function resolveStopLoss(
  signal: Pick<EntrySignal, "side" | "stopLoss">,
  entryPrice: number,
  defaultStopLossPct: number,
  priceStep = 0,
): StopLossResolution {
  if (signal.stopLoss !== undefined) {
    const price = signal.stopLoss;
    const protective = signal.side === "LONG" ? price < entryPrice : price > entryPrice;
    if (!protective || price <= 0) {
      return {
        ok: false,
        reason: "INVALID_STOP_LOSS",
        detail: `stop ${price} is not on the protective side of ${signal.side} entry ${entryPrice}`,
      };
    }
    return { ok: true, price, derived: false, distanceRatio: Math.abs(entryPrice - price) / entryPrice };
  }

  const ratio = ratioFromPercentOrRatio(defaultStopLossPct);
  if (ratio <= 0) {
    return { ok: false, reason: "MISSING_STOP_LOSS", detail: "signal has no stop-loss and no default is configured" };
  }
  const raw = derivedStopPrice(signal.side, entryPrice, ratio);
  const price = priceStep > 0 ? floorToStep(raw, priceStep) : raw;
  return { ok: true, price, derived: true, distanceRatio: Math.abs(entryPrice - price) / entryPrice };
}

function derivedStopPrice(side: Side, entryPrice: number, ratio: number): number {
  return side === "LONG" ? entryPrice * (1 - ratio) : entryPrice * (1 + ratio);
}

export interface SizingInput {
  equity: number;
  accountRiskPerTrade: number;
  entryPrice: number;
  stopPrice: number;
  maxNotional: number;
  rules: Pick<SymbolRules, "qtyStep" | "minQty">;
}

export interface SizingResult {
  /** Final size, floored to the quantity step */
  size: number;
  /** Size before the notional cap and rounding */
  rawSize: number;
  riskAmount: number;
  stopDistance: number;
  cappedByNotional: boolean;
  notional: number;
  belowMinQty: boolean;
}

/**
 * size = equity * risk / |entry - stop|, capped at maxNotional / entry,
 * then floored to the quantity step. Never rounds up to reach minQty.
 */
export function computeSize(input: SizingInput): SizingResult {
  const riskAmount = Math.max(input.equity, 0) * Math.max(input.accountRiskPerTrade, 0);
  const stopDistance = Math.abs(input.entryPrice - input.stopPrice);
  const rawSize = stopDistance > 0 && input.entryPrice > 0 ? riskAmount / stopDistance : 0;

  const notionalCap = input.entryPrice > 0 ? input.maxNotional / input.entryPrice : 0;
  const cappedByNotional = rawSize > notionalCap;
  const capped = cappedByNotional ? notionalCap : rawSize;

  const size = floorToStep(capped, input.rules.qtyStep);
  return {
    size,
    rawSize,
    riskAmount,
    stopDistance,
    cappedByNotional,
    notional: size * input.entryPrice,
    belowMinQty: size <= 0 || size < input.rules.minQty,
  };
}

export interface EntryLeg {
  /** Position in the ladder; leg 0 is meant to fill first */
  index: number;
  price: number;
  size: number;
}

/** Weight of each ladder point; points past the end of the ratio repeat its last weight */
export function ladderWeights(points: number, ratio: readonly number[]): number[] {
  const weights: number[] = [];
  for (let i = 0; i < points; i++) {
    const weight = ratio[Math.min(i, ratio.length - 1)] ?? 1;
    weights.push(weight > 0 ? weight : 1);
  }
  return weights;
}

/** Size-weighted price of a ladder whose legs all fill */
export function ladderAveragePrice(points: readonly number[], ratio: readonly number[]): number {
  const weights = ladderWeights(points.length, ratio);
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (total <= 0) return 0;
  return points.reduce((sum, price, i) => sum + price * weights[i], 0) / total;
}

/**
 * Split a total size over the ladder points by weight. Each leg is floored to
 * the quantity step and the last leg takes what rounding left over. Undefined
 * when any leg would sit below the minimum quantity.
 */
export function splitEntries(
  total: number,
  points: readonly number[],
  ratio: readonly number[],
  rules: Pick<SymbolRules, "qtyStep" | "minQty">,
): EntryLeg[] | undefined {
  if (points.length === 0 || total <= 0) return undefined;
  const weights = ladderWeights(points.length, ratio);
  const weightSum = weights.reduce((sum, w) => sum + w, 0);

  const legs: EntryLeg[] = [];
  let allocated = 0;
  for (let i = 0; i < points.length; i++) {
    const last = i === points.length - 1;
    const size = last
      ? floorToStep(total - allocated, rules.qtyStep)
      : floorToStep((total * weights[i]) / weightSum, rules.qtyStep);
    if (size <= 0 || size < rules.minQty) return undefined;
    legs.push({ index: i, price: points[i], size });
    allocated += size;
  }
  return legs;
}
