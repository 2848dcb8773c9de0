/**
 * Trade domain types shared by the risk engine, lifecycle manager,
 * reconciliation engine and exchange gateways.
 */

/** Position direction */
export type Side = "LONG" | "SHORT";

/** Exchange order direction */
export type OrderSide = "buy" | "sell";

/** Account position mode: one-way nets a single position per symbol, hedge keeps both sides */
export type PositionMode = "one_way" | "hedge";

/** Stop-loss enforcement mode */
export type StopLossMode = "trigger" | "local_guard";

/** What an order is for */
export type OrderPurpose = "entry" | "stop_loss" | "take_profit" | "close";

/** Normalized order status; UNKNOWN is a venue state the gateway could not map */
export type OrderStatus = "NEW" | "PARTIAL" | "FILLED" | "CANCELED" | "REJECTED" | "UNKNOWN";

/**
 * How a reducing order is expressed to the exchange.
 * One-way accounts use a reduce-only flag; hedge accounts name the hold side being closed.
 */
export type CloseInstruction =
  | { kind: "reduce_only" }
  | { kind: "close_side"; holdSide: Side };

export interface SymbolRules {
  symbol: string;
  qtyStep: number;
  priceStep: number;
  minQty: number;
  tradable: boolean;
}

export interface AccountSnapshot {
  /** Account equity in margin coin (wallet + unrealized) */
  equity: number;
  /** Balance available for new margin */
  available: number;
  unrealizedPnl: number;
  fetchedAt: number;
}

export interface MarketSnapshot {
  symbol: string;
  price: number;
  rules: SymbolRules;
  /** 24h quote volume, when the gateway provides it */
  quoteVolume24h?: number;
}

export interface Ticker {
  symbol: string;
  lastPrice: number;
  quoteVolume24h?: number;
}

export interface OrderSpec {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  holdSide: Side;
  type: "market" | "limit";
  size: number;
  price?: number;
  purpose: OrderPurpose;
  /** Present on every order that reduces exposure */
  close?: CloseInstruction;
}

export interface StopLossSpec {
  clientOrderId: string;
  symbol: string;
  holdSide: Side;
  size: number;
  triggerPrice: number;
  close: CloseInstruction;
}

export interface OrderResult {
  orderId: string;
  clientOrderId: string;
  status: OrderStatus;
  filledSize: number;
  avgFillPrice?: number;
}

export interface ExchangeOrder {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  holdSide: Side;
  purpose: OrderPurpose;
  size: number;
  filledSize: number;
  price?: number;
  triggerPrice?: number;
  avgFillPrice?: number;
  status: OrderStatus;
  reduceOnly: boolean;
}

export interface ExchangePosition {
  symbol: string;
  holdSide: Side;
  size: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
  liquidationPrice?: number;
}

export type CapabilityKind = "trigger_orders";

/** Raw probe answer from a gateway; "timeout" is distinct from "unsupported" */
export type ProbeResult = "supported" | "unsupported" | "timeout";

export interface PriceTick {
  symbol: string;
  price: number;
  at: number;
  source: "stream" | "poll";
}

/** Direction that opens a position on this side */
export function entrySideFor(side: Side): OrderSide {
  return side === "LONG" ? "buy" : "sell";
}

/** Direction that reduces a position on this side */
export function exitSideFor(side: Side): OrderSide {
  return side === "LONG" ? "sell" : "buy";
}

export function positionKey(symbol: string, side: Side): string {
  return `${symbol}:${side}`;
}
