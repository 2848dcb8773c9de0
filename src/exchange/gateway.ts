import type {
  AccountSnapshot,
  CapabilityKind,
  ExchangeOrder,
  ExchangePosition,
  OrderPurpose,
  OrderResult,
  OrderSpec,
  PositionMode,
  ProbeResult,
  Side,
  StopLossSpec,
  SymbolRules,
  Ticker,
} from "../domain/trade.types";

export interface CancelRequest {
  symbol: string;
  orderId: string;
  /** Trigger (plan) orders are cancelled through a different endpoint on most venues */
  purpose: OrderPurpose;
}

/**
 * Authenticated exchange access. Implementations do no retrying of their own;
 * the RateLimitedCallExecutor wraps every call.
 */
export interface ExchangeGateway {
  readonly name: string;
  readonly positionMode: PositionMode;

  getBalance(): Promise<AccountSnapshot>;
  getPositions(): Promise<ExchangePosition[]>;
  /** Open regular orders plus pending trigger orders */
  getOpenOrders(): Promise<ExchangeOrder[]>;
  getOrder(symbol: string, orderId: string): Promise<ExchangeOrder | undefined>;
  placeOrder(spec: OrderSpec): Promise<OrderResult>;
  placeStopLoss(spec: StopLossSpec): Promise<OrderResult>;
  cancelOrder(request: CancelRequest): Promise<void>;
  /** Undefined when the exchange does not list the symbol */
  getSymbolRules(symbol: string): Promise<SymbolRules | undefined>;
  getTicker(symbol: string): Promise<Ticker>;
  setLeverage(symbol: string, leverage: number, holdSide: Side): Promise<void>;
  /** "timeout" means the probe was inconclusive, never that the capability is missing */
  probeCapability(kind: CapabilityKind): Promise<ProbeResult>;
}
