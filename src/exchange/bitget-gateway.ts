/**
 * Bitget USDT-M futures REST gateway (v2 mix API)
 *
 * - HMAC-SHA256 base64 signature over timestamp + METHOD + path[?query] + body
 * - Query strings are part of the signed path, never axios params
 * - One-way accounts close with reduceOnly=YES, hedge accounts with tradeSide=close
 * - Stop-losses are position tpsl plan orders (planType=loss_plan)
 */

import axios, { type AxiosInstance } from "axios";
import crypto from "node:crypto";
import type { ExchangeConfig } from "../config/schema";
import { ExchangeApiError, TransientExchangeError } from "../errors/app.errors";
import {
  type AccountSnapshot,
  type CapabilityKind,
  type ExchangeOrder,
  type ExchangePosition,
  type OrderPurpose,
  type OrderResult,
  type OrderSide,
  type OrderSpec,
  type OrderStatus,
  type PositionMode,
  type ProbeResult,
  type Side,
  type StopLossSpec,
  type SymbolRules,
  type Ticker,
  entrySideFor,
} from "../domain/trade.types";
import { isRetryableError } from "../execution/rate-limit";
import { isRecord, readList, readNumber, readString, type JsonRecord } from "../utils/json.util";
import type { Logger } from "../utils/logger.util";
import type { CancelRequest, ExchangeGateway } from "./gateway";

export const BITGET_SUCCESS_CODES = new Set(["00000", "0", "success", ""]);

export const BITGET_ENDPOINTS = {
  TICKER: "/api/v2/mix/market/ticker",
  CONTRACTS: "/api/v2/mix/market/contracts",
  ACCOUNTS: "/api/v2/mix/account/accounts",
  SET_LEVERAGE: "/api/v2/mix/account/set-leverage",
  PLACE_ORDER: "/api/v2/mix/order/place-order",
  CANCEL_ORDER: "/api/v2/mix/order/cancel-order",
  ORDER_DETAIL: "/api/v2/mix/order/detail",
  ORDERS_PENDING: "/api/v2/mix/order/orders-pending",
  PLACE_TPSL: "/api/v2/mix/order/place-tpsl-order",
  CANCEL_PLAN: "/api/v2/mix/order/cancel-plan-order",
  PLAN_PENDING: "/api/v2/mix/order/orders-plan-pending",
  ALL_POSITIONS: "/api/v2/mix/position/all-position",
} as const;

type HttpMethod = "GET" | "POST";

// ============================================================================
// Pure helpers (exported for tests)
// ============================================================================

export function signRequest(
  secret: string,
  timestamp: string,
  method: HttpMethod,
  requestPath: string,
  body: string,
): string {
  const prehash = `${timestamp}${method}${requestPath}${body}`;
  return crypto.createHmac("sha256", secret).update(prehash).digest("base64");
}

export function buildQueryString(params: Record<string, string | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, value);
  }
  return search.toString();
}

export function normalizeOrderStatus(raw: string | undefined): OrderStatus {
  const value = (raw ?? "").toLowerCase();
  if (["live", "new", "init", "not_trigger", "pending"].includes(value)) return "NEW";
  if (["partially_filled", "partial-fill", "partial_fill", "partial"].includes(value)) return "PARTIAL";
  if (["filled", "full-fill", "full_fill", "done", "executed", "triggered"].includes(value)) return "FILLED";
  if (["canceled", "cancelled", "cancel"].includes(value)) return "CANCELED";
  if (["rejected", "failed", "fail_trigger"].includes(value)) return "REJECTED";
  return "UNKNOWN";
}

/** tpsl holdSide: one-way accounts name the opening direction, hedge accounts the side */
export function tpslHoldSide(holdSide: Side, mode: PositionMode): string {
  if (mode === "hedge") return holdSide === "LONG" ? "long" : "short";
  return entrySideFor(holdSide);
}

export function buildPlaceOrderBody(
  spec: OrderSpec,
  exchange: Pick<ExchangeConfig, "productType" | "marginCoin">,
  mode: PositionMode,
): JsonRecord {
  // hedge mode keeps the position direction as side and marks closes with tradeSide
  const side: OrderSide = mode === "hedge" ? entrySideFor(spec.holdSide) : spec.side;
  const body: JsonRecord = {
    symbol: spec.symbol,
    productType: exchange.productType,
    marginCoin: exchange.marginCoin,
    marginMode: "crossed",
    side,
    orderType: spec.type,
    size: String(spec.size),
    clientOid: spec.clientOrderId,
  };
  if (mode === "one_way") {
    body.reduceOnly = spec.close?.kind === "reduce_only" ? "YES" : "NO";
  } else {
    body.tradeSide = spec.close?.kind === "close_side" ? "close" : "open";
  }
  if (spec.type === "limit" && spec.price !== undefined) {
    body.price = String(spec.price);
    body.force = "gtc";
  }
  return body;
}

export function buildStopLossBody(
  spec: StopLossSpec,
  exchange: Pick<ExchangeConfig, "productType" | "marginCoin">,
  mode: PositionMode,
): JsonRecord {
  return {
    symbol: spec.symbol,
    productType: exchange.productType,
    marginCoin: exchange.marginCoin,
    planType: "loss_plan",
    triggerPrice: String(spec.triggerPrice),
    triggerType: "mark_price",
    executePrice: "0",
    holdSide: tpslHoldSide(spec.holdSide, mode),
    size: String(spec.size),
    clientOid: spec.clientOrderId,
  };
}

function parseSide(raw: string | undefined): OrderSide {
  return (raw ?? "").toLowerCase() === "sell" ? "sell" : "buy";
}

function purposeFromClientId(clientOid: string, reduceOnly: boolean): OrderPurpose {
  if (clientOid.startsWith("sl-") || clientOid.startsWith("guard-")) return "stop_loss";
  if (clientOid.startsWith("tp-")) return "take_profit";
  if (clientOid.startsWith("close-")) return "close";
  return reduceOnly ? "close" : "entry";
}

export function parseOrder(record: JsonRecord, mode: PositionMode): ExchangeOrder {
  const clientOrderId = readString(record, "clientOid") ?? "";
  const side = parseSide(readString(record, "side"));
  const tradeSide = (readString(record, "tradeSide") ?? "").toLowerCase();
  const reduceOnly =
    (readString(record, "reduceOnly") ?? "").toUpperCase() === "YES" || tradeSide.startsWith("close");
  const posSide = (readString(record, "posSide", "holdSide") ?? "").toLowerCase();
  const planType = (readString(record, "planType") ?? "").toLowerCase();
  const isPlan = planType !== "";

  // plan orders always reduce; one-way tpsl orders name the opening direction as holdSide
  let holdSide: Side;
  if (mode === "hedge" && (posSide === "long" || posSide === "short")) {
    holdSide = posSide === "long" ? "LONG" : "SHORT";
  } else if (isPlan && (posSide === "buy" || posSide === "sell")) {
    holdSide = posSide === "buy" ? "LONG" : "SHORT";
  } else if (reduceOnly || isPlan) {
    holdSide = side === "sell" ? "LONG" : "SHORT";
  } else {
    holdSide = side === "buy" ? "LONG" : "SHORT";
  }

  let purpose = purposeFromClientId(clientOrderId, reduceOnly);
  if (planType === "loss_plan" || planType === "pos_loss") purpose = "stop_loss";
  if (planType === "profit_plan" || planType === "pos_profit") purpose = "take_profit";

  return {
    orderId: readString(record, "orderId") ?? "",
    clientOrderId,
    symbol: readString(record, "symbol") ?? "",
    side,
    holdSide,
    purpose,
    size: readNumber(record, "size") ?? 0,
    filledSize: readNumber(record, "baseVolume", "filledQty") ?? 0,
    price: readNumber(record, "price"),
    triggerPrice: readNumber(record, "triggerPrice"),
    avgFillPrice: readNumber(record, "priceAvg"),
    status: normalizeOrderStatus(readString(record, "state", "status", "planStatus")),
    reduceOnly: reduceOnly || isPlan,
  };
}

export function parsePosition(record: JsonRecord): ExchangePosition | undefined {
  const size = readNumber(record, "total", "available") ?? 0;
  if (size <= 0) return undefined;
  const holdSideRaw = (readString(record, "holdSide") ?? "").toLowerCase();
  return {
    symbol: readString(record, "symbol") ?? "",
    holdSide: holdSideRaw === "short" ? "SHORT" : "LONG",
    size,
    entryPrice: readNumber(record, "openPriceAvg", "averageOpenPrice") ?? 0,
    markPrice: readNumber(record, "markPrice") ?? 0,
    unrealizedPnl: readNumber(record, "unrealizedPL", "unrealizedPnl") ?? 0,
    liquidationPrice: readNumber(record, "liquidationPrice"),
  };
}

export function parseContract(record: JsonRecord): SymbolRules {
  const volumePlace = readNumber(record, "volumePlace") ?? 0;
  const pricePlace = readNumber(record, "pricePlace") ?? 0;
  const priceEndStep = readNumber(record, "priceEndStep") ?? 1;
  const status = (readString(record, "symbolStatus") ?? "normal").toLowerCase();
  return {
    symbol: readString(record, "symbol") ?? "",
    qtyStep: readNumber(record, "sizeMultiplier") ?? Math.pow(10, -volumePlace),
    priceStep: Number((priceEndStep * Math.pow(10, -pricePlace)).toFixed(pricePlace)),
    minQty: readNumber(record, "minTradeNum") ?? 0,
    tradable: status === "normal",
  };
}

// ============================================================================
// Gateway
// ============================================================================

export interface BitgetGatewayOptions {
  exchange: ExchangeConfig;
  timeoutMs: number;
  logger: Logger;
  /** Injected HTTP client; defaults to axios.create with the configured base URL */
  http?: AxiosInstance;
  now?: () => number;
}

export class BitgetRestGateway implements ExchangeGateway {
  readonly name = "bitget";
  readonly positionMode: PositionMode;

  private readonly http: AxiosInstance;
  private readonly exchange: ExchangeConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: BitgetGatewayOptions) {
    this.exchange = options.exchange;
    this.positionMode = options.exchange.positionMode;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.exchange.baseUrl,
        timeout: options.timeoutMs,
        headers: { "Content-Type": "application/json", locale: "en-US" },
      });
  }

  async getBalance(): Promise<AccountSnapshot> {
    const data = await this.request("GET", BITGET_ENDPOINTS.ACCOUNTS, { productType: this.exchange.productType });
    const records = readList(data);
    const coin = this.exchange.marginCoin.toUpperCase();
    const record =
      records.find((r) => (readString(r, "marginCoin") ?? "").toUpperCase() === coin) ?? records[0];
    const equity = record ? readNumber(record, "usdtEquity", "accountEquity", "equity") : undefined;
    if (!record || equity === undefined) {
      throw new ExchangeApiError("account response missing equity", BITGET_ENDPOINTS.ACCOUNTS);
    }
    return {
      equity,
      available: readNumber(record, "crossedMaxAvailable", "available") ?? equity,
      unrealizedPnl: readNumber(record, "unrealizedPL") ?? 0,
      fetchedAt: this.now(),
    };
  }

  async getPositions(): Promise<ExchangePosition[]> {
    const data = await this.request("GET", BITGET_ENDPOINTS.ALL_POSITIONS, {
      productType: this.exchange.productType,
      marginCoin: this.exchange.marginCoin,
    });
    const positions: ExchangePosition[] = [];
    for (const record of readList(data, "list")) {
      const position = parsePosition(record);
      if (position) positions.push(position);
    }
    return positions;
  }

  async getOpenOrders(): Promise<ExchangeOrder[]> {
    const regular = await this.request("GET", BITGET_ENDPOINTS.ORDERS_PENDING, {
      productType: this.exchange.productType,
    });
    const plans = await this.request("GET", BITGET_ENDPOINTS.PLAN_PENDING, {
      productType: this.exchange.productType,
      planType: "profit_loss",
    });
    return [...readList(regular, "entrustedList"), ...readList(plans, "entrustedList")]
      .map((record) => parseOrder(record, this.positionMode))
      // pending lists only carry live orders; an unmapped state there still rests on the book
      .filter((order) => order.status === "NEW" || order.status === "PARTIAL" || order.status === "UNKNOWN");
  }

  async getOrder(symbol: string, orderId: string): Promise<ExchangeOrder | undefined> {
    const data = await this.request("GET", BITGET_ENDPOINTS.ORDER_DETAIL, {
      symbol,
      productType: this.exchange.productType,
      orderId,
    });
    return isRecord(data) ? parseOrder(data, this.positionMode) : undefined;
  }

  async placeOrder(spec: OrderSpec): Promise<OrderResult> {
    const body = buildPlaceOrderBody(spec, this.exchange, this.positionMode);
    const data = await this.request("POST", BITGET_ENDPOINTS.PLACE_ORDER, {}, body);
    return this.toAck(data, spec.clientOrderId);
  }

  async placeStopLoss(spec: StopLossSpec): Promise<OrderResult> {
    const body = buildStopLossBody(spec, this.exchange, this.positionMode);
    const data = await this.request("POST", BITGET_ENDPOINTS.PLACE_TPSL, {}, body);
    return this.toAck(data, spec.clientOrderId);
  }

  async cancelOrder(request: CancelRequest): Promise<void> {
    const isPlan = request.purpose === "stop_loss" || request.purpose === "take_profit";
    const body: JsonRecord = {
      symbol: request.symbol,
      productType: this.exchange.productType,
      marginCoin: this.exchange.marginCoin,
      orderId: request.orderId,
    };
    if (isPlan) body.planType = "profit_loss";
    await this.request("POST", isPlan ? BITGET_ENDPOINTS.CANCEL_PLAN : BITGET_ENDPOINTS.CANCEL_ORDER, {}, body);
  }

  async getSymbolRules(symbol: string): Promise<SymbolRules | undefined> {
    const data = await this.request(
      "GET",
      BITGET_ENDPOINTS.CONTRACTS,
      { productType: this.exchange.productType, symbol },
      undefined,
      false,
    );
    const record = readList(data, "list").find((r) => readString(r, "symbol") === symbol);
    return record ? parseContract(record) : undefined;
  }

  async getTicker(symbol: string): Promise<Ticker> {
    const data = await this.request(
      "GET",
      BITGET_ENDPOINTS.TICKER,
      { symbol, productType: this.exchange.productType },
      undefined,
      false,
    );
    const record = readList(data)[0];
    const lastPrice = record ? readNumber(record, "lastPr", "last", "markPrice") : undefined;
    if (!record || lastPrice === undefined) {
      throw new ExchangeApiError(`ticker response missing price for ${symbol}`, BITGET_ENDPOINTS.TICKER);
    }
    return { symbol, lastPrice, quoteVolume24h: readNumber(record, "quoteVolume", "usdtVolume") };
  }

  async setLeverage(symbol: string, leverage: number, holdSide: Side): Promise<void> {
    const body: JsonRecord = {
      symbol,
      productType: this.exchange.productType,
      marginCoin: this.exchange.marginCoin,
      leverage: String(leverage),
    };
    if (this.positionMode === "hedge") body.holdSide = holdSide === "LONG" ? "long" : "short";
    await this.request("POST", BITGET_ENDPOINTS.SET_LEVERAGE, {}, body);
  }

  /**
   * Listing pending tpsl orders only succeeds for accounts that may hold them.
   * A definitive client error means unsupported; anything transient is a timeout.
   */
  async probeCapability(kind: CapabilityKind): Promise<ProbeResult> {
    if (kind !== "trigger_orders") return "unsupported";
    try {
      await this.request("GET", BITGET_ENDPOINTS.PLAN_PENDING, {
        productType: this.exchange.productType,
        planType: "profit_loss",
      });
      return "supported";
    } catch (err) {
      if (isRetryableError(err)) {
        this.logger.warn(`[Bitget] capability probe inconclusive: ${String(err)}`);
        return "timeout";
      }
      if (err instanceof ExchangeApiError) return "unsupported";
      throw err;
    }
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async request(
    method: HttpMethod,
    path: string,
    params: Record<string, string | undefined> = {},
    body?: JsonRecord,
    auth = true,
  ): Promise<unknown> {
    const query = buildQueryString(params);
    const requestPath = query ? `${path}?${query}` : path;
    const payload = body && method !== "GET" ? JSON.stringify(body) : "";

    const headers: Record<string, string> = {};
    if (auth) {
      const timestamp = String(this.now());
      headers["ACCESS-KEY"] = this.exchange.apiKey;
      headers["ACCESS-SIGN"] = signRequest(this.exchange.apiSecret, timestamp, method, requestPath, payload);
      headers["ACCESS-TIMESTAMP"] = timestamp;
      headers["ACCESS-PASSPHRASE"] = this.exchange.passphrase;
    }

    let responseBody: unknown;
    try {
      const response = await this.http.request<unknown>({
        method,
        url: requestPath,
        data: payload || undefined,
        headers,
      });
      responseBody = response.data;
    } catch (err) {
      throw this.translateError(err, path);
    }

    this.logger.debug(`[Bitget] ${method} ${requestPath} ok`);
    return this.unwrap(responseBody, path, 200);
  }

  private unwrap(body: unknown, path: string, status: number): unknown {
    if (!isRecord(body)) {
      throw new ExchangeApiError("unexpected response body", path, status);
    }
    const code = readString(body, "code") ?? "";
    if (!BITGET_SUCCESS_CODES.has(code)) {
      const msg = readString(body, "msg") ?? "unknown error";
      throw new ExchangeApiError(`Bitget API error ${code}: ${msg}`, path, status, code);
    }
    return body.data;
  }

  private translateError(err: unknown, path: string): Error {
    if (axios.isAxiosError(err)) {
      const response = err.response;
      if (response) {
        const data: unknown = response.data;
        const code = isRecord(data) ? readString(data, "code") : undefined;
        const msg = isRecord(data) ? readString(data, "msg") : undefined;
        return new ExchangeApiError(
          `Bitget HTTP ${response.status}${code ? ` ${code}` : ""}: ${msg ?? err.message}`,
          path,
          response.status,
          code,
          err,
        );
      }
      return new TransientExchangeError(`Bitget network error on ${path}: ${err.message}`, path, err);
    }
    return err instanceof Error ? err : new Error(String(err));
  }

  private toAck(data: unknown, clientOrderId: string): OrderResult {
    const record = isRecord(data) ? data : {};
    return {
      orderId: readString(record, "orderId") ?? "",
      clientOrderId: readString(record, "clientOid") ?? clientOrderId,
      status: "NEW",
      filledSize: 0,
    };
  }
}
