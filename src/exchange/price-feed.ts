/**
 * PriceFeed - streaming ticker prices with REST polling fallback
 *
 * Features:
 * - Bitget public ticker channel over WebSocket
 * - Automatic reconnection with exponential backoff + jitter
 * - Keepalive via "ping" text messages, dead-socket detection via stale ticks
 * - Polls tickers over REST while the stream is down or stale
 * - Reports mode ("stream" | "poll") and emits a fallback event on stream -> poll
 *
 * Local-guard stop-losses depend on this feed, so the mode is part of readiness.
 */

import WebSocket from "ws";
import type { PriceTick } from "../domain/trade.types";
import { isRecord, readList, readNumber, readString } from "../utils/json.util";
import { describeError, type Logger } from "../utils/logger.util";

// ============================================================================
// Types
// ============================================================================

export type WsConnectionState = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "RECONNECTING";

export type FeedMode = "stream" | "poll";

export interface PriceFeedOptions {
  /** Public WebSocket URL; empty disables streaming */
  wsUrl: string;
  /** Bitget instType for subscriptions (default: USDT-FUTURES) */
  instType?: string;
  /** REST poll interval while in poll mode (default: 2000) */
  pollIntervalMs?: number;
  /** A symbol with no stream tick for this long is polled (default: 10000) */
  staleAfterMs?: number;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  pingIntervalMs?: number;
  /** REST price source used in poll mode */
  poll: (symbol: string) => Promise<number>;
  logger: Logger;
  now?: () => number;
}

export type TickListener = (tick: PriceTick) => void;
export type ModeListener = (mode: FeedMode, reason: string) => void;

/** Price access for components that only need the latest tick per symbol */
export interface PriceSource {
  getLatest(symbol: string): PriceTick | undefined;
  getMode(): FeedMode;
  watch(symbol: string): void;
  unwatch(symbol: string): void;
}

/**
 * Parse a Bitget ticker push into ticks. Non-ticker frames yield [].
 */
export function parseTickerMessage(raw: string, at: number): PriceTick[] {
  if (raw === "pong") return [];
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!isRecord(message)) return [];
  const arg = message.arg;
  if (!isRecord(arg) || readString(arg, "channel") !== "ticker") return [];

  const ticks: PriceTick[] = [];
  for (const item of readList(message.data)) {
    const symbol = readString(item, "instId", "symbol");
    const price = readNumber(item, "lastPr", "last", "markPrice");
    if (symbol && price !== undefined && price > 0) {
      ticks.push({ symbol, price, at, source: "stream" });
    }
  }
  return ticks;
}

// ============================================================================
// PriceFeed Implementation
// ============================================================================

export class PriceFeed implements PriceSource {
  private ws: WebSocket | null = null;
  private state: WsConnectionState = "DISCONNECTED";
  private mode: FeedMode = "poll";
  private running = false;
  private readonly symbols = new Set<string>();
  private readonly latest = new Map<string, PriceTick>();
  private readonly tickListeners: TickListener[] = [];
  private readonly modeListeners: ModeListener[] = [];

  private reconnectAttempt = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private polling = false;
  private lastStreamMessageAt = 0;

  private readonly instType: string;
  private readonly pollIntervalMs: number;
  private readonly staleAfterMs: number;
  private readonly reconnectBaseMs: number;
  private readonly reconnectMaxMs: number;
  private readonly pingIntervalMs: number;
  private readonly now: () => number;

  constructor(private readonly options: PriceFeedOptions) {
    this.instType = options.instType ?? "USDT-FUTURES";
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.staleAfterMs = options.staleAfterMs ?? 10000;
    this.reconnectBaseMs = options.reconnectBaseMs ?? 1000;
    this.reconnectMaxMs = options.reconnectMaxMs ?? 30000;
    this.pingIntervalMs = options.pingIntervalMs ?? 25000;
    this.now = options.now ?? Date.now;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Public API
  // ═══════════════════════════════════════════════════════════════════════════

  start(): void {
    if (this.running) return;
    this.running = true;
    if (this.options.wsUrl) {
      this.connect();
    } else {
      this.options.logger.warn("[PriceFeed] No WebSocket URL configured, polling only");
    }
    this.schedulePoll();
  }

  stop(): void {
    this.running = false;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    if (this.pollTimer) clearTimeout(this.pollTimer);
    this.reconnectTimer = null;
    this.pollTimer = null;
    this.clearPing();
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.on("error", () => undefined);
      this.ws.close(1000, "Client disconnect");
      this.ws = null;
    }
    this.state = "DISCONNECTED";
  }

  /**
   * Track a symbol. New subscriptions are sent immediately when connected.
   */
  watch(symbol: string): void {
    if (this.symbols.has(symbol)) return;
    this.symbols.add(symbol);
    if (this.ws && this.state === "CONNECTED") this.sendSubscribe([symbol]);
  }

  unwatch(symbol: string): void {
    this.symbols.delete(symbol);
    this.latest.delete(symbol);
  }

  getLatest(symbol: string): PriceTick | undefined {
    return this.latest.get(symbol);
  }

  getMode(): FeedMode {
    return this.mode;
  }

  getState(): WsConnectionState {
    return this.state;
  }

  onTick(listener: TickListener): void {
    this.tickListeners.push(listener);
  }

  onModeChange(listener: ModeListener): void {
    this.modeListeners.push(listener);
  }

  /**
   * Poll every watched symbol that has no fresh stream tick
   */
  async pollOnce(): Promise<void> {
    const current = this.now();
    const streamFresh = this.state === "CONNECTED" && current - this.lastStreamMessageAt < this.staleAfterMs;
    if (streamFresh) {
      this.setMode("stream", "stream fresh");
    } else {
      this.setMode("poll", this.state === "CONNECTED" ? "stream stale" : `stream ${this.state.toLowerCase()}`);
    }

    for (const symbol of this.symbols) {
      const tick = this.latest.get(symbol);
      if (streamFresh && tick?.source === "stream" && current - tick.at < this.staleAfterMs) continue;
      try {
        const price = await this.options.poll(symbol);
        this.publish({ symbol, price, at: this.now(), source: "poll" });
      } catch (err) {
        this.options.logger.warn(`[PriceFeed] poll ${symbol} failed: ${describeError(err)}`);
      }
    }
  }

  /** Feed a raw stream frame (used by the socket handler) */
  handleStreamFrame(raw: string): void {
    const at = this.now();
    this.lastStreamMessageAt = at;
    for (const tick of parseTickerMessage(raw, at)) {
      if (!this.symbols.has(tick.symbol)) continue;
      this.setMode("stream", "stream tick");
      this.publish(tick);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - WebSocket
  // ═══════════════════════════════════════════════════════════════════════════

  private connect(): void {
    if (!this.running) return;
    this.state = this.reconnectAttempt > 0 ? "RECONNECTING" : "CONNECTING";
    this.options.logger.info(`[PriceFeed] ${this.state} to ${this.options.wsUrl} (attempt ${this.reconnectAttempt + 1})`);

    const ws = new WebSocket(this.options.wsUrl);
    this.ws = ws;

    ws.on("open", () => {
      this.state = "CONNECTED";
      this.reconnectAttempt = 0;
      this.lastStreamMessageAt = this.now();
      this.options.logger.info(`[PriceFeed] Connected to ${this.options.wsUrl}`);
      if (this.symbols.size > 0) this.sendSubscribe([...this.symbols]);
      this.startPing();
    });

    ws.on("message", (data: WebSocket.RawData) => {
      this.handleStreamFrame(data.toString());
    });

    ws.on("close", (code: number) => {
      this.ws = null;
      this.clearPing();
      this.setMode("poll", `stream closed (${code})`);
      if (this.running) this.scheduleReconnect();
      else this.state = "DISCONNECTED";
    });

    ws.on("error", (err: Error) => {
      this.options.logger.warn(`[PriceFeed] WebSocket error: ${err.message}`);
    });
  }

  private sendSubscribe(symbols: string[]): void {
    if (!this.ws) return;
    const args = symbols.map((instId) => ({ instType: this.instType, channel: "ticker", instId }));
    this.ws.send(JSON.stringify({ op: "subscribe", args }));
  }

  private startPing(): void {
    this.clearPing();
    this.pingTimer = setInterval(() => {
      if (!this.ws || this.state !== "CONNECTED") return;
      if (this.now() - this.lastStreamMessageAt > this.staleAfterMs * 3) {
        this.options.logger.warn("[PriceFeed] stream silent, terminating socket");
        this.ws.terminate();
        return;
      }
      this.ws.send("ping");
    }, this.pingIntervalMs);
  }

  private clearPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.state = "RECONNECTING";
    this.reconnectAttempt++;
    const baseDelay = Math.min(this.reconnectBaseMs * Math.pow(2, this.reconnectAttempt - 1), this.reconnectMaxMs);
    const delay = Math.round(baseDelay + Math.random() * baseDelay * 0.3);
    this.options.logger.info(`[PriceFeed] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempt})`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Polling and fan-out
  // ═══════════════════════════════════════════════════════════════════════════

  private schedulePoll(): void {
    if (!this.running) return;
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      if (this.polling) {
        this.schedulePoll();
        return;
      }
      this.polling = true;
      this.pollOnce()
        .catch((err: unknown) => this.options.logger.warn(`[PriceFeed] poll cycle failed: ${describeError(err)}`))
        .finally(() => {
          this.polling = false;
          this.schedulePoll();
        });
    }, this.pollIntervalMs);
  }

  private setMode(mode: FeedMode, reason: string): void {
    if (this.mode === mode) return;
    const previous = this.mode;
    this.mode = mode;
    if (previous === "stream" && mode === "poll") {
      this.options.logger.warn(`[PriceFeed] PRICE_FEED_FALLBACK stream -> poll (${reason})`);
    } else {
      this.options.logger.info(`[PriceFeed] mode ${previous} -> ${mode} (${reason})`);
    }
    for (const listener of this.modeListeners) listener(mode, reason);
  }

  private publish(tick: PriceTick): void {
    this.latest.set(tick.symbol, tick);
    for (const listener of this.tickListeners) listener(tick);
  }
}
