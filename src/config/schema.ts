/**
 * Configuration Schema
 *
 * Typed configuration groups with built-in defaults. Every group has a
 * Required<> default object; env values and presets overlay these.
 */

import type { PositionMode, Side, StopLossMode } from "../domain/trade.types";
import type { AlertLevel } from "../services/alert-manager";

export type SymbolPolicy = "ALLOWLIST" | "ALLOW_ALL";
export type LeveragePolicy = "CAP" | "REJECT";
export type LimitPriceStrategy = "MID" | "LOW" | "HIGH";
export type RiskPresetName = "conservative" | "balanced" | "aggressive";

export interface PolicyConfig {
  // === Sizing ===
  /** Fraction of equity risked per trade (default: 0.005) */
  accountRiskPerTrade: number;
  /** Max notional per trade in margin coin; larger sizes are capped (default: 200) */
  maxNotionalPerTrade: number;

  // === Leverage ===
  /** Max leverage (default: 10) */
  maxLeverage: number;
  /** CAP clamps to maxLeverage, REJECT refuses the signal (default: CAP) */
  leveragePolicy: LeveragePolicy;

  // === Symbols ===
  /** ALLOWLIST only trades listed symbols, ALLOW_ALL trades anything not blacklisted (default: ALLOWLIST) */
  symbolPolicy: SymbolPolicy;
  symbolAllowlist: string[];
  symbolBlacklist: string[];
  /** Reject symbols the exchange does not report as tradable (default: true) */
  requireExchangeSymbol: boolean;
  /** Minimum 24h quote volume; 0 disables (default: 0) */
  minQuoteVolume24h: number;
  /** Sides allowed to open (default: LONG, SHORT) */
  allowedSides: Side[];

  // === Signal freshness and quality ===
  /** Max signal age in seconds (default: 20) */
  maxSignalAgeSeconds: number;
  /** Minimum quality score in [0, 1] (default: 0) */
  minSignalQuality: number;
  /** Confidence below this asks for confirmation when enabled (default: 0.7) */
  minConfidence: number;
  /** Route low-confidence signals to PENDING_CONFIRMATION (default: false) */
  requireConfirmationBelowConfidence: boolean;

  // === Cooldowns ===
  /** Seconds between entries on one symbol (default: 300) */
  symbolCooldownSeconds: number;
  /** Consecutive stop-loss closes before a global pause (default: 3) */
  maxConsecutiveStopLosses: number;
  /** Pause length after the stop-loss streak in seconds (default: 1800) */
  stopLossCooldownSeconds: number;

  // === Stop-loss and entry ===
  /** Reject signals without a derivable stop-loss (default: true) */
  hardStopLossRequired: boolean;
  /** Stop distance used when a signal carries none, percent or ratio; 0 disables (default: 1.0) */
  defaultStopLossPct: number;
  /** Max deviation between current price and entry in percent (default: 0.3) */
  entrySlippagePct: number;
  /** Which point of the entry range becomes the limit price (default: MID) */
  limitPriceStrategy: LimitPriceStrategy;
  /** Size weights of the entry legs when a signal lists several entry points (default: 1, 1) */
  entrySplitRatio: number[];

  // === Exposure ===
  /** Max concurrently open positions (default: 3) */
  maxOpenPositions: number;
}

export interface StopLossConfig {
  /** Requested stop-loss mode (default: trigger) */
  mode: StopLossMode;
  /** Break-even buffer in percent of entry (default: 0.05) */
  breakEvenBufferPct: number;
  /** Profit in percent required before a break-even move (default: 1.0) */
  breakEvenTriggerPct: number;
  /** Relative size difference tolerated before a stop-loss is re-sized (default: 0.01) */
  sizeTolerance: number;
  /** Attempts to confirm a re-placed stop-loss before escalating (default: 3) */
  maxReplaceAttempts: number;
  /** Readiness requires a streaming feed while a local guard is armed (default: true) */
  requireStreamingForLocalGuard: boolean;
  /** Probe trigger order support at startup (default: true) */
  probeOnStartup: boolean;
  /** Enter SAFE_MODE when the startup probe says unsupported (default: false) */
  safeModeOnProbeFailure: boolean;
  /** TTL for supported/unsupported capability results in seconds (default: 3600) */
  capabilityTtlSeconds: number;
  /** TTL for unknown capability results in seconds (default: 60) */
  unknownRetryTtlSeconds: number;
  /** Probe deadline in ms (default: 5000) */
  probeTimeoutMs: number;
  /** Once the first two entry legs have filled, rest a reduce order at their average price (default: false) */
  beReduceOnTwoEntries: boolean;
  /** Share of the two filled legs that order reduces, percent (default: 50) */
  beReducePct: number;
}

export interface ExecutionConfig {
  /** Sustained exchange request rate (default: 10/s) */
  rateLimitPerSecond: number;
  /** Burst capacity of the token bucket (default: 20) */
  burstCapacity: number;
  /** Total attempts per call including the first (default: 4) */
  maxAttempts: number;
  /** Base backoff delay in ms (default: 250) */
  baseDelayMs: number;
  /** Max backoff delay in ms (default: 8000) */
  maxDelayMs: number;
  /** Jitter factor (0-1) (default: 0.2) */
  jitterFactor: number;
  /** Deadline per exchange call in ms (default: 10000) */
  callTimeoutMs: number;
}

export interface SafetyConfig {
  /** Kill-switch file path; empty disables (default: "") */
  killSwitchFile: string;
  /** Drawdown from session peak equity that trips the breaker, percent (default: 10) */
  maxAccountDrawdownPct: number;
  /** Drawdown breach enters PANIC_CLOSE instead of SAFE_MODE (default: false) */
  panicOnDrawdown: boolean;
  /** Exchange failures within the window that enter SAFE_MODE (default: 8) */
  apiErrorBurstCount: number;
  /** API error burst window in seconds (default: 60) */
  apiErrorBurstWindowSeconds: number;
  /** Seconds a position may stay unprotected before an emergency close (default: 30) */
  maxUnprotectedSeconds: number;
  /** Safety evaluation interval in ms (default: 2000) */
  evaluationIntervalMs: number;
}

export interface ReconciliationConfig {
  /** Reconciliation interval in ms (default: 15000) */
  intervalMs: number;
  /** Account/position poll interval in ms (default: 5000) */
  accountPollIntervalMs: number;
  /** Adopt and protect positions without a local record (default: false) */
  adoptOrphans: boolean;
  /** Block new entries while an unadopted orphan position exists (default: false) */
  safeModeOnOrphan: boolean;
}

export interface ExchangeConfig {
  baseUrl: string;
  wsUrl: string;
  apiKey: string;
  apiSecret: string;
  passphrase: string;
  /** Bitget product type (default: USDT-FUTURES) */
  productType: string;
  /** Margin coin (default: USDT) */
  marginCoin: string;
  /** one_way or hedge (default: one_way) */
  positionMode: PositionMode;
  /** Symbol rules cache TTL in seconds (default: 300) */
  symbolRulesTtlSeconds: number;
}

export interface NotificationConfig {
  telegramBotToken: string;
  telegramChatId: string;
  telegramTopicId?: string;
  /** Send Telegram messages without sound (default: false) */
  silent: boolean;
  /** Alerts below this level are not forwarded (default: info) */
  minLevel: AlertLevel;
}

export interface LedgerConfig {
  /** NDJSON ledger path; empty keeps the ledger in memory (default: data/ledger.ndjson) */
  path: string;
}

export interface AppConfig {
  /** Trade against the in-process paper exchange (default: true) */
  dryRun: boolean;
  preset: RiskPresetName;
  policy: PolicyConfig;
  stopLoss: StopLossConfig;
  execution: ExecutionConfig;
  safety: SafetyConfig;
  reconciliation: ReconciliationConfig;
  exchange: ExchangeConfig;
  notifications: NotificationConfig;
  ledger: LedgerConfig;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_POLICY_CONFIG: Readonly<PolicyConfig> = {
  accountRiskPerTrade: 0.005,
  maxNotionalPerTrade: 200,
  maxLeverage: 10,
  leveragePolicy: "CAP",
  symbolPolicy: "ALLOWLIST",
  symbolAllowlist: ["BTCUSDT", "ETHUSDT"],
  symbolBlacklist: [],
  requireExchangeSymbol: true,
  minQuoteVolume24h: 0,
  allowedSides: ["LONG", "SHORT"],
  maxSignalAgeSeconds: 20,
  minSignalQuality: 0,
  minConfidence: 0.7,
  requireConfirmationBelowConfidence: false,
  symbolCooldownSeconds: 300,
  maxConsecutiveStopLosses: 3,
  stopLossCooldownSeconds: 1800,
  hardStopLossRequired: true,
  defaultStopLossPct: 1.0,
  entrySlippagePct: 0.3,
  limitPriceStrategy: "MID",
  entrySplitRatio: [1, 1],
  maxOpenPositions: 3,
};

export const DEFAULT_STOP_LOSS_CONFIG: Readonly<StopLossConfig> = {
  mode: "trigger",
  breakEvenBufferPct: 0.05,
  breakEvenTriggerPct: 1.0,
  sizeTolerance: 0.01,
  maxReplaceAttempts: 3,
  requireStreamingForLocalGuard: true,
  probeOnStartup: true,
  safeModeOnProbeFailure: false,
  capabilityTtlSeconds: 3600,
  unknownRetryTtlSeconds: 60,
  probeTimeoutMs: 5000,
  beReduceOnTwoEntries: false,
  beReducePct: 50,
};

export const DEFAULT_EXECUTION_CONFIG: Readonly<ExecutionConfig> = {
  rateLimitPerSecond: 10,
  burstCapacity: 20,
  maxAttempts: 4,
  baseDelayMs: 250,
  maxDelayMs: 8000,
  jitterFactor: 0.2,
  callTimeoutMs: 10000,
};

export const DEFAULT_SAFETY_CONFIG: Readonly<SafetyConfig> = {
  killSwitchFile: "",
  maxAccountDrawdownPct: 10,
  panicOnDrawdown: false,
  apiErrorBurstCount: 8,
  apiErrorBurstWindowSeconds: 60,
  maxUnprotectedSeconds: 30,
  evaluationIntervalMs: 2000,
};

export const DEFAULT_RECONCILIATION_CONFIG: Readonly<ReconciliationConfig> = {
  intervalMs: 15000,
  accountPollIntervalMs: 5000,
  adoptOrphans: false,
  safeModeOnOrphan: false,
};

export const DEFAULT_EXCHANGE_CONFIG: Readonly<ExchangeConfig> = {
  baseUrl: "https://api.bitget.com",
  wsUrl: "wss://ws.bitget.com/v2/ws/public",
  apiKey: "",
  apiSecret: "",
  passphrase: "",
  productType: "USDT-FUTURES",
  marginCoin: "USDT",
  positionMode: "one_way",
  symbolRulesTtlSeconds: 300,
};

export const DEFAULT_NOTIFICATION_CONFIG: Readonly<NotificationConfig> = {
  telegramBotToken: "",
  telegramChatId: "",
  telegramTopicId: undefined,
  silent: false,
  minLevel: "info",
};

export const DEFAULT_LEDGER_CONFIG: Readonly<LedgerConfig> = {
  path: "data/ledger.ndjson",
};
