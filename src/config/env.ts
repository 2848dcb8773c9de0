import { ConfigurationError } from "../errors/app.errors";
import type { PositionMode, Side, StopLossMode } from "../domain/trade.types";
import { isAlertLevel } from "../services/alert-manager";
import { RISK_PRESETS, isRiskPresetName } from "./presets";
import {
  DEFAULT_EXCHANGE_CONFIG,
  DEFAULT_EXECUTION_CONFIG,
  DEFAULT_LEDGER_CONFIG,
  DEFAULT_NOTIFICATION_CONFIG,
  DEFAULT_POLICY_CONFIG,
  DEFAULT_RECONCILIATION_CONFIG,
  DEFAULT_SAFETY_CONFIG,
  DEFAULT_STOP_LOSS_CONFIG,
  type AppConfig,
  type LeveragePolicy,
  type LimitPriceStrategy,
  type RiskPresetName,
  type SymbolPolicy,
} from "./schema";

export type EnvSource = Record<string, string | undefined>;

/**
 * Build the application config from environment variables.
 * Keys are accepted in upper or lower case. Unset keys keep the preset/default value.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const read = (key: string): string | undefined => {
    const raw = source[key] ?? source[key.toLowerCase()];
    if (raw === undefined) return undefined;
    const trimmed = raw.trim();
    return trimmed === "" ? undefined : trimmed;
  };

  const parseNumber = (key: string, fallback: number): number => {
    const raw = read(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${key} must be a number (got "${raw}")`);
    }
    return parsed;
  };

  const parseBool = (key: string, fallback: boolean): boolean => {
    const raw = read(key);
    if (raw === undefined) return fallback;
    return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
  };

  const parseList = (key: string, fallback: string[]): string[] => {
    const val = read(key);
    if (!val) return [...fallback];
    const maybeJson = parseJsonArray(val);
    if (maybeJson) return maybeJson.map((item) => String(item).toUpperCase());
    return val
      .split(",")
      .map((s) => s.trim().toUpperCase())
      .filter(Boolean);
  };

  const parseNumberList = (key: string, fallback: number[]): number[] => {
    const val = read(key);
    if (!val) return [...fallback];
    const items = parseJsonArray(val) ?? val.split(",").filter((s) => s.trim() !== "");
    return items.map((item) => {
      const parsed = Number(typeof item === "string" ? item.trim() : item);
      if (!Number.isFinite(parsed)) {
        throw new ConfigurationError(`${key} must be a list of numbers (got "${val}")`);
      }
      return parsed;
    });
  };

  const parseJsonArray = (val: string): unknown[] | undefined => {
    if (!val.startsWith("[")) return undefined;
    try {
      const parsed: unknown = JSON.parse(val);
      return Array.isArray(parsed) ? parsed : undefined;
    } catch {
      // not JSON, caller falls back to comma separated
      return undefined;
    }
  };

  const parseChoice = <T extends string>(key: string, choices: readonly T[], fallback: T): T => {
    const raw = read(key);
    if (raw === undefined) return fallback;
    const match = choices.find((choice) => choice.toLowerCase() === raw.toLowerCase());
    if (!match) {
      throw new ConfigurationError(`${key} must be one of ${choices.join(", ")} (got "${raw}")`);
    }
    return match;
  };

  const presetRaw = (read("RISK_PRESET") ?? "balanced").toLowerCase();
  if (!isRiskPresetName(presetRaw)) {
    throw new ConfigurationError(`RISK_PRESET must be conservative, balanced or aggressive (got "${presetRaw}")`);
  }
  const preset: RiskPresetName = presetRaw;
  const base = { ...DEFAULT_POLICY_CONFIG, ...RISK_PRESETS[preset] };

  const sides = parseList("ALLOWED_SIDES", base.allowedSides).filter(
    (side): side is Side => side === "LONG" || side === "SHORT",
  );

  const config: AppConfig = {
    dryRun: parseBool("DRY_RUN", true),
    preset,
    policy: {
      accountRiskPerTrade: parseNumber("ACCOUNT_RISK_PER_TRADE", base.accountRiskPerTrade),
      maxNotionalPerTrade: parseNumber("MAX_NOTIONAL_PER_TRADE", base.maxNotionalPerTrade),
      maxLeverage: parseNumber("MAX_LEVERAGE", base.maxLeverage),
      leveragePolicy: parseChoice<LeveragePolicy>("LEVERAGE_POLICY", ["CAP", "REJECT"], base.leveragePolicy),
      symbolPolicy: parseChoice<SymbolPolicy>("SYMBOL_POLICY", ["ALLOWLIST", "ALLOW_ALL"], base.symbolPolicy),
      symbolAllowlist: parseList("SYMBOL_ALLOWLIST", base.symbolAllowlist),
      symbolBlacklist: parseList("SYMBOL_BLACKLIST", base.symbolBlacklist),
      requireExchangeSymbol: parseBool("REQUIRE_EXCHANGE_SYMBOL", base.requireExchangeSymbol),
      minQuoteVolume24h: parseNumber("MIN_QUOTE_VOLUME_24H", base.minQuoteVolume24h),
      allowedSides: sides,
      maxSignalAgeSeconds: parseNumber("MAX_SIGNAL_AGE_SECONDS", base.maxSignalAgeSeconds),
      minSignalQuality: parseNumber("MIN_SIGNAL_QUALITY", base.minSignalQuality),
      minConfidence: parseNumber("MIN_CONFIDENCE", base.minConfidence),
      requireConfirmationBelowConfidence: parseBool(
        "REQUIRE_CONFIRMATION_BELOW_CONFIDENCE",
        base.requireConfirmationBelowConfidence,
      ),
      symbolCooldownSeconds: parseNumber("SYMBOL_COOLDOWN_SECONDS", base.symbolCooldownSeconds),
      maxConsecutiveStopLosses: parseNumber("MAX_CONSECUTIVE_STOP_LOSSES", base.maxConsecutiveStopLosses),
      stopLossCooldownSeconds: parseNumber("STOP_LOSS_COOLDOWN_SECONDS", base.stopLossCooldownSeconds),
      hardStopLossRequired: parseBool("HARD_STOP_LOSS_REQUIRED", base.hardStopLossRequired),
      defaultStopLossPct: parseNumber("DEFAULT_STOP_LOSS_PCT", base.defaultStopLossPct),
      entrySlippagePct: parseNumber("ENTRY_SLIPPAGE_PCT", base.entrySlippagePct),
      limitPriceStrategy: parseChoice<LimitPriceStrategy>(
        "LIMIT_PRICE_STRATEGY",
        ["MID", "LOW", "HIGH"],
        base.limitPriceStrategy,
      ),
      entrySplitRatio: parseNumberList("ENTRY_SPLIT_RATIO", base.entrySplitRatio),
      maxOpenPositions: parseNumber("MAX_OPEN_POSITIONS", base.maxOpenPositions),
    },
    stopLoss: {
      mode: parseChoice<StopLossMode>("STOP_LOSS_MODE", ["trigger", "local_guard"], DEFAULT_STOP_LOSS_CONFIG.mode),
      breakEvenBufferPct: parseNumber("BREAK_EVEN_BUFFER_PCT", DEFAULT_STOP_LOSS_CONFIG.breakEvenBufferPct),
      breakEvenTriggerPct: parseNumber("BREAK_EVEN_TRIGGER_PCT", DEFAULT_STOP_LOSS_CONFIG.breakEvenTriggerPct),
      sizeTolerance: parseNumber("STOP_LOSS_SIZE_TOLERANCE", DEFAULT_STOP_LOSS_CONFIG.sizeTolerance),
      maxReplaceAttempts: parseNumber("STOP_LOSS_MAX_REPLACE_ATTEMPTS", DEFAULT_STOP_LOSS_CONFIG.maxReplaceAttempts),
      requireStreamingForLocalGuard: parseBool(
        "REQUIRE_STREAMING_FOR_LOCAL_GUARD",
        DEFAULT_STOP_LOSS_CONFIG.requireStreamingForLocalGuard,
      ),
      probeOnStartup: parseBool("PROBE_TRIGGER_ORDERS_ON_STARTUP", DEFAULT_STOP_LOSS_CONFIG.probeOnStartup),
      safeModeOnProbeFailure: parseBool("SAFE_MODE_ON_PROBE_FAILURE", DEFAULT_STOP_LOSS_CONFIG.safeModeOnProbeFailure),
      capabilityTtlSeconds: parseNumber("CAPABILITY_TTL_SECONDS", DEFAULT_STOP_LOSS_CONFIG.capabilityTtlSeconds),
      unknownRetryTtlSeconds: parseNumber(
        "CAPABILITY_UNKNOWN_TTL_SECONDS",
        DEFAULT_STOP_LOSS_CONFIG.unknownRetryTtlSeconds,
      ),
      probeTimeoutMs: parseNumber("CAPABILITY_PROBE_TIMEOUT_MS", DEFAULT_STOP_LOSS_CONFIG.probeTimeoutMs),
      beReduceOnTwoEntries: parseBool("BE_REDUCE_ON_TWO_ENTRIES", DEFAULT_STOP_LOSS_CONFIG.beReduceOnTwoEntries),
      beReducePct: parseNumber("BE_REDUCE_PCT", DEFAULT_STOP_LOSS_CONFIG.beReducePct),
    },
    execution: {
      rateLimitPerSecond: parseNumber("RATE_LIMIT_PER_SECOND", DEFAULT_EXECUTION_CONFIG.rateLimitPerSecond),
      burstCapacity: parseNumber("RATE_LIMIT_BURST", DEFAULT_EXECUTION_CONFIG.burstCapacity),
      maxAttempts: parseNumber("CALL_MAX_ATTEMPTS", DEFAULT_EXECUTION_CONFIG.maxAttempts),
      baseDelayMs: parseNumber("BACKOFF_BASE_MS", DEFAULT_EXECUTION_CONFIG.baseDelayMs),
      maxDelayMs: parseNumber("BACKOFF_MAX_MS", DEFAULT_EXECUTION_CONFIG.maxDelayMs),
      jitterFactor: parseNumber("BACKOFF_JITTER", DEFAULT_EXECUTION_CONFIG.jitterFactor),
      callTimeoutMs: parseNumber("CALL_TIMEOUT_MS", DEFAULT_EXECUTION_CONFIG.callTimeoutMs),
    },
    safety: {
      killSwitchFile: read("KILL_SWITCH_FILE") ?? DEFAULT_SAFETY_CONFIG.killSwitchFile,
      maxAccountDrawdownPct: parseNumber("MAX_ACCOUNT_DRAWDOWN_PCT", DEFAULT_SAFETY_CONFIG.maxAccountDrawdownPct),
      panicOnDrawdown: parseBool("PANIC_ON_DRAWDOWN", DEFAULT_SAFETY_CONFIG.panicOnDrawdown),
      apiErrorBurstCount: parseNumber("API_ERROR_BURST_COUNT", DEFAULT_SAFETY_CONFIG.apiErrorBurstCount),
      apiErrorBurstWindowSeconds: parseNumber(
        "API_ERROR_BURST_WINDOW_SECONDS",
        DEFAULT_SAFETY_CONFIG.apiErrorBurstWindowSeconds,
      ),
      maxUnprotectedSeconds: parseNumber("MAX_UNPROTECTED_SECONDS", DEFAULT_SAFETY_CONFIG.maxUnprotectedSeconds),
      evaluationIntervalMs: parseNumber("SAFETY_INTERVAL_MS", DEFAULT_SAFETY_CONFIG.evaluationIntervalMs),
    },
    reconciliation: {
      intervalMs: parseNumber("RECONCILE_INTERVAL_MS", DEFAULT_RECONCILIATION_CONFIG.intervalMs),
      accountPollIntervalMs: parseNumber("ACCOUNT_POLL_INTERVAL_MS", DEFAULT_RECONCILIATION_CONFIG.accountPollIntervalMs),
      adoptOrphans: parseBool("ADOPT_ORPHAN_POSITIONS", DEFAULT_RECONCILIATION_CONFIG.adoptOrphans),
      safeModeOnOrphan: parseBool("ORPHAN_SAFE_MODE", DEFAULT_RECONCILIATION_CONFIG.safeModeOnOrphan),
    },
    exchange: {
      baseUrl: read("BITGET_BASE_URL") ?? DEFAULT_EXCHANGE_CONFIG.baseUrl,
      wsUrl: read("BITGET_WS_URL") ?? DEFAULT_EXCHANGE_CONFIG.wsUrl,
      apiKey: read("BITGET_API_KEY") ?? "",
      apiSecret: read("BITGET_API_SECRET") ?? "",
      passphrase: read("BITGET_PASSPHRASE") ?? "",
      productType: read("BITGET_PRODUCT_TYPE") ?? DEFAULT_EXCHANGE_CONFIG.productType,
      marginCoin: read("BITGET_MARGIN_COIN") ?? DEFAULT_EXCHANGE_CONFIG.marginCoin,
      positionMode: parseChoice<PositionMode>(
        "BITGET_POSITION_MODE",
        ["one_way", "hedge"],
        DEFAULT_EXCHANGE_CONFIG.positionMode,
      ),
      symbolRulesTtlSeconds: parseNumber("SYMBOL_RULES_TTL_SECONDS", DEFAULT_EXCHANGE_CONFIG.symbolRulesTtlSeconds),
    },
    notifications: {
      telegramBotToken: read("TELEGRAM_BOT_TOKEN") ?? "",
      telegramChatId: read("TELEGRAM_CHAT_ID") ?? "",
      telegramTopicId: read("TELEGRAM_TOPIC_ID"),
      silent: parseBool("TELEGRAM_SILENT", DEFAULT_NOTIFICATION_CONFIG.silent),
      minLevel: DEFAULT_NOTIFICATION_CONFIG.minLevel,
    },
    ledger: {
      path: source.LEDGER_PATH !== undefined ? source.LEDGER_PATH.trim() : DEFAULT_LEDGER_CONFIG.path,
    },
  };

  const minLevel = read("ALERT_MIN_LEVEL");
  if (minLevel !== undefined) {
    const normalized = minLevel.toLowerCase();
    if (!isAlertLevel(normalized)) {
      throw new ConfigurationError(`ALERT_MIN_LEVEL must be info, warn or critical (got "${minLevel}")`);
    }
    config.notifications.minLevel = normalized;
  }

  validateConfig(config);
  return config;
}

/**
 * Range checks that the type system cannot express
 */
export function validateConfig(config: AppConfig): void {
  const { policy, execution, exchange } = config;
  const problems: string[] = [];

  if (!(policy.accountRiskPerTrade > 0 && policy.accountRiskPerTrade <= 1)) {
    problems.push("ACCOUNT_RISK_PER_TRADE must be in (0, 1]");
  }
  if (policy.maxLeverage < 1) problems.push("MAX_LEVERAGE must be >= 1");
  if (policy.maxNotionalPerTrade <= 0) problems.push("MAX_NOTIONAL_PER_TRADE must be > 0");
  if (policy.maxOpenPositions < 1) problems.push("MAX_OPEN_POSITIONS must be >= 1");
  if (policy.allowedSides.length === 0) problems.push("ALLOWED_SIDES must name LONG and/or SHORT");
  if (policy.defaultStopLossPct < 0) problems.push("DEFAULT_STOP_LOSS_PCT must be >= 0");
  if (policy.entrySplitRatio.length === 0 || policy.entrySplitRatio.some((weight) => !(weight > 0))) {
    problems.push("ENTRY_SPLIT_RATIO must list positive weights");
  }
  if (!(config.stopLoss.beReducePct > 0 && config.stopLoss.beReducePct <= 100)) {
    problems.push("BE_REDUCE_PCT must be in (0, 100]");
  }
  if (execution.rateLimitPerSecond <= 0) problems.push("RATE_LIMIT_PER_SECOND must be > 0");
  if (execution.maxAttempts < 1) problems.push("CALL_MAX_ATTEMPTS must be >= 1");
  if (execution.callTimeoutMs <= 0) problems.push("CALL_TIMEOUT_MS must be > 0");
  if (config.reconciliation.intervalMs <= 0) problems.push("RECONCILE_INTERVAL_MS must be > 0");

  if (!config.dryRun) {
    if (!exchange.apiKey) problems.push("BITGET_API_KEY is required when DRY_RUN=false");
    if (!exchange.apiSecret) problems.push("BITGET_API_SECRET is required when DRY_RUN=false");
    if (!exchange.passphrase) problems.push("BITGET_PASSPHRASE is required when DRY_RUN=false");
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
  }
}
