/**
 * Trader runtime
 *
 * Builds every component from an AppConfig and owns their lifecycle:
 * - ledger, gateway, executor, capability cache, symbol registry
 * - alerts, kill switch, safety supervisor
 * - price feed, lifecycle manager, reconciliation, risk engine
 * - periodic workers for account polling, reconciliation, safety and capabilities
 *
 * Signals enter through submit(), which validates the raw payload first.
 */

import type { AppConfig } from "../config/schema";
import type { SignalIntent } from "../domain/signal.types";
import type { SymbolRules } from "../domain/trade.types";
import { SignalValidationError } from "../errors/app.errors";
import { BitgetRestGateway } from "../exchange/bitget-gateway";
import { CapabilityCache } from "../exchange/capability-cache";
import type { ExchangeGateway } from "../exchange/gateway";
import { PaperExchangeGateway } from "../exchange/paper-gateway";
import { PriceFeed } from "../exchange/price-feed";
import { SymbolRegistry } from "../exchange/symbol-registry";
import { RateLimitedCallExecutor } from "../execution/call-executor";
import { validateSignalPayload } from "../ingestion/signal-validator";
import { FileLedger } from "../ledger/file-ledger";
import { MemoryLedger, type Ledger } from "../ledger/ledger";
import { OrderLifecycleManager } from "../lifecycle/order-lifecycle-manager";
import { ReconciliationEngine } from "../reconciliation/reconciliation-engine";
import { RiskEngine } from "../risk/risk-engine";
import { AccountPoller } from "../runtime/account-poller";
import { getHealthSnapshot, type HealthSnapshot } from "../runtime/health";
import { PeriodicWorker } from "../runtime/periodic-worker";
import { SignalProcessor, type ProcessResult } from "../runtime/signal-processor";
import { KillSwitch } from "../safety/kill-switch";
import { SafetySupervisor } from "../safety/safety-supervisor";
import { AlertManager } from "../services/alert-manager";
import {
  CompositeNotificationSink,
  LogNotificationSink,
  TelegramNotificationSink,
  type NotificationSink,
} from "../services/notification.service";
import { toError, type Logger } from "../utils/logger.util";

/** Markets the dry-run exchange lists */
const PAPER_RULES: SymbolRules[] = [
  { symbol: "BTCUSDT", qtyStep: 0.001, priceStep: 0.1, minQty: 0.001, tradable: true },
  { symbol: "ETHUSDT", qtyStep: 0.01, priceStep: 0.01, minQty: 0.01, tradable: true },
];
const PAPER_PRICES: Record<string, number> = { BTCUSDT: 60000, ETHUSDT: 3000 };

export interface RuntimeOverrides {
  gateway?: ExchangeGateway;
  ledger?: Ledger;
  sink?: NotificationSink;
  env?: Record<string, string | undefined>;
  now?: () => number;
}

export type SubmitResult = ProcessResult | { status: "invalid"; signalId?: string; detail: string; field?: string };

export class TraderRuntime {
  readonly supervisor: SafetySupervisor;
  readonly lifecycle: OrderLifecycleManager;
  readonly reconciliation: ReconciliationEngine;
  readonly processor: SignalProcessor;
  readonly poller: AccountPoller;
  readonly feed: PriceFeed;
  readonly alerts: AlertManager;
  readonly capabilities: CapabilityCache;
  readonly killSwitch: KillSwitch;
  private readonly workers: PeriodicWorker[];
  private readonly now: () => number;
  private started = false;

  private constructor(
    private readonly config: AppConfig,
    readonly gateway: ExchangeGateway,
    readonly ledger: Ledger,
    private readonly logger: Logger,
    overrides: RuntimeOverrides,
  ) {
    this.now = overrides.now ?? Date.now;
    const now = this.now;

    const executor = new RateLimitedCallExecutor(config.execution, logger);
    this.capabilities = new CapabilityCache(
      {
        ttlMs: config.stopLoss.capabilityTtlSeconds * 1000,
        unknownTtlMs: config.stopLoss.unknownRetryTtlSeconds * 1000,
        probeTimeoutMs: config.stopLoss.probeTimeoutMs,
      },
      (kind) => gateway.probeCapability(kind),
      logger,
      now,
    );
    const symbols = new SymbolRegistry(gateway, executor, config.exchange.symbolRulesTtlSeconds * 1000, now);

    const sink =
      overrides.sink ??
      new CompositeNotificationSink([new TelegramNotificationSink(config.notifications, logger), new LogNotificationSink(logger)]);
    this.alerts = new AlertManager({ ledger, sink, logger, minLevel: config.notifications.minLevel, now });

    this.killSwitch = new KillSwitch({ filePath: config.safety.killSwitchFile, ledger, env: overrides.env });
    this.supervisor = new SafetySupervisor({
      config: config.safety,
      ledger,
      alerts: this.alerts,
      logger,
      killSwitch: this.killSwitch,
      now,
    });
    executor.onFailure((operation, error) => this.supervisor.recordApiError(new Error(`${operation}: ${error.message}`)));

    this.feed = new PriceFeed({
      wsUrl: config.dryRun ? "" : config.exchange.wsUrl,
      instType: config.exchange.productType,
      poll: async (symbol) => (await executor.call("getTicker", () => gateway.getTicker(symbol))).lastPrice,
      logger,
      now,
    });

    this.lifecycle = new OrderLifecycleManager({
      gateway,
      executor,
      capabilities: this.capabilities,
      symbols,
      ledger,
      alerts: this.alerts,
      supervisor: this.supervisor,
      config: config.stopLoss,
      logger,
      prices: this.feed,
      now,
    });

    this.feed.onTick((tick) => {
      this.lifecycle
        .processPriceTick(tick)
        .catch((err: unknown) => logger.error(`[Runtime] Price tick for ${tick.symbol} failed`, toError(err)));
    });
    this.feed.onModeChange((mode, reason) => {
      if (mode !== "poll") return;
      this.alerts
        .warn("PRICE_FEED_FALLBACK", `price feed fell back to REST polling (${reason})`, { data: { mode } })
        .catch((err: unknown) => logger.error("[Runtime] Feed fallback alert failed", toError(err)));
    });

    this.supervisor.setPanicSweeper(() => this.lifecycle.panicCloseAll());
    this.supervisor.setEmergencyCloser((key) => this.lifecycle.emergencyClose(key));

    this.reconciliation = new ReconciliationEngine({
      gateway,
      executor,
      lifecycle: this.lifecycle,
      ledger,
      alerts: this.alerts,
      supervisor: this.supervisor,
      config: config.reconciliation,
      sizeTolerance: config.stopLoss.sizeTolerance,
      adoptStopLossPct: config.policy.defaultStopLossPct,
      logger,
      now,
    });

    const risk = new RiskEngine({ policy: config.policy, stopLossMode: config.stopLoss.mode, logger, now });
    this.poller = new AccountPoller({
      gateway,
      executor,
      lifecycle: this.lifecycle,
      logger,
      maxAgeMs: config.reconciliation.accountPollIntervalMs,
      now,
    });
    this.processor = new SignalProcessor({
      ledger,
      risk,
      lifecycle: this.lifecycle,
      symbols,
      supervisor: this.supervisor,
      accounts: this.poller,
      alerts: this.alerts,
      logger,
    });

    this.workers = [
      new PeriodicWorker({
        name: "account-poll",
        intervalMs: config.reconciliation.accountPollIntervalMs,
        task: async () => {
          if (this.supervisor.isPanic()) return;
          await this.poller.pollOnce();
        },
        logger,
      }),
      new PeriodicWorker({
        name: "reconciliation",
        intervalMs: config.reconciliation.intervalMs,
        task: async () => {
          await this.reconciliation.runOnce();
        },
        logger,
        runOnStart: false,
      }),
      new PeriodicWorker({
        name: "safety",
        intervalMs: config.safety.evaluationIntervalMs,
        task: () => this.evaluateSafety(),
        logger,
      }),
      new PeriodicWorker({
        name: "capability-refresh",
        intervalMs: config.stopLoss.unknownRetryTtlSeconds * 1000,
        task: async () => {
          await this.lifecycle.refreshCapabilities();
        },
        logger,
        runOnStart: false,
      }),
    ];
  }

  /**
   * Build the runtime. Dry runs get the in-process exchange; the ledger is on
   * disk whenever a path is configured.
   */
  static async create(config: AppConfig, logger: Logger, overrides: RuntimeOverrides = {}): Promise<TraderRuntime> {
    const now = overrides.now ?? Date.now;
    let ledger = overrides.ledger;
    if (!ledger) {
      if (config.ledger.path) {
        const fileLedger = new FileLedger(config.ledger.path, logger, now);
        await fileLedger.open();
        ledger = fileLedger;
      } else {
        ledger = new MemoryLedger(now);
      }
    }

    const gateway =
      overrides.gateway ??
      (config.dryRun
        ? new PaperExchangeGateway({
            positionMode: config.exchange.positionMode,
            fillLimitOrders: true,
            rules: PAPER_RULES,
            prices: PAPER_PRICES,
          })
        : new BitgetRestGateway({ exchange: config.exchange, timeoutMs: config.execution.callTimeoutMs, logger }));

    return new TraderRuntime(config, gateway, ledger, logger, overrides);
  }

  /**
   * Restore the position book, probe capabilities and start the feed and workers
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const { restored, duplicates } = this.lifecycle.restore();
    this.logger.info(`[Runtime] Restored ${restored} open position(s) from the ledger`);
    if (duplicates.length > 0) {
      await this.alerts.warn("DUPLICATE_RECORDS", `Conflicting position snapshots on restore: ${duplicates.join(", ")}`, {
        data: { planIds: duplicates },
      });
    }

    if (this.config.stopLoss.probeOnStartup && this.config.stopLoss.mode === "trigger") {
      const record = await this.lifecycle.probeAtStartup();
      this.logger.info(`[Runtime] Trigger orders: ${record.value}`);
    }

    this.feed.start();
    for (const worker of this.workers) worker.start();
    this.logger.info(
      `[Runtime] Started on ${this.gateway.name} (${this.gateway.positionMode}, ${this.config.dryRun ? "dry run" : "live"}, preset ${this.config.preset})`,
    );
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.feed.stop();
    await Promise.all(this.workers.map((worker) => worker.stop()));
    this.logger.info("[Runtime] Stopped");
  }

  /**
   * Validate a raw payload and process it. Invalid payloads are reported,
   * never thrown.
   */
  async submit(payload: unknown): Promise<SubmitResult> {
    let intent: SignalIntent;
    try {
      intent = validateSignalPayload(payload, this.now());
    } catch (err) {
      if (!(err instanceof SignalValidationError)) throw err;
      this.logger.warn(`[Runtime] Invalid signal payload: ${err.message}`);
      return { status: "invalid", detail: err.message, field: err.field };
    }
    return this.processor.process(intent);
  }

  async evaluateSafety(): Promise<void> {
    await this.supervisor.evaluate({
      account: this.poller.getLatest() ?? undefined,
      unprotected: this.lifecycle.unprotectedPositions(),
    });
    if (this.supervisor.isPanic()) return;
    await this.lifecycle.checkLocalGuards();
  }

  health(): HealthSnapshot {
    const safety = this.supervisor.getState();
    return getHealthSnapshot({
      safety: { mode: safety.mode, version: safety.version, reasons: safety.reasons },
      openPositions: this.lifecycle.book.countOpen(),
      unprotectedPositions: this.lifecycle.unprotectedPositions().length,
      capabilities: this.capabilities.entries(),
      feedMode: this.started ? this.feed.getMode() : null,
      localGuardArmed: this.lifecycle.hasArmedLocalGuard(),
      requireStreamingForLocalGuard: this.config.stopLoss.requireStreamingForLocalGuard,
      lastAccountPollAt: this.poller.getLastPollAt(),
      lastReconcileAt: this.reconciliation.getLastReport()?.startedAt ?? null,
      accountPollIntervalMs: this.config.reconciliation.accountPollIntervalMs,
      now: this.now(),
    });
  }

  /** Summary line for the periodic status log */
  describe(): string {
    const health = this.health();
    const state = health.ready ? "ready" : `degraded: ${health.reasons.join("; ")}`;
    return `mode ${health.safetyMode} v${health.safetyVersion}, ${health.openPositions} open, ${state}`;
  }
}
