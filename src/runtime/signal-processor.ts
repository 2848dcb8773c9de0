/**
 * Signal Processor
 *
 * The event-driven path: validated intents come in, the ledger is consulted
 * for idempotency, entries go through the risk engine and accepted plans go
 * to the lifecycle manager. Manage actions skip the risk engine; they only
 * ever reduce or protect exposure.
 *
 * - a signalId seen before is a no-op
 * - a later version of a message that already produced a decision is
 *   recorded as SIGNAL_VERSION_IGNORED and not executed
 * - entries are decided and opened one at a time across all symbols, so
 *   account-wide limits see every position opened before them
 */

import { messageKey, sourceKey, type EntrySignal, type ManageAction, type SignalIntent } from "../domain/signal.types";
import type { AccountSnapshot } from "../domain/trade.types";
import type { SymbolRegistry } from "../exchange/symbol-registry";
import type { Ledger } from "../ledger/ledger";
import type { OrderLifecycleManager } from "../lifecycle/order-lifecycle-manager";
import type { RejectReason, RiskEngine } from "../risk/risk-engine";
import type { SafetySupervisor } from "../safety/safety-supervisor";
import type { AlertManager } from "../services/alert-manager";
import { newTraceId } from "../utils/id.util";
import { KeyedMutex } from "./keyed-mutex";
import { describeError, toError, type Logger } from "../utils/logger.util";

export type ProcessStatus =
  | "duplicate"
  | "version_ignored"
  | "ignored"
  | "rejected"
  | "pending_confirmation"
  | "opened"
  | "not_opened"
  | "managed"
  | "failed";

export interface ProcessResult {
  status: ProcessStatus;
  signalId: string;
  reason?: RejectReason;
  detail?: string;
}

export interface AccountSource {
  getAccount(): Promise<AccountSnapshot>;
}

export interface SignalProcessorDeps {
  ledger: Ledger;
  risk: RiskEngine;
  lifecycle: OrderLifecycleManager;
  symbols: SymbolRegistry;
  supervisor: SafetySupervisor;
  accounts: AccountSource;
  alerts: AlertManager;
  logger: Logger;
}

const ENTRY_GATE = "entries";

export class SignalProcessor {
  private readonly inFlight = new Set<string>();
  private readonly entryGate = new KeyedMutex();

  constructor(private readonly deps: SignalProcessorDeps) {
    deps.lifecycle.onPositionClosed((_position, reason) => {
      if (reason === "stop_loss") deps.risk.recordStopLoss();
      else deps.risk.recordNonStopLossClose();
    });
  }

  async process(intent: SignalIntent): Promise<ProcessResult> {
    const { signalId } = intent;
    if (this.inFlight.has(signalId) || this.deps.ledger.findBySignalId(signalId, "SIGNAL_RECEIVED").length > 0) {
      this.deps.logger.debug(`[Signal] Duplicate ${signalId} ignored`);
      return { status: "duplicate", signalId };
    }

    this.inFlight.add(signalId);
    try {
      await this.deps.ledger.append({
        kind: "SIGNAL_RECEIVED",
        signalId,
        sourceKey: sourceKey(intent.source),
        symbol: intent.kind === "NON_SIGNAL" ? undefined : intent.symbol,
        data: { kind: intent.kind, messageKey: messageKey(intent.source), version: intent.source.version },
      });

      switch (intent.kind) {
        case "NON_SIGNAL":
          return { status: "ignored", signalId, detail: intent.reason };
        case "MANAGE_ACTION":
          return await this.processManage(intent);
        case "ENTRY_SIGNAL":
          return await this.entryGate.runExclusive(ENTRY_GATE, () => this.processEntry(intent));
      }
    } catch (err) {
      this.deps.logger.error(`[Signal] ${signalId} failed`, toError(err));
      await this.deps.alerts.warn("SIGNAL_FAILED", `${signalId}: ${describeError(err)}`);
      return { status: "failed", signalId, detail: describeError(err) };
    } finally {
      this.inFlight.delete(signalId);
    }
  }

  private async processEntry(signal: EntrySignal): Promise<ProcessResult> {
    const { signalId } = signal;
    const traceId = newTraceId();

    const earlier = this.executedVersion(signal);
    if (earlier !== undefined) {
      await this.deps.ledger.append({
        kind: "SIGNAL_VERSION_IGNORED",
        signalId,
        sourceKey: sourceKey(signal.source),
        symbol: signal.symbol,
        traceId,
        data: { messageKey: messageKey(signal.source), version: signal.source.version, executedVersion: earlier },
      });
      this.deps.logger.info(
        `[Signal] ${signalId} is v${signal.source.version} of a message already decided at v${earlier}; not executed`,
      );
      return { status: "version_ignored", signalId };
    }

    const account = await this.deps.accounts.getAccount();
    const market = await this.deps.symbols.getMarket(signal.symbol);
    const outcome = this.deps.risk.evaluate(signal, {
      account,
      market,
      safetyMode: this.deps.supervisor.getMode(),
      openPositions: this.deps.lifecycle.book.countOpen(),
    });

    await this.deps.ledger.append({
      kind: "RISK_DECISION",
      signalId,
      sourceKey: sourceKey(signal.source),
      symbol: signal.symbol,
      traceId,
      data: {
        messageKey: messageKey(signal.source),
        version: signal.source.version,
        status: outcome.status,
        reason: outcome.status === "rejected" ? outcome.reason : undefined,
        detail: outcome.status === "accepted" ? undefined : outcome.detail,
        planId: outcome.status === "rejected" ? undefined : outcome.plan.planId,
        size: outcome.status === "rejected" ? undefined : outcome.plan.size,
      },
    });

    if (outcome.status === "rejected") {
      await this.deps.alerts.info("SIGNAL_REJECTED", `${signal.symbol} ${signal.side}: ${outcome.reason}`, {
        symbol: signal.symbol,
        traceId,
        data: { reason: outcome.reason, detail: outcome.detail },
      });
      return { status: "rejected", signalId, reason: outcome.reason, detail: outcome.detail };
    }

    if (outcome.status === "pending_confirmation") {
      await this.deps.alerts.warn(
        "PENDING_CONFIRMATION",
        `${signal.symbol} ${signal.side} needs confirmation: ${outcome.detail}`,
        { symbol: signal.symbol, traceId, data: { planId: outcome.plan.planId, size: outcome.plan.size } },
      );
      return { status: "pending_confirmation", signalId, detail: outcome.detail };
    }

    const result = await this.deps.lifecycle.openFromPlan(outcome.plan, traceId);
    if (result.status !== "opened") {
      return { status: "not_opened", signalId, detail: result.detail };
    }
    this.deps.risk.recordEntry(signal.symbol);
    return { status: "opened", signalId };
  }

  private async processManage(action: ManageAction): Promise<ProcessResult> {
    if (this.deps.supervisor.isPanic()) {
      return { status: "ignored", signalId: action.signalId, detail: "PANIC_CLOSE in progress" };
    }
    const result = await this.deps.lifecycle.handleManageAction(action);
    this.deps.logger.info(`[Signal] ${action.signalId} ${action.action} ${action.symbol}: ${result.status} (${result.detail})`);
    if (result.status === "applied") return { status: "managed", signalId: action.signalId, detail: result.detail };
    if (result.status === "ignored") return { status: "ignored", signalId: action.signalId, detail: result.detail };
    return { status: "failed", signalId: action.signalId, detail: result.detail };
  }

  /** Version of this message that already produced a risk decision, if any */
  private executedVersion(signal: EntrySignal): number | undefined {
    const key = messageKey(signal.source);
    for (const record of this.deps.ledger.query({ kind: "RISK_DECISION", symbol: signal.symbol })) {
      const version = record.data.version;
      if (record.data.messageKey === key && typeof version === "number" && version !== signal.source.version) {
        return version;
      }
    }
    return undefined;
  }
}
