/**
 * Reconciliation Engine
 *
 * Diffs exchange truth (positions + open orders) against the position book on
 * its own interval and repairs what it safely can:
 * - tracked position without its stop on the exchange -> re-place the stop
 * - stop sized for a different quantity than the live position -> re-size
 * - tracked position the exchange no longer reports -> close it locally
 * - exchange position with no local record -> flag and notify (adopt when configured)
 * - two local records on one symbol in a one-way account -> flag for the operator
 *
 * A pass with no drift makes exactly two reads and no writes. Mutations go
 * through the lifecycle manager, which takes the per-symbol lock.
 */

import type { ReconciliationConfig } from "../config/schema";
import { positionKey, type ExchangeOrder, type ExchangePosition } from "../domain/trade.types";
import { ReconciliationDivergenceError } from "../errors/app.errors";
import type { ExchangeGateway } from "../exchange/gateway";
import type { RateLimitedCallExecutor } from "../execution/call-executor";
import type { Ledger } from "../ledger/ledger";
import type { OrderLifecycleManager, RepairRequest } from "../lifecycle/order-lifecycle-manager";
import type { ManagedPosition } from "../lifecycle/position-book";
import type { SafetySupervisor } from "../safety/safety-supervisor";
import type { AlertManager } from "../services/alert-manager";
import { newTraceId } from "../utils/id.util";
import { describeError, type Logger } from "../utils/logger.util";
import { ratioFromPercentOrRatio, relativeDiff } from "../utils/price.util";

export type FindingKind =
  | "missing_protection"
  | "stop_size_mismatch"
  | "position_size_mismatch"
  | "vanished_position"
  | "orphan_position"
  | "adopted_position"
  | "duplicate_records";

export interface ReconciliationFinding {
  kind: FindingKind;
  positionKey: string;
  detail: string;
  /** Repair succeeded, or nothing needed repairing */
  resolved: boolean;
}

export interface ReconciliationReport {
  startedAt: number;
  exchangePositions: number;
  trackedPositions: number;
  findings: ReconciliationFinding[];
  /** The pass stopped early because PANIC_CLOSE was entered */
  yielded: boolean;
}

export interface ReconciliationDeps {
  gateway: ExchangeGateway;
  executor: RateLimitedCallExecutor;
  lifecycle: OrderLifecycleManager;
  ledger: Ledger;
  alerts: AlertManager;
  supervisor: SafetySupervisor;
  config: ReconciliationConfig;
  /** Relative size difference tolerated between stop and position */
  sizeTolerance: number;
  /** Stop distance used when adopting an orphan, percent or ratio */
  adoptStopLossPct: number;
  logger: Logger;
  now?: () => number;
}

export class ReconciliationEngine {
  private readonly now: () => number;
  private readonly flaggedOrphans = new Set<string>();
  private readonly flaggedDuplicates = new Set<string>();
  private lastReport: ReconciliationReport | null = null;
  private divergences: ReconciliationDivergenceError[] = [];

  constructor(private readonly deps: ReconciliationDeps) {
    this.now = deps.now ?? Date.now;
  }

  getLastReport(): ReconciliationReport | null {
    return this.lastReport;
  }

  /** Findings of the last pass that still need an operator */
  getUnresolved(): ReconciliationDivergenceError[] {
    return [...this.divergences];
  }

  async runOnce(): Promise<ReconciliationReport> {
    const report: ReconciliationReport = {
      startedAt: this.now(),
      exchangePositions: 0,
      trackedPositions: 0,
      findings: [],
      yielded: false,
    };
    this.divergences = [];
    if (this.deps.supervisor.isPanic()) {
      report.yielded = true;
      this.lastReport = report;
      return report;
    }

    const live = await this.deps.executor.call("getPositions", () => this.deps.gateway.getPositions());
    const openOrders = await this.deps.executor.call("getOpenOrders", () => this.deps.gateway.getOpenOrders());
    const liveByKey = new Map<string, ExchangePosition>();
    for (const position of live) {
      if (position.size > 0) liveByKey.set(positionKey(position.symbol, position.holdSide), position);
    }
    const stopsByKey = groupStops(openOrders);

    const tracked = this.deps.lifecycle.book.list();
    report.exchangePositions = liveByKey.size;
    report.trackedPositions = tracked.length;

    await this.checkDuplicates(tracked, report);

    for (const position of tracked) {
      if (this.deps.supervisor.isPanic()) {
        report.yielded = true;
        break;
      }
      await this.checkTracked(position, liveByKey.get(position.key), stopsByKey.get(position.key) ?? [], report);
    }

    if (!report.yielded) {
      for (const [key, position] of liveByKey) {
        if (this.deps.supervisor.isPanic()) {
          report.yielded = true;
          break;
        }
        if (this.deps.lifecycle.book.get(key)) continue;
        await this.handleOrphan(key, position, report);
      }
      for (const key of [...this.flaggedOrphans]) {
        if (!liveByKey.has(key)) this.flaggedOrphans.delete(key);
      }
    }

    if (report.findings.length > 0) {
      this.deps.logger.info(
        `[Reconcile] ${report.findings.length} finding(s): ${report.findings.map((f) => `${f.kind}@${f.positionKey}`).join(", ")}`,
      );
    } else {
      this.deps.logger.debug(`[Reconcile] No drift (${report.exchangePositions} live, ${report.trackedPositions} tracked)`);
    }
    this.lastReport = report;
    return report;
  }

  private async checkTracked(
    position: ManagedPosition,
    live: ExchangePosition | undefined,
    stops: ExchangeOrder[],
    report: ReconciliationReport,
  ): Promise<void> {
    if (position.state === "CLOSING") return;

    if (!live) {
      if (position.filledSize <= 0) return;
      const reason = await this.deps.lifecycle.resolveVanished(position.key);
      if (reason) {
        await this.record(report, {
          kind: "vanished_position",
          positionKey: position.key,
          detail: `not on the exchange anymore, closed locally (${reason})`,
          resolved: true,
        });
      }
      return;
    }

    const tolerance = this.deps.sizeTolerance;
    const stop = position.stopLoss;
    let request: RepairRequest | undefined;
    let kind: FindingKind | undefined;
    let detail = "";

    if (relativeDiff(position.filledSize, live.size) > tolerance) {
      kind = "position_size_mismatch";
      detail = `local size ${position.filledSize}, exchange ${live.size}`;
      request = { exchangeSize: live.size, exchangeEntryPrice: live.entryPrice };
    }

    if (stop?.mode === "trigger" && stop.orderId) {
      const liveStop = stops.find((order) => order.orderId === stop.orderId);
      if (!liveStop) {
        kind = "missing_protection";
        detail = `stop ${stop.orderId} is not open on the exchange`;
        request = { ...request, missingStopOrderId: stop.orderId, exchangeSize: live.size };
      } else if (relativeDiff(liveStop.size, live.size) > tolerance) {
        kind = kind ?? "stop_size_mismatch";
        detail = detail || `stop size ${liveStop.size}, position ${live.size}`;
        request = { ...request, stopOrderSize: liveStop.size, exchangeSize: live.size };
      }
    } else if (!stop) {
      kind = "missing_protection";
      detail = position.protectionPending ? "stop replacement was interrupted" : "no stop recorded";
      request = { ...request, exchangeSize: live.size };
    } else if (relativeDiff(stop.size, live.size) > tolerance) {
      kind = kind ?? "stop_size_mismatch";
      detail = detail || `local guard size ${stop.size}, position ${live.size}`;
      request = { ...request, exchangeSize: live.size };
    }

    if (!kind || !request) return;
    let resolved = false;
    try {
      resolved = await this.deps.lifecycle.repairProtection(position.key, request);
    } catch (err) {
      detail = `${detail}; repair failed: ${describeError(err)}`;
    }
    await this.record(report, { kind, positionKey: position.key, detail, resolved });
  }

  private async handleOrphan(key: string, live: ExchangePosition, report: ReconciliationReport): Promise<void> {
    const ratio = ratioFromPercentOrRatio(this.deps.adoptStopLossPct);
    if (this.deps.config.adoptOrphans && ratio > 0 && live.entryPrice > 0) {
      const stopPrice = live.holdSide === "LONG" ? live.entryPrice * (1 - ratio) : live.entryPrice * (1 + ratio);
      const adopted = await this.deps.lifecycle.adoptPosition(live, stopPrice);
      await this.record(report, {
        kind: "adopted_position",
        positionKey: key,
        detail: `adopted ${live.size} @ ${live.entryPrice}, stop ${stopPrice}`,
        resolved: adopted?.stopLoss !== undefined,
      });
      await this.deps.alerts.warn("ORPHAN_ADOPTED", `${key} adopted with stop ${stopPrice}`, { symbol: live.symbol });
      return;
    }

    const detail = `exchange position ${live.size} @ ${live.entryPrice} has no local record`;
    if (this.flaggedOrphans.has(key)) {
      // already reported; stays unresolved until it is closed or adopted
      this.divergences.push(new ReconciliationDivergenceError(detail, key, "orphan_position"));
      return;
    }
    this.flaggedOrphans.add(key);
    await this.record(report, { kind: "orphan_position", positionKey: key, detail, resolved: false });
    await this.deps.alerts.warn("ORPHAN_POSITION", `${key} is open on the exchange but not tracked`, {
      symbol: live.symbol,
      data: { size: live.size, entryPrice: live.entryPrice },
    });
    if (this.deps.config.safeModeOnOrphan) {
      await this.deps.supervisor.enterSafeMode([`untracked exchange position ${key}`], "orphan_position");
    }
  }

  /**
   * A one-way account nets one position per symbol, so local records for
   * both sides of a symbol contradict each other.
   */
  private async checkDuplicates(tracked: ManagedPosition[], report: ReconciliationReport): Promise<void> {
    if (this.deps.gateway.positionMode !== "one_way") return;
    const bySymbol = new Map<string, ManagedPosition[]>();
    for (const position of tracked) {
      const list = bySymbol.get(position.symbol) ?? [];
      list.push(position);
      bySymbol.set(position.symbol, list);
    }
    for (const [symbol, positions] of bySymbol) {
      if (positions.length < 2 || this.flaggedDuplicates.has(symbol)) continue;
      this.flaggedDuplicates.add(symbol);
      const keys = positions.map((p) => p.key).join(", ");
      await this.record(report, {
        kind: "duplicate_records",
        positionKey: symbol,
        detail: `contradictory local records: ${keys}`,
        resolved: false,
      });
      await this.deps.alerts.warn("DUPLICATE_RECORDS", `${symbol} has contradictory local records (${keys})`, {
        symbol,
      });
    }
  }

  private async record(report: ReconciliationReport, finding: ReconciliationFinding): Promise<void> {
    report.findings.push(finding);
    const line = `[Reconcile] ${finding.kind} ${finding.positionKey}: ${finding.detail}`;
    if (finding.resolved) {
      this.deps.logger.info(line);
    } else {
      this.deps.logger.warn(line);
      this.divergences.push(new ReconciliationDivergenceError(finding.detail, finding.positionKey, finding.kind));
    }
    await this.deps.ledger.append({
      kind: "RECONCILIATION",
      positionKey: finding.positionKey,
      traceId: newTraceId(),
      data: { finding: finding.kind, detail: finding.detail, resolved: finding.resolved },
    });
  }
}

function groupStops(orders: ExchangeOrder[]): Map<string, ExchangeOrder[]> {
  const grouped = new Map<string, ExchangeOrder[]>();
  for (const order of orders) {
    if (order.purpose !== "stop_loss") continue;
    const key = positionKey(order.symbol, order.holdSide);
    const list = grouped.get(key) ?? [];
    list.push(order);
    grouped.set(key, list);
  }
  return grouped;
}
