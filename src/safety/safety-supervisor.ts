/**
 * Safety Supervisor
 *
 * Owns the global trading mode:
 * - NORMAL: new entries allowed
 * - SAFE_MODE: no new entries, existing positions stay protected and managed
 * - PANIC_CLOSE: cancel entries and close everything, once per panic entry
 *
 * Modes only escalate on their own. Leaving SAFE_MODE or PANIC_CLOSE takes an
 * explicit operator reset.
 */

import type { SafetyConfig } from "../config/schema";
import type { Ledger } from "../ledger/ledger";
import type { AlertManager } from "../services/alert-manager";
import type { AccountSnapshot } from "../domain/trade.types";
import { FatalSafetyTriggerError } from "../errors/app.errors";
import { describeError, toError, type Logger } from "../utils/logger.util";
import { ApiErrorBurstBreaker, DrawdownBreaker } from "./breakers";
import type { KillSwitch } from "./kill-switch";
import type {
  PanicSweepResult,
  SafetyMode,
  SafetySource,
  SafetyState,
  SafetyTransition,
} from "./types";

const SEVERITY: Record<SafetyMode, number> = { NORMAL: 0, SAFE_MODE: 1, PANIC_CLOSE: 2 };

export type PanicSweeper = () => Promise<PanicSweepResult>;
export type EmergencyCloser = (positionKey: string) => Promise<void>;
export type TransitionListener = (transition: SafetyTransition) => void;

export interface UnprotectedPosition {
  positionKey: string;
  /** Epoch ms the position was first seen without a working stop */
  since: number;
}

export interface SafetyEvaluationInput {
  account?: AccountSnapshot;
  unprotected?: UnprotectedPosition[];
}

export interface SafetySupervisorDeps {
  config: SafetyConfig;
  ledger: Ledger;
  alerts: AlertManager;
  logger: Logger;
  killSwitch?: KillSwitch;
  now?: () => number;
}

export interface ResetOptions {
  force?: boolean;
}

export class SafetySupervisor {
  private state: SafetyState;
  private readonly history: SafetyTransition[] = [];
  private readonly listeners: TransitionListener[] = [];
  private readonly drawdown: DrawdownBreaker;
  private readonly apiErrors: ApiErrorBurstBreaker;
  private readonly now: () => number;
  private panicSweeper: PanicSweeper | null = null;
  private emergencyCloser: EmergencyCloser | null = null;
  private sweptForVersion = -1;
  private sweepPromise: Promise<PanicSweepResult | null> = Promise.resolve(null);
  private readonly emergencyClosed = new Set<string>();

  constructor(private readonly deps: SafetySupervisorDeps) {
    this.now = deps.now ?? Date.now;
    this.state = { mode: "NORMAL", version: 0, reasons: [], source: "startup", since: this.now() };
    this.drawdown = new DrawdownBreaker(deps.config.maxAccountDrawdownPct);
    this.apiErrors = new ApiErrorBurstBreaker(
      deps.config.apiErrorBurstCount,
      deps.config.apiErrorBurstWindowSeconds * 1000,
      this.now,
    );
  }

  getState(): SafetyState {
    return { ...this.state, reasons: [...this.state.reasons] };
  }

  getHistory(): SafetyTransition[] {
    return [...this.history];
  }

  getMode(): SafetyMode {
    return this.state.mode;
  }

  isPanic(): boolean {
    return this.state.mode === "PANIC_CLOSE";
  }

  allowsNewEntries(): boolean {
    return this.state.mode === "NORMAL";
  }

  setPanicSweeper(sweeper: PanicSweeper): void {
    this.panicSweeper = sweeper;
  }

  setEmergencyCloser(closer: EmergencyCloser): void {
    this.emergencyCloser = closer;
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  async enterSafeMode(reasons: string[], source: SafetySource): Promise<SafetyTransition | null> {
    return this.escalate("SAFE_MODE", reasons, source);
  }

  /**
   * Enter PANIC_CLOSE and start the sweep. The sweep runs once per panic
   * entry; use waitForSweep() to observe its result.
   */
  async enterPanic(reasons: string[], source: SafetySource): Promise<SafetyTransition | null> {
    const transition = await this.escalate("PANIC_CLOSE", reasons, source);
    if (transition) {
      this.sweepPromise = this.runPanicSweep(transition.version);
    }
    return transition;
  }

  waitForSweep(): Promise<PanicSweepResult | null> {
    return this.sweepPromise;
  }

  /**
   * Operator recovery. PANIC_CLOSE requires force.
   */
  async resetToNormal(operator: string, reason: string, options: ResetOptions = {}): Promise<SafetyTransition | null> {
    if (this.state.mode === "NORMAL") return null;
    if (this.state.mode === "PANIC_CLOSE" && !options.force) {
      this.deps.logger.warn(`[Safety] Reset from PANIC_CLOSE by ${operator} refused without force`);
      return null;
    }

    const kill = this.deps.killSwitch ? await this.deps.killSwitch.read() : undefined;
    if (kill && kill.level !== "none") {
      this.deps.logger.warn(`[Safety] Reset refused: kill switch still engaged via ${kill.source}`);
      return null;
    }

    this.apiErrors.reset();
    this.emergencyClosed.clear();
    return this.transition("NORMAL", [`operator ${operator}: ${reason}`], "operator");
  }

  recordApiError(err: unknown): void {
    this.apiErrors.record();
    this.deps.logger.debug(`[Safety] API failure recorded (${this.apiErrors.count()} in window): ${describeError(err)}`);
  }

  /**
   * One pass over every trigger. Returns the transition made, if any.
   */
  async evaluate(input: SafetyEvaluationInput = {}): Promise<SafetyTransition | null> {
    let result: SafetyTransition | null = null;

    if (this.deps.killSwitch) {
      const reading = await this.deps.killSwitch.read();
      if (reading.level === "panic") {
        result = (await this.enterPanic([`kill switch (${reading.source})`], "kill_switch")) ?? result;
      } else if (reading.level === "safe") {
        result = (await this.enterSafeMode([`kill switch (${reading.source})`], "kill_switch")) ?? result;
      }
    }

    if (input.account) {
      const reading = this.drawdown.update(input.account.equity);
      if (reading.tripped) {
        const reason = `drawdown ${reading.drawdownPct.toFixed(2)}% from peak ${reading.peakEquity} exceeds ${this.deps.config.maxAccountDrawdownPct}%`;
        if (this.state.mode === "NORMAL") {
          this.deps.logger.error("[Safety] Drawdown breaker tripped", new FatalSafetyTriggerError(reason, "drawdown"));
        }
        const transition = this.deps.config.panicOnDrawdown
          ? await this.enterPanic([reason], "drawdown")
          : await this.enterSafeMode([reason], "drawdown");
        result = transition ?? result;
      }
    }

    if (this.apiErrors.isTripped()) {
      const reason = `${this.apiErrors.count()} exchange failures within ${this.deps.config.apiErrorBurstWindowSeconds}s`;
      result = (await this.enterSafeMode([reason], "api_error_burst")) ?? result;
    }

    for (const position of input.unprotected ?? []) {
      const transition = await this.handleUnprotected(position);
      result = transition ?? result;
    }

    return result;
  }

  getPeakEquity(): number | null {
    return this.drawdown.getPeakEquity();
  }

  private async handleUnprotected(position: UnprotectedPosition): Promise<SafetyTransition | null> {
    const limitMs = this.deps.config.maxUnprotectedSeconds * 1000;
    const elapsed = this.now() - position.since;
    if (limitMs <= 0 || elapsed <= limitMs) return null;

    const reason = `${position.positionKey} unprotected for ${Math.round(elapsed / 1000)}s`;
    const transition = await this.enterSafeMode([reason], "unprotected_position");

    if (this.emergencyCloser && !this.emergencyClosed.has(position.positionKey)) {
      this.emergencyClosed.add(position.positionKey);
      await this.deps.alerts.critical("EMERGENCY_CLOSE", `Emergency closing ${reason}`, {
        data: { positionKey: position.positionKey },
      });
      try {
        await this.emergencyCloser(position.positionKey);
      } catch (err) {
        this.emergencyClosed.delete(position.positionKey);
        this.deps.logger.error(`[Safety] Emergency close of ${position.positionKey} failed`, toError(err));
      }
    }
    return transition;
  }

  private async escalate(to: SafetyMode, reasons: string[], source: SafetySource): Promise<SafetyTransition | null> {
    if (SEVERITY[to] <= SEVERITY[this.state.mode]) return null;
    return this.transition(to, reasons, source);
  }

  private async transition(to: SafetyMode, reasons: string[], source: SafetySource): Promise<SafetyTransition> {
    const from = this.state.mode;
    const at = this.now();
    const version = this.state.version + 1;
    this.state = { mode: to, version, reasons: [...reasons], source, since: at };

    const transition: SafetyTransition = { version, from, to, reasons: [...reasons], source, at };
    this.history.push(transition);

    this.deps.logger.warn(`[Safety] ${from} -> ${to} (v${version}): ${reasons.join("; ")}`);

    try {
      await this.deps.ledger.append({
        kind: "SAFETY_TRANSITION",
        data: { version, from, to, reasons: [...reasons], source },
      });
    } catch (err) {
      this.deps.logger.error("[Safety] Failed to ledger safety transition", toError(err));
    }

    await this.deps.alerts.emit(to === "NORMAL" ? "info" : "critical", `SAFETY_${to}`, `${from} -> ${to}: ${reasons.join("; ")}`, {
      data: { version, source },
    });

    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (err) {
        this.deps.logger.error("[Safety] Transition listener failed", toError(err));
      }
    }
    return transition;
  }

  private async runPanicSweep(version: number): Promise<PanicSweepResult | null> {
    if (this.sweptForVersion === version || !this.panicSweeper) {
      if (!this.panicSweeper) this.deps.logger.warn("[Safety] PANIC_CLOSE with no sweeper registered");
      return null;
    }
    this.sweptForVersion = version;

    try {
      const result = await this.panicSweeper();
      const level = result.failed.length > 0 ? "critical" : "warn";
      await this.deps.alerts.emit(
        level,
        "PANIC_SWEEP_DONE",
        `Panic sweep closed ${result.closed}/${result.attempted} positions`,
        { data: { failed: result.failed } },
      );
      return result;
    } catch (err) {
      this.deps.logger.error("[Safety] Panic sweep failed", toError(err));
      await this.deps.alerts.critical("PANIC_SWEEP_FAILED", `Panic sweep failed: ${describeError(err)}`);
      return null;
    }
  }
}
