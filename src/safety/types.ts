export type SafetyMode = "NORMAL" | "SAFE_MODE" | "PANIC_CLOSE";

/** Where a transition came from */
export type SafetySource =
  | "kill_switch"
  | "drawdown"
  | "api_error_burst"
  | "unprotected_position"
  | "protection_failure"
  | "capability_probe"
  | "orphan_position"
  | "operator";

export interface SafetyState {
  readonly mode: SafetyMode;
  /** Increments on every transition */
  readonly version: number;
  readonly reasons: readonly string[];
  readonly source: SafetySource | "startup";
  readonly since: number;
}

export interface SafetyTransition {
  readonly version: number;
  readonly from: SafetyMode;
  readonly to: SafetyMode;
  readonly reasons: readonly string[];
  readonly source: SafetySource;
  readonly at: number;
}

export type KillSwitchLevel = "none" | "safe" | "panic";

export interface KillSwitchReading {
  level: KillSwitchLevel;
  source: "file" | "env" | "flag" | "none";
  raw?: string;
}

export interface PanicSweepResult {
  attempted: number;
  closed: number;
  failed: string[];
}
