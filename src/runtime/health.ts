import type { CapabilityValue } from "../exchange/capability-cache";
import type { FeedMode } from "../exchange/price-feed";
import type { SafetyMode } from "../safety/types";

export interface HealthSources {
  safety: { mode: SafetyMode; version: number; reasons: readonly string[] };
  openPositions: number;
  unprotectedPositions: number;
  capabilities: Array<{ kind: string; value: CapabilityValue; expiresAt: number }>;
  feedMode: FeedMode | null;
  localGuardArmed: boolean;
  requireStreamingForLocalGuard: boolean;
  lastAccountPollAt: number | null;
  lastReconcileAt: number | null;
  accountPollIntervalMs: number;
  now: number;
}

export interface HealthSnapshot {
  ready: boolean;
  reasons: string[];
  safetyMode: SafetyMode;
  safetyVersion: number;
  safetyReasons: string[];
  openPositions: number;
  unprotectedPositions: number;
  capabilities: Array<{ key: string; value: CapabilityValue; expiresAt: number }>;
  feedMode: FeedMode | null;
  lastAccountPollAt: number | null;
  lastReconcileAt: number | null;
}

/** Polls older than this many intervals count as stale */
export const STALE_POLL_FACTOR = 3;

/**
 * Read-only readiness view. Not ready while entries are blocked, while any
 * position lacks a stop, when the account poll is stale, or when a local
 * guard depends on a polled price feed and streaming is required.
 */
export function getHealthSnapshot(sources: HealthSources): HealthSnapshot {
  const reasons: string[] = [];

  if (sources.safety.mode !== "NORMAL") {
    reasons.push(`safety mode ${sources.safety.mode}`);
  }
  if (sources.unprotectedPositions > 0) {
    reasons.push(`${sources.unprotectedPositions} position(s) without a confirmed stop`);
  }

  const staleAfter = sources.accountPollIntervalMs * STALE_POLL_FACTOR;
  if (sources.lastAccountPollAt === null) {
    reasons.push("account not polled yet");
  } else if (sources.now - sources.lastAccountPollAt > staleAfter) {
    reasons.push(`account poll stale (${sources.now - sources.lastAccountPollAt}ms > ${staleAfter}ms)`);
  }

  if (sources.requireStreamingForLocalGuard && sources.localGuardArmed && sources.feedMode === "poll") {
    reasons.push("local guard stop running on a polled price feed");
  }

  return {
    ready: reasons.length === 0,
    reasons,
    safetyMode: sources.safety.mode,
    safetyVersion: sources.safety.version,
    safetyReasons: [...sources.safety.reasons],
    openPositions: sources.openPositions,
    unprotectedPositions: sources.unprotectedPositions,
    capabilities: sources.capabilities.map((c) => ({ key: c.kind, value: c.value, expiresAt: c.expiresAt })),
    feedMode: sources.feedMode,
    lastAccountPollAt: sources.lastAccountPollAt,
    lastReconcileAt: sources.lastReconcileAt,
  };
}
