/**
 * Capability cache
 *
 * Tri-state, TTL-bounded record of what the exchange account supports.
 * - supported / unsupported live for the long TTL
 * - unknown (timeout, network error, anything inconclusive) lives for the short retry TTL
 * - an expired record is never returned; resolve() re-probes first
 * - concurrent resolves for one capability share a single probe
 */

import type { CapabilityKind, ProbeResult } from "../domain/trade.types";
import { CapabilityUnknownError } from "../errors/app.errors";
import { withTimeout } from "../execution/call-executor";
import { TtlCache } from "../infra/persistence/ttl-cache";
import { describeError, type Logger } from "../utils/logger.util";

export type CapabilityValue = "supported" | "unsupported" | "unknown";

export interface CapabilityRecord {
  kind: CapabilityKind;
  value: CapabilityValue;
  probedAt: number;
  expiresAt: number;
  /** Why the value is unknown, when it is */
  detail?: string;
}

export interface CapabilityCacheOptions {
  /** TTL for supported/unsupported in ms */
  ttlMs: number;
  /** TTL for unknown in ms */
  unknownTtlMs: number;
  /** Probe deadline in ms; a timeout yields unknown */
  probeTimeoutMs: number;
}

export type CapabilityProbe = (kind: CapabilityKind) => Promise<ProbeResult>;

export class CapabilityCache {
  private readonly cache: TtlCache<CapabilityKind, CapabilityRecord>;
  private readonly inFlight = new Map<CapabilityKind, Promise<CapabilityRecord>>();

  constructor(
    private readonly options: CapabilityCacheOptions,
    private readonly probe: CapabilityProbe,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {
    this.cache = new TtlCache(options.ttlMs, now);
  }

  /**
   * Fresh record or undefined; never returns an expired record
   */
  peek(kind: CapabilityKind): CapabilityRecord | undefined {
    return this.cache.get(kind);
  }

  /**
   * Fresh record, probing when there is none
   */
  async resolve(kind: CapabilityKind): Promise<CapabilityRecord> {
    const cached = this.cache.get(kind);
    if (cached) return cached;

    const pending = this.inFlight.get(kind);
    if (pending) return pending;

    const run = this.runProbe(kind).finally(() => this.inFlight.delete(kind));
    this.inFlight.set(kind, run);
    return run;
  }

  /**
   * Fresh record that is known to be supported or unsupported.
   * An inconclusive probe raises CapabilityUnknownError.
   */
  async resolveKnown(kind: CapabilityKind): Promise<CapabilityRecord> {
    const record = await this.resolve(kind);
    if (record.value === "unknown") {
      throw new CapabilityUnknownError(kind, record.detail ? new Error(record.detail) : undefined);
    }
    return record;
  }

  /**
   * Drop the cached record so the next resolve() probes again
   */
  invalidate(kind: CapabilityKind): void {
    this.cache.delete(kind);
  }

  entries(): CapabilityRecord[] {
    return this.cache.entries().map((entry) => entry.value);
  }

  private async runProbe(kind: CapabilityKind): Promise<CapabilityRecord> {
    let value: CapabilityValue;
    let detail: string | undefined;
    try {
      const result = await withTimeout(this.probe(kind), this.options.probeTimeoutMs, `probe:${kind}`);
      if (result === "timeout") {
        value = "unknown";
        detail = "probe reported timeout";
      } else {
        value = result;
      }
    } catch (err) {
      value = "unknown";
      detail = describeError(err);
    }

    const ttlMs = value === "unknown" ? this.options.unknownTtlMs : this.options.ttlMs;
    const probedAt = this.now();
    const record: CapabilityRecord = { kind, value, probedAt, expiresAt: probedAt + ttlMs, detail };
    this.cache.set(kind, record, ttlMs);

    if (value === "unknown") {
      this.logger.warn(`[Capability] ${kind} unresolved (${detail}); retry after ${ttlMs}ms`);
    } else {
      this.logger.info(`[Capability] ${kind} = ${value} (ttl ${ttlMs}ms)`);
    }
    return record;
  }
}
