/**
 * Durable append-only ledger
 *
 * Every signal, decision, order event, reconciliation action and safety
 * transition is appended here and never mutated. Indexes are derived from the
 * records, so a ledger rebuilt from disk answers the same idempotency queries.
 */

export type LedgerRecordKind =
  | "SIGNAL_RECEIVED"
  | "SIGNAL_VERSION_IGNORED"
  | "RISK_DECISION"
  | "ORDER_ATTEMPT"
  | "ORDER_RESULT"
  | "FILL"
  | "PROTECTION"
  | "POSITION"
  | "RECONCILIATION"
  | "SAFETY_TRANSITION"
  | "ALERT"
  | "FLAG";

export const LEDGER_RECORD_KINDS: ReadonlySet<string> = new Set<LedgerRecordKind>([
  "SIGNAL_RECEIVED",
  "SIGNAL_VERSION_IGNORED",
  "RISK_DECISION",
  "ORDER_ATTEMPT",
  "ORDER_RESULT",
  "FILL",
  "PROTECTION",
  "POSITION",
  "RECONCILIATION",
  "SAFETY_TRANSITION",
  "ALERT",
  "FLAG",
]);

export function isLedgerRecordKind(value: string): value is LedgerRecordKind {
  return LEDGER_RECORD_KINDS.has(value);
}

export interface LedgerRecord {
  seq: number;
  kind: LedgerRecordKind;
  at: number;
  signalId?: string;
  /** chatId:messageId:vN of the source message */
  sourceKey?: string;
  symbol?: string;
  /** symbol:side of the position the record concerns */
  positionKey?: string;
  traceId?: string;
  data: Record<string, unknown>;
}

export type LedgerInput = Omit<LedgerRecord, "seq" | "at"> & { at?: number };

export interface LedgerQuery {
  kind?: LedgerRecordKind;
  symbol?: string;
  positionKey?: string;
  since?: number;
}

export interface Ledger {
  append(input: LedgerInput): Promise<LedgerRecord>;
  findBySignalId(signalId: string, kind?: LedgerRecordKind): LedgerRecord[];
  findBySourceKey(sourceKey: string): LedgerRecord[];
  /** True once a RISK_DECISION exists for the signal */
  hasExecutionDecision(signalId: string): boolean;
  /** Latest PROTECTION record for the position says a stop is active */
  hasProtectiveOrder(positionKey: string): boolean;
  query(filter?: LedgerQuery): LedgerRecord[];
  getFlag(name: string): string | undefined;
  setFlag(name: string, value: string | null): Promise<void>;
  size(): number;
}

/**
 * In-memory ledger. Also the indexing core that FileLedger persists.
 */
export class MemoryLedger implements Ledger {
  protected readonly records: LedgerRecord[] = [];
  private readonly bySignal = new Map<string, LedgerRecord[]>();
  private readonly bySource = new Map<string, LedgerRecord[]>();
  private readonly protection = new Map<string, boolean>();
  private readonly flags = new Map<string, string>();
  private seq = 0;

  constructor(protected readonly now: () => number = Date.now) {}

  async append(input: LedgerInput): Promise<LedgerRecord> {
    this.seq++;
    const record: LedgerRecord = Object.freeze({
      ...input,
      data: Object.freeze({ ...input.data }),
      seq: this.seq,
      at: input.at ?? this.now(),
    });
    await this.persist(record);
    this.index(record);
    return record;
  }

  findBySignalId(signalId: string, kind?: LedgerRecordKind): LedgerRecord[] {
    const records = this.bySignal.get(signalId) ?? [];
    return kind ? records.filter((r) => r.kind === kind) : [...records];
  }

  findBySourceKey(sourceKey: string): LedgerRecord[] {
    return [...(this.bySource.get(sourceKey) ?? [])];
  }

  hasExecutionDecision(signalId: string): boolean {
    return this.findBySignalId(signalId, "RISK_DECISION").length > 0;
  }

  hasProtectiveOrder(positionKey: string): boolean {
    return this.protection.get(positionKey) ?? false;
  }

  query(filter: LedgerQuery = {}): LedgerRecord[] {
    return this.records.filter(
      (r) =>
        (filter.kind === undefined || r.kind === filter.kind) &&
        (filter.symbol === undefined || r.symbol === filter.symbol) &&
        (filter.positionKey === undefined || r.positionKey === filter.positionKey) &&
        (filter.since === undefined || r.at >= filter.since),
    );
  }

  getFlag(name: string): string | undefined {
    return this.flags.get(name);
  }

  async setFlag(name: string, value: string | null): Promise<void> {
    await this.append({ kind: "FLAG", data: { name, value } });
  }

  size(): number {
    return this.records.length;
  }

  /**
   * Durable write hook; the in-memory ledger has nothing to write
   */
  protected async persist(_record: LedgerRecord): Promise<void> {
    return;
  }

  /**
   * Apply a record to the indexes (also used when replaying from disk)
   */
  protected index(record: LedgerRecord): void {
    this.records.push(record);
    this.seq = Math.max(this.seq, record.seq);

    if (record.signalId) {
      const list = this.bySignal.get(record.signalId) ?? [];
      list.push(record);
      this.bySignal.set(record.signalId, list);
    }
    if (record.sourceKey) {
      const list = this.bySource.get(record.sourceKey) ?? [];
      list.push(record);
      this.bySource.set(record.sourceKey, list);
    }
    if (record.kind === "PROTECTION" && record.positionKey) {
      this.protection.set(record.positionKey, record.data.status === "active");
    }
    if (record.kind === "FLAG" && typeof record.data.name === "string") {
      const value = record.data.value;
      if (typeof value === "string") this.flags.set(record.data.name, value);
      else this.flags.delete(record.data.name);
    }
  }
}
