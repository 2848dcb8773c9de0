/**
 * Position book
 *
 * Local view of every position the engine manages. Each change is written to
 * the ledger as a POSITION snapshot, and restore() rebuilds the book from the
 * latest snapshot per plan.
 */

import { positionKey, type Side, type StopLossMode } from "../domain/trade.types";
import type { Ledger, LedgerRecord } from "../ledger/ledger";
import { isRecord, readNumber, readString, type JsonRecord } from "../utils/json.util";

export type PositionState =
  | "PENDING_ENTRY"
  | "PARTIALLY_FILLED"
  | "FILLED_PROTECTED"
  | "MANAGING"
  | "CLOSING"
  | "CLOSED"
  | "REJECTED";

const POSITION_STATES: ReadonlySet<string> = new Set<PositionState>([
  "PENDING_ENTRY",
  "PARTIALLY_FILLED",
  "FILLED_PROTECTED",
  "MANAGING",
  "CLOSING",
  "CLOSED",
  "REJECTED",
]);

const TERMINAL_STATES: ReadonlySet<PositionState> = new Set<PositionState>(["CLOSED", "REJECTED"]);

export function isTerminalState(state: PositionState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface StopLossRef {
  mode: StopLossMode;
  /** Exchange order id; absent for a local guard */
  orderId?: string;
  clientOrderId: string;
  triggerPrice: number;
  size: number;
  placedAt: number;
}

export interface TakeProfitRef {
  orderId: string;
  clientOrderId: string;
  price: number;
  size: number;
  filledSize: number;
}

/** One leg of the entry; a single entry is a ladder of one */
export interface EntryOrderRef {
  /** Ladder position; leg 0 is meant to fill first */
  index: number;
  orderId: string;
  clientOrderId: string;
  price: number;
  /** Shrinks to the filled size once the venue cancels the rest */
  size: number;
  filledSize: number;
  avgFillPrice?: number;
}

export interface ManagedPosition {
  key: string;
  planId: string;
  signalId: string;
  symbol: string;
  side: Side;
  state: PositionState;
  leverage: number;
  intendedSize: number;
  filledSize: number;
  avgEntryPrice: number;
  entryOrders: EntryOrderRef[];
  /** Level the protective stop should sit at */
  stopLossPrice: number;
  stopLoss?: StopLossRef;
  /** Set while a cancel-then-replace of the stop is in progress */
  protectionPending: boolean;
  /** First time the position was seen holding size without a stop */
  unprotectedSince?: number;
  breakEvenDone: boolean;
  takeProfits: number[];
  takeProfitOrders: TakeProfitRef[];
  /** Reduce order resting at the average of the first two entry legs */
  breakEvenReduce?: TakeProfitRef;
  /** Set once that order was attempted, placed or not */
  breakEvenReduceDone: boolean;
  /** Discovered on the exchange rather than opened by the engine */
  adopted: boolean;
  openedAt: number;
  updatedAt: number;
  closeReason?: string;
}

export class PositionBook {
  private readonly active = new Map<string, ManagedPosition>();
  private readonly closed: ManagedPosition[] = [];

  get(key: string): ManagedPosition | undefined {
    return this.active.get(key);
  }

  /** The active position on a symbol, either side */
  findBySymbol(symbol: string): ManagedPosition | undefined {
    for (const position of this.active.values()) {
      if (position.symbol === symbol) return position;
    }
    return undefined;
  }

  list(): ManagedPosition[] {
    return [...this.active.values()];
  }

  countOpen(): number {
    return this.active.size;
  }

  /** Positions holding size without a confirmed stop */
  unprotected(): ManagedPosition[] {
    return this.list().filter(
      (p) => p.filledSize > 0 && p.state !== "CLOSING" && (p.stopLoss === undefined || p.protectionPending),
    );
  }

  history(): ManagedPosition[] {
    return [...this.closed];
  }

  /**
   * Track a position. Terminal positions leave the active set.
   */
  put(position: ManagedPosition): void {
    if (isTerminalState(position.state)) {
      if (this.active.get(position.key) === position) this.active.delete(position.key);
      this.closed.push(position);
      return;
    }
    this.active.set(position.key, position);
  }

  /**
   * Append a POSITION snapshot
   */
  async persist(ledger: Ledger, position: ManagedPosition, traceId?: string): Promise<void> {
    await ledger.append({
      kind: "POSITION",
      signalId: position.signalId,
      symbol: position.symbol,
      positionKey: position.key,
      traceId,
      data: { position: serializePosition(position) },
    });
  }

  /**
   * Rebuild from the ledger. Returns the plan ids whose snapshots collided on
   * one position key, newest kept.
   */
  restore(ledger: Ledger): { restored: number; duplicates: string[] } {
    const latestByPlan = latestSnapshots(ledger.query({ kind: "POSITION" }));
    const duplicates: string[] = [];
    this.active.clear();

    for (const position of latestByPlan.values()) {
      if (isTerminalState(position.state)) continue;
      const existing = this.active.get(position.key);
      if (existing) {
        const [keep, drop] = existing.updatedAt >= position.updatedAt ? [existing, position] : [position, existing];
        duplicates.push(drop.planId);
        this.active.set(keep.key, keep);
        continue;
      }
      this.active.set(position.key, position);
    }
    return { restored: this.active.size, duplicates };
  }
}

/**
 * Latest non-corrupt POSITION snapshot per plan id
 */
export function latestSnapshots(records: LedgerRecord[]): Map<string, ManagedPosition> {
  const latest = new Map<string, ManagedPosition>();
  for (const record of records) {
    const position = parsePosition(record.data.position);
    if (position) latest.set(position.planId, position);
  }
  return latest;
}

export function serializePosition(position: ManagedPosition): JsonRecord {
  return {
    ...position,
    entryOrders: position.entryOrders.map((leg) => ({ ...leg })),
    stopLoss: position.stopLoss ? { ...position.stopLoss } : undefined,
    takeProfits: [...position.takeProfits],
    takeProfitOrders: position.takeProfitOrders.map((tp) => ({ ...tp })),
    breakEvenReduce: position.breakEvenReduce ? { ...position.breakEvenReduce } : undefined,
  };
}

export function parsePosition(value: unknown): ManagedPosition | undefined {
  if (!isRecord(value)) return undefined;
  const planId = readString(value, "planId");
  const signalId = readString(value, "signalId");
  const symbol = readString(value, "symbol");
  const side = readString(value, "side");
  const state = readString(value, "state");
  if (!planId || !signalId || !symbol || (side !== "LONG" && side !== "SHORT")) return undefined;
  if (!state || !isPositionState(state)) return undefined;

  return {
    key: positionKey(symbol, side),
    planId,
    signalId,
    symbol,
    side,
    state,
    leverage: readNumber(value, "leverage") ?? 1,
    intendedSize: readNumber(value, "intendedSize") ?? 0,
    filledSize: readNumber(value, "filledSize") ?? 0,
    avgEntryPrice: readNumber(value, "avgEntryPrice") ?? 0,
    entryOrders: Array.isArray(value.entryOrders)
      ? value.entryOrders.map(parseEntryOrderRef).filter((leg): leg is EntryOrderRef => leg !== undefined)
      : [],
    stopLossPrice: readNumber(value, "stopLossPrice") ?? 0,
    stopLoss: parseStopLossRef(value.stopLoss),
    protectionPending: value.protectionPending === true,
    unprotectedSince: readNumber(value, "unprotectedSince"),
    breakEvenDone: value.breakEvenDone === true,
    takeProfits: Array.isArray(value.takeProfits)
      ? value.takeProfits.filter((tp): tp is number => typeof tp === "number")
      : [],
    takeProfitOrders: Array.isArray(value.takeProfitOrders)
      ? value.takeProfitOrders.map(parseTakeProfitRef).filter((tp): tp is TakeProfitRef => tp !== undefined)
      : [],
    breakEvenReduce: parseTakeProfitRef(value.breakEvenReduce),
    breakEvenReduceDone: value.breakEvenReduceDone === true,
    adopted: value.adopted === true,
    openedAt: readNumber(value, "openedAt") ?? 0,
    updatedAt: readNumber(value, "updatedAt") ?? 0,
    closeReason: readString(value, "closeReason"),
  };
}

function isPositionState(value: string): value is PositionState {
  return POSITION_STATES.has(value);
}

function parseStopLossRef(value: unknown): StopLossRef | undefined {
  if (!isRecord(value)) return undefined;
  const mode = readString(value, "mode");
  const clientOrderId = readString(value, "clientOrderId");
  const triggerPrice = readNumber(value, "triggerPrice");
  const size = readNumber(value, "size");
  if ((mode !== "trigger" && mode !== "local_guard") || !clientOrderId) return undefined;
  if (triggerPrice === undefined || size === undefined) return undefined;
  return {
    mode,
    orderId: readString(value, "orderId"),
    clientOrderId,
    triggerPrice,
    size,
    placedAt: readNumber(value, "placedAt") ?? 0,
  };
}

function parseTakeProfitRef(value: unknown): TakeProfitRef | undefined {
  if (!isRecord(value)) return undefined;
  const orderId = readString(value, "orderId");
  const clientOrderId = readString(value, "clientOrderId");
  const price = readNumber(value, "price");
  const size = readNumber(value, "size");
  if (!orderId || !clientOrderId || price === undefined || size === undefined) return undefined;
  return { orderId, clientOrderId, price, size, filledSize: readNumber(value, "filledSize") ?? 0 };
}

function parseEntryOrderRef(value: unknown): EntryOrderRef | undefined {
  if (!isRecord(value)) return undefined;
  const index = readNumber(value, "index");
  const orderId = readString(value, "orderId");
  const clientOrderId = readString(value, "clientOrderId");
  const price = readNumber(value, "price");
  const size = readNumber(value, "size");
  if (index === undefined || !orderId || !clientOrderId || price === undefined || size === undefined) return undefined;
  return {
    index,
    orderId,
    clientOrderId,
    price,
    size,
    filledSize: readNumber(value, "filledSize") ?? 0,
    avgFillPrice: readNumber(value, "avgFillPrice"),
  };
}
