import type { Side } from "./trade.types";

/**
 * Identity of the source message a signal was extracted from.
 * Re-edits of the same message produce a higher version.
 */
export interface SignalSource {
  chatId: string;
  messageId: string;
  version: number;
}

export interface EntryRange {
  low: number;
  high: number;
}

export interface EntrySignal {
  kind: "ENTRY_SIGNAL";
  signalId: string;
  source: SignalSource;
  symbol: string;
  side: Side;
  entry: EntryRange;
  /** Prices of a laddered entry in fill order; absent for a single entry */
  entryPoints?: number[];
  stopLoss?: number;
  takeProfits: number[];
  leverage?: number;
  /** Signal quality score in [0, 1] */
  quality: number;
  /** Extraction confidence in [0, 1] */
  confidence: number;
  receivedAt: number;
}

export type ManageActionKind = "reduce_pct" | "move_sl_to_be" | "take_profit";

export interface ManageAction {
  kind: "MANAGE_ACTION";
  signalId: string;
  source: SignalSource;
  symbol: string;
  action: ManageActionKind;
  /** Percentage of the open position, 0 < pct <= 100 */
  pct?: number;
  price?: number;
  receivedAt: number;
}

export interface NonSignal {
  kind: "NON_SIGNAL";
  signalId: string;
  source: SignalSource;
  reason: string;
  receivedAt: number;
}

export type SignalIntent = EntrySignal | ManageAction | NonSignal;

export function sourceKey(source: SignalSource): string {
  return `${source.chatId}:${source.messageId}:v${source.version}`;
}

/** Message identity without version, shared by every edit of one message */
export function messageKey(source: SignalSource): string {
  return `${source.chatId}:${source.messageId}`;
}
