import crypto from "node:crypto";

/**
 * Exchange client order id: short prefix plus random hex, well within
 * the 50-character limit venues put on client ids.
 */
export function newClientOrderId(prefix: string): string {
  return `${prefix}-${crypto.randomBytes(8).toString("hex")}`;
}

/** Correlation id attached to alerts and ledger records */
export function newTraceId(): string {
  return crypto.randomBytes(6).toString("hex");
}
