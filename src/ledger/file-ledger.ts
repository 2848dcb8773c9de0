import { promises as fs } from "fs";
import path from "path";
import { isRecord } from "../utils/json.util";
import type { Logger } from "../utils/logger.util";
import { MemoryLedger, isLedgerRecordKind, type LedgerRecord } from "./ledger";

function toLedgerRecord(value: unknown): LedgerRecord | undefined {
  if (!isRecord(value)) return undefined;
  const { seq, kind, at, data } = value;
  if (typeof seq !== "number" || typeof at !== "number") return undefined;
  if (typeof kind !== "string" || !isLedgerRecordKind(kind) || !isRecord(data)) return undefined;
  const optional = (key: string): string | undefined => {
    const field = value[key];
    return typeof field === "string" ? field : undefined;
  };
  return {
    seq,
    kind,
    at,
    data,
    signalId: optional("signalId"),
    sourceKey: optional("sourceKey"),
    symbol: optional("symbol"),
    positionKey: optional("positionKey"),
    traceId: optional("traceId"),
  };
}

/**
 * NDJSON ledger on disk. Writes are serialized so lines land in sequence order;
 * open() replays the file to rebuild every index.
 */
export class FileLedger extends MemoryLedger {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
    now: () => number = Date.now,
  ) {
    super(now);
  }

  async open(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    let content = "";
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (!(isRecord(err) && err.code === "ENOENT")) throw err;
      this.logger.info(`[Ledger] Starting new ledger at ${this.filePath}`);
    }

    let skipped = 0;
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skipped++;
        continue;
      }
      const record = toLedgerRecord(parsed);
      if (record) this.index(record);
      else skipped++;
    }
    if (skipped > 0) {
      this.logger.warn(`[Ledger] Skipped ${skipped} unreadable line(s) in ${this.filePath}`);
    }
    this.logger.info(`[Ledger] Loaded ${this.size()} record(s) from ${this.filePath}`);
  }

  protected async persist(record: LedgerRecord): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const write = this.writeQueue.then(() => fs.appendFile(this.filePath, line, { encoding: "utf8" }));
    this.writeQueue = write.catch((err: unknown) => {
      this.logger.error(`[Ledger] append failed: ${String(err)}`);
    });
    await write;
  }
}
