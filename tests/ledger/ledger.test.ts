/**
 * Tests for the append-only ledger (memory and NDJSON file)
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { MemoryLedger } from "../../src/ledger/ledger";
import { FileLedger } from "../../src/ledger/file-ledger";
import { createNullLogger } from "../../src/utils/logger.util";

describe("MemoryLedger", () => {
  it("should assign sequence numbers and freeze records", async () => {
    const ledger = new MemoryLedger(() => 1234);

    const first = await ledger.append({ kind: "SIGNAL_RECEIVED", signalId: "s1", data: { symbol: "BTCUSDT" } });
    const second = await ledger.append({ kind: "RISK_DECISION", signalId: "s1", at: 99, data: {} });

    assert.strictEqual(first.seq, 1);
    assert.strictEqual(first.at, 1234);
    assert.strictEqual(second.seq, 2);
    assert.strictEqual(second.at, 99);
    assert.strictEqual(Object.isFrozen(first), true);
    assert.strictEqual(Object.isFrozen(first.data), true);
    assert.strictEqual(ledger.size(), 2);
  });

  it("should index by signal and source key", async () => {
    const ledger = new MemoryLedger();
    await ledger.append({ kind: "SIGNAL_RECEIVED", signalId: "s1", sourceKey: "c:1:v1", data: {} });
    await ledger.append({ kind: "SIGNAL_RECEIVED", signalId: "s2", sourceKey: "c:2:v1", data: {} });

    assert.strictEqual(ledger.hasExecutionDecision("s1"), false);
    await ledger.append({ kind: "RISK_DECISION", signalId: "s1", data: { status: "accepted" } });

    assert.strictEqual(ledger.hasExecutionDecision("s1"), true);
    assert.strictEqual(ledger.findBySignalId("s1").length, 2);
    assert.strictEqual(ledger.findBySignalId("s1", "RISK_DECISION").length, 1);
    assert.deepStrictEqual(
      ledger.findBySourceKey("c:2:v1").map((r) => r.signalId),
      ["s2"],
    );
  });

  it("should track protection from the latest PROTECTION record", async () => {
    const ledger = new MemoryLedger();
    await ledger.append({ kind: "PROTECTION", positionKey: "BTCUSDT:LONG", data: { status: "active" } });
    assert.strictEqual(ledger.hasProtectiveOrder("BTCUSDT:LONG"), true);

    await ledger.append({ kind: "PROTECTION", positionKey: "BTCUSDT:LONG", data: { status: "removed" } });
    assert.strictEqual(ledger.hasProtectiveOrder("BTCUSDT:LONG"), false);
    assert.strictEqual(ledger.hasProtectiveOrder("ETHUSDT:SHORT"), false);
  });

  it("should filter queries by kind, symbol, position and time", async () => {
    let now = 100;
    const ledger = new MemoryLedger(() => now);
    await ledger.append({ kind: "FILL", symbol: "BTCUSDT", positionKey: "BTCUSDT:LONG", data: {} });
    now = 200;
    await ledger.append({ kind: "FILL", symbol: "ETHUSDT", positionKey: "ETHUSDT:SHORT", data: {} });
    await ledger.append({ kind: "ALERT", symbol: "BTCUSDT", data: {} });

    assert.strictEqual(ledger.query({ kind: "FILL" }).length, 2);
    assert.strictEqual(ledger.query({ symbol: "BTCUSDT" }).length, 2);
    assert.strictEqual(ledger.query({ positionKey: "ETHUSDT:SHORT" }).length, 1);
    assert.strictEqual(ledger.query({ kind: "FILL", since: 150 }).length, 1);
    assert.strictEqual(ledger.query().length, 3);
  });

  it("should set and clear flags through FLAG records", async () => {
    const ledger = new MemoryLedger();
    await ledger.setFlag("kill_switch", "panic");
    assert.strictEqual(ledger.getFlag("kill_switch"), "panic");

    await ledger.setFlag("kill_switch", null);
    assert.strictEqual(ledger.getFlag("kill_switch"), undefined);
    assert.strictEqual(ledger.query({ kind: "FLAG" }).length, 2);
  });
});

describe("FileLedger", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ledger-test-"));
    file = path.join(dir, "nested", "ledger.ndjson");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write one JSON line per record", async () => {
    const ledger = new FileLedger(file, createNullLogger(), () => 42);
    await ledger.open();
    await ledger.append({ kind: "SIGNAL_RECEIVED", signalId: "s1", data: { n: 1 } });
    await ledger.append({ kind: "RISK_DECISION", signalId: "s1", data: { n: 2 } });

    const lines = (await fs.readFile(file, "utf8")).trim().split("\n");
    assert.strictEqual(lines.length, 2);
    assert.deepStrictEqual(JSON.parse(lines[0]), {
      kind: "SIGNAL_RECEIVED",
      signalId: "s1",
      data: { n: 1 },
      seq: 1,
      at: 42,
    });
  });

  it("should rebuild indexes and continue the sequence after a restart", async () => {
    const first = new FileLedger(file, createNullLogger());
    await first.open();
    await first.append({ kind: "RISK_DECISION", signalId: "s1", sourceKey: "c:1:v1", data: {} });
    await first.append({ kind: "PROTECTION", positionKey: "BTCUSDT:LONG", data: { status: "active" } });
    await first.setFlag("kill_switch", "safe");

    const reopened = new FileLedger(file, createNullLogger());
    await reopened.open();

    assert.strictEqual(reopened.size(), 3);
    assert.strictEqual(reopened.hasExecutionDecision("s1"), true);
    assert.strictEqual(reopened.findBySourceKey("c:1:v1").length, 1);
    assert.strictEqual(reopened.hasProtectiveOrder("BTCUSDT:LONG"), true);
    assert.strictEqual(reopened.getFlag("kill_switch"), "safe");

    const next = await reopened.append({ kind: "ALERT", data: {} });
    assert.strictEqual(next.seq, 4);
  });

  it("should skip unreadable lines", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(
      file,
      [
        JSON.stringify({ seq: 1, kind: "FILL", at: 1, data: {} }),
        "{broken",
        JSON.stringify({ seq: 2, kind: "NOT_A_KIND", at: 2, data: {} }),
        "",
      ].join("\n"),
    );

    const ledger = new FileLedger(file, createNullLogger());
    await ledger.open();
    assert.strictEqual(ledger.size(), 1);
  });
});
