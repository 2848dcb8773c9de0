/**
 * Tests for kill switch parsing and source priority
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import {
  KillSwitch,
  parseKillSwitchFileContent,
  parseKillSwitchValue,
} from "../../src/safety/kill-switch";
import { MemoryLedger } from "../../src/ledger/ledger";

describe("parseKillSwitchFileContent", () => {
  it("should read panic values as panic", () => {
    assert.strictEqual(parseKillSwitchFileContent("PANIC\n"), "panic");
    assert.strictEqual(parseKillSwitchFileContent("panic_close"), "panic");
    assert.strictEqual(parseKillSwitchFileContent("2"), "panic");
  });

  it("should read anything else, including an empty file, as safe", () => {
    assert.strictEqual(parseKillSwitchFileContent(""), "safe");
    assert.strictEqual(parseKillSwitchFileContent("stop please"), "safe");
  });
});

describe("parseKillSwitchValue", () => {
  it("should map named levels and ignore the rest", () => {
    assert.strictEqual(parseKillSwitchValue("safe_mode"), "safe");
    assert.strictEqual(parseKillSwitchValue("TRUE"), "safe");
    assert.strictEqual(parseKillSwitchValue("1"), "safe");
    assert.strictEqual(parseKillSwitchValue(" panic "), "panic");
    assert.strictEqual(parseKillSwitchValue("0"), "none");
    assert.strictEqual(parseKillSwitchValue(""), "none");
    assert.strictEqual(parseKillSwitchValue(undefined), "none");
  });
});

describe("KillSwitch", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "kill-switch-test-"));
    file = path.join(dir, "KILL");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should report none when no source is set", async () => {
    const killSwitch = new KillSwitch({ filePath: file, ledger: new MemoryLedger(), env: {} });
    assert.deepStrictEqual(await killSwitch.read(), { level: "none", source: "none" });
  });

  it("should prefer the file over env and the stored flag", async () => {
    const ledger = new MemoryLedger();
    await ledger.setFlag("kill_switch", "safe");
    await fs.writeFile(file, "panic\n");
    const killSwitch = new KillSwitch({ filePath: file, ledger, env: { TRADER_KILL_SWITCH: "safe" } });

    assert.deepStrictEqual(await killSwitch.read(), { level: "panic", source: "file", raw: "panic" });
  });

  it("should fall back to env, then to the stored flag", async () => {
    const ledger = new MemoryLedger();
    const withEnv = new KillSwitch({ filePath: file, ledger, env: { TRADER_KILL_SWITCH: "panic" } });
    assert.deepStrictEqual(await withEnv.read(), { level: "panic", source: "env", raw: "panic" });

    const withFlag = new KillSwitch({ filePath: file, ledger, env: { TRADER_KILL_SWITCH: "off" } });
    await withFlag.setFlag("safe");
    assert.deepStrictEqual(await withFlag.read(), { level: "safe", source: "flag", raw: "safe" });

    await withFlag.setFlag(null);
    assert.strictEqual((await withFlag.read()).level, "none");
  });

  it("should read an unreadable file as safe", async () => {
    const killSwitch = new KillSwitch({ filePath: dir, ledger: new MemoryLedger(), env: {} });
    const reading = await killSwitch.read();

    assert.strictEqual(reading.level, "safe");
    assert.strictEqual(reading.source, "file");
    assert.match(reading.raw ?? "", /^unreadable: /);
  });

  it("should ignore the file source when no path is configured", async () => {
    await fs.writeFile(file, "panic");
    const killSwitch = new KillSwitch({ filePath: "", ledger: new MemoryLedger(), env: {} });
    assert.strictEqual((await killSwitch.read()).level, "none");
  });
});
