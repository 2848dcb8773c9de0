import { promises as fs } from "fs";
import type { Ledger } from "../ledger/ledger";
import { isRecord } from "../utils/json.util";
import { describeError } from "../utils/logger.util";
import type { KillSwitchLevel, KillSwitchReading } from "./types";

export const KILL_SWITCH_ENV_KEY = "TRADER_KILL_SWITCH";
export const KILL_SWITCH_FLAG = "kill_switch";

const SAFE_VALUES = new Set(["safe", "safe_mode", "1", "true"]);
const PANIC_VALUES = new Set(["panic", "panic_close", "2"]);

/**
 * File presence is itself the signal: empty or unrecognized content means SAFE_MODE
 */
export function parseKillSwitchFileContent(content: string): KillSwitchLevel {
  const value = content.trim().toLowerCase();
  if (PANIC_VALUES.has(value)) return "panic";
  return "safe";
}

/**
 * Env and stored flags must name a level; anything else is ignored
 */
export function parseKillSwitchValue(raw: string | undefined): KillSwitchLevel {
  const value = (raw ?? "").trim().toLowerCase();
  if (SAFE_VALUES.has(value)) return "safe";
  if (PANIC_VALUES.has(value)) return "panic";
  return "none";
}

export interface KillSwitchOptions {
  /** Empty disables the file source */
  filePath: string;
  ledger: Ledger;
  env?: Record<string, string | undefined>;
}

/**
 * Reads the external kill switch. Sources in priority order: file, env, stored flag.
 * Only a missing file is "not set".
 */
export class KillSwitch {
  constructor(private readonly options: KillSwitchOptions) {}

  async read(): Promise<KillSwitchReading> {
    let fileContent: string | undefined;
    try {
      fileContent = await this.readFile();
    } catch (err) {
      // a switch file that exists but cannot be read counts as set
      return { level: "safe", source: "file", raw: `unreadable: ${describeError(err)}` };
    }
    if (fileContent !== undefined) {
      return { level: parseKillSwitchFileContent(fileContent), source: "file", raw: fileContent.trim() };
    }

    const env = this.options.env ?? process.env;
    const envRaw = env[KILL_SWITCH_ENV_KEY];
    const envLevel = parseKillSwitchValue(envRaw);
    if (envLevel !== "none") return { level: envLevel, source: "env", raw: envRaw };

    const flagRaw = this.options.ledger.getFlag(KILL_SWITCH_FLAG);
    const flagLevel = parseKillSwitchValue(flagRaw);
    if (flagLevel !== "none") return { level: flagLevel, source: "flag", raw: flagRaw };

    return { level: "none", source: "none" };
  }

  /** Operator command: persist a stored kill-switch flag (null clears it) */
  async setFlag(value: "safe" | "panic" | null): Promise<void> {
    await this.options.ledger.setFlag(KILL_SWITCH_FLAG, value);
  }

  private async readFile(): Promise<string | undefined> {
    if (!this.options.filePath) return undefined;
    try {
      return await fs.readFile(this.options.filePath, "utf8");
    } catch (err) {
      if (isRecord(err) && err.code === "ENOENT") return undefined;
      throw err;
    }
  }
}
