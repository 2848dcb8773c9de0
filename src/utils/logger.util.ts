import chalk from "chalk";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

/**
 * Log levels for filtering output
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEBUG_LEVELS = new Set(["debug", "trace"]);

const resolveLevelFromEnv = (): LogLevel => {
  const read = (key: string): string | undefined =>
    process.env[key] ?? process.env[key.toLowerCase()];
  if (read("DEBUG") === "1") {
    return "debug";
  }
  const logLevel = (read("LOG_LEVEL") ?? "").toLowerCase();
  if (DEBUG_LEVELS.has(logLevel)) return "debug";
  if (logLevel === "warn" || logLevel === "error") return logLevel;
  return "info";
};

export interface ConsoleLoggerOptions {
  /** Minimum level to print (default: LOG_LEVEL / DEBUG env, else "info") */
  level?: LogLevel;
  /** Prepend an ISO timestamp to every line (default: false) */
  includeTimestamp?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly minPriority: number;
  private readonly includeTimestamp: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minPriority = LOG_LEVEL_PRIORITY[options.level ?? resolveLevelFromEnv()];
    this.includeTimestamp = options.includeTimestamp ?? false;
  }

  info(msg: string): void {
    if (!this.enabled("info")) return;
    console.log(chalk.cyan("[INFO]"), this.format(msg));
  }

  warn(msg: string): void {
    if (!this.enabled("warn")) return;
    console.warn(chalk.yellow("[WARN]"), this.format(msg));
  }

  error(msg: string, err?: Error): void {
    console.error(
      chalk.red("[ERROR]"),
      this.format(msg),
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.enabled("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), this.format(msg));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= this.minPriority;
  }

  private format(msg: string): string {
    return this.includeTimestamp ? `${new Date().toISOString()} ${msg}` : msg;
  }
}

/**
 * Create a no-op logger (useful for testing)
 */
export function createNullLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  };
}

/**
 * Format an error for a single log line
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
