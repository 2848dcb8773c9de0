#!/usr/bin/env node
import "dotenv/config";
import readline from "readline";
import { loadConfig } from "../config";
import { ConsoleLogger, describeError, toError, type Logger } from "../utils/logger.util";
import { isRecord } from "../utils/json.util";
import { TraderRuntime } from "./runtime";

const STATUS_INTERVAL_MS = 60_000;

let runtime: TraderRuntime | undefined;
let statusTimer: NodeJS.Timeout | undefined;
let shuttingDown = false;

/**
 * One stdin line: an operator command ({"command": ...}) or a signal payload
 */
async function handleLine(line: string, app: TraderRuntime, logger: Logger): Promise<void> {
  const trimmed = line.trim();
  if (!trimmed) return;

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch (err) {
    logger.warn(`[Input] Not JSON, ignored: ${describeError(err)}`);
    return;
  }

  if (isRecord(payload) && typeof payload.command === "string") {
    await handleCommand(payload.command, payload, app, logger);
    return;
  }

  const result = await app.submit(payload);
  logger.info(`[Input] ${JSON.stringify(result)}`);
}

async function handleCommand(
  command: string,
  args: Record<string, unknown>,
  app: TraderRuntime,
  logger: Logger,
): Promise<void> {
  const operator = typeof args.operator === "string" ? args.operator : "stdin";
  switch (command) {
    case "health":
      logger.info(`[Health] ${JSON.stringify(app.health())}`);
      return;
    case "reset": {
      const reason = typeof args.reason === "string" ? args.reason : "manual reset";
      const transition = await app.supervisor.resetToNormal(operator, reason, { force: args.force === true });
      logger.info(transition ? `[Operator] Reset to NORMAL (v${transition.version})` : "[Operator] Reset refused");
      return;
    }
    case "kill": {
      const level = args.level;
      if (level !== "safe" && level !== "panic" && level !== null) {
        logger.warn('[Operator] kill needs level "safe", "panic" or null');
        return;
      }
      await app.killSwitch.setFlag(level);
      logger.info(`[Operator] Kill switch flag ${level === null ? "cleared" : `set to ${level}`} by ${operator}`);
      await app.evaluateSafety();
      return;
    }
    case "reconcile": {
      const report = await app.reconciliation.runOnce();
      logger.info(`[Operator] Reconciliation: ${report.findings.length} finding(s)`);
      return;
    }
    default:
      logger.warn(`[Operator] Unknown command "${command}"`);
  }
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger({ includeTimestamp: true });
  const config = loadConfig();

  logger.info(`Starting guarded signal trader (preset: ${config.preset}, ${config.dryRun ? "DRY RUN" : "LIVE"})`);
  const app = await TraderRuntime.create(config, logger);
  runtime = app;
  await app.start();

  statusTimer = setInterval(() => logger.info(`[Status] ${app.describe()}`), STATUS_INTERVAL_MS);

  const input = readline.createInterface({ input: process.stdin, terminal: false });
  let queue: Promise<void> = Promise.resolve();
  input.on("line", (line) => {
    // Lines are handled strictly in arrival order
    queue = queue
      .then(() => handleLine(line, app, logger))
      .catch((err: unknown) => logger.error("[Input] Line handling failed", toError(err)));
  });
  input.on("close", () => logger.info("[Input] stdin closed; workers keep running"));
}

/**
 * Graceful shutdown: stop workers and the price feed, then exit
 */
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n[Shutdown] Received ${signal}, cleaning up...`);
  if (statusTimer) clearInterval(statusTimer);
  if (runtime) await runtime.stop();
  console.log("[Shutdown] Cleanup complete, exiting...");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[Shutdown] Cleanup failed:", err);
      process.exit(1);
    });
  });
}

process.on("unhandledRejection", (reason) => {
  console.error("[UnhandledRejection]", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[UncaughtException]", error);
  setTimeout(() => process.exit(1), 1000);
});

main().catch((err) => {
  console.error("Fatal error in main():", err);
  process.exit(1);
});
