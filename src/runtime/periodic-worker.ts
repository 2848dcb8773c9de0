import { describeError, toError, type Logger } from "../utils/logger.util";

export interface PeriodicWorkerOptions {
  name: string;
  intervalMs: number;
  task: () => Promise<void>;
  logger: Logger;
  /** Run once immediately on start (default: true) */
  runOnStart?: boolean;
}

/**
 * Runs a named task on an interval. A tick that lands while the previous run
 * is still going is skipped, so runs never overlap.
 */
export class PeriodicWorker {
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<void> | null = null;
  private runs = 0;
  private failures = 0;
  private skipped = 0;
  private lastRunAt: number | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: PeriodicWorkerOptions) {}

  get name(): string {
    return this.options.name;
  }

  start(): void {
    if (this.timer) return;
    this.options.logger.debug(`[Worker] ${this.options.name} every ${this.options.intervalMs}ms`);
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    if (this.options.runOnStart ?? true) void this.runOnce();
  }

  /** Stop scheduling and wait for the in-flight run */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) await this.inFlight;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * One run of the task. Failures are logged and counted, never thrown.
   */
  runOnce(): Promise<void> {
    if (this.inFlight) {
      this.skipped++;
      return this.inFlight;
    }
    this.inFlight = this.execute().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  getStats(): { runs: number; failures: number; skipped: number; lastRunAt: number | null; lastError: string | null } {
    return {
      runs: this.runs,
      failures: this.failures,
      skipped: this.skipped,
      lastRunAt: this.lastRunAt,
      lastError: this.lastError,
    };
  }

  private async execute(): Promise<void> {
    this.runs++;
    this.lastRunAt = Date.now();
    try {
      await this.options.task();
      this.lastError = null;
    } catch (err) {
      this.failures++;
      this.lastError = describeError(err);
      this.options.logger.error(`[Worker] ${this.options.name} failed`, toError(err));
    }
  }
}
