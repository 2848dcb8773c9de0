import type { Ledger } from "../ledger/ledger";
import { newTraceId } from "../utils/id.util";
import { describeError, type Logger } from "../utils/logger.util";
import type { NotificationEvent, NotificationLevel, NotificationSink } from "./notification.service";

export type AlertLevel = NotificationLevel;

const LEVEL_PRIORITY: Record<AlertLevel, number> = { info: 0, warn: 1, critical: 2 };

export function isAlertLevel(value: string): value is AlertLevel {
  return value === "info" || value === "warn" || value === "critical";
}

export interface AlertOptions {
  symbol?: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface AlertManagerDeps {
  ledger: Ledger;
  sink: NotificationSink;
  logger: Logger;
  /** Alerts below this level are logged and ledgered but not sent (default: info) */
  minLevel?: AlertLevel;
  now?: () => number;
}

/**
 * Structured operator alerts. Each alert gets a trace id, is logged,
 * appended to the ledger, and sent to the notification sink without
 * waiting for delivery.
 */
export class AlertManager {
  private readonly minLevel: AlertLevel;
  private readonly now: () => number;
  private pendingDeliveries = 0;

  constructor(private readonly deps: AlertManagerDeps) {
    this.minLevel = deps.minLevel ?? "info";
    this.now = deps.now ?? Date.now;
  }

  async emit(level: AlertLevel, code: string, message: string, options: AlertOptions = {}): Promise<NotificationEvent> {
    const event: NotificationEvent = {
      traceId: options.traceId ?? newTraceId(),
      level,
      code,
      message,
      symbol: options.symbol,
      at: this.now(),
    };

    const line = `[Alert] ${code}${event.symbol ? ` ${event.symbol}` : ""}: ${message} (trace=${event.traceId})`;
    if (level === "critical") this.deps.logger.error(line);
    else if (level === "warn") this.deps.logger.warn(line);
    else this.deps.logger.info(line);

    try {
      await this.deps.ledger.append({
        kind: "ALERT",
        symbol: event.symbol,
        traceId: event.traceId,
        data: { level, code, message, ...options.data },
      });
    } catch (err) {
      this.deps.logger.error(`[Alert] ledger append failed for ${code}: ${describeError(err)}`);
    }

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel]) {
      void this.deliver(event);
    }
    return event;
  }

  info(code: string, message: string, options?: AlertOptions): Promise<NotificationEvent> {
    return this.emit("info", code, message, options);
  }

  warn(code: string, message: string, options?: AlertOptions): Promise<NotificationEvent> {
    return this.emit("warn", code, message, options);
  }

  critical(code: string, message: string, options?: AlertOptions): Promise<NotificationEvent> {
    return this.emit("critical", code, message, options);
  }

  /** Deliveries started but not yet settled */
  getPendingDeliveries(): number {
    return this.pendingDeliveries;
  }

  private async deliver(event: NotificationEvent): Promise<void> {
    this.pendingDeliveries++;
    try {
      const delivered = await this.deps.sink.notify(event);
      if (!delivered) {
        this.deps.logger.debug(`[Alert] ${event.code} not delivered by ${this.deps.sink.name}`);
      }
    } catch (err) {
      this.deps.logger.warn(`[Alert] sink ${this.deps.sink.name} threw: ${describeError(err)}`);
    } finally {
      this.pendingDeliveries--;
    }
  }
}
