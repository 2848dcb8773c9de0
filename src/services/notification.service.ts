/**
 * Notification Service
 *
 * Fire-and-forget delivery of operator-facing events:
 * - PENDING_CONFIRMATION and notify-only signals
 * - stop-loss mode and price feed fallbacks
 * - safety-state transitions and reconciliation findings
 *
 * Delivery failure is logged and never reaches the caller.
 *
 * Configuration via environment variables:
 * - TELEGRAM_BOT_TOKEN: Bot token from @BotFather
 * - TELEGRAM_CHAT_ID: Chat ID (can be a group or user)
 * - TELEGRAM_TOPIC_ID: Optional topic ID for forum-style groups
 * - TELEGRAM_SILENT: Send notifications silently without sound (default: false)
 */

import type { NotificationConfig } from "../config/schema";
import { describeError, type Logger } from "../utils/logger.util";

export type NotificationLevel = "info" | "warn" | "critical";

export interface NotificationEvent {
  traceId: string;
  level: NotificationLevel;
  /** Stable machine-readable code, e.g. SAFETY_TRANSITION, STOP_LOSS_MODE_FALLBACK */
  code: string;
  message: string;
  symbol?: string;
  at: number;
}

export interface NotificationSink {
  readonly name: string;
  /** Resolves to whether delivery succeeded; never rejects */
  notify(event: NotificationEvent): Promise<boolean>;
}

const LEVEL_ICON: Record<NotificationLevel, string> = {
  info: "ℹ️",
  warn: "⚠️",
  critical: "🚨",
};

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatNotification(event: NotificationEvent): string {
  const lines = [
    `${LEVEL_ICON[event.level]} <b>${escapeHtml(event.code)}</b>`,
    escapeHtml(event.message),
  ];
  if (event.symbol) lines.push(`Symbol: <code>${escapeHtml(event.symbol)}</code>`);
  lines.push(`Trace: <code>${event.traceId}</code>`);
  return lines.join("\n");
}

export type FetchFn = (input: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

/**
 * Telegram Bot API sink
 */
export class TelegramNotificationSink implements NotificationSink {
  readonly name = "telegram";
  private readonly enabled: boolean;

  constructor(
    private readonly config: NotificationConfig,
    private readonly logger: Logger,
    private readonly fetchFn: FetchFn = fetch,
  ) {
    this.enabled = Boolean(config.telegramBotToken && config.telegramChatId);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async notify(event: NotificationEvent): Promise<boolean> {
    if (!this.enabled) return false;

    try {
      const url = `https://api.telegram.org/bot${this.config.telegramBotToken}/sendMessage`;
      const body: Record<string, string | number | boolean> = {
        chat_id: this.config.telegramChatId,
        text: formatNotification(event),
        parse_mode: "HTML",
        disable_web_page_preview: true,
        disable_notification: this.config.silent,
      };

      if (this.config.telegramTopicId) {
        const topicIdNum = Number.parseInt(this.config.telegramTopicId, 10);
        if (Number.isNaN(topicIdNum)) {
          this.logger.warn(
            `[Notify] Invalid TELEGRAM_TOPIC_ID value "${this.config.telegramTopicId}" - skipping message_thread_id`,
          );
        } else {
          body.message_thread_id = topicIdNum;
        }
      }

      const response = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        const errorText = await response.text();
        this.logger.warn(`[Notify] Telegram HTTP ${response.status}: ${errorText.slice(0, 200)}`);
        return false;
      }
      return true;
    } catch (err) {
      this.logger.warn(`[Notify] Telegram delivery failed: ${describeError(err)}`);
      return false;
    }
  }
}

/**
 * Writes notifications to the log; the default when nothing else is configured
 */
export class LogNotificationSink implements NotificationSink {
  readonly name = "log";

  constructor(private readonly logger: Logger) {}

  async notify(event: NotificationEvent): Promise<boolean> {
    const line = `[Notify] ${event.code}${event.symbol ? ` ${event.symbol}` : ""}: ${event.message} (trace=${event.traceId})`;
    if (event.level === "critical") this.logger.error(line);
    else if (event.level === "warn") this.logger.warn(line);
    else this.logger.info(line);
    return true;
  }
}

/**
 * Fans out to several sinks; succeeds if any sink delivered
 */
export class CompositeNotificationSink implements NotificationSink {
  readonly name = "composite";

  constructor(private readonly sinks: NotificationSink[]) {}

  async notify(event: NotificationEvent): Promise<boolean> {
    const results = await Promise.all(this.sinks.map((sink) => sink.notify(event)));
    return results.some(Boolean);
  }
}
