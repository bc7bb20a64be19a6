import type { Messenger } from "../channels/adapter.js";
import type { Logger } from "../logging/logger.js";
import { escapeHtml } from "../utils/html.js";

/** Telegram caps messages at 4096 characters; leave room for the closing tag. */
const MAX_BODY_LENGTH = 4090;
const HEADER = "An exception was raised while handling an update\n";

export interface ErrorContext {
  readonly channelId?: string;
  readonly chatId?: string;
  readonly messageId?: string;
}

export function formatErrorReport(err: unknown): string {
  const detail =
    err instanceof Error ? (err.stack ?? `${err.name}: ${err.message}`) : String(err);
  const cause =
    err instanceof Error && err.cause !== undefined
      ? `\nCaused by: ${err.cause instanceof Error ? (err.cause.stack ?? err.cause.message) : String(err.cause)}`
      : "";
  const body = `${HEADER}<pre>${escapeHtml(detail + cause)}`;
  // A cut through an entity would make the whole message unparseable
  const truncated = body.slice(0, MAX_BODY_LENGTH).replace(/&[a-z0-9#]*$/i, "");
  return truncated + "</pre>";
}

/**
 * Last stop for failures nobody handled: logs them and forwards the
 * diagnostic to the operator chat. Never rejects.
 */
export class ErrorReporter {
  private readonly logger: Logger;

  constructor(
    private readonly messenger: Messenger,
    private readonly operatorChatId: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "error-reporter" });
  }

  async report(err: unknown, context: ErrorContext = {}): Promise<void> {
    this.logger.error({ err, ...context }, "Exception while handling an update");
    try {
      await this.messenger.sendText({
        to: this.operatorChatId,
        text: formatErrorReport(err),
        parseMode: "HTML",
      });
    } catch (sendErr) {
      this.logger.error({ err: sendErr }, "Failed to notify operator");
    }
  }
}
