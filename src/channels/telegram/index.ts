import { Bot } from "grammy";
import type {
  ChannelAdapter,
  ChannelEvents,
  SendImageParams,
  SendTextParams,
} from "../adapter.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import { normalizeTelegramMessage } from "./normalize.js";
import * as send from "./send.js";

export class TelegramAdapter implements ChannelAdapter {
  readonly id = "telegram";
  readonly label = "Telegram";
  readonly events = new TypedEventEmitter<ChannelEvents>();

  private bot: Bot | null = null;
  private botUserId: string | null = null;

  async start(token: string, signal: AbortSignal): Promise<void> {
    if (!token) throw new Error("Telegram bot token is required");

    this.bot = new Bot(token);

    this.bot.on("message:text", (ctx) => {
      if (this.botUserId && String(ctx.from?.id) === this.botUserId) return;
      const msg = normalizeTelegramMessage(ctx);
      if (msg) this.events.emit("message", msg);
    });

    this.bot.catch((err) => {
      this.events.emit("error", err.error instanceof Error ? err.error : new Error(String(err.error)));
    });

    signal.addEventListener("abort", () => {
      this.stopPolling().catch((err: unknown) => {
        this.events.emit("error", err instanceof Error ? err : new Error(String(err)));
      });
    });

    const botInfo = await this.bot.api.getMe();
    this.botUserId = String(botInfo.id);

    // bot.start() resolves only once polling stops
    this.bot.start({ drop_pending_updates: true }).catch((err: unknown) => {
      this.events.emit("error", err instanceof Error ? err : new Error(String(err)));
    });
    this.events.emit("connected");
  }

  async stop(): Promise<void> {
    await this.stopPolling();
    this.bot = null;
    this.events.emit("disconnected", "stopped");
  }

  async sendText(params: SendTextParams): Promise<{ messageId: string }> {
    return send.sendText(this.requireBot(), params);
  }

  async sendImage(params: SendImageParams): Promise<{ messageId: string }> {
    return send.sendImage(this.requireBot(), params);
  }

  async sendTyping(params: { to: string }): Promise<void> {
    await send.sendTyping(this.requireBot(), params.to);
  }

  private requireBot(): Bot {
    if (!this.bot) throw new Error("Telegram bot not started");
    return this.bot;
  }

  private async stopPolling(): Promise<void> {
    if (this.bot?.isRunning()) await this.bot.stop();
  }
}
