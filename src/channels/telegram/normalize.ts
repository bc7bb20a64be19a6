import type { Context } from "grammy";
import type { InboundMessage } from "../adapter.js";

export function normalizeTelegramMessage(ctx: Context): InboundMessage | null {
  const msg = ctx.message;
  if (!msg) return null;

  const chat = msg.chat;
  const from = msg.from;
  if (!from) return null;

  // "group" and "supergroup" are multi-party; channels never reach a bot as messages
  const chatType: "dm" | "group" =
    chat.type === "private" ? "dm" : "group";

  return {
    id: String(msg.message_id),
    channelId: "telegram",
    senderId: String(from.id),
    senderName:
      from.first_name + (from.last_name ? ` ${from.last_name}` : ""),
    chatId: String(chat.id),
    chatType,
    text: msg.text,
    timestamp: msg.date * 1000,
    raw: msg,
  };
}
