import type { Bot } from "grammy";
import type { SendImageParams, SendTextParams } from "../adapter.js";

export async function sendText(
  bot: Bot,
  params: SendTextParams,
): Promise<{ messageId: string }> {
  const msg = await bot.api.sendMessage(params.to, params.text, {
    reply_parameters: params.replyToId
      ? { message_id: Number(params.replyToId) }
      : undefined,
    parse_mode: params.parseMode,
  });
  return { messageId: String(msg.message_id) };
}

/** Telegram downloads the image from the URL itself. */
export async function sendImage(
  bot: Bot,
  params: SendImageParams,
): Promise<{ messageId: string }> {
  const msg = await bot.api.sendPhoto(params.to, params.url, {
    caption: params.caption,
  });
  return { messageId: String(msg.message_id) };
}

export async function sendTyping(bot: Bot, to: string): Promise<void> {
  await bot.api.sendChatAction(to, "typing");
}
