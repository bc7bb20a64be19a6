import type { TypedEventEmitter } from "../utils/typed-emitter.js";

export type ChatType = "dm" | "group";

export interface InboundMessage {
  readonly id: string;
  readonly channelId: string;
  readonly senderId: string;
  readonly senderName: string;
  readonly chatId: string;
  readonly chatType: ChatType;
  readonly text?: string;
  readonly timestamp: number;
  readonly raw: unknown;
}

export interface SendTextParams {
  readonly to: string;
  readonly text: string;
  readonly replyToId?: string;
  readonly parseMode?: "HTML";
}

export interface SendImageParams {
  readonly to: string;
  /** Remote URL the transport fetches the image from. */
  readonly url: string;
  readonly caption?: string;
}

export interface ChannelEvents {
  message: [msg: InboundMessage];
  error: [err: Error];
  connected: [];
  disconnected: [reason?: string];
}

/** Outbound operations the dispatch core needs from a transport. */
export interface Messenger {
  sendText(params: SendTextParams): Promise<{ messageId: string }>;
  sendImage(params: SendImageParams): Promise<{ messageId: string }>;
  sendTyping(params: { to: string }): Promise<void>;
}

export interface ChannelAdapter extends Messenger {
  readonly id: string;
  readonly label: string;
  readonly events: TypedEventEmitter<ChannelEvents>;

  start(token: string, signal: AbortSignal): Promise<void>;
  stop(): Promise<void>;
}
