import type { ChatType } from "../channels/adapter.js";
import { INITIAL_STATE, type ConversationState } from "./state.js";

export interface ConversationKey {
  readonly channelId: string;
  readonly chatId: string;
  readonly senderId: string;
  readonly chatType: ChatType;
}

/** Conversation state per (channel, chat, sender). Lives as long as the process. */
export class ConversationStore {
  private readonly states = new Map<string, ConversationState>();

  buildKey(key: ConversationKey): string {
    return `${key.channelId}:${key.chatType}:${key.chatId}:${key.senderId}`;
  }

  get(key: ConversationKey): ConversationState {
    return this.states.get(this.buildKey(key)) ?? INITIAL_STATE;
  }

  set(key: ConversationKey, state: ConversationState): void {
    const k = this.buildKey(key);
    // The initial state is the default, so it needs no entry
    if (state === INITIAL_STATE) {
      this.states.delete(k);
    } else {
      this.states.set(k, state);
    }
  }

  get size(): number {
    return this.states.size;
  }
}
