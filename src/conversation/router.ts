import type { InboundMessage, Messenger } from "../channels/adapter.js";
import type { LimitsConfig } from "../config/types.js";
import type { AdmissionController } from "../dispatch/controller.js";
import * as messages from "../dispatch/messages.js";
import { hashIdentity } from "../ledger/identity.js";
import type { Logger } from "../logging/logger.js";
import { parseConversationEvent } from "./commands.js";
import { resolveTransition, stateAfterDispatch, type ConversationState } from "./state.js";
import type { ConversationKey, ConversationStore } from "./store.js";

export interface ConversationRouterDeps {
  readonly controller: AdmissionController;
  readonly messenger: Messenger;
  readonly store: ConversationStore;
  readonly limits: LimitsConfig;
  readonly identitySalt: string;
  readonly logger: Logger;
}

export class ConversationRouter {
  private readonly logger: Logger;

  constructor(private readonly deps: ConversationRouterDeps) {
    this.logger = deps.logger.child({ component: "conversation" });
  }

  /**
   * Applies one inbound message to its conversation and returns the new
   * state. When dispatch throws, the state is left as it was.
   */
  async handleInbound(msg: InboundMessage): Promise<ConversationState> {
    const key: ConversationKey = {
      channelId: msg.channelId,
      chatId: msg.chatId,
      senderId: msg.senderId,
      chatType: msg.chatType,
    };
    const { store, messenger } = this.deps;
    const state = store.get(key);
    const event = parseConversationEvent(msg.text ?? "");
    const action = resolveTransition(state, event);

    const log = this.logger.child({ chat: msg.chatId, state, event: event.kind });
    if (!action) {
      log.debug("Message ignored in current state");
      return state;
    }

    let next: ConversationState;
    switch (action) {
      case "greet":
        await messenger.sendText({ to: msg.chatId, text: messages.greeting(this.deps.limits) });
        next = "awaiting_command";
        break;
      case "reset":
        next = "awaiting_command";
        break;
      case "dispatch": {
        const prompt = event.kind === "generate" ? event.prompt : event.kind === "text" ? event.text : "";
        const outcome = await this.deps.controller.admitAndDispatch({
          identity: hashIdentity(msg.senderId, this.deps.identitySalt),
          prompt,
          chatId: msg.chatId,
          chatType: msg.chatType,
        });
        next = stateAfterDispatch(outcome);
        break;
      }
    }

    store.set(key, next);
    log.debug({ next }, "Conversation transition");
    return next;
  }
}
