import type { ChatType, Messenger } from "../channels/adapter.js";
import type { LimitsConfig } from "../config/types.js";
import type { UsageLedger } from "../ledger/ledger.js";
import type { Logger } from "../logging/logger.js";
import { ProviderRequestRejected } from "../provider/errors.js";
import type { ImageProvider } from "../provider/types.js";
import { SerialLock } from "../utils/serial-lock.js";
import { startOfDay } from "../utils/time.js";
import * as messages from "./messages.js";
import type { DispatchOutcome } from "./outcome.js";

export interface DispatchRequest {
  readonly identity: number;
  readonly prompt: string;
  readonly chatId: string;
  readonly chatType: ChatType;
  readonly now?: Date;
}

export interface AdmissionControllerDeps {
  readonly ledger: UsageLedger;
  readonly provider: ImageProvider;
  readonly messenger: Messenger;
  readonly operatorChatId: string;
  readonly limits: LimitsConfig;
  readonly timeZone: string;
  readonly logger: Logger;
  readonly clock?: () => Date;
}

type AdmissionDecision =
  | { readonly admitted: true; readonly prompt: string; readonly isGroup: boolean }
  | { readonly admitted: false; readonly outcome: DispatchOutcome };

export class AdmissionController {
  private readonly lock = new SerialLock();
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: AdmissionControllerDeps) {
    this.logger = deps.logger.child({ component: "dispatch" });
    this.clock = deps.clock ?? (() => new Date());
  }

  async admitAndDispatch(request: DispatchRequest): Promise<DispatchOutcome> {
    const decision = await this.lock.run(() => this.admit(request));
    if (!decision.admitted) {
      await this.notifyRejection(request.chatId, decision.outcome);
      return decision.outcome;
    }

    const outcome = await this.dispatch(request, decision.prompt, decision.isGroup);
    this.logger.info({ identity: request.identity, outcome: outcome.kind }, "Request dispatched");
    return outcome;
  }

  /** Query and conditional append; runs inside the lock. */
  private async admit(request: DispatchRequest): Promise<AdmissionDecision> {
    const { ledger, limits, timeZone } = this.deps;
    const now = request.now ?? this.clock();
    const prompt = request.prompt.trim();

    const gap = ledger.timeSinceLast(request.identity, now);
    if (gap < limits.minRequestIntervalMs) {
      return {
        admitted: false,
        outcome: { kind: "too_soon", retryAfterMs: limits.minRequestIntervalMs - gap },
      };
    }

    const count = ledger.countSince(request.identity, startOfDay(now, timeZone));
    if (count > limits.maxRequestsPerDay) {
      return { admitted: false, outcome: { kind: "quota_exceeded", count } };
    }

    if (prompt === "") {
      return { admitted: false, outcome: { kind: "prompt_required" } };
    }

    const isGroup = request.chatType === "group";
    await ledger.record({
      isGroup,
      timestamp: now,
      prompt,
      size: limits.defaultSize,
      identity: request.identity,
    });
    return { admitted: true, prompt, isGroup };
  }

  private async notifyRejection(chatId: string, outcome: DispatchOutcome): Promise<void> {
    const { messenger, limits } = this.deps;
    switch (outcome.kind) {
      case "too_soon":
        this.logger.info({ retryAfterMs: outcome.retryAfterMs }, "Request too soon");
        await messenger.sendText({ to: chatId, text: messages.tooSoon(limits, outcome.retryAfterMs) });
        break;
      case "quota_exceeded":
        this.logger.info({ count: outcome.count }, "Daily quota exceeded");
        await messenger.sendText({ to: chatId, text: messages.quotaExceeded(limits) });
        break;
      case "prompt_required":
        await messenger.sendText({ to: chatId, text: messages.PROMPT_REQUIRED });
        break;
      default:
        break;
    }
  }

  private async dispatch(
    request: DispatchRequest,
    prompt: string,
    isGroup: boolean,
  ): Promise<DispatchOutcome> {
    const { messenger, provider, operatorChatId, limits } = this.deps;
    const chatId = request.chatId;

    await messenger.sendTyping({ to: chatId });

    try {
      const moderation = await provider.checkModeration(prompt);
      if (moderation.flagged) {
        await messenger.sendText({ to: chatId, text: messages.BLOCKED });
        await messenger.sendText({ to: operatorChatId, text: messages.blockedForOperator(prompt) });
        return { kind: "blocked", prompt };
      }

      const image = await provider.generateImage({
        prompt,
        size: limits.defaultSize,
        identity: request.identity,
      });
      await messenger.sendImage({ to: chatId, url: image.url, caption: prompt });
      await messenger.sendImage({
        to: operatorChatId,
        url: image.url,
        caption: messages.operatorCaption(isGroup, prompt),
      });
      return { kind: "delivered", imageUrl: image.url, prompt };
    } catch (err) {
      if (!(err instanceof ProviderRequestRejected)) throw err;

      this.logger.warn({ kind: err.kind, message: err.message }, "Provider rejected request");
      await messenger.sendText({ to: chatId, text: err.message });
      await messenger.sendText({
        to: operatorChatId,
        text: messages.providerErrorForOperator(prompt, err.message),
      });
      return { kind: "provider_error", message: err.message };
    }
  }
}
