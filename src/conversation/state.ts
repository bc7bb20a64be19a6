import type { DispatchOutcome } from "../dispatch/outcome.js";

export type ConversationState = "awaiting_command" | "awaiting_prompt";

export const INITIAL_STATE: ConversationState = "awaiting_command";

export type ConversationEvent =
  | { readonly kind: "start" }
  | { readonly kind: "generate"; readonly prompt: string }
  | { readonly kind: "cancel" }
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "unknown_command"; readonly name: string };

export type ConversationEventKind = ConversationEvent["kind"];

/**
 * greet: send the greeting, go to awaiting_command.
 * dispatch: run admission; the next state depends on the outcome.
 * reset: go to awaiting_command.
 */
export type TransitionAction = "greet" | "dispatch" | "reset";

export const TRANSITIONS = {
  awaiting_command: {
    start: "greet",
    generate: "dispatch",
    cancel: "reset",
  },
  awaiting_prompt: {
    start: "greet",
    generate: "dispatch",
    text: "dispatch",
    cancel: "reset",
  },
} as const satisfies Record<
  ConversationState,
  Partial<Record<ConversationEventKind, TransitionAction>>
>;

const TABLE: Record<ConversationState, Partial<Record<ConversationEventKind, TransitionAction>>> =
  TRANSITIONS;

/** Action for `event` in `state`, or null when the state ignores it. */
export function resolveTransition(
  state: ConversationState,
  event: ConversationEvent,
): TransitionAction | null {
  return TABLE[state][event.kind] ?? null;
}

export function stateAfterDispatch(outcome: DispatchOutcome): ConversationState {
  return outcome.kind === "prompt_required" ? "awaiting_prompt" : "awaiting_command";
}
