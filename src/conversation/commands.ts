import type { ConversationEvent } from "./state.js";

// "/generate@SomeBot a red fox" -> name "generate", rest "a red fox"
const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/;

export function parseCommandArgs(rest: string | undefined): string[] {
  return (rest ?? "").split(/\s+/).filter((arg) => arg.length > 0);
}

export function parseConversationEvent(text: string): ConversationEvent {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return { kind: "text", text };

  const name = (match[1] ?? "").toLowerCase();
  switch (name) {
    case "start":
      return { kind: "start" };
    case "generate":
      return { kind: "generate", prompt: parseCommandArgs(match[2]).join(" ") };
    case "cancel":
      return { kind: "cancel" };
    default:
      return { kind: "unknown_command", name };
  }
}
