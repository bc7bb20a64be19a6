import type { LimitsConfig } from "../config/types.js";

const SECOND_MS = 1000;

function seconds(ms: number): number {
  return Math.ceil(ms / SECOND_MS);
}

export function greeting(limits: LimitsConfig): string {
  return (
    "Hi there! I'm Pictor.\n" +
    "Send me /generate followed by a prompt and I'll send you a generated image.\n" +
    "As image generation is not free, there is a limit of one request per " +
    `${seconds(limits.minRequestIntervalMs)} seconds and ${limits.maxRequestsPerDay} images per day.\n` +
    "To enforce it I store an anonymised hash of your user id together with the time of your request.\n" +
    "To comply with the provider's moderation policy the prompts are stored as well, also anonymised."
  );
}

export function tooSoon(limits: LimitsConfig, retryAfterMs: number): string {
  return (
    "Sorry, due to resource constraints, it's only allowed to send one request per " +
    `${seconds(limits.minRequestIntervalMs)} seconds.\n` +
    `Please try again in ${seconds(retryAfterMs)} seconds.`
  );
}

export function quotaExceeded(limits: LimitsConfig): string {
  return (
    "Sorry, as the image generation is not for free, there is a limit of " +
    `${limits.maxRequestsPerDay} per day. Please try again tomorrow.`
  );
}

export const PROMPT_REQUIRED = "K let's do this! What image should I generate?";

export const BLOCKED = "This prompt doesn't comply with the provider's content policy.";

export function blockedForOperator(prompt: string): string {
  return `This prompt doesn't comply with the provider's content policy: ${prompt}.`;
}

export function providerErrorForOperator(prompt: string, message: string): string {
  return `${prompt}\n${message}`;
}

export function operatorCaption(isGroup: boolean, prompt: string): string {
  return (isGroup ? "group: " : "single user: ") + prompt;
}
