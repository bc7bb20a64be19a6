import pino from "pino";
import type { InboundMessage } from "../../src/channels/adapter.js";
import type { LimitsConfig, PictorConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { UsageRecord } from "../../src/ledger/types.js";

export const OPERATOR_CHAT = "operator-chat";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeLimits(overrides: Partial<LimitsConfig> = {}): LimitsConfig {
  return {
    minRequestIntervalMs: 60_000,
    maxRequestsPerDay: 5,
    defaultSize: 256,
    ...overrides,
  };
}

export function makeInboundMessage(
  overrides: Partial<InboundMessage> = {},
): InboundMessage {
  return {
    id: "msg-1",
    channelId: "mock",
    senderId: "user-1",
    senderName: "Test User",
    chatId: "chat-1",
    chatType: "dm",
    text: "/generate a red fox",
    timestamp: Date.now(),
    raw: {},
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    isGroup: false,
    timestamp: new Date("2024-05-10T12:00:00.000Z"),
    prompt: "a lighthouse at dusk",
    size: 256,
    identity: 1001,
    ...overrides,
  };
}

export function makePictorConfig(
  overrides: Partial<PictorConfig> = {},
): PictorConfig {
  return {
    telegram: { token: "test-token" },
    operator: { chatId: OPERATOR_CHAT },
    provider: { apiKey: "test-key", imageModel: "dall-e-2", timeoutMs: 120_000 },
    limits: makeLimits(),
    identity: { salt: "" },
    ledger: {},
    logging: { level: "info" },
    ...overrides,
  };
}
