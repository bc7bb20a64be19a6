import { z } from "zod";
import type { PictorConfig } from "./types.js";

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const telegramSchema = z.object({
  token: z.string().min(1),
});

const operatorSchema = z.object({
  chatId: z.union([z.string().min(1), z.number().int()]).transform(String),
});

const providerSchema = z.object({
  apiKey: z.string().min(1),
  imageModel: z.string().min(1).default("dall-e-2"),
  moderationModel: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(120_000),
});

const limitsSchema = z.object({
  minRequestIntervalMs: z.number().int().min(0).default(60_000),
  maxRequestsPerDay: z.number().int().min(0).default(5),
  defaultSize: z.union([z.literal(256), z.literal(512), z.literal(1024)]).default(256),
});

const identitySchema = z.object({
  salt: z.string().default(""),
});

const ledgerSchema = z.object({
  file: z.string().min(1).optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const pictorConfigSchema = z.object({
  telegram: telegramSchema,
  operator: operatorSchema,
  provider: providerSchema,
  limits: limitsSchema.default({}),
  identity: identitySchema.default({}),
  timezone: z
    .string()
    .refine(isValidTimeZone, { message: "Unknown IANA time zone" })
    .optional(),
  ledger: ledgerSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): PictorConfig {
  return pictorConfigSchema.parse(raw);
}
