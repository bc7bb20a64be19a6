export interface PictorConfig {
  readonly telegram: TelegramConfig;
  readonly operator: OperatorConfig;
  readonly provider: ProviderConfig;
  readonly limits: LimitsConfig;
  readonly identity: IdentityConfig;
  readonly timezone?: string;
  readonly ledger: LedgerConfig;
  readonly logging?: LoggingConfig;
}

export interface TelegramConfig {
  readonly token: string;
}

export interface OperatorConfig {
  /** Chat that mirrors every accepted, blocked and failed request. */
  readonly chatId: string;
}

export type ImageSize = 256 | 512 | 1024;

export interface ProviderConfig {
  readonly apiKey: string;
  readonly imageModel: string;
  readonly moderationModel?: string;
  readonly timeoutMs: number;
}

export interface LimitsConfig {
  readonly minRequestIntervalMs: number;
  readonly maxRequestsPerDay: number;
  readonly defaultSize: ImageSize;
}

export interface IdentityConfig {
  readonly salt: string;
}

export interface LedgerConfig {
  readonly file?: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
