export interface UsageRecord {
  readonly isGroup: boolean;
  readonly timestamp: Date;
  readonly prompt: string;
  /** Requested image edge length in pixels. */
  readonly size: number;
  /** One-way hash of the platform user id; the raw id is never stored. */
  readonly identity: number;
}

export interface UsageSummary {
  readonly totalRequests: number;
  readonly groupRequests: number;
  readonly identities: number;
  readonly period: string;
  readonly breakdown: UsageBreakdown[];
}

export interface UsageBreakdown {
  readonly date: string;
  readonly requests: number;
}
