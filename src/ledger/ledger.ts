import { readFile, rename, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "../logging/logger.js";
import { withFileLock, type FileLockOptions } from "../utils/file-lock.js";
import { calendarDate } from "../utils/time.js";
import { LedgerFormatError, parseLedger, serializeLedger } from "./csv.js";
import { PersistenceError } from "./errors.js";
import type { UsageBreakdown, UsageRecord, UsageSummary } from "./types.js";

/** Stand-in "last request" for identities that have never made one. */
export const EPOCH_SENTINEL = new Date("2022-01-01T00:00:00.000Z");

const BREAKDOWN_DAYS = 30;

/**
 * Lock wait on open: long enough for a lock left by a crashed process to go
 * stale (10s) and be taken over.
 */
const OPEN_LOCK: FileLockOptions = { retries: 30, maxTimeoutMs: 1_000 };

export interface OpenLedgerOptions {
  readonly lock?: FileLockOptions;
}

export interface SummarizeOptions {
  readonly identity?: number;
  readonly since?: Date;
  readonly timeZone: string;
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

/**
 * Reads the ledger file without locking or creating anything. Rewrites are
 * atomic renames, so the file is always a complete ledger. A missing file
 * reads as empty; a corrupt one throws LedgerFormatError.
 */
export async function readLedgerFile(filePath: string): Promise<UsageRecord[]> {
  try {
    return parseLedger(await readFile(filePath, "utf-8"));
  } catch (err) {
    if (errorCode(err) === "ENOENT") return [];
    throw err;
  }
}

export function summarizeRecords(
  records: readonly UsageRecord[],
  opts: SummarizeOptions,
): UsageSummary {
  const matching = records.filter(
    (r) =>
      (opts.identity === undefined || r.identity === opts.identity) &&
      (opts.since === undefined || r.timestamp.getTime() >= opts.since.getTime()),
  );

  const perDay = new Map<string, number>();
  for (const r of matching) {
    const date = calendarDate(r.timestamp, opts.timeZone);
    perDay.set(date, (perDay.get(date) ?? 0) + 1);
  }
  const breakdown: UsageBreakdown[] = [...perDay.entries()]
    .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
    .slice(0, BREAKDOWN_DAYS)
    .map(([date, requests]) => ({ date, requests }));

  return {
    totalRequests: matching.length,
    groupRequests: matching.filter((r) => r.isGroup).length,
    identities: new Set(matching.map((r) => r.identity)).size,
    period: opts.since ? `since ${opts.since.toISOString()}` : "all time",
    breakdown,
  };
}

/**
 * Append-only record of accepted requests, mirrored to a CSV file that is
 * rewritten in full on every append.
 */
export class UsageLedger {
  private constructor(
    private readonly filePath: string,
    private readonly records: UsageRecord[],
    private readonly logger: Logger,
  ) {}

  /**
   * Loads the ledger at `filePath`. A missing, unreadable or corrupt file
   * gives an empty ledger; a corrupt one is first copied aside so that the
   * next rewrite does not lose it. A lock still held after the wait raises
   * PersistenceError.
   */
  static async open(
    filePath: string,
    logger: Logger,
    opts: OpenLedgerOptions = {},
  ): Promise<UsageLedger> {
    const log = logger.child({ component: "ledger" });
    mkdirSync(dirname(filePath), { recursive: true });

    let content: string;
    try {
      content = await withFileLock(
        filePath,
        () => readFile(filePath, "utf-8"),
        opts.lock ?? OPEN_LOCK,
      );
    } catch (err) {
      const code = errorCode(err);
      if (code === "ELOCKED") {
        throw new PersistenceError("Usage ledger is locked by another process", filePath, {
          cause: err,
        });
      }
      if (code === "ENOENT") {
        log.info({ file: filePath }, "No usage ledger yet, starting empty");
      } else {
        log.warn({ err, file: filePath }, "Usage ledger unreadable, starting empty");
      }
      return new UsageLedger(filePath, [], log);
    }

    let records: UsageRecord[] = [];
    try {
      records = parseLedger(content);
      log.info({ file: filePath, records: records.length }, "Usage ledger loaded");
    } catch (err) {
      if (!(err instanceof LedgerFormatError)) throw err;
      const copy = `${filePath}.corrupt-${Date.now()}`;
      try {
        await writeFile(copy, content, "utf-8");
        log.warn({ err, file: filePath, copy }, "Usage ledger corrupt, starting empty");
      } catch (copyErr) {
        log.warn({ err, copyErr, file: filePath }, "Usage ledger corrupt and not copied, starting empty");
      }
    }

    return new UsageLedger(filePath, records, log);
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly UsageRecord[] {
    return this.records;
  }

  /**
   * Appends `entry` and rewrites the ledger file. When the write fails the
   * entry stays counted in memory and a PersistenceError is thrown.
   */
  async record(entry: UsageRecord): Promise<void> {
    this.records.push(entry);
    const content = serializeLedger(this.records);
    try {
      await withFileLock(this.filePath, async () => {
        // Readers outside the lock only ever see a complete file
        const tmp = `${this.filePath}.tmp`;
        await writeFile(tmp, content, "utf-8");
        await rename(tmp, this.filePath);
      });
    } catch (err) {
      throw new PersistenceError(
        `Failed to persist usage ledger (${this.records.length} records)`,
        this.filePath,
        { cause: err },
      );
    }
    this.logger.debug({ identity: entry.identity, records: this.records.length }, "Request recorded");
  }

  /** Milliseconds between `now` and the identity's latest record. */
  timeSinceLast(identity: number, now: Date): number {
    let last = EPOCH_SENTINEL.getTime();
    for (const r of this.records) {
      if (r.identity === identity && r.timestamp.getTime() > last) {
        last = r.timestamp.getTime();
      }
    }
    return now.getTime() - last;
  }

  countSince(identity: number, since: Date): number {
    const threshold = since.getTime();
    let count = 0;
    for (const r of this.records) {
      if (r.identity === identity && r.timestamp.getTime() >= threshold) count++;
    }
    return count;
  }

  summarize(opts: SummarizeOptions): UsageSummary {
    return summarizeRecords(this.records, opts);
  }
}
