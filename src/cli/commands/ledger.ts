import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getLedgerPath, getStateDir } from "../../config/paths.js";
import { hashIdentity } from "../../ledger/identity.js";
import { readLedgerFile, summarizeRecords } from "../../ledger/ledger.js";
import type { UsageRecord, UsageSummary } from "../../ledger/types.js";
import type { PictorConfig } from "../../config/types.js";
import { startOfCalendarDate, systemTimeZone } from "../../utils/time.js";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatSummary(summary: UsageSummary): string {
  const lines = [
    `Period:         ${summary.period}`,
    `Requests:       ${summary.totalRequests}`,
    `Group requests: ${summary.groupRequests}`,
    `Users:          ${summary.identities}`,
  ];
  if (summary.breakdown.length > 0) {
    lines.push("", "Date        Requests");
    for (const day of summary.breakdown) {
      lines.push(`${day.date}  ${day.requests}`);
    }
  }
  return lines.join("\n") + "\n";
}

export class LedgerStatsCommand extends Command {
  static override paths = [["ledger", "stats"]];

  static override usage = Command.Usage({
    description: "Summarize accepted requests recorded in the usage ledger",
    examples: [
      ["All users, all time", "pictor ledger stats"],
      ["One user since a date", "pictor ledger stats --user 123456789 --since 2024-05-01"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  ledgerFile = Option.String("--ledger", {
    description: "Ledger file to read instead of the configured one",
    required: false,
  });

  user = Option.String("--user", {
    description: "Platform user id to restrict the summary to",
    required: false,
  });

  since = Option.String("--since", {
    description: "Only count requests from this date on (YYYY-MM-DD)",
    required: false,
  });

  async execute(): Promise<number> {
    if (this.since !== undefined && !DATE_PATTERN.test(this.since)) {
      this.context.stdout.write(`Invalid --since date: ${this.since}\n`);
      return 1;
    }

    let config: PictorConfig | undefined;
    if (this.ledgerFile === undefined || this.user !== undefined) {
      try {
        config = loadConfig(this.config);
      } catch (err) {
        this.context.stdout.write(
          `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
        );
        return 1;
      }
    }

    const timeZone = config?.timezone ?? systemTimeZone();
    const filePath = this.ledgerFile ?? getLedgerPath(config?.ledger.file, getStateDir());
    const salt = config?.identity.salt ?? "";

    let records: UsageRecord[];
    try {
      records = await readLedgerFile(filePath);
    } catch (err) {
      this.context.stdout.write(
        `Failed to read ledger: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    const summary = summarizeRecords(records, {
      identity: this.user !== undefined ? hashIdentity(this.user, salt) : undefined,
      since: this.since !== undefined ? startOfCalendarDate(this.since, timeZone) : undefined,
      timeZone,
    });
    this.context.stdout.write(formatSummary(summary));
    return 0;
  }
}
