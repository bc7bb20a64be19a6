import Papa from "papaparse";
import { z } from "zod";
import type { UsageRecord } from "./types.js";

export const LEDGER_COLUMNS = ["group", "timestamp", "prompt", "size", "hashed_user"] as const;

type LedgerRow = Record<(typeof LEDGER_COLUMNS)[number], string>;

const ledgerRowSchema = z.object({
  group: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(["true", "false"]))
    .transform((v) => v === "true"),
  timestamp: z
    .string()
    .transform((v) => new Date(v))
    .refine((d) => !Number.isNaN(d.getTime()), { message: "Invalid timestamp" }),
  prompt: z.string(),
  size: z.coerce.number().int().positive(),
  hashed_user: z.coerce.number().int(),
});

export class LedgerFormatError extends Error {
  override readonly name = "LedgerFormatError";
}

export function serializeLedger(records: readonly UsageRecord[]): string {
  const rows: LedgerRow[] = records.map((r) => ({
    group: r.isGroup ? "true" : "false",
    timestamp: r.timestamp.toISOString(),
    prompt: r.prompt,
    size: String(r.size),
    hashed_user: String(r.identity),
  }));
  return Papa.unparse(rows, { columns: [...LEDGER_COLUMNS], newline: "\n" }) + "\n";
}

export function parseLedger(content: string): UsageRecord[] {
  if (content.trim() === "") return [];

  const result = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
  });

  const firstError = result.errors[0];
  if (firstError) {
    throw new LedgerFormatError(`Row ${firstError.row ?? "?"}: ${firstError.message}`);
  }

  const fields = result.meta.fields ?? [];
  const missing = LEDGER_COLUMNS.filter((c) => !fields.includes(c));
  if (missing.length > 0) {
    throw new LedgerFormatError(`Missing columns: ${missing.join(", ")}`);
  }

  return result.data.map((raw, index) => {
    const parsed = ledgerRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LedgerFormatError(
        `Row ${index + 1}: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`,
      );
    }
    const row = parsed.data;
    return {
      isGroup: row.group,
      timestamp: row.timestamp,
      prompt: row.prompt,
      size: row.size,
      identity: row.hashed_user,
    };
  });
}
