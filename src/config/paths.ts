import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["PICTOR_STATE_DIR"] ?? join(homedir(), ".pictor");
}

export function getConfigPath(): string {
  return process.env["PICTOR_CONFIG_PATH"] ?? "pictor.config.json";
}

export function getLedgerPath(configured: string | undefined, stateDir: string): string {
  return configured ?? join(stateDir, "logs", "usage-ledger.csv");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
