import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import type { PictorConfig } from "../../config/types.js";

const REDACTED = "***REDACTED***";

export function redactConfig(config: PictorConfig): PictorConfig {
  return {
    ...config,
    telegram: { ...config.telegram, token: REDACTED },
    provider: { ...config.provider, apiKey: REDACTED },
    identity: { ...config.identity, salt: config.identity.salt ? REDACTED : "" },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (secrets redacted)",
    examples: [["Show config", "pictor config show"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    let config: PictorConfig;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "pictor config validate"],
      ["Validate specific file", "pictor config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const substituted = substituteEnv(content);
      const raw = JSON.parse(substituted) as unknown;
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
  }
}
