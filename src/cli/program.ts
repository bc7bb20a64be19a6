import { Cli } from "clipanion";
import { BotRunCommand } from "./commands/bot.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { LedgerStatsCommand } from "./commands/ledger.js";

export function createCli(version: string): Cli {
  const cli = new Cli({
    binaryLabel: "Pictor",
    binaryName: "pictor",
    binaryVersion: version,
  });

  cli.register(BotRunCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Usage ledger
  cli.register(LedgerStatsCommand);

  return cli;
}
