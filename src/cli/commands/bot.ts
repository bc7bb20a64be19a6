import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
import { startBot } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";

const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };

export class BotRunCommand extends Command {
  static override paths = [["bot", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the Pictor chat bot",
    examples: [
      ["Start with default config", "pictor bot run"],
      ["Start with custom config", "pictor bot run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(pkg.version);

    try {
      const ctx = await startBot(this.config);
      // Polling runs until shutdown aborts the signal
      await new Promise<void>((resolve) => {
        ctx.abortController.signal.addEventListener("abort", () => resolve(), { once: true });
      });
      return 0;
    } catch (err) {
      this.context.stderr.write(
        `Failed to start bot: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
  }
}
