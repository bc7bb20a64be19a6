import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/channels/telegram/index.ts",
        "src/channels/adapter.ts",
        "src/cli/banner.ts",
        "src/cli/program.ts",
        "src/cli/commands/bot.ts",
        "src/gateway/lifecycle.ts",
        "src/config/types.ts",
        "src/provider/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
