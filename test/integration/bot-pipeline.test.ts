import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConversationRouter } from "../../src/conversation/router.js";
import { ConversationStore } from "../../src/conversation/store.js";
import { AdmissionController } from "../../src/dispatch/controller.js";
import { ErrorReporter } from "../../src/dispatch/error-reporter.js";
import { UsageLedger } from "../../src/ledger/ledger.js";
import type { LimitsConfig } from "../../src/config/types.js";
import { MockAdapter } from "../helpers/mock-adapter.js";
import { MockProvider } from "../helpers/mock-provider.js";
import {
  OPERATOR_CHAT,
  makeInboundMessage,
  makeLimits,
  silentLogger,
} from "../helpers/fixtures.js";

interface Pipeline {
  readonly adapter: MockAdapter;
  readonly provider: MockProvider;
  readonly ledger: UsageLedger;
  readonly router: ConversationRouter;
}

async function buildPipeline(ledgerPath: string, limits: LimitsConfig): Promise<Pipeline> {
  const logger = silentLogger();
  const adapter = new MockAdapter();
  const provider = new MockProvider();
  const ledger = await UsageLedger.open(ledgerPath, logger);
  const controller = new AdmissionController({
    ledger,
    provider,
    messenger: adapter,
    operatorChatId: OPERATOR_CHAT,
    limits,
    timeZone: "UTC",
    logger,
  });
  const router = new ConversationRouter({
    controller,
    messenger: adapter,
    store: new ConversationStore(),
    limits,
    identitySalt: "test-salt",
    logger,
  });
  const reporter = new ErrorReporter(adapter, OPERATOR_CHAT, logger);

  adapter.events.on("message", (msg) => {
    void router
      .handleInbound(msg)
      .catch((err: unknown) => reporter.report(err, { chatId: msg.chatId }));
  });
  return { adapter, provider, ledger, router };
}

describe("bot pipeline", () => {
  let tempDir: string;
  let ledgerPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "pictor-pipeline-test-"));
    ledgerPath = join(tempDir, "logs", "usage-ledger.csv");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("generates an image and mirrors it to the operator", async () => {
    const { adapter, router } = await buildPipeline(ledgerPath, makeLimits());

    await router.handleInbound(makeInboundMessage({ chatType: "group", chatId: "group-7" }));

    expect(adapter.images()).toEqual([
      { to: "group-7", url: "https://images.example.test/generated.png", caption: "a red fox" },
      {
        to: OPERATOR_CHAT,
        url: "https://images.example.test/generated.png",
        caption: "group: a red fox",
      },
    ]);
    const lines = readFileSync(ledgerPath, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe("group,timestamp,prompt,size,hashed_user");
    expect(lines[1]?.startsWith("true,")).toBe(true);
  });

  it("keeps the interval across a restart", async () => {
    const first = await buildPipeline(ledgerPath, makeLimits());
    await first.router.handleInbound(makeInboundMessage());
    expect(first.ledger.size).toBe(1);

    const second = await buildPipeline(ledgerPath, makeLimits());
    expect(second.ledger.size).toBe(1);

    const state = await second.router.handleInbound(makeInboundMessage({ text: "/generate a blue fox" }));

    expect(state).toBe("awaiting_command");
    expect(second.provider.generateImage).not.toHaveBeenCalled();
    const reply = second.adapter.texts("chat-1")[0]?.text ?? "";
    expect(reply.startsWith("Sorry, due to resource constraints")).toBe(true);
  });

  it("runs the two-step prompt flow through the adapter events", async () => {
    const { adapter, provider, ledger } = await buildPipeline(
      ledgerPath,
      makeLimits({ minRequestIntervalMs: 0 }),
    );

    adapter.events.emit("message", makeInboundMessage({ text: "/generate" }));
    await vi.waitFor(() => expect(adapter.texts()).toHaveLength(1));
    adapter.events.emit("message", makeInboundMessage({ text: "a lighthouse at dusk" }));
    await vi.waitFor(() => expect(adapter.images()).toHaveLength(2));

    expect(adapter.texts()).toEqual([
      { to: "chat-1", text: "K let's do this! What image should I generate?" },
    ]);
    expect(provider.generateImage).toHaveBeenCalledTimes(1);
    expect(ledger.all().map((r) => r.prompt)).toEqual(["a lighthouse at dusk"]);
  });

  it("reports unexpected failures to the operator", async () => {
    const { adapter, provider } = await buildPipeline(ledgerPath, makeLimits());
    provider.generateImage.mockRejectedValueOnce(new Error("socket hang up"));

    adapter.events.emit("message", makeInboundMessage());
    await vi.waitFor(() => expect(adapter.texts(OPERATOR_CHAT)).toHaveLength(1));

    const report = adapter.texts(OPERATOR_CHAT)[0];
    expect(report?.parseMode).toBe("HTML");
    expect(
      report?.text.startsWith(
        "An exception was raised while handling an update\n<pre>Error: socket hang up",
      ),
    ).toBe(true);
  });
});
