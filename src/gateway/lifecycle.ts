import { loadConfig } from "../config/loader.js";
import { ensureDir, getLedgerPath, getStateDir } from "../config/paths.js";
import type { PictorConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { UsageLedger } from "../ledger/ledger.js";
import { OpenAIImageProvider } from "../provider/openai.js";
import { TelegramAdapter } from "../channels/telegram/index.js";
import { AdmissionController } from "../dispatch/controller.js";
import { ErrorReporter } from "../dispatch/error-reporter.js";
import { ConversationStore } from "../conversation/store.js";
import { ConversationRouter } from "../conversation/router.js";
import { systemTimeZone } from "../utils/time.js";

export interface BotContext {
  config: PictorConfig;
  logger: Logger;
  ledger: UsageLedger;
  adapter: TelegramAdapter;
  controller: AdmissionController;
  router: ConversationRouter;
  errorReporter: ErrorReporter;
  abortController: AbortController;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

export async function startBot(configPath?: string): Promise<BotContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting Pictor...");

  // 3. Ensure state directory and load the usage ledger
  const stateDir = ensureDir(getStateDir());
  const ledger = await UsageLedger.open(getLedgerPath(config.ledger.file, stateDir), logger);

  // 4. Provider and transport
  const provider = new OpenAIImageProvider(config.provider, logger);
  const adapter = new TelegramAdapter();
  const errorReporter = new ErrorReporter(adapter, config.operator.chatId, logger);

  // 5. Admission core and conversation routing
  const timeZone = config.timezone ?? systemTimeZone();
  const controller = new AdmissionController({
    ledger,
    provider,
    messenger: adapter,
    operatorChatId: config.operator.chatId,
    limits: config.limits,
    timeZone,
    logger,
  });
  const router = new ConversationRouter({
    controller,
    messenger: adapter,
    store: new ConversationStore(),
    limits: config.limits,
    identitySalt: config.identity.salt,
    logger,
  });

  // 6. Wire transport events
  adapter.events.on("message", (msg) => {
    void router.handleInbound(msg).catch((err: unknown) =>
      errorReporter.report(err, {
        channelId: msg.channelId,
        chatId: msg.chatId,
        messageId: msg.id,
      }),
    );
  });
  adapter.events.on("connected", () => {
    logger.info({ channel: adapter.id }, "Channel connected");
  });
  adapter.events.on("disconnected", (reason) => {
    logger.warn({ channel: adapter.id, reason }, "Channel disconnected");
  });
  adapter.events.on("error", (err) => {
    void errorReporter.report(err, { channelId: adapter.id });
  });

  // 7. Start polling
  const abortController = new AbortController();
  await adapter.start(config.telegram.token, abortController.signal);
  logger.info({ timeZone, limits: config.limits }, "Pictor started");

  // 8. Graceful shutdown
  let shutdownInProgress = false;
  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    abortController.abort();
    try {
      await adapter.stop();
    } catch (err) {
      logger.error({ err, channel: adapter.id }, "Error stopping channel");
    }

    clearTimeout(forceExit);
    logger.info({ records: ledger.size }, "Shutdown complete");
    logger.flush();
  };

  process.once("SIGTERM", () => void shutdown());
  process.once("SIGINT", () => void shutdown());

  return {
    config,
    logger,
    ledger,
    adapter,
    controller,
    router,
    errorReporter,
    abortController,
  };
}
