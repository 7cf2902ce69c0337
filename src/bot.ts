import dotenv from "dotenv";
import { Pool } from "pg";
import { DatabaseConfig, loadBotConfig } from "./config";
import { CommandRouter } from "./handlers";
import { UpdatePoller } from "./poller";
import { initDatabase } from "./schema";
import {
  CreateDatabaseClient,
  checkDatabaseConnection,
} from "./tools/CreateDatabaseClient";
import { CreateLoggerClient } from "./tools/CreateLoggerClient";
import { TelegramClient } from "./tools/TelegramClient";
import { PgTransactionStore } from "./transactions";
import { closeServer, createWebhookApp, startWebhookServer, webhookPath } from "./webhook";

// Environment Variables
dotenv.config();

const logger = CreateLoggerClient();

let pool: Pool | undefined;

async function prepareDatabase(config: DatabaseConfig, client: Pool) {
  logger.info(`Initiating database pool | Host: ${config.host}:${config.port} | SSL: ${config.sslMode}`);
  const health = await checkDatabaseConnection(client);
  if (!health.healthy) {
    throw new Error(`Database connection failed: ${health.error}`);
  }
  logger.info(
    `Database connection successful | Database: ${health.database} | Server: ${health.serverVersion}`,
  );

  await initDatabase(client);
}

async function init() {
  const config = loadBotConfig();
  logger.level = config.logLevel;

  pool = CreateDatabaseClient(config.database, logger);
  await prepareDatabase(config.database, pool);
  const telegram = TelegramClient.create(config.botToken);
  const me = await telegram.getMe();
  logger.info(`Authorised as @${me.username ?? me.first_name}`);

  const router = new CommandRouter({
    store: new PgTransactionStore(pool),
    api: telegram,
    logger,
    timeZone: config.timeZone,
    defaultCurrency: config.defaultCurrency,
    botUsername: me.username,
  });
  const handle = router.handleUpdate.bind(router);

  if (config.serverUrl !== undefined) {
    const app = createWebhookApp(config.botToken, handle, logger);
    const server = await startWebhookServer(app, config.port, async () => {
      logger.info(`Listening on port ${config.port}`);
      await telegram.setWebhook(`${config.serverUrl}${webhookPath(config.botToken)}`);
    });
    logger.info(`Webhook registered, server ready to receive`);

    registerShutdown(() => closeServer(server));
    return;
  }

  await telegram.deleteWebhook();
  const poller = new UpdatePoller(telegram, handle, logger);
  registerShutdown(async () => {
    poller.stop();
  });
  await poller.run();
}

function registerShutdown(stop: () => Promise<void>) {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`);
    stop()
      .then(() => pool?.end())
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

init().catch((err) => {
  logger.fatal({ err }, "Bot stopped");
  process.exitCode = 1;
  pool?.end().catch((endErr) => logger.error({ err: endErr }, "Failed to close database pool"));
});
