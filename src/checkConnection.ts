import dotenv from "dotenv";
import { loadDatabaseConfig } from "./config";
import {
  CreateDatabaseClient,
  checkDatabaseConnection,
} from "./tools/CreateDatabaseClient";
import { CreateLoggerClient } from "./tools/CreateLoggerClient";

dotenv.config();

const logger = CreateLoggerClient();

// Verifies the deployment variables reach the database before the bot is started.
async function checkConnection() {
  const database = loadDatabaseConfig();
  logger.info(
    `Connecting | Host: ${database.host}:${database.port} | Database: ${database.database} | User: ${database.user} | SSL: ${database.sslMode}`,
  );

  const pool = CreateDatabaseClient(database, logger);
  try {
    const health = await checkDatabaseConnection(pool);
    if (health.healthy) {
      logger.info(
        `Database connection successful | Database: ${health.database} | Server: ${health.serverVersion}`,
      );
    } else {
      logger.error(`Database connection failed | ${health.error}`);
      process.exitCode = 1;
    }
  } finally {
    await pool.end();
  }
}

checkConnection().catch((err) => {
  logger.fatal({ err }, "Connection check failed");
  process.exitCode = 1;
});
