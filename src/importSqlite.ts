import dotenv from "dotenv";
import knex from "knex";
import { loadImportConfig } from "./config";
import { importLegacyTransactions } from "./legacyImport";
import { initDatabase } from "./schema";
import { CreateDatabaseClient } from "./tools/CreateDatabaseClient";
import { CreateLoggerClient } from "./tools/CreateLoggerClient";

dotenv.config();

const logger = CreateLoggerClient();

async function importSqlite() {
  const config = loadImportConfig();
  logger.info(`Importing ${config.sqlitePath} into ${config.database.host}/${config.database.database}`);

  const source = knex({
    client: "better-sqlite3",
    connection: { filename: config.sqlitePath },
    useNullAsDefault: true,
  });
  const pool = CreateDatabaseClient(config.database, logger);

  try {
    await initDatabase(pool);
    const summary = await importLegacyTransactions(source, pool, logger);
    logger.info(`Migration finished | Inserted: ${summary.inserted} | Skipped: ${summary.skipped}`);
  } finally {
    await source.destroy();
    await pool.end();
  }
}

importSqlite().catch((err) => {
  logger.fatal({ err }, "Import failed");
  process.exitCode = 1;
});
