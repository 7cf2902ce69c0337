import type { Knex } from "knex";
import dotenv from "dotenv";
import path from "path";
import { loadDatabaseConfig, toKnexConfig } from "./src/config";

// Reads .env from the working directory; the npm scripts run knex with --cwd .
dotenv.config();

const config: { [key: string]: Knex.Config } = {
  production: toKnexConfig(loadDatabaseConfig(), path.join(__dirname, "migrations")),
};

module.exports = config;

// npm run migrate
// npm run rollback
