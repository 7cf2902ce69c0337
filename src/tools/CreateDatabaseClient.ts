import { Pool } from "pg";
import type { Logger } from "pino";
import { DatabaseConfig, toPoolConfig } from "../config";

export type DatabaseHealth = {
  healthy: boolean;
  database?: string;
  serverVersion?: string;
  error?: string;
};

export function CreateDatabaseClient(config: DatabaseConfig, logger: Logger): Pool {
  const pool = new Pool(toPoolConfig(config));

  // An idle client losing its connection must not take the process down.
  pool.on("error", (err) => {
    logger.error({ err }, "PostgreSQL pool error");
  });

  return pool;
}

export async function checkDatabaseConnection(pool: Pool): Promise<DatabaseHealth> {
  try {
    const result = await pool.query<{ database: string; version: string }>(
      `SELECT current_database() AS database, version() AS version`,
    );
    const row = result.rows[0];
    return {
      healthy: true,
      database: row?.database,
      serverVersion: row?.version,
    };
  } catch (error) {
    return {
      healthy: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
