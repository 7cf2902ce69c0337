declare global {
  namespace NodeJS {
    interface ProcessEnv {
      PGHOST?: string;
      PGPORT?: string;
      PGDATABASE?: string;
      PGUSER?: string;
      PGPASSWORD?: string;
      PGSSLMODE?: string;
      PG_POOL_MAX?: string;
      BOT_TOKEN?: string;
      LOG_LEVEL?: string;
      SERVER_URL?: string;
      PORT?: string;
      BOT_TIMEZONE?: string;
      DEFAULT_CURRENCY?: string;
      CREDENTIALS_FILE?: string;
      SQLITE_PATH?: string;
    }
  }
}

// If this file has no import/export statements (i.e. is a script)
// convert it into a module by adding an empty export statement.
export {};
