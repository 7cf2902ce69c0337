import fs from "fs";
import { z } from "zod";
import type { Knex } from "knex";
import type { PoolConfig } from "pg";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const SSL_MODES = [
  "disable",
  "allow",
  "prefer",
  "require",
  "verify-ca",
  "verify-full",
] as const;
export type SslMode = (typeof SSL_MODES)[number];

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Empty values count as unset.
const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const requiredString = z.preprocess(blankAsUndefined, z.string());
const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

function isTimeZone(zone: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const DatabaseEnvSchema = z.object({
  PGHOST: requiredString,
  PGPORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(65535).default(5432),
  ),
  PGDATABASE: requiredString,
  PGUSER: requiredString,
  PGPASSWORD: requiredString,
  PGSSLMODE: z.preprocess(blankAsUndefined, z.enum(SSL_MODES).default("require")),
  PG_POOL_MAX: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).default(10),
  ),
});

const BotEnvSchema = z.object({
  BOT_TOKEN: optionalString,
  CREDENTIALS_FILE: z.preprocess(
    blankAsUndefined,
    z.string().default("credentials.txt"),
  ),
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default("info")),
  SERVER_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(65535).default(5000),
  ),
  BOT_TIMEZONE: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .refine(isTimeZone, { message: "is not a known IANA time zone" })
      .default("Asia/Kolkata"),
  ),
  DEFAULT_CURRENCY: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .regex(/^[A-Z]{3}$/, "must be a three-letter currency code")
      .default("INR"),
  ),
});

export type DatabaseConfig = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  sslMode: SslMode;
  poolMax: number;
};

export type BotConfig = {
  database: DatabaseConfig;
  botToken: string;
  logLevel: LogLevel;
  serverUrl?: string;
  port: number;
  timeZone: string;
  defaultCurrency: string;
};

export type ConnectionConfig = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: false | { rejectUnauthorized: boolean };
};

function toConfigError(error: z.ZodError): ConfigError {
  const missing: string[] = [];
  const invalid: string[] = [];
  for (const issue of error.issues) {
    const name = issue.path.join(".");
    if (issue.code === "invalid_type" && issue.received === "undefined") {
      missing.push(name);
    } else {
      invalid.push(`${name}: ${issue.message}`);
    }
  }

  const parts: string[] = [];
  if (missing.length > 0) {
    parts.push(
      `Please set ${missing.join(", ")} environment variables. ` +
        `Create a .env file or set them as environment variables.`,
    );
  }
  if (invalid.length > 0) {
    parts.push(`Invalid configuration: ${invalid.join("; ")}.`);
  }
  return new ConfigError(parts.join(" "));
}

function toDatabaseConfig(env: z.infer<typeof DatabaseEnvSchema>): DatabaseConfig {
  return {
    host: env.PGHOST,
    port: env.PGPORT,
    database: env.PGDATABASE,
    user: env.PGUSER,
    password: env.PGPASSWORD,
    sslMode: env.PGSSLMODE,
    poolMax: env.PG_POOL_MAX,
  };
}

export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const parsed = DatabaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw toConfigError(parsed.error);
  }
  return toDatabaseConfig(parsed.data);
}

/**
 * Reads `bot_token=...` from a credentials file. Returns undefined when the
 * file is absent or has no such line.
 */
export function readTokenFromFile(path: string): string | undefined {
  let contents: string;
  try {
    contents = fs.readFileSync(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("bot_token=")) {
      const token = trimmed.slice("bot_token=".length).trim();
      return token === "" ? undefined : token;
    }
  }
  return undefined;
}

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = DatabaseEnvSchema.merge(BotEnvSchema).safeParse(env);
  if (!parsed.success) {
    throw toConfigError(parsed.error);
  }

  const data = parsed.data;
  const botToken = data.BOT_TOKEN ?? readTokenFromFile(data.CREDENTIALS_FILE);
  if (botToken === undefined) {
    throw new ConfigError(
      `Bot token not provided. Set BOT_TOKEN env var or put bot_token=... in ${data.CREDENTIALS_FILE}`,
    );
  }

  return {
    database: toDatabaseConfig(data),
    botToken,
    logLevel: data.LOG_LEVEL,
    serverUrl: data.SERVER_URL,
    port: data.PORT,
    timeZone: data.BOT_TIMEZONE,
    defaultCurrency: data.DEFAULT_CURRENCY,
  };
}

function sslOptions(mode: SslMode): ConnectionConfig["ssl"] {
  switch (mode) {
    case "disable":
    case "allow":
    case "prefer":
      return false;
    // Encrypted, certificate not verified (libpq semantics).
    case "require":
      return { rejectUnauthorized: false };
    case "verify-ca":
    case "verify-full":
      return { rejectUnauthorized: true };
  }
}

export function toConnectionConfig(db: DatabaseConfig): ConnectionConfig {
  return {
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    password: db.password,
    ssl: sslOptions(db.sslMode),
  };
}

export function toPoolConfig(db: DatabaseConfig): PoolConfig {
  return {
    ...toConnectionConfig(db),
    max: db.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
  };
}

/** `migrationsDirectory` should be absolute; knex runs with the project root as its working directory. */
export function toKnexConfig(db: DatabaseConfig, migrationsDirectory: string): Knex.Config {
  return {
    client: "pg",
    connection: toConnectionConfig(db),
    pool: { min: 0, max: db.poolMax },
    migrations: {
      tableName: "migrations",
      directory: migrationsDirectory,
    },
  };
}

export type ImportConfig = {
  database: DatabaseConfig;
  sqlitePath: string;
};

export function loadImportConfig(env: NodeJS.ProcessEnv = process.env): ImportConfig {
  const parsed = DatabaseEnvSchema.extend({
    SQLITE_PATH: z.preprocess(blankAsUndefined, z.string().default("data.db")),
  }).safeParse(env);
  if (!parsed.success) {
    throw toConfigError(parsed.error);
  }
  return { database: toDatabaseConfig(parsed.data), sqlitePath: parsed.data.SQLITE_PATH };
}
