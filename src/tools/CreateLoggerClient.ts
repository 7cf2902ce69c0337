import pino, { Logger } from "pino";
import type { LogLevel } from "../config";

export function CreateLoggerClient(level: LogLevel = "info"): Logger {
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { translateTime: "dd-mm-yyyy HH:MM:ss Z" }, // Custom format
    },
  });
}
