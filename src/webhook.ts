import express, { Express } from "express";
import bodyParser from "body-parser";
import { Server } from "http";
import type { Logger } from "pino";
import { TelegramUpdate } from "./types/telegram";

export function webhookPath(token: string) {
  return `/webhook/${token}`;
}

function isTelegramUpdate(body: unknown): body is TelegramUpdate {
  return (
    typeof body === "object" &&
    body !== null &&
    "update_id" in body &&
    typeof body.update_id === "number"
  );
}

export function createWebhookApp(
  token: string,
  handle: (update: TelegramUpdate) => Promise<void>,
  logger: Logger,
) {
  const app = express();
  app.use(bodyParser.json());

  app.get("/", (_, res) => {
    return res.send("OK");
  });

  app.post(webhookPath(token), (req, res) => {
    const body: unknown = req.body;
    if (!isTelegramUpdate(body)) {
      res.status(400).send({ success: false });
      return;
    }

    // Acknowledge first, then handle.
    res.send({ success: true });
    logger.debug(`Update Received | Update Id: ${body.update_id}`);
    handle(body).catch((err) => {
      logger.error({ err, updateId: body.update_id }, "Failed to handle webhook update");
    });
  });

  return app;
}

export function closeServer(server: Server) {
  return new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve())),
  );
}

/**
 * Listens on `port`, then runs `register` (the setWebhook call). The server is
 * closed again when registration fails.
 */
export async function startWebhookServer(
  app: Express,
  port: number,
  register: (server: Server) => Promise<void>,
): Promise<Server> {
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, () => resolve(listening));
    listening.once("error", reject);
  });

  try {
    await register(server);
  } catch (error) {
    await closeServer(server);
    throw error;
  }
  return server;
}
