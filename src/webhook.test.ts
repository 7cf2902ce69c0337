import axios from "axios";
import { Server } from "http";
import pino from "pino";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { TelegramUpdate } from "./types/telegram";
import { closeServer, createWebhookApp, startWebhookServer, webhookPath } from "./webhook";

const token = "test-token";
const logger = pino({ enabled: false });

function baseUrl(server: Server) {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return `http://127.0.0.1:${address.port}`;
}

describe("createWebhookApp", () => {
  const handle = vi.fn(async (_update: TelegramUpdate) => {});
  const http = axios.create({ validateStatus: () => true });
  let server: Server;
  let url: string;

  beforeAll(async () => {
    server = await startWebhookServer(createWebhookApp(token, handle, logger), 0, async () => {});
    url = baseUrl(server);
  });

  afterAll(async () => {
    await closeServer(server);
  });

  beforeEach(() => {
    handle.mockClear();
  });

  it("acknowledges an update and hands it on", async () => {
    const update: TelegramUpdate = {
      update_id: 7,
      message: { message_id: 1, date: 1763015400, chat: { id: 100, type: "private" }, text: "/help" },
    };

    const response = await http.post(`${url}${webhookPath(token)}`, update);

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ success: true });
    await vi.waitFor(() => expect(handle).toHaveBeenCalledWith(update));
  });

  it("still acknowledges when handling fails", async () => {
    handle.mockRejectedValueOnce(new Error("database unavailable"));

    const response = await http.post(`${url}${webhookPath(token)}`, { update_id: 8 });

    expect(response.status).toBe(200);
    await vi.waitFor(() => expect(handle).toHaveBeenCalledTimes(1));
  });

  it("rejects a body without an update id", async () => {
    const response = await http.post(`${url}${webhookPath(token)}`, { message: "hello" });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ success: false });
    expect(handle).not.toHaveBeenCalled();
  });

  it("does not serve other tokens", async () => {
    const response = await http.post(`${url}${webhookPath("other-token")}`, { update_id: 9 });

    expect(response.status).toBe(404);
    expect(handle).not.toHaveBeenCalled();
  });

  it("answers health checks", async () => {
    const response = await http.get(`${url}/`);

    expect(response.status).toBe(200);
    expect(response.data).toBe("OK");
  });
});

describe("startWebhookServer", () => {
  it("closes the server when registration fails", async () => {
    const started: { server?: Server } = {};
    const app = createWebhookApp(token, async () => {}, logger);

    await expect(
      startWebhookServer(app, 0, async (server) => {
        started.server = server;
        throw new Error("Telegram setWebhook failed: bad webhook: HTTPS url must be provided");
      }),
    ).rejects.toThrow("HTTPS url must be provided");

    expect(started.server?.listening).toBe(false);
  });
});
