import axios, { AxiosError, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { TelegramApiError, TelegramClient } from "./TelegramClient";

type Reply = { status: number; data: unknown };

function fakeTelegram(reply: (config: InternalAxiosRequestConfig) => Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    baseURL: "https://api.telegram.org/bottest-token",
    adapter: async (config) => {
      requests.push(config);
      const { status, data } = reply(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response,
        );
      }
      return response;
    },
  });
  return { client: new TelegramClient(http), requests };
}

function jsonBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === "string" ? JSON.parse(config.data) : config.data;
}

describe("TelegramClient", () => {
  it("posts messages as JSON", async () => {
    const { client, requests } = fakeTelegram(() => ({
      status: 200,
      data: { ok: true, result: { message_id: 1 } },
    }));

    await client.sendMessage(100, "hi");

    expect(requests[0].url).toBe("/sendMessage");
    expect(jsonBody(requests[0])).toEqual({ chat_id: 100, text: "hi" });
  });

  it("long-polls with an HTTP timeout beyond the poll timeout", async () => {
    const { client, requests } = fakeTelegram(() => ({
      status: 200,
      data: { ok: true, result: [{ update_id: 5 }] },
    }));

    const updates = await client.getUpdates(5, 30);

    expect(updates).toEqual([{ update_id: 5 }]);
    expect(requests[0].url).toBe("/getUpdates");
    expect(requests[0].timeout).toBe(40000);
    expect(jsonBody(requests[0])).toEqual({
      offset: 5,
      timeout: 30,
      allowed_updates: ["message"],
    });
  });

  it("uploads documents as multipart form data", async () => {
    const { client, requests } = fakeTelegram(() => ({
      status: 200,
      data: { ok: true, result: { message_id: 2 } },
    }));

    await client.sendDocument(100, "expenses.csv", "id,date\n1,2025-11-13");

    const form = requests[0].data;
    if (!(form instanceof FormData)) {
      throw new Error("expected a FormData body");
    }
    expect(requests[0].url).toBe("/sendDocument");
    expect(form.get("chat_id")).toBe("100");
    const document = form.get("document");
    if (!(document instanceof Blob)) {
      throw new Error("expected a file part");
    }
    expect(await document.text()).toBe("id,date\n1,2025-11-13");
  });

  it("raises the Bot API description when ok is false", async () => {
    const { client } = fakeTelegram(() => ({
      status: 200,
      data: { ok: false, error_code: 400, description: "Bad Request: chat not found" },
    }));

    const error = await client.sendMessage(1, "hi").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TelegramApiError);
    expect(error).toMatchObject({
      message: "Telegram sendMessage failed: Bad Request: chat not found",
      method: "sendMessage",
      errorCode: 400,
    });
  });

  it("raises the Bot API description of an HTTP error", async () => {
    const { client } = fakeTelegram(() => ({
      status: 403,
      data: { ok: false, error_code: 403, description: "Forbidden: bot was blocked by the user" },
    }));

    await expect(client.sendMessage(1, "hi")).rejects.toThrow(
      "Telegram sendMessage failed: Forbidden: bot was blocked by the user",
    );
  });

  it("raises the transport error when there is no Bot API body", async () => {
    const { client } = fakeTelegram(() => ({ status: 502, data: undefined }));

    await expect(client.deleteWebhook()).rejects.toThrow(
      "Telegram deleteWebhook failed: Request failed with status code 502",
    );
  });
});
