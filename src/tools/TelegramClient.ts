import axios, { AxiosInstance, isAxiosError } from "axios";
import https from "https";
import { TelegramResponse, TelegramUpdate, TelegramUser } from "../types/telegram";

const agent = new https.Agent({ family: 4 }); // forces IPv4

export const TELEGRAM_API_BASE = "https://api.telegram.org";

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    message: string,
    readonly errorCode?: number,
  ) {
    super(`Telegram ${method} failed: ${message}`);
    this.name = "TelegramApiError";
  }
}

/** What command handlers need to answer a user. */
export interface BotApi {
  sendMessage(chatId: number, text: string): Promise<void>;
  sendDocument(chatId: number, filename: string, contents: string): Promise<void>;
}

export class TelegramClient implements BotApi {
  constructor(private readonly http: AxiosInstance) {}

  static create(token: string): TelegramClient {
    return new TelegramClient(
      axios.create({
        baseURL: `${TELEGRAM_API_BASE}/bot${token}`,
        httpsAgent: agent,
      }),
    );
  }

  private async call<T>(
    method: string,
    body: Record<string, unknown> | FormData,
    timeoutMs = 15000,
  ): Promise<T> {
    let data: TelegramResponse<T>;
    try {
      const response = await this.http.post<TelegramResponse<T>>(`/${method}`, body, {
        timeout: timeoutMs,
      });
      data = response.data;
    } catch (error) {
      if (isAxiosError<TelegramResponse<T>>(error)) {
        const failure = error.response?.data;
        if (failure !== undefined && !failure.ok) {
          throw new TelegramApiError(method, failure.description, failure.error_code);
        }
        throw new TelegramApiError(method, error.message);
      }
      throw error;
    }

    if (!data.ok) {
      throw new TelegramApiError(method, data.description, data.error_code);
    }
    return data.result;
  }

  async getMe(): Promise<TelegramUser> {
    return this.call<TelegramUser>("getMe", {});
  }

  /** Long-polls for updates; resolves with an empty list when the timeout passes quietly. */
  async getUpdates(offset: number | undefined, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    return this.call<TelegramUpdate[]>(
      "getUpdates",
      { offset, timeout: timeoutSeconds, allowed_updates: ["message"] },
      (timeoutSeconds + 10) * 1000,
    );
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.call("sendMessage", { chat_id: chatId, text });
  }

  async sendDocument(chatId: number, filename: string, contents: string): Promise<void> {
    const form = new FormData();
    form.append("chat_id", String(chatId));
    form.append("document", new Blob([contents], { type: "text/csv" }), filename);
    await this.call("sendDocument", form, 60000);
  }

  async setWebhook(url: string): Promise<void> {
    await this.call("setWebhook", { url, allowed_updates: ["message"] });
  }

  async deleteWebhook(): Promise<void> {
    await this.call("deleteWebhook", { drop_pending_updates: false });
  }
}
