import type { Logger } from "pino";
import { AddConversation } from "./conversation";
import { buildExportCsv, EXPORT_FILENAME } from "./csv";
import { formatIsoDate } from "./formatDate";
import {
  formatQuickSaved,
  formatSummary,
  formatTransactionList,
  HELP_TEXT,
  Replies,
} from "./messages";
import {
  findDate,
  parseListLimit,
  parseQuickCommand,
  parseSummaryPeriod,
  summaryStart,
} from "./parsing";
import { BotApi } from "./tools/TelegramClient";
import { TransactionStore } from "./transactions";
import { TelegramUpdate } from "./types/telegram";

export type CommandRouterOptions = {
  store: TransactionStore;
  api: BotApi;
  logger: Logger;
  timeZone: string;
  defaultCurrency: string;
  /** Commands addressed to another bot (`/list@other_bot`) are ignored when set. */
  botUsername?: string;
  now?: () => Date;
};

type Command = {
  name: string;
  args: string;
};

type Context = {
  chatId: number;
  userId: number;
  key: string;
};

export class CommandRouter {
  private readonly conversation = new AddConversation();
  private readonly now: () => Date;

  constructor(private readonly options: CommandRouterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private today() {
    return formatIsoDate(this.now(), this.options.timeZone);
  }

  /** Splits `/name@bot args`; null for plain text or commands meant for another bot. */
  parseCommand(text: string): Command | null {
    if (!text.startsWith("/")) {
      return null;
    }
    const token = text.split(/\s+/, 1)[0];
    const [name, mention] = token.slice(1).split("@", 2);
    const username = this.options.botUsername;
    if (mention !== undefined && username !== undefined) {
      if (mention.toLowerCase() !== username.toLowerCase()) {
        return null;
      }
    }
    return { name: name.toLowerCase(), args: text.slice(token.length).trim() };
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    if (message?.text === undefined || message.from === undefined) {
      return;
    }

    const chatId = message.chat.id;
    const userId = message.from.id;
    const context: Context = {
      chatId,
      userId,
      key: AddConversation.key(chatId, userId),
    };

    try {
      const command = this.parseCommand(message.text);
      if (command !== null) {
        await this.dispatch(command, context);
      } else if (message.text.startsWith("/")) {
        return;
      } else {
        await this.continueConversation(message.text, context);
      }
    } catch (error) {
      this.options.logger.error(
        { err: error, updateId: update.update_id },
        `Failed to handle update | User Id: ${userId}`,
      );
      await this.options.api.sendMessage(chatId, Replies.failure).catch((err) => {
        this.options.logger.error({ err }, "Failed to send failure reply");
      });
    }
  }

  private async dispatch(command: Command, context: Context) {
    switch (command.name) {
      case "start":
      case "help":
        return this.reply(context, HELP_TEXT);
      case "add":
        return this.reply(context, this.conversation.start(context.key));
      case "cancel":
        // Outside an /add flow there is nothing to cancel.
        if (this.conversation.cancel(context.key)) {
          return this.reply(context, Replies.cancelled);
        }
        return;
      case "quick":
        return this.quick(command.args, context);
      case "list":
        return this.list(command.args, context);
      case "summary":
        return this.summary(command.args, context);
      case "export":
        return this.exportCsv(context);
    }
  }

  private async continueConversation(text: string, context: Context) {
    const result = this.conversation.advance(context.key, text, this.today());
    if (result === null) {
      return;
    }
    if (result.kind === "prompt") {
      return this.reply(context, result.text);
    }

    const id = await this.options.store.insert({
      userId: context.userId,
      category: result.entry.category,
      amount: result.entry.amount,
      date: result.entry.date,
      description: result.entry.description,
      currency: this.options.defaultCurrency,
    });
    this.options.logger.info(`Transaction Saved | User Id: ${context.userId} | Id: ${id}`);
    return this.reply(context, Replies.saved);
  }

  private async quick(args: string, context: Context) {
    const parsed = parseQuickCommand(args);
    if (parsed === null) {
      return this.reply(context, Replies.quickUsage);
    }

    const today = this.today();
    const date = findDate(parsed.rest, today) ?? today;
    const id = await this.options.store.insert({
      userId: context.userId,
      category: parsed.category,
      amount: parsed.amount,
      date,
      description: parsed.description,
      tags: parsed.tags,
      currency: this.options.defaultCurrency,
    });
    this.options.logger.info(`Transaction Saved | User Id: ${context.userId} | Id: ${id}`);
    return this.reply(context, formatQuickSaved(parsed.category, parsed.amount, date));
  }

  private async list(args: string, context: Context) {
    const limit = parseListLimit(args.split(/\s+/)[0] || undefined);
    const rows = await this.options.store.recent(context.userId, limit);
    if (rows.length === 0) {
      return this.reply(context, Replies.noTransactions);
    }
    for (const text of formatTransactionList(rows)) {
      await this.reply(context, text);
    }
  }

  private async summary(args: string, context: Context) {
    const period = parseSummaryPeriod(args.split(/\s+/)[0] || undefined);
    const since = summaryStart(period, this.today());
    const rows = await this.options.store.summary(context.userId, since);
    if (rows.length === 0) {
      return this.reply(context, Replies.noSummary);
    }
    return this.reply(context, formatSummary(rows));
  }

  private async exportCsv(context: Context) {
    const rows = await this.options.store.exportRows(context.userId);
    if (rows.length === 0) {
      return this.reply(context, Replies.noExport);
    }
    await this.options.api.sendDocument(context.chatId, EXPORT_FILENAME, buildExportCsv(rows));
    this.options.logger.info(`Export Sent | User Id: ${context.userId} | Rows: ${rows.length}`);
  }

  private async reply(context: Context, text: string) {
    await this.options.api.sendMessage(context.chatId, text);
  }
}
