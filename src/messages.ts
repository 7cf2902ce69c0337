import { CategoryTotalRow, TransactionListRow } from "./types/database";

export const HELP_TEXT =
  "Hi! I'm your Expense Tracker Bot.\n\n" +
  "Commands:\n" +
  "/add - interactive add\n" +
  '/quick <category> <amount> [free text] --desc "your description"\n' +
  "/list [n] - last n items\n" +
  "/summary [today|week|month|all]\n" +
  "/export - get CSV\n" +
  "/help - this message";

export const Prompts = {
  category: "Enter category (e.g. food, petrol, creditcard, emi):",
  amount: "Enter amount (numbers):",
  amountRetry: "Couldn't parse amount. Enter numeric amount:",
  date: "Enter date (YYYY-MM-DD) or text like 'today' or '2025-11-13':",
  dateRetry: "Couldn't parse date. Please try again:",
  description: "Enter description (optional):",
} as const;

export const Replies = {
  saved: "Saved ✅",
  cancelled: "Cancelled.",
  quickUsage: 'Use: /quick <category> <amount> [free text] --desc "..."',
  noTransactions: "No transactions yet.",
  noSummary: "No transactions for the selected period.",
  noExport: "No data to export.",
  failure: "Something went wrong. Please try again later.",
} as const;

/** Telegram rejects longer texts. */
export const MESSAGE_LIMIT = 4096;

// Rounded to two decimals.
export function formatAmount(amount: number) {
  return String(Math.round(amount * 100) / 100);
}

export function formatQuickSaved(category: string, amount: number, date: string) {
  return `Saved: ${category} ${formatAmount(amount)} on ${date} ✅`;
}

/** Joins lines into as few messages as fit the limit; a line longer than the limit is cut. */
export function chunkLines(lines: string[], limit = MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const line of lines) {
    const fitted = line.slice(0, limit);
    if (current === "") {
      current = fitted;
    } else if (current.length + 1 + fitted.length <= limit) {
      current += `\n${fitted}`;
    } else {
      chunks.push(current);
      current = fitted;
    }
  }
  if (current !== "") {
    chunks.push(current);
  }
  return chunks;
}

/** One message per chunk of rows. */
export function formatTransactionList(rows: TransactionListRow[]): string[] {
  return chunkLines(
    rows.map(
      (row) =>
        `${row.date} | ${row.category} | ${formatAmount(row.amount)} | ${row.description ?? ""} (id:${row.id})`,
    ),
  );
}

export function formatSummary(rows: CategoryTotalRow[]) {
  return `Summary:\n${rows.map((row) => `${row.category} : ${formatAmount(row.total)}`).join("\n")}`;
}
