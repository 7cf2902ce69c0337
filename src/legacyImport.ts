import type { Knex } from "knex";
import moment from "moment";
import type { Logger } from "pino";
import { ISO_DATE } from "./formatDate";
import { Queryable } from "./transactions";
import { LegacyTransactionRow } from "./types/database";

export const IMPORT_BATCH_SIZE = 500;

const LEGACY_DATE_FORMATS = ["YYYY-MM-DD", "YYYY-MM-DD HH:mm:ss", "DD-MM-YYYY", "DD/MM/YYYY"];

export const IMPORT_COLUMNS = [
  "id",
  "user_id",
  "category",
  "amount",
  "currency",
  "date",
  "description",
  "tags",
  "merchant",
  "payment_method",
  "transaction_type",
  "is_recurring",
  "recurring_period",
  "status",
  "bill_due_date",
  "attachment_url",
  "created_at",
  "updated_at",
] as const;

type ImportColumn = (typeof IMPORT_COLUMNS)[number];

export type ImportRow = {
  id: number;
  user_id: number | string | null;
  category: string;
  amount: number;
  currency: string;
  date: string;
  description: string | null;
  /** JSON text, cast to jsonb on insert. */
  tags: string | null;
  merchant: string | null;
  payment_method: string | null;
  transaction_type: string;
  is_recurring: boolean;
  recurring_period: string | null;
  status: string;
  bill_due_date: string | null;
  attachment_url: string | null;
  created_at: string | null;
  updated_at: string | null;
};

export type ImportSummary = {
  inserted: number;
  skipped: number;
};

/**
 * Known formats become YYYY-MM-DD; anything else is passed through for
 * PostgreSQL to interpret.
 */
export function normalizeLegacyDate(value: string | null | undefined): string | null {
  if (value === null || value === undefined || value.trim() === "") {
    return null;
  }
  const parsed = moment(value.trim(), LEGACY_DATE_FORMATS, true);
  return parsed.isValid() ? parsed.format(ISO_DATE) : value.trim();
}

/** JSON text is kept whatever its type; other text becomes a comma-split array. */
export function normalizeLegacyTags(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  if (trimmed === "") {
    return null;
  }

  let tags: unknown;
  try {
    tags = JSON.parse(trimmed);
  } catch {
    tags = trimmed
      .split(",")
      .map((tag) => tag.trim())
      .filter((tag) => tag !== "");
  }
  return tags === null ? null : JSON.stringify(tags);
}

/** Null when the row lacks a column the table requires. */
export function normalizeLegacyRow(row: LegacyTransactionRow): ImportRow | null {
  const date = normalizeLegacyDate(row.date);
  const amount = Number(row.amount);
  if (
    row.id === null ||
    row.id === undefined ||
    !row.category ||
    row.amount === null ||
    row.amount === undefined ||
    !Number.isFinite(amount) ||
    date === null
  ) {
    return null;
  }

  return {
    id: row.id,
    user_id: row.user_id ?? null,
    category: row.category,
    amount,
    currency: row.currency || "INR",
    date,
    description: row.description ?? null,
    tags: normalizeLegacyTags(row.tags),
    merchant: row.merchant ?? null,
    payment_method: row.payment_method ?? null,
    transaction_type: row.transaction_type || "expense",
    is_recurring:
      row.is_recurring === null || row.is_recurring === undefined ? false : Boolean(row.is_recurring),
    recurring_period: row.recurring_period ?? null,
    status: row.status || "paid",
    bill_due_date: normalizeLegacyDate(row.bill_due_date),
    attachment_url: row.attachment_url ?? null,
    created_at: row.created_at ?? null,
    updated_at: row.updated_at ?? null,
  };
}

function placeholder(column: ImportColumn, index: number) {
  return column === "tags" ? `$${index}::jsonb` : `$${index}`;
}

/** Multi-row INSERT that leaves rows whose id already exists untouched. */
export function buildImportInsert(rows: ImportRow[]): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const slots = IMPORT_COLUMNS.map((column) => {
      values.push(row[column]);
      return placeholder(column, values.length);
    });
    return `(${slots.join(", ")})`;
  });

  return {
    text: `INSERT INTO transactions (${IMPORT_COLUMNS.join(", ")})
      VALUES ${tuples.join(",\n      ")}
      ON CONFLICT (id) DO NOTHING`,
    values,
  };
}

export async function importLegacyTransactions(
  source: Knex,
  pool: Queryable,
  logger: Logger,
  batchSize = IMPORT_BATCH_SIZE,
): Promise<ImportSummary> {
  const summary: ImportSummary = { inserted: 0, skipped: 0 };

  for (let offset = 0; ; offset += batchSize) {
    const batch: LegacyTransactionRow[] = await source<LegacyTransactionRow>("transactions")
      .select("*")
      .orderBy("id")
      .limit(batchSize)
      .offset(offset);
    if (batch.length === 0) {
      break;
    }

    const rows: ImportRow[] = [];
    for (const legacy of batch) {
      const row = normalizeLegacyRow(legacy);
      if (row === null) {
        summary.skipped++;
        logger.warn(`Skipping incomplete row | Id: ${legacy.id ?? "none"}`);
      } else {
        rows.push(row);
      }
    }

    if (rows.length > 0) {
      const insert = buildImportInsert(rows);
      const result = await pool.query(insert.text, insert.values);
      summary.inserted += result.rowCount ?? 0;
    }
    logger.info(`Imported ${summary.inserted} rows...`);

    if (batch.length < batchSize) {
      break;
    }
  }

  // Keep SERIAL ahead of the ids that were copied over verbatim.
  await pool.query(
    `SELECT setval(
       pg_get_serial_sequence('transactions', 'id'),
       COALESCE((SELECT MAX(id) FROM transactions), 0) + 1,
       false
     )`,
  );

  return summary;
}
