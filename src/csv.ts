import { TransactionExportRow } from "./types/database";

export const EXPORT_FILENAME = "expenses.csv";
export const EXPORT_HEADER = "id,date,category,amount,currency,description";

export function csvEscape(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** The description column is always quoted. */
export function buildExportCsv(rows: TransactionExportRow[]): string {
  const lines = [EXPORT_HEADER];
  for (const row of rows) {
    const description = (row.description ?? "").replace(/"/g, '""');
    lines.push(
      [
        String(row.id),
        row.date,
        csvEscape(row.category),
        String(row.amount),
        csvEscape(row.currency ?? ""),
        `"${description}"`,
      ].join(","),
    );
  }
  return lines.join("\n");
}
