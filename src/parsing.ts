import moment from "moment";
import { addDays, ISO_DATE, startOfMonth } from "./formatDate";

export const DEFAULT_LIST_LIMIT = 10;
export const MAX_LIST_LIMIT = 50;

// Day-first: 03/04/2025 is the 3rd of April.
const DATED_FORMATS = [
  "YYYY-MM-DD",
  "YYYY/MM/DD",
  "DD-MM-YYYY",
  "D-M-YYYY",
  "DD/MM/YYYY",
  "D/M/YYYY",
  "D MMM YYYY",
  "D MMMM YYYY",
  "MMM D YYYY",
  "MMMM D YYYY",
  "MMM D, YYYY",
  "MMMM D, YYYY",
];

const YEARLESS_FORMATS = ["D/M", "D-M", "D MMM", "D MMMM", "MMM D", "MMMM D"];

const QUICK_RE = /^([\p{L}\p{N}_-]+)\s+([\d,]+(?:\.\d+)?)\s*(.*)/u;
const DESC_RE = /--desc\s+"([^"]+)"/;
const TAGS_RE = /--tags\s+(\S+)/;

export type QuickCommand = {
  category: string;
  amount: number;
  description: string | null;
  tags: string[] | null;
  /** Free text left after the amount, options removed. */
  rest: string;
};

export type SummaryPeriod = "today" | "week" | "month" | "all";

/** Keeps digits, dots and minus signs, e.g. "₹1,250" -> 1250. */
export function parseAmount(text: string): number | null {
  const cleaned = text.replace(/[^\d.-]/g, "");
  if (cleaned === "") {
    return null;
  }
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
}

export function parseDate(text: string, today: string): string | null {
  const value = text.trim().replace(/[.,;:!?]+$/, "");
  if (value === "") {
    return null;
  }

  switch (value.toLowerCase()) {
    case "today":
      return today;
    case "yesterday":
      return addDays(today, -1);
    case "tomorrow":
      return addDays(today, 1);
  }

  const dated = moment(value, DATED_FORMATS, true);
  if (dated.isValid()) {
    return dated.format(ISO_DATE);
  }

  const year = today.slice(0, 4);
  const yearless = moment(
    `${value} ${year}`,
    YEARLESS_FORMATS.map((format) => `${format} YYYY`),
    true,
  );
  if (yearless.isValid()) {
    return yearless.format(ISO_DATE);
  }
  return null;
}

/** First date mentioned in free text, trying runs of three words before two and one. */
export function findDate(text: string, today: string): string | null {
  const words = text.split(/\s+/).filter((word) => word !== "");
  for (let size = 3; size >= 1; size--) {
    for (let start = 0; start + size <= words.length; start++) {
      const date = parseDate(words.slice(start, start + size).join(" "), today);
      if (date !== null) {
        return date;
      }
    }
  }
  return null;
}

/** Accepts a JSON array or a comma separated list. */
export function parseTags(text: string): string[] | null {
  const trimmed = text.trim();
  if (trimmed === "") {
    return null;
  }

  let tags: string[];
  try {
    const parsed: unknown = JSON.parse(trimmed);
    tags = Array.isArray(parsed) ? parsed.map((tag) => String(tag).trim()) : splitTags(trimmed);
  } catch {
    tags = splitTags(trimmed);
  }

  const nonEmpty = tags.filter((tag) => tag !== "");
  return nonEmpty.length > 0 ? nonEmpty : null;
}

function splitTags(text: string) {
  return text.split(",").map((tag) => tag.trim());
}

export function parseQuickCommand(payload: string): QuickCommand | null {
  const match = QUICK_RE.exec(payload.trim());
  if (match === null) {
    return null;
  }

  const [, category, rawAmount, tail] = match;
  const digits = rawAmount.replace(/,/g, "");
  if (digits === "") {
    return null;
  }

  let rest = tail.trim();
  let description: string | null = null;
  const descMatch = DESC_RE.exec(rest);
  if (descMatch !== null) {
    description = descMatch[1];
    rest = rest.replace(descMatch[0], "");
  }

  let tags: string[] | null = null;
  const tagsMatch = TAGS_RE.exec(rest);
  if (tagsMatch !== null) {
    tags = parseTags(tagsMatch[1]);
    rest = rest.replace(tagsMatch[0], "");
  }

  return {
    category,
    amount: Number(digits),
    description,
    tags,
    rest: rest.replace(/\s+/g, " ").trim(),
  };
}

export function parseListLimit(arg: string | undefined): number {
  if (arg === undefined || !/^-?\d+$/.test(arg)) {
    return DEFAULT_LIST_LIMIT;
  }
  const limit = Number(arg);
  if (limit < 1) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.min(limit, MAX_LIST_LIMIT);
}

export function parseSummaryPeriod(arg: string | undefined): SummaryPeriod {
  switch (arg?.toLowerCase()) {
    case "today":
      return "today";
    case "week":
      return "week";
    case "all":
      return "all";
    default:
      return "month";
  }
}

/** Inclusive lower bound for a summary, or null for all time. */
export function summaryStart(period: SummaryPeriod, today: string): string | null {
  switch (period) {
    case "today":
      return today;
    case "week":
      return addDays(today, -7);
    case "all":
      return null;
    case "month":
      return startOfMonth(today);
  }
}
