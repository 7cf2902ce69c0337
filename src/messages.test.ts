import { describe, expect, it } from "vitest";
import { chunkLines, formatAmount, formatTransactionList, MESSAGE_LIMIT } from "./messages";

describe("chunkLines", () => {
  it("packs lines into messages up to the limit", () => {
    expect(chunkLines(["aaa", "bb", "c"], 6)).toEqual(["aaa\nbb", "c"]);
    expect(chunkLines(["aaa", "bb", "c"])).toEqual(["aaa\nbb\nc"]);
  });

  it("cuts a line longer than the limit", () => {
    expect(chunkLines(["abcdefgh", "ij"], 4)).toEqual(["abcd", "ij"]);
  });

  it("returns no messages for no lines", () => {
    expect(chunkLines([])).toEqual([]);
  });
});

describe("formatTransactionList", () => {
  it("keeps every message within the Telegram limit", () => {
    const rows = Array.from({ length: 50 }, (_, i) => ({
      id: i + 1,
      category: "food",
      amount: 250,
      date: "2025-11-12",
      description: "x".repeat(200),
    }));

    const messages = formatTransactionList(rows);

    expect(messages.length).toBeGreaterThan(1);
    expect(messages.every((text) => text.length <= MESSAGE_LIMIT)).toBe(true);
    expect(messages.join("\n").split("\n")).toHaveLength(50);
    expect(messages[0].startsWith(`2025-11-12 | food | 250 | ${"x".repeat(200)} (id:1)`)).toBe(true);
  });
});

describe("formatAmount", () => {
  it("rounds to two decimals", () => {
    expect(formatAmount(0.1 + 0.2)).toBe("0.3");
    expect(formatAmount(1250)).toBe("1250");
  });
});
