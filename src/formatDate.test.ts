import { describe, expect, it } from "vitest";
import { addDays, formatIsoDate, startOfMonth } from "./formatDate";

describe("formatIsoDate", () => {
  it("uses the calendar date of the given zone", () => {
    const instant = new Date("2025-11-13T20:00:00Z");
    expect(formatIsoDate(instant, "UTC")).toBe("2025-11-13");
    expect(formatIsoDate(instant, "Asia/Kolkata")).toBe("2025-11-14");
  });
});

describe("date arithmetic", () => {
  it("crosses month boundaries", () => {
    expect(addDays("2025-03-01", -1)).toBe("2025-02-28");
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
  });

  it("finds the first day of the month", () => {
    expect(startOfMonth("2025-11-13")).toBe("2025-11-01");
  });
});
