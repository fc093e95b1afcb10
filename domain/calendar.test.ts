import { describe, expect, it } from "vitest";
import {
  addDays,
  dateKeyFromDate,
  federalHolidays,
  HolidayCache,
  isDateKey,
  observedDate,
  toDateKey,
  weekdayOf,
} from "./calendar.js";

describe("date keys", () => {
  it("isDateKey rejects impossible days and bad shapes", () => {
    expect(isDateKey("2024-02-29")).toBe(true);
    expect(isDateKey("2025-02-29")).toBe(false);
    expect(isDateKey("2025-13-01")).toBe(false);
    expect(isDateKey("2025-1-01")).toBe(false);
    expect(isDateKey(20250101)).toBe(false);
  });

  it("addDays crosses month and year", () => {
    expect(addDays("2025-01-31", 1)).toBe("2025-02-01");
    expect(addDays("2025-01-01", -1)).toBe("2024-12-31");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
  });

  it("weekdayOf: 0=Sun..6=Sat", () => {
    expect(weekdayOf("2025-01-01")).toBe(3); // Wed
    expect(weekdayOf("2025-02-15")).toBe(6); // Sat
  });

  it("dateKeyFromDate floors to the day in the timezone", () => {
    const instant = new Date("2025-03-01T03:00:00Z");
    expect(dateKeyFromDate(instant, "America/New_York")).toBe("2025-02-28");
    expect(dateKeyFromDate(instant, "UTC")).toBe("2025-03-01");
  });

  it("toDateKey passes keys through and floors timestamps", () => {
    expect(toDateKey("2025-06-30", "America/New_York")).toBe("2025-06-30");
    expect(toDateKey("2025-03-01T03:00:00Z", "America/New_York")).toBe("2025-02-28");
    expect(toDateKey("not a date", "UTC")).toBeNull();
  });
});

describe("federalHolidays", () => {
  it("2025 observed set", () => {
    expect([...federalHolidays(2025)].sort()).toEqual([
      "2025-01-01",
      "2025-01-20",
      "2025-02-17",
      "2025-05-26",
      "2025-06-19",
      "2025-07-04",
      "2025-09-01",
      "2025-10-13",
      "2025-11-11",
      "2025-11-27",
      "2025-12-25",
    ]);
  });

  it("Saturday holiday observed Friday", () => {
    // 2026-07-04 = Saturday
    expect(observedDate("2026-07-04")).toBe("2026-07-03");
    expect(federalHolidays(2026).has("2026-07-03")).toBe(true);
    expect(federalHolidays(2026).has("2026-07-04")).toBe(false);
  });

  it("Sunday holiday observed Monday", () => {
    // 2022-12-25 = Sunday
    expect(observedDate("2022-12-25")).toBe("2022-12-26");
    expect(federalHolidays(2022).has("2022-12-26")).toBe(true);
  });

  it("Jan 1 on a Saturday is observed Dec 31 and listed under the new year", () => {
    // 2022-01-01 = Saturday
    expect(federalHolidays(2022).has("2021-12-31")).toBe(true);
    expect(federalHolidays(2021).has("2021-12-31")).toBe(false);
  });
});

describe("HolidayCache", () => {
  it("computes each year once", () => {
    const cache = new HolidayCache();
    expect(cache.isHoliday("2025-01-20")).toBe(true);
    expect(cache.isHoliday("2025-01-21")).toBe(false);
    expect(cache.size).toBe(1);
    expect(cache.isHoliday("2026-07-03")).toBe(true);
    expect(cache.size).toBe(2);
  });

  it("looks a date up in its own year only", () => {
    const cache = new HolidayCache();
    expect(cache.isHoliday("2021-12-31")).toBe(false);
  });
});
