import { describe, expect, it } from "vitest";
import {
  formatMonthKey,
  monthEnd,
  monthIndexOf,
  monthKeys,
  monthStart,
  parseMonthKey,
  startOfNextMonth,
} from "./months.js";

describe("month keys", () => {
  it("index round-trips through the key", () => {
    const idx = monthIndexOf("2025-01-15");
    expect(idx).toBe(2025 * 12);
    expect(formatMonthKey(idx)).toBe("2025-01");
    expect(parseMonthKey("2025-01")).toBe(idx);
    expect(formatMonthKey(monthIndexOf("2024-12-31"))).toBe("2024-12");
  });

  it("parseMonthKey rejects malformed keys", () => {
    expect(parseMonthKey("2025-13")).toBeNull();
    expect(parseMonthKey("2025-00")).toBeNull();
    expect(parseMonthKey("2025-1")).toBeNull();
    expect(parseMonthKey("garbage")).toBeNull();
  });

  it("month bounds", () => {
    const feb2024 = parseMonthKey("2024-02") ?? 0;
    expect(monthStart(feb2024)).toBe("2024-02-01");
    expect(monthEnd(feb2024)).toBe("2024-02-29");
  });

  it("startOfNextMonth rolls the year", () => {
    expect(startOfNextMonth("2025-12")).toBe("2026-01-01");
    expect(startOfNextMonth("2025-02")).toBe("2025-03-01");
    expect(startOfNextMonth("bad")).toBeNull();
  });
});

describe("monthKeys", () => {
  it("inclusive across a year boundary", () => {
    expect(monthKeys("2024-11-15", "2025-02-01")).toEqual(["2024-11", "2024-12", "2025-01", "2025-02"]);
  });

  it("same month → one key", () => {
    expect(monthKeys("2025-03-01", "2025-03-31")).toEqual(["2025-03"]);
  });

  it("reversed range → []", () => {
    expect(monthKeys("2025-03-01", "2025-01-31")).toEqual([]);
  });
});
