/**
 * Stepped cumulative ceiling on the chart's month axis.
 * A month's value includes every release dated before the next month starts.
 */

import type { CeilingRelease } from "./ceilingRecord.js";
import { sortReleases } from "./ceilingRecord.js";
import { startOfNextMonth, type MonthKey } from "./months.js";

/** Share of the ceiling drawn as the warning line. */
export const CEILING_WARNING_RATIO = 0.75;

export interface CeilingSeries {
  /** Aligned to the month axis. */
  readonly ceilingSeries: readonly number[];
  readonly ceiling75Series: readonly number[];
}

/**
 * Single forward pass over the sorted releases; each release is
 * accrued once. Returns null when every month's ceiling is zero
 * (no ceiling configured). A malformed month key repeats the previous value.
 */
export function accrueCeiling(
  releases: readonly CeilingRelease[],
  months: readonly MonthKey[]
): CeilingSeries | null {
  const sorted = sortReleases(releases);
  if (sorted.length === 0) return null;

  const values: number[] = [];
  let running = 0;
  let cursor = 0;

  for (const month of months) {
    const nextMonthStart = startOfNextMonth(month);
    if (nextMonthStart == null) {
      values.push(values[values.length - 1] ?? 0);
      continue;
    }
    while (cursor < sorted.length) {
      const release = sorted[cursor];
      if (release == null || release.date >= nextMonthStart) break;
      running += release.hours;
      cursor++;
    }
    values.push(running);
  }

  if (values.every((v) => v === 0)) return null;

  return {
    ceilingSeries: values,
    ceiling75Series: values.map((v) => v * CEILING_WARNING_RATIO),
  };
}
