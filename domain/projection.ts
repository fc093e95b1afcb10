/**
 * Projected hours for (query stop, PoP end], bucketed by month.
 * Pure domain; no Date.now usage.
 */

import { maxDateKey, minDateKey, nextDay, HolidayCache, type DateKey } from "./calendar.js";
import { formatMonthKey, monthEnd, monthIndices, monthStart, type MonthKey } from "./months.js";
import { projectedHours } from "./workingDays.js";

/** True when PoP end is strictly after the query stop. */
export function hasProjection(queryStop: DateKey, popEnd: DateKey): boolean {
  return popEnd > queryStop;
}

/**
 * Projected hours per month from the day after queryStop through popEnd.
 * Months whose sub-range is empty get no entry.
 */
export function projectRemaining(
  queryStop: DateKey,
  popEnd: DateKey,
  holidays: HolidayCache = new HolidayCache()
): Map<MonthKey, number> {
  const result = new Map<MonthKey, number>();
  if (!hasProjection(queryStop, popEnd)) return result;

  const firstDay = nextDay(queryStop);
  for (const i of monthIndices(firstDay, popEnd)) {
    const start = maxDateKey(monthStart(i), firstDay);
    const end = minDateKey(monthEnd(i), popEnd);
    if (start > end) continue;
    result.set(formatMonthKey(i), projectedHours(start, end, holidays));
  }
  return result;
}

/** Sum buckets month by month; a month present in several maps accumulates. */
export function mergeMonthlyHours(
  ...buckets: ReadonlyArray<ReadonlyMap<MonthKey, number>>
): Map<MonthKey, number> {
  const merged = new Map<MonthKey, number>();
  for (const bucket of buckets) {
    for (const [month, hours] of bucket) {
      merged.set(month, (merged.get(month) ?? 0) + hours);
    }
  }
  return merged;
}
