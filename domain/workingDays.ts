/**
 * Working days: Mon-Fri minus observed federal holidays.
 * No external libs.
 */

import { HolidayCache, isWeekend, nextDay, type DateKey } from "./calendar.js";

/** Standard billable day. */
export const HOURS_PER_WORKING_DAY = 8;

/** True if date is a weekday and not a holiday of its own year. */
export function isWorkingDay(date: DateKey, holidays: HolidayCache = new HolidayCache()): boolean {
  if (isWeekend(date)) return false;
  return !holidays.isHoliday(date);
}

/**
 * Working days in [start, end], both inclusive. start > end → 0.
 * Holiday sets are computed once per distinct year; pass a cache to share
 * them across calls.
 */
export function workingDays(
  start: DateKey,
  end: DateKey,
  holidays: HolidayCache = new HolidayCache()
): number {
  if (start > end) return 0;
  let count = 0;
  let d = start;
  while (d <= end) {
    if (isWorkingDay(d, holidays)) count++;
    d = nextDay(d);
  }
  return count;
}

/** Projected hours for [start, end] at a full day per working day. */
export function projectedHours(start: DateKey, end: DateKey, holidays?: HolidayCache): number {
  return workingDays(start, end, holidays) * HOURS_PER_WORKING_DAY;
}
