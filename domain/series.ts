/**
 * Month axis, per-month and running totals,
 * and where the projected part of the axis begins.
 */

import { maxDateKey, nextDay, type DateKey } from "./calendar.js";
import { monthIndexOf, monthKeys, parseMonthKey, type MonthKey } from "./months.js";
import { hasProjection } from "./projection.js";

export interface SeriesPoint {
  readonly month: MonthKey;
  readonly value: number;
}

export type Series = readonly SeriesPoint[];

export interface CumulativeSeries {
  readonly monthlySeries: Series;
  readonly cumulativeSeries: Series;
}

/** [PoP-start month, max(query-stop month, PoP-end month)], no gaps. */
export function chartMonths(popStart: DateKey, popEnd: DateKey, queryStop: DateKey): MonthKey[] {
  return monthKeys(popStart, maxDateKey(queryStop, popEnd));
}

/** Per-month hours (missing → 0) and their running sum. */
export function buildCumulativeSeries(
  months: readonly MonthKey[],
  hoursByMonth: ReadonlyMap<MonthKey, number>
): CumulativeSeries {
  const monthlySeries: SeriesPoint[] = [];
  const cumulativeSeries: SeriesPoint[] = [];
  let running = 0;
  for (const month of months) {
    const value = hoursByMonth.get(month) ?? 0;
    running += value;
    monthlySeries.push({ month, value });
    cumulativeSeries.push({ month, value: running });
  }
  return { monthlySeries, cumulativeSeries };
}

/**
 * Index of the first projected month, or undefined when nothing is projected.
 *
 * Query stop after today: projected from the month holding the day after
 * the query stop. Query stop today or earlier: projected only after the
 * query stop's own month, so a mid-month stop in the past keeps its month
 * drawn as actual even though it carries projected hours.
 */
export function projectedStartIndex(
  months: readonly MonthKey[],
  queryStop: DateKey,
  popEnd: DateKey,
  today: DateKey
): number | undefined {
  if (!hasProjection(queryStop, popEnd)) return undefined;

  const isFuture = queryStop > today;
  const boundary = isFuture ? monthIndexOf(nextDay(queryStop)) : monthIndexOf(queryStop) + 1;

  const idx = months.findIndex((m) => {
    const i = parseMonthKey(m);
    return i != null && i >= boundary;
  });
  return idx === -1 ? undefined : idx;
}
