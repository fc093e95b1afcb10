/**
 * Month-by-month timesheet totals over [PoP start, query stop].
 * One fetch per calendar month; windows are disjoint, so nothing is counted twice.
 */

import { maxDateKey, minDateKey, type DateKey } from "./calendar.js";
import { formatMonthKey, monthEnd, monthIndices, monthStart, type MonthKey } from "./months.js";
import type { TimesheetSource } from "./repositories.js";
import { entryHours, type TimesheetEntry } from "./timesheet.js";

/** Date range fetched for one month. */
export interface FetchWindow {
  readonly month: MonthKey;
  readonly start: DateKey;
  readonly end: DateKey;
}

export interface Actuals {
  readonly hoursByMonth: ReadonlyMap<MonthKey, number>;
  readonly userIds: ReadonlySet<number>;
}

/** [max(monthStart, popStart), min(monthEnd, queryStop)] for each month touched. */
export function actualsWindows(popStart: DateKey, queryStop: DateKey): FetchWindow[] {
  return monthIndices(popStart, queryStop).map((i) => ({
    month: formatMonthKey(i),
    start: maxDateKey(monthStart(i), popStart),
    end: minDateKey(monthEnd(i), queryStop),
  }));
}

/** Mutable fold target; frozen into Actuals by the caller. */
export class ActualsAccumulator {
  private readonly hours = new Map<MonthKey, number>();
  private readonly users = new Set<number>();

  add(month: MonthKey, entries: readonly TimesheetEntry[]): void {
    let total = 0;
    for (const e of entries) {
      total += entryHours(e);
      this.users.add(e.userId);
    }
    this.hours.set(month, (this.hours.get(month) ?? 0) + total);
  }

  toActuals(): Actuals {
    return { hoursByMonth: new Map(this.hours), userIds: new Set(this.users) };
  }
}

/**
 * Fetch each month sequentially and fold. Any failed fetch rejects the
 * whole collection; an aborted signal stops before the next fetch.
 */
export async function collectActuals(
  source: TimesheetSource,
  jobId: number,
  popStart: DateKey,
  queryStop: DateKey,
  signal?: AbortSignal
): Promise<Actuals> {
  const acc = new ActualsAccumulator();
  for (const w of actualsWindows(popStart, queryStop)) {
    signal?.throwIfAborted();
    const entries = await source.fetchTimesheets(w.start, w.end, [jobId], signal);
    acc.add(w.month, entries);
  }
  return acc.toActuals();
}
