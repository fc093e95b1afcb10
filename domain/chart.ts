/**
 * Burn chart generation: validate the range, fold monthly actuals,
 * projects the rest of the PoP and lays the ceiling over the same months.
 *
 * Returns a typed outcome; never a partial chart.
 */

import { HolidayCache, type DateKey } from "./calendar.js";
import { collectActuals } from "./actuals.js";
import { accrueCeiling } from "./ceiling.js";
import { EMPTY_CEILING_RECORD, type CeilingRecord, type CeilingRelease } from "./ceilingRecord.js";
import { resolveEmployeeNames } from "./employees.js";
import { classifyError, DomainError, PersistenceError, ValidationError, type ErrorKind } from "./errors.js";
import type { MonthKey } from "./months.js";
import { mergeMonthlyHours, projectRemaining } from "./projection.js";
import type { CeilingRepo, TimesheetSource } from "./repositories.js";
import type { User } from "./timesheet.js";
import { buildCumulativeSeries, chartMonths, projectedStartIndex, type Series } from "./series.js";
import { invariant, validateChartRange } from "./validation.js";

export interface ChartRequest {
  readonly jobId: number;
  /** Falls back to the stored record's PoP when absent. */
  readonly popStart?: DateKey;
  readonly popEnd?: DateKey;
  readonly queryStop: DateKey;
}

export interface BurnChart {
  readonly jobId: number;
  readonly popStart: DateKey;
  readonly popEnd: DateKey;
  readonly queryStop: DateKey;
  readonly cumulativeSeries: Series;
  readonly monthlySeries: Series;
  /** Running total over actual and projected months, same as cumulativeSeries. */
  readonly cumulativeActualSeries: Series;
  readonly ceilingSeries?: readonly number[];
  readonly ceiling75Series?: readonly number[];
  readonly projectedStartIndex?: number;
  readonly employeeNames: readonly string[];
}

export interface ChartFailure {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export type ChartOutcome =
  | { readonly ok: true; readonly chart: BurnChart; readonly warnings: readonly string[] }
  | { readonly ok: false; readonly error: ChartFailure };

export interface ChartDeps {
  readonly timesheets: TimesheetSource;
  readonly ceilings: CeilingRepo;
  /** Calendar day "now", for the projection boundary. */
  readonly today: () => DateKey;
}

export interface ChartOptions {
  readonly signal?: AbortSignal;
}

/** Pure assembly once the inputs are in hand. */
export function assembleChart(input: {
  readonly jobId: number;
  readonly popStart: DateKey;
  readonly popEnd: DateKey;
  readonly queryStop: DateKey;
  readonly today: DateKey;
  readonly actualHours: ReadonlyMap<MonthKey, number>;
  readonly userIds: ReadonlySet<number>;
  readonly record: CeilingRecord;
  readonly usersById: ReadonlyMap<number, User>;
  readonly holidays?: HolidayCache;
}): BurnChart {
  const { jobId, popStart, popEnd, queryStop, today } = input;
  invariant(popStart <= popEnd, "PoP start must not be after PoP end", { popStart, popEnd });

  const months = chartMonths(popStart, popEnd, queryStop);
  const projected = projectRemaining(queryStop, popEnd, input.holidays ?? new HolidayCache());
  const hours = mergeMonthlyHours(input.actualHours, projected);
  const { monthlySeries, cumulativeSeries } = buildCumulativeSeries(months, hours);
  const startIdx = projectedStartIndex(months, queryStop, popEnd, today);
  const ceiling = accrueCeiling(input.record.releases, months);

  return {
    jobId,
    popStart,
    popEnd,
    queryStop,
    cumulativeSeries,
    monthlySeries,
    cumulativeActualSeries: cumulativeSeries,
    ...(ceiling != null && {
      ceilingSeries: ceiling.ceilingSeries,
      ceiling75Series: ceiling.ceiling75Series,
    }),
    ...(startIdx != null && { projectedStartIndex: startIdx }),
    employeeNames: resolveEmployeeNames(input.userIds, input.usersById),
  };
}

/** Same chart with the ceiling re-accrued from edited releases. */
export function withCeiling(chart: BurnChart, releases: readonly CeilingRelease[]): BurnChart {
  const { ceilingSeries: _previous, ceiling75Series: _previous75, ...rest } = chart;
  const ceiling = accrueCeiling(
    releases,
    chart.cumulativeSeries.map((p) => p.month)
  );
  return {
    ...rest,
    ...(ceiling != null && {
      ceilingSeries: ceiling.ceilingSeries,
      ceiling75Series: ceiling.ceiling75Series,
    }),
  };
}

function failure(kind: ErrorKind, message: string, details?: Record<string, unknown>): ChartOutcome {
  return { ok: false, error: { kind, message, ...(details != null && { details }) } };
}

/**
 * Generate the burn chart for one job.
 * Validation runs before any fetch; a failed month fetch aborts the whole run.
 * A ceiling record that cannot be read is replaced by an empty one and
 * reported in `warnings`.
 */
export async function generateChart(
  request: ChartRequest,
  deps: ChartDeps,
  options: ChartOptions = {}
): Promise<ChartOutcome> {
  const warnings: string[] = [];

  let record: CeilingRecord;
  try {
    record = await deps.ceilings.loadRecord(request.jobId);
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    warnings.push(`Ceiling record unavailable: ${err.message}`);
    record = EMPTY_CEILING_RECORD;
  }

  let range: { popStart: DateKey; popEnd: DateKey };
  try {
    range = validateChartRange(
      request.popStart ?? record.popStart,
      request.popEnd ?? record.popEnd,
      request.queryStop
    );
  } catch (err) {
    if (err instanceof ValidationError) return failure("validation", err.message, err.metadata);
    throw err;
  }

  const { signal } = options;
  try {
    const usersById = await deps.timesheets.fetchUsers();
    const actuals = await collectActuals(
      deps.timesheets,
      request.jobId,
      range.popStart,
      request.queryStop,
      signal
    );
    const chart = assembleChart({
      jobId: request.jobId,
      popStart: range.popStart,
      popEnd: range.popEnd,
      queryStop: request.queryStop,
      today: deps.today(),
      actualHours: actuals.hoursByMonth,
      userIds: actuals.userIds,
      record,
      usersById,
    });
    return { ok: true, chart, warnings };
  } catch (err) {
    const kind = signal?.aborted ? "cancelled" : classifyError(err);
    if (kind === "cancelled") return failure(kind, "Chart generation was cancelled");
    if (kind == null || !(err instanceof DomainError)) throw err;
    return failure(kind, err.message, err.metadata);
  }
}
