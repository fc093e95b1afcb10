/**
 * Boundaries: interfaces only.
 * Domain stays pure; implementations are injected.
 */

import type { DateKey } from "./calendar.js";
import type { CeilingRecord } from "./ceilingRecord.js";
import type { JobCode, TimesheetEntry, User } from "./timesheet.js";

/** Remote time-tracking API. Every call either decodes fully or throws. */
export interface TimesheetSource {
  fetchJobCodes(): Promise<ReadonlyMap<number, JobCode>>;
  fetchUsers(): Promise<ReadonlyMap<number, User>>;
  /** Entries in the inclusive date range, restricted to the given job codes. */
  fetchTimesheets(
    startDate: DateKey,
    endDate: DateKey,
    jobcodeIds: readonly number[],
    signal?: AbortSignal
  ): Promise<readonly TimesheetEntry[]>;
}

/** One ceiling record per job. */
export interface CeilingRepo {
  /** Missing record → empty record (no PoP, no releases). */
  loadRecord(jobId: number): Promise<CeilingRecord>;
  /** Persists releases sorted ascending by date. */
  saveRecord(jobId: number, record: CeilingRecord): Promise<void>;
  /**
   * Load, transform and save with no other write to the job in between.
   * An unreadable record reaches `update` as the empty record and is overwritten.
   */
  updateRecord(jobId: number, update: (current: CeilingRecord) => CeilingRecord): Promise<CeilingRecord>;
}
