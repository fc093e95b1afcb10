/**
 * Session cache over a TimesheetSource: job codes and users are fetched
 * once and reused. A rejected fetch is dropped so the next call retries.
 * Timesheets always go to the underlying source.
 */

import type { DateKey } from "../domain/calendar.js";
import type { TimesheetSource } from "../domain/repositories.js";
import type { JobCode, TimesheetEntry, User } from "../domain/timesheet.js";

export class CachedTimesheetSource implements TimesheetSource {
  private readonly inner: TimesheetSource;
  private jobCodes: Promise<ReadonlyMap<number, JobCode>> | null = null;
  private users: Promise<ReadonlyMap<number, User>> | null = null;

  constructor(inner: TimesheetSource) {
    this.inner = inner;
  }

  fetchJobCodes(): Promise<ReadonlyMap<number, JobCode>> {
    if (!this.jobCodes) {
      const pending = this.inner.fetchJobCodes();
      this.jobCodes = pending;
      void pending.catch(() => {
        if (this.jobCodes === pending) this.jobCodes = null;
      });
    }
    return this.jobCodes;
  }

  fetchUsers(): Promise<ReadonlyMap<number, User>> {
    if (!this.users) {
      const pending = this.inner.fetchUsers();
      this.users = pending;
      void pending.catch(() => {
        if (this.users === pending) this.users = null;
      });
    }
    return this.users;
  }

  fetchTimesheets(
    startDate: DateKey,
    endDate: DateKey,
    jobcodeIds: readonly number[],
    signal?: AbortSignal
  ): Promise<readonly TimesheetEntry[]> {
    return this.inner.fetchTimesheets(startDate, endDate, jobcodeIds, signal);
  }

  /** Forget cached job codes and users. */
  invalidate(): void {
    this.jobCodes = null;
    this.users = null;
  }
}
