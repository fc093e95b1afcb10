/**
 * In-memory timesheet source and ceiling repository. For dev and tests.
 * Swap for the HTTP client / file repo without touching domain or handler.
 */

import type { DateKey } from "../domain/calendar.js";
import { EMPTY_CEILING_RECORD, sortReleases, type CeilingRecord } from "../domain/ceilingRecord.js";
import type { CeilingRepo, TimesheetSource } from "../domain/repositories.js";
import type { JobCode, TimesheetEntry, User } from "../domain/timesheet.js";

/** Timesheet entry plus the day it was logged on. */
export interface DatedEntry extends TimesheetEntry {
  readonly date: DateKey;
}

export interface MockTimesheetData {
  readonly jobCodes: readonly JobCode[];
  readonly users: readonly User[];
  readonly entries: readonly DatedEntry[];
}

/** One range per fetchTimesheets call, in call order. */
export interface TimesheetCall {
  readonly startDate: DateKey;
  readonly endDate: DateKey;
  readonly jobcodeIds: readonly number[];
}

export interface MockTimesheetSource extends TimesheetSource {
  readonly calls: readonly TimesheetCall[];
}

const DEMO_DATA: MockTimesheetData = {
  jobCodes: [
    { id: 100, name: "Contract A" },
    { id: 101, name: "Task Order 1", parentId: 100 },
    { id: 102, name: "Task Order 2", parentId: 100 },
    { id: 200, name: "Internal", parentId: 0 },
  ],
  users: [
    { id: 1, firstName: "Ada", lastName: "Lovelace" },
    { id: 2, displayName: "Grace H." },
    { id: 3, firstName: "Alan" },
  ],
  entries: [
    { id: 1, userId: 1, jobcodeId: 101, durationSeconds: 8 * 3600, date: "2025-01-06" },
    { id: 2, userId: 2, jobcodeId: 101, durationSeconds: 6 * 3600, date: "2025-01-07" },
    { id: 3, userId: 1, jobcodeId: 101, durationSeconds: 4 * 3600, date: "2025-02-03" },
    { id: 4, userId: 3, jobcodeId: 102, durationSeconds: 8 * 3600, date: "2025-02-04" },
  ],
};

export function createMockTimesheetSource(data: MockTimesheetData = DEMO_DATA): MockTimesheetSource {
  const calls: TimesheetCall[] = [];
  return {
    calls,
    async fetchJobCodes(): Promise<ReadonlyMap<number, JobCode>> {
      return new Map(data.jobCodes.map((jc) => [jc.id, jc]));
    },
    async fetchUsers(): Promise<ReadonlyMap<number, User>> {
      return new Map(data.users.map((u) => [u.id, u]));
    },
    async fetchTimesheets(
      startDate: DateKey,
      endDate: DateKey,
      jobcodeIds: readonly number[]
    ): Promise<readonly TimesheetEntry[]> {
      calls.push({ startDate, endDate, jobcodeIds: [...jobcodeIds] });
      return data.entries
        .filter((e) => e.date >= startDate && e.date <= endDate)
        .filter((e) => jobcodeIds.length === 0 || jobcodeIds.includes(e.jobcodeId))
        .map(({ date: _date, ...entry }) => entry);
    },
  };
}

export class InMemoryCeilingRepo implements CeilingRepo {
  private readonly records = new Map<number, CeilingRecord>();

  async loadRecord(jobId: number): Promise<CeilingRecord> {
    return this.records.get(jobId) ?? EMPTY_CEILING_RECORD;
  }

  async saveRecord(jobId: number, record: CeilingRecord): Promise<void> {
    this.records.set(jobId, { ...record, releases: sortReleases(record.releases) });
  }

  async updateRecord(jobId: number, update: (current: CeilingRecord) => CeilingRecord): Promise<CeilingRecord> {
    const next = update(this.records.get(jobId) ?? EMPTY_CEILING_RECORD);
    const stored = { ...next, releases: sortReleases(next.releases) };
    this.records.set(jobId, stored);
    return stored;
  }
}
