/**
 * Timesheet source entities, as the engine sees them.
 * Field names are camelCase; adapters translate the wire format.
 */

/** Job code. Roots have no parentId (or 0). */
export interface JobCode {
  readonly id: number;
  readonly name: string;
  readonly parentId?: number;
  readonly active?: boolean;
}

export interface TimesheetEntry {
  readonly id: number;
  readonly userId: number;
  readonly jobcodeId: number;
  readonly durationSeconds: number;
}

export interface User {
  readonly id: number;
  readonly firstName?: string;
  readonly lastName?: string;
  readonly displayName?: string;
}

export const SECONDS_PER_HOUR = 3600;

export function entryHours(entry: TimesheetEntry): number {
  return entry.durationSeconds / SECONDS_PER_HOUR;
}
