/**
 * PoP dates plus dated, signed ceiling releases for one job.
 * Decoding accepts the current object shape and the legacy bare-array shape.
 */

import { toDateKey, type DateKey } from "./calendar.js";
import { ValidationError } from "./errors.js";
import type { CeilingRepo } from "./repositories.js";
import { parseCeilingHours } from "./validation.js";

/** Additive ceiling adjustment effective on `date`. Hours may be negative. */
export interface CeilingRelease {
  readonly id: string;
  readonly date: DateKey;
  readonly hours: number;
  readonly note?: string;
}

export interface CeilingRecord {
  readonly popStart?: DateKey;
  readonly popEnd?: DateKey;
  /** Sorted by date ascending. */
  readonly releases: readonly CeilingRelease[];
}

/** On-disk / wire shape. */
export interface StoredCeilingRelease {
  readonly id: string;
  readonly date: string;
  readonly hours: number;
  readonly note: string | null;
}

export interface StoredCeilingRecord {
  readonly popStart: string | null;
  readonly popEnd: string | null;
  readonly releases: readonly StoredCeilingRelease[];
}

export const EMPTY_CEILING_RECORD: CeilingRecord = { releases: [] };

/** Stable ascending sort by date; same-day releases keep their order. */
export function sortReleases(releases: readonly CeilingRelease[]): CeilingRelease[] {
  return releases
    .map((release, idx) => ({ release, idx }))
    .sort((a, b) => a.release.date.localeCompare(b.release.date) || a.idx - b.idx)
    .map(({ release }) => release);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeDate(value: unknown, field: string, timezone: string): DateKey {
  const key = typeof value === "string" ? toDateKey(value, timezone) : null;
  if (key == null) throw new ValidationError(`${field} is not a date`, { field, value });
  return key;
}

function decodeOptionalDate(value: unknown, field: string, timezone: string): DateKey | undefined {
  if (value == null) return undefined;
  return decodeDate(value, field, timezone);
}

/**
 * One release. `id` may be absent on input from a client; `newId` fills it.
 * Timestamps are floored to their calendar day in `timezone`.
 */
export function decodeCeilingRelease(
  raw: unknown,
  timezone: string,
  newId?: () => string
): CeilingRelease {
  if (!isRecord(raw)) throw new ValidationError("Ceiling release must be an object");

  let id: string;
  if (typeof raw.id === "string" && raw.id.length > 0) {
    id = raw.id;
  } else if (raw.id == null && newId) {
    id = newId();
  } else {
    throw new ValidationError("Ceiling release id is required", { id: raw.id });
  }

  const date = decodeDate(raw.date, "date", timezone);
  const hours = parseCeilingHours(raw.hours);
  if (raw.note != null && typeof raw.note !== "string") {
    throw new ValidationError("Ceiling release note must be a string", { id });
  }
  const note = typeof raw.note === "string" && raw.note.length > 0 ? raw.note : undefined;

  return { id, date, hours, ...(note != null && { note }) };
}

/** Decode a release list. Ids must be unique within the list. */
export function decodeCeilingReleases(
  raw: readonly unknown[],
  timezone: string,
  newId?: () => string
): CeilingRelease[] {
  const seen = new Set<string>();
  return raw.map((r) => {
    const release = decodeCeilingRelease(r, timezone, newId);
    if (seen.has(release.id)) {
      throw new ValidationError(`Duplicate ceiling release id: ${release.id}`, { id: release.id });
    }
    seen.add(release.id);
    return release;
  });
}

/** Parse a stored record. A bare array is the legacy shape: releases only, no PoP. */
export function decodeCeilingRecord(
  raw: unknown,
  timezone: string,
  newId?: () => string
): CeilingRecord {
  if (Array.isArray(raw)) {
    return { releases: sortReleases(decodeCeilingReleases(raw, timezone, newId)) };
  }
  if (!isRecord(raw)) throw new ValidationError("Ceiling record must be an object or an array");
  if (!Array.isArray(raw.releases)) throw new ValidationError("Ceiling record releases must be an array");

  const popStart = decodeOptionalDate(raw.popStart, "popStart", timezone);
  const popEnd = decodeOptionalDate(raw.popEnd, "popEnd", timezone);
  const releases = sortReleases(decodeCeilingReleases(raw.releases, timezone, newId));

  return {
    ...(popStart != null && { popStart }),
    ...(popEnd != null && { popEnd }),
    releases,
  };
}

/** Wire shape with releases sorted ascending. */
export function encodeCeilingRecord(record: CeilingRecord): StoredCeilingRecord {
  return {
    popStart: record.popStart ?? null,
    popEnd: record.popEnd ?? null,
    releases: sortReleases(record.releases).map((r) => ({
      id: r.id,
      date: r.date,
      hours: r.hours,
      note: r.note ?? null,
    })),
  };
}

/**
 * Replace a job's releases, keeping its stored PoP. An unreadable record
 * is overwritten with the new releases and no PoP.
 */
export function saveReleases(
  repo: CeilingRepo,
  jobId: number,
  releases: readonly CeilingRelease[]
): Promise<CeilingRecord> {
  return repo.updateRecord(jobId, (existing) => ({ ...existing, releases: sortReleases(releases) }));
}
