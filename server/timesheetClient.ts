/**
 * HTTP client for the remote time-tracking API.
 * Bearer auth, JSON responses keyed by string ids. No retries; any bad
 * status or payload is a TransportError.
 */

import type { DateKey } from "../domain/calendar.js";
import { TransportError } from "../domain/errors.js";
import type { TimesheetSource } from "../domain/repositories.js";
import type { JobCode, TimesheetEntry, User } from "../domain/timesheet.js";
import type { ApiConfig } from "./config.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Json, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

function requireInt(obj: Json, key: string, what: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isInteger(v)) {
    throw new TransportError(`Malformed ${what}: ${key} must be an integer`);
  }
  return v;
}

/** `{ results: { [collection]: { [id]: item } } }` → item list. */
function resultItems(body: unknown, collection: string): unknown[] {
  if (!isObject(body) || !isObject(body.results)) {
    throw new TransportError(`Malformed response: missing results`);
  }
  const items = body.results[collection];
  if (!isObject(items)) {
    throw new TransportError(`Malformed response: missing results.${collection}`);
  }
  return Object.values(items);
}

export function decodeJobCode(raw: unknown): JobCode {
  if (!isObject(raw)) throw new TransportError("Malformed job code");
  const name = raw.name;
  if (typeof name !== "string") throw new TransportError("Malformed job code: name must be a string");
  const parent = raw.parent_id;
  const active = raw.active;
  return {
    id: requireInt(raw, "id", "job code"),
    name,
    ...(typeof parent === "number" && { parentId: parent }),
    ...(typeof active === "boolean" && { active }),
  };
}

export function decodeUser(raw: unknown): User {
  if (!isObject(raw)) throw new TransportError("Malformed user");
  const firstName = optionalString(raw, "first_name");
  const lastName = optionalString(raw, "last_name");
  const displayName = optionalString(raw, "name");
  return {
    id: requireInt(raw, "id", "user"),
    ...(firstName != null && { firstName }),
    ...(lastName != null && { lastName }),
    ...(displayName != null && { displayName }),
  };
}

export function decodeTimesheet(raw: unknown): TimesheetEntry {
  if (!isObject(raw)) throw new TransportError("Malformed timesheet");
  const duration = raw.duration;
  if (typeof duration !== "number" || !Number.isFinite(duration) || duration < 0) {
    throw new TransportError("Malformed timesheet: duration must be a non-negative number");
  }
  return {
    id: requireInt(raw, "id", "timesheet"),
    userId: requireInt(raw, "user_id", "timesheet"),
    jobcodeId: requireInt(raw, "jobcode_id", "timesheet"),
    durationSeconds: duration,
  };
}

export class HttpTimesheetSource implements TimesheetSource {
  private readonly config: ApiConfig;
  private readonly fetchFn: FetchFn;

  constructor(config: ApiConfig, fetchFn: FetchFn = (input, init) => fetch(input, init)) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  /** Base URL + path, keeping any path prefix on the base. */
  requestUrl(path: string, query?: Record<string, string>): string {
    const base = this.config.baseUrl.href.replace(/\/+$/, "");
    const url = new URL(`${base}/${path.replace(/^\/+/, "")}`);
    for (const [k, v] of Object.entries(query ?? {})) url.searchParams.set(k, v);
    return url.toString();
  }

  private async getJson(path: string, query?: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const url = this.requestUrl(path, query);
    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          Accept: "application/json",
        },
        ...(signal != null && { signal }),
      });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") throw err;
      throw new TransportError(`Request to ${path} failed`, {
        path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    if (res.status !== 200) {
      throw new TransportError(`Request to ${path} returned ${res.status}`, { path, status: res.status });
    }
    try {
      return await res.json();
    } catch {
      throw new TransportError(`Invalid JSON from ${path}`, { path });
    }
  }

  async fetchJobCodes(): Promise<ReadonlyMap<number, JobCode>> {
    const body = await this.getJson("jobcodes");
    const byId = new Map<number, JobCode>();
    for (const raw of resultItems(body, "jobcodes")) {
      const jc = decodeJobCode(raw);
      byId.set(jc.id, jc);
    }
    return byId;
  }

  async fetchUsers(): Promise<ReadonlyMap<number, User>> {
    const body = await this.getJson("users");
    const byId = new Map<number, User>();
    for (const raw of resultItems(body, "users")) {
      const u = decodeUser(raw);
      byId.set(u.id, u);
    }
    return byId;
  }

  async fetchTimesheets(
    startDate: DateKey,
    endDate: DateKey,
    jobcodeIds: readonly number[],
    signal?: AbortSignal
  ): Promise<readonly TimesheetEntry[]> {
    const query: Record<string, string> = { start_date: startDate, end_date: endDate };
    if (jobcodeIds.length > 0) query.jobcode_ids = jobcodeIds.join(",");
    const body = await this.getJson("timesheets", query, signal);
    return resultItems(body, "timesheets").map(decodeTimesheet);
  }
}
