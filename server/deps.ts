/**
 * Server dependencies. Picks the timesheet source and ceiling store from env.
 * Swap to the in-memory source without touching domain/handler.
 */

import path from "node:path";
import { ChartCache } from "../domain/chartCache.js";
import { ConfigurationError } from "../domain/errors.js";
import type { TimesheetSource } from "../domain/repositories.js";
import type { JobCode, TimesheetEntry, User } from "../domain/timesheet.js";
import { CachedTimesheetSource } from "./cachedTimesheetSource.js";
import { loadApiConfig, loadServerSettings, type Env, type ServerSettings } from "./config.js";
import { FileCeilingRepo } from "./fileCeilingRepo.js";
import type { HandlerDeps } from "./handler.js";
import { createLogger, parseLogLevel } from "./logger.js";
import { createMockTimesheetSource } from "./mockRepos.js";
import { HttpTimesheetSource } from "./timesheetClient.js";

/** Rejects every call with the same error; the server still serves ceilings. */
export function unavailableTimesheetSource(error: ConfigurationError): TimesheetSource {
  return {
    fetchJobCodes: (): Promise<ReadonlyMap<number, JobCode>> => Promise.reject(error),
    fetchUsers: (): Promise<ReadonlyMap<number, User>> => Promise.reject(error),
    fetchTimesheets: (): Promise<readonly TimesheetEntry[]> => Promise.reject(error),
  };
}

function createTimesheetSource(settings: ServerSettings, env: Env): TimesheetSource {
  if (settings.timesheetSource === "memory") return createMockTimesheetSource();
  try {
    return new HttpTimesheetSource(loadApiConfig(env));
  } catch (err) {
    if (err instanceof ConfigurationError) return unavailableTimesheetSource(err);
    throw err;
  }
}

export interface AppDeps extends HandlerDeps {
  readonly settings: ServerSettings;
  readonly timesheets: CachedTimesheetSource;
}

export function createDeps(env: Env = process.env): AppDeps {
  const settings = loadServerSettings(env);
  const logger = createLogger("burn", { level: parseLogLevel(env.LOG_LEVEL) });
  return {
    settings,
    timesheets: new CachedTimesheetSource(createTimesheetSource(settings, env)),
    ceilings: new FileCeilingRepo(path.resolve(settings.ceilingStoreDir), settings.timezone),
    charts: new ChartCache(),
    clock: { now: () => Date.now(), timezone: settings.timezone },
    logger,
  };
}
