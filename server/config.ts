/**
 * Remote timesheet API credentials and server settings.
 * Read from env, or from a JSON file named by BURN_CONFIG_FILE.
 */

import { readFileSync } from "node:fs";
import { ConfigurationError } from "../domain/errors.js";

export interface ApiConfig {
  readonly baseUrl: URL;
  readonly token: string;
}

export interface ServerSettings {
  readonly port: number;
  readonly ceilingStoreDir: string;
  readonly timezone: string;
  readonly timesheetSource: "http" | "memory";
}

export type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_PORT = 3_000;
const DEFAULT_TIMEZONE = "America/New_York";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `{ API_URL, API_TOKEN }` as stored in config.json. */
function parseConfigFile(text: string, file: string): { url: unknown; token: unknown } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`Invalid JSON in ${file}`, { file });
  }
  if (!isObject(raw)) {
    throw new ConfigurationError(`${file} must contain an object`, { file });
  }
  return { url: raw.API_URL, token: raw.API_TOKEN };
}

export function loadApiConfig(
  env: Env = process.env,
  readFile: (file: string) => string = (file) => readFileSync(file, "utf8")
): ApiConfig {
  let url: unknown = env.TIMESHEET_API_URL;
  let token: unknown = env.TIMESHEET_API_TOKEN;

  const file = env.BURN_CONFIG_FILE;
  if (file != null && file !== "") {
    let text: string;
    try {
      text = readFile(file);
    } catch (err) {
      throw new ConfigurationError(`Cannot read ${file}`, {
        file,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    ({ url, token } = parseConfigFile(text, file));
  }

  if (typeof url !== "string" || url.trim() === "") {
    throw new ConfigurationError("API_URL is not configured");
  }
  if (typeof token !== "string" || token.trim() === "") {
    throw new ConfigurationError("API_TOKEN is not configured");
  }

  let baseUrl: URL;
  try {
    baseUrl = new URL(url.trim());
  } catch {
    throw new ConfigurationError(`Invalid API_URL in config: ${url}`, { url });
  }
  return { baseUrl, token: token.trim() };
}

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export function loadServerSettings(env: Env = process.env): ServerSettings {
  const port = env.PORT != null && env.PORT !== "" ? Number(env.PORT) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigurationError(`Invalid PORT: ${env.PORT}`);
  }
  const timezone = env.BURN_TIMEZONE ?? DEFAULT_TIMEZONE;
  if (!isValidTimezone(timezone)) {
    throw new ConfigurationError(`Invalid BURN_TIMEZONE: ${timezone}`);
  }
  return {
    port,
    ceilingStoreDir: env.CEILING_STORE_DIR ?? "./data/ceiling",
    timezone,
    timesheetSource: env.TIMESHEET_SOURCE === "memory" ? "memory" : "http",
  };
}
