/**
 * Scoped console logger with level filtering.
 * Credentials in logged objects are redacted.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...data: unknown[]): void;
  info(message: string, ...data: unknown[]): void;
  warn(message: string, ...data: unknown[]): void;
  error(message: string, ...data: unknown[]): void;
}

export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  readonly timestamps?: boolean;
}

const SENSITIVE_KEY = /token|secret|password|authorization/i;

export function redact(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(redact);
  if (data instanceof Error) return { name: data.name, message: data.message };
  if (typeof data === "object" && data !== null) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(data)) {
      out[k] = SENSITIVE_KEY.test(k) ? "[REDACTED]" : redact(v);
    }
    return out;
  }
  return data;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const wanted = value?.trim().toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? fallback;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const min = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? console;
  const timestamps = options.timestamps ?? true;

  function emit(level: Exclude<LogLevel, "silent">, message: string, data: unknown[]): void {
    if (LEVEL_ORDER[level] < min) return;
    const prefix = [
      ...(timestamps ? [`[${new Date().toISOString()}]`] : []),
      `[${level.toUpperCase()}]`,
      `[${scope}]`,
    ].join(" ");
    const args = [`${prefix} ${message}`, ...data.map(redact)];
    if (level === "error") sink.error(...args);
    else if (level === "warn") sink.warn(...args);
    else sink.log(...args);
  }

  return {
    debug: (message, ...data) => emit("debug", message, data),
    info: (message, ...data) => emit("info", message, data),
    warn: (message, ...data) => emit("warn", message, data),
    error: (message, ...data) => emit("error", message, data),
  };
}

/** Discards everything. For tests. */
export const silentLogger: Logger = createLogger("silent", { level: "silent" });
