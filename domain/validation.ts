/**
 * Invariants and input checks. Framework-independent.
 */

import { isDateKey, type DateKey } from "./calendar.js";
import { InvariantViolation, ValidationError, type ErrorMetadata } from "./errors.js";

/** Invariant that callers are expected to uphold; violation is a programming error. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}

/** Date input from a user or request body. */
export function requireDateKey(value: unknown, field: string): DateKey {
  if (!isDateKey(value)) {
    throw new ValidationError(`${field} must be a date (YYYY-MM-DD)`, { field, value });
  }
  return value;
}

/** Both present and start <= end. */
export function isValidPop(start: DateKey | undefined, end: DateKey | undefined): boolean {
  if (start == null || end == null) return false;
  return start <= end;
}

/**
 * Checks run before any fetch: PoP present and ordered, query stop not
 * before PoP start.
 */
export function validateChartRange(
  popStart: DateKey | undefined,
  popEnd: DateKey | undefined,
  queryStop: DateKey
): { popStart: DateKey; popEnd: DateKey } {
  if (popStart == null || popEnd == null) {
    throw new ValidationError("Set PoP start and end before generating a chart");
  }
  if (popStart > popEnd) {
    throw new ValidationError("PoP start is after PoP end", { popStart, popEnd });
  }
  if (queryStop < popStart) {
    throw new ValidationError("Query stop occurs before PoP start", { queryStop, popStart });
  }
  return { popStart, popEnd };
}

/** Ceiling hours from a form field or JSON: finite, signed, fractional allowed. */
export function parseCeilingHours(input: unknown): number {
  if (typeof input === "number") {
    if (Number.isFinite(input)) return input;
  } else if (typeof input === "string") {
    const trimmed = input.trim();
    if (/^[+-]?(\d+\.?\d*|\.\d+)$/.test(trimmed)) return Number(trimmed);
  }
  throw new ValidationError("Ceiling hours must be a number", { value: input });
}
