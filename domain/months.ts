/**
 * "YYYY-MM" keys at the boundary, integer index inside.
 * index = year * 12 + (month - 1), so ordering never depends on padding.
 */

import { daysInMonth, formatDateKey, parseDateKey, type DateKey } from "./calendar.js";

export type MonthKey = string; // "YYYY-MM"

const MONTH_KEY_RE = /^(\d{4})-(\d{2})$/;

export function monthIndexOf(date: DateKey): number {
  const { y, m } = parseDateKey(date);
  return y * 12 + (m - 1);
}

/** Integer index of a month key, or null if the key is malformed. */
export function parseMonthKey(key: MonthKey): number | null {
  const match = MONTH_KEY_RE.exec(key);
  if (!match) return null;
  const y = Number(match[1]);
  const m = Number(match[2]);
  if (m < 1 || m > 12) return null;
  return y * 12 + (m - 1);
}

export function formatMonthKey(index: number): MonthKey {
  const y = Math.floor(index / 12);
  const m = index - y * 12 + 1;
  return `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}`;
}

export function monthStart(index: number): DateKey {
  const y = Math.floor(index / 12);
  const m = index - y * 12 + 1;
  return formatDateKey(y, m, 1);
}

export function monthEnd(index: number): DateKey {
  const y = Math.floor(index / 12);
  const m = index - y * 12 + 1;
  return formatDateKey(y, m, daysInMonth(y, m));
}

/** First day of the month after `key`; null for a malformed key. */
export function startOfNextMonth(key: MonthKey): DateKey | null {
  const index = parseMonthKey(key);
  return index == null ? null : monthStart(index + 1);
}

/** Month indices from start's month through end's month, ascending. Reversed range → []. */
export function monthIndices(start: DateKey, end: DateKey): number[] {
  const result: number[] = [];
  const last = monthIndexOf(end);
  for (let i = monthIndexOf(start); i <= last; i++) result.push(i);
  return result;
}

/** Inclusive "YYYY-MM" keys spanning [start, end]. Reversed range → []. */
export function monthKeys(start: DateKey, end: DateKey): MonthKey[] {
  return monthIndices(start, end).map(formatMonthKey);
}
