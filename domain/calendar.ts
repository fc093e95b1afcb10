/**
 * domain/calendar.ts
 * U.S. federal holiday calendar on date-only keys.
 *
 * - Weekend: Sat/Sun
 * - Holidays: computed deterministically per year (no API)
 * - Fixed holidays on a weekend are observed Fri (Sat) or Mon (Sun)
 *
 * All arithmetic at noon UTC; a DateKey never drifts with the host timezone.
 */

export type DateKey = string; // "YYYY-MM-DD"

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/* -------------------------
 * Date helpers
 * ------------------------- */

export function parseDateKey(date: DateKey): { y: number; m: number; d: number } {
  const [ys, ms, ds] = date.split("-");
  return { y: Number(ys), m: Number(ms), d: Number(ds) };
}

export function formatDateKey(y: number, m: number, d: number): DateKey {
  return `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
}

/** True for a well-formed, real calendar date ("2025-02-30" is rejected). */
export function isDateKey(value: unknown): value is DateKey {
  if (typeof value !== "string") return false;
  const match = DATE_KEY_RE.exec(value);
  if (!match) return false;
  const y = Number(match[1]);
  const m = Number(match[2]);
  const d = Number(match[3]);
  if (m < 1 || m > 12 || d < 1) return false;
  return d <= daysInMonth(y, m);
}

function utcNoon(date: DateKey): Date {
  const { y, m, d } = parseDateKey(date);
  return new Date(Date.UTC(y, m - 1, d, 12, 0, 0));
}

function fromUtc(dt: Date): DateKey {
  return formatDateKey(dt.getUTCFullYear(), dt.getUTCMonth() + 1, dt.getUTCDate());
}

export function addDays(date: DateKey, n: number): DateKey {
  const dt = utcNoon(date);
  dt.setUTCDate(dt.getUTCDate() + n);
  return fromUtc(dt);
}

export function nextDay(date: DateKey): DateKey {
  return addDays(date, 1);
}

export function prevDay(date: DateKey): DateKey {
  return addDays(date, -1);
}

export function daysInMonth(y: number, m: number): number {
  return new Date(Date.UTC(y, m, 0, 12, 0, 0)).getUTCDate();
}

/** 0=Sun..6=Sat */
export function weekdayOf(date: DateKey): number {
  return utcNoon(date).getUTCDay();
}

export function isWeekend(date: DateKey): boolean {
  const wd = weekdayOf(date);
  return wd === 0 || wd === 6;
}

/** Calendar day of an instant in the given IANA timezone. */
export function dateKeyFromDate(date: Date, timezone: string): DateKey {
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return fmt.format(date); // "YYYY-MM-DD"
}

/**
 * Floor a stored date to its calendar day.
 * Plain keys pass through; timestamps are read in `timezone`.
 * Returns null when the value is not a date.
 */
export function toDateKey(value: string, timezone: string): DateKey | null {
  if (isDateKey(value)) return value;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) return null;
  return dateKeyFromDate(new Date(ms), timezone);
}

export function minDateKey(a: DateKey, b: DateKey): DateKey {
  return a <= b ? a : b;
}

export function maxDateKey(a: DateKey, b: DateKey): DateKey {
  return a >= b ? a : b;
}

/* -------------------------
 * U.S. federal holidays
 * ------------------------- */

const SUNDAY = 0;
const MONDAY = 1;
const THURSDAY = 4;
const SATURDAY = 6;

/** [month, day]: New Year's Day, Juneteenth, Independence Day, Veterans Day, Christmas. */
const FIXED_HOLIDAYS: ReadonlyArray<readonly [number, number]> = [
  [1, 1],
  [6, 19],
  [7, 4],
  [11, 11],
  [12, 25],
];

/** nth (1-based) weekday of a month, e.g. 3rd Monday of January. */
function nthWeekday(year: number, month: number, weekday: number, n: number): DateKey {
  const first = weekdayOf(formatDateKey(year, month, 1));
  const day = 1 + ((weekday - first + 7) % 7) + (n - 1) * 7;
  return formatDateKey(year, month, day);
}

function lastWeekday(year: number, month: number, weekday: number): DateKey {
  const last = daysInMonth(year, month);
  const lastWd = weekdayOf(formatDateKey(year, month, last));
  return formatDateKey(year, month, last - ((lastWd - weekday + 7) % 7));
}

/** Sat → preceding Fri, Sun → following Mon. */
export function observedDate(date: DateKey): DateKey {
  const wd = weekdayOf(date);
  if (wd === SATURDAY) return prevDay(date);
  if (wd === SUNDAY) return nextDay(date);
  return date;
}

/**
 * Observed federal holidays for a year.
 * A fixed holiday observed across the year boundary (Jan 1 on a Saturday)
 * is listed under its own year, i.e. as Dec 31 of the previous year.
 */
export function federalHolidays(year: number): Set<DateKey> {
  const res = new Set<DateKey>();

  for (const [m, d] of FIXED_HOLIDAYS) res.add(observedDate(formatDateKey(year, m, d)));

  res.add(nthWeekday(year, 1, MONDAY, 3)); // MLK Day
  res.add(nthWeekday(year, 2, MONDAY, 3)); // Presidents Day
  res.add(lastWeekday(year, 5, MONDAY)); // Memorial Day
  res.add(nthWeekday(year, 9, MONDAY, 1)); // Labor Day
  res.add(nthWeekday(year, 10, MONDAY, 2)); // Columbus Day
  res.add(nthWeekday(year, 11, THURSDAY, 4)); // Thanksgiving

  return res;
}

/**
 * Per-year holiday sets, computed on first use.
 * Owned by the caller; no process-wide state.
 */
export class HolidayCache {
  private readonly byYear = new Map<number, ReadonlySet<DateKey>>();

  holidaysFor(year: number): ReadonlySet<DateKey> {
    let set = this.byYear.get(year);
    if (!set) {
      set = federalHolidays(year);
      this.byYear.set(year, set);
    }
    return set;
  }

  /** Holiday lookup uses the set of the date's own year. */
  isHoliday(date: DateKey): boolean {
    return this.holidaysFor(parseDateKey(date).y).has(date);
  }

  /** Number of years computed so far. */
  get size(): number {
    return this.byYear.size;
  }
}
