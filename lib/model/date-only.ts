/**
 * Date-only helpers. Dates travel as "YYYY-MM-DD" strings; arithmetic goes
 * through UTC so no local offset or DST change can shift a day.
 */

import type { DateOnly } from "@/lib/types/zod";

const DATE_ONLY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

/** Latest date that still has a four-digit year. */
export const LAST_DATE: DateOnly = "9999-12-31";
const LAST_DATE_MS = Date.UTC(9999, 11, 31);

function toUTC(ymd: DateOnly): Date {
  const m = DATE_ONLY_RE.exec(ymd);
  if (!m) throw new RangeError(`Not a date: ${ymd}`);
  return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
}

function fromUTC(d: Date): DateOnly {
  return d.toISOString().slice(0, 10);
}

/** True for a well-formed, real calendar date (rejects 2024-02-30). */
export function isDateOnly(value: string): boolean {
  const m = DATE_ONLY_RE.exec(value);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return fromUTC(d) === value;
}

export function addDays(ymd: DateOnly, days: number): DateOnly {
  const d = toUTC(ymd);
  d.setUTCDate(d.getUTCDate() + days);
  return fromUTC(d);
}

/** True when ymd + days lands on or before LAST_DATE. Computed without building a Date. */
export function fitsCalendar(ymd: DateOnly, days: number): boolean {
  return toUTC(ymd).getTime() + days * DAY_MS <= LAST_DATE_MS;
}

/** Last calendar day of the month, no business-day adjustment. */
export function isLastDayOfMonth(ymd: DateOnly): boolean {
  return addDays(ymd, 1).slice(8, 10) === "01";
}

export function firstDayOfNextMonth(ymd: DateOnly): DateOnly {
  const d = toUTC(ymd);
  return fromUTC(new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1)));
}

/** First and last day of a "YYYYMM" month. */
export function monthBounds(month: string): { startDate: DateOnly; endDate: DateOnly } {
  const y = Number(month.slice(0, 4));
  const m = Number(month.slice(4, 6));
  return {
    startDate: fromUTC(new Date(Date.UTC(y, m - 1, 1))),
    endDate: fromUTC(new Date(Date.UTC(y, m, 0))),
  };
}

/** Local calendar date of a wall-clock instant. */
export function formatDateOnly(d: Date): DateOnly {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}

/** "YYYYMMDD" stamp used in output file names. */
export function compactDate(ymd: DateOnly): string {
  return ymd.replace(/-/g, "");
}
