import { DateTime } from "luxon";
import type { IsoDate } from "./types.js";

// Calendar arithmetic runs in UTC so that DST never shifts a date.
export function parseIsoDate(date: IsoDate): DateTime {
  const dt = DateTime.fromISO(date, { zone: "utc" });
  if (!dt.isValid) {
    throw new Error(`Invalid ISO date (${date}): ${dt.invalidReason}`);
  }
  return dt.startOf("day");
}

export function toIsoDate(dt: DateTime): IsoDate {
  // Only called on DateTimes built from valid dates
  return dt.toFormat("yyyy-MM-dd");
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(parseIsoDate(date).plus({ days }));
}

export function addWeeks(date: IsoDate, weeks: number): IsoDate {
  return addDays(date, weeks * 7);
}

/** Today's calendar date as seen from `zone`. */
export function todayIn(zone: string, now: Date = new Date()): IsoDate {
  const local = DateTime.fromJSDate(now).setZone(zone);
  if (!local.isValid) {
    throw new Error(`Invalid time zone ${zone}: ${local.invalidReason}`);
  }
  return local.toFormat("yyyy-MM-dd");
}
