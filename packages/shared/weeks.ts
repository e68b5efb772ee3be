import { DateTime } from "luxon";
import { parseIsoDate, toIsoDate } from "./dates.js";
import type { IsoDate, SectionStatus, Weekday } from "./types.js";

/**
 * When the "current" week rolls over. The real-world week is considered over
 * at Sunday 20:00 in the reference zone, not at Monday midnight.
 */
export type WeekCutoff = {
  weekday: Weekday;
  hour: number;
  zone: string;
};

export const DEFAULT_WEEK_CUTOFF: WeekCutoff = {
  weekday: 7,
  hour: 20,
  zone: "Europe/London",
};

/** Monday of the ISO week containing `date`. */
export function weekStartOf(date: IsoDate): IsoDate {
  return toIsoDate(parseIsoDate(date).startOf("week"));
}

export function isoWeekOf(date: IsoDate) {
  const dt = parseIsoDate(date);
  return { weekYear: dt.weekYear, weekNumber: dt.weekNumber };
}

/** Monday of the week the cutoff rule treats as current at `now`. */
export function currentWeekStart(
  now: Date,
  cutoff: WeekCutoff = DEFAULT_WEEK_CUTOFF,
): IsoDate {
  const local = DateTime.fromJSDate(now).setZone(cutoff.zone);
  if (!local.isValid) {
    throw new Error(`Invalid time zone ${cutoff.zone}: ${local.invalidReason}`);
  }
  const monday = local.startOf("week");
  // wall-clock hour, so a DST change earlier that day does not shift it
  const rollover = monday
    .plus({ days: cutoff.weekday - 1 })
    .set({ hour: cutoff.hour, minute: 0, second: 0, millisecond: 0 });
  const current = local >= rollover ? monday.plus({ weeks: 1 }) : monday;
  return current.toFormat("yyyy-MM-dd");
}

// ISO dates compare correctly as strings
export function sectionStatus(
  weekStart: IsoDate,
  currentStart: IsoDate,
): SectionStatus {
  if (weekStart < currentStart) return "past";
  if (weekStart > currentStart) return "upcoming";
  return "current";
}
