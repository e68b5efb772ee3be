import { DateTime } from "luxon";
import { SlotInputError } from "./errors.js";
import { parseIsoDate, toIsoDate } from "./dates.js";
import { isSlotKind, type IsoDate, type Slot, type SlotKey } from "./types.js";

/** Two-digit years resolve to CENTURY_BASE + YY. */
export const CENTURY_BASE = 2000;

/** Manual dates further than this from today are refused. */
export const MANUAL_DATE_MAX_DAYS = 365;

const CHOICE_PREVIEW_CHARS = 20;

export const WEEKDAY_NAMES = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

const LABEL_RE =
  /^([A-Za-z]+) (\S+) - (\d{2})\/(\d{2})\/(\d{2})(?: \(.*\))?$/;
const MANUAL_DATE_RE = /^(\d{1,2})-(\d{1,2})-(\d{2})$/;

export function weekdayName(date: IsoDate) {
  return WEEKDAY_NAMES[parseIsoDate(date).weekday - 1];
}

function calendarDate(day: number, month: number, yy: number) {
  const dt = DateTime.fromObject(
    { year: CENTURY_BASE + yy, month, day },
    { zone: "utc" },
  );
  return dt.isValid ? toIsoDate(dt) : null;
}

/**
 * "Thursday Training - 24/10/25". Stable: parseSlotLabel inverts it for
 * dates in CENTURY_BASE..CENTURY_BASE+99. Outside that century the two-digit
 * year reads back a century off, and parseSlotLabel refuses the label because
 * its weekday no longer matches.
 */
export function formatSlotLabel(key: SlotKey) {
  const dt = parseIsoDate(key.date);
  return `${weekdayName(key.date)} ${key.kind} - ${dt.toFormat("dd/MM/yy")}`;
}

/** Label plus a short preview of the filled details, for selection menus. */
export function formatSlotChoice(slot: Pick<Slot, "date" | "kind" | "label">) {
  const base = formatSlotLabel(slot);
  const label = slot.label.trim();
  if (!label) return base;
  const preview =
    label.length > CHOICE_PREVIEW_CHARS
      ? `${label.slice(0, CHOICE_PREVIEW_CHARS)}...`
      : label;
  return `${base} (${preview})`;
}

export function parseSlotLabel(text: string): SlotKey {
  const m = LABEL_RE.exec(text.trim());
  if (!m) {
    throw new SlotInputError(
      "invalid_label",
      `Unrecognised slot "${text}", expected e.g. "Thursday Training - 24/10/25"`,
    );
  }
  const [, dayName, kind, dd, mm, yy] = m;
  if (!isSlotKind(kind)) {
    throw new SlotInputError("unknown_kind", `Unknown event kind "${kind}"`);
  }
  const date = calendarDate(Number(dd), Number(mm), Number(yy));
  if (!date) {
    throw new SlotInputError("invalid_date", `Invalid date in "${text}"`);
  }
  if (weekdayName(date) !== dayName) {
    throw new SlotInputError(
      "invalid_label",
      `${date} is a ${weekdayName(date)}, not a ${dayName}`,
    );
  }
  return { date, kind };
}

/** "DD-MM-YY" (day and month may be a single digit). */
export function parseManualDate(text: string): IsoDate {
  const m = MANUAL_DATE_RE.exec(text.trim());
  const date = m ? calendarDate(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  if (!date) {
    throw new SlotInputError(
      "invalid_date",
      "Invalid date format. Please use DD-MM-YY (e.g. 25-10-24)",
    );
  }
  return date;
}

/** parseManualDate, then refuse anything over a year away from `today`. */
export function validateManualDate(text: string, today: IsoDate): IsoDate {
  const date = parseManualDate(text);
  const days = parseIsoDate(date).diff(parseIsoDate(today), "days").days;
  if (days < -MANUAL_DATE_MAX_DAYS) {
    throw new SlotInputError(
      "date_out_of_range",
      "Date is too far in the past (more than 1 year)",
    );
  }
  if (days > MANUAL_DATE_MAX_DAYS) {
    throw new SlotInputError(
      "date_out_of_range",
      "Date is too far in the future (more than 1 year)",
    );
  }
  return date;
}
