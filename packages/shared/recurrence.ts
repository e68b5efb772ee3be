import { SlotInputError } from "./errors.js";
import { parseIsoDate, toIsoDate } from "./dates.js";
import {
  isSlotKind,
  type DateRange,
  type IsoDate,
  type RecurrencePattern,
  type SlotKey,
  type SlotKind,
  type Weekday,
} from "./types.js";

export const DEFAULT_PATTERNS: readonly RecurrencePattern[] = [
  { weekday: 4, kind: "Training" },
  { weekday: 4, kind: "Mission" },
  { weekday: 7, kind: "Mission" },
];

const WEEKDAY_CODES: Partial<Record<string, Weekday>> = {
  MON: 1,
  TUE: 2,
  WED: 3,
  THU: 4,
  FRI: 5,
  SAT: 6,
  SUN: 7,
};

/** Rejects a pattern set in which two rules share weekday+kind. */
export function definePatterns(
  patterns: readonly RecurrencePattern[],
): readonly RecurrencePattern[] {
  const seen = new Set<string>();
  for (const p of patterns) {
    const id = `${p.weekday}:${p.kind}`;
    if (seen.has(id)) {
      throw new SlotInputError(
        "invalid_pattern",
        `Duplicate recurrence pattern ${id}`,
      );
    }
    seen.add(id);
  }
  return patterns;
}

/** "THU:Training,THU:Mission,SUN:Mission" → patterns. */
export function parsePatterns(text: string): readonly RecurrencePattern[] {
  const patterns = text
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((entry): RecurrencePattern => {
      const [day = "", kind = ""] = entry.split(":").map((s) => s.trim());
      const weekday = WEEKDAY_CODES[day.toUpperCase()];
      if (weekday === undefined) {
        throw new SlotInputError(
          "invalid_pattern",
          `Unknown weekday "${day}" in pattern "${entry}"`,
        );
      }
      if (!isSlotKind(kind)) {
        throw new SlotInputError(
          "unknown_kind",
          `Unknown kind "${kind}" in pattern "${entry}"`,
        );
      }
      return { weekday, kind };
    });
  return definePatterns(patterns);
}

export function kindsForWeekday(
  weekday: number,
  patterns: readonly RecurrencePattern[] = DEFAULT_PATTERNS,
): SlotKind[] {
  return patterns.filter((p) => p.weekday === weekday).map((p) => p.kind);
}

/**
 * Every (date, kind) the pattern set implies inside [from, to).
 * Empty or inverted ranges yield [].
 */
export function generateSlots(
  range: DateRange,
  patterns: readonly RecurrencePattern[] = DEFAULT_PATTERNS,
): SlotKey[] {
  const end = parseIsoDate(range.to);
  const out: SlotKey[] = [];
  for (
    let day = parseIsoDate(range.from);
    day < end;
    day = day.plus({ days: 1 })
  ) {
    const date = toIsoDate(day);
    for (const kind of kindsForWeekday(day.weekday, patterns)) {
      out.push({ date, kind });
    }
  }
  return out;
}

/**
 * The latest date on or before `date` that carries at least one pattern,
 * i.e. the far edge of a window ending at `date`. Null for an empty set.
 */
export function lastPatternDateOnOrBefore(
  date: IsoDate,
  patterns: readonly RecurrencePattern[] = DEFAULT_PATTERNS,
): IsoDate | null {
  if (patterns.length === 0) return null;
  let day = parseIsoDate(date);
  while (kindsForWeekday(day.weekday, patterns).length === 0) {
    day = day.minus({ days: 1 });
  }
  return toIsoDate(day);
}
