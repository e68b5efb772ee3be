// Single source of truth for domain enums/types
export const SLOT_KINDS = ["Training", "Mission"] as const;
export type SlotKind = (typeof SLOT_KINDS)[number];

export function isSlotKind(v: string): v is SlotKind {
  return (SLOT_KINDS as readonly string[]).includes(v);
}

/** Calendar date as "YYYY-MM-DD", no time component. */
export type IsoDate = string;

/** Luxon weekday numbering: 1 = Monday … 7 = Sunday. */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type SlotKey = {
  date: IsoDate;
  kind: SlotKind;
};

export type Slot = SlotKey & {
  id: number;
  tenantId: string;
  label: string; // "" while unfilled
  authorId: string; // "" while unfilled
  authorName: string;
};

export type RecurrencePattern = {
  weekday: Weekday;
  kind: SlotKind;
};

export type ScheduleConfig = {
  tenantId: string;
  summaryChannel: string;
  summaryMessage: string;
  briefingSource: string | null;
};

export type DateRange = {
  from: IsoDate;
  to: IsoDate; // exclusive
};

export type SectionStatus = "past" | "current" | "upcoming";

export function isFilled(slot: Pick<Slot, "label">) {
  return slot.label.trim() !== "";
}
