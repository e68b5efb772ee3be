import { DateTime } from "luxon";
import type { SummaryDocument, SummaryEntry, SummarySection } from "@rota/shared";

/** Hard limit on an embed field value. */
export const FIELD_VALUE_LIMIT = 1024;
const TRUNCATE_AT = 1000;
const SPACER = "\u200b";

export type EmbedField = { name: string; value: string; inline: boolean };

export type SummaryEmbed = {
  title: string;
  description: string;
  color: number;
  fields: EmbedField[];
  footer?: { text: string };
};

const SUFFIXES: Partial<Record<number, string>> = { 1: "st", 2: "nd", 3: "rd" };

export function ordinal(n: number) {
  const mod100 = n % 100;
  if (mod100 >= 10 && mod100 <= 20) return `${n}th`;
  return `${n}${SUFFIXES[n % 10] ?? "th"}`;
}

const bold = (s: string, on: boolean) => (on ? `**${s}**` : s);

function dayMarker(date: string, weekday: string) {
  const dt = DateTime.fromISO(date, { zone: "utc" }).setLocale("en");
  return `${weekday} ${ordinal(dt.day)} ${dt.toFormat("LLLL")}`;
}

function entryLine(e: SummaryEntry) {
  const label = e.label || "N/A";
  const linked = e.briefingUrl ? `[${label}](${e.briefingUrl})` : label;
  return `${e.kind}: ${linked} by ${e.authorName || "N/A"}`;
}

export function renderSection(section: SummarySection) {
  const current = section.status === "current";
  const lines: string[] = [];
  section.days.forEach((day, i) => {
    if (i > 0) lines.push(SPACER);
    lines.push(bold(dayMarker(day.date, day.weekday), current));
    for (const e of day.entries) lines.push(bold(entryLine(e), current));
  });
  const value = lines.join("\n");
  return value.length > FIELD_VALUE_LIMIT
    ? `${value.slice(0, TRUNCATE_AT)}... (truncated)`
    : value;
}

export function renderSummaryEmbed(
  doc: SummaryDocument,
  opts: { partial?: boolean } = {},
): SummaryEmbed {
  const unix = Math.floor(Date.parse(doc.generatedAt) / 1000);
  const description = [
    `Current Event Rotation: ${doc.year}`,
    `Editors: ${doc.editors.join(", ") || "None"}`,
    `Instructors: ${doc.instructors.join(", ") || "None"}`,
    "",
    `Last updated: <t:${unix}:f> (<t:${unix}:R>)`,
  ].join("\n");

  const fields: EmbedField[] = [];
  doc.sections.forEach((section, i) => {
    if (i > 0) fields.push({ name: SPACER, value: SPACER, inline: false });
    fields.push({
      name: `Week ${section.weekNumber}`,
      value: renderSection(section),
      inline: false,
    });
  });

  return {
    title: doc.title,
    description,
    color: 0x3498db,
    fields,
    ...(opts.partial ? { footer: { text: "Briefing links unavailable" } } : {}),
  };
}
