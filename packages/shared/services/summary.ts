import type { Logger } from "pino";
import { addWeeks, parseIsoDate, todayIn } from "../dates.js";
import { weekdayName } from "../labels.js";
import {
  BRIEFING_DEADLINE_MS,
  fetchWithDeadline,
  matchBriefing,
  type BriefingMatch,
  type MatchOutcome,
} from "../matcher.js";
import { DEFAULT_PATTERNS } from "../recurrence.js";
import {
  currentWeekStart,
  DEFAULT_WEEK_CUTOFF,
  isoWeekOf,
  sectionStatus,
  weekStartOf,
  type WeekCutoff,
} from "../weeks.js";
import { isFilled } from "../types.js";
import type { BriefingTitle, BriefingTitleSource } from "../briefing-source.js";
import type {
  IsoDate,
  RecurrencePattern,
  SectionStatus,
  Slot,
  SlotKind,
} from "../types.js";
import type { ConfigStore } from "../store/types.js";
import type { DateFilter } from "./date-filter.js";

export const DISPLAY_PAST_WEEKS = 2;
export const DISPLAY_FUTURE_WEEKS = 4;

export type SummaryEntry = {
  kind: SlotKind;
  label: string;
  authorName: string;
  briefing: BriefingMatch | null;
  /** Where the matched briefing lives, when the source gave one. */
  briefingUrl: string | null;
};

export type SummaryDay = {
  date: IsoDate;
  weekday: string;
  entries: SummaryEntry[];
};

export type SummarySection = {
  weekYear: number;
  weekNumber: number;
  weekStart: IsoDate;
  status: SectionStatus;
  days: SummaryDay[];
};

export type SummaryDocument = {
  tenantId: string;
  title: string;
  generatedAt: string;
  year: number;
  editors: string[];
  instructors: string[];
  sections: SummarySection[];
};

export type BriefingDegradation = "timeout" | "error";

export type SummaryBuild = {
  document: SummaryDocument;
  /** Slots rendered without links because the briefing source failed. */
  partial: boolean;
  degraded: BriefingDegradation | null;
};

export type SummaryBuilderOptions = {
  filter: DateFilter;
  configs: ConfigStore;
  titles: BriefingTitleSource;
  logger: Logger;
  zone?: string;
  cutoff?: WeekCutoff;
  patterns?: readonly RecurrencePattern[];
  deadlineMs?: number;
  title?: string;
  now?: () => Date;
  /** Observes every match attempt, e.g. for metrics. */
  onMatch?: (outcome: MatchOutcome) => void;
};

function authorsOf(slots: Slot[], kind: SlotKind) {
  const names = slots
    .filter((s) => s.kind === kind && s.authorName.trim())
    .map((s) => s.authorName.trim());
  return [...new Set(names)].sort();
}

export class SummaryBuilder {
  private readonly opts: SummaryBuilderOptions;
  private readonly cutoff: WeekCutoff;
  private readonly patterns: readonly RecurrencePattern[];
  private readonly now: () => Date;

  constructor(opts: SummaryBuilderOptions) {
    this.opts = opts;
    this.cutoff = opts.cutoff ?? DEFAULT_WEEK_CUTOFF;
    this.patterns = opts.patterns ?? DEFAULT_PATTERNS;
    this.now = opts.now ?? (() => new Date());
  }

  async build(tenantId: string): Promise<SummaryBuild> {
    const { filter, logger } = this.opts;
    const now = this.now();
    const today = todayIn(this.opts.zone ?? this.cutoff.zone, now);
    const slots = await filter.listRange(
      tenantId,
      addWeeks(today, -DISPLAY_PAST_WEEKS),
      addWeeks(today, DISPLAY_FUTURE_WEEKS),
    );

    const { titles, degraded } = await this.loadTitles(tenantId, slots);
    const deadlineMs = this.opts.deadlineMs ?? BRIEFING_DEADLINE_MS;
    const names = titles?.map((t) => t.title) ?? [];
    const briefingFor = (slot: Slot) => {
      if (!titles || !isFilled(slot)) return null;
      const outcome = matchBriefing(slot.label, names, { deadlineMs });
      this.opts.onMatch?.(outcome);
      return outcome.matched ? outcome.match : null;
    };
    const urlOf = (match: BriefingMatch | null) =>
      (match && titles?.find((t) => t.title === match.title)?.url) ?? null;

    const current = currentWeekStart(now, this.cutoff);
    const weeks = new Map<IsoDate, Map<IsoDate, SummaryEntry[]>>();
    for (const slot of [...slots].sort((a, b) => this.compareForDisplay(a, b))) {
      const weekStart = weekStartOf(slot.date);
      const days = weeks.get(weekStart) ?? new Map<IsoDate, SummaryEntry[]>();
      weeks.set(weekStart, days);
      const entries = days.get(slot.date) ?? [];
      days.set(slot.date, entries);
      const briefing = briefingFor(slot);
      entries.push({
        kind: slot.kind,
        label: slot.label.trim(),
        authorName: slot.authorName.trim(),
        briefing,
        briefingUrl: urlOf(briefing),
      });
    }

    const sections: SummarySection[] = [...weeks.keys()].sort().map((weekStart) => {
      const days = weeks.get(weekStart) ?? new Map<IsoDate, SummaryEntry[]>();
      return {
        ...isoWeekOf(weekStart),
        weekStart,
        status: sectionStatus(weekStart, current),
        days: [...days.entries()].map(([date, entries]) => ({
          date,
          weekday: weekdayName(date),
          entries,
        })),
      };
    });

    const document: SummaryDocument = {
      tenantId,
      title: this.opts.title ?? "Event Schedule",
      generatedAt: now.toISOString(),
      year: Number(today.slice(0, 4)),
      editors: authorsOf(slots, "Mission"),
      instructors: authorsOf(slots, "Training"),
      sections,
    };
    logger.info(
      { tenantId, sections: sections.length, slots: slots.length, degraded },
      "summary built",
    );
    return { document, partial: degraded !== null, degraded };
  }

  // Titles are fetched once per build, under the same deadline as a match.
  private async loadTitles(
    tenantId: string,
    slots: Slot[],
  ): Promise<{ titles: BriefingTitle[] | null; degraded: BriefingDegradation | null }> {
    const { configs, titles: source, logger } = this.opts;
    if (!slots.some(isFilled)) return { titles: null, degraded: null };

    const config = await configs.getScheduleConfig(tenantId);
    const briefingSource = config?.briefingSource;
    if (!briefingSource) return { titles: null, degraded: null };

    const res = await fetchWithDeadline(
      (signal) => source.listTitles(briefingSource, signal),
      this.opts.deadlineMs ?? BRIEFING_DEADLINE_MS,
    );
    if (res.ok) return { titles: res.value, degraded: null };

    logger.warn(
      { tenantId, reason: res.reason, err: res.error },
      "briefing titles unavailable, rendering without links",
    );
    return { titles: null, degraded: res.reason };
  }

  // Date, then the order the patterns list kinds for that weekday.
  private compareForDisplay(a: Slot, b: Slot) {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    const rank = (s: Slot) => {
      const weekday = parseIsoDate(s.date).weekday;
      const i = this.patterns.findIndex(
        (p) => p.kind === s.kind && p.weekday === weekday,
      );
      return i === -1 ? this.patterns.length : i;
    };
    const diff = rank(a) - rank(b);
    if (diff !== 0) return diff;
    return a.kind < b.kind ? -1 : a.kind > b.kind ? 1 : 0;
  }
}
