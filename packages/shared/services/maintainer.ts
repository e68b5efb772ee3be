import type { Logger } from "pino";
import { addDays, addWeeks, parseIsoDate, todayIn } from "../dates.js";
import {
  DEFAULT_PATTERNS,
  generateSlots,
  kindsForWeekday,
  lastPatternDateOnOrBefore,
} from "../recurrence.js";
import type { IsoDate, RecurrencePattern } from "../types.js";
import type { SlotStore } from "../store/types.js";

export const DEFAULT_PAST_WEEKS = 4;
export const DEFAULT_FUTURE_WEEKS = 4;

export type CoverageResult = {
  tenantId: string;
  from: IsoDate;
  to: IsoDate; // inclusive
  created: number;
  skipped: number;
  failed: number;
  total: number;
  touchedDates: IsoDate[];
};

export type CoverageCheck =
  | { outcome: "fresh"; horizon: IsoDate }
  | { outcome: "repopulated"; result: CoverageResult }
  | { outcome: "failed"; error: unknown };

export type CoverageMaintainerOptions = {
  store: SlotStore;
  logger: Logger;
  patterns?: readonly RecurrencePattern[];
  zone?: string;
  pastWeeks?: number;
  futureWeeks?: number;
  now?: () => Date;
  /** Fired after a run that inserted rows. Failures are logged, not thrown. */
  onCoverageChanged?: (tenantId: string, result: CoverageResult) => Promise<void>;
};

/**
 * Keeps every tenant's calendar populated from `pastWeeks` ago to
 * `futureWeeks` ahead. Only ever inserts; filled slots are never touched.
 */
export class CoverageMaintainer {
  private readonly store: SlotStore;
  private readonly logger: Logger;
  private readonly patterns: readonly RecurrencePattern[];
  private readonly zone: string;
  private readonly pastWeeks: number;
  private readonly futureWeeks: number;
  private readonly now: () => Date;
  private readonly onCoverageChanged?: CoverageMaintainerOptions["onCoverageChanged"];

  constructor(opts: CoverageMaintainerOptions) {
    this.store = opts.store;
    this.logger = opts.logger;
    this.patterns = opts.patterns ?? DEFAULT_PATTERNS;
    this.zone = opts.zone ?? "UTC";
    this.pastWeeks = opts.pastWeeks ?? DEFAULT_PAST_WEEKS;
    this.futureWeeks = opts.futureWeeks ?? DEFAULT_FUTURE_WEEKS;
    this.now = opts.now ?? (() => new Date());
    this.onCoverageChanged = opts.onCoverageChanged;
  }

  today() {
    return todayIn(this.zone, this.now());
  }

  /** Safe to call any number of times: existing rows are skipped. */
  async ensureCoverage(
    tenantId: string,
    pastWeeks = this.pastWeeks,
    futureWeeks = this.futureWeeks,
  ): Promise<CoverageResult> {
    const today = this.today();
    const from = addWeeks(today, -pastWeeks);
    const to = addWeeks(today, futureWeeks);
    const required = generateSlots({ from, to: addDays(to, 1) }, this.patterns);

    const touched = new Set<IsoDate>();
    let created = 0;
    let skipped = 0;
    let failed = 0;
    for (const { date, kind } of required) {
      try {
        if (await this.store.upsertIfAbsent(tenantId, date, kind)) {
          created++;
          touched.add(date);
        } else {
          skipped++;
        }
      } catch (err) {
        failed++;
        this.logger.warn({ err, tenantId, date, kind }, "slot insert failed");
      }
    }

    const result: CoverageResult = {
      tenantId,
      from,
      to,
      created,
      skipped,
      failed,
      total: required.length,
      touchedDates: [...touched],
    };
    this.logger.info(
      { tenantId, from, to, created, skipped, failed },
      "coverage ensured",
    );

    if (created > 0 && this.onCoverageChanged) {
      try {
        await this.onCoverageChanged(tenantId, result);
      } catch (err) {
        this.logger.warn({ err, tenantId }, "summary refresh request failed");
      }
    }
    return result;
  }

  /**
   * True when the far edge of the window (the last patterned date on or
   * before `horizon`) is missing every kind the patterns put on it.
   */
  async needsRepopulation(tenantId: string, horizon: IsoDate) {
    const edge = lastPatternDateOnOrBefore(horizon, this.patterns);
    if (!edge) return false;
    const expected = kindsForWeekday(parseIsoDate(edge).weekday, this.patterns);
    const existing = await this.store.queryRange(tenantId, edge, edge);
    return !existing.some((s) => expected.includes(s.kind));
  }

  /** Periodic body; never throws. */
  async runScheduledCheck(tenantId: string): Promise<CoverageCheck> {
    try {
      const horizon = addWeeks(this.today(), this.futureWeeks);
      if (!(await this.needsRepopulation(tenantId, horizon))) {
        this.logger.debug({ tenantId, horizon }, "coverage fresh");
        return { outcome: "fresh", horizon };
      }
      const result = await this.ensureCoverage(tenantId);
      return { outcome: "repopulated", result };
    } catch (error) {
      this.logger.error({ err: error, tenantId }, "scheduled coverage check failed");
      return { outcome: "failed", error };
    }
  }
}
