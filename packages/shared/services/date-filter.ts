import { SlotNotFoundError } from "../errors.js";
import { addWeeks, parseIsoDate, toIsoDate, todayIn } from "../dates.js";
import {
  formatSlotChoice,
  parseSlotLabel,
  validateManualDate,
} from "../labels.js";
import type { IsoDate, Slot } from "../types.js";
import type { SlotStore } from "../store/types.js";
import { DEFAULT_FUTURE_WEEKS, DEFAULT_PAST_WEEKS } from "./maintainer.js";

export const SEARCH_WINDOW_YEARS = 1;
/** Select menus show at most 25 options. */
export const DEFAULT_SEARCH_LIMIT = 25;

export type SlotQuery = {
  search?: string;
  /** Manual "DD-MM-YY"; takes precedence over search. */
  date?: string;
  limit?: number;
};

export type DateFilterOptions = {
  store: SlotStore;
  zone?: string;
  pastWeeks?: number;
  futureWeeks?: number;
  now?: () => Date;
};

export function compareSlots(a: Slot, b: Slot) {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  return 0;
}

export class DateFilter {
  private readonly store: SlotStore;
  private readonly zone: string;
  private readonly pastWeeks: number;
  private readonly futureWeeks: number;
  private readonly now: () => Date;

  constructor(opts: DateFilterOptions) {
    this.store = opts.store;
    this.zone = opts.zone ?? "UTC";
    this.pastWeeks = opts.pastWeeks ?? DEFAULT_PAST_WEEKS;
    this.futureWeeks = opts.futureWeeks ?? DEFAULT_FUTURE_WEEKS;
    this.now = opts.now ?? (() => new Date());
  }

  today() {
    return todayIn(this.zone, this.now());
  }

  async listRange(tenantId: string, from: IsoDate, to: IsoDate) {
    const slots = await this.store.queryRange(tenantId, from, to);
    return [...slots].sort(compareSlots);
  }

  /** The maintainer's window around today. */
  listDefault(tenantId: string) {
    const today = this.today();
    return this.listRange(
      tenantId,
      addWeeks(today, -this.pastWeeks),
      addWeeks(today, this.futureWeeks),
    );
  }

  /** Case-insensitive substring match on formatSlotChoice over ±1 year. */
  async search(tenantId: string, text: string, limit = DEFAULT_SEARCH_LIMIT) {
    const needle = text.trim().toLowerCase();
    if (!needle) return (await this.listDefault(tenantId)).slice(0, limit);

    const today = parseIsoDate(this.today());
    const slots = await this.listRange(
      tenantId,
      toIsoDate(today.minus({ years: SEARCH_WINDOW_YEARS })),
      toIsoDate(today.plus({ years: SEARCH_WINDOW_YEARS })),
    );
    return slots
      .filter((s) => formatSlotChoice(s).toLowerCase().includes(needle))
      .slice(0, limit);
  }

  /** Throws SlotInputError for malformed or out-of-range input. */
  async listForManualDate(tenantId: string, text: string) {
    const date = validateManualDate(text, this.today());
    return this.listRange(tenantId, date, date);
  }

  async available(tenantId: string, query: SlotQuery = {}): Promise<Slot[]> {
    if (query.date) return this.listForManualDate(tenantId, query.date);
    return this.search(tenantId, query.search ?? "", query.limit);
  }

  /** Label → slot. The label only addresses; the key is (tenant, date, kind). */
  async resolveSlot(tenantId: string, label: string): Promise<Slot> {
    const key = parseSlotLabel(label);
    const slot = await this.store.get(tenantId, key.date, key.kind);
    if (!slot) throw new SlotNotFoundError(tenantId, key);
    return slot;
  }
}
