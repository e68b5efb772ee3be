import { pino } from "pino";
import type {
  ConfigStore,
  IsoDate,
  ScheduleConfig,
  Slot,
  SlotKind,
  SlotStore,
} from "../../index.js";

export const silentLogger = pino({ level: "silent" });

const keyOf = (tenantId: string, date: IsoDate, kind: SlotKind) =>
  `${tenantId}|${date}|${kind}`;

/** In-process SlotStore/ConfigStore with the same uniqueness contract as the table. */
export class MemoryStore implements SlotStore, ConfigStore {
  readonly slots = new Map<string, Slot>();
  readonly configs = new Map<string, ScheduleConfig>();
  private nextId = 1;

  async upsertIfAbsent(tenantId: string, date: IsoDate, kind: SlotKind) {
    const key = keyOf(tenantId, date, kind);
    if (this.slots.has(key)) return false;
    this.slots.set(key, {
      id: this.nextId++,
      tenantId,
      date,
      kind,
      label: "",
      authorId: "",
      authorName: "",
    });
    return true;
  }

  async get(tenantId: string, date: IsoDate, kind: SlotKind) {
    const slot = this.slots.get(keyOf(tenantId, date, kind));
    return slot ? { ...slot } : null;
  }

  async setLabel(
    tenantId: string,
    date: IsoDate,
    kind: SlotKind,
    label: string,
    authorId: string,
    authorName: string,
  ) {
    const key = keyOf(tenantId, date, kind);
    const slot = this.slots.get(key);
    if (!slot) return null;
    const next = { ...slot, label, authorId, authorName };
    this.slots.set(key, next);
    return { ...next };
  }

  async queryRange(tenantId: string, from: IsoDate, to: IsoDate) {
    return [...this.slots.values()]
      .filter((s) => s.tenantId === tenantId && s.date >= from && s.date <= to)
      .sort((a, b) =>
        a.date === b.date ? a.kind.localeCompare(b.kind) : a.date.localeCompare(b.date),
      )
      .map((s) => ({ ...s }));
  }

  async getScheduleConfig(tenantId: string) {
    return this.configs.get(tenantId) ?? null;
  }

  async setScheduleConfig(config: ScheduleConfig) {
    this.configs.set(config.tenantId, { ...config });
  }

  /** Test seeding: a slot with details already attached. */
  async seed(
    tenantId: string,
    date: IsoDate,
    kind: SlotKind,
    label = "",
    authorName = "",
  ) {
    await this.upsertIfAbsent(tenantId, date, kind);
    if (label || authorName) {
      await this.setLabel(tenantId, date, kind, label, authorName ? "42" : "", authorName);
    }
  }
}
