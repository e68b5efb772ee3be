import type {
  IsoDate,
  ScheduleConfig,
  Slot,
  SlotKind,
} from "../types.js";

/**
 * Persisted slots keyed by (tenant, date, kind). Implementations enforce the
 * uniqueness of that triple themselves; callers never re-check it.
 */
export interface SlotStore {
  /** True when a row was inserted, false when the key already existed. */
  upsertIfAbsent(tenantId: string, date: IsoDate, kind: SlotKind): Promise<boolean>;
  get(tenantId: string, date: IsoDate, kind: SlotKind): Promise<Slot | null>;
  /** Null when the slot does not exist; never creates one. */
  setLabel(
    tenantId: string,
    date: IsoDate,
    kind: SlotKind,
    label: string,
    authorId: string,
    authorName: string,
  ): Promise<Slot | null>;
  /** Inclusive on both ends, ordered by date then kind. */
  queryRange(tenantId: string, from: IsoDate, to: IsoDate): Promise<Slot[]>;
}

export interface ConfigStore {
  getScheduleConfig(tenantId: string): Promise<ScheduleConfig | null>;
  setScheduleConfig(config: ScheduleConfig): Promise<void>;
}

/** The slice of pg's Pool/Client the stores use. */
export interface Queryable {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}
