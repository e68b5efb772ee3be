import { z } from "zod";
import { SLOT_KINDS, type IsoDate, type Slot, type SlotKind } from "../types.js";
import type { Queryable, SlotStore } from "./types.js";

// date::text keeps pg from turning DATE into a local-midnight JS Date.
const SLOT_COLUMNS =
  "id, tenant_id, date::text AS date, kind, label, author_id, author_name";

const SlotRow = z.object({
  // BIGSERIAL arrives as a string
  id: z.coerce.number().int(),
  tenant_id: z.string(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  kind: z.enum(SLOT_KINDS),
  label: z.string(),
  author_id: z.string(),
  author_name: z.string(),
});

function toSlot(row: unknown): Slot {
  const r = SlotRow.parse(row);
  return {
    id: r.id,
    tenantId: r.tenant_id,
    date: r.date,
    kind: r.kind,
    label: r.label,
    authorId: r.author_id,
    authorName: r.author_name,
  };
}

export class PgSlotStore implements SlotStore {
  constructor(private readonly db: Queryable) {}

  async upsertIfAbsent(tenantId: string, date: IsoDate, kind: SlotKind) {
    // Racing inserts land on the unique index and become no-ops here.
    const res = await this.db.query(
      `INSERT INTO slots (tenant_id, date, kind)
       VALUES ($1, $2::date, $3)
       ON CONFLICT (tenant_id, date, kind) DO NOTHING
       RETURNING id`,
      [tenantId, date, kind],
    );
    return res.rowCount === 1;
  }

  async get(tenantId: string, date: IsoDate, kind: SlotKind) {
    const res = await this.db.query(
      `SELECT ${SLOT_COLUMNS} FROM slots
       WHERE tenant_id = $1 AND date = $2::date AND kind = $3`,
      [tenantId, date, kind],
    );
    return res.rows.length ? toSlot(res.rows[0]) : null;
  }

  async setLabel(
    tenantId: string,
    date: IsoDate,
    kind: SlotKind,
    label: string,
    authorId: string,
    authorName: string,
  ) {
    const res = await this.db.query(
      `UPDATE slots SET label = $4, author_id = $5, author_name = $6
       WHERE tenant_id = $1 AND date = $2::date AND kind = $3
       RETURNING ${SLOT_COLUMNS}`,
      [tenantId, date, kind, label, authorId, authorName],
    );
    return res.rows.length ? toSlot(res.rows[0]) : null;
  }

  async queryRange(tenantId: string, from: IsoDate, to: IsoDate) {
    const res = await this.db.query(
      `SELECT ${SLOT_COLUMNS} FROM slots
       WHERE tenant_id = $1 AND date >= $2::date AND date <= $3::date
       ORDER BY date, kind`,
      [tenantId, from, to],
    );
    return res.rows.map(toSlot);
  }
}
