import { describe, it, expect, vi } from "vitest";
import { PgSlotStore, type Queryable } from "../index.js";

const row = {
  id: "17",
  tenant_id: "guild-1",
  date: "2025-10-23",
  kind: "Mission",
  label: "Operation Thunderbolt",
  author_id: "1001",
  author_name: "Sam",
};

function fakeDb(result: { rows: unknown[]; rowCount: number | null }) {
  const query = vi.fn(async (_text: string, _values?: unknown[]) => result);
  const db: Queryable = { query };
  return { db, query };
}

describe("PgSlotStore", () => {
  it("inserts with ON CONFLICT DO NOTHING and reports whether a row landed", async () => {
    const { db, query } = fakeDb({ rows: [{ id: "1" }], rowCount: 1 });
    const store = new PgSlotStore(db);

    expect(await store.upsertIfAbsent("guild-1", "2025-10-23", "Mission")).toBe(true);
    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain("ON CONFLICT (tenant_id, date, kind) DO NOTHING");
    expect(values).toEqual(["guild-1", "2025-10-23", "Mission"]);
  });

  it("treats a conflicting insert as already present", async () => {
    const { db } = fakeDb({ rows: [], rowCount: 0 });
    expect(await new PgSlotStore(db).upsertIfAbsent("guild-1", "2025-10-23", "Mission")).toBe(
      false,
    );
  });

  it("maps rows to slots", async () => {
    const { db } = fakeDb({ rows: [row], rowCount: 1 });
    expect(await new PgSlotStore(db).get("guild-1", "2025-10-23", "Mission")).toEqual({
      id: 17,
      tenantId: "guild-1",
      date: "2025-10-23",
      kind: "Mission",
      label: "Operation Thunderbolt",
      authorId: "1001",
      authorName: "Sam",
    });
  });

  it("returns null when an update matches nothing", async () => {
    const { db, query } = fakeDb({ rows: [], rowCount: 0 });
    const res = await new PgSlotStore(db).setLabel(
      "guild-1",
      "2025-10-30",
      "Training",
      "Range day",
      "1001",
      "Sam",
    );
    expect(res).toBeNull();
    expect(query.mock.calls[0][1]).toEqual([
      "guild-1",
      "2025-10-30",
      "Training",
      "Range day",
      "1001",
      "Sam",
    ]);
  });

  it("queries an inclusive range in date order", async () => {
    const { db, query } = fakeDb({ rows: [row, { ...row, id: "18", date: "2025-10-26" }], rowCount: 2 });
    const slots = await new PgSlotStore(db).queryRange("guild-1", "2025-10-20", "2025-10-26");
    expect(slots.map((s) => s.id)).toEqual([17, 18]);
    expect(query.mock.calls[0][0]).toContain("date >= $2::date AND date <= $3::date");
    expect(query.mock.calls[0][0]).toContain("ORDER BY date, kind");
  });

  it("refuses rows with an unknown kind", async () => {
    const { db } = fakeDb({ rows: [{ ...row, kind: "Parade" }], rowCount: 1 });
    await expect(new PgSlotStore(db).get("guild-1", "2025-10-23", "Mission")).rejects.toThrow();
  });
});
