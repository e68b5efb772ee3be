import { describe, it, expect, beforeEach } from "vitest";
import {
  CoverageMaintainer,
  DateFilter,
  SlotInputError,
  SlotNotFoundError,
} from "../index.js";
import { MemoryStore, silentLogger } from "./helpers/memory-store.js";

const TENANT = "guild-1";
const NOW = new Date("2025-10-22T12:00:00Z");

describe("DateFilter", () => {
  let store: MemoryStore;
  let filter: DateFilter;

  beforeEach(() => {
    store = new MemoryStore();
    filter = new DateFilter({ store, now: () => NOW });
  });

  it("returns nothing for an empty store", async () => {
    expect(await filter.search(TENANT, "mission")).toEqual([]);
    expect(await filter.available(TENANT)).toEqual([]);
  });

  describe("search", () => {
    beforeEach(async () => {
      await new CoverageMaintainer({ store, logger: silentLogger, now: () => NOW })
        .ensureCoverage(TENANT, 52, 52);
      // beyond the one-year window
      await store.seed(TENANT, "2026-11-01", "Mission");
    });

    it("finds only matching kinds over a year either side, ordered by date", async () => {
      const found = await filter.search(TENANT, "mission", 1_000);
      expect(found.length).toBeGreaterThan(100);
      expect(found.every((s) => s.kind === "Mission")).toBe(true);
      const dates = found.map((s) => s.date);
      expect(dates).toEqual([...dates].sort());
      expect(dates[0] >= "2024-10-22").toBe(true);
      expect(dates.at(-1)).toBe("2026-10-18");
    });

    it("matches case-insensitively anywhere in the label", async () => {
      const found = await filter.search(TENANT, "THURSDAY Mission - 23/10");
      expect(found.map((s) => [s.date, s.kind])).toEqual([["2025-10-23", "Mission"]]);
    });

    it("finds a filled slot by the preview of its event name", async () => {
      await store.seed(TENANT, "2025-10-30", "Training", "Operation Nightfall convoy escort", "Sam");
      const found = await filter.search(TENANT, "nightfall");
      expect(found.map((s) => [s.date, s.kind])).toEqual([["2025-10-30", "Training"]]);
      // past the 20-character preview
      expect(await filter.search(TENANT, "escort")).toEqual([]);
    });

    it("caps results at the default limit", async () => {
      expect(await filter.search(TENANT, "day")).toHaveLength(25);
    });

    it("falls back to the default window for a blank query", async () => {
      const found = await filter.search(TENANT, "   ", 100);
      expect(found.at(0)?.date).toBe("2025-09-25");
      expect(found.at(-1)?.date).toBe("2025-11-16");
      expect(found).toHaveLength(24);
    });
  });

  describe("manual date", () => {
    beforeEach(async () => {
      await store.seed(TENANT, "2025-10-23", "Training");
      await store.seed(TENANT, "2025-10-23", "Mission");
      await store.seed(TENANT, "2025-10-26", "Mission");
    });

    it("lists the slots of that day, ahead of any search text", async () => {
      const found = await filter.available(TENANT, { date: "23-10-25", search: "Sunday" });
      expect(found.map((s) => s.kind)).toEqual(["Mission", "Training"]);
    });

    it("returns an empty list for a day with no slots", async () => {
      expect(await filter.listForManualDate(TENANT, "24-10-25")).toEqual([]);
    });

    it("rejects dates more than a year from today", async () => {
      const err = await filter.available(TENANT, { date: "23-10-27" }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SlotInputError);
      expect(err instanceof SlotInputError && err.code).toBe("date_out_of_range");
    });

    it("rejects malformed dates", async () => {
      await expect(filter.available(TENANT, { date: "2025-10-23" })).rejects.toThrow(
        "Invalid date format. Please use DD-MM-YY (e.g. 25-10-24)",
      );
    });
  });

  describe("resolveSlot", () => {
    it("maps a label back to its stored slot", async () => {
      await store.seed(TENANT, "2025-10-23", "Training", "Range day", "Alex");
      const slot = await filter.resolveSlot(TENANT, "Thursday Training - 23/10/25");
      expect(slot).toMatchObject({ date: "2025-10-23", kind: "Training", label: "Range day" });
    });

    it("accepts a choice string carrying a preview", async () => {
      await store.seed(TENANT, "2025-10-23", "Training", "Range day", "Alex");
      const slot = await filter.resolveSlot(TENANT, "Thursday Training - 23/10/25 (Range day)");
      expect(slot.authorName).toBe("Alex");
    });

    it("throws not-found for a key with no slot", async () => {
      await expect(
        filter.resolveSlot(TENANT, "Thursday Training - 30/10/25"),
      ).rejects.toBeInstanceOf(SlotNotFoundError);
    });
  });
});
