import { describe, it, expect } from "vitest";
import {
  DEFAULT_PATTERNS,
  definePatterns,
  generateSlots,
  kindsForWeekday,
  lastPatternDateOnOrBefore,
  parsePatterns,
  SlotInputError,
} from "../index.js";

describe("recurrence", () => {
  describe("generateSlots", () => {
    it("emits Thursday Training+Mission and Sunday Mission for one week", () => {
      // 2025-10-20 is a Monday
      const slots = generateSlots({ from: "2025-10-20", to: "2025-10-27" });
      expect(slots).toEqual([
        { date: "2025-10-23", kind: "Training" },
        { date: "2025-10-23", kind: "Mission" },
        { date: "2025-10-26", kind: "Mission" },
      ]);
    });

    it("treats the range as half-open", () => {
      expect(generateSlots({ from: "2025-10-23", to: "2025-10-23" })).toEqual([]);
      expect(generateSlots({ from: "2025-10-23", to: "2025-10-24" })).toHaveLength(2);
      expect(generateSlots({ from: "2025-10-24", to: "2025-10-26" })).toEqual([]);
    });

    it("returns an empty list for inverted ranges", () => {
      expect(generateSlots({ from: "2025-11-01", to: "2025-10-01" })).toEqual([]);
    });

    it("produces exactly the implied entries with no duplicates over many weeks", () => {
      const slots = generateSlots({ from: "2025-01-06", to: "2025-03-31" }); // 12 weeks
      expect(slots).toHaveLength(12 * 3);
      const ids = new Set(slots.map((s) => `${s.date}|${s.kind}`));
      expect(ids.size).toBe(slots.length);
    });

    it("follows a custom pattern set", () => {
      const slots = generateSlots(
        { from: "2025-10-20", to: "2025-10-27" },
        [{ weekday: 1, kind: "Training" }],
      );
      expect(slots).toEqual([{ date: "2025-10-20", kind: "Training" }]);
    });
  });

  describe("patterns", () => {
    it("parses the env notation", () => {
      expect(parsePatterns("THU:Training, THU:Mission,SUN:Mission")).toEqual(
        DEFAULT_PATTERNS,
      );
    });

    it("rejects unknown weekdays and kinds", () => {
      expect(() => parsePatterns("FUNDAY:Mission")).toThrow(SlotInputError);
      expect(() => parsePatterns("THU:Parade")).toThrow(/Unknown kind "Parade"/);
    });

    it("rejects colliding weekday+kind pairs", () => {
      expect(() =>
        definePatterns([
          { weekday: 4, kind: "Mission" },
          { weekday: 4, kind: "Mission" },
        ]),
      ).toThrow("Duplicate recurrence pattern 4:Mission");
    });

    it("lists kinds per weekday in pattern order", () => {
      expect(kindsForWeekday(4)).toEqual(["Training", "Mission"]);
      expect(kindsForWeekday(7)).toEqual(["Mission"]);
      expect(kindsForWeekday(2)).toEqual([]);
    });
  });

  describe("lastPatternDateOnOrBefore", () => {
    it("walks back to the most recent patterned weekday", () => {
      // Wednesday → previous Sunday
      expect(lastPatternDateOnOrBefore("2025-10-22")).toBe("2025-10-19");
      // Saturday → Thursday
      expect(lastPatternDateOnOrBefore("2025-10-25")).toBe("2025-10-23");
      expect(lastPatternDateOnOrBefore("2025-10-26")).toBe("2025-10-26");
    });

    it("is null for an empty pattern set", () => {
      expect(lastPatternDateOnOrBefore("2025-10-22", [])).toBeNull();
    });
  });
});
