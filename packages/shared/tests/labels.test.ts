import { describe, it, expect } from "vitest";
import {
  formatSlotChoice,
  formatSlotLabel,
  generateSlots,
  parseManualDate,
  parseSlotLabel,
  SlotInputError,
  validateManualDate,
} from "../index.js";

function inputError(fn: () => unknown) {
  try {
    fn();
  } catch (err) {
    if (err instanceof SlotInputError) return err.code;
    throw err;
  }
  throw new Error("expected SlotInputError");
}

describe("labels", () => {
  describe("formatSlotLabel", () => {
    it("renders weekday, kind and DD/MM/YY", () => {
      expect(formatSlotLabel({ date: "2025-10-23", kind: "Training" })).toBe(
        "Thursday Training - 23/10/25",
      );
      expect(formatSlotLabel({ date: "2026-01-04", kind: "Mission" })).toBe(
        "Sunday Mission - 04/01/26",
      );
    });

    it("round-trips through parseSlotLabel for a year of generated slots", () => {
      for (const key of generateSlots({ from: "2025-06-01", to: "2026-06-01" })) {
        expect(parseSlotLabel(formatSlotLabel(key))).toEqual(key);
      }
    });

    it("refuses labels of dates outside the two-digit-year century", () => {
      // 2100-01-04 is a Monday; 04/01/00 reads back as Tuesday 2000-01-04
      const label = formatSlotLabel({ date: "2100-01-04", kind: "Training" });
      expect(label).toBe("Monday Training - 04/01/00");
      expect(() => parseSlotLabel(label)).toThrow("2000-01-04 is a Tuesday, not a Monday");
    });
  });

  describe("formatSlotChoice", () => {
    it("is the bare label while unfilled", () => {
      expect(formatSlotChoice({ date: "2025-10-23", kind: "Mission", label: "" })).toBe(
        "Thursday Mission - 23/10/25",
      );
    });

    it("appends a truncated preview once filled, and still parses", () => {
      const choice = formatSlotChoice({
        date: "2025-10-23",
        kind: "Mission",
        label: "Operation Thunderbolt Part Two",
      });
      expect(choice).toBe("Thursday Mission - 23/10/25 (Operation Thunderbol...)");
      expect(parseSlotLabel(choice)).toEqual({ date: "2025-10-23", kind: "Mission" });
    });
  });

  describe("parseSlotLabel", () => {
    it("rejects text that is not a label", () => {
      expect(inputError(() => parseSlotLabel("next thursday"))).toBe("invalid_label");
    });

    it("rejects unknown kinds", () => {
      expect(inputError(() => parseSlotLabel("Thursday Parade - 23/10/25"))).toBe(
        "unknown_kind",
      );
    });

    it("rejects impossible dates", () => {
      expect(inputError(() => parseSlotLabel("Thursday Mission - 31/02/25"))).toBe(
        "invalid_date",
      );
    });

    it("rejects a weekday that disagrees with the date", () => {
      expect(() => parseSlotLabel("Friday Mission - 23/10/25")).toThrow(
        "2025-10-23 is a Thursday, not a Friday",
      );
    });
  });

  describe("parseManualDate", () => {
    it("accepts DD-MM-YY with one or two digit day and month", () => {
      expect(parseManualDate("25-10-24")).toBe("2024-10-25");
      expect(parseManualDate(" 5-1-26 ")).toBe("2026-01-05");
    });

    it("resolves the two-digit year against 2000", () => {
      expect(parseManualDate("01-01-99")).toBe("2099-01-01");
    });

    it("rejects malformed input instead of defaulting", () => {
      for (const text of ["", "25/10/24", "25-10-2024", "32-01-25", "29-02-25", "abc"]) {
        expect(inputError(() => parseManualDate(text))).toBe("invalid_date");
      }
    });
  });

  describe("validateManualDate", () => {
    it("accepts dates within a year of today", () => {
      expect(validateManualDate("18-10-27", "2026-10-18")).toBe("2027-10-18");
      expect(validateManualDate("18-10-25", "2026-10-18")).toBe("2025-10-18");
    });

    it("rejects dates more than a year away", () => {
      expect(() => validateManualDate("20-10-27", "2026-10-18")).toThrow(
        "Date is too far in the future (more than 1 year)",
      );
      expect(inputError(() => validateManualDate("16-10-25", "2026-10-18"))).toBe(
        "date_out_of_range",
      );
    });
  });
});
