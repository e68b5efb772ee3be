import type { SlotKey } from "./types.js";

export type SlotInputCode =
  | "invalid_date"
  | "date_out_of_range"
  | "invalid_label"
  | "unknown_kind"
  | "invalid_pattern";

/** Caller supplied something we refuse to coerce. Surfaces as a 400. */
export class SlotInputError extends Error {
  readonly code: SlotInputCode;

  constructor(code: SlotInputCode, message: string) {
    super(message);
    this.name = "SlotInputError";
    this.code = code;
  }
}

/** Fill targeted a key with no slot behind it. Slots are never created implicitly. */
export class SlotNotFoundError extends Error {
  readonly tenantId: string;
  readonly key: SlotKey;

  constructor(tenantId: string, key: SlotKey) {
    super(`No ${key.kind} slot on ${key.date} for tenant ${tenantId}`);
    this.name = "SlotNotFoundError";
    this.tenantId = tenantId;
    this.key = key;
  }
}
