import type { Logger } from "pino";
import { SlotNotFoundError } from "../errors.js";
import { parseSlotLabel } from "../labels.js";
import type { Slot, SlotKey } from "../types.js";
import type { SlotStore } from "../store/types.js";

export type FillDetails = {
  label: string;
  authorId: string;
  authorName: string;
};

export type SlotEditorOptions = {
  store: SlotStore;
  logger: Logger;
  /** Best-effort, like the maintainer's hook. */
  onSlotFilled?: (tenantId: string, slot: Slot) => Promise<void>;
};

/** The single user-facing mutation: attach details to an existing slot. */
export class SlotEditor {
  private readonly store: SlotStore;
  private readonly logger: Logger;
  private readonly onSlotFilled?: SlotEditorOptions["onSlotFilled"];

  constructor(opts: SlotEditorOptions) {
    this.store = opts.store;
    this.logger = opts.logger;
    this.onSlotFilled = opts.onSlotFilled;
  }

  async fill(tenantId: string, key: SlotKey, details: FillDetails) {
    const slot = await this.store.setLabel(
      tenantId,
      key.date,
      key.kind,
      details.label.trim(),
      details.authorId,
      details.authorName.trim(),
    );
    if (!slot) throw new SlotNotFoundError(tenantId, key);

    this.logger.info(
      { tenantId, date: slot.date, kind: slot.kind, authorId: slot.authorId },
      "slot filled",
    );
    if (this.onSlotFilled) {
      try {
        await this.onSlotFilled(tenantId, slot);
      } catch (err) {
        this.logger.warn({ err, tenantId }, "summary refresh request failed");
      }
    }
    return slot;
  }

  /** Same as fill, addressed by "Thursday Training - 24/10/25". */
  async fillByLabel(tenantId: string, label: string, details: FillDetails) {
    return this.fill(tenantId, parseSlotLabel(label), details);
  }
}
