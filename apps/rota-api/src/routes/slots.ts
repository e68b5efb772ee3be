import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import {
  SLOT_KINDS,
  formatSlotChoice,
  formatSlotLabel,
  parseIsoDate,
  SlotInputError,
  type DateFilter,
  type Slot,
  type SlotEditor,
} from "@rota/shared";
import { slotFills } from "../metrics.js";

export type SlotRouteOptions = {
  filter: DateFilter;
  editor: SlotEditor;
};

const TenantParams = z.object({ tenantId: z.string().min(1) });

const SlotParams = TenantParams.extend({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  kind: z.enum(SLOT_KINDS),
});

const ListQuery = z.object({
  search: z.string().max(100).optional(),
  date: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

const Details = z.object({
  label: z.string().trim().min(1).max(200),
  authorId: z.string().min(1),
  authorName: z.string().trim().min(1).max(100),
});

const FillBody = Details.extend({ slot: z.string().min(1) });

function present(slot: Slot) {
  return { ...slot, key: formatSlotLabel(slot), choice: formatSlotChoice(slot) };
}

export const slotRoutes: FastifyPluginAsync<SlotRouteOptions> = async (app, opts) => {
  const { filter, editor } = opts;

  app.get("/tenants/:tenantId/slots", async (req, reply) => {
    const params = TenantParams.safeParse(req.params);
    const query = ListQuery.safeParse(req.query);
    if (!params.success || !query.success) {
      reply.code(400).send({
        error: "validation",
        details: params.success ? query.error?.flatten() : params.error.flatten(),
      });
      return;
    }
    const slots = await filter.available(params.data.tenantId, query.data);
    return { items: slots.map(present) };
  });

  // Addressed by the label a user picked from the list
  app.post("/tenants/:tenantId/slots/fill", async (req, reply) => {
    const params = TenantParams.safeParse(req.params);
    const body = FillBody.safeParse(req.body);
    if (!params.success || !body.success) {
      reply.code(400).send({
        error: "validation",
        details: params.success ? body.error?.flatten() : params.error.flatten(),
      });
      return;
    }
    const { slot: label, ...details } = body.data;
    const slot = await editor.fillByLabel(params.data.tenantId, label, details);
    slotFills.labels(slot.kind).inc();
    req.log.info({ requestId: req.requestId, key: formatSlotLabel(slot) }, "slot filled via label");
    return { slot: present(slot) };
  });

  app.put("/tenants/:tenantId/slots/:date/:kind", async (req, reply) => {
    const params = SlotParams.safeParse(req.params);
    const body = Details.safeParse(req.body);
    if (!params.success || !body.success) {
      reply.code(400).send({
        error: "validation",
        details: params.success ? body.error?.flatten() : params.error.flatten(),
      });
      return;
    }
    const { tenantId, date, kind } = params.data;
    try {
      parseIsoDate(date);
    } catch {
      throw new SlotInputError("invalid_date", `Invalid date ${date}`);
    }
    const slot = await editor.fill(tenantId, { date, kind }, body.data);
    slotFills.labels(slot.kind).inc();
    return { slot: present(slot) };
  });
};
