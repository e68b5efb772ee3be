import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { SummaryBuilder, SummaryPublishJob } from "@rota/shared";

export type SummaryRouteOptions = {
  summary: SummaryBuilder;
  requestPublish: (job: Omit<SummaryPublishJob, "type">) => Promise<string>;
};

const Params = z.object({ tenantId: z.string().min(1) });

export const summaryRoutes: FastifyPluginAsync<SummaryRouteOptions> = async (app, opts) => {
  app.get("/tenants/:tenantId/summary", async (req, reply) => {
    const params = Params.safeParse(req.params);
    if (!params.success) {
      reply.code(400).send({ error: "validation", details: params.error.flatten() });
      return;
    }
    return opts.summary.build(params.data.tenantId);
  });

  app.post("/tenants/:tenantId/summary/publish", async (req, reply) => {
    const params = Params.safeParse(req.params);
    if (!params.success) {
      reply.code(400).send({ error: "validation", details: params.error.flatten() });
      return;
    }
    const jobId = await opts.requestPublish({
      tenantId: params.data.tenantId,
      reason: "manual",
      trace: { requestId: req.requestId },
    });
    reply.code(202).send({ status: "queued", jobId });
  });
};
