import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { ConfigStore, SummaryPublishJob } from "@rota/shared";

export type ConfigRouteOptions = {
  configs: ConfigStore;
  requestPublish: (job: Omit<SummaryPublishJob, "type">) => Promise<string>;
};

const Params = z.object({ tenantId: z.string().min(1) });

const Body = z.object({
  summaryChannel: z.string().url(),
  summaryMessage: z.string().min(1),
  briefingSource: z.string().url().nullable().optional(),
});

export const configRoutes: FastifyPluginAsync<ConfigRouteOptions> = async (app, opts) => {
  app.get("/tenants/:tenantId/config", async (req, reply) => {
    const params = Params.safeParse(req.params);
    if (!params.success) {
      reply.code(400).send({ error: "validation", details: params.error.flatten() });
      return;
    }
    const config = await opts.configs.getScheduleConfig(params.data.tenantId);
    if (!config) {
      reply.code(404).send({ error: "not_found", message: "Summary publishing is not configured" });
      return;
    }
    return config;
  });

  app.put("/tenants/:tenantId/config", async (req, reply) => {
    const params = Params.safeParse(req.params);
    const body = Body.safeParse(req.body);
    if (!params.success || !body.success) {
      reply.code(400).send({
        error: "validation",
        details: params.success ? body.error?.flatten() : params.error.flatten(),
      });
      return;
    }
    const config = {
      tenantId: params.data.tenantId,
      summaryChannel: body.data.summaryChannel,
      summaryMessage: body.data.summaryMessage,
      briefingSource: body.data.briefingSource ?? null,
    };
    await opts.configs.setScheduleConfig(config);
    // New target: render into it right away
    await opts.requestPublish({
      tenantId: config.tenantId,
      reason: "config",
      trace: { requestId: req.requestId },
    });
    return config;
  });
};
