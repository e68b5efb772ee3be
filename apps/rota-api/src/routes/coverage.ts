import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { CoverageMaintainer } from "@rota/shared";
import { coverageRuns } from "../metrics.js";

export type CoverageRouteOptions = {
  maintainer: CoverageMaintainer;
  defaults: { pastWeeks: number; futureWeeks: number };
};

const Params = z.object({ tenantId: z.string().min(1) });

const Body = z
  .object({
    pastWeeks: z.number().int().min(0).max(52).optional(),
    futureWeeks: z.number().int().min(1).max(52).optional(),
  })
  .default({});

export const coverageRoutes: FastifyPluginAsync<CoverageRouteOptions> = async (app, opts) => {
  // Manual extension; the worker runs the same operation on a schedule
  app.post("/tenants/:tenantId/coverage", async (req, reply) => {
    const params = Params.safeParse(req.params);
    const body = Body.safeParse(req.body ?? undefined);
    if (!params.success || !body.success) {
      reply.code(400).send({
        error: "validation",
        details: params.success ? body.error?.flatten() : params.error.flatten(),
      });
      return;
    }
    const result = await opts.maintainer.ensureCoverage(
      params.data.tenantId,
      body.data.pastWeeks ?? opts.defaults.pastWeeks,
      body.data.futureWeeks ?? opts.defaults.futureWeeks,
    );
    coverageRuns.labels(result.failed > 0 ? "partial" : "ok").inc();
    return result;
  });
};
