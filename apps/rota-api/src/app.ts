import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import type { Logger } from "pino";
import {
  SlotInputError,
  SlotNotFoundError,
  type ConfigStore,
  type CoverageMaintainer,
  type DateFilter,
  type SlotEditor,
  type SummaryBuilder,
  type SummaryPublishJob,
} from "@rota/shared";
import { registerRequestId } from "./middleware/requestId.js";
import { registerAuth } from "./middleware/auth.js";
import { registerMetrics } from "./metrics.js";
import { healthRoutes, type HealthRouteOptions } from "./routes/health.js";
import { slotRoutes } from "./routes/slots.js";
import { coverageRoutes } from "./routes/coverage.js";
import { summaryRoutes } from "./routes/summary.js";
import { configRoutes } from "./routes/config.js";

export type ApiDeps = {
  logger: Logger;
  serviceToken: string;
  filter: DateFilter;
  editor: SlotEditor;
  maintainer: CoverageMaintainer;
  summary: SummaryBuilder;
  configs: ConfigStore;
  coverageDefaults: { pastWeeks: number; futureWeeks: number };
  requestPublish: (job: Omit<SummaryPublishJob, "type">) => Promise<string>;
  health: HealthRouteOptions;
};

export async function buildApp(deps: ApiDeps) {
  const loggerInstance: FastifyBaseLogger = deps.logger;
  const app = Fastify({ loggerInstance });

  registerRequestId(app);
  registerAuth(app, deps.serviceToken);

  app.setErrorHandler<FastifyError>((err, req, reply) => {
    if (err instanceof SlotInputError) {
      reply.code(400).send({ error: err.code, message: err.message });
      return;
    }
    if (err instanceof SlotNotFoundError) {
      reply.code(404).send({ error: "not_found", message: err.message });
      return;
    }
    const status = err.statusCode ?? 500;
    if (status < 500) {
      reply.code(status).send({ error: err.code ?? "bad_request", message: err.message });
      return;
    }
    req.log.error({ err, requestId: req.requestId }, "request failed");
    reply.code(status).send({ error: "internal" });
  });

  registerMetrics(app);
  await app.register(healthRoutes, deps.health);
  await app.register(slotRoutes, { filter: deps.filter, editor: deps.editor });
  await app.register(coverageRoutes, {
    maintainer: deps.maintainer,
    defaults: deps.coverageDefaults,
  });
  await app.register(summaryRoutes, {
    summary: deps.summary,
    requestPublish: deps.requestPublish,
  });
  await app.register(configRoutes, {
    configs: deps.configs,
    requestPublish: deps.requestPublish,
  });

  return app;
}
