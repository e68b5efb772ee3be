import { collectDefaultMetrics, Counter, register } from "prom-client";
import type { FastifyInstance } from "fastify";

collectDefaultMetrics({ prefix: "rota_api_" });

export const slotFills = new Counter({
  name: "rota_api_slot_fills_total",
  help: "Slot fills by kind",
  labelNames: ["kind"] as const,
});

export const coverageRuns = new Counter({
  name: "rota_api_coverage_runs_total",
  help: "Manual coverage extensions and the slots they created",
  labelNames: ["result"] as const,
});

export function registerMetrics(app: FastifyInstance) {
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", register.contentType);
    return register.metrics();
  });
}
