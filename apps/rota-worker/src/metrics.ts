import Fastify from "fastify";
import { collectDefaultMetrics, Counter, Histogram, Registry } from "prom-client";
import type { Logger } from "pino";

// Create a registry and default process metrics
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

// Custom metrics
export const coverageChecks = new Counter({
  name: "worker_coverage_checks_total",
  help: "Periodic coverage checks by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

export const slotsCreated = new Counter({
  name: "worker_slots_created_total",
  help: "Slots inserted by the periodic coverage check",
  registers: [registry],
});

export const summaryPublishes = new Counter({
  name: "worker_summary_publishes_total",
  help: "Summary publishes by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

export const briefingMatches = new Counter({
  name: "worker_briefing_matches_total",
  help: "Briefing match attempts by winning strategy or failure reason",
  labelNames: ["result"] as const,
  registers: [registry],
});

export const jobDuration = new Histogram({
  name: "worker_job_duration_seconds",
  help: "Maintenance job duration (s)",
  labelNames: ["type"] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export async function startMetricsServer(port: number, logger: Logger) {
  const app = Fastify({ logger: false });
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", registry.contentType);
    return registry.metrics();
  });
  await app.listen({ port, host: "0.0.0.0" });
  logger.info({ port }, "metrics listening");
  return app;
}
