// Worker: hosts the periodic coverage check (one job scheduler per tenant)
// and the debounced summary publish, and exposes Prometheus metrics.
import { Queue, Worker, type Job } from "bullmq";
import { Redis } from "ioredis";
import { pino } from "pino";
import { Pool } from "pg";
import {
  CoverageMaintainer,
  coverageSchedulerId,
  DateFilter,
  DEFAULT_PATTERNS,
  enqueueSummaryPublish,
  HttpBriefingTitleSource,
  parsePatterns,
  PgConfigStore,
  PgSlotStore,
  QUEUE_MAINTENANCE,
  SummaryBuilder,
  type MaintenanceJob,
} from "@rota/shared";
import { WebhookPublisher } from "./adapters/webhook-publisher.js";
import { briefingMatches, startMetricsServer } from "./metrics.js";
import { createMaintenanceProcessor } from "./processor.js";
import { loadEnv } from "./config.js";

const logger = pino({ level: "info" });

async function main() {
  const env = loadEnv();
  await startMetricsServer(env.METRICS_PORT, logger);

  /** BullMQ requires maxRetriesPerRequest: null for blocking ops. */
  const redis = new Redis(env.REDIS_URL, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });
  const pgPool = new Pool({ connectionString: env.DATABASE_URL });
  const queue = new Queue<MaintenanceJob>(QUEUE_MAINTENANCE, { connection: redis });

  const slots = new PgSlotStore(pgPool);
  const configs = new PgConfigStore(pgPool);
  const patterns = env.RECURRENCE_PATTERNS
    ? parsePatterns(env.RECURRENCE_PATTERNS)
    : DEFAULT_PATTERNS;

  const maintainer = new CoverageMaintainer({
    store: slots,
    logger,
    patterns,
    zone: env.REFERENCE_TZ,
    pastWeeks: env.COVERAGE_PAST_WEEKS,
    futureWeeks: env.COVERAGE_FUTURE_WEEKS,
    onCoverageChanged: async (tenantId) => {
      await enqueueSummaryPublish(
        queue,
        { tenantId, reason: "coverage" },
        env.PUBLISH_DEBOUNCE_MS,
      );
    },
  });
  const summary = new SummaryBuilder({
    filter: new DateFilter({ store: slots, zone: env.REFERENCE_TZ }),
    configs,
    titles: new HttpBriefingTitleSource(),
    logger,
    zone: env.REFERENCE_TZ,
    cutoff: { weekday: 7, hour: 20, zone: env.REFERENCE_TZ },
    patterns,
    deadlineMs: env.BRIEFING_DEADLINE_MS,
    onMatch: (outcome) => {
      briefingMatches
        .labels(outcome.matched ? outcome.match.strategy : outcome.reason)
        .inc(1);
    },
  });

  const processJob = createMaintenanceProcessor({
    maintainer,
    summary,
    configs,
    publisher: new WebhookPublisher(),
    logger,
  });

  const worker = new Worker<MaintenanceJob>(
    QUEUE_MAINTENANCE,
    (job: Job<MaintenanceJob>) => processJob(job),
    { connection: redis, concurrency: 1 },
  );

  worker.on("failed", (job, err) => {
    logger.warn(
      { jobId: job?.id, type: job?.data.type, attemptsMade: job?.attemptsMade, err: err.message },
      "maintenance job failed",
    );
  });

  for (const tenantId of env.TENANT_IDS) {
    const data: MaintenanceJob = { type: "coverage_check", tenantId };
    await queue.upsertJobScheduler(
      coverageSchedulerId(tenantId),
      { every: env.MAINTAIN_INTERVAL_MS },
      { name: "coverage_check", data, opts: { removeOnComplete: true, removeOnFail: 100 } },
    );
    // Startup check, independent of where the scheduler's interval stands
    await queue.add("coverage_check", data, { removeOnComplete: true, removeOnFail: 100 });
  }

  logger.info(
    { queue: QUEUE_MAINTENANCE, tenants: env.TENANT_IDS },
    "worker up: listening to queue",
  );

  const shutdown = async () => {
    await worker.close();
    await queue.close();
    await pgPool.end();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((e) => {
  logger.error(e, "worker fatal");
  process.exit(1);
});
