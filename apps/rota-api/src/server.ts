import { pino } from "pino";
import { Pool } from "pg";
import { Redis } from "ioredis";
import {
  CoverageMaintainer,
  DateFilter,
  DEFAULT_PATTERNS,
  enqueueSummaryPublish,
  HttpBriefingTitleSource,
  parsePatterns,
  PgConfigStore,
  PgSlotStore,
  SlotEditor,
  SummaryBuilder,
  type SummaryPublishJob,
} from "@rota/shared";
import { loadEnv } from "./config.js";
import { createMaintenanceQueue } from "./queues.js";
import { buildApp } from "./app.js";

const logger = pino({
  level: "info",
  transport:
    process.env.NODE_ENV === "development"
      ? { target: "pino-pretty", options: { singleLine: true } }
      : undefined,
});

async function main() {
  const env = loadEnv();

  // Shared connections
  const pgPool = new Pool({ connectionString: env.DATABASE_URL });
  const redis = new Redis(env.REDIS_URL);
  const { queue } = createMaintenanceQueue(env.REDIS_URL);

  const slots = new PgSlotStore(pgPool);
  const configs = new PgConfigStore(pgPool);
  const patterns = env.RECURRENCE_PATTERNS
    ? parsePatterns(env.RECURRENCE_PATTERNS)
    : DEFAULT_PATTERNS;
  const now = () => new Date();

  const requestPublish = (job: Omit<SummaryPublishJob, "type">) =>
    enqueueSummaryPublish(queue, job, env.PUBLISH_DEBOUNCE_MS);

  const filter = new DateFilter({
    store: slots,
    zone: env.REFERENCE_TZ,
    pastWeeks: env.COVERAGE_PAST_WEEKS,
    futureWeeks: env.COVERAGE_FUTURE_WEEKS,
    now,
  });
  const maintainer = new CoverageMaintainer({
    store: slots,
    logger,
    patterns,
    zone: env.REFERENCE_TZ,
    pastWeeks: env.COVERAGE_PAST_WEEKS,
    futureWeeks: env.COVERAGE_FUTURE_WEEKS,
    now,
    onCoverageChanged: async (tenantId) => {
      await requestPublish({ tenantId, reason: "coverage" });
    },
  });
  const editor = new SlotEditor({
    store: slots,
    logger,
    onSlotFilled: async (tenantId) => {
      await requestPublish({ tenantId, reason: "fill" });
    },
  });
  const summary = new SummaryBuilder({
    filter,
    configs,
    titles: new HttpBriefingTitleSource(),
    logger,
    zone: env.REFERENCE_TZ,
    cutoff: { weekday: 7, hour: 20, zone: env.REFERENCE_TZ },
    patterns,
    deadlineMs: env.BRIEFING_DEADLINE_MS,
    now,
  });

  const app = await buildApp({
    logger,
    serviceToken: env.SERVICE_TOKEN_DEV,
    filter,
    editor,
    maintainer,
    summary,
    configs,
    coverageDefaults: {
      pastWeeks: env.COVERAGE_PAST_WEEKS,
      futureWeeks: env.COVERAGE_FUTURE_WEEKS,
    },
    requestPublish,
    health: { db: pgPool, redis },
  });

  await app.listen({ port: env.PORT, host: "0.0.0.0" });
  app.log.info({ port: env.PORT }, "rota-api listening");
}

process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

main().catch((err) => {
  logger.fatal({ err }, "fatal boot error");
  process.exit(1);
});
