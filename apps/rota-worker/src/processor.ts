// Job handler for the maintenance queue: periodic coverage checks and
// debounced summary publishes.
import type { Logger } from "pino";
import type {
  ConfigStore,
  CoverageMaintainer,
  MaintenanceJob,
  SummaryBuilder,
} from "@rota/shared";
import type { Publisher } from "./adapters/webhook-publisher.js";
import { WebhookError } from "./adapters/webhook-publisher.js";
import {
  coverageChecks,
  jobDuration,
  slotsCreated,
  summaryPublishes,
} from "./metrics.js";

export type ProcessorDeps = {
  maintainer: CoverageMaintainer;
  summary: SummaryBuilder;
  configs: ConfigStore;
  publisher: Publisher;
  logger: Logger;
};

/** The slice of a BullMQ Job the handler reads. */
export type MaintenanceJobLike = {
  id?: string;
  name: string;
  data: MaintenanceJob;
};

export function createMaintenanceProcessor(deps: ProcessorDeps) {
  const { maintainer, summary, configs, publisher, logger } = deps;

  async function coverageCheck(tenantId: string, jobId: string) {
    // runScheduledCheck never throws; a failed check waits for the next firing
    const check = await maintainer.runScheduledCheck(tenantId);
    coverageChecks.labels(check.outcome).inc(1);
    if (check.outcome === "repopulated") {
      slotsCreated.inc(check.result.created);
    }
    logger.info({ tenantId, jobId, outcome: check.outcome }, "coverage check done");
  }

  async function summaryPublish(tenantId: string, jobId: string, reason: string) {
    const config = await configs.getScheduleConfig(tenantId);
    if (!config) {
      summaryPublishes.labels("skipped").inc(1);
      logger.info({ tenantId, jobId }, "no schedule config → publishing disabled");
      return;
    }

    const { document, partial } = await summary.build(tenantId);
    try {
      await publisher.publish(config, document, { partial });
    } catch (err) {
      if (err instanceof WebhookError && err.permanent) {
        summaryPublishes.labels("permanent_fail").inc(1);
        logger.warn(
          { tenantId, jobId, status: err.status },
          "permanent publish failure, no retry",
        );
        return; // do not throw → no retry
      }
      summaryPublishes.labels("transient_fail").inc(1);
      logger.warn({ tenantId, jobId, err }, "transient publish failure → will retry");
      throw err; // BullMQ backoff/attempts applies
    }

    summaryPublishes.labels(partial ? "partial" : "success").inc(1);
    logger.info({ tenantId, jobId, reason, partial }, "summary published");
  }

  return async function processJob(job: MaintenanceJobLike) {
    const jobId = job.id ?? "unknown";
    const end = jobDuration.labels(job.data.type).startTimer();
    try {
      switch (job.data.type) {
        case "coverage_check":
          await coverageCheck(job.data.tenantId, jobId);
          return;
        case "summary_publish":
          await summaryPublish(job.data.tenantId, jobId, job.data.reason);
          return;
      }
    } finally {
      end();
    }
  };
}
