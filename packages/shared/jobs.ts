// Shared job payload types + helpers for both API and worker.
export const QUEUE_MAINTENANCE = "schedule_maintenance";

export type CoverageCheckJob = {
  type: "coverage_check";
  tenantId: string;
};

export type SummaryPublishJob = {
  type: "summary_publish";
  tenantId: string;
  reason: "coverage" | "fill" | "config" | "manual";
  trace?: { requestId?: string };
};

export type MaintenanceJob = CoverageCheckJob | SummaryPublishJob;

export function coverageSchedulerId(tenantId: string) {
  return `coverage-${tenantId}`;
}

/**
 * Requests landing in the same `windowMs` bucket share a job id, so BullMQ
 * keeps only the first and overlapping completions publish once.
 */
export function summaryJobId(tenantId: string, nowMs: number, windowMs: number) {
  return `summary-${tenantId}-${Math.floor(nowMs / windowMs)}`;
}

/** Delay that lands a publish at the end of its debounce bucket. */
export function summaryDelayMs(nowMs: number, windowMs: number) {
  return windowMs - (nowMs % windowMs);
}

export const PUBLISH_ATTEMPTS = 5;
export const PUBLISH_BACKOFF_MS = 30_000;

/** The part of a BullMQ Queue<MaintenanceJob> the publish helper needs. */
export interface MaintenanceQueue {
  add(
    name: string,
    data: MaintenanceJob,
    opts: {
      jobId: string;
      delay: number;
      removeOnComplete: boolean;
      removeOnFail: number;
      attempts: number;
      backoff: { type: "exponential" | "fixed"; delay: number };
    },
  ): Promise<unknown>;
}

export async function enqueueSummaryPublish(
  queue: MaintenanceQueue,
  job: Omit<SummaryPublishJob, "type">,
  windowMs: number,
  nowMs = Date.now(),
) {
  const jobId = summaryJobId(job.tenantId, nowMs, windowMs);
  await queue.add(
    "summary_publish",
    { type: "summary_publish", ...job },
    {
      jobId, // same bucket → same id → BullMQ drops the duplicate
      delay: summaryDelayMs(nowMs, windowMs),
      removeOnComplete: true,
      removeOnFail: 100,
      attempts: PUBLISH_ATTEMPTS,
      backoff: { type: "exponential", delay: PUBLISH_BACKOFF_MS }, // 30s, 60s, 120s...
    },
  );
  return jobId;
}
