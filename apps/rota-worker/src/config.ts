// Simple env reader for the worker.
import { z } from "zod";

export const Env = z.object({
  DATABASE_URL: z.string().url(),
  REDIS_URL: z.string().url(),
  METRICS_PORT: z.coerce.number().default(8091),
  TENANT_IDS: z
    .string()
    .default("")
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    ),
  REFERENCE_TZ: z.string().default("Europe/London"),
  COVERAGE_PAST_WEEKS: z.coerce.number().int().min(0).max(52).default(4),
  COVERAGE_FUTURE_WEEKS: z.coerce.number().int().min(1).max(52).default(4),
  RECURRENCE_PATTERNS: z.string().optional(),

  // Periodic coverage check
  MAINTAIN_INTERVAL_MS: z.coerce.number().int().positive().default(12 * 3_600_000),
  BRIEFING_DEADLINE_MS: z.coerce.number().int().positive().default(5_000),
  PUBLISH_DEBOUNCE_MS: z.coerce.number().int().positive().default(10_000),
});

export type WorkerEnv = z.infer<typeof Env>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): WorkerEnv {
  return Env.parse(source);
}
