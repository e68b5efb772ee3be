import { config as loadDotenv } from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
loadDotenv({ path: path.resolve(__dirname, "../../../.env") });

const csv = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
  );

export const EnvSchema = z.object({
  PORT: z.coerce.number().default(8080),
  DATABASE_URL: z.string().url(),
  REDIS_URL: z.string().url(),
  SERVICE_TOKEN_DEV: z.string().min(1),
  TENANT_IDS: csv,
  REFERENCE_TZ: z.string().default("Europe/London"),
  COVERAGE_PAST_WEEKS: z.coerce.number().int().min(0).max(52).default(4),
  COVERAGE_FUTURE_WEEKS: z.coerce.number().int().min(1).max(52).default(4),
  BRIEFING_DEADLINE_MS: z.coerce.number().int().positive().default(5_000),
  PUBLISH_DEBOUNCE_MS: z.coerce.number().int().positive().default(10_000),
  RECURRENCE_PATTERNS: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}
