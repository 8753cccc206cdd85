import os from "node:os";
import { z } from "zod";

function toBooleanFlag(val?: string): boolean {
  if (!val) return false;
  const lower = val.toLowerCase().trim();
  return lower === "true" || lower === "1" || lower === "yes";
}

const EnvSchema = z.object({
  BOT_TOKEN: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3000),
  DB_PATH: z.string().min(1).default("./data/bot.sqlite"),

  // Claim owner recorded on content plan entries. Must be unique per running worker.
  WORKER_ID: z
    .string()
    .optional()
    .transform((val) => (val && val.trim().length > 0 ? val.trim() : `${os.hostname()}:${process.pid}`)),

  // Kill switch for the scheduler loop. Health endpoint keeps running when disabled.
  ENABLE_DELIVERY: z
    .string()
    .optional()
    .transform((val) => (val === undefined ? true : toBooleanFlag(val))),

  TICK_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(60),
  MAX_DELIVERY_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(5),
  SEND_TIMEOUT_MS: z.coerce.number().int().min(100).default(15_000),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(600_000),
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),

  // Dispatch lease on a delivery outcome. A worker that dies mid-send releases the row after this long.
  OUTCOME_LEASE_MS: z.coerce.number().int().min(1_000).default(120_000),

  // Finished entries (and their outcome rows) older than this are purged by maintenance.
  CONTENT_RETENTION_DAYS: z.coerce.number().int().min(1).default(30)
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(raw: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables.");
  }

  const env = parsed.data;

  if (env.RETRY_MAX_DELAY_MS < env.RETRY_BASE_DELAY_MS) {
    throw new Error("RETRY_MAX_DELAY_MS must be greater than or equal to RETRY_BASE_DELAY_MS.");
  }

  if (env.OUTCOME_LEASE_MS <= env.SEND_TIMEOUT_MS) {
    throw new Error("OUTCOME_LEASE_MS must be longer than SEND_TIMEOUT_MS.");
  }

  return env;
}
