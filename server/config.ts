import { z } from "zod";

/**
 * Environment configuration.
 *
 * DEFAULTS:
 * - PORT 5000
 * - MAX_UPLOAD_BYTES 5 MB
 * - SAMPLE_ROWS_MAX 10000
 * - UPLOAD_RATE_LIMIT_PER_MINUTE 20
 * - SESSION_STORE_MAX_ENTRIES 1000
 *
 * SESSION_SECRET is required in production.
 */

const DEV_SESSION_SECRET = "hr-dashboard-dev-secret-change-in-prod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  SESSION_SECRET: z.string().min(1).optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  SAMPLE_ROWS_MAX: z.coerce.number().int().positive().default(10_000),
  UPLOAD_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(20),
  SESSION_STORE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
  VALIDATE_API_CONTRACT: z.string().optional(),
});

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  sessionSecret: string;
  maxUploadBytes: number;
  sampleRowsMax: number;
  uploadRateLimitPerMinute: number;
  /** Dashboard sessions kept in memory before the least recently used is evicted */
  sessionStoreMaxEntries: number;
  /** Parse dashboard responses against the contract before sending */
  validateApiContract: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  if (parsed.NODE_ENV === "production" && !parsed.SESSION_SECRET) {
    throw new Error("SESSION_SECRET environment variable is required in production");
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    sessionSecret: parsed.SESSION_SECRET ?? DEV_SESSION_SECRET,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    sampleRowsMax: parsed.SAMPLE_ROWS_MAX,
    uploadRateLimitPerMinute: parsed.UPLOAD_RATE_LIMIT_PER_MINUTE,
    sessionStoreMaxEntries: parsed.SESSION_STORE_MAX_ENTRIES,
    validateApiContract:
      parsed.NODE_ENV === "development" || parsed.VALIDATE_API_CONTRACT === "1",
  };
}
