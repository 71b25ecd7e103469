import path from "node:path";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  STORE_API_URL: z.string().url().default("http://127.0.0.1:4020"),
  USER_ID: z.coerce.number().int().nonnegative().default(1),
  BATCH_SIZE: z.coerce.number().int().positive().default(10),
  MAX_BUFFER_SIZE: z.coerce.number().int().positive().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(30_000),
  READ_INTERVAL_MS: z.coerce.number().int().positive().default(100),
  FLUSH_SCHEDULE: z.string().default("*/30 * * * * *"),
  ACCELEROMETER_FILE: z.string().optional(),
  GPS_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type AgentConfig = z.infer<typeof envSchema> & {
  accelerometerFile: string;
  gpsFile: string;
};

export function loadConfig(env: NodeJS.ProcessEnv, dataDir: string): AgentConfig {
  const parsed = envSchema.parse(env);
  if (parsed.MAX_BUFFER_SIZE !== undefined && parsed.MAX_BUFFER_SIZE < parsed.BATCH_SIZE) {
    throw new Error(`MAX_BUFFER_SIZE (${parsed.MAX_BUFFER_SIZE}) must not be smaller than BATCH_SIZE (${parsed.BATCH_SIZE})`);
  }

  return {
    ...parsed,
    accelerometerFile: parsed.ACCELEROMETER_FILE ?? path.join(dataDir, "accelerometer.csv"),
    gpsFile: parsed.GPS_FILE ?? path.join(dataDir, "gps.csv")
  };
}
