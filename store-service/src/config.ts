import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().int().positive().optional(),
  HOST: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  RECORD_STORE: z.enum(["memory", "firestore"]).default("memory"),
  FIRESTORE_COLLECTION: z.string().min(1).default("processed_agent_data"),
  FIREBASE_PROJECT_ID: z.string().min(1).optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  SUBSCRIBER_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000)
});

export type ServiceConfig = z.infer<typeof envSchema> & {
  port: number;
  host: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.parse({
    ...env,
    PORT: env.PORT ?? env.STORE_SERVICE_PORT
  });

  return {
    ...parsed,
    port: parsed.PORT ?? 4020,
    host: parsed.HOST ?? "0.0.0.0"
  };
}
