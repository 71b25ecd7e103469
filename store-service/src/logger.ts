import type { FastifyBaseLogger } from "fastify";
import pino from "pino";
import type { ServiceConfig } from "./config.js";

export type ServiceLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">) {
  return pino({
    level: config.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
