import pino from "pino";
import type { AgentConfig } from "./config.js";

export function createLogger(config: Pick<AgentConfig, "LOG_LEVEL">) {
  return pino({
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
