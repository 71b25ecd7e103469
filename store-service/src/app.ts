import Fastify, { type FastifyBaseLogger } from "fastify";
import compress from "@fastify/compress";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { sendHttpError } from "./lib/httpError.js";
import { processedAgentDataRoutes } from "./routes/processedAgentData.js";
import { subscriptionRoutes } from "./routes/subscriptions.js";
import { IngestService } from "./services/ingestService.js";
import { SubscriptionRegistry } from "./services/subscriptionRegistry.js";
import type { RecordStore } from "./storage/recordStore.js";

export type BuildAppOptions = {
  store: RecordStore;
  logger?: FastifyBaseLogger | boolean;
  rateLimitMax?: number;
  bodyLimit?: number;
  sendTimeoutMs?: number;
};

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    logger: options.logger ?? false,
    bodyLimit: options.bodyLimit,
    ignoreTrailingSlash: true,
  });

  const registry = new SubscriptionRegistry(app.log, { sendTimeoutMs: options.sendTimeoutMs });
  const ingestService = new IngestService({ store: options.store, registry, logger: app.log });

  await app.register(cors, { origin: true });
  await app.register(compress);
  await app.register(rateLimit, { max: options.rateLimitMax ?? 600, timeWindow: "1 minute" });

  app.setErrorHandler((err, req, rep) => {
    if (!err.statusCode || err.statusCode >= 500) {
      req.log.error({ err }, "request failed");
    }
    return sendHttpError(rep, err);
  });

  app.get("/healthz", async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
    subscribers: registry.count(),
  }));

  await app.register(processedAgentDataRoutes, { ingestService });
  await app.register(subscriptionRoutes, { registry });

  app.addHook("onClose", async () => {
    await options.store.close?.();
  });

  await app.ready();
  return { app, registry, ingestService };
}
