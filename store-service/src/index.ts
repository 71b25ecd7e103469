import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { loadConfig, type ServiceConfig } from "./config.js";
import { db } from "./lib/fire.js";
import { createLogger } from "./logger.js";
import { FirestoreRecordStore } from "./storage/firestoreRecordStore.js";
import { MemoryRecordStore } from "./storage/memoryRecordStore.js";
import type { RecordStore } from "./storage/recordStore.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const serviceRoot = path.resolve(thisDir, "..");
const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.join(serviceRoot, file), override: true });
}

function createStore(config: ServiceConfig): RecordStore {
  if (config.RECORD_STORE === "firestore") {
    return new FirestoreRecordStore(db(config.FIREBASE_PROJECT_ID), config.FIRESTORE_COLLECTION);
  }
  return new MemoryRecordStore();
}

async function bootstrap() {
  const config = loadConfig();
  const logger = createLogger(config);

  const { app } = await buildApp({
    store: createStore(config),
    logger,
    rateLimitMax: config.RATE_LIMIT_MAX,
    bodyLimit: config.BODY_LIMIT_BYTES,
    sendTimeoutMs: config.SUBSCRIBER_SEND_TIMEOUT_MS,
  });

  const close = async () => {
    app.log.info("Shutting down");
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void close());
  process.on("SIGTERM", () => void close());

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info({ recordStore: config.RECORD_STORE }, `Store service listening on http://${config.host}:${config.port}`);
  }
  catch (err) {
    app.log.error({ err }, "Failed to start store service");
    process.exit(1);
  }
}

void bootstrap();
