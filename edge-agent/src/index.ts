import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import cron from "node-cron";
import { loadConfig } from "./config.js";
import { failureForException } from "./deliveryErrors.js";
import { BufferedForwarder, dropRejected } from "./forwarder.js";
import { createLogger } from "./logger.js";
import { AgentPipeline } from "./pipeline.js";
import { FileDatasource } from "./sampleSource.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const agentRoot = path.resolve(thisDir, "..");
const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.join(agentRoot, file), override: true });
}

async function bootstrap() {
  const config = loadConfig(process.env, path.join(agentRoot, "data"));
  const logger = createLogger(config);

  const source = new FileDatasource({
    accelerometerFile: config.accelerometerFile,
    gpsFile: config.gpsFile,
    userId: config.USER_ID
  });
  const forwarder: BufferedForwarder = new BufferedForwarder({
    endpoint: config.STORE_API_URL,
    batchSize: config.BATCH_SIZE,
    maxBufferSize: config.MAX_BUFFER_SIZE,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: config.RETRY_MAX_DELAY_MS,
    logger,
    onFlushError: (err) => {
      dropRejected(forwarder, err, logger);
    }
  });
  const pipeline = new AgentPipeline({
    source,
    forwarder,
    logger,
    readIntervalMs: config.READ_INTERVAL_MS
  });

  const flushTask = cron.schedule(config.FLUSH_SCHEDULE, async () => {
    logger.debug({ buffered: forwarder.stats().buffered }, "Running scheduled flush");
    try {
      await forwarder.scheduledFlush();
    }
    catch (err) {
      dropRejected(forwarder, failureForException(err), logger);
    }
  });

  const close = async () => {
    logger.info("Shutting down");
    flushTask.stop();
    const delivered = await pipeline.stop();
    process.exit(delivered ? 0 : 1);
  };

  process.on("SIGINT", () => void close());
  process.on("SIGTERM", () => void close());

  try {
    await pipeline.start();
    logger.info({ store: config.STORE_API_URL, userId: config.USER_ID, batchSize: config.BATCH_SIZE }, "Edge agent running");
  }
  catch (err) {
    logger.error({ err }, "Failed to start edge agent");
    process.exit(1);
  }
}

void bootstrap();
