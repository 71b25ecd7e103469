import type { Logger } from "pino";
import type { ProcessedAgentDataPayload } from "@roadwatch/types";
import {
  DeliveryError,
  PermanentRejectionFailure,
  failureForException,
  failureForStatus,
} from "./deliveryErrors.js";
import type { ProcessedRecord } from "./types.js";

export type ForwarderOptions = {
  /** Base URL of the store service. */
  endpoint: string;
  batchSize: number;
  /** When set, a full buffer drops its oldest record to make room. */
  maxBufferSize?: number;
  requestTimeoutMs?: number;
  /** 0 disables automatic retries after a transient failure. */
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
  /** Receives failures of flushes the forwarder started on its own. */
  onFlushError?: (err: DeliveryError) => void;
};

export type ForwarderStats = {
  buffered: number;
  delivered: number;
  dropped: number;
  failedAttempts: number;
  /** Head records the store refused; automatic flushes wait until they are discarded. */
  rejected: number;
  flushing: boolean;
  closed: boolean;
};

type BufferEntry = {
  seq: number;
  record: ProcessedRecord;
};

const INGEST_PATH = "/processed_agent_data/";

export function toPayload(record: ProcessedRecord): ProcessedAgentDataPayload {
  const { agentData } = record;
  return {
    road_state: record.roadState,
    agent_data: {
      user_id: agentData.userId,
      accelerometer: {
        x: agentData.accelerometer.x,
        y: agentData.accelerometer.y,
        z: agentData.accelerometer.z,
      },
      gps: {
        latitude: agentData.gps.latitude,
        longitude: agentData.gps.longitude,
      },
      timestamp: agentData.timestamp.toISOString(),
    },
  };
}

/**
 * Collects processed records and posts them to the store in batches.
 *
 * Records leave the buffer only after the store acknowledges them, either with a 2xx or as the
 * committed prefix (`failed_index`) of an error answer. At most one flush runs at a time.
 *
 * After a permanent rejection the refused records stay at the head and automatic flushes stop
 * until the caller calls `discard()` or flushes explicitly.
 */
export class BufferedForwarder {
  private buffer: BufferEntry[] = [];
  private nextSeq = 0;
  private inFlight: Promise<boolean> | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private consecutiveFailures = 0;
  private rejectedThroughSeq: number | null = null;
  private closed = false;
  private delivered = 0;
  private dropped = 0;
  private failedAttempts = 0;

  private readonly url: string;
  private readonly batchSize: number;
  private readonly maxBufferSize: number | null;
  private readonly requestTimeoutMs: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly onFlushError: (err: DeliveryError) => void;

  constructor(options: ForwarderOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    if (options.maxBufferSize !== undefined && options.maxBufferSize < options.batchSize) {
      throw new Error("maxBufferSize must not be smaller than batchSize");
    }
    this.url = new URL(INGEST_PATH, options.endpoint).toString();
    this.batchSize = options.batchSize;
    this.maxBufferSize = options.maxBufferSize ?? null;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5_000;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1_000;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? 30_000;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.onFlushError = options.onFlushError ?? ((err) => {
      this.logger.error({ err, reason: err.reason, statusCode: err.statusCode }, "Automatic flush failed");
    });
  }

  enqueue(record: ProcessedRecord): boolean {
    if (this.closed) return false;

    if (this.maxBufferSize !== null && this.buffer.length >= this.maxBufferSize) {
      const evicted = this.buffer.shift();
      this.dropped += 1;
      this.logger.warn({ dropped: this.dropped, evictedSeq: evicted?.seq, maxBufferSize: this.maxBufferSize }, "Buffer full, dropped oldest record");
    }

    this.buffer.push({ seq: this.nextSeq, record });
    this.nextSeq += 1;

    this.autoFlush();
    return true;
  }

  /**
   * Posts the whole buffer as one batch. Resolves false on a transient failure, keeping every record
   * the store did not confirm. Rejects with PermanentRejectionFailure when the store refuses the batch.
   */
  flush(): Promise<boolean> {
    if (this.inFlight) return this.inFlight;
    this.cancelRetry();

    const run = this.deliverBuffer().then((delivered) => {
      this.inFlight = null;
      // records that arrived during the flight may already fill the next batch
      if (delivered) this.autoFlush();
      return delivered;
    }, (err: unknown) => {
      this.inFlight = null;
      throw err;
    });
    this.inFlight = run;
    return run;
  }

  /** Flush for timers and schedules. Sends nothing while rejected records wait for `discard()`. */
  scheduledFlush(): Promise<boolean> {
    if (this.inFlight) return this.inFlight;
    if (this.rejectedThroughSeq !== null) return Promise.resolve(false);
    return this.flush();
  }

  /** Removes records from the head of the buffer, e.g. after the store rejected them. Clears the rejected state. */
  discard(count = this.buffer.length): ProcessedRecord[] {
    const removed = this.buffer.splice(0, Math.max(0, count));
    this.rejectedThroughSeq = null;
    if (removed.length) {
      this.logger.warn({ discarded: removed.length }, "Discarded buffered records");
    }
    return removed.map((entry) => entry.record);
  }

  /** Flushes what is left and stops scheduling retries. Resolves true when nothing remains buffered. */
  async close(): Promise<boolean> {
    this.closed = true;
    this.cancelRetry();
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }

    let flushed = false;
    try {
      flushed = await this.scheduledFlush();
    }
    catch (err) {
      this.onFlushError(failureForException(err));
    }

    const remaining = this.buffer.length;
    if (remaining > 0) {
      this.logger.warn({ remaining }, "Forwarder closed with undelivered records");
    }
    else {
      this.logger.info({ delivered: this.delivered }, "Forwarder closed");
    }
    return flushed && remaining === 0;
  }

  pending(): ProcessedRecord[] {
    return this.buffer.map((entry) => entry.record);
  }

  stats(): ForwarderStats {
    return {
      buffered: this.buffer.length,
      delivered: this.delivered,
      dropped: this.dropped,
      failedAttempts: this.failedAttempts,
      rejected: this.rejectedCount(),
      flushing: this.inFlight !== null,
      closed: this.closed,
    };
  }

  private rejectedCount(): number {
    const through = this.rejectedThroughSeq;
    if (through === null) return 0;
    return this.buffer.filter((entry) => entry.seq <= through).length;
  }

  private autoFlush(): void {
    if (this.closed || this.inFlight || this.retryTimer || this.rejectedThroughSeq !== null) return;
    if (this.buffer.length >= this.batchSize) this.flushInBackground();
  }

  private flushInBackground(): void {
    void this.flush().catch((err: unknown) => {
      this.onFlushError(failureForException(err));
    });
  }

  private async deliverBuffer(): Promise<boolean> {
    if (!this.buffer.length) return true;

    const snapshot = this.buffer.slice();
    const lastSeq = snapshot[snapshot.length - 1].seq;

    try {
      await this.post(snapshot.map((entry) => toPayload(entry.record)));
    }
    catch (err) {
      const failure = failureForException(err);
      this.failedAttempts += 1;
      const committed = this.confirmPrefix(snapshot, failure.failedIndex);
      if (failure instanceof PermanentRejectionFailure) {
        const refused = failure.failedIndex !== null && committed < snapshot.length
          ? snapshot[committed]
          : snapshot[snapshot.length - 1];
        this.rejectedThroughSeq = refused.seq;
        this.logger.error({ statusCode: failure.statusCode, size: snapshot.length, committed, rejected: this.rejectedCount() }, "Store rejected batch");
        throw failure;
      }
      this.consecutiveFailures += 1;
      this.logger.warn({ err: failure, reason: failure.reason, size: snapshot.length, committed, attempt: this.consecutiveFailures }, "Batch delivery failed, keeping records buffered");
      this.scheduleRetry();
      return false;
    }

    this.removeThrough(lastSeq);
    this.delivered += snapshot.length;
    this.consecutiveFailures = 0;
    this.rejectedThroughSeq = null;
    this.logger.debug({ size: snapshot.length, buffered: this.buffer.length }, "Batch delivered");
    return true;
  }

  /** Drops the prefix the store reported as stored before it failed. Returns its length. */
  private confirmPrefix(snapshot: BufferEntry[], failedIndex: number | null): number {
    if (failedIndex === null || failedIndex <= 0 || failedIndex > snapshot.length) return 0;
    this.removeThrough(snapshot[failedIndex - 1].seq);
    this.delivered += failedIndex;
    this.logger.info({ committed: failedIndex, size: snapshot.length }, "Store committed part of the batch");
    return failedIndex;
  }

  // The head may have been evicted or discarded meanwhile; drop whatever of it is still here.
  private removeThrough(seq: number): void {
    this.buffer = this.buffer.filter((entry) => entry.seq > seq);
  }

  private async post(batch: ProcessedAgentDataPayload[]): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(batch),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    }
    catch (err) {
      throw failureForException(err);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw failureForStatus(response.status, text);
    }
  }

  private scheduleRetry(): void {
    if (this.closed || this.retryBaseDelayMs <= 0 || this.retryTimer) return;
    const exponent = Math.min(this.consecutiveFailures - 1, 16);
    const delayMs = Math.min(this.retryBaseDelayMs * 2 ** exponent, this.retryMaxDelayMs);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.flushInBackground();
    }, delayMs);
    this.retryTimer.unref();
    this.logger.debug({ delayMs }, "Scheduled delivery retry");
  }

  private cancelRetry(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }
}

/**
 * The agent's answer to a failed flush: records the store refused are dropped with a logged
 * count so later records can flow again. Returns how many were dropped.
 */
export function dropRejected(forwarder: BufferedForwarder, err: DeliveryError, logger: Logger): number {
  if (!(err instanceof PermanentRejectionFailure)) {
    logger.error({ err, reason: err.reason, statusCode: err.statusCode }, "Flush failed");
    return 0;
  }
  const discarded = forwarder.discard(forwarder.stats().rejected);
  logger.error({ statusCode: err.statusCode, discarded: discarded.length, response: err.responseText }, "Dropped records the store rejected");
  return discarded.length;
}
