import type { IngestResult, StoredRecord } from "@roadwatch/types";
import { KeyedSerialQueue } from "../lib/serialQueue.js";
import { ProcessedAgentDataPayload, describeIssues } from "../lib/validation.js";
import type { ServiceLogger } from "../logger.js";
import { toNewRecord, type NewRecord, type RecordStore } from "../storage/recordStore.js";
import type { SubscriptionRegistry } from "./subscriptionRegistry.js";

export type IngestErrorReason = "INVALID_PAYLOAD" | "VALIDATION_FAILED" | "STORAGE_UNAVAILABLE" | "NOT_FOUND";

export class IngestServiceError extends Error {
  readonly statusCode: number;
  readonly reason: IngestErrorReason;
  /** Ids stored by this call before it stopped. They stay committed. */
  readonly committed: number[];
  /** 0-based position of the record that stopped the batch. */
  readonly failedIndex: number | null;

  constructor(
    reason: IngestErrorReason,
    message: string,
    statusCode: number,
    details?: { committed?: number[]; failedIndex?: number; cause?: unknown }
  ) {
    super(message, { cause: details?.cause });
    this.reason = reason;
    this.statusCode = statusCode;
    this.committed = details?.committed ?? [];
    this.failedIndex = details?.failedIndex ?? null;
    Object.setPrototypeOf(this, IngestServiceError.prototype);
  }
}

export type IngestServiceDependencies = {
  store: RecordStore;
  registry: SubscriptionRegistry;
  logger: ServiceLogger;
};

function notFound(id: number): IngestServiceError {
  return new IngestServiceError("NOT_FOUND", `Data not found: ${id}`, 404);
}

/**
 * Accepts batches of processed agent data, stores them record by record and
 * fans each stored record out to the subscribers of its user.
 *
 * A batch is not atomic: when record k fails validation or storage, records
 * before k remain stored and the error lists their ids.
 */
export class IngestService {
  private readonly deps: IngestServiceDependencies;
  private readonly perUser = new KeyedSerialQueue<number>();

  constructor(deps: IngestServiceDependencies) {
    this.deps = deps;
  }

  async ingest(batch: unknown): Promise<IngestResult> {
    if (!Array.isArray(batch)) {
      throw new IngestServiceError("INVALID_PAYLOAD", "expected a JSON array of processed agent data", 400);
    }

    const committed: number[] = [];
    for (let index = 0; index < batch.length; index += 1) {
      const parsed = ProcessedAgentDataPayload.safeParse(batch[index]);
      if (!parsed.success) {
        this.deps.logger.warn({ index, committed: committed.length }, "rejected invalid record in batch");
        throw new IngestServiceError("VALIDATION_FAILED", `record ${index}: ${describeIssues(parsed.error)}`, 422, {
          committed: [...committed],
          failedIndex: index,
        });
      }

      const record = toNewRecord(parsed.data);
      const stored = await this.perUser.run(record.user_id, () => this.persistAndNotify(record, index, committed));
      committed.push(stored.id);
    }

    this.deps.logger.info({ count: committed.length }, "batch ingested");
    return { accepted: true, ids: committed };
  }

  async get(id: number): Promise<StoredRecord> {
    const record = await this.deps.store.get(id);
    if (!record) throw notFound(id);
    return record;
  }

  async list(): Promise<StoredRecord[]> {
    return this.deps.store.list();
  }

  async update(id: number, body: unknown): Promise<StoredRecord> {
    const parsed = ProcessedAgentDataPayload.safeParse(body);
    if (!parsed.success) {
      throw new IngestServiceError("VALIDATION_FAILED", describeIssues(parsed.error), 422);
    }
    const updated = await this.deps.store.update(id, toNewRecord(parsed.data));
    if (!updated) throw notFound(id);
    return updated;
  }

  async remove(id: number): Promise<StoredRecord> {
    const removed = await this.deps.store.delete(id);
    if (!removed) throw notFound(id);
    return removed;
  }

  private async persistAndNotify(record: NewRecord, index: number, committed: number[]): Promise<StoredRecord> {
    let stored: StoredRecord;
    try {
      stored = await this.deps.store.insert(record);
    }
    catch (err) {
      this.deps.logger.error({ err, index, committed: committed.length }, "record store insert failed");
      throw new IngestServiceError("STORAGE_UNAVAILABLE", "record store unavailable", 503, {
        committed: [...committed],
        failedIndex: index,
        cause: err,
      });
    }

    const delivered = await this.deps.registry.notify(stored.user_id, stored);
    this.deps.logger.debug({ id: stored.id, userId: stored.user_id, delivered }, "record stored");
    return stored;
  }
}
