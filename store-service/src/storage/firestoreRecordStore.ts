import type { DocumentData, Firestore } from "firebase-admin/firestore";
import { ROAD_STATES, type StoredRecord } from "@roadwatch/types";
import { z } from "zod";
import { timestampToIsoString } from "../lib/time.js";
import { StorageError, type NewRecord, type RecordStore, type StorageOperation } from "./recordStore.js";

const COUNTERS_COLLECTION = "counters";

const StoredDocument = z.object({
  id: z.number().int().positive(),
  road_state: z.enum(ROAD_STATES),
  user_id: z.number().int().nonnegative(),
  x: z.number(),
  y: z.number(),
  z: z.number(),
  latitude: z.number(),
  longitude: z.number(),
  timestamp: z.unknown(),
});

function toDocument(id: number, record: NewRecord): DocumentData {
  return {
    id,
    road_state: record.road_state,
    user_id: record.user_id,
    x: record.x,
    y: record.y,
    z: record.z,
    latitude: record.latitude,
    longitude: record.longitude,
    timestamp: new Date(record.timestamp),
  };
}

function fromDocument(data: DocumentData | undefined): StoredRecord {
  const parsed = StoredDocument.safeParse(data);
  const timestamp = parsed.success ? timestampToIsoString(parsed.data.timestamp) : null;
  if (!parsed.success || !timestamp) {
    throw new StorageError("get", "stored document is malformed");
  }
  return { ...parsed.data, timestamp };
}

/**
 * Firestore-backed store. Rows live under `<collection>/<id>`; integer ids come from
 * `counters/<collection>.next`, incremented in the same transaction as the insert.
 */
export class FirestoreRecordStore implements RecordStore {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName = "processed_agent_data"
  ) {}

  private rows() {
    return this.db.collection(this.collectionName);
  }

  private counter() {
    return this.db.collection(COUNTERS_COLLECTION).doc(this.collectionName);
  }

  async insert(record: NewRecord): Promise<StoredRecord> {
    return this.guard("insert", () => this.db.runTransaction(async (tx) => {
      const counterRef = this.counter();
      const counterSnap = await tx.get(counterRef);
      const next = Number(counterSnap.get("next"));
      const id = Number.isInteger(next) && next > 0 ? next : 1;
      tx.set(counterRef, { next: id + 1 });
      tx.set(this.rows().doc(String(id)), toDocument(id, record));
      return { id, ...record };
    }));
  }

  async get(id: number): Promise<StoredRecord | null> {
    return this.guard("get", async () => {
      const snap = await this.rows().doc(String(id)).get();
      return snap.exists ? fromDocument(snap.data()) : null;
    });
  }

  async list(): Promise<StoredRecord[]> {
    return this.guard("list", async () => {
      const snap = await this.rows().orderBy("id", "asc").get();
      return snap.docs.map((doc) => fromDocument(doc.data()));
    });
  }

  async update(id: number, record: NewRecord): Promise<StoredRecord | null> {
    return this.guard("update", () => this.db.runTransaction(async (tx) => {
      const ref = this.rows().doc(String(id));
      const snap = await tx.get(ref);
      if (!snap.exists) return null;
      tx.set(ref, toDocument(id, record));
      return { id, ...record };
    }));
  }

  async delete(id: number): Promise<StoredRecord | null> {
    return this.guard("delete", () => this.db.runTransaction(async (tx) => {
      const ref = this.rows().doc(String(id));
      const snap = await tx.get(ref);
      if (!snap.exists) return null;
      const existing = fromDocument(snap.data());
      tx.delete(ref);
      return existing;
    }));
  }

  async close(): Promise<void> {
    await this.db.terminate();
  }

  private async guard<T>(operation: StorageOperation, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    }
    catch (err) {
      if (err instanceof StorageError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new StorageError(operation, `firestore ${operation} failed: ${detail}`, { cause: err });
    }
  }
}
